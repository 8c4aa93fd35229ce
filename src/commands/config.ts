import inquirer from 'inquirer';
import chalk from 'chalk';
import Conf from 'conf';
import type { HoistConfig } from '../core/config.js';
import { DEFAULT_STUB_MESSAGE } from '../refactor/types.js';

interface GlobalConfig {
  backup?: boolean;
  stubMessage?: string;
}

const globalConf = new Conf<GlobalConfig>({
  projectName: 'hoist-global',
  configName: 'config',
});

export async function configCommand(): Promise<void> {
  console.log(chalk.green.bold('\nhoist - Global Configuration\n'));

  const current = getGlobalDefaults();
  console.log(chalk.gray(`Snapshots before writing: ${current.backup === false ? 'off' : 'on'}`));
  console.log(chalk.gray(`Stub message: ${current.stubMessage ?? DEFAULT_STUB_MESSAGE}\n`));

  const { action } = await inquirer.prompt([
    {
      type: 'list',
      name: 'action',
      message: 'What would you like to do?',
      choices: [
        { name: 'Update defaults', value: 'update' },
        { name: 'Reset to built-in defaults', value: 'reset' },
        { name: 'Cancel', value: 'cancel' },
      ],
    },
  ]);

  if (action === 'cancel') {
    return;
  }

  if (action === 'reset') {
    globalConf.delete('backup');
    globalConf.delete('stubMessage');
    console.log(chalk.yellow('\nGlobal defaults reset.'));
    return;
  }

  const answers = await inquirer.prompt([
    {
      type: 'confirm',
      name: 'backup',
      message: 'Snapshot files before writing them?',
      default: current.backup !== false,
    },
    {
      type: 'input',
      name: 'stubMessage',
      message: 'Message thrown by generated stubs ({class} and {method} are replaced):',
      default: current.stubMessage ?? DEFAULT_STUB_MESSAGE,
      validate: (input: string) => {
        if (!input || input.trim().length === 0) {
          return 'Please enter a message';
        }
        return true;
      },
    },
  ]);

  globalConf.set('backup', answers.backup === true);
  globalConf.set('stubMessage', String(answers.stubMessage));

  console.log(chalk.green('\n✓ Defaults saved successfully!'));
  console.log(chalk.gray('\nProject files (.hoistrc) and command-line flags still take precedence.\n'));
}

/** Global defaults, with environment variables taking precedence (useful for CI/CD) */
export function getGlobalDefaults(): HoistConfig {
  const defaults: HoistConfig = {};

  const envBackup = process.env.HOIST_BACKUP;
  const backup = envBackup !== undefined ? !['0', 'false', 'off'].includes(envBackup.toLowerCase()) : globalConf.get('backup');
  if (backup !== undefined) defaults.backup = backup;

  const stubMessage = process.env.HOIST_STUB_MESSAGE ?? globalConf.get('stubMessage');
  if (stubMessage !== undefined) defaults.stubMessage = stubMessage;

  return defaults;
}
