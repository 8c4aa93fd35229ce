#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import {
  configCommand,
  pullUpCommand,
  classesCommand,
  methodsCommand,
  ancestorsCommand,
  restoreCommand,
  snapshotsCommand,
  type PullUpCommandOptions,
} from './commands/index.js';

const program = new Command();

program
  .name('hoist')
  .description(
    chalk.green('hoist') +
      ' - Pull methods up TypeScript class hierarchies\n' +
      chalk.gray('Moves a method and what it depends on into an ancestor, keeping every subclass compiling')
  )
  .version('0.1.0');

// =============================================================================
// REFACTORING
// =============================================================================

program
  .command('pull-up <class> <method>')
  .description('Move a method from a class into one of its ancestors')
  .option('-s, --source <paths...>', 'Source roots to scan (default: config or src)')
  .option('-t, --to <ancestor>', 'Destination ancestor (default: the direct superclass)')
  .option('--pick', 'Choose the destination ancestor interactively')
  .option('--dry-run', 'Preview the rewritten files without writing them')
  .option('-y, --yes', 'Skip confirmation prompt')
  .option('--no-backup', 'Do not snapshot files before writing')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print the migration trace')
  .action(async (className: string, methodName: string, options: PullUpCommandOptions) => {
    await pullUpCommand(className, methodName, options);
  });

program
  .command('restore [snapshotId]')
  .description('Undo a pull-up by restoring a snapshot (the latest by default)')
  .action((snapshotId: string | undefined) => {
    restoreCommand(snapshotId);
  });

program
  .command('snapshots')
  .description('List snapshots taken before pull-ups')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    snapshotsCommand(options);
  });

// =============================================================================
// EXPLORING
// =============================================================================

program
  .command('classes')
  .description('List the classes found in the source roots')
  .option('-s, --source <paths...>', 'Source roots to scan')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean; source?: string[] }) => {
    await classesCommand(options);
  });

program
  .command('methods <class>')
  .description('List the methods a class declares')
  .option('-s, --source <paths...>', 'Source roots to scan')
  .option('--json', 'Output as JSON')
  .action(async (className: string, options: { json?: boolean; source?: string[] }) => {
    await methodsCommand(className, options);
  });

program
  .command('ancestors <class>')
  .description('List the ancestors of a class, nearest first')
  .option('-s, --source <paths...>', 'Source roots to scan')
  .option('--json', 'Output as JSON')
  .action(async (className: string, options: { json?: boolean; source?: string[] }) => {
    await ancestorsCommand(className, options);
  });

program
  .command('config')
  .description('Set global defaults (snapshots, stub message)')
  .action(async () => {
    await configCommand();
  });

// =============================================================================
// HELP TEXT
// =============================================================================

program.addHelpText(
  'after',
  `
${chalk.green.bold('Get Started:')}
  ${chalk.white('$')} hoist classes                        ${chalk.gray('# What is in this project?')}
  ${chalk.white('$')} hoist ancestors Dog                  ${chalk.gray('# Where could Dog\'s methods go?')}
  ${chalk.white('$')} hoist pull-up Dog speak --dry-run    ${chalk.gray('# Preview the move')}
  ${chalk.white('$')} hoist pull-up Dog speak --to Animal  ${chalk.gray('# Do it')}
  ${chalk.white('$')} hoist restore                        ${chalk.gray('# Changed your mind')}
`
);

// Handle unknown commands
program.on('command:*', () => {
  console.error(chalk.red(`\nUnknown command: ${program.args.join(' ')}`));
  console.log(chalk.gray(`Run ${chalk.white('hoist --help')} for usage.\n`));
  process.exit(1);
});

program.parse();
