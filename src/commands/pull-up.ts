/**
 * pull-up command - Move a method from a class to one of its ancestors
 *
 * Previews the change first, asks before writing, and snapshots the files
 * it overwrites so `hoist restore` can undo the run.
 */

import * as path from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { loadProjectConfig, mergeWithDefaults, type ResolvedConfig } from '../core/config.js';
import { buildSourceModel } from '../parsers/typescript.js';
import { applyChanges, pullUpMethod } from '../refactor/pull-up.js';
import { listAncestors } from '../refactor/queries.js';
import type { RefactoringResult } from '../refactor/types.js';
import { getGlobalDefaults } from './config.js';

export interface PullUpCommandOptions {
  source?: string[];
  to?: string;
  pick?: boolean;
  dryRun?: boolean;
  yes?: boolean;
  backup?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export async function pullUpCommand(
  className: string,
  methodName: string,
  options: PullUpCommandOptions = {}
): Promise<void> {
  const rootDir = process.cwd();
  const config = mergeWithDefaults(
    { sourceRoots: options.source, backup: options.backup === false ? false : undefined },
    loadProjectConfig(rootDir),
    getGlobalDefaults()
  );

  const spinner = ora('Reading sources...');
  if (!options.json) spinner.start();

  try {
    let targetClassName = options.to;
    if (options.pick && !targetClassName) {
      spinner.stop();
      const picked = await pickAncestor(rootDir, config, className);
      if (picked === null) {
        process.exit(1);
      }
      targetClassName = picked;
      if (!options.json) spinner.start();
    }

    spinner.text = `Pulling up ${className}.${methodName}()...`;
    const result = await pullUpMethod({
      rootDir,
      sourceRoots: config.sourceRoots,
      ignore: config.ignore,
      className,
      methodName,
      targetClassName,
      stubMessage: config.stubMessage,
      dryRun: true,
    });
    spinner.stop();

    if (!result.success || !result.changes || result.changes.length === 0 || options.dryRun) {
      report(result, options, rootDir, options.dryRun ?? false);
      if (!result.success) process.exit(1);
      return;
    }

    if (!options.yes && !options.json) {
      printPlan(result, rootDir);
      const { confirm } = await inquirer.prompt([
        {
          type: 'confirm',
          name: 'confirm',
          message: `Write changes to ${chalk.cyan(result.changes.length)} file${result.changes.length !== 1 ? 's' : ''}?`,
          default: true,
        },
      ]);

      if (!confirm) {
        console.log(chalk.gray('\nCancelled. No changes made.\n'));
        return;
      }
    }

    const applied = applyChanges(rootDir, result.changes, {
      backup: config.backup,
      description: `pull-up ${className}.${methodName}`,
    });
    if (!applied.success) {
      console.error(chalk.red('\nError: Could not snapshot files before writing; nothing was changed.'));
      process.exit(1);
    }

    report(
      { ...result, message: result.message.replace(/ \(dry run\)$/, ''), snapshotId: applied.snapshotId },
      options,
      rootDir,
      false
    );
  } catch (error) {
    spinner.fail('Pull-up failed');
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : error}`));
    process.exit(1);
  }
}

/**
 * Ask which ancestor to pull into. Returns null when the class is unknown
 * or has no ancestor in the scanned sources.
 */
async function pickAncestor(rootDir: string, config: ResolvedConfig, className: string): Promise<string | null> {
  const model = await buildSourceModel(config.sourceRoots, { rootDir, ignore: config.ignore, inferTypes: false });
  const ancestors = listAncestors(model, className);

  if (ancestors === null) {
    console.error(chalk.red(`\nError: Class ${className} not found`));
    return null;
  }

  const choices = ancestors.filter(name => model.findClass(name) !== undefined);
  if (choices.length === 0) {
    console.error(chalk.red(`\nError: ${className} has no ancestor in the scanned sources`));
    return null;
  }

  const { target } = await inquirer.prompt([
    {
      type: 'list',
      name: 'target',
      message: `Pull up into which ancestor of ${chalk.cyan(className)}?`,
      choices,
    },
  ]);
  return typeof target === 'string' ? target : null;
}

function report(result: RefactoringResult, options: PullUpCommandOptions, rootDir: string, isDryRun: boolean): void {
  if (options.json) {
    printJsonResult(result, rootDir);
  } else {
    printHumanResult(result, rootDir, isDryRun, options.verbose ?? false);
  }
}

/**
 * Print result as JSON
 */
function printJsonResult(result: RefactoringResult, rootDir: string): void {
  const { changes, ...rest } = result;
  console.log(
    JSON.stringify(
      {
        ...rest,
        modifiedFiles: result.modifiedFiles.map(f => relative(rootDir, f)),
        changes: changes?.map(c => ({ filePath: relative(rootDir, c.filePath), newContent: c.newContent })),
      },
      null,
      2
    )
  );
}

function printPlan(result: RefactoringResult, rootDir: string): void {
  console.log('');
  console.log(chalk.cyan('Files to change:'));
  for (const file of result.modifiedFiles) {
    console.log(`  ${chalk.gray('-')} ${relative(rootDir, file)}`);
  }
  printWarnings(result.warnings);
}

/**
 * Print human-readable result
 */
function printHumanResult(result: RefactoringResult, rootDir: string, isDryRun: boolean, verbose: boolean): void {
  const prefix = isDryRun ? chalk.blue('[DRY RUN] ') : '';
  console.log('');

  if (!result.success) {
    console.error(prefix + chalk.red(`Error: ${result.message}`));
    if (result.code) console.log(chalk.gray(`  (${result.code})`));
    printWarnings(result.warnings);
    if (verbose) printTrace(result.trace);
    return;
  }

  console.log(prefix + chalk.green(result.message));
  console.log('');

  if (result.modifiedFiles.length > 0) {
    console.log(chalk.cyan(isDryRun ? 'Files to change:' : 'Files changed:'));
    for (const file of result.modifiedFiles) {
      console.log(`  ${chalk.gray('-')} ${relative(rootDir, file)}`);
    }
    console.log('');
  }

  if (result.visibilityChangedClasses.length > 0) {
    console.log(chalk.cyan('Visibility adjusted in:'));
    for (const name of result.visibilityChangedClasses) {
      console.log(`  ${chalk.gray('-')} ${name}`);
    }
    console.log('');
  }

  printWarnings(result.warnings);

  if (result.snapshotId) {
    console.log(chalk.gray(`Snapshot ${result.snapshotId} saved. Run \`hoist restore\` to undo.`));
    console.log('');
  }

  if (verbose) printTrace(result.trace);

  if (isDryRun && result.changes && result.changes.length > 0) {
    console.log(chalk.cyan('Preview of changes:'));
    console.log(chalk.gray('─'.repeat(50)));
    for (const change of result.changes) {
      console.log('');
      console.log(chalk.white(`File: ${relative(rootDir, change.filePath)}`));
      console.log(chalk.gray('─'.repeat(30)));
      console.log(change.newContent);
    }
    console.log(chalk.gray('─'.repeat(50)));
    console.log(chalk.blue('\nRun without --dry-run to apply these changes.'));
  }
}

function printWarnings(warnings: string[]): void {
  if (warnings.length === 0) return;
  console.log(chalk.yellow('Warnings:'));
  for (const warning of warnings) {
    console.log(`  ${chalk.yellow('!')} ${warning}`);
  }
  console.log('');
}

function printTrace(trace: string[]): void {
  console.log(chalk.gray('Trace:'));
  for (const line of trace) {
    console.log(chalk.gray(`  ${line}`));
  }
  console.log('');
}

function relative(rootDir: string, filePath: string): string {
  return path.relative(rootDir, filePath).replace(/\\/g, '/');
}
