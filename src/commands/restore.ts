import chalk from 'chalk';
import { listSnapshots, restoreSnapshot } from '../refactor/snapshot.js';

export function restoreCommand(snapshotId?: string): void {
  const rootDir = process.cwd();

  console.log(chalk.cyan('\nRestoring from snapshot...\n'));
  const restored = restoreSnapshot(rootDir, snapshotId);
  if (restored) {
    console.log(chalk.green(`Restored ${restored}.`));
  } else {
    console.log(chalk.red('No snapshot found or restore failed.'));
    console.log(chalk.gray('Use `hoist snapshots` to see available snapshots.'));
    process.exit(1);
  }
}

export function snapshotsCommand(options: { json?: boolean } = {}): void {
  const snapshots = listSnapshots(process.cwd());

  if (options.json) {
    console.log(JSON.stringify(snapshots, null, 2));
    return;
  }

  if (snapshots.length === 0) {
    console.log(chalk.gray('\nNo snapshots found.\n'));
    return;
  }

  console.log(chalk.cyan('\nAvailable snapshots:\n'));
  for (const snapshot of snapshots) {
    console.log(chalk.white(`  ${snapshot.id}`));
    if (snapshot.description) console.log(chalk.gray(`    ${snapshot.description}`));
    console.log(chalk.gray(`    Date: ${snapshot.date.toLocaleString()}`));
    console.log(chalk.gray(`    Files: ${snapshot.fileCount}`));
  }
  console.log('');
}
