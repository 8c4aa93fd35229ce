import chalk from 'chalk';
import ora from 'ora';
import { createConfiguredModel } from '../core/index.js';
import { listAncestors, listClasses, listMethods } from '../refactor/queries.js';

interface QueryOptions {
  json?: boolean;
  source?: string[];
}

export async function classesCommand(options: QueryOptions = {}): Promise<void> {
  const spinner = ora('Reading sources...').start();

  try {
    const model = await createConfiguredModel(process.cwd(), { sourceRoots: options.source });
    const classes = listClasses(model);
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(classes, null, 2));
      return;
    }

    if (classes.length === 0) {
      console.log(chalk.gray('\nNo classes found.\n'));
      return;
    }

    console.log(chalk.cyan(`\nClasses (${classes.length}):\n`));
    for (const cls of classes) {
      const abstract = cls.isAbstract ? chalk.magenta(' abstract') : '';
      const parent = cls.superclass ? chalk.gray(` extends ${cls.superclass}`) : '';
      console.log(`  ${chalk.white(cls.qualifiedName)}${abstract}${parent}`);
      console.log(chalk.gray(`    ${cls.methodCount} methods, ${cls.fieldCount} fields`));
    }
    console.log('');
  } catch (error) {
    spinner.fail('Failed to read sources');
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : error}`));
    process.exit(1);
  }
}

export async function methodsCommand(className: string, options: QueryOptions = {}): Promise<void> {
  const spinner = ora('Reading sources...').start();

  try {
    const model = await createConfiguredModel(process.cwd(), { sourceRoots: options.source });
    const methods = listMethods(model, className);
    spinner.stop();

    if (methods === null) {
      console.error(chalk.red(`\nError: Class ${className} not found`));
      process.exit(1);
    }

    if (options.json) {
      console.log(JSON.stringify(methods, null, 2));
      return;
    }

    console.log(chalk.cyan(`\nMethods of ${className}:\n`));
    for (const method of methods) {
      const flags = [method.visibility, method.isStatic ? 'static' : '', method.isAbstract ? 'abstract' : '']
        .filter(Boolean)
        .join(' ');
      console.log(`  ${chalk.white(method.signature)} ${chalk.gray(flags)}`);
    }
    console.log('');
  } catch (error) {
    spinner.fail('Failed to read sources');
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : error}`));
    process.exit(1);
  }
}

export async function ancestorsCommand(className: string, options: QueryOptions = {}): Promise<void> {
  const spinner = ora('Reading sources...').start();

  try {
    const model = await createConfiguredModel(process.cwd(), { sourceRoots: options.source });
    const ancestors = listAncestors(model, className);
    spinner.stop();

    if (ancestors === null) {
      console.error(chalk.red(`\nError: Class ${className} not found`));
      process.exit(1);
    }

    if (options.json) {
      console.log(JSON.stringify(ancestors, null, 2));
      return;
    }

    if (ancestors.length === 0) {
      console.log(chalk.gray(`\n${className} has no ancestors.\n`));
      return;
    }

    console.log(chalk.cyan(`\nAncestors of ${className}, nearest first:\n`));
    for (const name of ancestors) {
      const external = model.findClass(name) === undefined ? chalk.gray(' (not scanned)') : '';
      console.log(`  ${chalk.white(name)}${external}`);
    }
    console.log('');
  } catch (error) {
    spinner.fail('Failed to read sources');
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : error}`));
    process.exit(1);
  }
}
