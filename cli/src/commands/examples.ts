import { Command } from 'commander';
import chalk from 'chalk';
import { EXAMPLES } from '../lib/examples.js';

export function registerExamplesCommand(program: Command): void {
  program
    .command('examples')
    .description('List the tutorial examples')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      if (opts.json) {
        process.stdout.write(JSON.stringify(EXAMPLES, null, 2) + '\n');
        return;
      }

      process.stdout.write(chalk.bold('\nTutorial Examples\n'));
      process.stdout.write(chalk.gray('='.repeat(60)) + '\n\n');

      for (const example of EXAMPLES) {
        process.stdout.write(
          chalk.bold.cyan(example.name) + chalk.gray(`  (${example.directory})`) + '\n'
        );
        process.stdout.write(`  ${example.description}\n`);
        process.stdout.write(`  Template: ${example.templateFile}\n`);
        const params = Object.entries(example.parameterFiles)
          .map(([env, file]) => `${env}: ${file}`)
          .join(', ');
        if (params) {
          process.stdout.write(`  Parameters: ${params}\n`);
        }
        process.stdout.write(chalk.gray('  Resources:\n'));
        for (const resource of example.resources) {
          process.stdout.write(chalk.gray(`    - ${resource}\n`));
        }
        process.stdout.write('\n');
      }

      process.stdout.write(
        chalk.gray('Use `bicep-tutorial deploy <name>` to deploy an example.\n\n')
      );
    });
}
