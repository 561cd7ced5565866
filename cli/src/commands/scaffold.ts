import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { scaffoldCorpus, type ScaffoldEntry, type ScaffoldStatus } from '../lib/scaffold.js';
import { withErrors } from '../lib/command.js';

const STATUS_LABEL: Record<ScaffoldStatus, string> = {
  created: chalk.green('created  '),
  updated: chalk.yellow('updated  '),
  unchanged: chalk.gray('unchanged'),
};

export function registerScaffoldCommand(program: Command): void {
  program
    .command('scaffold [dir]')
    .description('Write the tutorial docs and example templates to a directory')
    .action(withErrors(async (dir: string | undefined) => {
      const target = path.resolve(dir ?? '.');

      const spinner = ora(`Writing tutorial files to ${target}...`).start();
      let entries: ScaffoldEntry[];
      try {
        entries = await scaffoldCorpus(target);
      } catch (err) {
        spinner.fail('Scaffold failed');
        throw err;
      }
      spinner.succeed(`Tutorial files written to ${target}`);

      for (const entry of entries) {
        process.stdout.write(`  ${STATUS_LABEL[entry.status]}  ${entry.path}\n`);
      }

      const created = entries.filter((e) => e.status === 'created').length;
      const updated = entries.filter((e) => e.status === 'updated').length;
      process.stdout.write(
        chalk.gray(
          `\n${entries.length} file(s): ${created} created, ${updated} updated, ` +
            `${entries.length - created - updated} unchanged\n`
        )
      );
      process.stdout.write(
        chalk.gray('Next: `bicep-tutorial examples` to see what you can deploy.\n')
      );
    }));
}
