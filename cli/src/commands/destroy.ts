import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getConfigValue } from '../lib/config.js';
import { confirmByTyping } from '../lib/prompt.js';
import { withAzure } from '../lib/command.js';

export function registerDestroyCommand(program: Command): void {
  program
    .command('destroy')
    .description('Delete a tutorial resource group and everything in it')
    .option('-g, --resource-group <name>', 'Resource group (default from config)')
    .option('--force', 'Skip confirmation prompt')
    .action(withAzure(async (backend, opts: { resourceGroup?: string; force?: boolean }) => {
      const name = opts.resourceGroup ?? getConfigValue('azure.resourceGroup');

      const spinner = ora('Fetching resource group contents...').start();
      const resources = await backend.listResources(name);
      spinner.stop();

      process.stdout.write('\n');
      process.stdout.write(chalk.bold.red('Delete Resource Group\n'));
      process.stdout.write(`  Name:      ${chalk.cyan(name)}\n`);
      process.stdout.write(`  Resources: ${resources.length}\n`);
      for (const resource of resources) {
        process.stdout.write(chalk.gray(`    - ${resource.name} (${resource.type})\n`));
      }
      process.stdout.write('\n');
      process.stdout.write(
        chalk.yellow('This will permanently delete the resource group and all its resources.\n')
      );

      if (!opts.force) {
        if (!(await confirmByTyping(name))) {
          process.stdout.write(chalk.yellow('Aborted.\n'));
          return;
        }
      }

      const deleteSpinner = ora(`Deleting ${name}...`).start();
      try {
        await backend.deleteResourceGroup(name);
      } catch (err) {
        deleteSpinner.fail('Delete failed');
        throw err;
      }
      deleteSpinner.succeed('Resource group deleted');

      process.stdout.write(chalk.green(`\nResource group "${name}" deleted.\n`));
    }));
}
