import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getConfigValue } from '../lib/config.js';
import { withAzure } from '../lib/command.js';
import { printResourceTable } from '../lib/table.js';

export function registerResourcesCommand(program: Command): void {
  program
    .command('resources')
    .description('List the resources in a resource group')
    .option('-g, --resource-group <name>', 'Resource group (default from config)')
    .option('--json', 'Output as JSON')
    .action(withAzure(async (backend, opts: { resourceGroup?: string; json?: boolean }) => {
      const resourceGroup = opts.resourceGroup ?? getConfigValue('azure.resourceGroup');

      const spinner = ora(`Fetching resources in ${resourceGroup}...`).start();
      const resources = await backend.listResources(resourceGroup);
      spinner.stop();

      if (opts.json) {
        process.stdout.write(JSON.stringify(resources, null, 2) + '\n');
        return;
      }

      printResourceTable(resources);
      if (resources.length > 0) {
        process.stdout.write(chalk.gray(`\n${resources.length} resource(s)\n`));
      }
    }));
}
