import { Command } from 'commander';
import chalk from 'chalk';
import { getConfig } from '../lib/config.js';
import { withAzure } from '../lib/command.js';

export function registerAccountCommand(program: Command): void {
  program
    .command('account')
    .description('Show the signed-in Azure account and tutorial defaults')
    .action(withAzure(async (backend) => {
      const account = await backend.getAccount();
      const cfg = getConfig();

      process.stdout.write(chalk.green('Signed in\n'));
      process.stdout.write(`  User:           ${account.user}\n`);
      process.stdout.write(`  Subscription:   ${account.name} (${account.subscriptionId})\n`);
      process.stdout.write(`  Tenant:         ${account.tenantId}\n`);
      process.stdout.write(`  Resource Group: ${cfg.azure.resourceGroup}\n`);
      process.stdout.write(`  Location:       ${cfg.azure.location}\n`);
      process.stdout.write(`  Examples Dir:   ${cfg.paths.examplesDir}\n`);
    }));
}
