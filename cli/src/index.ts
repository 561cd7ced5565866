#!/usr/bin/env node

import { Command } from 'commander';
import { registerAccountCommand } from './commands/account.js';
import { registerAuditCommand } from './commands/audit.js';
import { registerConfigCommand } from './commands/config.js';
import { registerDeployCommand, registerValidateCommand } from './commands/deploy.js';
import { registerDestroyCommand } from './commands/destroy.js';
import { registerExamplesCommand } from './commands/examples.js';
import { registerResourcesCommand } from './commands/resources.js';
import { registerScaffoldCommand } from './commands/scaffold.js';

const program = new Command();

program
  .name('bicep-tutorial')
  .description('Bicep tutorial CLI - scaffold, deploy and audit the example templates')
  .version('1.0.0');

registerScaffoldCommand(program);
registerExamplesCommand(program);
registerValidateCommand(program);
registerDeployCommand(program);
registerResourcesCommand(program);
registerDestroyCommand(program);
registerAuditCommand(program);
registerAccountCommand(program);
registerConfigCommand(program);

program.parse(process.argv);
