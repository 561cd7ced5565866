import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { getConfigValue } from '../lib/config.js';
import { withAzure } from '../lib/command.js';
import { EXAMPLE_NAMES, findExample, type ExampleInfo } from '../lib/examples.js';
import type { DeploymentBackend } from '../lib/backend.js';
import { printResourceTable } from '../lib/table.js';
import {
  executeDeployment,
  planDeployment,
  validateEnvironment,
  type DeploymentOutcome,
  type DeploymentPlan,
  type DeploymentStep,
} from '../lib/deployments.js';

interface DeployOptions {
  resourceGroup?: string;
  location?: string;
  environment: string;
  parameters?: string;
  dir?: string;
  name?: string;
}

const STEP_TEXT: Record<DeploymentStep, string> = {
  createResourceGroup: 'Creating resource group...',
  validateTemplate: 'Validating template...',
  deployTemplate: 'Deploying template...',
  getDeploymentOutputs: 'Fetching deployment outputs...',
  listResources: 'Listing created resources...',
};

function requireExample(name: string): ExampleInfo {
  const example = findExample(name);
  if (!example) {
    throw new Error(`Unknown example "${name}". Choose from: ${EXAMPLE_NAMES.join(', ')}`);
  }
  return example;
}

function buildPlan(name: string, opts: DeployOptions): DeploymentPlan {
  return planDeployment(requireExample(name), {
    resourceGroup: opts.resourceGroup ?? getConfigValue('azure.resourceGroup'),
    location: opts.location ?? getConfigValue('azure.location'),
    environment: validateEnvironment(opts.environment),
    examplesDir: opts.dir ?? getConfigValue('paths.examplesDir'),
    parameterFile: opts.parameters,
    deploymentName: opts.name,
  });
}

function printPlan(title: string, plan: DeploymentPlan): void {
  process.stdout.write('\n');
  process.stdout.write(chalk.bold(`${title} ${plan.example.name}\n`));
  process.stdout.write(`  Resource Group:  ${chalk.cyan(plan.resourceGroup)}\n`);
  process.stdout.write(`  Location:        ${plan.location}\n`);
  process.stdout.write(`  Environment:     ${plan.environment}\n`);
  process.stdout.write(`  Deployment Name: ${plan.deploymentName}\n`);
  process.stdout.write(`  Template:        ${plan.templateFile}\n`);
  if (plan.parameterFile) {
    process.stdout.write(`  Parameter file:  ${plan.parameterFile}\n`);
  } else {
    process.stdout.write(chalk.gray('  Parameter file:  none (template defaults)\n'));
  }
  process.stdout.write('\n');
}

async function runWithSpinner(
  plan: DeploymentPlan,
  backend: DeploymentBackend,
  validateOnly: boolean
): Promise<DeploymentOutcome> {
  const progress: { spinner: Ora | null } = { spinner: null };
  try {
    const outcome = await executeDeployment(plan, backend, {
      validateOnly,
      onStep: (step) => {
        progress.spinner?.succeed();
        progress.spinner = ora(STEP_TEXT[step]).start();
      },
    });
    progress.spinner?.succeed();
    return outcome;
  } catch (err) {
    progress.spinner?.fail();
    throw err;
  }
}

function addTargetOptions(command: Command): Command {
  return command
    .option('-g, --resource-group <name>', 'Resource group (default from config)')
    .option('-l, --location <location>', 'Azure region (default from config)')
    .option('-e, --environment <env>', 'Environment name; prod uses the prod parameter file', 'dev')
    .option('-p, --parameters <file>', 'Parameter file to use instead of the example default')
    .option('--dir <dir>', 'Directory holding the scaffolded examples');
}

export function registerDeployCommand(program: Command): void {
  addTargetOptions(
    program
      .command('deploy <example>')
      .description('Deploy a tutorial example to a resource group')
  )
    .option('--name <deploymentName>', 'Deployment name (default: <prefix>-<timestamp>)')
    .action(withAzure(async (backend, name: string, opts: DeployOptions) => {
      const plan = buildPlan(name, opts);
      printPlan('Deploying', plan);

      const outcome = await runWithSpinner(plan, backend, false);

      process.stdout.write(
        chalk.green(
          `\nDeployment ${plan.deploymentName} finished: ${outcome.deployment?.provisioningState ?? 'Unknown'}\n`
        )
      );

      process.stdout.write(chalk.bold('\nDeployment outputs:\n'));
      process.stdout.write(JSON.stringify(outcome.outputs, null, 2) + '\n');

      process.stdout.write(chalk.bold('\nCreated resources:\n'));
      printResourceTable(outcome.resources);

      if (plan.example.parameterFiles.prod) {
        process.stdout.write(chalk.gray('\nExample usage for different environments:\n'));
        process.stdout.write(chalk.gray(`  Development: bicep-tutorial deploy ${plan.example.name} -e dev\n`));
        process.stdout.write(
          chalk.gray(`  Production:  bicep-tutorial deploy ${plan.example.name} -e prod -g rg-bicep-prod\n`)
        );
      }
    }));
}

export function registerValidateCommand(program: Command): void {
  addTargetOptions(
    program
      .command('validate <example>')
      .description('Create the resource group and validate an example without deploying')
  ).action(withAzure(async (backend, name: string, opts: DeployOptions) => {
    const plan = buildPlan(name, opts);
    printPlan('Validating', plan);
    await runWithSpinner(plan, backend, true);
    process.stdout.write(chalk.green(`\nTemplate ${plan.example.templateFile} is valid.\n`));
  }));
}
