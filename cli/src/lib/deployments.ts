import { existsSync } from 'fs';
import * as path from 'path';
import dayjs, { type Dayjs } from 'dayjs';
import type { ExampleInfo } from './examples.js';
import type {
  DeploymentBackend,
  DeploymentOutputs,
  DeploymentResult,
  ResourceSummary,
} from './backend.js';

/** Free-form; only `prod` changes which parameter file is picked. */
export type Environment = string;

export function validateEnvironment(value: string): Environment {
  const env = value.trim();
  if (!env) {
    throw new Error('Environment cannot be empty.');
  }
  return env;
}

/** `params-deployment-20250304-050607` */
export function buildDeploymentName(prefix: string, now: Date | Dayjs = new Date()): string {
  return `${prefix}-${dayjs(now).format('YYYYMMDD-HHmmss')}`;
}

/**
 * Pick the parameter file for an environment. Only `prod` has its own file;
 * every other environment uses the dev one. An explicit override wins and
 * must exist; a missing example default resolves to `undefined`.
 */
export function resolveParameterFile(
  example: ExampleInfo,
  environment: Environment,
  exampleDir: string,
  override?: string
): string | undefined {
  if (override) {
    const explicit = path.resolve(override);
    if (!existsSync(explicit)) {
      throw new Error(`Parameter file not found: ${explicit}`);
    }
    return explicit;
  }
  const file =
    environment === 'prod' && example.parameterFiles.prod
      ? example.parameterFiles.prod
      : example.parameterFiles.dev;
  const candidate = file ? path.join(exampleDir, file) : undefined;
  return candidate && existsSync(candidate) ? candidate : undefined;
}

export interface DeploymentPlan {
  example: ExampleInfo;
  resourceGroup: string;
  location: string;
  environment: Environment;
  templateFile: string;
  parameterFile?: string;
  deploymentName: string;
}

export interface PlanOptions {
  resourceGroup: string;
  location: string;
  environment: Environment;
  examplesDir: string;
  parameterFile?: string;
  deploymentName?: string;
  now?: Date | Dayjs;
}

export function planDeployment(example: ExampleInfo, options: PlanOptions): DeploymentPlan {
  const exampleDir = path.resolve(options.examplesDir, example.directory);
  const templateFile = path.join(exampleDir, example.templateFile);
  if (!existsSync(templateFile)) {
    throw new Error(
      `Template not found: ${templateFile}. Run \`bicep-tutorial scaffold\` first or pass --dir.`
    );
  }

  return {
    example,
    resourceGroup: options.resourceGroup,
    location: options.location,
    environment: options.environment,
    templateFile,
    parameterFile: resolveParameterFile(
      example,
      options.environment,
      exampleDir,
      options.parameterFile
    ),
    deploymentName:
      options.deploymentName ?? buildDeploymentName(example.deploymentPrefix, options.now),
  };
}

export type DeploymentStep =
  | 'createResourceGroup'
  | 'validateTemplate'
  | 'deployTemplate'
  | 'getDeploymentOutputs'
  | 'listResources';

export interface DeploymentOutcome {
  deployment?: DeploymentResult;
  outputs: DeploymentOutputs;
  resources: ResourceSummary[];
}

export interface ExecuteOptions {
  validateOnly?: boolean;
  onStep?: (step: DeploymentStep) => void;
}

/**
 * Resource group, validation, deployment, outputs, resource listing, in that
 * order. The first failure propagates and nothing after it runs.
 */
export async function executeDeployment(
  plan: DeploymentPlan,
  backend: DeploymentBackend,
  options: ExecuteOptions = {}
): Promise<DeploymentOutcome> {
  const step = options.onStep ?? (() => undefined);
  const template = {
    resourceGroup: plan.resourceGroup,
    templateFile: plan.templateFile,
    parameterFile: plan.parameterFile,
  };

  step('createResourceGroup');
  await backend.createResourceGroup(plan.resourceGroup, plan.location);

  step('validateTemplate');
  await backend.validateTemplate(template);

  if (options.validateOnly) {
    return { outputs: {}, resources: [] };
  }

  step('deployTemplate');
  const deployment = await backend.deployTemplate({
    ...template,
    deploymentName: plan.deploymentName,
  });

  step('getDeploymentOutputs');
  const outputs = await backend.getDeploymentOutputs(plan.resourceGroup, plan.deploymentName);

  step('listResources');
  const resources = await backend.listResources(plan.resourceGroup);

  return { deployment, outputs, resources };
}
