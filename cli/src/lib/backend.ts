import { runAz, runAzJson, type AzRunner } from './az.js';
import type { ProviderRegistry } from './audit/registry.js';

export interface AzureAccount {
  name: string;
  subscriptionId: string;
  tenantId: string;
  user: string;
}

export interface ResourceSummary {
  name: string;
  type: string;
  location: string;
}

export interface TemplateRequest {
  resourceGroup: string;
  templateFile: string;
  parameterFile?: string;
}

export interface DeploymentRequest extends TemplateRequest {
  deploymentName: string;
}

export interface DeploymentResult {
  name: string;
  provisioningState: string;
}

export type DeploymentOutputs = Record<string, string>;

/**
 * Everything the deployment commands need from Azure. Callers depend on this
 * interface only; {@link AzCliBackend} is the production implementation.
 */
export interface DeploymentBackend {
  getAccount(): Promise<AzureAccount>;
  createResourceGroup(name: string, location: string): Promise<void>;
  validateTemplate(request: TemplateRequest): Promise<void>;
  deployTemplate(request: DeploymentRequest): Promise<DeploymentResult>;
  getDeploymentOutputs(resourceGroup: string, deploymentName: string): Promise<DeploymentOutputs>;
  listResources(resourceGroup: string): Promise<ResourceSummary[]>;
  deleteResourceGroup(name: string): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * ARM returns outputs as `{ name: { type, value } }`. Flatten to `{ name: value }`;
 * objects and arrays are kept as compact JSON.
 */
export function flattenDeploymentOutputs(raw: unknown): DeploymentOutputs {
  const flat: DeploymentOutputs = {};
  if (!isRecord(raw)) {
    return flat;
  }
  for (const [key, val] of Object.entries(raw)) {
    const value = isRecord(val) && 'value' in val ? val.value : val;
    flat[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return flat;
}

function templateArgs(request: TemplateRequest): string[] {
  const args = [
    '--resource-group', request.resourceGroup,
    '--template-file', request.templateFile,
  ];
  if (request.parameterFile) {
    args.push('--parameters', `@${request.parameterFile}`);
  }
  return args;
}

export class AzCliBackend implements DeploymentBackend, ProviderRegistry {
  constructor(private readonly run: AzRunner = runAz) {}

  async getAccount(): Promise<AzureAccount> {
    const raw = await runAzJson(this.run, ['account', 'show']);
    if (!isRecord(raw)) {
      throw new Error('Unexpected response from az account show');
    }
    const user = isRecord(raw.user) ? stringField(raw.user, 'name') : '';
    return {
      name: stringField(raw, 'name'),
      subscriptionId: stringField(raw, 'id'),
      tenantId: stringField(raw, 'tenantId'),
      user,
    };
  }

  async createResourceGroup(name: string, location: string): Promise<void> {
    await runAzJson(this.run, ['group', 'create', '--name', name, '--location', location]);
  }

  async validateTemplate(request: TemplateRequest): Promise<void> {
    await runAzJson(this.run, ['deployment', 'group', 'validate', ...templateArgs(request)]);
  }

  async deployTemplate(request: DeploymentRequest): Promise<DeploymentResult> {
    const raw = await runAzJson(this.run, [
      'deployment', 'group', 'create',
      ...templateArgs(request),
      '--name', request.deploymentName,
    ]);
    const properties = isRecord(raw) && isRecord(raw.properties) ? raw.properties : {};
    return {
      name: request.deploymentName,
      provisioningState: stringField(properties, 'provisioningState') || 'Unknown',
    };
  }

  async getDeploymentOutputs(
    resourceGroup: string,
    deploymentName: string
  ): Promise<DeploymentOutputs> {
    const raw = await runAzJson(this.run, [
      'deployment', 'group', 'show',
      '--resource-group', resourceGroup,
      '--name', deploymentName,
      '--query', 'properties.outputs',
    ]);
    return flattenDeploymentOutputs(raw);
  }

  async listResources(resourceGroup: string): Promise<ResourceSummary[]> {
    const raw = await runAzJson(this.run, ['resource', 'list', '--resource-group', resourceGroup]);
    if (!Array.isArray(raw)) {
      return [];
    }
    return raw.filter(isRecord).map((item) => ({
      name: stringField(item, 'name'),
      type: stringField(item, 'type'),
      location: stringField(item, 'location'),
    }));
  }

  async deleteResourceGroup(name: string): Promise<void> {
    await runAzJson(this.run, ['group', 'delete', '--name', name, '--yes']);
  }

  async listApiVersions(namespace: string, resourceType: string): Promise<string[]> {
    const raw = await runAzJson(this.run, [
      'provider', 'show',
      '--namespace', namespace,
      '--query', `resourceTypes[?resourceType=='${resourceType}'].apiVersions | [0]`,
    ]);
    if (!Array.isArray(raw)) {
      return [];
    }
    return raw.filter((v): v is string => typeof v === 'string');
  }
}

/**
 * Precondition for every command that talks to Azure.
 */
export async function requireAzureCli(backend: DeploymentBackend): Promise<AzureAccount> {
  try {
    return await backend.getAccount();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(
      `Azure CLI is not available or not logged in. Run \`az login\` first.\n${detail}`
    );
  }
}
