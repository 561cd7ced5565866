export interface ExampleInfo {
  name: string;
  directory: string;
  description: string;
  templateFile: string;
  parameterFiles: {
    dev?: string;
    prod?: string;
  };
  deploymentPrefix: string;
  resources: string[];
}

export const EXAMPLES: readonly ExampleInfo[] = [
  {
    name: 'basic-storage',
    directory: '01-basic-storage',
    description: 'A single storage account with hard-coded settings',
    templateFile: 'storage.bicep',
    parameterFiles: {},
    deploymentPrefix: 'storage-deployment',
    resources: ['Storage Account (Standard_LRS)'],
  },
  {
    name: 'parameters-variables',
    directory: '02-parameters-variables',
    description: 'Storage account driven by parameters, decorators and computed variables',
    templateFile: 'storage-with-params.bicep',
    parameterFiles: {
      dev: 'storage.parameters.json',
      prod: 'storage.prod.parameters.json',
    },
    deploymentPrefix: 'params-deployment',
    resources: ['Storage Account (SKU per environment)', 'Blob Service', 'Blob Container'],
  },
  {
    name: 'modules',
    directory: '03-modules',
    description: 'Web app and storage composed from reusable modules',
    templateFile: 'main.bicep',
    parameterFiles: {
      dev: 'main.parameters.json',
    },
    deploymentPrefix: 'modules-deployment',
    resources: ['Storage Account (module)', 'App Service Plan (module)', 'Web App (module)'],
  },
  {
    name: 'conditionals',
    directory: '04-conditionals',
    description: 'Optional resources and loops switched on by environment',
    templateFile: 'main.bicep',
    parameterFiles: {
      dev: 'main.parameters.json',
      prod: 'main.prod.parameters.json',
    },
    deploymentPrefix: 'conditionals-deployment',
    resources: [
      'Storage Account',
      'Log Analytics Workspace (prod only)',
      'Application Insights (prod only)',
      'Blob Containers (loop)',
    ],
  },
  {
    name: 'outputs',
    directory: '05-outputs',
    description: 'Exposing endpoints, IDs and objects as deployment outputs',
    templateFile: 'main.bicep',
    parameterFiles: {},
    deploymentPrefix: 'outputs-deployment',
    resources: ['Storage Account', 'Key Vault'],
  },
];

export const EXAMPLE_NAMES = EXAMPLES.map((e) => e.name);

export function findExample(name: string): ExampleInfo | undefined {
  return EXAMPLES.find((e) => e.name === name || e.directory === name);
}
