import Conf from 'conf';

interface TutorialConfig {
  azure: {
    resourceGroup: string;
    location: string;
  };
  paths: {
    examplesDir: string;
  };
}

export const DEFAULTS: TutorialConfig = {
  azure: {
    resourceGroup: 'rg-bicep-tutorial',
    location: 'eastus',
  },
  paths: {
    examplesDir: 'examples',
  },
};

const config = new Conf<TutorialConfig>({
  projectName: 'bicep-tutorial',
  defaults: DEFAULTS,
});

export const CONFIG_PATHS = [
  'azure.resourceGroup',
  'azure.location',
  'paths.examplesDir',
] as const;

export type ConfigPath = (typeof CONFIG_PATHS)[number];

export function isConfigPath(key: string): key is ConfigPath {
  return (CONFIG_PATHS as readonly string[]).includes(key);
}

export function getConfig(): TutorialConfig {
  return {
    azure: config.get('azure'),
    paths: config.get('paths'),
  };
}

export function getConfigValue(key: ConfigPath): string {
  const value = config.get(key);
  return typeof value === 'string' ? value : '';
}

export function setConfig(key: ConfigPath, value: string): void {
  config.set(key, value);
}

export function resetConfig(): void {
  config.clear();
}
