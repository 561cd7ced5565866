/**
 * Lookup of the API versions a resource provider currently publishes.
 * Implementations resolve newest first; only the first entry is consulted.
 */
export interface ProviderRegistry {
  listApiVersions(namespace: string, resourceType: string): Promise<string[]>;
}

export interface ResourceTypeParts {
  namespace: string;
  resourceType: string;
}

/**
 * Split `Microsoft.Network/virtualNetworks/subnets` into its provider
 * namespace and the (possibly nested) type. `null` when there is no `/`.
 */
export function splitResourceType(type: string): ResourceTypeParts | null {
  const index = type.indexOf('/');
  if (index <= 0 || index === type.length - 1) {
    return null;
  }
  return {
    namespace: type.slice(0, index),
    resourceType: type.slice(index + 1),
  };
}
