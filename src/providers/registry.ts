import type { Capability, CapabilityMap, FetchFn } from './types.js';
import type { ProviderCredentials, StudioConfig, StudioPaths } from '../workspace/types.js';

export interface ProviderDeps {
  config: StudioConfig;
  credentials: ProviderCredentials;
  paths: StudioPaths;
  fetch: FetchFn;
}

/**
 * Builds a provider instance, or returns null when the provider is not usable
 * with the given deps (typically a missing API key).
 */
export type ProviderConstructor<C extends Capability> = (deps: ProviderDeps) => CapabilityMap[C] | null;

type Registry = { [C in Capability]: Map<string, ProviderConstructor<C>> };

const registry: Registry = {
  trend: new Map(),
  script: new Map(),
  asset: new Map(),
  voiceover: new Map(),
  video: new Map(),
  thumbnail: new Map(),
  upload: new Map(),
};

export function registerProvider<C extends Capability>(
  capability: C,
  name: string,
  create: ProviderConstructor<C>,
): void {
  const entries: Map<string, ProviderConstructor<C>> = registry[capability];
  if (entries.has(name)) {
    throw new Error(`Provider ${capability}.${name} is already registered`);
  }
  entries.set(name, create);
}

export function lookupProvider<C extends Capability>(
  capability: C,
  name: string,
): ProviderConstructor<C> | undefined {
  const entries: Map<string, ProviderConstructor<C>> = registry[capability];
  return entries.get(name);
}

export function registeredProviders(capability: Capability): string[] {
  return [...registry[capability].keys()];
}
