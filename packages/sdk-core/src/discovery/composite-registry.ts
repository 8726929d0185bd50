import type { ProviderRegistration, ProviderRegistry } from './types.js';

/**
 * Concatenates the matches of several registries, so a name registered by
 * more than one source resolves as ambiguous instead of shadowing.
 */
export class CompositeProviderRegistry implements ProviderRegistry {
  private readonly registries: readonly ProviderRegistry[];

  constructor(...registries: ProviderRegistry[]) {
    this.registries = registries;
  }

  findProviders(namespace: string, name: string): ProviderRegistration[] {
    return this.registries.flatMap(registry => registry.findProviders(namespace, name));
  }
}
