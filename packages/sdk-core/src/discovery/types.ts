import type { RoleSource, RoleSourceConstructor } from '../providers/index.js';

/**
 * Namespace under which provider plugins register themselves.
 */
export const PROVIDER_NAMESPACE = 'cloud-sdk.providers';

export type ProviderTarget = RoleSource | RoleSourceConstructor;

export interface ProviderRegistration {
  namespace: string;
  name: string;
  /** Where the registration came from, e.g. `builtin` or a manifest path. */
  source: string;
  load: () => ProviderTarget;
}

/**
 * Discovery capability consumed by provider resolution. Implementations
 * return every registration matching the name; resolution decides what to
 * do with zero or several.
 */
export interface ProviderRegistry {
  findProviders(namespace: string, name: string): ProviderRegistration[];
}
