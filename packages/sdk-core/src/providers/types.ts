import type { ServiceDescriptorFactory } from '../descriptors/index.js';
import type { AuthPluginFactory } from '../auth/index.js';

export const AUTH_ROLE = 'auth';

export interface ServiceBinding {
  readonly kind: 'service';
  readonly create: ServiceDescriptorFactory;
}

export interface AuthBinding {
  readonly kind: 'auth';
  readonly create: AuthPluginFactory;
}

export type RoleBinding = ServiceBinding | AuthBinding;

export type RoleTable = Readonly<Record<string, RoleBinding>>;

/**
 * Anything a preference store can be built from: a single provider or an
 * ordered composition of providers.
 */
export interface RoleSource {
  readonly name: string;
  readonly roleNames: ReadonlySet<string>;
  lookupRole(role: string): RoleBinding | undefined;
}

export type RoleSourceConstructor = new () => RoleSource;

export function serviceRole(create: ServiceDescriptorFactory): ServiceBinding {
  return { kind: 'service', create };
}

export function authRole(create: AuthPluginFactory): AuthBinding {
  return { kind: 'auth', create };
}
