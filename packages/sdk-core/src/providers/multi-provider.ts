import { RoleLookupError } from '../error-handling/index.js';
import type { RoleBinding, RoleSource } from './types.js';

/**
 * Ordered composition of role sources. The first member that defines a role
 * wins; bindings are never merged.
 */
export class MultiProvider implements RoleSource {
  readonly providers: readonly RoleSource[];

  constructor(...providers: RoleSource[]) {
    this.providers = providers;
  }

  get name(): string {
    return this.providers.map(provider => provider.name).join('+');
  }

  get roleNames(): ReadonlySet<string> {
    const names = new Set<string>();
    for (const provider of this.providers) {
      for (const role of provider.roleNames) {
        names.add(role);
      }
    }
    return names;
  }

  lookupRole(role: string): RoleBinding | undefined {
    for (const provider of this.providers) {
      const binding = provider.lookupRole(role);
      if (binding !== undefined) {
        return binding;
      }
    }
    return undefined;
  }

  getRole(role: string): RoleBinding {
    const binding = this.lookupRole(role);
    if (binding === undefined) {
      throw new RoleLookupError(role, [...this.roleNames].sort());
    }
    return binding;
  }
}
