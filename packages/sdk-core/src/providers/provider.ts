/**
 * Provider
 *
 * A named, immutable table of role bindings. Derived providers are built with
 * `extend`, which copies the base table and replaces only the listed roles.
 */

import { ConfigurationError } from '../error-handling/index.js';
import { AUTH_ROLE, type RoleBinding, type RoleSource, type RoleTable } from './types.js';

export class Provider implements RoleSource {
  readonly name: string;
  readonly roleNames: ReadonlySet<string>;
  private readonly table: ReadonlyMap<string, RoleBinding>;

  constructor(name: string, table: RoleTable) {
    const entries = Object.entries(table);
    for (const [role, binding] of entries) {
      const expected = role === AUTH_ROLE ? 'auth' : 'service';
      if (binding.kind !== expected) {
        throw new ConfigurationError(
          `Provider "${name}" binds role "${role}" to the wrong kind of factory (expected ${expected}, got ${binding.kind})`,
          { provider: name, role, expected }
        );
      }
    }

    this.name = name;
    this.table = new Map(entries);
    this.roleNames = new Set(this.table.keys());
  }

  lookupRole(role: string): RoleBinding | undefined {
    return this.table.get(role);
  }

  /**
   * Plain copy of the role table, for merging into a derived provider.
   */
  toTable(): RoleTable {
    return Object.fromEntries(this.table);
  }

  extend(name: string, overrides: RoleTable): Provider {
    const unknownRoles = Object.keys(overrides).filter(role => !this.table.has(role));
    if (unknownRoles.length > 0) {
      throw new ConfigurationError(
        `Provider "${name}" overrides roles that "${this.name}" does not define: ${unknownRoles.join(', ')}`,
        { provider: name, base: this.name, unknownRoles }
      );
    }

    return new Provider(name, { ...this.toTable(), ...overrides });
  }
}
