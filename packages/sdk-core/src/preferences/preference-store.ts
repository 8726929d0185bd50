/**
 * Preference Store
 *
 * Holds one descriptor per service known to a provider and records which of
 * them the caller has customized. The session layer asks for a service's
 * preference when it builds a request.
 *
 * Every setter takes either a service type or `ALL`:
 *
 *   const prefs = new PreferenceStore();
 *   prefs.setName('compute', 'matrix');
 *   prefs.setRegion(ALL, 'zion');
 *   prefs.setVersion('identity', 'v3');
 *   prefs.setVisibility('object-store', 'internal');
 *
 * `ALL` broadcasts are applied service by service in sorted order and are not
 * rolled back if a later service rejects the value.
 */

import { VISIBILITY_UNSET, type PreferenceSnapshot, type VisibilityLevel } from '@cloud-sdk/shared-contracts';
import type { ServiceDescriptor } from '../descriptors/index.js';
import { createDefaultProviderRegistry, resolveProvider, type ProviderIdentifier, type ProviderRegistry } from '../discovery/index.js';
import { ConfigurationError, ServiceCollisionError, UnknownServiceError } from '../error-handling/index.js';
import { getLogger } from '../logging/index.js';
import { AUTH_ROLE, DEFAULT_PROVIDER_NAME, type RoleSource } from '../providers/index.js';

const logger = getLogger('preference-store');

/** Wildcard selector representing every known service. */
export const ALL = '*';
export type ServiceSelector = typeof ALL | string;

export interface PreferenceStoreOptions {
  /** Provider name, role source or role source constructor. Defaults to `identity`. */
  provider?: ProviderIdentifier;
  registry?: ProviderRegistry;
  /**
   * Visibility applied to every descriptor at construction. `unset` leaves the
   * choice to the endpoint catalog; an explicit level pins a default.
   */
  defaultVisibility?: VisibilityLevel;
}

export class PreferenceStore {
  static readonly ALL = ALL;

  readonly provider: RoleSource;
  readonly serviceNames: readonly string[];
  private readonly services: ReadonlyMap<string, ServiceDescriptor>;
  private readonly preferences = new Map<string, ServiceDescriptor>();

  constructor(options: PreferenceStoreOptions = {}) {
    const registry = options.registry ?? createDefaultProviderRegistry();
    this.provider = resolveProvider(options.provider ?? DEFAULT_PROVIDER_NAME, registry);

    const defaultVisibility = options.defaultVisibility ?? VISIBILITY_UNSET;
    const services = new Map<string, ServiceDescriptor>();
    const roleByService = new Map<string, string>();

    for (const role of [...this.provider.roleNames].sort()) {
      if (role === AUTH_ROLE) continue;

      const binding = this.provider.lookupRole(role);
      if (!binding || binding.kind !== 'service') continue;

      const descriptor = binding.create();
      if (!descriptor.serviceType || descriptor.serviceType === ALL) {
        throw new ConfigurationError(
          `Role "${role}" of provider "${this.provider.name}" has an unaddressable service type "${descriptor.serviceType}"`,
          { provider: this.provider.name, role, serviceType: descriptor.serviceType }
        );
      }
      descriptor.setVisibility(defaultVisibility);

      const existingRole = roleByService.get(descriptor.serviceType);
      if (existingRole !== undefined) {
        throw new ServiceCollisionError(descriptor.serviceType, existingRole, role);
      }
      roleByService.set(descriptor.serviceType, role);
      services.set(descriptor.serviceType, descriptor);
    }

    this.services = services;
    this.serviceNames = Object.freeze([...services.keys()].sort());

    logger.debug('Preference store initialized', {
      provider: this.provider.name,
      services: this.serviceNames,
      defaultVisibility,
    });
  }

  /**
   * The customized descriptor for `service`, or `undefined` when no setter has
   * touched it.
   */
  getPreference(service: string): ServiceDescriptor | undefined {
    this.requireService(service);
    return this.preferences.get(service);
  }

  /**
   * Layer the customization for `defaults.serviceType` over a request's own
   * defaults. Services without a preference, or unknown to this store, get
   * `defaults` back unchanged.
   */
  resolvePreference(defaults: ServiceDescriptor): ServiceDescriptor {
    const preference = this.preferences.get(defaults.serviceType);
    return preference ? defaults.join(preference) : defaults;
  }

  getServices(): ServiceDescriptor[] {
    return Array.from(this.services.values());
  }

  hasService(service: string): boolean {
    return this.services.has(service);
  }

  setName(service: ServiceSelector, name: string | undefined): void {
    this.apply(service, descriptor => {
      descriptor.serviceName = name;
    });
  }

  setRegion(service: ServiceSelector, region: string | undefined): void {
    this.apply(service, descriptor => {
      descriptor.region = region;
    });
  }

  setVersion(service: ServiceSelector, version: string | undefined): void {
    this.apply(service, descriptor => {
      descriptor.version = version;
    });
  }

  /**
   * `visibility` is validated by each descriptor; `null` and `undefined` clear it to `unset`.
   */
  setVisibility(service: ServiceSelector, visibility: string | null | undefined): void {
    this.apply(service, descriptor => descriptor.setVisibility(visibility));
  }

  toJSON(): PreferenceSnapshot {
    const snapshot: PreferenceSnapshot = {};
    for (const [serviceType, descriptor] of this.preferences) {
      snapshot[serviceType] = descriptor.toSnapshot();
    }
    return snapshot;
  }

  toString(): string {
    return Array.from(this.preferences.values(), descriptor => descriptor.toString()).join('\n');
  }

  private expand(service: ServiceSelector): readonly string[] {
    if (service === ALL) {
      return this.serviceNames;
    }
    this.requireService(service);
    return [service];
  }

  private apply(service: ServiceSelector, update: (descriptor: ServiceDescriptor) => void): void {
    for (const serviceType of this.expand(service)) {
      const descriptor = this.requireService(serviceType);
      update(descriptor);
      this.preferences.set(serviceType, descriptor);
    }
  }

  private requireService(service: string): ServiceDescriptor {
    const descriptor = this.services.get(service);
    if (descriptor === undefined) {
      throw new UnknownServiceError(service, this.serviceNames);
    }
    return descriptor;
  }
}
