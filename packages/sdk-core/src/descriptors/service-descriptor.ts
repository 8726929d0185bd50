/**
 * Service Descriptor
 *
 * Mutable per-service preference record. A descriptor is identified by its
 * service type; name, region, version and visibility can be customized.
 */

import {
  ServiceDescriptorSnapshotSchema,
  VISIBILITY,
  VISIBILITY_UNSET,
  VisibilityInputSchema,
  type ServiceDescriptorSnapshot,
  type Visibility,
  type VisibilityLevel,
} from '@cloud-sdk/shared-contracts';
import { ValidationError } from '../error-handling/index.js';

export interface ServiceDescriptorInit {
  serviceName?: string;
  region?: string;
  version?: string;
  visibility?: VisibilityLevel;
}

const ALL_VISIBILITIES: readonly Visibility[] = Object.values(VISIBILITY);

export class ServiceDescriptor {
  readonly serviceType: string;
  serviceName?: string;
  region?: string;
  version?: string;
  private _visibility: VisibilityLevel;

  constructor(serviceType: string, init: ServiceDescriptorInit = {}) {
    this.serviceType = serviceType;
    this.serviceName = init.serviceName;
    this.region = init.region;
    this.version = init.version;
    this._visibility = this.allowedVisibilities.includes(VISIBILITY.PUBLIC) ? VISIBILITY.PUBLIC : VISIBILITY_UNSET;
    if (init.visibility !== undefined) {
      this.setVisibility(init.visibility);
    }
  }

  /**
   * Explicit levels this descriptor accepts. `unset` is always accepted.
   */
  get allowedVisibilities(): readonly Visibility[] {
    return ALL_VISIBILITIES;
  }

  get visibility(): VisibilityLevel {
    return this._visibility;
  }

  setVisibility(value: unknown): void {
    const parsed = VisibilityInputSchema.safeParse(value);
    if (!parsed.success) {
      throw new ValidationError('visibility', `"${String(value)}" is not one of ${ALL_VISIBILITIES.join(', ')}`, {
        serviceType: this.serviceType,
        value,
      });
    }

    const level = parsed.data;
    if (level !== VISIBILITY_UNSET && !this.allowedVisibilities.includes(level)) {
      throw new ValidationError(
        'visibility',
        `${this.serviceType} does not support "${level}" (allowed: ${this.allowedVisibilities.join(', ')})`,
        { serviceType: this.serviceType, value }
      );
    }

    this._visibility = level;
  }

  matchServiceType(serviceType: string): boolean {
    return this.serviceType === serviceType;
  }

  matchServiceName(serviceName?: string): boolean {
    return !this.serviceName || this.serviceName === serviceName;
  }

  matchRegion(region?: string): boolean {
    return !this.region || this.region === region;
  }

  matchVisibility(visibility?: string): boolean {
    return this._visibility === VISIBILITY_UNSET || this._visibility === visibility;
  }

  resolveVersion(fallback?: string): string | undefined {
    return this.version || fallback;
  }

  /**
   * Layer `preference` over this descriptor. Neither input is modified.
   *
   * The result is a plain `ServiceDescriptor`: it accepts every visibility
   * level whatever `allowedVisibilities` the inputs narrow to.
   */
  join(preference?: ServiceDescriptor): ServiceDescriptor {
    const joined = new ServiceDescriptor(this.serviceType, {
      serviceName: preference?.serviceName ?? this.serviceName,
      region: preference?.region ?? this.region,
      version: preference?.version ?? this.version,
    });
    const preferred = preference?.visibility;
    joined._visibility = preferred && preferred !== VISIBILITY_UNSET ? preferred : this._visibility;
    return joined;
  }

  toSnapshot(): ServiceDescriptorSnapshot {
    return ServiceDescriptorSnapshotSchema.parse({
      serviceType: this.serviceType,
      serviceName: this.serviceName,
      region: this.region,
      version: this.version,
      visibility: this._visibility,
    });
  }

  toString(): string {
    const parts = [`service_type=${this.serviceType}`];
    if (this.serviceName) parts.push(`service_name=${this.serviceName}`);
    if (this.region) parts.push(`region=${this.region}`);
    if (this.version) parts.push(`version=${this.version}`);
    if (this._visibility !== VISIBILITY_UNSET) parts.push(`visibility=${this._visibility}`);
    return parts.join(',');
  }
}

export type ServiceDescriptorFactory = () => ServiceDescriptor;
