/**
 * Built-in service descriptors, one per role of the base provider.
 */

import { ServiceDescriptor, type ServiceDescriptorInit } from './service-descriptor.js';

export const SERVICE_TYPES = {
  COMPUTE: 'compute',
  DATABASE: 'database',
  IDENTITY: 'identity',
  IMAGE: 'image',
  KEYSTORE: 'keystore',
  NETWORK: 'network',
  OBJECT_STORE: 'object-store',
  ORCHESTRATION: 'orchestration',
  METERING: 'metering',
} as const;

export type BuiltinServiceType = (typeof SERVICE_TYPES)[keyof typeof SERVICE_TYPES];

export class ComputeService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.COMPUTE, init);
  }
}

export class DatabaseService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.DATABASE, init);
  }
}

export class IdentityService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.IDENTITY, init);
  }
}

export class ImageService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.IMAGE, init);
  }
}

export class KeystoreService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.KEYSTORE, init);
  }
}

export class NetworkService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.NETWORK, init);
  }
}

export class ObjectStoreService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.OBJECT_STORE, init);
  }
}

export class OrchestrationService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.ORCHESTRATION, init);
  }
}

export class TelemetryService extends ServiceDescriptor {
  constructor(init?: ServiceDescriptorInit) {
    super(SERVICE_TYPES.METERING, init);
  }
}
