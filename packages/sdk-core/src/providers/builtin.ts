/**
 * Built-in providers: the base identity bundle and its auth-version variants.
 */

import { AUTH_PLUGINS } from '../auth/index.js';
import {
  ComputeService,
  DatabaseService,
  IdentityService,
  ImageService,
  KeystoreService,
  NetworkService,
  ObjectStoreService,
  OrchestrationService,
  TelemetryService,
} from '../descriptors/index.js';
import { Provider } from './provider.js';
import { AUTH_ROLE, authRole, serviceRole, type RoleTable } from './types.js';

export const BASE_ROLE_TABLE: RoleTable = {
  [AUTH_ROLE]: authRole(AUTH_PLUGINS.discoverable),
  compute: serviceRole(() => new ComputeService()),
  database: serviceRole(() => new DatabaseService()),
  identity: serviceRole(() => new IdentityService()),
  image: serviceRole(() => new ImageService()),
  keystore: serviceRole(() => new KeystoreService()),
  network: serviceRole(() => new NetworkService()),
  object_store: serviceRole(() => new ObjectStoreService()),
  orchestration: serviceRole(() => new OrchestrationService()),
  telemetry: serviceRole(() => new TelemetryService()),
};

export const DEFAULT_PROVIDER_NAME = 'identity';

export class IdentityProvider extends Provider {
  constructor() {
    super(DEFAULT_PROVIDER_NAME, BASE_ROLE_TABLE);
  }
}

export class IdentityV2Provider extends Provider {
  constructor() {
    super('identity-v2', { ...BASE_ROLE_TABLE, [AUTH_ROLE]: authRole(AUTH_PLUGINS.v2) });
  }
}

export class IdentityV3Provider extends Provider {
  constructor() {
    super('identity-v3', { ...BASE_ROLE_TABLE, [AUTH_ROLE]: authRole(AUTH_PLUGINS.v3) });
  }
}

export const BUILTIN_PROVIDERS = {
  identity: IdentityProvider,
  'identity-v2': IdentityV2Provider,
  'identity-v3': IdentityV3Provider,
} as const;
