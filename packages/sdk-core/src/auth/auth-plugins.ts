/**
 * Auth Plugins
 *
 * Identity records bound to the `auth` role of a provider. They name which
 * identity API version a session would authenticate against; exchanging
 * credentials for tokens belongs to the transport layer.
 */

import type { AuthPluginName } from '@cloud-sdk/shared-contracts';

export interface AuthPlugin {
  readonly name: AuthPluginName;
  readonly identityVersion: 'v2' | 'v3' | 'auto';
  readonly description: string;
}

export type AuthPluginFactory = () => AuthPlugin;

export const AUTH_PLUGINS: Readonly<Record<AuthPluginName, AuthPluginFactory>> = {
  discoverable: () => ({
    name: 'discoverable',
    identityVersion: 'auto',
    description: 'Picks the identity API version advertised by the endpoint',
  }),
  v2: () => ({
    name: 'v2',
    identityVersion: 'v2',
    description: 'Identity v2 password and token authentication',
  }),
  v3: () => ({
    name: 'v3',
    identityVersion: 'v3',
    description: 'Identity v3 password and token authentication',
  }),
};
