/**
 * Environment Configuration Utilities
 *
 * Typed access to the environment variables that shape a preference store.
 */

import { SdkEnvironmentSchema, type SdkEnvironment } from '@cloud-sdk/shared-contracts';
import { ConfigurationError } from '../error-handling/index.js';
import { getLogger } from '../logging/index.js';

const logger = getLogger('environment-config');

export type SdkConfig = SdkEnvironment;

/**
 * Parse the SDK environment variables. Invalid values fail with a
 * ConfigurationError listing every offending variable.
 */
export function loadSdkConfig(env: NodeJS.ProcessEnv = process.env): SdkConfig {
  const parsed = SdkEnvironmentSchema.safeParse({
    SDK_PROVIDER: env.SDK_PROVIDER || undefined,
    SDK_PROVIDER_MANIFEST: env.SDK_PROVIDER_MANIFEST,
    SDK_DEFAULT_VISIBILITY: env.SDK_DEFAULT_VISIBILITY || undefined,
    SDK_REGION: env.SDK_REGION,
    SDK_INTERFACE: env.SDK_INTERFACE || undefined,
  });

  if (!parsed.success) {
    const variables = Array.from(new Set(parsed.error.issues.map(issue => String(issue.path[0]))));
    logger.error('Invalid SDK environment configuration', { variables });
    throw new ConfigurationError(`Invalid SDK environment configuration: ${variables.join(', ')}`, {
      variables,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return parsed.data;
}
