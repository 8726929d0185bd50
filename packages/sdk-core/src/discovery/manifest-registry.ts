/**
 * Manifest Provider Registry
 *
 * File-based discovery. The manifest is a JSON document listing providers
 * derived from the built-in ones:
 *
 *   { "providers": [{ "name": "lab", "extends": "identity", "auth": "v3" }] }
 */

import { readFileSync } from 'fs';
import { ProviderManifestSchema, type ProviderManifest, type ProviderManifestEntry } from '@cloud-sdk/shared-contracts';
import { AUTH_PLUGINS } from '../auth/index.js';
import { ConfigurationError, errorMessage } from '../error-handling/index.js';
import { getLogger } from '../logging/index.js';
import { AUTH_ROLE, BUILTIN_PROVIDERS, DEFAULT_PROVIDER_NAME, authRole, type Provider } from '../providers/index.js';
import { PROVIDER_NAMESPACE, type ProviderRegistration, type ProviderRegistry } from './types.js';

const logger = getLogger('manifest-registry');

function isBuiltinName(name: string): name is keyof typeof BUILTIN_PROVIDERS {
  return Object.prototype.hasOwnProperty.call(BUILTIN_PROVIDERS, name);
}

export function readProviderManifest(manifestPath: string): ProviderManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(manifestPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read provider manifest ${manifestPath}: ${errorMessage(error)}`,
      { manifestPath },
      error instanceof Error ? error : undefined
    );
  }

  const parsed = ProviderManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid provider manifest ${manifestPath}`, {
      manifestPath,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function buildManifestProvider(entry: ProviderManifestEntry): Provider {
  const baseName = entry.extends ?? DEFAULT_PROVIDER_NAME;
  if (!isBuiltinName(baseName)) {
    throw new ConfigurationError(`Provider "${entry.name}" extends unknown provider "${baseName}"`, {
      provider: entry.name,
      base: baseName,
      builtin: Object.keys(BUILTIN_PROVIDERS),
    });
  }

  const base = new BUILTIN_PROVIDERS[baseName]();
  return base.extend(entry.name, entry.auth ? { [AUTH_ROLE]: authRole(AUTH_PLUGINS[entry.auth]) } : {});
}

export class ManifestProviderRegistry implements ProviderRegistry {
  readonly manifestPath: string;
  private readonly registrations: ProviderRegistration[];

  constructor(manifestPath: string) {
    this.manifestPath = manifestPath;
    const manifest = readProviderManifest(manifestPath);

    this.registrations = manifest.providers.map(entry => ({
      namespace: PROVIDER_NAMESPACE,
      name: entry.name,
      source: manifestPath,
      load: () => buildManifestProvider(entry),
    }));

    logger.debug('Provider manifest loaded', {
      manifestPath,
      providers: this.registrations.map(r => r.name),
    });
  }

  findProviders(namespace: string, name: string): ProviderRegistration[] {
    return this.registrations.filter(r => r.namespace === namespace && r.name === name);
  }
}
