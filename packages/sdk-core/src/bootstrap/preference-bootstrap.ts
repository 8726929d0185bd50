/**
 * Preference Bootstrap
 *
 * Builds a ready-to-use PreferenceStore from SDK configuration: default
 * provider registry plus an optional manifest, the configured provider and
 * visibility policy, then the region/interface broadcasts.
 */

import { CompositeProviderRegistry, ManifestProviderRegistry, createDefaultProviderRegistry, type ProviderRegistry } from '../discovery/index.js';
import { loadSdkConfig, type SdkConfig } from '../config/index.js';
import { getLogger, serializeError } from '../logging/index.js';
import { ALL, PreferenceStore } from '../preferences/index.js';

const logger = getLogger('preference-bootstrap');

export function createProviderRegistry(config: Pick<SdkConfig, 'SDK_PROVIDER_MANIFEST'>): ProviderRegistry {
  const defaults = createDefaultProviderRegistry();
  if (!config.SDK_PROVIDER_MANIFEST) {
    return defaults;
  }
  return new CompositeProviderRegistry(defaults, new ManifestProviderRegistry(config.SDK_PROVIDER_MANIFEST));
}

export function createPreferenceStore(config: SdkConfig = loadSdkConfig()): PreferenceStore {
  try {
    const store = new PreferenceStore({
      provider: config.SDK_PROVIDER,
      registry: createProviderRegistry(config),
      defaultVisibility: config.SDK_DEFAULT_VISIBILITY,
    });

    if (config.SDK_REGION) {
      store.setRegion(ALL, config.SDK_REGION);
    }
    if (config.SDK_INTERFACE) {
      store.setVisibility(ALL, config.SDK_INTERFACE);
    }

    logger.info('Preference store ready', {
      provider: store.provider.name,
      services: store.serviceNames.length,
      region: config.SDK_REGION,
      interface: config.SDK_INTERFACE,
    });
    return store;
  } catch (error) {
    logger.error('Preference store bootstrap failed', {
      provider: config.SDK_PROVIDER,
      error: serializeError(error),
    });
    throw error;
  }
}
