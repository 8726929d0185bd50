import { ConfigurationError } from '../error-handling/index.js';
import { getLogger } from '../logging/index.js';
import type { RoleSource } from '../providers/index.js';
import { PROVIDER_NAMESPACE, type ProviderRegistry, type ProviderTarget } from './types.js';

const logger = getLogger('provider-resolver');

export type ProviderIdentifier = string | ProviderTarget;

function instantiate(target: ProviderTarget): RoleSource {
  return typeof target === 'function' ? new target() : target;
}

/**
 * Turn a provider identifier into a concrete role source.
 *
 * Names are looked up in `registry` under the provider namespace and must
 * match exactly one registration. Role sources are used as they are;
 * constructors are instantiated.
 */
export function resolveProvider(identifier: ProviderIdentifier, registry: ProviderRegistry): RoleSource {
  if (typeof identifier !== 'string') {
    return instantiate(identifier);
  }

  const matches = registry.findProviders(PROVIDER_NAMESPACE, identifier);
  if (matches.length === 0) {
    throw ConfigurationError.providerNotFound(PROVIDER_NAMESPACE, identifier);
  }
  if (matches.length > 1) {
    throw ConfigurationError.ambiguousProvider(
      PROVIDER_NAMESPACE,
      identifier,
      matches.map(match => match.source)
    );
  }

  const provider = instantiate(matches[0].load());
  logger.debug('Provider resolved', { name: identifier, source: matches[0].source, roles: provider.roleNames.size });
  return provider;
}
