import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  CompositeProviderRegistry,
  ManifestProviderRegistry,
  PROVIDER_NAMESPACE,
  StaticProviderRegistry,
  createDefaultProviderRegistry,
  readProviderManifest,
  resolveProvider,
} from '../discovery/index.js';
import { ConfigurationError, SdkErrorCode } from '../error-handling/index.js';
import { IdentityProvider, IdentityV2Provider, IdentityV3Provider, MultiProvider, type RoleSource } from '../providers/index.js';
import { captureError } from './test-helpers.js';

const fixture = (name: string) => fileURLToPath(new URL(`../../tests/fixtures/${name}`, import.meta.url));

function authPluginName(provider: RoleSource): string | undefined {
  const binding = provider.lookupRole('auth');
  return binding?.kind === 'auth' ? binding.create().name : undefined;
}

describe('StaticProviderRegistry', () => {
  it('should register the built-in providers by default', () => {
    const registry = createDefaultProviderRegistry();

    expect(registry.listNames()).toEqual(['identity', 'identity-v2', 'identity-v3']);
    expect(registry.findProviders(PROVIDER_NAMESPACE, 'identity')).toHaveLength(1);
    expect(registry.findProviders(PROVIDER_NAMESPACE, 'identity')[0].source).toBe('builtin');
  });

  it('should only match registrations in the requested namespace', () => {
    const registry = new StaticProviderRegistry().register('lab', IdentityV3Provider, { namespace: 'other.plugins' });

    expect(registry.findProviders(PROVIDER_NAMESPACE, 'lab')).toEqual([]);
    expect(registry.findProviders('other.plugins', 'lab')).toHaveLength(1);
    expect(registry.listNames()).toEqual([]);
  });
});

describe('resolveProvider', () => {
  it('should resolve a registered name to a provider instance', () => {
    const provider = resolveProvider('identity-v3', createDefaultProviderRegistry());

    expect(provider).toBeInstanceOf(IdentityV3Provider);
    expect(provider.name).toBe('identity-v3');
  });

  it('should fail when no registration matches', () => {
    const error = captureError(() => resolveProvider('missing', createDefaultProviderRegistry()), ConfigurationError);

    expect(error.message).toBe('No provider registered as "missing" in cloud-sdk.providers');
    expect(error.code).toBe(SdkErrorCode.CONFIGURATION_ERROR);
    expect(error.details).toEqual({ namespace: PROVIDER_NAMESPACE, name: 'missing' });
  });

  it('should fail when more than one registration matches', () => {
    const registry = createDefaultProviderRegistry().register('identity', IdentityV3Provider, { source: 'plugin-a' });

    const error = captureError(() => resolveProvider('identity', registry), ConfigurationError);

    expect(error.message).toBe('Provider "identity" is registered 2 times in cloud-sdk.providers: builtin, plugin-a');
  });

  it('should use a role source directly', () => {
    const provider = new MultiProvider(new IdentityV2Provider(), new IdentityProvider());

    expect(resolveProvider(provider, new StaticProviderRegistry())).toBe(provider);
  });

  it('should instantiate a provider constructor', () => {
    const provider = resolveProvider(IdentityV2Provider, new StaticProviderRegistry());

    expect(provider).toBeInstanceOf(IdentityV2Provider);
    expect(authPluginName(provider)).toBe('v2');
  });

  it('should load registered instances as they are', () => {
    const lab = new IdentityProvider().extend('lab', {});
    const registry = new StaticProviderRegistry().register('lab', lab);

    expect(resolveProvider('lab', registry)).toBe(lab);
  });
});

describe('ManifestProviderRegistry', () => {
  it('should derive providers from the manifest entries', () => {
    const registry = new ManifestProviderRegistry(fixture('providers.json'));

    const lab = resolveProvider('lab', registry);
    expect(lab.name).toBe('lab');
    expect(authPluginName(lab)).toBe('v3');
    expect([...lab.roleNames].sort()).toEqual([...new IdentityProvider().roleNames].sort());
  });

  it('should extend identity when no base is named', () => {
    const registry = new ManifestProviderRegistry(fixture('providers.json'));

    expect(authPluginName(resolveProvider('legacy', registry))).toBe('v2');
  });

  it('should keep the base auth plugin when none is given', () => {
    const registry = new ManifestProviderRegistry(fixture('providers.json'));

    expect(authPluginName(resolveProvider('plain-v2', registry))).toBe('v2');
  });

  it('should report the manifest path as the registration source', () => {
    const manifestPath = fixture('providers.json');
    const registry = new ManifestProviderRegistry(manifestPath);

    expect(registry.findProviders(PROVIDER_NAMESPACE, 'lab').map(r => r.source)).toEqual([manifestPath]);
  });

  it('should fail to load an entry that extends an unknown provider', () => {
    const registry = new ManifestProviderRegistry(fixture('providers.json'));

    const error = captureError(() => resolveProvider('broken', registry), ConfigurationError);
    expect(error.message).toBe('Provider "broken" extends unknown provider "no-such-provider"');
  });

  it('should reject a manifest that does not match the schema', () => {
    const manifestPath = fixture('providers-invalid.json');

    const error = captureError(() => new ManifestProviderRegistry(manifestPath), ConfigurationError);
    expect(error.message).toBe(`Invalid provider manifest ${manifestPath}`);
    expect(error.details?.manifestPath).toBe(manifestPath);
  });

  it('should reject a manifest that cannot be read', () => {
    const manifestPath = fixture('does-not-exist.json');

    const error = captureError(() => readProviderManifest(manifestPath), ConfigurationError);
    expect(error.message.startsWith(`Could not read provider manifest ${manifestPath}:`)).toBe(true);
    expect(error.cause).toBeInstanceOf(Error);
  });
});

describe('CompositeProviderRegistry', () => {
  it('should resolve names from any member registry', () => {
    const registry = new CompositeProviderRegistry(
      createDefaultProviderRegistry(),
      new ManifestProviderRegistry(fixture('providers.json'))
    );

    expect(resolveProvider('identity', registry).name).toBe('identity');
    expect(resolveProvider('lab', registry).name).toBe('lab');
  });

  it('should report a name registered by two sources as ambiguous', () => {
    const manifestPath = fixture('providers-duplicate.json');
    const registry = new CompositeProviderRegistry(
      createDefaultProviderRegistry(),
      new ManifestProviderRegistry(manifestPath)
    );

    const error = captureError(() => resolveProvider('identity', registry), ConfigurationError);
    expect(error.message).toBe(`Provider "identity" is registered 2 times in cloud-sdk.providers: builtin, ${manifestPath}`);
    expect(error.details).toEqual({ namespace: PROVIDER_NAMESPACE, name: 'identity', sources: ['builtin', manifestPath] });
  });
});
