import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../logging/index.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../logging/index.js')>();
  return {
    ...actual,
    getLogger: vi.fn(() => mockLogger),
  };
});

import { loadSdkConfig } from '../config/index.js';
import { ConfigurationError } from '../error-handling/index.js';
import { captureError } from './test-helpers.js';

describe('loadSdkConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should apply defaults to an empty environment', () => {
    expect(loadSdkConfig({})).toEqual({
      SDK_PROVIDER: 'identity',
      SDK_DEFAULT_VISIBILITY: 'unset',
    });
  });

  it('should treat empty strings as unset', () => {
    const config = loadSdkConfig({ SDK_PROVIDER: '', SDK_REGION: '   ', SDK_INTERFACE: '' });

    expect(config.SDK_PROVIDER).toBe('identity');
    expect(config.SDK_REGION).toBeUndefined();
    expect(config.SDK_INTERFACE).toBeUndefined();
  });

  it('should read every variable', () => {
    expect(
      loadSdkConfig({
        SDK_PROVIDER: 'identity-v3',
        SDK_PROVIDER_MANIFEST: '/etc/cloud-sdk/providers.json',
        SDK_DEFAULT_VISIBILITY: 'public',
        SDK_REGION: ' zion ',
        SDK_INTERFACE: 'internal',
      })
    ).toEqual({
      SDK_PROVIDER: 'identity-v3',
      SDK_PROVIDER_MANIFEST: '/etc/cloud-sdk/providers.json',
      SDK_DEFAULT_VISIBILITY: 'public',
      SDK_REGION: 'zion',
      SDK_INTERFACE: 'internal',
    });
  });

  it('should list every invalid variable', () => {
    const error = captureError(
      () => loadSdkConfig({ SDK_DEFAULT_VISIBILITY: 'private', SDK_INTERFACE: 'unset' }),
      ConfigurationError
    );

    expect(error.message).toBe('Invalid SDK environment configuration: SDK_DEFAULT_VISIBILITY, SDK_INTERFACE');
    expect(error.details?.variables).toEqual(['SDK_DEFAULT_VISIBILITY', 'SDK_INTERFACE']);
    expect(mockLogger.error).toHaveBeenCalledWith('Invalid SDK environment configuration', {
      variables: ['SDK_DEFAULT_VISIBILITY', 'SDK_INTERFACE'],
    });
  });

  it('should reject provider names that cannot be registered', () => {
    expect(() => loadSdkConfig({ SDK_PROVIDER: 'Not A Name' })).toThrow(
      'Invalid SDK environment configuration: SDK_PROVIDER'
    );
  });
});
