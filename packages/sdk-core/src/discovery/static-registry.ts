import { BUILTIN_PROVIDERS } from '../providers/index.js';
import { PROVIDER_NAMESPACE, type ProviderRegistration, type ProviderRegistry, type ProviderTarget } from './types.js';

export interface RegisterOptions {
  namespace?: string;
  source?: string;
}

export class StaticProviderRegistry implements ProviderRegistry {
  private readonly registrations: ProviderRegistration[];

  constructor(registrations: ProviderRegistration[] = []) {
    this.registrations = [...registrations];
  }

  register(name: string, target: ProviderTarget, options: RegisterOptions = {}): this {
    this.registrations.push({
      namespace: options.namespace ?? PROVIDER_NAMESPACE,
      name,
      source: options.source ?? 'static',
      load: () => target,
    });
    return this;
  }

  findProviders(namespace: string, name: string): ProviderRegistration[] {
    return this.registrations.filter(r => r.namespace === namespace && r.name === name);
  }

  listNames(namespace: string = PROVIDER_NAMESPACE): string[] {
    const names = this.registrations.filter(r => r.namespace === namespace).map(r => r.name);
    return Array.from(new Set(names)).sort();
  }
}

export function createDefaultProviderRegistry(): StaticProviderRegistry {
  const registry = new StaticProviderRegistry();
  for (const [name, providerClass] of Object.entries(BUILTIN_PROVIDERS)) {
    registry.register(name, providerClass, { source: 'builtin' });
  }
  return registry;
}
