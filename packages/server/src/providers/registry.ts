import type { ExternalProviderSummary } from '@authgate/shared';
import type { ExternalAuthOptions } from '../config/index.js';
import { ConfigurationError } from '../errors/faults.js';
import type { IExternalAuthProvider, ProviderHttpOptions } from './external-provider.js';
import { googleProvider } from './oidc-provider.js';
import { githubProvider } from './oauth2-profile-provider.js';

/**
 * Name -> provider lookup, built once and injected
 */
export class ExternalProviderRegistry {
  private readonly providers = new Map<string, IExternalAuthProvider>();

  constructor(providers: IExternalAuthProvider[] = []) {
    for (const provider of providers) {
      const key = provider.name.toLowerCase();
      if (this.providers.has(key)) {
        throw new ConfigurationError(`Duplicate external provider '${provider.name}'`);
      }
      this.providers.set(key, provider);
    }
  }

  get(name: string): IExternalAuthProvider | undefined {
    return this.providers.get(name.toLowerCase());
  }

  list(): ExternalProviderSummary[] {
    return Array.from(this.providers.values()).map((provider) => ({
      name: provider.name,
      displayName: provider.displayName,
    }));
  }
}

/**
 * Build the registry from the configured (enabled) providers
 */
export function createProviderRegistry(options: ExternalAuthOptions): ExternalProviderRegistry {
  const http: ProviderHttpOptions = { timeoutMs: options.timeoutMs };
  const providers: IExternalAuthProvider[] = [];

  if (options.providers.google) {
    providers.push(googleProvider(options.providers.google, http));
  }
  if (options.providers.github) {
    providers.push(githubProvider(options.providers.github, http));
  }

  return new ExternalProviderRegistry(providers);
}
