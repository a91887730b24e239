export type { IExternalAuthProvider, ProviderHttpOptions, ProviderClientCredentials } from './external-provider.js';
export { OidcProvider, googleProvider, type OidcProviderConfig } from './oidc-provider.js';
export {
  OAuth2ProfileProvider,
  githubProvider,
  selectEmail,
  splitName,
  type OAuth2ProfileProviderConfig,
  type EmailCandidate,
} from './oauth2-profile-provider.js';
export { ExternalProviderRegistry, createProviderRegistry } from './registry.js';
export { requestProvider } from './http.js';
