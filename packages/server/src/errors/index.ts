export * from './error-codes.js';
export { AuthFailure } from './auth-failure.js';
export { ConfigurationError, ProviderUnavailableError } from './faults.js';
