/**
 * Invalid startup configuration. Fatal; never raised per request.
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * An external provider could not be reached, timed out or answered 5xx
 */
export class ProviderUnavailableError extends Error {
  public readonly provider: string;
  public readonly status?: number;

  constructor(provider: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message);
    this.name = 'ProviderUnavailableError';
    this.provider = provider;
    if (options?.status !== undefined) {
      this.status = options.status;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}
