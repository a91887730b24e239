import type { ZodType, ZodTypeDef } from 'zod';
import { AuthFailure } from '../errors/auth-failure.js';
import { ProviderUnavailableError } from '../errors/faults.js';
import { type Result, ok, err } from '../result.js';
import { createLogger } from '../logging/logger.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../config/constants.js';
import type { ProviderHttpOptions } from './external-provider.js';

const logger = createLogger('providers');

export interface ProviderRequest<T> {
  provider: string;
  endpoint: string;
  url: string;
  init: RequestInit;
  schema: ZodType<T, ZodTypeDef, unknown>;
  signal?: AbortSignal;
}

function parseBody(text: string, contentType: string): unknown {
  // Some token endpoints answer form-encoded unless asked for JSON
  if (contentType.includes('application/x-www-form-urlencoded')) {
    return Object.fromEntries(new URLSearchParams(text));
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Call a provider endpoint and validate the response body
 *
 * - 4xx or an unexpected body: failed result (ProviderExchangeFailed)
 * - 5xx, network error, timeout or caller abort: ProviderUnavailableError
 *
 * No retries.
 */
export async function requestProvider<T>(
  request: ProviderRequest<T>,
  http: ProviderHttpOptions = {}
): Promise<Result<T>> {
  const fetchImpl = http.fetch ?? fetch;
  const timeoutMs = http.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  const { provider, endpoint, signal } = request;

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`${endpoint} request timed out after ${timeoutMs}ms`)),
    timeoutMs
  );
  const forwardAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  try {
    const response = await fetchImpl(request.url, { ...request.init, signal: controller.signal });
    const text = await response.text();

    if (response.status >= 500) {
      throw new ProviderUnavailableError(provider, `${provider} ${endpoint} returned ${response.status}`, {
        status: response.status,
      });
    }

    if (!response.ok) {
      logger.warn('Provider rejected request', { provider, endpoint, status: response.status });
      return err(AuthFailure.providerExchangeFailed());
    }

    const parsed = request.schema.safeParse(parseBody(text, response.headers.get('content-type') ?? ''));
    if (!parsed.success) {
      logger.warn('Provider response did not match the expected shape', { provider, endpoint });
      return err(AuthFailure.providerExchangeFailed());
    }

    return ok(parsed.data);
  } catch (error) {
    if (error instanceof ProviderUnavailableError) {
      throw error;
    }
    throw new ProviderUnavailableError(provider, `${provider} ${endpoint} request failed`, { cause: error });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', forwardAbort);
  }
}
