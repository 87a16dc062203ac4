import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse, HttpError } from './types.js';

/** Default request timeout: 10 seconds */
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Creates an HTTP client using the native fetch API.
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 5000 });
 * const result = await client.json({ url: tokenEndpoint, method: 'POST', body });
 *
 * if (result.isOk() && result.value.status === 200) {
 *   handleTokens(result.value.body);
 * }
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;

  const json = async (request: HttpRequest): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    let response: Response;
    try {
      const fetchOptions: RequestInit = {
        method: request.method,
        headers: {
          Accept: 'application/json',
          ...baseHeaders,
          ...request.headers,
        },
        signal: controller.signal,
      };

      // Only set body if provided (exactOptionalPropertyTypes compliance)
      if (request.body !== undefined) {
        fetchOptions.body = request.body;
      }

      response = await fetch(request.url, fetchOptions);
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof Error && error.name === 'AbortError') {
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          cause: error,
        });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    }

    try {
      const body: unknown = await response.json();
      return ok({ status: response.status, body });
    } catch (error) {
      return err({
        type: 'parse',
        message: `Failed to parse JSON response (HTTP ${String(response.status)})`,
        status: response.status,
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  };

  return { json };
};
