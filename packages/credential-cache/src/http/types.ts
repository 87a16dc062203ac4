import type { Result } from 'neverthrow';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * HTTP response with parsed body.
 *
 * Non-2xx responses are returned here too; OAuth endpoints put their error
 * object in a 400 body and callers need to read it.
 */
export interface HttpResponse<T> {
  readonly status: number;
  readonly body: T;
}

/**
 * Failure to obtain a response at all.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'parse';
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}

/**
 * HTTP client used for token and discovery endpoints.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  /**
   * Makes an HTTP request and parses the JSON response body.
   * @returns Result with the response (any status) or a transport error
   */
  readonly json: (request: HttpRequest) => Promise<Result<HttpResponse<unknown>, HttpError>>;
}

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
