export { createFetchClient } from './fetch-client.js';
export type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse, HttpError } from './types.js';
