/**
 * @fileoverview HTTP module and factory functions
 *
 * @module http
 */

import type { HttpClient, HttpClientOptions } from './client.ts';
import { DEFAULT_HEADERS } from '../_consts.ts';
import { NodeHttpClient } from './node-client.ts';

/**
 * Creates an HTTP client that sends the application's default headers
 * @param options - Overrides for timeout, redirect limit or headers
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
	return new NodeHttpClient({ defaultHeaders: DEFAULT_HEADERS, ...options });
}

/**
 * Shared client used by the commands. Holds read-only configuration only.
 */
export const httpClient = createHttpClient();

export type { HttpClient, HttpClientOptions, RequestOptions, ResponseHandle } from './client.ts';
export { getHeader } from './client.ts';
export { NodeHttpClient } from './node-client.ts';
