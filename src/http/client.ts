/**
 * @fileoverview HTTP client interface definitions
 *
 * The request pipeline talks to the network only through these types, so the
 * transport can be swapped for a fake in tests.
 *
 * @module http/client
 */

import type { HeaderEntry, HttpMethod } from '../_types.ts';

/**
 * Options for a single request
 */
export type RequestOptions = {
	/**
	 * HTTP method, GET when omitted
	 */
	readonly method?: HttpMethod;

	/**
	 * Extra headers, merged over the client's default headers
	 */
	readonly headers?: Readonly<Record<string, string>>;

	/**
	 * Request body, sent as UTF-8
	 */
	readonly body?: string;
};

/**
 * An in-flight response whose headers have arrived
 *
 * The body has not been read yet; `text()` waits for all of it.
 */
export type ResponseHandle = {
	/**
	 * Final URL after redirects
	 */
	readonly url: string;

	/**
	 * HTTP version as sent by the server, e.g. `1.1`
	 */
	readonly version: string;

	readonly status: number;

	/**
	 * Reason phrase, may be empty
	 */
	readonly statusText: string;

	/**
	 * Headers in the order received, names as sent
	 */
	readonly headers: readonly HeaderEntry[];

	/**
	 * Reads the whole body and decodes it as UTF-8
	 *
	 * Rejects with a TypeError when the body is not valid UTF-8.
	 */
	text: () => Promise<string>;
};

/**
 * HTTP client interface
 *
 * Resolves as soon as response headers arrive, whatever the status code.
 * Rejects only on transport failures.
 */
export type HttpClient = {
	request: (url: string, options?: RequestOptions) => Promise<ResponseHandle>;
};

/**
 * Construction options shared by client implementations
 */
export type HttpClientOptions = {
	/**
	 * Headers attached to every request
	 */
	readonly defaultHeaders?: Readonly<Record<string, string>>;

	/**
	 * Socket inactivity timeout in milliseconds
	 */
	readonly timeout?: number;

	/**
	 * Redirects followed before giving up
	 */
	readonly maxRedirects?: number;
};

/**
 * Looks up a header value by name, ignoring case. The first match wins.
 */
export function getHeader(headers: readonly HeaderEntry[], name: string): string | undefined {
	const wanted = name.toLowerCase();
	return headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
}

if (import.meta.vitest != null) {
	describe('getHeader', () => {
		const headers: HeaderEntry[] = [
			['Content-Type', 'text/plain'],
			['Set-Cookie', 'a=1'],
			['set-cookie', 'b=2'],
		];

		it('matches names case-insensitively', () => {
			expect(getHeader(headers, 'content-type')).toBe('text/plain');
			expect(getHeader(headers, 'CONTENT-TYPE')).toBe('text/plain');
		});

		it('returns the first of repeated headers', () => {
			expect(getHeader(headers, 'Set-Cookie')).toBe('a=1');
		});

		it('returns undefined for a missing header', () => {
			expect(getHeader(headers, 'Location')).toBeUndefined();
		});
	});
}
