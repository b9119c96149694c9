/**
 * @fileoverview HTTP client built on Node's http and https modules
 *
 * Resolves with a response handle as soon as headers arrive so the caller can
 * print them before the body has been read. Redirects are followed the way
 * browsers do.
 *
 * @module http/node-client
 */

import type { IncomingMessage, RequestOptions as NodeRequestOptions, OutgoingHttpHeaders } from 'node:http';
import type { HeaderEntry, HttpMethod } from '../_types.ts';
import type { HttpClient, HttpClientOptions, RequestOptions, ResponseHandle } from './client.ts';
import { Buffer } from 'node:buffer';
import { request as httpRequest } from 'node:http';
import { request as httpsRequest } from 'node:https';
import { TextDecoder } from 'node:util';
import { MAX_REDIRECTS, REQUEST_TIMEOUT_MS } from '../_consts.ts';
import { closedPortUrl, withServer } from '../_fixtures.ts';
import { logger } from '../logger.ts';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Headers describing a body, dropped when a redirect turns the request into a GET
 */
const BODY_HEADERS = new Set(['content-type', 'content-length']);

type PendingRequest = {
	readonly url: URL;
	readonly method: HttpMethod;
	readonly headers: Readonly<Record<string, string>>;
	readonly body?: string;
};

/**
 * Merges header records, later sources overriding earlier ones regardless of name case
 */
function mergeHeaders(...sources: ReadonlyArray<Readonly<Record<string, string>>>): Record<string, string> {
	const merged = new Map<string, readonly [string, string]>();
	for (const source of sources) {
		for (const [name, value] of Object.entries(source)) {
			merged.set(name.toLowerCase(), [name, value]);
		}
	}
	return Object.fromEntries(merged.values());
}

/**
 * Pairs up Node's flat `rawHeaders` list, keeping order and name case
 */
function pairRawHeaders(raw: readonly string[]): HeaderEntry[] {
	const entries: HeaderEntry[] = [];
	for (let i = 0; i + 1 < raw.length; i += 2) {
		const name = raw[i];
		const value = raw[i + 1];
		if (name !== undefined && value !== undefined) {
			entries.push([name, value]);
		}
	}
	return entries;
}

async function readBody(res: IncomingMessage): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		res.on('data', (chunk: Buffer) => chunks.push(chunk));
		res.on('end', () => resolve(Buffer.concat(chunks)));
		res.on('error', reject);
	});
}

function toResponseHandle(res: IncomingMessage, url: string): ResponseHandle {
	let body: Promise<string> | undefined;
	return {
		url,
		version: res.httpVersion,
		status: res.statusCode ?? 0,
		statusText: res.statusMessage ?? '',
		headers: pairRawHeaders(res.rawHeaders),
		// fatal: invalid UTF-8 rejects with a TypeError instead of inserting U+FFFD
		text: async () => {
			body ??= readBody(res).then(buffer => new TextDecoder('utf-8', { fatal: true }).decode(buffer));
			return body;
		},
	};
}

/**
 * HTTP client on top of `node:http` and `node:https`
 *
 * Every request carries the configured default headers. Status codes are
 * never treated as failures.
 */
export class NodeHttpClient implements HttpClient {
	private readonly defaultHeaders: Readonly<Record<string, string>>;
	private readonly timeout: number;
	private readonly maxRedirects: number;

	constructor(options: HttpClientOptions = {}) {
		this.defaultHeaders = options.defaultHeaders ?? {};
		this.timeout = options.timeout ?? REQUEST_TIMEOUT_MS;
		this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
	}

	/**
	 * Sends a request and resolves once the final response's headers arrive
	 * @param url - Absolute http or https URL
	 * @param options - Method, extra headers and body
	 */
	async request(url: string, options: RequestOptions = {}): Promise<ResponseHandle> {
		let pending: PendingRequest = {
			url: new URL(url),
			method: options.method ?? 'GET',
			headers: mergeHeaders(this.defaultHeaders, options.headers ?? {}),
			body: options.body,
		};

		for (let redirects = 0; ; redirects++) {
			const res = await this.send(pending);
			const next = this.followRedirect(pending, res);
			if (next == null) {
				return toResponseHandle(res, pending.url.href);
			}

			// discard the redirect body so the socket can be reused
			res.resume();
			if (redirects >= this.maxRedirects) {
				throw new Error(`Too many redirects (limit ${this.maxRedirects})`);
			}
			logger.debug(`Following ${res.statusCode} redirect to ${next.url.href}`);
			pending = next;
		}
	}

	/**
	 * Works out the next request for a redirect response
	 * @returns The request to send next, or undefined when the response is final
	 */
	private followRedirect(pending: PendingRequest, res: IncomingMessage): PendingRequest | undefined {
		const status = res.statusCode ?? 0;
		const location = res.headers.location;
		if (!REDIRECT_STATUSES.has(status) || location == null) {
			return undefined;
		}

		const url = new URL(location, pending.url);
		const switchToGet = status === 303 || ((status === 301 || status === 302) && pending.method === 'POST');
		if (!switchToGet) {
			return { ...pending, url };
		}

		return {
			url,
			method: 'GET',
			headers: Object.fromEntries(
				Object.entries(pending.headers).filter(([name]) => !BODY_HEADERS.has(name.toLowerCase())),
			),
		};
	}

	private async send({ url, method, headers, body }: PendingRequest): Promise<IncomingMessage> {
		if (url.protocol !== 'http:' && url.protocol !== 'https:') {
			throw new Error(`Unsupported protocol: ${url.protocol}`);
		}

		const requestHeaders: OutgoingHttpHeaders = { ...headers };
		if (body != null) {
			requestHeaders['Content-Length'] = Buffer.byteLength(body);
		}
		const requestOptions: NodeRequestOptions = {
			method,
			headers: requestHeaders,
			timeout: this.timeout,
		};

		return new Promise((resolve, reject) => {
			const req = url.protocol === 'https:'
				? httpsRequest(url, requestOptions, resolve)
				: httpRequest(url, requestOptions, resolve);

			req.on('error', reject);
			req.on('timeout', () => req.destroy(new Error(`Request timed out after ${this.timeout}ms`)));

			if (body != null) {
				req.write(body);
			}
			req.end();
		});
	}
}

if (import.meta.vitest != null) {
	const defaultHeaders = { 'X-Powered-By': 'quickhttp-test', 'User-Agent': 'quickhttp-test/0.0.0' };

	describe('NodeHttpClient', () => {
		it('sends default headers and exposes the response', async () => {
			await withServer((_req, res) => {
				res.writeHead(404, 'Not Found', { 'X-First': '1', 'Content-Type': 'text/plain' });
				res.end('missing');
			}, async (baseUrl, received) => {
				const client = new NodeHttpClient({ defaultHeaders });
				const response = await client.request(`${baseUrl}/items?id=7`);

				expect(received[0]?.method).toBe('GET');
				expect(received[0]?.url).toBe('/items?id=7');
				expect(received[0]?.headers['x-powered-by']).toBe('quickhttp-test');
				expect(received[0]?.headers['user-agent']).toBe('quickhttp-test/0.0.0');

				expect(response.version).toBe('1.1');
				expect(response.status).toBe(404);
				expect(response.statusText).toBe('Not Found');
				expect(response.url).toBe(`${baseUrl}/items?id=7`);
				expect(response.headers.slice(0, 2)).toEqual([['X-First', '1'], ['Content-Type', 'text/plain']]);
				expect(await response.text()).toBe('missing');
			});
		});

		it('sends a body with its length', async () => {
			await withServer((_req, res) => {
				res.end('ok');
			}, async (baseUrl, received) => {
				const client = new NodeHttpClient({ defaultHeaders });
				await client.request(baseUrl, {
					method: 'POST',
					headers: { 'Content-Type': 'application/json' },
					body: '{"name":"zoë"}',
				});

				expect(received[0]?.method).toBe('POST');
				expect(received[0]?.headers['content-type']).toBe('application/json');
				expect(received[0]?.headers['content-length']).toBe('15');
				expect(received[0]?.body).toBe('{"name":"zoë"}');
			});
		});

		it('lets request headers override defaults regardless of case', async () => {
			await withServer((_req, res) => {
				res.end();
			}, async (baseUrl, received) => {
				const client = new NodeHttpClient({ defaultHeaders });
				await client.request(baseUrl, { headers: { 'user-agent': 'custom' } });
				expect(received[0]?.headers['user-agent']).toBe('custom');
			});
		});

		it('turns a POST into a GET on 302', async () => {
			await withServer((req, res) => {
				if (req.url === '/start') {
					res.writeHead(302, { Location: '/landing' });
					res.end();
					return;
				}
				res.end('landed');
			}, async (baseUrl, received) => {
				const client = new NodeHttpClient({ defaultHeaders });
				const response = await client.request(`${baseUrl}/start`, {
					method: 'POST',
					headers: { 'Content-Type': 'application/json' },
					body: '{"a":"1"}',
				});

				expect(response.status).toBe(200);
				expect(response.url).toBe(`${baseUrl}/landing`);
				expect(await response.text()).toBe('landed');
				expect(received.map(entry => [entry.method, entry.url, entry.body])).toEqual([
					['POST', '/start', '{"a":"1"}'],
					['GET', '/landing', ''],
				]);
				expect(received[1]?.headers['content-type']).toBeUndefined();
			});
		});

		it('keeps method and body on 307', async () => {
			await withServer((req, res) => {
				if (req.url === '/start') {
					res.writeHead(307, { Location: '/again' });
					res.end();
					return;
				}
				res.end();
			}, async (baseUrl, received) => {
				const client = new NodeHttpClient({ defaultHeaders });
				await client.request(`${baseUrl}/start`, { method: 'POST', body: 'x=1' });
				expect(received.map(entry => [entry.method, entry.url, entry.body])).toEqual([
					['POST', '/start', 'x=1'],
					['POST', '/again', 'x=1'],
				]);
			});
		});

		it('gives up after the redirect limit', async () => {
			await withServer((_req, res) => {
				res.writeHead(301, { Location: '/loop' });
				res.end();
			}, async (baseUrl, received) => {
				const client = new NodeHttpClient({ defaultHeaders, maxRedirects: 2 });
				await expect(client.request(`${baseUrl}/loop`)).rejects.toThrow('Too many redirects (limit 2)');
				expect(received).toHaveLength(3);
			});
		});

		it('rejects an unsupported protocol', async () => {
			const client = new NodeHttpClient();
			await expect(client.request('ftp://example.com/file')).rejects.toThrow('Unsupported protocol: ftp:');
		});

		it('rejects when the connection is refused', async () => {
			const baseUrl = await closedPortUrl();
			const client = new NodeHttpClient();
			await expect(client.request(baseUrl)).rejects.toThrow(/ECONNREFUSED/);
		});

		it('rejects invalid UTF-8 bodies with a TypeError', async () => {
			await withServer((_req, res) => {
				res.end(Buffer.from([0x61, 0xFF, 0x62]));
			}, async (baseUrl) => {
				const client = new NodeHttpClient();
				const response = await client.request(baseUrl);
				await expect(response.text()).rejects.toBeInstanceOf(TypeError);
				await expect(response.text()).rejects.toMatchObject({ code: 'ERR_ENCODING_INVALID_ENCODED_DATA' });
			});
		});

		it('reads the body once', async () => {
			await withServer((_req, res) => {
				res.end('same');
			}, async (baseUrl) => {
				const client = new NodeHttpClient();
				const response = await client.request(baseUrl);
				expect(await response.text()).toBe('same');
				expect(await response.text()).toBe('same');
			});
		});
	});
}
