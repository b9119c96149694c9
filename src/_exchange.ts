import type { RenderOptions } from './_render.ts';
import type { RequestSpec } from './_types.ts';
import type { HttpClient } from './http/index.ts';
import type { NetworkError, RenderError } from './_errors.ts';
import { Result } from '@praha/byethrow';
import pc from 'picocolors';
import { dispatch } from './_dispatch.ts';
import { renderResponse } from './_render.ts';
import { httpClient } from './http/index.ts';

export type ExchangeOptions = RenderOptions & {
	client?: HttpClient;
};

/**
 * Sends one request and prints its response
 */
export async function executeRequest(spec: RequestSpec, options: ExchangeOptions = {}): Result.ResultAsync<void, NetworkError | RenderError> {
	const { client = httpClient, ...renderOptions } = options;
	return Result.pipe(
		dispatch(client, spec),
		Result.andThen(async response => renderResponse(response, renderOptions)),
	);
}

if (import.meta.vitest != null) {
	const plain = pc.createColors(false);

	describe('executeRequest', () => {
		it('dispatches then renders', async () => {
			const lines: string[] = [];
			const client: HttpClient = {
				request: vi.fn<HttpClient['request']>(async url => ({
					url,
					version: '1.1',
					status: 201,
					statusText: 'Created',
					headers: [['Content-Type', 'application/json']],
					text: async () => '{"id":"42","name":"widget"}',
				})),
			};

			const result = await executeRequest(
				{ method: 'POST', url: 'http://example.com/items', pairs: [{ key: 'name', value: 'widget' }] },
				{ client, colors: plain, write: line => lines.push(line) },
			);

			expect(Result.isSuccess(result)).toBe(true);
			expect(client.request).toHaveBeenCalledWith('http://example.com/items', {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: '{"name":"widget"}',
			});
			expect(lines).toEqual([
				'HTTP/1.1 201 Created',
				'Content-Type: application/json',
				'',
				'{\n  "id": "42",\n  "name": "widget"\n}',
			]);
		});

		it('prints nothing when the request fails', async () => {
			const lines: string[] = [];
			const client: HttpClient = {
				request: async () => Promise.reject(new Error('getaddrinfo ENOTFOUND nowhere.invalid')),
			};

			const result = await executeRequest(
				{ method: 'GET', url: 'http://nowhere.invalid/' },
				{ client, colors: plain, write: line => lines.push(line) },
			);

			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.name).toBe('NetworkError');
			expect(lines).toEqual([]);
		});
	});
}
