import type { HttpClient, RequestOptions, ResponseHandle } from './http/index.ts';
import type { RequestSpec } from './_types.ts';
import { Result } from '@praha/byethrow';
import { NetworkError, toError } from './_errors.ts';
import { toJsonBody } from './_key-value.ts';
import { logger } from './logger.ts';

/**
 * Translates a request spec into client options
 */
export function toRequestOptions(spec: RequestSpec): RequestOptions {
	switch (spec.method) {
		case 'GET':
			return { method: 'GET' };
		case 'POST':
			return {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify(toJsonBody(spec.pairs)),
			};
		default: {
			const unreachable: never = spec;
			throw new Error(`Unsupported request: ${JSON.stringify(unreachable)}`);
		}
	}
}

/**
 * Issues the request described by `spec`, once.
 * Any status code counts as success; only transport failures become NetworkError.
 */
export async function dispatch(client: HttpClient, spec: RequestSpec): Result.ResultAsync<ResponseHandle, NetworkError> {
	logger.debug(`${spec.method} ${spec.url}`);
	return Result.try({
		try: client.request(spec.url, toRequestOptions(spec)),
		catch: (error: unknown) => {
			const cause = toError(error);
			return new NetworkError(`${spec.method} ${spec.url} failed: ${cause.message}`, { cause });
		},
	});
}

if (import.meta.vitest != null) {
	const response: ResponseHandle = {
		url: 'http://example.com/',
		version: '1.1',
		status: 500,
		statusText: 'Internal Server Error',
		headers: [],
		text: async () => 'boom',
	};

	describe('toRequestOptions', () => {
		it('sends GET without a body', () => {
			expect(toRequestOptions({ method: 'GET', url: 'http://example.com' })).toEqual({ method: 'GET' });
		});

		it('serializes POST pairs as JSON', () => {
			const options = toRequestOptions({
				method: 'POST',
				url: 'http://example.com',
				pairs: [{ key: 'a', value: '1' }, { key: 'b', value: '2' }],
			});
			expect(options.method).toBe('POST');
			expect(options.headers).toEqual({ 'Content-Type': 'application/json' });
			expect(JSON.parse(options.body ?? '')).toEqual({ a: '1', b: '2' });
		});

		it('keeps the last value of a duplicate key', () => {
			const options = toRequestOptions({
				method: 'POST',
				url: 'http://example.com',
				pairs: [{ key: 'a', value: '1' }, { key: 'a', value: '2' }],
			});
			expect(options.body).toBe('{"a":"2"}');
		});

		it('sends an empty object when there are no pairs', () => {
			const options = toRequestOptions({ method: 'POST', url: 'http://example.com', pairs: [] });
			expect(options.body).toBe('{}');
		});
	});

	describe('dispatch', () => {
		it('passes the spec to the client and returns its response', async () => {
			const request = vi.fn<HttpClient['request']>().mockResolvedValue(response);
			const result = await dispatch({ request }, {
				method: 'POST',
				url: 'http://example.com/items',
				pairs: [{ key: 'name', value: 'widget' }],
			});

			expect(request).toHaveBeenCalledTimes(1);
			expect(request).toHaveBeenCalledWith('http://example.com/items', {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: '{"name":"widget"}',
			});
			expect(result).toEqual(Result.succeed(response));
		});

		it('treats error statuses as successful calls', async () => {
			const result = await dispatch({ request: async () => response }, { method: 'GET', url: 'http://example.com/' });
			if (Result.isFailure(result)) {
				throw result.error;
			}
			expect(result.value.status).toBe(500);
		});

		it('wraps transport failures in NetworkError', async () => {
			const cause = new Error('connect ECONNREFUSED 127.0.0.1:9');
			const request = vi.fn<HttpClient['request']>().mockRejectedValue(cause);
			const result = await dispatch({ request }, { method: 'GET', url: 'http://127.0.0.1:9/' });

			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error).toBeInstanceOf(NetworkError);
			expect(result.error.message).toBe('GET http://127.0.0.1:9/ failed: connect ECONNREFUSED 127.0.0.1:9');
			expect(result.error.cause).toBe(cause);
			expect(request).toHaveBeenCalledTimes(1);
		});
	});
}
