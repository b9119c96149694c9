import type { KeyValuePair, RequestSpec } from './_types.ts';
import { Result } from '@praha/byethrow';
import { ParseError } from './_errors.ts';
import { parseKeyValue } from './_key-value.ts';
import { validateUrl } from './_url.ts';

/**
 * Builds a GET request after validating its URL
 */
export function parseGetSpec(url: string): Result.Result<RequestSpec, ParseError> {
	return Result.pipe(
		validateUrl(url),
		Result.map(valid => ({ method: 'GET', url: valid }) as const),
	);
}

/**
 * Builds a POST request, validating the URL and then each body argument in order.
 * The first invalid argument is reported.
 */
export function parsePostSpec(url: string, args: readonly string[]): Result.Result<RequestSpec, ParseError> {
	const validated = validateUrl(url);
	if (Result.isFailure(validated)) {
		return validated;
	}

	const pairs: KeyValuePair[] = [];
	for (const arg of args) {
		const pair = parseKeyValue(arg);
		if (Result.isFailure(pair)) {
			return pair;
		}
		pairs.push(pair.value);
	}

	return Result.succeed({ method: 'POST', url: validated.value, pairs });
}

/**
 * Builds a GET request from the raw arguments after the command name: exactly one URL
 */
export function parseGetArguments(args: readonly string[]): Result.Result<RequestSpec, ParseError> {
	const [url, ...extra] = args;
	if (url == null) {
		return Result.fail(new ParseError('missing-argument', '', 'Missing required argument <url>'));
	}
	const [unexpected] = extra;
	if (unexpected != null) {
		return Result.fail(new ParseError('unexpected-argument', unexpected, `Unexpected argument "${unexpected}"`));
	}
	return parseGetSpec(url);
}

/**
 * Builds a POST request from the raw arguments after the command name: a URL, then key=value pairs.
 * Every argument after the URL goes through the key=value parser, including ones that look like options.
 */
export function parsePostArguments(args: readonly string[]): Result.Result<RequestSpec, ParseError> {
	const [url, ...body] = args;
	if (url == null) {
		return Result.fail(new ParseError('missing-argument', '', 'Missing required argument <url>'));
	}
	return parsePostSpec(url, body);
}

if (import.meta.vitest != null) {
	describe('parseGetArguments', () => {
		it('takes a single URL', () => {
			expect(parseGetArguments(['http://example.com'])).toEqual(Result.succeed({ method: 'GET', url: 'http://example.com' }));
		});

		it('requires a URL', () => {
			const result = parseGetArguments([]);
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.kind).toBe('missing-argument');
			expect(result.error.message).toBe('Missing required argument <url>');
		});

		it('rejects extra arguments', () => {
			const result = parseGetArguments(['http://example.com', 'a=1']);
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.kind).toBe('unexpected-argument');
			expect(result.error.input).toBe('a=1');
		});
	});

	describe('parsePostArguments', () => {
		it('parses values and keys that look like options', () => {
			expect(parsePostArguments(['http://example.com', 'a=--x', '--flag=1', '-x=2'])).toEqual(Result.succeed({
				method: 'POST',
				url: 'http://example.com',
				pairs: [
					{ key: 'a', value: '--x' },
					{ key: '--flag', value: '1' },
					{ key: '-x', value: '2' },
				],
			}));
		});

		it('rejects an option-like argument without a delimiter', () => {
			const result = parsePostArguments(['http://example.com', '--verbose']);
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.kind).toBe('missing-delimiter');
			expect(result.error.input).toBe('--verbose');
		});

		it('requires a URL', () => {
			const result = parsePostArguments([]);
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.kind).toBe('missing-argument');
		});
	});

	describe('parseGetSpec', () => {
		it('builds a GET spec for a valid URL', () => {
			const result = parseGetSpec('https://example.com/items');
			expect(result).toEqual(Result.succeed({ method: 'GET', url: 'https://example.com/items' }));
		});

		it('fails on an invalid URL', () => {
			const result = parseGetSpec('not-a-url');
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.kind).toBe('invalid-url');
		});
	});

	describe('parsePostSpec', () => {
		it('keeps pairs in argument order', () => {
			const result = parsePostSpec('http://example.com', ['a=1', 'b=2', 'a=3']);
			expect(result).toEqual(Result.succeed({
				method: 'POST',
				url: 'http://example.com',
				pairs: [
					{ key: 'a', value: '1' },
					{ key: 'b', value: '2' },
					{ key: 'a', value: '3' },
				],
			}));
		});

		it('allows an empty body', () => {
			const result = parsePostSpec('http://example.com', []);
			expect(result).toEqual(Result.succeed({ method: 'POST', url: 'http://example.com', pairs: [] }));
		});

		it('reports the first argument without a delimiter', () => {
			const result = parsePostSpec('http://example.com', ['a=1', 'oops', 'also-bad']);
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.kind).toBe('missing-delimiter');
			expect(result.error.input).toBe('oops');
		});

		it('validates the URL before the body', () => {
			const result = parsePostSpec('', ['oops']);
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error.kind).toBe('invalid-url');
		});
	});
}
