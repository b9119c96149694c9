import type { KeyValuePair } from './_types.ts';
import { Result } from '@praha/byethrow';
import { ParseError } from './_errors.ts';

/**
 * Splits a `key=value` argument at its first `=`.
 * Either side may be empty; only the delimiter is required.
 */
export function parseKeyValue(input: string): Result.Result<KeyValuePair, ParseError> {
	const index = input.indexOf('=');
	if (index === -1) {
		return Result.fail(new ParseError('missing-delimiter', input, `Expected key=value, got "${input}"`));
	}
	return Result.succeed({
		key: input.slice(0, index),
		value: input.slice(index + 1),
	});
}

/**
 * Builds the JSON body object for a POST. Later duplicates win.
 */
export function toJsonBody(pairs: readonly KeyValuePair[]): Record<string, string> {
	return Object.fromEntries(pairs.map(({ key, value }) => [key, value]));
}

if (import.meta.vitest != null) {
	describe('parseKeyValue', () => {
		const parsed = (input: string): KeyValuePair => {
			const result = parseKeyValue(input);
			if (Result.isFailure(result)) {
				throw result.error;
			}
			return result.value;
		};

		it('splits on the delimiter', () => {
			expect(parsed('name=alice')).toEqual({ key: 'name', value: 'alice' });
		});

		it('keeps later delimiters in the value', () => {
			expect(parsed('a=b=c')).toEqual({ key: 'a', value: 'b=c' });
			expect(parsed('query==x==')).toEqual({ key: 'query', value: '=x==' });
		});

		it('accepts an empty key', () => {
			expect(parsed('=value')).toEqual({ key: '', value: 'value' });
		});

		it('accepts an empty value', () => {
			expect(parsed('key=')).toEqual({ key: 'key', value: '' });
		});

		it('accepts a bare delimiter', () => {
			expect(parsed('=')).toEqual({ key: '', value: '' });
		});

		it('keeps whitespace on both sides', () => {
			expect(parsed(' a = b ')).toEqual({ key: ' a ', value: ' b ' });
		});

		it.each(['', 'name', 'a:b', 'key value'])('rejects %j without a delimiter', (input) => {
			const result = parseKeyValue(input);
			if (Result.isSuccess(result)) {
				throw new Error(`expected ${input} to be rejected`);
			}
			expect(result.error).toBeInstanceOf(ParseError);
			expect(result.error.kind).toBe('missing-delimiter');
			expect(result.error.input).toBe(input);
		});

		it('does not mutate its input', () => {
			const input = 'x=1';
			parsed(input);
			expect(input).toBe('x=1');
		});
	});

	describe('toJsonBody', () => {
		it('serializes pairs into a JSON object', () => {
			const body = toJsonBody([{ key: 'a', value: '1' }, { key: 'b', value: '2' }]);
			expect(JSON.parse(JSON.stringify(body))).toEqual({ a: '1', b: '2' });
		});

		it('lets the last duplicate win', () => {
			const body = toJsonBody([{ key: 'a', value: '1' }, { key: 'a', value: '2' }]);
			expect(Object.keys(body)).toEqual(['a']);
			expect(JSON.stringify(body)).toBe('{"a":"2"}');
		});

		it('treats __proto__ as an ordinary key', () => {
			const body = toJsonBody([{ key: '__proto__', value: 'x' }]);
			expect(JSON.stringify(body)).toBe('{"__proto__":"x"}');
			expect(Object.getPrototypeOf(body)).toBe(Object.prototype);
		});

		it('returns an empty object for no pairs', () => {
			expect(JSON.stringify(toJsonBody([]))).toBe('{}');
		});
	});
}
