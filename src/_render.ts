/**
 * @fileoverview Terminal rendering of HTTP responses
 *
 * Prints the status line, then the headers, then the body. JSON bodies are
 * re-indented; anything else is printed as received.
 *
 * @module render
 */

import type { Colors } from 'picocolors/types';
import type { HeaderEntry } from './_types.ts';
import type { ResponseHandle } from './http/index.ts';
import { Result } from '@praha/byethrow';
import pc from 'picocolors';
import MIMEType from 'whatwg-mimetype';
import { JSON_MIME_ESSENCE } from './_consts.ts';
import { NetworkError, RenderError, toError } from './_errors.ts';
import { reindentJson } from './_json-format.ts';
import { getHeader } from './http/index.ts';
import { log } from './logger.ts';

export type RenderOptions = {
	/**
	 * Receives each output line, defaults to stdout
	 */
	write?: (line: string) => void;

	/**
	 * Colour functions, defaults to picocolors' environment detection
	 */
	colors?: Colors;
};

export function formatStatusLine(response: Pick<ResponseHandle, 'version' | 'status' | 'statusText'>, colors: Colors): string {
	const reason = response.statusText.length > 0 ? ` ${response.statusText}` : '';
	return colors.blue(`HTTP/${response.version} ${response.status}${reason}`);
}

/**
 * One `name: value` line per header, followed by a blank line
 */
export function formatHeaders(headers: readonly HeaderEntry[], colors: Colors): string[] {
	return [...headers.map(([name, value]) => `${colors.green(name)}: ${value}`), ''];
}

/**
 * Parses the Content-Type header. Missing or unparseable values give null.
 */
export function getContentType(headers: readonly HeaderEntry[]): MIMEType | null {
	const value = getHeader(headers, 'content-type');
	return value == null ? null : MIMEType.parse(value);
}

/**
 * Pretty-prints JSON bodies, passes everything else through unchanged.
 * JSON is validated, then re-indented from its source text so values print as sent.
 */
export function formatBody(contentType: MIMEType | null, text: string): Result.Result<string, RenderError> {
	if (contentType?.essence !== JSON_MIME_ESSENCE) {
		return Result.succeed(text);
	}

	return Result.try({
		try: () => {
			JSON.parse(text);
			return reindentJson(text);
		},
		catch: (error: unknown) => new RenderError('malformed-json', `Response declared ${JSON_MIME_ESSENCE} but the body is not valid JSON`, { cause: toError(error) }),
	})();
}

function toBodyReadError(error: unknown): RenderError | NetworkError {
	const cause = toError(error);
	if (cause instanceof TypeError && 'code' in cause && cause.code === 'ERR_ENCODING_INVALID_ENCODED_DATA') {
		return new RenderError('invalid-encoding', 'Response body is not valid UTF-8', { cause });
	}
	return new NetworkError(`Failed to read response body: ${cause.message}`, { cause });
}

/**
 * Prints a response: status line, headers, blank line, body.
 * Output already written stays written if the body fails.
 */
export async function renderResponse(response: ResponseHandle, options: RenderOptions = {}): Result.ResultAsync<void, RenderError | NetworkError> {
	const write = options.write ?? log;
	const colors = options.colors ?? pc;

	write(formatStatusLine(response, colors));
	for (const line of formatHeaders(response.headers, colors)) {
		write(line);
	}

	const contentType = getContentType(response.headers);
	return Result.pipe(
		Result.try({
			try: response.text(),
			catch: toBodyReadError,
		}),
		Result.andThen(text => formatBody(contentType, text)),
		Result.inspect((body) => {
			if (body.length > 0) {
				write(body);
			}
		}),
		Result.map(() => undefined),
	);
}

if (import.meta.vitest != null) {
	const plain = pc.createColors(false);

	function fakeResponse(headers: HeaderEntry[], body: string | Error): ResponseHandle {
		return {
			url: 'http://example.com/',
			version: '1.1',
			status: 200,
			statusText: 'OK',
			headers,
			text: async () => typeof body === 'string' ? body : Promise.reject(body),
		};
	}

	async function render(response: ResponseHandle): Promise<{ lines: string[]; result: Result.Result<void, RenderError | NetworkError> }> {
		const lines: string[] = [];
		const result = await renderResponse(response, { write: line => lines.push(line), colors: plain });
		return { lines, result };
	}

	describe('formatStatusLine', () => {
		it('prints version, status and reason', () => {
			expect(formatStatusLine({ version: '1.1', status: 404, statusText: 'Not Found' }, plain)).toBe('HTTP/1.1 404 Not Found');
		});

		it('omits an empty reason', () => {
			expect(formatStatusLine({ version: '2.0', status: 204, statusText: '' }, plain)).toBe('HTTP/2.0 204');
		});

		it('colours the line blue', () => {
			const colors = pc.createColors(true);
			expect(formatStatusLine({ version: '1.1', status: 200, statusText: 'OK' }, colors)).toBe('\u001B[34mHTTP/1.1 200 OK\u001B[39m');
		});
	});

	describe('formatHeaders', () => {
		it('prints headers in order and ends with a blank line', () => {
			const lines = formatHeaders([['Date', 'Mon, 19 Oct 2026 10:00:00 GMT'], ['Set-Cookie', 'a=1'], ['Set-Cookie', 'b=2']], plain);
			expect(lines).toEqual([
				'Date: Mon, 19 Oct 2026 10:00:00 GMT',
				'Set-Cookie: a=1',
				'Set-Cookie: b=2',
				'',
			]);
		});

		it('colours header names green', () => {
			const colors = pc.createColors(true);
			expect(formatHeaders([['Content-Type', 'text/plain']], colors)[0]).toBe('\u001B[32mContent-Type\u001B[39m: text/plain');
		});
	});

	describe('getContentType', () => {
		it('parses the header case-insensitively', () => {
			expect(getContentType([['content-type', 'Application/JSON; charset=UTF-8']])?.essence).toBe('application/json');
		});

		it('returns null when the header is absent', () => {
			expect(getContentType([['Content-Length', '2']])).toBeNull();
		});

		it('returns null when the header cannot be parsed', () => {
			expect(getContentType([['Content-Type', 'not a mime type']])).toBeNull();
		});
	});

	describe('formatBody', () => {
		it('re-indents JSON', () => {
			expect(formatBody(MIMEType.parse('application/json'), '{"x":1,"y":[true,null]}'))
				.toEqual(Result.succeed('{\n  "x": 1,\n  "y": [\n    true,\n    null\n  ]\n}'));
		});

		it('keeps large integers and number formatting', () => {
			expect(formatBody(MIMEType.parse('application/json'), '{"id":12345678901234567890,"f":1.0,"e":1e2}'))
				.toEqual(Result.succeed('{\n  "id": 12345678901234567890,\n  "f": 1.0,\n  "e": 1e2\n}'));
		});

		it('leaves other types untouched', () => {
			expect(formatBody(MIMEType.parse('application/problem+json'), '{"x":1}')).toEqual(Result.succeed('{"x":1}'));
			expect(formatBody(null, '  raw  ')).toEqual(Result.succeed('  raw  '));
		});

		it('fails on malformed JSON', () => {
			const result = formatBody(MIMEType.parse('application/json'), '{"x":');
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error).toBeInstanceOf(RenderError);
			expect(result.error.kind).toBe('malformed-json');
		});
	});

	describe('renderResponse', () => {
		it('pretty-prints a JSON response', async () => {
			const { lines, result } = await render(fakeResponse([['Content-Type', 'application/json']], '{"x":1}'));
			expect(result).toEqual(Result.succeed(undefined));
			expect(lines).toEqual([
				'HTTP/1.1 200 OK',
				'Content-Type: application/json',
				'',
				'{\n  "x": 1\n}',
			]);
		});

		it('ignores content-type parameters when detecting JSON', async () => {
			const { lines } = await render(fakeResponse([['content-type', 'application/json; charset=utf-8']], '[1,2]'));
			expect(lines.at(-1)).toBe('[\n  1,\n  2\n]');
		});

		it('prints text bodies verbatim', async () => {
			const { lines, result } = await render(fakeResponse([['Content-Type', 'text/plain']], 'hello'));
			expect(Result.isSuccess(result)).toBe(true);
			expect(lines).toEqual(['HTTP/1.1 200 OK', 'Content-Type: text/plain', '', 'hello']);
		});

		it('prints the raw body when there is no content type', async () => {
			const { lines, result } = await render(fakeResponse([], '{"x":1}'));
			expect(Result.isSuccess(result)).toBe(true);
			expect(lines).toEqual(['HTTP/1.1 200 OK', '', '{"x":1}']);
		});

		it('prints nothing after the blank line for an empty body', async () => {
			const { lines } = await render(fakeResponse([['Content-Length', '0']], ''));
			expect(lines).toEqual(['HTTP/1.1 200 OK', 'Content-Length: 0', '']);
		});

		it('fails on malformed JSON after printing the head', async () => {
			const { lines, result } = await render(fakeResponse([['Content-Type', 'application/json']], '<html>'));
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error).toBeInstanceOf(RenderError);
			expect(lines).toEqual(['HTTP/1.1 200 OK', 'Content-Type: application/json', '']);
		});

		it('reports undecodable bodies as invalid-encoding', async () => {
			const decodeError = Object.assign(new TypeError('The encoded data was not valid for encoding utf-8'), {
				code: 'ERR_ENCODING_INVALID_ENCODED_DATA',
			});
			const { result } = await render(fakeResponse([], decodeError));
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error).toBeInstanceOf(RenderError);
			expect(result.error instanceof RenderError && result.error.kind).toBe('invalid-encoding');
		});

		it('does not report unrelated TypeErrors as invalid-encoding', async () => {
			const { result } = await render(fakeResponse([], new TypeError('body stream already read')));
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error).toBeInstanceOf(NetworkError);
			expect(result.error.message).toBe('Failed to read response body: body stream already read');
		});

		it('reports a broken body stream as a network error', async () => {
			const { result } = await render(fakeResponse([], new Error('aborted')));
			if (Result.isSuccess(result)) {
				throw new Error('expected failure');
			}
			expect(result.error).toBeInstanceOf(NetworkError);
			expect(result.error.message).toBe('Failed to read response body: aborted');
		});
	});
}
