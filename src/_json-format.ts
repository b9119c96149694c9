import { JSON_INDENT } from './_consts.ts';

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

function nextSignificant(text: string, from: number): number {
	let index = from;
	while (index < text.length && WHITESPACE.has(text.charAt(index))) {
		index++;
	}
	return index;
}

/**
 * End index (exclusive) of the string literal opening at `start`
 */
function stringEnd(text: string, start: number): number {
	let index = start + 1;
	while (index < text.length && text.charAt(index) !== '"') {
		index += text.charAt(index) === '\\' ? 2 : 1;
	}
	return index + 1;
}

/**
 * Re-indents valid JSON text without re-serializing it.
 * Numbers, strings and duplicate keys keep their source text; only whitespace
 * between tokens changes. Layout follows `JSON.stringify(value, null, indent)`.
 */
export function reindentJson(text: string, indent: number = JSON_INDENT): string {
	const newline = (depth: number): string => `\n${' '.repeat(depth * indent)}`;
	let output = '';
	let depth = 0;

	for (let index = 0; index < text.length; index++) {
		const char = text.charAt(index);
		if (WHITESPACE.has(char)) {
			continue;
		}

		switch (char) {
			case '"': {
				const end = stringEnd(text, index);
				output += text.slice(index, end);
				index = end - 1;
				break;
			}
			case '{':
			case '[': {
				const close = char === '{' ? '}' : ']';
				const next = nextSignificant(text, index + 1);
				if (text.charAt(next) === close) {
					output += char + close;
					index = next;
					break;
				}
				depth++;
				output += char + newline(depth);
				break;
			}
			case '}':
			case ']':
				depth--;
				output += newline(depth) + char;
				break;
			case ',':
				output += `,${newline(depth)}`;
				break;
			case ':':
				output += ': ';
				break;
			default:
				output += char;
		}
	}

	return output;
}

if (import.meta.vitest != null) {
	describe('reindentJson', () => {
		it('matches JSON.stringify layout for ordinary documents', () => {
			const text = '{"x":1,"y":[true,null],"z":{"w":"v"}}';
			expect(reindentJson(text)).toBe(JSON.stringify(JSON.parse(text), null, 2));
		});

		it('keeps number text exactly', () => {
			expect(reindentJson('{"id":12345678901234567890,"f":1.0,"e":1e2,"n":-0}'))
				.toBe('{\n  "id": 12345678901234567890,\n  "f": 1.0,\n  "e": 1e2,\n  "n": -0\n}');
		});

		it('keeps duplicate keys', () => {
			expect(reindentJson('{"a":1,"a":2}')).toBe('{\n  "a": 1,\n  "a": 2\n}');
		});

		it('leaves string contents alone', () => {
			expect(reindentJson('{"s":"a \\" {b}, [c]: d","u":"\\u00e9\\\\"}'))
				.toBe('{\n  "s": "a \\" {b}, [c]: d",\n  "u": "\\u00e9\\\\"\n}');
		});

		it('drops existing whitespace and keeps empty containers compact', () => {
			expect(reindentJson(' {\n\t"a" : { } ,\r\n "b":[ ]\n} ')).toBe('{\n  "a": {},\n  "b": []\n}');
		});

		it('passes scalars through', () => {
			expect(reindentJson(' "hi" ')).toBe('"hi"');
			expect(reindentJson('42')).toBe('42');
		});

		it('uses the given indent width', () => {
			expect(reindentJson('[[1]]', 4)).toBe('[\n    [\n        1\n    ]\n]');
		});
	});
}
