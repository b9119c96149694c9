/**
 * Argument synopsis of each command, shown in help and after a parse error
 */
export const commandUsages = {
	get: 'get <url>',
	post: 'post <url> [key=value ...]',
} as const;

/**
 * Arguments after the command name exactly as typed.
 * gunshi's option parsing would swallow body pairs such as `a=--x` or `--flag=1`.
 */
export function rawCommandArguments(argv: readonly string[], commandName: string): string[] {
	return argv[0] === commandName ? argv.slice(1) : [...argv];
}

if (import.meta.vitest != null) {
	describe('rawCommandArguments', () => {
		it('drops the leading command name', () => {
			expect(rawCommandArguments(['post', 'http://example.com', 'a=--x'], 'post')).toEqual(['http://example.com', 'a=--x']);
		});

		it('keeps option-like arguments', () => {
			expect(rawCommandArguments(['post', 'http://example.com', '--flag=1', '-x=2'], 'post')).toEqual(['http://example.com', '--flag=1', '-x=2']);
		});

		it('returns arguments unchanged when the command name is absent', () => {
			expect(rawCommandArguments(['http://example.com'], 'get')).toEqual(['http://example.com']);
		});
	});
}
