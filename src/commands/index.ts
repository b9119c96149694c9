import { define } from 'gunshi';
import { description } from '../../package.json';
import { ParseError } from '../_errors.ts';
import { commandUsages } from './_shared.ts';
import { getCommand } from './get.ts';
import { postCommand } from './post.ts';

export { commandUsages, getCommand, postCommand };

/**
 * Command entries as tuple array
 */
export const subCommandUnion = [
	['get', getCommand],
	['post', postCommand],
] as const;

/**
 * Available command names extracted from union
 */
export type CommandName = typeof subCommandUnion[number][0];

export function isCommandName(value: string | undefined): value is CommandName {
	return subCommandUnion.some(([name]) => name === value);
}

/**
 * Runs when no command is given
 */
export const mainCommand = define({
	description,
	run() {
		throw new ParseError('missing-command', '', 'A command is required');
	},
});

if (import.meta.vitest != null) {
	describe('isCommandName', () => {
		it('recognizes every command', () => {
			expect(subCommandUnion.map(([name]) => isCommandName(name))).toEqual([true, true]);
		});

		it('rejects anything else', () => {
			expect(isCommandName('put')).toBe(false);
			expect(isCommandName(undefined)).toBe(false);
		});
	});
}
