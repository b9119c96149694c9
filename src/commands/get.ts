import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import { executeRequest } from '../_exchange.ts';
import { parseGetArguments } from '../_request-spec.ts';
import { commandUsages, rawCommandArguments } from './_shared.ts';

export const getCommand = define({
	name: 'get',
	description: 'Send a GET request and print the response',
	examples: commandUsages.get,
	async run(ctx) {
		const result = await Result.pipe(
			parseGetArguments(rawCommandArguments(ctx._, 'get')),
			Result.andThen(async spec => executeRequest(spec)),
		);

		if (Result.isFailure(result)) {
			throw result.error;
		}
	},
});

if (import.meta.vitest != null) {
	describe('getCommand', () => {
		it('should have correct command definition', () => {
			expect(getCommand.name).toBe('get');
			expect(getCommand.examples).toBe('get <url>');
		});
	});
}
