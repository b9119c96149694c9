import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import { executeRequest } from '../_exchange.ts';
import { parsePostArguments } from '../_request-spec.ts';
import { commandUsages, rawCommandArguments } from './_shared.ts';

export const postCommand = define({
	name: 'post',
	description: 'Send key=value pairs as a JSON object in a POST request and print the response',
	examples: commandUsages.post,
	async run(ctx) {
		const result = await Result.pipe(
			parsePostArguments(rawCommandArguments(ctx._, 'post')),
			Result.andThen(async spec => executeRequest(spec)),
		);

		if (Result.isFailure(result)) {
			throw result.error;
		}
	},
});

if (import.meta.vitest != null) {
	describe('postCommand', () => {
		it('should have correct command definition', () => {
			expect(postCommand.name).toBe('post');
			expect(postCommand.examples).toBe('post <url> [key=value ...]');
		});
	});
}
