/**
 * @fileoverview CLI runner and the single top-level error handler
 */

import process from 'node:process';
import { cli } from 'gunshi';
import { description, name, version } from '../package.json';
import { ParseError, toError } from './_errors.ts';
import { closedPortUrl, withServer } from './_fixtures.ts';
import { commandUsages, isCommandName, mainCommand, subCommandUnion } from './commands/index.ts';
import { log, logger } from './logger.ts';

const subCommands = new Map<string, typeof subCommandUnion[number][1]>(subCommandUnion);

/**
 * Prints a failure. Parse errors are followed by usage for the attempted
 * command, or for every command when none was recognized.
 */
export function reportError(error: unknown, attempted?: string, write: (line: string) => void = log): void {
	const failure = toError(error);
	logger.error(failure.message);
	if (failure.cause != null) {
		logger.debug(failure.cause);
	}

	if (failure instanceof ParseError) {
		const usages = isCommandName(attempted) ? [commandUsages[attempted]] : Object.values(commandUsages);
		for (const usage of usages) {
			write(`Usage: ${name} ${usage}`);
		}
	}
}

export async function run(argv: string[] = process.argv.slice(2)): Promise<void> {
	// When invoked through npx, the binary name might be passed as the first argument
	let args = argv;
	if (args[0] === name) {
		args = args.slice(1);
	}

	try {
		await cli(args, mainCommand, {
			name,
			version,
			description,
			subCommands,
			renderHeader: null,
		});
	}
	catch (error) {
		reportError(error, args[0]);
		process.exitCode = 1;
	}
}

if (import.meta.vitest != null) {
	describe('reportError', () => {
		afterEach(() => {
			vi.restoreAllMocks();
		});

		it('prints usage for the attempted command after a parse error', () => {
			const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
			const output: string[] = [];

			reportError(new ParseError('invalid-url', 'nope', 'Invalid URL: "nope"'), 'get', line => output.push(line));

			expect(error).toHaveBeenCalledWith('Invalid URL: "nope"');
			expect(output).toEqual([`Usage: ${name} get <url>`]);
		});

		it('prints every usage when no command was recognized', () => {
			vi.spyOn(logger, 'error').mockImplementation(() => {});
			const output: string[] = [];

			reportError(new ParseError('missing-command', '', 'A command is required'), undefined, line => output.push(line));

			expect(output).toEqual([
				`Usage: ${name} get <url>`,
				`Usage: ${name} post <url> [key=value ...]`,
			]);
		});

		it('prints only the message for other failures', () => {
			const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
			const output: string[] = [];

			reportError(new Error('connect ECONNREFUSED 127.0.0.1:9'), 'get', line => output.push(line));

			expect(error).toHaveBeenCalledWith('connect ECONNREFUSED 127.0.0.1:9');
			expect(output).toEqual([]);
		});
	});

	describe('run', () => {
		afterEach(() => {
			vi.restoreAllMocks();
			process.exitCode = undefined;
		});

		it('exits nonzero on an invalid URL without sending anything', async () => {
			vi.spyOn(logger, 'error').mockImplementation(() => {});

			await run(['get', 'not-a-url']);

			expect(process.exitCode).toBe(1);
		});

		it.each([['get'], ['post']])('exits nonzero when %s has no URL', async (command) => {
			const error = vi.spyOn(logger, 'error').mockImplementation(() => {});

			await run([command]);

			expect(process.exitCode).toBe(1);
			expect(error).toHaveBeenCalledWith('Missing required argument <url>');
		});

		it('exits nonzero when get is given a body', async () => {
			const error = vi.spyOn(logger, 'error').mockImplementation(() => {});

			await run(['get', 'http://127.0.0.1:9/', 'a=1']);

			expect(process.exitCode).toBe(1);
			expect(error).toHaveBeenCalledWith('Unexpected argument "a=1"');
		});

		it('exits nonzero on a body argument without a delimiter', async () => {
			const error = vi.spyOn(logger, 'error').mockImplementation(() => {});

			await run(['post', 'http://127.0.0.1:9/', 'a=1', 'broken']);

			expect(process.exitCode).toBe(1);
			expect(error).toHaveBeenCalledWith('Expected key=value, got "broken"');
		});

		it('exits zero for an error status', async () => {
			await withServer((_req, res) => {
				res.writeHead(500, { 'Content-Type': 'text/plain' });
				res.end('server exploded');
			}, async (baseUrl, received) => {
				await run(['get', `${baseUrl}/fail`]);

				expect(received.map(entry => [entry.method, entry.url])).toEqual([['GET', '/fail']]);
				expect(process.exitCode).toBeUndefined();
			});
		});

		it('sends body pairs that look like options', async () => {
			await withServer((_req, res) => {
				res.end();
			}, async (baseUrl, received) => {
				await run(['post', baseUrl, 'a=--x']);
				await run(['post', baseUrl, 'a=1', '--flag=1', '-x=2']);

				expect(received.map(entry => entry.body)).toEqual([
					'{"a":"--x"}',
					'{"a":"1","--flag":"1","-x":"2"}',
				]);
				expect(received[0]?.headers['content-type']).toBe('application/json');
				expect(process.exitCode).toBeUndefined();
			});
		});

		it('exits nonzero when the connection fails', async () => {
			const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
			const baseUrl = await closedPortUrl();

			await run(['get', baseUrl]);

			expect(process.exitCode).toBe(1);
			expect(error).toHaveBeenCalledWith(expect.stringMatching(/^GET http:\/\/127\.0\.0\.1:\d+ failed: .*ECONNREFUSED/));
		});

		it('exits nonzero when a JSON response is malformed', async () => {
			const error = vi.spyOn(logger, 'error').mockImplementation(() => {});

			await withServer((_req, res) => {
				res.writeHead(200, { 'Content-Type': 'application/json' });
				res.end('<html>');
			}, async (baseUrl) => {
				await run(['get', baseUrl]);
			});

			expect(process.exitCode).toBe(1);
			expect(error).toHaveBeenCalledWith('Response declared application/json but the body is not valid JSON');
		});
	});
}
