/**
 * @fileoverview Logging utilities for quickhttp
 *
 * Diagnostics go through a consola instance tagged with the package name.
 * Rendered responses are written with `log` so they stay free of logger
 * formatting.
 *
 * @module logger
 */

import type { ConsolaInstance } from 'consola';
import process from 'node:process';
import { consola } from 'consola';
import { name } from '../package.json';

/**
 * Creates a tagged logger, applying the `LOG_LEVEL` environment variable when set
 * @param tag - Tag shown in front of every message
 */
export function createLogger(tag: string): ConsolaInstance {
	const logger: ConsolaInstance = consola.withTag(tag);

	if (process.env.LOG_LEVEL != null) {
		const level = Number.parseInt(process.env.LOG_LEVEL, 10);
		if (!Number.isNaN(level)) {
			logger.level = level;
		}
	}

	return logger;
}

/**
 * Application logger instance with package name tag
 */
export const logger: ConsolaInstance = createLogger(name);

/**
 * Direct console.log function for output that must not carry logger formatting
 */
// eslint-disable-next-line no-console
export const log = console.log;

if (import.meta.vitest != null) {
	describe('createLogger', () => {
		afterEach(() => {
			vi.unstubAllEnvs();
		});

		it('applies a numeric LOG_LEVEL', () => {
			vi.stubEnv('LOG_LEVEL', '5');
			expect(createLogger('test').level).toBe(5);
		});

		it('ignores a non-numeric LOG_LEVEL', () => {
			vi.stubEnv('LOG_LEVEL', 'verbose');
			const testLogger = createLogger('test');
			expect(testLogger.level).toBe(consola.level);
		});
	});
}
