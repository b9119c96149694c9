import { name, version } from '../package.json';

/**
 * Headers attached to every outgoing request
 */
export const DEFAULT_HEADERS = {
	'X-Powered-By': name,
	'User-Agent': `${name}/${version}`,
} as const satisfies Record<string, string>;

/**
 * MIME essence that switches the renderer to JSON pretty-printing
 */
export const JSON_MIME_ESSENCE = 'application/json';

/**
 * Socket inactivity timeout applied by the HTTP client, in milliseconds
 */
export const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Maximum number of redirects the HTTP client follows for one request
 */
export const MAX_REDIRECTS = 10;

/**
 * Indentation used when re-indenting JSON bodies
 */
export const JSON_INDENT = 2;
