/**
 * @fileoverview Error types raised while parsing arguments, sending a request
 * and rendering its response
 */

/**
 * Reasons an argument can be rejected before any request is made
 */
export type ParseErrorKind =
	| 'invalid-url'
	| 'missing-delimiter'
	| 'missing-command'
	| 'missing-argument'
	| 'unexpected-argument';

export class ParseError extends Error {
	readonly kind: ParseErrorKind;
	/** The argument that failed to parse */
	readonly input: string;

	constructor(kind: ParseErrorKind, input: string, message: string) {
		super(message);
		this.name = 'ParseError';
		this.kind = kind;
		this.input = input;
	}
}

/**
 * Transport-level failure: resolution, connection, TLS, timeout or redirect loop.
 * HTTP error statuses are not network errors.
 */
export class NetworkError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'NetworkError';
	}
}

export type RenderErrorKind = 'malformed-json' | 'invalid-encoding';

export class RenderError extends Error {
	readonly kind: RenderErrorKind;

	constructor(kind: RenderErrorKind, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'RenderError';
		this.kind = kind;
	}
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
