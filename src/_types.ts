/**
 * A `key=value` argument split on its first `=`
 */
export type KeyValuePair = {
	readonly key: string;
	readonly value: string;
};

/**
 * A request built from command-line input
 */
export type RequestSpec =
	| { readonly method: 'GET'; readonly url: string }
	| { readonly method: 'POST'; readonly url: string; readonly pairs: readonly KeyValuePair[] };

export type HttpMethod = RequestSpec['method'];

/**
 * Response header as received, in order
 */
export type HeaderEntry = readonly [name: string, value: string];
