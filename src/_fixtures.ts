/**
 * @fileoverview Loopback HTTP server for tests
 *
 * Only imported from in-source test blocks.
 */

import type { ServerResponse } from 'node:http';
import { Buffer } from 'node:buffer';
import { createServer } from 'node:http';

/**
 * A request as seen by the test server
 */
export type ReceivedRequest = {
	method: string | undefined;
	url: string | undefined;
	headers: Record<string, string | string[] | undefined>;
	body: string;
};

/**
 * Starts a server on 127.0.0.1 with a random port, runs `run` against it and closes it.
 * `handler` is called once the request body has been read.
 */
export async function withServer(
	handler: (req: ReceivedRequest, res: ServerResponse) => void,
	run: (baseUrl: string, received: ReceivedRequest[]) => Promise<void>,
): Promise<void> {
	const received: ReceivedRequest[] = [];
	const server = createServer((req, res) => {
		const chunks: Buffer[] = [];
		req.on('data', (chunk: Buffer) => chunks.push(chunk));
		req.on('end', () => {
			const entry: ReceivedRequest = {
				method: req.method,
				url: req.url,
				headers: req.headers,
				body: Buffer.concat(chunks).toString('utf8'),
			};
			received.push(entry);
			handler(entry, res);
		});
	});
	await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
	const address = server.address();
	if (address == null || typeof address === 'string') {
		throw new Error('Expected a TCP address');
	}

	try {
		await run(`http://127.0.0.1:${address.port}`, received);
	}
	finally {
		server.closeAllConnections();
		await new Promise<void>((resolve, reject) => server.close(error => error == null ? resolve() : reject(error)));
	}
}

/**
 * A loopback URL nothing listens on
 */
export async function closedPortUrl(): Promise<string> {
	let baseUrl = '';
	await withServer(() => {}, async (url) => {
		baseUrl = url;
	});
	return baseUrl;
}
