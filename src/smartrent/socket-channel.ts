// src/smartrent/socket-channel.ts
import WebSocket from 'ws';
import type { IncomingMessage } from 'node:http';

import { AuthorizationExpiredError, TransientNetworkError, describeError } from './errors.js';
import { createConsoleLogger } from './logger.js';
import type { SmartRentLogger } from './logger.js';

/**
 * One open websocket, seen as an ordered stream of text frames.
 *
 * Iteration ends normally after close() and throws when the server drops the
 * connection, so a `for await` read loop sees every outage as an error.
 */
export interface FrameChannel extends AsyncIterable<string> {
	send(frame: string): Promise<void>;
	close(): void;
}

/** Opens a channel; an aborted `signal` abandons the handshake. */
export type ChannelFactory = (url: string, signal?: AbortSignal) => Promise<FrameChannel>;

function rawDataToString(data: WebSocket.RawData): string {
	if (Buffer.isBuffer(data)) {
		return data.toString('utf8');
	}
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString('utf8');
	}
	return Buffer.from(data).toString('utf8');
}

function redactToken(url: string): string {
	return url.replace(/token=[^&]*/, 'token=***');
}

type Waiter = {
	resolve: (result: IteratorResult<string>) => void;
	reject: (err: Error) => void;
};

export class WebSocketChannel implements FrameChannel {
	private readonly queue: string[] = [];
	private readonly waiters: Waiter[] = [];
	private ended = false;
	private failure: Error | null = null;
	private closedLocally = false;

	public constructor(
		private readonly socket: WebSocket,
		private readonly log: SmartRentLogger,
	) {
		socket.on('message', (data) => {
			this.push(rawDataToString(data));
		});

		socket.on('close', (code, reason) => {
			if (this.closedLocally) {
				this.finish(null);
				return;
			}
			this.log.warn('[SmartRent WS] Socket closed by server (code=%d %s).', code, reason.toString('utf8'));
			this.finish(new TransientNetworkError(`SmartRent websocket closed (code ${code})`));
		});

		socket.on('error', (err) => {
			this.log.error('[SmartRent WS] Socket error: %s', describeError(err));
			this.finish(new TransientNetworkError(`SmartRent websocket error: ${err.message}`, { cause: err }));
		});
	}

	public send(frame: string): Promise<void> {
		if (this.ended || this.socket.readyState !== WebSocket.OPEN) {
			return Promise.reject(new TransientNetworkError('SmartRent websocket is not open'));
		}

		return new Promise((resolve, reject) => {
			this.socket.send(frame, (err) => {
				if (err) {
					reject(new TransientNetworkError(`SmartRent websocket send failed: ${err.message}`, { cause: err }));
				} else {
					resolve();
				}
			});
		});
	}

	public close(): void {
		if (this.closedLocally) {
			return;
		}
		this.closedLocally = true;
		this.finish(null);

		if (this.socket.readyState === WebSocket.CONNECTING) {
			this.socket.terminate();
		} else if (this.socket.readyState === WebSocket.OPEN) {
			this.socket.close(1000);
		}
	}

	public [Symbol.asyncIterator](): AsyncIterator<string> {
		return {
			next: () => this.next(),
		};
	}

	private next(): Promise<IteratorResult<string>> {
		const frame = this.queue.shift();
		if (frame !== undefined) {
			return Promise.resolve({ value: frame, done: false });
		}
		if (this.failure) {
			return Promise.reject(this.failure);
		}
		if (this.ended) {
			return Promise.resolve({ value: undefined, done: true });
		}
		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	private push(frame: string): void {
		if (this.ended) {
			return;
		}
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve({ value: frame, done: false });
		} else {
			this.queue.push(frame);
		}
	}

	private finish(err: Error | null): void {
		if (this.ended) {
			return;
		}
		this.ended = true;
		this.failure = err;

		for (const waiter of this.waiters.splice(0)) {
			if (err) {
				waiter.reject(err);
			} else {
				waiter.resolve({ value: undefined, done: true });
			}
		}
	}
}

/**
 * Open a websocket and wait for the handshake. A 401/403 on upgrade means the
 * token in the URL was rejected. Aborting `signal` terminates the socket.
 */
export function openWebSocketChannel(
	url: string,
	log?: SmartRentLogger,
	signal?: AbortSignal,
): Promise<FrameChannel> {
	const logger = log ?? createConsoleLogger('smartrent-ws');

	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new TransientNetworkError('SmartRent websocket connect aborted'));
			return;
		}

		logger.info('[SmartRent WS] Connecting to %s…', redactToken(url));
		const socket = new WebSocket(url);

		const onUnexpectedResponse = (_req: unknown, res: IncomingMessage) => {
			const status = res.statusCode ?? 0;
			cleanup();
			abandon();
			socket.terminate();

			if (status === 401 || status === 403) {
				reject(new AuthorizationExpiredError(
					`SmartRent websocket rejected the session (HTTP ${status})`,
					{ status },
				));
				return;
			}
			reject(new TransientNetworkError(`SmartRent websocket upgrade failed (HTTP ${status})`, { status }));
		};

		const onError = (err: Error) => {
			cleanup();
			abandon();
			reject(new TransientNetworkError(`SmartRent websocket connect failed: ${err.message}`, { cause: err }));
		};

		const onAbort = () => {
			cleanup();
			abandon();
			socket.terminate();
			reject(new TransientNetworkError('SmartRent websocket connect aborted'));
		};

		const onOpen = () => {
			cleanup();
			logger.info('[SmartRent WS] Connected.');
			resolve(new WebSocketChannel(socket, logger));
		};

		const cleanup = () => {
			socket.off('unexpected-response', onUnexpectedResponse);
			socket.off('error', onError);
			socket.off('open', onOpen);
			signal?.removeEventListener('abort', onAbort);
		};

		// Late errors from a socket we already gave up on are only logged.
		const abandon = () => {
			socket.on('error', (err) => {
				logger.debug('[SmartRent WS] Error after failed connect: %s', describeError(err));
			});
		};

		socket.on('unexpected-response', onUnexpectedResponse);
		socket.on('error', onError);
		socket.on('open', onOpen);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}
