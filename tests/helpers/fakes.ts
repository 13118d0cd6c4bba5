// tests/helpers/fakes.ts
import type { Sleeper } from '../../src/smartrent/connection-manager.js';
import { TransientNetworkError } from '../../src/smartrent/errors.js';
import type { FetchLike, HttpRequestInit } from '../../src/smartrent/http-client.js';
import type { ChannelFactory, FrameChannel } from '../../src/smartrent/socket-channel.js';
import type { TokenSource } from '../../src/smartrent/token-store.js';
import type { DeviceSnapshot } from '../../src/smartrent/types.js';

export const API_BASE = 'https://api.test/';
export const SOCKET_URL = 'wss://socket.test/socket/websocket';

export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export async function waitFor(predicate: () => boolean, attempts = 200): Promise<void> {
	for (let i = 0; i < attempts; i++) {
		if (predicate()) {
			return;
		}
		await flush();
	}
	throw new Error('waitFor: condition never became true');
}

// ----- HTTP -----

export interface RecordedRequest extends HttpRequestInit {
	path: string;
}

export type FakeReply = { status: number; body?: unknown; statusText?: string } | Error;

/**
 * Route table keyed by "METHOD path". Replies are consumed in order; the last
 * one repeats.
 */
export class FakeFetch {
	public readonly requests: RecordedRequest[] = [];
	private readonly routes = new Map<string, FakeReply[]>();

	public constructor(private readonly baseUrl = API_BASE) {}

	public on(method: string, path: string, ...replies: FakeReply[]): this {
		this.routes.set(`${method} ${path}`, replies);
		return this;
	}

	public count(method: string, path: string): number {
		return this.requests.filter((req) => req.method === method && req.path === path).length;
	}

	public readonly fetch: FetchLike = async (input, init) => {
		const path = input.startsWith(this.baseUrl) ? input.slice(this.baseUrl.length) : input;
		this.requests.push({ ...init, path });

		const queue = this.routes.get(`${init.method} ${path}`) ?? [];
		const reply = queue.length > 1 ? queue.shift() : queue[0];

		if (reply === undefined) {
			return { ok: false, status: 404, statusText: 'Not Found', text: async () => '' };
		}
		if (reply instanceof Error) {
			throw reply;
		}

		let text = '';
		if (typeof reply.body === 'string') {
			text = reply.body;
		} else if (reply.body !== undefined) {
			text = JSON.stringify(reply.body);
		}

		return {
			ok: reply.status >= 200 && reply.status < 300,
			status: reply.status,
			statusText: reply.statusText ?? '',
			text: async () => text,
		};
	};
}

export function tokenBody(accessToken: string, refreshToken: string, expires: number) {
	return { access_token: accessToken, refresh_token: refreshToken, expires };
}

// ----- Tokens -----

export class FakeTokens implements TokenSource {
	public ensureCalls = 0;
	public refreshCalls = 0;
	public current = 'token-1';
	public failWith: Error | null = null;

	public async ensureFresh(): Promise<string> {
		this.ensureCalls += 1;
		if (this.failWith) {
			throw this.failWith;
		}
		return this.current;
	}

	public async refresh(): Promise<string> {
		this.refreshCalls += 1;
		if (this.failWith) {
			throw this.failWith;
		}
		this.current = `token-${this.refreshCalls + 1}`;
		return this.current;
	}
}

// ----- Websocket -----

type Waiter = {
	resolve: (result: IteratorResult<string>) => void;
	reject: (err: Error) => void;
};

export class FakeChannel implements FrameChannel {
	public readonly sent: string[] = [];
	public closed = false;

	private readonly queue: string[] = [];
	private readonly waiters: Waiter[] = [];
	private ended = false;
	private failure: Error | null = null;

	/** Deliver a frame from the "server". Arrays are JSON-encoded. */
	public push(frame: string | unknown[]): void {
		const text = typeof frame === 'string' ? frame : JSON.stringify(frame);
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve({ value: text, done: false });
		} else {
			this.queue.push(text);
		}
	}

	/** Simulate the server dropping the connection. */
	public fail(err: Error = new TransientNetworkError('connection dropped')): void {
		this.finish(err);
	}

	public async send(frame: string): Promise<void> {
		if (this.closed || this.ended) {
			throw new TransientNetworkError('fake channel is closed');
		}
		this.sent.push(frame);
	}

	public close(): void {
		this.closed = true;
		this.finish(null);
	}

	public [Symbol.asyncIterator](): AsyncIterator<string> {
		return {
			next: () => {
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
			},
		};
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
 * Hands out scripted channels (or connect errors) in order, then fresh
 * FakeChannels once the script runs out.
 */
export class FakeSocketServer {
	public readonly urls: string[] = [];
	public readonly channels: FakeChannel[] = [];
	private readonly script: (FakeChannel | Error)[] = [];

	public enqueue(...items: (FakeChannel | Error)[]): this {
		this.script.push(...items);
		return this;
	}

	public readonly factory: ChannelFactory = async (url) => {
		this.urls.push(url);
		const next = this.script.shift() ?? new FakeChannel();
		if (next instanceof Error) {
			throw next;
		}
		this.channels.push(next);
		return next;
	};
}

// ----- Time -----

/**
 * Records requested delays. Returns at once for the first `immediate` calls,
 * then parks until the signal aborts.
 */
export class SleepRecorder {
	public readonly delays: number[] = [];

	public constructor(private readonly immediate = Number.POSITIVE_INFINITY) {}

	public readonly sleep: Sleeper = (ms, signal) => {
		this.delays.push(ms);
		if (this.delays.length <= this.immediate || signal.aborted) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			signal.addEventListener('abort', () => resolve(), { once: true });
		});
	};
}

// ----- Data -----

export function snapshot(
	id: number,
	type: string,
	attributes: Record<string, string | null>,
	overrides: Partial<Omit<DeviceSnapshot, 'id' | 'attributes'>> = {},
): DeviceSnapshot {
	return {
		id,
		type,
		name: `Device ${id}`,
		online: true,
		batteryPowered: false,
		batteryLevel: null,
		attributes: Object.entries(attributes).map(([name, state]) => ({ name, state })),
		...overrides,
	};
}

export function eventFrame(deviceId: number, type: string, name: string, value: string | null): unknown[] {
	return [null, null, `devices:${deviceId}`, 'attribute_state', { type, name, last_read_state: value }];
}
