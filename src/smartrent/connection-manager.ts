// src/smartrent/connection-manager.ts
import type { DeviceRegistry } from './device-registry.js';
import {
	AuthenticationError,
	AuthorizationExpiredError,
	TransientNetworkError,
	describeError,
} from './errors.js';
import {
	SMARTRENT_SOCKET_URL,
	buildCommandFrame,
	buildHeartbeatFrame,
	buildJoinFrame,
	buildLeaveFrame,
	buildSocketUrl,
	deviceTopic,
	parseFrame,
	toAttributeEvent,
	topicDeviceId,
} from './frames.js';
import type { InboundFrame } from './frames.js';
import type { SmartRentLogger } from './logger.js';
import { openWebSocketChannel } from './socket-channel.js';
import type { ChannelFactory, FrameChannel } from './socket-channel.js';
import type { TokenSource } from './token-store.js';
import type { ConnectionState, DeviceSnapshot } from './types.js';

export const DEFAULT_FETCH_INTERVAL_MS = 600_000;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
export const MAX_BACKOFF_SECONDS = 300;

/** Waits `ms`, resolving early (never rejecting) once `signal` aborts. */
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export const abortableSleep: Sleeper = (ms, signal) => new Promise((resolve) => {
	if (signal.aborted) {
		resolve();
		return;
	}
	const onAbort = () => {
		clearTimeout(timer);
		resolve();
	};
	const timer = setTimeout(() => {
		signal.removeEventListener('abort', onAbort);
		resolve();
	}, ms);
	signal.addEventListener('abort', onAbort, { once: true });
});

/**
 * Settles with `work`, or rejects as soon as `signal` aborts. The work itself
 * keeps running; its late result is dropped.
 */
export function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
	if (!signal) {
		return work;
	}

	return new Promise((resolve, reject) => {
		const onAbort = () => {
			reject(new TransientNetworkError('SmartRent operation aborted'));
		};

		void work.then(
			(value) => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(err: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(err);
			},
		);

		if (signal.aborted) {
			onAbort();
			return;
		}
		signal.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Seconds to wait before reconnect attempt number `retryCount` (0-based).
 */
export function backoffDelaySeconds(retryCount: number, maxSeconds = MAX_BACKOFF_SECONDS): number {
	return Math.min(maxSeconds, 1.25 ** retryCount);
}

export interface SnapshotSource {
	listHubsAndDevices(signal?: AbortSignal): Promise<DeviceSnapshot[]>;
}

/**
 * Collaborators the connection manager drives. One context per account.
 */
export interface ConnectionContext {
	log: SmartRentLogger;
	tokens: TokenSource;
	registry: DeviceRegistry;
	fetcher: SnapshotSource;
}

export interface ConnectionManagerOptions {
	socketUrl?: string;
	channelFactory?: ChannelFactory;
	/** Periodic REST re-fetch of subscribed devices; 0 disables it. */
	fetchIntervalMs?: number;
	/** Phoenix heartbeat period; 0 disables it. */
	heartbeatIntervalMs?: number;
	maxBackoffSeconds?: number;
	sleep?: Sleeper;
	onStateChange?: (state: ConnectionState) => void;
	/** Called when login fails for good and the background loops have stopped. */
	onFatalError?: (err: AuthenticationError) => void;
}

/**
 * Owns the single websocket shared by every subscribed device.
 *
 * States: disconnected → connecting → joining → live, with backoff between
 * failed attempts. The first subscriber starts the socket loop and the
 * periodic fetch loop; the last one to leave stops both.
 */
export class ConnectionManager {
	private readonly log: SmartRentLogger;
	private readonly socketUrl: string;
	private readonly channelFactory: ChannelFactory;
	private readonly fetchIntervalMs: number;
	private readonly heartbeatIntervalMs: number;
	private readonly maxBackoffSeconds: number;
	private readonly sleep: Sleeper;

	private readonly subscribed = new Set<number>();
	private readonly joined = new Set<number>();

	private connectionState: ConnectionState = 'disconnected';
	private retries = 0;
	private channel: FrameChannel | null = null;
	private controller: AbortController | null = null;
	private tasks: Promise<void>[] = [];
	private heartbeatTimer: NodeJS.Timeout | null = null;
	private heartbeatRef = 0;
	private forceTokenRefresh = false;

	public constructor(
		private readonly context: ConnectionContext,
		private readonly options: ConnectionManagerOptions = {},
	) {
		this.log = context.log;
		this.socketUrl = options.socketUrl ?? SMARTRENT_SOCKET_URL;
		this.channelFactory = options.channelFactory ?? ((url, signal) => openWebSocketChannel(url, context.log, signal));
		this.fetchIntervalMs = options.fetchIntervalMs ?? DEFAULT_FETCH_INTERVAL_MS;
		this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
		this.maxBackoffSeconds = options.maxBackoffSeconds ?? MAX_BACKOFF_SECONDS;
		this.sleep = options.sleep ?? abortableSleep;
	}

	public get state(): ConnectionState {
		return this.connectionState;
	}

	/** Consecutive failed connection attempts since the socket was last live. */
	public get retryCount(): number {
		return this.retries;
	}

	public isSubscribed(deviceId: number): boolean {
		return this.subscribed.has(deviceId);
	}

	public getSubscribedIds(): number[] {
		return [...this.subscribed];
	}

	public async subscribe(deviceId: number): Promise<void> {
		const isNew = !this.subscribed.has(deviceId);
		this.subscribed.add(deviceId);

		if (!this.controller) {
			this.start();
			return;
		}

		if (isNew) {
			await this.joinIfConnected(deviceId);
		}
	}

	public async unsubscribe(deviceId: number): Promise<void> {
		if (!this.subscribed.delete(deviceId)) {
			return;
		}

		if (this.subscribed.size === 0) {
			this.log.info('SmartRent: device list empty; stopping updater for now.');
			await this.stop();
			return;
		}

		const channel = this.channel;
		if (channel && this.joined.delete(deviceId)) {
			try {
				await channel.send(buildLeaveFrame(deviceId));
			} catch (err) {
				this.log.debug('SmartRent: leave for %s not sent: %s', deviceTopic(deviceId), describeError(err));
			}
		}
	}

	/**
	 * Drop every subscriber and stop the background loops.
	 */
	public async shutdown(): Promise<void> {
		this.subscribed.clear();
		await this.stop();
	}

	/**
	 * Send one attribute change. A rejected session refreshes the token and
	 * retries exactly once; a second failure reaches the caller as is.
	 */
	public async sendCommand(deviceId: number, attributeName: string, value: string): Promise<void> {
		const frame = buildCommandFrame(deviceId, attributeName, value);
		this.log.info('SmartRent: sending %s=%s to device %d', attributeName, value, deviceId);

		try {
			await this.deliver(deviceId, frame);
		} catch (err) {
			if (!(err instanceof AuthorizationExpiredError)) {
				throw err;
			}

			this.log.warn(
				'SmartRent: session rejected while sending command (%s); refreshing token and retrying.',
				err.message,
			);
			await this.context.tokens.refresh();
			await this.deliver(deviceId, frame);
		}
	}

	/**
	 * Re-fetch every subscribed device over REST and apply the snapshots.
	 * Returns how many records changed. An aborted `signal` rejects at once.
	 */
	public async refreshSubscribed(signal?: AbortSignal): Promise<number> {
		if (this.subscribed.size === 0) {
			return 0;
		}

		this.log.info('SmartRent: fetching current status for %d device(s)…', this.subscribed.size);
		const snapshots = await untilAborted(this.context.fetcher.listHubsAndDevices(signal), signal);

		let changed = 0;
		for (const snapshot of snapshots) {
			if (!this.subscribed.has(snapshot.id)) {
				continue;
			}
			if (await this.context.registry.applySnapshot(snapshot.id, snapshot)) {
				changed += 1;
			}
		}

		this.log.debug('SmartRent: status fetch done; %d record(s) changed.', changed);
		return changed;
	}

	private start(): void {
		const controller = new AbortController();
		this.controller = controller;
		this.retries = 0;

		this.log.info('SmartRent: starting updater for %d device(s).', this.subscribed.size);

		const tasks = [this.runSocketLoop(controller)];
		if (this.fetchIntervalMs > 0) {
			tasks.push(this.runFetchLoop(controller.signal));
		}
		this.tasks = tasks;
	}

	private async stop(): Promise<void> {
		const controller = this.controller;
		this.controller = null;

		if (controller) {
			controller.abort();
		}
		this.stopHeartbeat();
		this.channel?.close();
		this.channel = null;
		this.joined.clear();
		this.retries = 0;
		this.setState('disconnected');

		const tasks = this.tasks;
		this.tasks = [];
		await Promise.all(tasks);
	}

	private setState(next: ConnectionState): void {
		if (this.connectionState === next) {
			return;
		}
		this.log.debug('SmartRent: connection %s -> %s', this.connectionState, next);
		this.connectionState = next;
		this.options.onStateChange?.(next);
	}

	private async runSocketLoop(controller: AbortController): Promise<void> {
		const { signal } = controller;

		while (!signal.aborted) {
			try {
				await this.connectOnce(signal);
			} catch (err) {
				if (signal.aborted) {
					break;
				}

				if (err instanceof AuthenticationError) {
					this.halt(controller, err);
					return;
				}

				if (err instanceof AuthorizationExpiredError) {
					this.forceTokenRefresh = true;
				}

				const waitSeconds = backoffDelaySeconds(this.retries, this.maxBackoffSeconds);
				this.retries += 1;
				this.setState('backoff');
				this.log.warn(
					'SmartRent: websocket failed (%s); retrying in %s seconds…',
					describeError(err),
					waitSeconds.toFixed(2),
				);

				await this.sleep(waitSeconds * 1000, signal);
			}
		}
	}

	private async connectOnce(signal: AbortSignal): Promise<void> {
		this.setState('connecting');

		const token = await untilAborted(
			this.forceTokenRefresh ? this.context.tokens.refresh() : this.context.tokens.ensureFresh(),
			signal,
		);
		this.forceTokenRefresh = false;

		const opening = this.channelFactory(buildSocketUrl(this.socketUrl, token), signal);
		let channel: FrameChannel;
		try {
			channel = await untilAborted(opening, signal);
		} catch (err) {
			if (signal.aborted) {
				void opening.then(
					(late) => late.close(),
					(lateErr: unknown) => {
						this.log.debug('SmartRent: abandoned connect failed: %s', describeError(lateErr));
					},
				);
			}
			throw err;
		}
		if (signal.aborted) {
			channel.close();
			return;
		}

		this.channel = channel;

		try {
			this.setState('joining');
			this.startHeartbeat(channel);
			await this.joinAll(channel);

			// Coming off a retry: we may have missed events while the socket was down.
			if (this.retries > 0) {
				this.log.info('SmartRent: reconnected after %d attempt(s); catching up over REST.', this.retries);
				await this.refreshSubscribed(signal);
			}

			if (signal.aborted) {
				return;
			}

			this.retries = 0;
			this.setState('live');

			for await (const text of channel) {
				await this.dispatch(text);
			}

			if (!signal.aborted) {
				throw new TransientNetworkError('SmartRent websocket stream ended');
			}
		} finally {
			// A newer connection owns the timer once this.channel moved on.
			if (this.channel === channel) {
				this.stopHeartbeat();
				this.channel = null;
				this.joined.clear();
			}
			channel.close();
		}
	}

	private halt(controller: AbortController, err: AuthenticationError): void {
		this.log.error('SmartRent: authentication failed; background updates stopped: %s', err.message);

		if (this.controller === controller) {
			this.controller = null;
		}
		controller.abort();
		this.retries = 0;
		this.setState('disconnected');
		this.options.onFatalError?.(err);
	}

	private async runFetchLoop(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			try {
				await this.refreshSubscribed(signal);
			} catch (err) {
				if (signal.aborted) {
					break;
				}
				this.log.warn(
					'SmartRent: periodic fetch failed (%s); retrying in %d seconds…',
					describeError(err),
					Math.round(this.fetchIntervalMs / 1000),
				);
			}

			await this.sleep(this.fetchIntervalMs, signal);
		}
	}

	private async joinAll(channel: FrameChannel): Promise<void> {
		this.log.info('SmartRent: joining %d device(s) to websocket…', this.subscribed.size);
		for (const deviceId of [...this.subscribed]) {
			await this.join(channel, deviceId);
		}
	}

	private async join(channel: FrameChannel, deviceId: number): Promise<void> {
		if (this.joined.has(deviceId)) {
			return;
		}

		this.joined.add(deviceId);
		this.log.info('SmartRent: joining topic %s…', deviceTopic(deviceId));

		try {
			await channel.send(buildJoinFrame(deviceId));
		} catch (err) {
			this.joined.delete(deviceId);
			throw err;
		}
	}

	private async joinIfConnected(deviceId: number): Promise<void> {
		const channel = this.channel;
		if (!channel || (this.connectionState !== 'joining' && this.connectionState !== 'live')) {
			// Picked up by joinAll() on the next connect.
			return;
		}

		try {
			await this.join(channel, deviceId);
		} catch (err) {
			this.log.warn(
				'SmartRent: could not join %s (%s); it will be joined on reconnect.',
				deviceTopic(deviceId),
				describeError(err),
			);
		}
	}

	private async dispatch(text: string): Promise<void> {
		let frame: InboundFrame;
		try {
			frame = parseFrame(text);
		} catch (err) {
			this.log.warn('SmartRent: dropping websocket frame: %s', describeError(err));
			return;
		}

		const deviceId = topicDeviceId(frame.topic);
		const event = toAttributeEvent(frame.payload);

		if (deviceId === null || !event) {
			this.log.debug('SmartRent: control frame %s %s %o', frame.topic, frame.event, frame.payload);
			return;
		}

		if (!this.subscribed.has(deviceId)) {
			this.log.debug('SmartRent: event for unsubscribed device %d ignored.', deviceId);
			return;
		}

		this.log.info('%s -> %s -> %s', event.type, event.name, event.lastReadState ?? '');
		await this.context.registry.applyEvent(deviceId, event.name, event.lastReadState);
	}

	private async deliver(deviceId: number, frame: string): Promise<void> {
		const live = this.channel;
		if (live && this.connectionState === 'live') {
			await this.join(live, deviceId);
			await live.send(frame);
			return;
		}

		// No live socket: join and send over a short-lived one.
		const token = await this.context.tokens.ensureFresh();
		const channel = await this.channelFactory(buildSocketUrl(this.socketUrl, token));
		try {
			await channel.send(buildJoinFrame(deviceId));
			await channel.send(frame);
		} finally {
			channel.close();
		}
	}

	private startHeartbeat(channel: FrameChannel): void {
		this.stopHeartbeat();
		if (this.heartbeatIntervalMs <= 0) {
			return;
		}

		this.heartbeatTimer = setInterval(() => {
			this.heartbeatRef += 1;
			channel.send(buildHeartbeatFrame(this.heartbeatRef)).catch((err: unknown) => {
				this.log.debug('SmartRent: heartbeat not sent: %s', describeError(err));
			});
		}, this.heartbeatIntervalMs);
	}

	private stopHeartbeat(): void {
		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
	}
}
