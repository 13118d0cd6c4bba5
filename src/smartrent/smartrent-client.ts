// src/smartrent/smartrent-client.ts
import { ConnectionManager } from './connection-manager.js';
import type { Sleeper } from './connection-manager.js';
import { DeviceFetcher } from './device-fetcher.js';
import { isDeviceKind } from './device-kinds.js';
import { DeviceRegistry } from './device-registry.js';
import type { DeviceUpdateCallback } from './device-registry.js';
import {
	BinarySwitch,
	DoorLock,
	LeakSensor,
	MultilevelSwitch,
	Thermostat,
	createDevice,
} from './devices.js';
import type { AnyDevice, DeviceBackend } from './devices.js';
import { SmartRentError } from './errors.js';
import type { AuthenticationError } from './errors.js';
import { SmartRentHttpClient } from './http-client.js';
import type { FetchLike } from './http-client.js';
import { createConsoleLogger } from './logger.js';
import type { SmartRentLogger } from './logger.js';
import type { ChannelFactory } from './socket-channel.js';
import { TokenStore } from './token-store.js';
import type {
	ConnectionState,
	Credential,
	DeviceRecordView,
	TwoFactorCodeProvider,
} from './types.js';

/** A device id, or anything carrying one (device handles, records). */
export type DeviceRef = number | { readonly id: number };

export interface SmartRentClientOptions {
	credential: Credential;
	log?: SmartRentLogger;
	apiBaseUrl?: string;
	socketUrl?: string;
	/** Periodic REST re-fetch while subscribed. Default 600; 0 disables. */
	fetchIntervalSeconds?: number;
	/** Phoenix heartbeat period. Default 30; 0 disables. */
	heartbeatIntervalSeconds?: number;
	maxBackoffSeconds?: number;
	twoFactorCodeProvider?: TwoFactorCodeProvider;
	onStateChange?: (state: ConnectionState) => void;
	onFatalError?: (err: AuthenticationError) => void;

	// Injection points, mostly for tests.
	fetchImpl?: FetchLike;
	channelFactory?: ChannelFactory;
	sleep?: Sleeper;
	now?: () => number;
}

function idOf(device: DeviceRef): number {
	return typeof device === 'number' ? device : device.id;
}

/**
 * Entry point for one SmartRent account: login, discovery, typed device
 * handles and live updates over a single shared websocket.
 */
export class SmartRentClient implements DeviceBackend {
	public readonly registry: DeviceRegistry;

	private readonly log: SmartRentLogger;
	private readonly tokens: TokenStore;
	private readonly fetcher: DeviceFetcher;
	private readonly connection: ConnectionManager;
	private readonly devices = new Map<number, AnyDevice>();

	public constructor(options: SmartRentClientOptions) {
		this.log = options.log ?? createConsoleLogger('smartrent');

		const http = new SmartRentHttpClient({
			baseUrl: options.apiBaseUrl,
			fetchImpl: options.fetchImpl,
			log: this.log,
		});

		this.tokens = new TokenStore(http, options.credential, {
			log: this.log,
			twoFactorCodeProvider: options.twoFactorCodeProvider,
			now: options.now,
		});

		this.registry = new DeviceRegistry(this.log);
		this.fetcher = new DeviceFetcher(http, this.tokens, this.log);

		this.connection = new ConnectionManager(
			{
				log: this.log,
				tokens: this.tokens,
				registry: this.registry,
				fetcher: this.fetcher,
			},
			{
				socketUrl: options.socketUrl,
				channelFactory: options.channelFactory,
				fetchIntervalMs: options.fetchIntervalSeconds === undefined
					? undefined
					: options.fetchIntervalSeconds * 1000,
				heartbeatIntervalMs: options.heartbeatIntervalSeconds === undefined
					? undefined
					: options.heartbeatIntervalSeconds * 1000,
				maxBackoffSeconds: options.maxBackoffSeconds,
				sleep: options.sleep,
				onStateChange: options.onStateChange,
				onFatalError: options.onFatalError,
			},
		);
	}

	public get connectionState(): ConnectionState {
		return this.connection.state;
	}

	/**
	 * Obtain tokens up front so bad credentials surface before discovery.
	 */
	public async login(): Promise<void> {
		await this.tokens.ensureFresh();
	}

	/**
	 * Fetch every hub's devices and create handles for the supported kinds.
	 */
	public async discoverDevices(): Promise<AnyDevice[]> {
		const snapshots = await this.fetcher.listHubsAndDevices();

		for (const snapshot of snapshots) {
			if (!isDeviceKind(snapshot.type)) {
				this.log.info(
					'SmartRent: skipping unsupported device %s (%d, type=%s).',
					snapshot.name,
					snapshot.id,
					snapshot.type,
				);
				continue;
			}

			await this.registry.applySnapshot(snapshot.id, snapshot);
			if (!this.devices.has(snapshot.id)) {
				this.devices.set(snapshot.id, createDevice(snapshot.type, snapshot.id, this));
			}
		}

		this.log.info('SmartRent: discovered %d supported device(s).', this.devices.size);
		return this.getDevices();
	}

	public getDevices(): AnyDevice[] {
		return [...this.devices.values()];
	}

	public getDevice(device: DeviceRef): AnyDevice | undefined {
		return this.devices.get(idOf(device));
	}

	public getLocks(): DoorLock[] {
		return this.getDevices().filter((device): device is DoorLock => device instanceof DoorLock);
	}

	public getThermostats(): Thermostat[] {
		return this.getDevices().filter((device): device is Thermostat => device instanceof Thermostat);
	}

	public getBinarySwitches(): BinarySwitch[] {
		return this.getDevices().filter((device): device is BinarySwitch => device instanceof BinarySwitch);
	}

	public getMultilevelSwitches(): MultilevelSwitch[] {
		return this.getDevices().filter(
			(device): device is MultilevelSwitch => device instanceof MultilevelSwitch,
		);
	}

	public getLeakSensors(): LeakSensor[] {
		return this.getDevices().filter((device): device is LeakSensor => device instanceof LeakSensor);
	}

	/**
	 * Start live updates for a device. The first subscriber opens the socket.
	 */
	public subscribe(device: DeviceRef): Promise<void> {
		return this.connection.subscribe(idOf(device));
	}

	/**
	 * Stop live updates for a device. The last one out closes the socket and
	 * waits for the background tasks to finish.
	 */
	public unsubscribe(device: DeviceRef): Promise<void> {
		return this.connection.unsubscribe(idOf(device));
	}

	public isSubscribed(device: DeviceRef): boolean {
		return this.connection.isSubscribed(idOf(device));
	}

	/**
	 * Re-read one device over REST, regardless of socket state.
	 */
	public async fetchNow(device: DeviceRef): Promise<DeviceRecordView> {
		const id = idOf(device);
		const snapshot = await this.fetcher.getDevice(id);
		await this.registry.applySnapshot(id, snapshot);

		const record = this.registry.get(id);
		if (!record) {
			throw new SmartRentError(`SmartRent device ${id} vanished after fetch`);
		}
		return record;
	}

	public sendCommand(device: DeviceRef, attributeName: string, value: string): Promise<void> {
		return this.connection.sendCommand(idOf(device), attributeName, value);
	}

	public onUpdate(device: DeviceRef, callback: DeviceUpdateCallback): () => void {
		return this.registry.addCallback(idOf(device), callback);
	}

	/**
	 * Unsubscribe everything and wait for the socket and fetch loops to stop.
	 */
	public async close(): Promise<void> {
		await this.connection.shutdown();
		this.log.debug('SmartRent: client closed.');
	}
}
