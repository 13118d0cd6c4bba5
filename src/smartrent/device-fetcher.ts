// src/smartrent/device-fetcher.ts
import { AuthorizationExpiredError } from './errors.js';
import type { SmartRentHttpClient } from './http-client.js';
import { createConsoleLogger } from './logger.js';
import type { SmartRentLogger } from './logger.js';
import type { TokenSource } from './token-store.js';
import type { DeviceSnapshot } from './types.js';

/**
 * Reads hubs and devices over REST, refreshing the token and retrying once
 * when the server rejects it.
 */
export class DeviceFetcher {
	private readonly log: SmartRentLogger;

	public constructor(
		private readonly http: SmartRentHttpClient,
		private readonly tokens: TokenSource,
		log?: SmartRentLogger,
	) {
		this.log = log ?? createConsoleLogger('smartrent-fetch');
	}

	/**
	 * All devices of all hubs, in hub order.
	 */
	public async listHubsAndDevices(signal?: AbortSignal): Promise<DeviceSnapshot[]> {
		return this.withAuthRetry('listHubsAndDevices', async (token) => {
			const hubs = await this.http.getHubs(token, signal);
			const devices: DeviceSnapshot[] = [];

			for (const hub of hubs) {
				const hubDevices = await this.http.getHubDevices(token, hub.id, signal);
				for (const device of hubDevices) {
					this.log.debug('SmartRent: found %d: %s (%s)', device.id, device.name, device.type);
					devices.push(device);
				}
			}

			this.log.info('SmartRent: fetched %d device(s) across %d hub(s).', devices.length, hubs.length);
			return devices;
		});
	}

	public async getDevice(deviceId: number): Promise<DeviceSnapshot> {
		return this.withAuthRetry(`getDevice(${deviceId})`, (token) => this.http.getDevice(token, deviceId));
	}

	private async withAuthRetry<T>(label: string, operation: (token: string) => Promise<T>): Promise<T> {
		const token = await this.tokens.ensureFresh();

		try {
			return await operation(token);
		} catch (err) {
			if (!(err instanceof AuthorizationExpiredError)) {
				throw err;
			}

			this.log.warn('SmartRent: access token rejected during %s; refreshing and retrying once.', label);
			const refreshed = await this.tokens.refresh();
			return operation(refreshed);
		}
	}
}
