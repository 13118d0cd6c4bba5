// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import type { SmartRentAccessoryEnv } from './smartrent/accessory-helpers.js';
import { hasCredentials, parsePlatformConfig } from './smartrent/config.js';
import type { SmartRentPlatformConfig } from './smartrent/config.js';
import type { AnyDevice } from './smartrent/devices.js';
import { describeError } from './smartrent/errors.js';
import { configureLeakSensorAccessory } from './smartrent/leak-sensor-accessory.js';
import { configureLockAccessory } from './smartrent/lock-accessory.js';
import { toSmartRentLogger } from './smartrent/logger.js';
import { SmartRentClient } from './smartrent/smartrent-client.js';
import { configureDimmerAccessory, configureSwitchAccessory } from './smartrent/switch-accessory.js';
import { configureThermostatAccessory } from './smartrent/thermostat-accessory.js';

export class SmartRentPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];

	private readonly log: Logger;
	private readonly api: API;
	private readonly settings: SmartRentPlatformConfig;
	private readonly client: SmartRentClient;
	private readonly accessoryEnv: SmartRentAccessoryEnv;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;

		const smartRentLogger = toSmartRentLogger(this.log);
		this.settings = parsePlatformConfig(config, smartRentLogger);

		this.client = new SmartRentClient({
			credential: {
				email: this.settings.email,
				password: this.settings.password,
				twoFactorCode: this.settings.twoFactorCode,
			},
			log: smartRentLogger,
			apiBaseUrl: this.settings.apiBaseUrl,
			socketUrl: this.settings.socketUrl,
			fetchIntervalSeconds: this.settings.fetchIntervalSeconds,
			heartbeatIntervalSeconds: this.settings.heartbeatIntervalSeconds,
			onFatalError: (err) => {
				this.log.error(
					'SmartRent: login rejected (%s); live updates stay off until Homebridge restarts.',
					err.message,
				);
			},
		});

		this.accessoryEnv = {
			log: this.log,
			api: this.api,
		};

		this.log.info(this.settings.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.loadSmartRent();
		});

		this.api.on('shutdown', () => {
			this.client.close().catch((err: unknown) => {
				this.log.warn('SmartRent: shutdown did not complete cleanly: %s', describeError(err));
			});
		});
	}

	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}

	private async loadSmartRent(): Promise<void> {
		if (!hasCredentials(this.settings)) {
			this.log.warn('SmartRent: credentials missing in config.json; skipping cloud login.');
			return;
		}

		try {
			await this.client.login();
			const devices = await this.client.discoverDevices();

			const seen = new Set<string>();
			for (const device of devices) {
				const accessory = this.accessoryFor(device);
				seen.add(accessory.UUID);
				this.configureDevice(accessory, device);
			}

			this.removeStaleAccessories(seen);

			for (const device of devices) {
				await device.startUpdates();
			}
		} catch (err) {
			this.log.error('SmartRent: startup failed: %s', describeError(err));
		}
	}

	private accessoryFor(device: AnyDevice): PlatformAccessory {
		const uuidSeed = `smartrent-${device.id}`;
		const uuid = this.api.hap.uuid.generate(uuidSeed);

		const cached = this.accessories.find((acc) => acc.UUID === uuid);
		if (cached) {
			this.log.info('SmartRent: using cached accessory for %s (%s)', device.name, uuidSeed);
			return cached;
		}

		this.log.info('SmartRent: registering new accessory for %s (%s)', device.name, uuidSeed);
		const accessory = new this.api.platformAccessory(device.name, uuid);
		this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
		this.accessories.push(accessory);
		return accessory;
	}

	private configureDevice(accessory: PlatformAccessory, device: AnyDevice): void {
		this.log.info('SmartRent: configuring %s as %s (deviceId=%d)', device.name, device.kind, device.id);

		switch (device.kind) {
			case 'entry_control':
				configureLockAccessory(this.accessoryEnv, accessory, device);
				break;
			case 'thermostat':
				configureThermostatAccessory(this.accessoryEnv, accessory, device);
				break;
			case 'switch_binary':
				configureSwitchAccessory(this.accessoryEnv, accessory, device);
				break;
			case 'switch_multilevel':
				configureDimmerAccessory(this.accessoryEnv, accessory, device);
				break;
			case 'sensor_notification':
				configureLeakSensorAccessory(this.accessoryEnv, accessory, device);
				break;
		}
	}

	private removeStaleAccessories(seen: ReadonlySet<string>): void {
		const stale = this.accessories.filter((acc) => !seen.has(acc.UUID));
		if (stale.length === 0) {
			return;
		}

		for (const accessory of stale) {
			this.log.info('SmartRent: removing accessory no longer on the account: %s', accessory.displayName);
		}
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
		this.accessories.splice(0, this.accessories.length, ...this.accessories.filter((acc) => seen.has(acc.UUID)));
	}
}
