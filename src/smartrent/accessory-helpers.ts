// src/smartrent/accessory-helpers.ts
import type {
	API,
	Logger,
	PlatformAccessory,
	Service,
	WithUUID,
} from 'homebridge';

import { DEVICE_KIND_CATALOG } from './device-kinds.js';
import type { SmartRentDevice } from './devices.js';
import { describeError } from './errors.js';

/** Below this percentage HomeKit shows a low-battery warning. */
export const LOW_BATTERY_PERCENT = 20;

// Minimal runtime "env" that accessory modules need from the platform
export interface SmartRentAccessoryEnv {
	log: Logger;
	api: API;
}

/**
 * Populate the Accessory Information service from the device record.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	device: SmartRentDevice,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;

	infoService.updateCharacteristic(Characteristic.Name, device.name);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'SmartRent');
	infoService.updateCharacteristic(Characteristic.Model, DEVICE_KIND_CATALOG[device.kind].label);
	infoService.updateCharacteristic(Characteristic.SerialNumber, String(device.id));

	accessory.context.deviceId = device.id;
	accessory.context.kind = device.kind;
}

/**
 * Get or add the primary service, dropping any service a previous
 * configuration of this accessory left behind.
 */
export function ensurePrimaryService(
	env: SmartRentAccessoryEnv,
	accessory: PlatformAccessory,
	serviceType: WithUUID<typeof Service> & (new (displayName?: string, subtype?: string) => Service),
	name: string,
): Service {
	const { Service: Services } = env.api.hap;
	const managed = [
		Services.LockMechanism,
		Services.Thermostat,
		Services.Switch,
		Services.Lightbulb,
		Services.LeakSensor,
	];

	for (const candidate of managed) {
		if (candidate.UUID === serviceType.UUID) {
			continue;
		}
		const stale = accessory.getService(candidate);
		if (stale) {
			env.log.info('SmartRent: removing stale %s service from %s', stale.displayName, name);
			accessory.removeService(stale);
		}
	}

	return accessory.getService(serviceType) ?? accessory.addService(serviceType, name);
}

/**
 * Battery service for battery-powered devices; removed again when the device
 * reports mains power.
 */
export function configureBatteryService(
	env: SmartRentAccessoryEnv,
	accessory: PlatformAccessory,
	device: SmartRentDevice,
): void {
	const { Service: Services, Characteristic } = env.api.hap;
	const existing = accessory.getService(Services.Battery);

	if (!device.batteryPowered) {
		if (existing) {
			accessory.removeService(existing);
		}
		return;
	}

	const battery = existing ?? accessory.addService(Services.Battery, `${device.name} Battery`);

	battery.getCharacteristic(Characteristic.BatteryLevel).onGet(() => device.batteryLevel ?? 100);
	battery.getCharacteristic(Characteristic.StatusLowBattery).onGet(() => lowBatteryStatus(env, device));

	device.onUpdate(() => {
		battery.updateCharacteristic(Characteristic.BatteryLevel, device.batteryLevel ?? 100);
		battery.updateCharacteristic(Characteristic.StatusLowBattery, lowBatteryStatus(env, device));
	});
}

function lowBatteryStatus(env: SmartRentAccessoryEnv, device: SmartRentDevice): number {
	const { StatusLowBattery } = env.api.hap.Characteristic;
	const level = device.batteryLevel;
	return level !== null && level < LOW_BATTERY_PERCENT
		? StatusLowBattery.BATTERY_LEVEL_LOW
		: StatusLowBattery.BATTERY_LEVEL_NORMAL;
}

/**
 * Log a failed set and turn it into the HAP error HomeKit shows as
 * "No Response".
 */
export function communicationFailure(
	env: SmartRentAccessoryEnv,
	what: string,
	device: SmartRentDevice,
	err: unknown,
): Error {
	env.log.warn(
		'SmartRent: %s failed for %s (deviceId=%d): %s',
		what,
		device.name,
		device.id,
		describeError(err),
	);
	return new env.api.hap.HapStatusError(env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
}

export function toBoolean(value: unknown): boolean {
	return value === true || value === 1;
}

export function toNumber(value: unknown): number {
	return typeof value === 'number' ? value : Number(value);
}
