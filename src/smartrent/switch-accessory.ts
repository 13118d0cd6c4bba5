// src/smartrent/switch-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import type { SmartRentAccessoryEnv } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	communicationFailure,
	configureBatteryService,
	ensurePrimaryService,
	toBoolean,
	toNumber,
} from './accessory-helpers.js';
import type { BinarySwitch, MultilevelSwitch } from './devices.js';

export function configureSwitchAccessory(
	env: SmartRentAccessoryEnv,
	accessory: PlatformAccessory,
	device: BinarySwitch,
): void {
	const { Characteristic } = env.api.hap;
	const service = ensurePrimaryService(env, accessory, env.api.hap.Service.Switch, device.name);

	applyAccessoryInformation(env.api, accessory, device);
	configureBatteryService(env, accessory, device);

	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => device.getOn() ?? false)
		.onSet(async (value) => {
			const on = toBoolean(value);
			env.log.info('SmartRent: Switch On.set -> %s for %s (deviceId=%d)', String(on), device.name, device.id);

			try {
				await device.setOn(on);
			} catch (err) {
				throw communicationFailure(env, 'Switch On.set', device, err);
			}
		});

	device.onUpdate(() => {
		service.updateCharacteristic(Characteristic.On, device.getOn() ?? false);
	});
}

/**
 * Multilevel switches (dimmers) are exposed as a Lightbulb with Brightness.
 * Turning on restores the last non-zero level.
 */
export function configureDimmerAccessory(
	env: SmartRentAccessoryEnv,
	accessory: PlatformAccessory,
	device: MultilevelSwitch,
): void {
	const { Characteristic } = env.api.hap;
	const service = ensurePrimaryService(env, accessory, env.api.hap.Service.Lightbulb, device.name);

	applyAccessoryInformation(env.api, accessory, device);
	configureBatteryService(env, accessory, device);

	let lastLevel = device.getLevel() || 100;
	const level = () => device.getLevel() ?? 0;

	const setLevel = async (next: number, what: string) => {
		try {
			await device.setLevel(next);
		} catch (err) {
			throw communicationFailure(env, what, device, err);
		}
	};

	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => level() > 0)
		.onSet(async (value) => {
			const on = toBoolean(value);
			env.log.info('SmartRent: Dimmer On.set -> %s for %s (deviceId=%d)', String(on), device.name, device.id);

			if (on && level() > 0) {
				return;
			}
			await setLevel(on ? lastLevel : 0, 'Dimmer On.set');
		});

	service
		.getCharacteristic(Characteristic.Brightness)
		.onGet(level)
		.onSet(async (value) => {
			const brightness = Math.max(0, Math.min(100, Math.round(toNumber(value))));
			env.log.info('SmartRent: Dimmer Brightness.set -> %d for %s (deviceId=%d)', brightness, device.name, device.id);
			await setLevel(brightness, 'Dimmer Brightness.set');
		});

	device.onUpdate(() => {
		const current = level();
		if (current > 0) {
			lastLevel = current;
		}
		service.updateCharacteristic(Characteristic.On, current > 0);
		service.updateCharacteristic(Characteristic.Brightness, current);
	});
}
