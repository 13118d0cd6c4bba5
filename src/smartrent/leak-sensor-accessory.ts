// src/smartrent/leak-sensor-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import type { SmartRentAccessoryEnv } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	configureBatteryService,
	ensurePrimaryService,
} from './accessory-helpers.js';
import type { LeakSensor } from './devices.js';

export function configureLeakSensorAccessory(
	env: SmartRentAccessoryEnv,
	accessory: PlatformAccessory,
	sensor: LeakSensor,
): void {
	const { Characteristic } = env.api.hap;
	const service = ensurePrimaryService(env, accessory, env.api.hap.Service.LeakSensor, sensor.name);

	applyAccessoryInformation(env.api, accessory, sensor);
	configureBatteryService(env, accessory, sensor);

	const leakDetected = () => sensor.getLeak()
		? Characteristic.LeakDetected.LEAK_DETECTED
		: Characteristic.LeakDetected.LEAK_NOT_DETECTED;

	service.getCharacteristic(Characteristic.LeakDetected).onGet(leakDetected);
	service.getCharacteristic(Characteristic.StatusActive).onGet(() => sensor.online);

	sensor.onUpdate(() => {
		if (sensor.getLeak()) {
			env.log.warn('SmartRent: leak detected by %s (deviceId=%d)', sensor.name, sensor.id);
		}
		service.updateCharacteristic(Characteristic.LeakDetected, leakDetected());
		service.updateCharacteristic(Characteristic.StatusActive, sensor.online);
	});
}
