// src/smartrent/lock-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import type { SmartRentAccessoryEnv } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	communicationFailure,
	configureBatteryService,
	ensurePrimaryService,
} from './accessory-helpers.js';
import type { DoorLock } from './devices.js';

export interface LockStateValues {
	UNSECURED: number;
	SECURED: number;
	UNKNOWN: number;
}

export function toLockCurrentState(locked: boolean | null, values: LockStateValues): number {
	if (locked === null) {
		return values.UNKNOWN;
	}
	return locked ? values.SECURED : values.UNSECURED;
}

export function configureLockAccessory(
	env: SmartRentAccessoryEnv,
	accessory: PlatformAccessory,
	lock: DoorLock,
): void {
	const { Characteristic } = env.api.hap;
	const service = ensurePrimaryService(env, accessory, env.api.hap.Service.LockMechanism, lock.name);

	applyAccessoryInformation(env.api, accessory, lock);
	configureBatteryService(env, accessory, lock);

	const currentState = () => toLockCurrentState(lock.getLocked(), Characteristic.LockCurrentState);
	const targetState = () => lock.getLocked() === false
		? Characteristic.LockTargetState.UNSECURED
		: Characteristic.LockTargetState.SECURED;

	service.getCharacteristic(Characteristic.LockCurrentState).onGet(currentState);

	service
		.getCharacteristic(Characteristic.LockTargetState)
		.onGet(targetState)
		.onSet(async (value) => {
			const locked = value === Characteristic.LockTargetState.SECURED;
			env.log.info('SmartRent: Lock.set -> %s for %s (deviceId=%d)', locked ? 'LOCKED' : 'UNLOCKED', lock.name, lock.id);

			try {
				await lock.setLocked(locked);
			} catch (err) {
				throw communicationFailure(env, 'Lock.set', lock, err);
			}
		});

	lock.onUpdate(() => {
		service.updateCharacteristic(Characteristic.LockCurrentState, currentState());
		service.updateCharacteristic(Characteristic.LockTargetState, targetState());

		const notification = lock.getNotification();
		if (notification) {
			env.log.debug('SmartRent: %s notification: %s', lock.name, notification);
		}
	});
}
