// src/index.ts
import type { API } from 'homebridge';

import { SmartRentPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

export { SmartRentClient } from './smartrent/smartrent-client.js';
export type { DeviceRef, SmartRentClientOptions } from './smartrent/smartrent-client.js';
export {
	BinarySwitch,
	DoorLock,
	LeakSensor,
	MultilevelSwitch,
	SmartRentDevice,
	Thermostat,
} from './smartrent/devices.js';
export type { AnyDevice } from './smartrent/devices.js';
export {
	AuthenticationError,
	AuthorizationExpiredError,
	MalformedResponseError,
	SmartRentError,
	TransientNetworkError,
} from './smartrent/errors.js';
export type { SmartRentLogger } from './smartrent/logger.js';
export type { ConnectionState, Credential, DeviceRecord, DeviceRecordView } from './smartrent/types.js';

/**
 * Homebridge entry point.
 * Registers the SmartRentPlatform with Homebridge under PLATFORM_NAME.
 */
export default (api: API) => {
	api.registerPlatform(PLATFORM_NAME, SmartRentPlatform);
};
