// src/smartrent/device-kinds.ts

export const DEVICE_KINDS = [
	'entry_control',
	'thermostat',
	'switch_binary',
	'switch_multilevel',
	'sensor_notification',
] as const;

/** Raw `type` values the cloud reports for the devices we support. */
export type DeviceKind = typeof DEVICE_KINDS[number];

export const THERMOSTAT_MODES = ['aux_heat', 'heat', 'cool', 'auto', 'off'] as const;
export type ThermostatMode = typeof THERMOSTAT_MODES[number];

export const FAN_MODES = ['auto', 'on'] as const;
export type FanMode = typeof FAN_MODES[number];

export interface DeviceKindDescriptor {
	kind: DeviceKind;
	/** Human-readable label, used for logs and the HomeKit model field. */
	label: string;
	/** Attributes this kind reads or writes. */
	attributes: readonly string[];
}

export const DEVICE_KIND_CATALOG: Record<DeviceKind, DeviceKindDescriptor> = {
	entry_control: {
		kind: 'entry_control',
		label: 'Door Lock',
		attributes: ['locked', 'notifications'],
	},
	thermostat: {
		kind: 'thermostat',
		label: 'Thermostat',
		attributes: [
			'mode',
			'fan_mode',
			'cooling_setpoint',
			'heating_setpoint',
			'current_temp',
			'current_humidity',
		],
	},
	switch_binary: {
		kind: 'switch_binary',
		label: 'Binary Switch',
		attributes: ['on'],
	},
	switch_multilevel: {
		kind: 'switch_multilevel',
		label: 'Multilevel Switch',
		attributes: ['level'],
	},
	sensor_notification: {
		kind: 'sensor_notification',
		label: 'Leak Sensor',
		attributes: ['leak'],
	},
};

export function isDeviceKind(type: string): type is DeviceKind {
	return DEVICE_KINDS.some((kind) => kind === type);
}

/**
 * Attributes stored as integer strings. Values arrive float-encoded
 * ("72.0") or as "None" while a sensor is between readings.
 */
export const NUMERIC_ATTRIBUTES: ReadonlySet<string> = new Set([
	'current_temp',
	'current_humidity',
	'heating_setpoint',
	'cooling_setpoint',
	'level',
]);

/**
 * Normalize a numeric attribute to an integer string.
 * Returns undefined when the value is unusable and the prior value should be kept.
 */
export function normalizeNumericAttribute(name: string, raw: string | null | undefined): string | undefined {
	if (raw === null || raw === undefined) {
		return undefined;
	}

	const text = raw.trim();
	if (text === '' || text === 'None' || text === 'null') {
		return undefined;
	}

	const parsed = Number.parseFloat(text);
	if (!Number.isFinite(parsed)) {
		return undefined;
	}

	const value = Math.trunc(parsed);

	// Humidity sensors report 0 while they warm up; keep the last real reading.
	if (name === 'current_humidity' && value <= 0) {
		return undefined;
	}

	return String(value);
}

// ----- Typed state, keyed by kind -----

export interface DoorLockState {
	kind: 'entry_control';
	locked: boolean | null;
	notification: string | null;
}

export interface ThermostatState {
	kind: 'thermostat';
	mode: ThermostatMode | null;
	fanMode: FanMode | null;
	coolingSetpoint: number | null;
	heatingSetpoint: number | null;
	currentTemp: number | null;
	currentHumidity: number | null;
}

export interface BinarySwitchState {
	kind: 'switch_binary';
	on: boolean | null;
}

export interface MultilevelSwitchState {
	kind: 'switch_multilevel';
	level: number | null;
}

export interface LeakSensorState {
	kind: 'sensor_notification';
	leak: boolean | null;
}

export type DeviceState =
	| DoorLockState
	| ThermostatState
	| BinarySwitchState
	| MultilevelSwitchState
	| LeakSensorState;

export type StateOf<K extends DeviceKind> = Extract<DeviceState, { kind: K }>;

type AttributeMap = Readonly<Record<string, string>>;

function readBoolean(attrs: AttributeMap, name: string): boolean | null {
	const value = attrs[name];
	if (value === undefined) {
		return null;
	}
	return value === 'true';
}

function readInteger(attrs: AttributeMap, name: string): number | null {
	const value = attrs[name];
	if (value === undefined) {
		return null;
	}
	const parsed = Number.parseInt(value, 10);
	return Number.isFinite(parsed) ? parsed : null;
}

function readString(attrs: AttributeMap, name: string): string | null {
	return attrs[name] ?? null;
}

function readOneOf<T extends string>(attrs: AttributeMap, name: string, allowed: readonly T[]): T | null {
	const value = attrs[name];
	return allowed.find((candidate) => candidate === value) ?? null;
}

const STATE_PARSERS: { [K in DeviceKind]: (attrs: AttributeMap) => StateOf<K> } = {
	entry_control: (attrs) => ({
		kind: 'entry_control',
		locked: readBoolean(attrs, 'locked'),
		notification: readString(attrs, 'notifications'),
	}),
	thermostat: (attrs) => ({
		kind: 'thermostat',
		mode: readOneOf(attrs, 'mode', THERMOSTAT_MODES),
		fanMode: readOneOf(attrs, 'fan_mode', FAN_MODES),
		coolingSetpoint: readInteger(attrs, 'cooling_setpoint'),
		heatingSetpoint: readInteger(attrs, 'heating_setpoint'),
		currentTemp: readInteger(attrs, 'current_temp'),
		currentHumidity: readInteger(attrs, 'current_humidity'),
	}),
	switch_binary: (attrs) => ({
		kind: 'switch_binary',
		on: readBoolean(attrs, 'on'),
	}),
	switch_multilevel: (attrs) => ({
		kind: 'switch_multilevel',
		level: readInteger(attrs, 'level'),
	}),
	sensor_notification: (attrs) => ({
		kind: 'sensor_notification',
		leak: readBoolean(attrs, 'leak'),
	}),
};

export function parseDeviceState<K extends DeviceKind>(kind: K, attrs: AttributeMap): StateOf<K> {
	const parser: (attrs: AttributeMap) => StateOf<K> = STATE_PARSERS[kind];
	return parser(attrs);
}
