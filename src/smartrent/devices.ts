// src/smartrent/devices.ts
import {
	FAN_MODES,
	THERMOSTAT_MODES,
	parseDeviceState,
} from './device-kinds.js';
import type {
	DeviceKind,
	FanMode,
	StateOf,
	ThermostatMode,
} from './device-kinds.js';
import type { DeviceRegistry } from './device-registry.js';
import type { DeviceRecordView } from './types.js';

/**
 * What a device handle needs from the client that created it.
 */
export interface DeviceBackend {
	readonly registry: DeviceRegistry;
	subscribe(deviceId: number): Promise<void>;
	unsubscribe(deviceId: number): Promise<void>;
	fetchNow(deviceId: number): Promise<DeviceRecordView>;
	sendCommand(deviceId: number, attributeName: string, value: string): Promise<void>;
}

/**
 * Typed view over one DeviceRecord. Handles hold no state of their own;
 * every getter reads the registry.
 */
export abstract class SmartRentDevice<K extends DeviceKind = DeviceKind> {
	public abstract readonly kind: K;

	public constructor(
		public readonly id: number,
		protected readonly backend: DeviceBackend,
	) {}

	protected get record(): DeviceRecordView | undefined {
		return this.backend.registry.get(this.id);
	}

	public get name(): string {
		return this.record?.displayName ?? `Device ${this.id}`;
	}

	public get online(): boolean {
		return this.record?.online ?? false;
	}

	public get batteryPowered(): boolean {
		return this.record?.batteryPowered ?? false;
	}

	public get batteryLevel(): number | null {
		return this.record?.batteryLevel ?? null;
	}

	public getState(): StateOf<K> {
		return parseDeviceState(this.kind, this.record?.attributes ?? {});
	}

	/**
	 * Register a callback for every change to this device. Returns a disposer.
	 */
	public onUpdate(callback: (device: this) => void | Promise<void>): () => void {
		return this.backend.registry.addCallback(this.id, () => callback(this));
	}

	public startUpdates(): Promise<void> {
		return this.backend.subscribe(this.id);
	}

	public stopUpdates(): Promise<void> {
		return this.backend.unsubscribe(this.id);
	}

	public async fetchState(): Promise<StateOf<K>> {
		await this.backend.fetchNow(this.id);
		return this.getState();
	}

	/**
	 * Apply the value locally, then send it. Callbacks see the new value
	 * before the cloud has confirmed it.
	 */
	protected async sendCommand(attributeName: string, value: string): Promise<void> {
		await this.backend.registry.applyEvent(this.id, attributeName, value);
		await this.backend.sendCommand(this.id, attributeName, value);
	}
}

function toIntegerString(label: string, value: number): string {
	if (!Number.isFinite(value)) {
		throw new RangeError(`${label} must be a finite number, got ${value}`);
	}
	return String(Math.round(value));
}

export class DoorLock extends SmartRentDevice<'entry_control'> {
	public readonly kind = 'entry_control';

	public getLocked(): boolean | null {
		return this.getState().locked;
	}

	/** Last notification text, e.g. a jam or tamper report. */
	public getNotification(): string | null {
		return this.getState().notification;
	}

	public setLocked(locked: boolean): Promise<void> {
		return this.sendCommand('locked', String(locked));
	}
}

export class Thermostat extends SmartRentDevice<'thermostat'> {
	public readonly kind = 'thermostat';

	public getMode(): ThermostatMode | null {
		return this.getState().mode;
	}

	public getFanMode(): FanMode | null {
		return this.getState().fanMode;
	}

	public getCoolingSetpoint(): number | null {
		return this.getState().coolingSetpoint;
	}

	public getHeatingSetpoint(): number | null {
		return this.getState().heatingSetpoint;
	}

	public getCurrentTemp(): number | null {
		return this.getState().currentTemp;
	}

	public getCurrentHumidity(): number | null {
		return this.getState().currentHumidity;
	}

	public setMode(mode: ThermostatMode): Promise<void> {
		if (!THERMOSTAT_MODES.some((candidate) => candidate === mode)) {
			return Promise.reject(new RangeError(`Unknown thermostat mode: ${String(mode)}`));
		}
		return this.sendCommand('mode', mode);
	}

	public setFanMode(fanMode: FanMode): Promise<void> {
		if (!FAN_MODES.some((candidate) => candidate === fanMode)) {
			return Promise.reject(new RangeError(`Unknown fan mode: ${String(fanMode)}`));
		}
		return this.sendCommand('fan_mode', fanMode);
	}

	public async setCoolingSetpoint(fahrenheit: number): Promise<void> {
		await this.sendCommand('cooling_setpoint', toIntegerString('Cooling setpoint', fahrenheit));
	}

	public async setHeatingSetpoint(fahrenheit: number): Promise<void> {
		await this.sendCommand('heating_setpoint', toIntegerString('Heating setpoint', fahrenheit));
	}
}

export class BinarySwitch extends SmartRentDevice<'switch_binary'> {
	public readonly kind = 'switch_binary';

	public getOn(): boolean | null {
		return this.getState().on;
	}

	public setOn(on: boolean): Promise<void> {
		return this.sendCommand('on', String(on));
	}
}

export class MultilevelSwitch extends SmartRentDevice<'switch_multilevel'> {
	public readonly kind = 'switch_multilevel';

	public getLevel(): number | null {
		return this.getState().level;
	}

	/** Level 0-100. */
	public async setLevel(level: number): Promise<void> {
		if (!Number.isFinite(level) || level < 0 || level > 100) {
			throw new RangeError(`Level must be between 0 and 100, got ${level}`);
		}
		await this.sendCommand('level', String(Math.round(level)));
	}
}

export class LeakSensor extends SmartRentDevice<'sensor_notification'> {
	public readonly kind = 'sensor_notification';

	public getLeak(): boolean | null {
		return this.getState().leak;
	}
}

export type AnyDevice = DoorLock | Thermostat | BinarySwitch | MultilevelSwitch | LeakSensor;

export function createDevice(kind: DeviceKind, id: number, backend: DeviceBackend): AnyDevice {
	switch (kind) {
		case 'entry_control':
			return new DoorLock(id, backend);
		case 'thermostat':
			return new Thermostat(id, backend);
		case 'switch_binary':
			return new BinarySwitch(id, backend);
		case 'switch_multilevel':
			return new MultilevelSwitch(id, backend);
		case 'sensor_notification':
			return new LeakSensor(id, backend);
	}
}
