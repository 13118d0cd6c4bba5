// src/smartrent/thermostat-accessory.ts
import type { PlatformAccessory } from 'homebridge';

import type { SmartRentAccessoryEnv } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	communicationFailure,
	configureBatteryService,
	ensurePrimaryService,
	toNumber,
} from './accessory-helpers.js';
import type { ThermostatMode, ThermostatState } from './device-kinds.js';
import type { Thermostat } from './devices.js';

// SmartRent thermostats speak Fahrenheit; HomeKit always wants Celsius.

export function fahrenheitToCelsius(fahrenheit: number): number {
	return Math.round(((fahrenheit - 32) * 5 / 9) * 10) / 10;
}

export function celsiusToFahrenheit(celsius: number): number {
	return Math.round(celsius * 9 / 5 + 32);
}

function clamp(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

export interface TargetHeatingCoolingValues {
	OFF: number;
	HEAT: number;
	COOL: number;
	AUTO: number;
}

export interface CurrentHeatingCoolingValues {
	OFF: number;
	HEAT: number;
	COOL: number;
}

export function modeToTargetState(mode: ThermostatMode | null, values: TargetHeatingCoolingValues): number {
	switch (mode) {
		case 'heat':
		case 'aux_heat':
			return values.HEAT;
		case 'cool':
			return values.COOL;
		case 'auto':
			return values.AUTO;
		default:
			return values.OFF;
	}
}

export function targetStateToMode(value: number, values: TargetHeatingCoolingValues): ThermostatMode {
	if (value === values.HEAT) {
		return 'heat';
	}
	if (value === values.COOL) {
		return 'cool';
	}
	if (value === values.AUTO) {
		return 'auto';
	}
	return 'off';
}

/**
 * What the unit is doing right now. In auto mode that is inferred from the
 * current temperature against the two setpoints.
 */
export function currentHeatingCoolingState(state: ThermostatState, values: CurrentHeatingCoolingValues): number {
	const { mode, currentTemp, heatingSetpoint, coolingSetpoint } = state;

	switch (mode) {
		case 'heat':
		case 'aux_heat':
			return values.HEAT;
		case 'cool':
			return values.COOL;
		case 'auto':
			if (currentTemp !== null && heatingSetpoint !== null && currentTemp < heatingSetpoint) {
				return values.HEAT;
			}
			if (currentTemp !== null && coolingSetpoint !== null && currentTemp > coolingSetpoint) {
				return values.COOL;
			}
			return values.OFF;
		default:
			return values.OFF;
	}
}

/**
 * The setpoint HomeKit's single TargetTemperature maps to, in Fahrenheit.
 */
export function targetSetpointFahrenheit(state: ThermostatState): number | null {
	if (state.mode === 'cool') {
		return state.coolingSetpoint;
	}
	if (state.mode === 'heat' || state.mode === 'aux_heat') {
		return state.heatingSetpoint;
	}
	return state.heatingSetpoint ?? state.coolingSetpoint;
}

export function configureThermostatAccessory(
	env: SmartRentAccessoryEnv,
	accessory: PlatformAccessory,
	thermostat: Thermostat,
): void {
	const { Characteristic } = env.api.hap;
	const service = ensurePrimaryService(env, accessory, env.api.hap.Service.Thermostat, thermostat.name);

	applyAccessoryInformation(env.api, accessory, thermostat);
	configureBatteryService(env, accessory, thermostat);

	const celsiusOr = (fahrenheit: number | null, fallback: number, min: number, max: number) =>
		fahrenheit === null ? fallback : clamp(fahrenheitToCelsius(fahrenheit), min, max);

	const readings = {
		currentState: () => currentHeatingCoolingState(thermostat.getState(), Characteristic.CurrentHeatingCoolingState),
		targetState: () => modeToTargetState(thermostat.getMode(), Characteristic.TargetHeatingCoolingState),
		currentTemperature: () => celsiusOr(thermostat.getCurrentTemp(), 0, -270, 100),
		targetTemperature: () => celsiusOr(targetSetpointFahrenheit(thermostat.getState()), 20, 10, 38),
		heatingThreshold: () => celsiusOr(thermostat.getHeatingSetpoint(), 20, 0, 25),
		coolingThreshold: () => celsiusOr(thermostat.getCoolingSetpoint(), 25, 10, 35),
		humidity: () => clamp(thermostat.getCurrentHumidity() ?? 0, 0, 100),
	};

	const send = async (what: string, action: () => Promise<void>) => {
		try {
			await action();
		} catch (err) {
			throw communicationFailure(env, what, thermostat, err);
		}
	};

	service
		.getCharacteristic(Characteristic.TemperatureDisplayUnits)
		.onGet(() => Characteristic.TemperatureDisplayUnits.FAHRENHEIT);

	service.getCharacteristic(Characteristic.CurrentHeatingCoolingState).onGet(readings.currentState);
	service.getCharacteristic(Characteristic.CurrentTemperature).onGet(readings.currentTemperature);
	service.getCharacteristic(Characteristic.CurrentRelativeHumidity).onGet(readings.humidity);

	service
		.getCharacteristic(Characteristic.TargetHeatingCoolingState)
		.onGet(readings.targetState)
		.onSet(async (value) => {
			const mode = targetStateToMode(toNumber(value), Characteristic.TargetHeatingCoolingState);
			env.log.info('SmartRent: Thermostat mode.set -> %s for %s (deviceId=%d)', mode, thermostat.name, thermostat.id);
			await send('Thermostat mode.set', () => thermostat.setMode(mode));
		});

	service
		.getCharacteristic(Characteristic.TargetTemperature)
		.onGet(readings.targetTemperature)
		.onSet(async (value) => {
			const fahrenheit = celsiusToFahrenheit(toNumber(value));
			env.log.info(
				'SmartRent: Thermostat setpoint.set -> %d°F for %s (deviceId=%d)',
				fahrenheit,
				thermostat.name,
				thermostat.id,
			);

			if (thermostat.getMode() === 'cool') {
				await send('Thermostat setpoint.set', () => thermostat.setCoolingSetpoint(fahrenheit));
			} else {
				await send('Thermostat setpoint.set', () => thermostat.setHeatingSetpoint(fahrenheit));
			}
		});

	service
		.getCharacteristic(Characteristic.HeatingThresholdTemperature)
		.onGet(readings.heatingThreshold)
		.onSet(async (value) => {
			await send('Thermostat heating threshold.set', () =>
				thermostat.setHeatingSetpoint(celsiusToFahrenheit(toNumber(value))));
		});

	service
		.getCharacteristic(Characteristic.CoolingThresholdTemperature)
		.onGet(readings.coolingThreshold)
		.onSet(async (value) => {
			await send('Thermostat cooling threshold.set', () =>
				thermostat.setCoolingSetpoint(celsiusToFahrenheit(toNumber(value))));
		});

	thermostat.onUpdate(() => {
		service.updateCharacteristic(Characteristic.CurrentHeatingCoolingState, readings.currentState());
		service.updateCharacteristic(Characteristic.TargetHeatingCoolingState, readings.targetState());
		service.updateCharacteristic(Characteristic.CurrentTemperature, readings.currentTemperature());
		service.updateCharacteristic(Characteristic.TargetTemperature, readings.targetTemperature());
		service.updateCharacteristic(Characteristic.HeatingThresholdTemperature, readings.heatingThreshold());
		service.updateCharacteristic(Characteristic.CoolingThresholdTemperature, readings.coolingThreshold());
		service.updateCharacteristic(Characteristic.CurrentRelativeHumidity, readings.humidity());
	});
}
