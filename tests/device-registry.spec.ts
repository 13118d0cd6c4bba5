import { DeviceRegistry } from '../src/smartrent/device-registry.js';
import { silentLogger } from '../src/smartrent/logger.js';
import type { SmartRentLogger } from '../src/smartrent/logger.js';
import { flush, snapshot } from './helpers/fakes.js';

const thermostat = (attrs: Record<string, string | null>) => snapshot(7, 'thermostat', {
	mode: 'cool',
	current_temp: '72.0',
	current_humidity: '45',
	...attrs,
});

describe('DeviceRegistry.applySnapshot', () => {
	test('an identical snapshot changes nothing and notifies nobody', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));

		const callback = jest.fn();
		registry.addCallback(7, callback);

		expect(await registry.applySnapshot(7, thermostat({}))).toBe(false);
		expect(callback).not.toHaveBeenCalled();
	});

	test('one differing attribute notifies exactly once', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));

		const callback = jest.fn();
		registry.addCallback(7, callback);

		expect(await registry.applySnapshot(7, thermostat({ mode: 'heat' }))).toBe(true);
		expect(callback).toHaveBeenCalledTimes(1);
		expect(registry.get(7)?.attributes.mode).toBe('heat');
	});

	test('a changed name or online flag counts as a change', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));

		expect(await registry.applySnapshot(7, { ...thermostat({}), online: false })).toBe(true);
		expect(await registry.applySnapshot(7, { ...thermostat({}), online: false, name: 'Hall' })).toBe(true);
		expect(registry.get(7)?.displayName).toBe('Hall');
	});

	test('records handed out cannot be written through', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));
		await registry.applyEvent(7, 'mode', 'heat');

		const attributes = registry.get(7)?.attributes ?? {};
		expect(Reflect.set(attributes, 'mode', 'off')).toBe(false);
		expect(registry.get(7)?.attributes.mode).toBe('heat');

		expect(await registry.applySnapshot(7, thermostat({ mode: 'heat' }))).toBe(false);
	});

	test('numeric attributes are truncated to integers', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({ current_temp: '72.6', heating_setpoint: '68.0' }));

		expect(registry.get(7)?.attributes).toEqual({
			mode: 'cool',
			current_temp: '72',
			current_humidity: '45',
			heating_setpoint: '68',
		});
	});

	test('zero humidity keeps the last reading and is not a change', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));

		const callback = jest.fn();
		registry.addCallback(7, callback);

		expect(await registry.applySnapshot(7, thermostat({ current_humidity: '0' }))).toBe(false);
		expect(callback).not.toHaveBeenCalled();
		expect(registry.get(7)?.attributes.current_humidity).toBe('45');
	});

	test('listByType filters on the raw type', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));
		await registry.applySnapshot(8, snapshot(8, 'entry_control', { locked: 'true' }));

		expect(registry.listByType('entry_control').map((record) => record.id)).toEqual([8]);
		expect(registry.list()).toHaveLength(2);
	});
});

describe('DeviceRegistry.applyEvent', () => {
	test('always notifies, even when the value is unchanged', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(8, snapshot(8, 'entry_control', { locked: 'true' }));

		const seen: string[] = [];
		registry.addCallback(8, (record) => {
			seen.push(record.attributes.locked);
		});

		await registry.applyEvent(8, 'locked', 'true');
		await registry.applyEvent(8, 'locked', 'true');

		expect(seen).toEqual(['true', 'true']);
	});

	test('"None" keeps the prior numeric value but still notifies', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));

		const callback = jest.fn();
		registry.addCallback(7, callback);

		await registry.applyEvent(7, 'current_temp', 'None');

		expect(registry.get(7)?.attributes.current_temp).toBe('72');
		expect(callback).toHaveBeenCalledTimes(1);
	});

	test('float-encoded values are truncated', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(7, thermostat({}));

		await registry.applyEvent(7, 'cooling_setpoint', '75.9');

		expect(registry.get(7)?.attributes.cooling_setpoint).toBe('75');
	});

	test('events for unknown devices are ignored', async () => {
		const registry = new DeviceRegistry(silentLogger);
		expect(await registry.applyEvent(99, 'locked', 'true')).toBe(false);
		expect(registry.has(99)).toBe(false);
	});
});

describe('DeviceRegistry callbacks', () => {
	test('run in registration order and finish before applyEvent resolves', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(8, snapshot(8, 'entry_control', { locked: 'false' }));

		const order: string[] = [];
		registry.addCallback(8, async () => {
			await flush();
			order.push('first');
		});
		registry.addCallback(8, () => {
			order.push('second');
		});

		await registry.applyEvent(8, 'locked', 'true');

		expect(order).toEqual(['first', 'second']);
	});

	test('a throwing callback is logged and later callbacks still run', async () => {
		const error = jest.fn();
		const log: SmartRentLogger = { ...silentLogger, error };
		const registry = new DeviceRegistry(log);
		await registry.applySnapshot(8, snapshot(8, 'entry_control', { locked: 'false' }));

		const after = jest.fn();
		registry.addCallback(8, () => {
			throw new Error('boom');
		});
		registry.addCallback(8, after);

		await registry.applyEvent(8, 'locked', 'true');

		expect(after).toHaveBeenCalledTimes(1);
		expect(error).toHaveBeenCalledWith(
			'SmartRent: update callback for device %d threw: %s',
			8,
			'Error: boom',
		);
	});

	test('the disposer unregisters the callback', async () => {
		const registry = new DeviceRegistry(silentLogger);
		await registry.applySnapshot(8, snapshot(8, 'entry_control', { locked: 'false' }));

		const callback = jest.fn();
		const dispose = registry.addCallback(8, callback);
		dispose();

		await registry.applyEvent(8, 'locked', 'true');

		expect(callback).not.toHaveBeenCalled();
	});
});
