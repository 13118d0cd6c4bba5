import { DoorLock, MultilevelSwitch, Thermostat } from '../src/smartrent/devices.js';
import { buildCommandFrame, buildJoinFrame } from '../src/smartrent/frames.js';
import { silentLogger } from '../src/smartrent/logger.js';
import { SmartRentClient } from '../src/smartrent/smartrent-client.js';
import {
	API_BASE,
	FakeFetch,
	FakeSocketServer,
	SOCKET_URL,
	SleepRecorder,
	eventFrame,
	tokenBody,
	waitFor,
} from './helpers/fakes.js';

const hubDevices = [
	{
		id: 1234,
		type: 'entry_control',
		name: 'Front Door',
		battery_powered: true,
		battery_level: 15,
		attributes: [{ name: 'locked', state: 'false' }, { name: 'notifications', state: null }],
	},
	{
		id: 2000,
		type: 'thermostat',
		name: 'Hallway',
		attributes: [
			{ name: 'mode', state: 'cool' },
			{ name: 'fan_mode', state: 'auto' },
			{ name: 'cooling_setpoint', state: 74 },
			{ name: 'heating_setpoint', state: '68.0' },
			{ name: 'current_temp', state: '71.5' },
			{ name: 'current_humidity', state: '0' },
		],
	},
	{ id: 3000, type: 'switch_binary', name: 'Porch', attributes: [{ name: 'on', state: true }] },
	{ id: 4000, type: 'switch_multilevel', name: 'Dimmer', attributes: [{ name: 'level', state: 30 }] },
	{ id: 5000, type: 'sensor_notification', name: 'Water Heater', attributes: [{ name: 'leak', state: false }] },
	{ id: 6000, type: 'camera', name: 'Doorbell', attributes: [] },
];

const clients: SmartRentClient[] = [];

afterEach(async () => {
	await Promise.all(clients.splice(0).map((client) => client.close()));
});

function setup() {
	const fake = new FakeFetch(API_BASE);
	fake
		.on('POST', 'sessions', { status: 200, body: tokenBody('access-1', 'refresh-1', 4_102_444_800) })
		.on('GET', 'hubs', { status: 200, body: [{ id: 10 }] })
		.on('GET', 'hubs/10/devices', { status: 200, body: hubDevices });

	const server = new FakeSocketServer();
	const events: string[] = [];

	const client = new SmartRentClient({
		credential: { email: 'user@example.test', password: 'test-secret' },
		log: silentLogger,
		apiBaseUrl: API_BASE,
		socketUrl: SOCKET_URL,
		fetchIntervalSeconds: 0,
		heartbeatIntervalSeconds: 0,
		fetchImpl: fake.fetch,
		channelFactory: async (url) => {
			events.push('socket');
			return server.factory(url);
		},
		sleep: new SleepRecorder().sleep,
		now: () => 1_700_000_000_000,
	});
	clients.push(client);

	return { client, fake, server, events };
}

async function discovered() {
	const ctx = setup();
	await ctx.client.login();
	await ctx.client.discoverDevices();
	return ctx;
}

function first<T>(items: T[]): T {
	const item = items[0];
	if (item === undefined) {
		throw new Error('expected at least one item');
	}
	return item;
}

describe('SmartRentClient discovery', () => {
	test('creates typed handles for supported kinds only', async () => {
		const { client } = await discovered();

		expect(client.getDevices().map((device) => device.id)).toEqual([1234, 2000, 3000, 4000, 5000]);
		expect(client.getLocks()).toHaveLength(1);
		expect(client.getThermostats()).toHaveLength(1);
		expect(client.getBinarySwitches()).toHaveLength(1);
		expect(client.getMultilevelSwitches()).toHaveLength(1);
		expect(client.getLeakSensors()).toHaveLength(1);
		expect(client.getDevice(6000)).toBeUndefined();
	});

	test('typed getters read the normalized record', async () => {
		const { client } = await discovered();
		const thermostat = first(client.getThermostats());
		const lock = first(client.getLocks());

		expect(thermostat.name).toBe('Hallway');
		expect(thermostat.getMode()).toBe('cool');
		expect(thermostat.getFanMode()).toBe('auto');
		expect(thermostat.getCoolingSetpoint()).toBe(74);
		expect(thermostat.getHeatingSetpoint()).toBe(68);
		expect(thermostat.getCurrentTemp()).toBe(71);
		expect(thermostat.getCurrentHumidity()).toBeNull();

		expect(lock.getLocked()).toBe(false);
		expect(lock.getNotification()).toBeNull();
		expect(lock.batteryPowered).toBe(true);
		expect(lock.batteryLevel).toBe(15);

		expect(first(client.getBinarySwitches()).getOn()).toBe(true);
		expect(first(client.getMultilevelSwitches()).getLevel()).toBe(30);
		expect(first(client.getLeakSensors()).getLeak()).toBe(false);
	});

	test('rediscovery keeps the same handles', async () => {
		const { client } = await discovered();
		const lock = client.getDevice(1234);

		await client.discoverDevices();

		expect(client.getDevice(1234)).toBe(lock);
	});
});

describe('device commands', () => {
	test('setLocked(true) sends update_attributes and updates the record first', async () => {
		const { client, server, events } = await discovered();
		const lock = client.getDevice(1234);
		expect(lock).toBeInstanceOf(DoorLock);
		if (!(lock instanceof DoorLock)) {
			return;
		}

		lock.onUpdate((device) => {
			events.push(`update:${String(device.getLocked())}`);
		});

		await lock.setLocked(true);

		const sent = server.channels[0].sent;
		expect(sent[1]).toBe(
			'[null,null,"devices:1234","update_attributes",{"device_id":1234,"attributes":[{"name":"locked","value":"true"}]}]',
		);
		expect(JSON.parse(sent[1])[4]).toEqual({ device_id: 1234, attributes: [{ name: 'locked', value: 'true' }] });
		expect(events).toEqual(['update:true', 'socket']);
		expect(lock.getLocked()).toBe(true);
	});

	test('thermostat setters send strings the cloud understands', async () => {
		const { client, server } = await discovered();
		const thermostat = first(client.getThermostats());

		await thermostat.setMode('heat');
		await thermostat.setFanMode('on');
		await thermostat.setCoolingSetpoint(74.6);

		expect(server.channels.map((channel) => channel.sent[1])).toEqual([
			buildCommandFrame(2000, 'mode', 'heat'),
			buildCommandFrame(2000, 'fan_mode', 'on'),
			buildCommandFrame(2000, 'cooling_setpoint', '75'),
		]);
		expect(thermostat.getMode()).toBe('heat');
		expect(thermostat.getCoolingSetpoint()).toBe(75);
	});

	test('out-of-range values are rejected before anything is sent', async () => {
		const { client, server } = await discovered();
		const dimmer = client.getDevice(4000);
		expect(dimmer).toBeInstanceOf(MultilevelSwitch);
		if (!(dimmer instanceof MultilevelSwitch)) {
			return;
		}
		const thermostat = client.getDevice(2000);
		if (!(thermostat instanceof Thermostat)) {
			throw new Error('expected a thermostat');
		}

		await expect(dimmer.setLevel(150)).rejects.toBeInstanceOf(RangeError);
		await expect(thermostat.setHeatingSetpoint(Number.NaN)).rejects.toBeInstanceOf(RangeError);

		expect(server.urls).toEqual([]);
		expect(dimmer.getLevel()).toBe(30);
	});

	test('binary and multilevel switches send booleans and integers', async () => {
		const { client, server } = await discovered();

		await first(client.getBinarySwitches()).setOn(false);
		await first(client.getMultilevelSwitches()).setLevel(40.4);

		expect(server.channels.map((channel) => channel.sent[1])).toEqual([
			buildCommandFrame(3000, 'on', 'false'),
			buildCommandFrame(4000, 'level', '40'),
		]);
	});
});

describe('SmartRentClient subscriptions', () => {
	test('fetchNow re-reads one device over REST', async () => {
		const { client, fake } = await discovered();
		fake.on('GET', 'devices/1234', {
			status: 200,
			body: { data: { ...hubDevices[0], attributes: [{ name: 'locked', state: 'true' }] } },
		});

		const record = await client.fetchNow(1234);

		expect(record.attributes.locked).toBe('true');
		expect(first(client.getLocks()).getLocked()).toBe(true);
	});

	test('live events reach device callbacks until updates stop', async () => {
		const { client, server } = await discovered();
		const sensor = first(client.getLeakSensors());

		const leaks: (boolean | null)[] = [];
		sensor.onUpdate((device) => {
			leaks.push(device.getLeak());
		});

		await sensor.startUpdates();
		await waitFor(() => client.connectionState === 'live');

		const channel = server.channels[0];
		expect(channel.sent).toEqual([buildJoinFrame(5000)]);

		channel.push(eventFrame(5000, 'sensor_notification', 'leak', 'true'));
		await waitFor(() => leaks.length === 1);
		expect(leaks).toEqual([true]);
		expect(client.isSubscribed(sensor)).toBe(true);

		await sensor.stopUpdates();

		expect(client.connectionState).toBe('disconnected');
		expect(channel.closed).toBe(true);
	});

	test('close() stops everything even with several subscribers', async () => {
		const { client, server } = await discovered();

		await client.subscribe(1234);
		await client.subscribe({ id: 2000 });
		await waitFor(() => client.connectionState === 'live');

		await client.close();

		expect(client.connectionState).toBe('disconnected');
		expect(server.channels[0].closed).toBe(true);
		expect(client.isSubscribed(1234)).toBe(false);
	});
});
