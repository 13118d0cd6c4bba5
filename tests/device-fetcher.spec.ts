import { DeviceFetcher } from '../src/smartrent/device-fetcher.js';
import { AuthorizationExpiredError, TransientNetworkError } from '../src/smartrent/errors.js';
import { SmartRentHttpClient } from '../src/smartrent/http-client.js';
import { silentLogger } from '../src/smartrent/logger.js';
import { FakeFetch, FakeTokens } from './helpers/fakes.js';

function setup() {
	const fake = new FakeFetch();
	const tokens = new FakeTokens();
	const http = new SmartRentHttpClient({ baseUrl: 'https://api.test/', fetchImpl: fake.fetch, log: silentLogger });
	const fetcher = new DeviceFetcher(http, tokens, silentLogger);
	return { fake, tokens, fetcher };
}

describe('DeviceFetcher', () => {
	test('lists every hub\'s devices in hub order', async () => {
		const { fake, fetcher } = setup();
		fake
			.on('GET', 'hubs', { status: 200, body: [{ id: 1 }, { id: 2 }] })
			.on('GET', 'hubs/1/devices', { status: 200, body: [{ id: 11, type: 'thermostat' }, { id: 12, type: 'switch_binary' }] })
			.on('GET', 'hubs/2/devices', { status: 200, body: [{ id: 21, type: 'entry_control' }] });

		const devices = await fetcher.listHubsAndDevices();

		expect(devices.map((device) => device.id)).toEqual([11, 12, 21]);
		expect(fake.requests.map((req) => req.path)).toEqual(['hubs', 'hubs/1/devices', 'hubs/2/devices']);
	});

	test('refreshes the token and retries once after a 401', async () => {
		const { fake, tokens, fetcher } = setup();
		fake.on(
			'GET',
			'devices/5',
			{ status: 401 },
			{ status: 200, body: { id: 5, type: 'switch_binary' } },
		);

		const device = await fetcher.getDevice(5);

		expect(device.id).toBe(5);
		expect(tokens.refreshCalls).toBe(1);
		expect(fake.requests.map((req) => req.headers.authorization)).toEqual([
			'Bearer token-1',
			'Bearer token-2',
		]);
	});

	test('a second authorization failure propagates', async () => {
		const { fake, tokens, fetcher } = setup();
		fake.on('GET', 'hubs', { status: 401 });

		await expect(fetcher.listHubsAndDevices()).rejects.toBeInstanceOf(AuthorizationExpiredError);
		expect(tokens.refreshCalls).toBe(1);
		expect(fake.count('GET', 'hubs')).toBe(2);
	});

	test('other failures are not retried', async () => {
		const { fake, tokens, fetcher } = setup();
		fake.on('GET', 'hubs', { status: 502 });

		await expect(fetcher.listHubsAndDevices()).rejects.toBeInstanceOf(TransientNetworkError);
		expect(tokens.refreshCalls).toBe(0);
		expect(fake.count('GET', 'hubs')).toBe(1);
	});
});
