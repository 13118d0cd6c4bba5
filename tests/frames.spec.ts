import { MalformedResponseError } from '../src/smartrent/errors.js';
import {
	buildCommandFrame,
	buildHeartbeatFrame,
	buildJoinFrame,
	buildLeaveFrame,
	buildSocketUrl,
	parseFrame,
	toAttributeEvent,
	topicDeviceId,
} from '../src/smartrent/frames.js';

describe('outbound frames', () => {
	test('join and leave address the device topic', () => {
		expect(buildJoinFrame(42)).toBe('[null,null,"devices:42","phx_join",{}]');
		expect(buildLeaveFrame(42)).toBe('[null,null,"devices:42","phx_leave",{}]');
	});

	test('commands carry the device id and one attribute', () => {
		expect(JSON.parse(buildCommandFrame(1234, 'locked', 'true'))).toEqual([
			null,
			null,
			'devices:1234',
			'update_attributes',
			{ device_id: 1234, attributes: [{ name: 'locked', value: 'true' }] },
		]);
	});

	test('heartbeats go to the phoenix topic with a ref', () => {
		expect(buildHeartbeatFrame(3)).toBe('[null,"3","phoenix","heartbeat",{}]');
	});

	test('the socket URL carries the token and protocol version', () => {
		expect(buildSocketUrl('wss://socket.test/socket/websocket', 'abc')).toBe(
			'wss://socket.test/socket/websocket?token=abc&vsn=2.0.0',
		);
	});
});

describe('inbound frames', () => {
	test('parses an attribute event', () => {
		const frame = parseFrame(
			'[null,null,"devices:7","attribute_state",{"type":"thermostat","name":"current_temp","last_read_state":"71.0"}]',
		);

		expect(frame.topic).toBe('devices:7');
		expect(topicDeviceId(frame.topic)).toBe(7);
		expect(toAttributeEvent(frame.payload)).toEqual({
			type: 'thermostat',
			name: 'current_temp',
			lastReadState: '71.0',
		});
	});

	test('numeric states become strings', () => {
		expect(toAttributeEvent({ type: 'switch_multilevel', name: 'level', last_read_state: 40 })).toEqual({
			type: 'switch_multilevel',
			name: 'level',
			lastReadState: '40',
		});
	});

	test('join replies are control frames', () => {
		const frame = parseFrame('["1","1","devices:7","phx_reply",{"status":"ok","response":{}}]');

		expect(frame.joinRef).toBe('1');
		expect(toAttributeEvent(frame.payload)).toBeNull();
	});

	test('non-device topics have no device id', () => {
		expect(topicDeviceId('phoenix')).toBeNull();
		expect(topicDeviceId('devices:abc')).toBeNull();
	});

	test('rejects frames that are not five-element arrays', () => {
		expect(() => parseFrame('not json')).toThrow(MalformedResponseError);
		expect(() => parseFrame('{"topic":"devices:7"}')).toThrow(MalformedResponseError);
		expect(() => parseFrame('[null,null,"devices:7","x"]')).toThrow(MalformedResponseError);
		expect(() => parseFrame('[null,null,7,"x",{}]')).toThrow(MalformedResponseError);
	});
});
