// src/smartrent/frames.ts
// Phoenix (vsn 2.0.0) frame codec for the SmartRent websocket.
//
// Every frame is a five-element JSON array:
//   [join_ref, ref, topic, event, payload]
// Device traffic lives on "devices:{id}" topics.

import { MalformedResponseError } from './errors.js';

export const SMARTRENT_SOCKET_URL = 'wss://control.smartrent.com/socket/websocket';

export const JOIN_EVENT = 'phx_join';
export const LEAVE_EVENT = 'phx_leave';
export const COMMAND_EVENT = 'update_attributes';
export const HEARTBEAT_TOPIC = 'phoenix';
export const HEARTBEAT_EVENT = 'heartbeat';

export type FrameRef = string | null;

export interface InboundFrame {
	joinRef: FrameRef;
	ref: FrameRef;
	topic: string;
	event: string;
	payload: Record<string, unknown>;
}

/** Payload of a pushed attribute change. */
export interface AttributeEvent {
	type: string;
	name: string;
	lastReadState: string | null;
}

export function buildSocketUrl(baseUrl: string, accessToken: string): string {
	const url = new URL(baseUrl);
	url.searchParams.set('token', accessToken);
	url.searchParams.set('vsn', '2.0.0');
	return url.toString();
}

export function deviceTopic(deviceId: number): string {
	return `devices:${deviceId}`;
}

/**
 * Device id from a "devices:{id}" topic, or null for any other topic.
 */
export function topicDeviceId(topic: string): number | null {
	const match = /^devices:(\d+)$/.exec(topic);
	return match ? Number.parseInt(match[1], 10) : null;
}

function encode(ref: FrameRef, topic: string, event: string, payload: Record<string, unknown>): string {
	return JSON.stringify([null, ref, topic, event, payload]);
}

export function buildJoinFrame(deviceId: number): string {
	return encode(null, deviceTopic(deviceId), JOIN_EVENT, {});
}

export function buildLeaveFrame(deviceId: number): string {
	return encode(null, deviceTopic(deviceId), LEAVE_EVENT, {});
}

export function buildHeartbeatFrame(ref: number): string {
	return encode(String(ref), HEARTBEAT_TOPIC, HEARTBEAT_EVENT, {});
}

export function buildCommandFrame(deviceId: number, attributeName: string, value: string): string {
	return encode(null, deviceTopic(deviceId), COMMAND_EVENT, {
		device_id: deviceId,
		attributes: [{ name: attributeName, value }],
	});
}

function toRef(value: unknown): FrameRef {
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'number') {
		return String(value);
	}
	return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function parseFrame(text: string): InboundFrame {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (err) {
		throw new MalformedResponseError('SmartRent websocket frame is not JSON', { cause: err });
	}

	if (!Array.isArray(parsed) || parsed.length !== 5) {
		throw new MalformedResponseError('SmartRent websocket frame is not a five-element array');
	}

	const [joinRef, ref, topic, event, payload] = parsed;
	if (typeof topic !== 'string' || typeof event !== 'string') {
		throw new MalformedResponseError('SmartRent websocket frame has a non-string topic or event');
	}

	const payloadRecord: Record<string, unknown> = isRecord(payload) ? payload : {};

	return {
		joinRef: toRef(joinRef),
		ref: toRef(ref),
		topic,
		event,
		payload: payloadRecord,
	};
}

/**
 * Attribute-change payloads carry a non-empty "type"; anything else
 * (replies, presence, errors) is a control frame.
 */
export function toAttributeEvent(payload: Record<string, unknown>): AttributeEvent | null {
	const { type, name } = payload;
	if (typeof type !== 'string' || type === '' || typeof name !== 'string' || name === '') {
		return null;
	}

	const raw = payload.last_read_state;
	let lastReadState: string | null = null;
	if (typeof raw === 'string') {
		lastReadState = raw;
	} else if (typeof raw === 'number' || typeof raw === 'boolean') {
		lastReadState = String(raw);
	}

	return { type, name, lastReadState };
}
