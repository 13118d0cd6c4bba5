// src/smartrent/http-client.ts
// SmartRent REST client.
// Handles the session/token endpoints and the hub/device queries against
// control.smartrent.com.
//
// Stateless: TokenStore owns the tokens and DeviceFetcher owns the retry
// policy.

import {
	AuthorizationExpiredError,
	MalformedResponseError,
	SmartRentError,
	TransientNetworkError,
	describeError,
} from './errors.js';
import { createConsoleLogger } from './logger.js';
import type { SmartRentLogger } from './logger.js';
import type { AttributeEntry, DeviceSnapshot, Hub } from './types.js';

export const SMARTRENT_API_BASE = 'https://control.smartrent.com/api/v2/';

// Minimal fetch/response typing for Node 20, without depending on DOM lib types.
export type HttpRequestInit = {
	method: string;
	headers: Record<string, string>;
	body?: string;
	signal?: AbortSignal;
};

export type HttpResponse = {
	ok: boolean;
	status: number;
	statusText: string;
	text(): Promise<string>;
};

export type FetchLike = (input: string, init: HttpRequestInit) => Promise<HttpResponse>;

declare const fetch: FetchLike;

export interface ApiErrorEntry {
	code: string;
	description?: string;
}

export interface TokenGrant {
	accessToken: string;
	refreshToken: string;
	/** Seconds since epoch, as the API reports it. */
	expires: number;
}

export type SessionResult =
	| { kind: 'tokens'; grant: TokenGrant }
	| { kind: 'two-factor'; tfaApiToken: string }
	| { kind: 'rejected'; status: number; errors: ApiErrorEntry[] };

export interface HttpClientOptions {
	baseUrl?: string;
	fetchImpl?: FetchLike;
	log?: SmartRentLogger;
}

type JsonResponse = {
	status: number;
	ok: boolean;
	statusText: string;
	json: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
	return isRecord(value) ? value : undefined;
}

export function readApiErrors(json: unknown): ApiErrorEntry[] {
	const errors = asRecord(json)?.errors;
	if (!Array.isArray(errors)) {
		return [];
	}

	return errors.map((entry) => {
		const record = asRecord(entry) ?? {};
		return {
			code: typeof record.code === 'string' ? record.code : '',
			description: typeof record.description === 'string' ? record.description : undefined,
		};
	});
}

export function hasErrorCode(errors: ApiErrorEntry[], code: string): boolean {
	return errors.some((entry) => entry.code === code);
}

function normalizeState(value: unknown): string | null {
	if (value === null || value === undefined) {
		return null;
	}
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'number' || typeof value === 'boolean') {
		return String(value);
	}
	return JSON.stringify(value);
}

function toDeviceId(value: unknown): number | undefined {
	if (typeof value === 'number' && Number.isInteger(value)) {
		return value;
	}
	if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
		return Number.parseInt(value.trim(), 10);
	}
	return undefined;
}

/**
 * Validate one device object from the devices endpoints.
 */
export function parseDeviceSnapshot(json: unknown): DeviceSnapshot {
	const obj = asRecord(json);
	if (!obj) {
		throw new MalformedResponseError('SmartRent device payload is not an object');
	}

	const id = toDeviceId(obj.id);
	if (id === undefined) {
		throw new MalformedResponseError(`SmartRent device payload has no usable id: ${String(obj.id)}`);
	}

	const rawAttributes = obj.attributes ?? [];
	if (!Array.isArray(rawAttributes)) {
		throw new MalformedResponseError(`SmartRent device ${id} has a non-array attributes field`);
	}

	const attributes: AttributeEntry[] = [];
	for (const entry of rawAttributes) {
		const attr = asRecord(entry);
		if (!attr || typeof attr.name !== 'string') {
			continue;
		}
		attributes.push({ name: attr.name, state: normalizeState(attr.state) });
	}

	const batteryLevel = typeof obj.battery_level === 'number' && Number.isFinite(obj.battery_level)
		? obj.battery_level
		: null;

	return {
		id,
		type: typeof obj.type === 'string' ? obj.type : 'unknown',
		name: typeof obj.name === 'string' && obj.name.trim().length > 0 ? obj.name.trim() : `Device ${id}`,
		online: obj.online !== false,
		batteryPowered: obj.battery_powered === true,
		batteryLevel,
		attributes,
	};
}

function unwrapList(json: unknown, what: string): unknown[] {
	// Some responses wrap arrays in "data"; others are raw arrays.
	if (Array.isArray(json)) {
		return json;
	}
	const data = asRecord(json)?.data;
	if (Array.isArray(data)) {
		return data;
	}
	throw new MalformedResponseError(`SmartRent ${what} payload is not a list`);
}

function parseSessionBody(status: number, json: unknown): SessionResult {
	const obj = asRecord(json);
	if (!obj) {
		throw new MalformedResponseError('SmartRent session payload is not an object');
	}

	const errors = readApiErrors(obj);
	if (errors.length > 0) {
		return { kind: 'rejected', status, errors };
	}

	// Token fields are sometimes nested under "data".
	const data = asRecord(obj.data) ?? obj;

	const tfaApiToken = obj.tfa_api_token ?? data.tfa_api_token;
	if (typeof tfaApiToken === 'string' && tfaApiToken.length > 0) {
		return { kind: 'two-factor', tfaApiToken };
	}

	const accessToken = data.access_token;
	const refreshToken = data.refresh_token;
	const expires = data.expires;

	if (
		typeof accessToken !== 'string' || accessToken.length === 0 ||
		typeof refreshToken !== 'string' || refreshToken.length === 0 ||
		typeof expires !== 'number' || !Number.isFinite(expires)
	) {
		throw new MalformedResponseError(
			`SmartRent session payload missing access_token/refresh_token/expires; keys=${Object.keys(data).join(',')}`,
		);
	}

	return { kind: 'tokens', grant: { accessToken, refreshToken, expires } };
}

export class SmartRentHttpClient {
	private readonly log: SmartRentLogger;
	private readonly baseUrl: string;
	private readonly fetchImpl: FetchLike;

	public constructor(options: HttpClientOptions = {}) {
		this.log = options.log ?? createConsoleLogger('smartrent-http');
		const base = options.baseUrl ?? SMARTRENT_API_BASE;
		this.baseUrl = base.endsWith('/') ? base : `${base}/`;
		this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
	}

	/**
	 * Password grant. May answer with a two-factor challenge instead of tokens.
	 */
	public async createSession(email: string, password: string): Promise<SessionResult> {
		this.log.debug('Requesting SmartRent session for %s…', email);
		const res = await this.send('POST', 'sessions', {
			'Content-Type': 'application/json',
		}, JSON.stringify({ email, password }));
		return this.toSessionResult('sessions', res);
	}

	/**
	 * Second step of a two-factor login.
	 */
	public async createTwoFactorSession(tfaApiToken: string, code: string): Promise<SessionResult> {
		this.log.debug('Completing SmartRent two-factor session…');
		const res = await this.send('POST', 'sessions', {
			'Content-Type': 'application/json',
		}, JSON.stringify({ tfa_api_token: tfaApiToken, token: code }));
		return this.toSessionResult('sessions', res);
	}

	/**
	 * Refresh-token grant.
	 */
	public async refreshSession(refreshToken: string): Promise<SessionResult> {
		this.log.debug('Refreshing SmartRent tokens with refresh token…');
		const res = await this.send('POST', 'tokens', {
			'authorization-x-refresh': refreshToken,
		});
		return this.toSessionResult('tokens', res);
	}

	public async getHubs(accessToken: string, signal?: AbortSignal): Promise<Hub[]> {
		const res = await this.send('GET', 'hubs', this.authHeaders(accessToken), undefined, signal);
		this.ensureOk('GET', 'hubs', res);

		const hubs: Hub[] = [];
		for (const item of unwrapList(res.json, 'hubs')) {
			const record = asRecord(item);
			const id = toDeviceId(record?.id);
			if (!record || id === undefined) {
				this.log.warn('SmartRent hubs payload contained an entry without id; skipping.');
				continue;
			}
			hubs.push({ ...record, id });
		}
		return hubs;
	}

	public async getHubDevices(accessToken: string, hubId: number, signal?: AbortSignal): Promise<DeviceSnapshot[]> {
		const path = `hubs/${hubId}/devices`;
		const res = await this.send('GET', path, this.authHeaders(accessToken), undefined, signal);
		this.ensureOk('GET', path, res);

		const devices: DeviceSnapshot[] = [];
		for (const item of unwrapList(res.json, path)) {
			try {
				devices.push(parseDeviceSnapshot(item));
			} catch (err) {
				if (!(err instanceof MalformedResponseError)) {
					throw err;
				}
				this.log.warn('Skipping malformed device in %s: %s', path, err.message);
			}
		}
		return devices;
	}

	public async getDevice(accessToken: string, deviceId: number): Promise<DeviceSnapshot> {
		const path = `devices/${deviceId}`;
		const res = await this.send('GET', path, this.authHeaders(accessToken));
		this.ensureOk('GET', path, res);

		const obj = asRecord(res.json);
		return parseDeviceSnapshot(asRecord(obj?.data) ?? res.json);
	}

	private authHeaders(accessToken: string): Record<string, string> {
		return {
			authorization: `Bearer ${accessToken}`,
		};
	}

	private toSessionResult(path: string, res: JsonResponse): SessionResult {
		if (res.status >= 500) {
			throw new TransientNetworkError(
				`SmartRent ${path} failed: HTTP ${res.status} ${res.statusText}`,
				{ status: res.status },
			);
		}
		if (!res.ok && readApiErrors(res.json).length === 0) {
			const code = res.status === 401 ? 'unauthorized' : `http_${res.status}`;
			return {
				kind: 'rejected',
				status: res.status,
				errors: [{ code, description: res.statusText }],
			};
		}
		return parseSessionBody(res.status, res.json);
	}

	private ensureOk(method: string, path: string, res: JsonResponse): void {
		if (res.ok) {
			return;
		}

		const errors = readApiErrors(res.json);
		this.log.debug(
			'SmartRent %s %s failed: HTTP %d %s codes=%o',
			method,
			path,
			res.status,
			res.statusText,
			errors.map((entry) => entry.code),
		);

		if (res.status === 401 || hasErrorCode(errors, 'unauthorized')) {
			throw new AuthorizationExpiredError(
				`SmartRent ${method} ${path} rejected the access token`,
				{ status: res.status },
			);
		}

		if (res.status >= 500 || res.status === 429) {
			throw new TransientNetworkError(
				`SmartRent ${method} ${path} failed: HTTP ${res.status} ${res.statusText}`,
				{ status: res.status },
			);
		}

		const detail = errors[0]?.description ?? errors[0]?.code ?? res.statusText;
		throw new SmartRentError(
			`SmartRent ${method} ${path} failed with status ${res.status}: ${detail}`,
			{ status: res.status },
		);
	}

	private async send(
		method: string,
		path: string,
		headers: Record<string, string>,
		body?: string,
		signal?: AbortSignal,
	): Promise<JsonResponse> {
		const url = new URL(path, this.baseUrl).toString();

		let res: HttpResponse;
		try {
			res = await this.fetchImpl(url, {
				method,
				headers: { Accept: 'application/json', ...headers },
				body,
				signal,
			});
		} catch (err) {
			throw new TransientNetworkError(
				`SmartRent ${method} ${path} failed: ${describeError(err)}`,
				{ cause: err },
			);
		}

		const text = await res.text();
		let json: unknown = null;

		if (text.length > 0) {
			try {
				json = JSON.parse(text);
			} catch (err) {
				if (res.ok) {
					throw new MalformedResponseError(
						`SmartRent ${method} ${path} returned non-JSON payload`,
						{ cause: err, status: res.status },
					);
				}
				// Error pages are often HTML; the status carries the meaning.
				json = null;
			}
		}

		return {
			status: res.status,
			ok: res.ok,
			statusText: res.statusText,
			json,
		};
	}
}
