// src/smartrent/config.ts
import type { SmartRentLogger } from './logger.js';

export const DEFAULT_FETCH_INTERVAL_SECONDS = 600;
export const DEFAULT_HEARTBEAT_INTERVAL_SECONDS = 30;

export interface SmartRentPlatformConfig {
	name?: string;
	email: string;
	password: string;
	twoFactorCode?: string;
	fetchIntervalSeconds: number;
	heartbeatIntervalSeconds: number;
	apiBaseUrl?: string;
	socketUrl?: string;
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
	const value = raw[key];
	if (typeof value !== 'string') {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

function readSeconds(
	raw: Record<string, unknown>,
	key: string,
	fallback: number,
	log: SmartRentLogger,
): number {
	const value = raw[key];
	if (value === undefined || value === null || value === '') {
		return fallback;
	}

	const seconds = typeof value === 'number' ? value : Number(value);
	if (!Number.isFinite(seconds) || seconds < 0) {
		log.warn('SmartRent: ignoring invalid %s=%s; using %d.', key, String(value), fallback);
		return fallback;
	}
	return seconds;
}

/**
 * Read the platform block from config.json. Unknown keys are ignored;
 * invalid intervals fall back to their defaults with a warning.
 */
export function parsePlatformConfig(raw: Record<string, unknown>, log: SmartRentLogger): SmartRentPlatformConfig {
	// "username" is accepted as an alias for "email".
	const email = readString(raw, 'email') ?? readString(raw, 'username') ?? '';

	// Passwords are taken verbatim; leading/trailing spaces can be significant.
	const password = typeof raw.password === 'string' ? raw.password : '';

	return {
		name: readString(raw, 'name'),
		email,
		password,
		twoFactorCode: readString(raw, 'twoFactorCode'),
		fetchIntervalSeconds: readSeconds(raw, 'fetchIntervalSeconds', DEFAULT_FETCH_INTERVAL_SECONDS, log),
		heartbeatIntervalSeconds: readSeconds(
			raw,
			'heartbeatIntervalSeconds',
			DEFAULT_HEARTBEAT_INTERVAL_SECONDS,
			log,
		),
		apiBaseUrl: readString(raw, 'apiBaseUrl'),
		socketUrl: readString(raw, 'socketUrl'),
	};
}

export function hasCredentials(config: SmartRentPlatformConfig): boolean {
	return config.email.length > 0 && config.password.length > 0;
}
