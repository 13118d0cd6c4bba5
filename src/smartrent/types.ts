// src/smartrent/types.ts

export interface Credential {
	readonly email: string;
	readonly password: string;
	/** Six-digit code for accounts with two-factor auth; asked for on demand otherwise. */
	readonly twoFactorCode?: string;
}

export interface TokenState {
	accessToken: string;
	refreshToken: string;
	/** Milliseconds since epoch. */
	expiresAt: number;
}

/** Supplies the six-digit two-factor code when the cloud asks for one. */
export type TwoFactorCodeProvider = () => Promise<string>;

export interface AttributeEntry {
	name: string;
	/** Normalized to a string; null when the cloud has no reading. */
	state: string | null;
}

/**
 * One device as returned by the REST API.
 */
export interface DeviceSnapshot {
	id: number;
	type: string;
	name: string;
	online: boolean;
	batteryPowered: boolean;
	batteryLevel: number | null;
	attributes: AttributeEntry[];
}

export interface DeviceRecord {
	id: number;
	type: string;
	displayName: string;
	online: boolean;
	batteryPowered: boolean;
	batteryLevel: number | null;
	attributes: Record<string, string>;
}

/** What the registry hands out; callers cannot write through it. */
export type DeviceRecordView = Readonly<Omit<DeviceRecord, 'attributes'>> & {
	readonly attributes: Readonly<Record<string, string>>;
};

export type ConnectionState = 'disconnected' | 'connecting' | 'joining' | 'live' | 'backoff';

export interface Hub {
	id: number;
	[key: string]: unknown;
}
