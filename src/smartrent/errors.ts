// src/smartrent/errors.ts

export interface SmartRentErrorOptions {
	cause?: unknown;
	/** HTTP status, when the error came from a REST response. */
	status?: number;
}

/**
 * Base error for everything raised by the SmartRent client.
 */
export class SmartRentError extends Error {
	public readonly status?: number;

	public constructor(message: string, options: SmartRentErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = 'SmartRentError';
		this.status = options.status;
	}
}

/**
 * Bad credentials or a failed two-factor step. Fatal: never retried
 * automatically.
 */
export class AuthenticationError extends SmartRentError {
	public constructor(message: string, options: SmartRentErrorOptions = {}) {
		super(message, options);
		this.name = 'AuthenticationError';
	}
}

/**
 * The access token was rejected mid-request. Callers refresh once and retry.
 */
export class AuthorizationExpiredError extends SmartRentError {
	public constructor(message: string, options: SmartRentErrorOptions = {}) {
		super(message, options);
		this.name = 'AuthorizationExpiredError';
	}
}

/**
 * Socket closed, connection refused, 5xx and friends. Retried with backoff by
 * the background loops.
 */
export class TransientNetworkError extends SmartRentError {
	public constructor(message: string, options: SmartRentErrorOptions = {}) {
		super(message, options);
		this.name = 'TransientNetworkError';
	}
}

/**
 * Payload did not have the expected shape.
 */
export class MalformedResponseError extends SmartRentError {
	public constructor(message: string, options: SmartRentErrorOptions = {}) {
		super(message, options);
		this.name = 'MalformedResponseError';
	}
}

export function describeError(err: unknown): string {
	if (err instanceof Error) {
		return `${err.name}: ${err.message}`;
	}
	return String(err);
}
