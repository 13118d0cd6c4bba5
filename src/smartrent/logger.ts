// src/smartrent/logger.ts
import type { Logger } from 'homebridge';

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests. Messages use printf-style
 * placeholders (%s, %d, %o).
 */
export interface SmartRentLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(prefix: string): SmartRentLogger {
	const tag = `[${prefix}]`;
	return {
		debug: (message: string, ...args: unknown[]) => console.debug(`${tag} ${message}`, ...args),
		info: (message: string, ...args: unknown[]) => console.info(`${tag} ${message}`, ...args),
		warn: (message: string, ...args: unknown[]) => console.warn(`${tag} ${message}`, ...args),
		error: (message: string, ...args: unknown[]) => console.error(`${tag} ${message}`, ...args),
	};
}

export const toSmartRentLogger = (log: Logger): SmartRentLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

/** Logger that drops everything; handy for tests. */
export const silentLogger: SmartRentLogger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
