// src/smartrent/device-registry.ts
import { NUMERIC_ATTRIBUTES, normalizeNumericAttribute } from './device-kinds.js';
import { describeError } from './errors.js';
import { createConsoleLogger } from './logger.js';
import type { SmartRentLogger } from './logger.js';
import type { AttributeEntry, DeviceRecordView, DeviceSnapshot } from './types.js';

/**
 * Called after a device record changed. May be async; callbacks run one after
 * another in registration order.
 */
export type DeviceUpdateCallback = (record: DeviceRecordView) => void | Promise<void>;

function sameAttributes(a: Readonly<Record<string, string>>, b: Readonly<Record<string, string>>): boolean {
	const aKeys = Object.keys(a);
	if (aKeys.length !== Object.keys(b).length) {
		return false;
	}
	return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

/**
 * Resolve the value to store for one attribute, or undefined to keep `prior`.
 */
function resolveAttribute(name: string, state: string | null, prior: string | undefined): string | undefined {
	const next = NUMERIC_ATTRIBUTES.has(name)
		? normalizeNumericAttribute(name, state)
		: state ?? undefined;
	return next ?? prior;
}

export class DeviceRegistry {
	private readonly log: SmartRentLogger;
	private readonly records = new Map<number, DeviceRecordView>();
	private readonly callbacks = new Map<number, DeviceUpdateCallback[]>();

	public constructor(log?: SmartRentLogger) {
		this.log = log ?? createConsoleLogger('smartrent-registry');
	}

	public has(deviceId: number): boolean {
		return this.records.has(deviceId);
	}

	public get(deviceId: number): DeviceRecordView | undefined {
		return this.records.get(deviceId);
	}

	public list(): DeviceRecordView[] {
		return [...this.records.values()];
	}

	public listByType(type: string): DeviceRecordView[] {
		return this.list().filter((record) => record.type === type);
	}

	/**
	 * Overwrite a device from a full HTTP snapshot, creating it when unknown.
	 * Subscribers are notified only when something actually changed.
	 */
	public async applySnapshot(deviceId: number, snapshot: DeviceSnapshot): Promise<boolean> {
		const current = this.records.get(deviceId);
		const attributes = this.buildAttributes(snapshot.attributes, current?.attributes ?? {});

		const next: DeviceRecordView = {
			id: deviceId,
			type: snapshot.type,
			displayName: snapshot.name,
			online: snapshot.online,
			batteryPowered: snapshot.batteryPowered,
			batteryLevel: snapshot.batteryLevel,
			attributes: Object.freeze(attributes),
		};

		const changed = !current ||
			current.type !== next.type ||
			current.displayName !== next.displayName ||
			current.online !== next.online ||
			current.batteryPowered !== next.batteryPowered ||
			current.batteryLevel !== next.batteryLevel ||
			!sameAttributes(current.attributes, next.attributes);

		if (!changed) {
			this.log.debug('SmartRent: snapshot for device %d unchanged.', deviceId);
			return false;
		}

		this.records.set(deviceId, next);
		this.log.debug('SmartRent: snapshot applied for %s (%d): %o', next.displayName, deviceId, next.attributes);
		await this.notify(next);
		return true;
	}

	/**
	 * Patch one attribute from a push event. Always notifies.
	 */
	public async applyEvent(deviceId: number, name: string, value: string | null): Promise<boolean> {
		const record = this.records.get(deviceId);
		if (!record) {
			this.log.debug('SmartRent: event %s for unknown device %d ignored.', name, deviceId);
			return false;
		}

		let next = record;
		const resolved = resolveAttribute(name, value, record.attributes[name]);
		if (resolved !== undefined) {
			next = { ...record, attributes: Object.freeze({ ...record.attributes, [name]: resolved }) };
			this.records.set(deviceId, next);
		} else {
			this.log.debug('SmartRent: event %s=%s for device %d carried no usable value.', name, String(value), deviceId);
		}

		await this.notify(next);
		return true;
	}

	public addCallback(deviceId: number, callback: DeviceUpdateCallback): () => void {
		const list = this.callbacks.get(deviceId) ?? [];
		list.push(callback);
		this.callbacks.set(deviceId, list);
		return () => this.removeCallback(deviceId, callback);
	}

	public removeCallback(deviceId: number, callback: DeviceUpdateCallback): void {
		const list = this.callbacks.get(deviceId);
		if (!list) {
			return;
		}
		const index = list.indexOf(callback);
		if (index >= 0) {
			list.splice(index, 1);
		}
		if (list.length === 0) {
			this.callbacks.delete(deviceId);
		}
	}

	private buildAttributes(entries: AttributeEntry[], prior: Readonly<Record<string, string>>): Record<string, string> {
		const attributes: Record<string, string> = {};
		for (const entry of entries) {
			const value = resolveAttribute(entry.name, entry.state, prior[entry.name]);
			if (value !== undefined) {
				attributes[entry.name] = value;
			}
		}
		return attributes;
	}

	private async notify(record: DeviceRecordView): Promise<void> {
		// Copy so callbacks can unregister themselves mid-loop.
		const list = [...(this.callbacks.get(record.id) ?? [])];
		for (const callback of list) {
			try {
				await callback(record);
			} catch (err) {
				this.log.error(
					'SmartRent: update callback for device %d threw: %s',
					record.id,
					describeError(err),
				);
			}
		}
	}
}
