/**
 * User settings store, persisted to localStorage.
 */

import { writable, type Readable } from 'svelte/store';

export interface Settings {
	/** Subtracted from every raw sensor distance, in mm */
	calibrationOffsetMm: number;
	/** Serial baud rate of the distance sensor */
	baudRate: number;
	/** Last port selector typed into the connect form */
	portPath: string;
	/** Fall back to the simulated sensor when no device can be opened */
	simulateWhenUnavailable: boolean;
}

export const SETTINGS_STORAGE_KEY = 'resonance-lab-settings';

export const defaultSettings: Settings = {
	calibrationOffsetMm: 0,
	baudRate: 9600,
	portPath: '',
	simulateWhenUnavailable: true
};

export interface SettingsStore extends Readable<Settings> {
	set(value: Settings): void;
	update(fn: (s: Settings) => Settings): void;
	/** Current value without subscribing */
	get(): Settings;
}

/** Keep only known keys whose type matches the default */
function sanitize(saved: unknown): Partial<Settings> {
	if (typeof saved !== 'object' || saved === null) return {};
	const result: Partial<Settings> = {};
	const entries = new Map(Object.entries(saved));

	const offset = entries.get('calibrationOffsetMm');
	if (typeof offset === 'number' && Number.isFinite(offset)) result.calibrationOffsetMm = offset;
	const baudRate = entries.get('baudRate');
	if (typeof baudRate === 'number' && Number.isInteger(baudRate) && baudRate > 0) result.baudRate = baudRate;
	const portPath = entries.get('portPath');
	if (typeof portPath === 'string') result.portPath = portPath;
	const simulate = entries.get('simulateWhenUnavailable');
	if (typeof simulate === 'boolean') result.simulateWhenUnavailable = simulate;

	return result;
}

export type SettingsStorage = Pick<Storage, 'getItem' | 'setItem'>;

export function createSettingsStore(
	storage: SettingsStorage | null = typeof localStorage !== 'undefined' ? localStorage : null
): SettingsStore {
	// Load from storage if available
	let initial = defaultSettings;
	if (storage) {
		try {
			const saved = storage.getItem(SETTINGS_STORAGE_KEY);
			if (saved) {
				initial = { ...defaultSettings, ...sanitize(JSON.parse(saved)) };
			}
		} catch (err) {
			console.warn('[Settings] Ignoring unreadable saved settings:', err);
		}
	}

	let current = initial;
	const { subscribe, set } = writable<Settings>(initial);

	function persist(value: Settings): void {
		current = value;
		set(value);
		if (!storage) return;
		try {
			storage.setItem(SETTINGS_STORAGE_KEY, JSON.stringify(value));
		} catch (err) {
			console.warn('[Settings] Could not save settings:', err);
		}
	}

	return {
		subscribe,
		set: persist,
		update(fn: (s: Settings) => Settings) {
			persist(fn(current));
		},
		get: () => current
	};
}
