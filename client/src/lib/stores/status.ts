/**
 * Connection and equipment indicators.
 */

import { derived, writable, type Readable, type Writable } from 'svelte/store';
import type { RecorderStatus } from '../audio/types.js';
import type { TransportState } from '../transport/transport.js';

export type EquipmentStatus = 'disconnected' | 'connected' | 'simulated' | 'unavailable';

export interface LabStatus {
	connection: Writable<TransportState>;
	equipment: Writable<EquipmentStatus>;
	/** Latest sensor distance in mm; null after a sensor error */
	distance: Writable<{ value: number | null; error: boolean } | null>;
}

export function createLabStatus(): LabStatus {
	return {
		connection: writable<TransportState>('disconnected'),
		equipment: writable<EquipmentStatus>('disconnected'),
		distance: writable<{ value: number | null; error: boolean } | null>(null)
	};
}

const CONNECTION_LABELS: Record<TransportState, string> = {
	connecting: 'Connecting…',
	connected: 'Connected',
	disconnected: 'Disconnected',
	failed: 'Connection lost'
};

const EQUIPMENT_LABELS: Record<EquipmentStatus, string> = {
	disconnected: 'Sensor not connected',
	connected: 'Sensor connected',
	simulated: 'Simulated sensor',
	unavailable: 'Sensor unavailable'
};

const RECORDING_LABELS: Record<RecorderStatus, string> = {
	idle: 'Not recording',
	starting: 'Starting…',
	recording: 'Recording',
	stopping: 'Sending…'
};

export function connectionLabel(state: Readable<TransportState>): Readable<string> {
	return derived(state, ($state) => CONNECTION_LABELS[$state]);
}

export function equipmentLabel(state: Readable<EquipmentStatus>): Readable<string> {
	return derived(state, ($state) => EQUIPMENT_LABELS[$state]);
}

export function recordingLabel(state: Readable<RecorderStatus>): Readable<string> {
	return derived(state, ($state) => RECORDING_LABELS[$state]);
}

export function formatDistance(reading: { value: number | null; error: boolean } | null): string {
	if (!reading) return '-- mm';
	if (reading.error || reading.value === null) return '-- mm (error)';
	return `${reading.value.toFixed(1)} mm`;
}
