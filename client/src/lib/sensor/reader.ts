/**
 * Distance sensor reader over Web Serial.
 *
 *   disconnected → idle ⇄ recording → disconnected
 *
 * Every valid line is reported through onReading for the live display.
 * Between startRecording() and stopRecording() the calibrated samples are
 * also buffered with timestamps relative to the first sample of the
 * segment, to be attached to the step's audio.
 */

import { DeviceError, LabError, toLabError } from '../experiment/errors.js';
import { AUTO_STOP_DISTANCE_MM, type DistanceSeries } from '../experiment/types.js';
import type { Settings } from '../stores/settings.js';
import { parsePortSelector, parseSensorLine, portMatches, type SensorPortInfo } from './protocol.js';

/** The part of a Web Serial SerialPort the reader uses */
export interface SensorPort {
	readonly readable: ReadableStream<Uint8Array> | null;
	open(options: { baudRate: number }): Promise<void>;
	close(): Promise<void>;
	getInfo(): SensorPortInfo;
}

export interface SensorPortProvider {
	requestPort(): Promise<SensorPort>;
	getPorts(): Promise<SensorPort[]>;
}

export type SensorState = 'disconnected' | 'idle' | 'recording';

export interface SensorReading {
	/** Calibrated distance in mm; null when the sensor reported an error */
	distance: number | null;
	error: boolean;
	/** Sample time in ms (device timestamp, or the reader's clock) */
	time: number;
	rawValue: number;
}

export interface AutoStopHooks {
	/** The controller's stop path; the same one the stop button uses */
	requestStop?: () => void | Promise<unknown>;
	/** Used when requestStop is not wired; receives the drained segment */
	fallbackStop?: (series: DistanceSeries) => void;
}

export type SensorSettings = Pick<Settings, 'calibrationOffsetMm' | 'baudRate'>;

export interface DistanceSensorReaderOptions {
	/** Defaults to navigator.serial when the browser has it */
	provider?: SensorPortProvider | null;
	/** Read on every sample so calibration changes apply immediately */
	settings: () => SensorSettings;
	now?: () => number;
	onReading?: (reading: SensorReading) => void;
	/** Port lost or stream ended; error is null for a clean end of stream */
	onDisconnect?: (error: LabError | null) => void;
	autoStop?: AutoStopHooks;
	autoStopDistanceMm?: number;
}

const LOG_INTERVAL_MS = 1000;

export function browserSerialProvider(): SensorPortProvider | null {
	if (typeof navigator === 'undefined' || !('serial' in navigator)) return null;
	return navigator.serial;
}

export class DistanceSensorReader {
	private readonly provider: SensorPortProvider | null;
	private readonly settings: () => SensorSettings;
	private readonly now: () => number;
	private readonly onReading: (reading: SensorReading) => void;
	private onDisconnect: (error: LabError | null) => void;
	private readonly autoStopDistanceMm: number;
	private autoStop: AutoStopHooks;

	private port: SensorPort | null = null;
	private reader: ReadableStreamDefaultReader<Uint8Array> | null = null;
	private loop: Promise<void> | null = null;
	private closing = false;
	private _state: SensorState = 'disconnected';

	private distances: number[] = [];
	private timestamps: number[] = [];
	private originMs: number | null = null;
	private autoStopLatched = false;
	private lastLogAt = Number.NEGATIVE_INFINITY;

	constructor(options: DistanceSensorReaderOptions) {
		this.provider = options.provider === undefined ? browserSerialProvider() : options.provider;
		this.settings = options.settings;
		this.now = options.now ?? Date.now;
		this.onReading = options.onReading ?? (() => {});
		this.onDisconnect = options.onDisconnect ?? (() => {});
		this.autoStop = options.autoStop ?? {};
		this.autoStopDistanceMm = options.autoStopDistanceMm ?? AUTO_STOP_DISTANCE_MM;
	}

	get state(): SensorState {
		return this._state;
	}

	isConnected(): boolean {
		return this._state !== 'disconnected';
	}

	isRecording(): boolean {
		return this._state === 'recording';
	}

	isSupported(): boolean {
		return this.provider !== null;
	}

	setAutoStop(hooks: AutoStopHooks): void {
		this.autoStop = hooks;
	}

	setDisconnectHandler(handler: (error: LabError | null) => void): void {
		this.onDisconnect = handler;
	}

	/** Prompt the user for a port and open it */
	async connect(): Promise<void> {
		const provider = this.requireProvider();
		let port: SensorPort;
		try {
			port = await provider.requestPort();
		} catch (err) {
			throw toLabError(err);
		}
		await this.attach(port);
	}

	/** Open an already-authorized port chosen by USB ids or path */
	async connectToPort(path: string, baudRate?: number): Promise<void> {
		const provider = this.requireProvider();
		const selector = parsePortSelector(path);
		let ports: SensorPort[];
		try {
			ports = await provider.getPorts();
		} catch (err) {
			throw toLabError(err);
		}
		const port = ports.find((p) => portMatches(p.getInfo(), selector));
		if (!port) {
			throw new DeviceError(
				'not-found',
				`No authorized serial port matches "${path}". Use "Connect equipment" to grant access first.`
			);
		}
		await this.attach(port, baudRate);
	}

	/** Open a port that is already chosen (also used for the simulated port) */
	async attach(port: SensorPort, baudRate: number = this.settings().baudRate): Promise<void> {
		if (this.port) await this.disconnect();

		try {
			await port.open({ baudRate });
		} catch (err) {
			throw toLabError(err);
		}
		if (!port.readable) {
			await this.closePort(port);
			throw new DeviceError('read', 'Serial port opened without a readable stream');
		}

		const reader = port.readable.getReader();
		this.port = port;
		this.reader = reader;
		this.closing = false;
		this._state = 'idle';
		this.loop = this.readLoop(port, reader);
		console.log(`[Sensor] Connected at ${baudRate} baud`, port.getInfo());
	}

	async disconnect(): Promise<void> {
		const port = this.port;
		if (!port) return;

		this.closing = true;
		const reader = this.reader;
		if (reader) {
			try {
				await reader.cancel();
			} catch (err) {
				console.warn('[Sensor] Reader cancel failed:', err);
			}
		}
		if (this.loop) await this.loop;
		if (reader) this.releaseReader(reader);
		await this.closePort(port);
		this.reset();
		console.log('[Sensor] Disconnected');
	}

	/** Begin a recording segment; returns false when no sensor is connected */
	startRecording(): boolean {
		if (!this.isConnected()) {
			console.warn('[Sensor] Cannot record: sensor not connected');
			return false;
		}
		this.clearSegment();
		this._state = 'recording';
		return true;
	}

	/** End the segment and hand over its samples; a second call returns empty arrays */
	stopRecording(): DistanceSeries {
		const series = { distances: this.distances, timestamps: this.timestamps };
		this.clearSegment();
		if (this._state === 'recording') this._state = 'idle';
		return series;
	}

	/** Feed one raw line; the read loop calls this for every line received */
	handleLine(line: string): void {
		const parsed = parseSensorLine(line);
		switch (parsed.kind) {
			case 'distance':
				this.handleSample(parsed.value, parsed.timestamp ?? this.now(), true);
				return;
			case 'legacy':
				this.handleSample(parsed.value, this.now(), false);
				return;
			case 'ignored':
				if (line.trim() !== '') console.warn(`[Sensor] Ignoring line (${parsed.reason})`);
				return;
		}
	}

	private handleSample(rawValue: number, time: number, recordable: boolean): void {
		if (rawValue < 0) {
			this.onReading({ distance: null, error: true, time, rawValue });
			return;
		}

		const distance = rawValue - this.settings().calibrationOffsetMm;
		this.onReading({ distance, error: false, time, rawValue });
		this.logThrottled(distance);

		if (!recordable || this._state !== 'recording') return;

		if (this.originMs === null) this.originMs = time;
		this.distances.push(distance);
		this.timestamps.push((time - this.originMs) / 1000);
		this.checkAutoStop(distance);
	}

	private checkAutoStop(distance: number): void {
		if (distance <= this.autoStopDistanceMm) {
			this.autoStopLatched = false;
			return;
		}
		if (this.autoStopLatched) return;
		this.autoStopLatched = true;

		console.warn(
			`[Sensor] Distance ${distance.toFixed(1)} mm is beyond ${this.autoStopDistanceMm} mm, stopping recording`
		);
		const { requestStop, fallbackStop } = this.autoStop;
		if (requestStop) {
			try {
				const result = requestStop();
				if (result instanceof Promise) {
					result.catch((err: unknown) => console.error('[Sensor] Auto-stop failed:', err));
				}
			} catch (err) {
				console.error('[Sensor] Auto-stop failed:', err);
			}
			return;
		}
		const drained = this.stopRecording();
		fallbackStop?.(drained);
	}

	private async readLoop(
		port: SensorPort,
		reader: ReadableStreamDefaultReader<Uint8Array>
	): Promise<void> {
		const decoder = new TextDecoder();
		let buffer = '';
		try {
			for (;;) {
				const { value, done } = await reader.read();
				if (done) break;
				buffer += decoder.decode(value, { stream: true });
				let newline = buffer.indexOf('\n');
				while (newline >= 0) {
					this.handleLine(buffer.slice(0, newline));
					buffer = buffer.slice(newline + 1);
					newline = buffer.indexOf('\n');
				}
			}
			if (!this.closing && this.port === port) {
				console.warn('[Sensor] Serial stream ended');
				await this.release(port, reader);
				this.onDisconnect(null);
			}
		} catch (err) {
			if (this.closing || this.port !== port) return;
			const error = new DeviceError('read', 'Lost connection to the distance sensor', { cause: err });
			console.error('[Sensor] Read failed:', err);
			await this.release(port, reader);
			this.onDisconnect(error);
		}
	}

	/** Tear down after the read loop itself ended */
	private async release(port: SensorPort, reader: ReadableStreamDefaultReader<Uint8Array>): Promise<void> {
		try {
			await reader.cancel();
		} catch (err) {
			console.warn('[Sensor] Reader cancel failed:', err);
		}
		this.releaseReader(reader);
		await this.closePort(port);
		this.reset();
	}

	private releaseReader(reader: ReadableStreamDefaultReader<Uint8Array>): void {
		try {
			reader.releaseLock();
		} catch (err) {
			console.warn('[Sensor] Reader release failed:', err);
		}
	}

	private async closePort(port: SensorPort): Promise<void> {
		try {
			await port.close();
		} catch (err) {
			console.warn('[Sensor] Port close failed:', err);
		}
	}

	private reset(): void {
		this.port = null;
		this.reader = null;
		this.loop = null;
		this.closing = false;
		this._state = 'disconnected';
		this.clearSegment();
	}

	private clearSegment(): void {
		this.distances = [];
		this.timestamps = [];
		this.originMs = null;
		this.autoStopLatched = false;
	}

	private logThrottled(distance: number): void {
		const now = this.now();
		if (now - this.lastLogAt < LOG_INTERVAL_MS) return;
		this.lastLogAt = now;
		console.log(`[Sensor] ${distance.toFixed(1)} mm${this.isRecording() ? ' (recording)' : ''}`);
	}

	private requireProvider(): SensorPortProvider {
		if (!this.provider) {
			throw new DeviceError('unsupported', 'Web Serial is not available in this browser; use Chrome or Edge');
		}
		return this.provider;
	}
}
