/**
 * Audio capture unit.
 *
 * Sets up: getUserMedia → recorder engine, one continuous recording per step.
 * Chunks stay in memory until stop(), when the whole recording is encoded
 * and sent as a single complete_audio message tagged with the step that was
 * active when capture started.
 */

import { writable, type Readable } from 'svelte/store';
import { DeviceError, TransportError, ValidationError, toLabError } from '../experiment/errors.js';
import type { DistanceSeries, StepRecord } from '../experiment/types.js';
import type { Transport } from '../transport/transport.js';
import { blobToBase64 } from './encoding.js';
import {
	AUDIO_FORMAT,
	type CaptureDevices,
	type CaptureUnit,
	type RecorderEngine,
	type RecorderStatus,
	type StreamHandle
} from './types.js';

export interface CaptureSession {
	/** The step whose capture is running */
	activeStep(): StepRecord | null;
}

export interface AudioCaptureOptions<S extends StreamHandle> {
	transport: Pick<Transport, 'isConnected' | 'send'>;
	session: CaptureSession;
	devices: CaptureDevices<S>;
	/** Milliseconds; used for the recording duration */
	now?: () => number;
}

interface ActiveRecording<S extends StreamHandle> {
	stream: S;
	engine: RecorderEngine;
	chunks: Blob[];
	stopped: Promise<void>;
	startedAt: number;
	step: number;
	frequency: number;
	temperature: number;
}

function releaseTracks(stream: StreamHandle): void {
	for (const track of stream.getTracks()) {
		track.stop();
	}
}

export class AudioCapture<S extends StreamHandle = MediaStream> implements CaptureUnit {
	private readonly transport: Pick<Transport, 'isConnected' | 'send'>;
	private readonly session: CaptureSession;
	private readonly devices: CaptureDevices<S>;
	private readonly now: () => number;
	private readonly _status = writable<RecorderStatus>('idle');
	private active: ActiveRecording<S> | null = null;
	private starting = false;
	// Bumped by cancel() so a start() still awaiting the microphone backs out
	private token = 0;

	constructor(options: AudioCaptureOptions<S>) {
		this.transport = options.transport;
		this.session = options.session;
		this.devices = options.devices;
		this.now = options.now ?? Date.now;
	}

	get status(): Readable<RecorderStatus> {
		return { subscribe: this._status.subscribe };
	}

	isRecording(): boolean {
		return this.active !== null;
	}

	async start(): Promise<void> {
		if (this.active || this.starting) {
			throw new DeviceError('busy', 'A recording is already in progress');
		}
		if (!this.transport.isConnected()) {
			throw new TransportError('Not connected to the server');
		}
		const record = this.session.activeStep();
		if (!record || record.frequency === null || record.temperature === null) {
			throw new ValidationError('step', 'No step is being recorded');
		}

		const token = ++this.token;
		this.starting = true;
		this._status.set('starting');
		let stream: S | null = null;
		try {
			stream = await this.devices.getStream();
			if (token !== this.token) {
				throw new DeviceError('read', 'Capture was cancelled before it started');
			}

			const engine = this.devices.createEngine(stream);
			const chunks: Blob[] = [];
			engine.onData((chunk) => {
				if (chunk.size > 0) chunks.push(chunk);
			});
			const stopped = new Promise<void>((resolve) => {
				engine.onStop(() => resolve());
				engine.onError((err) => {
					console.error('[Capture] Recorder error:', err);
					resolve();
				});
			});
			engine.start();

			this.active = {
				stream,
				engine,
				chunks,
				stopped,
				startedAt: this.now(),
				step: record.stepNumber,
				frequency: record.frequency,
				temperature: record.temperature
			};
			this._status.set('recording');
			console.log(`[Capture] Recording step ${record.stepNumber} (${engine.mimeType})`);
		} catch (err) {
			if (stream) releaseTracks(stream);
			this._status.set('idle');
			throw toLabError(err);
		} finally {
			this.starting = false;
		}
	}

	async stop(aux?: DistanceSeries): Promise<void> {
		const active = this.active;
		if (!active) {
			console.warn('[Capture] stop() with no recording in progress');
			return;
		}
		this.active = null;
		this._status.set('stopping');

		try {
			if (active.engine.state !== 'inactive') {
				active.engine.stop();
				await active.stopped;
			}
		} finally {
			releaseTracks(active.stream);
		}

		try {
			const duration = (this.now() - active.startedAt) / 1000;
			const blob = new Blob(active.chunks, { type: active.engine.mimeType });
			if (blob.size === 0) {
				throw new DeviceError('read', 'The recording is empty; check the microphone');
			}

			const data = await blobToBase64(blob);
			const sent = this.transport.send({
				type: 'complete_audio',
				data,
				format: AUDIO_FORMAT,
				step: active.step,
				frequency: active.frequency,
				temperature: active.temperature,
				duration,
				distances: aux?.distances ?? [],
				timestamps: aux?.timestamps ?? []
			});
			if (!sent) {
				throw new TransportError('Could not send the recording: not connected');
			}
			console.log(
				`[Capture] Sent step ${active.step}: ${blob.size} bytes, ${duration.toFixed(1)}s, ` +
					`${aux?.distances.length ?? 0} distance samples`
			);
		} finally {
			this._status.set('idle');
		}
	}

	cancel(): void {
		this.token++;
		const active = this.active;
		this.active = null;
		if (active) {
			if (active.engine.state !== 'inactive') {
				try {
					active.engine.stop();
				} catch (err) {
					console.warn('[Capture] Recorder did not stop cleanly:', err);
				}
			}
			releaseTracks(active.stream);
			console.log(`[Capture] Cancelled recording for step ${active.step}`);
		}
		this._status.set('idle');
	}
}
