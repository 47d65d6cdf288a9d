/**
 * Audio capture types for the resonance lab.
 */

import type { Readable } from 'svelte/store';
import type { DistanceSeries } from '../experiment/types.js';

/** Capture parameters expected by the server's decoder */
export const SAMPLE_RATE = 44_100;
export const CHANNEL_COUNT = 1;
export const AUDIO_MIME_TYPE = 'audio/webm;codecs=opus';
export const AUDIO_BITS_PER_SECOND = 128_000;
/** `format` field of complete_audio */
export const AUDIO_FORMAT = 'webm';

/** Capture state, mirrored into a store for the recording indicator */
export type RecorderStatus = 'idle' | 'starting' | 'recording' | 'stopping';

/** The part of a MediaStream the capture unit touches */
export interface StreamHandle {
	getTracks(): Array<{ stop(): void }>;
}

/**
 * Recorder wrapped behind callbacks, so a MediaRecorder and a test double
 * look the same to the capture unit.
 */
export interface RecorderEngine {
	readonly mimeType: string;
	readonly state: RecordingState;
	start(): void;
	stop(): void;
	onData(callback: (chunk: Blob) => void): void;
	onStop(callback: () => void): void;
	onError(callback: (error: unknown) => void): void;
}

/** Where the microphone stream and its recorder come from */
export interface CaptureDevices<S extends StreamHandle> {
	getStream(): Promise<S>;
	createEngine(stream: S): RecorderEngine;
}

export interface CaptureUnit {
	readonly status: Readable<RecorderStatus>;
	isRecording(): boolean;
	/** Acquire the microphone and start one continuous recording */
	start(): Promise<void>;
	/** Finish the recording and send it, with optional sensor samples attached */
	stop(aux?: DistanceSeries): Promise<void>;
	/** Release everything without sending */
	cancel(): void;
}
