/**
 * Microphone access.
 *
 * The server analyses raw amplitude, so every browser-side processing
 * stage (AEC, AGC, NS) is disabled.
 */

import { DeviceError, toLabError } from '../experiment/errors.js';
import { CHANNEL_COUNT, SAMPLE_RATE } from './types.js';

export function isMicrophoneSupported(): boolean {
	return (
		typeof navigator !== 'undefined' &&
		typeof navigator.mediaDevices?.getUserMedia === 'function' &&
		typeof MediaRecorder !== 'undefined'
	);
}

/**
 * Request microphone access with all processing disabled.
 * Returns a MediaStream for mono audio capture.
 */
export async function getMicrophoneStream(): Promise<MediaStream> {
	if (!isMicrophoneSupported()) {
		throw new DeviceError('unsupported', 'This browser cannot record audio');
	}
	try {
		return await navigator.mediaDevices.getUserMedia({
			audio: {
				echoCancellation: false,
				autoGainControl: false,
				noiseSuppression: false,
				channelCount: CHANNEL_COUNT,
				sampleRate: SAMPLE_RATE
			},
			video: false
		});
	} catch (err) {
		throw toLabError(err);
	}
}
