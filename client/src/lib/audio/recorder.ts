/**
 * MediaRecorder behind the RecorderEngine interface.
 */

import { getMicrophoneStream } from './context.js';
import {
	AUDIO_BITS_PER_SECOND,
	AUDIO_MIME_TYPE,
	type CaptureDevices,
	type RecorderEngine
} from './types.js';

export function createMediaRecorderEngine(stream: MediaStream): RecorderEngine {
	const options: MediaRecorderOptions = { audioBitsPerSecond: AUDIO_BITS_PER_SECOND };
	if (MediaRecorder.isTypeSupported(AUDIO_MIME_TYPE)) {
		options.mimeType = AUDIO_MIME_TYPE;
	} else {
		console.warn(`[Recorder] ${AUDIO_MIME_TYPE} not supported, using the browser default`);
	}
	const recorder = new MediaRecorder(stream, options);

	return {
		get mimeType() {
			return recorder.mimeType || AUDIO_MIME_TYPE;
		},
		get state() {
			return recorder.state;
		},
		// No timeslice: one dataavailable with the whole recording on stop
		start: () => recorder.start(),
		stop: () => recorder.stop(),
		onData: (callback) => recorder.addEventListener('dataavailable', (event) => callback(event.data)),
		onStop: (callback) => recorder.addEventListener('stop', () => callback()),
		onError: (callback) => recorder.addEventListener('error', (event) => callback(event))
	};
}

export const browserCaptureDevices: CaptureDevices<MediaStream> = {
	getStream: getMicrophoneStream,
	createEngine: createMediaRecorderEngine
};
