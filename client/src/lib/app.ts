/**
 * Builds the experiment page's object graph.
 *
 * Everything browser-specific comes in through options so tests can run the
 * whole graph with in-process fakes.
 */

import { AudioCapture } from './audio/capture.js';
import type { CaptureDevices, CaptureUnit, StreamHandle } from './audio/types.js';
import { ExperimentController } from './experiment/controller.js';
import { ExperimentSession } from './experiment/session.js';
import { DistanceSensorReader, type SensorPort, type SensorPortProvider } from './sensor/reader.js';
import { createNotifier, type Notifier } from './stores/notifications.js';
import { createSettingsStore, type SettingsStorage, type SettingsStore } from './stores/settings.js';
import { createLabStatus, type LabStatus } from './stores/status.js';
import type { Timers } from './transport/retry.js';
import type { Transport } from './transport/transport.js';
import { WebSocketTransport, type SocketFactory } from './transport/websocket.js';

export interface ExperimentAppOptions<S extends StreamHandle> {
	experimentId: number;
	/** WebSocket endpoint, see experimentSocketUrl() */
	url: string;
	captureDevices: CaptureDevices<S>;
	createSocket?: SocketFactory;
	/** null when Web Serial is unavailable; defaults to navigator.serial */
	serialProvider?: SensorPortProvider | null;
	createSimulatedPort?: () => SensorPort;
	storage?: SettingsStorage | null;
	now?: () => number;
	timers?: Timers;
}

export interface ExperimentApp {
	controller: ExperimentController;
	session: ExperimentSession;
	transport: Transport;
	capture: CaptureUnit;
	sensor: DistanceSensorReader;
	notifier: Notifier;
	settings: SettingsStore;
	status: LabStatus;
}

export function createExperimentApp<S extends StreamHandle>(options: ExperimentAppOptions<S>): ExperimentApp {
	const settings = options.storage === undefined ? createSettingsStore() : createSettingsStore(options.storage);
	const notifier = createNotifier();
	const status = createLabStatus();
	const session = new ExperimentSession(options.experimentId);

	const transport = new WebSocketTransport({
		url: options.url,
		createSocket: options.createSocket,
		timers: options.timers
	});

	const capture = new AudioCapture<S>({
		transport,
		session,
		devices: options.captureDevices,
		now: options.now
	});

	const sensor = new DistanceSensorReader({
		provider: options.serialProvider,
		settings: settings.get,
		now: options.now,
		onReading: (reading) => status.distance.set({ value: reading.distance, error: reading.error })
	});

	const controller = new ExperimentController({
		session,
		transport,
		capture,
		sensor,
		notifier,
		settings,
		status,
		createSimulatedPort: options.createSimulatedPort
	});

	return { controller, session, transport, capture, sensor, notifier, settings, status };
}
