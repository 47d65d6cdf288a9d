export { createExperimentApp, type ExperimentApp, type ExperimentAppOptions } from './app.js';
export { AudioCapture } from './audio/capture.js';
export { getMicrophoneStream, isMicrophoneSupported } from './audio/context.js';
export { browserCaptureDevices, createMediaRecorderEngine } from './audio/recorder.js';
export type { CaptureDevices, CaptureUnit, RecorderEngine, RecorderStatus } from './audio/types.js';
export { ExperimentController, type ActionResult } from './experiment/controller.js';
export * from './experiment/errors.js';
export * from './experiment/physics.js';
export { ExperimentSession, type ApplyMinimaResult } from './experiment/session.js';
export * from './experiment/types.js';
export * from './experiment/validation.js';
export * from './protocol/messages.js';
export { MessageRouter, type MessageHandlers } from './protocol/router.js';
export { parseSensorLine, parsePortSelector, portMatches } from './sensor/protocol.js';
export {
	DistanceSensorReader,
	browserSerialProvider,
	type SensorPort,
	type SensorPortProvider,
	type SensorReading
} from './sensor/reader.js';
export { SimulatedSerialPort } from './sensor/simulated-port.js';
export { createNotifier, type Notifier, type Notification } from './stores/notifications.js';
export { createSettingsStore, defaultSettings, type Settings, type SettingsStore } from './stores/settings.js';
export { createLabStatus, type EquipmentStatus, type LabStatus } from './stores/status.js';
export { BoundedRetry } from './transport/retry.js';
export type { Transport, TransportState } from './transport/transport.js';
export { WebSocketTransport, browserSocketFactory, experimentSocketUrl } from './transport/websocket.js';
export { bindExperimentView, stepButtonLabel, type ViewDependencies } from './ui/view.js';
