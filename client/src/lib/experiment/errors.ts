/**
 * Error taxonomy for the lab client.
 *
 * validation  - out-of-range user input; shown inline, never notified
 * device      - microphone / serial access failures; notified, falls back
 * transport   - socket closed or unreachable; notified, blocks sends
 * protocol    - malformed or unknown inbound data; logged only
 * server      - explicit `error` message from the backend; notified
 * internal    - anything else, usually a bug in the client; notified only
 */

export type LabErrorKind = 'validation' | 'device' | 'transport' | 'protocol' | 'server' | 'internal';

export class LabError extends Error {
	constructor(
		readonly kind: LabErrorKind,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'LabError';
	}
}

export type ValidationField = 'frequency' | 'temperature' | 'step' | 'speed' | 'gamma';

export class ValidationError extends LabError {
	constructor(
		readonly field: ValidationField,
		message: string
	) {
		super('validation', message);
		this.name = 'ValidationError';
	}
}

export type DeviceErrorReason = 'unsupported' | 'permission' | 'busy' | 'not-found' | 'read';

export class DeviceError extends LabError {
	constructor(
		readonly reason: DeviceErrorReason,
		message: string,
		options?: { cause?: unknown }
	) {
		super('device', message, options);
		this.name = 'DeviceError';
	}
}

export class TransportError extends LabError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('transport', message, options);
		this.name = 'TransportError';
	}
}

export class ProtocolError extends LabError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('protocol', message, options);
		this.name = 'ProtocolError';
	}
}

export class ServerError extends LabError {
	constructor(
		message: string,
		readonly step: number | null = null
	) {
		super('server', message);
		this.name = 'ServerError';
	}
}

const PERMISSION_ERRORS = new Set(['NotAllowedError', 'SecurityError']);
const BUSY_ERRORS = new Set(['NetworkError', 'InvalidStateError', 'NotReadableError']);

/** Normalize anything thrown by browser APIs into a LabError */
export function toLabError(err: unknown): LabError {
	if (err instanceof LabError) return err;

	if (err instanceof Error) {
		if (PERMISSION_ERRORS.has(err.name)) {
			return new DeviceError('permission', `Device access denied: ${err.message}`, { cause: err });
		}
		if (BUSY_ERRORS.has(err.name) || err.message.toLowerCase().includes('port is already open')) {
			return new DeviceError(
				'busy',
				'Device is busy. It may be held by another application or a previous session; reconnect it and try again.',
				{ cause: err }
			);
		}
		if (err.name === 'NotFoundError') {
			return new DeviceError('not-found', `No device selected: ${err.message}`, { cause: err });
		}
		// Other DOMExceptions still come from a browser device API
		if (typeof DOMException !== 'undefined' && err instanceof DOMException) {
			return new LabError('device', err.message, { cause: err });
		}
		return new LabError('internal', err.message, { cause: err });
	}

	return new LabError('internal', String(err));
}
