/**
 * Wire protocol between the lab client and the experiment server.
 *
 * One JSON object per WebSocket frame, discriminated by `type`.
 * Inbound frames are validated and normalized here so handlers only ever
 * see the typed variants below.
 */

import { ProtocolError } from '../experiment/errors.js';
import type { Minimum, StepResult, VerificationResult } from '../experiment/types.js';

// ── Client → server ─────────────────────────────────────────────────────────

export interface ExperimentParamsMessage {
	type: 'experiment_params';
	step: number;
	frequency: number;
	temperature: number;
}

export interface RecordingControlMessage {
	type: 'start_recording' | 'stop_recording';
	step: number;
}

export interface CompleteAudioMessage {
	type: 'complete_audio';
	/** Base64-encoded recording */
	data: string;
	format: string;
	step: number;
	frequency: number;
	temperature: number;
	/** Seconds */
	duration: number;
	distances: number[];
	timestamps: number[];
}

export interface StagePayload {
	step_number: number;
	frequency: number;
	/** Minima positions in metres */
	data: number[];
	/** Minimum index k = 1..n */
	labels: number[];
	raw_minima_data: Array<{ distance_m: number; amplitude: number }>;
}

export interface SaveParamsMessage {
	type: 'update_all_params' | 'complete_experiment';
	experiment_id: number;
	temperature: number;
	pressure_pa: number;
	molar_mass_kg_mol: number;
	stages: StagePayload[];
}

export interface FinalResultsMessage {
	type: 'final_results';
	studentSpeed: number;
	studentGamma: number;
}

export type OutboundMessage =
	| ExperimentParamsMessage
	| RecordingControlMessage
	| CompleteAudioMessage
	| SaveParamsMessage
	| FinalResultsMessage;

// ── Server → client ─────────────────────────────────────────────────────────

export interface StepConfirmationMessage {
	type: 'step_confirmation';
	step: number;
	status: string;
	frequency: number | null;
	temperature: number | null;
}

export interface RecordingStartedMessage {
	type: 'recording_started';
	step: number;
}

export interface RecordingStoppedMessage {
	type: 'recording_stopped';
	step: number;
}

export interface MinimaDataMessage {
	type: 'minima_data';
	step: number;
	minima: Minimum[];
	frequency: number | null;
	temperature: number | null;
}

export interface ParametersUpdatedMessage {
	type: 'parameters_updated';
	status: string;
	params: Record<string, unknown> | null;
	message: string | null;
}

export interface ExperimentCompleteMessage {
	type: 'experiment_complete';
	message: string | null;
	steps: StepResult[];
}

export interface VerificationResultMessage extends VerificationResult {
	type: 'verification_result';
}

export interface ServerErrorMessage {
	type: 'error';
	message: string;
	step: number | null;
	context: string | null;
}

export interface UnknownMessage {
	type: 'unknown';
	originalType: string;
	payload: Record<string, unknown>;
}

export type InboundMessage =
	| StepConfirmationMessage
	| RecordingStartedMessage
	| RecordingStoppedMessage
	| MinimaDataMessage
	| ParametersUpdatedMessage
	| ExperimentCompleteMessage
	| VerificationResultMessage
	| ServerErrorMessage
	| UnknownMessage;

export type InboundMessageType = InboundMessage['type'];

// Older server builds used these tags for the same messages
const TYPE_ALIASES: Record<string, string> = {
	parameters_updated_ack: 'parameters_updated',
	experiment_completed: 'experiment_complete'
};

// ── Parsing ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accept numbers and numeric strings (the server is not consistent) */
function toNumber(value: unknown): number | null {
	if (typeof value === 'number') return Number.isFinite(value) ? value : null;
	if (typeof value === 'string' && value.trim() !== '') {
		const n = Number(value);
		return Number.isFinite(n) ? n : null;
	}
	return null;
}

function toText(value: unknown): string | null {
	return typeof value === 'string' ? value : null;
}

function requireStep(payload: Record<string, unknown>, type: string): number {
	const step = toNumber(payload.step);
	if (step === null || !Number.isInteger(step)) {
		throw new ProtocolError(`${type}: missing or invalid step`);
	}
	return step;
}

function requireNumber(payload: Record<string, unknown>, key: string, type: string): number {
	const n = toNumber(payload[key]);
	if (n === null) throw new ProtocolError(`${type}: missing or invalid ${key}`);
	return n;
}

function parseMinimum(entry: unknown): Minimum | null {
	if (!isRecord(entry)) return null;
	const position = toNumber(entry.distance_m) ?? toNumber(entry.position);
	const amplitude = toNumber(entry.amplitude);
	if (position === null || amplitude === null) return null;
	return { position, amplitude };
}

function parseStepResults(value: unknown): StepResult[] {
	if (!Array.isArray(value)) return [];
	const results: StepResult[] = [];
	for (const entry of value) {
		if (!isRecord(entry)) continue;
		const step = toNumber(entry.step);
		const speed = toNumber(entry.speed);
		const gamma = toNumber(entry.gamma);
		if (step !== null && speed !== null && gamma !== null) {
			results.push({ step, speed, gamma });
		}
	}
	return results;
}

function parseErrorList(value: unknown): string[] {
	if (typeof value === 'string') return [value];
	if (Array.isArray(value)) return value.filter((e): e is string => typeof e === 'string');
	if (isRecord(value)) {
		return Object.values(value).filter((e): e is string => typeof e === 'string');
	}
	return [];
}

/**
 * Parse one inbound frame.
 * Throws ProtocolError for malformed frames; unrecognized types are returned
 * as an `unknown` variant so the router can log and skip them.
 */
export function parseInboundMessage(text: string): InboundMessage {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		throw new ProtocolError('Inbound frame is not valid JSON', { cause: err });
	}

	if (!isRecord(raw)) throw new ProtocolError('Inbound frame is not a JSON object');
	if (typeof raw.type !== 'string' || raw.type === '') {
		throw new ProtocolError('Inbound frame has no type');
	}

	const type = TYPE_ALIASES[raw.type] ?? raw.type;

	switch (type) {
		case 'step_confirmation':
			return {
				type: 'step_confirmation',
				step: requireStep(raw, type),
				status: toText(raw.status) ?? '',
				frequency: toNumber(raw.frequency),
				temperature: toNumber(raw.temperature)
			};

		case 'recording_started':
			return { type: 'recording_started', step: requireStep(raw, type) };

		case 'recording_stopped':
			return { type: 'recording_stopped', step: requireStep(raw, type) };

		case 'minima_data': {
			if (!Array.isArray(raw.minima)) throw new ProtocolError('minima_data: minima is not a list');
			const minima: Minimum[] = [];
			for (const entry of raw.minima) {
				const m = parseMinimum(entry);
				if (!m) throw new ProtocolError('minima_data: malformed minimum');
				minima.push(m);
			}
			return {
				type: 'minima_data',
				step: requireStep(raw, type),
				minima,
				frequency: toNumber(raw.frequency),
				temperature: toNumber(raw.temperature)
			};
		}

		case 'parameters_updated':
			return {
				type: 'parameters_updated',
				status: toText(raw.status) ?? '',
				params: isRecord(raw.params) ? raw.params : null,
				message: toText(raw.message)
			};

		case 'experiment_complete':
			return {
				type: 'experiment_complete',
				message: toText(raw.message),
				steps: parseStepResults(raw.steps)
			};

		case 'verification_result':
			return {
				type: 'verification_result',
				isValid: raw.is_valid === true,
				studentSpeed: requireNumber(raw, 'student_speed', type),
				systemSpeed: requireNumber(raw, 'system_speed', type),
				studentGamma: requireNumber(raw, 'student_gamma', type),
				systemGamma: requireNumber(raw, 'system_gamma', type),
				speedError: toNumber(raw.speed_error),
				gammaErrorSystem: toNumber(raw.gamma_error_system),
				gammaErrorReference: toNumber(raw.gamma_error_reference),
				errors: parseErrorList(raw.errors)
			};

		case 'error': {
			const step = toNumber(raw.step);
			return {
				type: 'error',
				message: toText(raw.message) ?? 'Unknown server error',
				step: step !== null && Number.isInteger(step) ? step : null,
				context: toText(raw.context)
			};
		}

		default:
			return { type: 'unknown', originalType: raw.type, payload: raw };
	}
}

export function serializeMessage(message: OutboundMessage): string {
	return JSON.stringify(message);
}
