/**
 * Experiment controller.
 *
 * Coordinates the session, the transport, audio capture and the distance
 * sensor. Every user action and every server message goes through here;
 * the view only reads stores and calls these methods.
 */

import type { CaptureUnit } from '../audio/types.js';
import type { OutboundMessage } from '../protocol/messages.js';
import { MessageRouter, type MessageHandlers } from '../protocol/router.js';
import type { DistanceSensorReader, SensorPort } from '../sensor/reader.js';
import { SimulatedSerialPort } from '../sensor/simulated-port.js';
import type { Notifier } from '../stores/notifications.js';
import type { SettingsStore } from '../stores/settings.js';
import type { LabStatus } from '../stores/status.js';
import type { Transport, TransportState } from '../transport/transport.js';
import { LabError, ServerError, TransportError, ValidationError, toLabError } from './errors.js';
import type { ExperimentSession } from './session.js';
import { TEMPERATURE_MAX_C, TEMPERATURE_MIN_C, type StepParams } from './types.js';
import { validateTemperature } from './validation.js';

export type ActionResult = { ok: true } | { ok: false; error: LabError };

export interface ExperimentControllerOptions {
	session: ExperimentSession;
	transport: Transport;
	capture: CaptureUnit;
	sensor: DistanceSensorReader;
	notifier: Notifier;
	settings: SettingsStore;
	status: LabStatus;
	createSimulatedPort?: () => SensorPort;
}

export class ExperimentController {
	readonly session: ExperimentSession;
	private readonly transport: Transport;
	private readonly capture: CaptureUnit;
	private readonly sensor: DistanceSensorReader;
	private readonly notifier: Notifier;
	private readonly settings: SettingsStore;
	private readonly status: LabStatus;
	private readonly createSimulatedPort: () => SensorPort;
	private readonly router: MessageRouter;
	private stopping: number | null = null;
	// Step whose microphone is still opening, and whether a stop arrived meanwhile
	private starting: number | null = null;
	private stopRequested = false;
	private completionPending = false;
	private connectionLostNotified = false;

	constructor(options: ExperimentControllerOptions) {
		this.session = options.session;
		this.transport = options.transport;
		this.capture = options.capture;
		this.sensor = options.sensor;
		this.notifier = options.notifier;
		this.settings = options.settings;
		this.status = options.status;
		this.createSimulatedPort = options.createSimulatedPort ?? (() => new SimulatedSerialPort());

		this.router = new MessageRouter(this.createHandlers(), {
			onHandlerError: (err) => {
				this.session.setSaving(false);
				this.notifier.notify('error', `Could not process a server message: ${toLabError(err).message}`);
			}
		});
		this.router.attach(this.transport);
		this.transport.onStateChange((state) => this.handleTransportState(state));

		this.sensor.setAutoStop({ requestStop: () => this.stopActiveStep() });
		this.sensor.setDisconnectHandler((error) => this.handleSensorLost(error));
		this.session.onAllStepsProcessed(() => this.requestCompletion());
	}

	// ── Connection ─────────────────────────────────────────────────────────

	async connect(): Promise<boolean> {
		try {
			await this.transport.connect();
			return true;
		} catch (err) {
			this.notifier.notify('error', toLabError(err).message);
			return false;
		}
	}

	async dispose(): Promise<void> {
		this.releaseActiveCapture();
		this.transport.disconnect();
		await this.sensor.disconnect();
	}

	// ── Steps ──────────────────────────────────────────────────────────────

	async startStep(step: number, params: StepParams): Promise<ActionResult> {
		try {
			this.session.beginStep(step, params, this.transport.isConnected());
		} catch (err) {
			const error = toLabError(err);
			if (!(error instanceof ValidationError)) this.notifier.notify('error', error.message);
			return { ok: false, error };
		}

		if (!this.sensor.isConnected()) {
			this.notifier.notify('warning', 'No distance sensor connected; only audio will be recorded');
		}

		let serverRecording = false;
		try {
			this.sendOrThrow({
				type: 'experiment_params',
				step,
				frequency: params.frequency,
				temperature: params.temperature
			});
			this.sendOrThrow({ type: 'start_recording', step });
			serverRecording = true;
			if (this.sensor.isConnected()) this.sensor.startRecording();
			this.starting = step;
			await this.capture.start();
			this.starting = null;
			console.log(`[Controller] Step ${step} recording at ${params.frequency} Hz, ${params.temperature} °C`);
		} catch (err) {
			const error = toLabError(err);
			this.starting = null;
			this.stopRequested = false;
			if (this.sensor.isRecording()) this.sensor.stopRecording();
			if (serverRecording) this.transport.send({ type: 'stop_recording', step });
			this.session.abortStep(step);
			this.notifier.notify('error', `Could not start step ${step}: ${error.message}`);
			return { ok: false, error };
		}

		if (this.stopRequested) {
			this.stopRequested = false;
			console.log(`[Controller] Step ${step} was stopped while the microphone opened`);
			await this.stopStep(step);
		}
		return { ok: true };
	}

	/**
	 * Stop a step's capture and send its audio with the drained sensor
	 * samples. The stop button and the sensor's auto-stop both land here.
	 */
	async stopStep(step: number): Promise<ActionResult> {
		if (this.session.get().activeCapture !== step || this.stopping !== null) {
			return { ok: true };
		}
		if (this.starting === step) {
			this.stopRequested = true;
			return { ok: true };
		}
		this.stopping = step;
		const errors: LabError[] = [];

		const drained = this.sensor.isRecording() ? this.sensor.stopRecording() : undefined;
		let captured = true;
		try {
			await this.capture.stop(drained);
		} catch (err) {
			captured = false;
			errors.push(toLabError(err));
		}

		if (!this.transport.send({ type: 'stop_recording', step })) {
			errors.push(new TransportError('Could not notify the server that recording stopped'));
		}

		// Without audio the server never sends minima, so let the step be redone
		if (captured) {
			this.session.endCapture(step);
		} else {
			this.session.abortStep(step);
		}
		this.stopping = null;

		for (const error of errors) {
			this.notifier.notify('error', `Step ${step}: ${error.message}`);
		}
		return errors.length === 0 ? { ok: true } : { ok: false, error: errors[0] };
	}

	/** Stop whichever step is capturing; wired as the sensor's auto-stop */
	async stopActiveStep(): Promise<ActionResult> {
		const active = this.session.get().activeCapture;
		if (active === null) return { ok: true };
		return this.stopStep(active);
	}

	setTemperature(temperature: number): ActionResult {
		if (!validateTemperature(temperature)) {
			return {
				ok: false,
				error: new ValidationError(
					'temperature',
					`Temperature must be between ${TEMPERATURE_MIN_C} and ${TEMPERATURE_MAX_C} °C`
				)
			};
		}
		this.session.setTemperature(temperature);
		return { ok: true };
	}

	// ── Sensor ─────────────────────────────────────────────────────────────

	connectSensor(): Promise<boolean> {
		return this.openSensor(() => this.sensor.connect());
	}

	connectSensorToPort(path: string): Promise<boolean> {
		this.settings.update((s) => ({ ...s, portPath: path }));
		return this.openSensor(() => this.sensor.connectToPort(path));
	}

	async disconnectSensor(): Promise<void> {
		await this.sensor.disconnect();
		this.status.equipment.set('disconnected');
	}

	async useSimulation(): Promise<void> {
		await this.sensor.attach(this.createSimulatedPort());
		this.status.equipment.set('simulated');
		this.notifier.notify('warning', 'Using a simulated distance sensor');
	}

	// ── Saving ─────────────────────────────────────────────────────────────

	saveParams(): boolean {
		return this.sendStages('update_all_params');
	}

	completeExperiment(): boolean {
		return this.sendStages('complete_experiment');
	}

	submitResults(speed: number, gamma: number): ActionResult {
		if (!Number.isFinite(speed)) {
			return { ok: false, error: new ValidationError('speed', 'Enter the speed of sound as a number') };
		}
		if (!Number.isFinite(gamma)) {
			return { ok: false, error: new ValidationError('gamma', 'Enter γ as a number') };
		}
		if (!this.transport.send({ type: 'final_results', studentSpeed: speed, studentGamma: gamma })) {
			const error = new TransportError('Could not submit results: not connected to the server');
			this.notifier.notify('error', error.message);
			return { ok: false, error };
		}
		return { ok: true };
	}

	// ── Internals ──────────────────────────────────────────────────────────

	private sendStages(type: 'update_all_params' | 'complete_experiment'): boolean {
		const snapshot = this.session.get();
		if (snapshot.isSaving) {
			console.warn(`[Controller] ${type} ignored: a save is already in progress`);
			return false;
		}

		const stages = this.session.buildStages();
		if (type === 'update_all_params' && stages.length === 0) {
			console.warn('[Controller] No processed steps to save');
			this.notifier.notify('warning', 'No processed steps to save yet');
			return false;
		}

		this.session.setSaving(true);
		const sent = this.transport.send({
			type,
			experiment_id: snapshot.experimentId,
			temperature: snapshot.params.temperature,
			pressure_pa: snapshot.params.pressurePa,
			molar_mass_kg_mol: snapshot.params.molarMassKgMol,
			stages
		});
		if (!sent) {
			this.session.setSaving(false);
			this.notifier.notify('error', 'Could not save: not connected to the server');
		}
		return sent;
	}

	private sendOrThrow(message: OutboundMessage): void {
		if (!this.transport.send(message)) {
			throw new TransportError(`Could not send ${message.type}: not connected to the server`);
		}
	}

	private async openSensor(open: () => Promise<void>): Promise<boolean> {
		try {
			await open();
			this.status.equipment.set('connected');
			this.notifier.notify('success', 'Distance sensor connected');
			return true;
		} catch (err) {
			const error = toLabError(err);
			this.notifier.notify('error', error.message);
			await this.fallBack(error);
			return false;
		}
	}

	private async fallBack(error: LabError): Promise<void> {
		if (error.kind !== 'device' || !this.settings.get().simulateWhenUnavailable) {
			this.status.equipment.set(this.sensor.isSupported() ? 'disconnected' : 'unavailable');
			return;
		}
		try {
			await this.useSimulation();
		} catch (err) {
			console.error('[Controller] Simulated sensor failed to start:', err);
			this.status.equipment.set('unavailable');
		}
	}

	private handleSensorLost(error: LabError | null): void {
		this.status.equipment.set('disconnected');
		this.status.distance.set(null);
		if (!error) return;
		this.notifier.notify('error', error.message);
		this.fallBack(error).catch((err: unknown) => {
			console.error('[Controller] Sensor fallback failed:', err);
		});
	}

	private handleTransportState(state: TransportState): void {
		this.status.connection.set(state);
		if (state === 'connected') {
			this.connectionLostNotified = false;
			return;
		}
		if (state !== 'failed' || this.connectionLostNotified) return;

		this.connectionLostNotified = true;
		this.notifier.notify('error', 'Connection to the server was lost. Reload the page to reconnect.');
		this.session.setSaving(false);
		this.completionPending = false;
		// A new server session will never send minima for earlier audio
		for (const record of this.session.get().steps) {
			if (record.status === 'recording') this.releaseStep(record.stepNumber);
		}
	}

	private releaseActiveCapture(): void {
		const active = this.session.get().activeCapture;
		if (active !== null) this.releaseStep(active);
	}

	/** Cancel a step's capture if it is running and return it to pending */
	private releaseStep(step: number): void {
		if (this.session.get().activeCapture === step) {
			this.capture.cancel();
			if (this.sensor.isRecording()) this.sensor.stopRecording();
		}
		this.session.abortStep(step);
	}

	private requestCompletion(): void {
		if (this.session.get().isSaving) {
			console.log('[Controller] All steps processed; completing once the current save finishes');
			this.completionPending = true;
			return;
		}
		this.completeExperiment();
	}

	private savingFinished(): void {
		this.session.setSaving(false);
		if (!this.completionPending) return;
		this.completionPending = false;
		this.completeExperiment();
	}

	private createHandlers(): MessageHandlers {
		return {
			step_confirmation: (message) => {
				console.log(`[Controller] Step ${message.step} confirmed (${message.status})`);
				this.session.confirmStep(message.step);
			},
			recording_started: (message) => {
				console.log(`[Controller] Server recording step ${message.step}`);
			},
			recording_stopped: (message) => {
				console.log(`[Controller] Server stopped recording step ${message.step}`);
			},
			minima_data: (message) => {
				const result = this.session.applyMinima(message.step, message.minima);
				if (result.status === 'applied') {
					this.notifier.notify(
						'info',
						`Step ${message.step}: ${message.minima.length} minima found`
					);
				}
			},
			parameters_updated: (message) => {
				this.savingFinished();
				if (message.status === 'success') {
					const temperature = message.params?.temperature_celsius;
					if (typeof temperature === 'number' && Number.isFinite(temperature)) {
						this.session.setTemperature(temperature);
					}
					this.notifier.notify('success', message.message ?? 'Parameters saved');
				} else if (message.status === 'error') {
					this.notifier.notify('error', message.message ?? 'Saving parameters failed');
				} else {
					console.warn(`[Controller] Unexpected parameters_updated status: ${message.status}`);
				}
			},
			experiment_complete: (message) => {
				this.session.markCompleted(message.steps);
				this.notifier.notify('success', message.message ?? 'Experiment complete');
			},
			verification_result: (message) => {
				this.session.setVerification(message);
				this.notifier.notify(
					message.isValid ? 'success' : 'warning',
					message.isValid
						? 'Your results match the measured values'
						: 'Your results differ from the measured values'
				);
			},
			error: (message) => {
				const error = new ServerError(message.message, message.step);
				if (error.step !== null && this.session.step(error.step)?.status === 'recording') {
					this.releaseStep(error.step);
				}
				this.notifier.notify(
					'error',
					error.step === null ? error.message : `Step ${error.step}: ${error.message}`
				);
				this.savingFinished();
			}
		};
	}
}
