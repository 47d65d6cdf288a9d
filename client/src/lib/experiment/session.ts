/**
 * Experiment step state.
 *
 * Holds the three measurement steps and the experiment-wide flags as one
 * snapshot, exposed as a store for the view. Steps move
 *   pending → recording → processed
 * and only the server's minima move a step to processed; stopping a capture
 * leaves it in recording until they arrive.
 */

import { writable, type Readable, type Writable } from 'svelte/store';
import { TransportError, ValidationError } from './errors.js';
import {
	DEFAULT_MOLAR_MASS_KG_MOL,
	DEFAULT_PRESSURE_PA,
	DEFAULT_TEMPERATURE_C,
	MAX_STEPS,
	type Minimum,
	type SessionSnapshot,
	type StepParams,
	type StepRecord,
	type StepResult,
	type VerificationResult
} from './types.js';
import { assertStepParams, isValidStep } from './validation.js';
import type { StagePayload } from '../protocol/messages.js';

export interface ApplyMinimaResult {
	status: 'applied' | 'duplicate' | 'ignored';
	/** True only on the transition that first processed the last step */
	completed: boolean;
}

function createStep(stepNumber: number): StepRecord {
	return {
		stepNumber,
		frequency: null,
		temperature: null,
		minima: [],
		status: 'pending',
		confirmed: false
	};
}

function sameMinima(a: readonly Minimum[], b: readonly Minimum[]): boolean {
	return (
		a.length === b.length &&
		a.every((m, i) => m.position === b[i].position && m.amplitude === b[i].amplitude)
	);
}

export class ExperimentSession implements Readable<SessionSnapshot> {
	readonly maxSteps: number;
	private readonly store: Writable<SessionSnapshot>;
	private snapshot: SessionSnapshot;
	private allProcessedListeners: Array<(snapshot: SessionSnapshot) => void> = [];

	constructor(
		readonly experimentId: number,
		maxSteps: number = MAX_STEPS
	) {
		this.maxSteps = maxSteps;
		this.snapshot = this.initial();
		this.store = writable<SessionSnapshot>(this.snapshot);
	}

	subscribe(run: (value: SessionSnapshot) => void, invalidate?: () => void): () => void {
		return this.store.subscribe(run, invalidate);
	}

	get(): SessionSnapshot {
		return this.snapshot;
	}

	step(stepNumber: number): StepRecord | null {
		return isValidStep(stepNumber, this.maxSteps) ? this.snapshot.steps[stepNumber - 1] : null;
	}

	/** The step whose capture is running */
	activeStep(): StepRecord | null {
		const active = this.snapshot.activeCapture;
		return active === null ? null : this.step(active);
	}

	onAllStepsProcessed(listener: (snapshot: SessionSnapshot) => void): void {
		this.allProcessedListeners.push(listener);
	}

	/** Validate and mark a pending step as recording; throws a LabError */
	beginStep(stepNumber: number, params: StepParams, connected: boolean): StepRecord {
		const record = this.step(stepNumber);
		if (!record) {
			throw new ValidationError('step', `Step must be between 1 and ${this.maxSteps}`);
		}
		assertStepParams(params);
		if (!connected) {
			throw new TransportError('Not connected to the server');
		}
		if (this.snapshot.activeCapture !== null) {
			throw new ValidationError('step', `Step ${this.snapshot.activeCapture} is still recording`);
		}
		if (record.status !== 'pending') {
			throw new ValidationError('step', `Step ${stepNumber} has already been recorded`);
		}

		const updated: StepRecord = {
			...record,
			frequency: params.frequency,
			temperature: params.temperature,
			status: 'recording',
			confirmed: false
		};
		this.commit({
			steps: this.replaceStep(updated),
			currentStep: stepNumber,
			activeCapture: stepNumber
		});
		return updated;
	}

	/** Server acknowledged the step parameters */
	confirmStep(stepNumber: number): void {
		const record = this.step(stepNumber);
		if (!record || record.confirmed) return;
		this.commit({ steps: this.replaceStep({ ...record, confirmed: true }) });
	}

	/** Capture finished; the step waits in recording for its minima */
	endCapture(stepNumber: number): void {
		if (this.snapshot.activeCapture !== stepNumber) return;
		this.commit({ activeCapture: null });
	}

	/** Return a step whose capture failed to pending */
	abortStep(stepNumber: number): void {
		const record = this.step(stepNumber);
		if (!record) return;
		const activeCapture = this.snapshot.activeCapture === stepNumber ? null : this.snapshot.activeCapture;
		if (record.status !== 'recording') {
			this.commit({ activeCapture });
			return;
		}
		this.commit({
			steps: this.replaceStep({ ...record, status: 'pending', confirmed: false }),
			activeCapture
		});
	}

	applyMinima(stepNumber: number, minima: Minimum[]): ApplyMinimaResult {
		const record = this.step(stepNumber);
		if (!record) {
			console.warn(`[Session] Minima for unknown step ${stepNumber} ignored`);
			return { status: 'ignored', completed: false };
		}
		if (record.status === 'pending') {
			console.warn(`[Session] Minima for step ${stepNumber} before it was recorded, ignored`);
			return { status: 'ignored', completed: false };
		}
		if (record.status === 'processed' && sameMinima(record.minima, minima)) {
			return { status: 'duplicate', completed: false };
		}

		const completed = stepNumber === this.maxSteps && record.status !== 'processed';
		const steps = this.replaceStep({ ...record, minima: [...minima], status: 'processed' });
		const currentStep =
			stepNumber === this.snapshot.currentStep
				? Math.min(stepNumber + 1, this.maxSteps)
				: this.snapshot.currentStep;
		this.commit({ steps, currentStep });

		if (completed) {
			console.log(`[Session] Step ${stepNumber} processed, experiment complete`);
			for (const listener of this.allProcessedListeners) {
				listener(this.snapshot);
			}
		}
		return { status: 'applied', completed };
	}

	setSaving(isSaving: boolean): void {
		if (this.snapshot.isSaving === isSaving) return;
		this.commit({ isSaving });
	}

	setTemperature(temperature: number): void {
		this.commit({ params: { ...this.snapshot.params, temperature } });
	}

	markCompleted(results: StepResult[] = []): void {
		this.commit({
			completed: true,
			isSaving: false,
			finalResults: results.length > 0 ? results : this.snapshot.finalResults
		});
	}

	setVerification(result: VerificationResult): void {
		this.commit({ verification: result });
	}

	/** Stages for update_all_params / complete_experiment */
	buildStages(): StagePayload[] {
		const stages: StagePayload[] = [];
		for (const record of this.snapshot.steps) {
			if (record.frequency === null || record.minima.length === 0) continue;
			stages.push({
				step_number: record.stepNumber,
				frequency: record.frequency,
				data: record.minima.map((m) => m.position),
				labels: record.minima.map((_, i) => i + 1),
				raw_minima_data: record.minima.map((m) => ({
					distance_m: m.position,
					amplitude: m.amplitude
				}))
			});
		}
		return stages;
	}

	reset(): void {
		this.snapshot = this.initial();
		this.store.set(this.snapshot);
	}

	private replaceStep(updated: StepRecord): StepRecord[] {
		return this.snapshot.steps.map((s) => (s.stepNumber === updated.stepNumber ? updated : s));
	}

	private commit(changes: Partial<SessionSnapshot>): void {
		this.snapshot = { ...this.snapshot, ...changes };
		this.store.set(this.snapshot);
	}

	private initial(): SessionSnapshot {
		return {
			experimentId: this.experimentId,
			currentStep: 1,
			steps: Array.from({ length: this.maxSteps }, (_, i) => createStep(i + 1)),
			isSaving: false,
			activeCapture: null,
			params: {
				temperature: DEFAULT_TEMPERATURE_C,
				pressurePa: DEFAULT_PRESSURE_PA,
				molarMassKgMol: DEFAULT_MOLAR_MASS_KG_MOL
			},
			completed: false,
			finalResults: [],
			verification: null
		};
	}
}
