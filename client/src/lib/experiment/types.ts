/**
 * Experiment model types and fixed lab constants.
 */

/** Number of measurement steps in one experiment */
export const MAX_STEPS = 3;

export const FREQUENCY_MIN_HZ = 1000;
export const FREQUENCY_MAX_HZ = 6000;
export const TEMPERATURE_MIN_C = 10;
export const TEMPERATURE_MAX_C = 40;

/** Probe positions beyond this are outside the tube; recording auto-stops */
export const AUTO_STOP_DISTANCE_MM = 500;

export const DEFAULT_TEMPERATURE_C = 20;
export const DEFAULT_PRESSURE_PA = 101_325;
export const DEFAULT_MOLAR_MASS_KG_MOL = 0.0289644;

/** Heat capacity ratio of dry air */
export const REFERENCE_GAMMA = 1.4;

export type StepStatus = 'pending' | 'recording' | 'processed';

/** One detected resonance minimum */
export interface Minimum {
	/** Probe position in metres */
	position: number;
	amplitude: number;
}

export interface StepRecord {
	stepNumber: number;
	/** Hz, null until the step is started */
	frequency: number | null;
	/** °C, null until the step is started */
	temperature: number | null;
	minima: Minimum[];
	status: StepStatus;
	/** Server acknowledged the step parameters */
	confirmed: boolean;
}

export interface StepParams {
	frequency: number;
	temperature: number;
}

/** Experiment-wide physical parameters sent with saved stages */
export interface ExperimentParams {
	temperature: number;
	pressurePa: number;
	molarMassKgMol: number;
}

/** Per-step values computed by the server when the experiment completes */
export interface StepResult {
	step: number;
	speed: number;
	gamma: number;
}

export interface VerificationResult {
	isValid: boolean;
	studentSpeed: number;
	systemSpeed: number;
	studentGamma: number;
	systemGamma: number;
	speedError: number | null;
	gammaErrorSystem: number | null;
	gammaErrorReference: number | null;
	errors: string[];
}

export interface SessionSnapshot {
	experimentId: number;
	currentStep: number;
	steps: StepRecord[];
	isSaving: boolean;
	/** Step whose audio/sensor capture is running, if any */
	activeCapture: number | null;
	params: ExperimentParams;
	completed: boolean;
	finalResults: StepResult[];
	verification: VerificationResult | null;
}

/** Distance samples drained from the sensor for one recording window */
export interface DistanceSeries {
	/** Calibrated distances in mm */
	distances: number[];
	/** Seconds since the first sample of the window */
	timestamps: number[];
}
