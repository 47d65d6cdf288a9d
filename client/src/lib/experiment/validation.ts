/**
 * Client-side parameter validation, enforced before anything is sent.
 */

import { ValidationError } from './errors.js';
import {
	FREQUENCY_MAX_HZ,
	FREQUENCY_MIN_HZ,
	MAX_STEPS,
	TEMPERATURE_MAX_C,
	TEMPERATURE_MIN_C,
	type StepParams
} from './types.js';

export function validateFrequency(frequency: number): boolean {
	return frequency >= FREQUENCY_MIN_HZ && frequency <= FREQUENCY_MAX_HZ;
}

export function validateTemperature(temperature: number): boolean {
	return temperature >= TEMPERATURE_MIN_C && temperature <= TEMPERATURE_MAX_C;
}

export function isValidStep(step: number, maxSteps: number = MAX_STEPS): boolean {
	return Number.isInteger(step) && step >= 1 && step <= maxSteps;
}

/** Throw a ValidationError naming the first out-of-range field */
export function assertStepParams(params: StepParams): void {
	if (!validateTemperature(params.temperature)) {
		throw new ValidationError(
			'temperature',
			`Temperature must be between ${TEMPERATURE_MIN_C} and ${TEMPERATURE_MAX_C} °C`
		);
	}
	if (!validateFrequency(params.frequency)) {
		throw new ValidationError(
			'frequency',
			`Frequency must be between ${FREQUENCY_MIN_HZ} and ${FREQUENCY_MAX_HZ} Hz`
		);
	}
}

/** Parse a numeric form value; empty or non-numeric input becomes NaN */
export function parseNumericInput(value: string): number {
	const trimmed = value.trim();
	if (trimmed === '') return Number.NaN;
	return Number(trimmed.replace(',', '.'));
}
