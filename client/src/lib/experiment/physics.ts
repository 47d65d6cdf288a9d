/**
 * Speed of sound and heat capacity ratio from resonance minima.
 *
 * Adjacent minima in a resonance tube are half a wavelength apart, so
 *   v = 2 * mean(Δx) * f
 * and for an ideal gas
 *   γ = v² * M / (R * T)
 */

import { DEFAULT_MOLAR_MASS_KG_MOL, type SessionSnapshot } from './types.js';

/** Molar gas constant, J/(mol·K) */
export const GAS_CONSTANT = 8.314;

const KELVIN_OFFSET = 273.15;

/** Returns null when fewer than two minima are available */
export function speedFromMinima(positionsM: readonly number[], frequencyHz: number): number | null {
	if (positionsM.length < 2) return null;

	const sorted = [...positionsM].sort((a, b) => a - b);
	let total = 0;
	for (let i = 1; i < sorted.length; i++) {
		total += sorted[i] - sorted[i - 1];
	}
	const halfWavelength = total / (sorted.length - 1);
	return 2 * halfWavelength * frequencyHz;
}

export function gammaFromSpeed(
	speed: number,
	temperatureC: number,
	molarMassKgMol: number = DEFAULT_MOLAR_MASS_KG_MOL
): number {
	return (speed * speed * molarMassKgMol) / (GAS_CONSTANT * (temperatureC + KELVIN_OFFSET));
}

/** Signed relative deviation in percent */
export function percentError(measured: number, reference: number): number {
	return ((measured - reference) / reference) * 100;
}

export interface StepEstimate {
	step: number;
	speed: number | null;
	gamma: number | null;
}

/** Local per-step estimates for steps that have minima */
export function estimateSteps(snapshot: SessionSnapshot): StepEstimate[] {
	return snapshot.steps.map((record) => {
		if (record.frequency === null || record.minima.length < 2) {
			return { step: record.stepNumber, speed: null, gamma: null };
		}
		const speed = speedFromMinima(
			record.minima.map((m) => m.position),
			record.frequency
		);
		const temperature = record.temperature ?? snapshot.params.temperature;
		return {
			step: record.stepNumber,
			speed,
			gamma: speed === null ? null : gammaFromSpeed(speed, temperature, snapshot.params.molarMassKgMol)
		};
	});
}
