import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors.js';
import {
	assertStepParams,
	isValidStep,
	parseNumericInput,
	validateFrequency,
	validateTemperature
} from './validation.js';

describe('validateFrequency', () => {
	it('accepts the inclusive bounds', () => {
		expect(validateFrequency(1000)).toBe(true);
		expect(validateFrequency(6000)).toBe(true);
	});

	it('rejects values just outside the range', () => {
		expect(validateFrequency(999)).toBe(false);
		expect(validateFrequency(6001)).toBe(false);
	});

	it('rejects NaN', () => {
		expect(validateFrequency(Number.NaN)).toBe(false);
	});
});

describe('validateTemperature', () => {
	it('accepts the inclusive bounds', () => {
		expect(validateTemperature(10)).toBe(true);
		expect(validateTemperature(40)).toBe(true);
	});

	it('rejects values just outside the range', () => {
		expect(validateTemperature(9.9)).toBe(false);
		expect(validateTemperature(40.1)).toBe(false);
	});
});

describe('isValidStep', () => {
	it('accepts 1..maxSteps only', () => {
		expect(isValidStep(1)).toBe(true);
		expect(isValidStep(3)).toBe(true);
		expect(isValidStep(0)).toBe(false);
		expect(isValidStep(4)).toBe(false);
		expect(isValidStep(1.5)).toBe(false);
	});
});

describe('assertStepParams', () => {
	it('passes valid parameters', () => {
		expect(() => assertStepParams({ frequency: 1500, temperature: 20 })).not.toThrow();
	});

	it('names the temperature field first when both are invalid', () => {
		try {
			assertStepParams({ frequency: 50, temperature: 80 });
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(ValidationError);
			if (err instanceof ValidationError) expect(err.field).toBe('temperature');
		}
	});

	it('names the frequency field', () => {
		expect(() => assertStepParams({ frequency: 7000, temperature: 20 })).toThrow(
			'Frequency must be between 1000 and 6000 Hz'
		);
	});
});

describe('parseNumericInput', () => {
	it('parses plain and comma-decimal numbers', () => {
		expect(parseNumericInput(' 1500 ')).toBe(1500);
		expect(parseNumericInput('21,5')).toBe(21.5);
	});

	it('returns NaN for empty or non-numeric input', () => {
		expect(parseNumericInput('')).toBeNaN();
		expect(parseNumericInput('abc')).toBeNaN();
	});
});
