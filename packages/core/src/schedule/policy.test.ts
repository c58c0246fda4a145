import { describe, test, expect } from 'vitest';
import { isPollInterval, isWithinWorkHours, shouldAutoFetch, type AutoFetchInput } from './policy.js';

function at(hour: number): Date {
	return new Date(2025, 5, 3, hour, 30);
}

const due: AutoFetchInput = {
	now: at(10),
	phase: 'idle',
	elapsedSinceLastFetchMs: 15 * 60_000,
	intervalMinutes: 15,
	workHourStart: 9,
	workHourEnd: 17,
};

describe('isWithinWorkHours', () => {
	test('start is inclusive and end exclusive', () => {
		expect(isWithinWorkHours(9, 9, 17)).toBe(true);
		expect(isWithinWorkHours(16, 9, 17)).toBe(true);
		expect(isWithinWorkHours(17, 9, 17)).toBe(false);
		expect(isWithinWorkHours(8, 9, 17)).toBe(false);
	});

	test('wraps midnight when start is after end', () => {
		expect(isWithinWorkHours(23, 22, 6)).toBe(true);
		expect(isWithinWorkHours(3, 22, 6)).toBe(true);
		expect(isWithinWorkHours(6, 22, 6)).toBe(false);
		expect(isWithinWorkHours(12, 22, 6)).toBe(false);
	});

	test('equal bounds never match', () => {
		expect(isWithinWorkHours(9, 9, 9)).toBe(false);
	});
});

describe('shouldAutoFetch', () => {
	test('fetches when idle, in hours and the interval has elapsed', () => {
		expect(shouldAutoFetch(due)).toBe(true);
	});

	test('not outside work hours', () => {
		expect(shouldAutoFetch({ ...due, now: at(20) })).toBe(false);
	});

	test('not while a fetch or login is running', () => {
		expect(shouldAutoFetch({ ...due, phase: 'fetching' })).toBe(false);
		expect(shouldAutoFetch({ ...due, phase: 'logging-in' })).toBe(false);
	});

	test('fetches from the error phase', () => {
		expect(shouldAutoFetch({ ...due, phase: 'error' })).toBe(true);
	});

	test('not before the interval has elapsed', () => {
		expect(shouldAutoFetch({ ...due, elapsedSinceLastFetchMs: 15 * 60_000 - 1 })).toBe(false);
	});
});

describe('isPollInterval', () => {
	test('accepts the offered intervals only', () => {
		expect([5, 10, 15, 30, 60].every(isPollInterval)).toBe(true);
		expect(isPollInterval(7)).toBe(false);
		expect(isPollInterval(0)).toBe(false);
	});
});
