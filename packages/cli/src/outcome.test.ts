import { describe, test, expect } from 'vitest';
import type { SessionStateView } from '@dashmeter/core';
import { isSettled } from './outcome.js';

function state(fields: Partial<SessionStateView> = {}): SessionStateView {
	return { phase: 'idle', isAuthenticated: false, ...fields };
}

describe('isSettled', () => {
	test('a finished fetch settles', () => {
		expect(isSettled(state({ isAuthenticated: true }), state({ phase: 'fetching' }))).toBe(true);
		expect(isSettled(state({ phase: 'error', lastError: 'Page load timeout' }), state({ phase: 'fetching' }))).toBe(
			true,
		);
	});

	test('a successful login waits for its fetch', () => {
		expect(isSettled(state({ isAuthenticated: true }), state({ phase: 'logging-in' }))).toBe(false);
		expect(isSettled(state({ phase: 'fetching', isAuthenticated: true }), state({ isAuthenticated: true }))).toBe(
			false,
		);
	});

	test('a failed or abandoned login settles', () => {
		expect(isSettled(state({ phase: 'error', lastError: 'Login timeout - please try again' }), state({ phase: 'logging-in' }))).toBe(true);
		expect(isSettled(state(), state({ phase: 'logging-in' }))).toBe(true);
	});

	test('starting work does not settle', () => {
		expect(isSettled(state({ phase: 'fetching' }), state())).toBe(false);
		expect(isSettled(state({ phase: 'logging-in' }), state())).toBe(false);
	});
});
