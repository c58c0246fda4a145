import { describe, test, expect } from 'vitest';
import { UsageSnapshot, type SessionStateView } from '@dashmeter/core';
import { renderIndicator, renderStatus, renderTitle, renderUsage } from './status.js';

const usage = UsageSnapshot.create({
	includedUsed: 412,
	includedTotal: 500,
	onDemandUsed: 12.5,
	onDemandLimit: 100,
	lastModelName: 'claude-4-sonnet-thinking',
	lastRequestTimestamp: '2025-06-03T10:41:00Z',
	isThinkingMode: true,
});

function state(fields: Partial<SessionStateView> = {}): SessionStateView {
	return { phase: 'idle', isAuthenticated: false, ...fields };
}

describe('renderIndicator', () => {
	test('shows remaining requests and the last update', () => {
		expect(
			renderIndicator(state({ isAuthenticated: true, lastSnapshot: usage, lastFetchTime: '10:42' })),
		).toBe('C 88 ● Updated at 10:42');
	});

	test('starts out ready with no figures', () => {
		expect(renderIndicator(state())).toBe('C -- ● Ready');
	});
});

describe('renderTitle', () => {
	test('shows what the worker is doing before figures exist', () => {
		expect(renderTitle(state({ phase: 'fetching' }))).toBe('C ⏳');
		expect(renderTitle(state({ phase: 'logging-in' }))).toBe('C 🔑');
	});

	test('distinguishes signed out from other errors', () => {
		expect(renderTitle(state({ lastError: 'Please login' }))).toBe('C ?');
		expect(renderTitle(state({ phase: 'error', isAuthenticated: true, lastError: 'Page load timeout' }))).toBe(
			'C ⚠️',
		);
	});

	test('keeps the last figures while fetching', () => {
		expect(renderTitle(state({ phase: 'fetching', lastSnapshot: usage }))).toBe('C 88');
	});
});

describe('renderStatus', () => {
	test('prefers the running phase over an old error', () => {
		expect(renderStatus(state({ phase: 'fetching', lastError: 'Page load timeout' }))).toBe('⏳ Fetching...');
		expect(renderStatus(state({ phase: 'logging-in' }))).toBe('🔑 Waiting for login...');
	});

	test('shows the error text', () => {
		expect(renderStatus(state({ phase: 'error', lastError: 'Page load timeout', lastFetchTime: '09:00' }))).toBe(
			'⚠️ Page load timeout',
		);
	});
});

describe('renderUsage', () => {
	test('formats every figure', () => {
		expect(renderUsage(usage)).toEqual([
			['Included', '412/500 (82.4%)'],
			['On-Demand', '$12.50 / $100.00'],
			['Model', 'claude-4-sonnet-thinking'],
			['Time', '2025-06-03T10:41:00Z'],
			['Thinking', 'Yes (2x requests)'],
			['Max Mode', 'No'],
		]);
	});

	test('shortens long model names', () => {
		const long = UsageSnapshot.create({ lastModelName: 'a-very-long-model-name-with-many-parts-v2' });
		const model = renderUsage(long).find(([label]) => label === 'Model');
		expect(model).toEqual(['Model', 'a-very-long-model-name-with-many...']);
	});

	test('placeholders before the first fetch', () => {
		expect(renderUsage(undefined)[0]).toEqual(['Included', '--/--']);
	});
});
