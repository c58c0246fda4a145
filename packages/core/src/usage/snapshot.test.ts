import { describe, test, expect } from 'vitest';
import { UsageSnapshot } from './snapshot.js';
import { SchemaViolationError } from '../errors.js';

describe('UsageSnapshot', () => {
	test('defaults to zero figures and no model', () => {
		const snapshot = UsageSnapshot.create();
		expect(snapshot.includedUsed).toBe(0);
		expect(snapshot.includedTotal).toBe(0);
		expect(snapshot.onDemandUsed).toBe(0);
		expect(snapshot.onDemandLimit).toBe(0);
		expect(snapshot.isThinkingMode).toBe(false);
		expect(snapshot.isMaxMode).toBe(false);
		expect(snapshot.displayModel).toBe('Unknown');
	});

	test('is frozen', () => {
		const snapshot = UsageSnapshot.create({ includedUsed: 3, includedTotal: 10 });
		expect(Object.isFrozen(snapshot)).toBe(true);
	});

	describe('includedPercentage', () => {
		test('is used over total', () => {
			const snapshot = UsageSnapshot.create({ includedUsed: 125, includedTotal: 500 });
			expect(snapshot.includedPercentage).toBe(25);
		});

		test('is zero when the total is zero', () => {
			const snapshot = UsageSnapshot.create({ includedUsed: 5, includedTotal: 0 });
			expect(snapshot.includedPercentage).toBe(0);
		});
	});

	test('includedRemaining goes negative on overrun', () => {
		const snapshot = UsageSnapshot.create({ includedUsed: 510, includedTotal: 500 });
		expect(snapshot.includedRemaining).toBe(-10);
	});

	test('rejects negative figures', () => {
		expect(() => UsageSnapshot.create({ includedUsed: -1 })).toThrow(SchemaViolationError);
	});

	test('rejects fractional request counts', () => {
		expect(() => UsageSnapshot.create({ includedTotal: 2.5 })).toThrow(SchemaViolationError);
	});

	test('toJSON carries every figure', () => {
		const snapshot = UsageSnapshot.create({
			includedUsed: 1,
			includedTotal: 2,
			onDemandUsed: 0.5,
			onDemandLimit: 20,
			lastModelName: 'gpt-4.1',
			lastRequestTimestamp: '2025-06-03T10:41:00Z',
			isMaxMode: true,
		});
		expect(JSON.parse(JSON.stringify(snapshot))).toEqual({
			includedUsed: 1,
			includedTotal: 2,
			onDemandUsed: 0.5,
			onDemandLimit: 20,
			lastModelName: 'gpt-4.1',
			lastRequestTimestamp: '2025-06-03T10:41:00Z',
			isThinkingMode: false,
			isMaxMode: true,
		});
	});
});
