import { describe, test, expect, beforeEach } from 'vitest';
import { UsageAlertTracker } from './alerts.js';
import { UsageSnapshot } from './snapshot.js';

const plain = UsageSnapshot.create({ lastModelName: 'gpt-4.1' });
const max = UsageSnapshot.create({ lastModelName: 'o3', isMaxMode: true });
const thinking = UsageSnapshot.create({ lastModelName: 'claude-4-sonnet-thinking', isThinkingMode: true });

describe('UsageAlertTracker', () => {
	let tracker: UsageAlertTracker;

	beforeEach(() => {
		tracker = new UsageAlertTracker({ onMaxMode: true, onThinkingMode: false });
	});

	test('alerts once when max mode appears', () => {
		expect(tracker.observe(plain)).toEqual([]);
		expect(tracker.observe(max)).toEqual([{ kind: 'max-mode', model: 'o3' }]);
		expect(tracker.observe(max)).toEqual([]);
	});

	test('re-arms after max mode goes away', () => {
		tracker.observe(max);
		tracker.observe(plain);
		expect(tracker.observe(max)).toHaveLength(1);
	});

	test('a missing snapshot changes nothing', () => {
		tracker.observe(max);
		expect(tracker.observe(undefined)).toEqual([]);
		expect(tracker.observe(max)).toEqual([]);
	});

	test('thinking mode alerts are off unless enabled', () => {
		expect(tracker.observe(thinking)).toEqual([]);

		const enabled = new UsageAlertTracker({ onMaxMode: false, onThinkingMode: true });
		expect(enabled.observe(thinking)).toEqual([
			{ kind: 'thinking-mode', model: 'claude-4-sonnet-thinking' },
		]);
		expect(enabled.observe(max)).toEqual([]);
	});

	test('reset forgets the previous reading', () => {
		tracker.observe(max);
		tracker.reset();
		expect(tracker.observe(max)).toHaveLength(1);
	});
});
