import type { UsageSnapshot } from './snapshot.js';

export type UsageAlertKind = 'max-mode' | 'thinking-mode';

export interface UsageAlert {
	kind: UsageAlertKind;
	model: string;
}

export interface UsageAlertOptions {
	onMaxMode: boolean;
	onThinkingMode: boolean;
}

/**
 * Turns a stream of snapshots into one alert per occurrence: an alert fires
 * when a mode flag goes from off to on and re-arms once it goes off again.
 */
export class UsageAlertTracker {
	private maxModeSeen = false;
	private thinkingModeSeen = false;

	constructor(private readonly options: UsageAlertOptions) {}

	observe(snapshot: UsageSnapshot | undefined): UsageAlert[] {
		if (!snapshot) return [];

		const alerts: UsageAlert[] = [];

		if (snapshot.isMaxMode && !this.maxModeSeen && this.options.onMaxMode) {
			alerts.push({ kind: 'max-mode', model: snapshot.displayModel });
		}
		if (snapshot.isThinkingMode && !this.thinkingModeSeen && this.options.onThinkingMode) {
			alerts.push({ kind: 'thinking-mode', model: snapshot.displayModel });
		}

		this.maxModeSeen = snapshot.isMaxMode;
		this.thinkingModeSeen = snapshot.isThinkingMode;
		return alerts;
	}

	reset(): void {
		this.maxModeSeen = false;
		this.thinkingModeSeen = false;
	}
}
