import { POLL_INTERVALS } from '../config/types.js';
import { SessionPhase } from '../session/state.js';

export type PollInterval = (typeof POLL_INTERVALS)[number];

export function isPollInterval(value: number): value is PollInterval {
	return POLL_INTERVALS.some((interval) => interval === value);
}

/**
 * Whether `hour` falls in `[start, end)`. A window whose start is after its
 * end runs across midnight; equal bounds describe an empty window.
 */
export function isWithinWorkHours(hour: number, start: number, end: number): boolean {
	if (start === end) return false;
	if (start < end) return hour >= start && hour < end;
	return hour >= start || hour < end;
}

export interface AutoFetchInput {
	now: Date;
	phase: SessionPhase;
	elapsedSinceLastFetchMs: number;
	intervalMinutes: number;
	workHourStart: number;
	workHourEnd: number;
}

export function shouldAutoFetch(input: AutoFetchInput): boolean {
	if (!isWithinWorkHours(input.now.getHours(), input.workHourStart, input.workHourEnd)) {
		return false;
	}
	if (input.phase === SessionPhase.Fetching || input.phase === SessionPhase.LoggingIn) {
		return false;
	}
	return input.elapsedSinceLastFetchMs >= input.intervalMinutes * 60_000;
}
