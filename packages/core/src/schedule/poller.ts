import type { ScheduleConfig } from '../config/types.js';
import { POLL_INTERVALS } from '../config/types.js';
import { ConfigError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { SessionStateView } from '../session/state.js';
import { isPollInterval, shouldAutoFetch } from './policy.js';

const logger = createLogger('poller');

/** The part of the session worker the poller drives. */
export interface FetchTarget {
	requestFetch(): boolean;
	getSnapshot(): SessionStateView;
}

export interface PollerOptions {
	target: FetchTarget;
	schedule: ScheduleConfig;
	/** Delay before the first fetch after `start()`. Defaults to 2 s. */
	startupDelayMs?: number;
	tickIntervalMs?: number;
	now?: () => Date;
}

/**
 * Drives periodic fetches: one shortly after start, then whenever the
 * scheduling policy says the interval has elapsed inside work hours.
 */
export class Poller {
	private readonly target: FetchTarget;
	private readonly schedule: ScheduleConfig;
	private readonly startupDelayMs: number;
	private readonly tickIntervalMs: number;
	private readonly now: () => Date;

	private intervalMinutes: number;
	private lastRequestAt: number;
	private startupTimer: ReturnType<typeof setTimeout> | null = null;
	private tickTimer: ReturnType<typeof setInterval> | null = null;

	constructor(options: PollerOptions) {
		this.target = options.target;
		this.schedule = options.schedule;
		this.startupDelayMs = options.startupDelayMs ?? 2000;
		this.tickIntervalMs = options.tickIntervalMs ?? 1000;
		this.now = options.now ?? (() => new Date());
		this.intervalMinutes = options.schedule.pollIntervalMinutes;
		this.lastRequestAt = this.now().getTime();
	}

	get isRunning(): boolean {
		return this.tickTimer !== null;
	}

	get pollIntervalMinutes(): number {
		return this.intervalMinutes;
	}

	/** Milliseconds until the interval elapses; 0 once it is due. */
	get msUntilDue(): number {
		const elapsed = this.now().getTime() - this.lastRequestAt;
		return Math.max(0, this.intervalMinutes * 60_000 - elapsed);
	}

	start(): void {
		if (this.tickTimer) return;

		this.lastRequestAt = this.now().getTime();
		this.startupTimer = setTimeout(() => {
			this.startupTimer = null;
			this.refreshNow();
		}, this.startupDelayMs);
		this.tickTimer = setInterval(() => this.tick(), this.tickIntervalMs);
		logger.debug(`Polling every ${this.intervalMinutes} min`);
	}

	stop(): void {
		if (this.startupTimer) {
			clearTimeout(this.startupTimer);
			this.startupTimer = null;
		}
		if (this.tickTimer) {
			clearInterval(this.tickTimer);
			this.tickTimer = null;
		}
	}

	/** Requests a fetch now and restarts the interval. */
	refreshNow(): boolean {
		this.lastRequestAt = this.now().getTime();
		return this.target.requestFetch();
	}

	setIntervalMinutes(minutes: number): void {
		if (!isPollInterval(minutes)) {
			throw new ConfigError('schedule.pollIntervalMinutes', [
				`expected one of ${POLL_INTERVALS.join(', ')}, got ${minutes}`,
			]);
		}
		this.intervalMinutes = minutes;
		this.lastRequestAt = this.now().getTime();
		logger.info(`Poll interval set to ${minutes} min`);
	}

	/** One scheduling decision; returns whether a fetch was requested. */
	tick(): boolean {
		const now = this.now();
		const due = shouldAutoFetch({
			now,
			phase: this.target.getSnapshot().phase,
			elapsedSinceLastFetchMs: now.getTime() - this.lastRequestAt,
			intervalMinutes: this.intervalMinutes,
			workHourStart: this.schedule.workHourStart,
			workHourEnd: this.schedule.workHourEnd,
		});
		if (!due) return false;

		this.lastRequestAt = now.getTime();
		logger.debug('Interval elapsed; requesting fetch');
		this.target.requestFetch();
		return true;
	}
}
