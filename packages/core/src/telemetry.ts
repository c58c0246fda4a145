import { createLogger } from './logging.js';

const logger = createLogger('perf');

export interface TimingResult<T> {
	result: T;
	durationMs: number;
}

export interface TimedOptions {
	/** Log at warn level when the operation takes longer than this */
	warnAfterMs?: number;
}

/**
 * Runs `fn` and reports how long it took. Durations go to the `perf` logger
 * at debug level, or at warn level past `warnAfterMs`.
 */
export async function timed<T>(
	label: string,
	fn: () => Promise<T>,
	options: TimedOptions = {},
): Promise<TimingResult<T>> {
	const start = performance.now();
	try {
		const result = await fn();
		const durationMs = performance.now() - start;
		report(label, durationMs, options.warnAfterMs);
		return { result, durationMs };
	} catch (error) {
		const durationMs = performance.now() - start;
		logger.debug(`${label}: FAILED after ${durationMs.toFixed(1)}ms`);
		throw error;
	}
}

function report(label: string, durationMs: number, warnAfterMs?: number): void {
	const line = `${label}: ${durationMs.toFixed(1)}ms`;
	if (warnAfterMs !== undefined && durationMs > warnAfterMs) {
		logger.warn(`${line} (slower than ${warnAfterMs}ms)`);
	} else {
		logger.debug(line);
	}
}
