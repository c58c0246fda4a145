import { nanoid } from 'nanoid';
import { TimeoutError } from './errors.js';

// ── ID generation ──

export function generateId(size = 12): string {
	return nanoid(size);
}

// ── Text utilities ──

export function sanitizeText(text: string): string {
	return text
		.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
		.replace(/\s+/g, ' ')
		.trim();
}

/**
 * Cuts `text` to `maxLength` characters and appends `suffix` when anything
 * was cut. The suffix is not counted against `maxLength`.
 */
export function clipText(text: string, maxLength: number, suffix = '...'): string {
	if (text.length <= maxLength) return text;
	return text.slice(0, maxLength) + suffix;
}

/**
 * Parses a figure such as `1,204` or `12.50`. Returns undefined for anything
 * that is not a finite number once separators are removed.
 */
export function parseFigure(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	const value = Number(raw.replace(/,/g, ''));
	return Number.isFinite(value) ? value : undefined;
}

// ── Errors ──

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Playwright raises `TimeoutError` (by name) for navigation and selector
 * waits; ours shares the name.
 */
export function isTimeoutError(error: unknown): boolean {
	if (error instanceof TimeoutError) return true;
	if (!(error instanceof Error)) return false;
	return error.name === 'TimeoutError' || error.message.includes('Timeout');
}

// ── Timing ──

export async function withDeadline<T>(
	promise: Promise<T>,
	ms: number,
	operation: string,
): Promise<T> {
	let handle: ReturnType<typeof setTimeout> | undefined;
	const timer = new Promise<never>((_, reject) => {
		handle = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
	});
	try {
		return await Promise.race([promise, timer]);
	} finally {
		clearTimeout(handle);
	}
}

/** Formats a local wall-clock time as `HH:MM`. */
export function formatClock(date: Date): string {
	const h = date.getHours().toString().padStart(2, '0');
	const m = date.getMinutes().toString().padStart(2, '0');
	return `${h}:${m}`;
}
