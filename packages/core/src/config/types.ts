import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

export const DEFAULT_TARGET_URL = 'https://cursor.com/en-US/dashboard?tab=usage';
export const DEFAULT_AUTH_MARKER = 'Included-Request Usage';

/** Polling intervals, in minutes, offered to the user. */
export const POLL_INTERVALS = [5, 10, 15, 30, 60] as const;

export function defaultHomeDir(): string {
	return path.join(os.homedir(), '.dashmeter');
}

export const ScheduleConfigSchema = z.object({
	pollIntervalMinutes: z.number().int().positive().default(15),
	/** First hour (0–23) in which automatic fetches run */
	workHourStart: z.number().int().min(0).max(23).default(9),
	/** Hour (0–24) at which automatic fetches stop; wraps midnight when below the start */
	workHourEnd: z.number().int().min(0).max(24).default(17),
}).strict();

export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;

export const TimingConfigSchema = z.object({
	queuePollIntervalMs: z.number().int().positive().default(1000),
	loginPollIntervalMs: z.number().int().positive().default(2000),
	loginTimeoutMs: z.number().int().positive().default(300_000),
	loginNavigationTimeoutMs: z.number().int().positive().default(60_000),
	navigationTimeoutMs: z.number().int().positive().default(30_000),
	markerTimeoutMs: z.number().int().positive().default(10_000),
	settleDelayMs: z.number().int().nonnegative().default(2000),
	stopTimeoutMs: z.number().int().positive().default(5000),
	maxErrorLength: z.number().int().positive().default(50),
}).strict();

export type TimingConfig = z.infer<typeof TimingConfigSchema>;

export const BrowserConfigSchema = z.object({
	windowWidth: z.number().int().min(100).max(4096).default(1280),
	windowHeight: z.number().int().min(100).max(4096).default(800),
	extraArgs: z.array(z.string()).default([]),
	browserBinaryPath: z.string().optional(),
	channelName: z.string().optional(),
	/** Hides the automation flag some sign-in pages refuse */
	stealth: z.boolean().default(true),
}).strict();

export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;

export const AlertConfigSchema = z.object({
	onMaxMode: z.boolean().default(true),
	onThinkingMode: z.boolean().default(false),
}).strict();

export type AlertConfig = z.infer<typeof AlertConfigSchema>;

export const MonitorConfigSchema = z.object({
	targetUrl: z.string().url().default(DEFAULT_TARGET_URL),
	storageDir: z.string().min(1).default(() => path.join(defaultHomeDir(), 'browser-data')),
	/** Text that only appears on the dashboard once signed in */
	authMarker: z.string().min(1).default(DEFAULT_AUTH_MARKER),
	schedule: ScheduleConfigSchema.default({}),
	timing: TimingConfigSchema.default({}),
	browser: BrowserConfigSchema.default({}),
	alerts: AlertConfigSchema.default({}),
}).strict();

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;
export type MonitorConfigInput = z.input<typeof MonitorConfigSchema>;
