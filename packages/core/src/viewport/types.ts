import { z } from 'zod';

export const LaunchOptionsSchema = z.object({
	headless: z.boolean().default(true),
	extraArgs: z.array(z.string()).default([]),
	windowWidth: z.number().default(1280),
	windowHeight: z.number().default(800),
	/** Persistent profile directory; cookies and local storage live here */
	userDataDir: z.string(),
	browserBinaryPath: z.string().optional(),
	channelName: z.string().optional(),
});

export type LaunchOptions = z.infer<typeof LaunchOptionsSchema>;
export type LaunchOptionsInput = z.input<typeof LaunchOptionsSchema>;

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface NavigateOptions {
	timeoutMs: number;
	waitUntil?: WaitUntil;
}

/**
 * The one browsing context the session worker drives. Only the worker may
 * hold an instance.
 */
export interface BrowsingSession {
	readonly headless: boolean;
	navigate(url: string, options: NavigateOptions): Promise<void>;
	/** True when `marker` currently appears anywhere on the page */
	hasText(marker: string): Promise<boolean>;
	/** Resolves false when `marker` does not appear within `timeoutMs` */
	waitForText(marker: string, timeoutMs: number): Promise<boolean>;
	pause(ms: number): Promise<void>;
	/** Full rendered markup of the current page */
	content(): Promise<string>;
	close(): Promise<void>;
}

export interface SessionLaunchRequest {
	headless: boolean;
}

export type SessionFactory = (request: SessionLaunchRequest) => Promise<BrowsingSession>;
