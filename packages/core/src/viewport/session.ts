import { mkdir } from 'node:fs/promises';
import { chromium, type BrowserContext, type Page } from 'playwright';
import {
	LaunchOptionsSchema,
	type BrowsingSession,
	type LaunchOptionsInput,
	type NavigateOptions,
	type SessionFactory,
} from './types.js';
import { LaunchProfile } from './launch-profile.js';
import type { MonitorConfig } from '../config/types.js';
import { LaunchFailedError, NavigationFailedError, SessionClosedError } from '../errors.js';
import { createLogger } from '../logging.js';
import { timed } from '../telemetry.js';
import { errorMessage, isTimeoutError } from '../utils.js';

const logger = createLogger('browser-session');

/**
 * A Playwright persistent context. Cookies and local storage are kept in the
 * profile directory, so a sign-in survives process restarts.
 */
export class PlaywrightSession implements BrowsingSession {
	private context: BrowserContext | null;
	private page: Page | null;

	private constructor(
		context: BrowserContext,
		page: Page,
		readonly headless: boolean,
	) {
		this.context = context;
		this.page = page;
	}

	static async launch(input: LaunchOptionsInput): Promise<PlaywrightSession> {
		const options = LaunchOptionsSchema.parse(input);
		const { result, durationMs } = await timed(
			'browser-session.launch',
			async () => {
				let context: BrowserContext | undefined;
				try {
					await mkdir(options.userDataDir, { recursive: true });
					context = await chromium.launchPersistentContext(options.userDataDir, {
						headless: options.headless,
						viewport: { width: options.windowWidth, height: options.windowHeight },
						args: options.extraArgs,
						executablePath: options.browserBinaryPath || undefined,
						channel: options.channelName || undefined,
					});
					const existing = context.pages();
					const page = existing.length > 0 ? existing[0] : await context.newPage();
					return new PlaywrightSession(context, page, options.headless);
				} catch (error) {
					// A context left open keeps the profile directory locked
					await context?.close().catch((closeError: unknown) => {
						logger.debug(`Ignoring error while closing half-started browser: ${errorMessage(closeError)}`);
					});
					throw new LaunchFailedError(`Browser launch failed: ${errorMessage(error)}`, {
						cause: error,
					});
				}
			},
			{ warnAfterMs: 15_000 },
		);

		logger.info(
			`Browser session started (${options.headless ? 'headless' : 'visible'}) in ${durationMs.toFixed(0)}ms`,
		);
		return result;
	}

	private get currentPage(): Page {
		if (!this.page) {
			throw new SessionClosedError();
		}
		return this.page;
	}

	async navigate(url: string, options: NavigateOptions): Promise<void> {
		const page = this.currentPage;
		try {
			await timed(`navigate ${url}`, () =>
				page.goto(url, { timeout: options.timeoutMs, waitUntil: options.waitUntil ?? 'load' }),
			);
		} catch (error) {
			// Timeouts keep their type so the caller can report them as such
			if (isTimeoutError(error)) throw error;
			throw new NavigationFailedError(`Navigation failed: ${errorMessage(error)}`, url, {
				cause: error,
			});
		}
	}

	async hasText(marker: string): Promise<boolean> {
		const count = await this.currentPage.getByText(marker).count();
		return count > 0;
	}

	async waitForText(marker: string, timeoutMs: number): Promise<boolean> {
		try {
			await this.currentPage.getByText(marker).first().waitFor({ state: 'visible', timeout: timeoutMs });
			return true;
		} catch (error) {
			if (isTimeoutError(error)) return false;
			throw error;
		}
	}

	async pause(ms: number): Promise<void> {
		await this.currentPage.waitForTimeout(ms);
	}

	async content(): Promise<string> {
		return this.currentPage.content();
	}

	async close(): Promise<void> {
		const context = this.context;
		this.context = null;
		this.page = null;
		if (!context) return;

		await context.close();
		logger.debug('Browser session closed');
	}
}

/**
 * Builds the factory the session worker launches its sessions through.
 */
export function createPlaywrightSessionFactory(config: Readonly<MonitorConfig>): SessionFactory {
	return ({ headless }) => {
		const options = LaunchProfile.create()
			.headless(headless)
			.windowSize(config.browser.windowWidth, config.browser.windowHeight)
			.userDataDir(config.storageDir)
			.browserBinary(config.browser.browserBinaryPath)
			.channel(config.browser.channelName)
			.stealthMode(config.browser.stealth)
			.extraArgs(...config.browser.extraArgs)
			.autoDetect()
			.build();
		return PlaywrightSession.launch(options);
	};
}
