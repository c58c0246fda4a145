import type { LaunchOptions } from './types.js';
import { Config } from '../config/config.js';
import { ConfigError } from '../errors.js';

/**
 * Flags that keep a long-lived automation profile quiet: no first-run UI,
 * no background services, no automation banner.
 */
export const CHROME_AUTOMATION_FLAGS = [
	'--no-first-run',
	'--no-default-browser-check',
	'--disable-background-networking',
	'--disable-component-update',
	'--disable-default-apps',
	'--disable-sync',
	'--disable-translate',
	'--metrics-recording-only',
	'--no-pings',
	'--password-store=basic',
	'--use-mock-keychain',
	'--disable-infobars',
	'--disable-session-crashed-bubble',
];

/** Hides the automation fingerprint the dashboard's sign-in page checks. */
export const ANTI_DETECTION_FLAGS = [
	'--disable-blink-features=AutomationControlled',
];

export const CONTAINER_FLAGS = [
	'--no-sandbox',
	'--disable-gpu',
	'--disable-dev-shm-usage',
	'--disable-setuid-sandbox',
];

/**
 * Fluent builder for the persistent-context launch options.
 */
export class LaunchProfile {
	private options: Partial<LaunchOptions> = {};
	private _stealthMode = true;
	private _dockerMode = false;

	static create(): LaunchProfile {
		return new LaunchProfile();
	}

	headless(value = true): this {
		this.options.headless = value;
		return this;
	}

	windowSize(width: number, height: number): this {
		this.options.windowWidth = width;
		this.options.windowHeight = height;
		return this;
	}

	userDataDir(dir: string): this {
		this.options.userDataDir = dir;
		return this;
	}

	browserBinary(path: string | undefined): this {
		this.options.browserBinaryPath = path;
		return this;
	}

	channel(name: string | undefined): this {
		this.options.channelName = name;
		return this;
	}

	extraArgs(...args: string[]): this {
		this.options.extraArgs = [...(this.options.extraArgs ?? []), ...args];
		return this;
	}

	stealthMode(value = true): this {
		this._stealthMode = value;
		return this;
	}

	/**
	 * Applies container flags inside Docker, and forces headless there when
	 * no display is available.
	 */
	autoDetect(): this {
		if (Config.isDocker()) {
			this._dockerMode = true;
			if (!Config.hasDisplay()) {
				this.options.headless = true;
			}
		}
		return this;
	}

	build(): LaunchOptions {
		if (!this.options.userDataDir) {
			throw new ConfigError('userDataDir', ['a persistent profile directory is required']);
		}

		const args = [...CHROME_AUTOMATION_FLAGS];

		if (this._stealthMode) {
			args.push(...ANTI_DETECTION_FLAGS);
		}

		if (this._dockerMode) {
			args.push(...CONTAINER_FLAGS);
		}

		const width = this.options.windowWidth ?? 1280;
		const height = this.options.windowHeight ?? 800;
		args.push(`--window-size=${width},${height}`);

		// User extra args go last so they can override
		if (this.options.extraArgs) {
			args.push(...this.options.extraArgs);
		}

		return {
			headless: this.options.headless ?? true,
			extraArgs: args,
			windowWidth: width,
			windowHeight: height,
			userDataDir: this.options.userDataDir,
			browserBinaryPath: this.options.browserBinaryPath,
			channelName: this.options.channelName,
		};
	}
}
