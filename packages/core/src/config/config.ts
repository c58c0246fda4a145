import { config as loadDotenv } from 'dotenv';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { defaultHomeDir, MonitorConfigSchema, type MonitorConfig } from './types.js';
import { ConfigError } from '../errors.js';
import { createLogger } from '../logging.js';

const logger = createLogger('config');

type Environment = Record<string, string | undefined>;
type ConfigLayer = Record<string, unknown>;

export interface ConfigSources {
	/** Environment variables to read `DASHMETER_*` settings from */
	env?: Environment;
	/** Contents of the config file */
	file?: ConfigLayer;
	/** Highest-precedence values, e.g. from command-line flags */
	overrides?: ConfigLayer;
}

let _instance: Config | undefined;

function isRecord(value: unknown): value is ConfigLayer {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Config {
	readonly config: Readonly<MonitorConfig>;

	/**
	 * Layers, lowest precedence first: schema defaults, file, environment,
	 * overrides. Throws `ConfigError` when the merged result is invalid.
	 */
	constructor(sources: ConfigSources = {}) {
		const merged = Config.deepMerge(
			sources.file ?? {},
			Config.fromEnvironment(sources.env ?? {}),
			sources.overrides ?? {},
		);

		const parsed = MonitorConfigSchema.safeParse(merged);
		if (!parsed.success) {
			const issues = parsed.error.issues.map(
				(issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
			);
			const field = parsed.error.issues[0]?.path.join('.') || 'config';
			throw new ConfigError(field, issues);
		}
		this.config = Object.freeze(parsed.data);
	}

	/**
	 * Process-wide configuration from `.env`, the environment and the config
	 * file. Overrides only apply on the first call.
	 */
	static instance(overrides?: ConfigLayer): Config {
		if (!_instance) {
			loadDotenv();
			_instance = new Config({
				env: process.env,
				file: Config.loadConfigFile(),
				overrides,
			});
		}
		return _instance;
	}

	static reset(): void {
		_instance = undefined;
	}

	static fromEnvironment(env: Environment): ConfigLayer {
		const layer: ConfigLayer = {};
		const schedule: ConfigLayer = {};

		if (env.DASHMETER_TARGET_URL) layer.targetUrl = env.DASHMETER_TARGET_URL;
		if (env.DASHMETER_STORAGE_DIR) layer.storageDir = env.DASHMETER_STORAGE_DIR;
		if (env.DASHMETER_AUTH_MARKER) layer.authMarker = env.DASHMETER_AUTH_MARKER;

		if (env.DASHMETER_POLL_INTERVAL) {
			schedule.pollIntervalMinutes = Number(env.DASHMETER_POLL_INTERVAL);
		}
		if (env.DASHMETER_WORK_HOURS) {
			const match = /^\s*(\d{1,2})\s*-\s*(\d{1,2})\s*$/.exec(env.DASHMETER_WORK_HOURS);
			if (!match) {
				throw new ConfigError('DASHMETER_WORK_HOURS', [
					`expected "<start>-<end>", got "${env.DASHMETER_WORK_HOURS}"`,
				]);
			}
			schedule.workHourStart = Number(match[1]);
			schedule.workHourEnd = Number(match[2]);
		}
		if (Object.keys(schedule).length > 0) layer.schedule = schedule;

		if (env.BROWSER_BINARY_PATH) {
			layer.browser = { browserBinaryPath: env.BROWSER_BINARY_PATH };
		}

		return layer;
	}

	static deepMerge(...layers: ConfigLayer[]): ConfigLayer {
		const result: ConfigLayer = {};

		for (const layer of layers) {
			for (const [key, value] of Object.entries(layer)) {
				const existing = result[key];
				if (isRecord(value) && isRecord(existing)) {
					result[key] = Config.deepMerge(existing, value);
				} else if (value !== undefined) {
					result[key] = value;
				}
			}
		}

		return result;
	}

	get targetUrl(): string {
		return this.config.targetUrl;
	}

	get storageDir(): string {
		return this.config.storageDir;
	}

	get schedule() {
		return this.config.schedule;
	}

	get timing() {
		return this.config.timing;
	}

	get browser() {
		return this.config.browser;
	}

	get alerts() {
		return this.config.alerts;
	}

	static get configDir(): string {
		return process.env.DASHMETER_HOME ?? defaultHomeDir();
	}

	static get configFilePath(): string {
		return path.join(Config.configDir, 'config.json');
	}

	static loadConfigFile(filePath = Config.configFilePath): ConfigLayer {
		try {
			if (fs.existsSync(filePath)) {
				const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
				if (isRecord(parsed)) {
					logger.debug(`Loaded config from ${filePath}`);
					return parsed;
				}
				logger.warn(`Ignoring config file ${filePath}: top level is not an object`);
			}
		} catch (error) {
			logger.warn(`Failed to load config file: ${error}`);
		}
		return {};
	}

	static saveConfigFile(contents: ConfigLayer, filePath = Config.configFilePath): void {
		const dir = path.dirname(filePath);
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
		fs.writeFileSync(filePath, JSON.stringify(contents, null, 2), 'utf-8');
		logger.info(`Config saved to ${filePath}`);
	}

	static isDocker(): boolean {
		try {
			if (fs.existsSync('/.dockerenv')) return true;
			if (fs.existsSync('/proc/1/cgroup')) {
				const cgroup = fs.readFileSync('/proc/1/cgroup', 'utf-8');
				return cgroup.includes('docker') || cgroup.includes('kubepods');
			}
		} catch {
			// Not on Linux, definitely not Docker
		}
		return false;
	}

	static hasDisplay(): boolean {
		if (process.platform === 'win32') return true;
		if (process.platform === 'darwin') return true;
		return !!process.env.DISPLAY || !!process.env.WAYLAND_DISPLAY;
	}
}
