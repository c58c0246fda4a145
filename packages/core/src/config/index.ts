export { Config, type ConfigSources } from './config.js';
export {
	type MonitorConfig,
	type MonitorConfigInput,
	MonitorConfigSchema,
	type ScheduleConfig,
	ScheduleConfigSchema,
	type TimingConfig,
	TimingConfigSchema,
	type BrowserConfig,
	BrowserConfigSchema,
	type AlertConfig,
	AlertConfigSchema,
	DEFAULT_TARGET_URL,
	DEFAULT_AUTH_MARKER,
	POLL_INTERVALS,
	defaultHomeDir,
} from './types.js';
