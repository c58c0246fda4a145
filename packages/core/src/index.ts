// ── Usage ──
export * from './usage/index.js';

// ── Session ──
export * from './session/index.js';

// ── Scheduling ──
export * from './schedule/index.js';

// ── Browser ──
export * from './viewport/index.js';

// ── Config ──
export * from './config/index.js';

// ── Events ──
export { EventHub, type EventRecord } from './event-hub.js';
export type { MonitorEventMap, WorkerStatus, CommandDropReason } from './events.js';

// ── Errors ──
export {
	DashmeterError,
	SessionError,
	LaunchFailedError,
	NavigationFailedError,
	SessionClosedError,
	MarkupStructureError,
	TimeoutError,
	SchemaViolationError,
	ConfigError,
	ProgrammingError,
} from './errors.js';

// ── Logging & utilities ──
export {
	Logger,
	createLogger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	setLogColors,
	setLogTimestamps,
	setLogSink,
	parseLogLevel,
	formatLogLine,
	type LogSink,
} from './logging.js';
export { timed, type TimingResult, type TimedOptions } from './telemetry.js';
export { LogLevel, type CommandId } from './types.js';
export { clipText, formatClock, errorMessage, isTimeoutError, sanitizeText, parseFigure } from './utils.js';
