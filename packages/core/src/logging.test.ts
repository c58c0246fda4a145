import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import {
	createLogger,
	formatLogLine,
	parseLogLevel,
	setGlobalLogLevel,
	setLogColors,
	setLogSink,
	setLogTimestamps,
} from './logging.js';
import { LogLevel } from './types.js';

describe('logging', () => {
	const sink = vi.fn();

	beforeEach(() => {
		setLogColors(false);
		setLogTimestamps(false);
		setLogSink(sink);
		setGlobalLogLevel(LogLevel.INFO);
	});

	afterEach(() => {
		setLogColors(true);
		setLogTimestamps(true);
		setLogSink(null);
		sink.mockReset();
	});

	test('formats level, name and message', () => {
		expect(formatLogLine(LogLevel.INFO, 'config', 'Loaded')).toBe('INFO  [config] Loaded');
		expect(formatLogLine(LogLevel.ERROR, 'session-worker', 'boom')).toBe('ERROR [session-worker] boom');
	});

	test('drops messages below the global level', () => {
		const logger = createLogger('test-levels');
		logger.debug('hidden');
		logger.warn('shown', 42);

		expect(sink).toHaveBeenCalledTimes(1);
		expect(sink).toHaveBeenCalledWith(LogLevel.WARN, 'WARN  [test-levels] shown', [42]);
	});

	test('a logger level overrides the global level', () => {
		const logger = createLogger('test-override');
		logger.setLevel(LogLevel.DEBUG);
		logger.debug('visible');
		expect(sink).toHaveBeenCalledWith(LogLevel.DEBUG, 'DEBUG [test-override] visible', []);
	});

	test('createLogger returns one logger per name', () => {
		expect(createLogger('same')).toBe(createLogger('same'));
	});

	test('parseLogLevel', () => {
		expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
		expect(parseLogLevel(' Warning ')).toBe(LogLevel.WARN);
		expect(parseLogLevel('loud')).toBeUndefined();
		expect(parseLogLevel(undefined)).toBeUndefined();
	});
});
