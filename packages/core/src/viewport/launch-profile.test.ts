import { describe, test, expect, afterEach, vi } from 'vitest';
import {
	LaunchProfile,
	CHROME_AUTOMATION_FLAGS,
	ANTI_DETECTION_FLAGS,
	CONTAINER_FLAGS,
} from './launch-profile.js';
import { Config } from '../config/config.js';
import { ConfigError } from '../errors.js';

const PROFILE_DIR = '/tmp/dashmeter-profile';

describe('LaunchProfile', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test('static create returns a LaunchProfile instance', () => {
		expect(LaunchProfile.create()).toBeInstanceOf(LaunchProfile);
	});

	test('requires a profile directory', () => {
		expect(() => LaunchProfile.create().build()).toThrow(ConfigError);
	});

	describe('default build', () => {
		const opts = () => LaunchProfile.create().userDataDir(PROFILE_DIR).build();

		test('is headless with a 1280x800 window', () => {
			const built = opts();
			expect(built.headless).toBe(true);
			expect(built.windowWidth).toBe(1280);
			expect(built.windowHeight).toBe(800);
			expect(built.userDataDir).toBe(PROFILE_DIR);
		});

		test('includes the automation and anti-detection flags', () => {
			const { extraArgs } = opts();
			for (const arg of [...CHROME_AUTOMATION_FLAGS, ...ANTI_DETECTION_FLAGS]) {
				expect(extraArgs).toContain(arg);
			}
			expect(extraArgs).toContain('--disable-blink-features=AutomationControlled');
		});

		test('leaves out container flags', () => {
			const { extraArgs } = opts();
			for (const arg of CONTAINER_FLAGS) {
				expect(extraArgs).not.toContain(arg);
			}
		});

		test('binary and channel are unset', () => {
			const built = opts();
			expect(built.browserBinaryPath).toBeUndefined();
			expect(built.channelName).toBeUndefined();
		});
	});

	describe('builder methods', () => {
		test('headless(false) opens a visible window', () => {
			expect(LaunchProfile.create().userDataDir(PROFILE_DIR).headless(false).build().headless).toBe(false);
		});

		test('windowSize sets the size and the window-size flag', () => {
			const built = LaunchProfile.create().userDataDir(PROFILE_DIR).windowSize(1024, 700).build();
			expect(built.windowWidth).toBe(1024);
			expect(built.extraArgs).toContain('--window-size=1024,700');
		});

		test('stealthMode(false) drops the anti-detection flags', () => {
			const built = LaunchProfile.create().userDataDir(PROFILE_DIR).stealthMode(false).build();
			expect(built.extraArgs).not.toContain('--disable-blink-features=AutomationControlled');
		});

		test('extra args come last', () => {
			const built = LaunchProfile.create()
				.userDataDir(PROFILE_DIR)
				.extraArgs('--lang=en-US')
				.extraArgs('--mute-audio')
				.build();
			expect(built.extraArgs.slice(-3)).toEqual(['--window-size=1280,800', '--lang=en-US', '--mute-audio']);
		});

		test('binary and channel pass through', () => {
			const built = LaunchProfile.create()
				.userDataDir(PROFILE_DIR)
				.browserBinary('/opt/chrome/chrome')
				.channel('chrome')
				.build();
			expect(built.browserBinaryPath).toBe('/opt/chrome/chrome');
			expect(built.channelName).toBe('chrome');
		});
	});

	describe('autoDetect', () => {
		test('forces headless in a container without a display', () => {
			vi.spyOn(Config, 'isDocker').mockReturnValue(true);
			vi.spyOn(Config, 'hasDisplay').mockReturnValue(false);

			const built = LaunchProfile.create().userDataDir(PROFILE_DIR).headless(false).autoDetect().build();
			expect(built.headless).toBe(true);
			expect(built.extraArgs).toContain('--no-sandbox');
		});

		test('adds the container flags and keeps a window when a display exists', () => {
			vi.spyOn(Config, 'isDocker').mockReturnValue(true);
			vi.spyOn(Config, 'hasDisplay').mockReturnValue(true);

			const built = LaunchProfile.create().userDataDir(PROFILE_DIR).headless(false).autoDetect().build();
			expect(built.headless).toBe(false);
			for (const arg of CONTAINER_FLAGS) {
				expect(built.extraArgs).toContain(arg);
			}
		});

		test('keeps a visible window outside containers', () => {
			vi.spyOn(Config, 'isDocker').mockReturnValue(false);

			const built = LaunchProfile.create().userDataDir(PROFILE_DIR).headless(false).autoDetect().build();
			expect(built.headless).toBe(false);
			expect(built.extraArgs).not.toContain('--no-sandbox');
		});
	});
});
