export { PlaywrightSession, createPlaywrightSessionFactory } from './session.js';
export {
	LaunchProfile,
	CHROME_AUTOMATION_FLAGS,
	ANTI_DETECTION_FLAGS,
	CONTAINER_FLAGS,
} from './launch-profile.js';
export {
	type BrowsingSession,
	type LaunchOptions,
	type LaunchOptionsInput,
	LaunchOptionsSchema,
	type NavigateOptions,
	type SessionFactory,
	type SessionLaunchRequest,
	type WaitUntil,
} from './types.js';
