export {
	SessionState,
	SessionPhase,
	type SessionStateFields,
	type SessionStateView,
	type SessionStatePatch,
	type SessionStateListener,
} from './state.js';
export { CommandQueue } from './command-queue.js';
export { CommandKind, createCommand, describeCommand, type SessionCommand } from './commands.js';
export {
	SessionWorker,
	type SessionWorkerOptions,
	describeFetchError,
	NOT_AUTHENTICATED_MESSAGE,
	LOGIN_TIMEOUT_MESSAGE,
	PAGE_LOAD_TIMEOUT_MESSAGE,
} from './worker.js';
