import { ProgrammingError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { UsageSnapshot } from '../usage/snapshot.js';

export const SessionPhase = {
	Idle: 'idle',
	Fetching: 'fetching',
	LoggingIn: 'logging-in',
	Error: 'error',
} as const;
export type SessionPhase = (typeof SessionPhase)[keyof typeof SessionPhase];

export interface SessionStateFields {
	phase: SessionPhase;
	lastError?: string;
	isAuthenticated: boolean;
	lastSnapshot?: UsageSnapshot;
	/** Local `HH:MM` of the last successful fetch */
	lastFetchTime?: string;
}

/** A frozen view of the state at one instant. */
export type SessionStateView = Readonly<SessionStateFields>;

/**
 * Fields an update may name. Passing `undefined` clears an optional field.
 */
export type SessionStatePatch = {
	[K in keyof SessionStateFields]?: SessionStateFields[K];
};

const UPDATABLE_FIELDS: ReadonlySet<string> = new Set<keyof SessionStateFields>([
	'phase',
	'lastError',
	'isAuthenticated',
	'lastSnapshot',
	'lastFetchTime',
]);

export type SessionStateListener = (next: SessionStateView, previous: SessionStateView) => void;

const logger = createLogger('session-state');

const INITIAL_STATE: SessionStateView = Object.freeze({
	phase: SessionPhase.Idle,
	isAuthenticated: false,
});

/**
 * State shared between the session worker (sole writer) and any number of
 * readers. Every update builds a new frozen record and swaps it in, so a
 * reader holds either the whole previous state or the whole next one.
 */
export class SessionState {
	private current: SessionStateView = INITIAL_STATE;
	private readonly listener?: SessionStateListener;

	constructor(options: { onChange?: SessionStateListener } = {}) {
		this.listener = options.onChange;
	}

	get phase(): SessionPhase {
		return this.current.phase;
	}

	/**
	 * Merges `patch` into the state. Keys outside the field set throw
	 * `ProgrammingError` and leave the state untouched.
	 */
	update(patch: SessionStatePatch): SessionStateView {
		for (const key of Object.keys(patch)) {
			if (!UPDATABLE_FIELDS.has(key)) {
				throw new ProgrammingError(`Unknown session state field "${key}"`);
			}
		}

		const previous = this.current;
		const next: SessionStateView = Object.freeze({ ...previous, ...patch });
		this.current = next;
		try {
			this.listener?.(next, previous);
		} catch (error) {
			logger.error('State change listener failed', error);
		}
		return next;
	}

	snapshot(): SessionStateView {
		return this.current;
	}
}
