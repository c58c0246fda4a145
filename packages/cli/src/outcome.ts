import type { SessionStateView, SessionWorker } from '@dashmeter/core';

/**
 * Whether a state change ends a one-shot command. A successful login is not
 * the end: the worker goes on to fetch, and that fetch finishing is.
 */
export function isSettled(state: SessionStateView, previous: SessionStateView): boolean {
	if (state.phase === 'fetching' || state.phase === 'logging-in') return false;
	if (previous.phase === 'fetching') return true;
	if (previous.phase === 'logging-in') return state.phase === 'error' || !state.isAuthenticated;
	return false;
}

/** Resolves with the first settled state after this call. */
export function waitForOutcome(worker: SessionWorker): Promise<SessionStateView> {
	return new Promise((resolve) => {
		const off = worker.events.on('state-changed', ({ state, previous }) => {
			if (!isSettled(state, previous)) return;
			off();
			resolve(state);
		});
	});
}
