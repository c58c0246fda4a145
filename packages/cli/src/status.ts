import { clipText, type SessionStateView, type UsageSnapshot } from '@dashmeter/core';

const MODEL_WIDTH = 35;

/**
 * Short indicator text: remaining included requests once known, otherwise a
 * glyph for what the worker is doing.
 */
export function renderTitle(state: SessionStateView): string {
	if (state.lastSnapshot) return `C ${state.lastSnapshot.includedRemaining}`;

	switch (state.phase) {
		case 'fetching':
			return 'C ⏳';
		case 'logging-in':
			return 'C 🔑';
	}
	if (state.lastError) return state.isAuthenticated ? 'C ⚠️' : 'C ?';
	return 'C --';
}

export function renderStatus(state: SessionStateView): string {
	switch (state.phase) {
		case 'fetching':
			return '⏳ Fetching...';
		case 'logging-in':
			return '🔑 Waiting for login...';
	}
	if (state.lastError) return `⚠️ ${state.lastError}`;
	if (state.lastFetchTime) return `● Updated at ${state.lastFetchTime}`;
	return '● Ready';
}

/** The one-line indicator the watch command redraws, e.g. `C 88 ● Updated at 10:42`. */
export function renderIndicator(state: SessionStateView): string {
	return `${renderTitle(state)} ${renderStatus(state)}`;
}

function formatDollars(value: number): string {
	return `$${value.toFixed(2)}`;
}

/** Label and value pairs for the usage block; `--` where nothing is known yet. */
export function renderUsage(snapshot: UsageSnapshot | undefined): Array<[string, string]> {
	if (!snapshot) {
		return [
			['Included', '--/--'],
			['On-Demand', '--/--'],
			['Model', '--'],
			['Time', '--'],
			['Thinking', '--'],
			['Max Mode', '--'],
		];
	}

	const model = snapshot.lastModelName ?? '--';
	return [
		[
			'Included',
			`${snapshot.includedUsed}/${snapshot.includedTotal} (${snapshot.includedPercentage.toFixed(1)}%)`,
		],
		['On-Demand', `${formatDollars(snapshot.onDemandUsed)} / ${formatDollars(snapshot.onDemandLimit)}`],
		['Model', model.length > MODEL_WIDTH ? clipText(model, MODEL_WIDTH - 3) : model],
		['Time', snapshot.lastRequestTimestamp ?? '--'],
		['Thinking', snapshot.isThinkingMode ? 'Yes (2x requests)' : 'No'],
		['Max Mode', snapshot.isMaxMode ? 'Yes' : 'No'],
	];
}
