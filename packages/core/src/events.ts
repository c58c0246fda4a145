import type { SessionStateView } from './session/state.js';
import type { CommandKind, SessionCommand } from './session/commands.js';
import type { UsageSnapshot } from './usage/snapshot.js';

export type WorkerStatus = 'stopped' | 'running' | 'stopping';

export type CommandDropReason = 'busy' | 'stopped';

export interface MonitorEventMap {
	'state-changed': { state: SessionStateView; previous: SessionStateView };
	'snapshot-updated': { snapshot: UsageSnapshot; fetchedAt: string };
	'command-queued': { command: SessionCommand; queueDepth: number };
	'command-dropped': { kind: CommandKind; reason: CommandDropReason };
	'worker-status': { status: WorkerStatus };
}
