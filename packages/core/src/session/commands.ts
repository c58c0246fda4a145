import { commandId, type CommandId } from '../types.js';
import { generateId } from '../utils.js';

export const CommandKind = {
	Fetch: 'fetch',
	Login: 'login',
	Stop: 'stop',
} as const;
export type CommandKind = (typeof CommandKind)[keyof typeof CommandKind];

export interface SessionCommand {
	id: CommandId;
	kind: CommandKind;
	enqueuedAt: number;
}

export function createCommand(kind: CommandKind, now = Date.now()): SessionCommand {
	return { id: commandId(generateId(8)), kind, enqueuedAt: now };
}

export function describeCommand(command: SessionCommand): string {
	return `${command.kind}#${command.id}`;
}
