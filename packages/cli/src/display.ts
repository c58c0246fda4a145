import chalk from 'chalk';
import type { SessionStateView, UsageAlert } from '@dashmeter/core';
import { renderStatus, renderTitle, renderUsage } from './status.js';

// ── Status line ──

/**
 * A single terminal line redrawn on a timer. Anything else printed while it
 * runs goes through `interrupt` so the line is cleared first and redrawn
 * after.
 */
export class StatusLine {
	private intervalId: ReturnType<typeof setInterval> | null = null;

	constructor(
		private readonly render: () => string,
		private readonly refreshMs = 1000,
	) {}

	start(): void {
		if (this.intervalId) return;
		this.draw();
		this.intervalId = setInterval(() => this.draw(), this.refreshMs);
	}

	interrupt(print: () => void): void {
		if (this.intervalId) this.clear();
		print();
		if (this.intervalId) this.draw();
	}

	stop(finalMessage?: string): void {
		if (this.intervalId) {
			clearInterval(this.intervalId);
			this.intervalId = null;
		}
		this.clear();
		if (finalMessage) {
			console.log(finalMessage);
		}
	}

	private draw(): void {
		process.stdout.write(`\r\x1b[K${this.render()}`);
	}

	private clear(): void {
		process.stdout.write('\r\x1b[K');
	}
}

export function colorIndicator(state: SessionStateView): string {
	const title = chalk.bold(renderTitle(state));
	const status = renderStatus(state);
	if (state.phase === 'error' || state.lastError) return `${title} ${chalk.yellow(status)}`;
	if (state.phase !== 'idle') return `${title} ${chalk.cyan(status)}`;
	return `${title} ${chalk.green(status)}`;
}

// ── Usage block ──

export function displayUsage(state: SessionStateView): void {
	console.log(colorIndicator(state));
	displaySeparator();
	for (const [label, value] of renderUsage(state.lastSnapshot)) {
		console.log(`  ${chalk.white(`${label}:`.padEnd(11))} ${value}`);
	}
}

export function displayAlert(alert: UsageAlert): void {
	const label = alert.kind === 'max-mode' ? 'Max mode detected' : 'Thinking mode detected';
	console.log(`${chalk.bold.red('!')} ${chalk.bold(label)} ${chalk.dim(`model: ${alert.model}`)}`);
	// Terminal bell stands in for a desktop notification
	process.stdout.write('\x07');
}

// ── Helpers ──

export function displayError(message: string): void {
	console.error(chalk.red('Error:'), message);
}

export function displayInfo(message: string): void {
	console.log(chalk.blue('Info:'), message);
}

export function displaySeparator(): void {
	console.log(chalk.dim('─'.repeat(40)));
}
