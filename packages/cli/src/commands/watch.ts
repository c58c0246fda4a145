import * as readline from 'node:readline';
import type { Command } from 'commander';
import chalk from 'chalk';
import {
	Config,
	Poller,
	POLL_INTERVALS,
	SessionWorker,
	UsageAlertTracker,
	errorMessage,
	isPollInterval,
	setLogSink,
} from '@dashmeter/core';
import { StatusLine, colorIndicator, displayAlert, displayError } from '../display.js';
import { openInBrowser } from '../open-url.js';
import { renderIndicator } from '../status.js';

interface WatchOptions {
	interval?: string;
	keys: boolean;
}

interface Keypress {
	name?: string;
	ctrl?: boolean;
}

const KEY_HELP = 'r refresh · l login · o open dashboard · i interval · q quit';

function nextInterval(current: number): number {
	const index = POLL_INTERVALS.findIndex((interval) => interval === current);
	return POLL_INTERVALS[(index + 1) % POLL_INTERVALS.length];
}

export function registerWatchCommand(program: Command): void {
	program
		.command('watch', { isDefault: true })
		.description('Keep a live usage indicator on screen')
		.option('-i, --interval <minutes>', `Polling interval in minutes (${POLL_INTERVALS.join(', ')})`)
		.option('--no-keys', 'Do not listen for keyboard shortcuts')
		.action(async (options: WatchOptions) => {
			let config: Config;
			try {
				const interval = options.interval === undefined ? undefined : Number(options.interval);
				if (interval !== undefined && !isPollInterval(interval)) {
					displayError(`Interval must be one of ${POLL_INTERVALS.join(', ')} minutes`);
					process.exitCode = 1;
					return;
				}
				config = Config.instance(
					interval === undefined ? undefined : { schedule: { pollIntervalMinutes: interval } },
				);
			} catch (error) {
				displayError(errorMessage(error));
				process.exitCode = 1;
				return;
			}

			const worker = new SessionWorker({ config: config.config });
			const poller = new Poller({ target: worker, schedule: config.schedule });
			const alerts = new UsageAlertTracker(config.alerts);
			const { targetUrl } = config;
			const line = new StatusLine(() => {
				const minutes = chalk.dim(`every ${poller.pollIntervalMinutes} min`);
				return `${colorIndicator(worker.getSnapshot())} ${minutes}`;
			});

			// Log lines would tear the redrawn indicator
			setLogSink((_level, text, args) => line.interrupt(() => console.error(text, ...args)));

			worker.events.on('snapshot-updated', ({ snapshot }) => {
				for (const alert of alerts.observe(snapshot)) {
					line.interrupt(() => displayAlert(alert));
				}
			});

			await new Promise<void>((resolve) => {
				const stdin = process.stdin;
				const listenForKeys = options.keys && stdin.isTTY;

				const shutdown = () => {
					process.off('SIGINT', shutdown);
					process.off('SIGTERM', shutdown);
					if (listenForKeys) {
						stdin.off('keypress', onKey);
						stdin.setRawMode(false);
						stdin.pause();
					}
					resolve();
				};

				const onKey = (_input: string | undefined, key: Keypress | undefined) => {
					if (!key) return;
					if (key.name === 'q' || (key.ctrl && key.name === 'c')) {
						shutdown();
					} else if (key.name === 'r') {
						poller.refreshNow();
					} else if (key.name === 'l') {
						worker.requestLogin();
					} else if (key.name === 'o') {
					openInBrowser(targetUrl).catch((error: unknown) => {
						line.interrupt(() => displayError(errorMessage(error)));
					});
				} else if (key.name === 'i') {
						const minutes = nextInterval(poller.pollIntervalMinutes);
						poller.setIntervalMinutes(minutes);
					}
				};

				process.once('SIGINT', shutdown);
				process.once('SIGTERM', shutdown);
				if (listenForKeys) {
					readline.emitKeypressEvents(stdin);
					stdin.setRawMode(true);
					stdin.on('keypress', onKey);
					console.log(chalk.dim(KEY_HELP));
				}

				worker.start();
				poller.start();
				line.start();
			});

			poller.stop();
			line.stop(renderIndicator(worker.getSnapshot()));
			setLogSink(null);
			await worker.stop();
			console.log(chalk.dim('Stopped'));
		});
}
