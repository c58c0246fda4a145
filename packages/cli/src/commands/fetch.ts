import type { Command } from 'commander';
import { Config, SessionWorker, errorMessage } from '@dashmeter/core';
import { StatusLine, colorIndicator, displayError, displayInfo, displayUsage } from '../display.js';
import { waitForOutcome } from '../outcome.js';

export function registerFetchCommand(program: Command): void {
	program
		.command('fetch')
		.description('Fetch usage once and print it')
		.action(async () => {
			let worker: SessionWorker | null = null;

			try {
				const config = Config.instance();
				const active = new SessionWorker({ config: config.config });
				worker = active;

				const line = new StatusLine(() => colorIndicator(active.getSnapshot()), 250);
				const outcome = waitForOutcome(active);
				process.once('SIGINT', () => void active.stop());

				active.start();
				active.requestFetch();
				line.start();
				const state = await outcome;
				line.stop();

				displayUsage(state);
				if (!state.isAuthenticated) {
					displayInfo('Run "dashmeter login" to sign in');
				}
				if (state.lastError) process.exitCode = 1;
			} catch (error) {
				displayError(errorMessage(error));
				process.exitCode = 1;
			} finally {
				await worker?.stop();
			}
		});
}
