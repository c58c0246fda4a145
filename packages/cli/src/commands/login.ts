import type { Command } from 'commander';
import chalk from 'chalk';
import { Config, SessionWorker, errorMessage } from '@dashmeter/core';
import { StatusLine, colorIndicator, displayError, displayUsage } from '../display.js';
import { waitForOutcome } from '../outcome.js';

export function registerLoginCommand(program: Command): void {
	program
		.command('login')
		.description('Open a browser window to sign in to the dashboard')
		.action(async () => {
			let worker: SessionWorker | null = null;

			try {
				const config = Config.instance();
				if (!Config.hasDisplay()) {
					displayError('No display available; sign-in needs a visible browser window');
					process.exitCode = 1;
					return;
				}

				const active = new SessionWorker({ config: config.config });
				worker = active;

				console.log(chalk.dim(`Sign in at ${config.targetUrl} in the window that opens.`));
				const line = new StatusLine(() => colorIndicator(active.getSnapshot()), 250);
				const outcome = waitForOutcome(active);
				process.once('SIGINT', () => void active.stop());

				active.start();
				active.requestLogin();
				line.start();
				const state = await outcome;
				line.stop();

				if (state.isAuthenticated && !state.lastError) {
					console.log(chalk.bold.green('Signed in'));
					displayUsage(state);
					return;
				}
				displayError(state.lastError ?? 'Login cancelled');
				process.exitCode = 1;
			} catch (error) {
				displayError(errorMessage(error));
				process.exitCode = 1;
			} finally {
				await worker?.stop();
			}
		});
}
