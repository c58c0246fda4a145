import type { Command } from 'commander';
import { Config, errorMessage } from '@dashmeter/core';
import { displayError, displayInfo } from '../display.js';
import { openInBrowser } from '../open-url.js';

export function registerOpenCommand(program: Command): void {
	program
		.command('open')
		.description('Open the usage dashboard in your browser')
		.action(async () => {
			try {
				const { targetUrl } = Config.instance();
				await openInBrowser(targetUrl);
				displayInfo(`Opened ${targetUrl}`);
			} catch (error) {
				displayError(errorMessage(error));
				process.exitCode = 1;
			}
		});
}
