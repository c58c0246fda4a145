#!/usr/bin/env node
import { Command } from 'commander';
import { LogLevel, errorMessage, setGlobalLogLevel } from '@dashmeter/core';
import { registerWatchCommand } from './commands/watch.js';
import { registerFetchCommand } from './commands/fetch.js';
import { registerLoginCommand } from './commands/login.js';
import { registerConfigCommand } from './commands/config.js';
import { registerOpenCommand } from './commands/open.js';
import { displayError } from './display.js';

type GlobalOptions = {
	verbose?: boolean;
	quiet?: boolean;
};

const program = new Command();

program
	.name('dashmeter')
	.description('Keep an eye on dashboard request usage from the terminal')
	.version('0.1.0')
	.option('-v, --verbose', 'Log debug output')
	.option('-q, --quiet', 'Only log errors')
	.hook('preAction', (command) => {
		const { verbose, quiet } = command.opts<GlobalOptions>();
		if (verbose) setGlobalLogLevel(LogLevel.DEBUG);
		else if (quiet) setGlobalLogLevel(LogLevel.ERROR);
	});

// ── Live indicator ──
registerWatchCommand(program);

// ── One-shot commands ──
registerFetchCommand(program);
registerLoginCommand(program);
registerOpenCommand(program);
registerConfigCommand(program);

try {
	await program.parseAsync();
} catch (error) {
	displayError(errorMessage(error));
	process.exitCode = 1;
}
