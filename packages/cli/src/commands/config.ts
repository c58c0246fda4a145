import type { Command } from 'commander';
import chalk from 'chalk';
import { Config, ConfigError, errorMessage } from '@dashmeter/core';
import { displayError } from '../display.js';

interface ConfigOptions {
	set?: string[];
	path?: boolean;
}

function parseValue(raw: string): unknown {
	try {
		const parsed: unknown = JSON.parse(raw);
		return parsed;
	} catch {
		// Not JSON: keep the text
		return raw;
	}
}

/**
 * Turns `schedule.pollIntervalMinutes=30` into
 * `{ schedule: { pollIntervalMinutes: 30 } }`. Values are read as JSON when
 * they parse, as text otherwise.
 */
export function parseAssignment(assignment: string): Record<string, unknown> {
	const eq = assignment.indexOf('=');
	const keys = assignment.slice(0, Math.max(eq, 0)).trim().split('.');
	if (eq <= 0 || keys.some((key) => key === '')) {
		throw new ConfigError(assignment, ['expected <key>=<value>, e.g. schedule.pollIntervalMinutes=30']);
	}

	const layer: Record<string, unknown> = {};
	let cursor = layer;
	keys.forEach((key, index) => {
		if (index === keys.length - 1) {
			cursor[key] = parseValue(assignment.slice(eq + 1).trim());
			return;
		}
		const next: Record<string, unknown> = {};
		cursor[key] = next;
		cursor = next;
	});
	return layer;
}

export function registerConfigCommand(program: Command): void {
	program
		.command('config')
		.description('Show the effective configuration or change the config file')
		.option('-s, --set <key=value...>', 'Write settings to the config file')
		.option('--path', 'Print the config file location')
		.action((options: ConfigOptions) => {
			try {
				if (options.path) {
					console.log(Config.configFilePath);
					return;
				}

				if (options.set && options.set.length > 0) {
					const updates = options.set.map(parseAssignment);
					const contents = Config.deepMerge(Config.loadConfigFile(), ...updates);
					// Validate before writing so a bad value never lands in the file
					new Config({ file: contents });
					Config.saveConfigFile(contents);
					Config.reset();
				}

				console.log(chalk.bold('Configuration'));
				console.log(chalk.dim(Config.configFilePath));
				console.log(JSON.stringify(Config.instance().config, null, 2));
			} catch (error) {
				if (error instanceof ConfigError) {
					displayError(`Invalid setting "${error.field}"`);
					for (const issue of error.issues) {
						console.error(`  ${chalk.dim('-')} ${issue}`);
					}
				} else {
					displayError(errorMessage(error));
				}
				process.exitCode = 1;
			}
		});
}
