import { spawn } from 'node:child_process';

export interface Opener {
	command: string;
	args: string[];
}

/** The desktop's own "open this link" command. */
export function openerFor(url: string, platform: NodeJS.Platform = process.platform): Opener {
	switch (platform) {
		case 'darwin':
			return { command: 'open', args: [url] };
		case 'win32':
			// `start` goes through cmd.exe, which splits URLs on `&`
			return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
		default:
			return { command: 'xdg-open', args: [url] };
	}
}

/**
 * Hands `url` to the user's default browser. Resolves once the opener has
 * started; the opener is not waited for.
 */
export function openInBrowser(url: string): Promise<void> {
	const { command, args } = openerFor(url);
	return new Promise((resolve, reject) => {
		const child = spawn(command, args, { stdio: 'ignore', detached: true });
		child.once('error', (error: Error) => {
			reject(new Error(`Could not run ${command}: ${error.message}`, { cause: error }));
		});
		child.once('spawn', () => {
			child.unref();
			resolve();
		});
	});
}
