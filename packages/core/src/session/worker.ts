import { EventHub } from '../event-hub.js';
import type { CommandDropReason, MonitorEventMap, WorkerStatus } from '../events.js';
import type { MonitorConfig } from '../config/types.js';
import { ProgrammingError } from '../errors.js';
import { createLogger } from '../logging.js';
import { timed } from '../telemetry.js';
import { extractUsage } from '../usage/extractor.js';
import type { UsageSnapshot } from '../usage/snapshot.js';
import { clipText, errorMessage, formatClock, isTimeoutError, withDeadline } from '../utils.js';
import type { BrowsingSession, SessionFactory } from '../viewport/types.js';
import { createPlaywrightSessionFactory } from '../viewport/session.js';
import { CommandQueue } from './command-queue.js';
import { CommandKind, createCommand, describeCommand, type SessionCommand } from './commands.js';
import { SessionPhase, SessionState, type SessionStateView } from './state.js';

const logger = createLogger('session-worker');

export const NOT_AUTHENTICATED_MESSAGE = 'Please login';
export const LOGIN_TIMEOUT_MESSAGE = 'Login timeout - please try again';
export const PAGE_LOAD_TIMEOUT_MESSAGE = 'Page load timeout';

export interface SessionWorkerOptions {
	config: Readonly<MonitorConfig>;
	/** Defaults to a Playwright persistent context in `config.storageDir` */
	sessionFactory?: SessionFactory;
	/** Defaults to `extractUsage` with its standard labels */
	extract?: (markup: string) => UsageSnapshot;
	clock?: () => Date;
}

/**
 * Turns a fetch failure into a status line: timeouts get a fixed message,
 * anything else is cut to `maxLength` characters.
 */
export function describeFetchError(error: unknown, maxLength: number): string {
	if (isTimeoutError(error)) return PAGE_LOAD_TIMEOUT_MESSAGE;
	return clipText(errorMessage(error), maxLength);
}

/**
 * Owns the single browser session and is the only writer of its
 * `SessionState`. Commands are queued by any caller and executed one at a
 * time, in order, by one consumer loop. Nothing thrown while handling a
 * command leaves the worker; failures become state.
 */
export class SessionWorker {
	readonly events = new EventHub<MonitorEventMap>({ maxHistory: 200 });

	private readonly config: Readonly<MonitorConfig>;
	private readonly sessionFactory: SessionFactory;
	private readonly extract: (markup: string) => UsageSnapshot;
	private readonly clock: () => Date;
	private readonly state: SessionState;
	private readonly queue = new CommandQueue<SessionCommand>();

	private session: BrowsingSession | null = null;
	private running = false;
	private stopRequested = false;
	private loop: Promise<void> | null = null;

	constructor(options: SessionWorkerOptions) {
		this.config = options.config;
		this.sessionFactory = options.sessionFactory ?? createPlaywrightSessionFactory(options.config);
		this.extract = options.extract ?? ((markup) => extractUsage(markup));
		this.clock = options.clock ?? (() => new Date());
		this.state = new SessionState({
			onChange: (state, previous) => this.events.emit('state-changed', { state, previous }),
		});
	}

	get status(): WorkerStatus {
		if (this.running) return 'running';
		return this.loop ? 'stopping' : 'stopped';
	}

	/** Commands waiting behind the one in flight. */
	get pendingCommands(): number {
		return this.queue.size;
	}

	getSnapshot(): SessionStateView {
		return this.state.snapshot();
	}

	// ── Command API ──

	start(): void {
		if (this.running) return;
		if (this.loop) {
			logger.warn('Previous worker loop is still shutting down; start ignored');
			return;
		}

		this.running = true;
		this.stopRequested = false;
		this.queue.reopen();

		const loop = this.runLoop();
		this.loop = loop;
		void loop.finally(() => {
			if (this.loop === loop) this.loop = null;
			this.events.emit('worker-status', { status: this.status });
		});
		this.events.emit('worker-status', { status: 'running' });
	}

	/**
	 * Asks the loop to exit after the command in flight and waits up to
	 * `timing.stopTimeoutMs` for it. Queued commands are discarded.
	 */
	async stop(): Promise<void> {
		this.stopRequested = true;
		const loop = this.loop;
		if (!loop) return;

		this.running = false;
		this.queue.push(createCommand(CommandKind.Stop));
		this.queue.close();
		this.events.emit('worker-status', { status: 'stopping' });

		try {
			await withDeadline(loop, this.config.timing.stopTimeoutMs, 'session-worker.stop');
		} catch (error) {
			logger.warn(`Worker did not stop cleanly: ${errorMessage(error)}`);
		}
	}

	/** Queues a fetch unless one is running or a login is in progress. */
	requestFetch(): boolean {
		const phase = this.state.phase;
		if (phase === SessionPhase.Fetching || phase === SessionPhase.LoggingIn) {
			return this.drop(CommandKind.Fetch, 'busy');
		}
		return this.enqueue(CommandKind.Fetch);
	}

	/** Queues a login unless one is already in progress. */
	requestLogin(): boolean {
		if (this.state.phase === SessionPhase.LoggingIn) {
			return this.drop(CommandKind.Login, 'busy');
		}
		return this.enqueue(CommandKind.Login);
	}

	private enqueue(kind: CommandKind): boolean {
		if (this.stopRequested) {
			const violation = new ProgrammingError(`"${kind}" requested after the worker was stopped`);
			logger.error(violation.message);
			return this.drop(kind, 'stopped');
		}

		const command = createCommand(kind);
		this.queue.push(command);
		logger.debug(`Queued ${describeCommand(command)} (depth ${this.queue.size})`);
		this.events.emit('command-queued', { command, queueDepth: this.queue.size });
		return true;
	}

	private drop(kind: CommandKind, reason: CommandDropReason): false {
		logger.debug(`Dropped ${kind} request (${reason})`);
		this.events.emit('command-dropped', { kind, reason });
		return false;
	}

	// ── Consumer loop ──

	private async runLoop(): Promise<void> {
		logger.info('Session worker started');
		try {
			while (this.running) {
				const command = await this.queue.take(this.config.timing.queuePollIntervalMs);
				if (!command) continue;
				if (!this.running || command.kind === CommandKind.Stop) break;

				await this.execute(command);
			}
		} catch (error) {
			logger.error('Session worker loop failed', error);
		} finally {
			this.running = false;
			await this.closeSession();
			const discarded = this.queue.drain();
			if (discarded.length > 0) {
				logger.debug(`Discarded ${discarded.length} queued command(s) on stop`);
			}
			logger.info('Session worker stopped');
		}
	}

	private async execute(command: SessionCommand): Promise<void> {
		const waitedMs = Date.now() - command.enqueuedAt;
		logger.debug(`Running ${describeCommand(command)} after ${waitedMs}ms in queue`);

		try {
			switch (command.kind) {
				case CommandKind.Login:
					await this.handleLogin();
					break;
				case CommandKind.Fetch:
					await timed('session-worker.fetch', () => this.handleFetch());
					break;
				case CommandKind.Stop:
					break;
			}
		} catch (error) {
			// Handlers record their own failures; this only sees bugs in them
			logger.error(`Unhandled failure in ${describeCommand(command)}`, error);
			this.state.update({
				phase: SessionPhase.Error,
				lastError: clipText(errorMessage(error), this.config.timing.maxErrorLength),
			});
			await this.closeSession();
		}
	}

	// ── Session flows ──

	private async handleLogin(): Promise<void> {
		const { timing, targetUrl, authMarker } = this.config;
		this.state.update({ phase: SessionPhase.LoggingIn, lastError: undefined });

		try {
			await this.closeSession();
			const session = await this.ensureSession(false);
			await session.navigate(targetUrl, { timeoutMs: timing.loginNavigationTimeoutMs });
			logger.info('Waiting for sign-in in the browser window');

			let waitedMs = 0;
			while (waitedMs < timing.loginTimeoutMs && this.running) {
				if (await this.markerVisible(session, authMarker)) {
					logger.info('Sign-in detected');
					// Phase stays logging-in until the fetch takes over, so no
					// request slips in while the window closes
					this.state.update({ isAuthenticated: true, lastError: undefined });
					await this.closeSession();
					await this.handleFetch();
					return;
				}

				await session.pause(timing.loginPollIntervalMs);
				waitedMs += timing.loginPollIntervalMs;
			}

			await this.closeSession();
			if (!this.running) {
				logger.info('Login abandoned: worker stopping');
				this.state.update({ phase: SessionPhase.Idle });
				return;
			}

			logger.warn(`No sign-in within ${timing.loginTimeoutMs}ms`);
			this.state.update({ phase: SessionPhase.Error, lastError: LOGIN_TIMEOUT_MESSAGE });
		} catch (error) {
			logger.warn(`Login failed: ${errorMessage(error)}`);
			this.state.update({
				phase: SessionPhase.Error,
				lastError: `Login failed: ${clipText(errorMessage(error), timing.maxErrorLength)}`,
			});
			await this.closeSession();
		}
	}

	private async handleFetch(): Promise<void> {
		const { timing, targetUrl, authMarker } = this.config;
		this.state.update({ phase: SessionPhase.Fetching, lastError: undefined });

		try {
			const session = await this.ensureSession(true);
			await session.navigate(targetUrl, {
				timeoutMs: timing.navigationTimeoutMs,
				waitUntil: 'domcontentloaded',
			});

			const authenticated = await session.waitForText(authMarker, timing.markerTimeoutMs);
			if (!authenticated) {
				logger.info('Dashboard marker not found; sign-in required');
				this.state.update({
					phase: SessionPhase.Idle,
					isAuthenticated: false,
					lastError: NOT_AUTHENTICATED_MESSAGE,
				});
				return;
			}

			// Figures render after the marker
			await session.pause(timing.settleDelayMs);
			const snapshot = this.extract(await session.content());
			const fetchedAt = formatClock(this.clock());

			this.state.update({
				phase: SessionPhase.Idle,
				isAuthenticated: true,
				lastSnapshot: snapshot,
				lastFetchTime: fetchedAt,
				lastError: undefined,
			});
			logger.info(
				`Fetched usage: ${snapshot.includedUsed}/${snapshot.includedTotal} included, model ${snapshot.displayModel}`,
			);
			this.events.emit('snapshot-updated', { snapshot, fetchedAt });
		} catch (error) {
			logger.warn(`Fetch failed: ${errorMessage(error)}`);
			this.state.update({
				phase: SessionPhase.Error,
				lastError: describeFetchError(error, timing.maxErrorLength),
			});
			await this.closeSession();
		}
	}

	/**
	 * Probing can fail while the sign-in page navigates between steps; that
	 * counts as "not yet".
	 */
	private async markerVisible(session: BrowsingSession, marker: string): Promise<boolean> {
		try {
			return await session.hasText(marker);
		} catch (error) {
			logger.debug(`Marker probe failed: ${errorMessage(error)}`);
			return false;
		}
	}

	// ── Session resource ──

	private async ensureSession(headless: boolean): Promise<BrowsingSession> {
		if (this.session && this.session.headless === headless) {
			return this.session;
		}

		await this.closeSession();
		this.session = await this.sessionFactory({ headless });
		return this.session;
	}

	private async closeSession(): Promise<void> {
		const session = this.session;
		this.session = null;
		if (!session) return;

		try {
			await session.close();
		} catch (error) {
			logger.debug(`Ignoring error while closing browser session: ${errorMessage(error)}`);
		}
	}
}
