import { createLogger } from './logging.js';

const logger = createLogger('events');

type Handler<T = unknown> = (payload: T) => void;

export interface EventRecord {
	event: string;
	payload: unknown;
	timestamp: number;
}

/**
 * Typed synchronous pub/sub. A throwing handler is logged and does not stop
 * delivery to the others, nor reach the emitter.
 */
export class EventHub<EventMap extends { [K in keyof EventMap]: EventMap[K] } = Record<string, unknown>> {
	private handlers = new Map<string, Set<Handler>>();
	private history: EventRecord[] = [];
	private maxHistory: number;

	constructor(options?: { maxHistory?: number }) {
		this.maxHistory = options?.maxHistory ?? 100;
	}

	on<K extends keyof EventMap & string>(event: K, handler: Handler<EventMap[K]>): () => void {
		let set = this.handlers.get(event);
		if (!set) {
			set = new Set();
			this.handlers.set(event, set);
		}
		// Handlers are stored untyped; `emit` only ever passes EventMap[K] for key K.
		const stored = handler as Handler;
		set.add(stored);

		return () => {
			this.handlers.get(event)?.delete(stored);
		};
	}

	once<K extends keyof EventMap & string>(event: K, handler: Handler<EventMap[K]>): () => void {
		const off = this.on(event, (payload) => {
			off();
			handler(payload);
		});
		return off;
	}

	emit<K extends keyof EventMap & string>(event: K, payload: EventMap[K]): void {
		this.recordHistory(event, payload);
		const handlers = this.handlers.get(event);
		if (!handlers) return;

		for (const handler of [...handlers]) {
			try {
				handler(payload);
			} catch (error) {
				logger.error(`Error in "${event}" handler`, error);
			}
		}
	}

	listenerCount<K extends keyof EventMap & string>(event: K): number {
		return this.handlers.get(event)?.size ?? 0;
	}

	removeAllListeners(): void {
		this.handlers.clear();
	}

	getHistory(event?: string): EventRecord[] {
		if (event) {
			return this.history.filter((h) => h.event === event);
		}
		return [...this.history];
	}

	clearHistory(): void {
		this.history = [];
	}

	private recordHistory(event: string, payload: unknown): void {
		this.history.push({ event, payload, timestamp: Date.now() });
		if (this.history.length > this.maxHistory) {
			this.history = this.history.slice(-this.maxHistory);
		}
	}
}
