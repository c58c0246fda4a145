import { ProgrammingError } from '../errors.js';

type Waiter<T> = (item: T | undefined) => void;

/**
 * Unbounded FIFO channel for a single consumer. `push` never blocks;
 * `take` waits for the next item up to a timeout so the consumer can
 * look at its own stop flag between waits.
 */
export class CommandQueue<T> {
	private items: T[] = [];
	private waiter: Waiter<T> | null = null;
	private closed = false;

	get size(): number {
		return this.items.length;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Returns false, dropping the item, once the queue is closed. */
	push(item: T): boolean {
		if (this.closed) return false;

		const waiter = this.waiter;
		if (waiter) {
			this.waiter = null;
			waiter(item);
		} else {
			this.items.push(item);
		}
		return true;
	}

	/**
	 * Resolves with the oldest item, or `undefined` after `timeoutMs`
	 * with nothing queued, or at once when the queue is closed and empty.
	 */
	take(timeoutMs: number): Promise<T | undefined> {
		if (this.items.length > 0) {
			return Promise.resolve(this.items.shift());
		}
		if (this.closed) {
			return Promise.resolve(undefined);
		}
		if (this.waiter) {
			return Promise.reject(new ProgrammingError('CommandQueue supports a single consumer'));
		}

		return new Promise<T | undefined>((resolve) => {
			const timer = setTimeout(() => {
				if (this.waiter === settle) this.waiter = null;
				resolve(undefined);
			}, timeoutMs);

			const settle: Waiter<T> = (item) => {
				clearTimeout(timer);
				resolve(item);
			};
			this.waiter = settle;
		});
	}

	/** Removes and returns everything still queued. */
	drain(): T[] {
		const pending = this.items;
		this.items = [];
		return pending;
	}

	/** Stops accepting items and wakes a waiting consumer. */
	close(): void {
		this.closed = true;
		const waiter = this.waiter;
		this.waiter = null;
		waiter?.(undefined);
	}

	reopen(): void {
		this.closed = false;
	}
}
