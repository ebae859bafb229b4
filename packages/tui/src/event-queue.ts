/**
 * Unbounded FIFO with a single async take point.
 *
 * Producers (stdin, resize, settled background requests) push from their own
 * callbacks; the UI loop awaits `next()` and is the only consumer. Ordering
 * is total: items come out in exactly the order they were pushed.
 */
export class EventQueue<T> {
	#items: T[] = [];
	#waiters: Array<(item: T) => void> = [];

	get size(): number {
		return this.#items.length;
	}

	push(item: T): void {
		const waiter = this.#waiters.shift();
		if (waiter) {
			waiter(item);
			return;
		}
		this.#items.push(item);
	}

	/** Resolve with the next item, waiting for one if the queue is empty. */
	next(): Promise<T> {
		if (this.#items.length > 0) {
			const [item] = this.#items.splice(0, 1);
			if (item !== undefined) return Promise.resolve(item);
		}
		return new Promise<T>(resolve => {
			this.#waiters.push(resolve);
		});
	}

	/**
	 * Like `next`, but gives up after `timeoutMs` and resolves undefined.
	 * A timed-out wait leaves no waiter behind, so no item is lost.
	 */
	nextWithin(timeoutMs: number): Promise<T | undefined> {
		const queued = this.poll();
		if (queued !== undefined) return Promise.resolve(queued);
		return new Promise<T | undefined>(resolve => {
			const waiter = (item: T) => {
				clearTimeout(timer);
				resolve(item);
			};
			const timer = setTimeout(() => {
				const index = this.#waiters.indexOf(waiter);
				if (index !== -1) this.#waiters.splice(index, 1);
				resolve(undefined);
			}, Math.max(0, timeoutMs));
			this.#waiters.push(waiter);
		});
	}

	/** Take an item only if one is already queued. */
	poll(): T | undefined {
		return this.#items.shift();
	}
}
