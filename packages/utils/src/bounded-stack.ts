/**
 * A LIFO stack with a fixed capacity, stored in a circular buffer.
 * Pushing onto a full stack silently discards the oldest (bottom) item.
 *
 * @template T The type of elements stored in the stack.
 */
export class BoundedStack<T> {
	#buf: (T | undefined)[];
	#bottom = 0;
	#size = 0;

	/**
	 * @param capacity - Maximum number of items retained. Must be positive.
	 */
	constructor(public readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new RangeError(`BoundedStack capacity must be a positive integer, got ${capacity}`);
		}
		this.#buf = new Array(capacity);
	}

	get length(): number {
		return this.#size;
	}

	get isEmpty(): boolean {
		return this.#size === 0;
	}

	/**
	 * Push an item on top.
	 * @returns The discarded bottom item when the stack was full, otherwise `undefined`.
	 */
	push(item: T): T | undefined {
		const idx = (this.#bottom + this.#size) % this.capacity;
		if (this.#size === this.capacity) {
			const dropped = this.#buf[idx];
			this.#buf[idx] = item;
			this.#bottom = (this.#bottom + 1) % this.capacity;
			return dropped;
		}
		this.#buf[idx] = item;
		this.#size++;
		return undefined;
	}

	/** Remove and return the top item. */
	pop(): T | undefined {
		if (this.#size === 0) return undefined;
		const idx = (this.#bottom + this.#size - 1) % this.capacity;
		const item = this.#buf[idx];
		this.#buf[idx] = undefined;
		this.#size--;
		return item;
	}

	/** Return the top item without removing it. */
	peek(): T | undefined {
		if (this.#size === 0) return undefined;
		return this.#buf[(this.#bottom + this.#size - 1) % this.capacity];
	}

	clear(): void {
		this.#buf = new Array(this.capacity);
		this.#bottom = 0;
		this.#size = 0;
	}

	/** Items from bottom (oldest) to top (newest). */
	toArray(): T[] {
		const out: T[] = [];
		for (let i = 0; i < this.#size; i++) {
			const item = this.#buf[(this.#bottom + i) % this.capacity];
			if (item !== undefined) out.push(item);
		}
		return out;
	}
}
