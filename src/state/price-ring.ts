/**
 * Fixed-capacity ring of the most recent values. Pushing past capacity
 * overwrites the oldest entry.
 */
export class PriceRing<T> {
	private readonly slots: (T | undefined)[];
	private head = 0;
	private count = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(`PriceRing capacity must be a positive integer, got ${capacity}`);
		}
		this.slots = new Array<T | undefined>(capacity);
	}

	get size(): number {
		return this.count;
	}

	push(value: T): void {
		this.slots[(this.head + this.count) % this.capacity] = value;
		if (this.count < this.capacity) {
			this.count++;
		} else {
			this.head = (this.head + 1) % this.capacity;
		}
	}

	/** Newest value, or undefined when empty. */
	last(): T | undefined {
		if (this.count === 0) return undefined;
		return this.slots[(this.head + this.count - 1) % this.capacity];
	}

	/** Oldest first. */
	toArray(): T[] {
		const out: T[] = [];
		for (let i = 0; i < this.count; i++) {
			const value = this.slots[(this.head + i) % this.capacity];
			if (value !== undefined) out.push(value);
		}
		return out;
	}
}
