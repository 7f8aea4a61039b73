import type { Clock } from "../../shared/time.js";
import { SystemClock } from "../../shared/time.js";

export interface CacheOptions {
	/** Entry lifetime; 0 makes every read a miss. */
	readonly ttlMs: number;
	readonly capacity: number;
	readonly clock?: Clock | undefined;
}

/**
 * Expiring map keyed by string, bounded by least-recent use.
 *
 * Backs the shared quote cache: workers read a quote no older than `ttlMs`
 * and fall through to the venue otherwise.
 */
export class Cache<T> {
	private readonly store = new Map<string, { value: T; expiresAt: number }>();
	private readonly ttlMs: number;
	private readonly capacity: number;
	private readonly clock: Clock;

	constructor(options: CacheOptions) {
		if (options.capacity < 1) {
			throw new Error(`Cache capacity must be at least 1, got ${options.capacity}`);
		}
		this.ttlMs = options.ttlMs;
		this.capacity = options.capacity;
		this.clock = options.clock ?? SystemClock;
	}

	get size(): number {
		return this.store.size;
	}

	get(key: string): T | undefined {
		const hit = this.store.get(key);
		if (hit === undefined) return undefined;
		this.store.delete(key);
		if (hit.expiresAt <= this.clock.now()) return undefined;
		this.store.set(key, hit);
		return hit.value;
	}

	set(key: string, value: T): void {
		this.store.delete(key);
		while (this.store.size >= this.capacity) {
			const lru = this.store.keys().next();
			if (lru.done) break;
			this.store.delete(lru.value);
		}
		this.store.set(key, { value, expiresAt: this.clock.now() + this.ttlMs });
	}
}
