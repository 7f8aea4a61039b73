/**
 * Async coordination primitives for long-running workers.
 *
 * `Notifier` is a level-triggered "something changed" flag: consumers drain
 * it and re-check state rather than counting wake-ups. `Latch` is a one-shot
 * flag used for shutdown and drain completion. `mapConcurrent` bounds fan-out
 * for a batch; `WorkPool` bounds fan-out for work submitted over time.
 */

import { TypedEmitter } from "../events/index.js";

type SignalEvents = { set: () => void };

function waitForSet(emitter: TypedEmitter<SignalEvents>, timeoutMs: number): Promise<boolean> {
	return new Promise((resolve) => {
		const onSet = (): void => {
			clearTimeout(timer);
			resolve(true);
		};
		const timer = setTimeout(
			() => {
				emitter.off("set", onSet);
				resolve(false);
			},
			Math.max(0, timeoutMs),
		);
		emitter.once("set", onSet);
	});
}

/** Level-triggered notification. Stays set until a consumer drains it. */
export class Notifier {
	private readonly emitter = new TypedEmitter<SignalEvents>();
	private flag = false;

	notify(): void {
		this.flag = true;
		this.emitter.emit("set");
	}

	isSet(): boolean {
		return this.flag;
	}

	/** Clears the flag; returns whether it was set. */
	drain(): boolean {
		const was = this.flag;
		this.flag = false;
		return was;
	}

	/** Resolves true as soon as the flag is set, false after `timeoutMs` without a notification. */
	wait(timeoutMs: number): Promise<boolean> {
		if (this.flag) return Promise.resolve(true);
		return waitForSet(this.emitter, timeoutMs);
	}

	/**
	 * Returns a notifier raised on every later `notify()` of this one, so each
	 * consumer can drain its own flag without hiding the change from the others.
	 */
	subscribe(): NotifierSubscription {
		const subscription = new NotifierSubscription(() => this.emitter.off("set", forward));
		const forward = (): void => subscription.notify();
		this.emitter.on("set", forward);
		return subscription;
	}
}

export class NotifierSubscription extends Notifier {
	constructor(private readonly detach: () => void) {
		super();
	}

	close(): void {
		this.detach();
	}
}

/** One-shot flag: once set it never clears. */
export class Latch {
	private readonly emitter = new TypedEmitter<SignalEvents>();
	private flag = false;

	set(): void {
		if (this.flag) return;
		this.flag = true;
		this.emitter.emit("set");
	}

	isSet(): boolean {
		return this.flag;
	}

	wait(timeoutMs: number): Promise<boolean> {
		if (this.flag) return Promise.resolve(true);
		return waitForSet(this.emitter, timeoutMs);
	}
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight.
 * Every item settles; results keep the input order.
 */
export async function mapConcurrent<T, R>(
	items: readonly T[],
	limit: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
	const results: PromiseSettledResult<R>[] = new Array(items.length);
	const pending = items.entries();

	const worker = async (): Promise<void> => {
		for (const [index, item] of pending) {
			try {
				results[index] = { status: "fulfilled", value: await fn(item, index) };
			} catch (reason) {
				results[index] = { status: "rejected", reason };
			}
		}
	};

	const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
	await Promise.all(workers);
	return results;
}

/**
 * Runs submitted jobs with at most `limit` in flight; the rest queue in
 * submission order. A job's failure goes to `onError` and never stops the pool.
 */
export class WorkPool {
	private readonly queue: Array<() => Promise<void>> = [];
	private readonly idle = new TypedEmitter<SignalEvents>();
	private active = 0;

	constructor(
		private readonly limit: number,
		private readonly onError: (err: unknown) => void,
	) {
		if (!Number.isInteger(limit) || limit < 1) {
			throw new Error(`WorkPool limit must be a positive integer, got ${limit}`);
		}
	}

	submit(job: () => Promise<void>): void {
		this.queue.push(job);
		this.pump();
	}

	inFlight(): number {
		return this.active;
	}

	queued(): number {
		return this.queue.length;
	}

	/** Resolves true once nothing is running or queued, false after `timeoutMs`. */
	onIdle(timeoutMs: number): Promise<boolean> {
		if (this.active === 0 && this.queue.length === 0) return Promise.resolve(true);
		return waitForSet(this.idle, timeoutMs);
	}

	private pump(): void {
		while (this.active < this.limit) {
			const job = this.queue.shift();
			if (!job) break;
			this.active++;
			void this.execute(job);
		}
		if (this.active === 0 && this.queue.length === 0) this.idle.emit("set");
	}

	private async execute(job: () => Promise<void>): Promise<void> {
		try {
			await job();
		} catch (err) {
			this.onError(err);
		} finally {
			this.active--;
			this.pump();
		}
	}
}
