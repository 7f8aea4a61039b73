/**
 * SignalWorker — runs one strategy as a supervised task.
 *
 * Update-driven strategies wake on the price update signal (or its timeout),
 * drain it and evaluate. Interval strategies evaluate on a fixed period.
 * Intents go to the sink through a bounded pool, so a slow order does not
 * hold up the next evaluation.
 */

import { WorkPool } from "../lib/concurrency/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { ShutdownSignal, SupervisedTask } from "../lifecycle/worker-supervisor.js";
import type { SharedState } from "../state/shared-state.js";
import type { QuoteService } from "../venue/quote-service.js";
import type { IntentSink, Strategy, TradeIntent } from "./types.js";

export interface SignalWorkerConfig {
	readonly signalWaitMs: number;
	readonly detectConcurrency: number;
	/** How long a stopping worker waits for dispatched intents to settle. */
	readonly drainTimeoutMs: number;
}

export interface SignalWorkerDeps {
	readonly strategy: Strategy;
	readonly state: SharedState;
	readonly quotes: QuoteService;
	readonly sink: IntentSink;
	readonly config: SignalWorkerConfig;
	readonly logger: Logger;
}

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

export class SignalWorker implements SupervisedTask {
	readonly name: string;

	private readonly strategy: Strategy;
	private readonly state: SharedState;
	private readonly quotes: QuoteService;
	private readonly sink: IntentSink;
	private readonly config: SignalWorkerConfig;
	private readonly logger: Logger;
	private readonly pool: WorkPool;

	constructor(deps: SignalWorkerDeps) {
		this.strategy = deps.strategy;
		this.state = deps.state;
		this.quotes = deps.quotes;
		this.sink = deps.sink;
		this.config = deps.config;
		this.name = `signal:${deps.strategy.kind}`;
		this.logger = deps.logger.child({ component: this.name });
		this.pool = new WorkPool(deps.config.detectConcurrency, (e) =>
			this.logger.error({ error: errorMessage(e) }, "intent dispatch failed"),
		);
	}

	async run(signal: ShutdownSignal): Promise<void> {
		try {
			if (this.strategy.trigger.mode === "interval") {
				await this.runOnInterval(signal, this.strategy.trigger.intervalMs);
			} else {
				await this.runOnUpdates(signal);
			}
		} finally {
			if (!(await this.pool.onIdle(this.config.drainTimeoutMs))) {
				this.logger.warn({ inFlight: this.pool.inFlight() }, "intents still in flight at exit");
			}
		}
	}

	/** Evaluates once and queues the intents. Returns how many were queued. */
	async cycle(): Promise<number> {
		const intents = await this.strategy.evaluate({
			state: this.state,
			quotes: this.quotes,
			now: this.state.clock.now(),
			logger: this.logger,
		});
		for (const intent of intents) {
			this.pool.submit(() => this.dispatch(intent));
		}
		return intents.length;
	}

	/** Resolves once every queued intent has settled, false on timeout. */
	idle(timeoutMs: number): Promise<boolean> {
		return this.pool.onIdle(timeoutMs);
	}

	private async runOnUpdates(signal: ShutdownSignal): Promise<void> {
		const updates = this.state.updates.subscribe();
		try {
			while (!signal.isShutdown()) {
				const woke = await updates.wait(this.config.signalWaitMs);
				if (signal.isShutdown()) break;
				if (!woke) continue;
				updates.drain();
				await this.safeCycle();
			}
		} finally {
			updates.close();
		}
	}

	private async runOnInterval(signal: ShutdownSignal, intervalMs: number): Promise<void> {
		while (!signal.isShutdown()) {
			await this.safeCycle();
			if (await signal.pause(intervalMs)) break;
		}
	}

	private async safeCycle(): Promise<void> {
		try {
			await this.cycle();
		} catch (e: unknown) {
			this.logger.error({ error: errorMessage(e) }, "strategy evaluation failed");
		}
	}

	private async dispatch(intent: TradeIntent): Promise<void> {
		const log = this.logger.child({ kind: intent.kind, instrument: intent.instrument });
		if (this.state.isShutdown()) {
			log.warn("shutting down, intent discarded");
			return;
		}
		const placed = await this.sink.dispatch(intent);
		log.debug({ placed, reason: intent.reason }, placed ? "intent placed" : "intent not placed");
	}
}
