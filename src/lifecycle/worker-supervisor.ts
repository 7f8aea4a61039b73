/**
 * WorkerSupervisor — runs named long-lived tasks and restarts them on crash.
 *
 * A task that throws, or returns while the engine is not shutting down,
 * has crashed. It is restarted after `restartDelayMs`; after
 * `maxConsecutiveFailures` crashes in a row the supervisor waits
 * `failureBackoffMs` instead and starts counting again. A run lasting at
 * least `healthyRunMs` clears the count. Tasks are never abandoned while
 * the engine runs.
 */

import { Latch } from "../lib/concurrency/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

/** What a task sees of the engine lifecycle. */
export interface ShutdownSignal {
	isShutdown(): boolean;
	/** Sleeps up to `ms`, waking on shutdown. Resolves true once shutting down. */
	pause(ms: number): Promise<boolean>;
}

/** Lifecycle hooks the supervisor drives; SharedState provides them. */
export interface SupervisorLifecycle extends ShutdownSignal {
	requestShutdown(): void;
	markCleanupComplete(): void;
}

export interface SupervisedTask {
	readonly name: string;
	run(signal: ShutdownSignal): Promise<void>;
}

export interface SupervisorConfig {
	readonly restartDelayMs: number;
	readonly maxConsecutiveFailures: number;
	readonly failureBackoffMs: number;
	readonly healthyRunMs: number;
}

export const TaskState = {
	Running: "running",
	Restarting: "restarting",
	Stopped: "stopped",
} as const;

export type TaskState = (typeof TaskState)[keyof typeof TaskState];

export interface TaskStatus {
	readonly name: string;
	readonly state: TaskState;
	readonly restarts: number;
	readonly consecutiveFailures: number;
	readonly lastError: string | null;
}

export interface SupervisorStatus {
	readonly tasks: readonly TaskStatus[];
}

export interface StopReport {
	readonly drained: boolean;
	/** Tasks still running when the timeout expired. */
	readonly undrained: readonly string[];
}

export interface RestartEvent {
	readonly name: string;
	readonly restarts: number;
	readonly consecutiveFailures: number;
	readonly error: string;
	readonly delayMs: number;
}

interface TaskEntry {
	readonly task: SupervisedTask;
	state: TaskState;
	restarts: number;
	consecutiveFailures: number;
	lastError: string | null;
}

export interface WorkerSupervisorDeps {
	readonly config: SupervisorConfig;
	readonly lifecycle: SupervisorLifecycle;
	readonly logger: Logger;
	readonly clock?: Clock | undefined;
	readonly onRestart?: ((event: RestartEvent) => void) | undefined;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export class WorkerSupervisor {
	private readonly config: SupervisorConfig;
	private readonly lifecycle: SupervisorLifecycle;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly onRestart: ((event: RestartEvent) => void) | undefined;
	private readonly entries: TaskEntry[] = [];
	private readonly loops: Promise<void>[] = [];

	constructor(deps: WorkerSupervisorDeps) {
		this.config = deps.config;
		this.lifecycle = deps.lifecycle;
		this.logger = deps.logger.child({ component: "supervisor" });
		this.clock = deps.clock ?? SystemClock;
		this.onRestart = deps.onRestart;
	}

	/** Starts every task in its own loop. Names must be unique. */
	start(tasks: readonly SupervisedTask[]): void {
		for (const task of tasks) {
			if (this.entries.some((e) => e.task.name === task.name)) {
				throw new Error(`Duplicate task name "${task.name}"`);
			}
			const entry: TaskEntry = {
				task,
				state: TaskState.Running,
				restarts: 0,
				consecutiveFailures: 0,
				lastError: null,
			};
			this.entries.push(entry);
			this.loops.push(this.supervise(entry));
			this.logger.info({ task: task.name }, "task started");
		}
	}

	/**
	 * Requests shutdown and waits up to `timeoutMs` for every task to return.
	 * Cleanup is marked complete either way.
	 */
	async stop(timeoutMs: number): Promise<StopReport> {
		this.lifecycle.requestShutdown();
		const drained = new Latch();
		const all = Promise.all(this.loops).then(() => drained.set());
		const finished = await drained.wait(timeoutMs);

		const undrained = this.entries.filter((e) => e.state !== TaskState.Stopped).map((e) => e.task.name);
		if (finished) {
			await all;
			this.logger.info({ tasks: this.entries.length }, "all tasks drained");
		} else {
			this.logger.warn({ undrained, timeoutMs }, "tasks did not drain before timeout");
		}
		this.lifecycle.markCleanupComplete();
		return { drained: finished, undrained };
	}

	status(): SupervisorStatus {
		return {
			tasks: this.entries.map((e) => ({
				name: e.task.name,
				state: e.state,
				restarts: e.restarts,
				consecutiveFailures: e.consecutiveFailures,
				lastError: e.lastError,
			})),
		};
	}

	/** Tasks currently inside `run`. */
	activeTasks(): number {
		return this.entries.filter((e) => e.state === TaskState.Running).length;
	}

	private async supervise(entry: TaskEntry): Promise<void> {
		const log = this.logger.child({ task: entry.task.name });

		while (!this.lifecycle.isShutdown()) {
			entry.state = TaskState.Running;
			const startedAt = this.clock.now();
			let failure: string;
			try {
				await entry.task.run(this.lifecycle);
				failure = "task returned unexpectedly";
				if (this.lifecycle.isShutdown()) break;
			} catch (e: unknown) {
				failure = errorMessage(e);
				if (this.lifecycle.isShutdown()) {
					log.warn({ error: failure }, "task failed during shutdown");
					break;
				}
			}

			if (this.clock.now() - startedAt >= this.config.healthyRunMs) {
				entry.consecutiveFailures = 0;
			}
			entry.consecutiveFailures++;
			entry.restarts++;
			entry.lastError = failure;
			entry.state = TaskState.Restarting;

			const backingOff = entry.consecutiveFailures >= this.config.maxConsecutiveFailures;
			const delayMs = backingOff ? this.config.failureBackoffMs : this.config.restartDelayMs;
			log.error(
				{
					error: entry.lastError,
					restarts: entry.restarts,
					consecutiveFailures: entry.consecutiveFailures,
					delayMs,
				},
				backingOff ? "task keeps crashing, backing off" : "task crashed, restarting",
			);
			this.onRestart?.({
				name: entry.task.name,
				restarts: entry.restarts,
				consecutiveFailures: entry.consecutiveFailures,
				error: entry.lastError,
				delayMs,
			});

			if (await this.lifecycle.pause(delayMs)) break;
			if (backingOff) entry.consecutiveFailures = 0;
		}

		entry.state = TaskState.Stopped;
	}
}
