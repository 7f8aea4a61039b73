/**
 * PositionsSync — live mode only. Polls the venue's position report and
 * swaps it into SharedState, grouped by event slug.
 */

import type { Logger } from "../lib/logger/index.js";
import type { ShutdownSignal, SupervisedTask } from "../lifecycle/worker-supervisor.js";
import type { GroupedPositions, PositionInfo } from "../state/types.js";
import type { SharedState } from "../state/shared-state.js";
import type { VenueGateway } from "../venue/types.js";

export function groupPositions(positions: readonly PositionInfo[]): GroupedPositions {
	const grouped = new Map<string, PositionInfo[]>();
	for (const p of positions) {
		const bucket = grouped.get(p.eventSlug) ?? [];
		bucket.push(p);
		grouped.set(p.eventSlug, bucket);
	}
	return grouped;
}

export interface PositionsSyncDeps {
	readonly state: SharedState;
	readonly gateway: VenueGateway;
	readonly intervalMs: number;
	readonly logger: Logger;
	/** Called after every successful refresh. */
	readonly onSynced?: (() => void) | undefined;
}

export class PositionsSync implements SupervisedTask {
	readonly name = "positions-sync";

	private readonly deps: PositionsSyncDeps;
	private readonly logger: Logger;

	constructor(deps: PositionsSyncDeps) {
		this.deps = deps;
		this.logger = deps.logger.child({ component: "positions-sync" });
	}

	async run(signal: ShutdownSignal): Promise<void> {
		while (!signal.isShutdown()) {
			await this.sync();
			if (await signal.pause(this.deps.intervalMs)) break;
		}
	}

	/** One refresh. A failed read keeps the previous snapshot. */
	async sync(): Promise<boolean> {
		const result = await this.deps.gateway.getPositions();
		if (!result.ok) {
			this.logger.warn({ error: result.error.message, code: result.error.code }, "positions refresh failed");
			return false;
		}
		this.deps.state.replacePositions(groupPositions(result.value));
		this.logger.debug({ positions: result.value.length }, "positions refreshed");
		this.deps.onSynced?.();
		return true;
	}
}
