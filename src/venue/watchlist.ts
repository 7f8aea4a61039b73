/**
 * Watchlist resolution — turns the configured source into tracked
 * instruments and opposite-outcome pairs.
 *
 * Individual bad entries (malformed pair strings, unknown slugs, events
 * without exactly two outcomes) are skipped with a warning; only an
 * unreadable slug file is fatal.
 */

import { readFile } from "node:fs/promises";
import type { Logger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import type { InstrumentMeta } from "../market/types.js";
import type { SimPositionSeed, WatchlistSource } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError } from "../shared/errors.js";
import { instrumentId } from "../shared/identifiers.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { LedgerSeed } from "../state/sim-ledger.js";
import type { PositionInfo } from "../state/types.js";
import type { VenueGateway } from "./types.js";

export type InstrumentPair = readonly [InstrumentId, InstrumentId];

export interface ResolvedWatchlist {
	readonly pairs: readonly InstrumentPair[];
	readonly instruments: ReadonlyMap<InstrumentId, InstrumentMeta>;
	/** Human-readable descriptions of entries that were dropped. */
	readonly skipped: readonly string[];
}

const slugFileSchema = z.union([z.array(z.string()), z.object({ slugs: z.array(z.string()) })]);

// ── Parsing ──────────────────────────────────────────────────────────

export function splitCsv(raw: string): string[] {
	return raw
		.split(",")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}

/** Parses `"a:b"` entries (each may itself be a comma list) into pairs. */
export function parsePairList(entries: readonly string[]): {
	pairs: InstrumentPair[];
	skipped: string[];
} {
	const pairs: InstrumentPair[] = [];
	const skipped: string[] = [];
	for (const entry of entries.flatMap(splitCsv)) {
		const parts = entry.split(":").map((p) => p.trim());
		const [a, b] = parts;
		if (parts.length !== 2 || !a || !b || a === b) {
			skipped.push(`malformed pair "${entry}"`);
			continue;
		}
		pairs.push([instrumentId(a), instrumentId(b)]);
	}
	return { pairs, skipped };
}

/** Reads a `{ "slugs": [...] }` or `[...]` JSON file; trimmed, deduplicated, order kept. */
export async function loadSlugFile(path: string): Promise<string[]> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error: unknown) {
		throw new ConfigError(`Cannot read watchlist file ${path}`, { cause: error, path });
	}

	let json: unknown;
	try {
		json = JSON.parse(content);
	} catch (error: unknown) {
		throw new ConfigError(`Watchlist file ${path} is not valid JSON`, { cause: error, path });
	}

	const parsed = validate(slugFileSchema, json, "watchlist file");
	if (!parsed.ok) {
		throw new ConfigError(`Invalid watchlist file ${path}`, { cause: parsed.error, path });
	}
	const slugs = Array.isArray(parsed.value) ? parsed.value : parsed.value.slugs;
	return dedupe(slugs.map((s) => s.trim()).filter((s) => s.length > 0));
}

function dedupe(values: readonly string[]): string[] {
	return [...new Set(values)];
}

/** Groups positions by event; events holding exactly two outcomes become pairs. */
export function pairsFromPositions(positions: readonly PositionInfo[]): ResolvedWatchlist {
	const instruments = new Map<InstrumentId, InstrumentMeta>();
	const byEvent = new Map<string, InstrumentId[]>();
	for (const p of positions) {
		instruments.set(p.asset, { eventSlug: p.eventSlug, outcome: p.outcome });
		const list = byEvent.get(p.eventSlug) ?? [];
		if (!list.includes(p.asset)) list.push(p.asset);
		byEvent.set(p.eventSlug, list);
	}

	const pairs: InstrumentPair[] = [];
	const skipped: string[] = [];
	for (const [slug, ids] of byEvent) {
		const [a, b] = ids;
		if (ids.length === 2 && a && b) {
			pairs.push([a, b]);
		} else {
			skipped.push(`event "${slug}" holds ${ids.length} outcome(s), left unpaired`);
		}
	}
	return { pairs, instruments, skipped };
}

/** Instruments, pairs and ledger seeds for configured simulated positions. */
export function simSeedWatchlist(seeds: readonly SimPositionSeed[]): ResolvedWatchlist & {
	ledgerSeeds: LedgerSeed[];
} {
	const ledgerSeeds: LedgerSeed[] = seeds.map((s) => ({
		instrument: instrumentId(s.asset),
		meta: { eventSlug: s.eventSlug, outcome: s.outcome },
		shares: Decimal.from(s.shares),
		avgPrice: Decimal.from(s.avgPrice),
	}));
	const grouped = pairsFromPositions(
		ledgerSeeds.map((s) => ({
			eventSlug: s.meta.eventSlug,
			outcome: s.meta.outcome,
			asset: s.instrument,
			avgPrice: s.avgPrice,
			shares: s.shares,
			currentPrice: s.avgPrice,
			initialValue: s.avgPrice.mul(s.shares),
			currentValue: s.avgPrice.mul(s.shares),
			pnl: Decimal.zero(),
			percentPnl: Decimal.zero(),
			realizedPnl: Decimal.zero(),
		})),
	);
	return { ...grouped, ledgerSeeds };
}

// ── Resolver ─────────────────────────────────────────────────────────

export interface WatchlistResolverDeps {
	readonly gateway: VenueGateway;
	readonly logger: Logger;
	/** Sleep between position polls; resolves true when shutting down. */
	readonly pause: (ms: number) => Promise<boolean>;
}

export class WatchlistResolver {
	private readonly gateway: VenueGateway;
	private readonly logger: Logger;
	private readonly pause: (ms: number) => Promise<boolean>;

	constructor(deps: WatchlistResolverDeps) {
		this.gateway = deps.gateway;
		this.logger = deps.logger.child({ component: "watchlist" });
		this.pause = deps.pause;
	}

	async resolve(source: WatchlistSource): Promise<ResolvedWatchlist> {
		const resolved = await this.resolveSource(source);
		for (const reason of resolved.skipped) {
			this.logger.warn({ reason }, "watchlist entry skipped");
		}
		this.logger.info(
			{ source: source.kind, instruments: resolved.instruments.size, pairs: resolved.pairs.length },
			"watchlist resolved",
		);
		return resolved;
	}

	private async resolveSource(source: WatchlistSource): Promise<ResolvedWatchlist> {
		switch (source.kind) {
			case "pairs":
				return this.fromPairs(source.pairs);
			case "slugs": {
				const fromFile = source.file !== undefined ? await loadSlugFile(source.file) : [];
				return this.fromSlugs(dedupe([...source.slugs.flatMap(splitCsv), ...fromFile]));
			}
			case "positions":
				return this.fromPositions(source.attempts, source.intervalMs);
		}
	}

	private fromPairs(entries: readonly string[]): ResolvedWatchlist {
		const { pairs, skipped } = parsePairList(entries);
		const instruments = new Map<InstrumentId, InstrumentMeta>();
		for (const [a, b] of pairs) {
			const eventSlug = `${a}:${b}`;
			instruments.set(a, { eventSlug, outcome: "YES" });
			instruments.set(b, { eventSlug, outcome: "NO" });
		}
		return { pairs, instruments, skipped };
	}

	private async fromSlugs(slugs: readonly string[]): Promise<ResolvedWatchlist> {
		const pairs: InstrumentPair[] = [];
		const instruments = new Map<InstrumentId, InstrumentMeta>();
		const skipped: string[] = [];

		for (const slug of slugs) {
			const result = await this.gateway.resolveMarket(slug);
			if (!result.ok) {
				skipped.push(`slug "${slug}": ${result.error.message}`);
				continue;
			}
			if (result.value.length === 0) {
				skipped.push(`slug "${slug}": no markets`);
				continue;
			}
			for (const market of result.value) {
				const [a, b] = market.outcomes;
				if (market.outcomes.length !== 2 || !a || !b) {
					skipped.push(`slug "${slug}": market with ${market.outcomes.length} outcome(s)`);
					continue;
				}
				pairs.push([a.instrument, b.instrument]);
				instruments.set(a.instrument, { eventSlug: slug, outcome: a.label });
				instruments.set(b.instrument, { eventSlug: slug, outcome: b.label });
			}
		}
		return { pairs, instruments, skipped };
	}

	private async fromPositions(attempts: number, intervalMs: number): Promise<ResolvedWatchlist> {
		for (let attempt = 1; attempt <= attempts; attempt++) {
			const result = await this.gateway.getPositions();
			if (result.ok && result.value.length > 0) {
				return pairsFromPositions(result.value);
			}
			this.logger.info(
				{ attempt, attempts, error: result.ok ? undefined : result.error.message },
				"no positions yet",
			);
			if (attempt < attempts && (await this.pause(intervalMs))) break;
		}
		return { pairs: [], instruments: new Map(), skipped: ["no positions found"] };
	}
}
