/**
 * Paper Engine Example
 *
 * Runs the full engine in simulation against a PaperVenue:
 * - Two paired instruments whose books follow a random walk
 * - Spike and mean-reversion strategies enabled
 * - Prints every trade and exit, then the positions table on shutdown
 *
 * Run time is 20 seconds unless SPIKEBOT_DEMO_SECONDS says otherwise.
 */

import {
	Decimal,
	PaperVenue,
	StrategyKind,
	TradingEngine,
	configFromEnv,
	createLogger,
	instrumentId,
	sleep,
} from "../src/index.js";
import type { BookLevel, InstrumentId } from "../src/index.js";

const yes = instrumentId("demo-yes");
const no = instrumentId("demo-no");

const level = (price: Decimal, size: number): BookLevel => ({ price, size: Decimal.from(size) });

/** Moves the YES mid by a random step and mirrors it on NO, with an occasional jump. */
function drive(venue: PaperVenue, mid: Decimal): Decimal {
	const jump = Math.random() < 0.05 ? (Math.random() - 0.5) * 0.12 : 0;
	const step = (Math.random() - 0.5) * 0.01 + jump;
	const moved = mid.add(Decimal.from(step.toFixed(4)));
	const next = moved.clamp(Decimal.from("0.05"), Decimal.from("0.95"));
	quote(venue, yes, next);
	quote(venue, no, Decimal.one().sub(next));
	return next;
}

function quote(venue: PaperVenue, id: InstrumentId, mid: Decimal): void {
	const half = Decimal.from("0.005");
	venue.setBook(id, [level(mid.sub(half), 200)], [level(mid.add(half), 200)]);
}

async function main(): Promise<void> {
	const logger = createLogger({ level: "info", name: "paper-engine" });
	const venue = new PaperVenue({ startUsdc: Decimal.from(1_000) });
	let mid = Decimal.from("0.45");
	quote(venue, yes, mid);
	quote(venue, no, Decimal.one().sub(mid));

	const engine = TradingEngine.create(
		{
			minTriggerIntervalMs: 2_000,
			cooldownMs: 2_000,
			...configFromEnv(),
			simulation: true,
			watchlist: { kind: "pairs", pairs: [`${yes}:${no}`] },
			strategies: [StrategyKind.Spike, StrategyKind.MeanReversion],
			priceUpdateMinIntervalMs: 250,
			quoteCacheTtlMs: 0,
		},
		{ gateway: venue, logger },
	);

	engine.events.on("trade", (t) => {
		logger.info(
			{ side: t.side, instrument: t.instrument, shares: t.shares.toString(), price: t.price.toString() },
			t.reason,
		);
	});
	engine.events.on("exit", (e) => {
		logger.info({ instrument: e.instrument, reason: e.decision.reason, sold: e.sold }, "exit");
	});

	await engine.start();

	const ticker = setInterval(() => {
		mid = drive(venue, mid);
	}, 250);

	const seconds = Number(process.env["SPIKEBOT_DEMO_SECONDS"] ?? "20");
	await sleep(seconds * 1_000);
	clearInterval(ticker);

	const report = await engine.stop(5_000);
	const positions = engine.positionsSnapshot();
	logger.info(
		{
			drained: report.drained,
			balance: engine.statusSnapshot().simBalance?.toFixed(2),
			positions: positions.lines.length,
			value: positions.totalValue.toFixed(2),
			realized: positions.realizedPnl.toFixed(2),
		},
		"demo finished",
	);
}

main().catch((error: unknown) => {
	console.error(error);
	process.exit(1);
});
