export type {
	IntentSink,
	Strategy,
	StrategyContext,
	StrategyTrigger,
	TradeIntent,
	TradeIntentKind,
} from "./types.js";

export { SignalWorker } from "./signal-worker.js";
export type { SignalWorkerConfig, SignalWorkerDeps } from "./signal-worker.js";

export { SpikeDetector, spikeWindow } from "./detectors/spike-detector.js";
export type { SpikeConfig, SpikeReading } from "./detectors/spike-detector.js";
export { MeanReversionStrategy } from "./detectors/mean-reversion.js";
export type { MeanReversionConfig } from "./detectors/mean-reversion.js";
export { PairArbitrageStrategy } from "./detectors/pair-arbitrage.js";
export type { PairArbitrageConfig } from "./detectors/pair-arbitrage.js";
export { MarketMakerStrategy } from "./detectors/market-maker.js";
export type { MarketMakerConfig } from "./detectors/market-maker.js";

export { mean, populationStdev, simpleReturns, zScore } from "./statistics.js";
export type { ZScore } from "./statistics.js";
