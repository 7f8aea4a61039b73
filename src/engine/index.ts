export { TradingEngine, buildStrategy } from "./trading-engine.js";
export type { EngineEvents, TradingEngineDeps } from "./trading-engine.js";
export { PositionsSync, groupPositions } from "./positions-sync.js";
export type { PositionsSyncDeps } from "./positions-sync.js";
export { StatusReporter, positionsSnapshot } from "./status-reporter.js";
export type {
	PositionLine,
	PositionsSnapshot,
	ReportTick,
	StatusReporterConfig,
	StatusReporterDeps,
	StatusSnapshot,
} from "./status-reporter.js";
