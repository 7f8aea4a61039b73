export { PriceRing } from "./price-ring.js";
export { SimLedger } from "./sim-ledger.js";
export type { LedgerSeed, SellFill } from "./sim-ledger.js";
export { SharedState } from "./shared-state.js";
export type { SharedStateOptions } from "./shared-state.js";
export type { ActiveTrade, GroupedPositions, PositionInfo, PricePoint } from "./types.js";
