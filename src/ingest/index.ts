export { PriceIngestor } from "./price-ingestor.js";
export type { PriceIngestorConfig, PriceIngestorDeps } from "./price-ingestor.js";
