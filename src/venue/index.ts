export { PaperVenue } from "./paper-venue.js";
export type { PaperVenueConfig, PaperVenueMethod } from "./paper-venue.js";
export { QuoteService, describeQuoteError } from "./quote-service.js";
export type { QuoteReadOptions } from "./quote-service.js";
export { VenueClient } from "./venue-client.js";
export type { RawOrderRequest, VenueClientOptions, VenueProviders } from "./venue-client.js";
export {
	WatchlistResolver,
	loadSlugFile,
	pairsFromPositions,
	parsePairList,
	simSeedWatchlist,
	splitCsv,
} from "./watchlist.js";
export type { InstrumentPair, ResolvedWatchlist } from "./watchlist.js";
export { OrderType } from "./types.js";
export type {
	MarketOutcome,
	OrderAck,
	OrderRequest,
	QuoteError,
	ResolvedMarket,
	VenueGateway,
} from "./types.js";
