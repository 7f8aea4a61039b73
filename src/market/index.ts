export type { BookLevel, BookSide, InstrumentMeta, Quote } from "./types.js";
export {
	buildQuote,
	depthSize,
	effectivePrice,
	midPrice,
	observedPrice,
	spread,
	topOfBookNotional,
} from "./orderbook.js";
