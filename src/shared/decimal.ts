/**
 * Decimal — safe financial math facade.
 *
 * All financial values (prices, sizes, balances, P&L) MUST use Decimal.
 * Never use raw `number` for money. Backed by decimal.js-light through
 * the lib wrapper so the dependency stays behind one import path.
 */

export { LibDecimal as Decimal } from "../lib/decimal/index.js";
