/**
 * Exact arithmetic for position sizes, prices and notional values.
 *
 * Size equality in the differ must never go through floating point, so every
 * monetary or quantity field in the domain is a Decimal.
 */

export { LibDecimal as Decimal } from "../lib/decimal/index.js";
