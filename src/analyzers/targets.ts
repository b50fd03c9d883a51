/**
 * Fee-aware price targets for the bi-weekly strategy.
 *
 * A position is opened with a fixed cash amount. The buy fee comes out of that
 * amount, so the share count is:
 *
 *   shares = (investment − buyFee) / entryPrice
 *
 * The target is the sell price at which the proceeds cover the gross target
 * on the invested amount plus the sell fee:
 *
 *   target = (investment × (1 + gross) + sellFee) / shares
 */

export type FeeStructure =
  | { mode: "flat"; flatFee: number }
  | { mode: "pct"; pctFee: number };

export const DEFAULT_FLAT_FEE = 1.99;
export const DEFAULT_PCT_FEE  = 0.005;

function round(value: number, decimals: number): number {
  return parseFloat(value.toFixed(decimals));
}

/** Fee charged on the buy leg for a given invested amount. */
export function buyFee(investment: number, fees: FeeStructure): number {
  return fees.mode === "flat" ? fees.flatFee : investment * fees.pctFee;
}

/** Fee charged on the sell leg once the gross target is reached (post-gain notional in pct mode). */
export function sellFee(investment: number, grossTargetPct: number, fees: FeeStructure): number {
  return fees.mode === "flat"
    ? fees.flatFee
    : investment * (1 + grossTargetPct) * fees.pctFee;
}

/** Fractional share count bought with `investment` at `entryPrice`. Zero when the price is unusable. */
export function computeShares(entryPrice: number, investment: number, fees: FeeStructure): number {
  if (!(entryPrice > 0)) return 0;
  const shares = (investment - buyFee(investment, fees)) / entryPrice;
  return Number.isFinite(shares) ? shares : 0;
}

/**
 * Sell price needed to realize `grossTargetPct` on `investment` after both fees.
 * Rounded to 4 decimals: shares are fractional, so cent rounding would drift.
 */
export function computeTarget(
  entryPrice: number,
  investment: number,
  grossTargetPct: number,
  fees: FeeStructure,
): number {
  const shares = computeShares(entryPrice, investment, fees);
  const totalOut = investment * (1 + grossTargetPct) + sellFee(investment, grossTargetPct, fees);

  const target = shares > 0
    ? totalOut / shares
    : entryPrice * (1 + grossTargetPct);

  return round(target, 4);
}

/** Net P&L of a round trip after both legs' fees, rounded to cents. */
export function computeNetGain(
  entryPrice: number,
  exitPrice: number,
  qty: number,
  fees: FeeStructure,
): number {
  const gross = (exitPrice - entryPrice) * qty;
  const totalFees = fees.mode === "flat"
    ? 2 * fees.flatFee
    : entryPrice * qty * fees.pctFee + exitPrice * qty * fees.pctFee;
  return round(gross - totalFees, 2);
}

/** Minimum gross move, in percent, that pays for both fees on `investment`. */
export function computeBreakeven(investment: number, fees: FeeStructure): number {
  const totalFees = fees.mode === "flat"
    ? 2 * fees.flatFee
    : investment * fees.pctFee * 2;
  if (!(investment > 0)) return 0;
  return round((totalFees / investment) * 100, 2);
}

/** Gross target (fraction) that leaves `netTargetPct` after the round-trip fee drag. */
export function grossTargetFromNet(
  netTargetPct: number,
  investment: number,
  fees: FeeStructure,
): number {
  if (!(investment > 0)) return netTargetPct;
  return netTargetPct + (2 * buyFee(investment, fees)) / investment;
}
