/**
 * Volatility-based confidence score (0–100). Higher recent volatility means a
 * less reliable path to the target inside one cycle.
 *
 *   25% annualized vol → ≈ 50
 *   50%+ annualized vol → 0
 *   10% annualized vol → ≈ 80
 */

export const NEUTRAL_CONFIDENCE = 50.0;
const TRADING_DAYS_PER_YEAR = 252;

export type ConfidenceLabel = "High" | "Moderate" | "Low" | "Very low";

/** Daily percentage returns between consecutive closes. */
export function pctReturns(closes: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    out.push(closes[i] / closes[i - 1] - 1);
  }
  return out;
}

/** Sample standard deviation (n − 1). NaN for fewer than two values. */
export function sampleStd(values: number[]): number {
  if (values.length < 2) return NaN;
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const sq = values.reduce((acc, v) => acc + (v - mean) ** 2, 0);
  return Math.sqrt(sq / (values.length - 1));
}

export function computeConfidence(closes: readonly number[] | null | undefined, window = 20): number {
  if (!closes || !Number.isInteger(window) || window < 2) return NEUTRAL_CONFIDENCE;
  if (closes.length < window + 1) return NEUTRAL_CONFIDENCE;

  const tail = closes.slice(-(window + 1));
  if (tail.some((c) => !Number.isFinite(c) || c <= 0)) return NEUTRAL_CONFIDENCE;

  const std = sampleStd(pctReturns(tail));
  if (!Number.isFinite(std)) return NEUTRAL_CONFIDENCE;

  const annualVolPct = std * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
  const score = Math.max(0, 100 - annualVolPct * 2);
  return parseFloat(score.toFixed(1));
}

export function confidenceLabel(score: number): ConfidenceLabel {
  if (score >= 75) return "High";
  if (score >= 50) return "Moderate";
  if (score >= 25) return "Low";
  return "Very low";
}
