import { DailyPrice } from "../fetchers/marketData";
import { HistoryEntry } from "../utils/history";

export type PickStatus = "target-hit" | "open" | "no-data";

export interface PickReview {
  ticker: string;
  date: string;
  entryPrice: number;
  targetPrice: number;
  lastClose: number | null;
  changePct: number | null;
  status: PickStatus;
  hitDate: string | null;
}

/**
 * Follows a recorded pick through the closes after its recommendation date.
 * The first close at or above the target marks it as hit.
 */
export function evaluatePick(entry: HistoryEntry, prices: readonly DailyPrice[]): PickReview {
  const after = prices.filter((p) => p.date > entry.date);
  const base = {
    ticker: entry.ticker,
    date: entry.date,
    entryPrice: entry.price,
    targetPrice: entry.targetPrice,
  };

  if (after.length === 0) {
    return { ...base, lastClose: null, changePct: null, status: "no-data", hitDate: null };
  }

  const last = after[after.length - 1].close;
  const changePct = entry.price > 0 ? parseFloat((((last - entry.price) / entry.price) * 100).toFixed(2)) : null;
  const hit = after.find((p) => p.close >= entry.targetPrice);

  return {
    ...base,
    lastClose: last,
    changePct,
    status: hit ? "target-hit" : "open",
    hitDate: hit ? hit.date : null,
  };
}

export interface ReviewStats {
  reviewed: number;
  hits: number;
  hitRate: number;       // percent, 1 decimal
  averageChange: number; // percent, 2 decimals
}

export function reviewStats(reviews: readonly PickReview[]): ReviewStats {
  const priced = reviews.filter((r) => r.status !== "no-data");
  const hits = priced.filter((r) => r.status === "target-hit").length;
  const changes = priced.map((r) => r.changePct ?? 0);
  return {
    reviewed: priced.length,
    hits,
    hitRate: priced.length > 0 ? parseFloat(((hits / priced.length) * 100).toFixed(1)) : 0,
    averageChange: changes.length > 0
      ? parseFloat((changes.reduce((a, b) => a + b, 0) / changes.length).toFixed(2))
      : 0,
  };
}
