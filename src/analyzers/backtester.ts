/**
 * Walk-forward replay of the bi-weekly strategy.
 *
 * The common trading calendar of all tickers is cut into consecutive cycles of
 * `intervalDays` sessions. In each cycle every ticker is bought at the first
 * close and sold on the first close that reaches the fee-aware target, or at
 * the last close of the cycle when the target is never touched.
 */

import logger from "../utils/logger";
import { StrategySettings } from "../config/settings";
import {
  DailyPrice,
  MarketDataProvider,
  fetchUniverseHistories,
  isoDate,
  windowFor,
} from "../fetchers/marketData";
import { computeNetGain, computeShares, computeTarget } from "./targets";

// Extra calendar days fetched beyond the lookback so the window is fully covered.
const FETCH_MARGIN_DAYS = 60;

// ── Types ────────────────────────────────────────────────────────────────────

export type TradeOutcome = "target-hit" | "cycle-end";

export interface SimulatedTrade {
  ticker: string;
  cycle: number;
  entryDate: string;
  entryPrice: number;
  exitDate: string;
  exitPrice: number;
  targetPrice: number;
  quantity: number;
  netPnl: number;
  outcome: TradeOutcome;
}

export interface EquityPoint {
  date: string;
  cumulativePnl: number;
}

export interface BacktestSummary {
  totalPnl: number;
  tradeCount: number;
  wins: number;
  winRate: number;      // percent, 1 decimal
  targetHits: number;
  bestTrade: number;
  worstTrade: number;
  averageTrade: number;
  maxDrawdown: number;  // currency, peak-to-trough on cumulative P&L
}

export interface BacktestReport {
  ok: true;
  tradeLog: SimulatedTrade[];
  equityCurve: EquityPoint[];
  summary: BacktestSummary;
  startDate: string;
  endDate: string;
  commonDates: number;
  cycles: number;
  skippedTrades: number;
}

export interface BacktestFailure {
  ok: false;
  error: string;
}

export type BacktestResult = BacktestReport | BacktestFailure;

interface Cycle {
  index: number;
  dates: string[];
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function round(value: number, decimals: number): number {
  return parseFloat(value.toFixed(decimals));
}

/** Sorted dates present in every series. */
export function commonTradingDates(series: ReadonlyMap<string, readonly DailyPrice[]>): string[] {
  let common: Set<string> | null = null;
  for (const prices of series.values()) {
    const dates = new Set(prices.map((p) => p.date));
    common = common === null
      ? dates
      : new Set([...common].filter((d: string) => dates.has(d)));
  }
  return common === null ? [] : [...common].sort();
}

/**
 * Consecutive, non-overlapping cycles of `intervalDays` dates. The final
 * cycle is clamped to the last date; a trailing single date is not a cycle.
 */
export function partitionCycles(dates: readonly string[], intervalDays: number): Cycle[] {
  const cycles: Cycle[] = [];
  for (let start = 0; start < dates.length; start += intervalDays) {
    const end = Math.min(start + intervalDays - 1, dates.length - 1);
    if (end <= start) break;
    cycles.push({ index: cycles.length, dates: dates.slice(start, end + 1) });
  }
  return cycles;
}

/** Cumulative P&L ordered by exit date. The last point equals the sum of all trades. */
export function buildEquityCurve(trades: readonly SimulatedTrade[]): EquityPoint[] {
  const byExit = [...trades].sort((a, b) => a.exitDate.localeCompare(b.exitDate));
  let cumulative = 0;
  return byExit.map((t) => {
    cumulative += t.netPnl;
    return { date: t.exitDate, cumulativePnl: round(cumulative, 2) };
  });
}

export function calcMaxDrawdown(curve: readonly EquityPoint[]): number {
  let peak = 0;
  let maxDD = 0;
  for (const point of curve) {
    if (point.cumulativePnl > peak) peak = point.cumulativePnl;
    const dd = peak - point.cumulativePnl;
    if (dd > maxDD) maxDD = dd;
  }
  return round(maxDD, 2);
}

export function summarize(trades: readonly SimulatedTrade[], curve: readonly EquityPoint[]): BacktestSummary {
  const pnls = trades.map((t) => t.netPnl);
  const n = pnls.length;
  const total = pnls.reduce((a, b) => a + b, 0);
  const wins = pnls.filter((p) => p > 0).length;

  return {
    totalPnl:     round(total, 2),
    tradeCount:   n,
    wins,
    winRate:      n > 0 ? round((wins / n) * 100, 1) : 0,
    targetHits:   trades.filter((t) => t.outcome === "target-hit").length,
    bestTrade:    n > 0 ? round(Math.max(...pnls), 2) : 0,
    worstTrade:   n > 0 ? round(Math.min(...pnls), 2) : 0,
    averageTrade: n > 0 ? round(total / n, 2) : 0,
    maxDrawdown:  calcMaxDrawdown(curve),
  };
}

// ── Single trade ─────────────────────────────────────────────────────────────

function simulateTrade(
  ticker: string,
  cycle: Cycle,
  closes: ReadonlyMap<string, number>,
  settings: StrategySettings,
): SimulatedTrade | null {
  const entryDate = cycle.dates[0];
  const entryPrice = closes.get(entryDate);
  if (entryPrice === undefined || !(entryPrice > 0)) return null;

  const targetPrice = computeTarget(entryPrice, settings.investmentAmount, settings.grossTargetPct, settings.fees);
  const quantity = computeShares(entryPrice, settings.investmentAmount, settings.fees);
  if (quantity <= 0) return null;

  let exit: { date: string; price: number; outcome: TradeOutcome } | null = null;
  for (const date of cycle.dates) {
    const close = closes.get(date);
    if (close === undefined) return null;
    if (close >= targetPrice) {
      exit = { date, price: close, outcome: "target-hit" };
      break;
    }
  }

  if (exit === null) {
    const lastDate = cycle.dates[cycle.dates.length - 1];
    const lastClose = closes.get(lastDate);
    if (lastClose === undefined) return null;
    exit = { date: lastDate, price: lastClose, outcome: "cycle-end" };
  }

  return {
    ticker,
    cycle: cycle.index,
    entryDate,
    entryPrice: round(entryPrice, 2),
    exitDate: exit.date,
    exitPrice: round(exit.price, 2),
    targetPrice,
    quantity: round(quantity, 6),
    netPnl: computeNetGain(entryPrice, exit.price, quantity, settings.fees),
    outcome: exit.outcome,
  };
}

// ── Simulation ───────────────────────────────────────────────────────────────

export function simulateBacktest(
  seriesByTicker: ReadonlyMap<string, readonly DailyPrice[]>,
  settings: StrategySettings,
  asOf: Date = new Date(),
): BacktestResult {
  const series = new Map<string, readonly DailyPrice[]>();
  for (const [ticker, prices] of seriesByTicker) {
    if (prices.length > 0) series.set(ticker, prices);
  }
  if (series.size === 0) {
    return { ok: false, error: "No price data available for the backtest." };
  }

  const cutoff = isoDate(windowFor(settings.lookbackDays, asOf).from);
  const dates = commonTradingDates(series).filter((d) => d >= cutoff);

  if (dates.length < settings.intervalDays) {
    return {
      ok: false,
      error: `Not enough data: only ${dates.length} common trading days (need ${settings.intervalDays}).`,
    };
  }

  const closeLookup = new Map<string, Map<string, number>>();
  for (const [ticker, prices] of series) {
    closeLookup.set(ticker, new Map(prices.map((p) => [p.date, p.close])));
  }

  const cycles = partitionCycles(dates, settings.intervalDays);
  const trades: SimulatedTrade[] = [];
  let skippedTrades = 0;

  for (const cycle of cycles) {
    for (const [ticker, closes] of closeLookup) {
      const trade = simulateTrade(ticker, cycle, closes, settings);
      if (trade) trades.push(trade);
      else skippedTrades++;
    }
  }

  if (trades.length === 0) {
    return { ok: false, error: "No trades could be simulated." };
  }

  const equityCurve = buildEquityCurve(trades);

  return {
    ok: true,
    tradeLog: trades,
    equityCurve,
    summary: summarize(trades, equityCurve),
    startDate: dates[0],
    endDate: dates[dates.length - 1],
    commonDates: dates.length,
    cycles: cycles.length,
    skippedTrades,
  };
}

// ── Fetch + simulate ─────────────────────────────────────────────────────────

export interface BacktestDeps {
  provider: MarketDataProvider;
  asOf?: Date;
  pauseMs?: number;
}

export async function runBacktest(
  tickers: readonly string[],
  settings: StrategySettings,
  deps: BacktestDeps,
): Promise<BacktestResult> {
  const asOf = deps.asOf ?? new Date();
  const { from, to } = windowFor(settings.lookbackDays + FETCH_MARGIN_DAYS, asOf);

  logger.info(`Backtesting ${tickers.length} tickers — ${settings.intervalDays}-session cycles over ${settings.lookbackDays} days`);

  const histories = await fetchUniverseHistories(deps.provider, tickers, from, to, deps.pauseMs ?? 0);
  const series = new Map<string, DailyPrice[]>();
  for (const [ticker, fetched] of histories) {
    if (fetched.ok && fetched.prices.length > 0) series.set(ticker, fetched.prices);
    else logger.warn(`${ticker} excluded from backtest: ${fetched.ok ? "no data" : fetched.detail}`);
  }

  const result = simulateBacktest(series, settings, asOf);
  if (!result.ok) {
    logger.error(`Backtest failed: ${result.error}`);
  } else if (result.skippedTrades > 0) {
    logger.warn(`${result.skippedTrades} trade(s) skipped on unusable prices`);
  }
  return result;
}
