/**
 * Multi-factor momentum scorer.
 *
 * Four raw factors per instrument, each min-max normalized across the
 * surviving universe, then combined with fixed weights:
 *
 *   - 12-month return relative to the benchmark : 35%
 *   - 3-month momentum (rate of change)         : 30%
 *   - 4-week stability (inverse weekly std)     : 20%
 *   - liquidity (avg daily traded value, 20d)   : 15%
 */

import logger from "../utils/logger";
import { StrategySettings } from "../config/settings";
import { Instrument, loadUniverse } from "../data/universe";
import {
  DailyPrice,
  MarketDataProvider,
  fetchUniverseHistories,
  isoDate,
  windowFor,
} from "../fetchers/marketData";
import { computeConfidence, pctReturns, sampleStd } from "./confidence";
import { computeTarget } from "./targets";

// ── Constants ────────────────────────────────────────────────────────────────

export const MIN_OBSERVATIONS  = 60;
export const MOMENTUM_SESSIONS = 63;  // ~3 months of trading days
export const LIQUIDITY_WINDOW  = 20;
export const STABILITY_WEEKS   = 4;
export const SCORING_HISTORY_DAYS = 365;

export const FACTOR_WEIGHTS = {
  relativeReturn: 0.35,
  momentum:       0.30,
  stability:      0.20,
  liquidity:      0.15,
} as const;

export type FactorName = keyof typeof FACTOR_WEIGHTS;

// ── Types ────────────────────────────────────────────────────────────────────

export interface FactorRow {
  ticker: string;
  name: string;
  sector: string;
  price: number;
  targetPrice: number;
  confidenceScore: number;
  relativeReturnPct: number;
  momentumPct: number;
  stability: number;
  liquidity: number;
}

export type NormalizedFactors = Record<FactorName, number>;

export interface ScoredCandidate extends FactorRow {
  normalized: NormalizedFactors;
  compositeScore: number;
}

export type SkipReason = "fetch-failed" | "malformed-series" | "insufficient-data";

export interface SkipRecord {
  ticker: string;
  reason: SkipReason;
  detail: string;
}

export type FactorResult =
  | { ok: true; row: FactorRow }
  | { ok: false; skip: SkipRecord };

export type ScoringResult =
  | { ok: true; candidates: ScoredCandidate[]; skipped: SkipRecord[] }
  | { ok: false; error: string; skipped: SkipRecord[] };

export interface ScoringInput {
  instrument: Instrument;
  prices: DailyPrice[];
}

// ── Factor helpers ───────────────────────────────────────────────────────────

function round(value: number, decimals: number): number {
  return parseFloat(value.toFixed(decimals));
}

/** last / first − 1; 0 when there are fewer than two points. */
export function periodReturn(closes: readonly number[]): number {
  if (closes.length < 2) return 0;
  return closes[closes.length - 1] / closes[0] - 1;
}

/** Sunday closing the calendar week that contains `date` (YYYY-MM-DD). */
export function weekEndingKey(date: string): string {
  const d = new Date(`${date}T00:00:00Z`);
  const day = d.getUTCDay(); // 0 = Sunday
  d.setUTCDate(d.getUTCDate() + ((7 - day) % 7));
  return isoDate(d);
}

/** Last close of each calendar week, oldest week first. */
export function weeklyCloses(prices: readonly DailyPrice[]): number[] {
  const out: number[] = [];
  let currentKey: string | null = null;
  for (const p of prices) {
    const key = weekEndingKey(p.date);
    if (key === currentKey) {
      out[out.length - 1] = p.close;
    } else {
      out.push(p.close);
      currentKey = key;
    }
  }
  return out;
}

/** 1 / (1 + std of the last 4 weekly returns); 1.0 when that std is zero or undefined. */
export function computeStability(prices: readonly DailyPrice[]): number {
  const weekly = pctReturns(weeklyCloses(prices));
  const lastWeeks = weekly.slice(-STABILITY_WEEKS);
  const std = lastWeeks.length > 1 ? sampleStd(lastWeeks) : 0;
  if (!Number.isFinite(std) || std <= 0) return 1.0;
  return 1 / (1 + std);
}

/** Average close × volume over the trailing 20 sessions. */
export function computeLiquidity(prices: readonly DailyPrice[]): number {
  const recent = prices
    .slice(-LIQUIDITY_WINDOW)
    .filter((p) => Number.isFinite(p.volume));
  if (recent.length === 0) return 0;
  return recent.reduce((acc, p) => acc + p.close * p.volume, 0) / recent.length;
}

/** Rate of change from 63 sessions back (or the first close) to the last close. */
export function computeMomentum(closes: readonly number[]): number {
  if (closes.length === 0) return 0;
  const idx = Math.max(0, closes.length - MOMENTUM_SESSIONS);
  return closes[closes.length - 1] / closes[idx] - 1;
}

/** Instrument return minus the benchmark's return over the instrument's own date span. */
export function computeRelativeReturn(
  prices: readonly DailyPrice[],
  benchmark: readonly DailyPrice[],
): number {
  if (prices.length < 2) return 0;
  const first = prices[0].date;
  const last = prices[prices.length - 1].date;
  const benchCloses = benchmark
    .filter((b) => b.date >= first && b.date <= last && Number.isFinite(b.close) && b.close > 0)
    .map((b) => b.close);
  return periodReturn(prices.map((p) => p.close)) - periodReturn(benchCloses);
}

/**
 * Min-max normalization to [0, 1]. A column with no finite spread maps to 0.5
 * everywhere; an individual non-finite value maps to 0.5.
 */
export function safeNormalize(values: readonly number[]): number[] {
  const finite = values.filter((v) => Number.isFinite(v));
  if (finite.length === 0) return values.map(() => 0.5);

  const min = Math.min(...finite);
  const max = Math.max(...finite);
  const range = max - min;
  if (!Number.isFinite(range) || range === 0) return values.map(() => 0.5);

  return values.map((v) => (Number.isFinite(v) ? (v - min) / range : 0.5));
}

// ── Per-instrument factors ──────────────────────────────────────────────────

export function computeFactorRow(
  instrument: Instrument,
  prices: readonly DailyPrice[],
  benchmark: readonly DailyPrice[],
  settings: StrategySettings,
): FactorResult {
  const clean = prices.filter((p) => Number.isFinite(p.close) && p.close > 0);
  if (clean.length < MIN_OBSERVATIONS) {
    return {
      ok: false,
      skip: {
        ticker: instrument.ticker,
        reason: "insufficient-data",
        detail: `${clean.length} closes, need ${MIN_OBSERVATIONS}`,
      },
    };
  }

  const closes = clean.map((p) => p.close);
  const currentPrice = closes[closes.length - 1];

  return {
    ok: true,
    row: {
      ticker: instrument.ticker,
      name: instrument.name,
      sector: instrument.sector,
      price: round(currentPrice, 2),
      targetPrice: round(
        computeTarget(currentPrice, settings.investmentAmount, settings.grossTargetPct, settings.fees),
        2,
      ),
      confidenceScore: computeConfidence(closes),
      relativeReturnPct: round(computeRelativeReturn(clean, benchmark) * 100, 2),
      momentumPct: round(computeMomentum(closes) * 100, 2),
      stability: round(computeStability(clean), 4),
      liquidity: computeLiquidity(clean),
    },
  };
}

// ── Ranking ──────────────────────────────────────────────────────────────────

/** Normalizes the surviving rows and returns every one of them with its composite score, best first. */
export function scoreRows(rows: readonly FactorRow[]): ScoredCandidate[] {
  const columns: Record<FactorName, number[]> = {
    relativeReturn: safeNormalize(rows.map((r) => r.relativeReturnPct)),
    momentum:       safeNormalize(rows.map((r) => r.momentumPct)),
    stability:      safeNormalize(rows.map((r) => r.stability)),
    liquidity:      safeNormalize(rows.map((r) => r.liquidity)),
  };

  const scored = rows.map((row, i): ScoredCandidate => {
    const normalized: NormalizedFactors = {
      relativeReturn: columns.relativeReturn[i],
      momentum:       columns.momentum[i],
      stability:      columns.stability[i],
      liquidity:      columns.liquidity[i],
    };
    const weighted =
      FACTOR_WEIGHTS.relativeReturn * normalized.relativeReturn +
      FACTOR_WEIGHTS.momentum       * normalized.momentum +
      FACTOR_WEIGHTS.stability      * normalized.stability +
      FACTOR_WEIGHTS.liquidity      * normalized.liquidity;
    return { ...row, normalized, compositeScore: round(weighted * 100, 1) };
  });

  return scored.sort((a, b) => b.compositeScore - a.compositeScore);
}

export function rankCandidates(
  inputs: readonly ScoringInput[],
  benchmark: readonly DailyPrice[],
  settings: StrategySettings,
  priorSkips: readonly SkipRecord[] = [],
): ScoringResult {
  const skipped: SkipRecord[] = [...priorSkips];
  const rows: FactorRow[] = [];

  for (const { instrument, prices } of inputs) {
    const result = computeFactorRow(instrument, prices, benchmark, settings);
    if (result.ok) rows.push(result.row);
    else skipped.push(result.skip);
  }

  if (rows.length === 0) {
    return { ok: false, error: "No instrument had enough usable history to score.", skipped };
  }

  return { ok: true, candidates: scoreRows(rows).slice(0, settings.topN), skipped };
}

// ── Fetch + rank ─────────────────────────────────────────────────────────────

export interface ScoringDeps {
  provider: MarketDataProvider;
  instruments?: readonly Instrument[];
  asOf?: Date;
  pauseMs?: number;
}

export async function computeScores(
  settings: StrategySettings,
  deps: ScoringDeps,
): Promise<ScoringResult> {
  const instruments = deps.instruments ?? loadUniverse().instruments;
  const { from, to } = windowFor(SCORING_HISTORY_DAYS, deps.asOf);

  logger.info(`Scoring ${instruments.length} instruments against ${settings.benchmark} (${isoDate(from)} → ${isoDate(to)})`);

  const benchmarkFetch = await fetchUniverseHistories(deps.provider, [settings.benchmark], from, to);
  const bench = benchmarkFetch.get(settings.benchmark);
  const benchmark = bench?.ok ? bench.prices : [];
  if (benchmark.length < 2) {
    logger.warn(`Benchmark ${settings.benchmark} unavailable — relative return falls back to raw return`);
  }

  const histories = await fetchUniverseHistories(
    deps.provider,
    instruments.map((i) => i.ticker),
    from,
    to,
    deps.pauseMs ?? 0,
  );

  const inputs: ScoringInput[] = [];
  const fetchSkips: SkipRecord[] = [];
  for (const instrument of instruments) {
    const fetched = histories.get(instrument.ticker);
    if (!fetched) continue;
    if (fetched.ok) inputs.push({ instrument, prices: fetched.prices });
    else fetchSkips.push({ ticker: instrument.ticker, reason: fetched.reason, detail: fetched.detail });
  }

  const result = rankCandidates(inputs, benchmark, settings, fetchSkips);

  for (const s of result.skipped) {
    logger.warn(`${s.ticker} skipped (${s.reason}): ${s.detail}`);
  }
  if (result.ok) {
    logger.info(`Ranked ${result.candidates.length} candidates, ${result.skipped.length} instruments skipped`);
  } else {
    logger.error(result.error);
  }

  return result;
}
