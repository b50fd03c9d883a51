import fs from "fs";
import path from "path";
import YahooFinance from "yahoo-finance2";
import { z } from "zod";
import logger from "../utils/logger";

// ── Shared Yahoo Finance instance ───────────────────────────────────────────

export const yf = new YahooFinance({ suppressNotices: ["ripHistorical", "yahooSurvey"] });

// ── Exported Types ───────────────────────────────────────────────────────────

export interface DailyPrice {
  date: string; // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface MarketDataProvider {
  /** Daily bars for `symbol` between `from` and `to`, oldest first. Empty when the provider has nothing. */
  fetchHistory(symbol: string, from: Date, to: Date): Promise<DailyPrice[]>;
}

export class MarketDataError extends Error {
  constructor(
    readonly symbol: string,
    message: string,
  ) {
    super(`${symbol}: ${message}`);
    this.name = "MarketDataError";
  }
}

export type SeriesFetch =
  | { ok: true; prices: DailyPrice[] }
  | { ok: false; reason: "fetch-failed" | "malformed-series"; detail: string };

// ── Zod Schemas ──────────────────────────────────────────────────────────────

// Yahoo rows may carry nulls on halted days; those rows are dropped, not the series.
const YahooRowSchema = z.object({
  date: z.coerce.date(),
  open: z.number().nullable().optional(),
  high: z.number().nullable().optional(),
  low: z.number().nullable().optional(),
  close: z.number().nullable().optional(),
  volume: z.number().nullable().optional(),
});

const YahooHistorySchema = z.array(YahooRowSchema);

const DailyPriceSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  open: z.number().positive(),
  high: z.number().positive(),
  low: z.number().positive(),
  close: z.number().positive(),
  volume: z.number().nonnegative(),
});

const CacheFileSchema = z.object({
  fetchedAt: z.number(),
  prices: z.array(DailyPriceSchema),
});

// ── Helpers ──────────────────────────────────────────────────────────────────

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isoDate(d: Date): string {
  return d.toISOString().split("T")[0];
}

/** Keeps valid rows, sorts by date, and drops duplicate dates (last one wins). */
export function sanitizeSeries(rows: DailyPrice[]): DailyPrice[] {
  const byDate = new Map<string, DailyPrice>();
  for (const row of rows) {
    if (DailyPriceSchema.safeParse(row).success) byDate.set(row.date, row);
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}

// ── Yahoo Finance provider ──────────────────────────────────────────────────

export class YahooMarketDataProvider implements MarketDataProvider {
  async fetchHistory(symbol: string, from: Date, to: Date): Promise<DailyPrice[]> {
    const results: unknown = await yf.historical(symbol, {
      period1: from,
      period2: to,
    });

    const parsed = YahooHistorySchema.safeParse(results);
    if (!parsed.success) {
      throw new MarketDataError(symbol, `unexpected history shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
    }

    const prices: DailyPrice[] = [];
    for (const row of parsed.data) {
      const { open, high, low, close } = row;
      if (open == null || high == null || low == null || close == null) continue;
      prices.push({
        date: isoDate(row.date),
        open,
        high,
        low,
        close,
        volume: row.volume ?? 0,
      });
    }

    const clean = sanitizeSeries(prices);
    logger.debug(`${symbol} prices: Yahoo Finance — ${clean.length} days`);
    return clean;
  }
}

// ── Disk cache ───────────────────────────────────────────────────────────────

const CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export class CachedMarketDataProvider implements MarketDataProvider {
  constructor(
    private readonly inner: MarketDataProvider,
    private readonly cacheDir = path.resolve(process.cwd(), "logs", "price_cache"),
    private readonly ttlMs = CACHE_TTL_MS,
  ) {}

  private cachePath(symbol: string, from: Date, to: Date): string {
    const safe = symbol.replace(/[^A-Za-z0-9._-]/g, "_");
    return path.join(this.cacheDir, `${safe}_${isoDate(from)}_${isoDate(to)}.json`);
  }

  private readCache(file: string): DailyPrice[] | null {
    if (!fs.existsSync(file)) return null;
    try {
      const raw = CacheFileSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
      if (Date.now() - raw.fetchedAt > this.ttlMs) return null; // stale
      return raw.prices;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.warn(`Ignoring unreadable price cache ${path.basename(file)}: ${msg}`);
      return null;
    }
  }

  async fetchHistory(symbol: string, from: Date, to: Date): Promise<DailyPrice[]> {
    const file = this.cachePath(symbol, from, to);
    const cached = this.readCache(file);
    if (cached) {
      logger.debug(`[cache] ${symbol.padEnd(8)} ${cached.length} days`);
      return cached;
    }

    const prices = await this.inner.fetchHistory(symbol, from, to);
    if (prices.length > 0) {
      fs.mkdirSync(this.cacheDir, { recursive: true });
      fs.writeFileSync(file, JSON.stringify({ fetchedAt: Date.now(), prices }, null, 2));
    }
    return prices;
  }
}

// ── Batch fetch ──────────────────────────────────────────────────────────────

/**
 * Fetches each ticker independently. A failing ticker is reported in its own
 * entry and never interrupts the rest of the batch.
 */
export async function fetchUniverseHistories(
  provider: MarketDataProvider,
  tickers: readonly string[],
  from: Date,
  to: Date,
  pauseMs = 0,
): Promise<Map<string, SeriesFetch>> {
  const out = new Map<string, SeriesFetch>();

  for (let i = 0; i < tickers.length; i++) {
    const ticker = tickers[i];
    try {
      const prices = await provider.fetchHistory(ticker, from, to);
      out.set(ticker, { ok: true, prices });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      const reason = err instanceof MarketDataError ? "malformed-series" : "fetch-failed";
      logger.warn(`${ticker} history unavailable (${reason}): ${msg}`);
      out.set(ticker, { ok: false, reason, detail: msg });
    }
    if (pauseMs > 0 && i < tickers.length - 1) await delay(pauseMs);
  }

  return out;
}

/** Calendar window ending at `asOf` that spans `days` days. */
export function windowFor(days: number, asOf: Date = new Date()): { from: Date; to: Date } {
  const from = new Date(asOf);
  from.setDate(from.getDate() - days);
  return { from, to: asOf };
}
