import axios from "axios";
import { z } from "zod";
import logger from "../utils/logger";
import { isoDate, yf } from "./marketData";

const FINNHUB_BASE_URL = "https://finnhub.io/api/v1";
const API_TIMEOUT = 15_000; // 15 seconds
const MIN_PRIMARY_ITEMS = 2;

export interface NewsItem {
  title: string;
  source: string;
  publishedAt: Date | null;
  url: string;
}

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const CompanyNewsItemSchema = z.object({
  datetime: z.number(),
  headline: z.string(),
  source: z.string(),
  url: z.string().optional().default(""),
});

const CompanyNewsResponseSchema = z.array(CompanyNewsItemSchema);

const YahooSearchSchema = z.object({
  news: z
    .array(
      z.object({
        title: z.string(),
        publisher: z.string().optional(),
        link: z.string().optional(),
        providerPublishTime: z.coerce.date().optional(),
      }),
    )
    .default([]),
});

// ── Finnhub ──────────────────────────────────────────────────────────────────

export async function fetchCompanyNews(
  symbol: string,
  from: Date,
  to: Date,
  maxItems = 5,
): Promise<NewsItem[]> {
  const token = process.env.FINNHUB_API_KEY;
  if (!token) {
    logger.warn("FINNHUB_API_KEY is not set — skipping company news");
    return [];
  }

  try {
    const { data } = await axios.get(
      `${FINNHUB_BASE_URL}/company-news`,
      { params: { symbol, from: isoDate(from), to: isoDate(to), token }, timeout: API_TIMEOUT },
    );

    const parsed = CompanyNewsResponseSchema.parse(data);

    return parsed.slice(0, maxItems).map((item) => ({
      title: item.headline,
      source: item.source,
      publishedAt: item.datetime > 0 ? new Date(item.datetime * 1000) : null,
      url: item.url,
    }));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.warn(`Company news unavailable for ${symbol}: ${msg}`);
    return [];
  }
}

// ── Yahoo search fallback ────────────────────────────────────────────────────

export async function fetchYahooNews(query: string, maxItems = 5): Promise<NewsItem[]> {
  if (maxItems <= 0) return [];
  try {
    const result: unknown = await yf.search(query, { newsCount: maxItems, quotesCount: 0 });
    const parsed = YahooSearchSchema.parse(result);
    return parsed.news.slice(0, maxItems).map((n) => ({
      title: n.title,
      source: n.publisher ?? "Yahoo Finance",
      publishedAt: n.providerPublishTime ?? null,
      url: n.link ?? "",
    }));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.warn(`Yahoo news search failed for ${query}: ${msg}`);
    return [];
  }
}

/**
 * Recent headlines for `symbol`: Finnhub first, topped up from a Yahoo search
 * on the symbol when Finnhub yields fewer than two items.
 */
export async function getRecentNews(symbol: string, lookbackDays = 7, maxItems = 5): Promise<NewsItem[]> {
  const to = new Date();
  const from = new Date(to);
  from.setDate(from.getDate() - lookbackDays);

  const news = await fetchCompanyNews(symbol, from, to, maxItems);
  if (news.length >= MIN_PRIMARY_ITEMS) return news;

  const seen = new Set(news.map((n) => n.title));
  const extra = (await fetchYahooNews(symbol, maxItems - news.length)).filter((n) => !seen.has(n.title));
  return [...news, ...extra].slice(0, maxItems);
}

// ── Formatting ───────────────────────────────────────────────────────────────

export function newsToText(items: readonly NewsItem[]): string {
  if (items.length === 0) return "No recent news available.";
  return items
    .map((n) => {
      const when = n.publishedAt ? ` (${isoDate(n.publishedAt)})` : "";
      return `• [${n.source}]${when} ${n.title}`;
    })
    .join("\n");
}
