import fs from "fs";
import path from "path";
import { z } from "zod";
import logger from "./logger";

export const HISTORY_PATH = path.resolve(process.cwd(), "logs", "history.json");

const HistoryEntrySchema = z.object({
  ticker: z.string(),
  name: z.string(),
  date: z.string(),
  price: z.number(),
  targetPrice: z.number(),
  compositeScore: z.number(),
  confidenceScore: z.number(),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

/** Recorded recommendations; an absent or unreadable file yields an empty list. */
export function readHistory(file = HISTORY_PATH): HistoryEntry[] {
  if (!fs.existsSync(file)) return [];
  try {
    return z.array(HistoryEntrySchema).parse(JSON.parse(fs.readFileSync(file, "utf-8")));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.warn(`Ignoring unreadable history ${path.basename(file)}: ${msg}`);
    return [];
  }
}

/** Existing entries with the same ticker+date are replaced by the new ones. */
export function mergeHistory(existing: readonly HistoryEntry[], incoming: readonly HistoryEntry[]): HistoryEntry[] {
  const newKeys = new Set(incoming.map((e) => `${e.ticker}:${e.date}`));
  const deduped = existing.filter((e) => !newKeys.has(`${e.ticker}:${e.date}`));
  return [...deduped, ...incoming];
}

export function appendToHistory(entries: readonly HistoryEntry[], file = HISTORY_PATH): HistoryEntry[] {
  const merged = mergeHistory(readHistory(file), entries);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(merged, null, 2), "utf-8");
  return merged;
}

/** Entries from the most recent recorded date, in recorded order. */
export function latestPicks(entries: readonly HistoryEntry[]): HistoryEntry[] {
  if (entries.length === 0) return [];
  const lastDate = entries.reduce((max, e) => (e.date > max ? e.date : max), entries[0].date);
  return entries.filter((e) => e.date === lastDate);
}
