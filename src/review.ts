import dotenv from "dotenv";
dotenv.config();

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { CachedMarketDataProvider, YahooMarketDataProvider, fetchUniverseHistories, isoDate } from "./fetchers/marketData";
import { evaluatePick, reviewStats, PickReview } from "./analyzers/tracker";
import { readHistory } from "./utils/history";
import logger from "./utils/logger";
import { sendSignal } from "./utils/telegram";

// ── CLI Arguments ────────────────────────────────────────────────────────────

const argv = yargs(hideBin(process.argv))
  .option("days", {
    alias: "d",
    type: "number",
    default: 28,
    describe: "Review picks recorded in the last N days",
  })
  .option("notify", {
    type: "boolean",
    default: false,
    describe: "Send the report to Telegram",
  })
  .strict()
  .parseSync();

function sign(n: number): string {
  return (n >= 0 ? "+" : "") + n.toFixed(2) + "%";
}

// ── Main ─────────────────────────────────────────────────────────────────────

async function main() {
  logger.info("Recommendation Review");

  const history = readHistory();
  if (history.length === 0) {
    throw new Error("logs/history.json is empty or missing. Run 'npm run scan' first.");
  }

  const now = new Date();
  const since = new Date(now);
  since.setDate(now.getDate() - argv.days);
  const sinceLabel = isoDate(since);

  const entries = history.filter((e) => e.date >= sinceLabel && e.price > 0);
  logger.info(`History entries: ${history.length} total, ${entries.length} since ${sinceLabel}`);

  if (entries.length === 0) {
    logger.info("No picks to review in this window.");
    return;
  }

  const tickers = [...new Set(entries.map((e) => e.ticker))];
  logger.info(`Fetching prices for ${tickers.length} tickers...`);

  const provider = new CachedMarketDataProvider(new YahooMarketDataProvider());
  const histories = await fetchUniverseHistories(provider, tickers, since, now, 300);

  const reviews: PickReview[] = entries.map((e) => {
    const fetched = histories.get(e.ticker);
    return evaluatePick(e, fetched?.ok ? fetched.prices : []);
  });
  const stats = reviewStats(reviews);

  logger.info(`${"═".repeat(60)}`);
  logger.info(`  REVIEW ${sinceLabel} → ${isoDate(now)}`);
  logger.info(`${"─".repeat(60)}`);
  for (const r of reviews) {
    const change = r.changePct !== null ? sign(r.changePct) : "n/a";
    const status = r.status === "target-hit" ? `HIT ${r.hitDate}` : r.status.toUpperCase();
    logger.info(`  ${r.date} ${r.ticker.padEnd(8)} ${r.entryPrice.toFixed(2).padStart(8)} → ${r.targetPrice.toFixed(2).padEnd(8)} ${change.padStart(8)}  ${status}`);
  }
  logger.info(`${"─".repeat(60)}`);
  logger.info(`  Reviewed: ${stats.reviewed} | Hits: ${stats.hits} (${stats.hitRate}%) | Avg change: ${sign(stats.averageChange)}`);
  logger.info(`${"═".repeat(60)}`);

  if (argv.notify) {
    await sendSignal(
      [
        `📊 *Recommendation Review*`,
        `_${sinceLabel} → ${isoDate(now)}_`,
        ``,
        `📦 Picks reviewed: *${stats.reviewed}*`,
        `🎯 Targets reached: *${stats.hits} (${stats.hitRate}%)*`,
        `📈 Average change: *${sign(stats.averageChange)}*`,
      ].join("\n"),
    );
  }
}

// ── Run ───────────────────────────────────────────────────────────────────────

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
