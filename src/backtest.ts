/**
 * Backtest CLI
 *
 * Replays the bi-weekly strategy over the last LOOKBACK_DAYS on either the
 * tickers given with --tickers or the most recent picks in logs/history.json.
 *
 * Writes logs/backtest_results.json.
 */

import dotenv from "dotenv";
dotenv.config();

import fs from "fs";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadSettings, describeFees, SettingsOverrides } from "./config/settings";
import { CachedMarketDataProvider, YahooMarketDataProvider, isoDate } from "./fetchers/marketData";
import { runBacktest, SimulatedTrade } from "./analyzers/backtester";
import { kellyFraction } from "./analyzers/moneyManagement";
import { latestPicks, readHistory } from "./utils/history";
import logger from "./utils/logger";
import { sendSignal, formatBacktestDigest } from "./utils/telegram";

// ── CLI Arguments ────────────────────────────────────────────────────────────

const argv = yargs(hideBin(process.argv))
  .option("tickers", {
    alias: "t",
    type: "string",
    describe: "Comma-separated tickers (default: latest scanner picks)",
  })
  .option("lookback", {
    type: "number",
    describe: "Calendar days to replay (overrides LOOKBACK_DAYS)",
  })
  .option("interval", {
    type: "number",
    describe: "Sessions per cycle (overrides INTERVAL_DAYS)",
  })
  .option("notify", {
    type: "boolean",
    default: false,
    describe: "Send the summary to Telegram",
  })
  .strict()
  .parseSync();

const OUTPUT_PATH = path.resolve(process.cwd(), "logs", "backtest_results.json");

// ── Helpers ──────────────────────────────────────────────────────────────────

function resolveTickers(): string[] {
  if (argv.tickers) {
    return argv.tickers
      .split(",")
      .map((t) => t.trim().toUpperCase())
      .filter((t) => t.length > 0);
  }
  return latestPicks(readHistory()).map((e) => e.ticker);
}

function averageOf(trades: SimulatedTrade[]): number {
  return trades.length ? trades.reduce((s, t) => s + t.netPnl, 0) / trades.length : 0;
}

// ── Main ─────────────────────────────────────────────────────────────────────

async function main() {
  const overrides: SettingsOverrides = {};
  if (argv.lookback !== undefined) overrides.lookbackDays = argv.lookback;
  if (argv.interval !== undefined) overrides.intervalDays = argv.interval;
  const settings = loadSettings(process.env, overrides);

  const tickers = resolveTickers();
  if (tickers.length === 0) {
    throw new Error("No tickers to backtest: pass --tickers or run the scanner first");
  }

  logger.info(`Backtest — ${tickers.join(", ")} | Fees: ${describeFees(settings.fees)}`);

  const provider = new CachedMarketDataProvider(new YahooMarketDataProvider());
  const result = await runBacktest(tickers, settings, { provider, pauseMs: 300 });
  if (!result.ok) {
    throw new Error(result.error);
  }

  const { summary, tradeLog } = result;

  fs.mkdirSync(path.dirname(OUTPUT_PATH), { recursive: true });
  fs.writeFileSync(
    OUTPUT_PATH,
    JSON.stringify(
      {
        generated_at: isoDate(new Date()),
        tickers,
        settings,
        start_date: result.startDate,
        end_date: result.endDate,
        common_dates: result.commonDates,
        cycles: result.cycles,
        summary,
        equity_curve: result.equityCurve,
        trades: tradeLog,
      },
      null,
      2,
    ),
  );

  const winners = tradeLog.filter((t) => t.netPnl > 0);
  const losers  = tradeLog.filter((t) => t.netPnl <= 0);
  const winRate = summary.tradeCount > 0 ? summary.wins / summary.tradeCount : 0;
  const kelly   = kellyFraction(winRate, averageOf(winners), Math.abs(averageOf(losers)));

  // ── Summary ────────────────────────────────────────────────────────────────
  const sep = "═".repeat(55);
  logger.info(sep);
  logger.info(`  BACKTEST COMPLETE — ${result.startDate} → ${result.endDate}`);
  logger.info("─".repeat(55));
  logger.info(`  Common sessions  : ${result.commonDates} (${result.cycles} cycles)`);
  logger.info(`  Trades simulated : ${summary.tradeCount}`);
  logger.info(`  Win Rate         : ${summary.winRate}%`);
  logger.info(`  Target hits      : ${summary.targetHits}`);
  logger.info(`  Total P&L        : ${summary.totalPnl >= 0 ? "+" : ""}${summary.totalPnl}`);
  logger.info(`  Best / Worst     : ${summary.bestTrade} / ${summary.worstTrade}`);
  logger.info(`  Average trade    : ${summary.averageTrade}`);
  logger.info(`  Max Drawdown     : ${summary.maxDrawdown}`);
  logger.info(`  Kelly fraction   : ${(kelly * 100).toFixed(1)}%`);
  logger.info(sep);
  logger.info(`  Saved → ${OUTPUT_PATH}`);

  if (argv.notify) {
    await sendSignal(formatBacktestDigest(summary, result.startDate, result.endDate));
  }
}

// ── Entry point ──────────────────────────────────────────────────────────────

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
