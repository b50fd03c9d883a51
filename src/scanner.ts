import dotenv from "dotenv";
dotenv.config();

import fs from "fs";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadSettings, describeFees, StrategySettings } from "./config/settings";
import { CachedMarketDataProvider, YahooMarketDataProvider, fetchUniverseHistories, isoDate, windowFor } from "./fetchers/marketData";
import { computeScores, ScoredCandidate, SkipRecord, SCORING_HISTORY_DAYS } from "./analyzers/scorer";
import { computeMarketHeat, positionSizeAdvice, MarketHeat } from "./analyzers/moneyManagement";
import { computeBreakeven } from "./analyzers/targets";
import { confidenceLabel } from "./analyzers/confidence";
import { appendToHistory, HistoryEntry } from "./utils/history";
import logger from "./utils/logger";
import { sendRecommendationsDigest } from "./utils/telegram";

// ── CLI Arguments ────────────────────────────────────────────────────────────

const argv = yargs(hideBin(process.argv))
  .option("top", {
    alias: "n",
    type: "number",
    describe: "Number of candidates to keep (overrides TOP_N)",
  })
  .option("capital", {
    type: "number",
    default: 1000,
    describe: "Total capital used for the allocation advice",
  })
  .option("notify", {
    type: "boolean",
    default: false,
    describe: "Send the picks to Telegram",
  })
  .option("pause", {
    type: "number",
    default: 300,
    describe: "Milliseconds between price requests",
  })
  .strict()
  .parseSync();

// ── RECOMMENDATIONS.md writer ────────────────────────────────────────────────

const REC_PATH = path.resolve(process.cwd(), "RECOMMENDATIONS.md");

const REC_TABLE_HEADER = [
  "| # | Ticker | Name | Sector | Price | Target | Score | Confidence | 12M vs Bench | 3M Mom |",
  "| - | ------ | ---- | ------ | ----- | ------ | ----- | ---------- | ------------ | ------ |",
].join("\n");

function signed(value: number): string {
  return `${value > 0 ? "+" : ""}${value.toFixed(2)}%`;
}

function writeRecommendations(
  candidates: ScoredCandidate[],
  skipped: SkipRecord[],
  heat: MarketHeat,
  settings: StrategySettings,
  capital: number,
  date: string,
): void {
  const allocation = positionSizeAdvice(capital, heat, settings.investmentAmount);
  const lines: string[] = [
    "# Bi-weekly Momentum Picks",
    "",
    `> **Date:** ${date} | **Benchmark:** ${settings.benchmark} | **Investment:** ${settings.investmentAmount} | ` +
    `**Gross target:** +${(settings.grossTargetPct * 100).toFixed(1)}% | **Fees:** ${describeFees(settings.fees)} | ` +
    `**Break-even:** ${computeBreakeven(settings.investmentAmount, settings.fees)}%`,
    "",
    "## Market Heat",
    "",
    "| Indicator | Value |",
    "| --------- | ----- |",
    `| RSI (14) | ${heat.rsi} |`,
    `| Below 52w high | ${heat.distFrom52wHigh}% |`,
    `| Heat | ${heat.heat}/100 (${heat.level}) |`,
    `| Allocation | ${allocation.positions} × ${allocation.perPosition} = ${allocation.totalDeployed} (${allocation.pctDeployed}% of ${allocation.capital}) |`,
    "",
    `> ${heat.advice}`,
    "",
    "## Candidates",
    "",
  ];

  if (candidates.length === 0) {
    lines.push("**No candidate passed the data checks.**", "");
  } else {
    lines.push(REC_TABLE_HEADER);
    candidates.forEach((c, i) => {
      lines.push(
        `| ${i + 1} ` +
        `| ${c.ticker} ` +
        `| ${c.name.replace(/\|/g, "\\|")} ` +
        `| ${c.sector} ` +
        `| ${c.price.toFixed(2)} ` +
        `| ${c.targetPrice.toFixed(2)} ` +
        `| **${c.compositeScore}** ` +
        `| ${c.confidenceScore} (${confidenceLabel(c.confidenceScore)}) ` +
        `| ${signed(c.relativeReturnPct)} ` +
        `| ${signed(c.momentumPct)} |`,
      );
    });
    lines.push("");
  }

  if (skipped.length > 0) {
    lines.push("## Skipped", "");
    for (const s of skipped) lines.push(`- ${s.ticker}: ${s.reason} (${s.detail})`);
    lines.push("");
  }

  fs.writeFileSync(REC_PATH, lines.join("\n"), "utf-8");
}

// ── Main Scanner ─────────────────────────────────────────────────────────────

async function main() {
  const settings = loadSettings(process.env, argv.top !== undefined ? { topN: argv.top } : {});
  const date = isoDate(new Date());
  const provider = new CachedMarketDataProvider(new YahooMarketDataProvider());

  logger.info(`Momentum Scanner — ${date} | Top ${settings.topN} | Fees: ${describeFees(settings.fees)}`);

  const { from, to } = windowFor(SCORING_HISTORY_DAYS);
  const benchFetch = (await fetchUniverseHistories(provider, [settings.benchmark], from, to)).get(settings.benchmark);
  const heat = computeMarketHeat(benchFetch?.ok ? benchFetch.prices.map((p) => p.close) : []);
  logger.info(`Market heat: ${heat.heat}/100 [${heat.level}] — RSI ${heat.rsi}, ${heat.distFrom52wHigh}% below 52w high`);

  const result = await computeScores(settings, { provider, pauseMs: argv.pause });
  if (!result.ok) {
    writeRecommendations([], result.skipped, heat, settings, argv.capital, date);
    throw new Error(result.error);
  }

  const { candidates, skipped } = result;
  writeRecommendations(candidates, skipped, heat, settings, argv.capital, date);

  const entries: HistoryEntry[] = candidates.map((c) => ({
    ticker: c.ticker,
    name: c.name,
    date,
    price: c.price,
    targetPrice: c.targetPrice,
    compositeScore: c.compositeScore,
    confidenceScore: c.confidenceScore,
  }));
  appendToHistory(entries);

  // Final summary
  logger.info(`${"═".repeat(72)}`);
  logger.info(`  SCAN COMPLETE — ${date}`);
  logger.info(`${"─".repeat(72)}`);
  for (const [i, c] of candidates.entries()) {
    logger.info(
      `  ${String(i + 1).padStart(2)}. ${c.ticker.padEnd(8)} | Score: ${String(c.compositeScore).padEnd(5)} | ` +
      `${c.price.toFixed(2).padStart(8)} → ${c.targetPrice.toFixed(2).padEnd(8)} | Conf: ${c.confidenceScore}`,
    );
  }
  logger.info(`${"─".repeat(72)}`);
  logger.info(`  Skipped: ${skipped.length} | ${heat.advice}`);
  logger.info(`${"═".repeat(72)}`);
  logger.info(`Results saved to RECOMMENDATIONS.md`);

  if (argv.notify) {
    await sendRecommendationsDigest(candidates, heat, settings, date);
  }
}

// ── Run ──────────────────────────────────────────────────────────────────────

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
