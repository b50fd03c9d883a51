import dotenv from "dotenv";
dotenv.config();

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadSettings, describeFees } from "./config/settings";
import { getInstrument } from "./data/universe";
import { CachedMarketDataProvider, YahooMarketDataProvider, fetchUniverseHistories, windowFor } from "./fetchers/marketData";
import { getRecentNews } from "./fetchers/news";
import { SCORING_HISTORY_DAYS, computeFactorRow, scoreRows } from "./analyzers/scorer";
import { computeBreakeven, computeShares } from "./analyzers/targets";
import { confidenceLabel } from "./analyzers/confidence";
import { getAdvice, verdictEmoji } from "./analyzers/advisor";
import { latestPicks, readHistory } from "./utils/history";
import logger from "./utils/logger";

// ── CLI ──────────────────────────────────────────────────────────────────────

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("Usage: $0 --ticker <SYMBOL>")
    .option("ticker", {
      alias: "t",
      type: "string",
      demandOption: true,
      describe: "Ticker symbol (e.g. MC.PA, SAP.DE)",
    })
    .option("skip-ai", {
      type: "boolean",
      default: false,
      describe: "Use the rule-based verdict instead of Claude",
    })
    .strict()
    .help().argv;

  const symbol = argv.ticker.toUpperCase();
  const settings = loadSettings();
  const instrument = getInstrument(symbol);
  logger.info(`Momentum Check — ${instrument.name} (${symbol})`);

  // ── Prices ───────────────────────────────────────────────────────────────

  const provider = new CachedMarketDataProvider(new YahooMarketDataProvider());
  const { from, to } = windowFor(SCORING_HISTORY_DAYS);

  logger.info("[1/3] Fetching prices...");
  const histories = await fetchUniverseHistories(provider, [symbol, settings.benchmark], from, to);
  const own = histories.get(symbol);
  const bench = histories.get(settings.benchmark);
  if (!own?.ok) {
    throw new Error(`No price history for ${symbol}${own ? `: ${own.detail}` : ""}`);
  }

  const factors = computeFactorRow(instrument, own.prices, bench?.ok ? bench.prices : [], settings);
  if (!factors.ok) {
    throw new Error(`${symbol} cannot be scored: ${factors.skip.detail}`);
  }

  // A lone row normalizes to the neutral score; the latest universe ranking is preferred when it has the ticker.
  const [candidate] = scoreRows([factors.row]);
  const ranked = latestPicks(readHistory()).find((e) => e.ticker === symbol);
  if (ranked) candidate.compositeScore = ranked.compositeScore;

  // ── News + verdict ──────────────────────────────────────────────────────

  logger.info("[2/3] Fetching news...");
  const news = await getRecentNews(symbol);

  logger.info("[3/3] Building verdict...");
  const advice = await getAdvice(candidate, news, settings, { skipAi: argv["skip-ai"] });

  // ── Report ──────────────────────────────────────────────────────────────

  const shares = computeShares(candidate.price, settings.investmentAmount, settings.fees);
  const sep = "═".repeat(60);
  logger.info(sep);
  logger.info(`  ${instrument.name} (${symbol}) — ${instrument.sector}`);
  logger.info("─".repeat(60));
  logger.info(`  Price            : ${candidate.price.toFixed(2)}`);
  logger.info(`  Target           : ${candidate.targetPrice.toFixed(2)} (+${(settings.grossTargetPct * 100).toFixed(1)}% gross)`);
  logger.info(`  Shares           : ${shares.toFixed(4)} for ${settings.investmentAmount} (${describeFees(settings.fees)})`);
  logger.info(`  Break-even       : ${computeBreakeven(settings.investmentAmount, settings.fees)}%`);
  logger.info(`  Confidence       : ${candidate.confidenceScore} (${confidenceLabel(candidate.confidenceScore)})`);
  logger.info(`  Score            : ${candidate.compositeScore}${ranked ? ` (ranked ${ranked.date})` : " (unranked)"}`);
  logger.info(`  12M vs benchmark : ${candidate.relativeReturnPct}%`);
  logger.info(`  3M momentum      : ${candidate.momentumPct}%`);
  logger.info("─".repeat(60));
  logger.info(`  ${verdictEmoji(advice.verdict)} ${advice.verdict} — ${advice.summary}`);
  logger.info(`  Horizon: ${advice.horizon}`);
  for (const r of advice.risks) logger.info(`  ⚠ ${r}`);
  for (const c of advice.catalysts) logger.info(`  ✓ ${c}`);
  logger.info(`  Source: ${advice.source === "ai" ? "Claude" : "rule-based"}`);
  logger.info(sep);
}

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
