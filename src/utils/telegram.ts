import { Telegram } from "telegraf";
import logger from "./logger";
import { ScoredCandidate } from "../analyzers/scorer";
import { MarketHeat } from "../analyzers/moneyManagement";
import { BacktestSummary } from "../analyzers/backtester";
import { StrategySettings, describeFees } from "../config/settings";
import { confidenceLabel } from "../analyzers/confidence";

const BOT_TOKEN = process.env.TELEGRAM_BOT_TOKEN ?? "";
const CHAT_ID   = process.env.TELEGRAM_CHAT_ID   ?? "";

let bot: Telegram | null = null;

function getBot(): Telegram | null {
  if (!BOT_TOKEN || !CHAT_ID) return null;
  if (!bot) bot = new Telegram(BOT_TOKEN);
  return bot;
}

// ── Formatting Helpers ────────────────────────────────────────────────────────

export function escapeMd(text: string): string {
  return text.replace(/[_*`\[\]]/g, "\\$&");
}

/** 5-square meter for a 0–100 score. */
export function confidenceMeter(score: number): string {
  const filled = Math.round((Math.max(0, Math.min(100, score)) / 100) * 5);
  return "🟦".repeat(filled) + "⬜".repeat(5 - filled);
}

function signed(value: number): string {
  return `${value > 0 ? "+" : ""}${value.toFixed(1)}%`;
}

export function formatRecommendationsDigest(
  candidates: readonly ScoredCandidate[],
  heat: MarketHeat,
  settings: StrategySettings,
  date: string,
): string {
  const header = [
    `📈 *Bi-weekly picks — ${date}*`,
    `_${settings.investmentAmount} per position · +${(settings.grossTargetPct * 100).toFixed(1)}% gross target · ${escapeMd(describeFees(settings.fees))}_`,
    ``,
    `🌡️ *Market heat:* ${heat.heat}/100 (${heat.level})`,
    escapeMd(heat.advice),
    ``,
  ];

  if (candidates.length === 0) {
    return [...header, `No candidate passed the data checks this cycle.`].join("\n");
  }

  const rows = candidates.map((c, i) => [
    `*${i + 1}. ${escapeMd(c.ticker)}* — ${escapeMd(c.name)}`,
    `   Score ${c.compositeScore} | ${c.price.toFixed(2)} → ${c.targetPrice.toFixed(2)}`,
    `   ${confidenceMeter(c.confidenceScore)} ${confidenceLabel(c.confidenceScore)} (${c.confidenceScore})`,
    `   12M rel ${signed(c.relativeReturnPct)} · 3M mom ${signed(c.momentumPct)}`,
  ].join("\n"));

  return [...header, ...rows].join("\n");
}

export function formatBacktestDigest(summary: BacktestSummary, from: string, to: string): string {
  return [
    `🧪 *Backtest ${from} → ${to}*`,
    ``,
    `Trades: ${summary.tradeCount} | Win rate: ${summary.winRate}%`,
    `Target hits: ${summary.targetHits}`,
    `Total P&L: ${summary.totalPnl.toFixed(2)} | Avg: ${summary.averageTrade.toFixed(2)}`,
    `Best: ${summary.bestTrade.toFixed(2)} | Worst: ${summary.worstTrade.toFixed(2)}`,
    `Max drawdown: ${summary.maxDrawdown.toFixed(2)}`,
  ].join("\n");
}

// ── Sender ────────────────────────────────────────────────────────────────────

async function send(message: string): Promise<void> {
  const tg = getBot();
  if (!tg) {
    logger.warn("Telegram not configured (missing TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID)");
    return;
  }

  const chatId = /^-?\d+$/.test(CHAT_ID) ? Number(CHAT_ID) : CHAT_ID;

  logger.info(`Sending Telegram message to chat ${CHAT_ID}...`);

  try {
    await tg.sendMessage(chatId, message, { parse_mode: "Markdown" });
    logger.info("Telegram message sent successfully");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.error(`Telegram send failed: ${msg}`);
  }
}

// ── Public API ────────────────────────────────────────────────────────────────

export async function sendSignal(message: string): Promise<void> {
  await send(message);
}

export async function sendRecommendationsDigest(
  candidates: readonly ScoredCandidate[],
  heat: MarketHeat,
  settings: StrategySettings,
  date: string,
): Promise<void> {
  await send(formatRecommendationsDigest(candidates, heat, settings, date));
}
