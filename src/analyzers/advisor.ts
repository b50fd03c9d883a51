import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import logger from "../utils/logger";
import { StrategySettings, describeFees } from "../config/settings";
import { NewsItem, newsToText } from "../fetchers/news";

// ── Types ────────────────────────────────────────────────────────────────────

export type Verdict = "BUY NOW" | "WAIT FOR PULLBACK" | "AVOID";

/** The fields of a ranked candidate the advisor reads. */
export interface AdvisorInput {
  ticker: string;
  name: string;
  sector: string;
  price: number;
  targetPrice: number;
  compositeScore: number;
  confidenceScore: number;
  relativeReturnPct: number;
  momentumPct: number;
}

export interface Advice {
  verdict: Verdict;
  decisionScore: number;
  summary: string;
  analysis: string;
  risks: string[];
  catalysts: string[];
  horizon: string;
  source: "ai" | "rules";
}

const VERDICT_EMOJI: Record<Verdict, string> = {
  "BUY NOW": "🟢",
  "WAIT FOR PULLBACK": "🟡",
  "AVOID": "🔴",
};

export function verdictEmoji(verdict: Verdict): string {
  return VERDICT_EMOJI[verdict];
}

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const AdviceResponseSchema = z.object({
  verdict: z.enum(["BUY NOW", "WAIT FOR PULLBACK", "AVOID"]),
  summary: z.string(),
  analysis: z.string(),
  risks: z.array(z.string()).default([]),
  catalysts: z.array(z.string()).default([]),
  horizon: z.string(),
});

// ── Rule-based verdict ───────────────────────────────────────────────────────

const RISK_KEYWORDS = [
  "earnings", "warning", "profit warning", "lawsuit", "investigation",
  "loss", "decline", "plunge", "downgrade", "sell",
];
const GOOD_KEYWORDS = [
  "buyback", "acquisition", "dividend", "rise", "contract",
  "record", "growth", "buy", "upgrade", "target raised",
];

export const KEYWORD_WEIGHT = 5;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Net count of distinct good minus risk keywords found in the headlines. */
export function keywordBalance(news: readonly NewsItem[]): number {
  const text = news.map((n) => n.title.toLowerCase()).join(" ");
  const good = GOOD_KEYWORDS.filter((k) => text.includes(k)).length;
  const risk = RISK_KEYWORDS.filter((k) => text.includes(k)).length;
  return good - risk;
}

export function decisionScore(candidate: AdvisorInput, news: readonly NewsItem[]): number {
  const momentumPart = clamp(50 + candidate.momentumPct * 2, 0, 100);
  const base =
    0.4 * candidate.compositeScore +
    0.35 * candidate.confidenceScore +
    0.25 * momentumPart;
  return clamp(base + keywordBalance(news) * KEYWORD_WEIGHT, 0, 100);
}

export function ruleBasedAdvice(candidate: AdvisorInput, news: readonly NewsItem[]): Advice {
  const score = decisionScore(candidate, news);
  const { name, compositeScore, confidenceScore, momentumPct, relativeReturnPct } = candidate;
  const mom = `${momentumPct > 0 ? "+" : ""}${momentumPct.toFixed(1)}%`;
  const rel = `${relativeReturnPct > 0 ? "+" : ""}${relativeReturnPct.toFixed(1)}%`;

  const base = { decisionScore: parseFloat(score.toFixed(1)), source: "rules" as const };

  if (score >= 70 && confidenceScore >= 55) {
    return {
      ...base,
      verdict: "BUY NOW",
      summary: `${name} shows a favourable setup with solid momentum.`,
      analysis:
        `${name} scores ${compositeScore.toFixed(0)}/100 on the composite, backed by a 12-month ` +
        `relative return of ${rel} and 3-month momentum of ${mom}. ` +
        `Confidence of ${confidenceScore.toFixed(0)}/100 points to contained volatility over the cycle.`,
      risks: ["Broad market reversal", "High intraday volatility"],
      catalysts: ["Confirmed positive momentum", "High technical confidence"],
      horizon: "5 to 12 sessions",
    };
  }

  if (score >= 45) {
    return {
      ...base,
      verdict: "WAIT FOR PULLBACK",
      summary: `${name} is interesting but a 1–2% pullback would give a better entry.`,
      analysis:
        `${name} ranks reasonably (score ${compositeScore.toFixed(0)}/100) but 3-month momentum of ${mom} ` +
        `suggests the move is already extended. Waiting for a consolidation improves the odds of reaching the target.`,
      risks: ["Entering on a short-term high", "Extended consolidation"],
      catalysts: ["Good relative rank in the universe", "Possible rebound from support"],
      horizon: "8 to 15 sessions after a pullback entry",
    };
  }

  return {
    ...base,
    verdict: "AVOID",
    summary: `${name} does not meet the conditions for this cycle's target.`,
    analysis:
      `Weak composite score (${compositeScore.toFixed(0)}/100), limited confidence ` +
      `(${confidenceScore.toFixed(0)}/100) and 3-month momentum of ${mom}. ` +
      `Capital is better allocated to a higher-ranked candidate.`,
    risks: ["Potential downtrend", "Volatility too high for the target"],
    catalysts: ["Technical rebound (unreliable)"],
    horizon: "Undetermined",
  };
}

// ── Claude verdict ───────────────────────────────────────────────────────────

function buildPrompt(candidate: AdvisorInput, news: readonly NewsItem[], settings: StrategySettings): string {
  const grossPct = (settings.grossTargetPct * 100).toFixed(1);
  const sign = (v: number) => `${v > 0 ? "+" : ""}${v.toFixed(1)}%`;
  return (
    `Analyze this stock for a bi-weekly strategy: ${settings.investmentAmount} invested every ` +
    `${settings.intervalDays} sessions, fees ${describeFees(settings.fees)}.\n\n` +
    `Stock: ${candidate.name} (${candidate.ticker}) | Sector: ${candidate.sector}\n` +
    `Price: ${candidate.price.toFixed(2)} | Target: ${candidate.targetPrice.toFixed(2)} (+${grossPct}% gross)\n` +
    `Composite score: ${candidate.compositeScore.toFixed(1)}/100 | Confidence: ${candidate.confidenceScore.toFixed(0)}/100\n` +
    `12M relative return vs ${settings.benchmark}: ${sign(candidate.relativeReturnPct)} | 3M momentum: ${sign(candidate.momentumPct)}\n\n` +
    `Recent news:\n${newsToText(news)}\n\n` +
    `Can +${grossPct}% gross be reached within the next cycle? Factor in earnings dates and macro events.\n\n` +
    `Respond with this exact JSON format:\n` +
    `{"verdict": "BUY NOW" | "WAIT FOR PULLBACK" | "AVOID", "summary": "<one sentence>", ` +
    `"analysis": "<2-3 short paragraphs>", "risks": ["..."], "catalysts": ["..."], ` +
    `"horizon": "<estimated sessions to target>"}`
  );
}

export function parseAdviceText(text: string): z.infer<typeof AdviceResponseSchema> {
  // Strip markdown code fences that Claude sometimes wraps around JSON
  const cleanedText = text
    .replace(/```(?:json)?\s*/gi, "")
    .replace(/```\s*/g, "")
    .trim();
  const raw: unknown = JSON.parse(cleanedText);
  return AdviceResponseSchema.parse(raw);
}

/**
 * Verdict from Claude when ANTHROPIC_API_KEY is set, otherwise (or on any
 * failure) the rule-based verdict.
 */
export async function getAdvice(
  candidate: AdvisorInput,
  news: readonly NewsItem[],
  settings: StrategySettings,
  opts: { skipAi?: boolean } = {},
): Promise<Advice> {
  const fallback = ruleBasedAdvice(candidate, news);
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (opts.skipAi || !apiKey) return fallback;

  try {
    const client = new Anthropic({ apiKey });

    const message = await client.messages.create({
      model: "claude-sonnet-4-5-20250929",
      max_tokens: 1024,
      system:
        "You are a senior European equity portfolio manager advising a short-cycle momentum strategy. " +
        "Base your verdict on momentum, volatility, recent news, event timing and liquidity. " +
        "Respond ONLY with a JSON object — no markdown, no code fences.",
      messages: [{ role: "user", content: buildPrompt(candidate, news, settings) }],
    });

    const textBlock = message.content.find((block) => block.type === "text");
    if (!textBlock || textBlock.type !== "text") {
      logger.warn(`No text in Claude response for ${candidate.ticker} — using rule-based verdict`);
      return fallback;
    }

    const parsed = parseAdviceText(textBlock.text);
    return { ...parsed, decisionScore: fallback.decisionScore, source: "ai" };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.warn(`Claude advice failed for ${candidate.ticker}: ${msg} — using rule-based verdict`);
    return fallback;
  }
}
