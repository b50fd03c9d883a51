import { afterEach, describe, expect, it, vi } from "vitest";
import {
  AdvisorInput,
  decisionScore,
  getAdvice,
  keywordBalance,
  parseAdviceText,
  ruleBasedAdvice,
  verdictEmoji,
} from "../../src/analyzers/advisor";
import { NewsItem } from "../../src/fetchers/news";
import { makeSettings } from "../helpers/fixtures";

function candidate(overrides: Partial<AdvisorInput> = {}): AdvisorInput {
  return {
    ticker: "MC.PA",
    name: "LVMH",
    sector: "Consumer",
    price: 700,
    targetPrice: 760.57,
    compositeScore: 80,
    confidenceScore: 70,
    relativeReturnPct: 12,
    momentumPct: 10,
    ...overrides,
  };
}

function headline(title: string): NewsItem {
  return { title, source: "Wire", publishedAt: null, url: "" };
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("decisionScore", () => {
  it("blends score, confidence and momentum 40/35/25", () => {
    // 0.4 × 80 + 0.35 × 70 + 0.25 × (50 + 2 × 10)
    expect(decisionScore(candidate(), [])).toBeCloseTo(74, 10);
  });

  it("caps the momentum term at 0 and 100", () => {
    expect(decisionScore(candidate({ compositeScore: 0, confidenceScore: 0, momentumPct: 40 }), [])).toBeCloseTo(25, 10);
    expect(decisionScore(candidate({ compositeScore: 0, confidenceScore: 0, momentumPct: -40 }), [])).toBe(0);
  });

  it("moves 5 points per net keyword and stays within [0, 100]", () => {
    expect(decisionScore(candidate(), [headline("Record dividend for shareholders")])).toBeCloseTo(84, 10);
    expect(decisionScore(candidate({ compositeScore: 100, confidenceScore: 100, momentumPct: 30 }), [
      headline("Record dividend and acquisition news"),
    ])).toBe(100);
  });
});

describe("keywordBalance", () => {
  it("counts distinct good and risk keywords", () => {
    expect(keywordBalance([headline("Profit warning triggers downgrade")])).toBe(-3);
    expect(keywordBalance([headline("New contract"), headline("Another contract")])).toBe(1);
    expect(keywordBalance([])).toBe(0);
  });
});

describe("ruleBasedAdvice", () => {
  it("says BUY NOW for a strong, confident setup", () => {
    const advice = ruleBasedAdvice(candidate(), []);
    expect(advice.verdict).toBe("BUY NOW");
    expect(advice.decisionScore).toBe(74);
    expect(advice.source).toBe("rules");
  });

  it("waits when confidence is below 55 even with a high score", () => {
    const advice = ruleBasedAdvice(candidate({ compositeScore: 100, confidenceScore: 50, momentumPct: 20 }), []);
    // 40 + 17.5 + 22.5
    expect(advice.decisionScore).toBe(80);
    expect(advice.verdict).toBe("WAIT FOR PULLBACK");
  });

  it("says AVOID for a weak setup", () => {
    const advice = ruleBasedAdvice(candidate({ compositeScore: 20, confidenceScore: 20, momentumPct: -20 }), []);
    expect(advice.decisionScore).toBe(17.5);
    expect(advice.verdict).toBe("AVOID");
    expect(verdictEmoji(advice.verdict)).toBe("🔴");
  });

  it("lets bad news push a borderline candidate down", () => {
    const news = [headline("Profit warning triggers downgrade")];
    expect(ruleBasedAdvice(candidate({ confidenceScore: 50 }), []).verdict).toBe("WAIT FOR PULLBACK");
    expect(ruleBasedAdvice(candidate({ compositeScore: 50, confidenceScore: 50 }), news).verdict).toBe("AVOID");
  });
});

describe("parseAdviceText", () => {
  it("strips code fences before validating", () => {
    const text = [
      "```json",
      '{"verdict": "AVOID", "summary": "s", "analysis": "a", "horizon": "n/a"}',
      "```",
    ].join("\n");
    expect(parseAdviceText(text)).toEqual({
      verdict: "AVOID",
      summary: "s",
      analysis: "a",
      risks: [],
      catalysts: [],
      horizon: "n/a",
    });
  });

  it("rejects an unknown verdict", () => {
    expect(() => parseAdviceText('{"verdict": "HOLD", "summary": "", "analysis": "", "horizon": ""}')).toThrow();
  });
});

describe("getAdvice", () => {
  it("uses the rule-based verdict without an API key", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");
    const advice = await getAdvice(candidate(), [], makeSettings());
    expect(advice).toEqual(ruleBasedAdvice(candidate(), []));
  });

  it("uses the rule-based verdict when AI is skipped", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-secret");
    const advice = await getAdvice(candidate(), [], makeSettings(), { skipAi: true });
    expect(advice.source).toBe("rules");
  });
});
