import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchCompanyNews, newsToText } from "../../src/fetchers/news";
import { confidenceMeter, escapeMd, formatBacktestDigest, formatRecommendationsDigest } from "../../src/utils/telegram";
import { computeMarketHeat } from "../../src/analyzers/moneyManagement";
import { getInstrument, loadUniverse } from "../../src/data/universe";
import { makeSettings } from "../helpers/fixtures";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("newsToText", () => {
  it("formats one bullet per headline", () => {
    const text = newsToText([
      { title: "Quarterly sales beat", source: "Wire", publishedAt: new Date("2024-05-02T08:30:00Z"), url: "" },
      { title: "New plant opens", source: "Daily", publishedAt: null, url: "" },
    ]);
    expect(text).toBe("• [Wire] (2024-05-02) Quarterly sales beat\n• [Daily] New plant opens");
  });

  it("says so when there is no news", () => {
    expect(newsToText([])).toBe("No recent news available.");
  });
});

describe("fetchCompanyNews", () => {
  it("returns nothing without an API key", async () => {
    vi.stubEnv("FINNHUB_API_KEY", "");
    const news = await fetchCompanyNews("MC.PA", new Date("2024-05-01"), new Date("2024-05-08"));
    expect(news).toEqual([]);
  });
});

describe("telegram formatting", () => {
  it("escapes markdown control characters", () => {
    expect(escapeMd("a_b*c")).toBe("a\\_b\\*c");
  });

  it("draws a five-square meter", () => {
    expect(confidenceMeter(100)).toBe("🟦🟦🟦🟦🟦");
    expect(confidenceMeter(40)).toBe("🟦🟦⬜⬜⬜");
    expect(confidenceMeter(-10)).toBe("⬜⬜⬜⬜⬜");
  });

  it("formats the backtest summary", () => {
    const text = formatBacktestDigest(
      {
        totalPnl: 1.84, tradeCount: 2, wins: 1, winRate: 50, targetHits: 1,
        bestTrade: 5.82, worstTrade: -3.98, averageTrade: 0.92, maxDrawdown: 3.98,
      },
      "2024-01-01",
      "2024-02-07",
    );
    expect(text.split("\n")).toEqual([
      "🧪 *Backtest 2024-01-01 → 2024-02-07*",
      "",
      "Trades: 2 | Win rate: 50%",
      "Target hits: 1",
      "Total P&L: 1.84 | Avg: 0.92",
      "Best: 5.82 | Worst: -3.98",
      "Max drawdown: 3.98",
    ]);
  });

  it("notes an empty pick list", () => {
    const text = formatRecommendationsDigest([], computeMarketHeat([]), makeSettings(), "2024-05-01");
    expect(text.split("\n")[0]).toBe("📈 *Bi-weekly picks — 2024-05-01*");
    expect(text.split("\n").pop()).toBe("No candidate passed the data checks this cycle.");
  });
});

describe("universe", () => {
  it("loads the instrument catalog", () => {
    const universe = loadUniverse();
    expect(universe.benchmark.ticker).toBe("^FCHI");
    const tickers = universe.instruments.map((i) => i.ticker);
    expect(new Set(tickers).size).toBe(tickers.length);
  });

  it("gives unknown tickers a placeholder entry", () => {
    expect(getInstrument("ZZZZ")).toEqual({ ticker: "ZZZZ", name: "ZZZZ", sector: "—" });
  });
});
