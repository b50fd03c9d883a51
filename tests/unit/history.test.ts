import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HistoryEntry, appendToHistory, latestPicks, mergeHistory, readHistory } from "../../src/utils/history";
import { evaluatePick, reviewStats } from "../../src/analyzers/tracker";
import { makeSeries, weekdays } from "../helpers/fixtures";

function entry(ticker: string, date: string, overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    ticker,
    name: ticker,
    date,
    price: 100,
    targetPrice: 108.65,
    compositeScore: 70,
    confidenceScore: 60,
    ...overrides,
  };
}

describe("history file", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "momentum-history-"));
    file = path.join(dir, "logs", "history.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads an absent file as empty", () => {
    expect(readHistory(file)).toEqual([]);
  });

  it("reads an unreadable file as empty", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "{not json");
    expect(readHistory(file)).toEqual([]);
  });

  it("appends and replaces same-day entries for a ticker", () => {
    appendToHistory([entry("AAA", "2024-05-01"), entry("BBB", "2024-05-01")], file);
    appendToHistory([entry("AAA", "2024-05-01", { price: 101 }), entry("AAA", "2024-05-15")], file);

    const stored = readHistory(file);
    expect(stored.map((e) => `${e.ticker}:${e.date}:${e.price}`)).toEqual([
      "BBB:2024-05-01:100",
      "AAA:2024-05-01:101",
      "AAA:2024-05-15:100",
    ]);
  });
});

describe("mergeHistory", () => {
  it("keeps entries from other days", () => {
    const merged = mergeHistory([entry("AAA", "2024-05-01")], [entry("AAA", "2024-05-02")]);
    expect(merged).toHaveLength(2);
  });
});

describe("latestPicks", () => {
  it("returns the entries of the most recent date", () => {
    const picks = latestPicks([
      entry("AAA", "2024-05-15"),
      entry("BBB", "2024-05-01"),
      entry("CCC", "2024-05-15"),
    ]);
    expect(picks.map((e) => e.ticker)).toEqual(["AAA", "CCC"]);
    expect(latestPicks([])).toEqual([]);
  });
});

describe("evaluatePick", () => {
  const dates = weekdays("2024-05-01", 10);

  it("marks the first close at the target as a hit", () => {
    const prices = makeSeries(dates, (i) => (i === 4 ? 109 : i > 4 ? 104 : 100));
    const review = evaluatePick(entry("AAA", dates[0]), prices);
    expect(review.status).toBe("target-hit");
    expect(review.hitDate).toBe(dates[4]);
    expect(review.lastClose).toBe(104);
    expect(review.changePct).toBe(4);
  });

  it("ignores the recommendation day itself", () => {
    const prices = makeSeries(dates, (i) => (i === 0 ? 200 : 95));
    const review = evaluatePick(entry("AAA", dates[0]), prices);
    expect(review.status).toBe("open");
    expect(review.changePct).toBe(-5);
  });

  it("reports no data when nothing traded since", () => {
    const review = evaluatePick(entry("AAA", "2024-06-01"), makeSeries(dates, () => 100));
    expect(review).toMatchObject({ status: "no-data", lastClose: null, changePct: null });
  });

  it("summarizes reviewed picks", () => {
    const hit = evaluatePick(entry("AAA", dates[0]), makeSeries(dates, (i) => (i === 2 ? 110 : 100)));
    const open = evaluatePick(entry("BBB", dates[0]), makeSeries(dates, () => 97));
    const none = evaluatePick(entry("CCC", "2024-06-01"), []);
    expect(reviewStats([hit, open, none])).toEqual({
      reviewed: 2,
      hits: 1,
      hitRate: 50,
      averageChange: -1.5,
    });
  });
});
