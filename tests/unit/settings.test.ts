import { describe, expect, it } from "vitest";
import { DEFAULT_SETTINGS, SettingsError, describeFees, loadSettings } from "../../src/config/settings";

describe("loadSettings", () => {
  it("uses defaults with an empty environment", () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it("reads environment values", () => {
    const settings = loadSettings({
      INVESTMENT_AMOUNT: "250",
      GROSS_TARGET_PCT: "0.05",
      INTERVAL_DAYS: "10",
      TOP_N: "3",
      BENCHMARK_SYMBOL: "^GDAXI",
    });
    expect(settings.investmentAmount).toBe(250);
    expect(settings.grossTargetPct).toBe(0.05);
    expect(settings.intervalDays).toBe(10);
    expect(settings.topN).toBe(3);
    expect(settings.benchmark).toBe("^GDAXI");
    expect(settings.fees).toEqual({ mode: "flat", flatFee: 1.99 });
  });

  it("switches to percentage fees", () => {
    const settings = loadSettings({ FEE_MODE: "pct", PCT_FEE: "0.002" });
    expect(settings.fees).toEqual({ mode: "pct", pctFee: 0.002 });
  });

  it("lets overrides win over the environment", () => {
    const settings = loadSettings({ TOP_N: "3", FLAT_FEE: "2.5" }, { topN: 8, flatFee: 0 });
    expect(settings.topN).toBe(8);
    expect(settings.fees).toEqual({ mode: "flat", flatFee: 0 });
  });

  it("derives the gross target from a net target", () => {
    // 0.05 + 2 × 1.99 / 100
    expect(loadSettings({ NET_TARGET_PCT: "0.05" }).grossTargetPct).toBeCloseTo(0.0898, 12);
    // 0.02 + 2 × 0.005
    expect(loadSettings({}, { netTargetPct: 0.02, feeMode: "pct" }).grossTargetPct).toBeCloseTo(0.03, 12);
  });

  it("prefers an explicit gross target over the net one", () => {
    const settings = loadSettings({ NET_TARGET_PCT: "0.05", GROSS_TARGET_PCT: "0.06" });
    expect(settings.grossTargetPct).toBe(0.06);
    expect(settings.netTargetPct).toBe(0.05);
  });

  it("treats blank values as unset", () => {
    expect(loadSettings({ TOP_N: "", BENCHMARK_SYMBOL: "  " })).toEqual(DEFAULT_SETTINGS);
  });

  it("rejects a non-numeric value", () => {
    expect(() => loadSettings({ INVESTMENT_AMOUNT: "lots" })).toThrow(SettingsError);
  });

  it("rejects an interval shorter than two sessions and names the key", () => {
    try {
      loadSettings({ INTERVAL_DAYS: "1" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SettingsError);
      if (!(err instanceof SettingsError)) return;
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0].startsWith("intervalDays:")).toBe(true);
    }
  });

  it("rejects an unknown fee mode", () => {
    expect(() => loadSettings({ FEE_MODE: "tiered" })).toThrow(SettingsError);
  });
});

describe("describeFees", () => {
  it("formats both fee modes", () => {
    expect(describeFees({ mode: "flat", flatFee: 1.99 })).toBe("flat 1.99 per leg");
    expect(describeFees({ mode: "pct", pctFee: 0.005 })).toBe("0.50% per leg");
  });
});
