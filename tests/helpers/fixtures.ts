import { DailyPrice, MarketDataError, MarketDataProvider, isoDate } from "../../src/fetchers/marketData";
import { DEFAULT_SETTINGS, StrategySettings } from "../../src/config/settings";

/** `n` consecutive weekdays starting at `start` (YYYY-MM-DD, UTC). */
export function weekdays(start: string, n: number): string[] {
  const out: string[] = [];
  const d = new Date(`${start}T00:00:00Z`);
  while (out.length < n) {
    const day = d.getUTCDay();
    if (day !== 0 && day !== 6) out.push(isoDate(d));
    d.setUTCDate(d.getUTCDate() + 1);
  }
  return out;
}

export function makeSeries(
  dates: readonly string[],
  close: (i: number) => number,
  volume = 1000,
): DailyPrice[] {
  return dates.map((date, i) => {
    const c = close(i);
    return { date, open: c, high: c, low: c, close: c, volume };
  });
}

export function makeSettings(overrides: Partial<StrategySettings> = {}): StrategySettings {
  return { ...DEFAULT_SETTINGS, ...overrides };
}

/** In-process provider: serves fixed series filtered to the requested window. */
export class InMemoryProvider implements MarketDataProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly series: Record<string, DailyPrice[]>,
    private readonly failures: Record<string, "network" | "malformed"> = {},
  ) {}

  async fetchHistory(symbol: string, from: Date, to: Date): Promise<DailyPrice[]> {
    this.calls.push(symbol);
    const failure = this.failures[symbol];
    if (failure === "network") throw new Error("socket hang up");
    if (failure === "malformed") throw new MarketDataError(symbol, "unexpected history shape");

    const lo = isoDate(from);
    const hi = isoDate(to);
    return (this.series[symbol] ?? []).filter((p) => p.date >= lo && p.date <= hi);
  }
}
