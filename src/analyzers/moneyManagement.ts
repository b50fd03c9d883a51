/**
 * Market heat index and cycle-level position sizing.
 *
 *   heat = 0.6 × RSI(14) + 0.4 × max(0, 100 − 3 × distance below 52-week high %)
 *
 *   heat ≥ 75  → hot   → at most 2 positions
 *   heat ≥ 50  → warm  → 3 positions
 *   otherwise  → cool  → all 5 positions
 */

export const RSI_PERIOD      = 14;
export const YEAR_SESSIONS   = 252;
export const DEFAULT_MAX_KELLY = 0.25;

export type HeatLevel = "hot" | "warm" | "cool";

export interface MarketHeat {
  rsi: number;
  distFrom52wHigh: number; // percent below the 52-week high
  level: HeatLevel;
  heat: number;            // 0–100
  advice: string;
  positionsRecommended: number;
}

export interface PositionAdvice {
  capital: number;
  positions: number;
  perPosition: number;
  totalDeployed: number;
  pctDeployed: number;
  advice: string;
}

function round(value: number, decimals: number): number {
  return parseFloat(value.toFixed(decimals));
}

/**
 * RSI of the last close using simple rolling means of gains and losses.
 * 50 when there are not enough closes or no losses in the window.
 */
export function computeRSI(closes: readonly number[], period = RSI_PERIOD): number {
  if (closes.length < period + 1) return 50;

  let gains = 0;
  let losses = 0;
  for (let i = closes.length - period; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    if (delta > 0) gains += delta;
    else losses -= delta;
  }

  if (losses === 0) return 50;
  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
}

const NO_DATA_HEAT: MarketHeat = {
  rsi: 50,
  distFrom52wHigh: 0,
  level: "warm",
  heat: 50,
  advice: "🟡 Benchmark data unavailable — proceed with caution",
  positionsRecommended: 3,
};

export function computeMarketHeat(benchmarkCloses: readonly number[]): MarketHeat {
  const closes = benchmarkCloses.filter((c) => Number.isFinite(c) && c > 0);
  if (closes.length === 0) return { ...NO_DATA_HEAT };

  const rsi = computeRSI(closes);
  const high52w = Math.max(...closes.slice(-YEAR_SESSIONS));
  const current = closes[closes.length - 1];
  const distHigh = ((high52w - current) / high52w) * 100;

  const heat = 0.6 * rsi + 0.4 * Math.max(0, 100 - distHigh * 3);

  let level: HeatLevel;
  let advice: string;
  let positionsRecommended: number;
  if (heat >= 75) {
    level = "hot";
    advice = "🔴 Overheated market — buy at most 2 positions";
    positionsRecommended = 2;
  } else if (heat >= 50) {
    level = "warm";
    advice = "🟡 Moderate market — buy 3 to 4 positions";
    positionsRecommended = 3;
  } else {
    level = "cool";
    advice = "🟢 Favourable market — buy all 5 positions";
    positionsRecommended = 5;
  }

  return {
    rsi: round(rsi, 1),
    distFrom52wHigh: round(distHigh, 2),
    level,
    heat: round(heat, 1),
    advice,
    positionsRecommended,
  };
}

/** Kelly fraction of capital per trade, clamped to [0, maxKelly]. avgLoss is a positive magnitude. */
export function kellyFraction(
  winRate: number,
  avgWin: number,
  avgLoss: number,
  maxKelly = DEFAULT_MAX_KELLY,
): number {
  if (avgLoss === 0) return maxKelly;
  const ratio = avgWin / avgLoss;
  if (ratio <= 0) return 0;
  const kelly = winRate - (1 - winRate) / ratio;
  return round(Math.max(0, Math.min(kelly, maxKelly)), 4);
}

export function positionSizeAdvice(
  capital: number,
  heat: MarketHeat,
  perPosition = 100,
): PositionAdvice {
  const positions = heat.positionsRecommended;
  const totalDeployed = positions * perPosition;
  return {
    capital: round(capital, 2),
    positions,
    perPosition,
    totalDeployed: round(totalDeployed, 2),
    pctDeployed: capital > 0 ? round((totalDeployed / capital) * 100, 1) : 0,
    advice: heat.advice,
  };
}
