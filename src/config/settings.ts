import { z } from "zod";
import { DEFAULT_FLAT_FEE, DEFAULT_PCT_FEE, FeeStructure, grossTargetFromNet } from "../analyzers/targets";

/**
 * Strategy settings threaded explicitly into the scorer, the pricer and the
 * backtester. Nothing in the analyzers reads process.env.
 */
export interface StrategySettings {
  investmentAmount: number;
  grossTargetPct: number;   // fraction, e.g. 0.045
  netTargetPct: number;     // fraction; sets the gross target when none is given
  fees: FeeStructure;
  intervalDays: number;     // trading sessions per cycle
  lookbackDays: number;     // calendar days replayed by the backtest
  topN: number;
  benchmark: string;
}

export const DEFAULT_SETTINGS: StrategySettings = {
  investmentAmount: 100,
  grossTargetPct: 0.045,
  netTargetPct: 0.03,
  fees: { mode: "flat", flatFee: DEFAULT_FLAT_FEE },
  intervalDays: 14,
  lookbackDays: 90,
  topN: 5,
  benchmark: "^FCHI",
};

export class SettingsError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid settings: ${issues.join("; ")}`);
    this.name = "SettingsError";
  }
}

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const FeeSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("flat"), flatFee: z.number().nonnegative() }),
  z.object({ mode: z.literal("pct"), pctFee: z.number().min(0).lt(1) }),
]);

const SettingsSchema = z.object({
  investmentAmount: z.number().positive(),
  grossTargetPct: z.number().gt(-1).lt(10),
  netTargetPct: z.number().gt(-1).lt(10),
  fees: FeeSchema,
  intervalDays: z.number().int().min(2),
  lookbackDays: z.number().int().positive(),
  topN: z.number().int().positive(),
  benchmark: z.string().min(1),
});

const EnvNumber = z.coerce.number().finite();

const EnvSchema = z.object({
  INVESTMENT_AMOUNT: EnvNumber.optional(),
  GROSS_TARGET_PCT: EnvNumber.optional(),
  NET_TARGET_PCT: EnvNumber.optional(),
  FEE_MODE: z.enum(["flat", "pct"]).optional(),
  FLAT_FEE: EnvNumber.optional(),
  PCT_FEE: EnvNumber.optional(),
  INTERVAL_DAYS: EnvNumber.optional(),
  LOOKBACK_DAYS: EnvNumber.optional(),
  TOP_N: EnvNumber.optional(),
  BENCHMARK_SYMBOL: z.string().min(1).optional(),
});

export type SettingsOverrides = Partial<Omit<StrategySettings, "fees">> & {
  feeMode?: FeeStructure["mode"];
  flatFee?: number;
  pctFee?: number;
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/**
 * Builds settings from environment variables (as loaded by dotenv), then CLI
 * overrides, then validates. Empty env values count as unset. Without an
 * explicit gross target, a given net target is grossed up by the round-trip fees.
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  overrides: SettingsOverrides = {},
): StrategySettings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  const parsedEnv = EnvSchema.safeParse(present);
  if (!parsedEnv.success) throw new SettingsError(formatIssues(parsedEnv.error));
  const e = parsedEnv.data;

  const feeMode = overrides.feeMode ?? e.FEE_MODE ?? DEFAULT_SETTINGS.fees.mode;
  const fees: FeeStructure = feeMode === "flat"
    ? { mode: "flat", flatFee: overrides.flatFee ?? e.FLAT_FEE ?? DEFAULT_FLAT_FEE }
    : { mode: "pct", pctFee: overrides.pctFee ?? e.PCT_FEE ?? DEFAULT_PCT_FEE };

  const investmentAmount = overrides.investmentAmount ?? e.INVESTMENT_AMOUNT ?? DEFAULT_SETTINGS.investmentAmount;
  const netTarget = overrides.netTargetPct ?? e.NET_TARGET_PCT;
  const grossTarget = overrides.grossTargetPct ?? e.GROSS_TARGET_PCT;

  const candidate: StrategySettings = {
    investmentAmount,
    grossTargetPct: grossTarget
      ?? (netTarget !== undefined ? grossTargetFromNet(netTarget, investmentAmount, fees) : DEFAULT_SETTINGS.grossTargetPct),
    netTargetPct: netTarget ?? DEFAULT_SETTINGS.netTargetPct,
    fees,
    intervalDays: overrides.intervalDays ?? e.INTERVAL_DAYS ?? DEFAULT_SETTINGS.intervalDays,
    lookbackDays: overrides.lookbackDays ?? e.LOOKBACK_DAYS ?? DEFAULT_SETTINGS.lookbackDays,
    topN: overrides.topN ?? e.TOP_N ?? DEFAULT_SETTINGS.topN,
    benchmark: overrides.benchmark ?? e.BENCHMARK_SYMBOL ?? DEFAULT_SETTINGS.benchmark,
  };

  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) throw new SettingsError(formatIssues(parsed.error));
  return parsed.data;
}

export function describeFees(fees: FeeStructure): string {
  return fees.mode === "flat"
    ? `flat ${fees.flatFee.toFixed(2)} per leg`
    : `${(fees.pctFee * 100).toFixed(2)}% per leg`;
}
