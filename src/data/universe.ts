import { z } from "zod";
import universeFile from "./universe.json";

export interface Instrument {
  ticker: string;
  name: string;
  sector: string;
}

const InstrumentSchema = z.object({
  ticker: z.string().min(1),
  name: z.string().min(1),
  sector: z.string().min(1),
});

const UniverseSchema = z.object({
  benchmark: InstrumentSchema,
  instruments: z.array(InstrumentSchema).min(1),
});

export type Universe = z.infer<typeof UniverseSchema>;

let cached: Universe | null = null;

export function loadUniverse(): Universe {
  if (!cached) cached = UniverseSchema.parse(universeFile);
  return cached;
}

/** Catalog entry for `ticker`; unknown symbols get a placeholder name and sector. */
export function getInstrument(ticker: string): Instrument {
  const found = loadUniverse().instruments.find((i) => i.ticker === ticker);
  return found ?? { ticker, name: ticker, sector: "—" };
}
