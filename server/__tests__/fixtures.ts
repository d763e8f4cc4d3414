import { windowSettingsSchema, type RawPricePoint, type WindowSettings, type WindowSettingsInput } from "@shared/schema";
import type { PriceWindow } from "../engine/types";

/**
 * Einstellungen ohne Preisaufschläge: Gesamtpreis = Rohwert.
 */
export function plainSettings(overrides: WindowSettingsInput = {}): WindowSettings {
  return windowSettingsSchema.parse({
    vatPct: 0,
    taxPerKwh: 0,
    additionalCostPerKwh: 0,
    minPriceDifference: 0,
    ...overrides,
  });
}

/** Rohpreisreihe ab `startIso` mit festem Abstand. */
export function priceSeries(startIso: string, values: readonly number[], minutes: 15 | 60 = 60): RawPricePoint[] {
  const start = new Date(startIso).getTime();
  return values.map((value, i) => ({
    start: new Date(start + i * minutes * 60_000).toISOString(),
    value,
  }));
}

export function windowsFrom(startIso: string, prices: readonly number[], minutes: 15 | 60 = 60): PriceWindow[] {
  const start = new Date(startIso).getTime();
  return prices.map((price, i) => ({
    start: new Date(start + i * minutes * 60_000),
    durationMinutes: minutes,
    price,
  }));
}

/**
 * Typischer Tagesverlauf in Stunden: günstige Nacht, Abendspitze.
 * 00-03: 0.10-0.13, 04-15: 0.20, 16-19: 0.40-0.46, 20-23: 0.25
 */
export const DAY_PROFILE: readonly number[] = [
  0.1, 0.11, 0.12, 0.13,
  0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2,
  0.4, 0.42, 0.44, 0.46,
  0.25, 0.25, 0.25, 0.25,
];

/** Deterministische Pseudo-Zufallszahlen für Eigenschaftstests. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function shuffled<T>(items: readonly T[], seed: number): T[] {
  const random = seededRandom(seed);
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}
