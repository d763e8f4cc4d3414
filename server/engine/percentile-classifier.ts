import type { WindowSettings } from "@shared/schema";
import { calculatePercentile } from "./price-math";
import type { Classification, PriceWindow } from "./types";

export type ClassifierSettings = Pick<
  WindowSettings,
  "cheapPercentile" | "expensivePercentile" | "chargeWindowCount"
>;

export const byStart = (a: PriceWindow, b: PriceWindow): number => a.start.getTime() - b.start.getTime();

export const byPriceAscending = (a: PriceWindow, b: PriceWindow): number =>
  a.price - b.price || byStart(a, b);

export const byPriceDescending = (a: PriceWindow, b: PriceWindow): number =>
  b.price - a.price || byStart(a, b);

/**
 * Bestimmt Perzentil-Grenzen und Kandidaten.
 *
 * Günstige Kandidaten: Preis <= Grenze des unteren Perzentils; ohne
 * Ladefenster (chargeWindowCount = 0) gibt es keine. Teure Kandidaten:
 * Preis >= Grenze des oberen Perzentils (100 - expensivePercentile).
 * Beide Listen chronologisch.
 */
export function classifyWindows(
  windows: readonly PriceWindow[],
  settings: ClassifierSettings,
): Classification {
  const ordered = [...windows].sort(byStart);
  const prices = ordered.map((w) => w.price);
  const cheapCutoff = calculatePercentile(prices, settings.cheapPercentile);
  const expensiveCutoff = calculatePercentile(prices, 100 - settings.expensivePercentile);

  const cheapCandidates =
    cheapCutoff === null || settings.chargeWindowCount === 0
      ? []
      : ordered.filter((w) => w.price <= cheapCutoff);

  const expensiveCandidates =
    expensiveCutoff === null ? [] : ordered.filter((w) => w.price >= expensiveCutoff);

  return {
    cheapCutoff,
    expensiveCutoff,
    cheapCandidates: Object.freeze(cheapCandidates),
    expensiveCandidates: Object.freeze(expensiveCandidates),
  };
}
