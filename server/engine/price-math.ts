/**
 * Arithmetisches Mittel, `null` für eine leere Liste.
 */
export const calculateAveragePrice = <T>(
  entries: readonly T[],
  getValue: (entry: T) => number,
): number | null => {
  if (entries.length === 0) return null;
  let sum = 0;
  for (const entry of entries) {
    sum += getValue(entry);
  }
  return sum / entries.length;
};

/**
 * Quantil per linearer Interpolation zwischen den benachbarten Rängen:
 * h = (n - 1) * p / 100, q = v[floor(h)] + (h - floor(h)) * (v[floor(h) + 1] - v[floor(h)]).
 */
export const calculatePercentile = (values: readonly number[], percentile: number): number | null => {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const p = Math.min(100, Math.max(0, percentile));
  const rank = ((sorted.length - 1) * p) / 100;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (rank - lower) * (sorted[upper] - sorted[lower]);
};

/**
 * Ladepreis inklusive Wirkungsgradverlust: von 1 kWh eingekaufter Energie
 * kommen nur `roundTripEfficiencyPct` % wieder heraus.
 */
export const toEffectiveChargePrice = (price: number, roundTripEfficiencyPct: number): number =>
  price / (roundTripEfficiencyPct / 100);

/**
 * Relativer Abstand in Prozent, bezogen auf den Betrag des günstigen Preises.
 * So zeigt ein positiver Wert auch bei negativem Ladepreis einen Gewinn an.
 */
export const calculateSpreadPct = (cheap: number | null, expensive: number | null): number | null => {
  if (cheap === null || expensive === null || cheap === 0) return null;
  return ((expensive - cheap) / Math.abs(cheap)) * 100;
};

/**
 * Spread-Prüfung. Bei günstigem Preis <= 0 ist ein relativer Spread
 * nicht definiert; dann zählt nur, dass der teure Preis darüber liegt.
 */
export const meetsSpread = (params: {
  cheap: number;
  expensive: number;
  minSpreadPct: number;
  minPriceDifference: number;
}): boolean => {
  const { cheap, expensive, minSpreadPct, minPriceDifference } = params;
  const diff = expensive - cheap;
  if (diff < minPriceDifference) return false;
  if (cheap <= 0) return diff > 0;
  return (diff / cheap) * 100 >= minSpreadPct;
};
