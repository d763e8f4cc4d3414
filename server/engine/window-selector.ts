import type { WindowSettings } from "@shared/schema";
import { log } from "../core/logger";
import { byPriceAscending, byPriceDescending, byStart } from "./percentile-classifier";
import { calculateAveragePrice, meetsSpread, toEffectiveChargePrice } from "./price-math";
import type { Classification, PriceWindow, WindowSelection } from "./types";

export type SelectorSettings = Pick<
  WindowSettings,
  | "chargeWindowCount"
  | "expensiveWindowCount"
  | "minSpreadPct"
  | "dischargeSpreadPct"
  | "aggressiveSpreadPct"
  | "minPriceDifference"
  | "roundTripEfficiencyPct"
>;

const getPrice = (w: PriceWindow): number => w.price;

const chronological = (windows: readonly PriceWindow[]): readonly PriceWindow[] =>
  Object.freeze([...windows].sort(byStart));

/**
 * Ladefenster: günstigste Kandidaten zuerst, jeder wird nur übernommen, wenn
 * der wirkungsgradbereinigte Durchschnitt inkl. Kandidat noch genug Abstand
 * zum Referenz-Entladepreis hält. Abgelehnte Kandidaten werden übersprungen.
 */
function selectChargeWindows(
  cheapSorted: readonly PriceWindow[],
  expensiveSorted: readonly PriceWindow[],
  settings: SelectorSettings,
): PriceWindow[] {
  if (settings.chargeWindowCount === 0) return [];

  const referencePool =
    settings.expensiveWindowCount > 0
      ? expensiveSorted.slice(0, settings.expensiveWindowCount)
      : expensiveSorted;
  const reference = calculateAveragePrice(referencePool, getPrice);
  if (reference === null) return [];

  const selected: PriceWindow[] = [];
  for (const candidate of cheapSorted) {
    if (selected.length >= settings.chargeWindowCount) break;
    const proposedAvg = calculateAveragePrice([...selected, candidate], getPrice) ?? candidate.price;
    const accepted = meetsSpread({
      cheap: toEffectiveChargePrice(proposedAvg, settings.roundTripEfficiencyPct),
      expensive: reference,
      minSpreadPct: settings.minSpreadPct,
      minPriceDifference: settings.minPriceDifference,
    });
    if (accepted) {
      selected.push(candidate);
    } else {
      log("trace", "selector", `Ladefenster ${candidate.start.toISOString()} verworfen (Spread)`);
    }
  }
  return selected;
}

function selectDischargeWindows(
  pool: readonly PriceWindow[],
  effectiveCheapPrice: number | null,
  settings: SelectorSettings,
): PriceWindow[] {
  if (settings.expensiveWindowCount === 0) return [];
  if (effectiveCheapPrice === null) {
    return pool.slice(0, settings.expensiveWindowCount);
  }

  const selected: PriceWindow[] = [];
  for (const candidate of pool) {
    if (selected.length >= settings.expensiveWindowCount) break;
    const proposedAvg = calculateAveragePrice([...selected, candidate], getPrice) ?? candidate.price;
    const accepted = meetsSpread({
      cheap: effectiveCheapPrice,
      expensive: proposedAvg,
      minSpreadPct: settings.dischargeSpreadPct,
      minPriceDifference: settings.minPriceDifference,
    });
    if (accepted) {
      selected.push(candidate);
    } else {
      log("trace", "selector", `Entladefenster ${candidate.start.toISOString()} verworfen (Spread)`);
    }
  }
  return selected;
}

/**
 * Wählt aus den Kandidaten die Lade-, Entlade- und aggressiven Entladefenster.
 *
 * `windows` ist die analysierte Tagesreihe; sie liefert im reinen
 * Entlademodus den günstigen Referenzpreis für die Aggressiv-Prüfung.
 * Der Wirkungsgrad fließt nur in die Lade- und Entlade-Prüfung ein, aggressive
 * Fenster werden gegen den rohen Referenzpreis gemessen.
 * Das Ergebnis hängt nur von Preisen und Zeitpunkten ab, nicht von der
 * Reihenfolge der Eingabe.
 */
export function selectWindows(
  classification: Classification,
  windows: readonly PriceWindow[],
  settings: SelectorSettings,
): WindowSelection {
  const cheapSorted = [...classification.cheapCandidates].sort(byPriceAscending);
  const expensiveSorted = [...classification.expensiveCandidates].sort(byPriceDescending);

  const charge = selectChargeWindows(cheapSorted, expensiveSorted, settings);
  const chargeStarts = new Set(charge.map((w) => w.start.getTime()));
  const chargeAvg = calculateAveragePrice(charge, getPrice);
  const effectiveChargeAvg =
    chargeAvg === null ? null : toEffectiveChargePrice(chargeAvg, settings.roundTripEfficiencyPct);

  const pool = expensiveSorted.filter((w) => !chargeStarts.has(w.start.getTime()));
  const discharge = selectDischargeWindows(pool, effectiveChargeAvg, settings);

  // Referenz für aggressives Entladen: roher Ladedurchschnitt, ohne Ladefenster
  // der Durchschnitt aller Preise bis zur Günstig-Grenze
  let cheapReference = chargeAvg;
  if (cheapReference === null && classification.cheapCutoff !== null) {
    const cutoff = classification.cheapCutoff;
    cheapReference = calculateAveragePrice(
      [...windows].sort(byStart).filter((w) => w.price <= cutoff),
      getPrice,
    );
  }

  const reference = cheapReference;
  const aggressive =
    reference === null
      ? []
      : discharge.filter((w) =>
          meetsSpread({
            cheap: reference,
            expensive: w.price,
            minSpreadPct: settings.aggressiveSpreadPct,
            minPriceDifference: settings.minPriceDifference,
          }),
        );

  log(
    "debug",
    "selector",
    `Auswahl: ${charge.length} Laden, ${discharge.length} Entladen, ${aggressive.length} aggressiv`,
  );

  return {
    chargeWindows: chronological(charge),
    dischargeWindows: chronological(discharge),
    aggressiveWindows: chronological(aggressive),
    cheapReferencePrice: cheapReference,
    effectiveCheapPrice:
      cheapReference === null ? null : toEffectiveChargePrice(cheapReference, settings.roundTripEfficiencyPct),
  };
}
