import type { WindowSettings } from "@shared/schema";
import { calculateAveragePrice, calculateSpreadPct, meetsSpread, toEffectiveChargePrice } from "./price-math";
import {
  windowEnd,
  type ActualTimeline,
  type CompletedSummary,
  type NetSummary,
  type PriceWindow,
  type SpreadSummary,
  type WindowSelection,
} from "./types";

export type EconomicsSettings = Pick<
  WindowSettings,
  | "minSpreadPct"
  | "dischargeSpreadPct"
  | "aggressiveSpreadPct"
  | "roundTripEfficiencyPct"
  | "chargePowerW"
  | "dischargePowerW"
>;

const getPrice = (w: PriceWindow): number => w.price;

/**
 * Durchschnittspreise und Spread-Kennzahlen der gewählten Fenster.
 * Ohne Lade- oder ohne Entladefenster gibt es keine Bedingung zu verletzen.
 */
export function summarizeSpread(selection: WindowSelection, settings: EconomicsSettings): SpreadSummary {
  const avgCheapPrice = calculateAveragePrice(selection.chargeWindows, getPrice);
  const avgExpensivePrice = calculateAveragePrice(selection.dischargeWindows, getPrice);
  const spreadPct = calculateSpreadPct(avgCheapPrice, avgExpensivePrice);

  const gate = (minSpreadPct: number): boolean => {
    if (avgCheapPrice === null || avgExpensivePrice === null) return true;
    return meetsSpread({
      cheap: toEffectiveChargePrice(avgCheapPrice, settings.roundTripEfficiencyPct),
      expensive: avgExpensivePrice,
      minSpreadPct,
      minPriceDifference: 0,
    });
  };

  return {
    avgCheapPrice,
    avgExpensivePrice,
    spreadPct,
    spreadMet: gate(settings.minSpreadPct),
    dischargeSpreadMet: selection.dischargeWindows.length > 0 && gate(settings.dischargeSpreadPct),
    aggressiveSpreadMet: selection.aggressiveWindows.length > 0,
  };
}

const energyKwh = (window: PriceWindow, powerW: number): number =>
  (window.durationMinutes / 60) * (powerW / 1000);

/**
 * Zählt abgeschlossene Fenster (Ende <= now) des tatsächlichen Verlaufs
 * und summiert Energie sowie Kosten bzw. Erlös.
 */
export function summarizeCompleted(
  timeline: ActualTimeline,
  settings: EconomicsSettings,
  now: Date,
): CompletedSummary {
  const isCompleted = (w: PriceWindow): boolean => windowEnd(w).getTime() <= now.getTime();
  const charged = timeline.actualCharge.filter(isCompleted);
  const discharged = timeline.actualDischarge.filter(isCompleted);

  let chargedKwh = 0;
  let completedChargeCost = 0;
  for (const w of charged) {
    const kwh = energyKwh(w, settings.chargePowerW);
    chargedKwh += kwh;
    completedChargeCost += w.price * kwh;
  }

  let dischargedKwh = 0;
  let completedDischargeRevenue = 0;
  for (const w of discharged) {
    const kwh = energyKwh(w, settings.dischargePowerW);
    dischargedKwh += kwh;
    completedDischargeRevenue += w.price * kwh;
  }

  return {
    completedChargeWindows: charged.length,
    completedDischargeWindows: discharged.length,
    chargedKwh,
    dischargedKwh,
    completedChargeCost,
    completedDischargeRevenue,
  };
}

/**
 * Netto-Bilanz. Beide Werte dürfen negativ werden: mehr entladen als
 * geladen bzw. Gewinn. Der Betrag im Nenner erhält das Vorzeichen der Kosten.
 */
export function computeNetSummary(
  completed: Pick<
    CompletedSummary,
    "chargedKwh" | "dischargedKwh" | "completedChargeCost" | "completedDischargeRevenue"
  >,
  spread: Pick<SpreadSummary, "avgCheapPrice" | "avgExpensivePrice">,
): NetSummary {
  const netKwh = completed.chargedKwh - completed.dischargedKwh;
  const netCost = completed.completedChargeCost - completed.completedDischargeRevenue;

  let netPricePerKwh: number | null = null;
  if (netKwh !== 0) {
    netPricePerKwh = netCost / Math.abs(netKwh);
  } else if (spread.avgCheapPrice !== null && spread.avgExpensivePrice !== null) {
    netPricePerKwh = spread.avgExpensivePrice - spread.avgCheapPrice;
  }

  return { netKwh, netCost, netPricePerKwh };
}
