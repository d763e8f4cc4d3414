import type { WindowState } from "@shared/schema";
import type { ClassificationResult, PriceWindow } from "./types";

export interface WindowAttributes {
  state: WindowState;
  day: ClassificationResult["day"];
  date: string;
  numWindows: number;
  currentPrice: number | null;
  cheapCutoff: number | null;
  expensiveCutoff: number | null;
  cheapestTimes: string[];
  cheapestPrices: number[];
  expensiveTimes: string[];
  expensivePrices: number[];
  expensiveTimesAggressive: string[];
  expensivePricesAggressive: number[];
  actualChargeTimes: string[];
  actualChargePrices: number[];
  actualDischargeTimes: string[];
  actualDischargePrices: number[];
  completedChargeWindows: number;
  completedDischargeWindows: number;
  completedChargeCost: number;
  completedDischargeRevenue: number;
  chargedKwh: number;
  dischargedKwh: number;
  netKwh: number;
  netCost: number;
  netPricePerKwh: number | null;
  avgCheapPrice: number | null;
  avgExpensivePrice: number | null;
  spreadPercentage: number | null;
  minSpreadRequired: number;
  spreadMet: boolean;
  dischargeSpreadMet: boolean;
  aggressiveSpreadMet: boolean;
  priceOverrideActive: boolean;
  timeOverrideActive: boolean;
  automationEnabled: boolean;
  calculationWindowEnabled: boolean;
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const roundOrNull = (value: number | null, digits: number): number | null =>
  value === null ? null : round(value, digits);

const times = (windows: readonly PriceWindow[]): string[] => windows.map((w) => w.start.toISOString());
const prices = (windows: readonly PriceWindow[]): number[] => windows.map((w) => round(w.price, 5));

/**
 * Flache, JSON-taugliche Sicht auf ein Tagesergebnis für Dashboards.
 * Preise auf 5, Kosten und Energie auf 3 Nachkommastellen, Spread auf 0,1 %.
 */
export function toWindowAttributes(result: ClassificationResult): WindowAttributes {
  const { selection, timeline, economics, classification } = result;

  return {
    state: result.state,
    day: result.day,
    date: result.date,
    numWindows: result.windows.length,
    currentPrice: roundOrNull(result.currentPrice, 5),
    cheapCutoff: roundOrNull(classification.cheapCutoff, 5),
    expensiveCutoff: roundOrNull(classification.expensiveCutoff, 5),
    cheapestTimes: times(selection.chargeWindows),
    cheapestPrices: prices(selection.chargeWindows),
    expensiveTimes: times(selection.dischargeWindows),
    expensivePrices: prices(selection.dischargeWindows),
    expensiveTimesAggressive: times(selection.aggressiveWindows),
    expensivePricesAggressive: prices(selection.aggressiveWindows),
    actualChargeTimes: times(timeline.actualCharge),
    actualChargePrices: prices(timeline.actualCharge),
    actualDischargeTimes: times(timeline.actualDischarge),
    actualDischargePrices: prices(timeline.actualDischarge),
    completedChargeWindows: economics.completedChargeWindows,
    completedDischargeWindows: economics.completedDischargeWindows,
    completedChargeCost: round(economics.completedChargeCost, 3),
    completedDischargeRevenue: round(economics.completedDischargeRevenue, 3),
    chargedKwh: round(economics.chargedKwh, 3),
    dischargedKwh: round(economics.dischargedKwh, 3),
    netKwh: round(economics.netKwh, 3),
    netCost: round(economics.netCost, 3),
    netPricePerKwh: roundOrNull(economics.netPricePerKwh, 5),
    avgCheapPrice: roundOrNull(economics.avgCheapPrice, 5),
    avgExpensivePrice: roundOrNull(economics.avgExpensivePrice, 5),
    spreadPercentage: roundOrNull(economics.spreadPct, 1),
    minSpreadRequired: result.minSpreadRequired,
    spreadMet: economics.spreadMet,
    dischargeSpreadMet: economics.dischargeSpreadMet,
    aggressiveSpreadMet: economics.aggressiveSpreadMet,
    priceOverrideActive: result.priceOverrideActive,
    timeOverrideActive: result.timeOverrideActive,
    automationEnabled: result.automationEnabled,
    calculationWindowEnabled: result.calculationWindowEnabled,
  };
}
