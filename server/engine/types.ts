import type { WindowDuration, WindowSettings, WindowState } from "@shared/schema";
import type { StateDecision } from "./state-resolver";

/**
 * Ein Preisfenster in Zielauflösung, Preis bereits inkl. MwSt., Steuer und Zusatzkosten.
 */
export interface PriceWindow {
  readonly start: Date;
  readonly durationMinutes: WindowDuration;
  readonly price: number;
}

export type Day = "today" | "tomorrow";

export interface Classification {
  cheapCutoff: number | null;
  expensiveCutoff: number | null;
  /** Chronologisch, Preis <= cheapCutoff. */
  cheapCandidates: readonly PriceWindow[];
  /** Chronologisch, Preis >= expensiveCutoff. */
  expensiveCandidates: readonly PriceWindow[];
}

export interface WindowSelection {
  chargeWindows: readonly PriceWindow[];
  dischargeWindows: readonly PriceWindow[];
  aggressiveWindows: readonly PriceWindow[];
  /** Ø Ladepreis bzw. Ø bis zur Günstig-Grenze; Maßstab für aggressive Fenster. */
  cheapReferencePrice: number | null;
  /** `cheapReferencePrice` inkl. Wirkungsgradverlust. */
  effectiveCheapPrice: number | null;
}

export interface SpreadSummary {
  avgCheapPrice: number | null;
  avgExpensivePrice: number | null;
  spreadPct: number | null;
  spreadMet: boolean;
  dischargeSpreadMet: boolean;
  aggressiveSpreadMet: boolean;
}

export interface CompletedSummary {
  completedChargeWindows: number;
  completedDischargeWindows: number;
  chargedKwh: number;
  dischargedKwh: number;
  completedChargeCost: number;
  completedDischargeRevenue: number;
}

export interface NetSummary {
  netKwh: number;
  netCost: number;
  netPricePerKwh: number | null;
}

export type Economics = SpreadSummary & CompletedSummary & NetSummary;

export interface ActualTimeline {
  actualCharge: readonly PriceWindow[];
  actualDischarge: readonly PriceWindow[];
}

/**
 * Vollständiges, unveränderliches Ergebnis für einen Tag.
 */
export interface ClassificationResult {
  readonly day: Day;
  /** yyyy-MM-dd in der Zeitzone der Einstellungen */
  readonly date: string;
  readonly state: WindowState;
  /** Vorrangstufe, aus der `state` stammt */
  readonly decision: StateDecision;
  readonly windows: readonly PriceWindow[];
  readonly currentWindow: PriceWindow | null;
  readonly currentPrice: number | null;
  readonly classification: Classification;
  readonly selection: WindowSelection;
  readonly timeline: ActualTimeline;
  readonly economics: Economics;
  readonly priceOverrideActive: boolean;
  readonly timeOverrideActive: boolean;
  readonly automationEnabled: boolean;
  readonly calculationWindowEnabled: boolean;
  readonly minSpreadRequired: number;
}

/**
 * Vom Zeitpunkt unabhängiger Teil eines Tages: Normalisierung, Klassifizierung,
 * Auswahl und Spread. Wird gecacht; Zustand und abgeschlossene Fenster nicht.
 */
export interface DayAnalysis {
  readonly day: Day;
  readonly date: string;
  readonly settings: WindowSettings;
  readonly windows: readonly PriceWindow[];
  /** Fenster innerhalb des Berechnungszeitraums, sonst alle */
  readonly analysed: readonly PriceWindow[];
  readonly classification: Classification;
  readonly selection: WindowSelection;
  readonly spread: SpreadSummary;
}

export interface AnalysisSnapshot {
  readonly today: DayAnalysis;
  readonly tomorrow: DayAnalysis;
}

export interface EvaluationResult {
  readonly today: ClassificationResult;
  readonly tomorrow: ClassificationResult;
  readonly computedAt: Date;
}

export const windowEnd = (window: PriceWindow): Date =>
  new Date(window.start.getTime() + window.durationMinutes * 60_000);
