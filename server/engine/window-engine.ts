import { parseISO } from "date-fns";
import type { RawPricePoint, WindowSettings } from "@shared/schema";
import { log } from "../core/logger";
import { computeNetSummary, summarizeCompleted, summarizeSpread } from "./economics";
import { hashFingerprint } from "./fingerprint";
import { getLocalTimeParts, nextLocalDate } from "./local-time";
import { classifyWindows } from "./percentile-classifier";
import { filterByCalculationWindow, normalizePrices } from "./price-normalizer";
import type { CacheStats, ResultCache } from "./result-cache";
import {
  buildActualTimeline,
  buildMembership,
  decisionToState,
  resolveDecision,
  type ResolverContext,
} from "./state-resolver";
import {
  windowEnd,
  type AnalysisSnapshot,
  type ClassificationResult,
  type Day,
  type DayAnalysis,
  type EvaluationResult,
  type PriceWindow,
} from "./types";
import { selectWindows } from "./window-selector";

export interface EvaluateInput {
  pricesToday: readonly RawPricePoint[] | null | undefined;
  pricesTomorrow: readonly RawPricePoint[] | null | undefined;
  settings: WindowSettings;
  /** Einstellungen für morgen, sonst gelten die heutigen */
  tomorrowSettings?: WindowSettings;
  now: Date;
}

export interface EvaluateOutcome {
  today: ClassificationResult;
  tomorrow: ClassificationResult;
  computedAt: Date;
  fromCache: boolean;
}

function resolveDate(windows: readonly PriceWindow[], settings: WindowSettings, now: Date, day: Day): string {
  if (windows.length > 0) {
    return getLocalTimeParts(windows[0].start, settings.timezone).date;
  }
  const today = getLocalTimeParts(now, settings.timezone).date;
  return day === "today" ? today : nextLocalDate(today);
}

/**
 * Zeitunabhängige Schritte für einen Tag: Normalisieren, Klassifizieren,
 * Auswählen und Spread. `now` bestimmt nur das Datum einer leeren Reihe.
 */
export function analyseDay(
  raw: readonly RawPricePoint[] | null | undefined,
  settings: WindowSettings,
  now: Date,
  day: Day,
): DayAnalysis {
  const windows = normalizePrices(raw, settings);
  const analysed = filterByCalculationWindow(windows, settings.calculationWindow, settings.timezone);

  const classification = classifyWindows(analysed, settings);
  const selection = selectWindows(classification, analysed, settings);

  return Object.freeze({
    day,
    date: resolveDate(windows, settings, now, day),
    settings,
    windows,
    analysed,
    classification,
    selection,
    spread: summarizeSpread(selection, settings),
  });
}

/**
 * Zustand, tatsächlicher Verlauf und abgeschlossene Fenster zum Zeitpunkt `now`.
 * Außerhalb des Berechnungszeitraums gibt es weder aktuellen Preis noch Preis-Override.
 */
export function resolveDay(analysis: DayAnalysis, now: Date): ClassificationResult {
  const { settings, analysed, spread } = analysis;

  const ctx: ResolverContext = {
    settings,
    membership: buildMembership(analysis.selection),
    spreadMet: spread.spreadMet,
  };
  const timeline = buildActualTimeline(analysed, ctx);
  const completed = summarizeCompleted(timeline, settings, now);
  const net = computeNetSummary(completed, spread);

  const nowMs = now.getTime();
  const current =
    analysed.find((w) => w.start.getTime() <= nowMs && nowMs < windowEnd(w).getTime()) ?? null;
  const decision = resolveDecision(now, current, ctx);

  return Object.freeze({
    day: analysis.day,
    date: analysis.date,
    state: decisionToState(decision),
    decision,
    windows: analysis.windows,
    currentWindow: current,
    currentPrice: current ? current.price : null,
    classification: analysis.classification,
    selection: analysis.selection,
    timeline,
    economics: Object.freeze({ ...spread, ...completed, ...net }),
    priceOverrideActive: decision.kind === "price_override",
    timeOverrideActive: decision.kind === "time_override",
    automationEnabled: settings.automationEnabled,
    calculationWindowEnabled: settings.calculationWindow !== undefined,
    minSpreadRequired: settings.minSpreadPct,
  });
}

/** Komplette Berechnung für einen Tag ohne Cache. */
export function calculateWindows(
  raw: readonly RawPricePoint[] | null | undefined,
  settings: WindowSettings,
  now: Date,
  day: Day,
): ClassificationResult {
  return resolveDay(analyseDay(raw, settings, now, day), now);
}

const sortByStart = (points: readonly RawPricePoint[] | null | undefined): RawPricePoint[] =>
  [...(points ?? [])].sort((a, b) => parseISO(a.start).getTime() - parseISO(b.start).getTime());

/**
 * Cache-Schlüssel aus allem, was die Analyse ändern kann: Preisreihen
 * (nach Zeit sortiert), beide Einstellungs-Slots und der lokale Kalendertag.
 */
export function buildCacheKey(input: EvaluateInput): string {
  return hashFingerprint({
    today: sortByStart(input.pricesToday),
    tomorrow: sortByStart(input.pricesTomorrow),
    settings: input.settings,
    tomorrowSettings: input.tomorrowSettings ?? input.settings,
    date: getLocalTimeParts(input.now, input.settings.timezone).date,
  });
}

/**
 * Einstiegspunkt für wiederholte Abfragen. Der Cache wird vom Aufrufer
 * übergeben und gehört ihm; er hält nur die Analyse, der Zustand wird bei
 * jedem Aufruf für `now` neu aufgelöst.
 */
export class WindowEngine {
  private last: EvaluationResult | null = null;

  constructor(private readonly cache: ResultCache<AnalysisSnapshot>) {}

  evaluate(input: EvaluateInput): EvaluateOutcome {
    const key = buildCacheKey(input);
    const { value: snapshot, fromCache } = this.cache.getOrCompute(key, () => {
      const started = Date.now();
      const today = analyseDay(input.pricesToday, input.settings, input.now, "today");
      const tomorrow = analyseDay(
        input.pricesTomorrow,
        input.tomorrowSettings ?? input.settings,
        input.now,
        "tomorrow",
      );
      log(
        "debug",
        "engine",
        `Fenster berechnet in ${Date.now() - started} ms: heute ${today.windows.length}, morgen ${tomorrow.windows.length} Fenster`,
      );
      return Object.freeze({ today, tomorrow });
    });

    const result: EvaluationResult = Object.freeze({
      today: resolveDay(snapshot.today, input.now),
      tomorrow: resolveDay(snapshot.tomorrow, input.now),
      computedAt: input.now,
    });
    this.last = result;
    return { ...result, fromCache };
  }

  /** Letztes gültiges Ergebnis, solange seine Analyse im Cache liegt. */
  lastResult(): EvaluationResult | null {
    return this.cache.peek() ? this.last : null;
  }

  invalidate(reason: string): void {
    this.cache.invalidate(reason);
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }
}
