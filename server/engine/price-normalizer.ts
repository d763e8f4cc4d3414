import { isValid, parseISO } from "date-fns";
import type { CalculationWindow, RawPricePoint, WindowDuration, WindowSettings } from "@shared/schema";
import { MalformedSeriesError } from "../core/errors";
import { log } from "../core/logger";
import { getLocalTimeParts, isTimeInRange, nextLocalDate } from "./local-time";
import type { PriceWindow } from "./types";

export type NormalizerSettings = Pick<
  WindowSettings,
  "windowDurationMinutes" | "vatPct" | "taxPerKwh" | "additionalCostPerKwh" | "timezone"
>;

interface ParsedPoint {
  start: Date;
  price: number;
}

const MINUTE_MS = 60_000;

/**
 * Endkundenpreis pro kWh: Börsenpreis (MWh wird umgerechnet) plus MwSt.,
 * danach Steuer und Zusatzkosten.
 */
export function toTotalPrice(
  point: Pick<RawPricePoint, "value" | "unit">,
  settings: Pick<WindowSettings, "vatPct" | "taxPerKwh" | "additionalCostPerKwh">,
): number {
  const perKwh = point.unit === "MWh" ? point.value / 1000 : point.value;
  return perKwh * (1 + settings.vatPct / 100) + settings.taxPerKwh + settings.additionalCostPerKwh;
}

function parsePoints(raw: readonly RawPricePoint[], settings: NormalizerSettings): ParsedPoint[] {
  const points = raw.map((point) => {
    const start = parseISO(point.start);
    if (!isValid(start)) {
      throw new MalformedSeriesError("timestamp", `Ungültiger Zeitstempel: ${point.start}`);
    }
    return { start, price: toTotalPrice(point, settings) };
  });
  return points.sort((a, b) => a.start.getTime() - b.start.getTime());
}

function detectGranularity(points: readonly ParsedPoint[]): WindowDuration {
  if (points.length < 2) {
    throw new MalformedSeriesError(
      "granularity",
      "Auflösung nicht bestimmbar: mindestens zwei Einträge nötig",
    );
  }
  const minutes = (points[1].start.getTime() - points[0].start.getTime()) / MINUTE_MS;
  if (minutes === 0) {
    throw new MalformedSeriesError("duplicate", `Doppelter Zeitstempel ${points[0].start.toISOString()}`);
  }
  if (minutes === 15 || minutes === 60) return minutes;
  throw new MalformedSeriesError("granularity", `Nicht unterstützte Auflösung: ${minutes} Minuten`);
}

function assertContiguous(points: readonly ParsedPoint[], granularity: WindowDuration): void {
  for (let i = 1; i < points.length; i++) {
    const minutes = (points[i].start.getTime() - points[i - 1].start.getTime()) / MINUTE_MS;
    if (minutes === granularity) continue;
    const at = points[i].start.toISOString();
    if (minutes === 0) {
      throw new MalformedSeriesError("duplicate", `Doppelter Zeitstempel ${at}`);
    }
    if (minutes > granularity) {
      throw new MalformedSeriesError("gap", `Lücke von ${minutes} Minuten vor ${at}`);
    }
    throw new MalformedSeriesError(
      "granularity",
      `Abstand ${minutes} Minuten vor ${at} passt nicht zur Auflösung ${granularity}`,
    );
  }
}

function assertFullDay(points: readonly ParsedPoint[], granularity: WindowDuration, timezone: string): void {
  const first = getLocalTimeParts(points[0].start, timezone);
  if (first.time !== "00:00") {
    throw new MalformedSeriesError(
      "day_start",
      `Reihe beginnt um ${first.time} statt um Mitternacht (${timezone})`,
    );
  }
  const lastEnd = new Date(points[points.length - 1].start.getTime() + granularity * MINUTE_MS);
  const last = getLocalTimeParts(lastEnd, timezone);
  const expectedDate = nextLocalDate(first.date);
  if (last.time !== "00:00" || last.date !== expectedDate) {
    throw new MalformedSeriesError(
      "day_end",
      `Reihe endet ${last.date} ${last.time} statt ${expectedDate} 00:00 (${timezone})`,
    );
  }
}

function toWindows(
  points: readonly ParsedPoint[],
  native: WindowDuration,
  target: WindowDuration,
): PriceWindow[] {
  if (native === target) {
    return points.map((p) => Object.freeze({ start: p.start, durationMinutes: target, price: p.price }));
  }

  if (native === 60) {
    return points.flatMap((p) =>
      [0, 1, 2, 3].map((quarter) =>
        Object.freeze({
          start: new Date(p.start.getTime() + quarter * 15 * MINUTE_MS),
          durationMinutes: target,
          price: p.price,
        }),
      ),
    );
  }

  // 15 → 60: je vier Viertelstunden mitteln
  const hours: PriceWindow[] = [];
  for (let i = 0; i < points.length; i += 4) {
    const group = points.slice(i, i + 4);
    const price = group.reduce((sum, p) => sum + p.price, 0) / group.length;
    hours.push(Object.freeze({ start: group[0].start, durationMinutes: target, price }));
  }
  return hours;
}

/**
 * Bringt eine Rohpreisreihe in eine lückenlose, chronologische Folge von
 * Fenstern der konfigurierten Länge, die genau einen lokalen Tag abdeckt.
 *
 * Leere oder fehlende Reihen ergeben eine leere Folge. Verletzungen von
 * Auflösung, Lückenlosigkeit oder Tagesgrenzen werfen MalformedSeriesError.
 */
export function normalizePrices(
  raw: readonly RawPricePoint[] | null | undefined,
  settings: NormalizerSettings,
): readonly PriceWindow[] {
  if (!raw || raw.length === 0) {
    return [];
  }

  const points = parsePoints(raw, settings);
  const granularity = detectGranularity(points);
  assertContiguous(points, granularity);
  assertFullDay(points, granularity, settings.timezone);

  const windows = toWindows(points, granularity, settings.windowDurationMinutes);
  log(
    "debug",
    "normalizer",
    `${points.length} Preise (${granularity} min) → ${windows.length} Fenster (${settings.windowDurationMinutes} min)`,
  );
  return Object.freeze(windows);
}

/**
 * Beschränkt die Analyse auf Fenster, deren lokaler Beginn im
 * Berechnungszeitraum liegt. Übernacht-Zeiträume sind erlaubt.
 */
export function filterByCalculationWindow(
  windows: readonly PriceWindow[],
  calculationWindow: CalculationWindow | undefined,
  timezone: string,
): readonly PriceWindow[] {
  if (!calculationWindow) return windows;
  return windows.filter((w) =>
    isTimeInRange(
      getLocalTimeParts(w.start, timezone).time,
      calculationWindow.start,
      calculationWindow.end,
    ),
  );
}
