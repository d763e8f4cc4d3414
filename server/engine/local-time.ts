import { addDays, format, parseISO } from "date-fns";

export interface LocalTimeParts {
  /** yyyy-MM-dd */
  date: string;
  /** HH:mm */
  time: string;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("de-DE", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Zerlegt einen Zeitpunkt in Datum und Uhrzeit der angegebenen Zeitzone.
 */
export function getLocalTimeParts(instant: Date, timezone: string): LocalTimeParts {
  const parts = getFormatter(timezone).formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value || "00";

  return {
    date: `${pick("year")}-${pick("month")}-${pick("day")}`,
    time: `${pick("hour")}:${pick("minute")}`,
  };
}

/** Kalendertag nach `date` (yyyy-MM-dd). */
export function nextLocalDate(date: string): string {
  return format(addDays(parseISO(date), 1), "yyyy-MM-dd");
}

/**
 * Prüft ob eine Zeit (HH:MM) in einem Zeitfenster liegt.
 * Unterstützt Übernacht-Fenster (z.B. 23:00 - 05:00).
 */
export function isTimeInRange(
  current: string,
  start: string,
  end: string,
): boolean {
  const [currentH, currentM] = current.split(":").map(Number);
  const [startH, startM] = start.split(":").map(Number);
  const [endH, endM] = end.split(":").map(Number);

  const currentMinutes = currentH * 60 + currentM;
  const startMinutes = startH * 60 + startM;
  const endMinutes = endH * 60 + endM;

  // Handle overnight time windows (e.g., 23:00 - 05:00)
  if (endMinutes < startMinutes) {
    return currentMinutes >= startMinutes || currentMinutes < endMinutes;
  }

  return currentMinutes >= startMinutes && currentMinutes < endMinutes;
}
