import { storage } from "../core/storage";
import { log, errorMessage } from "../core/logger";
import { getAppConfig } from "../core/config";
import { SETTINGS_ROTATION_CHECK_INTERVAL_MS } from "../core/defaults";
import { getLocalTimeParts } from "../engine/local-time";
import {
  settingsRotationInterval,
  settingsRotationStartTimeout,
  setSettingsRotationInterval,
  setSettingsRotationStartTimeout,
  getOrCreateWindowEngine,
} from "./shared-state";

// Lokales Datum der letzten Rotation, verhindert Doppelrotation innerhalb der Mitternachtsminute
let lastRotationDate: string | null = null;

export function resetRotationState(): void {
  lastRotationDate = null;
}

/**
 * Rotiert um 00:00 Ortszeit die Einstellungen (morgen → heute),
 * höchstens einmal pro Datum und nur wenn der Morgen-Slot aktiv ist.
 * Gibt true zurück, wenn rotiert wurde.
 */
export function checkSettingsRotation(
  now: Date = new Date(),
  timezone: string = getAppConfig().timezone,
): boolean {
  const { date, time } = getLocalTimeParts(now, timezone);

  log("trace", "scheduler", `Rotations-Check: ${date} ${time} (${timezone})`);

  if (time !== "00:00" || lastRotationDate === date) {
    return false;
  }
  lastRotationDate = date;

  if (!storage.getSettingsSnapshot().tomorrowSettingsEnabled) {
    log("debug", "scheduler", "Mitternacht: Morgen-Slot inaktiv, keine Rotation");
    return false;
  }

  storage.rotateSettings();
  getOrCreateWindowEngine().invalidate("Mitternachts-Rotation");
  log("info", "scheduler", `Einstellungen für ${date} übernommen (morgen → heute)`);
  return true;
}

const runRotationTick = (): void => {
  try {
    checkSettingsRotation();
  } catch (error) {
    log("error", "scheduler", "Fehler bei der Einstellungs-Rotation", errorMessage(error));
  }
};

export function startSchedulers(): void {
  log(
    "info",
    "scheduler",
    "Rotations-Scheduler wird gestartet - prüft jede volle Minute",
  );

  // Berechne Verzögerung bis zur nächsten vollen Minute
  const now = new Date();
  const secondsUntilNextMinute = 60 - now.getSeconds();
  const msUntilNextMinute = secondsUntilNextMinute * 1000 - now.getMilliseconds();

  log(
    "debug",
    "scheduler",
    `Scheduler-Synchronisation: Nächste Prüfung in ${secondsUntilNextMinute}s zur vollen Minute`,
  );

  if (!settingsRotationInterval && !settingsRotationStartTimeout) {
    setSettingsRotationStartTimeout(
      setTimeout(() => {
        setSettingsRotationStartTimeout(null);
        runRotationTick();
        setSettingsRotationInterval(setInterval(runRotationTick, SETTINGS_ROTATION_CHECK_INTERVAL_MS));
      }, msUntilNextMinute),
    );
  }

  runRotationTick();
}

/**
 * Graceful Shutdown für alle Scheduler
 * Wird von index.ts beim SIGTERM/SIGINT aufgerufen
 */
export function shutdownSchedulers(): void {
  log("info", "scheduler", "Stoppe alle Scheduler...");

  if (settingsRotationStartTimeout) {
    clearTimeout(settingsRotationStartTimeout);
    setSettingsRotationStartTimeout(null);
  }

  if (settingsRotationInterval) {
    clearInterval(settingsRotationInterval);
    setSettingsRotationInterval(null);
    log("info", "scheduler", "Rotations-Scheduler gestoppt");
  }

  log("info", "scheduler", "Alle Scheduler erfolgreich gestoppt");
}
