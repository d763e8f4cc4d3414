import type { WindowSettings, SettingsSlot, LogEntry, LogSettings } from "@shared/schema";
import { createDefaultSettings, MAX_LOG_ENTRIES } from "./defaults";

export interface SettingsSnapshot {
  today: WindowSettings;
  tomorrow: WindowSettings;
  tomorrowSettingsEnabled: boolean;
}

export interface IStorage {
  getSettingsSnapshot(): SettingsSnapshot;
  getSettings(slot: SettingsSlot): WindowSettings;
  saveSettings(slot: SettingsSlot, settings: WindowSettings): void;
  setTomorrowSettingsEnabled(enabled: boolean): void;
  rotateSettings(): SettingsSnapshot;
  getLogs(): LogEntry[];
  addLog(entry: Omit<LogEntry, "id" | "timestamp">): void;
  clearLogs(): void;
  getLogSettings(): LogSettings;
  saveLogSettings(settings: LogSettings): void;
}

function freezeSettings(settings: WindowSettings): WindowSettings {
  const timeOverrides = settings.timeOverrides.map((o) => Object.freeze({ ...o }));
  Object.freeze(timeOverrides);
  return Object.freeze({ ...settings, timeOverrides });
}

/**
 * Hält die Einstellungs-Slots "heute" und "morgen" im Speicher.
 *
 * Der komplette Snapshot wird bei jeder Änderung als neues, eingefrorenes Objekt
 * ersetzt. Leser sehen damit immer entweder den Zustand vor oder nach einer
 * Rotation, nie einen halb kopierten.
 */
export class MemStorage implements IStorage {
  private snapshot: SettingsSnapshot;
  private logs: LogEntry[] = [];
  private logSettings: LogSettings = {
    level: "info",
  };
  private maxLogs = MAX_LOG_ENTRIES;

  constructor(initial?: Partial<SettingsSnapshot>) {
    this.snapshot = Object.freeze({
      today: freezeSettings(initial?.today ?? createDefaultSettings()),
      tomorrow: freezeSettings(initial?.tomorrow ?? createDefaultSettings()),
      tomorrowSettingsEnabled: initial?.tomorrowSettingsEnabled ?? false,
    });
  }

  getSettingsSnapshot(): SettingsSnapshot {
    return this.snapshot;
  }

  getSettings(slot: SettingsSlot): WindowSettings {
    return this.snapshot[slot];
  }

  saveSettings(slot: SettingsSlot, settings: WindowSettings): void {
    const frozen = freezeSettings(settings);
    this.snapshot = Object.freeze(
      slot === "today"
        ? { ...this.snapshot, today: frozen }
        : { ...this.snapshot, tomorrow: frozen },
    );
  }

  setTomorrowSettingsEnabled(enabled: boolean): void {
    this.snapshot = Object.freeze({
      ...this.snapshot,
      tomorrowSettingsEnabled: enabled,
    });
  }

  /**
   * Kopiert "morgen" nach "heute" und deaktiviert den Morgen-Slot.
   * Mehrfacher Aufruf ändert "heute" nicht weiter.
   */
  rotateSettings(): SettingsSnapshot {
    const current = this.snapshot;
    this.snapshot = Object.freeze({
      today: current.tomorrow,
      tomorrow: current.tomorrow,
      tomorrowSettingsEnabled: false,
    });
    return this.snapshot;
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  addLog(entry: Omit<LogEntry, "id" | "timestamp">): void {
    const logEntry: LogEntry = {
      id: `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
      timestamp: new Date().toISOString(),
      ...entry,
    };

    this.logs.push(logEntry);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  clearLogs(): void {
    this.logs = [];
  }

  getLogSettings(): LogSettings {
    return this.logSettings;
  }

  saveLogSettings(settings: LogSettings): void {
    this.logSettings = settings;
  }
}

export const storage = new MemStorage();
