import { windowSettingsSchema, type WindowSettings } from "@shared/schema";

export const DEFAULT_TIMEZONE = "Europe/Berlin";

// Knapp unter dem externen Polling-Intervall (30s)
export const DEFAULT_CACHE_TTL_SECONDS = 25;

export const SETTINGS_ROTATION_CHECK_INTERVAL_MS = 60_000;

export const MAX_LOG_ENTRIES = 1000;

export function createDefaultSettings(): WindowSettings {
  return windowSettingsSchema.parse({});
}
