import { windowSettingsSchema, type WindowSettings } from "@shared/schema";
import { InvalidSettingsError } from "./errors";

/**
 * Annahmegrenze für Einstellungen: alles, was hier durchkommt, ist im
 * erlaubten Wertebereich. Fehlende Felder bekommen die Defaults.
 */
export function parseSettings(input: unknown): WindowSettings {
  const result = windowSettingsSchema.safeParse(input);
  if (!result.success) {
    throw InvalidSettingsError.fromZod(result.error);
  }
  return result.data;
}
