import type { Express } from "express";
import { z } from "zod";
import { settingsSlotSchema } from "@shared/schema";
import { storage } from "../core/storage";
import { log } from "../core/logger";
import { parseSettings } from "../core/settings";
import { getBuildInfo } from "../core/build-info";
import { getOrCreateWindowEngine } from "./shared-state";

const tomorrowEnabledSchema = z.object({ enabled: z.boolean() });

export function registerSettingsRoutes(app: Express): void {
  app.get("/api/build-info", (req, res) => {
    res.json(getBuildInfo());
  });

  app.get("/api/settings", (req, res) => {
    res.json(storage.getSettingsSnapshot());
  });

  app.post("/api/settings/rotate", (req, res) => {
    const snapshot = storage.rotateSettings();
    getOrCreateWindowEngine().invalidate("Einstellungen rotiert");
    log("info", "settings", "Einstellungen manuell rotiert: morgen → heute");
    res.json(snapshot);
  });

  app.post("/api/settings/tomorrow/enabled", (req, res) => {
    const parsed = tomorrowEnabledSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Feld 'enabled' (boolean) erforderlich" });
      return;
    }
    storage.setTomorrowSettingsEnabled(parsed.data.enabled);
    getOrCreateWindowEngine().invalidate("Morgen-Slot umgeschaltet");
    log("info", "settings", `Einstellungen für morgen ${parsed.data.enabled ? "aktiviert" : "deaktiviert"}`);
    res.json(storage.getSettingsSnapshot());
  });

  app.post("/api/settings/:slot", (req, res, next) => {
    const slot = settingsSlotSchema.safeParse(req.params.slot);
    if (!slot.success) {
      res.status(404).json({ message: `Unbekannter Einstellungs-Slot: ${req.params.slot}` });
      return;
    }

    try {
      // Teil-Updates: fehlende Felder behalten ihren bisherigen Wert
      const current = storage.getSettings(slot.data);
      const body: unknown = req.body;
      const patch = typeof body === "object" && body !== null ? body : {};
      const settings = parseSettings({ ...current, ...patch });

      storage.saveSettings(slot.data, settings);
      getOrCreateWindowEngine().invalidate(`Einstellungen (${slot.data}) geändert`);
      log("info", "settings", `Einstellungen für ${slot.data === "today" ? "heute" : "morgen"} gespeichert`);
      res.json(settings);
    } catch (error) {
      next(error);
    }
  });
}
