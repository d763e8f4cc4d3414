import type { Express } from "express";
import { logSettingsSchema } from "@shared/schema";
import { storage } from "../core/storage";
import { log } from "../core/logger";

export function registerLogRoutes(app: Express): void {
  app.get("/api/logs", (req, res) => {
    const logs = storage.getLogs();
    res.json(logs);
  });

  app.delete("/api/logs", (req, res) => {
    storage.clearLogs();
    log("info", "system", "Logs gelöscht");
    res.json({ success: true });
  });

  app.get("/api/logs/settings", (req, res) => {
    const settings = storage.getLogSettings();
    res.json(settings);
  });

  app.post("/api/logs/settings", (req, res) => {
    const parsed = logSettingsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid log settings data" });
      return;
    }
    storage.saveLogSettings(parsed.data);
    log("info", "system", `Log-Level auf "${parsed.data.level}" gesetzt`);
    res.json({ success: true });
  });
}
