import type { Express } from "express";
import { evaluateRequestSchema } from "@shared/schema";
import { storage } from "../core/storage";
import { log, errorMessage } from "../core/logger";
import { MalformedSeriesError } from "../core/errors";
import { toWindowAttributes } from "../engine/attributes";
import { getOrCreateWindowEngine } from "./shared-state";

export function registerWindowRoutes(app: Express): void {
  app.post("/api/windows/evaluate", (req, res, next) => {
    const parsed = evaluateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        message: "Ungültige Anfrage",
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
      return;
    }

    const { today, tomorrow, now } = parsed.data;
    // Ein Snapshot für beide Tage: eine parallele Rotation ist entweder ganz oder gar nicht sichtbar
    const snapshot = storage.getSettingsSnapshot();
    const engine = getOrCreateWindowEngine();

    try {
      const outcome = engine.evaluate({
        pricesToday: today,
        pricesTomorrow: tomorrow,
        settings: snapshot.today,
        tomorrowSettings: snapshot.tomorrowSettingsEnabled ? snapshot.tomorrow : undefined,
        now: now ? new Date(now) : new Date(),
      });

      res.json({
        today: toWindowAttributes(outcome.today),
        tomorrow: toWindowAttributes(outcome.tomorrow),
        computedAt: outcome.computedAt.toISOString(),
        fromCache: outcome.fromCache,
      });
    } catch (error) {
      if (error instanceof MalformedSeriesError) {
        log("warning", "normalizer", `Preisreihe verworfen (${error.invariant})`, errorMessage(error));
      }
      next(error);
    }
  });

  // Letztes gültiges Ergebnis, z.B. nachdem eine neue Preisreihe verworfen wurde
  app.get("/api/windows/last", (req, res) => {
    const last = getOrCreateWindowEngine().lastResult();
    if (!last) {
      res.status(404).json({ message: "Kein gültiges Ergebnis im Cache" });
      return;
    }
    res.json({
      today: toWindowAttributes(last.today),
      tomorrow: toWindowAttributes(last.tomorrow),
      computedAt: last.computedAt.toISOString(),
      fromCache: true,
    });
  });
}
