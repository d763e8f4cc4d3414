import express from "express";
import { storage } from "./core/storage";
import { log } from "./core/logger";
import { createHealthHandler } from "./core/health";
import { errorHandler } from "./core/error-handler";
import { registerRoutes } from "./routes/index";
import { getOrCreateWindowEngine } from "./routes/shared-state";

/**
 * Baut die Express-App samt HTTP-Server, ohne zu lauschen oder Scheduler zu starten.
 */
export function createApp() {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      // Nur bei TRACE-Level HTTP-Logs ausgeben (sehr detailliert)
      if (path.startsWith("/api") && storage.getLogSettings().level === "trace") {
        log("trace", "api", `${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  app.get("/api/health", createHealthHandler(() => getOrCreateWindowEngine().getCacheStats()));

  const server = registerRoutes(app);

  app.use(errorHandler);

  return { app, server };
}
