import type { Express } from "express";
import { createServer, type Server } from "http";
import { registerWindowRoutes } from "./window-routes";
import { registerSettingsRoutes } from "./settings-routes";
import { registerLogRoutes } from "./log-routes";

export { startSchedulers, shutdownSchedulers } from "./scheduler";

export function registerRoutes(app: Express): Server {
  registerWindowRoutes(app);
  registerSettingsRoutes(app);
  registerLogRoutes(app);

  return createServer(app);
}
