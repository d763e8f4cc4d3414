import type { Request, RequestHandler, Response } from "express";
import type { CacheStats } from "../engine/result-cache";
import { getBuildInfo } from "./build-info";

const startTime = Date.now();

export interface HealthResponse {
  status: "ok";
  version: string;
  uptime: number;
  timestamp: string;
  cache: CacheStats;
}

/**
 * GET /api/health – Health-Check inkl. Trefferstatistik des Ergebnis-Caches.
 */
export function createHealthHandler(getCacheStats: () => CacheStats): RequestHandler {
  return (_req: Request, res: Response): void => {
    const response: HealthResponse = {
      status: "ok",
      version: getBuildInfo().version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
      cache: getCacheStats(),
    };

    res.json(response);
  };
}
