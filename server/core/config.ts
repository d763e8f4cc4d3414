import { logLevelSchema, type LogLevel } from "@shared/schema";
import { DEFAULT_CACHE_TTL_SECONDS, DEFAULT_TIMEZONE } from "./defaults";

export interface AppConfig {
  port: number;
  host: string;
  timezone: string;
  cacheTtlMs: number;
  logLevel: LogLevel;
}

/**
 * Liest die Laufzeitkonfiguration aus der Umgebung.
 * Setzt voraus, dass validateEnvironment() vorher gelaufen ist.
 */
export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const ttlSeconds = Number(env.CACHE_TTL_SECONDS || DEFAULT_CACHE_TTL_SECONDS);
  const logLevel = logLevelSchema.safeParse(env.LOG_LEVEL);

  return {
    port: parseInt(env.PORT || "3000", 10),
    host: env.HOST || "0.0.0.0",
    timezone: env.TIMEZONE || DEFAULT_TIMEZONE,
    cacheTtlMs: Math.round(ttlSeconds * 1000),
    logLevel: logLevel.success ? logLevel.data : "info",
  };
}
