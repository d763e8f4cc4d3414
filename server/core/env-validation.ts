import { log } from "./logger";
import { logLevelSchema } from "@shared/schema";

type LogLevel = "warning" | "info" | "debug";

interface EnvVarConfig {
  name: string;
  defaultValue: string;
  description: string;
  /** Log level when not set (default: "warning") */
  missingLogLevel?: LogLevel;
  /** Returns an error text for invalid values */
  validate?: (value: string) => string | null;
}

const isPositiveNumber = (value: string): string | null => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? null : "muss eine positive Zahl sein";
};

const ENV_VARS: EnvVarConfig[] = [
  {
    name: "PORT",
    defaultValue: "3000",
    description: "HTTP-Server-Port",
    missingLogLevel: "info",
    validate: (value) => {
      const port = Number(value);
      return Number.isInteger(port) && port >= 0 && port <= 65535 ? null : "muss ein gültiger Port sein";
    },
  },
  {
    name: "NODE_ENV",
    defaultValue: "development",
    description: "Umgebung (development/production)",
  },
  {
    name: "TIMEZONE",
    defaultValue: "Europe/Berlin",
    description: "Zeitzone für die Mitternachts-Rotation der Einstellungen",
    missingLogLevel: "debug",
    validate: (value) => {
      try {
        new Intl.DateTimeFormat("en-US", { timeZone: value });
        return null;
      } catch {
        return "unbekannte Zeitzone";
      }
    },
  },
  {
    name: "CACHE_TTL_SECONDS",
    defaultValue: "25",
    description: "Lebensdauer des Ergebnis-Caches (knapp unter dem Polling-Intervall)",
    missingLogLevel: "debug",
    validate: isPositiveNumber,
  },
  {
    name: "LOG_LEVEL",
    defaultValue: "info",
    description: "Start-Log-Level (trace/debug/info/warning/error)",
    missingLogLevel: "debug",
    validate: (value) => (logLevelSchema.safeParse(value).success ? null : "unbekanntes Log-Level"),
  },
];

export interface EnvMessage {
  level: LogLevel;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  invalid: string[];
  warnings: string[];
  messages: EnvMessage[];
}

/**
 * Validates environment variables at startup.
 * Invalid values → error + process exit.
 * Unset vars → log at their configured level, default applies.
 */
export function validateEnvironment(): ValidationResult {
  const invalid: string[] = [];
  const warnings: string[] = [];
  const messages: EnvMessage[] = [];

  for (const envVar of ENV_VARS) {
    const value = process.env[envVar.name];

    if (!value) {
      const msg = `${envVar.name} nicht gesetzt (Default: ${envVar.defaultValue}) – ${envVar.description}`;
      const level = envVar.missingLogLevel ?? "warning";
      messages.push({ level, message: msg });
      if (level === "warning") {
        warnings.push(msg);
      }
      continue;
    }

    const problem = envVar.validate?.(value) ?? null;
    if (problem) {
      invalid.push(`${envVar.name}=${value} – ${problem}`);
    }
  }

  for (const { level, message } of messages) {
    const prefix = level === "warning" ? "⚠️ " : "";
    log(level, "system", `${prefix}${message}`);
  }

  if (invalid.length > 0) {
    log("error", "system", "❌ Ungültige Environment-Variablen:");
    for (const i of invalid) {
      log("error", "system", `   → ${i}`);
    }
  }

  const valid = invalid.length === 0;
  if (!valid) {
    log("error", "system", "Server kann nicht starten. Bitte korrigiere die Environment-Variablen.");
  }

  return { valid, invalid, warnings, messages };
}
