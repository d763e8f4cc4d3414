import { z } from "zod";

// HH:MM (24h)
const timeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Zeit muss im Format HH:MM angegeben werden");

export const logLevelSchema = z.enum(["trace", "debug", "info", "warning", "error"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logCategorySchema = z.enum([
  "system",
  "engine",
  "normalizer",
  "selector",
  "cache",
  "settings",
  "scheduler",
  "api",
]);
export type LogCategory = z.infer<typeof logCategorySchema>;

export const logEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  level: logLevelSchema,
  category: logCategorySchema,
  message: z.string(),
  details: z.string().optional(),
});
export type LogEntry = z.infer<typeof logEntrySchema>;

export const logSettingsSchema = z.object({
  level: logLevelSchema,
});
export type LogSettings = z.infer<typeof logSettingsSchema>;

/**
 * Betriebszustände des Speichers. "off" = Automatik deaktiviert.
 */
export const windowStateSchema = z.enum(["off", "charge", "discharge", "discharge_aggressive", "idle"]);
export type WindowState = z.infer<typeof windowStateSchema>;

export const overrideModeSchema = z.enum(["idle", "charge", "discharge", "discharge_aggressive"]);
export type OverrideMode = z.infer<typeof overrideModeSchema>;

export const timeOverrideSchema = z.object({
  mode: overrideModeSchema,
  start: timeOfDaySchema,
  end: timeOfDaySchema,
});
export type TimeOverride = z.infer<typeof timeOverrideSchema>;

export const priceOverrideSchema = z
  .object({
    chargeBelow: z.number().finite().optional(),
    dischargeAbove: z.number().finite().optional(),
  })
  .refine(
    (o) =>
      o.chargeBelow === undefined ||
      o.dischargeAbove === undefined ||
      o.chargeBelow < o.dischargeAbove,
    { message: "chargeBelow muss kleiner als dischargeAbove sein" },
  );
export type PriceOverride = z.infer<typeof priceOverrideSchema>;

export const calculationWindowSchema = z.object({
  start: timeOfDaySchema,
  end: timeOfDaySchema,
});
export type CalculationWindow = z.infer<typeof calculationWindowSchema>;

export const windowDurationSchema = z.union([z.literal(15), z.literal(60)]);
export type WindowDuration = z.infer<typeof windowDurationSchema>;

const isValidTimezone = (tz: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
};

export const windowSettingsSchema = z.object({
  automationEnabled: z.boolean().default(true),
  windowDurationMinutes: windowDurationSchema.default(15),
  chargeWindowCount: z.number().int().min(0).max(96).default(4),
  expensiveWindowCount: z.number().int().min(0).max(96).default(4),
  cheapPercentile: z.number().min(0).max(100).default(25),
  expensivePercentile: z.number().min(0).max(100).default(25),
  minSpreadPct: z.number().min(0).default(10),
  dischargeSpreadPct: z.number().min(0).default(20),
  aggressiveSpreadPct: z.number().min(0).default(40),
  minPriceDifference: z.number().min(0).default(0.05),
  vatPct: z.number().min(0).max(100).default(21),
  taxPerKwh: z.number().finite().default(0.12286),
  additionalCostPerKwh: z.number().finite().default(0.02398),
  roundTripEfficiencyPct: z.number().gt(0).max(100).default(85),
  chargePowerW: z.number().min(0).default(2400),
  dischargePowerW: z.number().min(0).default(2400),
  priceOverride: priceOverrideSchema.optional(),
  timeOverrides: z.array(timeOverrideSchema).default([]),
  calculationWindow: calculationWindowSchema.optional(),
  timezone: z.string().refine(isValidTimezone, "Unbekannte Zeitzone").default("Europe/Berlin"),
});
export type WindowSettings = z.infer<typeof windowSettingsSchema>;
export type WindowSettingsInput = z.input<typeof windowSettingsSchema>;

export const settingsSlotSchema = z.enum(["today", "tomorrow"]);
export type SettingsSlot = z.infer<typeof settingsSlotSchema>;

export const rawPricePointSchema = z.object({
  start: z.string().datetime({ offset: true }),
  end: z.string().datetime({ offset: true }).optional(),
  value: z.number().finite(),
  unit: z.enum(["kWh", "MWh"]).optional(),
});
export type RawPricePoint = z.infer<typeof rawPricePointSchema>;

export const evaluateRequestSchema = z.object({
  today: z.array(rawPricePointSchema),
  tomorrow: z.array(rawPricePointSchema).nullable().optional(),
  now: z.string().datetime({ offset: true }).optional(),
});
export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;

export interface BuildInfo {
  version: string;
  buildTime: string;
}
