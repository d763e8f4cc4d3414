import { describe, it, expect } from "vitest";
import {
  windowSettingsSchema,
  priceOverrideSchema,
  timeOverrideSchema,
  rawPricePointSchema,
  evaluateRequestSchema,
  windowStateSchema,
  logLevelSchema,
} from "../schema";

describe("Schema Validation", () => {
  describe("windowSettingsSchema", () => {
    it("fills in defaults", () => {
      const settings = windowSettingsSchema.parse({});

      expect(settings).toMatchObject({
        automationEnabled: true,
        windowDurationMinutes: 15,
        chargeWindowCount: 4,
        expensiveWindowCount: 4,
        cheapPercentile: 25,
        expensivePercentile: 25,
        minSpreadPct: 10,
        dischargeSpreadPct: 20,
        aggressiveSpreadPct: 40,
        vatPct: 21,
        taxPerKwh: 0.12286,
        additionalCostPerKwh: 0.02398,
        chargePowerW: 2400,
        dischargePowerW: 2400,
        timeOverrides: [],
        timezone: "Europe/Berlin",
      });
      expect(settings.priceOverride).toBeUndefined();
      expect(settings.calculationWindow).toBeUndefined();
    });

    it("rejects window durations other than 15 and 60", () => {
      expect(() => windowSettingsSchema.parse({ windowDurationMinutes: 30 })).toThrow();
      expect(windowSettingsSchema.parse({ windowDurationMinutes: 60 }).windowDurationMinutes).toBe(60);
    });

    it("rejects percentiles outside 0-100", () => {
      expect(() => windowSettingsSchema.parse({ cheapPercentile: -1 })).toThrow();
      expect(() => windowSettingsSchema.parse({ expensivePercentile: 101 })).toThrow();
    });

    it("rejects a round-trip efficiency of zero or above 100", () => {
      expect(() => windowSettingsSchema.parse({ roundTripEfficiencyPct: 0 })).toThrow();
      expect(() => windowSettingsSchema.parse({ roundTripEfficiencyPct: 101 })).toThrow();
      expect(windowSettingsSchema.parse({ roundTripEfficiencyPct: 100 }).roundTripEfficiencyPct).toBe(100);
    });

    it("rejects negative window counts and fractional counts", () => {
      expect(() => windowSettingsSchema.parse({ chargeWindowCount: -1 })).toThrow();
      expect(() => windowSettingsSchema.parse({ expensiveWindowCount: 2.5 })).toThrow();
    });

    it("rejects unknown timezones", () => {
      expect(() => windowSettingsSchema.parse({ timezone: "Mars/Olympus" })).toThrow();
    });
  });

  describe("priceOverrideSchema", () => {
    it("accepts one-sided thresholds", () => {
      expect(priceOverrideSchema.parse({ chargeBelow: 0.05 })).toEqual({ chargeBelow: 0.05 });
    });

    it("requires chargeBelow to be below dischargeAbove", () => {
      expect(() => priceOverrideSchema.parse({ chargeBelow: 0.5, dischargeAbove: 0.4 })).toThrow();
      expect(() => priceOverrideSchema.parse({ chargeBelow: 0.4, dischargeAbove: 0.4 })).toThrow();
    });
  });

  describe("timeOverrideSchema", () => {
    it("accepts HH:MM times", () => {
      expect(timeOverrideSchema.parse({ mode: "charge", start: "22:00", end: "06:00" }).mode).toBe("charge");
    });

    it("rejects malformed times and unknown modes", () => {
      expect(() => timeOverrideSchema.parse({ mode: "charge", start: "24:00", end: "06:00" })).toThrow();
      expect(() => timeOverrideSchema.parse({ mode: "charge", start: "7:00", end: "08:00" })).toThrow();
      expect(() => timeOverrideSchema.parse({ mode: "off", start: "07:00", end: "08:00" })).toThrow();
    });
  });

  describe("rawPricePointSchema", () => {
    it("accepts timestamps with offset", () => {
      const point = rawPricePointSchema.parse({ start: "2025-06-10T00:00:00+02:00", value: 0.21 });
      expect(point.value).toBe(0.21);
    });

    it("rejects timestamps without offset and non-numeric values", () => {
      expect(() => rawPricePointSchema.parse({ start: "2025-06-10T00:00:00", value: 0.21 })).toThrow();
      expect(() => rawPricePointSchema.parse({ start: "2025-06-10T00:00:00Z", value: "0.21" })).toThrow();
    });

    it("accepts MWh as unit", () => {
      expect(rawPricePointSchema.parse({ start: "2025-06-10T00:00:00Z", value: 85, unit: "MWh" }).unit).toBe("MWh");
    });
  });

  describe("evaluateRequestSchema", () => {
    it("allows a missing or null tomorrow series", () => {
      expect(evaluateRequestSchema.parse({ today: [] }).tomorrow).toBeUndefined();
      expect(evaluateRequestSchema.parse({ today: [], tomorrow: null }).tomorrow).toBeNull();
    });

    it("requires today", () => {
      expect(() => evaluateRequestSchema.parse({ tomorrow: [] })).toThrow();
    });
  });

  describe("enums", () => {
    it("accepts known states and log levels", () => {
      expect(windowStateSchema.parse("discharge_aggressive")).toBe("discharge_aggressive");
      expect(logLevelSchema.parse("trace")).toBe("trace");
    });

    it("rejects unknown values", () => {
      expect(() => windowStateSchema.parse("boost")).toThrow();
      expect(() => logLevelSchema.parse("verbose")).toThrow();
    });
  });
});
