import { describe, it, expect, beforeEach, vi } from "vitest";
import request from "supertest";
import { createApp } from "../app";
import { storage } from "../core/storage";
import { createDefaultSettings } from "../core/defaults";
import { getOrCreateWindowEngine } from "../routes/shared-state";
import { DAY_PROFILE, priceSeries } from "./fixtures";

vi.mock("../core/logger", () => ({
  log: vi.fn(),
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

/**
 * Integration tests for the HTTP API.
 * Uses the real Express app, routes, storage and engine in-process.
 */

// 2025-06-10 00:00 Europe/Berlin
const today = priceSeries("2025-06-09T22:00:00.000Z", DAY_PROFILE);
const tomorrow = priceSeries("2025-06-10T22:00:00.000Z", DAY_PROFILE);
// 19:30 local → Abendspitze (0.46)
const now = "2025-06-10T17:30:00.000Z";

const { app } = createApp();

beforeEach(() => {
  storage.saveSettings("today", createDefaultSettings());
  storage.saveSettings("tomorrow", createDefaultSettings());
  storage.setTomorrowSettingsEnabled(false);
  getOrCreateWindowEngine().invalidate("Test");
});

describe("GET /api/health", () => {
  it("returns status ok", async () => {
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(typeof res.body.uptime).toBe("number");
    expect(res.body.cache.hasEntry).toBe(false);
  });
});

describe("POST /api/windows/evaluate", () => {
  it("returns attributes for today and tomorrow", async () => {
    const res = await request(app).post("/api/windows/evaluate").send({ today, tomorrow, now });

    expect(res.status).toBe(200);
    expect(res.body.fromCache).toBe(false);
    expect(res.body.today.state).toBe("discharge_aggressive");
    expect(res.body.today.date).toBe("2025-06-10");
    expect(res.body.today.numWindows).toBe(96);
    // 4 günstigste Viertelstunden = Stunde 00 lokal
    expect(res.body.today.cheapestTimes).toEqual([
      "2025-06-09T22:00:00.000Z",
      "2025-06-09T22:15:00.000Z",
      "2025-06-09T22:30:00.000Z",
      "2025-06-09T22:45:00.000Z",
    ]);
    expect(res.body.today.cheapestPrices).toEqual([0.26784, 0.26784, 0.26784, 0.26784]);
    expect(res.body.tomorrow.date).toBe("2025-06-11");
    expect(res.body.tomorrow.state).toBe("idle");
  });

  it("serves repeated requests from the cache", async () => {
    await request(app).post("/api/windows/evaluate").send({ today, tomorrow, now });
    const res = await request(app).post("/api/windows/evaluate").send({ today, tomorrow, now });

    expect(res.body.fromCache).toBe(true);
  });

  it("returns an empty tomorrow result without tomorrow prices", async () => {
    const res = await request(app).post("/api/windows/evaluate").send({ today, now });

    expect(res.status).toBe(200);
    expect(res.body.tomorrow.numWindows).toBe(0);
    expect(res.body.tomorrow.cheapestTimes).toEqual([]);
  });

  it("rejects malformed price series with 422", async () => {
    const res = await request(app)
      .post("/api/windows/evaluate")
      .send({ today: today.slice(0, 23), now });

    expect(res.status).toBe(422);
    expect(res.body.message).toContain("statt 2025-06-11 00:00");
  });

  it("rejects invalid request bodies with 400", async () => {
    const res = await request(app).post("/api/windows/evaluate").send({ today: [{ start: "gestern", value: 1 }] });

    expect(res.status).toBe(400);
    expect(res.body.issues[0].path).toBe("today.0.start");
  });

  it("serves the last good result after a rejected series", async () => {
    await request(app).post("/api/windows/evaluate").send({ today, now });
    await request(app).post("/api/windows/evaluate").send({ today: today.slice(1), now });

    const res = await request(app).get("/api/windows/last");
    expect(res.status).toBe(200);
    expect(res.body.today.state).toBe("discharge_aggressive");
  });
});

describe("settings API", () => {
  it("returns both slots", async () => {
    const res = await request(app).get("/api/settings");

    expect(res.status).toBe(200);
    expect(res.body.today.chargeWindowCount).toBe(4);
    expect(res.body.tomorrowSettingsEnabled).toBe(false);
  });

  it("merges partial updates into a slot", async () => {
    const res = await request(app).post("/api/settings/today").send({ chargeWindowCount: 6 });

    expect(res.status).toBe(200);
    expect(res.body.chargeWindowCount).toBe(6);
    expect(res.body.vatPct).toBe(21);
    expect(storage.getSettings("today").chargeWindowCount).toBe(6);
  });

  it("rejects invalid settings with 400", async () => {
    const res = await request(app).post("/api/settings/today").send({ roundTripEfficiencyPct: 0 });

    expect(res.status).toBe(400);
    expect(res.body.message).toMatch(/^Ungültige Einstellungen: roundTripEfficiencyPct/);
    expect(storage.getSettings("today").roundTripEfficiencyPct).toBe(85);
  });

  it("returns 404 for unknown slots", async () => {
    const res = await request(app).post("/api/settings/yesterday").send({});

    expect(res.status).toBe(404);
  });

  it("invalidates cached results when settings change", async () => {
    await request(app).post("/api/windows/evaluate").send({ today, now });
    await request(app).post("/api/settings/today").send({ minSpreadPct: 12 });
    const res = await request(app).post("/api/windows/evaluate").send({ today, now });

    expect(res.body.fromCache).toBe(false);
    expect(res.body.today.minSpreadRequired).toBe(12);
  });

  it("rotates tomorrow into today", async () => {
    await request(app).post("/api/settings/tomorrow").send({ expensiveWindowCount: 2 });
    await request(app).post("/api/settings/tomorrow/enabled").send({ enabled: true });

    const res = await request(app).post("/api/settings/rotate");

    expect(res.status).toBe(200);
    expect(res.body.today.expensiveWindowCount).toBe(2);
    expect(res.body.tomorrowSettingsEnabled).toBe(false);
  });
});

describe("logs API", () => {
  it("updates the log level", async () => {
    const res = await request(app).post("/api/logs/settings").send({ level: "debug" });

    expect(res.status).toBe(200);
    expect(storage.getLogSettings().level).toBe("debug");
    storage.saveLogSettings({ level: "info" });
  });

  it("rejects unknown log levels", async () => {
    const res = await request(app).post("/api/logs/settings").send({ level: "loud" });

    expect(res.status).toBe(400);
  });

  it("clears logs", async () => {
    storage.addLog({ level: "info", category: "system", message: "x" });
    const res = await request(app).delete("/api/logs");

    expect(res.status).toBe(200);
    expect(storage.getLogs()).toEqual([]);
  });
});
