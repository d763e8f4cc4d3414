import type { TimeOverride, WindowSettings, WindowState } from "@shared/schema";
import { getLocalTimeParts, isTimeInRange } from "./local-time";
import type { ActualTimeline, PriceWindow, WindowSelection } from "./types";

/**
 * Ergebnis der Zustandsauflösung. Jede Variante entspricht einer
 * Vorrangstufe; `decisionToState` macht daraus den Betriebszustand.
 */
export type StateDecision =
  | { kind: "disabled" }
  | { kind: "time_override"; override: TimeOverride }
  | { kind: "price_override"; mode: "charge" | "discharge"; price: number }
  | { kind: "window"; mode: "discharge_aggressive" | "discharge" | "charge" }
  | { kind: "idle" };

export type ResolverSettings = Pick<
  WindowSettings,
  "automationEnabled" | "timeOverrides" | "priceOverride" | "timezone"
>;

export interface WindowMembership {
  charge: ReadonlySet<number>;
  discharge: ReadonlySet<number>;
  aggressive: ReadonlySet<number>;
}

export interface ResolverContext {
  settings: ResolverSettings;
  membership: WindowMembership;
  spreadMet: boolean;
}

export function buildMembership(selection: WindowSelection): WindowMembership {
  const starts = (windows: readonly PriceWindow[]) => new Set(windows.map((w) => w.start.getTime()));
  return {
    charge: starts(selection.chargeWindows),
    discharge: starts(selection.dischargeWindows),
    aggressive: starts(selection.aggressiveWindows),
  };
}

/** Erster Zeit-Override, dessen Zeitraum die lokale Uhrzeit enthält. */
export function findActiveTimeOverride(
  instant: Date,
  settings: Pick<WindowSettings, "timeOverrides" | "timezone">,
): TimeOverride | null {
  if (settings.timeOverrides.length === 0) return null;
  const time = getLocalTimeParts(instant, settings.timezone).time;
  return settings.timeOverrides.find((o) => isTimeInRange(time, o.start, o.end)) ?? null;
}

/**
 * Löst den Zustand für einen Zeitpunkt auf. `window` ist das Preisfenster,
 * das den Zeitpunkt enthält, oder null ohne Preisdaten.
 */
export function resolveDecision(
  instant: Date,
  window: PriceWindow | null,
  ctx: ResolverContext,
): StateDecision {
  const { settings, membership, spreadMet } = ctx;

  if (!settings.automationEnabled) {
    return { kind: "disabled" };
  }

  const override = findActiveTimeOverride(instant, settings);
  if (override) {
    return { kind: "time_override", override };
  }

  if (!window) {
    return { kind: "idle" };
  }

  const priceOverride = settings.priceOverride;
  if (priceOverride?.chargeBelow !== undefined && window.price <= priceOverride.chargeBelow) {
    return { kind: "price_override", mode: "charge", price: window.price };
  }
  if (priceOverride?.dischargeAbove !== undefined && window.price >= priceOverride.dischargeAbove) {
    return { kind: "price_override", mode: "discharge", price: window.price };
  }

  if (spreadMet) {
    const key = window.start.getTime();
    if (membership.aggressive.has(key)) return { kind: "window", mode: "discharge_aggressive" };
    if (membership.discharge.has(key)) return { kind: "window", mode: "discharge" };
    if (membership.charge.has(key)) return { kind: "window", mode: "charge" };
  }

  return { kind: "idle" };
}

export function decisionToState(decision: StateDecision): WindowState {
  switch (decision.kind) {
    case "disabled":
      return "off";
    case "time_override":
      return decision.override.mode;
    case "price_override":
    case "window":
      return decision.mode;
    case "idle":
      return "idle";
  }
}

/**
 * Wendet die Vorrangregeln auf jedes Fenster des Tages an und liefert die
 * Fenster, in denen tatsächlich geladen bzw. entladen wird.
 */
export function buildActualTimeline(
  windows: readonly PriceWindow[],
  ctx: ResolverContext,
): ActualTimeline {
  const actualCharge: PriceWindow[] = [];
  const actualDischarge: PriceWindow[] = [];

  for (const window of windows) {
    const state = decisionToState(resolveDecision(window.start, window, ctx));
    if (state === "charge") {
      actualCharge.push(window);
    } else if (state === "discharge" || state === "discharge_aggressive") {
      actualDischarge.push(window);
    }
  }

  return {
    actualCharge: Object.freeze(actualCharge),
    actualDischarge: Object.freeze(actualDischarge),
  };
}
