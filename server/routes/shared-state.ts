import { getAppConfig } from "../core/config";
import { ResultCache } from "../engine/result-cache";
import type { AnalysisSnapshot } from "../engine/types";
import { WindowEngine } from "../engine/window-engine";

// Module-scope Scheduler Handles (überleben Hot-Reload)
export let settingsRotationInterval: NodeJS.Timeout | null = null;
export let settingsRotationStartTimeout: NodeJS.Timeout | null = null;
let windowEngine: WindowEngine | null = null;

export function setSettingsRotationInterval(v: NodeJS.Timeout | null) { settingsRotationInterval = v; }
export function setSettingsRotationStartTimeout(v: NodeJS.Timeout | null) { settingsRotationStartTimeout = v; }

export function getOrCreateWindowEngine(): WindowEngine {
  if (!windowEngine) {
    const cache = new ResultCache<AnalysisSnapshot>({ ttlMs: getAppConfig().cacheTtlMs });
    windowEngine = new WindowEngine(cache);
  }
  return windowEngine;
}
