import { readFileSync } from "fs";
import path from "path";
import type { BuildInfo } from "@shared/schema";
import { errorMessage, log } from "./logger";

const STARTUP_TIME = new Date().toISOString();
let cachedBuildInfo: BuildInfo | null = null;

export function getBuildInfo(): BuildInfo {
  if (cachedBuildInfo) {
    return cachedBuildInfo;
  }

  const pkgPath = path.resolve(process.cwd(), "package.json");
  let version = "unknown";

  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      version = pkg.version;
    }
  } catch (error) {
    log("warning", "system", "package.json für Versionsangabe nicht lesbar", errorMessage(error));
  }

  cachedBuildInfo = {
    version,
    buildTime: process.env.BUILD_TIME || STARTUP_TIME,
  };

  return cachedBuildInfo;
}
