import type { Request, Response, NextFunction } from "express";
import { log, errorMessage } from "./logger";

function readStatus(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return 500;
}

function readMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string" && err.message) {
    return err.message;
  }
  return "Internal Server Error";
}

/**
 * Letzter Express-Handler: Status + Nachricht, niemals Stacktraces an den Client.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = readStatus(err);
  const message = readMessage(err);

  if (status >= 500) {
    log("error", "api", `${req.method} ${req.path} fehlgeschlagen`, errorMessage(err));
  }

  res.status(status).json({ message });
}
