import type { ZodError } from "zod";

/**
 * Basisklasse für Fehler, die mit HTTP-Status an den Aufrufer gehen.
 * Der Express-Error-Handler liest `status`.
 */
export abstract class WindowEngineError extends Error {
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type SeriesInvariant =
  | "granularity"
  | "duplicate"
  | "gap"
  | "day_start"
  | "day_end"
  | "timestamp";

/** Preisreihe verletzt Lückenlosigkeit oder Tagesabdeckung. */
export class MalformedSeriesError extends WindowEngineError {
  readonly status = 422;

  constructor(
    readonly invariant: SeriesInvariant,
    message: string,
  ) {
    super(message);
  }
}

export interface SettingsIssue {
  path: string;
  message: string;
}

/** Einstellungen außerhalb des erlaubten Wertebereichs. */
export class InvalidSettingsError extends WindowEngineError {
  readonly status = 400;

  constructor(readonly issues: SettingsIssue[]) {
    super(`Ungültige Einstellungen: ${issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ")}`);
  }

  static fromZod(error: ZodError): InvalidSettingsError {
    return new InvalidSettingsError(
      error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }
}
