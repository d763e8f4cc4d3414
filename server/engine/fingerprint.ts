import { createHash } from "node:crypto";

type FingerprintNode =
  | readonly ["null"]
  | readonly ["undefined"]
  | readonly ["string", string]
  | readonly ["number", string]
  | readonly ["boolean", boolean]
  | readonly ["date", string]
  | readonly ["array", readonly FingerprintNode[]]
  | readonly ["object", readonly (readonly [string, FingerprintNode])[]]
  | readonly ["unknown", string];

const serializeNumber = (value: number): string => {
  if (Number.isNaN(value)) return "NaN";
  if (Object.is(value, -0)) return "-0";
  return String(value);
};

const toFingerprintNode = (value: unknown): FingerprintNode => {
  if (value === null) return ["null"];
  if (value === undefined) return ["undefined"];
  if (typeof value === "string") return ["string", value];
  if (typeof value === "number") return ["number", serializeNumber(value)];
  if (typeof value === "boolean") return ["boolean", value];
  if (value instanceof Date) return ["date", String(value.getTime())];
  if (Array.isArray(value)) return ["array", value.map((entry: unknown) => toFingerprintNode(entry))];
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]: [string, unknown]): readonly [string, FingerprintNode] => [key, toFingerprintNode(entry)]);
    return ["object", entries];
  }
  return ["unknown", String(value)];
};

/**
 * Serialisierung mit sortierten Objektschlüsseln: gleiche Inhalte ergeben
 * unabhängig von der Einfügereihenfolge denselben String.
 */
export function toStableFingerprint(value: unknown): string {
  return JSON.stringify(toFingerprintNode(value));
}

/** SHA-256 über den stabilen Fingerprint, hex-kodiert. */
export function hashFingerprint(value: unknown): string {
  return createHash("sha256").update(toStableFingerprint(value)).digest("hex");
}
