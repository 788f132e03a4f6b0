// ---------------------------------------------------------------------------
// Core types for the UPC checker.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Primitives ──────────────────────────────────────────────────────────────

/** Number of payload digits in a UPC-A code (the check digit excluded). */
export const UPCA_PAYLOAD_LENGTH = 11;

/** The 11 payload digits of a UPC-A code, in printed order. */
export type UPCAPayload = readonly [
  number, number, number, number, number, number,
  number, number, number, number, number,
];

/** Unvalidated UPC input, e.g. as read from a scanner or a form field. */
export type RawUPC = string;

// ── Enums ───────────────────────────────────────────────────────────────────

export const UPCStandardKind = {
  UPC_A: "upc-a",
} as const;
export type UPCStandardKind =
  (typeof UPCStandardKind)[keyof typeof UPCStandardKind];

export const UPCErrorKind = {
  SEQUENCE_OVERFLOW: "SequenceOverflow",
  CHECK_DIGIT_OVERFLOW: "CheckDigitOverflow",
} as const;
export type UPCErrorKind = (typeof UPCErrorKind)[keyof typeof UPCErrorKind];

// ── Domain types ────────────────────────────────────────────────────────────

/**
 * A barcode payload tagged with the standard it follows.
 * Further standards are added as new members of this union.
 */
export type UPCStandard = {
  readonly kind: typeof UPCStandardKind.UPC_A;
  readonly payload: UPCAPayload;
};

/** A payload paired with the check digit claimed for it. */
export interface ValidationRecord {
  readonly upc: UPCStandard;
  readonly checkDigit: number;
}

export type UPCCheckResult =
  | { ok: true; valid: boolean }
  | { ok: false; error: UPCErrorKind };

export type UPCParseResult =
  | { ok: true; record: ValidationRecord }
  | { ok: false; raw: RawUPC; reason: string };

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "staging" | "production";
  logging: LoggingConfig;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}
