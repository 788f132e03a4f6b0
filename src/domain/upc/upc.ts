// ---------------------------------------------------------------------------
// UPC record construction, validation and parsing
// ---------------------------------------------------------------------------

import {
  UPCA_PAYLOAD_LENGTH,
  UPCErrorKind,
  UPCStandardKind,
} from "../../core/types.js";
import type {
  RawUPC,
  UPCAPayload,
  UPCCheckResult,
  UPCParseResult,
  UPCStandard,
  ValidationRecord,
} from "../../core/types.js";
import {
  CheckDigitOverflowError,
  PayloadLengthError,
  SequenceOverflowError,
} from "../../core/errors.js";
import { computeUPCACheckDigit, isSingleDigit } from "./check-digit.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

function isUPCAPayload(digits: readonly number[]): digits is UPCAPayload {
  return digits.length === UPCA_PAYLOAD_LENGTH;
}

/** Strip hyphens, spaces, and surrounding whitespace from a raw UPC string. */
export function stripFormatting(raw: string): string {
  return raw.trim().replace(/[\s-]/g, "");
}

// ── Construction ────────────────────────────────────────────────────────────

/**
 * Tag 11 payload digits as a UPC-A code.
 *
 * The digits are copied and frozen. Their range is left to `validateUPC`,
 * so an out-of-range payload can still be built and reported on.
 */
export function upcA(payload: readonly number[]): UPCStandard {
  const digits = Object.freeze([...payload]);
  if (!isUPCAPayload(digits)) {
    throw new PayloadLengthError(UPCA_PAYLOAD_LENGTH, payload.length);
  }
  return Object.freeze({ kind: UPCStandardKind.UPC_A, payload: digits });
}

export function createValidationRecord(
  upc: UPCStandard,
  checkDigit: number,
): ValidationRecord {
  return Object.freeze({ upc, checkDigit });
}

// ── Validation ──────────────────────────────────────────────────────────────

/**
 * Check a record's payload against its check digit.
 *
 * Payload digits are checked before the check digit, so a record where both
 * overflow reports `SequenceOverflow`.
 */
export function validateUPC(record: ValidationRecord): UPCCheckResult {
  const { payload } = record.upc;

  if (!payload.every(isSingleDigit)) {
    return { ok: false, error: UPCErrorKind.SEQUENCE_OVERFLOW };
  }
  if (!isSingleDigit(record.checkDigit)) {
    return { ok: false, error: UPCErrorKind.CHECK_DIGIT_OVERFLOW };
  }

  return { ok: true, valid: computeUPCACheckDigit(payload) === record.checkDigit };
}

/**
 * Like `validateUPC`, but throws a `UPCValidationError` subclass on
 * out-of-range digits.
 */
export function assertUPC(record: ValidationRecord): boolean {
  const result = validateUPC(record);
  if (result.ok) return result.valid;

  switch (result.error) {
    case UPCErrorKind.SEQUENCE_OVERFLOW:
      throw new SequenceOverflowError();
    case UPCErrorKind.CHECK_DIGIT_OVERFLOW:
      throw new CheckDigitOverflowError(record.checkDigit);
  }
}

// ── Top-level parse ─────────────────────────────────────────────────────────

/**
 * Parse a printed 12-digit UPC-A code into a validation record.
 * The check digit is split off but not verified.
 */
export function parseUPC(raw: RawUPC): UPCParseResult {
  const stripped = stripFormatting(raw);

  if (stripped.length === 0) {
    return { ok: false, raw, reason: "Empty string" };
  }

  if (stripped.length !== UPCA_PAYLOAD_LENGTH + 1) {
    return {
      ok: false,
      raw,
      reason: `Invalid length: expected 12 digits, got ${stripped.length}`,
    };
  }

  if (!/^\d{12}$/.test(stripped)) {
    return { ok: false, raw, reason: "UPC-A contains non-numeric characters" };
  }

  const payload = Array.from(stripped.slice(0, UPCA_PAYLOAD_LENGTH), Number);
  const checkDigit = Number(stripped[UPCA_PAYLOAD_LENGTH]);
  return { ok: true, record: createValidationRecord(upcA(payload), checkDigit) };
}
