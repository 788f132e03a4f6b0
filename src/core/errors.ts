// ---------------------------------------------------------------------------
// Error hierarchy for the UPC checker.
// ---------------------------------------------------------------------------

import { UPCErrorKind } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all UPC checker errors.
 */
export class UPCCheckerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UPCCheckerError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Validation errors ───────────────────────────────────────────────────────

/**
 * A digit in a validation record lies outside 0-9.
 */
export class UPCValidationError extends UPCCheckerError {
  public readonly kind: UPCErrorKind;

  constructor(kind: UPCErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UPCValidationError";
    this.kind = kind;
  }
}

/** One or more payload digits are not single digits. */
export class SequenceOverflowError extends UPCValidationError {
  constructor(options?: ErrorOptions) {
    super(
      UPCErrorKind.SEQUENCE_OVERFLOW,
      "UPC payload contains a value outside 0-9",
      options,
    );
    this.name = "SequenceOverflowError";
  }
}

/** The check digit is not a single digit. */
export class CheckDigitOverflowError extends UPCValidationError {
  public readonly checkDigit: number;

  constructor(checkDigit: number, options?: ErrorOptions) {
    super(
      UPCErrorKind.CHECK_DIGIT_OVERFLOW,
      `UPC check digit ${checkDigit} is outside 0-9`,
      options,
    );
    this.name = "CheckDigitOverflowError";
    this.checkDigit = checkDigit;
  }
}

/** A payload was built with the wrong number of digits. */
export class PayloadLengthError extends UPCCheckerError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, options?: ErrorOptions) {
    super(`Expected ${expected} payload digits, got ${actual}`, options);
    this.name = "PayloadLengthError";
    this.expected = expected;
    this.actual = actual;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends UPCCheckerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
