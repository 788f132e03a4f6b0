// ---------------------------------------------------------------------------
// Tests for the package entry point.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  UPCErrorKind,
  UPCStandardKind,
  assertUPC,
  createValidationRecord,
  loadConfig,
  parseUPC,
  upcA,
  validateUPC,
  SequenceOverflowError,
} from "../../src/index.js";

describe("public API", () => {
  it("validates a record built from the exported constructors", () => {
    const record = createValidationRecord(upcA([0, 3, 6, 0, 0, 0, 2, 4, 1, 4, 5]), 7);
    expect(record.upc.kind).toBe(UPCStandardKind.UPC_A);
    expect(validateUPC(record)).toEqual({ ok: true, valid: true });
  });

  it("exposes the error kinds as constants", () => {
    const record = createValidationRecord(upcA([0, 3, 6, 0, 0, 0, 2, 4, 1, 4, 15]), 7);
    expect(validateUPC(record)).toEqual({
      ok: false,
      error: UPCErrorKind.SEQUENCE_OVERFLOW,
    });
    expect(() => assertUPC(record)).toThrow(SequenceOverflowError);
  });

  it("parses and validates a printed code", () => {
    const parsed = parseUPC("012345678905");
    expect(parsed.ok && validateUPC(parsed.record)).toEqual({ ok: true, valid: true });
  });

  it("loads configuration", () => {
    expect(loadConfig({}).logging.level).toBe("info");
  });
});
