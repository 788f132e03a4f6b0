// ---------------------------------------------------------------------------
// Tests for the logging UPCValidator.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { UPCValidator } from "../../../src/domain/upc/validator.js";
import { upcA, createValidationRecord } from "../../../src/domain/upc/upc.js";
import { createLogger } from "../../../src/logging/logger.js";

const SODA = [0, 3, 6, 0, 0, 0, 2, 4, 1, 4, 5];

describe("UPCValidator", () => {
  let lines: Record<string, unknown>[];
  let validator: UPCValidator;

  beforeEach(() => {
    lines = [];
    const logger = createLogger(
      { level: "debug", prettyPrint: false },
      { write: (msg: string) => lines.push(JSON.parse(msg)) },
    );
    validator = new UPCValidator(logger);
  });

  it("returns the validation result unchanged", () => {
    const result = validator.validate(createValidationRecord(upcA(SODA), 7));
    expect(result).toEqual({ ok: true, valid: true });
  });

  it("logs successful checks at debug", () => {
    validator.validate(createValidationRecord(upcA(SODA), 3));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      component: "upc-validator",
      kind: "upc-a",
      valid: false,
      msg: "upc checked",
    });
  });

  it("logs overflowing records at warn", () => {
    const result = validator.validate(createValidationRecord(upcA(SODA), 12));
    expect(result).toEqual({ ok: false, error: "CheckDigitOverflow" });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      component: "upc-validator",
      kind: "upc-a",
      error: "CheckDigitOverflow",
      msg: "upc rejected",
    });
  });
});
