// ---------------------------------------------------------------------------
// Validator that records each check on an injected logger.
// ---------------------------------------------------------------------------

import type { UPCCheckResult, ValidationRecord } from "../../core/types.js";
import type { Logger } from "../../logging/logger.js";
import { validateUPC } from "./upc.js";

/**
 * Wraps `validateUPC` for callers that want an audit trail.
 *
 * Results are returned unchanged. Successful checks go to `debug`,
 * overflowing records to `warn`, both tagged `component: "upc-validator"`.
 */
export class UPCValidator {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "upc-validator" });
  }

  validate(record: ValidationRecord): UPCCheckResult {
    const result = validateUPC(record);
    const kind = record.upc.kind;

    if (result.ok) {
      this.logger.debug({ kind, valid: result.valid }, "upc checked");
    } else {
      this.logger.warn({ kind, error: result.error }, "upc rejected");
    }

    return result;
  }
}
