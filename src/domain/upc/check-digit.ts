// ---------------------------------------------------------------------------
// UPC-A check-digit computation
// ---------------------------------------------------------------------------

import { UPCA_PAYLOAD_LENGTH } from "../../core/types.js";
import { PayloadLengthError, SequenceOverflowError } from "../../core/errors.js";

/** True for the integers 0 through 9. */
export function isSingleDigit(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 9;
}

/**
 * Compute the UPC-A check digit for exactly 11 payload digits.
 *
 * Digits at odd (1-indexed) positions weigh 3, the rest weigh 1; the check
 * digit brings the weighted sum up to the next multiple of 10.
 */
export function computeUPCACheckDigit(payload: readonly number[]): number {
  if (payload.length !== UPCA_PAYLOAD_LENGTH) {
    throw new PayloadLengthError(UPCA_PAYLOAD_LENGTH, payload.length);
  }
  if (!payload.every(isSingleDigit)) {
    throw new SequenceOverflowError();
  }

  let odd = 0;
  let even = 0;
  for (let i = 0; i < payload.length; i++) {
    // i is 0-indexed, so even i is an odd position
    if (i % 2 === 0) odd += payload[i];
    else even += payload[i];
  }

  const total = odd * 3 + even;
  return (10 - (total % 10)) % 10;
}
