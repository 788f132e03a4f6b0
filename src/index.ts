// ---------------------------------------------------------------------------
// UPC checker -- public entry point.
// ---------------------------------------------------------------------------

export type {
  AppConfig,
  LoggingConfig,
  RawUPC,
  UPCAPayload,
  UPCCheckResult,
  UPCParseResult,
  UPCStandard,
  ValidationRecord,
} from "./core/types.js";
export { UPCErrorKind, UPCStandardKind } from "./core/types.js";

export {
  UPCCheckerError,
  UPCValidationError,
  SequenceOverflowError,
  CheckDigitOverflowError,
  PayloadLengthError,
  ConfigurationError,
} from "./core/errors.js";

export {
  upcA,
  createValidationRecord,
  validateUPC,
  assertUPC,
  parseUPC,
} from "./domain/upc/upc.js";
export { UPCValidator } from "./domain/upc/validator.js";

export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
export { loadConfig } from "./config/config.js";
