// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

const booleanFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

export const EnvSchema = z.object({
  UPC_CHECKER_ENV: z
    .enum(["development", "staging", "production"])
    .default("development"),
  UPC_CHECKER_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  UPC_CHECKER_LOG_PRETTY: booleanFlag.default("false"),
});

/**
 * Load the configuration from environment variables.
 *
 * Every setting has a default, so an empty environment is valid. Throws
 * `ConfigurationError` naming the first variable that fails validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue ? issue.path.join(".") : "environment";
    throw new ConfigurationError(
      `Invalid ${name}: ${issue?.message ?? "validation failed"}`,
      { cause: parsed.error },
    );
  }

  const vars = parsed.data;
  return {
    env: vars.UPC_CHECKER_ENV,
    logging: {
      level: vars.UPC_CHECKER_LOG_LEVEL,
      prettyPrint: vars.UPC_CHECKER_LOG_PRETTY,
    },
  };
}
