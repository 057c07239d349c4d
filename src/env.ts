const VALID_LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const BOOLEAN_VALUES = ["true", "false", "1", "0", "yes", "no"];

/**
 * Validate format-sensitive environment variables at startup.
 * Throws with a descriptive message listing all failures if any are invalid.
 */
export function validateEnv(): void {
  const errors: string[] = [];

  const url = process.env.ALERTMANAGER_URL;
  if (url && !/^https?:\/\//.test(url)) {
    errors.push("ALERTMANAGER_URL must start with http:// or https://");
  }

  const enabled = process.env.ALERTMANAGER_ENABLED;
  if (enabled !== undefined && !BOOLEAN_VALUES.includes(enabled.trim().toLowerCase())) {
    errors.push(`ALERTMANAGER_ENABLED must be one of: ${BOOLEAN_VALUES.join(", ")} (got "${enabled}")`);
  }

  const rawPort = process.env.PORT;
  if (rawPort !== undefined) {
    const port = Number(rawPort);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      errors.push(`PORT must be an integer between 1 and 65535 (got "${rawPort}")`);
    }
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel && !VALID_LOG_LEVELS.some((level) => level === logLevel)) {
    errors.push(`LOG_LEVEL must be one of: ${VALID_LOG_LEVELS.join(", ")} (got "${logLevel}")`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
