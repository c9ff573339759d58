import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - REST host is set
 * - provider.timeoutMs is positive (warning above 60s)
 * - provider.maxRetries is a non-negative integer (warning above 5)
 * - provider.retryDelayMs is a non-negative integer
 * - log.level is a pino level
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  if (!cfg.rest.host) {
    errors.push("REST host is required");
  }

  if (!Number.isInteger(cfg.provider.timeoutMs) || cfg.provider.timeoutMs <= 0) {
    errors.push(`provider.timeoutMs must be positive, got ${cfg.provider.timeoutMs}`);
  } else if (cfg.provider.timeoutMs > 60_000) {
    warnings.push(`provider.timeoutMs is ${cfg.provider.timeoutMs}ms — requests may hang for over a minute`);
  }

  if (!Number.isInteger(cfg.provider.maxRetries) || cfg.provider.maxRetries < 0) {
    errors.push(`provider.maxRetries must be a non-negative integer, got ${cfg.provider.maxRetries}`);
  } else if (cfg.provider.maxRetries > 5) {
    warnings.push(`provider.maxRetries is ${cfg.provider.maxRetries} (recommended: at most 5)`);
  }

  if (!Number.isInteger(cfg.provider.retryDelayMs) || cfg.provider.retryDelayMs < 0) {
    errors.push(`provider.retryDelayMs must be a non-negative integer, got ${cfg.provider.retryDelayMs}`);
  }

  if (!LOG_LEVELS.includes(cfg.log.level)) {
    errors.push(`log.level must be one of ${LOG_LEVELS.join(", ")}, got ${cfg.log.level}`);
  }

  return { errors, warnings };
}

/**
 * Checks if a port number is in the valid range (1-65535).
 */
function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
