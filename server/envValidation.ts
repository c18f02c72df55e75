/**
 * Environment Variable Validation
 *
 * Purpose: Fail-fast startup validation to prevent a misconfigured till
 *
 * This module validates environment variables before the catalog is opened.
 * Tier 1 (FATAL): Core requirements - process exits if misconfigured
 * Tier 2 (NON-FATAL): Tuning knobs - warns and falls back to defaults
 */

import { logger } from "./logger";

interface EnvCheck {
  name: string;
  required: boolean;
  tier: 1 | 2; // 1 = FATAL (exit), 2 = NON-FATAL (warn)
  validator?: (value: string | undefined) => string | null; // Returns error message or null if valid
}

function validateFraction(name: string) {
  return (value: string | undefined): string | null => {
    if (!value) return null;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
      return `${name} must be a number between 0 and 1 (got "${value}")`;
    }
    return null;
  };
}

// Tier 1: FATAL - process exits if these fail
const TIER1_CHECKS: EnvCheck[] = [
  {
    name: "DATABASE_URL",
    required: true,
    tier: 1,
    validator: (value) => {
      if (!value) return "DATABASE_URL must be set";
      try {
        const url = new URL(value);
        if (url.protocol !== "postgres:" && url.protocol !== "postgresql:") {
          return "DATABASE_URL must be a postgres:// or postgresql:// connection string";
        }
        return null;
      } catch {
        return "DATABASE_URL must be a valid PostgreSQL connection string";
      }
    },
  },
];

// Tier 2: NON-FATAL - logs warnings and continues with defaults
const TIER2_CHECKS: EnvCheck[] = [
  {
    name: "LOG_LEVEL",
    required: false,
    tier: 2,
    validator: (value) => {
      if (!value) return null;
      if (!["debug", "info", "warn", "error"].includes(value.trim().toLowerCase())) {
        return `LOG_LEVEL="${value}" is not recognized. Valid values: debug, info, warn, error`;
      }
      return null;
    },
  },
  {
    name: "DELETED_PRODUCT_RETENTION_DAYS",
    required: false,
    tier: 2,
    validator: (value) => {
      if (!value) return null;
      const days = Number(value);
      if (!Number.isInteger(days) || days <= 0) {
        return `DELETED_PRODUCT_RETENTION_DAYS must be a positive whole number (got "${value}")`;
      }
      return null;
    },
  },
  {
    name: "RESOLVE_FUZZY_THRESHOLD",
    required: false,
    tier: 2,
    validator: validateFraction("RESOLVE_FUZZY_THRESHOLD"),
  },
  {
    name: "SEARCH_FUZZY_THRESHOLD",
    required: false,
    tier: 2,
    validator: validateFraction("SEARCH_FUZZY_THRESHOLD"),
  },
  {
    name: "SEARCH_LIMIT",
    required: false,
    tier: 2,
    validator: (value) => {
      if (!value) return null;
      const limit = Number(value);
      if (!Number.isInteger(limit) || limit <= 0) {
        return `SEARCH_LIMIT must be a positive whole number (got "${value}")`;
      }
      return null;
    },
  },
  {
    name: "SCHEME_TIMEZONE",
    required: false,
    tier: 2,
    validator: (value) => {
      if (!value) return null;
      try {
        new Intl.DateTimeFormat("en-CA", { timeZone: value });
        return null;
      } catch {
        return `SCHEME_TIMEZONE="${value}" is not a valid IANA time zone`;
      }
    },
  },
];

export interface ValidationResult {
  valid: boolean;
  tier1Errors: Array<{ var: string; message: string }>;
  tier2Warnings: Array<{ var: string; message: string }>;
}

export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const tier1Errors: Array<{ var: string; message: string }> = [];
  const tier2Warnings: Array<{ var: string; message: string }> = [];

  // Validate Tier 1 (FATAL)
  for (const check of TIER1_CHECKS) {
    const value = env[check.name];

    if (check.required && !value) {
      tier1Errors.push({
        var: check.name,
        message: `${check.name} is required but not set`,
      });
      continue;
    }

    if (check.validator) {
      const validationError = check.validator(value);
      if (validationError) {
        tier1Errors.push({
          var: check.name,
          message: validationError,
        });
      }
    }
  }

  // Validate Tier 2 (NON-FATAL)
  for (const check of TIER2_CHECKS) {
    const value = env[check.name];

    if (check.validator) {
      const validationError = check.validator(value);
      if (validationError) {
        tier2Warnings.push({
          var: check.name,
          message: validationError,
        });
      }
    }
  }

  return {
    valid: tier1Errors.length === 0,
    tier1Errors,
    tier2Warnings,
  };
}

/**
 * Validate and exit on Tier 1 failures. Scripts call this before touching the catalog.
 */
export function validateEnvironmentOrExit(): void {
  const result = validateEnvironment();

  for (const warning of result.tier2Warnings) {
    logger.warn(`Environment warning: ${warning.var}`, { reason: warning.message });
  }

  if (!result.valid) {
    for (const error of result.tier1Errors) {
      logger.error(`Environment invalid: ${error.var}`, { reason: error.message });
    }
    logger.error("Cannot open the catalog with invalid core configuration. Fix the errors above and retry.");
    process.exit(1);
  }

  logger.info("Environment validation passed", { warnings: result.tier2Warnings.length });
}
