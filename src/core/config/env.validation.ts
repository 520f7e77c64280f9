/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates environment variables at startup.
 *
 * Results go through the logger (stderr); stdout carries the MCP protocol
 * when running over stdio and must stay clean.
 *
 * USAGE:
 * ```typescript
 * validateAndLogEnvironment(); // exits in production if invalid
 * ```
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

interface EnvVar {
  name: string;
  required: boolean;
  /** Required only when NODE_ENV=production */
  requiredInProduction?: boolean;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;

const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'TRANSPORT',
    required: false,
    validator: (v) => ['stdio', 'http'].includes(v.toLowerCase()),
    description: 'Tool transport: stdio or http'
  },
  {
    name: 'PORT',
    required: false,
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'HTTP port number'
  },

  // ==========================================================================
  // GOOGLE MAPS
  // ==========================================================================
  {
    name: 'GOOGLE_MAPS_API_KEY',
    required: false,
    requiredInProduction: true,
    description: 'Google Maps Platform API key (Geocoding, Places, Directions)'
  },
  {
    name: 'DEFAULT_ORIGIN',
    required: false,
    validator: (v) => v.trim().length >= 2,
    description: 'Origin used by query_route'
  },
  {
    name: 'LOCATION_CHECK_TIMEOUT_MS',
    required: false,
    validator: isPositiveInt,
    description: 'Timeout of the best-effort location check (ms)'
  },
  {
    name: 'MAPS_REQUEST_TIMEOUT_MS',
    required: false,
    validator: isPositiveInt,
    description: 'Timeout of geocoding, places and directions requests (ms)'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    validator: (v) => ['error', 'warn', 'info', 'debug'].includes(v),
    description: 'Logging level'
  }
];

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: []
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (!value) {
      if (envVar.required || (isProduction && envVar.requiredInProduction)) {
        result.valid = false;
        result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      } else if (envVar.requiredInProduction) {
        result.warnings.push(`${envVar.name} is not set - ${envVar.description}`);
      }
      continue;
    }

    if (envVar.validator && !envVar.validator(value)) {
      result.valid = false;
      result.errors.push(`Invalid value for ${envVar.name}: "${value}" - ${envVar.description}`);
    }
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): ValidationResult {
  const result = validateEnvironment();

  result.errors.forEach(error => logger.error(`Environment validation error: ${error}`));
  result.warnings.forEach(warning => logger.warn(`Environment validation warning: ${warning}`));

  if (result.valid) {
    logger.info(`Environment validation passed (mode: ${process.env.NODE_ENV || 'development'})`);
  }

  if (!result.valid && process.env.NODE_ENV === 'production') {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }

  return result;
}
