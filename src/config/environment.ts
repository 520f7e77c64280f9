/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - The Google Maps key is never logged or echoed in tool output
 * - Missing key is tolerated in development (tools answer with an error text)
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Services receive the slices they need at construction time
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

export type TransportKind = 'stdio' | 'http';

function parseTransport(value: string): TransportKind {
  return value.toLowerCase() === 'http' ? 'http' : 'stdio';
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');
const googleMapsApiKey = getOptional('GOOGLE_MAPS_API_KEY', '').trim();

/**
 * Application configuration object
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Tool transport: stdio for agent hosts, http for the REST surface
  transport: parseTransport(getOptional('TRANSPORT', 'stdio')),

  // Google Maps
  googleMaps: {
    apiKey: googleMapsApiKey,
  },

  // Used by query_route, which never receives an explicit origin
  defaultOrigin: getOptional('DEFAULT_ORIGIN', 'Chicago, IL'),

  // Outbound request timeouts (ms)
  timeouts: {
    locationCheckMs: getNumber('LOCATION_CHECK_TIMEOUT_MS', 5000),
    requestMs: getNumber('MAPS_REQUEST_TIMEOUT_MS', 10000),
  },

  // Rate Limiting (HTTP transport only)
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 60 * 1000), // 1 minute
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 60),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // CORS
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isTest: nodeEnv === 'test',
} as const;
