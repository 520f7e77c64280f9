/**
 * =============================================================================
 * ENVIRONMENT VALIDATION - Tests
 * =============================================================================
 */

import { validateEnvironment } from '../core/config/env.validation';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('validateEnvironment', () => {
  it('accepts an empty development environment with a key warning', () => {
    const result = validateEnvironment({ NODE_ENV: 'development' });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([
      'GOOGLE_MAPS_API_KEY is not set - Google Maps Platform API key (Geocoding, Places, Directions)',
    ]);
  });

  it('requires the Maps key in production', () => {
    const result = validateEnvironment({ NODE_ENV: 'production' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Missing required environment variable: GOOGLE_MAPS_API_KEY - Google Maps Platform API key (Geocoding, Places, Directions)',
    ]);
  });

  it('accepts a complete production environment', () => {
    const result = validateEnvironment({
      NODE_ENV: 'production',
      TRANSPORT: 'HTTP',
      PORT: '3000',
      GOOGLE_MAPS_API_KEY: 'test-key',
      DEFAULT_ORIGIN: 'Chicago, IL',
      LOCATION_CHECK_TIMEOUT_MS: '5000',
      MAPS_REQUEST_TIMEOUT_MS: '10000',
      LOG_LEVEL: 'warn',
    });

    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('reports each invalid value', () => {
    const result = validateEnvironment({
      NODE_ENV: 'test',
      TRANSPORT: 'websocket',
      PORT: '70000',
      GOOGLE_MAPS_API_KEY: 'test-key',
      LOCATION_CHECK_TIMEOUT_MS: '0',
      LOG_LEVEL: 'verbose',
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Invalid value for TRANSPORT: "websocket" - Tool transport: stdio or http',
      'Invalid value for PORT: "70000" - HTTP port number',
      'Invalid value for LOCATION_CHECK_TIMEOUT_MS: "0" - Timeout of the best-effort location check (ms)',
      'Invalid value for LOG_LEVEL: "verbose" - Logging level',
    ]);
  });
});
