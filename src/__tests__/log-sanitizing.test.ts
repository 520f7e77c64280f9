/**
 * =============================================================================
 * LOG SANITIZING - Secret redaction tests
 * =============================================================================
 */

import { maskQueryParams } from '../shared/middleware/request-logger.middleware';
import { sanitizeLogData } from '../shared/services/logger.service';

describe('sanitizeLogData', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(sanitizeLogData({
      origin: 'Chicago, IL',
      apiKey: 'test-key',
      request: { url: '/geocode/json', authorization: 'Bearer test-token', params: { key: 'test-key' } },
    })).toEqual({
      origin: 'Chicago, IL',
      apiKey: '[REDACTED]',
      request: { url: '/geocode/json', authorization: '[REDACTED]', params: { key: '[REDACTED]' } },
    });
  });

  it('matches key names case-insensitively and by substring', () => {
    expect(sanitizeLogData({ GOOGLE_MAPS_API_KEY: 'test-key', clientSecret: 'test-secret', mode: 'walking' }))
      .toEqual({ GOOGLE_MAPS_API_KEY: '[REDACTED]', clientSecret: '[REDACTED]', mode: 'walking' });
  });

  it('keeps arrays as they are', () => {
    expect(sanitizeLogData({ waypoints: ['Lincoln Park'] })).toEqual({ waypoints: ['Lincoln Park'] });
  });
});

describe('maskQueryParams', () => {
  it('masks sensitive query parameters', () => {
    expect(maskQueryParams({ key: 'test-key', access_token: 'test-token', mode: 'walking' }))
      .toEqual({ key: '[MASKED]', access_token: '[MASKED]', mode: 'walking' });
  });
});
