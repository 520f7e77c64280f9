/**
 * =============================================================================
 * GOOGLE MAPS SERVICE - HTTP layer tests
 * =============================================================================
 *
 * fetch is replaced with a spy; nothing leaves the process.
 * =============================================================================
 */

import { ErrorCode, TravelMode } from '../core/constants';
import { ProviderError } from '../core/errors/AppError';
import { GoogleMapsService } from '../shared/services/google-maps.service';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const BASE_URL = 'https://maps.test/api';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestedUrl(spy: jest.SpyInstance, call = 0): URL {
  return new URL(String(spy.mock.calls[call][0]));
}

describe('GoogleMapsService', () => {
  let fetchSpy: jest.SpyInstance;
  let service: GoogleMapsService;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    service = new GoogleMapsService({ apiKey: 'test-key', timeoutMs: 1000, baseUrl: BASE_URL });
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  describe('isAvailable', () => {
    it('is false without an API key', () => {
      expect(new GoogleMapsService({ apiKey: '', timeoutMs: 1000 }).isAvailable()).toBe(false);
      expect(service.isAvailable()).toBe(true);
    });
  });

  describe('geocode', () => {
    it('sends the address and key and returns the body', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ status: 'ZERO_RESULTS', results: [] }));

      const data = await service.geocode('Chicago, IL');

      expect(data).toEqual({ status: 'ZERO_RESULTS', results: [] });
      const url = requestedUrl(fetchSpy);
      expect(url.origin + url.pathname).toBe('https://maps.test/api/geocode/json');
      expect(url.searchParams.get('address')).toBe('Chicago, IL');
      expect(url.searchParams.get('key')).toBe('test-key');
    });
  });

  describe('nearbySearch', () => {
    it('sends location, radius and type', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ status: 'OK', results: [{ name: 'Lincoln Park' }] }));

      await service.nearbySearch({ location: { lat: 41.8781, lng: -87.6298 }, radiusMeters: 1698, type: 'park' });

      const url = requestedUrl(fetchSpy);
      expect(url.pathname).toBe('/api/place/nearbysearch/json');
      expect(url.searchParams.get('location')).toBe('41.8781,-87.6298');
      expect(url.searchParams.get('radius')).toBe('1698');
      expect(url.searchParams.get('type')).toBe('park');
    });
  });

  describe('directions', () => {
    it('pipe-joins waypoints', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ status: 'OK', routes: [] }));

      await service.directions({
        origin: 'Chicago, IL',
        destination: 'Chicago, IL',
        mode: TravelMode.WALKING,
        waypoints: ['Lincoln Park', 'Navy Pier'],
      });

      const url = requestedUrl(fetchSpy);
      expect(url.pathname).toBe('/api/directions/json');
      expect(url.searchParams.get('origin')).toBe('Chicago, IL');
      expect(url.searchParams.get('destination')).toBe('Chicago, IL');
      expect(url.searchParams.get('mode')).toBe('walking');
      expect(url.searchParams.get('waypoints')).toBe('Lincoln Park|Navy Pier');
    });

    it('omits the waypoints parameter when there are none', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ status: 'OK', routes: [] }));

      await service.directions({ origin: 'A St', destination: 'B St', mode: TravelMode.DRIVING, waypoints: [] });

      expect(requestedUrl(fetchSpy).searchParams.has('waypoints')).toBe(false);
    });
  });

  describe('failures', () => {
    it('raises a ProviderError with the first 100 characters of a non-2xx body', async () => {
      fetchSpy.mockResolvedValue(new Response('x'.repeat(150), { status: 500 }));

      const error = await service.geocode('Chicago, IL').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({
        message: `HTTP error 500: ${'x'.repeat(100)}`,
        code: ErrorCode.PROVIDER_HTTP_ERROR,
      });
    });

    it('raises a timeout error when the request is aborted', async () => {
      fetchSpy.mockImplementation((_input: unknown, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
      );

      const error = await service.directions(
        { origin: 'A St', destination: 'B St', mode: TravelMode.DRIVING },
        { timeoutMs: 10 }
      ).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({
        message: 'Request timed out. Please try again.',
        code: ErrorCode.PROVIDER_TIMEOUT,
        statusCode: 504,
      });
    });

    it('wraps transport failures', async () => {
      fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

      await expect(service.geocode('Chicago, IL')).rejects.toMatchObject({
        message: 'Request failed: fetch failed',
        code: ErrorCode.PROVIDER_ERROR,
      });
    });

    it('never puts the API key in an error message', async () => {
      fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

      const error = await service.geocode('Chicago, IL').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error instanceof ProviderError && error.message.includes('test-key')).toBe(false);
    });
  });
});
