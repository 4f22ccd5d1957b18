// tests/unit/errors.test.ts

import { describe, it, expect } from 'vitest';
import {
  ApiClientError,
  ApiError,
  ApiServerError,
  ConfigError,
  EntityNotFoundError,
  KarmaError,
  NetworkError,
  NetworkTimeoutError,
  OperationCancelledError,
  RateLimitError,
  summarizeError,
  ValidationError,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  it('should carry message, code and details', () => {
    const error = new KarmaError('Test error', 'TEST_CODE', { url: '/x.json' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('KarmaError');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.details).toEqual({ url: '/x.json' });
  });

  it('should name subclasses after their constructor', () => {
    expect(new ConfigError('bad').name).toBe('ConfigError');
    expect(new EntityNotFoundError('gone').code).toBe('ENTITY_NOT_FOUND');
    expect(new ValidationError('bad limit').code).toBe('VALIDATION_ERROR');
  });

  describe('API errors', () => {
    it('should record the status in details', () => {
      const error = new ApiError('Failed', 418, { url: '/tea.json' });

      expect(error.status).toBe(418);
      expect(error.code).toBe('API_ERROR');
      expect(error.details).toEqual({ url: '/tea.json', status: 418 });
    });

    it('should default client and server statuses', () => {
      expect(new ApiClientError('Bad request').status).toBe(400);
      expect(new ApiClientError('Bad request').code).toBe('API_CLIENT_ERROR');
      expect(new ApiServerError('Boom').status).toBe(500);
      expect(new ApiServerError('Boom').code).toBe('API_SERVER_ERROR');
    });

    it('should treat rate limiting as a client error', () => {
      const error = new RateLimitError(undefined, 30);

      expect(error).toBeInstanceOf(ApiClientError);
      expect(error.message).toBe('Rate limit exceeded');
      expect(error.status).toBe(429);
      expect(error.retryAfter).toBe(30);
      expect(error.code).toBe('RATE_LIMIT_EXCEEDED');
      expect(error.details).toEqual({ retryAfter: 30, status: 429 });
    });
  });

  describe('Network errors', () => {
    it('should use a default timeout message', () => {
      const error = new NetworkTimeoutError();

      expect(error).toBeInstanceOf(NetworkError);
      expect(error.message).toBe('Request timeout');
      expect(error.code).toBe('NETWORK_TIMEOUT');
    });

    it('should use a default cancellation message', () => {
      const error = new OperationCancelledError();

      expect(error.message).toBe('Operation cancelled');
      expect(error.code).toBe('OPERATION_CANCELLED');
    });
  });

  describe('summarizeError', () => {
    it('should mention the HTTP status of API errors once', () => {
      expect(summarizeError(new ApiClientError('Client error: 404', 404))).toBe('Client error: 404');
    });

    it('should use the message of other errors', () => {
      expect(summarizeError(new EntityNotFoundError('User u/x not found'))).toBe('User u/x not found');
      expect(summarizeError(new TypeError('nope'))).toBe('nope');
    });

    it('should stringify non-errors', () => {
      expect(summarizeError('plain')).toBe('plain');
    });
  });
});
