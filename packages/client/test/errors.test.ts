import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  ConflictError,
  InvalidResponseError,
  NetworkError,
  NotFoundError,
  ReliefClientError,
  ServerError,
  ValidationError,
} from '../src/errors.js';

describe('ReliefClientError', () => {
  it('should create error with all properties', () => {
    const error = new ReliefClientError('Test message', 'TEST_CODE', 500, { extra: 'data' });

    expect(error.message).toBe('Test message');
    expect(error.code).toBe('TEST_CODE');
    expect(error.status).toBe(500);
    expect(error.details).toEqual({ extra: 'data' });
    expect(error.name).toBe('ReliefClientError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should work without details', () => {
    const error = new ReliefClientError('Message', 'CODE', 400);

    expect(error.details).toBeUndefined();
  });
});

describe('NetworkError', () => {
  it('should use status 0 and keep the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new NetworkError('Request failed', cause);

    expect(error.code).toBe('NETWORK_ERROR');
    expect(error.status).toBe(0);
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(ReliefClientError);
  });
});

describe('HTTP status errors', () => {
  it.each([
    [new NotFoundError('Request not found: req_1'), 'NotFoundError', 'NOT_FOUND', 404],
    [new ValidationError('Invalid body'), 'ValidationError', 'VALIDATION_ERROR', 400],
    [new AuthenticationError(), 'AuthenticationError', 'UNAUTHORIZED', 401],
    [new ConflictError('Not failed'), 'ConflictError', 'CONFLICT', 409],
    [new ServerError('Boom'), 'ServerError', 'SERVER_ERROR', 500],
  ])('%s carries its name, code and status', (error, name, code, status) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.status).toBe(status);
    expect(error).toBeInstanceOf(ReliefClientError);
  });

  it('should default the authentication message', () => {
    expect(new AuthenticationError().message).toBe('Authentication required');
  });

  it('should take a custom status and code for server errors', () => {
    const error = new ServerError('Trigger bus unavailable', 503, 'SERVICE_UNAVAILABLE');

    expect(error.status).toBe(503);
    expect(error.code).toBe('SERVICE_UNAVAILABLE');
  });
});

describe('InvalidResponseError', () => {
  it('should keep the validation details', () => {
    const error = new InvalidResponseError('Unexpected data', [{ path: ['items'] }]);

    expect(error.code).toBe('INVALID_RESPONSE');
    expect(error.details).toEqual([{ path: ['items'] }]);
  });
});
