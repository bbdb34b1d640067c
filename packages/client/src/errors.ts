/**
 * Relief Client Error Classes
 */

/**
 * Base error class for all relief client errors
 */
export class ReliefClientError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ReliefClientError';
  }
}

/**
 * Error for network-level failures (connection, timeout, etc.)
 */
export class NetworkError extends ReliefClientError {
  constructor(message: string, cause?: unknown) {
    super(message, 'NETWORK_ERROR', 0);
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

/**
 * Error when a resource is not found (404)
 */
export class NotFoundError extends ReliefClientError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for validation failures (400)
 */
export class ValidationError extends ReliefClientError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Error for authentication failures (401)
 */
export class AuthenticationError extends ReliefClientError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error for state conflicts (409), such as reprocessing a stage that has not failed
 */
export class ConflictError extends ReliefClientError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
    this.name = 'ConflictError';
  }
}

/**
 * Error for server-side failures (5xx)
 */
export class ServerError extends ReliefClientError {
  constructor(message: string, status = 500, code = 'SERVER_ERROR') {
    super(message, code, status);
    this.name = 'ServerError';
  }
}

/**
 * The server replied with a body that does not match the API contract
 */
export class InvalidResponseError extends ReliefClientError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_RESPONSE', 0, details);
    this.name = 'InvalidResponseError';
  }
}
