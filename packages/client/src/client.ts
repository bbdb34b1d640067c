/**
 * Relief Client - Main Client Class
 */

import type { z } from 'zod';
import { apiEnvelopeSchema } from '@relief-pipeline/shared';
import type { ReliefClientConfig, RequestOptions } from './types.js';
import {
  ReliefClientError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  ConflictError,
  ServerError,
  InvalidResponseError,
} from './errors.js';
import { RequestsResource } from './resources/requests.js';
import { OperatorResource } from './resources/operator.js';

interface ApiErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown> | undefined;
}

/**
 * Relief pipeline API client
 *
 * @example
 * ```typescript
 * const client = new ReliefClient({ baseUrl: 'http://localhost:3000', apiKey: 'local-key' });
 *
 * const ack = await client.requests.submit({
 *   location: { name: 'Riverside district' },
 *   imagery: { preEvent: ['s3://imagery/pre.tif'], postEvent: ['s3://imagery/post.tif'] },
 * });
 * const status = await client.requests.get(ack.requestId);
 * ```
 */
export class ReliefClient {
  private baseUrl: string;
  private apiKey: string | undefined;
  private timeout: number;
  private fetchFn: typeof fetch;

  /** Rescue requests */
  public readonly requests: RequestsResource;

  /** Reconciliation, dead letters and audit trails */
  public readonly operator: OperatorResource;

  constructor(config: ReliefClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 30000;
    this.fetchFn = config.fetch ?? fetch;

    const requestFn = this.request.bind(this);
    this.requests = new RequestsResource(requestFn);
    this.operator = new OperatorResource(requestFn);
  }

  private getHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {};
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiKey) {
      headers['X-API-Key'] = this.apiKey;
    }
    return headers;
  }

  /**
   * Make an HTTP request to the API and validate the reply
   */
  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = new URL(path, this.baseUrl);
    if (options.params) {
      for (const [key, value] of Object.entries(options.params)) {
        url.searchParams.set(key, value);
      }
    }

    const hasBody = options.body !== undefined;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(url.toString(), {
        method,
        headers: this.getHeaders(hasBody),
        ...(hasBody && { body: JSON.stringify(options.body) }),
        signal: controller.signal,
      });

      let raw: unknown;
      try {
        raw = await response.json();
      } catch (error) {
        if (!response.ok) {
          throw new ServerError(`HTTP ${response.status} with a non-JSON body`, response.status);
        }
        throw new InvalidResponseError(`${method} ${path} returned a non-JSON body`, error);
      }

      const envelope = apiEnvelopeSchema.safeParse(raw);
      if (!envelope.success) {
        if (!response.ok) {
          throw new ServerError(`HTTP ${response.status}`, response.status);
        }
        throw new InvalidResponseError(
          `${method} ${path} returned an unexpected body`,
          envelope.error.errors
        );
      }

      const body = envelope.data;
      if (!body.success) {
        this.handleError(response.status, body.error);
      }

      const data = schema.safeParse(body.data);
      if (!data.success) {
        throw new InvalidResponseError(
          `${method} ${path} returned unexpected data`,
          data.error.errors
        );
      }
      return data.data;
    } catch (error) {
      if (error instanceof ReliefClientError) throw error;

      if (error instanceof Error && error.name === 'AbortError') {
        throw new NetworkError(`Request timed out after ${this.timeout}ms`, error);
      }

      throw new NetworkError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Handle API error responses
   */
  private handleError(status: number, error: ApiErrorResponse): never {
    switch (status) {
      case 400:
        throw new ValidationError(error.message, error.details);
      case 401:
        throw new AuthenticationError(error.message);
      case 404:
        throw new NotFoundError(error.message);
      case 409:
        throw new ConflictError(error.message, error.details);
      default:
        if (status >= 500) {
          throw new ServerError(error.message, status, error.code);
        }
        throw new ReliefClientError(error.message, error.code, status, error.details);
    }
  }
}
