import type { FastifyReply, FastifyRequest } from 'fastify';
import { createErrorResponse, ErrorCode } from '../types.js';

export const API_KEY_HEADER = 'x-api-key';

export type ApiKeyAuth = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

/**
 * preHandler for mutating routes. Validates the `X-API-Key` header when a
 * key is configured; without one every request passes.
 */
export function createApiKeyAuth(apiKey: string | undefined): ApiKeyAuth {
  return async (request, reply) => {
    if (!apiKey) {
      return undefined;
    }

    const provided = request.headers[API_KEY_HEADER];

    if (provided === undefined) {
      return reply
        .status(401)
        .send(createErrorResponse(ErrorCode.UNAUTHORIZED, 'X-API-Key header required', undefined, request.id));
    }

    if (provided !== apiKey) {
      return reply
        .status(401)
        .send(createErrorResponse(ErrorCode.UNAUTHORIZED, 'Invalid API key', undefined, request.id));
    }

    return undefined;
  };
}
