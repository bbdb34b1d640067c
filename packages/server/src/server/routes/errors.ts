import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import {
  ConflictError,
  NotFoundError,
  TriggerPublishError,
  ValidationError,
} from '../../pipeline/errors.js';
import { createErrorResponse, ErrorCode } from '../types.js';

/**
 * Send the error envelope for a failure thrown by the pipeline.
 */
export function sendRouteError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  logger: Logger,
  fallbackMessage: string
): FastifyReply {
  if (error instanceof ValidationError) {
    return reply
      .status(400)
      .send(createErrorResponse(ErrorCode.VALIDATION_ERROR, error.message, { issues: error.issues }, request.id));
  }
  if (error instanceof NotFoundError) {
    return reply.status(404).send(createErrorResponse(ErrorCode.NOT_FOUND, error.message, undefined, request.id));
  }
  if (error instanceof ConflictError) {
    return reply.status(409).send(createErrorResponse(ErrorCode.CONFLICT, error.message, error.details, request.id));
  }
  if (error instanceof TriggerPublishError) {
    logger.error({ err: error, requestId: request.id }, fallbackMessage);
    return reply
      .status(503)
      .send(createErrorResponse(ErrorCode.SERVICE_UNAVAILABLE, error.message, error.details, request.id));
  }

  logger.error({ err: error, requestId: request.id }, fallbackMessage);
  return reply.status(500).send(createErrorResponse(ErrorCode.INTERNAL_ERROR, fallbackMessage, undefined, request.id));
}

/**
 * 400 for a query, params or body that failed its schema.
 */
export function sendBadRequest(
  request: FastifyRequest,
  reply: FastifyReply,
  message: string,
  errors: unknown
): FastifyReply {
  return reply.status(400).send(createErrorResponse(ErrorCode.BAD_REQUEST, message, { errors }, request.id));
}
