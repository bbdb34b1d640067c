/**
 * Error taxonomy for the relief pipeline.
 *
 * Races and redeliveries (StoreConflictError, BusRedeliveryDuplicate) are
 * absorbed by the workers. External failures become record data. Anything
 * else thrown out of a handler makes the bus redeliver the message.
 */

export const PipelineErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  EXTERNAL_FUNCTION_FAILED: 'EXTERNAL_FUNCTION_FAILED',
  STORE_CONFLICT: 'STORE_CONFLICT',
  DUPLICATE_DELIVERY: 'DUPLICATE_DELIVERY',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  STORE_ERROR: 'STORE_ERROR',
  TRIGGER_PUBLISH_FAILED: 'TRIGGER_PUBLISH_FAILED',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: PipelineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface FieldIssue {
  path: string;
  message: string;
}

/**
 * Intake payload rejected before anything was written.
 */
export class ValidationError extends PipelineError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super(PipelineErrorCode.VALIDATION_ERROR, message, { issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A record the stage depends on is missing or not ready yet.
 */
export class PreconditionError extends PipelineError {
  readonly requestId: string;

  constructor(requestId: string, message: string) {
    super(PipelineErrorCode.PRECONDITION_FAILED, message, { requestId });
    this.name = 'PreconditionError';
    this.requestId = requestId;
  }
}

/**
 * The analysis or planning engine failed, returned garbage or timed out.
 */
export class ExternalFunctionError extends PipelineError {
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(PipelineErrorCode.EXTERNAL_FUNCTION_FAILED, message, {
      timedOut: options.timedOut ?? false,
    });
    this.name = 'ExternalFunctionError';
    this.timedOut = options.timedOut ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * A conditional create found the key taken, or a compare-and-set lost.
 */
export class StoreConflictError extends PipelineError {
  readonly collection: string;
  readonly key: string;

  constructor(collection: string, key: string, message?: string) {
    super(
      PipelineErrorCode.STORE_CONFLICT,
      message ?? `Document already exists: ${collection}/${key}`,
      { collection, key }
    );
    this.name = 'StoreConflictError';
    this.collection = collection;
    this.key = key;
  }
}

/**
 * The guard saw that this stage already ran (or is running) for the request.
 */
export class BusRedeliveryDuplicate extends PipelineError {
  readonly requestId: string;
  readonly existingStatus: string;

  constructor(requestId: string, existingStatus: string) {
    super(
      PipelineErrorCode.DUPLICATE_DELIVERY,
      `Duplicate delivery for ${requestId}: record already ${existingStatus}`,
      { requestId, existingStatus }
    );
    this.name = 'BusRedeliveryDuplicate';
    this.requestId = requestId;
    this.existingStatus = existingStatus;
  }
}

export class NotFoundError extends PipelineError {
  constructor(resource: string, id: string) {
    super(PipelineErrorCode.NOT_FOUND, `${resource} not found: ${id}`, { resource, id });
    this.name = 'NotFoundError';
  }
}

/**
 * An operator action does not apply to the record's current state.
 */
export class ConflictError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(PipelineErrorCode.CONFLICT, message, details);
    this.name = 'ConflictError';
  }
}

/**
 * Store I/O failed or a document did not match its schema.
 */
export class StoreError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(PipelineErrorCode.STORE_ERROR, message, details);
    this.name = 'StoreError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class TriggerPublishError extends PipelineError {
  readonly topic: string;
  readonly attempts: number;

  constructor(topic: string, attempts: number, cause?: unknown) {
    super(
      PipelineErrorCode.TRIGGER_PUBLISH_FAILED,
      `Failed to publish to ${topic} after ${attempts} attempt(s)`,
      { topic, attempts }
    );
    this.name = 'TriggerPublishError';
    this.topic = topic;
    this.attempts = attempts;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Narrow an unknown thrown value to a Node system error with the given code.
 */
export function hasErrorCode(error: unknown, code: string): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
