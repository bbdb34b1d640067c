import type { Logger } from 'pino';
import type { PipelineStage, RequestStatus } from '@relief-pipeline/shared';
import { createLogger } from '../utils/logger.js';

/**
 * Lifecycle of one stage record (a DamageReport or a LogisticsPlan).
 */
export type StageState =
  | 'triggered' // Trigger received, no record yet
  | 'pending' // Failed record reset by an operator, waiting for a trigger
  | 'running' // Claimed; placeholder written, engine call in flight
  | 'complete'
  | 'failed';

export type StageEvent =
  | 'CLAIM' // triggered | pending → running
  | 'COMPLETE' // running → complete
  | 'FAIL' // running → failed
  | 'RESET'; // failed → pending

export const STAGE_TRANSITIONS: Record<StageState, Partial<Record<StageEvent, StageState>>> = {
  triggered: {
    CLAIM: 'running',
  },
  pending: {
    CLAIM: 'running',
  },
  running: {
    COMPLETE: 'complete',
    FAIL: 'failed',
  },
  complete: {}, // Terminal
  failed: {
    RESET: 'pending', // Operator reprocess only
  },
};

/**
 * Status the owning Request takes when a stage record enters `state`.
 */
export function requestStatusFor(
  stage: PipelineStage,
  state: Exclude<StageState, 'triggered'>
): RequestStatus {
  switch (state) {
    case 'pending':
      return stage === 'damage' ? 'submitted' : 'analyzed';
    case 'running':
      return stage === 'damage' ? 'analyzing' : 'planning';
    case 'complete':
      return stage === 'damage' ? 'analyzed' : 'completed';
    case 'failed':
      return 'failed';
  }
}

const REQUEST_STATUS_RANK: Record<RequestStatus, number> = {
  submitted: 0,
  analyzing: 1,
  analyzed: 2,
  planning: 3,
  completed: 4,
  failed: 5,
};

/**
 * Whether a worker may move a Request from `from` to `to`. Workers only move
 * it forward and never out of `completed`; operator reprocess is the one path
 * back from `failed`.
 */
export function isRequestAdvance(from: RequestStatus, to: RequestStatus): boolean {
  if (from === 'completed') {
    return false;
  }
  return REQUEST_STATUS_RANK[to] > REQUEST_STATUS_RANK[from];
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly requestId: string,
    public readonly stage: PipelineStage,
    public readonly fromState: StageState,
    public readonly event: StageEvent,
    public readonly validEvents: StageEvent[]
  ) {
    super(
      `Invalid transition: Cannot apply '${event}' to ${stage} stage of ${requestId} ` +
        `in state '${fromState}'. Valid events: [${validEvents.join(', ')}]`
    );
    this.name = 'InvalidTransitionError';
  }
}

export interface StageMachineConfig {
  stage: PipelineStage;
  requestId: string;
  initialState?: StageState;
}

/**
 * Explicit transition table for one stage of one request. Workers drive it
 * while handling a delivery and persist `requestStatus` at each step.
 */
export class StageStateMachine {
  private readonly logger: Logger;
  private _currentState: StageState;

  constructor(private readonly config: StageMachineConfig) {
    this.logger = createLogger(`stage-machine:${config.stage}`);
    this._currentState = config.initialState ?? 'triggered';
  }

  get currentState(): StageState {
    return this._currentState;
  }

  /**
   * Status to persist on the owning Request for the current state.
   */
  get requestStatus(): RequestStatus {
    return requestStatusFor(this.config.stage, this.persistedState());
  }

  /**
   * Throws InvalidTransitionError if the event does not apply to the current state.
   */
  transition(event: StageEvent, metadata?: Record<string, unknown>): StageState {
    const validTransitions = STAGE_TRANSITIONS[this._currentState];
    const nextState = validTransitions[event];

    if (!nextState) {
      throw new InvalidTransitionError(
        this.config.requestId,
        this.config.stage,
        this._currentState,
        event,
        this.getValidEvents()
      );
    }

    const previousState = this._currentState;
    this._currentState = nextState;

    this.logger.debug(
      { requestId: this.config.requestId, from: previousState, to: nextState, event, ...metadata },
      'Stage transition'
    );

    return nextState;
  }

  claim(metadata?: Record<string, unknown>): void {
    this.transition('CLAIM', metadata);
  }

  complete(metadata?: Record<string, unknown>): void {
    this.transition('COMPLETE', metadata);
  }

  fail(error: string): void {
    this.transition('FAIL', { error });
  }

  reset(metadata?: Record<string, unknown>): void {
    this.transition('RESET', metadata);
  }

  private getValidEvents(): StageEvent[] {
    const valid = STAGE_TRANSITIONS[this._currentState];
    return (['CLAIM', 'COMPLETE', 'FAIL', 'RESET'] as const).filter((e) => valid[e] !== undefined);
  }

  private persistedState(): Exclude<StageState, 'triggered'> {
    if (this._currentState === 'triggered') {
      throw new Error(`No ${this.config.stage} record exists for ${this.config.requestId} before it is claimed`);
    }
    return this._currentState;
  }
}
