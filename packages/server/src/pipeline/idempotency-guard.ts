import { claimKey, type ClaimRecord, type PipelineStage } from '@relief-pipeline/shared';
import type { StateStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';
import { StoreConflictError } from './errors.js';

const log = createLogger('idempotency-guard');

export type ClaimResult =
  | { acquired: true; claim: ClaimRecord }
  | { acquired: false; reason: 'already_owned_or_done'; existing: ClaimRecord | null };

/**
 * Single-winner claims over `{stage}:{requestId}:{attempt}` keys, backed by a
 * conditional create in the `claims` collection. Claims are never released;
 * an operator reprocess bumps the attempt instead.
 */
export class IdempotencyGuard {
  constructor(
    private readonly store: StateStore,
    private readonly owner: string
  ) {}

  async claim(stage: PipelineStage, requestId: string, attempt: number): Promise<ClaimResult> {
    const key = claimKey(stage, requestId, attempt);
    const record: ClaimRecord = {
      key,
      stage,
      requestId,
      attempt,
      owner: this.owner,
      claimedAt: new Date().toISOString(),
    };

    try {
      const claim = await this.store.create('claims', key, record);
      log.debug({ key, owner: this.owner }, 'Claim acquired');
      return { acquired: true, claim };
    } catch (error) {
      if (!(error instanceof StoreConflictError)) {
        throw error;
      }
      const existing = await this.store.read('claims', key);
      log.info({ key, owner: this.owner, holder: existing?.owner }, 'Claim already held');
      return { acquired: false, reason: 'already_owned_or_done', existing };
    }
  }
}
