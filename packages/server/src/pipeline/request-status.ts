import type { RequestStatus } from '@relief-pipeline/shared';
import type { StateStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';
import { NotFoundError, StoreConflictError } from './errors.js';
import { isRequestAdvance } from './stage-machine.js';

const log = createLogger('request-status');

/**
 * Move a Request to `status` unless it is already there or further along.
 * The write is a compare-and-set on the status read, so a late write from a
 * slow worker cannot overwrite a later stage's status.
 *
 * Returns whether the status was written.
 */
export async function advanceRequestStatus(
  store: StateStore,
  requestId: string,
  status: RequestStatus,
  updatedAt: string = new Date().toISOString()
): Promise<boolean> {
  for (;;) {
    const request = await store.read('requests', requestId);
    if (!request) {
      throw new NotFoundError('Request', requestId);
    }
    if (!isRequestAdvance(request.status, status)) {
      log.debug({ requestId, current: request.status, status }, 'Request status not advanced');
      return false;
    }

    try {
      await store.update('requests', requestId, { status, updatedAt }, { expectStatus: request.status });
      return true;
    } catch (error) {
      if (!(error instanceof StoreConflictError)) {
        throw error;
      }
      log.debug({ requestId, status }, 'Request status changed concurrently; re-reading');
    }
  }
}
