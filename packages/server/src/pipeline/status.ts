import type {
  DamageReport,
  LogisticsPlan,
  PipelineProgress,
  PipelineStatusView,
} from '@relief-pipeline/shared';
import type { StateStore } from '../store/types.js';
import { NotFoundError } from './errors.js';

export function deriveProgress(
  damageReport: DamageReport | null,
  logisticsPlan: LogisticsPlan | null
): PipelineProgress {
  if (damageReport?.status === 'failed' || logisticsPlan?.status === 'failed') {
    return 'failed';
  }
  if (logisticsPlan?.status === 'complete') {
    return 'done';
  }
  if (damageReport?.status === 'complete') {
    return 'logistics_planning';
  }
  if (damageReport) {
    return 'damage_analysis';
  }
  return 'intake';
}

/**
 * Read the three records of a request. Throws NotFoundError for an unknown id.
 */
export async function getPipelineStatus(
  store: StateStore,
  requestId: string
): Promise<PipelineStatusView> {
  const [request, damageReport, logisticsPlan] = await Promise.all([
    store.read('requests', requestId),
    store.read('damage_reports', requestId),
    store.read('logistics_plans', requestId),
  ]);

  if (!request) {
    throw new NotFoundError('Request', requestId);
  }

  return {
    requestId,
    progress: deriveProgress(damageReport, logisticsPlan),
    request,
    damageReport,
    logisticsPlan,
  };
}
