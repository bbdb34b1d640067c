/**
 * Operator Resource API
 */

import { z } from 'zod';
import {
  auditEventViewSchema,
  deadLetterSummarySchema,
  reconcileReportSchema,
} from '@relief-pipeline/shared';
import type { AuditEventView, DeadLetterSummary, ReconcileReport, RequestFn } from '../types.js';

export interface ReconcileOptions {
  /** Report stuck requests without repairing them */
  dryRun?: boolean;
}

const deadLetterListSchema = z.array(deadLetterSummarySchema);
const auditTrailSchema = z.array(auditEventViewSchema);

export class OperatorResource {
  constructor(private request: RequestFn) {}

  /**
   * Scan for stuck requests and republish or fail them
   */
  async reconcile(options: ReconcileOptions = {}): Promise<ReconcileReport> {
    return this.request('POST', '/api/v1/reconcile', reconcileReportSchema, {
      body: { dryRun: options.dryRun ?? false },
    });
  }

  async deadLetters(): Promise<DeadLetterSummary[]> {
    return this.request('GET', '/api/v1/dead-letters', deadLetterListSchema);
  }

  /**
   * Audit trail of one request, oldest first
   */
  async audit(requestId: string): Promise<AuditEventView[]> {
    return this.request(
      'GET',
      `/api/v1/audit/${encodeURIComponent(requestId)}`,
      auditTrailSchema
    );
  }
}
