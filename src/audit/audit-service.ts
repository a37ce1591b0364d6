/**
 * Audit Trail Service.
 *
 * Records immutable, queryable audit records for plans and runs.
 */

import { v4 as uuid } from 'uuid';
import { AuditAction, AuditOutcome, AuditRecord, AuditResourceType } from '../domain/audit';
import { Store } from '../storage/store';

/** Input for creating an audit record. */
export interface AuditInput {
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  details?: Record<string, unknown>;
}

/** Audit query options. */
export interface AuditQueryOptions {
  resourceId: string;
  limit?: number;
  offset?: number;
}

/** The audit service. */
export class AuditService {
  constructor(private store: Store) {}

  /** Record an audit event. */
  async record(input: AuditInput): Promise<AuditRecord> {
    const record: AuditRecord = {
      id: `aud_${uuid()}`,
      timestamp: new Date().toISOString(),
      actorId: input.actorId,
      action: input.action,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      outcome: input.outcome,
      details: input.details,
    };

    return this.store.audit.create(record);
  }

  /** Audit records for one run or plan, oldest first. */
  async query(options: AuditQueryOptions): Promise<AuditRecord[]> {
    return this.store.audit.listByResource(options.resourceId, {
      limit: options.limit,
      offset: options.offset,
    });
  }
}
