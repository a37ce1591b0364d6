/**
 * Audit trail domain model.
 *
 * Immutable records of who planned, started, cancelled and finished which
 * deployment run.
 */

/** Audit event categories. */
export type AuditAction = 'plan.created' | 'run.started' | 'run.completed' | 'run.cancel_requested';

/** Resource types for audit records. */
export type AuditResourceType = 'run' | 'plan';

/** Audit outcome. */
export type AuditOutcome = 'success' | 'failure' | 'cancelled';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  timestamp: string;
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  /** Additional context about the action. */
  details?: Record<string, unknown>;
}
