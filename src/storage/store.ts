/**
 * Storage layer interfaces.
 *
 * Defines the contract for run persistence with pluggable backends: an
 * in-memory store (tests, the HTTP server) and a file-backed store (CLI,
 * so `show` and `cancel` work across processes).
 */

import { AuditRecord } from '../domain/audit';
import { CancellationRequest, RunRecord } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for runs. */
export interface RunStore {
  create(run: RunRecord): Promise<RunRecord>;
  getById(id: string): Promise<RunRecord | null>;
  update(id: string, updates: Partial<RunRecord>): Promise<RunRecord | null>;
  /** Most recently created first. */
  list(options?: ListOptions): Promise<RunRecord[]>;
}

/**
 * Store interface for cancellation requests.
 * A request may be recorded before the run it targets has been seen by this
 * process; the executor polls for it.
 */
export interface CancellationStore {
  request(runId: string, request: CancellationRequest): Promise<void>;
  get(runId: string): Promise<CancellationRequest | null>;
  clear(runId: string): Promise<void>;
}

/** Store interface for audit records. */
export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  listByResource(resourceId: string, options?: ListOptions): Promise<AuditRecord[]>;
}

/** Apply offset/limit to an already-ordered list. */
export function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/** Composite store interface. */
export interface Store {
  runs: RunStore;
  cancellations: CancellationStore;
  audit: AuditStore;
}
