/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Values are deep
 * copied on the way in and out: a caller mutating a returned record never
 * corrupts the store's copy.
 */

import { AuditRecord } from '../domain/audit';
import { CancellationRequest, RunRecord } from '../domain/run';
import { AuditStore, CancellationStore, ListOptions, RunStore, Store, applyListOptions } from './store';

export function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, RunRecord>();

  async create(run: RunRecord): Promise<RunRecord> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<RunRecord | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<RunRecord>): Promise<RunRecord | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: RunRecord = {
      ...deepCopy(existing),
      ...deepCopy(updates),
      id,
      updatedAt: new Date().toISOString(),
    };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<RunRecord[]> {
    const items = [...this.data.values()].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return applyListOptions(items.map(deepCopy), options);
  }
}

class MemoryCancellationStore implements CancellationStore {
  private data = new Map<string, CancellationRequest>();

  async request(runId: string, request: CancellationRequest): Promise<void> {
    // First request wins; later ones are no-ops.
    if (!this.data.has(runId)) this.data.set(runId, deepCopy(request));
  }

  async get(runId: string): Promise<CancellationRequest | null> {
    const request = this.data.get(runId);
    return request ? deepCopy(request) : null;
  }

  async clear(runId: string): Promise<void> {
    this.data.delete(runId);
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async listByResource(resourceId: string, options?: ListOptions): Promise<AuditRecord[]> {
    const items = this.data.filter((r) => r.resourceId === resourceId);
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a fresh in-memory store. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
    cancellations: new MemoryCancellationStore(),
    audit: new MemoryAuditStore(),
  };
}
