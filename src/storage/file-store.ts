/**
 * File-backed storage.
 *
 * Layout under the state directory:
 *
 *   runs/<runId>.json     one RunRecord per run (report included once terminal)
 *   cancel/<runId>.json   pending cancellation request
 *   audit.jsonl           append-only audit trail
 *
 * Writes go through a temp file and a rename so a concurrent reader (e.g.
 * `deckhand show` while a run is in progress) never sees a torn record.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuid } from 'uuid';
import { AuditRecord } from '../domain/audit';
import { createTypedError, DeckhandError } from '../domain/errors';
import { CancellationRequest, RunRecord, RunStatus } from '../domain/run';
import { isRecord } from '../dsl/validator';
import { AuditStore, CancellationStore, ListOptions, RunStore, Store, applyListOptions } from './store';

const SAFE_ID = /^[A-Za-z0-9_-]+$/;
const RUN_STATUSES: ReadonlySet<string> = new Set(Object.values(RunStatus));

function assertSafeId(id: string): void {
  if (!SAFE_ID.test(id)) {
    throw new DeckhandError(
      createTypedError({ code: 'STORE.INVALID_ID', message: `"${id}" is not a valid run id`, runId: id }),
    );
  }
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

async function readJson(file: string): Promise<unknown> {
  try {
    const text = await fs.readFile(file, 'utf8');
    return JSON.parse(text);
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

async function writeJsonAtomic(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${uuid()}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf8');
  await fs.rename(tmp, file);
}

export function isRunRecord(value: unknown): value is RunRecord {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.manifestName === 'string' &&
    typeof value.status === 'string' &&
    RUN_STATUSES.has(value.status) &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string'
  );
}

function isCancellationRequest(value: unknown): value is CancellationRequest {
  return isRecord(value) && typeof value.requestedBy === 'string' && typeof value.requestedAt === 'string';
}

function isAuditRecord(value: unknown): value is AuditRecord {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.action === 'string' &&
    typeof value.resourceId === 'string'
  );
}

class FileRunStore implements RunStore {
  constructor(private dir: string) {}

  private fileFor(id: string): string {
    assertSafeId(id);
    return path.join(this.dir, `${id}.json`);
  }

  async create(run: RunRecord): Promise<RunRecord> {
    await writeJsonAtomic(this.fileFor(run.id), run);
    return run;
  }

  async getById(id: string): Promise<RunRecord | null> {
    if (!SAFE_ID.test(id)) return null;
    const value = await readJson(this.fileFor(id));
    return isRunRecord(value) ? value : null;
  }

  async update(id: string, updates: Partial<RunRecord>): Promise<RunRecord | null> {
    const existing = await this.getById(id);
    if (!existing) return null;
    const updated: RunRecord = { ...existing, ...updates, id, updatedAt: new Date().toISOString() };
    await writeJsonAtomic(this.fileFor(id), updated);
    return updated;
  }

  async list(options?: ListOptions): Promise<RunRecord[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const runs: RunRecord[] = [];
    for (const name of names) {
      if (!name.endsWith('.json')) continue;
      const value = await readJson(path.join(this.dir, name));
      if (isRunRecord(value)) runs.push(value);
    }
    runs.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return applyListOptions(runs, options);
  }
}

class FileCancellationStore implements CancellationStore {
  constructor(private dir: string) {}

  private fileFor(runId: string): string {
    assertSafeId(runId);
    return path.join(this.dir, `${runId}.json`);
  }

  async request(runId: string, request: CancellationRequest): Promise<void> {
    if (await this.get(runId)) return;
    await writeJsonAtomic(this.fileFor(runId), request);
  }

  async get(runId: string): Promise<CancellationRequest | null> {
    if (!SAFE_ID.test(runId)) return null;
    const value = await readJson(this.fileFor(runId));
    return isCancellationRequest(value) ? value : null;
  }

  async clear(runId: string): Promise<void> {
    try {
      await fs.unlink(this.fileFor(runId));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }
}

class FileAuditStore implements AuditStore {
  constructor(private file: string) {}

  async create(record: AuditRecord): Promise<AuditRecord> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.appendFile(this.file, JSON.stringify(record) + '\n', 'utf8');
    return record;
  }

  async listByResource(resourceId: string, options?: ListOptions): Promise<AuditRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const records: AuditRecord[] = [];
    for (const line of text.split('\n')) {
      if (line.trim() === '') continue;
      const value: unknown = JSON.parse(line);
      if (isAuditRecord(value) && value.resourceId === resourceId) records.push(value);
    }
    return applyListOptions(records, options);
  }
}

/** Create a store rooted at `stateDir`. Directories are created on first write. */
export function createFileStore(stateDir: string): Store {
  return {
    runs: new FileRunStore(path.join(stateDir, 'runs')),
    cancellations: new FileCancellationStore(path.join(stateDir, 'cancel')),
    audit: new FileAuditStore(path.join(stateDir, 'audit.jsonl')),
  };
}
