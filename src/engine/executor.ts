/**
 * Deployment Executor: the core orchestration engine.
 *
 * Drives a run through plan -> reconcile -> execute -> report -> notify:
 *
 *   const executor = new DeploymentExecutor({ transport, credentials, store, config });
 *   const run = await executor.createRun(manifest, inventory, 'alice');
 *   const report = await executor.executeRun(run.id);
 *
 * Manifest and graph errors surface from createRun, before any remote
 * action. Cancellation requests arrive in-process (cancelRun) or through the
 * store from another process; both feed the run's CancellationToken.
 */

import { v4 as uuid } from 'uuid';
import { AuditService } from '../audit/audit-service';
import { DeckhandConfig } from '../config';
import {
  DeckhandError,
  TypedError,
  runAlreadyFinishedError,
  runAlreadyRunningError,
  runNotFoundError,
  toTypedError,
} from '../domain/errors';
import { Inventory } from '../domain/inventory';
import { Manifest } from '../domain/manifest';
import { CancellationRequest, PlanReport, RunRecord, RunReport, RunStatus, isTerminalRunStatus } from '../domain/run';
import { TaskGraph, buildTaskGraph } from '../graph/task-graph';
import { CredentialResolver } from '../inventory/credentials';
import { Logger, logger as rootLogger } from '../logger';
import { Notifier } from '../notifications/webhook';
import { StateReconciler } from '../reconciler/reconciler';
import { Store } from '../storage/store';
import { Transport } from '../transport/transport';
import { CancellationToken } from './cancellation';
import { sleep as realSleep } from './pool';
import { buildPlanReport, buildRunReport } from './report';
import { GraphScheduler, SchedulerHooks } from './scheduler';
import { transitionRunStatus } from './state-machine';

export type ExecutorConfig = Pick<
  DeckhandConfig,
  | 'maxConcurrency'
  | 'maxAttempts'
  | 'backoffBaseMs'
  | 'backoffMaxMs'
  | 'operationTimeoutMs'
  | 'probeTimeoutMs'
  | 'matchMode'
  | 'redactEnv'
>;

export interface ExecutorDependencies {
  transport: Transport;
  credentials: CredentialResolver;
  store: Store;
  config: ExecutorConfig;
  notifier?: Notifier;
  log?: Logger;
  /** Backoff sleep; tests pass a fake. */
  sleep?: (ms: number) => Promise<void>;
  /** How often the store is checked for cross-process cancellation. */
  cancelPollIntervalMs?: number;
  hooks?: SchedulerHooks;
  /** Source of secret values for redaction. */
  env?: NodeJS.ProcessEnv;
}

interface PreparedRun {
  graph: TaskGraph;
  inventory: Inventory;
  actor: string;
}

const DEFAULT_CANCEL_POLL_MS = 1000;

/** The deployment executor. */
export class DeploymentExecutor {
  private log: Logger;
  private audit: AuditService;
  private prepared = new Map<string, PreparedRun>();
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Map<string, CancellationToken>();

  constructor(private deps: ExecutorDependencies) {
    this.log = (deps.log ?? rootLogger).child({ component: 'executor' });
    this.audit = new AuditService(deps.store);
  }

  /** Build and reconcile without executing anything. */
  async plan(manifest: Manifest, inventory: Inventory, actor = 'cli'): Promise<PlanReport> {
    const graph = this.buildGraph(manifest, inventory);
    const plan = await this.reconciler(inventory).reconcile(graph, inventory);
    const report = buildPlanReport(graph, plan);
    await this.audit.record({
      actorId: actor,
      action: 'plan.created',
      resourceType: 'plan',
      resourceId: manifest.name,
      outcome: 'success',
      details: {
        operations: report.operations.length,
        toExecute: plan.executionSet.length,
        probeFailures: plan.probeFailures.length,
      },
    });
    return report;
  }

  /** Validate the graph and register a planned run. */
  async createRun(manifest: Manifest, inventory: Inventory, actor = 'cli'): Promise<RunRecord> {
    const graph = this.buildGraph(manifest, inventory);
    const now = new Date().toISOString();
    const run: RunRecord = {
      id: `run_${uuid()}`,
      manifestName: manifest.name,
      status: RunStatus.Planned,
      createdAt: now,
      updatedAt: now,
    };
    await this.deps.store.runs.create(run);
    this.prepared.set(run.id, { graph, inventory, actor });
    this.log.info('Run created', { runId: run.id, manifest: manifest.name, operations: graph.order.length });
    return run;
  }

  /** Execute a run created by this executor. Resolves with the frozen report. */
  async executeRun(runId: string): Promise<RunReport> {
    if (this.runningRuns.has(runId)) {
      throw new DeckhandError(runAlreadyRunningError(runId));
    }
    // Claimed before the first await so a concurrent call sees it.
    const token = new CancellationToken();
    this.runningRuns.set(runId, token);
    try {
      const record = await this.deps.store.runs.getById(runId);
      if (!record) throw new DeckhandError(runNotFoundError(runId));
      if (isTerminalRunStatus(record.status)) {
        throw new DeckhandError(runAlreadyFinishedError(runId, record.status));
      }
      const prepared = this.prepared.get(runId);
      if (!prepared) throw new DeckhandError(runNotFoundError(runId));
      return await this.executeRunInternal(record, prepared, token);
    } finally {
      this.runningRuns.delete(runId);
      this.prepared.delete(runId);
    }
  }

  /** Create and execute in one step. */
  async run(manifest: Manifest, inventory: Inventory, actor = 'cli'): Promise<RunReport> {
    const record = await this.createRun(manifest, inventory, actor);
    return this.executeRun(record.id);
  }

  /**
   * Request cancellation. Takes effect at the next dispatch boundary of a
   * run in this process, or at the next poll of a run in another process.
   */
  async cancelRun(runId: string, requestedBy: string, reason?: string): Promise<RunRecord> {
    const record = await requestRunCancellation(this.deps.store, runId, requestedBy, reason);
    this.runningRuns.get(runId)?.cancel(requestedBy, reason);
    this.log.warn('Cancellation requested', { runId, requestedBy, reason });
    return record;
  }

  private async executeRunInternal(record: RunRecord, prepared: PreparedRun, token: CancellationToken): Promise<RunReport> {
    const { graph, inventory, actor } = prepared;
    const runLog = this.log.child({ runId: record.id });
    const startedAt = new Date().toISOString();

    let status = this.transitionRun(record.status, RunStatus.Running);
    await this.deps.store.runs.update(record.id, { status });
    await this.audit.record({
      actorId: actor,
      action: 'run.started',
      resourceType: 'run',
      resourceId: record.id,
      outcome: 'success',
      details: { manifest: graph.manifestName, operations: graph.order.length, hosts: inventory.hosts.length },
    });
    runLog.info('Run started', { manifest: graph.manifestName, operations: graph.order.length });

    const stopPolling = this.pollCancellation(record.id, token, runLog);
    let report: RunReport;
    try {
      const plan = await this.reconciler(inventory).reconcile(graph, inventory);
      const scheduler = new GraphScheduler(
        this.deps.transport,
        this.deps.credentials,
        {
          maxConcurrency: this.deps.config.maxConcurrency ?? Math.max(1, inventory.hosts.length),
          retry: { backoffBaseMs: this.deps.config.backoffBaseMs, backoffMaxMs: this.deps.config.backoffMaxMs },
          redact: this.redactions(),
          sleep: this.deps.sleep ?? realSleep,
        },
        runLog,
        this.deps.hooks,
      );
      const outcome = await scheduler.execute({ runId: record.id, graph, inventory, plan, cancellation: token });
      report = buildRunReport({
        runId: record.id,
        graph,
        plan,
        results: outcome.results,
        startedAt,
        cancellation: token.cancellation,
      });
    } catch (err) {
      stopPolling();
      const error = { ...toTypedError(err), runId: record.id };
      await this.failRun(record.id, status, error, actor);
      throw err;
    }
    stopPolling();

    status = this.transitionRun(status, report.outcome);
    await this.deps.store.runs.update(record.id, { status, report, cancellation: report.cancellation });
    await this.deps.store.cancellations.clear(record.id);
    await this.audit.record({
      actorId: actor,
      action: 'run.completed',
      resourceType: 'run',
      resourceId: record.id,
      outcome: auditOutcome(report.outcome),
      details: { durationMs: report.durationMs, rootCauses: report.rootCauses.map((c) => c.operationId) },
    });
    runLog.info('Run finished', { outcome: report.outcome, durationMs: report.durationMs });

    if (this.deps.notifier) await this.deps.notifier.notify(report);
    return report;
  }

  /** Periodically copy persisted cancellation requests onto the token. */
  private pollCancellation(runId: string, token: CancellationToken, log: Logger): () => void {
    const check = async (): Promise<void> => {
      if (token.isCancelled) return;
      try {
        const request = await this.deps.store.cancellations.get(runId);
        if (request) token.cancel(request.requestedBy, request.reason);
      } catch (err) {
        log.warn('Cancellation check failed', { error: err instanceof Error ? err.message : String(err) });
      }
    };
    void check();
    const timer = setInterval(() => void check(), this.deps.cancelPollIntervalMs ?? DEFAULT_CANCEL_POLL_MS);
    timer.unref();
    return () => clearInterval(timer);
  }

  private buildGraph(manifest: Manifest, inventory: Inventory): TaskGraph {
    return buildTaskGraph(manifest, inventory, {
      timeoutMs: this.deps.config.operationTimeoutMs,
      maxAttempts: this.deps.config.maxAttempts,
    });
  }

  private reconciler(inventory: Inventory): StateReconciler {
    return new StateReconciler(
      this.deps.transport,
      this.deps.credentials,
      {
        matchMode: this.deps.config.matchMode,
        probeTimeoutMs: this.deps.config.probeTimeoutMs,
        concurrency: this.deps.config.maxConcurrency ?? Math.max(1, inventory.hosts.length),
      },
      this.log,
    );
  }

  private redactions(): string[] {
    const env = this.deps.env ?? process.env;
    return this.deps.config.redactEnv.flatMap((name) => {
      const value = env[name];
      return value ? [value] : [];
    });
  }

  private transitionRun(current: RunStatus, target: RunStatus): RunStatus {
    const result = transitionRunStatus(current, target);
    if (!result.success) throw new DeckhandError(result.error);
    return result.newStatus;
  }

  private async failRun(runId: string, current: RunStatus, error: TypedError, actor: string): Promise<void> {
    this.log.error('Run aborted', { runId, code: error.code, message: error.message });
    const status = this.transitionRun(current, RunStatus.Failed);
    await this.deps.store.runs.update(runId, { status, error });
    await this.deps.store.cancellations.clear(runId);
    await this.audit.record({
      actorId: actor,
      action: 'run.completed',
      resourceType: 'run',
      resourceId: runId,
      outcome: 'failure',
      details: { code: error.code },
    });
  }
}

/**
 * Persist a cancellation request for a run that has not finished. Needs only
 * the store, so `deckhand cancel` can reach a run owned by another process.
 */
export async function requestRunCancellation(
  store: Store,
  runId: string,
  requestedBy: string,
  reason?: string,
): Promise<RunRecord> {
  const record = await store.runs.getById(runId);
  if (!record) throw new DeckhandError(runNotFoundError(runId));
  if (isTerminalRunStatus(record.status)) {
    throw new DeckhandError(runAlreadyFinishedError(runId, record.status));
  }

  const request: CancellationRequest = { requestedBy, requestedAt: new Date().toISOString(), reason };
  await store.cancellations.request(runId, request);
  const updated = (await store.runs.update(runId, { cancellation: record.cancellation ?? request })) ?? record;

  await new AuditService(store).record({
    actorId: requestedBy,
    action: 'run.cancel_requested',
    resourceType: 'run',
    resourceId: runId,
    outcome: 'success',
    details: reason ? { reason } : undefined,
  });
  return updated;
}

function auditOutcome(outcome: RunStatus): 'success' | 'failure' | 'cancelled' {
  if (outcome === RunStatus.Succeeded) return 'success';
  if (outcome === RunStatus.Cancelled) return 'cancelled';
  return 'failure';
}
