/**
 * Graph scheduler: executes the reconciled graph.
 *
 * A bounded pool of workers drains the frontier. Operations on one host run
 * strictly one at a time in topological order; operations on different
 * hosts run concurrently unless a declared dependency orders them. All
 * bookkeeping (statuses, host locks, the frontier) is mutated only inside
 * pump(), which runs on the event loop between awaits, so there is a single
 * writer. A fatal failure blocks every transitive dependent; unrelated
 * subgraphs keep going.
 */

import { DeckhandError, createTypedError, toTypedError } from '../domain/errors';
import { Inventory } from '../domain/inventory';
import { Operation } from '../domain/operation';
import { ExecutionResult, OperationStatus, satisfiesDependency } from '../domain/run';
import { TaskGraph, transitiveDependents } from '../graph/task-graph';
import { CredentialResolver } from '../inventory/credentials';
import { getHost } from '../inventory/inventory';
import { Logger } from '../logger';
import { ReconcilePlan } from '../reconciler/reconciler';
import { Transport } from '../transport/transport';
import { CancellationToken } from './cancellation';
import { OperationRunOutcome, RetryPolicy, runOperation } from './operation-runner';
import { transitionOperationStatus } from './state-machine';

export interface SchedulerOptions {
  /** Worker pool size. */
  maxConcurrency: number;
  retry: RetryPolicy;
  redact: string[];
  sleep: (ms: number) => Promise<void>;
}

export interface ScheduleInput {
  runId: string;
  graph: TaskGraph;
  inventory: Inventory;
  plan: ReconcilePlan;
  cancellation: CancellationToken;
}

export interface ScheduleOutcome {
  /** Final result per operation, in topological order. */
  results: ExecutionResult[];
  cancelled: boolean;
}

/** Lifecycle hooks for observers (progress output, tests). */
export interface SchedulerHooks {
  onDispatch?(operation: Operation): void;
  onSettled?(result: ExecutionResult): void;
}

export class GraphScheduler {
  constructor(
    private transport: Transport,
    private credentials: CredentialResolver,
    private options: SchedulerOptions,
    private log: Logger,
    private hooks: SchedulerHooks = {},
  ) {}

  execute(input: ScheduleInput): Promise<ScheduleOutcome> {
    const { graph, plan, cancellation } = input;
    const position = new Map(graph.order.map((id, index) => [id, index]));
    const results = new Map<string, ExecutionResult>();

    for (const id of graph.order) {
      const op = requireOperation(graph, id);
      const reason = plan.satisfied.get(id);
      results.set(id, {
        ...baseResult(op),
        status: reason ? OperationStatus.SkippedAlreadySatisfied : OperationStatus.Pending,
        skipReason: reason,
      });
    }

    // Per-host queues of executable operations, in topological order.
    const hostQueues = new Map<string, string[]>();
    for (const id of plan.executionSet) {
      const op = requireOperation(graph, id);
      const queue = hostQueues.get(op.hostId) ?? [];
      queue.push(id);
      hostQueues.set(op.hostId, queue);
    }

    const busyHosts = new Set<string>();
    let inFlight = 0;
    let cancelled = false;
    let finished = false;

    return new Promise<ScheduleOutcome>((resolve, reject) => {
      const setStatus = (id: string, target: OperationStatus, patch: Partial<ExecutionResult> = {}) => {
        const current = results.get(id);
        if (!current) return;
        const transition = transitionOperationStatus(id, current.status, target);
        if (!transition.success) throw new DeckhandError(transition.error);
        results.set(id, { ...current, ...patch, status: transition.newStatus });
      };

      const isTerminal = (id: string) => {
        const status = results.get(id)?.status;
        return status !== OperationStatus.Pending && status !== OperationStatus.Queued;
      };

      const cancelRemaining = () => {
        for (const [id, result] of results) {
          if (result.status === OperationStatus.Pending || result.status === OperationStatus.Queued) {
            setStatus(id, OperationStatus.SkippedCancelled, { completedAt: new Date().toISOString() });
            this.hooks.onSettled?.(results.get(id) ?? result);
          }
        }
      };

      const blockDependents = (failedId: string) => {
        for (const dependent of transitiveDependents(graph, failedId)) {
          const result = results.get(dependent);
          if (result && (result.status === OperationStatus.Pending || result.status === OperationStatus.Queued)) {
            setStatus(dependent, OperationStatus.SkippedBlockedByFailure, {
              blockedBy: failedId,
              completedAt: new Date().toISOString(),
            });
            this.log.warn('Operation blocked by upstream failure', { operationId: dependent, blockedBy: failedId });
            this.hooks.onSettled?.(results.get(dependent) ?? result);
          }
        }
      };

      const pump = () => {
        if (finished) return;
        try {
          step();
        } catch (err) {
          abandon(err);
        }
      };

      const step = () => {
        if (cancellation.isCancelled && !cancelled) {
          cancelled = true;
          this.log.warn('Cancellation requested; no further operations will be dispatched', {
            inFlight,
            requestedBy: cancellation.cancellation?.requestedBy,
          });
          cancelRemaining();
        }

        if (!cancelled) {
          // Frontier: the head of each idle host's queue, once its dependencies are satisfied.
          const frontier: string[] = [];
          for (const [hostId, queue] of hostQueues) {
            while (queue.length > 0 && isTerminal(queue[0])) queue.shift();
            const head = queue[0];
            if (head === undefined) continue;
            const op = requireOperation(graph, head);
            const ready = op.dependencies.every((dep) => satisfiesDependency(results.get(dep)?.status ?? OperationStatus.Pending));
            if (!ready) continue;
            if (results.get(head)?.status === OperationStatus.Pending) setStatus(head, OperationStatus.Queued);
            if (!busyHosts.has(hostId)) frontier.push(head);
          }
          frontier.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));

          for (const id of frontier) {
            if (inFlight >= this.options.maxConcurrency || cancellation.isCancelled) break;
            void dispatch(requireOperation(graph, id));
          }
        }

        if (inFlight === 0) {
          finished = true;
          unsubscribe();
          resolve({ results: graph.order.map((id) => results.get(id)).filter(isDefined), cancelled });
        }
      };

      const abandon = (err: unknown) => {
        // Bookkeeping invariant violated; abandon the schedule.
        finished = true;
        unsubscribe();
        reject(err);
      };

      const dispatch = (op: Operation) => {
        setStatus(op.id, OperationStatus.Running, { startedAt: new Date().toISOString() });
        busyHosts.add(op.hostId);
        inFlight++;
        this.hooks.onDispatch?.(op);
        void settle(op);
      };

      const settle = async (op: Operation): Promise<void> => {
        const opLog = this.log.child({ operationId: op.id, hostId: op.hostId, action: op.action });
        opLog.info('Dispatching operation');

        let outcome: OperationRunOutcome;
        try {
          outcome = await this.runOne(input, op, opLog);
        } catch (err) {
          const now = new Date().toISOString();
          outcome = {
            status: OperationStatus.FailedFatal,
            attempts: [],
            error: { ...toTypedError(err, 'OPERATION.EXECUTION_ERROR'), operationId: op.id, hostId: op.hostId },
            startedAt: now,
            completedAt: now,
            durationMs: 0,
          };
        }

        try {
          setStatus(op.id, outcome.status, {
            attempts: outcome.attempts.length,
            attemptLog: outcome.attempts,
            durationMs: outcome.durationMs,
            output: outcome.output,
            error: outcome.error,
            completedAt: outcome.completedAt,
          });
          busyHosts.delete(op.hostId);
          inFlight--;
          this.hooks.onSettled?.(results.get(op.id) ?? baseResult(op));

          if (outcome.status === OperationStatus.FailedFatal) {
            blockDependents(op.id);
          } else {
            opLog.info('Operation succeeded', { attempts: outcome.attempts.length, durationMs: outcome.durationMs });
          }
        } catch (err) {
          abandon(err);
          return;
        }
        pump();
      };

      // Deferred so a cancel raised from inside a dispatch cannot re-enter step().
      const unsubscribe = cancellation.onCancel(() => queueMicrotask(pump));
      pump();
    });
  }

  private async runOne(input: ScheduleInput, op: Operation, log: Logger): Promise<OperationRunOutcome> {
    const host = getHost(input.inventory, op.hostId);
    if (!host) {
      throw new DeckhandError(
        createTypedError({ code: 'INVENTORY.UNKNOWN_HOST', message: `Host "${op.hostId}" is not in the inventory`, hostId: op.hostId }),
      );
    }
    return runOperation(op, {
      runId: input.runId,
      host,
      credential: this.credentials.resolve(host.credentialRef),
      transport: this.transport,
      retry: this.options.retry,
      redact: this.options.redact,
      log,
      sleep: this.options.sleep,
    });
  }
}

function requireOperation(graph: TaskGraph, id: string): Operation {
  const op = graph.operations.get(id);
  if (!op) {
    throw new DeckhandError(createTypedError({ code: 'GRAPH.UNKNOWN_OPERATION', message: `Operation "${id}" is not in the graph`, operationId: id }));
  }
  return op;
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

function baseResult(op: Operation): ExecutionResult {
  return {
    operationId: op.id,
    hostId: op.hostId,
    role: op.role,
    action: op.action,
    idempotencyKey: op.idempotencyKey,
    status: OperationStatus.Pending,
    attempts: 0,
    durationMs: 0,
    attemptLog: [],
  };
}
