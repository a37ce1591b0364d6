/**
 * Run report assembly.
 */

import { HostState } from '../domain/inventory';
import {
  CancellationRequest,
  ExecutionResult,
  OperationStatus,
  OutcomeCounts,
  PlanReport,
  RootCause,
  RunOutcome,
  RunReport,
  RunStatus,
} from '../domain/run';
import { TaskGraph } from '../graph/task-graph';
import { ReconcilePlan } from '../reconciler/reconciler';

export interface ReportInput {
  runId: string;
  graph: TaskGraph;
  plan: ReconcilePlan;
  results: ExecutionResult[];
  startedAt: string;
  completedAt?: string;
  cancellation?: CancellationRequest;
}

/**
 * Cancelled when cancellation stopped at least one operation; otherwise
 * failed when any operation failed fatally; otherwise succeeded.
 *
 * A run that both failed and was cancelled reports cancelled; its fatal
 * failures still appear in `rootCauses`.
 */
export function determineOutcome(results: ExecutionResult[]): RunOutcome {
  if (results.some((r) => r.status === OperationStatus.SkippedCancelled)) return RunStatus.Cancelled;
  if (results.some((r) => r.status === OperationStatus.FailedFatal)) return RunStatus.Failed;
  return RunStatus.Succeeded;
}

export function countByHost(results: ExecutionResult[]): Record<string, OutcomeCounts> {
  const counts: Record<string, OutcomeCounts> = {};
  for (const result of results) {
    const host = counts[result.hostId] ?? {};
    host[result.status] = (host[result.status] ?? 0) + 1;
    counts[result.hostId] = host;
  }
  return counts;
}

export function rootCausesOf(results: ExecutionResult[]): RootCause[] {
  return results
    .filter((r) => r.status === OperationStatus.FailedFatal)
    .map((r) => ({ operationId: r.operationId, hostId: r.hostId, error: r.error }));
}

export function buildRunReport(input: ReportInput): RunReport {
  const completedAt = input.completedAt ?? new Date().toISOString();
  const hostStates: HostState[] = [...input.plan.hostStates.values()].map((s) => ({ ...s, observed: { ...s.observed } }));

  const report: RunReport = {
    runId: input.runId,
    manifestName: input.graph.manifestName,
    manifestVersion: input.graph.manifestVersion,
    outcome: determineOutcome(input.results),
    startedAt: input.startedAt,
    completedAt,
    durationMs: Math.max(0, Date.parse(completedAt) - Date.parse(input.startedAt)),
    results: input.results.map((r) => ({ ...r, attemptLog: r.attemptLog.map((a) => ({ ...a })) })),
    hostStates,
    probeFailures: [...input.plan.probeFailures],
    rootCauses: rootCausesOf(input.results),
    countsByHost: countByHost(input.results),
    cancellation: input.cancellation,
  };
  return deepFreeze(report);
}

/** Serializable view of a reconciled graph, for `plan`. */
export function buildPlanReport(graph: TaskGraph, plan: ReconcilePlan): PlanReport {
  const operations = graph.order.flatMap((id) => {
    const op = graph.operations.get(id);
    if (!op) return [];
    const skipReason = plan.satisfied.get(id);
    return [
      {
        operationId: op.id,
        hostId: op.hostId,
        role: op.role,
        action: op.action,
        dependencies: [...op.dependencies],
        decision: skipReason ? ('skip' as const) : ('execute' as const),
        skipReason,
      },
    ];
  });
  return deepFreeze({
    manifestName: graph.manifestName,
    manifestVersion: graph.manifestVersion,
    operations,
    hostStates: [...plan.hostStates.values()].map((s) => ({ ...s, observed: { ...s.observed } })),
    probeFailures: [...plan.probeFailures],
    createdAt: new Date().toISOString(),
  });
}

/** Recursively freeze a plain-data structure. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
