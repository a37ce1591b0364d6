/**
 * Run domain model.
 *
 * A run is one pass of plan -> reconcile -> execute over a manifest. Its
 * outcome is captured in an immutable RunReport; the RunRecord tracks the
 * live status around it.
 */

import { TypedError } from './errors';
import { HostState } from './inventory';
import { ActionKind } from './operation';

/** Per-operation states. The first three are transient. */
export enum OperationStatus {
  Pending = 'pending',
  Queued = 'queued',
  Running = 'running',
  SkippedAlreadySatisfied = 'skipped-already-satisfied',
  Succeeded = 'succeeded',
  /** Outcome of a single attempt; never a final status. */
  FailedRetryable = 'failed-retryable',
  FailedFatal = 'failed-fatal',
  SkippedBlockedByFailure = 'skipped-blocked-by-failure',
  SkippedCancelled = 'skipped-cancelled',
}

export const VALID_OPERATION_TRANSITIONS: Record<OperationStatus, OperationStatus[]> = {
  [OperationStatus.Pending]: [
    OperationStatus.Queued,
    OperationStatus.SkippedAlreadySatisfied,
    OperationStatus.SkippedBlockedByFailure,
    OperationStatus.SkippedCancelled,
  ],
  [OperationStatus.Queued]: [
    OperationStatus.Running,
    OperationStatus.SkippedBlockedByFailure,
    OperationStatus.SkippedCancelled,
  ],
  [OperationStatus.Running]: [OperationStatus.Succeeded, OperationStatus.FailedFatal],
  [OperationStatus.SkippedAlreadySatisfied]: [],
  [OperationStatus.Succeeded]: [],
  [OperationStatus.FailedRetryable]: [],
  [OperationStatus.FailedFatal]: [],
  [OperationStatus.SkippedBlockedByFailure]: [],
  [OperationStatus.SkippedCancelled]: [],
};

export enum RunStatus {
  Planned = 'planned',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Planned]: [RunStatus.Running, RunStatus.Cancelled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Cancelled]: [],
};

export type RunOutcome = RunStatus.Succeeded | RunStatus.Failed | RunStatus.Cancelled;

/** One try of an operation against its host. */
export interface AttemptRecord {
  attempt: number;
  status: OperationStatus.Succeeded | OperationStatus.FailedRetryable | OperationStatus.FailedFatal;
  startedAt: string;
  durationMs: number;
  output?: string;
  error?: TypedError;
}

export interface ExecutionResult {
  operationId: string;
  hostId: string;
  role: string;
  action: ActionKind;
  idempotencyKey: string;
  status: OperationStatus;
  /** Attempts made; 0 for skipped operations. */
  attempts: number;
  durationMs: number;
  output?: string;
  error?: TypedError;
  attemptLog: AttemptRecord[];
  /** For blocked operations: the failed operation that blocked them. */
  blockedBy?: string;
  /** For reconciled skips: why the reconciler considered them satisfied. */
  skipReason?: 'desired-state-matched' | 'dependencies-satisfied';
  startedAt?: string;
  completedAt?: string;
}

/** Per-host tally of final statuses, as sent to notification sinks. */
export type OutcomeCounts = Partial<Record<OperationStatus, number>>;

export interface RootCause {
  operationId: string;
  hostId: string;
  error?: TypedError;
}

export interface RunReport {
  runId: string;
  manifestName: string;
  manifestVersion: string;
  outcome: RunOutcome;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  /** Final results in topological order. */
  results: ExecutionResult[];
  hostStates: HostState[];
  probeFailures: TypedError[];
  /** Every failed-fatal operation; the origin of any skipped-blocked entry. */
  rootCauses: RootCause[];
  countsByHost: Record<string, OutcomeCounts>;
  cancellation?: CancellationRequest;
}

export interface CancellationRequest {
  requestedBy: string;
  requestedAt: string;
  reason?: string;
}

/** Live, persisted view of a run. */
export interface RunRecord {
  id: string;
  manifestName: string;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  /** Present once the run reached a terminal status. */
  report?: RunReport;
  cancellation?: CancellationRequest;
  error?: TypedError;
}

export function isTerminalOperationStatus(status: OperationStatus): boolean {
  return VALID_OPERATION_TRANSITIONS[status].length === 0;
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return VALID_RUN_TRANSITIONS[status].length === 0;
}

/** Statuses that let dependents proceed. */
export function satisfiesDependency(status: OperationStatus): boolean {
  return status === OperationStatus.Succeeded || status === OperationStatus.SkippedAlreadySatisfied;
}

/** One operation as the dry-run plan sees it. */
export interface PlannedOperation {
  operationId: string;
  hostId: string;
  role: string;
  action: ActionKind;
  dependencies: string[];
  decision: 'execute' | 'skip';
  skipReason?: 'desired-state-matched' | 'dependencies-satisfied';
}

/** Result of `plan`: what a run would do, without side effects. */
export interface PlanReport {
  manifestName: string;
  manifestVersion: string;
  /** In topological order. */
  operations: PlannedOperation[];
  hostStates: HostState[];
  probeFailures: TypedError[];
  createdAt: string;
}
