/**
 * State reconciler.
 *
 * Runs once per run, before execution. Each host is probed once for the
 * union of resource keys its operations assert; operations whose assertion
 * matches are pruned as already satisfied. Operations without an assertion
 * are pruned when every one of their dependencies was pruned. A failed
 * probe leaves the host's state unknown, so its operations always execute.
 */

import { MatchMode } from '../config';
import { TypedError, probeUnreachableError } from '../domain/errors';
import { HostState, Inventory } from '../domain/inventory';
import { DesiredState } from '../domain/operation';
import { TaskGraph } from '../graph/task-graph';
import { CredentialResolver } from '../inventory/credentials';
import { getHost } from '../inventory/inventory';
import { Logger, logger as rootLogger } from '../logger';
import { Transport } from '../transport/transport';
import { mapWithConcurrency } from '../engine/pool';

export type SkipReason = 'desired-state-matched' | 'dependencies-satisfied';

/** Expected value that matches any observed value. */
export const ANY_VALUE = '*';

export interface ReconcileOptions {
  matchMode: MatchMode;
  probeTimeoutMs: number;
  /** Maximum probes in flight. */
  concurrency: number;
}

export interface ReconcilePlan {
  hostStates: Map<string, HostState>;
  /** Pruned operations and why. */
  satisfied: Map<string, SkipReason>;
  /** Operations left to execute, in topological order. */
  executionSet: string[];
  probeFailures: TypedError[];
}

/** Own keys only: a probe result never inherits an observation. */
function observedValue(observed: Record<string, string>, key: string): string | undefined {
  return Object.hasOwn(observed, key) ? observed[key] : undefined;
}

export function valuesMatch(expected: string, observed: string | undefined): boolean {
  if (observed === undefined) return false;
  return expected === ANY_VALUE || expected === observed;
}

export function assertionSatisfied(
  desired: DesiredState,
  observed: Record<string, string>,
  mode: MatchMode,
): boolean {
  const keys = Object.keys(desired);
  if (keys.length === 0) return false;

  if (mode === 'all') {
    return keys.every((key) => valuesMatch(desired[key], observedValue(observed, key)));
  }
  const seen = keys.filter((key) => observedValue(observed, key) !== undefined);
  return seen.length > 0 && seen.every((key) => valuesMatch(desired[key], observedValue(observed, key)));
}

export class StateReconciler {
  private log: Logger;

  constructor(
    private transport: Transport,
    private credentials: CredentialResolver,
    private options: ReconcileOptions,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ stage: 'reconcile' });
  }

  async reconcile(graph: TaskGraph, inventory: Inventory): Promise<ReconcilePlan> {
    const keysByHost = new Map<string, Set<string>>();
    for (const op of graph.operations.values()) {
      const keys = keysByHost.get(op.hostId) ?? new Set<string>();
      for (const key of Object.keys(op.desiredState)) keys.add(key);
      keysByHost.set(op.hostId, keys);
    }

    const hostIds = [...keysByHost.keys()];
    const probeFailures: TypedError[] = [];
    const states = await mapWithConcurrency(hostIds, this.options.concurrency, (hostId) =>
      this.probeHost(inventory, hostId, [...(keysByHost.get(hostId) ?? [])], probeFailures),
    );
    const hostStates = new Map(states.map((s) => [s.hostId, s]));

    const satisfied = new Map<string, SkipReason>();
    const executionSet: string[] = [];

    for (const id of graph.order) {
      const op = graph.operations.get(id);
      if (!op) continue;
      const state = hostStates.get(op.hostId);
      // Undefined when the probe failed: state unknown, so the operation runs.
      const observed = state && state.probeError === undefined ? state.observed : undefined;

      let reason: SkipReason | undefined;
      if (observed && Object.keys(op.desiredState).length > 0) {
        if (assertionSatisfied(op.desiredState, observed, this.options.matchMode)) {
          reason = 'desired-state-matched';
        }
      } else if (observed && op.dependencies.length > 0 && op.dependencies.every((dep) => satisfied.has(dep))) {
        reason = 'dependencies-satisfied';
      }

      if (reason) {
        satisfied.set(id, reason);
        this.log.debug('Operation already satisfied', { operationId: id, reason });
      } else {
        executionSet.push(id);
      }
    }

    this.log.info('Reconciliation complete', {
      operations: graph.order.length,
      satisfied: satisfied.size,
      toExecute: executionSet.length,
      probeFailures: probeFailures.length,
    });

    return { hostStates, satisfied, executionSet, probeFailures };
  }

  private async probeHost(
    inventory: Inventory,
    hostId: string,
    keys: string[],
    failures: TypedError[],
  ): Promise<HostState> {
    if (keys.length === 0) return { hostId, observed: {} };

    const host = getHost(inventory, hostId);
    try {
      if (!host) throw new Error('host is not in the inventory');
      const observed = await withTimeout(
        this.transport.probe(host, keys, {
          credential: this.credentials.resolve(host.credentialRef),
          timeoutMs: this.options.probeTimeoutMs,
        }),
        this.options.probeTimeoutMs,
      );
      return { hostId, observed: { ...observed }, probedAt: new Date().toISOString() };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const error = probeUnreachableError(hostId, reason);
      failures.push(error);
      this.log.warn('Probe failed; host state unknown, its operations will execute', { hostId, reason });
      return { hostId, observed: {}, probedAt: new Date().toISOString(), probeError: reason };
    }
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`probe timed out after ${timeoutMs}ms`)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
