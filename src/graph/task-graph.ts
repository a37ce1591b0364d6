/**
 * Task graph builder.
 *
 * Expands a manifest against an inventory into a DAG of host-bound
 * operations. Each manifest operation becomes one graph operation per
 * target host (`<operationId>@<hostId>`). Ordering is deterministic: the
 * topological sort breaks ties by declaration order.
 */

import {
  DeckhandError,
  cycleDetectedError,
  unknownDependencyError,
  unknownHostTargetError,
} from '../domain/errors';
import { Inventory } from '../domain/inventory';
import { Manifest, ManifestOperation } from '../domain/manifest';
import { ActionKind, Operation, OperationAction } from '../domain/operation';
import { resolveTargets } from '../inventory/inventory';

export interface TaskGraph {
  readonly manifestName: string;
  readonly manifestVersion: string;
  readonly operations: ReadonlyMap<string, Operation>;
  /** Operation ids in deterministic topological order. */
  readonly order: readonly string[];
  /** Operation id -> ids of operations that directly depend on it. */
  readonly dependents: ReadonlyMap<string, readonly string[]>;
}

export interface GraphDefaults {
  timeoutMs: number;
  maxAttempts: number;
}

interface DeclaredOperation {
  op: ManifestOperation;
  role: string;
  /** Resolved manifest-level dependency ids. */
  dependsOn: string[];
}

export function instanceId(operationId: string, hostId: string): string {
  return `${operationId}@${hostId}`;
}

/** Build the task graph. Throws DeckhandError on unknown ids, cycles or empty targets. */
export function buildTaskGraph(manifest: Manifest, inventory: Inventory, defaults: GraphDefaults): TaskGraph {
  const declared = declareOperations(manifest);
  assertAcyclic(declared);

  // Expansion: one instance per target host, in declaration order.
  const instancesByManifestId = new Map<string, Operation[]>();
  const operations = new Map<string, Operation>();
  let declarationIndex = 0;

  for (const { op, role } of declared.values()) {
    const targets = resolveTargets(inventory, op.hosts);
    if (targets.length === 0) {
      throw new DeckhandError(unknownHostTargetError(op.id, op.hosts));
    }
    const instances: Operation[] = [];
    for (const host of targets) {
      const instance: Operation = {
        ...actionOf(op),
        id: instanceId(op.id, host.id),
        manifestOperationId: op.id,
        role,
        hostId: host.id,
        idempotencyKey: op.idempotencyKey,
        dependencies: [],
        desiredState: { ...(op.desiredState ?? {}) },
        timeoutMs: op.timeoutMs ?? defaults.timeoutMs,
        maxAttempts: op.maxAttempts ?? defaults.maxAttempts,
        declarationIndex: declarationIndex++,
      };
      instances.push(instance);
      operations.set(instance.id, instance);
    }
    instancesByManifestId.set(op.id, instances);
  }

  // Edges: a dependency binds to its instance on the same host when there is
  // one, otherwise to every instance of it.
  for (const { op, dependsOn } of declared.values()) {
    for (const instance of instancesByManifestId.get(op.id) ?? []) {
      const deps = new Set<string>();
      for (const depManifestId of dependsOn) {
        const depInstances = instancesByManifestId.get(depManifestId) ?? [];
        const sameHost = depInstances.find((d) => d.hostId === instance.hostId);
        for (const dep of sameHost ? [sameHost] : depInstances) deps.add(dep.id);
      }
      instance.dependencies = [...deps];
    }
  }

  const dependents = new Map<string, string[]>();
  for (const id of operations.keys()) dependents.set(id, []);
  for (const operation of operations.values()) {
    for (const dep of operation.dependencies) dependents.get(dep)?.push(operation.id);
  }

  return {
    manifestName: manifest.name,
    manifestVersion: manifest.version,
    operations,
    order: topologicalOrder([...operations.values()]),
    dependents,
  };
}

/** Copy action and params as a pair so each instance owns its parameters. */
function actionOf(op: OperationAction): OperationAction {
  switch (op.action) {
    case ActionKind.Install:
      return { action: op.action, params: { packages: [...op.params.packages] } };
    case ActionKind.Configure:
      return { action: op.action, params: { ...op.params } };
    case ActionKind.Deploy:
      return { action: op.action, params: { ...op.params } };
    case ActionKind.Restart:
    case ActionKind.Stop:
      return { action: op.action, params: { ...op.params } };
    case ActionKind.Teardown:
      return { action: op.action, params: { services: [...op.params.services], paths: [...op.params.paths] } };
  }
}

/** Resolve explicit and implicit (declaration-order) dependencies. */
function declareOperations(manifest: Manifest): Map<string, DeclaredOperation> {
  const declared = new Map<string, DeclaredOperation>();
  for (const role of manifest.roles) {
    let previous: string | undefined;
    for (const op of role.operations) {
      const dependsOn = op.dependsOn ?? (previous ? [previous] : []);
      declared.set(op.id, { op, role: role.name, dependsOn: [...new Set(dependsOn)] });
      previous = op.id;
    }
  }
  for (const { op, dependsOn } of declared.values()) {
    for (const dep of dependsOn) {
      if (!declared.has(dep)) {
        throw new DeckhandError(unknownDependencyError(op.id, dep));
      }
    }
  }
  return declared;
}

/** Depth-first search that reports the first cycle found as a closed path. */
function assertAcyclic(declared: Map<string, DeclaredOperation>): void {
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (id: string): void => {
    if (done.has(id)) return;
    if (onStack.has(id)) {
      const cycle = [...stack.slice(stack.indexOf(id)), id];
      throw new DeckhandError(cycleDetectedError(cycle));
    }
    stack.push(id);
    onStack.add(id);
    for (const dep of declared.get(id)?.dependsOn ?? []) visit(dep);
    stack.pop();
    onStack.delete(id);
    done.add(id);
  };

  for (const id of declared.keys()) visit(id);
}

/**
 * Kahn's algorithm; among ready operations the lowest declaration index
 * goes first. Throws on a cycle so a hand-built graph cannot slip through.
 */
export function topologicalOrder(operations: Operation[]): string[] {
  const byId = new Map(operations.map((o) => [o.id, o]));
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, Operation[]>();
  for (const op of operations) {
    inDegree.set(op.id, op.dependencies.length);
    dependents.set(op.id, []);
  }
  for (const op of operations) {
    for (const dep of op.dependencies) {
      if (!byId.has(dep)) throw new DeckhandError(unknownDependencyError(op.id, dep));
      dependents.get(dep)?.push(op);
    }
  }

  const ready = operations.filter((o) => o.dependencies.length === 0);
  ready.sort((a, b) => a.declarationIndex - b.declarationIndex);

  const order: string[] = [];
  while (ready.length > 0) {
    const current = ready.shift();
    if (!current) break;
    order.push(current.id);
    for (const next of dependents.get(current.id) ?? []) {
      const remaining = (inDegree.get(next.id) ?? 0) - 1;
      inDegree.set(next.id, remaining);
      if (remaining === 0) insertByDeclaration(ready, next);
    }
  }

  if (order.length !== operations.length) {
    const stuck = operations.filter((o) => !order.includes(o.id)).map((o) => o.id);
    throw new DeckhandError(cycleDetectedError([...stuck, stuck[0]]));
  }
  return order;
}

function insertByDeclaration(ready: Operation[], op: Operation): void {
  let lo = 0;
  let hi = ready.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (ready[mid].declarationIndex < op.declarationIndex) lo = mid + 1;
    else hi = mid;
  }
  ready.splice(lo, 0, op);
}

/** Every operation reachable through dependents of `id`, excluding `id`. */
export function transitiveDependents(graph: TaskGraph, id: string): string[] {
  const seen = new Set<string>();
  const queue = [...(graph.dependents.get(id) ?? [])];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    queue.push(...(graph.dependents.get(next) ?? []));
  }
  return graph.order.filter((opId) => seen.has(opId));
}
