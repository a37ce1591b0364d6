import { Manifest } from '../../src/domain/manifest';
import { Inventory } from '../../src/domain/inventory';
import { OperationStatus } from '../../src/domain/run';
import { CancellationToken } from '../../src/engine/cancellation';
import { GraphScheduler, ScheduleOutcome, SchedulerHooks } from '../../src/engine/scheduler';
import { GraphDefaults, buildTaskGraph } from '../../src/graph/task-graph';
import { createLogger } from '../../src/logger';
import { ReconcilePlan, SkipReason } from '../../src/reconciler/reconciler';
import { FakeTransport } from '../helpers/fake-transport';
import { inventoryOf, manifestOf, recordingSleep, StaticCredentials, webManifest } from '../helpers/fixtures';

interface ScheduleSetup {
  manifest?: Manifest;
  inventory: Inventory;
  transport: FakeTransport;
  maxConcurrency?: number;
  defaults?: GraphDefaults;
  satisfied?: Record<string, SkipReason>;
  token?: CancellationToken;
  hooks?: SchedulerHooks;
  sleep?: (ms: number) => Promise<void>;
}

function schedule(setup: ScheduleSetup): Promise<ScheduleOutcome> {
  const graph = buildTaskGraph(
    setup.manifest ?? webManifest(),
    setup.inventory,
    setup.defaults ?? { timeoutMs: 5000, maxAttempts: 3 },
  );
  const satisfied = new Map(Object.entries(setup.satisfied ?? {}));
  const plan: ReconcilePlan = {
    hostStates: new Map(),
    satisfied,
    executionSet: graph.order.filter((id) => !satisfied.has(id)),
    probeFailures: [],
  };
  const scheduler = new GraphScheduler(
    setup.transport,
    new StaticCredentials(),
    {
      maxConcurrency: setup.maxConcurrency ?? 4,
      retry: { backoffBaseMs: 10, backoffMaxMs: 40 },
      redact: [],
      sleep: setup.sleep ?? recordingSleep().sleep,
    },
    createLogger(),
    setup.hooks,
  );
  return scheduler.execute({
    runId: 'run_test',
    graph,
    inventory: setup.inventory,
    plan,
    cancellation: setup.token ?? new CancellationToken(),
  });
}

function statuses(outcome: ScheduleOutcome): Record<string, OperationStatus> {
  return Object.fromEntries(outcome.results.map((r) => [r.operationId, r.status]));
}

describe('GraphScheduler', () => {
  test('runs one operation at a time per host and hosts in parallel', async () => {
    const transport = new FakeTransport();
    transport.delayMs = 5;
    const outcome = await schedule({ inventory: inventoryOf(['web1', 'web2']), transport });

    expect(outcome.cancelled).toBe(false);
    expect(outcome.results.every((r) => r.status === OperationStatus.Succeeded)).toBe(true);
    expect(transport.maxInFlightPerHost).toBe(1);
    expect(transport.maxInFlight).toBe(2);
    expect(transport.calls.filter((c) => c.hostId === 'web1').map((c) => c.operationId)).toEqual([
      'install-nginx@web1',
      'configure-site@web1',
      'deploy-app@web1',
    ]);
  });

  test('a timed-out attempt keeps its host until the transport lets go', async () => {
    const manifest = manifestOf({
      name: 'slow-stack',
      roles: [
        {
          name: 'web',
          operations: [
            { id: 'slow', action: 'restart', hosts: 'web1', idempotencyKey: 's1', params: { service: 'slow' } },
            { id: 'next', action: 'restart', hosts: 'web1', idempotencyKey: 'n1', params: { service: 'next' }, dependsOn: [], timeoutMs: 1000 },
          ],
        },
      ],
    });
    // Ignores the abort signal and settles well after the deadline.
    const transport = new FakeTransport();
    transport.delayMs = 60;
    const outcome = await schedule({
      manifest,
      inventory: inventoryOf(['web1']),
      transport,
      defaults: { timeoutMs: 20, maxAttempts: 2 },
    });

    expect(statuses(outcome)).toEqual({
      'slow@web1': OperationStatus.FailedFatal,
      'next@web1': OperationStatus.Succeeded,
    });
    expect(transport.maxInFlightPerHost).toBe(1);
    expect(transport.executedIds()).toEqual(['slow@web1', 'slow@web1', 'next@web1']);
    expect(transport.aborted).toEqual(['slow@web1#1', 'slow@web1#2']);
    expect(outcome.results.find((r) => r.operationId === 'slow@web1')?.error?.code).toBe('OPERATION.RETRIES_EXHAUSTED');
  });

  test('respects the worker pool bound', async () => {
    const transport = new FakeTransport();
    transport.delayMs = 5;
    await schedule({ inventory: inventoryOf(['web1', 'web2', 'web3']), transport, maxConcurrency: 2 });
    expect(transport.maxInFlight).toBe(2);
    expect(transport.calls).toHaveLength(9);
  });

  test('results come back in topological order', async () => {
    const outcome = await schedule({ inventory: inventoryOf(['web1', 'web2']), transport: new FakeTransport() });
    expect(outcome.results.map((r) => r.operationId)).toEqual([
      'install-nginx@web1',
      'install-nginx@web2',
      'configure-site@web1',
      'configure-site@web2',
      'deploy-app@web1',
      'deploy-app@web2',
    ]);
  });

  test('a fatal failure blocks its dependents and leaves other hosts alone', async () => {
    const transport = new FakeTransport().script('configure-site@web1', 'fatal');
    const outcome = await schedule({ inventory: inventoryOf(['web1', 'web2']), transport });

    expect(statuses(outcome)).toEqual({
      'install-nginx@web1': OperationStatus.Succeeded,
      'install-nginx@web2': OperationStatus.Succeeded,
      'configure-site@web1': OperationStatus.FailedFatal,
      'configure-site@web2': OperationStatus.Succeeded,
      'deploy-app@web1': OperationStatus.SkippedBlockedByFailure,
      'deploy-app@web2': OperationStatus.Succeeded,
    });
    const blocked = outcome.results.find((r) => r.operationId === 'deploy-app@web1');
    expect(blocked?.blockedBy).toBe('configure-site@web1');
    expect(blocked?.attempts).toBe(0);
    expect(transport.executedIds()).not.toContain('deploy-app@web1');
  });

  test('a failure on one host blocks cross-host dependents', async () => {
    const manifest = manifestOf({
      name: 'stack',
      roles: [
        { name: 'db', operations: [{ id: 'migrate', action: 'restart', hosts: 'db', idempotencyKey: 'm1', params: { service: 'migrate' } }] },
        {
          name: 'web',
          operations: [
            { id: 'reload', action: 'restart', hosts: 'web', idempotencyKey: 'r1', params: { service: 'nginx' }, dependsOn: ['migrate'] },
          ],
        },
      ],
    });
    const transport = new FakeTransport().script('migrate@db1', 'fatal');
    const outcome = await schedule({ manifest, inventory: inventoryOf({ db1: ['db'], web1: ['web'], web2: ['web'] }), transport });

    expect(statuses(outcome)).toEqual({
      'migrate@db1': OperationStatus.FailedFatal,
      'reload@web1': OperationStatus.SkippedBlockedByFailure,
      'reload@web2': OperationStatus.SkippedBlockedByFailure,
    });
    expect(transport.executedIds()).toEqual(['migrate@db1']);
  });

  test('transient failures are retried within the run', async () => {
    const transport = new FakeTransport().script('install-nginx@web1', 'retryable', 'retryable', 'ok');
    const { sleep, delays } = recordingSleep();
    const outcome = await schedule({ inventory: inventoryOf(['web1']), transport, sleep });

    const install = outcome.results.find((r) => r.operationId === 'install-nginx@web1');
    expect(install?.status).toBe(OperationStatus.Succeeded);
    expect(install?.attempts).toBe(3);
    expect(install?.attemptLog.map((a) => a.attempt)).toEqual([1, 2, 3]);
    expect(delays).toEqual([10, 20]);
    expect(statuses(outcome)['deploy-app@web1']).toBe(OperationStatus.Succeeded);
  });

  test('already-satisfied operations are skipped and satisfy their dependents', async () => {
    const transport = new FakeTransport();
    const outcome = await schedule({
      inventory: inventoryOf(['web1']),
      transport,
      satisfied: { 'install-nginx@web1': 'desired-state-matched' },
    });

    const install = outcome.results[0];
    expect(install.status).toBe(OperationStatus.SkippedAlreadySatisfied);
    expect(install.skipReason).toBe('desired-state-matched');
    expect(transport.executedIds()).toEqual(['configure-site@web1', 'deploy-app@web1']);
  });

  test('cancellation lets the running operation finish and skips the rest', async () => {
    const token = new CancellationToken();
    const transport = new FakeTransport();
    transport.onExecute = (op) => {
      if (op.id === 'install-nginx@web1') token.cancel('alice', 'maintenance window closed');
    };
    const outcome = await schedule({ inventory: inventoryOf(['web1']), transport, token, maxConcurrency: 1 });

    expect(outcome.cancelled).toBe(true);
    expect(statuses(outcome)).toEqual({
      'install-nginx@web1': OperationStatus.Succeeded,
      'configure-site@web1': OperationStatus.SkippedCancelled,
      'deploy-app@web1': OperationStatus.SkippedCancelled,
    });
    expect(transport.executedIds()).toEqual(['install-nginx@web1']);
  });

  test('a token cancelled before start dispatches nothing', async () => {
    const token = new CancellationToken();
    token.cancel('alice');
    const transport = new FakeTransport();
    const outcome = await schedule({ inventory: inventoryOf(['web1']), transport, token });

    expect(outcome.cancelled).toBe(true);
    expect(outcome.results.every((r) => r.status === OperationStatus.SkippedCancelled)).toBe(true);
    expect(transport.calls).toEqual([]);
  });

  test('hooks observe every dispatch and settlement', async () => {
    const dispatched: string[] = [];
    const settled: string[] = [];
    await schedule({
      inventory: inventoryOf(['web1']),
      transport: new FakeTransport().script('configure-site@web1', 'fatal'),
      hooks: {
        onDispatch: (op) => dispatched.push(op.id),
        onSettled: (result) => settled.push(`${result.operationId}:${result.status}`),
      },
    });

    expect(dispatched).toEqual(['install-nginx@web1', 'configure-site@web1']);
    expect(settled).toEqual([
      'install-nginx@web1:succeeded',
      'configure-site@web1:failed-fatal',
      'deploy-app@web1:skipped-blocked-by-failure',
    ]);
  });
});
