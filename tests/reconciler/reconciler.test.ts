import { MatchMode } from '../../src/config';
import { buildTaskGraph } from '../../src/graph/task-graph';
import { assertionSatisfied, StateReconciler, valuesMatch } from '../../src/reconciler/reconciler';
import { FakeTransport } from '../helpers/fake-transport';
import { inventoryOf, manifestOf, StaticCredentials, webManifest } from '../helpers/fixtures';

const DEFAULTS = { timeoutMs: 60_000, maxAttempts: 3 };

const WEB_STATE = {
  'package:nginx': '1.24.0',
  'file:/etc/nginx/sites-enabled/app.conf': 'sha256:abc',
  'release:/srv/app': '42',
};

function reconciler(transport: FakeTransport, matchMode: MatchMode = 'all'): StateReconciler {
  return new StateReconciler(transport, new StaticCredentials(), { matchMode, probeTimeoutMs: 1000, concurrency: 4 });
}

describe('assertionSatisfied', () => {
  test('an empty assertion is never satisfied', () => {
    expect(assertionSatisfied({}, { 'package:nginx': '1.24.0' }, 'all')).toBe(false);
  });

  test('"*" matches any observed value but not a missing one', () => {
    expect(valuesMatch('*', '41')).toBe(true);
    expect(valuesMatch('*', undefined)).toBe(false);
  });

  test('match modes differ on unobserved keys', () => {
    const desired = { 'package:nginx': '1.24.0', 'service:nginx': 'active' };
    const observed = { 'package:nginx': '1.24.0' };
    expect(assertionSatisfied(desired, observed, 'all')).toBe(false);
    expect(assertionSatisfied(desired, observed, 'observed')).toBe(true);
    expect(assertionSatisfied(desired, {}, 'observed')).toBe(false);
  });

  test('inherited object members never count as observed', () => {
    expect(assertionSatisfied({ constructor: '*' }, {}, 'all')).toBe(false);
    expect(assertionSatisfied({ toString: '*' }, {}, 'observed')).toBe(false);
    expect(assertionSatisfied({ 'package:nginx': '1.24.0', toString: '*' }, { 'package:nginx': '1.24.0' }, 'all')).toBe(false);
  });

  test('a mismatched observed key fails both modes', () => {
    const desired = { 'package:nginx': '1.24.0' };
    expect(assertionSatisfied(desired, { 'package:nginx': '1.22.1' }, 'all')).toBe(false);
    expect(assertionSatisfied(desired, { 'package:nginx': '1.22.1' }, 'observed')).toBe(false);
  });
});

describe('StateReconciler', () => {
  test('prunes operations whose desired state is already present', async () => {
    const transport = new FakeTransport();
    transport.observed = { web1: { ...WEB_STATE } };
    const inventory = inventoryOf(['web1']);
    const graph = buildTaskGraph(webManifest(), inventory, DEFAULTS);

    const plan = await reconciler(transport).reconcile(graph, inventory);
    expect(plan.executionSet).toEqual([]);
    expect([...plan.satisfied.entries()]).toEqual([
      ['install-nginx@web1', 'desired-state-matched'],
      ['configure-site@web1', 'desired-state-matched'],
      ['deploy-app@web1', 'desired-state-matched'],
    ]);
  });

  test('probes each host once for the union of its keys', async () => {
    const transport = new FakeTransport();
    const inventory = inventoryOf(['web1', 'web2']);
    const graph = buildTaskGraph(webManifest(), inventory, DEFAULTS);

    await reconciler(transport).reconcile(graph, inventory);
    expect(transport.probes).toEqual([
      { hostId: 'web1', keys: ['file:/etc/nginx/sites-enabled/app.conf', 'package:nginx', 'release:/srv/app'] },
      { hostId: 'web2', keys: ['file:/etc/nginx/sites-enabled/app.conf', 'package:nginx', 'release:/srv/app'] },
    ]);
  });

  test('only mismatched operations are scheduled', async () => {
    const transport = new FakeTransport();
    transport.observed = { web1: { ...WEB_STATE, 'release:/srv/app': '41' } };
    const inventory = inventoryOf(['web1']);
    const graph = buildTaskGraph(webManifest(), inventory, DEFAULTS);

    const plan = await reconciler(transport).reconcile(graph, inventory);
    expect(plan.executionSet).toEqual(['deploy-app@web1']);
  });

  test('a failed probe leaves every operation on that host scheduled', async () => {
    const transport = new FakeTransport();
    transport.observed = { web1: { ...WEB_STATE }, web2: { ...WEB_STATE } };
    transport.unreachable.add('web2');
    const inventory = inventoryOf(['web1', 'web2']);
    const graph = buildTaskGraph(webManifest(), inventory, DEFAULTS);

    const plan = await reconciler(transport).reconcile(graph, inventory);
    expect(plan.executionSet).toEqual(['install-nginx@web2', 'configure-site@web2', 'deploy-app@web2']);
    expect(plan.probeFailures).toHaveLength(1);
    expect(plan.probeFailures[0]).toMatchObject({
      code: 'PROBE.UNREACHABLE',
      hostId: 'web2',
      message: 'Probe of host "web2" failed: connect to web2.example.test refused',
    });
    expect(plan.hostStates.get('web2')?.probeError).toBe('connect to web2.example.test refused');
  });

  test('operations without an assertion follow their pruned dependencies', async () => {
    const manifest = manifestOf({
      name: 'stack',
      roles: [
        {
          name: 'web',
          operations: [
            {
              id: 'install-nginx',
              action: 'install',
              hosts: 'web',
              idempotencyKey: 'nginx-1.24',
              params: { packages: ['nginx'] },
              desiredState: { 'package:nginx': '1.24.0' },
            },
            { id: 'restart-nginx', action: 'restart', hosts: 'web', idempotencyKey: 'r1', params: { service: 'nginx' } },
          ],
        },
      ],
    });
    const transport = new FakeTransport();
    transport.observed = { web1: { 'package:nginx': '1.24.0' }, web2: { 'package:nginx': '1.22.1' } };
    const inventory = inventoryOf(['web1', 'web2']);
    const graph = buildTaskGraph(manifest, inventory, DEFAULTS);

    const plan = await reconciler(transport).reconcile(graph, inventory);
    expect(plan.satisfied.get('restart-nginx@web1')).toBe('dependencies-satisfied');
    expect(plan.executionSet).toEqual(['install-nginx@web2', 'restart-nginx@web2']);
  });

  test('hosts without assertions are not probed and their operations run', async () => {
    const manifest = manifestOf({
      name: 'stack',
      roles: [
        {
          name: 'web',
          operations: [{ id: 'restart-nginx', action: 'restart', hosts: 'web', idempotencyKey: 'r1', params: { service: 'nginx' } }],
        },
      ],
    });
    const transport = new FakeTransport();
    const inventory = inventoryOf(['web1']);
    const graph = buildTaskGraph(manifest, inventory, DEFAULTS);

    const plan = await reconciler(transport).reconcile(graph, inventory);
    expect(transport.probes).toEqual([]);
    expect(plan.executionSet).toEqual(['restart-nginx@web1']);
  });

  test('observed match mode tolerates keys the probe could not report', async () => {
    const transport = new FakeTransport();
    transport.observed = { web1: { 'package:nginx': '1.24.0' } };
    const inventory = inventoryOf(['web1']);
    const graph = buildTaskGraph(webManifest(), inventory, DEFAULTS);

    const strict = await reconciler(transport, 'all').reconcile(graph, inventory);
    const lenient = await reconciler(transport, 'observed').reconcile(graph, inventory);
    expect(strict.executionSet).toEqual(['install-nginx@web1', 'configure-site@web1', 'deploy-app@web1']);
    expect(lenient.executionSet).toEqual(['configure-site@web1', 'deploy-app@web1']);
  });
});
