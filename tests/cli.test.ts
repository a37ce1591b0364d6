import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { CliIO, EXIT_CANCELLED, EXIT_FAILURE, EXIT_INVALID_INPUT, EXIT_SUCCESS, runCli } from '../src/cli';
import { isRecord } from '../src/dsl/validator';
import { createMemoryStore } from '../src/storage/memory-store';
import { Store } from '../src/storage/store';
import { Transport } from '../src/transport/transport';
import { FakeTransport } from './helpers/fake-transport';
import { StaticCredentials } from './helpers/fixtures';

const MANIFEST_YAML = `
name: web-stack
roles:
  - name: web
    operations:
      - id: install-nginx
        action: install
        hosts: web
        idempotencyKey: nginx-1.24
        params:
          packages: [nginx]
        desiredState:
          "package:nginx": "1.24.0"
      - id: restart-nginx
        action: restart
        hosts: web
        idempotencyKey: restart-1
        params:
          service: nginx
`;

const INVENTORY_JSON = JSON.stringify({
  hosts: { web1: { address: 'web1.example.test', credential: 'agent', groups: ['web'] } },
});

interface Harness {
  io: CliIO;
  out: string[];
  err: string[];
  interrupt: () => void;
}

function harness(transport: Transport, store: Store = createMemoryStore()): Harness {
  const out: string[] = [];
  const err: string[] = [];
  let handler: (() => void) | undefined;
  const io: CliIO = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    env: { USER: 'alice' },
    onInterrupt: (h) => {
      handler = h;
      return () => {
        handler = undefined;
      };
    },
    createTransport: () => transport,
    createStore: () => store,
    credentials: new StaticCredentials(),
    sleep: async () => undefined,
  };
  return { io, out, err, interrupt: () => handler?.() };
}

function parsedStdout(h: Harness): Record<string, unknown> {
  const value: unknown = JSON.parse(h.out.join(''));
  if (!isRecord(value)) throw new Error('stdout is not a JSON object');
  return value;
}

describe('deckhand CLI', () => {
  let dir: string;
  let manifestPath: string;
  let inventoryPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'deckhand-cli-'));
    manifestPath = path.join(dir, 'deploy.yaml');
    inventoryPath = path.join(dir, 'hosts.json');
    await fs.writeFile(manifestPath, MANIFEST_YAML);
    await fs.writeFile(inventoryPath, INVENTORY_JSON);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('plan prints decisions and executes nothing', async () => {
    const transport = new FakeTransport();
    transport.observed = { web1: { 'package:nginx': '1.24.0' } };
    const h = harness(transport);

    expect(await runCli(['plan', manifestPath, '-i', inventoryPath], h.io)).toBe(EXIT_SUCCESS);
    const operations = parsedStdout(h).operations;
    if (!Array.isArray(operations)) throw new Error('plan has no operations');
    expect(operations.map((op: unknown) => (isRecord(op) ? [op.operationId, op.decision] : op))).toEqual([
      ['install-nginx@web1', 'skip'],
      ['restart-nginx@web1', 'skip'],
    ]);
    expect(transport.calls).toEqual([]);
  });

  test('run prints the report and exits 0 on success', async () => {
    const transport = new FakeTransport();
    const store = createMemoryStore();
    const h = harness(transport, store);

    expect(await runCli(['run', manifestPath, '-i', inventoryPath], h.io)).toBe(EXIT_SUCCESS);
    const report = parsedStdout(h);
    expect(report.outcome).toBe('succeeded');
    expect(transport.executedIds()).toEqual(['install-nginx@web1', 'restart-nginx@web1']);
    expect(h.err[0]).toBe(`run ${String(report.runId)} started\n`);

    const audit = await store.audit.listByResource(String(report.runId));
    expect(audit.map((r) => `${r.actorId}:${r.action}`)).toEqual(['alice:run.started', 'alice:run.completed']);
  });

  test('a failed run exits 1', async () => {
    const transport = new FakeTransport().script('install-nginx@web1', 'fatal');
    const h = harness(transport);

    expect(await runCli(['run', manifestPath, '-i', inventoryPath], h.io)).toBe(EXIT_FAILURE);
    expect(parsedStdout(h).outcome).toBe('failed');
    expect(transport.executedIds()).toEqual(['install-nginx@web1']);
  });

  test('an interrupt cancels the run and exits 130', async () => {
    const transport = new FakeTransport();
    transport.delayMs = 20;
    const h = harness(transport);
    let interrupted = false;
    transport.onExecute = () => {
      if (interrupted) return;
      interrupted = true;
      h.interrupt();
    };

    expect(await runCli(['run', manifestPath, '-i', inventoryPath], h.io)).toBe(EXIT_CANCELLED);
    expect(parsedStdout(h).outcome).toBe('cancelled');
    expect(transport.executedIds()).toEqual(['install-nginx@web1']);
  });

  test('an invalid manifest exits 2 and lists the issues', async () => {
    await fs.writeFile(manifestPath, 'name: broken\nroles: []\n');
    const h = harness(new FakeTransport());

    expect(await runCli(['plan', manifestPath, '-i', inventoryPath], h.io)).toBe(EXIT_INVALID_INPUT);
    expect(h.err[0]).toBe('error: Invalid deployment manifest: roles: must be a non-empty array\n');
    expect(h.err).toHaveLength(2);
    expect(h.out).toEqual([]);
  });

  test('a missing inventory file exits 2', async () => {
    const h = harness(new FakeTransport());
    const missing = path.join(dir, 'nope.json');

    expect(await runCli(['plan', manifestPath, '-i', missing], h.io)).toBe(EXIT_INVALID_INPUT);
    expect(h.err.join('')).toMatch(/^error: Cannot read document .*nope\.json: /);
  });

  test('usage errors exit 2', async () => {
    const h = harness(new FakeTransport());
    expect(await runCli(['run', manifestPath], h.io)).toBe(EXIT_INVALID_INPUT);
    expect(await runCli(['run', manifestPath, '-i', inventoryPath, '--max-attempts', '0'], h.io)).toBe(
      EXIT_INVALID_INPUT,
    );
    expect(await runCli(['frobnicate'], h.io)).toBe(EXIT_INVALID_INPUT);
  });

  test('show of an unknown run exits 2', async () => {
    const h = harness(new FakeTransport());
    expect(await runCli(['show', 'run_missing'], h.io)).toBe(EXIT_INVALID_INPUT);
    expect(h.err).toEqual(['error: run not found: run_missing\n']);
  });

  test('cancel of an unknown run exits 2', async () => {
    const h = harness(new FakeTransport());
    expect(await runCli(['cancel', 'run_missing'], h.io)).toBe(EXIT_INVALID_INPUT);
    expect(h.err).toEqual(['error: Run not found: run_missing\n']);
  });

  test('run and show share the state directory', async () => {
    const out: string[] = [];
    const io: CliIO = {
      stdout: (text) => out.push(text),
      stderr: () => undefined,
      env: {},
      onInterrupt: () => () => undefined,
      credentials: new StaticCredentials(),
    };
    const stateDir = path.join(dir, 'state');

    const code = await runCli(['run', manifestPath, '-i', inventoryPath, '--dry-transport', '--state-dir', stateDir], io);
    expect(code).toBe(EXIT_SUCCESS);
    const report: unknown = JSON.parse(out.join(''));
    if (!isRecord(report) || typeof report.runId !== 'string') throw new Error('report has no run id');
    expect(report.outcome).toBe('succeeded');

    out.length = 0;
    expect(await runCli(['show', report.runId, '--state-dir', stateDir], io)).toBe(EXIT_SUCCESS);
    const shown: unknown = JSON.parse(out.join(''));
    if (!isRecord(shown) || !isRecord(shown.run) || !Array.isArray(shown.audit)) throw new Error('unexpected show output');
    expect([shown.run.id, shown.run.status]).toEqual([report.runId, 'succeeded']);
    expect(shown.audit.map((r: unknown) => (isRecord(r) ? `${String(r.actorId)}:${String(r.action)}` : r))).toEqual([
      'cli:run.started',
      'cli:run.completed',
    ]);
  });
});
