import { DeckhandError } from '../../src/domain/errors';
import { Inventory } from '../../src/domain/inventory';
import { Manifest } from '../../src/domain/manifest';
import { CredentialHandle, CredentialResolver } from '../../src/inventory/credentials';
import { createInventory } from '../../src/inventory/inventory';
import { parseManifest } from '../../src/dsl/validator';
import { ExecutorConfig } from '../../src/engine/executor';

/** Inventory with the given hosts; every host joins group "web" unless listed otherwise. */
export function inventoryOf(hosts: Record<string, string[]> | string[]): Inventory {
  const entries = Array.isArray(hosts) ? Object.fromEntries(hosts.map((h) => [h, ['web']])) : hosts;
  return createInventory({
    hosts: Object.fromEntries(
      Object.entries(entries).map(([id, groups]) => [id, { address: `${id}.example.test`, credential: 'agent', groups }]),
    ),
  });
}

export function manifestOf(document: unknown): Manifest {
  return parseManifest(document);
}

/** The three-step web role used across engine tests. */
export function webManifest(hosts = 'web'): Manifest {
  return manifestOf({
    name: 'web-stack',
    roles: [
      {
        name: 'web',
        operations: [
          {
            id: 'install-nginx',
            action: 'install',
            hosts,
            idempotencyKey: 'nginx-1.24',
            params: { packages: ['nginx'] },
            desiredState: { 'package:nginx': '1.24.0' },
          },
          {
            id: 'configure-site',
            action: 'configure',
            hosts,
            idempotencyKey: 'site-v3',
            params: { path: '/etc/nginx/sites-enabled/app.conf', content: 'server {}' },
            desiredState: { 'file:/etc/nginx/sites-enabled/app.conf': 'sha256:abc' },
          },
          {
            id: 'deploy-app',
            action: 'deploy',
            hosts,
            idempotencyKey: 'release-42',
            params: { release: '42', directory: '/srv/app' },
            desiredState: { 'release:/srv/app': '42' },
          },
        ],
      },
    ],
  });
}

export class StaticCredentials implements CredentialResolver {
  resolve(ref: string): CredentialHandle {
    return { ref, kind: 'agent' };
  }
}

export const TEST_CONFIG: ExecutorConfig = {
  maxAttempts: 3,
  backoffBaseMs: 10,
  backoffMaxMs: 40,
  operationTimeoutMs: 5000,
  probeTimeoutMs: 5000,
  matchMode: 'all',
  redactEnv: [],
};

/** Resolves immediately and records requested delays. */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

/** The DeckhandError thrown by `fn`; fails the test when nothing (or something else) is thrown. */
export function thrownBy(fn: () => unknown): DeckhandError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DeckhandError) return err;
    throw err;
  }
  throw new Error('expected a DeckhandError to be thrown');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<DeckhandError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof DeckhandError) return err;
    throw err;
  }
  throw new Error('expected a DeckhandError rejection');
}
