import { Operation } from '../../src/domain/operation';
import { buildTaskGraph } from '../../src/graph/task-graph';
import {
  parseProbeOutput,
  probeCommandFor,
  renderCommand,
  renderProbeScript,
  shellQuote,
} from '../../src/transport/commands';
import { DryRunTransport } from '../../src/transport/dry-run-transport';
import { inventoryOf, manifestOf } from '../helpers/fixtures';

const inventory = inventoryOf(['web1']);

function operation(action: string, params: Record<string, unknown>): Operation {
  const manifest = manifestOf({
    name: 'cmd',
    roles: [{ name: 'web', operations: [{ id: 'op', action, hosts: 'web1', idempotencyKey: 'k', params }] }],
  });
  const op = buildTaskGraph(manifest, inventory, { timeoutMs: 1000, maxAttempts: 1 }).operations.get('op@web1');
  if (!op) throw new Error('fixture operation missing');
  return op;
}

describe('shellQuote', () => {
  test('leaves safe words alone', () => {
    expect(shellQuote('nginx')).toBe('nginx');
    expect(shellQuote('/etc/nginx/nginx.conf')).toBe('/etc/nginx/nginx.conf');
  });

  test('single-quotes everything else', () => {
    expect(shellQuote('a b')).toBe("'a b'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote('$(reboot)')).toBe("'$(reboot)'");
  });
});

describe('renderCommand', () => {
  test('install', () => {
    expect(renderCommand(operation('install', { packages: ['nginx', 'libssl3'] }))).toBe(
      'DEBIAN_FRONTEND=noninteractive apt-get install -y --no-install-recommends nginx libssl3',
    );
  });

  test('configure writes through a temp file', () => {
    expect(renderCommand(operation('configure', { path: '/etc/nginx/sites-enabled/app.conf', content: 'server {}' }))).toBe(
      [
        'mkdir -p "$(dirname /etc/nginx/sites-enabled/app.conf)"',
        "printf '%s' 'server {}' > /etc/nginx/sites-enabled/app.conf.deckhand-tmp",
        'mv /etc/nginx/sites-enabled/app.conf.deckhand-tmp /etc/nginx/sites-enabled/app.conf',
      ].join(' && '),
    );
  });

  test('configure applies a file mode', () => {
    expect(renderCommand(operation('configure', { path: '/etc/app.conf', content: 'x', mode: '0600' }))).toBe(
      "mkdir -p \"$(dirname /etc/app.conf)\" && printf '%s' x > /etc/app.conf.deckhand-tmp && chmod 0600 /etc/app.conf.deckhand-tmp && mv /etc/app.conf.deckhand-tmp /etc/app.conf",
    );
  });

  test('deploy records the release marker', () => {
    expect(renderCommand(operation('deploy', { release: '42', directory: '/srv/app' }))).toBe(
      "mkdir -p /srv/app && cd /srv/app && printf '%s' 42 > /srv/app/.deckhand-release",
    );
  });

  test('restart, stop and teardown', () => {
    expect(renderCommand(operation('restart', { service: 'nginx' }))).toBe('systemctl restart nginx');
    expect(renderCommand(operation('stop', { service: 'nginx' }))).toBe('systemctl stop nginx');
    expect(renderCommand(operation('teardown', { services: ['app'], paths: ['/srv/app'] }))).toBe(
      'systemctl disable --now app && rm -rf -- /srv/app',
    );
  });
});

describe('probes', () => {
  test('known key kinds map to commands', () => {
    expect(probeCommandFor('package:nginx')).toBe("dpkg-query -W -f='${Version}' nginx");
    expect(probeCommandFor('service:nginx')).toBe('systemctl is-active nginx');
    expect(probeCommandFor('release:/srv/app/')).toBe('cat /srv/app/.deckhand-release');
  });

  test('unknown key kinds have no probe', () => {
    expect(probeCommandFor('kernel:version')).toBeUndefined();
    expect(probeCommandFor('nginx')).toBeUndefined();
    expect(renderProbeScript(['kernel:version'])).toBe('true');
  });

  test('probe output keys become own properties', () => {
    const observed = parseProbeOutput('__proto__\tx\n', ['__proto__']);
    expect(Object.keys(observed)).toEqual(['__proto__']);
  });

  test('parses tab-separated probe output for the requested keys', () => {
    const output = 'package:nginx\t1.24.0\nfile:/etc/app.conf\tsha256:ab12\nunrequested\tx\nnoise\n';
    expect(parseProbeOutput(output, ['package:nginx', 'file:/etc/app.conf', 'service:nginx'])).toEqual({
      'package:nginx': '1.24.0',
      'file:/etc/app.conf': 'sha256:ab12',
    });
  });
});

describe('DryRunTransport', () => {
  test('observes nothing and echoes the command', async () => {
    const transport = new DryRunTransport();
    expect(await transport.probe(inventory.hosts[0], ['package:nginx'])).toEqual({});
    expect(await transport.execute(inventory.hosts[0], operation('restart', { service: 'nginx' }))).toEqual({
      output: '[dry-run] web1: systemctl restart nginx',
    });
  });
});
