/**
 * Typed operation -> remote shell command rendering.
 *
 * Only this module produces shell text, and every interpolated value goes
 * through shellQuote().
 */

import { ActionKind, Operation } from '../domain/operation';

/** Marker file written by deploy operations; read back by `release:` probes. */
export const RELEASE_MARKER = '.deckhand-release';

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_\/.:=@%+-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function renderCommand(operation: Operation): string {
  switch (operation.action) {
    case ActionKind.Install: {
      const packages = operation.params.packages.map(shellQuote).join(' ');
      return `DEBIAN_FRONTEND=noninteractive apt-get install -y --no-install-recommends ${packages}`;
    }
    case ActionKind.Configure: {
      const { path, content, mode } = operation.params;
      const target = shellQuote(path);
      const tmp = shellQuote(`${path}.deckhand-tmp`);
      const steps = [
        `mkdir -p "$(dirname ${target})"`,
        `printf '%s' ${shellQuote(content)} > ${tmp}`,
      ];
      if (mode) steps.push(`chmod ${shellQuote(mode)} ${tmp}`);
      steps.push(`mv ${tmp} ${target}`);
      return steps.join(' && ');
    }
    case ActionKind.Deploy: {
      const { release, directory, activate } = operation.params;
      const dir = shellQuote(directory);
      const steps = [`mkdir -p ${dir}`, `cd ${dir}`];
      if (activate) steps.push(`RELEASE=${shellQuote(release)} sh -c ${shellQuote(activate)}`);
      steps.push(`printf '%s' ${shellQuote(release)} > ${shellQuote(`${directory}/${RELEASE_MARKER}`)}`);
      return steps.join(' && ');
    }
    case ActionKind.Restart:
      return `systemctl restart ${shellQuote(operation.params.service)}`;
    case ActionKind.Stop:
      return `systemctl stop ${shellQuote(operation.params.service)}`;
    case ActionKind.Teardown: {
      const steps = operation.params.services.map((s) => `systemctl disable --now ${shellQuote(s)}`);
      if (operation.params.paths.length > 0) {
        steps.push(`rm -rf -- ${operation.params.paths.map(shellQuote).join(' ')}`);
      }
      return steps.join(' && ');
    }
  }
}

/** Shell snippet that prints the current value of one resource key, if known. */
export function probeCommandFor(key: string): string | undefined {
  const sep = key.indexOf(':');
  if (sep <= 0) return undefined;
  const kind = key.slice(0, sep);
  const subject = key.slice(sep + 1);
  if (subject === '') return undefined;

  switch (kind) {
    case 'package':
      return `dpkg-query -W -f='\${Version}' ${shellQuote(subject)}`;
    case 'file':
      return `h=$(sha256sum ${shellQuote(subject)}) && printf 'sha256:%s' "\${h%% *}"`;
    case 'service':
      return `systemctl is-active ${shellQuote(subject)}`;
    case 'release':
      return `cat ${shellQuote(`${subject.replace(/\/+$/, '')}/${RELEASE_MARKER}`)}`;
    default:
      return undefined;
  }
}

/**
 * One script probing every key; prints `<key>\t<value>` for each key whose
 * command succeeded with non-empty output.
 */
export function renderProbeScript(keys: string[]): string {
  const lines: string[] = [];
  for (const key of keys) {
    const command = probeCommandFor(key);
    if (!command) continue;
    lines.push(`v=$( (${command}) 2>/dev/null ) && [ -n "$v" ] && printf '%s\\t%s\\n' ${shellQuote(key)} "$v"`);
  }
  lines.push('true');
  return lines.join('; ');
}

export function parseProbeOutput(output: string, keys: string[]): Record<string, string> {
  const wanted = new Set(keys);
  const observed: Array<[string, string]> = [];
  for (const line of output.split('\n')) {
    const tab = line.indexOf('\t');
    if (tab <= 0) continue;
    const key = line.slice(0, tab);
    if (wanted.has(key)) observed.push([key, line.slice(tab + 1).trim()]);
  }
  return Object.fromEntries(observed);
}
