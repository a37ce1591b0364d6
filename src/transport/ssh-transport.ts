/**
 * SSH transport.
 *
 * Runs rendered commands through the system `ssh` client in batch mode.
 * Exit status 255 (connection failure), local timeouts and well-known
 * transient remote errors are retryable; any other non-zero exit is fatal.
 */

import { spawn } from 'child_process';
import { Host } from '../domain/inventory';
import { Operation } from '../domain/operation';
import { CredentialHandle } from '../inventory/credentials';
import { logger } from '../logger';
import { parseProbeOutput, renderCommand, renderProbeScript, shellQuote } from './commands';
import { ExecuteContext, ExecuteResult, ProbeContext, Transport, TransportError } from './transport';

export interface SshTransportOptions {
  sshBinary?: string;
  connectTimeoutSec?: number;
  /** Wrap remote commands in `sudo -n`. */
  sudo?: boolean;
  extraArgs?: string[];
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

const SSH_CONNECTION_FAILURE = 255;

const TRANSIENT_REMOTE_ERRORS = [
  /Could not get lock/i,
  /dpkg was interrupted/i,
  /Temporary failure resolving/i,
  /Connection (reset|timed out)/i,
];

/** Characters kept per stream. */
const MAX_CAPTURE_CHARS = 64 * 1024;

export class SshTransport implements Transport {
  readonly name = 'ssh';
  private log = logger.child({ transport: 'ssh' });

  constructor(private options: SshTransportOptions = {}) {}

  sshArgs(host: Host, credential: CredentialHandle): string[] {
    const args = [
      '-o', 'BatchMode=yes',
      '-o', `ConnectTimeout=${this.options.connectTimeoutSec ?? 10}`,
      '-o', 'StrictHostKeyChecking=accept-new',
    ];
    if (host.port) args.push('-p', String(host.port));
    if (credential.kind === 'identity-file' && credential.identityFile) {
      args.push('-i', credential.identityFile, '-o', 'IdentitiesOnly=yes');
    }
    args.push(...(this.options.extraArgs ?? []));
    args.push(host.user ? `${host.user}@${host.address}` : host.address);
    return args;
  }

  async probe(host: Host, keys: string[], context: ProbeContext): Promise<Record<string, string>> {
    const script = renderProbeScript(keys);
    const result = await this.run(host, context.credential, this.wrap(script, {}), context.timeoutMs);
    if (result.timedOut) {
      throw new Error(`probe timed out after ${context.timeoutMs}ms`);
    }
    if (result.exitCode === SSH_CONNECTION_FAILURE || result.exitCode === null) {
      throw new Error(result.stderr.trim() || 'ssh connection failed');
    }
    return parseProbeOutput(result.stdout, keys);
  }

  async execute(host: Host, operation: Operation, context: ExecuteContext): Promise<ExecuteResult> {
    const command = this.wrap(renderCommand(operation), {
      DECKHAND_RUN_ID: context.runId,
      DECKHAND_IDEMPOTENCY_KEY: context.idempotencyKey,
      DECKHAND_ATTEMPT: String(context.attempt),
    });
    this.log.debug('Executing remote command', { hostId: host.id, operationId: operation.id, attempt: context.attempt });

    const result = await this.run(host, context.credential, command, context.timeoutMs, context.signal);
    const output = [result.stdout, result.stderr].filter((s) => s.length > 0).join('\n');

    if (result.timedOut) {
      throw new TransportError(`command timed out after ${context.timeoutMs}ms`, true, output);
    }
    if (result.exitCode === 0) {
      return { output };
    }
    if (result.exitCode === SSH_CONNECTION_FAILURE || result.exitCode === null) {
      throw new TransportError(`ssh connection to ${host.address} failed`, true, output, result.exitCode ?? undefined);
    }
    const transient = TRANSIENT_REMOTE_ERRORS.some((pattern) => pattern.test(output));
    throw new TransportError(`remote command exited with status ${result.exitCode}`, transient, output, result.exitCode);
  }

  private wrap(command: string, env: Record<string, string>): string {
    const assignments = Object.entries(env).map(([k, v]) => `${k}=${shellQuote(v)}`);
    const shell = `sh -c ${shellQuote(command)}`;
    const prefix = this.options.sudo ? ['sudo', '-n', 'env', ...assignments] : assignments.length > 0 ? ['env', ...assignments] : [];
    return [...prefix, shell].join(' ');
  }

  private run(
    host: Host,
    credential: CredentialHandle,
    command: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.options.sshBinary ?? 'ssh', [...this.sshArgs(host, credential), command], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const stop = (): void => {
        timedOut = true;
        child.kill('SIGTERM');
      };
      const timer = setTimeout(stop, timeoutMs);
      signal?.addEventListener('abort', stop, { once: true });
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', stop);
      };

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        if (stdout.length < MAX_CAPTURE_CHARS) stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        if (stderr.length < MAX_CAPTURE_CHARS) stderr += chunk;
      });
      child.on('error', (err) => {
        cleanup();
        reject(new TransportError(`cannot start ssh: ${err.message}`, false));
      });
      child.on('close', (code) => {
        cleanup();
        resolve({ exitCode: code, stdout: stdout.trim(), stderr: stderr.trim(), timedOut });
      });
    });
  }
}
