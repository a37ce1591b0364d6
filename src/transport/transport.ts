/**
 * Remote execution channel.
 *
 * The engine never talks to hosts directly: it asks a Transport to probe
 * resource keys and to apply operations. Implementations decide how.
 */

import { Host } from '../domain/inventory';
import { Operation } from '../domain/operation';
import { CredentialHandle } from '../inventory/credentials';

export interface ProbeContext {
  credential: CredentialHandle;
  timeoutMs: number;
}

export interface ExecuteContext {
  runId: string;
  /** 1-based attempt number. */
  attempt: number;
  /** Reused across retries so reapplication is safe on the host. */
  idempotencyKey: string;
  credential: CredentialHandle;
  timeoutMs: number;
  /**
   * Aborted when the attempt's deadline passes. The engine keeps the host
   * reserved until execute settles, so implementations should stop the
   * remote command promptly once this fires.
   */
  signal: AbortSignal;
}

export interface ExecuteResult {
  output: string;
}

export interface Transport {
  readonly name: string;
  /**
   * Fetch current values for resource keys. Keys the host cannot report are
   * left out of the result. Throws when the host cannot be reached.
   */
  probe(host: Host, keys: string[], context: ProbeContext): Promise<Record<string, string>>;
  /** Apply one operation. Throws TransportError (or anything) on failure. */
  execute(host: Host, operation: Operation, context: ExecuteContext): Promise<ExecuteResult>;
}

/** Failure raised by a transport, classified for the retry policy. */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly output?: string,
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}
