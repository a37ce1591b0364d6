/**
 * Operation runner: applies one operation to its host under the retry
 * policy.
 *
 * Each attempt has its own timeout. Timeouts and retryable transport errors
 * are retried with exponential backoff until the attempt budget runs out;
 * the idempotency key is the same on every attempt.
 */

import {
  TypedError,
  maskSecretsInMessage,
  operationExecutionError,
  operationTimeoutError,
  retriesExhaustedError,
} from '../domain/errors';
import { Host } from '../domain/inventory';
import { Operation } from '../domain/operation';
import { AttemptRecord, OperationStatus } from '../domain/run';
import { CredentialHandle } from '../inventory/credentials';
import { Logger } from '../logger';
import { Transport, TransportError } from '../transport/transport';

export interface RetryPolicy {
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface OperationRunContext {
  runId: string;
  host: Host;
  credential: CredentialHandle;
  transport: Transport;
  retry: RetryPolicy;
  /** Secret values masked out of captured output and error messages. */
  redact: string[];
  log: Logger;
  sleep: (ms: number) => Promise<void>;
}

export interface OperationRunOutcome {
  status: OperationStatus.Succeeded | OperationStatus.FailedFatal;
  attempts: AttemptRecord[];
  output?: string;
  error?: TypedError;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

/**
 * Delay before retry number `retry` (1 for the first retry):
 * base × 2^(retry−1), capped at `maxMs`.
 */
export function computeBackoff(baseMs: number, retry: number, maxMs: number): number {
  return Math.min(baseMs * Math.pow(2, Math.max(0, retry - 1)), maxMs);
}

class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/**
 * Run one attempt under a deadline. On expiry the signal is aborted, but the
 * attempt holds its host until the transport's promise settles.
 */
async function withAttemptTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const result = await fn(controller.signal);
    if (controller.signal.aborted) throw new AttemptTimeoutError(timeoutMs);
    return result;
  } catch (err) {
    if (controller.signal.aborted) throw new AttemptTimeoutError(timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

export async function runOperation(operation: Operation, ctx: OperationRunContext): Promise<OperationRunOutcome> {
  const startedAt = new Date().toISOString();
  const started = Date.now();
  const attempts: AttemptRecord[] = [];
  const mask = (text: string) => maskSecretsInMessage(text, ctx.redact);

  for (let attempt = 1; attempt <= operation.maxAttempts; attempt++) {
    const attemptStartedAt = new Date().toISOString();
    const attemptStarted = Date.now();
    try {
      const result = await withAttemptTimeout(
        (signal) =>
          ctx.transport.execute(ctx.host, operation, {
            runId: ctx.runId,
            attempt,
            idempotencyKey: operation.idempotencyKey,
            credential: ctx.credential,
            timeoutMs: operation.timeoutMs,
            signal,
          }),
        operation.timeoutMs,
      );
      const output = mask(result.output);
      attempts.push({
        attempt,
        status: OperationStatus.Succeeded,
        startedAt: attemptStartedAt,
        durationMs: Date.now() - attemptStarted,
        output,
      });
      return {
        status: OperationStatus.Succeeded,
        attempts,
        output,
        startedAt,
        completedAt: new Date().toISOString(),
        durationMs: Date.now() - started,
      };
    } catch (err) {
      const { error, output } = classifyFailure(operation, ctx.host, attempt, err, mask);
      const willRetry = error.retryable && attempt < operation.maxAttempts;
      attempts.push({
        attempt,
        status: error.retryable ? OperationStatus.FailedRetryable : OperationStatus.FailedFatal,
        startedAt: attemptStartedAt,
        durationMs: Date.now() - attemptStarted,
        output,
        error,
      });

      if (!willRetry) {
        const finalError = error.retryable ? retriesExhaustedError(operation.id, attempt, error) : error;
        ctx.log.error('Operation failed', { code: finalError.code, attempts: attempt, message: finalError.message });
        return {
          status: OperationStatus.FailedFatal,
          attempts,
          output,
          error: finalError,
          startedAt,
          completedAt: new Date().toISOString(),
          durationMs: Date.now() - started,
        };
      }

      const delay = computeBackoff(ctx.retry.backoffBaseMs, attempt, ctx.retry.backoffMaxMs);
      ctx.log.info('Retrying operation after transient failure', { attempt, delayMs: delay, code: error.code });
      await ctx.sleep(delay);
    }
  }

  // Only reachable when maxAttempts < 1, which validation forbids.
  return {
    status: OperationStatus.FailedFatal,
    attempts,
    error: operationExecutionError(operation.id, 'Operation has no attempts configured', false),
    startedAt,
    completedAt: new Date().toISOString(),
    durationMs: Date.now() - started,
  };
}

function classifyFailure(
  operation: Operation,
  host: Host,
  attempt: number,
  err: unknown,
  mask: (text: string) => string,
): { error: TypedError; output?: string } {
  if (err instanceof AttemptTimeoutError) {
    return { error: { ...operationTimeoutError(operation.id, err.timeoutMs, attempt), hostId: host.id } };
  }
  if (err instanceof TransportError) {
    const output = err.output !== undefined ? mask(err.output) : undefined;
    const error = operationExecutionError(operation.id, mask(err.message), err.retryable, {
      attempt,
      exitCode: err.exitCode,
    });
    return { error: { ...error, hostId: host.id }, output };
  }
  // Anything else the transport throws (network errors, bugs) is treated as transient.
  const message = err instanceof Error ? err.message : String(err);
  return { error: { ...operationExecutionError(operation.id, mask(message), true, { attempt }), hostId: host.id } };
}
