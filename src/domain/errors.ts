/**
 * Typed error model.
 *
 * Every failure the engine can report is a TypedError with a namespaced
 * code. Load-time and graph errors are thrown wrapped in DeckhandError;
 * execution-time errors are recorded on the affected ExecutionResult.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'MANIFEST'
  | 'INVENTORY'
  | 'GRAPH'
  | 'PROBE'
  | 'OPERATION'
  | 'NOTIFY'
  | 'RUN'
  | 'CONFIG'
  | 'STORE'
  | 'SYSTEM';

/** Machine-actionable remediation hint. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

export interface TypedError {
  /** Namespaced error code (e.g. "GRAPH.CYCLE_DETECTED"). */
  code: string;
  message: string;
  operationId?: string;
  hostId?: string;
  runId?: string;
  /** Whether repeating the same action unchanged may succeed. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

export function createTypedError(params: {
  code: string;
  message: string;
  operationId?: string;
  hostId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    operationId: params.operationId,
    hostId: params.hostId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Thrown wrapper so callers can branch on the typed payload. */
export class DeckhandError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'DeckhandError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Problem found while validating a document, with its JSON-ish path. */
export interface ValidationIssue {
  path: string;
  message: string;
}

// --- Load-time errors ---

export function invalidManifestError(issues: ValidationIssue[]): TypedError {
  return createTypedError({
    code: 'MANIFEST.INVALID',
    message: `Invalid deployment manifest: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
    details: { issues },
    suggestedFixes: issues.map((i) => ({
      type: 'FIX_FIELD',
      params: { path: i.path },
      description: i.message,
    })),
  });
}

export function invalidInventoryError(issues: ValidationIssue[]): TypedError {
  return createTypedError({
    code: 'INVENTORY.INVALID',
    message: `Invalid inventory: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
    details: { issues },
  });
}

export function unreadableDocumentError(path: string, reason: string): TypedError {
  return createTypedError({
    code: 'MANIFEST.UNREADABLE',
    message: `Cannot read document ${path}: ${reason}`,
    details: { path },
  });
}

// --- Graph construction errors ---

export function cycleDetectedError(cycle: string[]): TypedError {
  return createTypedError({
    code: 'GRAPH.CYCLE_DETECTED',
    message: `Dependency cycle detected: ${cycle.join(' -> ')}`,
    details: { cycle },
    suggestedFixes: [
      { type: 'REMOVE_DEPENDENCY', params: { from: cycle[cycle.length - 2], to: cycle[cycle.length - 1] } },
    ],
  });
}

export function unknownDependencyError(operationId: string, dependencyId: string): TypedError {
  return createTypedError({
    code: 'GRAPH.UNKNOWN_DEPENDENCY',
    message: `Operation "${operationId}" depends on unknown operation "${dependencyId}"`,
    operationId,
    details: { dependencyId },
    suggestedFixes: [
      { type: 'FIX_DEPENDENCY', params: { operationId, dependencyId }, description: 'Reference an operation declared in the manifest' },
    ],
  });
}

export function unknownHostTargetError(operationId: string, target: string): TypedError {
  return createTypedError({
    code: 'GRAPH.UNKNOWN_HOST_GROUP',
    message: `Operation "${operationId}" targets "${target}", which matches no host or group in the inventory`,
    operationId,
    details: { target },
  });
}

// --- Execution-time errors ---

export function probeUnreachableError(hostId: string, reason: string): TypedError {
  return createTypedError({
    code: 'PROBE.UNREACHABLE',
    message: `Probe of host "${hostId}" failed: ${reason}`,
    hostId,
    retryable: true,
  });
}

export function operationTimeoutError(operationId: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'OPERATION.TIMEOUT',
    message: `Operation timed out after ${timeoutMs}ms`,
    operationId,
    retryable: true,
    details: { timeoutMs, attempt },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
  });
}

export function operationExecutionError(
  operationId: string,
  message: string,
  retryable: boolean,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: retryable ? 'OPERATION.EXECUTION_ERROR' : 'OPERATION.NON_RETRYABLE',
    message,
    operationId,
    retryable,
    details,
  });
}

export function retriesExhaustedError(operationId: string, attempts: number, last: TypedError): TypedError {
  return createTypedError({
    code: 'OPERATION.RETRIES_EXHAUSTED',
    message: `Operation failed after ${attempts} attempt(s): ${last.message}`,
    operationId,
    hostId: last.hostId,
    retryable: false,
    details: { attempts, lastError: last },
  });
}

export function notifyFailedError(reason: string, runId: string): TypedError {
  return createTypedError({
    code: 'NOTIFY.FAILED',
    message: `Run notification failed: ${reason}`,
    runId,
    retryable: true,
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
  });
}

export function runAlreadyRunningError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.ALREADY_RUNNING',
    message: `Run "${runId}" is already being executed`,
    runId,
  });
}

export function runAlreadyFinishedError(runId: string, outcome: string): TypedError {
  return createTypedError({
    code: 'RUN.ALREADY_FINISHED',
    message: `Run "${runId}" already finished with outcome "${outcome}"`,
    runId,
    details: { outcome },
  });
}

// --- Secret masking ---

/**
 * Mask a secret, keeping the last 4 characters for identification.
 * Secrets shorter than 8 characters are masked entirely.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in `message` with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret) {
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** Extract the typed payload from anything thrown. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof DeckhandError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
  });
}

/** Standard API error response body. */
export interface ApiErrorResponse {
  error: TypedError;
}

export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
