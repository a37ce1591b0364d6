/**
 * Runtime configuration.
 *
 * Defaults, overridden by DECKHAND_* environment variables, overridden by
 * explicit values (CLI flags, embedding code):
 *
 *   const config = loadConfig(process.env, { maxAttempts: 5 });
 *   const { valid, errors } = validateConfig(config);
 */

import { LogLevel, parseLogLevel } from './logger';

/**
 * How the reconciler treats asserted keys the probe could not observe.
 * - `all`: every asserted key must be observed and equal.
 * - `observed`: unobserved keys are ignored, provided at least one key was
 *   observed and every observed key matches.
 */
export type MatchMode = 'all' | 'observed';

export interface DeckhandConfig {
  /** Worker pool size; undefined means "one per host". */
  maxConcurrency?: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  operationTimeoutMs: number;
  probeTimeoutMs: number;
  matchMode: MatchMode;
  /** Directory for persisted run reports and cancellation requests. */
  stateDir: string;
  webhookUrl?: string;
  webhookSigningSecret?: string;
  /** Allow webhook targets on private networks (e.g. a sink on the same VPN). */
  webhookAllowPrivate: boolean;
  /** Environment variable names whose values are masked in captured output. */
  redactEnv: string[];
  logLevel: LogLevel;
  port: number;
}

export const DEFAULT_CONFIG: DeckhandConfig = {
  maxAttempts: 3,
  backoffBaseMs: 1000,
  backoffMaxMs: 30_000,
  operationTimeoutMs: 300_000,
  probeTimeoutMs: 30_000,
  matchMode: 'all',
  stateDir: '.deckhand',
  webhookAllowPrivate: false,
  redactEnv: [],
  logLevel: LogLevel.Info,
  port: 7400,
};

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : Number.NaN;
}

function matchModeFromEnv(value: string | undefined): MatchMode | undefined {
  if (value === 'all' || value === 'observed') return value;
  return undefined;
}

/** Read DECKHAND_* variables. Unparseable numbers come back as NaN for validateConfig to reject. */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<DeckhandConfig> {
  const fromEnv: Partial<DeckhandConfig> = {
    maxConcurrency: intFromEnv(env.DECKHAND_MAX_CONCURRENCY),
    maxAttempts: intFromEnv(env.DECKHAND_MAX_ATTEMPTS),
    backoffBaseMs: intFromEnv(env.DECKHAND_BACKOFF_BASE_MS),
    backoffMaxMs: intFromEnv(env.DECKHAND_BACKOFF_MAX_MS),
    operationTimeoutMs: intFromEnv(env.DECKHAND_OPERATION_TIMEOUT_MS),
    probeTimeoutMs: intFromEnv(env.DECKHAND_PROBE_TIMEOUT_MS),
    matchMode: matchModeFromEnv(env.DECKHAND_MATCH_MODE),
    stateDir: env.DECKHAND_STATE_DIR || undefined,
    webhookUrl: env.DECKHAND_WEBHOOK_URL || undefined,
    webhookSigningSecret: env.DECKHAND_WEBHOOK_SECRET || undefined,
    webhookAllowPrivate: env.DECKHAND_WEBHOOK_ALLOW_PRIVATE === undefined ? undefined : env.DECKHAND_WEBHOOK_ALLOW_PRIVATE === 'true',
    redactEnv: env.DECKHAND_REDACT_ENV ? env.DECKHAND_REDACT_ENV.split(',').map((s) => s.trim()).filter(Boolean) : undefined,
    logLevel: parseLogLevel(env.DECKHAND_LOG_LEVEL),
    port: intFromEnv(env.DECKHAND_PORT),
  };
  return fromEnv;
}

/** An undefined override falls through to the environment, then to the default. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<DeckhandConfig> = {}): DeckhandConfig {
  const fromEnv = configFromEnv(env);
  const pick = <K extends keyof DeckhandConfig>(key: K): DeckhandConfig[K] =>
    overrides[key] ?? fromEnv[key] ?? DEFAULT_CONFIG[key];

  return {
    maxConcurrency: pick('maxConcurrency'),
    maxAttempts: pick('maxAttempts'),
    backoffBaseMs: pick('backoffBaseMs'),
    backoffMaxMs: pick('backoffMaxMs'),
    operationTimeoutMs: pick('operationTimeoutMs'),
    probeTimeoutMs: pick('probeTimeoutMs'),
    matchMode: pick('matchMode'),
    stateDir: pick('stateDir'),
    webhookUrl: pick('webhookUrl'),
    webhookSigningSecret: pick('webhookSigningSecret'),
    webhookAllowPrivate: pick('webhookAllowPrivate'),
    redactEnv: pick('redactEnv'),
    logLevel: pick('logLevel'),
    port: pick('port'),
  };
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateConfig(config: DeckhandConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const positive = (name: keyof DeckhandConfig, value: number | undefined) => {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      errors.push(`${name} must be a positive integer, got ${value}`);
    }
  };
  positive('maxConcurrency', config.maxConcurrency);
  positive('maxAttempts', config.maxAttempts);
  positive('backoffBaseMs', config.backoffBaseMs);
  positive('backoffMaxMs', config.backoffMaxMs);
  positive('operationTimeoutMs', config.operationTimeoutMs);
  positive('probeTimeoutMs', config.probeTimeoutMs);
  positive('port', config.port);

  if (config.backoffMaxMs < config.backoffBaseMs) {
    errors.push('backoffMaxMs must be greater than or equal to backoffBaseMs');
  }
  if (config.maxAttempts > 10) {
    warnings.push(`maxAttempts of ${config.maxAttempts} may keep a failing host busy for a long time`);
  }
  if (config.webhookSigningSecret && !config.webhookUrl) {
    warnings.push('webhookSigningSecret is set but no webhookUrl is configured');
  }

  return { valid: errors.length === 0, errors, warnings };
}
