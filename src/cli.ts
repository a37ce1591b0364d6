#!/usr/bin/env node
/**
 * deckhand command line.
 *
 *   deckhand plan   deploy.yaml -i hosts.yaml
 *   deckhand run    deploy.yaml -i hosts.yaml [--dry-transport]
 *   deckhand cancel <run-id> [--reason text]
 *   deckhand show   <run-id>          run record and its audit trail
 *   deckhand serve  [--port 7400]
 *
 * Reports go to stdout as JSON; logs go to stderr. Exit codes: 0 success,
 * 1 run failed, 2 invalid input, 130 cancelled.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { AuditService } from './audit/audit-service';
import { DeckhandConfig, MatchMode, loadConfig, validateConfig } from './config';
import { DeckhandError, TypedError, createTypedError, toTypedError } from './domain/errors';
import { RunStatus } from './domain/run';
import { loadManifest } from './dsl/loader';
import { DeploymentExecutor, requestRunCancellation } from './engine/executor';
import { CredentialResolver, EnvironmentCredentialResolver } from './inventory/credentials';
import { loadInventory } from './inventory/inventory';
import { logger, parseLogLevel, setLogLevel } from './logger';
import { Notifier } from './notifications/webhook';
import { createAppContext, startServer } from './server';
import { createFileStore } from './storage/file-store';
import { Store } from './storage/store';
import { DryRunTransport } from './transport/dry-run-transport';
import { SshTransport } from './transport/ssh-transport';
import { Transport } from './transport/transport';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_INPUT = 2;
export const EXIT_CANCELLED = 130;

const INPUT_ERROR_PREFIXES = ['MANIFEST.', 'INVENTORY.', 'GRAPH.', 'CONFIG.', 'STORE.'];

/** Process-facing seams, replaced in tests. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  /** Subscribe to Ctrl-C; returns an unsubscribe function. */
  onInterrupt(handler: () => void): () => void;
  createTransport?(dry: boolean): Transport;
  createStore?(stateDir: string): Store;
  credentials?: CredentialResolver;
  sleep?: (ms: number) => Promise<void>;
}

interface CommonOptions {
  stateDir?: string;
  logLevel?: string;
}

interface DeploymentOptions extends CommonOptions {
  inventory: string;
  dryTransport?: boolean;
  maxConcurrency?: number;
  maxAttempts?: number;
  timeout?: number;
  matchMode?: MatchMode;
  webhook?: string;
  webhookSecret?: string;
  webhookAllowPrivate?: boolean;
}

interface CancelOptions extends CommonOptions {
  reason?: string;
  by?: string;
}

interface ServeOptions extends CommonOptions {
  port?: number;
  dryTransport?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function parseMatchMode(value: string): MatchMode {
  if (value === 'all' || value === 'observed') return value;
  throw new InvalidArgumentError('must be "all" or "observed"');
}

export function exitCodeForOutcome(outcome: RunStatus): number {
  if (outcome === RunStatus.Succeeded) return EXIT_SUCCESS;
  if (outcome === RunStatus.Cancelled) return EXIT_CANCELLED;
  return EXIT_FAILURE;
}

export function exitCodeForError(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return EXIT_INVALID_INPUT;
  return INPUT_ERROR_PREFIXES.some((prefix) => error.code.startsWith(prefix)) ? EXIT_INVALID_INPUT : EXIT_FAILURE;
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

/** Build the program; `setExit` receives each command's exit code. */
export function buildProgram(io: CliIO, setExit: (code: number) => void): Command {
  const program = new Command();

  const resolveConfig = (opts: CommonOptions, overrides: Partial<DeckhandConfig> = {}): DeckhandConfig => {
    const config = loadConfig(io.env, {
      ...overrides,
      stateDir: opts.stateDir,
      logLevel: parseLogLevel(opts.logLevel),
    });
    const validation = validateConfig(config);
    if (!validation.valid) {
      throw new DeckhandError(
        createTypedError({
          code: 'CONFIG.INVALID',
          message: `Invalid configuration: ${validation.errors.join('; ')}`,
          details: { errors: validation.errors },
        }),
      );
    }
    for (const warning of validation.warnings) logger.warn(warning);
    setLogLevel(config.logLevel);
    return config;
  };

  const storeFor = (config: DeckhandConfig): Store =>
    io.createStore ? io.createStore(config.stateDir) : createFileStore(config.stateDir);

  const transportFor = (dry: boolean): Transport => {
    if (io.createTransport) return io.createTransport(dry);
    return dry ? new DryRunTransport() : new SshTransport();
  };

  const executorFor = (config: DeckhandConfig, store: Store, dry: boolean): DeploymentExecutor =>
    new DeploymentExecutor({
      transport: transportFor(dry),
      credentials: io.credentials ?? new EnvironmentCredentialResolver(io.env),
      store,
      config,
      env: io.env,
      sleep: io.sleep,
      notifier: new Notifier({
        url: config.webhookUrl,
        signingSecret: config.webhookSigningSecret,
        allowPrivate: config.webhookAllowPrivate,
      }),
    });

  const deploymentOverrides = (opts: DeploymentOptions): Partial<DeckhandConfig> => ({
    maxConcurrency: opts.maxConcurrency,
    maxAttempts: opts.maxAttempts,
    operationTimeoutMs: opts.timeout,
    matchMode: opts.matchMode,
    webhookUrl: opts.webhook,
    webhookSigningSecret: opts.webhookSecret,
    webhookAllowPrivate: opts.webhookAllowPrivate,
  });

  /** Run an action, mapping thrown errors to exit codes. */
  const guarded =
    <A extends unknown[]>(fn: (...args: A) => Promise<number>) =>
    async (...args: A): Promise<void> => {
      try {
        setExit(await fn(...args));
      } catch (err) {
        const error = toTypedError(err);
        io.stderr(`error: ${error.message}\n`);
        const issues = error.details?.issues;
        if (Array.isArray(issues)) {
          for (const issue of issues) io.stderr(`  - ${JSON.stringify(issue)}\n`);
        }
        setExit(exitCodeForError(error));
      }
    };

  const withDeploymentOptions = (command: Command): Command =>
    command
      .requiredOption('-i, --inventory <path>', 'inventory file (JSON or YAML)')
      .option('--dry-transport', 'execute nothing; report every operation as succeeded')
      .option('--max-concurrency <n>', 'worker pool size (default: host count)', parsePositiveInt)
      .option('--max-attempts <n>', 'default attempts per operation', parsePositiveInt)
      .option('--timeout <ms>', 'default per-attempt timeout in milliseconds', parsePositiveInt)
      .option('--match-mode <mode>', 'desired-state matching: all | observed', parseMatchMode)
      .option('--webhook <url>', 'summary notification URL')
      .option('--webhook-secret <secret>', 'HMAC signing secret for the webhook')
      .option('--webhook-allow-private', 'allow webhook targets on private networks')
      .option('--state-dir <dir>', 'directory for run reports and cancellation requests')
      .option('--log-level <level>', 'debug | info | warn | error');

  program
    .name('deckhand')
    .description('Deployment orchestration for small fleets')
    .exitOverride()
    .configureOutput({ writeOut: (s) => io.stdout(s), writeErr: (s) => io.stderr(s) });

  withDeploymentOptions(program.command('plan').argument('<manifest>', 'deployment document (JSON or YAML)'))
    .description('show what a run would do, without executing anything')
    .action(
      guarded(async (manifestPath: string, opts: DeploymentOptions) => {
        const config = resolveConfig(opts, deploymentOverrides(opts));
        const manifest = await loadManifest(manifestPath);
        const inventory = await loadInventory(opts.inventory);
        const plan = await executorFor(config, storeFor(config), opts.dryTransport ?? false).plan(manifest, inventory);
        io.stdout(json(plan));
        return EXIT_SUCCESS;
      }),
    );

  withDeploymentOptions(program.command('run').argument('<manifest>', 'deployment document (JSON or YAML)'))
    .description('plan, reconcile and execute a deployment')
    .action(
      guarded(async (manifestPath: string, opts: DeploymentOptions) => {
        const config = resolveConfig(opts, deploymentOverrides(opts));
        const manifest = await loadManifest(manifestPath);
        const inventory = await loadInventory(opts.inventory);
        const executor = executorFor(config, storeFor(config), opts.dryTransport ?? false);

        const run = await executor.createRun(manifest, inventory, io.env.USER ?? 'cli');
        io.stderr(`run ${run.id} started\n`);
        const unsubscribe = io.onInterrupt(() => {
          io.stderr(`cancelling ${run.id}; in-flight operations will finish\n`);
          executor.cancelRun(run.id, 'signal:SIGINT', 'interrupted').catch((err: unknown) => {
            logger.warn('Cancellation on interrupt failed', { runId: run.id, error: toTypedError(err).message });
          });
        });
        try {
          const report = await executor.executeRun(run.id);
          io.stdout(json(report));
          return exitCodeForOutcome(report.outcome);
        } finally {
          unsubscribe();
        }
      }),
    );

  program
    .command('cancel')
    .argument('<run-id>', 'run to cancel')
    .description('request cancellation of a running deployment')
    .option('--reason <text>', 'recorded with the request')
    .option('--by <actor>', 'who is cancelling')
    .option('--state-dir <dir>', 'directory for run reports and cancellation requests')
    .option('--log-level <level>', 'debug | info | warn | error')
    .action(
      guarded(async (runId: string, opts: CancelOptions) => {
        const config = resolveConfig(opts);
        const record = await requestRunCancellation(storeFor(config), runId, opts.by ?? io.env.USER ?? 'cli', opts.reason);
        io.stdout(json({ runId: record.id, status: record.status, cancellation: record.cancellation }));
        return EXIT_SUCCESS;
      }),
    );

  program
    .command('show')
    .argument('<run-id>', 'run to show')
    .description('print a run record, its report and its audit trail')
    .option('--state-dir <dir>', 'directory for run reports and cancellation requests')
    .option('--log-level <level>', 'debug | info | warn | error')
    .action(
      guarded(async (runId: string, opts: CommonOptions) => {
        const config = resolveConfig(opts);
        const store = storeFor(config);
        const record = await store.runs.getById(runId);
        if (!record) {
          io.stderr(`error: run not found: ${runId}\n`);
          return EXIT_INVALID_INPUT;
        }
        const audit = await new AuditService(store).query({ resourceId: runId });
        io.stdout(json({ run: record, audit }));
        return EXIT_SUCCESS;
      }),
    );

  program
    .command('serve')
    .description('start the HTTP API')
    .option('--port <n>', 'listen port', parsePositiveInt)
    .option('--dry-transport', 'execute nothing; report every operation as succeeded')
    .option('--log-level <level>', 'debug | info | warn | error')
    .action(
      guarded(async (opts: ServeOptions) => {
        const config = resolveConfig(opts, { port: opts.port });
        const ctx = createAppContext({
          config,
          transport: transportFor(opts.dryTransport ?? false),
          credentials: io.credentials ?? new EnvironmentCredentialResolver(io.env),
        });
        await startServer(ctx, config.port);
        return EXIT_SUCCESS;
      }),
    );

  return program;
}

/** Parse and run; resolves with the process exit code. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_SUCCESS;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version exit cleanly; usage errors are invalid input.
      return err.exitCode === 0 ? EXIT_SUCCESS : EXIT_INVALID_INPUT;
    }
    throw err;
  }
  return exitCode;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
  onInterrupt: (handler) => {
    process.on('SIGINT', handler);
    return () => {
      process.off('SIGINT', handler);
    };
  },
};

if (require.main === module) {
  runCli(process.argv.slice(2), processIO).then(
    (code) => {
      // serve keeps the event loop alive through its listener.
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`fatal: ${toTypedError(err).message}\n`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
