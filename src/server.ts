/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { Server } from 'http';
import { errorHandler } from './api/middleware';
import { createPlanRoutes } from './api/plans';
import { createRunRoutes } from './api/runs';
import { DeckhandConfig } from './config';
import { DeploymentExecutor } from './engine/executor';
import { CredentialResolver, EnvironmentCredentialResolver } from './inventory/credentials';
import { logger } from './logger';
import { Notifier } from './notifications/webhook';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';
import { Transport } from './transport/transport';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  executor: DeploymentExecutor;
  notifier: Notifier;
  transport: Transport;
}

export interface AppContextOptions {
  config: DeckhandConfig;
  transport: Transport;
  store?: Store;
  credentials?: CredentialResolver;
  notifier?: Notifier;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions): AppContext {
  const store = options.store ?? createMemoryStore();
  const notifier =
    options.notifier ??
    new Notifier({
      url: options.config.webhookUrl,
      signingSecret: options.config.webhookSigningSecret,
      allowPrivate: options.config.webhookAllowPrivate,
    });
  const executor = new DeploymentExecutor({
    transport: options.transport,
    credentials: options.credentials ?? new EnvironmentCredentialResolver(),
    store,
    config: options.config,
    notifier,
  });

  return { store, executor, notifier, transport: options.transport };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      transport: ctx.transport.name,
      notifications: ctx.notifier.enabled,
    });
  });

  const v1 = express.Router();
  v1.use('/', createPlanRoutes(ctx.executor));
  v1.use('/', createRunRoutes(ctx.store, ctx.executor));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}

/** Start listening; resolves once the port is bound. */
export function startServer(ctx: AppContext, port: number): Promise<Server> {
  const app = createApp(ctx);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info('Server listening', { port, transport: ctx.transport.name });
      resolve(server);
    });
    server.on('error', reject);
  });
}
