/**
 * Deckhand: deployment orchestration for small fleets.
 *
 * Library entry point. The `deckhand` binary lives in ./cli.
 */

export * from './domain';
export * from './config';
export * from './logger';
export * from './dsl/schema';
export * from './dsl/validator';
export * from './dsl/loader';
export * from './inventory/inventory';
export * from './inventory/credentials';
export * from './graph/task-graph';
export * from './reconciler/reconciler';
export * from './engine/cancellation';
export * from './engine/executor';
export * from './engine/operation-runner';
export * from './engine/report';
export * from './engine/scheduler';
export * from './engine/state-machine';
export * from './transport';
export * from './notifications/webhook';
export * from './audit/audit-service';
export * from './storage/store';
export * from './storage/memory-store';
export * from './storage/file-store';
export { createApp, createAppContext, startServer } from './server';
export type { AppContext, AppContextOptions } from './server';
