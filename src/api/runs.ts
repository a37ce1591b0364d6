/**
 * Run API routes.
 *
 * POST /runs: Start a run (executes asynchronously)
 * GET /runs: List recent runs
 * GET /runs/:runId: Run status, and the report once finished
 * POST /runs/:runId/cancel: Request cancellation of an in-flight run
 */

import { Router } from 'express';
import { DeckhandError, runNotFoundError } from '../domain/errors';
import { isRecord } from '../dsl/validator';
import { DeploymentExecutor } from '../engine/executor';
import { logger } from '../logger';
import { Store } from '../storage/store';
import { actorOf, asyncHandler } from './middleware';
import { parseDeploymentRequest } from './plans';

function parseLimit(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

export function createRunRoutes(store: Store, executor: DeploymentExecutor): Router {
  const router = Router();

  router.post(
    '/runs',
    asyncHandler(async (req, res) => {
      const { manifest, inventory } = parseDeploymentRequest(req.body);
      const run = await executor.createRun(manifest, inventory, actorOf(req));

      // Execute asynchronously; the outcome is recorded on the run.
      executor.executeRun(run.id).catch((err: unknown) => {
        logger.error('Run execution aborted', {
          runId: run.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });

      res.status(202).json({ run });
    }),
  );

  router.get(
    '/runs',
    asyncHandler(async (req, res) => {
      const runs = await store.runs.list({ limit: parseLimit(req.query.limit) });
      res.json({ runs: runs.map(({ report: _report, ...summary }) => summary) });
    }),
  );

  router.get(
    '/runs/:runId',
    asyncHandler(async (req, res) => {
      const run = await store.runs.getById(req.params.runId);
      if (!run) throw new DeckhandError(runNotFoundError(req.params.runId));
      res.json({ run });
    }),
  );

  router.post(
    '/runs/:runId/cancel',
    asyncHandler(async (req, res) => {
      const reason = isRecord(req.body) && typeof req.body.reason === 'string' ? req.body.reason : undefined;
      const run = await executor.cancelRun(req.params.runId, actorOf(req), reason);
      res.status(202).json({ run });
    }),
  );

  return router;
}
