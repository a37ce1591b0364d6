/**
 * Plan API routes.
 *
 * POST /plans: Build and reconcile a deployment without executing it
 */

import { Router } from 'express';
import { createTypedError, DeckhandError } from '../domain/errors';
import { Inventory } from '../domain/inventory';
import { Manifest } from '../domain/manifest';
import { isRecord, parseManifest } from '../dsl/validator';
import { DeploymentExecutor } from '../engine/executor';
import { createInventory } from '../inventory/inventory';
import { actorOf, asyncHandler } from './middleware';

export interface DeploymentRequest {
  manifest: Manifest;
  inventory: Inventory;
}

/** Validate a `{ manifest, inventory }` request body. */
export function parseDeploymentRequest(body: unknown): DeploymentRequest {
  if (!isRecord(body) || body.manifest === undefined || body.inventory === undefined) {
    throw new DeckhandError(
      createTypedError({
        code: 'MANIFEST.INVALID',
        message: 'Request body must contain "manifest" and "inventory" documents',
      }),
    );
  }
  return {
    manifest: parseManifest(body.manifest),
    inventory: createInventory(body.inventory, 'request'),
  };
}

export function createPlanRoutes(executor: DeploymentExecutor): Router {
  const router = Router();

  router.post(
    '/plans',
    asyncHandler(async (req, res) => {
      const { manifest, inventory } = parseDeploymentRequest(req.body);
      const plan = await executor.plan(manifest, inventory, actorOf(req));
      res.json({ plan });
    }),
  );

  return router;
}
