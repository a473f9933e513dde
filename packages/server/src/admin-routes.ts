// Asset Registry - Admin Routes
//
// Protected routes for minting and inspecting the operation history.

import { Router, Request, Response } from 'express';
import type { RegistryManager } from './registry-manager.js';
import { requireAdminAuth } from './auth-middleware.js';
import { handle, parseBody, submitOperation } from './routes.js';
import { mintRequestSchema } from './schemas.js';

// =============================================================================
// Route Factory
// =============================================================================

export function createAdminRoutes(manager: RegistryManager, adminApiKey: string | null): Router {
  const router = Router();

  router.use(requireAdminAuth(adminApiKey));

  /**
   * POST /admin/mint - Mint the next token to an account
   */
  router.post('/mint', handle((req, res) => {
    const body = parseBody(mintRequestSchema, req, res);
    if (!body) return;

    submitOperation(manager, { type: 'mint', to: body.to, uri: body.uri }, res, 201);
  }));

  /**
   * GET /admin/history - Operations accepted by this server. `replayable` is
   * false when the server started from an existing registry; restore those
   * from /admin/snapshot instead.
   */
  router.get('/history', (_req: Request, res: Response) => {
    const operations = manager.getHistory();
    res.json({ count: operations.length, replayable: manager.isHistoryReplayable(), operations });
  });

  /**
   * GET /admin/snapshot - Full registry snapshot, restorable with AssetRegistry.deserialize()
   */
  router.get('/snapshot', (_req: Request, res: Response) => {
    res.type('application/json').send(manager.registry.serialize());
  });

  return router;
}
