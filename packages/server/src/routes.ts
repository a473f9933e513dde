// Asset Registry - Express Routes
//
// Query surface (GET) and mutation intents (POST) for the presentation layer.
// Mutations act on behalf of the account named in the X-Caller header.

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodType } from 'zod';
import { fromZodError } from 'zod-validation-error';
import {
  RegistryError,
  RegistryErrorCode,
  RegistryOperation,
  TokenId,
  isRegistryError,
  isValidTokenId,
  isZeroAccount,
} from '@asset-registry/core';
import type { RegistryManager } from './registry-manager.js';
import { getCaller } from './auth-middleware.js';
import {
  approveRequestSchema,
  operatorRequestSchema,
  transferRequestSchema,
} from './schemas.js';
import type { ErrorResponse, MutationResponse, RegistryInfoResponse } from './types.js';

// =============================================================================
// Error mapping
// =============================================================================

const STATUS_BY_CODE: Record<RegistryErrorCode, number> = {
  ZeroAddress: 400,
  InvalidAccount: 400,
  SelfApproval: 400,
  InvalidTokenId: 400,
  InvalidSnapshot: 400,
  NotFound: 404,
  Unauthorized: 403,
  OwnerMismatch: 409,
  AlreadyMinted: 409,
};

export function sendError(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

export function sendRegistryError(res: Response, code: RegistryErrorCode, message: string): void {
  sendError(res, STATUS_BY_CODE[code], { success: false, error: code, message });
}

/**
 * Wrap a synchronous handler so registry rejections become JSON responses
 * and anything else reaches the express error handler.
 */
export function handle(fn: (req: Request, res: Response) => void): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      fn(req, res);
    } catch (error) {
      if (isRegistryError(error)) {
        sendRegistryError(res, error.code, error.message);
        return;
      }
      next(error);
    }
  };
}

// =============================================================================
// Input helpers
// =============================================================================

export function parseTokenId(raw: string): TokenId {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!isValidTokenId(id)) {
    throw new RegistryError('InvalidTokenId', `Invalid token id: ${raw}`);
  }
  return id;
}

/**
 * Validate a request body, answering 400 on failure. Returns null when the
 * response has already been sent.
 */
export function parseBody<T>(schema: ZodType<T>, req: Request, res: Response): T | null {
  const parsed = schema.safeParse(req.body);
  if (!parsed.success) {
    sendError(res, 400, {
      success: false,
      error: 'VALIDATION_ERROR',
      message: fromZodError(parsed.error).message,
    });
    return null;
  }
  return parsed.data;
}

function requireCaller(req: Request, res: Response): string | null {
  const caller = getCaller(req);
  if (!caller) {
    sendError(res, 401, {
      success: false,
      error: 'MISSING_CALLER',
      message: 'X-Caller header is required',
    });
    return null;
  }
  if (isZeroAccount(caller)) {
    sendError(res, 403, {
      success: false,
      error: 'Unauthorized',
      message: 'The zero account cannot act as caller',
    });
    return null;
  }
  return caller;
}

export function submitOperation(
  manager: RegistryManager,
  operation: RegistryOperation,
  res: Response,
  successStatus = 200
): void {
  const result = manager.submit(operation);
  if (!result.ok) {
    sendRegistryError(res, result.error.code, result.error.message);
    return;
  }

  const body: MutationResponse = { success: true };
  if (result.tokenId !== undefined) {
    body.tokenId = result.tokenId;
  }
  res.status(successStatus).json(body);
}

// =============================================================================
// Route Factory
// =============================================================================

export function createRoutes(manager: RegistryManager): Router {
  const router = Router();
  const registry = manager.registry;

  // ===========================================================================
  // Health Check
  // ===========================================================================

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime(),
    });
  });

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * GET /registry - Name, symbol and total minted
   */
  router.get('/registry', (_req: Request, res: Response) => {
    const info: RegistryInfoResponse = {
      name: registry.getName(),
      symbol: registry.getSymbol(),
      totalMinted: registry.getTotalMinted(),
    };
    res.json(info);
  });

  /**
   * GET /tokens/:id - Asset view
   */
  router.get('/tokens/:id', handle((req, res) => {
    const tokenId = parseTokenId(req.params.id);
    const asset = registry.getAsset(tokenId);
    if (!asset) {
      sendRegistryError(res, 'NotFound', `Token ${tokenId} does not exist`);
      return;
    }
    res.json(asset);
  }));

  /**
   * GET /tokens/:id/owner - Owner, or the zero account
   */
  router.get('/tokens/:id/owner', handle((req, res) => {
    const tokenId = parseTokenId(req.params.id);
    res.json({ tokenId, owner: registry.ownerOf(tokenId) });
  }));

  router.get('/tokens/:id/uri', handle((req, res) => {
    const tokenId = parseTokenId(req.params.id);
    res.json({ tokenId, uri: registry.getTokenUri(tokenId) });
  }));

  router.get('/tokens/:id/approved', handle((req, res) => {
    const tokenId = parseTokenId(req.params.id);
    res.json({ tokenId, approved: registry.getApproved(tokenId) });
  }));

  router.get('/accounts/:account/balance', handle((req, res) => {
    const { account } = req.params;
    res.json({ account, balance: registry.balanceOf(account) });
  }));

  router.get('/accounts/:account/tokens', handle((req, res) => {
    const { account } = req.params;
    res.json({ account, tokenIds: registry.getTokenIdsOf(account) });
  }));

  router.get('/accounts/:owner/operators/:operator', handle((req, res) => {
    const { owner, operator } = req.params;
    res.json({ owner, operator, approved: registry.isApprovedForAll(owner, operator) });
  }));

  // ===========================================================================
  // Mutation intents
  // ===========================================================================

  /**
   * POST /tokens/:id/approve - Approve one account for a token
   */
  router.post('/tokens/:id/approve', handle((req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;
    const tokenId = parseTokenId(req.params.id);
    const body = parseBody(approveRequestSchema, req, res);
    if (!body) return;

    submitOperation(manager, { type: 'approve', caller, to: body.to, tokenId }, res);
  }));

  /**
   * POST /tokens/:id/transfer - Transfer a token
   */
  router.post('/tokens/:id/transfer', handle((req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;
    const tokenId = parseTokenId(req.params.id);
    const body = parseBody(transferRequestSchema, req, res);
    if (!body) return;

    submitOperation(manager, { type: 'transfer', caller, from: body.from, to: body.to, tokenId }, res);
  }));

  /**
   * POST /tokens/:id/burn - Destroy a token
   */
  router.post('/tokens/:id/burn', handle((req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;
    const tokenId = parseTokenId(req.params.id);

    submitOperation(manager, { type: 'burn', caller, tokenId }, res);
  }));

  /**
   * POST /operators - Grant or revoke an operator for the caller
   */
  router.post('/operators', handle((req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;
    const body = parseBody(operatorRequestSchema, req, res);
    if (!body) return;

    submitOperation(
      manager,
      { type: 'setOperatorApproval', caller, operator: body.operator, approved: body.approved },
      res
    );
  }));

  return router;
}
