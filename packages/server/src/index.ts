// Asset Registry - Server Entry Point
//
// Express + WebSocket server exposing the registry to the game client and to
// event indexers.

import express, { Express } from 'express';
import { createServer, Server } from 'http';
import type { WebSocketServer } from 'ws';
import { AssetRegistry } from '@asset-registry/core';
import { loadConfig, ServerConfig } from './config.js';
import { RegistryManager } from './registry-manager.js';
import { createRoutes } from './routes.js';
import { createAdminRoutes } from './admin-routes.js';
import { setupWebSocket } from './websocket.js';
import { CALLER_HEADER, ADMIN_KEY_HEADER } from './auth-middleware.js';
import { RateLimiter, createQueryRateLimiter, createMutationRateLimiter } from './rate-limiter.js';

// =============================================================================
// Server Setup
// =============================================================================

export interface CreateAppOptions {
  config?: Partial<ServerConfig>;
  /** Serve an existing registry instead of a fresh one */
  registry?: AssetRegistry;
}

export function createApp(options?: CreateAppOptions): {
  app: Express;
  server: Server;
  manager: RegistryManager;
  wss: WebSocketServer;
  config: ServerConfig;
  cleanup: () => void;
  rateLimiters: RateLimiter[];
} {
  const config: ServerConfig = { ...loadConfig(), ...options?.config };
  const app = express();
  const server = createServer(app);
  const manager = new RegistryManager(
    options?.registry ?? { name: config.registryName, symbol: config.registrySymbol }
  );

  const queryRateLimiter = createQueryRateLimiter();
  const mutationRateLimiter = createMutationRateLimiter();
  const rateLimiters = [queryRateLimiter, mutationRateLimiter];

  // Middleware
  app.use(express.json());

  // CORS for the browser client
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', `Content-Type, ${CALLER_HEADER}, ${ADMIN_KEY_HEADER}`);
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  if (config.enableRateLimiting) {
    const queries = queryRateLimiter.middleware();
    const mutations = mutationRateLimiter.middleware();
    app.use('/api', (req, res, next) => (req.method === 'GET' ? queries(req, res, next) : mutations(req, res, next)));
    console.log('Rate limiting enabled for /api');
  }

  // Admin routes go first so /api/admin is not shadowed
  app.use('/api/admin', createAdminRoutes(manager, config.adminApiKey));
  app.use('/api', createRoutes(manager));

  const wss = setupWebSocket(server, manager);

  manager.on('operation_accepted', ({ operation }: { operation: { type: string } }) => {
    console.log(`Registry operation accepted: ${operation.type}`);
  });

  // Error handling
  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if ('type' in err && err.type === 'entity.parse.failed') {
        res.status(400).json({ success: false, error: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
        return;
      }
      console.error('Server error:', err);
      res.status(500).json({ error: 'Internal server error' });
    }
  );

  const cleanup = () => {
    rateLimiters.forEach(rl => rl.stop());
    wss.close();
  };

  return { app, server, manager, wss, config, cleanup, rateLimiters };
}

// =============================================================================
// Start Server
// =============================================================================

if (process.env.NODE_ENV !== 'test') {
  const { server, manager, config, cleanup } = createApp();

  server.listen(config.port, config.host, () => {
    console.log(`Asset registry "${config.registryName}" (${config.registrySymbol}) at http://${config.host}:${config.port}`);
    console.log(`WebSocket available at ws://${config.host}:${config.port}/ws`);
  });

  process.on('SIGINT', () => {
    console.log('\nShutting down...');
    cleanup();
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });
  });

  manager.on('operation_rejected', ({ error }: { error: { code: string; message: string } }) =>
    console.warn(`Registry operation rejected: ${error.code} - ${error.message}`)
  );
}

// Export for testing
export { RegistryManager } from './registry-manager.js';
export { loadConfig } from './config.js';
export type { ServerConfig } from './config.js';
export * from './types.js';
export { createRoutes } from './routes.js';
export { createAdminRoutes } from './admin-routes.js';
export { setupWebSocket, handleRawMessage } from './websocket.js';
export { RateLimiter, createQueryRateLimiter, createMutationRateLimiter } from './rate-limiter.js';
