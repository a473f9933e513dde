// Asset Registry - WebSocket Event Feed

import { WebSocket, WebSocketServer, RawData } from 'ws';
import type { Server } from 'http';
import { fromZodError } from 'zod-validation-error';
import type { RegistryManager } from './registry-manager.js';
import { wsClientMessageSchema } from './schemas.js';
import type { EventSocket, WSErrorMessage } from './types.js';

// =============================================================================
// WebSocket Setup
// =============================================================================

export function setupWebSocket(server: Server, manager: RegistryManager): WebSocketServer {
  const wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws: WebSocket) => {
    console.log('WebSocket client connected');

    ws.on('message', (data: RawData) => {
      const text = Array.isArray(data) ? Buffer.concat(data).toString() : Buffer.from(data).toString();
      handleRawMessage(ws, text, manager);
    });

    ws.on('close', () => {
      console.log('WebSocket client disconnected');
      manager.unsubscribe(ws);
    });

    ws.on('error', (error) => {
      console.error('WebSocket error:', error);
      manager.unsubscribe(ws);
    });
  });

  return wss;
}

// =============================================================================
// Message Handling
// =============================================================================

export function handleRawMessage(ws: EventSocket, raw: string, manager: RegistryManager): void {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    sendError(ws, 'PARSE_ERROR', 'Invalid JSON message');
    return;
  }

  const parsed = wsClientMessageSchema.safeParse(decoded);
  if (!parsed.success) {
    sendError(ws, 'INVALID_MESSAGE', fromZodError(parsed.error).message);
    return;
  }

  const message = parsed.data;
  switch (message.type) {
    case 'subscribe':
      manager.subscribe(ws, message.account ?? null);
      console.log(`Client subscribed to ${message.account ?? 'all events'}`);
      break;

    case 'unsubscribe':
      manager.unsubscribe(ws);
      console.log('Client unsubscribed');
      break;
  }
}

function sendError(ws: EventSocket, code: string, message: string): void {
  const errorMsg: WSErrorMessage = {
    type: 'error',
    payload: { code, message },
  };

  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(errorMsg));
  }
}
