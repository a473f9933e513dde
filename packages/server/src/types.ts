// Asset Registry - Server Types

import type { Account, RegistryErrorCode, RegistryEvent, TokenId } from '@asset-registry/core';

// =============================================================================
// Sockets
// =============================================================================

/** The part of a `ws` WebSocket the event feed writes to */
export interface EventSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
}

export interface Subscription {
  /** Only events touching this account, or every event when null */
  account: Account | null;
}

// =============================================================================
// API Response Types
// =============================================================================

export interface RegistryInfoResponse {
  name: string;
  symbol: string;
  totalMinted: number;
}

export interface MutationResponse {
  success: true;
  tokenId?: TokenId;
}

export interface ErrorResponse {
  success: false;
  error: RegistryErrorCode | 'VALIDATION_ERROR' | 'MISSING_CALLER';
  message: string;
}

// =============================================================================
// WebSocket Message Types
// =============================================================================

export type WSMessageType = 'subscribe' | 'unsubscribe' | 'connected' | 'registry_event' | 'error';

export interface WSConnectedMessage {
  type: 'connected';
  payload: { message: string; totalMinted: number };
}

export interface WSRegistryEventMessage {
  type: 'registry_event';
  payload: RegistryEvent;
}

export interface WSErrorMessage {
  type: 'error';
  payload: { code: string; message: string };
}

export type WSServerMessage = WSConnectedMessage | WSRegistryEventMessage | WSErrorMessage;
