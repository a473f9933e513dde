// Asset Registry - Registry Manager
//
// Owns the deployed AssetRegistry, accepts mutation intents and fans registry
// events out to WebSocket subscribers.

import { EventEmitter } from 'events';
import {
  AssetRegistry,
  RegistryConfig,
  RegistryEvent,
  RegistryOperation,
  OperationResult,
  eventAccounts,
} from '@asset-registry/core';
import type {
  EventSocket,
  Subscription,
  WSConnectedMessage,
  WSRegistryEventMessage,
  WSServerMessage,
} from './types.js';

export class RegistryManager extends EventEmitter {
  readonly registry: AssetRegistry;
  private readonly subscriptions: Map<EventSocket, Subscription> = new Map();
  private readonly history: RegistryOperation[] = [];
  private readonly historyReplayable: boolean;

  constructor(registry: AssetRegistry | RegistryConfig) {
    super();
    this.registry = registry instanceof AssetRegistry ? registry : new AssetRegistry(registry);
    this.historyReplayable = !(registry instanceof AssetRegistry);
    this.registry.on('registry_event', (event: RegistryEvent) => this.handleEvent(event));
  }

  // ===========================================================================
  // Intents
  // ===========================================================================

  /**
   * Apply one mutation intent. Accepted intents are kept in the operation
   * history.
   */
  submit(operation: RegistryOperation): OperationResult {
    const result = this.registry.apply(operation);
    if (result.ok) {
      this.history.push(operation);
      this.emit('operation_accepted', { operation, result });
    } else {
      this.emit('operation_rejected', { operation, error: result.error });
    }
    return result;
  }

  /**
   * Operations accepted by this manager. When the manager wrapped a registry
   * that already held state, the history starts from that state and only
   * serialize() captures the whole registry.
   */
  getHistory(): readonly RegistryOperation[] {
    return [...this.history];
  }

  /**
   * Whether AssetRegistry.recover(config, getHistory()) rebuilds the registry.
   */
  isHistoryReplayable(): boolean {
    return this.historyReplayable;
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  /**
   * Subscribe a socket to registry events, optionally only those touching
   * `account`. Re-subscribing replaces the filter.
   */
  subscribe(ws: EventSocket, account: string | null = null): void {
    this.subscriptions.set(ws, { account });

    const msg: WSConnectedMessage = {
      type: 'connected',
      payload: {
        message: account ? `Subscribed to events for ${account}` : 'Subscribed to all registry events',
        totalMinted: this.registry.getTotalMinted(),
      },
    };
    this.sendToSocket(ws, msg);
  }

  unsubscribe(ws: EventSocket): void {
    this.subscriptions.delete(ws);
  }

  getSubscriberCount(): number {
    return this.subscriptions.size;
  }

  // ===========================================================================
  // Broadcasting
  // ===========================================================================

  private handleEvent(event: RegistryEvent): void {
    this.emit('registry_event', event);

    const msg: WSRegistryEventMessage = { type: 'registry_event', payload: event };
    const touched = eventAccounts(event);
    const data = JSON.stringify(msg);

    for (const [ws, subscription] of this.subscriptions) {
      if (subscription.account !== null && !touched.includes(subscription.account)) {
        continue;
      }
      if (ws.readyState === ws.OPEN) {
        ws.send(data);
      }
    }
  }

  sendToSocket(ws: EventSocket, message: WSServerMessage): void {
    if (ws.readyState === ws.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }
}
