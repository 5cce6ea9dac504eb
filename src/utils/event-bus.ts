/**
 * Relay Event Bus
 *
 * Operator-visible channel for terminal errors and lifecycle signals.
 * One instance is created per relay context and handed to every component
 * that publishes or listens.
 *
 * @module utils/event-bus
 */

import { EventEmitter } from 'events';

export const RelayEvents = {
  /** An outbox entry exceeded maxRetries and was dropped */
  DELIVERY_ABANDONED: 'delivery:abandoned',
  /** A drain cycle finished (successfully or not) */
  DELIVERY_CYCLE_COMPLETED: 'delivery:cycle-completed',
  /** Reachability went offline -> online */
  CONNECTIVITY_RESTORED: 'connectivity:restored',
  /** Reachability went online -> offline */
  CONNECTIVITY_LOST: 'connectivity:lost',
  /** A new identity was provisioned with the hub */
  IDENTITY_PROVISIONED: 'identity:provisioned',
} as const;

export interface DeliveryAbandonedEvent {
  entryId: number;
  identityId: string;
  retryCount: number;
  /** Full serialized event, kept for manual recovery */
  eventJson: string;
  lastError: string | null;
  abandonedAt: string;
}

export interface DeliveryCycleCompletedEvent {
  attempted: number;
  delivered: number;
  failed: number;
  abandoned: number;
  durationMs: number;
}

export interface ConnectivityChangedEvent {
  at: string;
}

export interface IdentityProvisionedEvent {
  identityId: string;
  created: boolean;
}

export interface RelayEventMap {
  'delivery:abandoned': DeliveryAbandonedEvent;
  'delivery:cycle-completed': DeliveryCycleCompletedEvent;
  'connectivity:restored': ConnectivityChangedEvent;
  'connectivity:lost': ConnectivityChangedEvent;
  'identity:provisioned': IdentityProvisionedEvent;
}

export type RelayEventName = keyof RelayEventMap;

export class RelayEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(20);
  }

  publish<K extends RelayEventName>(name: K, payload: RelayEventMap[K]): void {
    this.emit(name, payload);
  }

  /**
   * Subscribe to a typed event
   *
   * @returns Unsubscribe function
   */
  subscribe<K extends RelayEventName>(
    name: K,
    listener: (payload: RelayEventMap[K]) => void
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }
}
