/**
 * Delivery Sinks
 *
 * The two destinations an outbox entry is delivered to. The Delivery Worker
 * iterates over them without knowing which is which.
 *
 * @module services/delivery-sinks
 */

import type { BackendApiService } from './backend-api.service';
import type { HubClientService } from './hub-client.service';
import type { DeliveryPath, HubScanPayload, OutboxEntry } from '../shared/types/scan.types';

export interface DeliverySink {
  readonly path: DeliveryPath;
  /** Resolves on confirmed delivery; rejects on any failure */
  deliver(entry: OutboxEntry): Promise<void>;
}

/**
 * Build the hub message for an entry. `entryId` lets consumers drop duplicates.
 */
export function toHubPayload(entry: OutboxEntry): HubScanPayload {
  return {
    eventKind: entry.event.kind,
    identityId: entry.identityId,
    code: entry.event.code,
    quantityDelta: entry.event.quantityDelta,
    timestamp: entry.event.observedAt,
    sourceDeviceTag: entry.event.sourceDeviceTag,
    entryId: entry.id,
  };
}

export class HubDeliverySink implements DeliverySink {
  readonly path = 'hub';

  constructor(private readonly hub: HubClientService) {}

  async deliver(entry: OutboxEntry): Promise<void> {
    await this.hub.send(entry.identityId, toHubPayload(entry));
  }
}

/**
 * Registration events confirm the identity; everything else reports a
 * quantity change.
 */
export class ApiDeliverySink implements DeliverySink {
  readonly path = 'api';

  constructor(private readonly api: BackendApiService) {}

  async deliver(entry: OutboxEntry): Promise<void> {
    if (entry.event.kind === 'identity-registration') {
      await this.api.confirmRegistration(entry.identityId);
      return;
    }
    await this.api.postScan({
      deviceId: entry.identityId,
      code: entry.event.code,
      quantity: entry.event.quantityDelta,
    });
  }
}
