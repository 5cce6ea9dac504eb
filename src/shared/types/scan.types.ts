/**
 * Scan Event & Identity Types
 *
 * Zod schemas for everything the relay persists or puts on the wire.
 * Persisted JSON is re-validated on read, so a corrupted row surfaces as a
 * typed failure instead of a malformed hub message.
 *
 * @module shared/types/scan
 * @security SEC-014: Input validation for persisted and outbound payloads
 */

import { z } from 'zod';

// ============================================================================
// Scan Events
// ============================================================================

export const ScanEventKindSchema = z.enum(['identity-registration', 'quantity-update']);
export type ScanEventKind = z.infer<typeof ScanEventKindSchema>;

/**
 * One barcode observation. Immutable once created.
 */
export const ScanEventSchema = z.object({
  code: z.string().min(1),
  ownerIdentityId: z.string().min(1),
  observedAt: z.string().datetime(),
  quantityDelta: z.number().int().default(1),
  kind: ScanEventKindSchema,
  sourceDeviceTag: z.string(),
});
export type ScanEvent = z.infer<typeof ScanEventSchema>;

/**
 * Hub message body published for each delivered event
 */
export const HubScanPayloadSchema = z.object({
  eventKind: ScanEventKindSchema,
  identityId: z.string(),
  code: z.string(),
  quantityDelta: z.number().int(),
  timestamp: z.string(),
  sourceDeviceTag: z.string(),
  entryId: z.number().int(),
});
export type HubScanPayload = z.infer<typeof HubScanPayloadSchema>;

// ============================================================================
// Identities
// ============================================================================

export const IdentityStatusSchema = z.enum(['pending', 'active', 'deactivated']);
export type IdentityStatus = z.infer<typeof IdentityStatusSchema>;

/**
 * A provisioned endpoint on the cloud hub
 */
export interface DeviceIdentity {
  identityId: string;
  /** Opaque hub connection string */
  credential: string;
  provisionedAt: string;
  lastSeenAt: string;
  status: IdentityStatus;
}

// ============================================================================
// Outbox
// ============================================================================

export type DeliveryPath = 'hub' | 'api';

/**
 * A durable wrapper around a ScanEvent awaiting delivery
 */
export interface OutboxEntry {
  id: number;
  identityId: string;
  event: ScanEvent;
  retryCount: number;
  lastAttemptAt: string | null;
  nextAttemptAt: string | null;
  hubDeliveredAt: string | null;
  apiDeliveredAt: string | null;
  lastError: string | null;
  createdAt: string;
}

// ============================================================================
// Ingestion
// ============================================================================

export type RejectionReason = 'invalid-code' | 'test-code' | 'duplicate-scan' | 'storage-unavailable';

export type IngestResult =
  | { status: 'accepted'; entryId: number; identityId: string; kind: ScanEventKind }
  | { status: 'accepted-queued-offline'; entryId: number; identityId: string; kind: ScanEventKind }
  | { status: 'rejected'; reason: RejectionReason; detail?: string };
