/**
 * Hub Client Service
 *
 * Keeps one cached connection per active identity and publishes scan
 * payloads over it.
 *
 * - A `send` either completes within `sendTimeoutMs` or fails; it never
 *   retries. Retrying entries is the Delivery Worker's job.
 * - A dropped link is marked disconnected and redialled on its own backoff
 *   schedule, independent of outbox backoff, so one dead identity does not
 *   hold up the others.
 *
 * @module services/hub-client
 */

import type { RetryStrategyService } from './retry-strategy.service';
import type { HubConnection, HubConnectionFactory } from './mqtt-transport';
import type { HubScanPayload } from '../shared/types/scan.types';
import {
  InvalidCodeError,
  ProvisioningUnavailableError,
  TransientNetworkError,
  getErrorMessage,
} from '../utils/errors';
import { parseConnectionString, telemetryTopic } from '../utils/hub-credentials';
import { createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-identity runtime link state. Read-only outside this service.
 */
export interface ConnectionState {
  connected: boolean;
  consecutiveFailures: number;
  lastStateChangeAt: string;
  /**
   * Start of the oldest publish still without an acknowledgement. A send that
   * fails or times out leaves it set; an ack or a forced reconnect clears it.
   */
  awaitingAckSince: string | null;
}

/**
 * Returns the connection string for an identity
 */
export type CredentialProvider = (identityId: string) => Promise<string>;

export interface HubClientOptions {
  credentials: CredentialProvider;
  connectionFactory: HubConnectionFactory;
  retryStrategy: RetryStrategyService;
  sendTimeoutMs: number;
}

interface Link {
  identityId: string;
  connection: HubConnection | null;
  connecting: Promise<HubConnection> | null;
  reconnectTimer: NodeJS.Timeout | null;
  inFlight: number;
  /** Bumped by forceReconnect so sends on the replaced link do not fail the new one */
  generation: number;
  state: ConnectionState;
}

const log = createLogger('hub-client');

// ============================================================================
// Hub Client Service
// ============================================================================

export class HubClientService {
  private readonly links = new Map<string, Link>();
  private readonly credentials: CredentialProvider;
  private readonly connectionFactory: HubConnectionFactory;
  private readonly retryStrategy: RetryStrategyService;
  private readonly sendTimeoutMs: number;
  private closed = false;

  constructor(options: HubClientOptions) {
    this.credentials = options.credentials;
    this.connectionFactory = options.connectionFactory;
    this.retryStrategy = options.retryStrategy;
    this.sendTimeoutMs = options.sendTimeoutMs;
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Publish a payload for an identity
   *
   * @throws TransientNetworkError on connect failure, publish failure or timeout
   */
  async send(identityId: string, payload: HubScanPayload): Promise<void> {
    if (this.closed) {
      throw new TransientNetworkError('Hub client is closed');
    }

    const link = this.getLink(identityId);
    const generation = link.generation;
    link.inFlight++;
    if (link.state.awaitingAckSince === null) {
      link.state.awaitingAckSince = new Date().toISOString();
    }

    // An unacknowledged publish keeps awaitingAckSince set until a later ack
    // or a forced reconnect clears it
    let settled = false;
    try {
      await withTimeout(this.publish(link, payload), this.sendTimeoutMs, `Hub send for ${identityId}`);
      settled = true;
    } catch (error) {
      if (isCredentialError(error)) {
        // No link was attempted; the identity itself is not usable yet
        settled = true;
        throw new TransientNetworkError(`Hub credential for ${identityId} unavailable: ${error.message}`, error);
      }
      if (link.generation === generation) {
        this.handleFailure(link, getErrorMessage(error));
      }
      if (error instanceof TransientNetworkError) {
        throw error;
      }
      throw new TransientNetworkError(`Hub send for ${identityId} failed: ${getErrorMessage(error)}`, error);
    } finally {
      if (link.generation === generation) {
        link.inFlight = Math.max(0, link.inFlight - 1);
        if (settled && link.inFlight === 0) {
          link.state.awaitingAckSince = null;
        }
      }
    }
  }

  /**
   * Snapshot of an identity's link state (disconnected if never used)
   */
  getState(identityId: string): ConnectionState {
    const link = this.links.get(identityId);
    if (!link) {
      return { connected: false, consecutiveFailures: 0, lastStateChangeAt: new Date(0).toISOString(), awaitingAckSince: null };
    }
    return { ...link.state };
  }

  listStates(): Array<{ identityId: string; state: ConnectionState }> {
    return Array.from(this.links.values(), (link) => ({ identityId: link.identityId, state: { ...link.state } }));
  }

  /**
   * Identities with a publish unacknowledged for longer than `staleAfterMs`
   */
  getStaleIdentities(staleAfterMs: number, now: Date = new Date()): string[] {
    const cutoff = now.getTime() - staleAfterMs;
    return Array.from(this.links.values())
      .filter((link) => link.state.awaitingAckSince !== null && Date.parse(link.state.awaitingAckSince) <= cutoff)
      .map((link) => link.identityId);
  }

  /**
   * Dial a disconnected link now instead of waiting for its reconnect timer.
   * Joins a dial already in progress; a live link is left alone.
   *
   * @returns true if the link is up afterwards
   */
  async redial(identityId: string): Promise<boolean> {
    const link = this.links.get(identityId);
    if (!link || this.closed) {
      return false;
    }
    if (link.connection && link.state.connected) {
      return true;
    }

    const joined = link.connecting !== null;
    this.clearReconnectTimer(link);
    try {
      await this.ensureConnected(link);
      return true;
    } catch (error) {
      // A joined dial's failure is handled by whoever started it
      if (!joined && !isCredentialError(error)) {
        this.handleFailure(link, getErrorMessage(error));
      }
      return false;
    }
  }

  /**
   * Drop the current link and dial again immediately
   *
   * @returns true if the new link came up
   */
  async forceReconnect(identityId: string): Promise<boolean> {
    const link = this.links.get(identityId);
    if (!link || this.closed) {
      return false;
    }

    log.info('Forcing hub reconnect', { identityId });
    this.clearReconnectTimer(link);
    const previous = link.connection;
    link.connection = null;
    link.connecting = null;
    link.inFlight = 0;
    link.generation++;
    link.state.awaitingAckSince = null;
    this.setConnected(link, false);
    if (previous) {
      await this.endQuietly(identityId, previous);
    }

    try {
      await this.ensureConnected(link);
      return true;
    } catch (error) {
      if (!isCredentialError(error)) {
        this.handleFailure(link, getErrorMessage(error));
      }
      return false;
    }
  }

  /**
   * End every connection and cancel pending reconnects
   */
  async close(): Promise<void> {
    this.closed = true;
    const links = Array.from(this.links.values());
    for (const link of links) {
      this.clearReconnectTimer(link);
    }
    await Promise.all(
      links.map(async (link) => {
        const connection = link.connection;
        link.connection = null;
        this.setConnected(link, false);
        if (connection) {
          await this.endQuietly(link.identityId, connection);
        }
      })
    );
    log.info('Hub client closed', { identities: links.length });
  }

  // ==========================================================================
  // Connection Management
  // ==========================================================================

  private getLink(identityId: string): Link {
    let link = this.links.get(identityId);
    if (!link) {
      link = {
        identityId,
        connection: null,
        connecting: null,
        reconnectTimer: null,
        inFlight: 0,
        generation: 0,
        state: {
          connected: false,
          consecutiveFailures: 0,
          lastStateChangeAt: new Date().toISOString(),
          awaitingAckSince: null,
        },
      };
      this.links.set(identityId, link);
    }
    return link;
  }

  private async publish(link: Link, payload: HubScanPayload): Promise<void> {
    const connection = await this.ensureConnected(link);
    await connection.publish(telemetryTopic(link.identityId), JSON.stringify(payload));
  }

  /**
   * Reuse the live connection, join an in-progress dial, or start one
   */
  private ensureConnected(link: Link): Promise<HubConnection> {
    if (link.connection && link.state.connected) {
      return Promise.resolve(link.connection);
    }
    if (!link.connecting) {
      link.connecting = this.dial(link).finally(() => {
        link.connecting = null;
      });
    }
    return link.connecting;
  }

  private async dial(link: Link): Promise<HubConnection> {
    const credential = parseConnectionString(await this.credentials(link.identityId));
    const connection = await this.connectionFactory(credential);

    if (this.closed) {
      await this.endQuietly(link.identityId, connection);
      throw new TransientNetworkError('Hub client closed while connecting');
    }

    connection.onDisconnect((reason) => {
      if (link.connection === connection) {
        this.handleFailure(link, reason);
      }
    });

    link.connection = connection;
    link.state.consecutiveFailures = 0;
    this.clearReconnectTimer(link);
    this.setConnected(link, true);
    log.info('Hub connection established', { identityId: link.identityId });
    return connection;
  }

  private handleFailure(link: Link, reason: string): void {
    link.state.consecutiveFailures++;
    const stale = link.connection;
    link.connection = null;
    this.setConnected(link, false);
    if (stale) {
      void this.endQuietly(link.identityId, stale);
    }

    log.warn('Hub link failed', {
      identityId: link.identityId,
      reason,
      consecutiveFailures: link.state.consecutiveFailures,
    });
    this.scheduleReconnect(link);
  }

  private scheduleReconnect(link: Link): void {
    if (this.closed || link.reconnectTimer) {
      return;
    }

    const delayMs = this.retryStrategy.calculateBackoffDelay(link.state.consecutiveFailures);
    link.reconnectTimer = setTimeout(() => {
      link.reconnectTimer = null;
      this.ensureConnected(link).catch((error: unknown) => {
        if (isCredentialError(error)) {
          log.warn('Hub reconnect abandoned: credential unavailable', {
            identityId: link.identityId,
            error: error.message,
          });
          return;
        }
        this.handleFailure(link, getErrorMessage(error));
      });
    }, delayMs);
    link.reconnectTimer.unref();

    log.debug('Hub reconnect scheduled', { identityId: link.identityId, delayMs });
  }

  private clearReconnectTimer(link: Link): void {
    if (link.reconnectTimer) {
      clearTimeout(link.reconnectTimer);
      link.reconnectTimer = null;
    }
  }

  private setConnected(link: Link, connected: boolean): void {
    if (link.state.connected !== connected) {
      link.state.connected = connected;
      link.state.lastStateChangeAt = new Date().toISOString();
    }
  }

  /**
   * End a connection; teardown errors are logged, not propagated
   */
  private async endQuietly(identityId: string, connection: HubConnection): Promise<void> {
    try {
      await connection.end();
    } catch (error) {
      log.debug('Error while ending hub connection', { identityId, error: getErrorMessage(error) });
    }
  }
}

function isCredentialError(error: unknown): error is InvalidCodeError | ProvisioningUnavailableError {
  return error instanceof InvalidCodeError || error instanceof ProvisioningUnavailableError;
}
