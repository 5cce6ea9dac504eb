/**
 * Connectivity Monitor Service
 *
 * Periodically probes internet reachability and reacts to transitions:
 * - offline -> online: publishes ConnectivityRestored, requests a drain
 *   that ignores backoff, then re-dials disconnected hub links in parallel
 * - online -> offline: publishes ConnectivityLost
 *
 * Every tick also re-dials hub links whose last publish has gone
 * unacknowledged for longer than the stale threshold.
 *
 * The state starts unknown and is treated as offline until the first probe.
 *
 * @module services/connectivity-monitor
 */

import net from 'node:net';
import type { DeliveryWorkerService } from './delivery-worker.service';
import type { HubClientService } from './hub-client.service';
import { RelayEvents, type RelayEventBus } from '../utils/event-bus';
import { getErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/** Resolves true when the internet is reachable. Must not reject. */
export type ConnectivityProbe = () => Promise<boolean>;

export type ConnectivityState = 'unknown' | 'online' | 'offline';

export interface ConnectivityMonitorOptions {
  probe: ConnectivityProbe;
  worker: Pick<DeliveryWorkerService, 'requestDrain'>;
  hub: Pick<HubClientService, 'listStates' | 'getStaleIdentities' | 'forceReconnect' | 'redial'>;
  eventBus: RelayEventBus;
  pollIntervalMs: number;
  staleAckMs: number;
}

export interface TcpProbeOptions {
  host: string;
  port: number;
  timeoutMs?: number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 5000;

const log = createLogger('connectivity-monitor');

// ============================================================================
// Default Probe
// ============================================================================

/**
 * TCP connect to a well-known host. Success means reachable.
 */
export function createTcpProbe(options: TcpProbeOptions): ConnectivityProbe {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;

  return () =>
    new Promise<boolean>((resolve) => {
      const socket = net.createConnection({ host: options.host, port: options.port });
      let settled = false;

      const finish = (reachable: boolean): void => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve(reachable);
      };

      socket.setTimeout(timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', (error) => {
        log.debug('Connectivity probe failed', { host: options.host, error: error.message });
        finish(false);
      });
    });
}

// ============================================================================
// Connectivity Monitor Service
// ============================================================================

export class ConnectivityMonitorService {
  private readonly probe: ConnectivityProbe;
  private readonly worker: Pick<DeliveryWorkerService, 'requestDrain'>;
  private readonly hub: Pick<HubClientService, 'listStates' | 'getStaleIdentities' | 'forceReconnect' | 'redial'>;
  private readonly eventBus: RelayEventBus;
  private readonly pollIntervalMs: number;
  private readonly staleAckMs: number;

  private intervalId: NodeJS.Timeout | null = null;
  private state: ConnectivityState = 'unknown';
  private lastCheckedAt: Date | null = null;
  private checking: Promise<ConnectivityState> | null = null;

  constructor(options: ConnectivityMonitorOptions) {
    this.probe = options.probe;
    this.worker = options.worker;
    this.hub = options.hub;
    this.eventBus = options.eventBus;
    this.pollIntervalMs = options.pollIntervalMs;
    this.staleAckMs = options.staleAckMs;
  }

  start(): void {
    if (this.intervalId) {
      log.warn('Connectivity monitor already running');
      return;
    }

    log.info('Starting connectivity monitor', { pollIntervalSec: this.pollIntervalMs / 1000 });

    this.checkNow().catch((err: unknown) => {
      log.error('Initial connectivity check failed', { error: getErrorMessage(err) });
    });

    this.intervalId = setInterval(() => {
      this.checkNow().catch((err: unknown) => {
        log.error('Connectivity check failed', { error: getErrorMessage(err) });
      });
    }, this.pollIntervalMs);
    this.intervalId.unref();
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      log.info('Connectivity monitor stopped');
    }
  }

  isOnline(): boolean {
    return this.state === 'online';
  }

  getState(): ConnectivityState {
    return this.state;
  }

  getLastCheckedAt(): string | null {
    return this.lastCheckedAt?.toISOString() ?? null;
  }

  /**
   * Probe once and apply any transition. Concurrent calls share one probe.
   */
  checkNow(): Promise<ConnectivityState> {
    if (!this.checking) {
      this.checking = this.tick().finally(() => {
        this.checking = null;
      });
    }
    return this.checking;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async tick(): Promise<ConnectivityState> {
    let reachable: boolean;
    try {
      reachable = await this.probe();
    } catch (error) {
      log.warn('Connectivity probe threw', { error: getErrorMessage(error) });
      reachable = false;
    }

    const previous = this.state;
    this.state = reachable ? 'online' : 'offline';
    this.lastCheckedAt = new Date();
    const at = this.lastCheckedAt.toISOString();

    if (this.state === 'online' && previous !== 'online') {
      log.info('Connectivity restored', { previous });
      this.eventBus.publish(RelayEvents.CONNECTIVITY_RESTORED, { at });
      // The drain dials through send; it must not wait behind the re-dials
      this.worker.requestDrain({ ignoreBackoff: true }).catch((err: unknown) => {
        log.error('Recovery drain failed', { error: getErrorMessage(err) });
      });
      await this.redialDisconnected();
    } else if (this.state === 'offline' && previous === 'online') {
      log.warn('Connectivity lost');
      this.eventBus.publish(RelayEvents.CONNECTIVITY_LOST, { at });
    }

    if (this.state === 'online') {
      await this.reconnectStale();
    }

    return this.state;
  }

  private async redialDisconnected(): Promise<void> {
    const disconnected = this.hub
      .listStates()
      .filter(({ state }) => !state.connected)
      .map(({ identityId }) => identityId);

    await settleAll(disconnected, (identityId) => this.hub.redial(identityId), 'Hub redial failed');
  }

  private async reconnectStale(): Promise<void> {
    const stale = this.hub.getStaleIdentities(this.staleAckMs);
    for (const identityId of stale) {
      log.warn('Hub link unacknowledged past threshold, reconnecting', { identityId });
    }
    await settleAll(stale, (identityId) => this.hub.forceReconnect(identityId), 'Forced hub reconnect failed');
  }
}

async function settleAll(
  identityIds: string[],
  operation: (identityId: string) => Promise<boolean>,
  failureMessage: string
): Promise<void> {
  const results = await Promise.allSettled(identityIds.map(operation));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      log.error(failureMessage, { identityId: identityIds[index], error: getErrorMessage(result.reason) });
    }
  });
}
