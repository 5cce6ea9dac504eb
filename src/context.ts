/**
 * Relay Context
 *
 * Builds every service once, in dependency order, and hands each its
 * collaborators through the constructor. Tests pass overrides for the
 * network edges (provisioner, hub connections, connectivity probe).
 *
 * @module context
 */

import { IdentitiesDAL } from './dal/identities.dal';
import { OutboxDAL } from './dal/outbox.dal';
import { BackendApiService } from './services/backend-api.service';
import { CircuitBreakerService, type CircuitState } from './services/circuit-breaker.service';
import {
  ConnectivityMonitorService,
  createTcpProbe,
  type ConnectivityProbe,
  type ConnectivityState,
} from './services/connectivity-monitor.service';
import { closeDatabase, openDatabase, type DatabaseInstance } from './services/database.service';
import { ApiDeliverySink, HubDeliverySink, type DeliverySink } from './services/delivery-sinks';
import { DeliveryWorkerService, type DeliveryWorkerStatus } from './services/delivery-worker.service';
import { HubClientService, type ConnectionState } from './services/hub-client.service';
import { IdentityResolverService } from './services/identity-resolver.service';
import { getCurrentSchemaVersion, runMigrations, type MigrationSummary } from './services/migration.service';
import { createMqttConnectionFactory, type HubConnectionFactory } from './services/mqtt-transport';
import { HubProvisioningService, type IdentityProvisioner } from './services/provisioning.service';
import { RetryStrategyService } from './services/retry-strategy.service';
import { ScanIngestionService } from './services/scan-ingestion.service';
import type { RelayConfig } from './shared/types/config.types';
import { RelayEventBus } from './utils/event-bus';
import { getErrorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface RelayContext {
  config: RelayConfig;
  db: DatabaseInstance;
  migrations: MigrationSummary;
  eventBus: RelayEventBus;
  identities: IdentitiesDAL;
  outbox: OutboxDAL;
  retryStrategy: RetryStrategyService;
  resolver: IdentityResolverService;
  hub: HubClientService;
  api: BackendApiService;
  sinks: DeliverySink[];
  worker: DeliveryWorkerService;
  monitor: ConnectivityMonitorService;
  ingestion: ScanIngestionService;
}

export interface RelayContextOverrides {
  /** An already-open database (migrations are still applied) */
  db?: DatabaseInstance;
  migrationsDir?: string;
  provisioner?: IdentityProvisioner;
  connectionFactory?: HubConnectionFactory;
  probe?: ConnectivityProbe;
  apiCircuitBreaker?: CircuitBreakerService;
  random?: () => number;
  clock?: () => Date;
}

export interface RelayStatus {
  connectivity: ConnectivityState;
  lastConnectivityCheckAt: string | null;
  worker: DeliveryWorkerStatus;
  leasedCount: number;
  identityCount: number;
  hub: Array<{ identityId: string; state: ConnectionState }>;
  apiCircuit: CircuitState;
  schemaVersion: number;
}

const log = createLogger('context');

// ============================================================================
// Construction
// ============================================================================

export function createRelayContext(config: RelayConfig, overrides: RelayContextOverrides = {}): RelayContext {
  const db = overrides.db ?? openDatabase({ dbPath: config.databasePath });
  const migrations = runMigrations(db, overrides.migrationsDir);

  const eventBus = new RelayEventBus();
  const identities = new IdentitiesDAL(db);
  const outbox = new OutboxDAL(db, { maxRetries: config.maxRetries, eventBus });

  const retryStrategy = new RetryStrategyService(
    {
      baseDelayMs: config.baseBackoffSeconds * 1000,
      maxDelayMs: config.maxBackoffSeconds * 1000,
      jitterFactor: config.jitterFactor,
    },
    { defaultBatchSize: config.drainBatchSize },
    overrides.random
  );

  const provisioner =
    overrides.provisioner ??
    new HubProvisioningService({
      endpoint: config.hubProvisioningEndpoint,
      apiKey: config.provisioningApiKey,
      timeoutMs: config.provisioningTimeoutSeconds * 1000,
    });

  const resolver = new IdentityResolverService({
    identities,
    provisioner,
    eventBus,
    rules: {
      reservedTestCodes: config.reservedTestCodes,
      minCodeLength: config.minCodeLength,
      maxEditDistance: config.reservedCodeMaxEditDistance,
    },
    provisioningTimeoutMs: config.provisioningTimeoutSeconds * 1000,
  });

  const hub = new HubClientService({
    credentials: (identityId) => resolver.getCredential(identityId),
    connectionFactory:
      overrides.connectionFactory ??
      createMqttConnectionFactory({ connectTimeoutMs: config.hubSendTimeoutSeconds * 1000 }),
    retryStrategy,
    sendTimeoutMs: config.hubSendTimeoutSeconds * 1000,
  });

  const api = new BackendApiService({
    baseUrl: config.apiBaseUrl,
    apiKey: config.apiKey,
    timeoutMs: config.apiTimeoutSeconds * 1000,
    circuitBreaker: overrides.apiCircuitBreaker,
  });

  const sinks: DeliverySink[] = [new HubDeliverySink(hub), new ApiDeliverySink(api)];

  const worker: DeliveryWorkerService = new DeliveryWorkerService({
    outbox,
    sinks,
    requiredSinks: config.requiredSinks,
    retryStrategy,
    eventBus,
    // Read lazily: the monitor is built below
    isOnline: () => monitor.isOnline(),
    drainIntervalMs: config.drainIntervalSeconds * 1000,
    deliveryTimeoutMs: config.deliveryTimeoutSeconds * 1000,
  });

  const monitor = new ConnectivityMonitorService({
    probe:
      overrides.probe ?? createTcpProbe({ host: config.connectivityProbeHost, port: config.connectivityProbePort }),
    worker,
    hub,
    eventBus,
    pollIntervalMs: config.connectivityPollIntervalSeconds * 1000,
    staleAckMs: config.staleAckSeconds * 1000,
  });

  const ingestion = new ScanIngestionService({
    resolver,
    outbox,
    worker,
    isOnline: () => monitor.isOnline(),
    sourceDeviceTag: config.sourceDeviceTag,
    duplicateCooldownSeconds: config.duplicateCooldownSeconds,
    clock: overrides.clock,
  });

  log.info('Relay context created', {
    schemaVersion: getCurrentSchemaVersion(db),
    pendingEntries: outbox.count(),
    identities: identities.count(),
    requiredSinks: config.requiredSinks,
  });

  return {
    config,
    db,
    migrations,
    eventBus,
    identities,
    outbox,
    retryStrategy,
    resolver,
    hub,
    api,
    sinks,
    worker,
    monitor,
    ingestion,
  };
}

// ============================================================================
// Lifecycle
// ============================================================================

export function startRelay(context: RelayContext): void {
  context.monitor.start();
  context.worker.start();
}

export function getRelayStatus(context: RelayContext): RelayStatus {
  return {
    connectivity: context.monitor.getState(),
    lastConnectivityCheckAt: context.monitor.getLastCheckedAt(),
    worker: context.worker.getStatus(),
    leasedCount: context.outbox.getLeasedCount(),
    identityCount: context.identities.count(),
    hub: context.hub.listStates(),
    apiCircuit: context.api.getCircuitState(),
    schemaVersion: getCurrentSchemaVersion(context.db),
  };
}

/**
 * Stop loops, wait for the running drain, close hub links, close the database
 */
export async function shutdownRelay(context: RelayContext): Promise<void> {
  log.info('Shutting down relay');
  context.monitor.stop();
  await context.worker.stop();

  try {
    await context.hub.close();
  } catch (error) {
    log.error('Failed to close hub connections', { error: getErrorMessage(error) });
  }

  closeDatabase(context.db);
  log.info('Relay shut down');
}
