/**
 * Delivery Worker Service Unit Tests
 *
 * Drain cycles over a real in-memory outbox with scripted sinks.
 *
 * @module tests/unit/services/delivery-worker.service.spec
 * @security ERR-007: Bounded retries with jittered backoff
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';

vi.mock('../../../src/utils/logger', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { OutboxDAL } from '../../../src/dal/outbox.dal';
import type { DeliverySink } from '../../../src/services/delivery-sinks';
import { DeliveryWorkerService, type DeliveryWorkerOptions } from '../../../src/services/delivery-worker.service';
import { RetryStrategyService } from '../../../src/services/retry-strategy.service';
import type { DeliveryPath, OutboxEntry, ScanEvent } from '../../../src/shared/types/scan.types';
import { RelayEventBus, RelayEvents, type DeliveryCycleCompletedEvent } from '../../../src/utils/event-bus';
import { createTestDatabase, type TestDatabaseContext } from '../../helpers/test-database';

type DeliverFn = Mock<(entry: OutboxEntry) => Promise<void>>;

function scanEvent(identityId: string): ScanEvent {
  return {
    code: identityId,
    ownerIdentityId: identityId,
    observedAt: '2026-01-01T00:00:00.000Z',
    quantityDelta: 1,
    kind: 'quantity-update',
    sourceDeviceTag: 'scanner-01',
  };
}

describe('DeliveryWorkerService', () => {
  let ctx: TestDatabaseContext;
  let eventBus: RelayEventBus;
  let outbox: OutboxDAL;
  let hubDeliver: DeliverFn;
  let apiDeliver: DeliverFn;
  let worker: DeliveryWorkerService;
  let online: boolean;

  const sinks = (): DeliverySink[] => [
    { path: 'hub', deliver: hubDeliver },
    { path: 'api', deliver: apiDeliver },
  ];

  const createWorker = (overrides: Partial<DeliveryWorkerOptions> = {}) =>
    new DeliveryWorkerService({
      outbox,
      sinks: sinks(),
      requiredSinks: ['hub'],
      retryStrategy: new RetryStrategyService({}, {}, () => 0.5),
      eventBus,
      isOnline: () => online,
      drainIntervalMs: 60_000,
      deliveryTimeoutMs: 1000,
      ...overrides,
    });

  const setup = (maxRetries = 5) => {
    outbox = new OutboxDAL(ctx.db, { maxRetries, eventBus });
    worker = createWorker();
  };

  beforeEach(() => {
    ctx = createTestDatabase();
    eventBus = new RelayEventBus();
    online = true;
    hubDeliver = vi.fn<(entry: OutboxEntry) => Promise<void>>(async () => undefined);
    apiDeliver = vi.fn<(entry: OutboxEntry) => Promise<void>>(async () => undefined);
    setup();
  });

  afterEach(async () => {
    await worker.stop();
    ctx.cleanup();
  });

  it('should refuse a required path without a sink', () => {
    const required: DeliveryPath[] = ['hub', 'api'];
    expect(() => createWorker({ sinks: [{ path: 'hub', deliver: hubDeliver }], requiredSinks: required })).toThrow(
      'Required delivery sink "api" is not configured'
    );
  });

  it('should leave the outbox untouched while offline', async () => {
    online = false;
    const cycles: DeliveryCycleCompletedEvent[] = [];
    eventBus.subscribe(RelayEvents.DELIVERY_CYCLE_COMPLETED, (event) => cycles.push(event));
    const id = outbox.enqueue(scanEvent('item-000001'));

    const scheduled = await worker.requestDrain();
    const recovery = await worker.requestDrain({ ignoreBackoff: true });

    expect(scheduled).toMatchObject({ attempted: 0, skipped: 'offline' });
    expect(recovery.skipped).toBe('offline');
    expect(hubDeliver).not.toHaveBeenCalled();
    expect(outbox.findById(id)?.retryCount).toBe(0);
    expect(outbox.getLeasedCount()).toBe(0);
    expect(cycles).toEqual([]);
    expect(worker.getStatus().lastDrainAt).toBeNull();
  });

  it('should deliver pending entries in order and remove them', async () => {
    const first = outbox.enqueue(scanEvent('item-000001'));
    const second = outbox.enqueue(scanEvent('item-000002'));

    const result = await worker.requestDrain();

    expect(result).toMatchObject({ attempted: 2, delivered: 2, failed: 0, abandoned: 0 });
    expect(hubDeliver.mock.calls.map(([entry]) => entry.id)).toEqual([first, second]);
    expect(apiDeliver).toHaveBeenCalledTimes(2);
    expect(outbox.count()).toBe(0);
    expect(outbox.getLeasedCount()).toBe(0);
  });

  it('should keep a failed entry with one more retry and a backoff gate', async () => {
    hubDeliver.mockRejectedValueOnce(new Error('hub unreachable'));
    const id = outbox.enqueue(scanEvent('item-000001'));
    const before = Date.now();

    const result = await worker.requestDrain();

    expect(result).toMatchObject({ attempted: 1, delivered: 0, failed: 1 });
    const entry = outbox.findById(id);
    expect(entry?.retryCount).toBe(1);
    expect(entry?.lastError).toBe('hub: hub unreachable');
    expect(Date.parse(entry?.nextAttemptAt ?? '')).toBeGreaterThanOrEqual(before + 2000);
    expect(outbox.getLeasedCount()).toBe(0);
  });

  it('should respect backoff on a normal drain and skip it on a recovery drain', async () => {
    hubDeliver.mockRejectedValueOnce(new Error('hub unreachable'));
    const id = outbox.enqueue(scanEvent('item-000001'));
    await worker.requestDrain();

    expect((await worker.requestDrain()).attempted).toBe(0);

    const recovery = await worker.requestDrain({ ignoreBackoff: true });
    expect(recovery).toMatchObject({ attempted: 1, delivered: 1 });
    expect(outbox.findById(id)).toBeUndefined();
  });

  it('should hold back later entries of an identity after a failure', async () => {
    hubDeliver.mockImplementation(async (entry) => {
      if (entry.identityId === 'identity-a') {
        throw new Error('hub unreachable');
      }
    });
    const a1 = outbox.enqueue(scanEvent('identity-a'));
    const a2 = outbox.enqueue(scanEvent('identity-a'));
    const b1 = outbox.enqueue(scanEvent('identity-b'));

    const result = await worker.requestDrain();

    expect(result).toMatchObject({ attempted: 2, delivered: 1, failed: 1, deferred: 1 });
    expect(hubDeliver.mock.calls.map(([entry]) => entry.id)).toEqual([a1, b1]);
    expect(outbox.findById(a2)?.retryCount).toBe(0);
    expect(outbox.getLeasedCount()).toBe(0);

    // a2 stays behind a1 while a1 waits out its backoff
    expect((await worker.requestDrain()).attempted).toBe(0);
    expect(hubDeliver).toHaveBeenCalledTimes(2);
  });

  it('should clear an entry when only an optional sink fails', async () => {
    apiDeliver.mockRejectedValueOnce(new Error('backend down'));
    const id = outbox.enqueue(scanEvent('item-000001'));

    const result = await worker.requestDrain();

    expect(result.delivered).toBe(1);
    expect(outbox.findById(id)).toBeUndefined();
  });

  it('should not repeat a path that already succeeded', async () => {
    worker = createWorker({ requiredSinks: ['hub', 'api'] });
    apiDeliver.mockRejectedValueOnce(new Error('backend down'));
    const id = outbox.enqueue(scanEvent('item-000001'));

    await worker.requestDrain();
    expect(outbox.findById(id)?.hubDeliveredAt).not.toBeNull();

    const retry = await worker.requestDrain({ ignoreBackoff: true });

    expect(retry.delivered).toBe(1);
    expect(hubDeliver).toHaveBeenCalledTimes(1);
    expect(apiDeliver).toHaveBeenCalledTimes(2);
  });

  it('should count a sink that misses its deadline as failed', async () => {
    worker = createWorker({ deliveryTimeoutMs: 20 });
    hubDeliver.mockImplementationOnce(() => new Promise<void>(() => undefined));
    const id = outbox.enqueue(scanEvent('item-000001'));

    const result = await worker.requestDrain();

    expect(result.failed).toBe(1);
    expect(outbox.findById(id)?.lastError).toBe(`hub: hub delivery of entry ${id} timed out after 20ms`);
  });

  it('should abandon an entry that exhausts its retries', async () => {
    setup(0);
    hubDeliver.mockRejectedValue(new Error('hub unreachable'));
    const id = outbox.enqueue(scanEvent('item-000001'));
    const abandonedIds: number[] = [];
    eventBus.subscribe(RelayEvents.DELIVERY_ABANDONED, (event) => abandonedIds.push(event.entryId));

    const result = await worker.requestDrain();

    expect(result).toMatchObject({ attempted: 1, failed: 0, abandoned: 1 });
    expect(abandonedIds).toEqual([id]);
    expect(worker.getStatus().totals.abandoned).toBe(1);
    expect(outbox.count()).toBe(0);
  });

  it('should coalesce drain requests made before the cycle starts', async () => {
    outbox.enqueue(scanEvent('item-000001'));

    const first = worker.requestDrain();
    const second = worker.requestDrain({ ignoreBackoff: true });

    expect(second).toBe(first);
    await first;
    expect(hubDeliver).toHaveBeenCalledTimes(1);
  });

  it('should queue one follow-up cycle behind a running one', async () => {
    let release: () => void = () => undefined;
    hubDeliver.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    outbox.enqueue(scanEvent('item-000001'));

    const running = worker.requestDrain();
    await vi.waitFor(() => expect(hubDeliver).toHaveBeenCalledTimes(1));
    outbox.enqueue(scanEvent('item-000002'));
    const followUp = worker.requestDrain();
    const joined = worker.requestDrain();

    expect(joined).toBe(followUp);
    expect(followUp).not.toBe(running);

    release();
    expect((await running).delivered).toBe(1);
    expect((await followUp).delivered).toBe(1);
  });

  it('should publish a summary after every cycle', async () => {
    const cycles: DeliveryCycleCompletedEvent[] = [];
    eventBus.subscribe(RelayEvents.DELIVERY_CYCLE_COMPLETED, (event) => cycles.push(event));
    outbox.enqueue(scanEvent('item-000001'));

    await worker.requestDrain();

    expect(cycles).toHaveLength(1);
    expect(cycles[0]).toMatchObject({ attempted: 1, delivered: 1, failed: 0, abandoned: 0 });
  });

  it('should report status', async () => {
    hubDeliver.mockRejectedValueOnce(new Error('hub unreachable'));
    outbox.enqueue(scanEvent('item-000001'));
    outbox.enqueue(scanEvent('item-000002'));

    await worker.requestDrain();
    const status = worker.getStatus();

    expect(status).toMatchObject({
      isStarted: false,
      isRunning: false,
      pendingCount: 1,
      currentBatchSize: 10,
      totals: { delivered: 1, failed: 1, abandoned: 0 },
    });
    expect(status.lastDrainAt).not.toBeNull();
    expect(status.recentErrors).toHaveLength(1);
    expect(status.recentErrors[0].error).toBe('hub: hub unreachable');
  });

  it('should drain on start and stop cleanly', async () => {
    outbox.enqueue(scanEvent('item-000001'));

    worker.start();
    expect(worker.getStatus().isStarted).toBe(true);
    await vi.waitFor(() => expect(outbox.count()).toBe(0));

    await worker.stop();
    expect(worker.getStatus().isStarted).toBe(false);
  });
});
