/**
 * Collector Tests
 * End to end over the mock transport with an in-memory sink
 */

import { once } from 'events';
import { Collector, CollectorOptions } from './Collector';
import { MockTransport } from '../ble-bridge/MockTransport';
import { AdapterUnavailableError } from '../ble-bridge/TransportErrors';
import { PollScheduler } from '../ble-management/PollScheduler';
import { ISink, WritePoint } from '../export-pipeline/types';
import { DeviceState, RegistrySummary } from '../registry-management/types';
import { ManualClock } from '../shared/async';

const KITCHEN = 'AA:BB:CC:DD:EE:01';
const GARAGE = 'AA:BB:CC:DD:EE:02';

const OPTIONS: CollectorOptions = {
  devices: { kitchen: KITCHEN, garage: GARAGE },
  discovery: {
    namePattern: 'Ruuvi',
    scanWindowMs: 0,
    retryDelayMs: 1000,
    retryBackoffMultiplier: 1,
    maxRetryDelayMs: 30000,
    startupTimeoutMs: 0,
    reconcileIntervalMs: 10000,
  },
  polling: {
    intervalMs: 1000,
    readTimeoutMs: 5000,
    maxConcurrentReads: 4,
    maxConsecutiveReadFailures: 5,
  },
  export: { bucket: 'sensors', measurement: 'ruuvi' },
  statusEvery: 2,
};

function waitForTicks(scheduler: PollScheduler, count: number): Promise<void> {
  let seen = 0;
  return new Promise(resolve => {
    scheduler.on('tickCompleted', () => {
      seen++;
      if (seen === count) resolve();
    });
  });
}

describe('Collector', () => {
  let transport: MockTransport;
  let clock: ManualClock;
  let write: jest.Mock<Promise<void>, [string, WritePoint[]]>;
  let close: jest.Mock<Promise<void>, []>;
  let sink: ISink;

  function createCollector(options: Partial<CollectorOptions> = {}): Collector {
    return new Collector(transport, sink, { ...OPTIONS, ...options }, clock);
  }

  beforeEach(() => {
    transport = new MockTransport([
      { address: KITCHEN, name: 'Ruuvi 0001', simulate: true },
      { address: GARAGE, name: 'Ruuvi 0002', simulate: true },
    ]);
    clock = new ManualClock();
    write = jest.fn(async (_bucket: string, _points: WritePoint[]): Promise<void> => undefined);
    close = jest.fn(async (): Promise<void> => undefined);
    sink = { write, close };
  });

  it('collects from every device and releases everything on stop', async () => {
    const collector = createCollector();
    const firstTick = waitForTicks(collector.scheduler, 1);

    const report = await collector.start();
    await firstTick;
    await collector.stop();

    expect(report.complete).toBe(true);
    expect(write).toHaveBeenCalled();
    const [bucket, points] = write.mock.calls[0];
    expect(bucket).toBe('sensors');
    expect(points.map(point => point.tags.name)).toEqual(['kitchen', 'garage']);
    expect(points[0].measurement).toBe('ruuvi');

    expect(close).toHaveBeenCalledTimes(1);
    expect(collector.isRunning).toBe(false);
    expect(transport.isInitialized).toBe(false);
    expect(transport.getConnection(KITCHEN)).toBeNull();
  });

  it('fails to start without an adapter', async () => {
    transport.adapterAvailable = false;
    const collector = createCollector();

    await expect(collector.start()).rejects.toBeInstanceOf(AdapterUnavailableError);
    expect(collector.isRunning).toBe(false);
    expect(transport.scanCount).toBe(0);
  });

  it('refuses to start twice', async () => {
    const collector = createCollector();
    await collector.start();

    await expect(collector.start()).rejects.toThrow('Collector already started');
    await collector.stop();
  });

  it('polls the devices it has while reporting the missing ones', async () => {
    transport.setVisible(GARAGE, false);
    const collector = createCollector({
      discovery: { ...OPTIONS.discovery, startupTimeoutMs: 1000 },
    });
    const status = once(collector, 'statusReport');

    const report = await collector.start();
    const [summary]: RegistrySummary[] = await status;
    await collector.stop();

    expect(report).toMatchObject({ complete: false, unavailable: ['garage'] });
    expect(summary.total).toBe(2);
    expect(summary.byState[DeviceState.SUBSCRIBED]).toBe(1);
    expect(summary.unavailable.map(device => device.name)).toEqual(['garage']);
    expect(write.mock.calls[0][1].map(point => point.tags.name)).toEqual(['kitchen']);
  });

  it('keeps polling after a failed write', async () => {
    write.mockRejectedValueOnce(new Error('connection refused'));
    const collector = createCollector();
    const ticks = waitForTicks(collector.scheduler, 2);

    await collector.start();
    await ticks;
    const runningAfterFailure = collector.isRunning;
    await collector.stop();

    expect(runningAfterFailure).toBe(true);
    expect(write.mock.calls.length).toBeGreaterThanOrEqual(2);
  });

  it('abandons startup when stopped before every device is found', async () => {
    transport.setVisible(GARAGE, false);
    const collector = createCollector();

    const starting = collector.start();
    await new Promise(resolve => setImmediate(resolve));
    await collector.stop();
    const report = await starting;

    expect(report.complete).toBe(false);
    expect(collector.isRunning).toBe(false);
    expect(collector.scheduler.ticks).toBe(0);
    expect(collector.registry.getConnection('kitchen')).toBeUndefined();
  });

  it('waits for adapter initialization before cleaning up the transport', async () => {
    const events: string[] = [];
    let finishInitialize: () => void = () => undefined;
    jest.spyOn(transport, 'initialize').mockImplementation(async () => {
      await new Promise<void>(resolve => {
        finishInitialize = resolve;
      });
      events.push('initialized');
      return true;
    });
    jest.spyOn(transport, 'cleanup').mockImplementation(async () => {
      events.push('cleanup');
    });
    const collector = createCollector();

    const starting = collector.start();
    const stopping = collector.stop();
    await new Promise(resolve => setImmediate(resolve));
    const beforeInitialize = [...events];
    finishInitialize();
    await stopping;
    const report = await starting;

    expect(beforeInitialize).toEqual([]);
    expect(events).toEqual(['initialized', 'cleanup']);
    expect(report.complete).toBe(false);
    expect(transport.scanCount).toBe(0);
    expect(collector.isRunning).toBe(false);
  });

  it('shares one shutdown between concurrent stop calls', async () => {
    const collector = createCollector();
    await collector.start();

    await Promise.all([collector.stop(), collector.stop()]);

    expect(close).toHaveBeenCalledTimes(1);
  });
});
