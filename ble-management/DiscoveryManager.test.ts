/**
 * Discovery Manager Tests
 * Runs against the in-process mock transport on a virtual clock.
 */

import { once } from 'events';
import { DiscoveryManager } from './DiscoveryManager';
import { DiscoveryOptions } from './types';
import { MockTransport } from '../ble-bridge/MockTransport';
import { DeviceRegistry } from '../registry-management/DeviceRegistry';
import { DeviceState, DeviceStateChange } from '../registry-management/types';
import { ManualClock } from '../shared/async';

const KITCHEN = 'AA:BB:CC:DD:EE:01';
const GARAGE = 'AA:BB:CC:DD:EE:02';

const OPTIONS: DiscoveryOptions = {
  namePattern: 'Ruuvi',
  scanWindowMs: 0,
  retryDelayMs: 1000,
  retryBackoffMultiplier: 1,
  maxRetryDelayMs: 30000,
  startupTimeoutMs: 0,
  reconcileIntervalMs: 10000,
};

describe('DiscoveryManager', () => {
  let registry: DeviceRegistry;
  let transport: MockTransport;
  let clock: ManualClock;

  function createManager(options: Partial<DiscoveryOptions> = {}): DiscoveryManager {
    return new DiscoveryManager(registry, transport, { ...OPTIONS, ...options }, clock);
  }

  beforeEach(async () => {
    registry = new DeviceRegistry({ kitchen: KITCHEN, garage: GARAGE });
    transport = new MockTransport([
      { address: KITCHEN, name: 'Ruuvi 0001' },
      { address: GARAGE, name: 'Ruuvi 0002' },
    ]);
    clock = new ManualClock();
    await transport.initialize();
  });

  describe('reconcileOnce', () => {
    it('subscribes every visible device', async () => {
      const report = await createManager().reconcileOnce();

      expect(report.subscribed.sort()).toEqual(['garage', 'kitchen']);
      expect(report.failed).toEqual([]);
      expect(registry.get('kitchen')?.state).toBe(DeviceState.SUBSCRIBED);
      expect(registry.get('kitchen')?.lastSeen).toEqual(new Date(0));
      expect(registry.getConnection('garage')?.address).toBe(GARAGE);
    });

    it('walks each device through the connection states in order', async () => {
      const states: DeviceState[] = [];
      registry.on('deviceStateChanged', (change: DeviceStateChange) => {
        if (change.name === 'kitchen') states.push(change.newState);
      });

      await createManager().reconcileOnce();

      expect(states).toEqual([
        DeviceState.DISCOVERED,
        DeviceState.CONNECTING,
        DeviceState.CONNECTED,
        DeviceState.SUBSCRIBED,
      ]);
    });

    it('reports devices that are out of range as not found', async () => {
      transport.setVisible(GARAGE, false);

      const report = await createManager().reconcileOnce();

      expect(report.subscribed).toEqual(['kitchen']);
      expect(report.notFound).toEqual(['garage']);
      expect(registry.get('garage')?.state).toBe(DeviceState.UNSEEN);
    });

    it('isolates a failing device from the others', async () => {
      transport.failConnect(GARAGE, 'ConnectFailed');

      const report = await createManager().reconcileOnce();

      expect(report.subscribed).toEqual(['kitchen']);
      expect(report.failed).toEqual([
        { name: 'garage', kind: 'ConnectFailed', message: 'Simulated connect failure' },
      ]);
      expect(registry.get('garage')?.state).toBe(DeviceState.FAILED);
      expect(registry.get('garage')?.consecutiveFailures).toBe(1);
      expect(registry.get('kitchen')?.consecutiveFailures).toBe(0);
    });

    it('fails and closes a device without the notify characteristic', async () => {
      transport.addDevice({ address: GARAGE, name: 'Ruuvi 0002', hasNotifyCharacteristic: false });

      const report = await createManager().reconcileOnce();

      expect(report.failed).toEqual([
        {
          name: 'garage',
          kind: 'SubscribeFailed',
          message: 'Notify characteristic 6e400003-b5a3-f393-e0a9-e50e24dcca9e not found',
        },
      ]);
      expect(registry.getConnection('garage')).toBeUndefined();
      expect(transport.getConnection(GARAGE)).toBeNull();
    });

    it('leaves subscribed devices alone', async () => {
      const manager = createManager();
      await manager.reconcileOnce();
      const scansBefore = transport.scanCount;

      const report = await manager.reconcileOnce();

      expect(report.skipped.sort()).toEqual(['garage', 'kitchen']);
      expect(transport.scanCount).toBe(scansBefore);
      expect(transport.connectAttempts).toHaveLength(2);
    });

    it('reports a failed scan without touching device state', async () => {
      await transport.cleanup();

      const report = await createManager().reconcileOnce();

      expect(report.scanError).toBe('Transport not initialized');
      expect(report.notFound.sort()).toEqual(['garage', 'kitchen']);
      expect(registry.get('kitchen')?.state).toBe(DeviceState.UNSEEN);
    });
  });

  describe('runStartup', () => {
    it('retries with a fixed delay until every device is subscribed', async () => {
      transport.failConnect(GARAGE, 'ConnectFailed', 'ConnectFailed');

      const report = await createManager().runStartup();

      expect(report).toEqual({ passes: 3, complete: true, unavailable: [], elapsedMs: 2000 });
      expect(clock.sleeps).toEqual([1000, 1000]);
      expect(registry.get('garage')?.consecutiveFailures).toBe(0);
    });

    it('backs off exponentially up to the cap', async () => {
      transport.failConnect(GARAGE, 'ConnectFailed', 'ConnectFailed', 'ConnectFailed', 'ConnectFailed');

      const report = await createManager({ retryBackoffMultiplier: 2, maxRetryDelayMs: 3000 }).runStartup();

      expect(report.passes).toBe(5);
      expect(clock.sleeps).toEqual([1000, 2000, 3000, 3000]);
    });

    it('gives up on missing devices after the startup timeout', async () => {
      transport.setVisible(GARAGE, false);

      const report = await createManager({ startupTimeoutMs: 2500 }).runStartup();

      expect(report).toEqual({ passes: 4, complete: false, unavailable: ['garage'], elapsedMs: 2500 });
      expect(clock.sleeps).toEqual([1000, 1000, 500]);
      expect(registry.get('kitchen')?.state).toBe(DeviceState.SUBSCRIBED);
    });

    it('stops retrying when aborted', async () => {
      transport.setVisible(GARAGE, false);
      const controller = new AbortController();
      controller.abort();

      const report = await createManager().runStartup(controller.signal);

      expect(report.complete).toBe(false);
      expect(report.passes).toBe(0);
      expect(transport.scanCount).toBe(0);
    });
  });

  describe('link loss', () => {
    it('moves a disconnected device to FAILED and reconnects it on the next pass', async () => {
      const manager = createManager();
      await manager.reconcileOnce();

      const lost = once(manager, 'deviceLost');
      transport.getConnection(KITCHEN)?.simulateDisconnect('Out of range');
      const [event] = await lost;

      expect(event).toEqual({ name: 'kitchen', address: KITCHEN, reason: 'Out of range' });
      expect(registry.get('kitchen')?.state).toBe(DeviceState.FAILED);
      expect(registry.get('kitchen')?.lastError?.kind).toBe('Disconnected');
      expect(registry.getConnection('kitchen')).toBeUndefined();

      const report = await manager.reconcileOnce();
      expect(report.subscribed).toEqual(['kitchen']);
      expect(registry.get('kitchen')?.state).toBe(DeviceState.SUBSCRIBED);
    });

    it('does not report a link the collector closed itself', async () => {
      const manager = createManager();
      await manager.reconcileOnce();
      const onLost = jest.fn();
      manager.on('deviceLost', onLost);

      await manager.disconnectAll();
      await new Promise(resolve => setImmediate(resolve));

      expect(onLost).not.toHaveBeenCalled();
      expect(registry.get('kitchen')?.state).toBe(DeviceState.SUBSCRIBED);
      expect(registry.getConnection('kitchen')).toBeUndefined();
    });
  });

  describe('background reconciliation', () => {
    it('recovers a device that comes into range later', async () => {
      transport.setVisible(GARAGE, false);
      const manager = createManager();
      await manager.reconcileOnce();

      const subscribed = once(manager, 'deviceSubscribed');
      manager.startBackground();
      transport.setVisible(GARAGE, true);
      const [event] = await subscribed;
      await manager.stopBackground();

      expect(event).toEqual({ name: 'garage', address: GARAGE });
      expect(clock.sleeps[0]).toBe(10000);
      expect(manager.isBackgroundRunning).toBe(false);
    });
  });
});
