/**
 * Mock Transport for development and tests
 * Simulates environmental beacons without a Bluetooth adapter.
 *
 * Each device can be scripted: hidden from scans, made to fail connect or
 * subscribe a number of times, or fed an exact sequence of notification
 * results. Unscripted simulated devices answer every read with a freshly
 * encoded payload.
 */

import {
  CharacteristicInfo,
  DiscoveredDevice,
  ITransport,
  ScanFilter,
} from './interfaces/ITransport';
import { BLE_CONFIG, NOTIFY_CHARACTERISTIC, normalizeUuid } from './BleBridgeConstants';
import { matchesFilter } from './DeviceFilter';
import { TransportError, TransportErrorKind } from './TransportErrors';
import { QueuedConnection } from './transports/QueuedConnection';
import { encodePayload } from '../payload/PayloadEncoder';
import { SensorMeasurements } from '../payload/types';
import { normalizeAddress } from '../registry-management/DeviceIdentifier';
import { CollectorLogger } from '../shared/logger';

/** One scripted answer to `awaitNotification` */
export type MockNotification = Buffer | TransportError | 'hang';

export interface MockDeviceSpec {
  address: string;
  name?: string;
  rssi?: number;
  visible?: boolean;
  /** Generate a payload for every unscripted read */
  simulate?: boolean;
  /** Advertise the notify characteristic (default true) */
  hasNotifyCharacteristic?: boolean;
}

interface MockDevice {
  address: string;
  name: string;
  rssi: number;
  visible: boolean;
  simulate: boolean;
  hasNotifyCharacteristic: boolean;
  connectFailures: TransportErrorKind[];
  subscribeFailures: number;
  notifications: MockNotification[];
  sequence: number;
  connection: MockConnection | null;
}

const NUS_SERVICE = normalizeUuid(BLE_CONFIG.SERVICE_UUID);

/**
 * Readings for a simulated beacon; values drift slowly with the sequence number
 */
export function simulatedMeasurements(sequence: number): SensorMeasurements {
  const phase = sequence / 20;
  return {
    temperature: Math.round((21 + 2 * Math.sin(phase)) * 200) / 200,
    humidity: Math.round((45 + 5 * Math.cos(phase)) * 400) / 400,
    pressure: 101325,
    accelerationX: 0,
    accelerationY: 0,
    accelerationZ: 1,
    batteryVoltage: 3.0,
    txPower: 4,
    movementCounter: 0,
    measurementSequence: sequence % 65536,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Mock Connection
// ─────────────────────────────────────────────────────────────────────────────

export class MockConnection extends QueuedConnection {
  private subscribed = false;
  readonly reads: number[] = [];

  constructor(private device: MockDevice, logger: CollectorLogger) {
    super(device.address, device.name, logger);
  }

  async discoverServices(): Promise<CharacteristicInfo[]> {
    if (!this.isConnected) {
      throw new TransportError('Disconnected', 'Link closed');
    }

    const characteristics: CharacteristicInfo[] = [
      {
        uuid: normalizeUuid('6e400002-b5a3-f393-e0a9-e50e24dcca9e'),
        serviceUuid: NUS_SERVICE,
        properties: { read: false, write: true, writeWithoutResponse: true, notify: false, indicate: false },
      },
    ];
    if (this.device.hasNotifyCharacteristic) {
      characteristics.push({
        uuid: NOTIFY_CHARACTERISTIC,
        serviceUuid: NUS_SERVICE,
        properties: { read: false, write: false, writeWithoutResponse: false, notify: true, indicate: false },
      });
    }
    return characteristics;
  }

  async subscribe(characteristicUuid: string): Promise<void> {
    if (this.device.subscribeFailures > 0) {
      this.device.subscribeFailures--;
      throw new TransportError('SubscribeFailed', 'Simulated subscribe failure');
    }
    if (!this.device.hasNotifyCharacteristic || normalizeUuid(characteristicUuid) !== NOTIFY_CHARACTERISTIC) {
      throw new TransportError('SubscribeFailed', `Characteristic ${characteristicUuid} not discovered`);
    }
    this.subscribed = true;
  }

  awaitNotification(timeoutMs: number, signal?: AbortSignal): Promise<Buffer> {
    this.reads.push(timeoutMs);
    const scripted = this.device.notifications.shift();

    if (scripted === undefined) {
      if (this.device.simulate && this.subscribed && this.isConnected) {
        this.device.sequence++;
        return Promise.resolve(encodePayload(simulatedMeasurements(this.device.sequence)));
      }
      return this.queue.next(timeoutMs, signal);
    }

    if (scripted === 'hang') {
      // Ignores both the timeout and the signal, like a wedged host stack
      return new Promise<Buffer>(() => undefined);
    }
    if (scripted instanceof TransportError) {
      if (scripted.kind === 'Disconnected') {
        this.linkLost(scripted.message);
      }
      return Promise.reject(scripted);
    }
    return Promise.resolve(scripted);
  }

  /** Deliver a notification as the host stack would */
  push(data: Buffer): void {
    this.queue.push(data);
  }

  /** Drop the link from the device side */
  simulateDisconnect(reason = 'Simulated link loss'): void {
    this.linkLost(reason);
  }

  protected async closeLink(): Promise<void> {
    this.subscribed = false;
    if (this.device.connection === this) {
      this.device.connection = null;
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Mock Transport
// ─────────────────────────────────────────────────────────────────────────────

export class MockTransport implements ITransport {
  readonly name = 'mock';

  private _isInitialized = false;
  private devices = new Map<string, MockDevice>();
  private logger = new CollectorLogger('MockTransport');

  adapterAvailable = true;
  scanCount = 0;
  readonly connectAttempts: string[] = [];

  constructor(devices: MockDeviceSpec[] = []) {
    for (const spec of devices) {
      this.addDevice(spec);
    }
  }

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  async initialize(): Promise<boolean> {
    this._isInitialized = this.adapterAvailable;
    this.logger.info(`Mock transport initialized with ${this.devices.size} simulated devices`);
    return this._isInitialized;
  }

  async cleanup(): Promise<void> {
    for (const device of this.devices.values()) {
      await device.connection?.disconnect();
    }
    this._isInitialized = false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Scripting
  // ─────────────────────────────────────────────────────────────────────────

  addDevice(spec: MockDeviceSpec): void {
    const address = normalizeAddress(spec.address);
    this.devices.set(address, {
      address,
      name: spec.name ?? `Ruuvi ${address.slice(-5).replace(':', '')}`,
      rssi: spec.rssi ?? -60,
      visible: spec.visible ?? true,
      simulate: spec.simulate ?? false,
      hasNotifyCharacteristic: spec.hasNotifyCharacteristic ?? true,
      connectFailures: [],
      subscribeFailures: 0,
      notifications: [],
      sequence: 0,
      connection: null,
    });
  }

  setVisible(address: string, visible: boolean): void {
    this.requireDevice(address).visible = visible;
  }

  /** Fail the next connect attempts, one entry per attempt */
  failConnect(address: string, ...kinds: TransportErrorKind[]): void {
    const failures: TransportErrorKind[] = kinds.length > 0 ? kinds : ['ConnectFailed'];
    this.requireDevice(address).connectFailures.push(...failures);
  }

  failSubscribe(address: string, times = 1): void {
    this.requireDevice(address).subscribeFailures += times;
  }

  /** Queue answers for the next reads, in order */
  queueNotifications(address: string, ...notifications: MockNotification[]): void {
    this.requireDevice(address).notifications.push(...notifications);
  }

  getConnection(address: string): MockConnection | null {
    return this.requireDevice(address).connection;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ITransport
  // ─────────────────────────────────────────────────────────────────────────

  async scan(filter: ScanFilter): Promise<DiscoveredDevice[]> {
    if (!this._isInitialized) {
      throw new TransportError('NotFound', 'Transport not initialized');
    }
    this.scanCount++;

    return Array.from(this.devices.values())
      .filter(device => device.visible && matchesFilter(device.address, device.name, filter))
      .map(device => ({ id: device.address, name: device.name, address: device.address, rssi: device.rssi }));
  }

  async connect(discovered: DiscoveredDevice): Promise<MockConnection> {
    this.connectAttempts.push(discovered.address);
    const device = this.devices.get(discovered.address);

    if (!device || !device.visible) {
      throw new TransportError('NotFound', `Device ${discovered.address} not in range`);
    }

    const failure = device.connectFailures.shift();
    if (failure) {
      throw new TransportError(failure, 'Simulated connect failure');
    }

    const connection = new MockConnection(device, this.logger);
    device.connection = connection;
    return connection;
  }

  private requireDevice(address: string): MockDevice {
    const device = this.devices.get(normalizeAddress(address));
    if (!device) {
      throw new Error(`Unknown mock device ${address}`);
    }
    return device;
  }
}
