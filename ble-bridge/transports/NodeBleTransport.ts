/**
 * Node-BLE Transport Implementation
 * Wraps node-ble (BlueZ over D-Bus) for Linux / Raspberry Pi
 *
 * BlueZ keeps its own device cache, so scanning is "run discovery for a
 * window, then read adapter.devices()".
 */

import { createBluetooth } from 'node-ble';
import type { Adapter, Device, GattCharacteristic, GattServer } from 'node-ble';
import {
  CharacteristicInfo,
  DiscoveredDevice,
  ITransport,
  ScanFilter,
} from '../interfaces/ITransport';
import { normalizeUuid } from '../BleBridgeConstants';
import { TransportTiming } from '../PlatformConfig';
import { TransportError, toTransportError } from '../TransportErrors';
import { QueuedConnection } from './QueuedConnection';
import { matchesFilter } from '../DeviceFilter';
import { normalizeAddress } from '../../registry-management/DeviceIdentifier';
import { CollectorLogger } from '../../shared/logger';
import { delay, withTimeout } from '../../shared/async';

function toProperties(flags: readonly string[]): CharacteristicInfo['properties'] {
  return {
    read: flags.includes('read'),
    write: flags.includes('write'),
    writeWithoutResponse: flags.includes('write-without-response'),
    notify: flags.includes('notify'),
    indicate: flags.includes('indicate'),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─────────────────────────────────────────────────────────────────────────────
// Node-BLE Connection
// ─────────────────────────────────────────────────────────────────────────────

class NodeBleConnection extends QueuedConnection {
  private characteristics = new Map<string, GattCharacteristic>();

  constructor(
    private device: Device,
    private gattServer: GattServer,
    address: string,
    name: string,
    logger: CollectorLogger
  ) {
    super(address, name, logger);

    this.device.once('disconnect', () => {
      this.linkLost('BlueZ reported disconnect');
    });
  }

  async discoverServices(): Promise<CharacteristicInfo[]> {
    try {
      const found: CharacteristicInfo[] = [];
      const serviceUuids = await this.gattServer.services();

      for (const serviceUuid of serviceUuids) {
        const service = await this.gattServer.getPrimaryService(serviceUuid);
        const characteristicUuids = await service.characteristics();

        for (const uuid of characteristicUuids) {
          const characteristic = await service.getCharacteristic(uuid);
          const flags = await characteristic.getFlags();
          this.characteristics.set(normalizeUuid(uuid), characteristic);
          found.push({
            uuid: normalizeUuid(uuid),
            serviceUuid: normalizeUuid(serviceUuid),
            properties: toProperties(flags),
          });
        }
      }

      this.logger.debug(`${this.deviceName}: discovered ${found.length} characteristics`);
      return found;
    } catch (error) {
      throw toTransportError(error, 'SubscribeFailed');
    }
  }

  async subscribe(characteristicUuid: string): Promise<void> {
    const characteristic = this.characteristics.get(normalizeUuid(characteristicUuid));
    if (!characteristic) {
      throw new TransportError('SubscribeFailed', `Characteristic ${characteristicUuid} not discovered`);
    }

    try {
      await characteristic.startNotifications();
    } catch (error) {
      throw toTransportError(error, 'SubscribeFailed');
    }

    characteristic.removeAllListeners('valuechanged');
    characteristic.on('valuechanged', (buffer: Buffer) => {
      this.queue.push(buffer);
    });
  }

  protected async closeLink(): Promise<void> {
    for (const characteristic of this.characteristics.values()) {
      characteristic.removeAllListeners('valuechanged');
    }
    this.characteristics.clear();

    try {
      await this.device.disconnect();
    } catch (error) {
      // "Not Connected" is actually success
      if (!errorMessage(error).includes('Not Connected')) {
        this.logger.warn(`${this.deviceName}: disconnect failed`, error);
      }
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Node-BLE Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NodeBleTransport implements ITransport {
  readonly name = 'node-ble';

  private _isInitialized = false;
  private adapter: Adapter | null = null;
  private destroy: (() => void) | null = null;
  private logger = new CollectorLogger('NodeBleTransport');

  constructor(private timing: TransportTiming) {}

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  async initialize(): Promise<boolean> {
    this.logger.info('Initializing...');

    try {
      const { bluetooth, destroy } = createBluetooth();
      this.destroy = destroy;

      const adapter = await withTimeout(
        bluetooth.defaultAdapter(),
        this.timing.adapterReadyTimeoutMs,
        () => new Error(`Bluetooth adapter timeout (${this.timing.adapterReadyTimeoutMs / 1000}s)`)
      );

      if (!(await adapter.isPowered())) {
        this.logger.error('Default adapter is not powered');
        this.releaseBus();
        return false;
      }

      const adapterName = await adapter.getName();
      const adapterAddress = await adapter.getAddress();
      this.logger.info(`Adapter: ${adapterName} (${adapterAddress})`);

      this.adapter = adapter;
      this._isInitialized = true;
      this.logger.info('Initialized successfully');
      return true;
    } catch (error) {
      this.logger.error('Initialization failed:', error);
      this.releaseBus();
      return false;
    }
  }

  async cleanup(): Promise<void> {
    this.logger.info('Cleaning up...');

    if (this.adapter && (await this.adapter.isDiscovering().catch(() => false))) {
      await this.adapter.stopDiscovery().catch((error: unknown) => {
        this.logger.warn('Error stopping discovery:', error);
      });
    }

    this.adapter = null;
    this.releaseBus();
    this._isInitialized = false;
  }

  async scan(filter: ScanFilter): Promise<DiscoveredDevice[]> {
    const adapter = this.requireAdapter();

    try {
      if (!(await adapter.isDiscovering())) {
        await adapter.startDiscovery();
      }
      await delay(filter.scanWindowMs);
    } catch (error) {
      throw toTransportError(error, 'NotFound');
    } finally {
      await adapter.stopDiscovery().catch((error: unknown) => {
        this.logger.debug('Error stopping discovery:', error);
      });
    }

    const found: DiscoveredDevice[] = [];
    for (const rawAddress of await adapter.devices()) {
      const address = normalizeAddress(rawAddress);
      if (filter.addresses.length > 0 && !filter.addresses.includes(address)) continue;

      try {
        const device = await adapter.getDevice(rawAddress);
        const name = await device.getName().catch(() => device.getAlias());
        if (!matchesFilter(address, name, filter)) continue;

        // BlueZ drops RSSI from its cache for devices not heard this window
        const rssi = Number(await device.getRSSI().catch(() => Number.NaN));
        if (Number.isNaN(rssi)) continue;

        found.push({ id: rawAddress, name, address, rssi });
      } catch (error) {
        this.logger.debug(`Skipping ${address}: ${errorMessage(error)}`);
      }
    }

    this.logger.debug(`Scan window closed, ${found.length} matching devices`);
    return found;
  }

  async connect(device: DiscoveredDevice): Promise<QueuedConnection> {
    const adapter = this.requireAdapter();

    let bleDevice: Device;
    try {
      bleDevice = await adapter.getDevice(device.id);
    } catch (error) {
      throw toTransportError(error, 'NotFound');
    }

    try {
      await withTimeout(
        bleDevice.connect(),
        this.timing.connectionTimeoutMs,
        () => new TransportError('ConnectFailed', `Connection timeout after ${this.timing.connectionTimeoutMs}ms`)
      );
      const gattServer = await this.acquireGattServer(bleDevice, device.name);
      return new NodeBleConnection(bleDevice, gattServer, device.address, device.name, this.logger);
    } catch (error) {
      await bleDevice.disconnect().catch((disconnectError: unknown) => {
        this.logger.debug(`${device.name}: disconnect after failed connect:`, disconnectError);
      });
      throw toTransportError(error, 'ConnectFailed');
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private async acquireGattServer(device: Device, name: string): Promise<GattServer> {
    const { gattRetryAttempts, gattRetryDelayMs, gattStabilizationMs } = this.timing;
    let lastError: unknown;

    for (let attempt = 0; attempt < gattRetryAttempts; attempt++) {
      try {
        // Wait for BlueZ stabilization
        await delay(gattStabilizationMs);
        return await device.gatt();
      } catch (error) {
        lastError = error;
        this.logger.warn(`${name}: GATT attempt ${attempt + 1}/${gattRetryAttempts} failed: ${errorMessage(error)}`);
        if (attempt < gattRetryAttempts - 1) {
          await delay(gattRetryDelayMs);
        }
      }
    }

    throw new TransportError(
      'ConnectFailed',
      `Failed to acquire GATT server after ${gattRetryAttempts} attempts: ${errorMessage(lastError)}`,
      lastError
    );
  }

  private requireAdapter(): Adapter {
    if (!this.adapter) {
      throw new TransportError('NotFound', 'Transport not initialized');
    }
    return this.adapter;
  }

  private releaseBus(): void {
    if (this.destroy) {
      this.destroy();
      this.destroy = null;
    }
  }
}
