/**
 * Noble Transport Implementation
 * Wraps @abandonware/noble for Windows/macOS BLE operations
 *
 * Noble is a process-wide singleton driven by events ('stateChange',
 * 'discover'); this class turns it into the scan/connect calls the
 * discovery loop needs.
 */

import noble from '@abandonware/noble';
import type { Characteristic, Peripheral } from '@abandonware/noble';
import {
  CharacteristicInfo,
  DiscoveredDevice,
  ITransport,
  ScanFilter,
} from '../interfaces/ITransport';
import { normalizeUuid } from '../BleBridgeConstants';
import { matchesFilter } from '../DeviceFilter';
import { TransportTiming } from '../PlatformConfig';
import { TransportError, toTransportError } from '../TransportErrors';
import { QueuedConnection } from './QueuedConnection';
import { normalizeAddress } from '../../registry-management/DeviceIdentifier';
import { CollectorLogger } from '../../shared/logger';
import { delay, withTimeout } from '../../shared/async';

function toProperties(properties: readonly string[]): CharacteristicInfo['properties'] {
  return {
    read: properties.includes('read'),
    write: properties.includes('write'),
    writeWithoutResponse: properties.includes('writeWithoutResponse'),
    notify: properties.includes('notify'),
    indicate: properties.includes('indicate'),
  };
}

/**
 * macOS hides hardware addresses; the peripheral id stands in for it there
 */
function addressOf(peripheral: Peripheral): string {
  return normalizeAddress(peripheral.address || peripheral.id);
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Connection
// ─────────────────────────────────────────────────────────────────────────────

class NobleConnection extends QueuedConnection {
  private characteristics = new Map<string, Characteristic>();

  constructor(private peripheral: Peripheral, name: string, logger: CollectorLogger) {
    super(addressOf(peripheral), name, logger);

    this.peripheral.once('disconnect', () => {
      this.linkLost('Peripheral disconnected');
    });
  }

  async discoverServices(): Promise<CharacteristicInfo[]> {
    try {
      const { services } = await this.peripheral.discoverAllServicesAndCharacteristicsAsync();
      const found: CharacteristicInfo[] = [];

      for (const service of services) {
        for (const characteristic of service.characteristics ?? []) {
          const uuid = normalizeUuid(characteristic.uuid);
          this.characteristics.set(uuid, characteristic);
          found.push({
            uuid,
            serviceUuid: normalizeUuid(service.uuid),
            properties: toProperties(characteristic.properties),
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

    characteristic.on('data', (data: Buffer) => {
      this.queue.push(data);
    });

    try {
      await characteristic.subscribeAsync();
    } catch (error) {
      characteristic.removeAllListeners('data');
      throw toTransportError(error, 'SubscribeFailed');
    }
  }

  protected async closeLink(): Promise<void> {
    for (const characteristic of this.characteristics.values()) {
      characteristic.removeAllListeners('data');
    }
    this.characteristics.clear();

    if (this.peripheral.state === 'disconnected') return;
    try {
      await this.peripheral.disconnectAsync();
    } catch (error) {
      this.logger.warn(`${this.deviceName}: disconnect failed`, error);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NobleTransport implements ITransport {
  readonly name = 'noble';

  private _isInitialized = false;
  private peripherals = new Map<string, Peripheral>();
  private logger = new CollectorLogger('NobleTransport');

  constructor(private timing: TransportTiming) {}

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  async initialize(): Promise<boolean> {
    this.logger.info('Initializing...');

    try {
      await this.waitForBluetoothReady();
    } catch (error) {
      this.logger.error('Initialization failed:', error);
      return false;
    }

    this._isInitialized = true;
    this.logger.info('Initialized successfully');
    return true;
  }

  async cleanup(): Promise<void> {
    this.logger.info('Cleaning up...');

    try {
      await noble.stopScanningAsync();
    } catch (error) {
      this.logger.warn('Error stopping scan:', error);
    }

    this.peripherals.clear();
    this._isInitialized = false;
  }

  /**
   * Listen for advertisements for one scan window and return the matches
   */
  async scan(filter: ScanFilter): Promise<DiscoveredDevice[]> {
    if (!this._isInitialized) {
      throw new TransportError('NotFound', 'Transport not initialized');
    }

    const found = new Map<string, DiscoveredDevice>();

    const onDiscover = (peripheral: Peripheral) => {
      const address = addressOf(peripheral);
      const name = peripheral.advertisement?.localName ?? '';
      if (!matchesFilter(address, name, filter)) return;

      this.peripherals.set(address, peripheral);
      found.set(address, { id: peripheral.id, name, address, rssi: peripheral.rssi });
    };

    noble.on('discover', onDiscover);
    try {
      // Duplicates on: a beacon that was seen in an earlier window must be reported again
      await noble.startScanningAsync([], true);
      await delay(filter.scanWindowMs);
    } catch (error) {
      throw toTransportError(error, 'NotFound');
    } finally {
      noble.removeListener('discover', onDiscover);
      await noble.stopScanningAsync().catch((error: unknown) => {
        this.logger.warn('Error stopping scan:', error);
      });
    }

    this.logger.debug(`Scan window closed, ${found.size} matching devices`);
    return Array.from(found.values());
  }

  async connect(device: DiscoveredDevice): Promise<QueuedConnection> {
    const peripheral = this.peripherals.get(device.address);
    if (!peripheral) {
      throw new TransportError('NotFound', `Device ${device.address} was not seen in a scan`);
    }

    try {
      await withTimeout(
        peripheral.connectAsync(),
        this.timing.connectionTimeoutMs,
        () => new TransportError('ConnectFailed', `Connection timeout after ${this.timing.connectionTimeoutMs}ms`)
      );
    } catch (error) {
      // Noble keeps trying in the background after a timeout
      await peripheral.disconnectAsync().catch((disconnectError: unknown) => {
        this.logger.debug(`${device.name}: disconnect after failed connect:`, disconnectError);
      });
      throw toTransportError(error, 'ConnectFailed');
    }

    return new NobleConnection(peripheral, device.name, this.logger);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private waitForBluetoothReady(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (noble._state === 'poweredOn') {
        resolve();
        return;
      }

      const timeoutMs = this.timing.adapterReadyTimeoutMs;
      const timeout = setTimeout(() => {
        noble.removeListener('stateChange', stateChangeHandler);
        reject(new Error(`Bluetooth adapter timeout (${timeoutMs / 1000}s), state: ${noble._state}`));
      }, timeoutMs);

      const stateChangeHandler = (state: string) => {
        this.logger.info(`Bluetooth state during init: ${state}`);
        if (state === 'poweredOn') {
          clearTimeout(timeout);
          noble.removeListener('stateChange', stateChangeHandler);
          resolve();
        }
      };

      noble.on('stateChange', stateChangeHandler);
    });
  }
}
