/**
 * Transport Factory - Platform-aware transport selector
 *
 * Windows/Mac: @abandonware/noble (HCI socket)
 * Linux/Raspberry Pi: node-ble (BlueZ via DBus)
 *
 * The host-stack modules are imported on demand so the other one (and its
 * native bindings) is never loaded.
 */

import { ITransport } from './interfaces/ITransport';
import { MockTransport } from './MockTransport';
import {
  TransportSelection,
  detectPlatform,
  getTransportTiming,
  resolveTransportType,
} from './PlatformConfig';
import { createLogger } from '../shared/logger';

const logger = createLogger('TransportFactory');

export interface TransportFactoryOptions {
  /** Addresses the mock transport simulates; ignored by real transports */
  simulatedAddresses?: string[];
}

export async function createTransport(
  selection: TransportSelection,
  options: TransportFactoryOptions = {}
): Promise<ITransport> {
  const platform = detectPlatform();
  const transportType = resolveTransportType(selection, platform);

  logger.info(`Platform ${platform}, transport ${transportType}${selection === 'auto' ? ' (auto)' : ''}`);

  switch (transportType) {
    case 'noble': {
      const { NobleTransport } = await import('./transports/NobleTransport');
      return new NobleTransport(getTransportTiming('noble'));
    }
    case 'node-ble': {
      const { NodeBleTransport } = await import('./transports/NodeBleTransport');
      return new NodeBleTransport(getTransportTiming('node-ble'));
    }
    case 'mock':
      return new MockTransport(
        (options.simulatedAddresses ?? []).map(address => ({ address, simulate: true }))
      );
  }
}
