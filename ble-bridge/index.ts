/**
 * BLE Bridge - Platform-aware Bluetooth Low Energy transports
 *
 * Windows/Mac: @abandonware/noble (HCI socket)
 * Linux/Raspberry Pi: node-ble (BlueZ via DBus)
 *
 * Concrete host-stack transports are not re-exported here; get one from
 * createTransport() so only the selected stack is loaded.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ITransport,
  IConnection,
  CharacteristicInfo,
  CharacteristicProperties,
  DiscoveredDevice,
  ScanFilter,
} from './interfaces/ITransport';

// ─────────────────────────────────────────────────────────────────────────────
// Factory & platform
// ─────────────────────────────────────────────────────────────────────────────

export { createTransport } from './TransportFactory';
export type { TransportFactoryOptions } from './TransportFactory';
export {
  detectPlatform,
  resolveTransportType,
  getTransportTiming,
} from './PlatformConfig';
export type { PlatformType, TransportType, TransportSelection, TransportTiming } from './PlatformConfig';

// ─────────────────────────────────────────────────────────────────────────────
// Building blocks
// ─────────────────────────────────────────────────────────────────────────────

export { BLE_CONFIG, NOTIFY_CHARACTERISTIC, normalizeUuid } from './BleBridgeConstants';
export { NotificationQueue } from './NotificationQueue';
export { matchesFilter } from './DeviceFilter';
export { MockTransport, MockConnection, simulatedMeasurements } from './MockTransport';
export type { MockDeviceSpec, MockNotification } from './MockTransport';
export {
  TransportError,
  AdapterUnavailableError,
  toTransportError,
} from './TransportErrors';
export type { TransportErrorKind } from './TransportErrors';
