/**
 * BLE Transport Interface
 * Platform-agnostic abstraction over the wireless host stack
 */

import { EventEmitter } from 'events';

// ─────────────────────────────────────────────────────────────────────────────
// Characteristic Info
// ─────────────────────────────────────────────────────────────────────────────

export interface CharacteristicProperties {
  read: boolean;
  write: boolean;
  writeWithoutResponse: boolean;
  notify: boolean;
  indicate: boolean;
}

export interface CharacteristicInfo {
  /** Lower case, no dashes */
  uuid: string;
  serviceUuid: string;
  properties: CharacteristicProperties;
}

// ─────────────────────────────────────────────────────────────────────────────
// Discovered Device Info
// ─────────────────────────────────────────────────────────────────────────────

export interface DiscoveredDevice {
  id: string;
  name: string;
  /** Normalized hardware address (AA:BB:CC:DD:EE:FF) */
  address: string;
  rssi: number;
}

export interface ScanFilter {
  /** Normalized addresses of interest; empty means "any" */
  addresses: string[];
  /** Case-insensitive substrings of the advertised name; empty means "any" */
  namePatterns: string[];
  scanWindowMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Connection Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An open link to one device.
 *
 * Events: 'disconnect' (reason: string)
 */
export interface IConnection extends EventEmitter {
  readonly address: string;
  readonly isConnected: boolean;

  discoverServices(): Promise<CharacteristicInfo[]>;
  subscribe(characteristicUuid: string): Promise<void>;
  /**
   * Resolve with the newest notification received since the previous call,
   * or wait for the next one. Rejects with TransportError('Timeout') after
   * `timeoutMs` and with TransportError('Disconnected') when the link drops.
   */
  awaitNotification(timeoutMs: number, signal?: AbortSignal): Promise<Buffer>;
  disconnect(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface ITransport {
  readonly name: string;
  readonly isInitialized: boolean;

  /** False when no usable adapter is present */
  initialize(): Promise<boolean>;
  cleanup(): Promise<void>;

  scan(filter: ScanFilter): Promise<DiscoveredDevice[]>;
  connect(device: DiscoveredDevice): Promise<IConnection>;
}
