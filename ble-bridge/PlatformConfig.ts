/**
 * Platform Configuration
 * Detects the current platform and picks the host-stack transport for it
 */

import fs from 'fs';
import { BLE_CONFIG } from './BleBridgeConstants';

// ─────────────────────────────────────────────────────────────────────────────
// Platform Detection
// ─────────────────────────────────────────────────────────────────────────────

export type PlatformType = 'windows' | 'macos' | 'linux' | 'unknown';
export type TransportType = 'noble' | 'node-ble' | 'mock';
export type TransportSelection = TransportType | 'auto';

export function detectPlatform(platform: NodeJS.Platform = process.platform): PlatformType {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    case 'linux':
      return 'linux';
    default:
      return 'unknown';
  }
}

export function isRaspberryPi(): boolean {
  try {
    if (fs.existsSync('/proc/device-tree/model')) {
      const model = fs.readFileSync('/proc/device-tree/model', 'utf8');
      if (model.toLowerCase().includes('raspberry pi')) {
        return true;
      }
    }
    return false;
  } catch {
    return false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport Timing
// ─────────────────────────────────────────────────────────────────────────────

export interface TransportTiming {
  /** Pause after connect before asking BlueZ for the GATT server */
  gattStabilizationMs: number;
  gattRetryAttempts: number;
  gattRetryDelayMs: number;
  connectionTimeoutMs: number;
  adapterReadyTimeoutMs: number;
}

const NOBLE_TIMING: TransportTiming = {
  gattStabilizationMs: 0,
  gattRetryAttempts: 1,
  gattRetryDelayMs: 0,
  connectionTimeoutMs: BLE_CONFIG.CONNECTION_TIMEOUT,
  adapterReadyTimeoutMs: BLE_CONFIG.ADAPTER_READY_TIMEOUT,
};

const NODEBLE_TIMING: TransportTiming = {
  gattStabilizationMs: 200,       // Wait for GATT to be ready
  gattRetryAttempts: 3,           // More retries for flaky BlueZ
  gattRetryDelayMs: 500,
  connectionTimeoutMs: 60000,     // Pi connections can be slow
  adapterReadyTimeoutMs: BLE_CONFIG.ADAPTER_READY_TIMEOUT,
};

// ─────────────────────────────────────────────────────────────────────────────
// Selection
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolve `auto` to the transport that fits the platform:
 * noble (HCI) on Windows/macOS, node-ble (BlueZ over D-Bus) on Linux
 */
export function resolveTransportType(
  selection: TransportSelection,
  platform: PlatformType = detectPlatform()
): TransportType {
  if (selection !== 'auto') {
    return selection;
  }
  return platform === 'linux' ? 'node-ble' : 'noble';
}

export function getTransportTiming(transportType: TransportType): TransportTiming {
  if (transportType !== 'node-ble') {
    return { ...NOBLE_TIMING };
  }

  if (isRaspberryPi()) {
    return {
      ...NODEBLE_TIMING,
      gattStabilizationMs: 250,    // Slightly longer for Pi
    };
  }
  return { ...NODEBLE_TIMING };
}
