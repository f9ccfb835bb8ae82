/**
 * BLE Management Types
 * Options, defaults and event payloads for the discovery and poll loops
 */

import { BLE_CONFIG } from '../ble-bridge/BleBridgeConstants';
import type { TransportErrorKind } from '../ble-bridge/TransportErrors';
import type { ExportResult } from '../export-pipeline/types';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export const MANAGEMENT_DEFAULTS = {
  discovery: {
    namePattern: BLE_CONFIG.DEVICE_NAME_PATTERN,
    scanWindowMs: BLE_CONFIG.SCAN_WINDOW,
    retryDelayMs: 1000,
    retryBackoffMultiplier: 1,   // 1 = fixed delay
    maxRetryDelayMs: 30000,
    startupTimeoutMs: 0,         // 0 = wait until every device is subscribed
    reconcileIntervalMs: 10000,
  },
  polling: {
    readTimeoutMs: 5000,
    maxConcurrentReads: 4,
    maxConsecutiveReadFailures: 5,
  },
} as const;

export interface DiscoveryOptions {
  namePattern: string;
  scanWindowMs: number;
  retryDelayMs: number;
  retryBackoffMultiplier: number;
  maxRetryDelayMs: number;
  startupTimeoutMs: number;
  reconcileIntervalMs: number;
}

export interface PollOptions {
  intervalMs: number;
  readTimeoutMs: number;
  maxConcurrentReads: number;
  /** Consecutive timeouts before a device is handed back to discovery; 0 disables */
  maxConsecutiveReadFailures: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Discovery Reports
// ─────────────────────────────────────────────────────────────────────────────

export interface DeviceAttemptFailure {
  name: string;
  kind: TransportErrorKind;
  message: string;
}

export interface ReconcileReport {
  /** Devices visible in this pass that a connection was attempted for */
  attempted: string[];
  subscribed: string[];
  failed: DeviceAttemptFailure[];
  /** Configured, not subscribed, and not seen in this scan */
  notFound: string[];
  /** Already subscribed, or mid-attempt from an overlapping pass */
  skipped: string[];
  scanError: string | null;
}

export interface StartupReport {
  passes: number;
  /** True when every configured device reached SUBSCRIBED */
  complete: boolean;
  unavailable: string[];
  elapsedMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Poll Reports
// ─────────────────────────────────────────────────────────────────────────────

export type ReadFailureKind = TransportErrorKind | 'Decode';

export interface ReadFailure {
  name: string;
  address: string;
  kind: ReadFailureKind;
  message: string;
}

export interface TickReport {
  tick: number;
  /** Grid time the tick was due (clock ms) */
  scheduledAt: number;
  startedAt: number;
  finishedAt: number;
  collectedAt: Date;
  attempted: number;
  readings: number;
  failures: ReadFailure[];
  exportResult: ExportResult;
}
