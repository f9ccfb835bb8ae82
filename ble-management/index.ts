/**
 * BLE Management Module
 * Discovery/reconnect loop and the fixed-rate poll loop
 */

export { DiscoveryManager } from './DiscoveryManager';
export { PollScheduler } from './PollScheduler';
export { releaseConnection } from './connectionRelease';
export type { ReleaseReason } from './connectionRelease';

export { MANAGEMENT_DEFAULTS } from './types';
export type {
  DiscoveryOptions,
  PollOptions,
  DeviceAttemptFailure,
  ReconcileReport,
  StartupReport,
  ReadFailureKind,
  ReadFailure,
  TickReport,
} from './types';
