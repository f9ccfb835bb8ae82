/**
 * Device Registry Types
 * Connection lifecycle state machine for configured devices
 */

// ─────────────────────────────────────────────────────────────────────────────
// State Machine
// ─────────────────────────────────────────────────────────────────────────────

export enum DeviceState {
  UNSEEN = 'unseen',
  DISCOVERED = 'discovered',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  SUBSCRIBED = 'subscribed',
  FAILED = 'failed',
}

/**
 * Valid state transitions
 * Any transition not in this map is invalid and will throw
 */
export const TRANSITION_RULES: Record<DeviceState, DeviceState[]> = {
  [DeviceState.UNSEEN]: [
    DeviceState.DISCOVERED,
  ],
  [DeviceState.DISCOVERED]: [
    DeviceState.CONNECTING,
  ],
  [DeviceState.CONNECTING]: [
    DeviceState.CONNECTED,
    DeviceState.FAILED,
  ],
  [DeviceState.CONNECTED]: [
    DeviceState.SUBSCRIBED,
    DeviceState.FAILED,  // Service discovery or subscribe error
  ],
  [DeviceState.SUBSCRIBED]: [
    DeviceState.FAILED,  // Disconnect or persistent read failure
  ],
  [DeviceState.FAILED]: [
    DeviceState.DISCOVERED,  // Seen again during a scan
    DeviceState.CONNECTING,  // Direct retry
  ],
};

// ─────────────────────────────────────────────────────────────────────────────
// Device Descriptor
// ─────────────────────────────────────────────────────────────────────────────

export interface DeviceFailure {
  kind: string;
  message: string;
  at: Date;
}

export interface DeviceDescriptor {
  // Identity (from configuration, immutable)
  name: string;
  hardwareAddress: string;

  // State machine
  state: DeviceState;
  previousState: DeviceState | null;
  stateChangedAt: Date;

  // Health
  lastSeen: Date | null;
  consecutiveFailures: number;
  consecutiveReadFailures: number;
  lastError: DeviceFailure | null;
}

export interface DeviceStateChange {
  name: string;
  hardwareAddress: string;
  previousState: DeviceState;
  newState: DeviceState;
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

export interface RegistrySummary {
  total: number;
  byState: Record<DeviceState, number>;
  unavailable: Array<Pick<DeviceDescriptor, 'name' | 'hardwareAddress' | 'state' | 'consecutiveFailures' | 'lastSeen'>>;
}
