/**
 * Device Registry
 *
 * Configured name → hardware address mapping plus the live connection-state
 * table for each device. Descriptors are created once from configuration and
 * never removed during a run, so a device that keeps failing stays visible.
 *
 * The registry does no network I/O. Callers that mutate a descriptor across
 * an await (discovery, poll-driven failure handling) go through
 * `runExclusive(name, fn)` so only one writer touches an entry at a time.
 */

import { EventEmitter } from 'events';
import type { IConnection } from '../ble-bridge/interfaces/ITransport';
import { normalizeAddress } from './DeviceIdentifier';
import {
  DeviceDescriptor,
  DeviceFailure,
  DeviceState,
  DeviceStateChange,
  RegistrySummary,
  TRANSITION_RULES,
} from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export class InvalidTransitionError extends Error {
  constructor(
    public readonly deviceName: string,
    public readonly fromState: DeviceState,
    public readonly toState: DeviceState
  ) {
    super(`Invalid transition for device ${deviceName}: ${fromState} → ${toState}`);
    this.name = 'InvalidTransitionError';
  }
}

export class DeviceNotFoundError extends Error {
  constructor(public readonly identifier: string) {
    super(`Device not found: ${identifier}`);
    this.name = 'DeviceNotFoundError';
  }
}

export class DuplicateDeviceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DuplicateDeviceError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export class DeviceRegistry extends EventEmitter {
  // Primary storage: name → descriptor
  private devices = new Map<string, DeviceDescriptor>();
  private addressToName = new Map<string, string>();

  private connections = new Map<string, IConnection>();
  private locks = new Map<string, Promise<unknown>>();

  /**
   * @param mapping - logical device name → hardware address
   */
  constructor(mapping: Record<string, string>, private readonly now: () => Date = () => new Date()) {
    super();

    for (const [name, rawAddress] of Object.entries(mapping)) {
      const hardwareAddress = normalizeAddress(rawAddress);

      const existing = this.addressToName.get(hardwareAddress);
      if (existing !== undefined) {
        throw new DuplicateDeviceError(
          `Address ${hardwareAddress} is configured for both "${existing}" and "${name}"`
        );
      }

      this.devices.set(name, {
        name,
        hardwareAddress,
        state: DeviceState.UNSEEN,
        previousState: null,
        stateChangedAt: this.now(),
        lastSeen: null,
        consecutiveFailures: 0,
        consecutiveReadFailures: 0,
        lastError: null,
      });
      this.addressToName.set(hardwareAddress, name);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lookup
  // ───────────────────────────────────────────────────────────────────────────

  get size(): number {
    return this.devices.size;
  }

  /**
   * Snapshot of one descriptor
   */
  get(name: string): DeviceDescriptor | undefined {
    const device = this.devices.get(name);
    return device ? { ...device } : undefined;
  }

  getByAddress(address: string): DeviceDescriptor | undefined {
    const name = this.addressToName.get(normalizeAddress(address));
    return name === undefined ? undefined : this.get(name);
  }

  getAll(): DeviceDescriptor[] {
    return Array.from(this.devices.values(), device => ({ ...device }));
  }

  getInState(...states: DeviceState[]): DeviceDescriptor[] {
    return this.getAll().filter(device => states.includes(device.state));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // State Machine Core
  // ───────────────────────────────────────────────────────────────────────────

  validateTransition(from: DeviceState, to: DeviceState): boolean {
    return TRANSITION_RULES[from].includes(to);
  }

  canTransition(name: string, to: DeviceState): boolean {
    const device = this.devices.get(name);
    return device ? this.validateTransition(device.state, to) : false;
  }

  /**
   * Transition a device to a new state (with validation)
   * @throws InvalidTransitionError if the edge is not in TRANSITION_RULES
   */
  transition(name: string, newState: DeviceState, metadata?: Record<string, unknown>): void {
    const device = this.require(name);
    const previousState = device.state;

    if (!this.validateTransition(previousState, newState)) {
      throw new InvalidTransitionError(name, previousState, newState);
    }

    const now = this.now();
    device.previousState = previousState;
    device.state = newState;
    device.stateChangedAt = now;

    if (newState === DeviceState.SUBSCRIBED) {
      device.consecutiveFailures = 0;
      device.consecutiveReadFailures = 0;
      device.lastError = null;
    }

    const change: DeviceStateChange = {
      name,
      hardwareAddress: device.hardwareAddress,
      previousState,
      newState,
      metadata,
      timestamp: now,
    };
    this.emit('deviceStateChanged', change);
  }

  /**
   * Move a device to FAILED and count the failure.
   * A device that is already FAILED keeps its count.
   */
  markFailed(name: string, error: { kind: string; message: string }): void {
    const device = this.require(name);
    if (device.state === DeviceState.FAILED) {
      return;
    }
    if (!this.validateTransition(device.state, DeviceState.FAILED)) {
      throw new InvalidTransitionError(name, device.state, DeviceState.FAILED);
    }

    const failure: DeviceFailure = { kind: error.kind, message: error.message, at: this.now() };
    device.consecutiveFailures++;
    device.lastError = failure;
    this.transition(name, DeviceState.FAILED, { error: failure });
  }

  markSeen(name: string, at: Date = this.now()): void {
    this.require(name).lastSeen = at;
  }

  /**
   * @returns the updated count of consecutive read failures
   */
  recordReadFailure(name: string): number {
    const device = this.require(name);
    device.consecutiveReadFailures++;
    return device.consecutiveReadFailures;
  }

  resetReadFailures(name: string): void {
    this.require(name).consecutiveReadFailures = 0;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Connections
  // ───────────────────────────────────────────────────────────────────────────

  attachConnection(name: string, connection: IConnection): void {
    this.require(name);
    this.connections.set(name, connection);
  }

  getConnection(name: string): IConnection | undefined {
    return this.connections.get(name);
  }

  /**
   * @returns the connection that was attached, if any
   */
  detachConnection(name: string): IConnection | undefined {
    const connection = this.connections.get(name);
    this.connections.delete(name);
    return connection;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Per-device serialization
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` once every earlier `runExclusive` call for the same device has
   * settled. Calls for different devices do not wait on each other.
   */
  runExclusive<T>(name: string, fn: () => Promise<T> | T): Promise<T> {
    this.require(name);

    const previous = this.locks.get(name) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );

    this.locks.set(name, tail);
    void tail.then(() => {
      if (this.locks.get(name) === tail) {
        this.locks.delete(name);
      }
    });

    return run;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reporting
  // ───────────────────────────────────────────────────────────────────────────

  getSummary(): RegistrySummary {
    const byState: Record<DeviceState, number> = {
      [DeviceState.UNSEEN]: 0,
      [DeviceState.DISCOVERED]: 0,
      [DeviceState.CONNECTING]: 0,
      [DeviceState.CONNECTED]: 0,
      [DeviceState.SUBSCRIBED]: 0,
      [DeviceState.FAILED]: 0,
    };

    const unavailable: RegistrySummary['unavailable'] = [];
    for (const device of this.devices.values()) {
      byState[device.state]++;
      if (device.state !== DeviceState.SUBSCRIBED) {
        unavailable.push({
          name: device.name,
          hardwareAddress: device.hardwareAddress,
          state: device.state,
          consecutiveFailures: device.consecutiveFailures,
          lastSeen: device.lastSeen,
        });
      }
    }

    return { total: this.devices.size, byState, unavailable };
  }

  private require(name: string): DeviceDescriptor {
    const device = this.devices.get(name);
    if (!device) {
      throw new DeviceNotFoundError(name);
    }
    return device;
  }
}
