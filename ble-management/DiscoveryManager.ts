/**
 * Discovery Manager
 * Reconciles configured devices against what the radio can see.
 *
 * One pass scans once, then walks every visible, not-yet-subscribed device
 * through DISCOVERED → CONNECTING → CONNECTED → SUBSCRIBED in parallel.
 * A failure at any step lands the device in FAILED and closes the half-open
 * link; the next pass retries it. This is the only place that retries.
 *
 * Events:
 *   'reconcileCompleted' (ReconcileReport)
 *   'deviceSubscribed'   ({ name, address })
 *   'deviceFailed'       (DeviceAttemptFailure)
 *   'deviceLost'         ({ name, address, reason })
 */

import { EventEmitter } from 'events';
import {
  DiscoveredDevice,
  IConnection,
  ITransport,
  ScanFilter,
} from '../ble-bridge/interfaces/ITransport';
import { BLE_CONFIG, NOTIFY_CHARACTERISTIC } from '../ble-bridge/BleBridgeConstants';
import { TransportError, toTransportError } from '../ble-bridge/TransportErrors';
import { DeviceRegistry } from '../registry-management/DeviceRegistry';
import { DeviceDescriptor, DeviceState } from '../registry-management/types';
import { CollectorLogger } from '../shared/logger';
import { Clock, systemClock } from '../shared/async';
import { releaseConnection } from './connectionRelease';
import {
  DeviceAttemptFailure,
  DiscoveryOptions,
  ReconcileReport,
  StartupReport,
} from './types';

type AttemptOutcome =
  | { ok: true; name: string }
  | { ok: false; failure: DeviceAttemptFailure };

export class DiscoveryManager extends EventEmitter {
  private inFlight = new Set<string>();
  private backgroundController: AbortController | null = null;
  private backgroundLoop: Promise<void> | null = null;
  private logger = new CollectorLogger('DiscoveryManager');

  constructor(
    private registry: DeviceRegistry,
    private transport: ITransport,
    private options: DiscoveryOptions,
    private clock: Clock = systemClock
  ) {
    super();
  }

  get isBackgroundRunning(): boolean {
    return this.backgroundLoop !== null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reconciliation
  // ───────────────────────────────────────────────────────────────────────────

  async reconcileOnce(): Promise<ReconcileReport> {
    const report: ReconcileReport = {
      attempted: [],
      subscribed: [],
      failed: [],
      notFound: [],
      skipped: [],
      scanError: null,
    };

    const candidates: DeviceDescriptor[] = [];
    for (const device of this.registry.getAll()) {
      if (device.state === DeviceState.SUBSCRIBED || this.inFlight.has(device.name)) {
        report.skipped.push(device.name);
      } else {
        candidates.push(device);
      }
    }

    if (candidates.length === 0) {
      this.emit('reconcileCompleted', report);
      return report;
    }

    let visible: DiscoveredDevice[];
    try {
      visible = await this.transport.scan(this.scanFilter(candidates));
    } catch (error) {
      report.scanError = error instanceof Error ? error.message : String(error);
      report.notFound = candidates.map(device => device.name);
      this.logger.error('Scan failed:', report.scanError);
      this.emit('reconcileCompleted', report);
      return report;
    }

    const visibleByAddress = new Map(visible.map(device => [device.address, device]));
    const attempts: Array<Promise<AttemptOutcome>> = [];

    for (const device of candidates) {
      const discovered = visibleByAddress.get(device.hardwareAddress);
      // Checked again here: an overlapping pass may have claimed it during the scan
      if (this.inFlight.has(device.name)) {
        report.skipped.push(device.name);
        continue;
      }
      if (!discovered) {
        report.notFound.push(device.name);
        continue;
      }

      report.attempted.push(device.name);
      this.inFlight.add(device.name);
      attempts.push(
        this.registry
          .runExclusive(device.name, () => this.connectDevice(device.name, discovered))
          .finally(() => this.inFlight.delete(device.name))
      );
    }

    const outcomes = await Promise.allSettled(attempts);
    for (const [index, outcome] of outcomes.entries()) {
      if (outcome.status === 'rejected') {
        // Registry misuse; the device keeps whatever state it reached
        const name = report.attempted[index];
        const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        this.logger.error(`${name}: reconcile attempt aborted:`, message);
        report.failed.push({ name, kind: 'ConnectFailed', message });
      } else if (outcome.value.ok) {
        report.subscribed.push(outcome.value.name);
      } else {
        report.failed.push(outcome.value.failure);
      }
    }

    if (report.notFound.length > 0) {
      this.logger.info(`Not found yet: ${report.notFound.join(', ')}`);
    }
    this.emit('reconcileCompleted', report);
    return report;
  }

  /**
   * Repeat reconciliation until every device is subscribed, or until
   * `startupTimeoutMs` (when non-zero) has passed.
   */
  async runStartup(signal?: AbortSignal): Promise<StartupReport> {
    const startedAt = this.clock.now();
    const { retryBackoffMultiplier, maxRetryDelayMs, startupTimeoutMs } = this.options;
    let retryDelay = this.options.retryDelayMs;
    let passes = 0;

    while (!signal?.aborted) {
      passes++;
      await this.reconcileOnce();

      const unavailable = this.unsubscribedNames();
      const elapsedMs = this.clock.now() - startedAt;
      const total = this.registry.size;

      if (unavailable.length === 0) {
        this.logger.info(`Startup complete: ${total}/${total} devices subscribed after ${passes} pass(es)`);
        return { passes, complete: true, unavailable, elapsedMs };
      }

      this.logger.info(`Startup pass ${passes}: ${total - unavailable.length}/${total} subscribed`);

      const timedOut = startupTimeoutMs > 0 && elapsedMs >= startupTimeoutMs;
      if (timedOut || signal?.aborted) {
        this.logger.warn(
          `Startup ${timedOut ? 'timed out' : 'aborted'}; unavailable: ${unavailable.join(', ')}`
        );
        return { passes, complete: false, unavailable, elapsedMs };
      }

      const sleepMs = startupTimeoutMs > 0
        ? Math.min(retryDelay, startupTimeoutMs - elapsedMs)
        : retryDelay;
      await this.clock.sleep(sleepMs, signal);
      retryDelay = Math.min(retryDelay * retryBackoffMultiplier, maxRetryDelayMs);
    }

    const unavailable = this.unsubscribedNames();
    this.logger.warn(`Startup aborted; unavailable: ${unavailable.join(', ')}`);
    return { passes, complete: unavailable.length === 0, unavailable, elapsedMs: this.clock.now() - startedAt };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Background reconciliation
  // ───────────────────────────────────────────────────────────────────────────

  startBackground(): void {
    if (this.backgroundLoop) {
      this.logger.info('Background reconciliation already running');
      return;
    }

    const controller = new AbortController();
    this.backgroundController = controller;
    this.logger.info(`Background reconciliation every ${this.options.reconcileIntervalMs}ms`);

    this.backgroundLoop = this.runBackground(controller.signal).finally(() => {
      this.backgroundLoop = null;
      this.backgroundController = null;
    });
  }

  async stopBackground(): Promise<void> {
    const loop = this.backgroundLoop;
    if (!loop) return;

    this.backgroundController?.abort();
    await loop;
    this.logger.info('Background reconciliation stopped');
  }

  /**
   * Close every attached link without marking devices failed
   */
  async disconnectAll(): Promise<void> {
    const closing = this.registry.getAll().map(device =>
      this.registry.runExclusive(device.name, async () => {
        const connection = this.registry.detachConnection(device.name);
        if (connection?.isConnected) {
          await connection.disconnect();
        }
      })
    );

    for (const result of await Promise.allSettled(closing)) {
      if (result.status === 'rejected') {
        this.logger.warn('Error closing connection:', result.reason);
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ───────────────────────────────────────────────────────────────────────────

  private async runBackground(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.clock.sleep(this.options.reconcileIntervalMs, signal);
      if (signal.aborted) break;

      try {
        const report = await this.reconcileOnce();
        if (report.attempted.length > 0) {
          this.logger.info(
            `Background pass: ${report.subscribed.length}/${report.attempted.length} recovered`
          );
        }
      } catch (error) {
        this.logger.error('Background reconciliation failed:', error);
      }
    }
  }

  private async connectDevice(name: string, discovered: DiscoveredDevice): Promise<AttemptOutcome> {
    const device = this.registry.get(name);
    if (!device || device.state === DeviceState.SUBSCRIBED) {
      return { ok: true, name };
    }

    this.registry.markSeen(name, new Date(this.clock.now()));
    if (device.state !== DeviceState.DISCOVERED) {
      this.registry.transition(name, DeviceState.DISCOVERED, { rssi: discovered.rssi });
    }
    this.registry.transition(name, DeviceState.CONNECTING);
    this.logger.logConnection(name, discovered.address, 'Connecting', { rssi: discovered.rssi });

    let connection: IConnection | null = null;
    try {
      connection = await this.transport.connect(discovered);
      this.registry.transition(name, DeviceState.CONNECTED);

      const characteristics = await connection.discoverServices();
      const notify = characteristics.find(
        characteristic => characteristic.uuid === NOTIFY_CHARACTERISTIC && characteristic.properties.notify
      );
      if (!notify) {
        throw new TransportError(
          'SubscribeFailed',
          `Notify characteristic ${BLE_CONFIG.NOTIFY_CHARACTERISTIC_UUID} not found`
        );
      }

      await connection.subscribe(notify.uuid);
      if (!connection.isConnected) {
        throw new TransportError('Disconnected', 'Link dropped during subscribe');
      }

      this.registry.attachConnection(name, connection);
      this.watchConnection(name, connection);
      this.registry.transition(name, DeviceState.SUBSCRIBED);

      this.logger.logConnection(name, discovered.address, 'Subscribed');
      this.emit('deviceSubscribed', { name, address: discovered.address });
      return { ok: true, name };
    } catch (error) {
      const transportError = toTransportError(error, 'ConnectFailed');
      const failure: DeviceAttemptFailure = { name, kind: transportError.kind, message: transportError.message };

      this.registry.detachConnection(name);
      this.registry.markFailed(name, failure);
      this.logger.logConnectionError(name, discovered.address, 'Connect', transportError);

      if (connection?.isConnected) {
        await connection.disconnect().catch((disconnectError: unknown) => {
          this.logger.warn(`${name}: closing half-open link failed`, disconnectError);
        });
      }

      this.emit('deviceFailed', failure);
      return { ok: false, failure };
    }
  }

  private watchConnection(name: string, connection: IConnection): void {
    connection.once('disconnect', (reason: string) => {
      releaseConnection(this.registry, name, connection, { kind: 'Disconnected', message: reason }, this.logger)
        .then(released => {
          if (released) {
            this.emit('deviceLost', { name, address: connection.address, reason });
          }
        })
        .catch((error: unknown) => {
          this.logger.error(`${name}: failed to release lost connection`, error);
        });
    });
  }

  private scanFilter(candidates: DeviceDescriptor[]): ScanFilter {
    return {
      addresses: candidates.map(device => device.hardwareAddress),
      namePatterns: this.options.namePattern ? [this.options.namePattern] : [],
      scanWindowMs: this.options.scanWindowMs,
    };
  }

  private unsubscribedNames(): string[] {
    return this.registry
      .getAll()
      .filter(device => device.state !== DeviceState.SUBSCRIBED)
      .map(device => device.name);
  }
}
