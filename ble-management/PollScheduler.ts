/**
 * Poll Scheduler
 * Fixed-rate read/export loop over every subscribed device.
 *
 * Tick k is due at anchor + k·interval and the anchor never moves, so a slow
 * tick shortens the next sleep and overdue ticks run back to back until the
 * loop is on the grid again. Each tick's export finishes before the next tick
 * starts, so batches reach the sink in order.
 *
 * Events:
 *   'tickCompleted' (TickReport)
 *   'readFailed'    (ReadFailure)
 *   'decodeFailed'  ({ name, address, error: DecodeError })
 */

import { EventEmitter } from 'events';
import type { IConnection } from '../ble-bridge/interfaces/ITransport';
import { TransportError, toTransportError } from '../ble-bridge/TransportErrors';
import { createReading, decodePayload, describeReading, SensorReading } from '../payload';
import type { IExporter } from '../export-pipeline/types';
import { DeviceRegistry } from '../registry-management/DeviceRegistry';
import { DeviceDescriptor, DeviceState } from '../registry-management/types';
import { CollectorLogger } from '../shared/logger';
import {
  AbortedError,
  Clock,
  mapSettledWithConcurrency,
  raceAbort,
  systemClock,
  withTimeout,
} from '../shared/async';
import { releaseConnection } from './connectionRelease';
import { PollOptions, ReadFailure, TickReport } from './types';

/** Extra time a read gets past its own timeout before the scheduler stops waiting */
const READ_GUARD_MS = 1000;

interface ReadTarget {
  device: DeviceDescriptor;
  connection: IConnection;
}

type ReadOutcome =
  | { ok: true; reading: SensorReading }
  | { ok: false; failure: ReadFailure };

export class PollScheduler extends EventEmitter {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private tickCount = 0;
  private logger = new CollectorLogger('PollScheduler');

  constructor(
    private registry: DeviceRegistry,
    private exporter: IExporter,
    private options: PollOptions,
    private clock: Clock = systemClock
  ) {
    super();
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  get ticks(): number {
    return this.tickCount;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.loop) {
      this.logger.info('Already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.logger.info(
      `Polling every ${this.options.intervalMs}ms ` +
        `(read timeout ${this.options.readTimeoutMs}ms, max ${this.options.maxConcurrentReads} concurrent)`
    );

    this.loop = this.run(controller.signal)
      .catch((error: unknown) => {
        this.logger.error('Poll loop crashed:', error);
      })
      .finally(() => {
        this.loop = null;
        this.controller = null;
      });
  }

  /**
   * Abort the in-flight tick (its readings are discarded) and wait for the loop to exit
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.controller?.abort();
    await loop;
    this.logger.info(`Stopped after ${this.tickCount} ticks`);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Loop
  // ───────────────────────────────────────────────────────────────────────────

  private async run(signal: AbortSignal): Promise<void> {
    const interval = this.options.intervalMs;
    const anchor = this.clock.now();
    let index = 0;

    while (!signal.aborted) {
      const due = anchor + index * interval;
      const now = this.clock.now();

      if (now - due >= interval) {
        this.logger.warn(`Tick ${index + 1} is ${now - due}ms late; running it now`);
      } else if (due > now) {
        await this.clock.sleep(due - now, signal);
        if (signal.aborted) break;
      }

      const report = await this.runTick(due, signal);
      if (!report) break;

      this.emit('tickCompleted', report);
      index++;
    }
  }

  /**
   * @returns null when the tick was aborted before its export
   */
  private async runTick(scheduledAt: number, signal: AbortSignal): Promise<TickReport | null> {
    const tick = ++this.tickCount;
    const startedAt = this.clock.now();
    const collectedAt = new Date(startedAt);
    const targets = this.collectTargets();

    let outcomes: PromiseSettledResult<ReadOutcome>[];
    try {
      outcomes = await raceAbort(
        mapSettledWithConcurrency(targets, this.options.maxConcurrentReads, target =>
          this.readDevice(target, collectedAt, signal)
        ),
        signal
      );
    } catch (error) {
      if (error instanceof AbortedError) {
        this.logger.info(`Tick ${tick} aborted; partial readings discarded`);
        return null;
      }
      throw error;
    }
    if (signal.aborted) {
      this.logger.info(`Tick ${tick} aborted; partial readings discarded`);
      return null;
    }

    const readings: SensorReading[] = [];
    const failures: ReadFailure[] = [];
    for (const [i, outcome] of outcomes.entries()) {
      if (outcome.status === 'rejected') {
        const { device } = targets[i];
        const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        failures.push({ name: device.name, address: device.hardwareAddress, kind: 'Disconnected', message });
        this.logger.error(`${device.name}: read handling failed:`, message);
      } else if (outcome.value.ok) {
        readings.push(outcome.value.reading);
      } else {
        failures.push(outcome.value.failure);
      }
    }

    const exportResult = await this.exporter.export(readings);
    const finishedAt = this.clock.now();

    const report: TickReport = {
      tick,
      scheduledAt,
      startedAt,
      finishedAt,
      collectedAt,
      attempted: targets.length,
      readings: readings.length,
      failures,
      exportResult,
    };

    this.logger.debug(
      `Tick ${tick}: ${readings.length}/${targets.length} readings, ` +
        `${exportResult.success ? `${exportResult.written} written` : 'export failed'}`
    );
    return report;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────────

  private collectTargets(): ReadTarget[] {
    const targets: ReadTarget[] = [];
    for (const device of this.registry.getInState(DeviceState.SUBSCRIBED)) {
      const connection = this.registry.getConnection(device.name);
      if (connection) {
        targets.push({ device, connection });
      }
    }
    return targets;
  }

  private async readDevice(
    { device, connection }: ReadTarget,
    collectedAt: Date,
    signal: AbortSignal
  ): Promise<ReadOutcome> {
    const { readTimeoutMs } = this.options;
    let raw: Buffer;

    try {
      // The guard covers host stacks that ignore their own timeout
      raw = await withTimeout(
        connection.awaitNotification(readTimeoutMs, signal),
        readTimeoutMs + READ_GUARD_MS,
        () => new TransportError('Timeout', `Read did not settle within ${readTimeoutMs + READ_GUARD_MS}ms`)
      );
    } catch (error) {
      const transportError = toTransportError(error, 'Timeout');
      const failure: ReadFailure = {
        name: device.name,
        address: device.hardwareAddress,
        kind: transportError.kind,
        message: transportError.message,
      };
      if (!signal.aborted) {
        await this.handleReadFailure(device, connection, failure);
      }
      return { ok: false, failure };
    }

    const decoded = decodePayload(raw);
    if (!decoded.success) {
      this.logger.warn(`${device.name}: ${decoded.error.message}`);
      this.emit('decodeFailed', { name: device.name, address: device.hardwareAddress, error: decoded.error });
      return {
        ok: false,
        failure: { name: device.name, address: device.hardwareAddress, kind: 'Decode', message: decoded.error.message },
      };
    }

    this.registry.resetReadFailures(device.name);
    const reading = createReading(decoded.measurements, device.name, device.hardwareAddress, collectedAt);
    this.logger.debug(describeReading(reading));
    return { ok: true, reading };
  }

  private async handleReadFailure(
    device: DeviceDescriptor,
    connection: IConnection,
    failure: ReadFailure
  ): Promise<void> {
    this.logger.warn(`${device.name}: read failed (${failure.kind}): ${failure.message}`);
    this.emit('readFailed', failure);

    if (failure.kind === 'Disconnected') {
      await releaseConnection(this.registry, device.name, connection, failure, this.logger);
      return;
    }

    if (failure.kind !== 'Timeout') return;

    const count = this.registry.recordReadFailure(device.name);
    const limit = this.options.maxConsecutiveReadFailures;
    if (limit > 0 && count >= limit) {
      await releaseConnection(
        this.registry,
        device.name,
        connection,
        { kind: 'Timeout', message: `${count} consecutive reads timed out` },
        this.logger
      );
    }
  }
}
