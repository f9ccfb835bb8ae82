/**
 * Collector
 * Owns the registry and wires transport, discovery, polling and export together.
 *
 * Lifecycle:
 *   start(): adapter up → startup reconciliation → background reconciliation
 *            + fixed-rate polling
 *   stop():  polling → background reconciliation → links → adapter → sink
 *
 * Events:
 *   'statusReport' (RegistrySummary) every `statusEvery` ticks
 */

import { EventEmitter } from 'events';
import { AdapterUnavailableError, ITransport } from '../ble-bridge';
import {
  DeviceAttemptFailure,
  DiscoveryManager,
  DiscoveryOptions,
  PollOptions,
  PollScheduler,
  StartupReport,
  TickReport,
} from '../ble-management';
import { ExportFailedEvent, ExportPipeline, ExportPipelineOptions, ISink } from '../export-pipeline';
import { DeviceRegistry, DeviceStateChange, RegistrySummary } from '../registry-management';
import { Clock, systemClock } from '../shared/async';
import { CollectorLogger } from '../shared/logger';

export interface CollectorOptions {
  /** Logical name → hardware address */
  devices: Record<string, string>;
  discovery: DiscoveryOptions;
  polling: PollOptions;
  export: ExportPipelineOptions;
  /** Ticks between status summaries; 0 disables them */
  statusEvery: number;
}

export class Collector extends EventEmitter {
  readonly registry: DeviceRegistry;
  readonly discovery: DiscoveryManager;
  readonly pipeline: ExportPipeline;
  readonly scheduler: PollScheduler;

  private started = false;
  private startupController: AbortController | null = null;
  private startup: Promise<StartupReport> | null = null;
  private stopping: Promise<void> | null = null;
  private logger = new CollectorLogger('Collector');

  constructor(
    private transport: ITransport,
    sink: ISink,
    private options: CollectorOptions,
    clock: Clock = systemClock
  ) {
    super();
    this.registry = new DeviceRegistry(options.devices, () => new Date(clock.now()));
    this.discovery = new DiscoveryManager(this.registry, transport, options.discovery, clock);
    this.pipeline = new ExportPipeline(sink, options.export);
    this.scheduler = new PollScheduler(this.registry, this.pipeline, options.polling, clock);
    this.wireEvents();
  }

  get isRunning(): boolean {
    return this.scheduler.isRunning;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Bring the adapter up and run startup reconciliation, then start polling.
   * Rejects with AdapterUnavailableError when the transport has no adapter.
   */
  async start(): Promise<StartupReport> {
    if (this.started) {
      throw new Error('Collector already started');
    }
    this.started = true;

    this.logger.info(
      `Starting with ${this.registry.size} device(s) on ${this.transport.name} transport, ` +
        `polling every ${this.options.polling.intervalMs}ms`
    );

    // stop() during initialize must still cancel startup and wait for the adapter
    const controller = new AbortController();
    this.startupController = controller;
    this.startup = this.bringUp(controller.signal);

    let report: StartupReport;
    try {
      report = await this.startup;
    } finally {
      this.startupController = null;
      this.startup = null;
    }

    if (controller.signal.aborted || this.stopping) {
      this.logger.info('Stopped during startup');
      return report;
    }

    if (!report.complete) {
      this.logger.warn(`Polling without: ${report.unavailable.join(', ')}; background reconciliation will retry`);
    }

    this.discovery.startBackground();
    this.scheduler.start();
    return report;
  }

  /**
   * Idempotent; concurrent callers share one shutdown
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  getStatus(): RegistrySummary {
    return this.registry.getSummary();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ───────────────────────────────────────────────────────────────────────────

  private async bringUp(signal: AbortSignal): Promise<StartupReport> {
    const ready = await this.transport.initialize();
    if (!ready) {
      throw new AdapterUnavailableError(this.transport.name);
    }
    return this.discovery.runStartup(signal);
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Shutting down...');

    this.startupController?.abort();
    if (this.startup) {
      await this.startup.catch((error: unknown) => {
        this.logger.warn('Startup ended with an error during shutdown:', error);
      });
    }

    await this.scheduler.stop();
    await this.discovery.stopBackground();
    await this.discovery.disconnectAll();

    try {
      await this.transport.cleanup();
    } catch (error) {
      this.logger.error('Transport cleanup failed:', error);
    }

    try {
      await this.pipeline.close();
    } catch (error) {
      this.logger.error('Closing the sink failed:', error);
    }

    this.logger.info('Shutdown complete');
  }

  private wireEvents(): void {
    this.registry.on('deviceStateChanged', (change: DeviceStateChange) => {
      this.logger.debug(`${change.name}: ${change.previousState} → ${change.newState}`);
    });

    this.discovery.on('deviceFailed', (failure: DeviceAttemptFailure) => {
      this.logger.warn(`${failure.name}: connection attempt failed (${failure.kind}): ${failure.message}`);
    });

    this.discovery.on('deviceLost', ({ name, reason }: { name: string; reason: string }) => {
      this.logger.warn(`${name}: link lost (${reason}); will reconnect`);
    });

    this.pipeline.on('exportFailed', (event: ExportFailedEvent) => {
      this.logger.error(`Dropped ${event.readings} reading(s): ${event.error.message}`);
    });

    this.scheduler.on('tickCompleted', (report: TickReport) => {
      const { statusEvery } = this.options;
      if (statusEvery > 0 && report.tick % statusEvery === 0) {
        this.reportStatus();
      }
    });
  }

  private reportStatus(): void {
    const summary = this.registry.getSummary();
    const subscribed = summary.total - summary.unavailable.length;

    if (summary.unavailable.length === 0) {
      this.logger.info(`Status: ${subscribed}/${summary.total} subscribed`);
    } else {
      const details = summary.unavailable.map(device => {
        const seen = device.lastSeen ? `last seen ${device.lastSeen.toISOString()}` : 'never seen';
        return `${device.name} (${device.state}, ${device.consecutiveFailures} failure(s), ${seen})`;
      });
      this.logger.warn(`Status: ${subscribed}/${summary.total} subscribed; unavailable: ${details.join(', ')}`);
    }

    this.emit('statusReport', summary);
  }
}
