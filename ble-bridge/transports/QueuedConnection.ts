/**
 * Common connection plumbing: notifications land in a NotificationQueue,
 * a dropped link closes the queue and emits 'disconnect' exactly once.
 */

import { EventEmitter } from 'events';
import { CharacteristicInfo, IConnection } from '../interfaces/ITransport';
import { NotificationQueue } from '../NotificationQueue';
import { CollectorLogger } from '../../shared/logger';

export abstract class QueuedConnection extends EventEmitter implements IConnection {
  protected readonly queue = new NotificationQueue();
  private _isConnected = true;

  constructor(
    readonly address: string,
    protected readonly deviceName: string,
    protected readonly logger: CollectorLogger
  ) {
    super();
  }

  get isConnected(): boolean {
    return this._isConnected;
  }

  abstract discoverServices(): Promise<CharacteristicInfo[]>;
  abstract subscribe(characteristicUuid: string): Promise<void>;

  /** Host-stack specific teardown; called at most once */
  protected abstract closeLink(): Promise<void>;

  awaitNotification(timeoutMs: number, signal?: AbortSignal): Promise<Buffer> {
    return this.queue.next(timeoutMs, signal);
  }

  async disconnect(): Promise<void> {
    if (!this._isConnected) return;
    this.linkLost('Disconnected by collector');
    await this.closeLink();
  }

  /**
   * Mark the link dead. Pending and future reads fail with Disconnected.
   */
  protected linkLost(reason: string): void {
    if (!this._isConnected) return;
    this._isConnected = false;
    this.queue.close(reason);
    this.logger.logConnection(this.deviceName, this.address, 'Link closed', { reason });
    this.emit('disconnect', reason);
  }
}
