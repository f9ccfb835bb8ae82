/**
 * Notification Queue
 * Bridges push-style characteristic notifications to pull-style reads.
 *
 * Only the newest unread payload is kept: a poll wants current values,
 * not a backlog.
 */

import { TransportError } from './TransportErrors';

interface Waiter {
  resolve: (data: Buffer) => void;
  reject: (error: TransportError) => void;
}

export class NotificationQueue {
  private pending: Buffer | null = null;
  private waiters: Waiter[] = [];
  private closedReason: string | null = null;
  private replacedCount = 0;

  get isClosed(): boolean {
    return this.closedReason !== null;
  }

  /** Unread payloads overwritten by a newer one */
  get replaced(): number {
    return this.replacedCount;
  }

  push(data: Buffer): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(data);
      return;
    }

    if (this.pending) this.replacedCount++;
    this.pending = data;
  }

  next(timeoutMs: number, signal?: AbortSignal): Promise<Buffer> {
    if (this.pending) {
      const data = this.pending;
      this.pending = null;
      return Promise.resolve(data);
    }

    if (this.closedReason !== null) {
      return Promise.reject(new TransportError('Disconnected', this.closedReason));
    }

    if (signal?.aborted) {
      return Promise.reject(new TransportError('Timeout', 'Notification wait aborted'));
    }

    return new Promise<Buffer>((resolve, reject) => {
      const settle = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiters = this.waiters.filter(w => w !== waiter);
      };

      const waiter: Waiter = {
        resolve: data => {
          settle();
          resolve(data);
        },
        reject: error => {
          settle();
          reject(error);
        },
      };

      const timer = setTimeout(() => {
        waiter.reject(new TransportError('Timeout', `No notification within ${timeoutMs}ms`));
      }, timeoutMs);

      const onAbort = () => {
        waiter.reject(new TransportError('Timeout', 'Notification wait aborted'));
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Fail every waiter and all future reads
   */
  close(reason: string): void {
    if (this.isClosed) return;
    this.closedReason = reason;
    this.pending = null;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new TransportError('Disconnected', reason));
    }
  }
}
