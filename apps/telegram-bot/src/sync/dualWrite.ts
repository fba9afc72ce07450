/**
 * Dual-Write Coordinator
 *
 * Every bot mutation is written to the local log first and then forwarded
 * to the sync gateway. The local write is the result of the operation. The
 * forward runs in the background under a timeout; its failures are logged
 * and emitted but never reach the caller. Nothing is retried, so a failed
 * forward leaves the backend behind until the next write of that entity or
 * an administrative import.
 */

import { EventEmitter } from 'node:events';
import { toError, withTimeout, type Logger } from '@adsync/utils';

export interface DualWriteOptions {
  syncEnabled: boolean;
  forwardTimeoutMs: number;
  logger: Logger;
}

export interface ForwardedEvent {
  description: string;
  durationMs: number;
}

export interface ForwardFailedEvent {
  description: string;
  error: Error;
}

export interface DualWriteEvents {
  forwarded: [ForwardedEvent];
  'forward-failed': [ForwardFailedEvent];
}

export class DualWriteCoordinator extends EventEmitter<DualWriteEvents> {
  private readonly syncEnabled: boolean;
  private readonly forwardTimeoutMs: number;
  private readonly log: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: DualWriteOptions) {
    super();
    this.syncEnabled = options.syncEnabled;
    this.forwardTimeoutMs = options.forwardTimeoutMs;
    this.log = options.logger.child({ component: 'dual-write' });
  }

  get pendingForwards(): number {
    return this.inFlight.size;
  }

  /**
   * Write locally, then forward the result without waiting for it. A local
   * failure rejects and nothing is forwarded.
   */
  async write<T>(
    description: string,
    local: () => Promise<T>,
    forward: (result: T) => Promise<unknown>,
  ): Promise<T> {
    const result = await local();

    if (this.syncEnabled) {
      this.track(this.forward(description, () => forward(result)));
    } else {
      this.log.debug({ description }, 'Sync disabled, skipping forward');
    }

    return result;
  }

  /**
   * Resolve once every forward started so far has settled.
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  private async forward(description: string, send: () => Promise<unknown>): Promise<void> {
    const startedAt = Date.now();
    try {
      // Started inside the try so a synchronous throw is reported too
      await withTimeout(Promise.resolve().then(send), this.forwardTimeoutMs, `Forward of ${description}`);
    } catch (caught) {
      const error = toError(caught);
      this.log.warn({ description, err: error }, 'Forward to sync gateway failed');
      this.notify(description, () => this.emit('forward-failed', { description, error }));
      return;
    }

    const durationMs = Date.now() - startedAt;
    this.log.debug({ description, durationMs }, 'Forwarded to sync gateway');
    this.notify(description, () => this.emit('forwarded', { description, durationMs }));
  }

  /**
   * Listener errors are logged; they never fail the tracked forward.
   */
  private notify(description: string, emit: () => boolean): void {
    try {
      emit();
    } catch (caught) {
      this.log.error({ description, err: toError(caught) }, 'Dual-write listener failed');
    }
  }
}
