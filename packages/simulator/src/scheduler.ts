import { TransientChannelError, errorMessage } from '@factory-sim/shared';
import type { Logger } from '@factory-sim/shared';

/**
 * Fixed-period timer for one entity. A tick that throws is logged and the
 * timer keeps running; a tick still in flight when the next one is due is
 * not overlapped.
 */
export class PeriodicTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly periodMs: number,
    private readonly run: () => void | Promise<void>,
    private readonly logger: Logger,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.trigger();
    }, this.periodMs);
  }

  /** Run one tick now, or join the tick already in flight */
  trigger(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug({ task: this.name }, 'Previous tick still running, skipping');
      return this.inFlight;
    }
    const current = this.execute().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = current;
    return current;
  }

  /** Stop the timer and wait for the in-flight tick to complete */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  private async execute(): Promise<void> {
    try {
      await this.run();
    } catch (err) {
      if (err instanceof TransientChannelError) {
        this.logger.warn({ task: this.name, err: err.message }, 'Channel unavailable, retrying next tick');
      } else {
        this.logger.error({ task: this.name, err: errorMessage(err) }, 'Tick failed');
      }
    }
  }
}

/**
 * FIFO handed to a single handler one item at a time, so an entity never
 * processes two inbound messages concurrently.
 */
export class SerialInbox<T> {
  private queue: T[] = [];
  private draining: Promise<void> | null = null;

  constructor(
    private readonly handle: (item: T) => void | Promise<void>,
    private readonly onError: (err: unknown, item: T) => void,
  ) {}

  get size(): number {
    return this.queue.length;
  }

  push(item: T): void {
    this.queue.push(item);
    this.schedule();
  }

  /** Resolves once every queued item has been handled */
  async drain(): Promise<void> {
    while (this.draining) await this.draining;
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = this.process().finally(() => {
      this.draining = null;
      if (this.queue.length > 0) this.schedule();
    });
  }

  private async process(): Promise<void> {
    // Never run the handler inside push()
    await Promise.resolve();
    let item = this.queue.shift();
    while (item !== undefined) {
      try {
        await this.handle(item);
      } catch (err) {
        this.onError(err, item);
      }
      item = this.queue.shift();
    }
  }
}
