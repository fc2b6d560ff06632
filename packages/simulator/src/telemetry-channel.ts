import { matchTopic, errorMessage } from '@factory-sim/shared';
import type { Logger } from '@factory-sim/shared';

export type MessageHandler = (topic: string, payload: string) => void;
export type Unsubscribe = () => void;

/**
 * Publish/subscribe bus consumed by every entity. Publish is fire-and-forget
 * (at-most-once); ordering holds only per publisher and topic.
 */
export interface TelemetryChannel {
  publish(topic: string, payload: string): void;
  subscribe(pattern: string, handler: MessageHandler): Unsubscribe;
}

interface Subscription {
  pattern: string;
  handler: MessageHandler;
}

/**
 * In-process channel. Deliveries run as microtasks in publish order, so a
 * publisher never re-enters a subscriber's handler.
 */
export class InMemoryTelemetryChannel implements TelemetryChannel {
  private subscriptions: Subscription[] = [];
  private pending = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly logger: Logger) {}

  publish(topic: string, payload: string): void {
    for (const sub of this.subscriptions) {
      if (!matchTopic(sub.pattern, topic)) continue;
      this.pending++;
      queueMicrotask(() => {
        try {
          if (this.subscriptions.includes(sub)) sub.handler(topic, payload);
        } catch (err) {
          this.logger.error({ topic, err: errorMessage(err) }, 'Subscriber failed');
        } finally {
          this.settle();
        }
      });
    }
  }

  subscribe(pattern: string, handler: MessageHandler): Unsubscribe {
    const sub: Subscription = { pattern, handler };
    this.subscriptions.push(sub);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== sub);
    };
  }

  /** Resolves once every queued delivery, including cascades, has run */
  async flush(): Promise<void> {
    while (this.pending > 0) {
      await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
    }
  }

  private settle(): void {
    this.pending--;
    if (this.pending > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
