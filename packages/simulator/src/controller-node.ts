import {
  DecodeError,
  TransientChannelError,
  decodeAlert,
  decodePeerMessage,
  decodeReading,
  decodeSortingStats,
  errorMessage,
  matchTopic,
  patterns,
  topics,
} from '@factory-sim/shared';
import type { ControllerConfig, Logger } from '@factory-sim/shared';
import { ControllerAggregator } from './controller-aggregator.js';
import type { Rng } from './rng.js';
import { PeriodicTask, SerialInbox } from './scheduler.js';
import type { TelemetryChannel, Unsubscribe } from './telemetry-channel.js';

interface Inbound {
  topic: string;
  payload: string;
}

/**
 * Runtime wrapper around a ControllerAggregator: wires it to the channel,
 * decodes inbound payloads one at a time and drives its tick.
 */
export class ControllerNode {
  readonly aggregator: ControllerAggregator;
  private readonly inbox: SerialInbox<Inbound>;
  private readonly task: PeriodicTask;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private subscriptions: Unsubscribe[] = [];

  constructor(
    config: ControllerConfig,
    private readonly channel: TelemetryChannel,
    rng: Rng,
    logger: Logger,
    tickResolutionMs: number,
    clock: () => number = Date.now,
  ) {
    this.logger = logger.child({ controllerId: config.controllerId });
    this.clock = clock;
    this.aggregator = new ControllerAggregator(config, { channel, logger, rng, clock });
    this.inbox = new SerialInbox((msg) => this.handle(msg), (err, msg) => this.onHandlerError(err, msg));
    this.task = new PeriodicTask(`controller:${config.controllerId}`, tickResolutionMs, () => {
      this.aggregator.tick(this.clock());
    }, this.logger);
  }

  get controllerId(): string {
    return this.aggregator.controllerId;
  }

  start(): void {
    const id = this.controllerId;
    const enqueue = (topic: string, payload: string) => this.inbox.push({ topic, payload });
    this.subscriptions = [
      this.channel.subscribe(patterns.childReadings(id), enqueue),
      this.channel.subscribe(patterns.childAlerts(id), enqueue),
      this.channel.subscribe(patterns.peerInbox(id), enqueue),
      this.channel.subscribe(topics.sortingStats(id), enqueue),
    ];
    this.task.start();
    this.logger.info({ role: this.aggregator.config.role, downstream: this.aggregator.config.downstream }, 'Controller started');
  }

  /** Stop ticking, drop subscriptions and finish what is already queued */
  async stop(): Promise<void> {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    await this.task.stop();
    await this.inbox.drain();
    this.logger.info('Controller stopped');
  }

  private handle({ topic, payload }: Inbound): void {
    const id = this.controllerId;
    if (matchTopic(patterns.childReadings(id), topic)) {
      this.aggregator.onChildReading(decodeReading(payload));
    } else if (matchTopic(patterns.childAlerts(id), topic)) {
      this.aggregator.onChildAlert(decodeAlert(payload));
    } else if (matchTopic(patterns.peerInbox(id), topic)) {
      this.aggregator.onPeerMessage(decodePeerMessage(payload));
    } else if (topic === topics.sortingStats(id)) {
      const stats = decodeSortingStats(payload);
      this.aggregator.onProcessReport({
        ...stats.counts,
        unknown: stats.unknown,
        totalProcessed: stats.totalProcessed,
        efficiency: stats.efficiency,
        throughputPerHour: stats.throughputPerHour,
      });
    }
  }

  private onHandlerError(err: unknown, { topic }: Inbound): void {
    if (err instanceof DecodeError) {
      this.logger.warn({ topic, err: err.message }, 'Dropping undecodable message');
    } else if (err instanceof TransientChannelError) {
      this.logger.warn({ topic, err: err.message }, 'Channel unavailable, reply dropped');
    } else {
      this.logger.error({ topic, err: errorMessage(err) }, 'Inbound message failed');
    }
  }
}
