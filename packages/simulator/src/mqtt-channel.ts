import type { MqttClient } from 'mqtt';
import { TransientChannelError, errorMessage, matchTopic } from '@factory-sim/shared';
import type { Logger } from '@factory-sim/shared';
import type { MessageHandler, TelemetryChannel, Unsubscribe } from './telemetry-channel.js';

interface Subscription {
  pattern: string;
  handler: MessageHandler;
}

/** TelemetryChannel over an MQTT client, QoS 0 */
export class MqttTelemetryChannel implements TelemetryChannel {
  private subscriptions: Subscription[] = [];

  constructor(private readonly client: MqttClient, private readonly logger: Logger) {
    client.on('message', (topic, payload) => this.dispatch(topic, payload.toString()));
  }

  publish(topic: string, payload: string): void {
    if (!this.client.connected) {
      throw new TransientChannelError(`MQTT client not connected, dropped publish to ${topic}`);
    }
    this.client.publish(topic, payload, { qos: 0 }, (err) => {
      if (err) this.logger.warn({ topic, err: err.message }, 'Publish failed');
    });
  }

  subscribe(pattern: string, handler: MessageHandler): Unsubscribe {
    const sub: Subscription = { pattern, handler };
    const firstForPattern = !this.subscriptions.some((s) => s.pattern === pattern);
    this.subscriptions.push(sub);

    if (firstForPattern) {
      this.client.subscribe(pattern, { qos: 0 }, (err) => {
        if (err) this.logger.error({ pattern, err: err.message }, 'Subscribe failed');
      });
    }

    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== sub);
      if (!this.subscriptions.some((s) => s.pattern === pattern)) {
        this.client.unsubscribe(pattern);
      }
    };
  }

  private dispatch(topic: string, payload: string): void {
    for (const sub of this.subscriptions) {
      if (!matchTopic(sub.pattern, topic)) continue;
      try {
        sub.handler(topic, payload);
      } catch (err) {
        this.logger.error({ topic, err: errorMessage(err) }, 'Subscriber failed');
      }
    }
  }
}
