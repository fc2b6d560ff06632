import { encodeAlert, encodeReading, topics } from '@factory-sim/shared';
import type { Logger, Reading, SensorProfile, SensorState } from '@factory-sim/shared';
import type { Rng } from './rng.js';
import { PeriodicTask } from './scheduler.js';
import { createSensorState, tickSensor } from './signal-generator.js';
import type { TelemetryChannel } from './telemetry-channel.js';

/**
 * A simulated field device: owns its SensorState and publishes one reading
 * (and each alert it carries) every `updatePeriodMs`.
 */
export class SensorDevice {
  private state: SensorState;
  private readonly task: PeriodicTask;
  private readonly logger: Logger;

  constructor(
    readonly profile: SensorProfile,
    private readonly channel: TelemetryChannel,
    private readonly rng: Rng,
    logger: Logger,
    private readonly clock: () => number = Date.now,
  ) {
    this.logger = logger.child({ sensorId: profile.sensorId });
    this.state = createSensorState(profile, clock(), rng);
    this.task = new PeriodicTask(`sensor:${profile.sensorId}`, profile.updatePeriodMs, () => {
      this.tick();
    }, this.logger);
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  /** Generate and publish one reading. State only advances once the publish is accepted. */
  tick(now: number = this.clock()): Reading {
    const { reading, state } = tickSensor(this.state, this.profile, now, this.rng);
    const { controllerId, sensorId } = this.profile;

    this.channel.publish(topics.sensorReading(controllerId, sensorId), encodeReading(reading));
    for (const alert of reading.alerts) {
      this.channel.publish(topics.sensorAlert(controllerId, sensorId), encodeAlert(alert));
      this.logger.warn({ kind: alert.kind, severity: alert.severity, value: reading.value }, alert.message);
    }

    this.state = state;
    this.logger.debug({ value: reading.value, unit: reading.unit }, 'Reading published');
    return reading;
  }

  get currentState(): Readonly<SensorState> {
    return { ...this.state };
  }
}
