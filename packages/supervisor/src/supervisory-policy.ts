import { encodePeerMessage, topics } from '@factory-sim/shared';
import type { ControllerTelemetry, Logger, PeerMessage } from '@factory-sim/shared';
import { createCommand } from '@factory-sim/simulator/peer-link';
import type { TelemetryChannel } from '@factory-sim/simulator/telemetry-channel';

export interface PolicyOptions {
  /** Health below this marks a controller degraded */
  degradedHealthThreshold: number;
  /** speedFactor commanded to a degraded controller */
  reducedSpeedFactor: number;
}

/**
 * Slows a controller down while its health is degraded and restores full
 * speed once it recovers. One Command per transition; a transition whose
 * Command could not be published is retried on the next telemetry.
 */
export class SupervisoryPolicy {
  private readonly degraded = new Set<string>();
  private seq = 0;
  private readonly logger: Logger;

  constructor(
    private readonly supervisorId: string,
    private readonly options: PolicyOptions,
    private readonly channel: TelemetryChannel,
    logger: Logger,
    private readonly clock: () => number = Date.now,
  ) {
    this.logger = logger.child({ component: 'policy' });
  }

  isDegraded(controllerId: string): boolean {
    return this.degraded.has(controllerId);
  }

  /** Returns the Command sent for this telemetry, if any */
  onTelemetry(telemetry: ControllerTelemetry): PeerMessage | null {
    const { controllerId } = telemetry;
    const { health } = telemetry.metrics;
    const isDegraded = health < this.options.degradedHealthThreshold;
    if (isDegraded === this.degraded.has(controllerId)) return null;

    const speedFactor = isDegraded ? this.options.reducedSpeedFactor : 1;
    const command = createCommand(this.supervisorId, controllerId, this.seq + 1, { speedFactor }, this.clock());
    this.channel.publish(topics.peer(controllerId, 'command'), encodePeerMessage(command));
    this.seq++;

    if (isDegraded) {
      this.degraded.add(controllerId);
      this.logger.warn({ controllerId, health, speedFactor }, 'Controller degraded, reducing speed');
    } else {
      this.degraded.delete(controllerId);
      this.logger.info({ controllerId, health, speedFactor }, 'Controller recovered, restoring speed');
    }
    return command;
  }
}
