import { getChildSensors } from '@factory-sim/shared';
import type { FactoryTopology, Logger } from '@factory-sim/shared';
import { ControllerNode } from './controller-node.js';
import { createSeededRng, deriveSeed } from './rng.js';
import { SensorDevice } from './sensor-device.js';
import { SortingProcess } from './sorting-process.js';
import type { TelemetryChannel } from './telemetry-channel.js';

export interface SimulatorOptions {
  topology: FactoryTopology;
  seed: number;
  /** How often controllers check whether telemetry or heartbeats are due */
  tickResolutionMs: number;
  clock?: () => number;
}

/**
 * Builds every entity of a factory topology on one channel and runs them.
 * Each entity draws from its own RNG seeded from the run seed and its id.
 */
export class FactorySimulator {
  readonly controllers = new Map<string, ControllerNode>();
  readonly sensors = new Map<string, SensorDevice>();
  readonly sorting: SortingProcess | null;
  private running = false;

  constructor(
    channel: TelemetryChannel,
    private readonly options: SimulatorOptions,
    private readonly logger: Logger,
  ) {
    const { topology, seed, tickResolutionMs } = options;
    const clock = options.clock ?? Date.now;
    const rngFor = (id: string) => createSeededRng(deriveSeed(seed, id));

    for (const config of topology.controllers) {
      const node = new ControllerNode(config, channel, rngFor(config.controllerId), logger, tickResolutionMs, clock);
      this.controllers.set(config.controllerId, node);

      for (const profile of getChildSensors(topology, config.controllerId)) {
        this.sensors.set(profile.sensorId, new SensorDevice(profile, channel, rngFor(profile.sensorId), logger, clock));
      }
    }

    this.sorting = topology.sorting
      ? new SortingProcess(topology.sorting, topology.supervisorId, {
          channel,
          logger,
          rng: rngFor(`sorting:${topology.sorting.controllerId}`),
          clock,
        })
      : null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    const { topology, seed } = this.options;
    this.logger.info(
      { seed, controllers: this.controllers.size, sensors: this.sensors.size, sorting: this.sorting !== null },
      `Starting factory simulation (supervisor ${topology.supervisorId})`,
    );

    // Controllers subscribe before any sensor publishes
    for (const node of this.controllers.values()) node.start();
    for (const sensor of this.sensors.values()) sensor.start();
    this.sorting?.start();
  }

  /** Producers stop first, then controllers finish their queued input */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.logger.info('Stopping factory simulation...');

    await Promise.all([...this.sensors.values()].map((s) => s.stop()));
    if (this.sorting) await this.sorting.stop();
    await Promise.all([...this.controllers.values()].map((c) => c.stop()));

    this.logger.info('Factory simulation stopped');
  }
}
