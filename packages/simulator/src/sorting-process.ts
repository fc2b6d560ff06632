import {
  BLOCK_COLORS,
  KNOWN_COLORS,
  SIZE_CLASSES,
  SimulationInvariantViolation,
  encodeActuation,
  encodeCameraRecord,
  encodeSortingStats,
  encodeSortingSummary,
  errorMessage,
  topics,
} from '@factory-sim/shared';
import type {
  ActuationCommand,
  Block,
  BlockColor,
  CameraRecord,
  Logger,
  SortingConfig,
  SortingPhase,
  SortingStats,
  SortingSummary,
} from '@factory-sim/shared';
import { pickWeighted, uniform, type Rng } from './rng.js';
import type { TelemetryChannel } from './telemetry-channel.js';

/** Bin angle (degrees) the sorting arm turns to per color */
export const BIN_POSITIONS: Record<BlockColor, number> = {
  red: 0,
  blue: 90,
  green: 180,
  yellow: 270,
  unknown: 0,
};

const round = (value: number, places: number) => Math.round(value * 10 ** places) / 10 ** places;

export function createBlock(blockId: number, now: number, rng: Rng, weights: Record<BlockColor, number>): Block {
  const color = pickWeighted(rng, weights, BLOCK_COLORS);
  const confidence = color === 'unknown' ? uniform(rng, 0.3, 0.6) : uniform(rng, 0.85, 0.99);
  const sizeClass = SIZE_CLASSES[Math.min(SIZE_CLASSES.length - 1, Math.floor(rng.next() * SIZE_CLASSES.length))];
  return { blockId, color, confidence: round(confidence, 3), sizeClass, createdAt: now };
}

function emptyStats(startedAt: number): SortingStats {
  return {
    counts: { red: 0, blue: 0, green: 0, yellow: 0 },
    unknown: 0,
    totalProcessed: 0,
    efficiency: 1,
    throughputPerHour: 0,
    startedAt,
  };
}

export type BlockSource = (blockId: number, now: number) => Block;

export interface SortingDeps {
  channel: TelemetryChannel;
  logger: Logger;
  rng: Rng;
  clock?: () => number;
  /** Replaces random block generation */
  blockSource?: BlockSource;
}

/**
 * Color-sorting cell: generate a block, detect it with the camera, actuate the
 * sorting arm and report statistics, one block per cycle with a random pause
 * in between.
 */
export class SortingProcess {
  private phase: SortingPhase = 'idle';
  private stats: SortingStats;
  private nextBlockId = 1;
  /** totalProcessed at the last published summary */
  private lastSummaryTotal = 0;
  private loop: Promise<void> | null = null;
  private stopping = false;
  private cancelWait: (() => void) | null = null;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    readonly config: SortingConfig,
    private readonly supervisorId: string,
    private readonly deps: SortingDeps,
  ) {
    this.logger = deps.logger.child({ component: 'sorting', controllerId: config.controllerId });
    this.clock = deps.clock ?? Date.now;
    this.stats = emptyStats(this.clock());
  }

  getPhase(): SortingPhase {
    return this.phase;
  }

  getStats(): SortingStats {
    return { ...this.stats, counts: { ...this.stats.counts } };
  }

  start(): void {
    if (this.loop) return;
    this.stopping = false;
    this.phase = 'idle';
    this.logger.info({ minDelayMs: this.config.minDelayMs, maxDelayMs: this.config.maxDelayMs }, 'Sorting process started');
    this.loop = this.run();
  }

  /** Waits for the current cycle, then leaves the process in `stopped` */
  async stop(): Promise<void> {
    this.stopping = true;
    this.cancelWait?.();
    if (this.loop) await this.loop;
    this.loop = null;
    this.phase = 'stopped';
    this.logger.info({ totalProcessed: this.stats.totalProcessed }, 'Sorting process stopped');
  }

  /** Stop, reset statistics and start again */
  async restart(): Promise<void> {
    await this.stop();
    this.stats = emptyStats(this.clock());
    this.nextBlockId = 1;
    this.lastSummaryTotal = 0;
    this.start();
  }

  /** Process exactly one block through every stage */
  runCycle(now: number): Block {
    try {
      this.phase = 'generating';
      const blockId = this.nextBlockId++;
      const block = this.deps.blockSource
        ? this.deps.blockSource(blockId, now)
        : createBlock(blockId, now, this.deps.rng, this.config.colorWeights);

      this.phase = 'detecting';
      this.publishCamera(block, now);

      this.phase = 'sorting';
      this.publishActuation(block, now);
      this.recordBlock(block.color, now);

      this.phase = 'reporting';
      this.publishStats();
      // a summary missed by a failed publish goes out with the next block
      if (this.stats.totalProcessed - this.lastSummaryTotal >= this.config.summaryEvery) this.publishSummary(now);

      this.logger.debug({ blockId, color: block.color, confidence: block.confidence }, 'Block sorted');
      return block;
    } finally {
      this.phase = 'idle';
    }
  }

  summary(now: number): SortingSummary {
    const { counts, unknown, totalProcessed } = this.stats;
    const pct = (n: number) => (totalProcessed === 0 ? 0 : round((n / totalProcessed) * 100, 1));
    return {
      total: totalProcessed,
      percentages: {
        red: pct(counts.red),
        blue: pct(counts.blue),
        green: pct(counts.green),
        yellow: pct(counts.yellow),
        unknown: pct(unknown),
      },
      efficiency: this.stats.efficiency,
      throughputPerHour: this.stats.throughputPerHour,
      timestamp: new Date(now).toISOString(),
    };
  }

  private async run(): Promise<void> {
    let delay = this.drawDelay();
    while (!this.stopping) {
      await this.wait(delay);
      if (this.stopping) break;
      try {
        this.runCycle(this.clock());
        delay = this.drawDelay();
      } catch (err) {
        this.logger.error({ err: errorMessage(err) }, 'Sorting cycle failed');
        delay = this.config.errorBackoffMs;
      }
    }
  }

  private drawDelay(): number {
    return uniform(this.deps.rng, this.config.minDelayMs, this.config.maxDelayMs);
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelWait = null;
        resolve();
      }, ms);
      this.cancelWait = () => {
        clearTimeout(timer);
        this.cancelWait = null;
        resolve();
      };
    });
  }

  private publishCamera(block: Block, now: number): void {
    const record: CameraRecord = {
      blockId: block.blockId,
      color: block.color,
      confidence: block.confidence,
      imageQuality: round(uniform(this.deps.rng, 0.75, 0.98), 3),
      sizeClass: block.sizeClass,
      timestamp: new Date(now).toISOString(),
    };
    this.deps.channel.publish(topics.camera(this.config.controllerId), encodeCameraRecord(record));
  }

  private publishActuation(block: Block, now: number): void {
    const command: ActuationCommand = {
      blockId: block.blockId,
      color: block.color,
      position: BIN_POSITIONS[block.color],
      timestamp: new Date(now).toISOString(),
    };
    this.deps.channel.publish(topics.actuator(this.config.controllerId), encodeActuation(command));
  }

  private recordBlock(color: BlockColor, now: number): void {
    const stats = this.stats;
    if (color === 'unknown') stats.unknown++;
    else stats.counts[color]++;
    stats.totalProcessed++;

    const sorted = KNOWN_COLORS.reduce((sum, c) => sum + stats.counts[c], 0);
    if (sorted + stats.unknown !== stats.totalProcessed) {
      throw new SimulationInvariantViolation(
        `sorting counts ${sorted} + ${stats.unknown} do not add up to ${stats.totalProcessed}`,
      );
    }

    stats.efficiency = round(sorted / stats.totalProcessed, 3);
    const elapsedS = (now - stats.startedAt) / 1000;
    stats.throughputPerHour = elapsedS > 0 ? round((stats.totalProcessed * 3600) / elapsedS, 2) : 0;
  }

  private publishStats(): void {
    this.deps.channel.publish(topics.sortingStats(this.config.controllerId), encodeSortingStats(this.stats));
  }

  private publishSummary(now: number): void {
    const summary = this.summary(now);
    this.deps.channel.publish(topics.sortingSummary(this.supervisorId), encodeSortingSummary(summary));
    this.lastSummaryTotal = summary.total;
    this.logger.info({ total: summary.total, efficiency: summary.efficiency }, 'Sorting summary');
  }
}
