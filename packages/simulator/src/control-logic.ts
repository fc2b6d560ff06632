import type { ControllerRole } from '@factory-sim/shared';
import { chance, type Rng } from './rng.js';

export interface ControlEvent {
  event: string;
  detail: Record<string, string>;
}

/**
 * Per-role process model run on every controller tick. It reads setpoints
 * from `params` and updates `metrics`; both belong to the calling controller.
 */
export interface ControlLogic {
  initialMetrics(): Record<string, number>;
  step(params: Record<string, number>, metrics: Record<string, number>, dtS: number, rng: Rng): ControlEvent[];
}

/** Metres of belt between two delivered items */
const ITEM_SPACING_M = 1;

function param(params: Record<string, number>, key: string, fallback: number): number {
  return params[key] ?? fallback;
}

function blocked(params: Record<string, number>): boolean {
  return param(params, 'upstreamBlocked', 0) === 1;
}

const paperFeed: ControlLogic = {
  initialMetrics: () => ({ sheetsFed: 0, jammed: 0, jamCount: 0 }),
  step(params, metrics, dtS, rng) {
    if (metrics.jammed === 1) {
      if (!chance(rng, param(params, 'jamClearProbability', 0.2))) return [];
      metrics.jammed = 0;
      return [{ event: 'jam_cleared', detail: {} }];
    }

    const rate = param(params, 'feedRate', 60) * param(params, 'speedFactor', 1);
    metrics.sheetsFed = Math.round((metrics.sheetsFed + (rate * dtS) / 60) * 100) / 100;

    if (!chance(rng, param(params, 'jamProbability', 0.01))) return [];
    metrics.jammed = 1;
    metrics.jamCount += 1;
    return [{ event: 'jam_detected', detail: { sheetsFed: String(Math.floor(metrics.sheetsFed)) } }];
  },
};

const print: ControlLogic = {
  initialMetrics: () => ({ pagesPrinted: 0, inkLowSignalled: 0 }),
  step(params, metrics, dtS) {
    const inkLowLevel = param(params, 'inkLowLevel', 10);
    const ink = param(params, 'inkLevel', 100);
    // a refill Command re-arms the low-ink event
    if (ink >= inkLowLevel) metrics.inkLowSignalled = 0;
    if (blocked(params) || ink <= 0) return [];

    const pages = (param(params, 'printSpeed', 40) * param(params, 'speedFactor', 1) * dtS) / 60;
    metrics.pagesPrinted = Math.round((metrics.pagesPrinted + pages) * 100) / 100;
    const remaining = Math.max(0, Math.round((ink - pages * param(params, 'inkPerPage', 0.05)) * 1000) / 1000);
    params.inkLevel = remaining;

    if (remaining >= inkLowLevel || metrics.inkLowSignalled === 1) return [];
    metrics.inkLowSignalled = 1;
    return [{ event: 'ink_low', detail: { inkLevel: String(remaining) } }];
  },
};

/** Sorting statistics arrive from the sorting cell, nothing to simulate here */
const sorting: ControlLogic = {
  initialMetrics: () => ({}),
  step: () => [],
};

const transport: ControlLogic = {
  initialMetrics: () => ({ beltDistance: 0, itemsDelivered: 0 }),
  step(params, metrics, dtS) {
    if (blocked(params)) return [];
    const speed = param(params, 'beltSpeed', 0.5) * param(params, 'speedFactor', 1);
    metrics.beltDistance = Math.round((metrics.beltDistance + speed * dtS) * 1000) / 1000;
    metrics.itemsDelivered = Math.floor(metrics.beltDistance / ITEM_SPACING_M);
    return [];
  },
};

const LOGIC: Record<ControllerRole, ControlLogic> = {
  paper_feed: paperFeed,
  print,
  sorting,
  transport,
};

export function controlLogicFor(role: ControllerRole): ControlLogic {
  return LOGIC[role];
}
