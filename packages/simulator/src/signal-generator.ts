import { resolveTuning } from '@factory-sim/shared';
import type { QuantityKind, Reading, ReadingDerived, SensorProfile, SensorState, SignalTuning } from '@factory-sim/shared';
import { evaluateAlerts } from './alert-evaluator.js';
import { chance, gaussian, poisson, uniform, type Rng } from './rng.js';

const DAY_S = 86_400;
const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;
const TWO_PI = 2 * Math.PI;

/** Ambient (daily) coupling per kind, as a fraction of the range */
const ENVIRONMENT_COUPLING: Record<QuantityKind, number> = {
  temperature: 0,
  pressure: 0.01,
  vibration: 0.005,
  flow: 0.01,
  vision_defect_count: 0,
};

function round(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Operating point each kind oscillates around */
function nominalValue(profile: SensorProfile, tuning: SignalTuning): number {
  const [min, max] = profile.range;
  const range = max - min;
  switch (profile.kind) {
    case 'temperature': return min + range / 2;
    case 'pressure': return min + 0.6 * range;
    case 'vibration': return tuning.vibrationBaseline;
    case 'flow': return min + 0.5 * range;
    case 'vision_defect_count': return 0;
  }
}

export function createSensorState(profile: SensorProfile, now: number, rng: Rng, lastCalibrationAt?: number): SensorState {
  const calibratedAt = lastCalibrationAt
    ?? (profile.lastCalibratedAt !== undefined ? Date.parse(profile.lastCalibratedAt) : now);
  return {
    baseValue: nominalValue(profile, resolveTuning(profile)),
    driftAccumulator: 0,
    operatingHours: 0,
    lastCalibrationAt: calibratedAt,
    previousValue: null,
    lastTickAt: null,
    wearFactor: uniform(rng, 0.8, 1.2),
  };
}

function basePattern(kind: Exclude<QuantityKind, 'vision_defect_count'>, state: SensorState, tuning: SignalTuning, range: number, t: number, rng: Rng): number {
  switch (kind) {
    case 'temperature':
      return state.baseValue
        + 0.1 * range * Math.sin(TWO_PI * t / DAY_S)
        + 0.2 * range * Math.sin(TWO_PI * t / tuning.processPeriodS);
    case 'pressure': {
      const value = state.baseValue + 0.05 * range * Math.sin(TWO_PI * t / tuning.pumpCycleS);
      return chance(rng, tuning.pressureDropProbability) ? value * (1 - tuning.pressureDropFraction) : value;
    }
    case 'vibration': {
      const baseline = state.baseValue;
      const value = baseline * state.wearFactor + 0.3 * baseline * Math.sin(TWO_PI * t / tuning.rotationPeriodS);
      return chance(rng, tuning.spikeProbability) ? value * uniform(rng, tuning.spikeMin, tuning.spikeMax) : value;
    }
    case 'flow':
      return state.baseValue + 0.05 * range * Math.sin(TWO_PI * t / tuning.pumpCycleS);
  }
}

function calibrationError(profile: SensorProfile, state: SensorState, tuning: SignalTuning, now: number): number {
  const overdueMs = now - state.lastCalibrationAt - tuning.calibrationIntervalDays * MS_PER_DAY;
  if (overdueMs <= 0) return 0;
  return profile.accuracy * (1 + overdueMs / MS_PER_DAY / 30);
}

export interface TickResult {
  reading: Reading;
  state: SensorState;
}

/**
 * Produce one reading. Deterministic for a given rng sequence and `now`
 * sequence; the input state is never mutated.
 */
export function tickSensor(state: SensorState, profile: SensorProfile, now: number, rng: Rng): TickResult {
  const tuning = resolveTuning(profile);
  const [min, max] = profile.range;
  const range = max - min;
  const t = now / 1000;
  const elapsedHours = state.lastTickAt === null ? 0 : Math.max(0, now - state.lastTickAt) / MS_PER_HOUR;
  const driftAccumulator = state.driftAccumulator + tuning.driftPerHour * range * elapsedHours;

  let value: number;
  const derived: ReadingDerived = {};

  if (profile.kind === 'vision_defect_count') {
    const rate = tuning.baseDefectRate * (1 + 0.5 * Math.sin(TWO_PI * t / tuning.qualityCycleS));
    value = poisson(rng, tuning.inspectedPerTick * rate);
    derived.confidence = round(uniform(rng, 0.85, 0.99), 3);
    derived.imageQuality = round(uniform(rng, 0.7, 1.0), 3);
  } else {
    value = basePattern(profile.kind, state, tuning, range, t, rng)
      + driftAccumulator
      + gaussian(rng, profile.accuracy)
      + ENVIRONMENT_COUPLING[profile.kind] * range * Math.sin(TWO_PI * t / DAY_S)
      + calibrationError(profile, state, tuning, now);
    value = round(value, 2);
  }
  value = clamp(value, min, max);

  const draft: Reading = {
    sensorId: profile.sensorId,
    kind: profile.kind,
    value,
    unit: profile.unit,
    timestamp: new Date(now).toISOString(),
    derived,
    alerts: [],
  };
  const reading: Reading = { ...draft, alerts: evaluateAlerts(draft, profile, state) };

  return {
    reading,
    state: {
      ...state,
      driftAccumulator,
      operatingHours: state.operatingHours + elapsedHours,
      previousValue: value,
      lastTickAt: now,
    },
  };
}
