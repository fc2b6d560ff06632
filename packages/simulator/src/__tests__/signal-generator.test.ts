import { describe, it, expect } from 'vitest';
import { DEFAULT_TOPOLOGY, encodeReading } from '@factory-sim/shared';
import type { SensorProfile } from '@factory-sim/shared';
import { constantRng, scriptedRng } from '../../../../tests/helpers/factories.js';
import { createSeededRng, deriveSeed } from '../rng.js';
import { createSensorState, tickSensor } from '../signal-generator.js';

const DAY_MS = 86_400_000;
const T0 = Date.parse('2025-06-01T00:00:00.000Z');

function profile(overrides: Partial<SensorProfile> = {}): SensorProfile {
  return {
    sensorId: 'test-temp-01',
    kind: 'temperature',
    unit: '°C',
    range: [60, 80],
    accuracy: 0.3,
    updatePeriodMs: 2000,
    controllerId: 'plc-test',
    manufacturer: 'Acme',
    model: 'T-1',
    ...overrides,
  };
}

function run(p: SensorProfile, seed: number, ticks: number, periodMs: number): string[] {
  const rng = createSeededRng(seed);
  let state = createSensorState(p, T0, rng);
  const out: string[] = [];
  for (let i = 0; i < ticks; i++) {
    const result = tickSensor(state, p, T0 + i * periodMs, rng);
    out.push(encodeReading(result.reading));
    state = result.state;
  }
  return out;
}

describe('tickSensor', () => {
  it('keeps every reading inside the sensor range', () => {
    for (const p of DEFAULT_TOPOLOGY.sensors) {
      const rng = createSeededRng(deriveSeed(1, p.sensorId));
      let state = createSensorState(p, T0, rng);
      for (let i = 0; i < 300; i++) {
        const { reading, state: next } = tickSensor(state, p, T0 + i * p.updatePeriodMs, rng);
        expect(reading.value).toBeGreaterThanOrEqual(p.range[0]);
        expect(reading.value).toBeLessThanOrEqual(p.range[1]);
        state = next;
      }
    }
  });

  it('clamps readings when noise exceeds the range', () => {
    const noisy = profile({ kind: 'flow', unit: 'L/min', range: [0, 10], accuracy: 50 });
    const rng = createSeededRng(3);
    let state = createSensorState(noisy, T0, rng);
    const values = new Set<number>();
    for (let i = 0; i < 100; i++) {
      const { reading, state: next } = tickSensor(state, noisy, T0 + i * 1000, rng);
      expect(reading.value).toBeGreaterThanOrEqual(0);
      expect(reading.value).toBeLessThanOrEqual(10);
      values.add(reading.value);
      state = next;
    }
    expect(values.has(0) || values.has(10)).toBe(true);
  });

  it('produces identical readings for identical seeds and timestamps', () => {
    for (const p of DEFAULT_TOPOLOGY.sensors) {
      expect(run(p, 42, 50, p.updatePeriodMs)).toEqual(run(p, 42, 50, p.updatePeriodMs));
    }
  });

  it('produces different readings for different seeds', () => {
    const p = profile();
    expect(run(p, 1, 10, 1000)).not.toEqual(run(p, 2, 10, 1000));
  });

  it('does not mutate the input state', () => {
    const p = profile();
    const rng = createSeededRng(5);
    const state = Object.freeze(createSensorState(p, T0, rng));
    const copy = { ...state };
    tickSensor(state, p, T0 + 1000, rng);
    expect(state).toEqual(copy);
  });

  it('accumulates drift and operating hours between ticks', () => {
    const p = profile();
    const rng = createSeededRng(9);
    const first = tickSensor(createSensorState(p, T0, rng), p, T0, rng);
    const second = tickSensor(first.state, p, T0 + 3_600_000, rng);

    // 0.0005 of the 20 °C range per hour
    expect(second.state.driftAccumulator).toBeCloseTo(0.01, 10);
    expect(second.state.operatingHours).toBeCloseTo(1, 10);
    expect(second.state.previousValue).toBe(second.reading.value);
    expect(second.state.lastTickAt).toBe(T0 + 3_600_000);
  });

  it('applies a transient pressure drop', () => {
    const p = profile({ sensorId: 'test-pres-01', kind: 'pressure', unit: 'bar', range: [0, 10], accuracy: 0.05 });
    // wear, drop roll, gaussian u1, gaussian u2 (zero noise)
    const dropped = scriptedRng([0.5, 0.05, 0, 0.25]);
    const steady = scriptedRng([0.5, 0.5, 0, 0.25]);

    const a = tickSensor(createSensorState(p, 0, dropped), p, 0, dropped);
    const b = tickSensor(createSensorState(p, 0, steady), p, 0, steady);

    expect(a.reading.value).toBe(5.4);
    expect(b.reading.value).toBe(6);
    expect(dropped.remaining()).toBe(0);
  });

  it('raises a mechanical anomaly on a vibration spike', () => {
    const p = profile({ sensorId: 'test-vib-01', kind: 'vibration', unit: 'mm/s', range: [0, 10], accuracy: 0.05 });
    // wear 1.0, spike roll, spike factor 3.5, zero noise
    const rng = scriptedRng([0.5, 0.01, 0.5, 0, 0.25]);
    const { reading } = tickSensor(createSensorState(p, 0, rng), p, 0, rng);

    expect(reading.value).toBe(3.5);
    expect(reading.alerts).toEqual([
      {
        kind: 'mechanical_anomaly',
        severity: 'critical',
        message: 'vibration 3.5mm/s exceeds 3x baseline 1mm/s',
        sensorId: 'test-vib-01',
        timestamp: '1970-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('counts vision defects with confidence and image quality', () => {
    const p = profile({ sensorId: 'test-vis-01', kind: 'vision_defect_count', unit: 'count', range: [0, 50], accuracy: 1 });
    const rng = createSeededRng(11);
    let state = createSensorState(p, T0, rng);
    for (let i = 0; i < 50; i++) {
      const { reading, state: next } = tickSensor(state, p, T0 + i * 3000, rng);
      expect(Number.isInteger(reading.value)).toBe(true);
      expect(reading.derived.confidence).toBeGreaterThanOrEqual(0.85);
      expect(reading.derived.confidence).toBeLessThanOrEqual(0.99);
      expect(reading.derived.imageQuality).toBeGreaterThanOrEqual(0.7);
      expect(reading.derived.imageQuality).toBeLessThanOrEqual(1);
      state = next;
    }
  });

  describe('temperature sensor [60, 80] with a 300 s process period, ticked at t=0', () => {
    const p = profile({ tuning: { processPeriodS: 300 } });

    it('flags calibration when the last one is older than 180 days', () => {
      const rng = createSeededRng(42);
      const state = createSensorState(p, 0, rng, -200 * DAY_MS);
      const { reading } = tickSensor(state, p, 0, rng);

      expect(reading.value).toBeGreaterThanOrEqual(60);
      expect(reading.value).toBeLessThanOrEqual(80);
      expect(reading.alerts.map((a) => a.kind)).toEqual(['calibration_due']);
      expect(reading.alerts[0].message).toBe('last calibrated 200 days ago');
    });

    it('stays quiet when the sensor was calibrated recently', () => {
      const rng = createSeededRng(42);
      const state = createSensorState(p, 0, rng, -10 * DAY_MS);
      const { reading } = tickSensor(state, p, 0, rng);

      expect(reading.value).toBeGreaterThanOrEqual(60);
      expect(reading.value).toBeLessThanOrEqual(80);
      expect(reading.alerts).toEqual([]);
    });
  });
});

describe('createSensorState', () => {
  it('takes the calibration date from the profile', () => {
    const p = profile({ lastCalibratedAt: '2025-01-15T00:00:00.000Z' });
    const state = createSensorState(p, T0, constantRng(0.5));
    expect(state.lastCalibrationAt).toBe(Date.parse('2025-01-15T00:00:00.000Z'));
    expect(state.wearFactor).toBe(1);
    expect(state.baseValue).toBe(70);
    expect(state.previousValue).toBeNull();
  });
});
