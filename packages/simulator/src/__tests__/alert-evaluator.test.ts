import { describe, it, expect } from 'vitest';
import type { Reading, SensorProfile, SensorState } from '@factory-sim/shared';
import { evaluateAlerts } from '../alert-evaluator.js';

const DAY_MS = 86_400_000;
const NOW = Date.parse('2025-06-01T00:00:00.000Z');

const temperature: SensorProfile = {
  sensorId: 'print-temp-01',
  kind: 'temperature',
  unit: '°C',
  range: [60, 80],
  accuracy: 0.3,
  updatePeriodMs: 2000,
  controllerId: 'plc-print',
  manufacturer: 'Acme',
  model: 'T-1',
};

function reading(value: number, at = NOW): Reading {
  return {
    sensorId: 'print-temp-01',
    kind: 'temperature',
    value,
    unit: '°C',
    timestamp: new Date(at).toISOString(),
    derived: {},
    alerts: [],
  };
}

function state(overrides: Partial<SensorState> = {}): SensorState {
  return {
    baseValue: 70,
    driftAccumulator: 0,
    operatingHours: 0,
    lastCalibrationAt: NOW - DAY_MS,
    previousValue: null,
    lastTickAt: null,
    wearFactor: 1,
    ...overrides,
  };
}

describe('evaluateAlerts', () => {
  it('returns nothing for a nominal reading', () => {
    expect(evaluateAlerts(reading(70), temperature, state())).toEqual([]);
  });

  it('is pure', () => {
    const s = Object.freeze(state({ previousValue: 70, lastTickAt: NOW - 1000, lastCalibrationAt: NOW - 200 * DAY_MS }));
    const r = reading(79.5);
    const first = evaluateAlerts(r, temperature, s);
    const second = evaluateAlerts(r, temperature, s);

    expect(first).toEqual(second);
    expect(first.map((a) => a.kind)).toEqual(['range_warning', 'calibration_due', 'rapid_change']);
    expect(s).toEqual(state({ previousValue: 70, lastTickAt: NOW - 1000, lastCalibrationAt: NOW - 200 * DAY_MS }));
  });

  it('raises a critical alert and a warning at the range limit', () => {
    const alerts = evaluateAlerts(reading(80), temperature, state());
    expect(alerts).toEqual([
      {
        kind: 'range_critical',
        severity: 'critical',
        message: '80°C at upper limit 80°C',
        sensorId: 'print-temp-01',
        timestamp: '2025-06-01T00:00:00.000Z',
      },
      {
        kind: 'range_warning',
        severity: 'warning',
        message: 'high: 80°C within 5% of maximum 80°C',
        sensorId: 'print-temp-01',
        timestamp: '2025-06-01T00:00:00.000Z',
      },
    ]);
  });

  it('warns inside the low band', () => {
    const alerts = evaluateAlerts(reading(60.5), temperature, state());
    expect(alerts.map((a) => [a.kind, a.message])).toEqual([['range_warning', 'low: 60.5°C within 5% of minimum 60°C']]);
  });

  it('is not due for calibration at exactly the interval', () => {
    expect(evaluateAlerts(reading(70), temperature, state({ lastCalibrationAt: NOW - 180 * DAY_MS }))).toEqual([]);
  });

  it('respects a per-sensor calibration interval', () => {
    const shortInterval = { ...temperature, tuning: { calibrationIntervalDays: 30 } };
    const alerts = evaluateAlerts(reading(70), shortInterval, state({ lastCalibrationAt: NOW - 31 * DAY_MS }));
    expect(alerts.map((a) => [a.kind, a.severity, a.message])).toEqual([
      ['calibration_due', 'info', 'last calibrated 31 days ago'],
    ]);
  });

  it('never flags a rapid change on the first tick', () => {
    expect(evaluateAlerts(reading(75), temperature, state())).toEqual([]);
  });

  it('flags a temperature changing faster than 1 unit per second', () => {
    const alerts = evaluateAlerts(reading(75), temperature, state({ previousValue: 70, lastTickAt: NOW - 1000 }));
    expect(alerts.map((a) => [a.kind, a.message])).toEqual([['rapid_change', 'temperature changing at 5.00°C/s']]);
  });

  it('tolerates a slow change', () => {
    expect(evaluateAlerts(reading(71), temperature, state({ previousValue: 70, lastTickAt: NOW - 2000 }))).toEqual([]);
  });

  it('only checks vibration sensors for mechanical anomalies', () => {
    expect(evaluateAlerts(reading(75), temperature, state()).some((a) => a.kind === 'mechanical_anomaly')).toBe(false);
  });
});
