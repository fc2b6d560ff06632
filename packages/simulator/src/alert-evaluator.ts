import { resolveTuning } from '@factory-sim/shared';
import type { Alert, AlertKind, AlertSeverity, Reading, SensorProfile, SensorState } from '@factory-sim/shared';

const MS_PER_DAY = 86_400_000;
/** Band at each end of the range, as a fraction of the range, that raises a warning */
const RANGE_WARNING_BAND = 0.05;
/** A vibration reading this many times the nominal baseline is a mechanical anomaly */
const ANOMALY_FACTOR = 3;

function alert(reading: Reading, kind: AlertKind, severity: AlertSeverity, message: string): Alert {
  return { kind, severity, message, sensorId: reading.sensorId, timestamp: reading.timestamp };
}

/**
 * Evaluate every alert rule against a fresh reading. `state` is the sensor
 * state the reading was generated from (previous value, last tick). Pure.
 */
export function evaluateAlerts(reading: Reading, profile: SensorProfile, state: Readonly<SensorState>): Alert[] {
  const tuning = resolveTuning(profile);
  const [min, max] = profile.range;
  const band = (max - min) * RANGE_WARNING_BAND;
  const value = reading.value;
  const now = Date.parse(reading.timestamp);
  const alerts: Alert[] = [];

  if (value <= min) {
    alerts.push(alert(reading, 'range_critical', 'critical', `${value}${reading.unit} at lower limit ${min}${reading.unit}`));
  } else if (value >= max) {
    alerts.push(alert(reading, 'range_critical', 'critical', `${value}${reading.unit} at upper limit ${max}${reading.unit}`));
  }

  if (value <= min + band) {
    alerts.push(alert(reading, 'range_warning', 'warning', `low: ${value}${reading.unit} within 5% of minimum ${min}${reading.unit}`));
  } else if (value >= max - band) {
    alerts.push(alert(reading, 'range_warning', 'warning', `high: ${value}${reading.unit} within 5% of maximum ${max}${reading.unit}`));
  }

  const sinceCalibration = now - state.lastCalibrationAt;
  if (sinceCalibration > tuning.calibrationIntervalDays * MS_PER_DAY) {
    const days = Math.floor(sinceCalibration / MS_PER_DAY);
    alerts.push(alert(reading, 'calibration_due', 'info', `last calibrated ${days} days ago`));
  }

  if (profile.kind === 'vibration' && value > ANOMALY_FACTOR * tuning.vibrationBaseline) {
    alerts.push(
      alert(reading, 'mechanical_anomaly', 'critical', `vibration ${value}${reading.unit} exceeds ${ANOMALY_FACTOR}x baseline ${tuning.vibrationBaseline}${reading.unit}`),
    );
  }

  if (profile.kind === 'temperature' && state.previousValue !== null && state.lastTickAt !== null) {
    const elapsedS = (now - state.lastTickAt) / 1000;
    if (elapsedS > 0) {
      const rate = Math.abs(value - state.previousValue) / elapsedS;
      if (rate > tuning.rapidChangePerSecond) {
        alerts.push(alert(reading, 'rapid_change', 'warning', `temperature changing at ${rate.toFixed(2)}${reading.unit}/s`));
      }
    }
  }

  return alerts;
}
