import { describe, it, expect } from 'vitest';
import {
  encodeAlert,
  encodePeerMessage,
  encodeReading,
  encodeSortingStats,
  encodeSortingSummary,
  encodeTelemetry,
} from '@factory-sim/shared';
import type { Alert, ControllerTelemetry } from '@factory-sim/shared';
import { createMockLogger } from '../../../../tests/helpers/factories.js';
import { processMessage } from '../mqtt-handler.js';
import { ALERT_HISTORY_SIZE, SupervisoryState } from '../supervisory-state.js';

const TS = '2025-06-01T08:00:00.000Z';

function telemetry(controllerId: string, health: number): ControllerTelemetry {
  return {
    controllerId,
    role: 'transport',
    timestamp: TS,
    metrics: { avgTemperature: 30, maxPressure: null, vibrationAlarm: false, activeAlerts: 0, health },
    connection: 'connected',
    peerCounters: { helloSent: 1, helloReceived: 0, acksReceived: 1, commandsProcessed: 0, processEventsReceived: 0 },
    knownSensors: 1,
    processParameters: { speedFactor: 1 },
    processMetrics: { beltDistance: 2.5 },
  };
}

function alert(n: number, severity: Alert['severity'] = 'warning'): Alert {
  return { kind: 'range_warning', message: `alert ${n}`, severity, sensorId: 't-1', timestamp: TS };
}

describe('processMessage', () => {
  it('records sensor readings', () => {
    const state = new SupervisoryState();
    const payload = encodeReading({ sensorId: 't-1', kind: 'temperature', value: 31.5, unit: '°C', timestamp: TS, derived: {}, alerts: [] });

    const event = processMessage('factory/plc-feed/sensor/t-1/attrs', Buffer.from(payload), state, createMockLogger());

    expect(event).toMatchObject({ type: 'reading', controllerId: 'plc-feed' });
    expect(state.readings.get('t-1')?.value).toBe(31.5);
  });

  it('records alerts', () => {
    const state = new SupervisoryState();
    const event = processMessage('factory/plc-feed/sensor/t-1/alert', encodeAlert(alert(1, 'critical')), state, createMockLogger());

    expect(event?.type).toBe('alert');
    expect(state.alerts).toEqual([alert(1, 'critical')]);
  });

  it('records controller telemetry', () => {
    const state = new SupervisoryState();
    const event = processMessage('factory/plc-b/attrs', encodeTelemetry(telemetry('plc-b', 90)), state, createMockLogger());

    expect(event).toEqual({ type: 'controller_telemetry', data: telemetry('plc-b', 90) });
    expect(state.controllers.get('plc-b')?.metrics.health).toBe(90);
  });

  it('passes peer messages through without touching the state', () => {
    const state = new SupervisoryState();
    const payload = encodePeerMessage({
      source: 'plc-b',
      destination: 'supervisor',
      kind: 'response',
      seq: 4,
      payload: { status: 'ok', applied: 'speedFactor', echo: 'speedFactor=0.8' },
      timestamp: TS,
    });

    const event = processMessage('factory/supervisor/peer/response', payload, state, createMockLogger());

    expect(event?.type).toBe('peer_message');
    expect(state.controllers.size).toBe(0);
  });

  it('records sorting statistics and summaries', () => {
    const state = new SupervisoryState();
    const logger = createMockLogger();
    processMessage(
      'factory/plc-sort/sorting/stats',
      encodeSortingStats({
        counts: { red: 3, blue: 3, green: 2, yellow: 1 },
        unknown: 1,
        totalProcessed: 10,
        efficiency: 0.9,
        throughputPerHour: 3600,
        startedAt: Date.parse(TS),
      }),
      state,
      logger,
    );
    processMessage(
      'factory/supervisor/sorting/summary',
      encodeSortingSummary({
        total: 10,
        percentages: { red: 30, blue: 30, green: 20, yellow: 10, unknown: 10 },
        efficiency: 0.9,
        throughputPerHour: 3600,
        timestamp: TS,
      }),
      state,
      logger,
    );

    expect(state.sortingStats.get('plc-sort')?.totalProcessed).toBe(10);
    expect(state.lastSummary?.percentages.red).toBe(30);
  });

  it('ignores topics outside the factory layout', () => {
    const state = new SupervisoryState();
    const logger = createMockLogger();

    expect(processMessage('other/plc-b/attrs', 'a|b', state, logger)).toBeNull();
    expect(processMessage('factory/plc-b', 'a|b', state, logger)).toBeNull();
    expect(processMessage('factory/plc-b/unknown/path', 'a|b', state, logger)).toBeNull();
    expect(logger.messages('warn')).toEqual([]);
  });

  it('drops undecodable payloads with a warning', () => {
    const state = new SupervisoryState();
    const logger = createMockLogger();

    expect(processMessage('factory/plc-b/attrs', 'controllerId|plc-b|role', state, logger)).toBeNull();
    expect(logger.messages('warn')).toEqual(['Dropping undecodable message']);
    expect(state.controllers.size).toBe(0);
  });
});

describe('SupervisoryState', () => {
  it('keeps a bounded alert history but counts every alert', () => {
    const state = new SupervisoryState();
    for (let i = 1; i <= ALERT_HISTORY_SIZE + 5; i++) state.handleAlert(alert(i));

    expect(state.alerts).toHaveLength(ALERT_HISTORY_SIZE);
    expect(state.alerts[0].message).toBe('alert 6');
    expect(state.alertsRecorded).toBe(105);
  });

  it('summarizes the factory', () => {
    const state = new SupervisoryState();
    state.handleTelemetry(telemetry('plc-b', 80));
    state.handleTelemetry(telemetry('plc-a', 100));
    state.handleAlert(alert(1, 'critical'));
    state.handleAlert(alert(2));
    state.handleReading({ sensorId: 't-1', kind: 'temperature', value: 30, unit: '°C', timestamp: TS, derived: {}, alerts: [] });

    expect(state.overview()).toEqual({
      controllers: [
        { controllerId: 'plc-a', role: 'transport', health: 100, connection: 'connected', activeAlerts: 0, lastSeen: TS },
        { controllerId: 'plc-b', role: 'transport', health: 80, connection: 'connected', activeAlerts: 0, lastSeen: TS },
      ],
      sensorsReporting: 1,
      alertsRecorded: 2,
      criticalAlerts: 1,
      sortedBlocks: 0,
      sortingEfficiency: null,
    });
  });
});
