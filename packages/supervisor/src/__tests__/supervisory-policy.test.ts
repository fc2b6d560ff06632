import { describe, it, expect } from 'vitest';
import { DEFAULT_THRESHOLDS, TransientChannelError, decodePeerMessage, defaultParametersFor } from '@factory-sim/shared';
import type { ControllerTelemetry } from '@factory-sim/shared';
import { ControllerAggregator } from '@factory-sim/simulator/controller-aggregator';
import { RecordingChannel, constantRng, createMockLogger } from '../../../../tests/helpers/factories.js';
import { SupervisoryPolicy } from '../supervisory-policy.js';

const T0 = Date.parse('2025-06-01T08:00:00.000Z');
const OPTIONS = { degradedHealthThreshold: 60, reducedSpeedFactor: 0.8 };

function telemetry(controllerId: string, health: number): ControllerTelemetry {
  return {
    controllerId,
    role: 'print',
    timestamp: new Date(T0).toISOString(),
    metrics: { avgTemperature: null, maxPressure: null, vibrationAlarm: false, activeAlerts: 0, health },
    connection: 'connected',
    peerCounters: { helloSent: 0, helloReceived: 0, acksReceived: 0, commandsProcessed: 0, processEventsReceived: 0 },
    knownSensors: 0,
    processParameters: {},
    processMetrics: {},
  };
}

function setup() {
  const channel = new RecordingChannel();
  const logger = createMockLogger();
  const policy = new SupervisoryPolicy('supervisor', OPTIONS, channel, logger, () => T0);
  return { channel, logger, policy };
}

describe('SupervisoryPolicy', () => {
  it('slows a degraded controller down once', () => {
    const { channel, logger, policy } = setup();

    const command = policy.onTelemetry(telemetry('plc-print', 55));
    expect(command).toMatchObject({ source: 'supervisor', destination: 'plc-print', kind: 'command', seq: 1 });
    expect(command?.payload).toEqual({ speedFactor: '0.8' });
    expect(channel.published.map((p) => p.topic)).toEqual(['factory/plc-print/peer/command']);
    expect(policy.isDegraded('plc-print')).toBe(true);
    expect(logger.messages('warn')).toEqual(['Controller degraded, reducing speed']);

    expect(policy.onTelemetry(telemetry('plc-print', 50))).toBeNull();
    expect(channel.published).toHaveLength(1);
  });

  it('restores full speed on recovery', () => {
    const { channel, policy } = setup();
    policy.onTelemetry(telemetry('plc-print', 55));

    const command = policy.onTelemetry(telemetry('plc-print', 100));
    expect(command?.seq).toBe(2);
    expect(decodePeerMessage(channel.published[1].payload).payload).toEqual({ speedFactor: '1' });
    expect(policy.isDegraded('plc-print')).toBe(false);
  });

  it('leaves healthy controllers alone', () => {
    const { channel, policy } = setup();
    expect(policy.onTelemetry(telemetry('plc-feed', 60))).toBeNull();
    expect(channel.published).toEqual([]);
  });

  it('retries a command that could not be published', () => {
    const { channel, policy } = setup();
    channel.failWith = new TransientChannelError('not connected');
    expect(() => policy.onTelemetry(telemetry('plc-print', 55))).toThrow(TransientChannelError);
    expect(policy.isDegraded('plc-print')).toBe(false);

    channel.failWith = null;
    expect(policy.onTelemetry(telemetry('plc-print', 55))?.seq).toBe(1);
    expect(policy.isDegraded('plc-print')).toBe(true);
  });

  it('issues commands the controller applies', () => {
    const { channel, policy } = setup();
    const controllerChannel = new RecordingChannel();
    const controller = new ControllerAggregator(
      {
        controllerId: 'plc-print',
        name: 'Print',
        role: 'print',
        downstream: [],
        telemetryPeriodMs: 5000,
        heartbeatPeriodMs: 5000,
        thresholds: { ...DEFAULT_THRESHOLDS },
        processParameters: defaultParametersFor('print'),
      },
      { channel: controllerChannel, logger: createMockLogger(), rng: constantRng(0.5), clock: () => T0 },
    );

    policy.onTelemetry(telemetry('plc-print', 55));
    controller.onPeerMessage(decodePeerMessage(channel.published[0].payload));

    expect(controller.snapshot().processParameters.speedFactor).toBe(0.8);
    const response = decodePeerMessage(controllerChannel.published[0].payload);
    expect(controllerChannel.published[0].topic).toBe('factory/supervisor/peer/response');
    expect(response.payload['status']).toBe('ok');
  });
});
