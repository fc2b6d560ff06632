import { SimulationInvariantViolation, encodePeerMessage, encodeTelemetry, topics } from '@factory-sim/shared';
import type {
  AggregatedMetrics,
  Alert,
  ControllerConfig,
  ControllerState,
  ControllerTelemetry,
  HealthThresholds,
  Logger,
  PeerMessage,
  Reading,
} from '@factory-sim/shared';
import { controlLogicFor, type ControlEvent, type ControlLogic } from './control-logic.js';
import {
  SequenceTracker,
  clockOf,
  createAck,
  createHeartbeat,
  createProcessEvent,
  createResponse,
  parseSetpoints,
} from './peer-link.js';
import type { Rng } from './rng.js';
import type { TelemetryChannel } from './telemetry-channel.js';

const HEALTH_PENALTY = {
  hotTemperature: 10,
  highPressure: 15,
  vibrationAlarm: 20,
} as const;

/**
 * Health score from aggregated metrics: 100 minus a penalty per breached
 * threshold, floored at 0. Metrics with no readings yet carry no penalty.
 */
export function computeHealth(
  metrics: Pick<AggregatedMetrics, 'avgTemperature' | 'maxPressure' | 'vibrationAlarm'>,
  thresholds: HealthThresholds,
): number {
  let health = 100;
  if (metrics.avgTemperature !== null && metrics.avgTemperature > thresholds.hotTemperature) {
    health -= HEALTH_PENALTY.hotTemperature;
  }
  if (metrics.maxPressure !== null && metrics.maxPressure > thresholds.highPressure) {
    health -= HEALTH_PENALTY.highPressure;
  }
  if (metrics.vibrationAlarm) health -= HEALTH_PENALTY.vibrationAlarm;
  health = Math.max(0, health);

  if (!(health >= 0 && health <= 100)) {
    throw new SimulationInvariantViolation(`health score ${health} outside [0, 100]`);
  }
  return health;
}

export function aggregateReadings(readings: Iterable<Reading>, thresholds: HealthThresholds): AggregatedMetrics {
  let temperatureSum = 0;
  let temperatureCount = 0;
  let maxPressure: number | null = null;
  let vibrationAlarm = false;
  let activeAlerts = 0;

  for (const r of readings) {
    activeAlerts += r.alerts.length;
    switch (r.kind) {
      case 'temperature':
        temperatureSum += r.value;
        temperatureCount++;
        break;
      case 'pressure':
        maxPressure = maxPressure === null ? r.value : Math.max(maxPressure, r.value);
        break;
      case 'vibration':
        if (r.value > thresholds.vibrationAlarm) vibrationAlarm = true;
        break;
      default:
        break;
    }
  }

  const avgTemperature = temperatureCount > 0 ? Math.round((temperatureSum / temperatureCount) * 100) / 100 : null;
  return {
    avgTemperature,
    maxPressure,
    vibrationAlarm,
    activeAlerts,
    health: computeHealth({ avgTemperature, maxPressure, vibrationAlarm }, thresholds),
  };
}

export interface ControllerDeps {
  channel: TelemetryChannel;
  logger: Logger;
  rng: Rng;
  clock?: () => number;
}

/** Deep copy of a controller's state, safe to hand out */
export type ControllerSnapshot = Readonly<ControllerState>;

/**
 * One PLC node: aggregates its child sensors, speaks the peer-link protocol
 * with other controllers and publishes its own telemetry. Every inbound call
 * recomputes the aggregate before returning, so a later tick never publishes
 * a stale view.
 */
export class ControllerAggregator {
  private readonly state: ControllerState;
  private readonly heartbeats = new SequenceTracker();
  private readonly commands = new SequenceTracker();
  private readonly logic: ControlLogic;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private seq = 0;
  private logicalClock = 0;
  private lastTelemetryAt: number | null = null;
  private lastHeartbeatAt: number | null = null;
  private lastStepAt: number | null = null;

  constructor(readonly config: ControllerConfig, private readonly deps: ControllerDeps) {
    this.logger = deps.logger.child({ controllerId: config.controllerId });
    this.clock = deps.clock ?? Date.now;
    this.logic = controlLogicFor(config.role);
    this.state = {
      readings: new Map(),
      metrics: aggregateReadings([], config.thresholds),
      peerCounters: { helloSent: 0, helloReceived: 0, acksReceived: 0, commandsProcessed: 0, processEventsReceived: 0 },
      connection: 'isolated',
      processParameters: { ...config.processParameters },
      processMetrics: this.logic.initialMetrics(),
    };
  }

  get controllerId(): string {
    return this.config.controllerId;
  }

  onChildReading(reading: Reading): void {
    this.state.readings.set(reading.sensorId, reading);
    this.recompute();
    this.logger.debug({ sensorId: reading.sensorId, value: reading.value, health: this.state.metrics.health }, 'Child reading');
  }

  /**
   * Alerts travel on their own topic after the reading they belong to; one
   * whose timestamp no longer matches the stored reading is stale and dropped.
   */
  onChildAlert(alert: Alert): void {
    const reading = this.state.readings.get(alert.sensorId);
    if (!reading || reading.timestamp !== alert.timestamp) return;
    this.state.readings.set(alert.sensorId, { ...reading, alerts: [...reading.alerts, alert] });
    this.recompute();
  }

  onPeerMessage(msg: PeerMessage): void {
    if (msg.destination !== this.controllerId) {
      this.logger.debug({ source: msg.source, destination: msg.destination }, 'Ignoring message for another node');
      return;
    }
    this.logicalClock = Math.max(this.logicalClock, clockOf(msg)) + 1;
    const now = this.clock();

    switch (msg.kind) {
      case 'heartbeat':
        if (this.heartbeats.observe(msg.source, msg.seq)) {
          this.state.peerCounters.helloReceived++;
        } else {
          this.logger.debug({ source: msg.source, seq: msg.seq }, 'Duplicate heartbeat, re-acknowledging');
        }
        this.markConnected(msg.source);
        this.send(createAck(msg, this.logicalClock, now));
        break;

      case 'ack':
        this.state.peerCounters.acksReceived++;
        this.markConnected(msg.source);
        break;

      case 'command':
        this.handleCommand(msg, now);
        break;

      case 'process_event':
        this.handleProcessEvent(msg);
        break;

      case 'response':
        this.logger.debug({ source: msg.source, seq: msg.seq, status: msg.payload['status'] }, 'Command response');
        break;
    }

    this.recompute();
  }

  /** Numeric statistics reported by a process this controller owns */
  onProcessReport(fields: Record<string, number>): void {
    Object.assign(this.state.processMetrics, fields);
    this.recompute();
  }

  /** Run control logic, then publish telemetry and heartbeats when due */
  tick(now: number): void {
    this.runControlLogic(now);

    if (this.lastTelemetryAt === null || now - this.lastTelemetryAt >= this.config.telemetryPeriodMs) {
      this.publishTelemetry(now);
    }
    if (this.lastHeartbeatAt === null || now - this.lastHeartbeatAt >= this.config.heartbeatPeriodMs) {
      this.sendHeartbeats(now);
    }
  }

  publishTelemetry(now: number): ControllerTelemetry {
    const telemetry = this.toTelemetry(now);
    this.deps.channel.publish(topics.controllerTelemetry(this.controllerId), encodeTelemetry(telemetry));
    this.lastTelemetryAt = now;
    return telemetry;
  }

  /** One heartbeat per downstream peer, sent whether or not earlier ones were acked */
  sendHeartbeats(now: number): void {
    for (const peer of this.config.downstream) {
      this.logicalClock++;
      this.send(createHeartbeat(this.controllerId, peer, this.nextSeq(), this.logicalClock, now));
      this.state.peerCounters.helloSent++;
    }
    this.lastHeartbeatAt = now;
  }

  snapshot(): ControllerSnapshot {
    return {
      readings: new Map(this.state.readings),
      metrics: { ...this.state.metrics },
      peerCounters: { ...this.state.peerCounters },
      connection: this.state.connection,
      processParameters: { ...this.state.processParameters },
      processMetrics: { ...this.state.processMetrics },
    };
  }

  toTelemetry(now: number): ControllerTelemetry {
    return {
      controllerId: this.controllerId,
      role: this.config.role,
      timestamp: new Date(now).toISOString(),
      metrics: { ...this.state.metrics },
      connection: this.state.connection,
      peerCounters: { ...this.state.peerCounters },
      knownSensors: this.state.readings.size,
      processParameters: { ...this.state.processParameters },
      processMetrics: { ...this.state.processMetrics },
    };
  }

  private recompute(): void {
    this.state.metrics = aggregateReadings(this.state.readings.values(), this.config.thresholds);
  }

  private markConnected(peer: string): void {
    if (this.state.connection === 'connected') return;
    this.state.connection = 'connected';
    this.logger.info({ peer }, 'Peer link connected');
  }

  private handleCommand(msg: PeerMessage, now: number): void {
    const params = this.state.processParameters;

    if (!this.commands.observe(msg.source, msg.seq)) {
      this.logger.debug({ source: msg.source, seq: msg.seq }, 'Duplicate command, re-sending response');
      const applied = Object.keys(parseSetpoints(msg)).filter((key) => Object.hasOwn(params, key));
      this.send(createResponse(msg, applied.length > 0 ? 'ok' : 'ignored', applied, now));
      return;
    }

    this.state.peerCounters.commandsProcessed++;
    const applied: string[] = [];
    for (const [key, value] of Object.entries(parseSetpoints(msg))) {
      if (!Object.hasOwn(params, key)) continue;
      params[key] = value;
      applied.push(key);
    }
    this.logger.info({ source: msg.source, applied }, 'Command processed');
    this.send(createResponse(msg, applied.length > 0 ? 'ok' : 'ignored', applied, now));
  }

  private handleProcessEvent(msg: PeerMessage): void {
    this.state.peerCounters.processEventsReceived++;
    const event = msg.payload['event'];
    if (event === 'jam_detected') this.state.processParameters.upstreamBlocked = 1;
    else if (event === 'jam_cleared') this.state.processParameters.upstreamBlocked = 0;
    this.logger.debug({ source: msg.source, event }, 'Process event');
  }

  private runControlLogic(now: number): void {
    const dtS = this.lastStepAt === null ? 0 : (now - this.lastStepAt) / 1000;
    this.lastStepAt = now;
    if (dtS <= 0) return;

    const events = this.logic.step(this.state.processParameters, this.state.processMetrics, dtS, this.deps.rng);
    for (const event of events) this.emitProcessEvent(event, now);
  }

  private emitProcessEvent(event: ControlEvent, now: number): void {
    this.logger.info({ event: event.event, ...event.detail }, 'Process event');
    for (const peer of this.config.downstream) {
      this.send(createProcessEvent(this.controllerId, peer, this.nextSeq(), event.event, event.detail, now));
    }
  }

  private nextSeq(): number {
    this.seq++;
    return this.seq;
  }

  private send(msg: PeerMessage): void {
    this.deps.channel.publish(topics.peer(msg.destination, msg.kind), encodePeerMessage(msg));
  }
}
