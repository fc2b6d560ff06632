import { DecodeError } from './errors.js';
import type {
  ActuationCommand,
  Alert,
  AlertKind,
  AlertSeverity,
  BlockColor,
  CameraRecord,
  ConnectionStatus,
  ControllerRole,
  ControllerTelemetry,
  KnownColor,
  PeerMessage,
  PeerMessageKind,
  QuantityKind,
  Reading,
  SizeClass,
  SortingStats,
  SortingSummary,
} from './types.js';

// ---- Token codec ----
// Payloads are flat key/value token sequences: key1|value1|key2|value2

export type WireValue = string | number | boolean;
export type WireEntry = readonly [string, WireValue];

const SEPARATOR = '|';
const ESCAPES: Record<string, string> = { '%': '%25', '|': '%7C', '\n': '%0A', '\r': '%0D' };
const UNESCAPES: Record<string, string> = { '%25': '%', '%7C': '|', '%0A': '\n', '%0D': '\r' };

function escapeToken(token: string): string {
  return token.replace(/[%|\n\r]/g, (ch) => ESCAPES[ch] ?? ch);
}

function unescapeToken(token: string): string {
  return token.replace(/%(25|7C|0A|0D)/g, (seq) => UNESCAPES[seq] ?? seq);
}

export function encodeFields(entries: Iterable<WireEntry>): string {
  const tokens: string[] = [];
  for (const [key, value] of entries) {
    tokens.push(escapeToken(key), escapeToken(String(value)));
  }
  return tokens.join(SEPARATOR);
}

/** Decode a token sequence. The first occurrence of a repeated key wins. */
export function decodeFields(payload: string): Map<string, string> {
  const fields = new Map<string, string>();
  if (payload === '') return fields;

  const tokens = payload.split(SEPARATOR);
  if (tokens.length % 2 !== 0) {
    throw new DecodeError(`odd token count (${tokens.length})`, payload);
  }
  for (let i = 0; i < tokens.length; i += 2) {
    const key = unescapeToken(tokens[i]);
    if (key === '') throw new DecodeError(`empty key at token ${i}`, payload);
    if (!fields.has(key)) fields.set(key, unescapeToken(tokens[i + 1]));
  }
  return fields;
}

/** Typed access to decoded fields; every failure is a DecodeError */
export class FieldReader {
  readonly fields: Map<string, string>;

  constructor(readonly payload: string) {
    this.fields = decodeFields(payload);
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  string(key: string): string {
    const value = this.fields.get(key);
    if (value === undefined) throw new DecodeError(`missing field "${key}"`, this.payload);
    return value;
  }

  number(key: string): number {
    const raw = this.string(key);
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new DecodeError(`field "${key}" is not a number: ${raw}`, this.payload);
    }
    return value;
  }

  optionalNumber(key: string): number | null {
    return this.has(key) ? this.number(key) : null;
  }

  integer(key: string): number {
    const value = this.number(key);
    if (!Number.isInteger(value)) {
      throw new DecodeError(`field "${key}" is not an integer: ${value}`, this.payload);
    }
    return value;
  }

  boolean(key: string): boolean {
    const raw = this.string(key);
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    throw new DecodeError(`field "${key}" is not a boolean: ${raw}`, this.payload);
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T {
    const raw = this.string(key);
    const match = allowed.find((a) => a === raw);
    if (match === undefined) {
      throw new DecodeError(`field "${key}" has unexpected value: ${raw}`, this.payload);
    }
    return match;
  }

  /** Numeric fields under a prefix, e.g. `param.` → { feedRate: 60 } */
  numbersWithPrefix(prefix: string): Record<string, number> {
    const result: Record<string, number> = {};
    for (const key of this.fields.keys()) {
      if (key.startsWith(prefix) && key.length > prefix.length) {
        result[key.slice(prefix.length)] = this.number(key);
      }
    }
    return result;
  }

  stringsWithPrefix(prefix: string): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of this.fields) {
      if (key.startsWith(prefix) && key.length > prefix.length) {
        result[key.slice(prefix.length)] = value;
      }
    }
    return result;
  }
}

// ---- Enumerations ----

export const QUANTITY_KINDS = ['temperature', 'pressure', 'vibration', 'flow', 'vision_defect_count'] as const satisfies readonly QuantityKind[];
export const ALERT_KINDS = ['range_warning', 'range_critical', 'calibration_due', 'rapid_change', 'mechanical_anomaly'] as const satisfies readonly AlertKind[];
export const ALERT_SEVERITIES = ['info', 'warning', 'critical'] as const satisfies readonly AlertSeverity[];
export const CONTROLLER_ROLES = ['paper_feed', 'print', 'sorting', 'transport'] as const satisfies readonly ControllerRole[];
export const CONNECTION_STATUSES = ['isolated', 'connected'] as const satisfies readonly ConnectionStatus[];
export const PEER_MESSAGE_KINDS = ['heartbeat', 'ack', 'process_event', 'command', 'response'] as const satisfies readonly PeerMessageKind[];
export const BLOCK_COLORS = ['red', 'blue', 'green', 'yellow', 'unknown'] as const satisfies readonly BlockColor[];
export const KNOWN_COLORS = ['red', 'blue', 'green', 'yellow'] as const satisfies readonly KnownColor[];
export const SIZE_CLASSES = ['small', 'medium', 'large'] as const satisfies readonly SizeClass[];

// ---- Readings and alerts ----

export function encodeReading(reading: Reading): string {
  const entries: WireEntry[] = [
    ['sensorId', reading.sensorId],
    ['kind', reading.kind],
    ['value', reading.value],
    ['unit', reading.unit],
    ['timestamp', reading.timestamp],
  ];
  if (reading.derived.confidence !== undefined) entries.push(['confidence', reading.derived.confidence]);
  if (reading.derived.imageQuality !== undefined) entries.push(['imageQuality', reading.derived.imageQuality]);
  entries.push(['alerts', reading.alerts.length]);
  return encodeFields(entries);
}

/** Alerts travel on their own topic; a decoded reading carries none */
export function decodeReading(payload: string): Reading {
  const r = new FieldReader(payload);
  const confidence = r.optionalNumber('confidence');
  const imageQuality = r.optionalNumber('imageQuality');
  return {
    sensorId: r.string('sensorId'),
    kind: r.oneOf('kind', QUANTITY_KINDS),
    value: r.number('value'),
    unit: r.string('unit'),
    timestamp: r.string('timestamp'),
    derived: {
      ...(confidence !== null ? { confidence } : {}),
      ...(imageQuality !== null ? { imageQuality } : {}),
    },
    alerts: [],
  };
}

export function encodeAlert(alert: Alert): string {
  return encodeFields([
    ['sensorId', alert.sensorId],
    ['kind', alert.kind],
    ['severity', alert.severity],
    ['message', alert.message],
    ['timestamp', alert.timestamp],
  ]);
}

export function decodeAlert(payload: string): Alert {
  const r = new FieldReader(payload);
  return {
    sensorId: r.string('sensorId'),
    kind: r.oneOf('kind', ALERT_KINDS),
    severity: r.oneOf('severity', ALERT_SEVERITIES),
    message: r.string('message'),
    timestamp: r.string('timestamp'),
  };
}

// ---- Controller telemetry ----

export function encodeTelemetry(t: ControllerTelemetry): string {
  const entries: WireEntry[] = [
    ['controllerId', t.controllerId],
    ['role', t.role],
    ['timestamp', t.timestamp],
  ];
  if (t.metrics.avgTemperature !== null) entries.push(['avgTemperature', t.metrics.avgTemperature]);
  if (t.metrics.maxPressure !== null) entries.push(['maxPressure', t.metrics.maxPressure]);
  entries.push(
    ['vibrationAlarm', t.metrics.vibrationAlarm],
    ['activeAlerts', t.metrics.activeAlerts],
    ['health', t.metrics.health],
    ['connection', t.connection],
    ['helloSent', t.peerCounters.helloSent],
    ['helloReceived', t.peerCounters.helloReceived],
    ['acksReceived', t.peerCounters.acksReceived],
    ['commandsProcessed', t.peerCounters.commandsProcessed],
    ['processEventsReceived', t.peerCounters.processEventsReceived],
    ['knownSensors', t.knownSensors],
  );
  for (const [key, value] of Object.entries(t.processParameters)) entries.push([`param.${key}`, value]);
  for (const [key, value] of Object.entries(t.processMetrics)) entries.push([`metric.${key}`, value]);
  return encodeFields(entries);
}

export function decodeTelemetry(payload: string): ControllerTelemetry {
  const r = new FieldReader(payload);
  return {
    controllerId: r.string('controllerId'),
    role: r.oneOf('role', CONTROLLER_ROLES),
    timestamp: r.string('timestamp'),
    metrics: {
      avgTemperature: r.optionalNumber('avgTemperature'),
      maxPressure: r.optionalNumber('maxPressure'),
      vibrationAlarm: r.boolean('vibrationAlarm'),
      activeAlerts: r.integer('activeAlerts'),
      health: r.number('health'),
    },
    connection: r.oneOf('connection', CONNECTION_STATUSES),
    peerCounters: {
      helloSent: r.integer('helloSent'),
      helloReceived: r.integer('helloReceived'),
      acksReceived: r.integer('acksReceived'),
      commandsProcessed: r.integer('commandsProcessed'),
      processEventsReceived: r.integer('processEventsReceived'),
    },
    knownSensors: r.integer('knownSensors'),
    processParameters: r.numbersWithPrefix('param.'),
    processMetrics: r.numbersWithPrefix('metric.'),
  };
}

// ---- Peer messages ----

export function encodePeerMessage(msg: PeerMessage): string {
  const entries: WireEntry[] = [
    ['src', msg.source],
    ['dst', msg.destination],
    ['kind', msg.kind],
    ['seq', msg.seq],
    ['ts', msg.timestamp],
  ];
  for (const [key, value] of Object.entries(msg.payload)) entries.push([`p.${key}`, value]);
  return encodeFields(entries);
}

export function decodePeerMessage(payload: string): PeerMessage {
  const r = new FieldReader(payload);
  return {
    source: r.string('src'),
    destination: r.string('dst'),
    kind: r.oneOf('kind', PEER_MESSAGE_KINDS),
    seq: r.integer('seq'),
    timestamp: r.string('ts'),
    payload: r.stringsWithPrefix('p.'),
  };
}

// ---- Sorting cell ----

export function encodeCameraRecord(c: CameraRecord): string {
  return encodeFields([
    ['blockId', c.blockId],
    ['color', c.color],
    ['confidence', c.confidence],
    ['imageQuality', c.imageQuality],
    ['sizeClass', c.sizeClass],
    ['timestamp', c.timestamp],
  ]);
}

export function decodeCameraRecord(payload: string): CameraRecord {
  const r = new FieldReader(payload);
  return {
    blockId: r.integer('blockId'),
    color: r.oneOf('color', BLOCK_COLORS),
    confidence: r.number('confidence'),
    imageQuality: r.number('imageQuality'),
    sizeClass: r.oneOf('sizeClass', SIZE_CLASSES),
    timestamp: r.string('timestamp'),
  };
}

export function encodeActuation(a: ActuationCommand): string {
  return encodeFields([
    ['blockId', a.blockId],
    ['color', a.color],
    ['position', a.position],
    ['timestamp', a.timestamp],
  ]);
}

export function decodeActuation(payload: string): ActuationCommand {
  const r = new FieldReader(payload);
  return {
    blockId: r.integer('blockId'),
    color: r.oneOf('color', BLOCK_COLORS),
    position: r.number('position'),
    timestamp: r.string('timestamp'),
  };
}

export function encodeSortingStats(s: SortingStats): string {
  const entries: WireEntry[] = KNOWN_COLORS.map((color) => [color, s.counts[color]] as const);
  entries.push(
    ['unknown', s.unknown],
    ['total', s.totalProcessed],
    ['efficiency', s.efficiency],
    ['throughput', s.throughputPerHour],
    ['startedAt', s.startedAt],
  );
  return encodeFields(entries);
}

export function decodeSortingStats(payload: string): SortingStats {
  const r = new FieldReader(payload);
  return {
    counts: {
      red: r.integer('red'),
      blue: r.integer('blue'),
      green: r.integer('green'),
      yellow: r.integer('yellow'),
    },
    unknown: r.integer('unknown'),
    totalProcessed: r.integer('total'),
    efficiency: r.number('efficiency'),
    throughputPerHour: r.number('throughput'),
    startedAt: r.number('startedAt'),
  };
}

export function encodeSortingSummary(s: SortingSummary): string {
  const entries: WireEntry[] = [['total', s.total]];
  for (const color of BLOCK_COLORS) entries.push([`pct.${color}`, s.percentages[color]]);
  entries.push(['efficiency', s.efficiency], ['throughput', s.throughputPerHour], ['timestamp', s.timestamp]);
  return encodeFields(entries);
}

export function decodeSortingSummary(payload: string): SortingSummary {
  const r = new FieldReader(payload);
  return {
    total: r.integer('total'),
    percentages: {
      red: r.number('pct.red'),
      blue: r.number('pct.blue'),
      green: r.number('pct.green'),
      yellow: r.number('pct.yellow'),
      unknown: r.number('pct.unknown'),
    },
    efficiency: r.number('efficiency'),
    throughputPerHour: r.number('throughput'),
    timestamp: r.string('timestamp'),
  };
}
