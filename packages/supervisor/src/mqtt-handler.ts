import {
  DecodeError,
  TOPIC_ROOT,
  decodeActuation,
  decodeAlert,
  decodeCameraRecord,
  decodePeerMessage,
  decodeReading,
  decodeSortingStats,
  decodeSortingSummary,
  decodeTelemetry,
} from '@factory-sim/shared';
import type {
  ActuationCommand,
  Alert,
  CameraRecord,
  ControllerTelemetry,
  Logger,
  PeerMessage,
  Reading,
  SortingStats,
  SortingSummary,
} from '@factory-sim/shared';
import type { SupervisoryState } from './supervisory-state.js';

export type SupervisoryEvent =
  | { type: 'reading'; controllerId: string; data: Reading }
  | { type: 'alert'; controllerId: string; data: Alert }
  | { type: 'controller_telemetry'; data: ControllerTelemetry }
  | { type: 'peer_message'; data: PeerMessage }
  | { type: 'camera'; controllerId: string; data: CameraRecord }
  | { type: 'actuation'; controllerId: string; data: ActuationCommand }
  | { type: 'sorting_stats'; controllerId: string; data: SortingStats }
  | { type: 'sorting_summary'; data: SortingSummary };

function decodeEvent(parts: string[], payload: string): SupervisoryEvent | null {
  const nodeId = parts[1];
  const path = parts.slice(2).join('/');

  // factory/{controllerId}/sensor/{sensorId}/attrs|alert
  if (parts.length === 5 && parts[2] === 'sensor') {
    if (parts[4] === 'attrs') return { type: 'reading', controllerId: nodeId, data: decodeReading(payload) };
    if (parts[4] === 'alert') return { type: 'alert', controllerId: nodeId, data: decodeAlert(payload) };
    return null;
  }

  // factory/{destinationId}/peer/{kind}
  if (parts.length === 4 && parts[2] === 'peer') {
    return { type: 'peer_message', data: decodePeerMessage(payload) };
  }

  switch (path) {
    case 'attrs':
      return { type: 'controller_telemetry', data: decodeTelemetry(payload) };
    case 'camera/attrs':
      return { type: 'camera', controllerId: nodeId, data: decodeCameraRecord(payload) };
    case 'actuator/cmd':
      return { type: 'actuation', controllerId: nodeId, data: decodeActuation(payload) };
    case 'sorting/stats':
      return { type: 'sorting_stats', controllerId: nodeId, data: decodeSortingStats(payload) };
    case 'sorting/summary':
      return { type: 'sorting_summary', data: decodeSortingSummary(payload) };
    default:
      return null;
  }
}

/**
 * Decode one factory message and fold it into the supervisory state.
 * Returns null for topics outside the factory layout and for payloads that
 * fail to decode; the state is left untouched in both cases.
 */
export function processMessage(
  topic: string,
  payload: Buffer | string,
  state: SupervisoryState,
  logger: Logger,
): SupervisoryEvent | null {
  const parts = topic.split('/');
  if (parts[0] !== TOPIC_ROOT || parts.length < 3) return null;

  let event: SupervisoryEvent | null;
  try {
    event = decodeEvent(parts, payload.toString());
  } catch (err) {
    if (!(err instanceof DecodeError)) throw err;
    logger.warn({ topic, err: err.message }, 'Dropping undecodable message');
    return null;
  }
  if (!event) return null;

  switch (event.type) {
    case 'reading':
      state.handleReading(event.data);
      break;
    case 'alert':
      state.handleAlert(event.data);
      break;
    case 'controller_telemetry':
      state.handleTelemetry(event.data);
      break;
    case 'sorting_stats':
      state.handleSortingStats(event.controllerId, event.data);
      break;
    case 'sorting_summary':
      state.handleSortingSummary(event.data);
      break;
    case 'peer_message':
    case 'camera':
    case 'actuation':
      break;
  }
  return event;
}
