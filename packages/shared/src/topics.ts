import type { PeerMessageKind } from './types.js';

// Topic layout: factory/{nodeId}/...

export const TOPIC_ROOT = 'factory';

export const topics = {
  sensorReading: (controllerId: string, sensorId: string) => `${TOPIC_ROOT}/${controllerId}/sensor/${sensorId}/attrs`,
  sensorAlert: (controllerId: string, sensorId: string) => `${TOPIC_ROOT}/${controllerId}/sensor/${sensorId}/alert`,
  controllerTelemetry: (controllerId: string) => `${TOPIC_ROOT}/${controllerId}/attrs`,
  peer: (destinationId: string, kind: PeerMessageKind) => `${TOPIC_ROOT}/${destinationId}/peer/${kind}`,
  camera: (controllerId: string) => `${TOPIC_ROOT}/${controllerId}/camera/attrs`,
  actuator: (controllerId: string) => `${TOPIC_ROOT}/${controllerId}/actuator/cmd`,
  sortingStats: (controllerId: string) => `${TOPIC_ROOT}/${controllerId}/sorting/stats`,
  sortingSummary: (supervisorId: string) => `${TOPIC_ROOT}/${supervisorId}/sorting/summary`,
} as const;

export const patterns = {
  childReadings: (controllerId: string) => `${TOPIC_ROOT}/${controllerId}/sensor/+/attrs`,
  childAlerts: (controllerId: string) => `${TOPIC_ROOT}/${controllerId}/sensor/+/alert`,
  peerInbox: (nodeId: string) => `${TOPIC_ROOT}/${nodeId}/peer/+`,
  everything: `${TOPIC_ROOT}/#`,
} as const;

/**
 * MQTT-style topic matching: `+` matches exactly one level,
 * `#` (last level only) matches the remaining levels, including none.
 */
export function matchTopic(pattern: string, topic: string): boolean {
  const p = pattern.split('/');
  const t = topic.split('/');

  for (let i = 0; i < p.length; i++) {
    const level = p[i];
    if (level === '#') return i === p.length - 1;
    if (i >= t.length) return false;
    if (level !== '+' && level !== t[i]) return false;
  }
  return p.length === t.length;
}
