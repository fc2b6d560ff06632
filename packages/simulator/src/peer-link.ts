import type { PeerMessage } from '@factory-sim/shared';

// Heartbeat/command protocol between controllers.
// Every Heartbeat is answered by exactly one Ack carrying the same seq;
// every Command by one Response.

export type CommandStatus = 'ok' | 'ignored';

function iso(now: number): string {
  return new Date(now).toISOString();
}

export function createHeartbeat(source: string, destination: string, seq: number, logicalClock: number, now: number): PeerMessage {
  return {
    source,
    destination,
    kind: 'heartbeat',
    seq,
    payload: { sender: source, clock: String(logicalClock) },
    timestamp: iso(now),
  };
}

/** Ack for a heartbeat: addressed back to its sender, same seq */
export function createAck(heartbeat: PeerMessage, logicalClock: number, now: number): PeerMessage {
  return {
    source: heartbeat.destination,
    destination: heartbeat.source,
    kind: 'ack',
    seq: heartbeat.seq,
    payload: { sender: heartbeat.source, clock: String(logicalClock) },
    timestamp: iso(now),
  };
}

export function createCommand(source: string, destination: string, seq: number, setpoints: Record<string, number>, now: number): PeerMessage {
  const payload: Record<string, string> = {};
  for (const [key, value] of Object.entries(setpoints)) payload[key] = String(value);
  return { source, destination, kind: 'command', seq, payload, timestamp: iso(now) };
}

export function createResponse(command: PeerMessage, status: CommandStatus, applied: string[], now: number): PeerMessage {
  const echo = Object.entries(command.payload).map(([key, value]) => `${key}=${value}`).join(',');
  return {
    source: command.destination,
    destination: command.source,
    kind: 'response',
    seq: command.seq,
    payload: { status, applied: applied.join(','), echo },
    timestamp: iso(now),
  };
}

export function createProcessEvent(
  source: string,
  destination: string,
  seq: number,
  event: string,
  detail: Record<string, string>,
  now: number,
): PeerMessage {
  return {
    source,
    destination,
    kind: 'process_event',
    seq,
    payload: { ...detail, event },
    timestamp: iso(now),
  };
}

/** Numeric setpoints carried by a Command; non-numeric entries are dropped */
export function parseSetpoints(command: PeerMessage): Record<string, number> {
  const setpoints: Record<string, number> = {};
  for (const [key, raw] of Object.entries(command.payload)) {
    const value = Number(raw);
    if (raw.trim() !== '' && Number.isFinite(value)) setpoints[key] = value;
  }
  return setpoints;
}

/** Logical clock carried by a heartbeat or ack, 0 when absent */
export function clockOf(msg: PeerMessage): number {
  const value = Number(msg.payload['clock']);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Duplicate detection by sequence number per sender. Keeps a bounded
 * window of seen numbers per sender; the oldest fall out first.
 */
export class SequenceTracker {
  private readonly seen = new Map<string, Set<number>>();

  constructor(private readonly window = 1024) {}

  /** True when (sender, seq) has not been seen before */
  observe(sender: string, seq: number): boolean {
    let seqs = this.seen.get(sender);
    if (!seqs) {
      seqs = new Set();
      this.seen.set(sender, seqs);
    }
    if (seqs.has(seq)) return false;

    seqs.add(seq);
    if (seqs.size > this.window) {
      let oldest = Infinity;
      for (const s of seqs) if (s < oldest) oldest = s;
      seqs.delete(oldest);
    }
    return true;
  }
}
