/**
 * Event type definitions for the cut correlation engine.
 * Device events are immutable records stamped with the instant they were observed.
 */

import {
  formatTimecode,
  parseTimecode,
  type Timecode,
} from '../timecode/timecode.js';

// ============================================================================
// Core Types
// ============================================================================

export const TRANSPORT_STATES = ['stopped', 'playing', 'paused', 'shuttling', 'unknown'] as const;

/**
 * Recorder transport state.
 * Only 'playing' readings are trusted as a running timecode reference.
 */
export type TransportState = (typeof TRANSPORT_STATES)[number];

/**
 * Switcher input identifier.
 */
export interface SourceId {
  /** Opaque identifier, stable for the session */
  readonly id: string;
  /** Human-readable label, used as reel and clip name in the EDL */
  readonly label: string;
}

/**
 * Emitted by the switcher whenever the program input changes.
 * May be delivered more than once for the same physical change.
 */
export interface SourceChangedEvent {
  readonly type: 'source_changed';
  readonly source: SourceId;
  /** Milliseconds since the Unix epoch */
  readonly observedAt: number;
}

/**
 * Emitted by the recorder at a device-driven cadence.
 */
export interface TimecodeTickEvent {
  readonly type: 'timecode_tick';
  readonly timecode: Timecode;
  readonly transportState: TransportState;
  readonly observedAt: number;
}

/**
 * Session lifecycle marker, recorded in the journal.
 */
export interface SessionEvent {
  readonly type: 'session';
  readonly action: 'start' | 'stop';
  readonly sessionId: string;
  readonly observedAt: number;
}

export type DeviceEvent = SourceChangedEvent | TimecodeTickEvent;

/**
 * Union of all event types.
 */
export type EngineEvent = DeviceEvent | SessionEvent;

// ============================================================================
// Journal Entry
// ============================================================================

/**
 * Serialised event for JSONL storage.
 * Timecodes are stored as SMPTE strings.
 */
export type EventLogEntry =
  | {
      id: string;
      type: 'source_changed';
      observedAt: number;
      data: { source: { id: string; label: string } };
    }
  | {
      id: string;
      type: 'timecode_tick';
      observedAt: number;
      data: { timecode: string; transportState: TransportState };
    }
  | {
      id: string;
      type: 'session';
      observedAt: number;
      data: { action: 'start' | 'stop'; sessionId: string };
    };

// ============================================================================
// Factory Functions
// ============================================================================

export function sourceChanged(
  source: SourceId,
  observedAt: number = Date.now()
): SourceChangedEvent {
  return { type: 'source_changed', source, observedAt };
}

export function timecodeTick(
  timecode: Timecode,
  transportState: TransportState,
  observedAt: number = Date.now()
): TimecodeTickEvent {
  return { type: 'timecode_tick', timecode, transportState, observedAt };
}

/**
 * Generate unique event ID.
 */
export function generateEventId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `${timestamp}-${random}`;
}

/**
 * Serialise event for JSONL storage.
 */
export function serialiseEvent(event: EngineEvent): EventLogEntry {
  const id = generateEventId();

  switch (event.type) {
    case 'source_changed':
      return {
        id,
        type: event.type,
        observedAt: event.observedAt,
        data: { source: { id: event.source.id, label: event.source.label } },
      };
    case 'timecode_tick':
      return {
        id,
        type: event.type,
        observedAt: event.observedAt,
        data: {
          timecode: formatTimecode(event.timecode),
          transportState: event.transportState,
        },
      };
    case 'session':
      return {
        id,
        type: event.type,
        observedAt: event.observedAt,
        data: { action: event.action, sessionId: event.sessionId },
      };
  }
}

/**
 * Deserialise event from JSONL storage.
 */
export function deserialiseEvent(entry: EventLogEntry): EngineEvent {
  switch (entry.type) {
    case 'source_changed':
      return sourceChanged(entry.data.source, entry.observedAt);
    case 'timecode_tick':
      return timecodeTick(
        parseTimecode(entry.data.timecode),
        entry.data.transportState,
        entry.observedAt
      );
    case 'session':
      return {
        type: 'session',
        action: entry.data.action,
        sessionId: entry.data.sessionId,
        observedAt: entry.observedAt,
      };
  }
}
