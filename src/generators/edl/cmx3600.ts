/**
 * CMX 3600 EDL Generator.
 * Serialises a finalized cut log into an Edit Decision List.
 */

import type { CutRecord, FinalizedCutLog } from '../../core/cutlog/cut-log.js';
import { EmptyLogError, UnsupportedFrameRateError } from '../../core/errors.js';
import type { Timecode } from '../../core/timecode/timecode.js';
import { formatTimecode } from '../../core/timecode/timecode.js';

// ============================================================================
// Types
// ============================================================================

export interface EdlEvent {
  /** Event number (001-999) */
  eventNumber: number;
  /** Source reel name (max 8 chars) */
  reelName: string;
  track: 'V';
  /** Live cuts only ever produce straight cuts */
  transition: 'C';
  sourceIn: Timecode;
  sourceOut: Timecode;
  recordIn: Timecode;
  recordOut: Timecode;
  comments: EdlComment[];
}

export interface EdlComment {
  key: string;
  value: string;
}

export interface EdlDocument {
  title: string;
  dropFrame: boolean;
  /** Comment lines emitted between the header and the first event */
  notes: EdlComment[];
  events: EdlEvent[];
}

export interface EdlExportConfig {
  title: string;
  /** Refuse to export a session with no records */
  rejectEmptyExport: boolean;
  includeComments?: boolean;
  /** Reel name per source id; otherwise derived from the source label */
  reelNames?: Readonly<Record<string, string>>;
}

// ============================================================================
// Constants
// ============================================================================

export const EDL_FRAME_RATES: readonly number[] = [23.976, 24, 25, 29.97, 30];

const MAX_EVENTS = 999;
const MAX_REEL_LENGTH = 8;
const FALLBACK_REEL = 'AX';

// ============================================================================
// Validation
// ============================================================================

/**
 * Whether a rate and counting mode can be written to a CMX 3600 EDL.
 * Drop-frame is only representable at 29.97.
 */
export function isEdlFrameRate(frameRate: number, dropFrame: boolean): boolean {
  if (!EDL_FRAME_RATES.includes(frameRate)) {
    return false;
  }
  return !dropFrame || frameRate === 29.97;
}

/**
 * Upper-case, restricted to [A-Z0-9_-], at most 8 characters.
 */
export function sanitiseReelName(label: string): string {
  const reel = label
    .toUpperCase()
    .replace(/[^A-Z0-9_-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .substring(0, MAX_REEL_LENGTH);
  return reel.length > 0 ? reel : FALLBACK_REEL;
}

// ============================================================================
// EDL Event Builder
// ============================================================================

function isResolved(record: CutRecord): boolean {
  return record.recordIn.timecode !== null && (record.recordOut?.timecode ?? null) !== null;
}

/**
 * Build EDL events from resolved cut records.
 * Records with an unresolved or missing boundary are left out, and so is
 * every resolved record past the CMX 3600 limit.
 */
export function buildEdlEvents(records: readonly CutRecord[], config: EdlExportConfig): EdlEvent[] {
  const events: EdlEvent[] = [];
  const includeComments = config.includeComments ?? true;

  for (const record of records) {
    const recordIn = record.recordIn.timecode;
    const recordOut = record.recordOut?.timecode;
    if (!recordIn || !recordOut) {
      continue;
    }

    if (events.length >= MAX_EVENTS) {
      break;
    }

    const comments: EdlComment[] = [];
    if (includeComments) {
      comments.push({ key: 'FROM CLIP NAME', value: record.source.label });

      if (record.recordIn.confidence === 'degraded' || record.recordOut?.confidence === 'degraded') {
        comments.push({ key: 'TIMECODE', value: 'DEGRADED (RECORDER NOT PLAYING)' });
      }
    }

    events.push({
      eventNumber: events.length + 1,
      reelName: sanitiseReelName(config.reelNames?.[record.source.id] ?? record.source.label),
      track: 'V',
      transition: 'C',
      sourceIn: recordIn,
      sourceOut: recordOut,
      recordIn,
      recordOut,
      comments,
    });
  }

  return events;
}

function unresolvedNotes(records: readonly CutRecord[]): EdlComment[] {
  const notes: EdlComment[] = [];
  for (const record of records) {
    if (isResolved(record)) {
      continue;
    }
    const point = record.recordIn.timecode ? record.recordOut : record.recordIn;
    const observed = point ? new Date(point.observedAt).toISOString() : 'unknown';
    notes.push({
      key: 'UNRESOLVED',
      value: `RECORD ${String(record.sequenceIndex)} ${record.source.label} AT ${observed}`,
    });
  }
  return notes;
}

/**
 * Names the resolved records that did not fit in the event list.
 */
function truncationNotes(records: readonly CutRecord[]): EdlComment[] {
  const omitted = records.filter(isResolved).slice(MAX_EVENTS);
  const first = omitted[0];
  const last = omitted[omitted.length - 1];
  if (!first || !last) {
    return [];
  }
  return [
    {
      key: 'TRUNCATED',
      value:
        `${String(omitted.length)} RECORDS NOT WRITTEN, RECORD ${String(first.sequenceIndex)} ` +
        `TO RECORD ${String(last.sequenceIndex)} (LIMIT ${String(MAX_EVENTS)} EVENTS)`,
    },
  ];
}

// ============================================================================
// EDL Formatting
// ============================================================================

/**
 * Format a single EDL event line.
 */
function formatEventLine(event: EdlEvent, dropFrame: boolean): string {
  const eventNum = event.eventNumber.toString().padStart(3, '0');
  const reel = event.reelName.padEnd(8, ' ');
  const track = event.track.padEnd(2, ' ');
  const transition = 'C   ';

  const sourceIn = formatTimecode(event.sourceIn, dropFrame);
  const sourceOut = formatTimecode(event.sourceOut, dropFrame);
  const recordIn = formatTimecode(event.recordIn, dropFrame);
  const recordOut = formatTimecode(event.recordOut, dropFrame);

  return `${eventNum}  ${reel} ${track}    ${transition} ${sourceIn} ${sourceOut} ${recordIn} ${recordOut}`;
}

/**
 * Generate complete EDL document as string.
 */
export function generateEdl(document: EdlDocument): string {
  const lines: string[] = [];

  lines.push(`TITLE: ${document.title}`);
  lines.push('');

  // FCM line (Frame Code Mode)
  lines.push(document.dropFrame ? 'FCM: DROP FRAME' : 'FCM: NON-DROP FRAME');
  lines.push('');

  if (document.notes.length > 0) {
    for (const note of document.notes) {
      lines.push(`* ${note.key}: ${note.value}`);
    }
    lines.push('');
  }

  for (const event of document.events) {
    lines.push(formatEventLine(event, document.dropFrame));
    for (const comment of event.comments) {
      lines.push(`* ${comment.key}: ${comment.value}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Export a finalized cut log. Same log and config always give the same bytes.
 *
 * @throws UnsupportedFrameRateError if the session rate has no CMX 3600 form
 * @throws EmptyLogError if the log is empty and the config rejects empty exports
 */
export function exportEdl(log: FinalizedCutLog, config: EdlExportConfig): Buffer {
  const { frameRate, dropFrame } = log.options;

  if (!isEdlFrameRate(frameRate, dropFrame)) {
    throw new UnsupportedFrameRateError(frameRate, dropFrame);
  }

  if (log.records.length === 0 && config.rejectEmptyExport) {
    throw new EmptyLogError();
  }

  const document: EdlDocument = {
    title: config.title,
    dropFrame,
    notes: [...unresolvedNotes(log.records), ...truncationNotes(log.records)],
    events: buildEdlEvents(log.records, config),
  };

  return Buffer.from(generateEdl(document), 'utf-8');
}
