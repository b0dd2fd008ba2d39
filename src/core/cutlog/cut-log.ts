/**
 * Cut Log
 *
 * Append-only sequence of cut records for one session. Adjacent records share
 * a single boundary point, so the out point of one record and the in point of
 * the next can never disagree, even after deferred resolution fills it in.
 */

import type { SourceId } from '../events/types.js';
import { InvariantViolationError } from '../errors.js';
import type { EstimateConfidence } from '../timecode/tracker.js';
import { durationInFrames, type Timecode, type TimecodeOptions } from '../timecode/timecode.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Instant at which a record boundary occurred.
 * `timecode` is null until the tracker can answer for `observedAt`.
 */
export interface CutPoint {
  readonly observedAt: number;
  readonly timecode: Timecode | null;
  readonly confidence: EstimateConfidence;
}

export interface CutRecord {
  readonly sequenceIndex: number;
  readonly source: SourceId;
  readonly recordIn: CutPoint;
  /** null while this is the open record */
  readonly recordOut: CutPoint | null;
}

/**
 * Boundary point owned by a live log. Only the log resolves it.
 */
export class PendingCutPoint {
  readonly observedAt: number;
  private resolved: { timecode: Timecode; confidence: EstimateConfidence } | null;

  constructor(observedAt: number, resolution: { timecode: Timecode; confidence: EstimateConfidence } | null = null) {
    this.observedAt = observedAt;
    this.resolved = resolution;
  }

  get timecode(): Timecode | null {
    return this.resolved?.timecode ?? null;
  }

  get confidence(): EstimateConfidence {
    return this.resolved?.confidence ?? 'degraded';
  }

  isResolved(): boolean {
    return this.resolved !== null;
  }

  /** @internal */
  resolve(timecode: Timecode, confidence: EstimateConfidence): void {
    this.resolved = { timecode, confidence };
  }
}

export interface NewCutRecord {
  sequenceIndex: number;
  source: SourceId;
  recordIn: PendingCutPoint;
}

/**
 * Answers the compensated timecode for an instant, or null when it can't yet.
 */
export type CutPointResolver = (
  observedAt: number
) => { timecode: Timecode; confidence: EstimateConfidence } | null;

interface MutableRecord {
  readonly sequenceIndex: number;
  readonly source: SourceId;
  readonly recordIn: PendingCutPoint;
  recordOut: PendingCutPoint | null;
}

// ============================================================================
// Finalized Log
// ============================================================================

/**
 * Immutable result of a finished session; the only thing the exporter accepts.
 */
export interface FinalizedCutLog {
  readonly sessionId: string;
  readonly options: TimecodeOptions;
  readonly records: readonly CutRecord[];
  readonly finalizedAt: number;
}

/**
 * Records whose in or out point never resolved.
 */
export function unresolvedRecords(records: readonly CutRecord[]): CutRecord[] {
  return records.filter((record) => record.recordIn.timecode === null || record.recordOut?.timecode === null);
}

/**
 * Duration in frames, or null while open or unresolved.
 */
export function recordDuration(record: CutRecord, options: TimecodeOptions): number | null {
  const start = record.recordIn.timecode;
  const end = record.recordOut?.timecode;
  if (!start || !end) {
    return null;
  }
  return durationInFrames(start, end, options);
}

// ============================================================================
// Cut Log
// ============================================================================

export class CutLog {
  readonly sessionId: string;
  readonly options: TimecodeOptions;

  private readonly entries: MutableRecord[] = [];
  private finalized: FinalizedCutLog | null = null;

  constructor(sessionId: string, options: TimecodeOptions) {
    this.sessionId = sessionId;
    this.options = options;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Append a new open record.
   *
   * @throws InvariantViolationError when a record is still open, the index
   * breaks the sequence, or recordIn is not the previous record's recordOut.
   */
  append(record: NewCutRecord): void {
    this.assertMutable('append');

    const previous = this.entries[this.entries.length - 1];
    const expectedIndex = this.entries.length;

    if (previous && previous.recordOut === null) {
      throw new InvariantViolationError(
        `Cannot append record ${String(record.sequenceIndex)} while record ${String(previous.sequenceIndex)} is open`
      );
    }

    if (record.sequenceIndex !== expectedIndex) {
      throw new InvariantViolationError(
        `Expected sequence index ${String(expectedIndex)}, got ${String(record.sequenceIndex)}`
      );
    }

    if (previous && previous.recordOut !== record.recordIn) {
      throw new InvariantViolationError(
        `Record ${String(record.sequenceIndex)} does not start where record ${String(previous.sequenceIndex)} ends`
      );
    }

    this.entries.push({
      sequenceIndex: record.sequenceIndex,
      source: record.source,
      recordIn: record.recordIn,
      recordOut: null,
    });
  }

  /**
   * Close the open record at the given point.
   *
   * @throws InvariantViolationError when no record is open or the point
   * precedes the record's in point.
   */
  closeOpen(recordOut: PendingCutPoint): void {
    this.assertMutable('close');

    const open = this.openEntry();
    if (!open) {
      throw new InvariantViolationError('Cannot close: no record is open');
    }

    if (recordOut.observedAt < open.recordIn.observedAt) {
      throw new InvariantViolationError(
        `Record ${String(open.sequenceIndex)} cannot end at ${String(recordOut.observedAt)}, ` +
        `before it started at ${String(open.recordIn.observedAt)}`
      );
    }

    open.recordOut = recordOut;
  }

  /**
   * Retry every unresolved boundary point.
   * Returns the number of points that remain unresolved.
   */
  resolvePending(resolver: CutPointResolver): number {
    this.assertMutable('resolve');

    let remaining = 0;
    for (const point of this.boundaryPoints()) {
      if (point.isResolved()) {
        continue;
      }
      const resolution = resolver(point.observedAt);
      if (resolution) {
        point.resolve(resolution.timecode, resolution.confidence);
      } else {
        remaining++;
      }
    }
    return remaining;
  }

  /**
   * Freeze the log. Idempotent once called.
   *
   * @throws InvariantViolationError if a record is still open.
   */
  finalize(finalizedAt: number = Date.now()): FinalizedCutLog {
    if (this.finalized) {
      return this.finalized;
    }

    const open = this.openEntry();
    if (open) {
      throw new InvariantViolationError(`Cannot finalize with record ${String(open.sequenceIndex)} still open`);
    }

    this.finalized = Object.freeze({
      sessionId: this.sessionId,
      options: Object.freeze({ ...this.options }),
      records: this.records(),
      finalizedAt,
    });
    return this.finalized;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Read-only snapshot. Shared boundaries stay shared in the snapshot.
   */
  records(): readonly CutRecord[] {
    const frozen = new Map<PendingCutPoint, CutPoint>();
    const freeze = (point: PendingCutPoint): CutPoint => {
      let copy = frozen.get(point);
      if (!copy) {
        const timecode = point.timecode;
        copy = Object.freeze({
          observedAt: point.observedAt,
          timecode: timecode ? Object.freeze({ ...timecode }) : null,
          confidence: point.confidence,
        });
        frozen.set(point, copy);
      }
      return copy;
    };

    return Object.freeze(
      this.entries.map((entry) =>
        Object.freeze({
          sequenceIndex: entry.sequenceIndex,
          source: entry.source,
          recordIn: freeze(entry.recordIn),
          recordOut: entry.recordOut ? freeze(entry.recordOut) : null,
        })
      )
    );
  }

  get length(): number {
    return this.entries.length;
  }

  isFinalized(): boolean {
    return this.finalized !== null;
  }

  openRecord(): { sequenceIndex: number; source: SourceId } | null {
    const open = this.openEntry();
    return open ? { sequenceIndex: open.sequenceIndex, source: open.source } : null;
  }

  /**
   * Instant of the most recent boundary, or null when empty.
   */
  lastBoundaryAt(): number | null {
    const last = this.entries[this.entries.length - 1];
    if (!last) {
      return null;
    }
    return (last.recordOut ?? last.recordIn).observedAt;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private openEntry(): MutableRecord | undefined {
    const last = this.entries[this.entries.length - 1];
    return last && last.recordOut === null ? last : undefined;
  }

  private *boundaryPoints(): Generator<PendingCutPoint> {
    for (const entry of this.entries) {
      // recordIn of every record after the first is the previous recordOut
      if (entry.sequenceIndex === 0) {
        yield entry.recordIn;
      }
      if (entry.recordOut) {
        yield entry.recordOut;
      }
    }
  }

  private assertMutable(operation: string): void {
    if (this.finalized) {
      throw new InvariantViolationError(`Cannot ${operation}: cut log for session ${this.sessionId} is finalized`);
    }
  }
}
