/**
 * Cut Correlator
 *
 * State machine that turns program source changes into cut records:
 *
 *   idle → armed → recording → stopped
 *
 * Every boundary point records the raw observed instant first and is
 * resolved to a compensated timecode as soon as the tracker can answer.
 * Points the tracker can't answer yet are retried on every later event
 * and at stop.
 */

import { pino, type Logger } from 'pino';
import {
  CutLog,
  PendingCutPoint,
  type CutPointResolver,
  type CutRecord,
  type FinalizedCutLog,
} from '../cutlog/cut-log.js';
import { isReferenceUnavailable, SessionStateError } from '../errors.js';
import type { SourceChangedEvent } from '../events/types.js';
import { formatTimecode } from '../timecode/timecode.js';
import type { Session } from '../session/session.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What a source change did to the log.
 */
export type CorrelationOutcome =
  | { kind: 'opened'; record: CutRecord }
  | { kind: 'cut'; closed: CutRecord; opened: CutRecord }
  | { kind: 'duplicate' }
  | { kind: 'out_of_order'; lastAppliedAt: number };

export interface CutCorrelatorOptions {
  logger?: Logger;
}

// ============================================================================
// Correlator
// ============================================================================

export class CutCorrelator {
  private readonly logger: Logger;

  constructor(options: CutCorrelatorOptions = {}) {
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ module: 'correlator' });
  }

  /**
   * Arm a session with a fresh cut log.
   */
  start(session: Session, startedAt: number = Date.now()): void {
    if (session.isActive()) {
      this.logger.info({ sessionId: session.id }, 'Restarting active session; previous cuts discarded');
    }

    session.cutLog = new CutLog(session.id, session.timecodeOptions);
    session.finalized = null;
    session.startedAt = startedAt;
    session.metrics.cuts = 0;
    session.metrics.duplicatesSuppressed = 0;
    session.metrics.outOfOrderDiscarded = 0;
    session.metrics.unresolvedPoints = 0;
    session.state = 'armed';

    this.logger.info({ sessionId: session.id }, 'Session armed');
  }

  /**
   * Apply a program source change.
   *
   * @throws SessionStateError when the session is not armed or recording
   */
  onSourceChanged(session: Session, event: SourceChangedEvent): CorrelationOutcome {
    if (!session.isActive()) {
      throw new SessionStateError(`Session ${session.id} is ${session.state}; source changes are not accepted`);
    }

    const log = session.cutLog;
    const lastAppliedAt = log.lastBoundaryAt();

    if (lastAppliedAt !== null && event.observedAt < lastAppliedAt) {
      session.metrics.outOfOrderDiscarded++;
      this.logger.warn(
        { sourceId: event.source.id, observedAt: event.observedAt, lastAppliedAt },
        'Discarding source change older than the last applied cut'
      );
      return { kind: 'out_of_order', lastAppliedAt };
    }

    const open = log.openRecord();
    if (open && open.source.id === event.source.id) {
      session.metrics.duplicatesSuppressed++;
      this.logger.debug({ sourceId: event.source.id }, 'Duplicate source change suppressed');
      return { kind: 'duplicate' };
    }

    this.resolvePending(session);

    const point = new PendingCutPoint(event.observedAt, this.resolverFor(session)(event.observedAt));

    if (!open) {
      log.append({ sequenceIndex: log.length, source: event.source, recordIn: point });
      session.state = 'recording';
      session.metrics.cuts++;
      this.refreshUnresolved(session);

      const records = log.records();
      const opened = records[records.length - 1];
      if (!opened) {
        throw new SessionStateError(`Session ${session.id} lost its first record`);
      }
      this.logCut(session, opened);
      return { kind: 'opened', record: opened };
    }

    log.closeOpen(point);
    log.append({ sequenceIndex: log.length, source: event.source, recordIn: point });
    session.metrics.cuts++;
    this.refreshUnresolved(session);

    const records = log.records();
    const closed = records[records.length - 2];
    const opened = records[records.length - 1];
    if (!closed || !opened) {
      throw new SessionStateError(`Session ${session.id} lost records while cutting`);
    }
    this.logCut(session, opened);
    return { kind: 'cut', closed, opened };
  }

  /**
   * Close the open record and finalize the log.
   *
   * @throws SessionStateError unless the session is armed or recording
   */
  stop(session: Session, stoppedAt: number = Date.now()): FinalizedCutLog {
    if (!session.isActive()) {
      throw new SessionStateError(`Session ${session.id} is ${session.state} and cannot be stopped`);
    }

    const log = session.cutLog;
    this.resolvePending(session);

    if (log.openRecord()) {
      // A stop can't end a record before it started
      const lastAt = log.lastBoundaryAt() ?? stoppedAt;
      const at = Math.max(stoppedAt, lastAt);
      log.closeOpen(new PendingCutPoint(at, this.resolverFor(session)(at)));
    }

    this.refreshUnresolved(session);
    const finalized = log.finalize(stoppedAt);

    session.finalized = finalized;
    session.state = 'stopped';

    if (session.metrics.unresolvedPoints > 0) {
      this.logger.warn(
        { sessionId: session.id, unresolved: session.metrics.unresolvedPoints },
        'Session stopped with unresolved cut points'
      );
    }
    this.logger.info({ sessionId: session.id, records: finalized.records.length }, 'Session stopped');

    return finalized;
  }

  /**
   * Retry every unresolved point in the session's log.
   */
  resolvePending(session: Session): number {
    const remaining = session.cutLog.resolvePending(this.resolverFor(session));
    session.metrics.unresolvedPoints = remaining;
    return remaining;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private resolverFor(session: Session): CutPointResolver {
    return (observedAt) => {
      try {
        const estimate = session.tracker.estimateAt(observedAt);
        return {
          timecode: session.compensator.compensate(estimate.timecode),
          confidence: estimate.confidence,
        };
      } catch (error) {
        if (isReferenceUnavailable(error)) {
          this.logger.debug({ observedAt, reason: error.code }, 'Cut point deferred');
          return null;
        }
        throw error;
      }
    };
  }

  private refreshUnresolved(session: Session): void {
    session.metrics.unresolvedPoints = unresolvedCount(session.cutLog.records());
  }

  private logCut(session: Session, record: CutRecord): void {
    const tc = record.recordIn.timecode;
    this.logger.info(
      {
        sessionId: session.id,
        index: record.sequenceIndex,
        source: record.source.label,
        recordIn: tc ? formatTimecode(tc, session.config.dropFrame) : null,
      },
      'Cut'
    );
  }
}

function unresolvedCount(records: readonly CutRecord[]): number {
  let count = 0;
  for (const record of records) {
    if (record.sequenceIndex === 0 && record.recordIn.timecode === null) count++;
    if (record.recordOut && record.recordOut.timecode === null) count++;
  }
  return count;
}
