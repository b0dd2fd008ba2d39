/**
 * Timecode Tracker
 *
 * Maintains the recorder's recent timecode readings and answers
 * "what timecode was in effect at instant T".
 *
 * - Playing readings are extrapolated with elapsed time at the session frame rate.
 * - Non-playing readings freeze the estimate at the reported value, flagged degraded.
 * - Readings that jump backward are accepted as the new reference and
 *   reported as discontinuities; recorders legitimately loop.
 */

import { pino, type Logger } from 'pino';
import type { TransportState } from '../events/types.js';
import { NoReferenceAvailableError, StaleReferenceError } from '../errors.js';
import { msToFrames } from './offset.js';
import {
  addFrames,
  formatTimecode,
  framesPerDay,
  timecodeToFrames,
  type Timecode,
  type TimecodeOptions,
} from './timecode.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_HISTORY_SIZE = 256;

/** Backward jumps up to this many frames are treated as jitter */
const DISCONTINUITY_TOLERANCE_FRAMES = 2;

// ============================================================================
// Types
// ============================================================================

export type EstimateConfidence = 'trusted' | 'degraded';

/**
 * A single reading from the recorder.
 */
export interface TimecodeReading {
  readonly timecode: Timecode;
  readonly transportState: TransportState;
  readonly observedAt: number;
}

/**
 * Result of estimating the timecode at an instant.
 */
export interface TimecodeEstimate {
  readonly timecode: Timecode;
  readonly confidence: EstimateConfidence;
  /** The reading the estimate was derived from */
  readonly reference: TimecodeReading;
}

export interface Discontinuity {
  readonly expected: Timecode;
  readonly received: Timecode;
  readonly observedAt: number;
  /** Received minus expected, in frames (negative for a backward jump) */
  readonly deltaFrames: number;
}

export interface TimecodeTrackerOptions extends TimecodeOptions {
  /** Maximum distance between an instant and its playing reference */
  stalenessThresholdMs: number;
  /** Readings kept for estimating past instants */
  historySize?: number;
  logger?: Logger;
  onDiscontinuity?: (discontinuity: Discontinuity) => void;
}

// ============================================================================
// Tracker
// ============================================================================

export class TimecodeTracker {
  private readonly options: TimecodeOptions;
  private readonly stalenessThresholdMs: number;
  private readonly historySize: number;
  private readonly logger: Logger;
  private readonly onDiscontinuity: ((discontinuity: Discontinuity) => void) | undefined;

  // Ordered by observedAt
  private readonly history: TimecodeReading[] = [];
  private discontinuityCount = 0;
  private hasPlayed = false;

  constructor(options: TimecodeTrackerOptions) {
    this.options = { frameRate: options.frameRate, dropFrame: options.dropFrame };
    this.stalenessThresholdMs = options.stalenessThresholdMs;
    this.historySize = Math.max(1, options.historySize ?? DEFAULT_HISTORY_SIZE);
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ module: 'tracker' });
    this.onDiscontinuity = options.onDiscontinuity;
  }

  // ---------------------------------------------------------------------------
  // Ingestion
  // ---------------------------------------------------------------------------

  /**
   * Ingest a recorder reading.
   */
  recordTick(timecode: Timecode, transportState: TransportState, observedAt: number): void {
    const reading: TimecodeReading = { timecode, transportState, observedAt };

    this.checkDiscontinuity(reading);

    // Readings normally arrive in order; keep history sorted when they don't.
    let index = this.history.length;
    while (index > 0 && (this.history[index - 1]?.observedAt ?? 0) > observedAt) {
      index--;
    }
    this.history.splice(index, 0, reading);

    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }

    if (transportState === 'playing') {
      this.hasPlayed = true;
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Best-estimate timecode at an instant.
   *
   * Uses the latest reading at or before the instant, or the earliest
   * reading when the instant predates all of them.
   *
   * @throws NoReferenceAvailableError if no playing reading was ever recorded
   * @throws StaleReferenceError if the playing reference is too far from the instant
   */
  estimateAt(instant: number): TimecodeEstimate {
    if (!this.hasPlayed) {
      throw new NoReferenceAvailableError(instant);
    }

    const reference = this.referenceFor(instant);
    const playing = this.playingReferenceFor(instant);

    if (!reference || !playing) {
      throw new NoReferenceAvailableError(instant);
    }

    const ageMs = Math.abs(instant - playing.observedAt);
    if (ageMs > this.stalenessThresholdMs) {
      throw new StaleReferenceError(instant, ageMs, this.stalenessThresholdMs);
    }

    if (reference.transportState !== 'playing') {
      return { timecode: reference.timecode, confidence: 'degraded', reference };
    }

    return {
      timecode: this.extrapolate(reference, instant),
      confidence: 'trusted',
      reference,
    };
  }

  /**
   * Latest reading, if any.
   */
  latest(): TimecodeReading | null {
    return this.history[this.history.length - 1] ?? null;
  }

  getDiscontinuityCount(): number {
    return this.discontinuityCount;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private extrapolate(reference: TimecodeReading, instant: number): Timecode {
    const elapsedFrames = msToFrames(instant - reference.observedAt, this.options.frameRate);
    return addFrames(reference.timecode, elapsedFrames, this.options);
  }

  private referenceFor(instant: number): TimecodeReading | undefined {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const reading = this.history[i];
      if (reading && reading.observedAt <= instant) {
        return reading;
      }
    }
    return this.history[0];
  }

  private playingReferenceFor(instant: number): TimecodeReading | undefined {
    let earliestAfter: TimecodeReading | undefined;

    for (let i = this.history.length - 1; i >= 0; i--) {
      const reading = this.history[i];
      if (!reading || reading.transportState !== 'playing') {
        continue;
      }
      if (reading.observedAt <= instant) {
        return reading;
      }
      earliestAfter = reading;
    }

    return earliestAfter;
  }

  private checkDiscontinuity(reading: TimecodeReading): void {
    const previous = this.latest();
    if (!previous || previous.transportState !== 'playing' || reading.observedAt < previous.observedAt) {
      return;
    }

    const expected = this.extrapolate(previous, reading.observedAt);
    const day = framesPerDay(this.options);
    let deltaFrames =
      timecodeToFrames(reading.timecode, this.options) - timecodeToFrames(expected, this.options);

    // Crossing midnight is forward motion, not a jump.
    if (deltaFrames < -day / 2) {
      deltaFrames += day;
    } else if (deltaFrames > day / 2) {
      deltaFrames -= day;
    }

    if (deltaFrames >= -DISCONTINUITY_TOLERANCE_FRAMES) {
      return;
    }

    this.discontinuityCount++;

    const discontinuity: Discontinuity = {
      expected,
      received: reading.timecode,
      observedAt: reading.observedAt,
      deltaFrames,
    };

    this.logger.warn(
      {
        expected: formatTimecode(expected, this.options.dropFrame),
        received: formatTimecode(reading.timecode, this.options.dropFrame),
        deltaFrames,
      },
      'Timecode moved backward; accepting as new reference'
    );

    this.onDiscontinuity?.(discontinuity);
  }
}
