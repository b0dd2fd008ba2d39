/**
 * Session: the lifetime boundary of one cut log.
 *
 * Holds everything the correlator mutates, so that sequential sessions never
 * share state through the process.
 */

import type { Logger } from 'pino';
import { CutLog, type FinalizedCutLog } from '../cutlog/cut-log.js';
import { generateEventId } from '../events/types.js';
import { FrameOffsetCompensator } from '../timecode/offset.js';
import type { TimecodeOptions } from '../timecode/timecode.js';
import { TimecodeTracker, type Discontinuity, type TimecodeReading } from '../timecode/tracker.js';

// ============================================================================
// Types
// ============================================================================

export type SessionState = 'idle' | 'armed' | 'recording' | 'stopped';

/**
 * Engine-level settings a session is created with.
 */
export interface SessionConfig extends TimecodeOptions {
  frameOffset: number;
  stalenessThresholdMs: number;
  historySize?: number;
}

export interface SessionMetrics {
  cuts: number;
  duplicatesSuppressed: number;
  outOfOrderDiscarded: number;
  unresolvedPoints: number;
}

export interface SessionOptions {
  id?: string;
  logger?: Logger;
  onDiscontinuity?: (discontinuity: Discontinuity) => void;
  /** Readings carried over from a previous session */
  seedReadings?: readonly TimecodeReading[];
}

// ============================================================================
// Session
// ============================================================================

export class Session {
  readonly id: string;
  readonly config: SessionConfig;
  readonly tracker: TimecodeTracker;
  readonly compensator: FrameOffsetCompensator;

  state: SessionState = 'idle';
  cutLog: CutLog;
  startedAt: number | null = null;
  finalized: FinalizedCutLog | null = null;

  readonly metrics: SessionMetrics = {
    cuts: 0,
    duplicatesSuppressed: 0,
    outOfOrderDiscarded: 0,
    unresolvedPoints: 0,
  };

  /**
   * @throws InvalidOffsetError when the frame offset cannot be applied at this rate
   */
  constructor(config: SessionConfig, options: SessionOptions = {}) {
    this.id = options.id ?? generateEventId();
    this.config = config;

    const timecodeOptions: TimecodeOptions = { frameRate: config.frameRate, dropFrame: config.dropFrame };
    this.compensator = new FrameOffsetCompensator(config.frameOffset, timecodeOptions);

    this.tracker = new TimecodeTracker({
      ...timecodeOptions,
      stalenessThresholdMs: config.stalenessThresholdMs,
      ...(config.historySize !== undefined ? { historySize: config.historySize } : {}),
      ...(options.logger ? { logger: options.logger } : {}),
      ...(options.onDiscontinuity ? { onDiscontinuity: options.onDiscontinuity } : {}),
    });

    for (const reading of options.seedReadings ?? []) {
      this.tracker.recordTick(reading.timecode, reading.transportState, reading.observedAt);
    }

    this.cutLog = new CutLog(this.id, timecodeOptions);
  }

  get timecodeOptions(): TimecodeOptions {
    return this.cutLog.options;
  }

  isActive(): boolean {
    return this.state === 'armed' || this.state === 'recording';
  }
}
