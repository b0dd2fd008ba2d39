/**
 * Frame offset compensation.
 *
 * Recorders report timecode with a constant transport and network latency
 * relative to the switcher. A fixed, signed frame offset configured per
 * session cancels it: positive when the recorder runs ahead, negative when
 * it lags behind.
 */

import { InvalidOffsetError } from '../errors.js';
import { addFrames, framesPerDay, type Timecode, type TimecodeOptions } from './timecode.js';

// ============================================================================
// Constants
// ============================================================================

const MILLISECONDS_PER_SECOND = 1000;

// ============================================================================
// Compensator
// ============================================================================

/**
 * Applies a fixed frame offset to every timecode it is given.
 *
 * The offset is validated once, at construction. `compensate` itself never
 * fails and keeps no state.
 *
 * @example
 * // Recorder reports 2 frames late at 25fps
 * const compensator = new FrameOffsetCompensator(-2, { frameRate: 25, dropFrame: false });
 * compensator.compensate(parseTimecode('01:00:00:00')); // 00:59:59:23
 */
export class FrameOffsetCompensator {
  readonly offsetFrames: number;
  readonly options: TimecodeOptions;

  constructor(offsetFrames: number, options: TimecodeOptions) {
    validateFrameOffset(offsetFrames, options);
    this.offsetFrames = offsetFrames;
    this.options = options;
  }

  compensate(tc: Timecode): Timecode {
    if (this.offsetFrames === 0) {
      return tc;
    }
    return addFrames(tc, this.offsetFrames, this.options);
  }

  /**
   * Compensator that undoes this one.
   */
  inverse(): FrameOffsetCompensator {
    return new FrameOffsetCompensator(-this.offsetFrames, this.options);
  }
}

/**
 * Check that an offset can be applied without leaving the 24-hour range.
 *
 * @throws InvalidOffsetError when the offset is not a whole number of frames
 * or spans a full timecode day or more.
 */
export function validateFrameOffset(offsetFrames: number, options: TimecodeOptions): void {
  if (!Number.isInteger(offsetFrames)) {
    throw new InvalidOffsetError(`Frame offset must be a whole number of frames, got ${String(offsetFrames)}`);
  }

  const day = framesPerDay(options);
  if (Math.abs(offsetFrames) >= day) {
    throw new InvalidOffsetError(
      `Frame offset ${String(offsetFrames)} exceeds the ${String(day - 1)} frames ` +
      `representable in 24 hours at ${String(options.frameRate)} fps`
    );
  }
}

// ============================================================================
// Duration Conversion
// ============================================================================

/**
 * Calculate the frame duration in milliseconds for a given frame rate.
 */
export function frameDurationMs(frameRate: number): number {
  return MILLISECONDS_PER_SECOND / frameRate;
}

/**
 * Convert a frame count to milliseconds.
 */
export function framesToMs(frames: number, frameRate: number): number {
  return frames * frameDurationMs(frameRate);
}

/**
 * Convert milliseconds to frame count (rounded to nearest frame).
 * Negative durations give negative counts.
 */
export function msToFrames(ms: number, frameRate: number): number {
  const frames = Math.round(ms / frameDurationMs(frameRate));
  // Avoid -0 leaking into frame arithmetic
  return frames === 0 ? 0 : frames;
}
