/**
 * Timecode utilities for frame-accurate cut logging.
 * Handles SMPTE timecode with drop-frame support and 24-hour rollover.
 */

// ============================================================================
// Types
// ============================================================================

export interface Timecode {
  hours: number;
  minutes: number;
  seconds: number;
  frames: number;
}

export interface TimecodeOptions {
  frameRate: number;
  dropFrame: boolean;
}

// ============================================================================
// Constants
// ============================================================================

const DROP_FRAME_RATES = [29.97, 59.94];

const HOURS_PER_DAY = 24;

// ============================================================================
// Frame Rate Helpers
// ============================================================================

/**
 * Whether drop-frame counting applies for these options.
 */
export function isDropFrame(options: TimecodeOptions): boolean {
  return options.dropFrame && DROP_FRAME_RATES.includes(options.frameRate);
}

/**
 * Frame numbers skipped at the start of each non-tenth minute.
 * 2 at 29.97, 4 at 59.94, 0 when not drop-frame.
 */
export function droppedFramesPerMinute(options: TimecodeOptions): number {
  if (!isDropFrame(options)) {
    return 0;
  }
  return Math.round(options.frameRate * 0.066666);
}

/**
 * Number of counted frames in one 24-hour timecode day.
 */
export function framesPerDay(options: TimecodeOptions): number {
  const nominal = Math.round(options.frameRate);
  const drop = droppedFramesPerMinute(options);
  const framesPer10Minutes = nominal * 600 - drop * 9;
  return framesPer10Minutes * 6 * HOURS_PER_DAY;
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Parse timecode string to Timecode object.
 * Supports both drop-frame (;) and non-drop-frame (:) separators.
 */
export function parseTimecode(tc: string): Timecode {
  const match = tc.match(/^(\d{2}):(\d{2}):(\d{2})[:;](\d{2})$/);

  if (!match) {
    throw new Error(`Invalid timecode format: ${tc}. Expected HH:MM:SS:FF or HH:MM:SS;FF`);
  }

  const [, hours = '0', minutes = '0', seconds = '0', frames = '0'] = match;

  return {
    hours: parseInt(hours, 10),
    minutes: parseInt(minutes, 10),
    seconds: parseInt(seconds, 10),
    frames: parseInt(frames, 10),
  };
}

/**
 * Whether a string looks like SMPTE timecode.
 */
export function isTimecodeString(value: string): boolean {
  return /^\d{2}:\d{2}:\d{2}[:;]\d{2}$/.test(value);
}

/**
 * Format Timecode object to string.
 */
export function formatTimecode(tc: Timecode, dropFrame: boolean = false): string {
  const separator = dropFrame ? ';' : ':';
  const pad = (n: number) => n.toString().padStart(2, '0');

  return `${pad(tc.hours)}:${pad(tc.minutes)}:${pad(tc.seconds)}${separator}${pad(tc.frames)}`;
}

/**
 * Convert timecode to total frame count since 00:00:00:00.
 * Accounts for drop-frame timecode where applicable.
 */
export function timecodeToFrames(tc: Timecode, options: TimecodeOptions): number {
  const nominalFrameRate = Math.round(options.frameRate);

  let totalFrames =
    tc.hours * 3600 * nominalFrameRate +
    tc.minutes * 60 * nominalFrameRate +
    tc.seconds * nominalFrameRate +
    tc.frames;

  const drop = droppedFramesPerMinute(options);
  if (drop > 0) {
    const totalMinutes = tc.hours * 60 + tc.minutes;
    totalFrames -= drop * (totalMinutes - Math.floor(totalMinutes / 10));
  }

  return totalFrames;
}

/**
 * Convert a frame count to timecode.
 * Counts outside one day wrap around, so negative counts land before midnight.
 */
export function framesToTimecode(totalFrames: number, options: TimecodeOptions): Timecode {
  const nominalFrameRate = Math.round(options.frameRate);
  const day = framesPerDay(options);

  let frames = ((Math.round(totalFrames) % day) + day) % day;

  const drop = droppedFramesPerMinute(options);
  if (drop > 0) {
    // Re-insert the skipped frame numbers so plain division yields the label.
    const framesPerMinute = nominalFrameRate * 60 - drop;
    const framesPer10Minutes = nominalFrameRate * 600 - drop * 9;

    const tenMinuteBlocks = Math.floor(frames / framesPer10Minutes);
    const remainder = frames % framesPer10Minutes;

    frames += drop * 9 * tenMinuteBlocks;
    if (remainder > drop) {
      frames += drop * Math.floor((remainder - drop) / framesPerMinute);
    }
  }

  const framesPerHour = nominalFrameRate * 3600;
  const framesPerMinute = nominalFrameRate * 60;

  const hours = Math.floor(frames / framesPerHour);
  frames %= framesPerHour;

  const minutes = Math.floor(frames / framesPerMinute);
  frames %= framesPerMinute;

  const seconds = Math.floor(frames / nominalFrameRate);
  frames %= nominalFrameRate;

  return {
    hours,
    minutes,
    seconds,
    frames,
  };
}

/**
 * Add a signed number of frames, rolling over at 24 hours.
 */
export function addFrames(tc: Timecode, frames: number, options: TimecodeOptions): Timecode {
  return framesToTimecode(timecodeToFrames(tc, options) + frames, options);
}

/**
 * Calculate duration between two timecodes in frames.
 * An end before the start is taken to have crossed midnight.
 */
export function durationInFrames(start: Timecode, end: Timecode, options: TimecodeOptions): number {
  const diff = timecodeToFrames(end, options) - timecodeToFrames(start, options);
  return diff < 0 ? diff + framesPerDay(options) : diff;
}

/**
 * Convert wall clock time to timecode.
 * Uses time of day as timecode value.
 */
export function wallClockToTimecode(date: Date, options: TimecodeOptions): Timecode {
  const msSinceMidnight =
    date.getHours() * 3_600_000 +
    date.getMinutes() * 60_000 +
    date.getSeconds() * 1000 +
    date.getMilliseconds();

  // Real elapsed frames, so drop-frame labels track the clock.
  return framesToTimecode(Math.floor((msSinceMidnight / 1000) * options.frameRate), options);
}
