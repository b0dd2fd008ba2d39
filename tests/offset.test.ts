/**
 * Frame offset compensation tests.
 */

import { describe, it, expect } from 'vitest';
import { InvalidOffsetError } from '../src/core/errors.js';
import {
  FrameOffsetCompensator,
  frameDurationMs,
  framesToMs,
  msToFrames,
  validateFrameOffset,
} from '../src/core/timecode/offset.js';
import { formatTimecode, parseTimecode } from '../src/core/timecode/timecode.js';

const PAL = { frameRate: 25, dropFrame: false };
const NTSC_DF = { frameRate: 29.97, dropFrame: true };

describe('FrameOffsetCompensator', () => {
  it('returns the input unchanged for a zero offset', () => {
    const tc = parseTimecode('01:00:00:00');
    expect(new FrameOffsetCompensator(0, PAL).compensate(tc)).toBe(tc);
  });

  it('pulls a late recorder back', () => {
    const compensator = new FrameOffsetCompensator(-2, PAL);
    expect(formatTimecode(compensator.compensate(parseTimecode('01:00:00:00')))).toBe('00:59:59:23');
  });

  it('pushes an early recorder forward', () => {
    const compensator = new FrameOffsetCompensator(3, PAL);
    expect(formatTimecode(compensator.compensate(parseTimecode('01:00:00:23')))).toBe('01:00:01:01');
  });

  it('rolls back across a drop-frame boundary', () => {
    const compensator = new FrameOffsetCompensator(-5, NTSC_DF);
    expect(formatTimecode(compensator.compensate(parseTimecode('00:10:00;02')), true)).toBe('00:09:59;27');
  });

  it('wraps before midnight', () => {
    const compensator = new FrameOffsetCompensator(-1, PAL);
    expect(formatTimecode(compensator.compensate(parseTimecode('00:00:00:00')))).toBe('23:59:59:24');
  });

  it('is undone by its inverse', () => {
    const cases: Array<[number, typeof PAL, string]> = [
      [-5, NTSC_DF, '00:10:00;02'],
      [3, NTSC_DF, '00:00:59;28'],
      [-2, PAL, '00:00:00:01'],
      [12, PAL, '23:59:59:20'],
    ];

    for (const [offset, options, label] of cases) {
      const compensator = new FrameOffsetCompensator(offset, options);
      const tc = parseTimecode(label);
      expect(compensator.inverse().compensate(compensator.compensate(tc))).toEqual(tc);
    }
  });

  it('rejects an offset that is not a whole frame', () => {
    expect(() => new FrameOffsetCompensator(1.5, PAL)).toThrow(InvalidOffsetError);
  });
});

describe('validateFrameOffset', () => {
  it('accepts offsets inside one timecode day', () => {
    expect(() => {
      validateFrameOffset(2159999, PAL);
    }).not.toThrow();
  });

  it('rejects offsets spanning a full day', () => {
    expect(() => {
      validateFrameOffset(-2160000, PAL);
    }).toThrow(InvalidOffsetError);
  });
});

describe('duration conversion', () => {
  it('converts frames to milliseconds', () => {
    expect(frameDurationMs(25)).toBe(40);
    expect(framesToMs(25, 25)).toBe(1000);
  });

  it('rounds milliseconds to the nearest frame', () => {
    expect(msToFrames(40, 25)).toBe(1);
    expect(msToFrames(59, 25)).toBe(1);
    expect(msToFrames(61, 25)).toBe(2);
    expect(msToFrames(-200, 25)).toBe(-5);
  });

  it('never returns negative zero', () => {
    expect(Object.is(msToFrames(-10, 25), 0)).toBe(true);
  });
});
