/**
 * Cut log tests.
 */

import { describe, it, expect } from 'vitest';
import { CutLog, PendingCutPoint, recordDuration, unresolvedRecords } from '../src/core/cutlog/cut-log.js';
import { InvariantViolationError } from '../src/core/errors.js';
import { parseTimecode } from '../src/core/timecode/timecode.js';

const OPTIONS = { frameRate: 25, dropFrame: false };
const CAM1 = { id: '1', label: 'Camera 1' };
const CAM2 = { id: '2', label: 'Camera 2' };

function resolvedPoint(observedAt: number, label: string): PendingCutPoint {
  return new PendingCutPoint(observedAt, { timecode: parseTimecode(label), confidence: 'trusted' });
}

describe('CutLog', () => {
  it('shares the boundary between adjacent records', () => {
    const log = new CutLog('s1', OPTIONS);
    const first = resolvedPoint(1000, '01:00:00:00');
    const boundary = new PendingCutPoint(11000);

    log.append({ sequenceIndex: 0, source: CAM1, recordIn: first });
    log.closeOpen(boundary);
    log.append({ sequenceIndex: 1, source: CAM2, recordIn: boundary });

    // Resolving later fills both sides at once
    log.resolvePending(() => ({ timecode: parseTimecode('01:00:10:00'), confidence: 'trusted' }));

    const [a, b] = log.records();
    expect(a?.recordOut).toBe(b?.recordIn);
    expect(a?.recordOut?.timecode).toEqual(parseTimecode('01:00:10:00'));
  });

  it('refuses to append while a record is open', () => {
    const log = new CutLog('s1', OPTIONS);
    log.append({ sequenceIndex: 0, source: CAM1, recordIn: resolvedPoint(1000, '01:00:00:00') });

    expect(() => {
      log.append({ sequenceIndex: 1, source: CAM2, recordIn: resolvedPoint(2000, '01:00:01:00') });
    }).toThrow(InvariantViolationError);
  });

  it('refuses a gap in the sequence', () => {
    const log = new CutLog('s1', OPTIONS);
    expect(() => {
      log.append({ sequenceIndex: 1, source: CAM1, recordIn: resolvedPoint(1000, '01:00:00:00') });
    }).toThrow(InvariantViolationError);
  });

  it('refuses a record that does not start at the previous out point', () => {
    const log = new CutLog('s1', OPTIONS);
    log.append({ sequenceIndex: 0, source: CAM1, recordIn: resolvedPoint(1000, '01:00:00:00') });
    log.closeOpen(resolvedPoint(2000, '01:00:01:00'));

    expect(() => {
      log.append({ sequenceIndex: 1, source: CAM2, recordIn: resolvedPoint(2000, '01:00:01:00') });
    }).toThrow(InvariantViolationError);
  });

  it('refuses to close before the record started', () => {
    const log = new CutLog('s1', OPTIONS);
    log.append({ sequenceIndex: 0, source: CAM1, recordIn: resolvedPoint(2000, '01:00:01:00') });

    expect(() => {
      log.closeOpen(resolvedPoint(1000, '01:00:00:00'));
    }).toThrow(InvariantViolationError);
  });

  it('refuses to close when nothing is open', () => {
    expect(() => {
      new CutLog('s1', OPTIONS).closeOpen(resolvedPoint(1000, '01:00:00:00'));
    }).toThrow(InvariantViolationError);
  });

  it('counts points the resolver cannot answer', () => {
    const log = new CutLog('s1', OPTIONS);
    log.append({ sequenceIndex: 0, source: CAM1, recordIn: new PendingCutPoint(1000) });
    log.closeOpen(new PendingCutPoint(2000));

    expect(log.resolvePending(() => null)).toBe(2);
    expect(unresolvedRecords(log.records())).toHaveLength(1);
    expect(log.records()[0]?.recordIn.confidence).toBe('degraded');
  });

  it('finalizes once and then rejects mutation', () => {
    const log = new CutLog('s1', OPTIONS);
    log.append({ sequenceIndex: 0, source: CAM1, recordIn: resolvedPoint(1000, '01:00:00:00') });
    log.closeOpen(resolvedPoint(2000, '01:00:01:00'));

    const finalized = log.finalize(5000);
    expect(log.finalize(9000)).toBe(finalized);
    expect(finalized.finalizedAt).toBe(5000);
    expect(Object.isFrozen(finalized.records)).toBe(true);
    expect(() => {
      log.closeOpen(resolvedPoint(3000, '01:00:02:00'));
    }).toThrow(InvariantViolationError);
  });

  it('refuses to finalize with an open record', () => {
    const log = new CutLog('s1', OPTIONS);
    log.append({ sequenceIndex: 0, source: CAM1, recordIn: resolvedPoint(1000, '01:00:00:00') });

    expect(() => log.finalize()).toThrow(InvariantViolationError);
  });

  it('reports the open record and last boundary', () => {
    const log = new CutLog('s1', OPTIONS);
    expect(log.lastBoundaryAt()).toBeNull();

    log.append({ sequenceIndex: 0, source: CAM1, recordIn: resolvedPoint(1000, '01:00:00:00') });
    expect(log.openRecord()).toEqual({ sequenceIndex: 0, source: CAM1 });
    expect(log.lastBoundaryAt()).toBe(1000);
  });
});

describe('recordDuration', () => {
  it('is null while open and counts frames once closed', () => {
    const log = new CutLog('s1', OPTIONS);
    log.append({ sequenceIndex: 0, source: CAM1, recordIn: resolvedPoint(1000, '01:00:00:00') });
    expect(recordDuration(log.records()[0] ?? missing(), OPTIONS)).toBeNull();

    log.closeOpen(resolvedPoint(11000, '01:00:10:00'));
    expect(recordDuration(log.records()[0] ?? missing(), OPTIONS)).toBe(250);
  });
});

function missing(): never {
  throw new Error('expected a record');
}
