/**
 * Event journal and replay tests.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CutEngineConfig } from '../src/core/engine/engine.js';
import { replayEvents, replayJournal } from '../src/core/events/replay.js';
import { EventStore, EventStoreError } from '../src/core/events/store.js';
import { sourceChanged, timecodeTick, type EngineEvent, type SessionEvent } from '../src/core/events/types.js';
import { addFrames, formatTimecode, parseTimecode } from '../src/core/timecode/timecode.js';

const CONFIG: CutEngineConfig = {
  frameRate: 25,
  dropFrame: false,
  frameOffset: 0,
  stalenessThresholdMs: 15000,
  rejectEmptyExport: false,
  channelCapacity: 1024,
};

const CAM_A = { id: '1', label: 'Camera A' };
const CAM_B = { id: '2', label: 'Camera B' };

function session(action: 'start' | 'stop', sessionId: string, observedAt: number): SessionEvent {
  return { type: 'session', action, sessionId, observedAt };
}

function showEvents(): EngineEvent[] {
  return [
    session('start', 'show', 0),
    timecodeTick(parseTimecode('01:00:00:00'), 'playing', 1000),
    sourceChanged(CAM_A, 1000),
    sourceChanged(CAM_B, 11000),
    session('stop', 'show', 21000),
  ];
}

describe('EventStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cut-journal-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes events as JSONL and reads them back', async () => {
    const store = new EventStore({ logDirectory: dir, rotateDaily: false });
    for (const event of showEvents()) {
      await store.append(event);
    }
    await store.close();

    expect(store.getCurrentLogPath()).toBe(join(dir, 'events-all.jsonl'));
    expect(store.getEventsWritten()).toBe(5);

    const events = await store.getEvents();
    expect(events).toEqual(showEvents());
  });

  it('filters by type and time range', async () => {
    const store = new EventStore({ logDirectory: dir, rotateDaily: false });
    for (const event of showEvents()) {
      await store.append(event);
    }

    const changes = await store.getEvents({ type: 'source_changed', from: 5000 });
    expect(changes).toEqual([sourceChanged(CAM_B, 11000)]);
  });

  it('skips malformed lines', async () => {
    const path = join(dir, 'events-all.jsonl');
    const good = JSON.stringify({
      id: 'a',
      type: 'source_changed',
      observedAt: 1000,
      data: { source: { id: '1', label: 'Camera A' } },
    });
    await writeFile(path, [good, '{not json', JSON.stringify({ id: 'b', type: 'other' }), ''].join('\n'));

    const events = await new EventStore({ logDirectory: dir }).loadFromFile(path);
    expect(events).toEqual([sourceChanged(CAM_A, 1000)]);
  });

  it('refuses writes after close', async () => {
    const store = new EventStore({ logDirectory: dir });
    await store.close();

    await expect(store.append(sourceChanged(CAM_A, 0))).rejects.toThrow(EventStoreError);
  });
});

describe('replayEvents', () => {
  it('rebuilds the cut log of a recorded session', async () => {
    const result = await replayEvents(showEvents(), CONFIG);

    expect(result.sessions).toHaveLength(1);
    expect(result.incompleteSessionId).toBeNull();
    expect(result.eventsReplayed).toBe(5);

    const records = result.sessions[0]?.records ?? [];
    expect(records.map((r) => r.source.id)).toEqual(['1', '2']);
    expect(records.map((r) => (r.recordOut?.timecode ? formatTimecode(r.recordOut.timecode) : null))).toEqual([
      '01:00:10:00',
      '01:00:20:00',
    ]);
  });

  it('closes a session whose stop was never written at the next start', async () => {
    const events: EngineEvent[] = [
      session('start', 'first', 0),
      timecodeTick(parseTimecode('01:00:00:00'), 'playing', 1000),
      sourceChanged(CAM_A, 1000),
      session('start', 'second', 5000),
      sourceChanged(CAM_B, 6000),
    ];

    const result = await replayEvents(events, CONFIG);

    expect(result.sessions.map((s) => s.sessionId)).toEqual(['first']);
    expect(result.sessions[0]?.finalizedAt).toBe(5000);
    expect(result.incompleteSessionId).toBe('second');
  });

  it('replays a journal longer than the engine channels hold', async () => {
    const start = parseTimecode('01:00:00:00');
    const events: EngineEvent[] = [session('start', 'long', 0)];
    for (let i = 0; i < 2500; i++) {
      const observedAt = i * 80;
      events.push(timecodeTick(addFrames(start, i * 2, { frameRate: 25, dropFrame: false }), 'playing', observedAt));
      if (observedAt === 4960) {
        events.push(sourceChanged(CAM_A, 5000));
      } else if (observedAt === 150000) {
        events.push(sourceChanged(CAM_B, 150000));
      }
    }
    events.push(session('stop', 'long', 200000));

    const result = await replayEvents(events, CONFIG);
    const records = result.sessions[0]?.records ?? [];

    expect(records.map((r) => (r.recordIn.timecode ? formatTimecode(r.recordIn.timecode) : null))).toEqual([
      '01:00:05:00',
      '01:02:30:00',
    ]);
    expect(records[1]?.recordOut?.timecode ? formatTimecode(records[1].recordOut.timecode) : null).toBe('01:03:20:00');
  });
});

describe('replayJournal', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cut-replay-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the last completed session in a journal file', async () => {
    const store = new EventStore({ logDirectory: dir, rotateDaily: false });
    for (const event of showEvents()) {
      await store.append(event);
    }
    await store.close();

    const log = await replayJournal(store.getCurrentLogPath(), CONFIG);
    expect(log.sessionId).toBe('show');
    expect(log.records).toHaveLength(2);
  });

  it('fails when no session completed', async () => {
    const store = new EventStore({ logDirectory: dir, rotateDaily: false });
    await store.append(session('start', 'open', 0));
    await store.close();

    await expect(replayJournal(store.getCurrentLogPath(), CONFIG)).rejects.toThrow('contains no completed session');
  });
});
