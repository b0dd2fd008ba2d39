/**
 * Journal replay: feeds recorded events through a fresh engine so the cut log
 * of a past session can be rebuilt and exported again.
 */

import type { Logger } from 'pino';
import type { FinalizedCutLog } from '../cutlog/cut-log.js';
import { CutEngine, type CutEngineConfig } from '../engine/engine.js';
import { EventStore } from './store.js';
import type { EngineEvent } from './types.js';

export interface ReplayResult {
  /** Every session that reached a stop, in journal order */
  sessions: FinalizedCutLog[];
  /** Session started but never stopped, if the journal ends mid-session */
  incompleteSessionId: string | null;
  eventsReplayed: number;
}

export interface ReplayOptions {
  logger?: Logger;
}

/**
 * Replay journal events in the order they were written.
 */
export async function replayEvents(
  events: readonly EngineEvent[],
  config: CutEngineConfig,
  options: ReplayOptions = {}
): Promise<ReplayResult> {
  const engine = new CutEngine({ config, ...(options.logger ? { logger: options.logger } : {}) });
  const sessions: FinalizedCutLog[] = [];
  let openSessionId: string | null = null;

  // The journal is already in applied order, so each event is drained before
  // the next is queued and a long journal never overflows the channels.
  for (const event of events) {
    switch (event.type) {
      case 'timecode_tick':
        engine.pushTimecodeTick(event);
        await engine.flush();
        break;
      case 'source_changed':
        engine.pushSourceChanged(event);
        await engine.flush();
        break;
      case 'session':
        if (event.action === 'start') {
          if (openSessionId !== null) {
            // Journal lost the stop; finalize what was there at the restart instant
            sessions.push(await engine.stopSession(event.observedAt));
          }
          engine.startSession(event.sessionId, event.observedAt);
          openSessionId = event.sessionId;
        } else if (openSessionId === event.sessionId) {
          sessions.push(await engine.stopSession(event.observedAt));
          openSessionId = null;
        }
        break;
    }
  }

  await engine.flush();

  return { sessions, incompleteSessionId: openSessionId, eventsReplayed: events.length };
}

/**
 * Replay a JSONL journal file and return the last complete session.
 *
 * @throws Error if the journal holds no complete session
 */
export async function replayJournal(
  path: string,
  config: CutEngineConfig,
  options: ReplayOptions = {}
): Promise<FinalizedCutLog> {
  const store = new EventStore({
    logDirectory: '.',
    ...(options.logger ? { logger: options.logger } : {}),
  });
  const events = await store.loadFromFile(path);
  const result = await replayEvents(events, config, options);

  const last = result.sessions[result.sessions.length - 1];
  if (!last) {
    throw new Error(`Journal ${path} contains no completed session`);
  }
  return last;
}
