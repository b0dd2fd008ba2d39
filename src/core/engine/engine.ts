/**
 * Cut Engine
 *
 * Single writer for tracker and cut log state. Device callbacks only enqueue;
 * a chained drain applies queued events in observed-time order, one drain at
 * a time.
 */

import { EventEmitter } from 'node:events';
import { pino, type Logger } from 'pino';
import { CutCorrelator, type CorrelationOutcome } from '../correlator/correlator.js';
import type { CutRecord, FinalizedCutLog } from '../cutlog/cut-log.js';
import { NoReferenceAvailableError, SessionStateError } from '../errors.js';
import type {
  EngineEvent,
  SessionEvent,
  SourceChangedEvent,
  TimecodeTickEvent,
} from '../events/types.js';
import { Session, type SessionConfig, type SessionState } from '../session/session.js';
import type { Discontinuity, TimecodeEstimate, TimecodeReading } from '../timecode/tracker.js';
import { BoundedChannel } from './channel.js';

// ============================================================================
// Types
// ============================================================================

export interface CutEngineConfig extends SessionConfig {
  rejectEmptyExport: boolean;
  channelCapacity: number;
}

/**
 * Anything that can persist applied events. EventStore satisfies it.
 */
export interface EventJournal {
  append(event: EngineEvent): Promise<void>;
}

export interface CutEngineOptions {
  config: CutEngineConfig;
  logger?: Logger;
  journal?: EventJournal;
}

export interface EngineMetrics {
  state: SessionState;
  sessionId: string | null;
  cuts: number;
  duplicatesSuppressed: number;
  outOfOrderDiscarded: number;
  unresolvedPoints: number;
  /** Source changes received while no session was active */
  droppedAfterStop: number;
  switcherOverflow: number;
  recorderOverflow: number;
  discontinuities: number;
  eventsApplied: number;
}

export interface CutEngineEvents {
  cut: (outcome: Extract<CorrelationOutcome, { kind: 'opened' | 'cut' }>, sessionId: string) => void;
  session: (event: SessionEvent, finalized: FinalizedCutLog | null) => void;
  discontinuity: (discontinuity: Discontinuity, sessionId: string) => void;
  error: (error: Error) => void;
}

type CutEngineEventKey = keyof CutEngineEvents;

class TypedEventEmitter extends EventEmitter {
  override on<K extends CutEngineEventKey>(event: K, listener: CutEngineEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends CutEngineEventKey>(event: K, listener: CutEngineEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends CutEngineEventKey>(
    event: K,
    ...args: Parameters<CutEngineEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

// ============================================================================
// Engine
// ============================================================================

/**
 * @example
 * const engine = new CutEngine({ config });
 * switcher.on('sourceChanged', (e) => engine.pushSourceChanged(e));
 * recorder.on('timecodeTick', (e) => engine.pushTimecodeTick(e));
 *
 * engine.startSession();
 * // ...
 * const log = await engine.stopSession();
 * await writeFile('show.edl', exportEdl(log, edlConfig));
 */
export class CutEngine extends TypedEventEmitter {
  readonly config: CutEngineConfig;

  private readonly baseLogger: Logger;
  private readonly logger: Logger;
  private readonly correlator: CutCorrelator;
  private readonly journal: EventJournal | undefined;

  private session: Session | null = null;
  private lastFinalized: FinalizedCutLog | null = null;
  private stopping = false;

  private switcherChannel: BoundedChannel<SourceChangedEvent>;
  private recorderChannel: BoundedChannel<TimecodeTickEvent>;

  private drainQueue: Promise<void> = Promise.resolve();
  private drainScheduled = false;
  private fault: Error | null = null;

  // Most recent reading, carried into the next session's tracker
  private lastReading: TimecodeReading | null = null;

  private droppedAfterStop = 0;
  private eventsApplied = 0;

  constructor(options: CutEngineOptions) {
    super();
    this.config = options.config;
    this.baseLogger = options.logger ?? pino({ level: 'silent' });
    this.logger = this.baseLogger.child({ module: 'engine' });
    this.correlator = new CutCorrelator({ logger: this.baseLogger });
    this.journal = options.journal;
    this.switcherChannel = new BoundedChannel(this.config.channelCapacity);
    this.recorderChannel = new BoundedChannel(this.config.channelCapacity);
  }

  // ---------------------------------------------------------------------------
  // Session Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start a new session with a fresh cut log.
   *
   * @throws SessionStateError if a session is already active
   * @throws InvalidOffsetError if the configured frame offset is out of range
   */
  startSession(sessionId?: string, startedAt: number = Date.now()): Session {
    if (this.session?.isActive()) {
      throw new SessionStateError(`Session ${this.session.id} is still ${this.session.state}`);
    }
    this.assertHealthy();

    const session = new Session(this.config, {
      ...(sessionId !== undefined ? { id: sessionId } : {}),
      logger: this.baseLogger,
      seedReadings: this.lastReading ? [this.lastReading] : [],
      onDiscontinuity: (discontinuity) => {
        this.emit('discontinuity', discontinuity, session.id);
      },
    });

    this.switcherChannel = new BoundedChannel(this.config.channelCapacity);
    this.recorderChannel = new BoundedChannel(this.config.channelCapacity);
    this.correlator.start(session, startedAt);
    this.session = session;
    this.stopping = false;

    const event: SessionEvent = { type: 'session', action: 'start', sessionId: session.id, observedAt: startedAt };
    this.record(event);
    this.emit('session', event, null);

    return session;
  }

  /**
   * Apply everything queued, close the open record and finalize.
   * Events pushed after this is called are discarded.
   *
   * @throws SessionStateError if no session is active
   */
  async stopSession(stoppedAt: number = Date.now()): Promise<FinalizedCutLog> {
    const session = this.session;
    if (!session?.isActive() || this.stopping) {
      throw new SessionStateError('No active session to stop');
    }

    this.stopping = true;
    await this.flush();

    const finalized = this.correlator.stop(session, stoppedAt);
    this.lastFinalized = finalized;
    this.lastReading = session.tracker.latest() ?? this.lastReading;

    const event: SessionEvent = { type: 'session', action: 'stop', sessionId: session.id, observedAt: stoppedAt };
    this.record(event);
    this.emit('session', event, finalized);

    return finalized;
  }

  /**
   * Resolve once every event queued so far has been applied.
   *
   * @throws the first fatal error raised while applying events
   */
  async flush(): Promise<void> {
    this.scheduleDrain();
    await this.drainQueue;
    this.assertHealthy();
  }

  // ---------------------------------------------------------------------------
  // Ingestion
  // ---------------------------------------------------------------------------

  pushSourceChanged(event: SourceChangedEvent): void {
    if (!this.session?.isActive() || this.stopping) {
      this.droppedAfterStop++;
      this.logger.debug({ sourceId: event.source.id }, 'Source change discarded; no active session');
      return;
    }

    const dropped = this.switcherChannel.push(event);
    if (dropped) {
      this.logger.warn({ observedAt: dropped.observedAt }, 'Switcher channel full; dropped oldest event');
    }
    this.scheduleDrain();
  }

  pushTimecodeTick(event: TimecodeTickEvent): void {
    if (!this.session?.isActive() || this.stopping) {
      // Seeds the next session; journaled so replay sees the same seed
      this.rememberReading(event);
      this.record(event);
      return;
    }

    const dropped = this.recorderChannel.push(event);
    if (dropped) {
      this.logger.warn({ observedAt: dropped.observedAt }, 'Recorder channel full; dropped oldest tick');
    }
    this.scheduleDrain();
  }

  // ---------------------------------------------------------------------------
  // Read-only Views
  // ---------------------------------------------------------------------------

  /**
   * Snapshot of the current (or last) session's records. Never waits on a drain.
   */
  records(): readonly CutRecord[] {
    return this.session?.cutLog.records() ?? [];
  }

  /**
   * @throws NoReferenceAvailableError when there is no session
   */
  estimateAt(instant: number): TimecodeEstimate {
    if (!this.session) {
      throw new NoReferenceAvailableError(instant);
    }
    return this.session.tracker.estimateAt(instant);
  }

  getLastFinalized(): FinalizedCutLog | null {
    return this.lastFinalized;
  }

  getSession(): Session | null {
    return this.session;
  }

  getMetrics(): EngineMetrics {
    const session = this.session;
    return {
      state: session?.state ?? 'idle',
      sessionId: session?.id ?? null,
      cuts: session?.metrics.cuts ?? 0,
      duplicatesSuppressed: session?.metrics.duplicatesSuppressed ?? 0,
      outOfOrderDiscarded: session?.metrics.outOfOrderDiscarded ?? 0,
      unresolvedPoints: session?.metrics.unresolvedPoints ?? 0,
      droppedAfterStop: this.droppedAfterStop,
      switcherOverflow: this.switcherChannel.overflow,
      recorderOverflow: this.recorderChannel.overflow,
      discontinuities: session?.tracker.getDiscontinuityCount() ?? 0,
      eventsApplied: this.eventsApplied,
    };
  }

  // ---------------------------------------------------------------------------
  // Drain
  // ---------------------------------------------------------------------------

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;

    this.drainQueue = this.drainQueue.then(() => {
      this.drainScheduled = false;
      this.applyQueued();
    }).catch((err: unknown) => {
      this.drainScheduled = false;
      this.fail(err);
    });
  }

  private applyQueued(): void {
    const session = this.session;
    if (!session || this.fault) {
      return;
    }

    let applied = 0;
    for (;;) {
      const tick = this.recorderChannel.peek();
      const change = this.switcherChannel.peek();

      if (!tick && !change) {
        break;
      }

      // On equal instants the tick goes first so the change can use it
      if (tick && (!change || tick.observedAt <= change.observedAt)) {
        this.recorderChannel.shift();
        this.applyTick(session, tick);
      } else if (change) {
        this.switcherChannel.shift();
        this.applySourceChange(session, change);
      }
      applied++;
    }

    if (applied > 0) {
      this.logger.debug({ applied }, 'Drained device events');
    }
  }

  private applyTick(session: Session, event: TimecodeTickEvent): void {
    session.tracker.recordTick(event.timecode, event.transportState, event.observedAt);
    // Settle deferred points while the readings around them are still in history
    if (session.metrics.unresolvedPoints > 0) {
      this.correlator.resolvePending(session);
    }
    this.rememberReading(event);
    this.eventsApplied++;
    this.record(event);
  }

  private applySourceChange(session: Session, event: SourceChangedEvent): void {
    const outcome = this.correlator.onSourceChanged(session, event);
    this.eventsApplied++;
    this.record(event);

    if (outcome.kind === 'opened' || outcome.kind === 'cut') {
      this.emit('cut', outcome, session.id);
    }
  }

  private rememberReading(event: TimecodeTickEvent): void {
    if (!this.lastReading || event.observedAt >= this.lastReading.observedAt) {
      this.lastReading = {
        timecode: event.timecode,
        transportState: event.transportState,
        observedAt: event.observedAt,
      };
    }
  }

  private record(event: EngineEvent): void {
    if (!this.journal) {
      return;
    }
    this.journal.append(event).catch((err: unknown) => {
      this.logger.error({ err, type: event.type }, 'Failed to journal event');
    });
  }

  private fail(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.fault = error;
    this.logger.error({ err: error }, 'Engine halted on fatal error');
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private assertHealthy(): void {
    if (this.fault) {
      throw this.fault;
    }
  }
}
