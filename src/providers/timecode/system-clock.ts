/**
 * System Clock Timecode Source
 *
 * Generates playing timecode ticks from the host clock, for running the
 * engine without a recorder.
 *
 * Supports:
 * - Time-of-day timecode (real wall clock)
 * - Fixed start timecode with elapsed time
 */

import { pino, type Logger } from 'pino';
import { RecorderEventEmitter, type RecorderSource } from '../../core/events/sources.js';
import { timecodeTick, type TimecodeTickEvent } from '../../core/events/types.js';
import {
  addFrames,
  parseTimecode,
  wallClockToTimecode,
  type Timecode,
  type TimecodeOptions,
} from '../../core/timecode/timecode.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_UPDATE_RATE_HZ = 25;

// ============================================================================
// Types
// ============================================================================

export interface SystemClockSourceConfig extends TimecodeOptions {
  /** 'auto' for time of day, otherwise the timecode at connect */
  startTimecode: string;
  updateRateHz?: number;
  /** Clock override, mainly for tests */
  now?: () => number;
}

// ============================================================================
// System Clock Source
// ============================================================================

export class SystemClockTimecodeSource extends RecorderEventEmitter implements RecorderSource {
  readonly name = 'SystemClock';

  private readonly options: TimecodeOptions;
  private readonly start: Timecode | null;
  private readonly updateRateHz: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private updateTimer: NodeJS.Timeout | null = null;
  private startedAt = 0;
  private running = false;

  constructor(config: SystemClockSourceConfig, logger?: Logger) {
    super();
    this.options = { frameRate: config.frameRate, dropFrame: config.dropFrame };
    this.start = config.startTimecode === 'auto' ? null : parseTimecode(config.startTimecode);
    this.updateRateHz = config.updateRateHz ?? Math.min(config.frameRate, DEFAULT_UPDATE_RATE_HZ);
    this.now = config.now ?? Date.now;
    this.logger = (logger ?? pino({ level: 'silent' })).child({ module: 'system-clock' });
  }

  // ---------------------------------------------------------------------------
  // Public Interface
  // ---------------------------------------------------------------------------

  isConnected(): boolean {
    return this.running;
  }

  async connect(): Promise<void> {
    if (this.running) {
      return;
    }

    this.startedAt = this.now();
    this.running = true;
    this.startUpdateLoop();

    this.logger.info({ mode: this.start ? 'elapsed' : 'time-of-day' }, 'System clock source started');
    this.emit('connection', 'connected');
  }

  async disconnect(): Promise<void> {
    this.stopUpdateLoop();
    this.running = false;
    this.emit('connection', 'disconnected');
  }

  /**
   * Reading for the current instant.
   */
  read(): TimecodeTickEvent {
    const observedAt = this.now();
    return timecodeTick(this.timecodeAt(observedAt), 'playing', observedAt);
  }

  // ---------------------------------------------------------------------------
  // Timecode Generation
  // ---------------------------------------------------------------------------

  private timecodeAt(instant: number): Timecode {
    if (!this.start) {
      return wallClockToTimecode(new Date(instant), this.options);
    }

    const elapsedFrames = Math.floor(((instant - this.startedAt) / 1000) * this.options.frameRate);
    return addFrames(this.start, elapsedFrames, this.options);
  }

  // ---------------------------------------------------------------------------
  // Update Loop
  // ---------------------------------------------------------------------------

  private startUpdateLoop(): void {
    this.stopUpdateLoop();

    const intervalMs = Math.floor(1000 / this.updateRateHz);

    this.updateTimer = setInterval(() => {
      this.emit('timecodeTick', this.read());
    }, intervalMs);
  }

  private stopUpdateLoop(): void {
    if (this.updateTimer) {
      clearInterval(this.updateTimer);
      this.updateTimer = null;
    }
  }
}
