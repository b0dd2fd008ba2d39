/**
 * HyperDeck Timecode Source
 *
 * Reads display timecode and transport state from a Blackmagic HyperDeck and
 * emits `timecodeTick` events. Uses notifications where the deck supports
 * them and falls back to polling transport info.
 */

import { Commands, Hyperdeck, TransportStatus } from 'hyperdeck-connection';
import { pino, type Logger } from 'pino';
import type { ReconnectConfig } from '../../core/config/schema.js';
import { RecorderEventEmitter, type RecorderSource } from '../../core/events/sources.js';
import { timecodeTick, type TimecodeTickEvent, type TransportState } from '../../core/events/types.js';
import { isTimecodeString, parseTimecode } from '../../core/timecode/timecode.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_PORT = 9993;
const DEFAULT_POLL_RATE_HZ = 10;
const DEFAULT_CONNECTION_TIMEOUT_MS = 5000;
const MAX_POLL_RATE_HZ = 25;
const MIN_POLL_RATE_HZ = 1;

// ============================================================================
// Types
// ============================================================================

export interface HyperDeckSourceConfig {
  host: string;
  port?: number;
  pollRateHz?: number;
  useNotifications?: boolean;
  connectionTimeout?: number;
  reconnect: ReconnectConfig;
}

/**
 * Last known deck state; notifications update one field at a time.
 */
export interface DeckReading {
  status: TransportStatus | null;
  displayTimecode: string | null;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Map HyperDeck transport status to the engine's transport state.
 */
export function mapTransportStatus(status: TransportStatus | null): TransportState {
  switch (status) {
    case TransportStatus.PLAY:
    case TransportStatus.RECORD:
      return 'playing';
    case TransportStatus.PREVIEW:
      return 'paused';
    case TransportStatus.STOPPED:
      return 'stopped';
    case TransportStatus.FORWARD:
    case TransportStatus.REWIND:
    case TransportStatus.JOG:
    case TransportStatus.SHUTTLE:
      return 'shuttling';
    default:
      return 'unknown';
  }
}

/**
 * Tick for a deck reading, or null while the timecode is unusable.
 */
export function tickFromReading(reading: DeckReading, observedAt: number): TimecodeTickEvent | null {
  if (!reading.displayTimecode || !isTimecodeString(reading.displayTimecode)) {
    return null;
  }
  return timecodeTick(parseTimecode(reading.displayTimecode), mapTransportStatus(reading.status), observedAt);
}

// ============================================================================
// HyperDeck Timecode Source
// ============================================================================

export class HyperDeckTimecodeSource extends RecorderEventEmitter implements RecorderSource {
  readonly name: string;

  private readonly config: Required<Omit<HyperDeckSourceConfig, 'reconnect'>> & { reconnect: ReconnectConfig };
  private readonly logger: Logger;

  private hyperdeck: Hyperdeck | null = null;
  private reading: DeckReading = { status: null, displayTimecode: null };
  private pollTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private notificationsEnabled = false;
  private stopped = false;

  constructor(config: HyperDeckSourceConfig, logger?: Logger) {
    super();

    this.name = `HyperDeck@${config.host}`;
    this.logger = (logger ?? pino({ level: 'silent' })).child({ module: 'hyperdeck' });
    this.config = {
      host: config.host,
      port: config.port ?? DEFAULT_PORT,
      pollRateHz: Math.min(
        Math.max(config.pollRateHz ?? DEFAULT_POLL_RATE_HZ, MIN_POLL_RATE_HZ),
        MAX_POLL_RATE_HZ
      ),
      useNotifications: config.useNotifications ?? true,
      connectionTimeout: config.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT_MS,
      reconnect: config.reconnect,
    };
  }

  // ---------------------------------------------------------------------------
  // Public Interface
  // ---------------------------------------------------------------------------

  isConnected(): boolean {
    return this.hyperdeck?.connected ?? false;
  }

  async connect(): Promise<void> {
    if (this.hyperdeck?.connected) {
      return;
    }

    this.stopped = false;
    this.clearReconnectTimer();
    this.emit('connection', 'connecting');

    const deck = new Hyperdeck({ debug: false });
    this.hyperdeck = deck;

    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.cleanup();
        reject(new Error(`Connection timeout after ${String(this.config.connectionTimeout)}ms`));
      }, this.config.connectionTimeout);

      deck.once('connected', () => {
        clearTimeout(timeout);
        this.onConnected(deck).then(resolve, reject);
      });

      deck.once('error', (message, error) => {
        clearTimeout(timeout);
        const err = error instanceof Error ? error : new Error(String(message));
        this.handleDisconnect(err);
        reject(err);
      });

      this.setupPersistentHandlers(deck);
      deck.connect(this.config.host, this.config.port);
    });
  }

  async disconnect(): Promise<void> {
    this.stopped = true;
    this.clearPollTimer();
    this.clearReconnectTimer();

    const deck = this.hyperdeck;
    this.hyperdeck = null;
    this.notificationsEnabled = false;

    if (deck) {
      await deck.disconnect();
    }
    this.emit('connection', 'disconnected');
  }

  getReading(): DeckReading {
    return { ...this.reading };
  }

  // ---------------------------------------------------------------------------
  // Connection Setup
  // ---------------------------------------------------------------------------

  private async onConnected(deck: Hyperdeck): Promise<void> {
    if (this.config.useNotifications) {
      await this.enableNotifications(deck);
    }
    if (!this.notificationsEnabled) {
      this.startPolling();
    }

    await this.poll(deck);

    this.reconnectAttempts = 0;
    this.logger.info(
      { host: this.config.host, notifications: this.notificationsEnabled },
      'Recorder connected'
    );
    this.emit('connection', 'connected');
  }

  private setupPersistentHandlers(deck: Hyperdeck): void {
    deck.on('disconnected', () => {
      if (this.hyperdeck === deck) {
        this.handleDisconnect();
      }
    });

    deck.on('error', (message, error) => {
      this.emit('error', error instanceof Error ? error : new Error(String(message)));
    });

    deck.on('notify.transport', (info) => {
      if (!this.notificationsEnabled) return;
      this.update({
        status: info.status ?? this.reading.status,
        displayTimecode: info.displayTimecode ?? this.reading.displayTimecode,
      });
    });

    // Frame-accurate timecode updates
    deck.on('notify.displayTimecode', (info) => {
      if (!this.notificationsEnabled) return;
      this.update({ ...this.reading, displayTimecode: info.displayTimecode });
    });
  }

  private async enableNotifications(deck: Hyperdeck): Promise<void> {
    const notifyCmd = new Commands.NotifySetCommand();
    notifyCmd.transport = true;
    notifyCmd.displayTimecode = true;

    try {
      await deck.sendCommand(notifyCmd);
      this.notificationsEnabled = true;
    } catch (error) {
      // Older protocol versions reject display timecode notifications
      this.notificationsEnabled = false;
      this.logger.info({ err: error }, 'Notifications unavailable; polling transport info');
    }
  }

  // ---------------------------------------------------------------------------
  // Polling
  // ---------------------------------------------------------------------------

  private startPolling(): void {
    this.clearPollTimer();

    const intervalMs = Math.floor(1000 / this.config.pollRateHz);

    this.pollTimer = setInterval(() => {
      const deck = this.hyperdeck;
      if (!deck?.connected) {
        this.clearPollTimer();
        return;
      }
      this.poll(deck).catch((error: unknown) => {
        this.emit('error', error instanceof Error ? error : new Error('Poll failed'));
      });
    }, intervalMs);
  }

  private async poll(deck: Hyperdeck): Promise<void> {
    const info = await deck.sendCommand(new Commands.TransportInfoCommand());
    this.update({ status: info.status, displayTimecode: info.displayTimecode });
  }

  private clearPollTimer(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private update(reading: DeckReading): void {
    this.reading = reading;
    const tick = tickFromReading(reading, Date.now());
    if (tick) {
      this.emit('timecodeTick', tick);
    }
  }

  // ---------------------------------------------------------------------------
  // Reconnection
  // ---------------------------------------------------------------------------

  private handleDisconnect(error?: Error): void {
    this.clearPollTimer();
    this.notificationsEnabled = false;
    this.reading = { status: null, displayTimecode: null };
    this.logger.warn({ host: this.config.host, err: error }, 'Recorder disconnected');
    this.emit('connection', 'disconnected', error);

    if (this.config.reconnect.enabled && !this.stopped) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;

    const { maxAttempts, initialDelayMs, maxDelayMs } = this.config.reconnect;

    if (maxAttempts > 0 && this.reconnectAttempts >= maxAttempts) {
      this.emit('error', new Error(`Max reconnection attempts (${String(maxAttempts)}) exceeded`));
      return;
    }

    const delay = Math.min(initialDelayMs * Math.pow(1.5, this.reconnectAttempts), maxDelayMs);
    this.reconnectAttempts++;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((err: unknown) => {
        this.logger.debug({ err, attempt: this.reconnectAttempts }, 'Reconnect attempt failed');
      });
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private cleanup(): void {
    this.clearPollTimer();
    this.clearReconnectTimer();
    this.hyperdeck = null;
    this.notificationsEnabled = false;
  }
}
