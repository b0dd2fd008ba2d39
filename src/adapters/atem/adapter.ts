/**
 * ATEM Switcher Source.
 * Watches the program input of one M/E on a Blackmagic ATEM and emits
 * `sourceChanged` events for the cut engine.
 */

import { Atem } from 'atem-connection';
import type { AtemState } from 'atem-connection';
import { pino, type Logger } from 'pino';
import type { InputConfig, SwitcherConfig } from '../../core/config/schema.js';
import { SwitcherEventEmitter, type SwitcherSource } from '../../core/events/sources.js';
import { sourceChanged, type SourceId } from '../../core/events/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The part of the atem-connection client this source uses.
 */
export interface AtemClient {
  readonly state: Readonly<AtemState> | undefined;
  connect(address: string): Promise<void>;
  disconnect(): Promise<void>;
  on(event: 'connected' | 'disconnected', listener: () => void): unknown;
  on(event: 'error', listener: (message: string) => void): unknown;
  on(event: 'stateChanged', listener: (state: Readonly<AtemState>, pathToChange: string[]) => void): unknown;
}

export interface AtemSwitcherSourceOptions {
  config: SwitcherConfig;
  inputs: Record<number, InputConfig>;
  logger?: Logger;
  /** Injected client, mainly for tests */
  client?: AtemClient;
}

// ============================================================================
// Source Implementation
// ============================================================================

export class AtemSwitcherSource extends SwitcherEventEmitter implements SwitcherSource {
  readonly name: string;

  private readonly atem: AtemClient;
  private readonly config: SwitcherConfig;
  private readonly inputs: Record<number, InputConfig>;
  private readonly logger: Logger;

  private connected = false;
  private stopped = false;
  private lastProgramInput: number | null = null;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(options: AtemSwitcherSourceOptions) {
    super();
    this.config = options.config;
    this.inputs = options.inputs;
    this.name = `ATEM@${options.config.host} M/E ${String(options.config.mixEffect + 1)}`;
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ module: 'atem' });
    this.atem = options.client ?? new Atem();

    this.setupEventHandlers();
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  async connect(): Promise<void> {
    this.stopped = false;
    this.emit('connection', 'connecting');
    try {
      await this.atem.connect(this.config.host);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.handleConnectionError(err);
      throw err;
    }
  }

  async disconnect(): Promise<void> {
    this.stopped = true;
    this.clearReconnectTimer();
    await this.atem.disconnect();
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  getCurrentProgram(): number | null {
    return this.lastProgramInput;
  }

  announceCurrent(): void {
    if (this.lastProgramInput === null) {
      this.logger.warn('No program input known yet; first cut will open the session');
      return;
    }
    this.emit('sourceChanged', sourceChanged(this.buildSourceId(this.lastProgramInput)));
  }

  // --------------------------------------------------------------------------
  // Event Handlers
  // --------------------------------------------------------------------------

  private setupEventHandlers(): void {
    this.atem.on('connected', () => {
      this.handleConnected();
    });

    this.atem.on('disconnected', () => {
      this.handleDisconnected();
    });

    this.atem.on('error', (message: string) => {
      this.emit('error', new Error(message));
    });

    this.atem.on('stateChanged', (state: Readonly<AtemState>, pathToChange: string[]) => {
      this.handleStateChanged(state, pathToChange);
    });
  }

  private handleConnected(): void {
    this.connected = true;
    this.reconnectAttempts = 0;
    this.clearReconnectTimer();

    const me = this.atem.state?.video.mixEffects[this.config.mixEffect];
    if (me) {
      this.lastProgramInput = me.programInput;
    }

    this.logger.info({ host: this.config.host, program: this.lastProgramInput }, 'Switcher connected');
    this.emit('connection', 'connected');

    // Opens the on-air record when a session was started before the switcher
    // answered; the engine ignores it when idle or already on that source.
    if (this.lastProgramInput !== null) {
      this.emit('sourceChanged', sourceChanged(this.buildSourceId(this.lastProgramInput)));
    }
  }

  private handleDisconnected(): void {
    this.connected = false;
    this.logger.warn({ host: this.config.host }, 'Switcher disconnected');
    this.emit('connection', 'disconnected');
    this.scheduleReconnect();
  }

  private handleConnectionError(error: Error): void {
    this.logger.error({ host: this.config.host, err: error }, 'Switcher connection failed');
    this.emit('connection', 'error', error);
    this.scheduleReconnect();
  }

  private handleStateChanged(state: Readonly<AtemState>, pathToChange: string[]): void {
    const mePrefix = `video.mixEffects.${String(this.config.mixEffect)}`;

    const programChanged = pathToChange.some(
      (path) => path.startsWith(mePrefix) && path.includes('programInput')
    );
    if (!programChanged) {
      return;
    }

    const me = state.video.mixEffects[this.config.mixEffect];
    if (!me || me.programInput === this.lastProgramInput) {
      return;
    }

    this.lastProgramInput = me.programInput;
    this.emit('sourceChanged', sourceChanged(this.buildSourceId(me.programInput, state)));
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private buildSourceId(inputId: number, state: Readonly<AtemState> | undefined = this.atem.state): SourceId {
    const label =
      this.inputs[inputId]?.label ??
      state?.inputs[inputId]?.longName ??
      `Input ${String(inputId)}`;

    return { id: String(inputId), label };
  }

  private scheduleReconnect(): void {
    if (this.stopped || !this.config.reconnect.enabled || this.reconnectTimer) return;

    const { maxAttempts, initialDelayMs, maxDelayMs } = this.config.reconnect;

    if (maxAttempts > 0 && this.reconnectAttempts >= maxAttempts) {
      this.emit('error', new Error(`Max reconnection attempts (${String(maxAttempts)}) reached`));
      return;
    }

    // Exponential backoff with jitter
    const delay = Math.min(
      initialDelayMs * Math.pow(2, this.reconnectAttempts) + Math.random() * 1000,
      maxDelayMs
    );

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectAttempts++;
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
}
