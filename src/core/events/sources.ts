/**
 * Device Event Sources
 *
 * Contracts for the two device streams the engine consumes:
 * - a switcher emitting `sourceChanged` whenever program input changes
 * - a recorder emitting `timecodeTick` at a device-driven cadence
 *
 * Sources deliver at least once and may duplicate; the engine tolerates both.
 */

import { EventEmitter } from 'node:events';
import type { CutEngine } from '../engine/engine.js';
import type { SourceChangedEvent, TimecodeTickEvent } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type ConnectionState = 'connecting' | 'connected' | 'disconnected' | 'error';

export interface SwitcherSourceEvents {
  sourceChanged: (event: SourceChangedEvent) => void;
  connection: (state: ConnectionState, error?: Error) => void;
  error: (error: Error) => void;
}

export interface RecorderSourceEvents {
  timecodeTick: (event: TimecodeTickEvent) => void;
  connection: (state: ConnectionState, error?: Error) => void;
  error: (error: Error) => void;
}

interface DeviceSource {
  /** Human-readable name for logging and UI */
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
}

export interface SwitcherSource extends DeviceSource {
  /**
   * Re-emit the current program source, stamped now.
   * Opens the first record of a session started mid-show.
   */
  announceCurrent(): void;
}

export type RecorderSource = DeviceSource;

// ============================================================================
// Typed EventEmitters
// ============================================================================

type SwitcherEventKey = keyof SwitcherSourceEvents;
type RecorderEventKey = keyof RecorderSourceEvents;

/**
 * Typed EventEmitter base for switcher sources.
 */
export class SwitcherEventEmitter extends EventEmitter {
  override on<K extends SwitcherEventKey>(event: K, listener: SwitcherSourceEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends SwitcherEventKey>(event: K, listener: SwitcherSourceEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends SwitcherEventKey>(event: K, ...args: Parameters<SwitcherSourceEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}

/**
 * Typed EventEmitter base for recorder sources.
 */
export class RecorderEventEmitter extends EventEmitter {
  override on<K extends RecorderEventKey>(event: K, listener: RecorderSourceEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends RecorderEventKey>(event: K, listener: RecorderSourceEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends RecorderEventKey>(event: K, ...args: Parameters<RecorderSourceEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}

// ============================================================================
// Wiring
// ============================================================================

/**
 * Route both device streams into the engine's channels.
 * Returns a function that detaches them again.
 */
export function attachSources(
  engine: CutEngine,
  switcher: SwitcherSource & SwitcherEventEmitter,
  recorder: RecorderSource & RecorderEventEmitter
): () => void {
  const onSourceChanged = (event: SourceChangedEvent): void => {
    engine.pushSourceChanged(event);
  };
  const onTick = (event: TimecodeTickEvent): void => {
    engine.pushTimecodeTick(event);
  };

  switcher.on('sourceChanged', onSourceChanged);
  recorder.on('timecodeTick', onTick);

  return () => {
    switcher.off('sourceChanged', onSourceChanged);
    recorder.off('timecodeTick', onTick);
  };
}
