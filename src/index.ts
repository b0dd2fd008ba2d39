/**
 * Live Cut EDL
 *
 * Frame-accurate Edit Decision List generation from a live switcher's cut
 * events and a recorder's timecode.
 *
 * @module live-cut-edl
 */

export * from './core/errors.js';
export * from './core/timecode/timecode.js';
export * from './core/timecode/offset.js';
export * from './core/timecode/tracker.js';
export * from './core/events/types.js';
export * from './core/events/sources.js';
export * from './core/events/store.js';
export * from './core/events/replay.js';
export * from './core/cutlog/cut-log.js';
export * from './core/session/session.js';
export * from './core/correlator/correlator.js';
export * from './core/engine/channel.js';
export * from './core/engine/engine.js';
export * from './core/config/schema.js';
export * from './generators/edl/cmx3600.js';
export { AtemSwitcherSource, type AtemClient, type AtemSwitcherSourceOptions } from './adapters/atem/adapter.js';
export {
  HyperDeckTimecodeSource,
  mapTransportStatus,
  tickFromReading,
  type DeckReading,
  type HyperDeckSourceConfig,
} from './providers/timecode/hyperdeck.js';
export { SystemClockTimecodeSource, type SystemClockSourceConfig } from './providers/timecode/system-clock.js';
