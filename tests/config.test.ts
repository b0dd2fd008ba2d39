/**
 * Configuration schema tests.
 */

import { describe, it, expect } from 'vitest';
import {
  parseConfig,
  parseEngineConfig,
  reelNamesFromInputs,
  safeParseConfig,
  toEngineConfig,
  validateEngineConfig,
} from '../src/core/config/schema.js';

const MINIMAL = { switcher: { host: '192.168.10.240' } };

describe('parseConfig', () => {
  it('fills defaults around the switcher address', () => {
    const config = parseConfig(MINIMAL);

    expect(config.engine).toEqual({
      frameRate: 25,
      dropFrame: false,
      frameOffset: 0,
      stalenessThresholdMs: 15000,
      rejectEmptyExport: false,
      channelCapacity: 1024,
      historySize: 256,
    });
    expect(config.switcher.mixEffect).toBe(0);
    expect(config.recorder.source).toBe('system');
    expect(config.recorder.startTimecode).toBe('auto');
    expect(config.edl.title).toBe('LIVE_PRODUCTION');
    expect(config.web.port).toBe(3000);
  });

  it('rejects a malformed switcher address', () => {
    expect(safeParseConfig({ switcher: { host: 'not-an-ip' } }).success).toBe(false);
  });

  it('rejects a frame rate outside the supported set', () => {
    expect(safeParseConfig({ ...MINIMAL, engine: { frameRate: 48 } }).success).toBe(false);
  });

  it('rejects a start timecode that is neither a timecode nor auto', () => {
    expect(safeParseConfig({ ...MINIMAL, recorder: { startTimecode: 'noon' } }).success).toBe(false);
    expect(safeParseConfig({ ...MINIMAL, recorder: { startTimecode: '10:00:00:00' } }).success).toBe(true);
  });

  it('rejects reel names longer than eight characters', () => {
    const result = safeParseConfig({ ...MINIMAL, inputs: { 1: { label: 'Cam', reelName: 'TOOLONGREEL' } } });
    expect(result.success).toBe(false);
  });
});

describe('validateEngineConfig', () => {
  it('accepts the defaults', () => {
    expect(validateEngineConfig(parseConfig(MINIMAL))).toEqual([]);
  });

  it('rejects drop-frame at a whole-frame rate', () => {
    const errors = validateEngineConfig(parseConfig({ ...MINIMAL, engine: { frameRate: 25, dropFrame: true } }));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain('Drop-frame timecode is only valid for 29.97 and 59.94 fps');
  });

  it('rejects an offset of a day or more', () => {
    const errors = validateEngineConfig(parseConfig({ ...MINIMAL, engine: { frameOffset: 2160000 } }));
    expect(errors).toEqual(['Frame offset 2160000 exceeds the 2159999 frames representable in 24 hours at 25 fps']);
  });

  it('requires a host for a HyperDeck recorder', () => {
    const errors = validateEngineConfig(parseConfig({ ...MINIMAL, recorder: { source: 'hyperdeck' } }));
    expect(errors).toEqual(['recorder.host is required when recorder.source is hyperdeck']);
  });
});

describe('engine settings', () => {
  it('parses engine settings on their own', () => {
    expect(parseEngineConfig({ frameRate: 29.97, dropFrame: true }).stalenessThresholdMs).toBe(15000);
  });

  it('copies engine settings out of the configuration', () => {
    const config = parseConfig({ ...MINIMAL, engine: { frameOffset: -2 } });
    const engine = toEngineConfig(config);

    expect(engine.frameOffset).toBe(-2);
    expect(engine).not.toBe(config.engine);
  });
});

describe('reelNamesFromInputs', () => {
  it('maps input numbers to configured reels', () => {
    const config = parseConfig({
      ...MINIMAL,
      inputs: {
        1: { label: 'Camera 1', reelName: 'CAM1' },
        2: { label: 'Camera 2' },
        3: { label: 'Graphics', reelName: 'GFX' },
      },
    });

    expect(reelNamesFromInputs(config)).toEqual({ '1': 'CAM1', '3': 'GFX' });
  });
});
