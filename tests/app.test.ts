/**
 * Application wiring tests.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { pino } from 'pino';
import {
  beginSession,
  createAppContext,
  createRecorder,
  edlExportConfig,
  endSession,
  generateSessionId,
  loadConfig,
} from '../src/app.js';
import { parseConfig } from '../src/core/config/schema.js';
import { SwitcherEventEmitter, type SwitcherSource } from '../src/core/events/sources.js';
import { sourceChanged } from '../src/core/events/types.js';
import { HyperDeckTimecodeSource } from '../src/providers/timecode/hyperdeck.js';
import { SystemClockTimecodeSource } from '../src/providers/timecode/system-clock.js';

const logger = pino({ level: 'silent' });

class AnnouncingSwitcher extends SwitcherEventEmitter implements SwitcherSource {
  readonly name = 'announcing';
  connect(): Promise<void> {
    return Promise.resolve();
  }
  disconnect(): Promise<void> {
    return Promise.resolve();
  }
  isConnected(): boolean {
    return true;
  }
  announceCurrent(): void {
    this.emit('sourceChanged', sourceChanged({ id: '4', label: 'Graphics' }));
  }
}

describe('generateSessionId', () => {
  it('stamps the UTC date and time', () => {
    expect(generateSessionId(new Date('2026-10-18T09:30:15.123Z'))).toBe('20261018_093015');
  });
});

describe('createRecorder', () => {
  it('uses the system clock by default', () => {
    const recorder = createRecorder(parseConfig({ switcher: { host: '10.0.0.1' } }), logger);
    expect(recorder).toBeInstanceOf(SystemClockTimecodeSource);
  });

  it('builds a HyperDeck source when one is configured', () => {
    const config = parseConfig({ switcher: { host: '10.0.0.1' }, recorder: { source: 'hyperdeck', host: '10.0.0.2' } });
    const recorder = createRecorder(config, logger);

    expect(recorder).toBeInstanceOf(HyperDeckTimecodeSource);
    expect(recorder.name).toBe('HyperDeck@10.0.0.2');
  });

  it('requires a HyperDeck host', () => {
    const config = parseConfig({ switcher: { host: '10.0.0.1' }, recorder: { source: 'hyperdeck' } });
    expect(() => createRecorder(config, logger)).toThrow('recorder.host is required');
  });
});

describe('edlExportConfig', () => {
  it('carries exporter settings and reel overrides', () => {
    const config = parseConfig({
      switcher: { host: '10.0.0.1' },
      engine: { rejectEmptyExport: true },
      edl: { includeComments: false },
      inputs: { 1: { label: 'Camera 1', reelName: 'CAM1' } },
    });

    expect(edlExportConfig(config, 'SHOW')).toEqual({
      title: 'SHOW',
      rejectEmptyExport: true,
      includeComments: false,
      reelNames: { '1': 'CAM1' },
    });
  });
});

describe('session control', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cut-app-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a YAML configuration file', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'switcher:\n  host: 192.168.10.240\nengine:\n  frameOffset: -2\n');

    const config = await loadConfig(path, logger);
    expect(config.switcher.host).toBe('192.168.10.240');
    expect(config.engine.frameOffset).toBe(-2);
  });

  it('rejects a missing configuration file', async () => {
    await expect(loadConfig(join(dir, 'absent.yaml'), logger)).rejects.toThrow('Configuration file not found');
  });

  it('announces the program at start and writes the EDL at the end', async () => {
    const config = parseConfig({
      switcher: { host: '10.0.0.1' },
      journal: { enabled: false },
      edl: { outputDirectory: dir, title: 'SHOW' },
    });
    const switcher = new AnnouncingSwitcher();
    const context = createAppContext(config, logger, { switcher });
    switcher.on('sourceChanged', (event) => {
      context.engine.pushSourceChanged(event);
    });

    beginSession(context, 'evening');
    const { log, path } = await endSession(context);

    expect(log.records.map((r) => r.source.label)).toEqual(['Graphics']);
    expect(path).toBe(resolve(dir, 'SHOW_evening.edl'));

    // No recorder reading arrived, so the record is listed but not cut
    const lines = (await readFile(path, 'utf-8')).split('\n');
    expect(lines[0]).toBe('TITLE: SHOW_evening');
    expect(lines[4]?.startsWith('* UNRESOLVED: RECORD 0 Graphics AT ')).toBe(true);
  });
});
