/**
 * HTTP API and WebSocket tests against an in-process server.
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { pino } from 'pino';
import { WebSocket } from 'ws';
import { createAppContext, type AppContext } from '../src/app.js';
import { parseConfig } from '../src/core/config/schema.js';
import {
  RecorderEventEmitter,
  SwitcherEventEmitter,
  type RecorderSource,
  type SwitcherSource,
} from '../src/core/events/sources.js';
import { sourceChanged, timecodeTick } from '../src/core/events/types.js';
import { parseTimecode } from '../src/core/timecode/timecode.js';
import { createWebServer, type WebServer } from '../src/web/server.js';

// ============================================================================
// Fixtures
// ============================================================================

class FakeSwitcher extends SwitcherEventEmitter implements SwitcherSource {
  readonly name = 'fake-switcher';
  connected = true;

  connect(): Promise<void> {
    return Promise.resolve();
  }
  disconnect(): Promise<void> {
    return Promise.resolve();
  }
  isConnected(): boolean {
    return this.connected;
  }
  announceCurrent(): void {
    // No program known
  }
}

class FakeRecorder extends RecorderEventEmitter implements RecorderSource {
  readonly name = 'fake-recorder';
  connected = false;

  connect(): Promise<void> {
    return Promise.resolve();
  }
  disconnect(): Promise<void> {
    return Promise.resolve();
  }
  isConnected(): boolean {
    return this.connected;
  }
}

interface Harness {
  context: AppContext;
  server: WebServer;
  switcher: FakeSwitcher;
  recorder: FakeRecorder;
  baseUrl: string;
  outputDirectory: string;
}

async function startHarness(auth?: { username: string; password: string }): Promise<Harness> {
  const outputDirectory = await mkdtemp(join(tmpdir(), 'cut-web-'));
  const config = parseConfig({
    switcher: { host: '127.0.0.1' },
    journal: { enabled: false },
    edl: { outputDirectory },
    web: {
      port: 0,
      host: '127.0.0.1',
      ...(auth ? { auth: { enabled: true, ...auth } } : {}),
    },
  });
  const logger = pino({ level: 'silent' });
  const switcher = new FakeSwitcher();
  const recorder = new FakeRecorder();
  const context = createAppContext(config, logger, { switcher, recorder });
  const server = createWebServer({ config: config.web, context, logger });
  await server.start();

  return {
    context,
    server,
    switcher,
    recorder,
    baseUrl: `http://127.0.0.1:${String(server.port())}`,
    outputDirectory,
  };
}

async function stopHarness(harness: Harness): Promise<void> {
  await harness.server.stop();
  await rm(harness.outputDirectory, { recursive: true, force: true });
}

function post(url: string, body?: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body ?? {}),
  });
}

async function recordOneCut(context: AppContext): Promise<void> {
  const now = Date.now();
  context.engine.pushTimecodeTick(timecodeTick(parseTimecode('01:00:00:00'), 'playing', now));
  context.engine.pushSourceChanged(sourceChanged({ id: '1', label: 'Camera 1' }, now));
  await context.engine.flush();
}

// ============================================================================
// REST API
// ============================================================================

describe('REST API', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await startHarness();
  });

  afterEach(async () => {
    await stopHarness(harness);
  });

  it('reports an idle engine', async () => {
    const res = await fetch(`${harness.baseUrl}/api/status`);
    expect(res.status).toBe(200);

    const body: unknown = await res.json();
    expect(body).toMatchObject({
      session: { id: null, state: 'idle', startedAt: null },
      devices: {
        switcher: { name: 'fake-switcher', connected: true },
        recorder: { name: 'fake-recorder', connected: false },
      },
      reference: null,
      config: { frameRate: 25, dropFrame: false, frameOffset: 0 },
    });
  });

  it('starts a session once', async () => {
    const first = await post(`${harness.baseUrl}/api/session/start`, { sessionId: 'web-test' });
    expect(first.status).toBe(201);
    expect(await first.json()).toEqual({ sessionId: 'web-test', state: 'armed' });

    const second = await post(`${harness.baseUrl}/api/session/start`, { sessionId: 'again' });
    expect(second.status).toBe(409);
    expect(await second.json()).toMatchObject({ code: 'SESSION_STATE' });
  });

  it('rejects a session id with unsafe characters', async () => {
    const res = await post(`${harness.baseUrl}/api/session/start`, { sessionId: 'bad id!' });
    expect(res.status).toBe(400);
    expect(harness.context.engine.getSession()).toBeNull();
  });

  it('lists the live cuts', async () => {
    await post(`${harness.baseUrl}/api/session/start`, { sessionId: 'cuts' });
    await recordOneCut(harness.context);

    const res = await fetch(`${harness.baseUrl}/api/cuts`);
    const body: unknown = await res.json();

    expect(body).toMatchObject({
      sessionId: 'cuts',
      total: 1,
      records: [
        {
          sequenceIndex: 0,
          source: { id: '1', label: 'Camera 1' },
          recordIn: { timecode: '01:00:00:00', confidence: 'trusted' },
          recordOut: null,
        },
      ],
    });
  });

  it('stops a session, writes its EDL and serves it', async () => {
    await post(`${harness.baseUrl}/api/session/start`, { sessionId: 'show' });
    await recordOneCut(harness.context);

    const stop = await post(`${harness.baseUrl}/api/session/stop`);
    expect(stop.status).toBe(200);

    const path = resolve(harness.outputDirectory, 'LIVE_PRODUCTION_show.edl');
    expect(await stop.json()).toEqual({ sessionId: 'show', records: 1, unresolved: 0, path });

    const written = await readFile(path, 'utf-8');
    expect(written.split('\n')[0]).toBe('TITLE: LIVE_PRODUCTION_show');

    const download = await fetch(`${harness.baseUrl}/api/edl?title=REPLAY`);
    expect(download.status).toBe(200);
    expect(download.headers.get('content-disposition')).toBe('attachment; filename="REPLAY_show.edl"');
    expect((await download.text()).split('\n')[0]).toBe('TITLE: REPLAY_show');
  });

  it('rejects an export title with unsafe characters', async () => {
    await post(`${harness.baseUrl}/api/session/start`, { sessionId: 'show' });
    await recordOneCut(harness.context);
    await post(`${harness.baseUrl}/api/session/stop`);

    const res = await fetch(`${harness.baseUrl}/api/edl?title=${encodeURIComponent('bad"\r\nX-Injected: 1')}`);
    expect(res.status).toBe(400);
    expect(res.headers.get('content-disposition')).toBeNull();
    expect(res.headers.get('x-injected')).toBeNull();
  });

  it('has nothing to export before a session ends', async () => {
    const res = await fetch(`${harness.baseUrl}/api/edl`);
    expect(res.status).toBe(404);
  });

  it('refuses to stop when no session is active', async () => {
    const res = await post(`${harness.baseUrl}/api/session/stop`);
    expect(res.status).toBe(409);
  });

  it('reports degraded health with one device down', async () => {
    const res = await fetch(`${harness.baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'degraded',
      checks: { switcher: { status: 'up' }, recorder: { status: 'down' } },
    });
  });

  it('reports unhealthy with both devices down', async () => {
    harness.switcher.connected = false;

    const res = await fetch(`${harness.baseUrl}/api/health`);
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'unhealthy' });
  });

  it('answers unknown paths with JSON', async () => {
    const res = await fetch(`${harness.baseUrl}/api/nothing-here`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('basic auth', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await startHarness({ username: 'operator', password: 'test-secret' });
  });

  afterEach(async () => {
    await stopHarness(harness);
  });

  it('challenges requests without credentials', async () => {
    const res = await fetch(`${harness.baseUrl}/api/status`);
    expect(res.status).toBe(401);
    expect(res.headers.get('www-authenticate')).toBe('Basic realm="Live Cut EDL"');
  });

  it('accepts the configured credentials', async () => {
    const token = Buffer.from('operator:test-secret').toString('base64');
    const res = await fetch(`${harness.baseUrl}/api/status`, { headers: { Authorization: `Basic ${token}` } });
    expect(res.status).toBe(200);
  });
});

// ============================================================================
// WebSocket
// ============================================================================

/**
 * Buffers messages from the moment the socket is created.
 */
class MessageQueue {
  private readonly received: unknown[] = [];
  private waiting: ((message: unknown) => void) | null = null;

  constructor(ws: WebSocket) {
    ws.on('message', (data) => {
      const message: unknown = JSON.parse(String(data));
      if (this.waiting) {
        const resolveNext = this.waiting;
        this.waiting = null;
        resolveNext(message);
      } else {
        this.received.push(message);
      }
    });
  }

  next(): Promise<unknown> {
    if (this.received.length > 0) {
      return Promise.resolve(this.received.shift());
    }
    return new Promise((resolveNext) => {
      this.waiting = resolveNext;
    });
  }
}

describe('WebSocket', () => {
  let harness: Harness;
  let ws: WebSocket;
  let messages: MessageQueue;

  beforeEach(async () => {
    harness = await startHarness();
    ws = new WebSocket(`${harness.baseUrl.replace('http', 'ws')}/ws`);
    messages = new MessageQueue(ws);
    await new Promise<void>((resolveOpen, reject) => {
      ws.once('open', () => {
        resolveOpen();
      });
      ws.once('error', reject);
    });
  });

  afterEach(async () => {
    ws.close();
    await stopHarness(harness);
  });

  it('sends the current state on connect', async () => {
    expect(await messages.next()).toMatchObject({
      type: 'initial_state',
      payload: { session: null, records: [], devices: { switcher: { connected: true } } },
    });
    expect(harness.server.wsHandler.getClientCount()).toBe(1);
  });

  it('streams session changes and cuts', async () => {
    await messages.next();

    harness.context.engine.startSession('live', 0);
    expect(await messages.next()).toMatchObject({ type: 'session', payload: { sessionId: 'live', action: 'start' } });

    await recordOneCut(harness.context);
    expect(await messages.next()).toMatchObject({
      type: 'cut',
      payload: { sessionId: 'live', kind: 'opened', closed: null, opened: { source: { label: 'Camera 1' } } },
    });
  });

  it('answers invalid messages with an error', async () => {
    await messages.next();

    ws.send('{"type":"dance"}');
    expect(await messages.next()).toMatchObject({ type: 'error', payload: { message: 'Invalid message format' } });
  });

  it('stops sending topics a client unsubscribed from', async () => {
    await messages.next();

    ws.send(JSON.stringify({ type: 'unsubscribe', payload: { events: ['session'] } }));
    ws.send(JSON.stringify({ type: 'get_state' }));
    await messages.next();

    harness.context.engine.startSession('quiet', 0);
    await recordOneCut(harness.context);
    expect(await messages.next()).toMatchObject({ type: 'cut' });
  });
});
