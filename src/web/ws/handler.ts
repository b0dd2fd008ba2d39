/**
 * WebSocket Handler.
 * Broadcasts cuts, session changes and timecode discontinuities to connected
 * clients.
 */

import type { Server } from 'node:http';
import type { Logger } from 'pino';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { z } from 'zod';
import type { AppContext } from '../../app.js';
import type { CorrelationOutcome } from '../../core/correlator/correlator.js';
import { unresolvedRecords, type FinalizedCutLog } from '../../core/cutlog/cut-log.js';
import type { CutEngineEvents } from '../../core/engine/engine.js';
import type { SessionEvent } from '../../core/events/types.js';
import { formatTimecode } from '../../core/timecode/timecode.js';
import type { Discontinuity } from '../../core/timecode/tracker.js';
import { serialiseCutRecord } from '../api/routes.js';

// ============================================================================
// Types
// ============================================================================

export type BroadcastTopic = 'cut' | 'session' | 'discontinuity';

/**
 * Message types sent from server to clients.
 */
export interface ServerMessage {
  type: BroadcastTopic | 'initial_state' | 'error';
  payload: Record<string, unknown>;
  timestamp: string;
}

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('pong') }),
  z.object({ type: z.literal('get_state') }),
  z.object({
    type: z.literal('subscribe'),
    payload: z.object({ events: z.array(z.enum(['cut', 'session', 'discontinuity'])) }),
  }),
  z.object({
    type: z.literal('unsubscribe'),
    payload: z.object({ events: z.array(z.enum(['cut', 'session', 'discontinuity'])) }),
  }),
]);

/**
 * Message types received from clients.
 */
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

interface ClientInfo {
  clientId: string;
  isAlive: boolean;
  topics: Set<BroadcastTopic>;
}

const HEARTBEAT_INTERVAL_MS = 30000;

// ============================================================================
// WebSocket Handler
// ============================================================================

export class WebSocketHandler {
  private readonly wss: WebSocketServer;
  private readonly context: AppContext;
  private readonly logger: Logger;
  private readonly clients = new Map<WebSocket, ClientInfo>();
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private clientCounter = 0;

  private readonly onCut: CutEngineEvents['cut'];
  private readonly onSession: CutEngineEvents['session'];
  private readonly onDiscontinuity: CutEngineEvents['discontinuity'];

  constructor(server: Server, context: AppContext, logger: Logger) {
    this.context = context;
    this.logger = logger.child({ module: 'websocket' });

    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.onCut = (outcome, sessionId) => {
      this.broadcastCut(outcome, sessionId);
    };
    this.onSession = (event, finalized) => {
      this.broadcastSession(event, finalized);
    };
    this.onDiscontinuity = (discontinuity, sessionId) => {
      this.broadcastDiscontinuity(discontinuity, sessionId);
    };

    context.engine.on('cut', this.onCut);
    context.engine.on('session', this.onSession);
    context.engine.on('discontinuity', this.onDiscontinuity);

    this.setupEventHandlers();
    this.startHeartbeat();
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  broadcastCut(
    outcome: Extract<CorrelationOutcome, { kind: 'opened' | 'cut' }>,
    sessionId: string
  ): void {
    const { dropFrame } = this.context.config.engine;
    this.broadcast({
      type: 'cut',
      payload: {
        sessionId,
        kind: outcome.kind,
        closed: outcome.kind === 'cut' ? serialiseCutRecord(outcome.closed, dropFrame) : null,
        opened: serialiseCutRecord(outcome.kind === 'cut' ? outcome.opened : outcome.record, dropFrame),
      },
      timestamp: new Date().toISOString(),
    });
  }

  broadcastSession(event: SessionEvent, finalized: FinalizedCutLog | null): void {
    this.broadcast({
      type: 'session',
      payload: {
        sessionId: event.sessionId,
        action: event.action,
        observedAt: new Date(event.observedAt).toISOString(),
        records: finalized?.records.length ?? null,
        unresolved: finalized ? unresolvedRecords(finalized.records).length : null,
      },
      timestamp: new Date().toISOString(),
    });
  }

  broadcastDiscontinuity(discontinuity: Discontinuity, sessionId: string): void {
    const { dropFrame } = this.context.config.engine;
    this.broadcast({
      type: 'discontinuity',
      payload: {
        sessionId,
        expected: formatTimecode(discontinuity.expected, dropFrame),
        received: formatTimecode(discontinuity.received, dropFrame),
        deltaFrames: discontinuity.deltaFrames,
        observedAt: new Date(discontinuity.observedAt).toISOString(),
      },
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Get count of connected clients.
   */
  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Shutdown WebSocket server.
   */
  shutdown(): void {
    this.logger.info('Shutting down WebSocket server');

    this.context.engine.off('cut', this.onCut);
    this.context.engine.off('session', this.onSession);
    this.context.engine.off('discontinuity', this.onDiscontinuity);

    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    for (const client of this.clients.keys()) {
      client.close(1001, 'Server shutting down');
    }

    this.clients.clear();
    this.wss.close();
  }

  // --------------------------------------------------------------------------
  // Private Methods
  // --------------------------------------------------------------------------

  private setupEventHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      this.handleConnection(ws);
    });

    this.wss.on('error', (error) => {
      this.logger.error({ err: error }, 'WebSocket server error');
    });
  }

  private handleConnection(ws: WebSocket): void {
    const info: ClientInfo = {
      clientId: `client-${String(++this.clientCounter)}`,
      isAlive: true,
      topics: new Set<BroadcastTopic>(['cut', 'session', 'discontinuity']),
    };

    this.clients.set(ws, info);
    this.logger.info({ clientId: info.clientId, clients: this.clients.size }, 'Client connected');

    this.sendInitialState(ws);

    ws.on('message', (data: RawData) => {
      this.handleMessage(ws, info, data);
    });

    ws.on('pong', () => {
      info.isAlive = true;
    });

    ws.on('close', (code, reason) => {
      this.clients.delete(ws);
      this.logger.info(
        { clientId: info.clientId, code, reason: reason.toString(), clients: this.clients.size },
        'Client disconnected'
      );
    });

    ws.on('error', (error) => {
      this.logger.error({ clientId: info.clientId, err: error }, 'Client error');
      this.clients.delete(ws);
    });
  }

  /**
   * Send the current session and its records to a newly connected client.
   */
  private sendInitialState(ws: WebSocket): void {
    const { engine, switcher, recorder, config } = this.context;
    const session = engine.getSession();

    this.send(ws, {
      type: 'initial_state',
      payload: {
        session: session ? { id: session.id, state: session.state } : null,
        records: engine.records().map((record) => serialiseCutRecord(record, config.engine.dropFrame)),
        devices: {
          switcher: { name: switcher.name, connected: switcher.isConnected() },
          recorder: { name: recorder.name, connected: recorder.isConnected() },
        },
        metrics: engine.getMetrics(),
      },
      timestamp: new Date().toISOString(),
    });
  }

  private handleMessage(ws: WebSocket, info: ClientInfo, data: RawData): void {
    const parsed = ClientMessageSchema.safeParse(parseJson(rawDataToString(data)));

    if (!parsed.success) {
      this.logger.warn({ clientId: info.clientId }, 'Invalid client message');
      this.send(ws, {
        type: 'error',
        payload: { message: 'Invalid message format' },
        timestamp: new Date().toISOString(),
      });
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'pong':
        info.isAlive = true;
        break;

      case 'get_state':
        this.sendInitialState(ws);
        break;

      case 'subscribe':
        info.topics = new Set(message.payload.events);
        this.logger.debug({ clientId: info.clientId, topics: message.payload.events }, 'Client subscribed');
        break;

      case 'unsubscribe':
        for (const topic of message.payload.events) {
          info.topics.delete(topic);
        }
        break;
    }
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private broadcast(message: ServerMessage & { type: BroadcastTopic }): void {
    const messageStr = JSON.stringify(message);

    for (const [client, info] of this.clients) {
      if (!info.topics.has(message.type)) {
        continue;
      }
      if (client.readyState === WebSocket.OPEN) {
        client.send(messageStr);
      }
    }
  }

  /**
   * Terminate clients that missed a heartbeat.
   */
  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      for (const [ws, info] of this.clients) {
        if (!info.isAlive) {
          this.logger.info({ clientId: info.clientId }, 'Terminating inactive client');
          ws.terminate();
          this.clients.delete(ws);
          continue;
        }

        info.isAlive = false;
        ws.ping();
      }
    }, HEARTBEAT_INTERVAL_MS);
    this.heartbeatInterval.unref();
  }
}

// ============================================================================
// Helpers
// ============================================================================

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
