/**
 * API Route Handlers.
 * Provides endpoints for status, the live cut log, session control, EDL
 * download and health checks.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { beginSession, edlExportConfig, generateSessionId, saveEdl, type AppContext } from '../../app.js';
import { unresolvedRecords, type CutPoint, type CutRecord } from '../../core/cutlog/cut-log.js';
import type { EngineMetrics } from '../../core/engine/engine.js';
import { EngineError, SessionStateError } from '../../core/errors.js';
import { formatTimecode } from '../../core/timecode/timecode.js';
import { exportEdl } from '../../generators/edl/cmx3600.js';

// ============================================================================
// Types
// ============================================================================

export interface CutPointDto {
  observedAt: string;
  timecode: string | null;
  confidence: CutPoint['confidence'];
}

export interface CutRecordDto {
  sequenceIndex: number;
  source: { id: string; label: string };
  recordIn: CutPointDto;
  recordOut: CutPointDto | null;
}

interface StatusResponse {
  uptime: number;
  session: {
    id: string | null;
    state: EngineMetrics['state'];
    startedAt: string | null;
  };
  devices: {
    switcher: { name: string; connected: boolean };
    recorder: { name: string; connected: boolean };
  };
  reference: {
    timecode: string;
    transportState: string;
    observedAt: string;
  } | null;
  metrics: EngineMetrics;
  config: {
    frameRate: number;
    dropFrame: boolean;
    frameOffset: number;
  };
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  checks: {
    switcher: { status: 'up' | 'down'; name: string };
    recorder: { status: 'up' | 'down'; name: string };
    engine: { eventsApplied: number; unresolvedPoints: number };
  };
}

const SafeNameSchema = z.string().min(1).max(64).regex(/^[A-Za-z0-9_-]+$/);

const SessionStartBodySchema = z
  .object({
    sessionId: SafeNameSchema.optional(),
  })
  .default({});

const EdlQuerySchema = z.object({
  title: SafeNameSchema.optional(),
});

// ============================================================================
// Serialisation
// ============================================================================

function serialisePoint(point: CutPoint, dropFrame: boolean): CutPointDto {
  return {
    observedAt: new Date(point.observedAt).toISOString(),
    timecode: point.timecode ? formatTimecode(point.timecode, dropFrame) : null,
    confidence: point.confidence,
  };
}

/**
 * JSON form of a cut record, shared by the REST and WebSocket surfaces.
 */
export function serialiseCutRecord(record: CutRecord, dropFrame: boolean): CutRecordDto {
  return {
    sequenceIndex: record.sequenceIndex,
    source: { id: record.source.id, label: record.source.label },
    recordIn: serialisePoint(record.recordIn, dropFrame),
    recordOut: record.recordOut ? serialisePoint(record.recordOut, dropFrame) : null,
  };
}

// ============================================================================
// Router Factory
// ============================================================================

/**
 * Create API router with all endpoints.
 */
export function createApiRouter(context: AppContext): Router {
  const router = Router();
  const { engine, config } = context;

  // GET /api/status - Session state, device connections and counters
  router.get('/status', (_req: Request, res: Response) => {
    res.json(buildStatusResponse(context));
  });

  // GET /api/cuts - Snapshot of the current (or last) session's records
  router.get('/cuts', (_req: Request, res: Response) => {
    const records = engine.records();
    res.json({
      sessionId: engine.getSession()?.id ?? null,
      records: records.map((record) => serialiseCutRecord(record, config.engine.dropFrame)),
      total: records.length,
    });
  });

  // POST /api/session/start - Start a new session
  router.post('/session/start', (req: Request, res: Response) => {
    const body = SessionStartBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid request body' });
      return;
    }

    try {
      const session = beginSession(context, body.data.sessionId ?? generateSessionId());
      res.status(201).json({ sessionId: session.id, state: session.state });
    } catch (error) {
      if (error instanceof SessionStateError) {
        res.status(409).json({ error: error.message, code: error.code });
        return;
      }
      throw error;
    }
  });

  // POST /api/session/stop - Stop the session and write its EDL
  router.post('/session/stop', (_req: Request, res: Response, next: NextFunction) => {
    stopSession(context)
      .then((body) => {
        res.json(body);
      })
      .catch((error: unknown) => {
        if (error instanceof SessionStateError) {
          res.status(409).json({ error: error.message, code: error.code });
          return;
        }
        next(error);
      });
  });

  // GET /api/edl - Download the last finalized session as CMX 3600
  router.get('/edl', (req: Request, res: Response) => {
    const log = engine.getLastFinalized();
    if (!log) {
      res.status(404).json({ error: 'No finalized session to export' });
      return;
    }

    const query = EdlQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: query.error.issues[0]?.message ?? 'Invalid query' });
      return;
    }
    const title = `${query.data.title ?? config.edl.title}_${log.sessionId}`;

    let edl: Buffer;
    try {
      edl = exportEdl(log, edlExportConfig(config, title));
    } catch (error) {
      if (error instanceof EngineError) {
        res.status(422).json({ error: error.message, code: error.code });
        return;
      }
      throw error;
    }

    res.setHeader('Content-Type', 'text/plain');
    res.setHeader('Content-Disposition', `attachment; filename="${title}.edl"`);
    res.send(edl);
  });

  // GET /api/health - Return health check
  router.get('/health', (_req: Request, res: Response) => {
    const health = buildHealthResponse(context);
    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  return router;
}

// ============================================================================
// Handlers
// ============================================================================

async function stopSession(context: AppContext): Promise<Record<string, unknown>> {
  const log = await context.engine.stopSession();
  const unresolved = unresolvedRecords(log.records).length;

  try {
    const path = await saveEdl(context, log);
    return { sessionId: log.sessionId, records: log.records.length, unresolved, path };
  } catch (error) {
    // The session is finalized either way; the log can be exported again later
    if (error instanceof EngineError) {
      return {
        sessionId: log.sessionId,
        records: log.records.length,
        unresolved,
        path: null,
        exportError: { code: error.code, message: error.message },
      };
    }
    throw error;
  }
}

// ============================================================================
// Response Builders
// ============================================================================

/**
 * Build status response from the application context.
 */
function buildStatusResponse(context: AppContext): StatusResponse {
  const { engine, switcher, recorder, config } = context;
  const session = engine.getSession();
  const reading = session?.tracker.latest() ?? null;

  return {
    uptime: Math.floor((Date.now() - context.startTime.getTime()) / 1000),
    session: {
      id: session?.id ?? null,
      state: session?.state ?? 'idle',
      startedAt: session?.startedAt != null ? new Date(session.startedAt).toISOString() : null,
    },
    devices: {
      switcher: { name: switcher.name, connected: switcher.isConnected() },
      recorder: { name: recorder.name, connected: recorder.isConnected() },
    },
    reference: reading
      ? {
          timecode: formatTimecode(reading.timecode, config.engine.dropFrame),
          transportState: reading.transportState,
          observedAt: new Date(reading.observedAt).toISOString(),
        }
      : null,
    metrics: engine.getMetrics(),
    config: {
      frameRate: config.engine.frameRate,
      dropFrame: config.engine.dropFrame,
      frameOffset: config.engine.frameOffset,
    },
  };
}

/**
 * Build health check response.
 */
function buildHealthResponse(context: AppContext): HealthResponse {
  const { switcher, recorder, engine } = context;
  const switcherUp = switcher.isConnected();
  const recorderUp = recorder.isConnected();
  const metrics = engine.getMetrics();

  let status: HealthResponse['status'];
  if (switcherUp && recorderUp) {
    status = 'healthy';
  } else if (switcherUp || recorderUp) {
    status = 'degraded';
  } else {
    status = 'unhealthy';
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    checks: {
      switcher: { status: switcherUp ? 'up' : 'down', name: switcher.name },
      recorder: { status: recorderUp ? 'up' : 'down', name: recorder.name },
      engine: { eventsApplied: metrics.eventsApplied, unresolvedPoints: metrics.unresolvedPoints },
    },
  };
}
