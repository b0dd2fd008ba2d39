/**
 * Live cut EDL application.
 *
 * Core application logic extracted for use by CLI and programmatic interfaces.
 *
 * @module live-cut-edl/app
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { pino, type Logger } from 'pino';
import { parse as parseYaml } from 'yaml';
import { AtemSwitcherSource } from './adapters/atem/adapter.js';
import {
  parseConfig,
  reelNamesFromInputs,
  toEngineConfig,
  type Config,
} from './core/config/schema.js';
import type { FinalizedCutLog } from './core/cutlog/cut-log.js';
import { CutEngine } from './core/engine/engine.js';
import {
  attachSources,
  type RecorderEventEmitter,
  type RecorderSource,
  type SwitcherEventEmitter,
  type SwitcherSource,
} from './core/events/sources.js';
import { EventStore } from './core/events/store.js';
import type { Session } from './core/session/session.js';
import { exportEdl, type EdlExportConfig } from './generators/edl/cmx3600.js';
import { HyperDeckTimecodeSource } from './providers/timecode/hyperdeck.js';
import { SystemClockTimecodeSource } from './providers/timecode/system-clock.js';
import { createWebServer, type WebServer } from './web/server.js';

// ============================================================================
// Logger Setup
// ============================================================================

/**
 * Create application logger with sensible defaults.
 */
export function createLogger(level?: string, prettyPrint = true): Logger {
  if (prettyPrint) {
    return pino({
      level: level ?? process.env['LOG_LEVEL'] ?? 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
  });
}

// ============================================================================
// Application Context
// ============================================================================

export type Switcher = SwitcherSource & SwitcherEventEmitter;
export type Recorder = RecorderSource & RecorderEventEmitter;

export interface AppContext {
  config: Config;
  engine: CutEngine;
  switcher: Switcher;
  recorder: Recorder;
  journal: EventStore | null;
  logger: Logger;
  startTime: Date;
}

export interface AppContextOverrides {
  switcher?: Switcher;
  recorder?: Recorder;
}

/**
 * Session identifier from the current UTC time, e.g. 20261018_093015.
 */
export function generateSessionId(now: Date = new Date()): string {
  return now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

/**
 * Timecode source for the configured recorder.
 */
export function createRecorder(config: Config, logger: Logger): Recorder {
  const { recorder, engine } = config;

  if (recorder.source === 'hyperdeck') {
    if (!recorder.host) {
      throw new Error('recorder.host is required when recorder.source is hyperdeck');
    }
    return new HyperDeckTimecodeSource(
      {
        host: recorder.host,
        port: recorder.port,
        pollRateHz: recorder.pollRateHz,
        useNotifications: recorder.useNotifications,
        reconnect: recorder.reconnect,
      },
      logger
    );
  }

  return new SystemClockTimecodeSource(
    {
      frameRate: engine.frameRate,
      dropFrame: engine.dropFrame,
      startTimecode: recorder.startTimecode,
    },
    logger
  );
}

/**
 * Build the engine, journal and device sources. Nothing connects yet.
 */
export function createAppContext(
  config: Config,
  logger: Logger,
  overrides: AppContextOverrides = {}
): AppContext {
  const journal = config.journal.enabled
    ? new EventStore({
        logDirectory: config.journal.directory,
        rotateDaily: config.journal.rotateDaily,
        logger,
      })
    : null;

  const engine = new CutEngine({
    config: toEngineConfig(config),
    logger,
    ...(journal ? { journal } : {}),
  });

  const switcher =
    overrides.switcher ??
    new AtemSwitcherSource({ config: config.switcher, inputs: config.inputs, logger });
  const recorder = overrides.recorder ?? createRecorder(config, logger);

  return { config, engine, switcher, recorder, journal, logger, startTime: new Date() };
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Load and validate configuration from YAML file.
 */
export async function loadConfig(configPath: string, logger: Logger): Promise<Config> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    logger.error({ path: absolutePath }, 'Configuration file not found');
    logger.info('Copy config/config.example.yaml to config/config.yaml and edit with your settings');
    throw new Error(`Configuration file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, 'utf-8');
  const raw: unknown = parseYaml(content);

  return parseConfig(raw);
}

/**
 * Ensure required output directories exist.
 */
export async function ensureDirectories(config: Config, logger: Logger): Promise<void> {
  const dirs = [config.edl.outputDirectory];
  if (config.journal.enabled) {
    dirs.push(config.journal.directory);
  }

  for (const dir of dirs) {
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
      logger.debug({ dir }, 'Created directory');
    }
  }
}

// ============================================================================
// Session Control
// ============================================================================

/**
 * Start a session and announce the current program source so the first
 * record opens immediately.
 */
export function beginSession(context: AppContext, sessionId: string = generateSessionId()): Session {
  const session = context.engine.startSession(sessionId);
  context.switcher.announceCurrent();
  return session;
}

/**
 * Exporter settings from the parsed configuration.
 */
export function edlExportConfig(config: Config, title: string): EdlExportConfig {
  return {
    title,
    rejectEmptyExport: config.engine.rejectEmptyExport,
    includeComments: config.edl.includeComments,
    reelNames: reelNamesFromInputs(config),
  };
}

/**
 * Write the EDL for a finalized log. Returns the file path.
 */
export async function saveEdl(context: AppContext, log: FinalizedCutLog): Promise<string> {
  const { config, logger } = context;
  const title = `${config.edl.title}_${log.sessionId}`;

  const edl = exportEdl(log, edlExportConfig(config, title));

  const filepath = resolve(config.edl.outputDirectory, `${title}.edl`);
  await mkdir(config.edl.outputDirectory, { recursive: true });
  await writeFile(filepath, edl);
  logger.info({ path: filepath, records: log.records.length }, 'EDL generated');

  return filepath;
}

/**
 * Stop the active session and write its EDL.
 */
export async function endSession(context: AppContext): Promise<{ log: FinalizedCutLog; path: string }> {
  const log = await context.engine.stopSession();
  const path = await saveEdl(context, log);
  return { log, path };
}

// ============================================================================
// Event Handlers
// ============================================================================

/**
 * Log device and engine events.
 */
export function setupEventHandlers(context: AppContext): void {
  const { switcher, recorder, engine, logger } = context;

  switcher.on('connection', (state, error) => {
    if (state === 'error') {
      logger.error({ device: switcher.name, err: error }, 'Switcher connection error');
    } else {
      logger.info({ device: switcher.name, state }, 'Switcher connection state');
    }
  });

  switcher.on('error', (error) => {
    logger.error({ device: switcher.name, err: error }, 'Switcher error');
  });

  recorder.on('connection', (state, error) => {
    if (state === 'error') {
      logger.error({ device: recorder.name, err: error }, 'Recorder connection error');
    } else {
      logger.info({ device: recorder.name, state }, 'Recorder connection state');
    }
  });

  recorder.on('error', (error) => {
    logger.error({ device: recorder.name, err: error }, 'Recorder error');
  });

  engine.on('error', (error) => {
    logger.fatal({ err: error }, 'Engine halted');
  });
}

// ============================================================================
// Application Lifecycle
// ============================================================================

export interface StartOptions {
  configPath?: string;
  /** Disable web server (useful for testing) */
  disableWeb?: boolean;
  /** Start a session as soon as the devices are connecting (default: true) */
  autoStart?: boolean;
}

export interface RunningApp {
  context: AppContext;
  webServer: WebServer | null;
  shutdown: () => Promise<void>;
}

/**
 * Start the application.
 * Returns a shutdown function for graceful termination.
 */
export async function startApp(options: StartOptions = {}): Promise<RunningApp> {
  const configPath = options.configPath ?? process.env['CONFIG_PATH'] ?? './config/config.yaml';

  const bootLogger = createLogger();
  const config = await loadConfig(configPath, bootLogger);
  const logger = createLogger(config.logging.level, config.logging.prettyPrint);

  logger.info({ switcher: config.switcher.host, recorder: config.recorder.source }, 'Configuration loaded');

  await ensureDirectories(config, logger);

  const context = createAppContext(config, logger);
  setupEventHandlers(context);
  const detach = attachSources(context.engine, context.switcher, context.recorder);

  // Devices reconnect on their own; a failed first attempt is not fatal
  context.switcher.connect().catch((error: unknown) => {
    logger.error({ err: error }, 'Failed to connect to switcher');
  });
  context.recorder.connect().catch((error: unknown) => {
    logger.error({ err: error }, 'Failed to connect to recorder');
  });

  if (options.autoStart ?? true) {
    beginSession(context);
  }

  let webServer: WebServer | null = null;
  if (config.web.enabled && !options.disableWeb) {
    webServer = createWebServer({ config: config.web, context, logger });
    await webServer.start();
  }

  logger.info('Live cut EDL engine running. Press Ctrl+C to stop.');

  const shutdown = async (): Promise<void> => {
    logger.info('Shutdown initiated');

    if (webServer) {
      await webServer.stop();
    }

    if (context.engine.getSession()?.isActive()) {
      logger.info('Writing final EDL before shutdown...');
      await endSession(context);
    }

    detach();
    await Promise.all([context.switcher.disconnect(), context.recorder.disconnect()]);
    await context.journal?.close();

    logger.info('Shutdown complete');
  };

  return { context, webServer, shutdown };
}
