#!/usr/bin/env node
/**
 * Live cut EDL CLI.
 *
 * Command-line interface for running the engine, regenerating EDLs from a
 * journal, and validating configuration files.
 *
 * @module live-cut-edl/cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createLogger, loadConfig, startApp } from './app.js';
import {
  parseEngineConfig,
  reelNamesFromInputs,
  safeParseConfig,
  validateEngineConfig,
  validateEngineSettings,
  type EngineConfig,
} from './core/config/schema.js';
import { unresolvedRecords } from './core/cutlog/cut-log.js';
import { replayJournal } from './core/events/replay.js';
import { exportEdl } from './generators/edl/cmx3600.js';

// ============================================================================
// CLI Setup
// ============================================================================

const program = new Command();

program
  .name('cut-edl')
  .description('Frame-accurate EDL generation from live switcher cuts and recorder timecode')
  .version('0.1.0');

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

// ============================================================================
// Start Command
// ============================================================================

program
  .command('start')
  .description('Connect to the devices, record cuts and write the EDL on exit')
  .option('-c, --config <path>', 'Path to configuration file', './config/config.yaml')
  .option('--no-auto-start', 'Wait for POST /api/session/start instead of starting a session')
  .action(async (options: { config: string; autoStart: boolean }) => {
    const { shutdown, context } = await startApp({
      configPath: options.config,
      autoStart: options.autoStart,
    });
    const { logger } = context;

    let shuttingDown = false;
    const handleSignal = (signal: string): void => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info({ signal }, 'Shutdown signal received');
      shutdown()
        .then(() => {
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.fatal({ err: error }, 'Shutdown failed');
          process.exit(1);
        });
    };

    process.on('SIGINT', () => {
      handleSignal('SIGINT');
    });
    process.on('SIGTERM', () => {
      handleSignal('SIGTERM');
    });
  });

// ============================================================================
// Generate EDL Command
// ============================================================================

interface GenerateEdlOptions {
  input: string;
  output: string;
  config?: string;
  title: string;
  frameRate?: number;
  dropFrame?: boolean;
  offset?: number;
  staleness?: number;
  comments: boolean;
  rejectEmpty?: boolean;
}

program
  .command('generate-edl')
  .description('Replay an event journal and write the EDL of its last complete session')
  .requiredOption('-i, --input <path>', 'Path to event journal JSONL file')
  .requiredOption('-o, --output <path>', 'Path for output file')
  .option('-c, --config <path>', 'Configuration file for engine settings and reel names')
  .option('-t, --title <string>', 'EDL title', 'LIVE_PRODUCTION')
  .option('-r, --frame-rate <number>', 'Frame rate', parseNumber)
  .option('--drop-frame', 'Use drop-frame timecode')
  .option('--offset <frames>', 'Signed frame offset applied to every cut', parseInteger)
  .option('--staleness <ms>', 'Staleness threshold in milliseconds', parseInteger)
  .option('--no-comments', 'Exclude comments from EDL')
  .option('--reject-empty', 'Fail when the session has no records')
  .action(async (options: GenerateEdlOptions) => {
    const logger = createLogger('info');

    try {
      const inputPath = resolve(options.input);
      const outputPath = resolve(options.output);

      if (!existsSync(inputPath)) {
        logger.error({ path: inputPath }, 'Input file not found');
        process.exit(1);
      }

      const config = options.config ? await loadConfig(options.config, logger) : null;
      const engine: EngineConfig = parseEngineConfig({
        ...(config?.engine ?? {}),
        ...(options.frameRate !== undefined ? { frameRate: options.frameRate } : {}),
        ...(options.dropFrame !== undefined ? { dropFrame: options.dropFrame } : {}),
        ...(options.offset !== undefined ? { frameOffset: options.offset } : {}),
        ...(options.staleness !== undefined ? { stalenessThresholdMs: options.staleness } : {}),
        ...(options.rejectEmpty !== undefined ? { rejectEmptyExport: options.rejectEmpty } : {}),
      });

      const settingsErrors = validateEngineSettings(engine);
      if (settingsErrors.length > 0) {
        for (const error of settingsErrors) {
          logger.error(error);
        }
        process.exit(1);
      }

      logger.info({ path: inputPath }, 'Replaying event journal');
      const log = await replayJournal(inputPath, engine, { logger });

      const edl = exportEdl(log, {
        title: options.title,
        rejectEmptyExport: engine.rejectEmptyExport,
        includeComments: options.comments,
        reelNames: config ? reelNamesFromInputs(config) : {},
      });

      await writeFile(outputPath, edl);
      logger.info(
        {
          path: outputPath,
          sessionId: log.sessionId,
          records: log.records.length,
          unresolved: unresolvedRecords(log.records).length,
        },
        'EDL generated successfully'
      );
    } catch (error) {
      logger.fatal({ err: error }, 'Failed to generate EDL');
      process.exit(1);
    }
  });

// ============================================================================
// Validate Config Command
// ============================================================================

program
  .command('validate-config')
  .description('Validate configuration file')
  .option('-c, --config <path>', 'Path to configuration file', './config/config.yaml')
  .action(async (options: { config: string }) => {
    const logger = createLogger('info');

    try {
      const configPath = resolve(options.config);

      if (!existsSync(configPath)) {
        logger.error({ path: configPath }, 'Configuration file not found');
        process.exit(1);
      }

      logger.info({ path: configPath }, 'Validating configuration');

      const content = await readFile(configPath, 'utf-8');
      const raw: unknown = parseYaml(content);

      const result = safeParseConfig(raw);

      if (!result.success) {
        logger.error('Configuration validation failed:');
        for (const issue of result.error.issues) {
          logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
        }
        process.exit(1);
      }

      const semanticErrors = validateEngineConfig(result.data);

      if (semanticErrors.length > 0) {
        logger.error('Configuration semantic errors:');
        for (const error of semanticErrors) {
          logger.error(`  ${error}`);
        }
        process.exit(1);
      }

      logger.info('Configuration valid');
      console.log('\nParsed configuration:');
      console.log(JSON.stringify(result.data, null, 2));
    } catch (error) {
      logger.fatal({ err: error }, 'Failed to validate configuration');
      process.exit(1);
    }
  });

// ============================================================================
// Entry Point
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
