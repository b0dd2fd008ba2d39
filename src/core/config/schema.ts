/**
 * Configuration schema for the live cut EDL engine.
 * Zod-validated configuration with sensible defaults.
 */

import { z } from 'zod';
import { validateFrameOffset } from '../timecode/offset.js';
import { isTimecodeString } from '../timecode/timecode.js';
import type { CutEngineConfig } from '../engine/engine.js';

// ============================================================================
// Sub-schemas
// ============================================================================

const FrameRateSchema = z.union([
  z.literal(23.976),
  z.literal(24),
  z.literal(25),
  z.literal(29.97),
  z.literal(30),
  z.literal(50),
  z.literal(59.94),
  z.literal(60),
]);

const ReconnectConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxAttempts: z.number().int().min(0).default(0), // 0 = infinite
  initialDelayMs: z.number().int().positive().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
});

const EngineConfigSchema = z.object({
  frameRate: FrameRateSchema.default(25),
  dropFrame: z.boolean().default(false),
  /**
   * Signed frame correction applied to every cut timecode.
   * Positive when the recorder runs ahead of the switcher, negative when behind.
   */
  frameOffset: z.number().int().default(0),
  /** Maximum distance between a cut and the playing reading used to time it */
  stalenessThresholdMs: z.number().int().positive().default(15000),
  rejectEmptyExport: z.boolean().default(false),
  channelCapacity: z.number().int().positive().default(1024),
  historySize: z.number().int().positive().default(256),
});

const SwitcherConfigSchema = z.object({
  host: z.string().ip({ version: 'v4' }),
  mixEffect: z.number().int().min(0).max(3).default(0),
  reconnect: ReconnectConfigSchema.default({}),
});

const RecorderConfigSchema = z.object({
  source: z.enum(['hyperdeck', 'system']).default('system'),
  host: z.string().ip({ version: 'v4' }).optional(),
  port: z.number().int().min(1).max(65535).default(9993),
  pollRateHz: z.number().positive().max(50).default(10),
  useNotifications: z.boolean().default(true),
  /** Timecode the system clock source starts from; 'auto' follows time of day */
  startTimecode: z
    .string()
    .refine((value) => value === 'auto' || isTimecodeString(value), {
      message: 'Expected HH:MM:SS:FF, HH:MM:SS;FF or auto',
    })
    .default('auto'),
  reconnect: ReconnectConfigSchema.default({}),
});

const InputConfigSchema = z.object({
  label: z.string().min(1).max(64),
  reelName: z.string().min(1).max(8).optional(), // CMX 3600 limit
});

const EdlConfigSchema = z.object({
  outputDirectory: z.string().default('./output'),
  title: z.string().min(1).max(64).regex(/^[A-Za-z0-9_-]+$/).default('LIVE_PRODUCTION'),
  includeComments: z.boolean().default(true),
});

const JournalConfigSchema = z.object({
  enabled: z.boolean().default(true),
  directory: z.string().default('./logs/journal'),
  rotateDaily: z.boolean().default(true),
});

const WebAuthConfigSchema = z.object({
  enabled: z.boolean().default(false),
  username: z.string().optional(),
  password: z.string().optional(),
});

const WebConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(0).max(65535).default(3000),
  host: z.string().default('0.0.0.0'),
  auth: WebAuthConfigSchema.optional(),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  prettyPrint: z.boolean().default(true),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  engine: EngineConfigSchema.default({}),
  switcher: SwitcherConfigSchema,
  recorder: RecorderConfigSchema.default({}),
  inputs: z.record(z.coerce.number(), InputConfigSchema).default({}),
  edl: EdlConfigSchema.default({}),
  journal: JournalConfigSchema.default({}),
  web: WebConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type SwitcherConfig = z.infer<typeof SwitcherConfigSchema>;
export type RecorderConfig = z.infer<typeof RecorderConfigSchema>;
export type ReconnectConfig = z.infer<typeof ReconnectConfigSchema>;
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type EdlConfig = z.infer<typeof EdlConfigSchema>;
export type JournalConfig = z.infer<typeof JournalConfigSchema>;
export type WebConfig = z.infer<typeof WebConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate and parse configuration.
 * Returns parsed config or throws ZodError.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

/**
 * Validate configuration without throwing.
 */
export function safeParseConfig(raw: unknown): z.SafeParseReturnType<unknown, Config> {
  return ConfigSchema.safeParse(raw);
}

/**
 * Parse engine settings on their own, filling defaults.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  return EngineConfigSchema.parse(raw);
}

/**
 * Engine checks the schema can't express: drop-frame rate and offset range.
 */
export function validateEngineSettings(engine: EngineConfig): string[] {
  const errors: string[] = [];
  const { frameRate, dropFrame, frameOffset } = engine;

  if (dropFrame && frameRate !== 29.97 && frameRate !== 59.94) {
    errors.push(
      `Drop-frame timecode is only valid for 29.97 and 59.94 fps. ` +
      `Current frame rate is ${String(frameRate)}. Set dropFrame to false.`
    );
  }

  try {
    validateFrameOffset(frameOffset, { frameRate, dropFrame });
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  return errors;
}

/**
 * Semantic checks across the whole configuration.
 */
export function validateEngineConfig(config: Config): string[] {
  const errors = validateEngineSettings(config.engine);

  if (config.recorder.source === 'hyperdeck' && !config.recorder.host) {
    errors.push('recorder.host is required when recorder.source is hyperdeck');
  }

  return errors;
}

/**
 * Engine settings from the parsed configuration.
 */
export function toEngineConfig(config: Config): CutEngineConfig {
  return { ...config.engine };
}

/**
 * Reel name overrides keyed by source id (the switcher input number).
 */
export function reelNamesFromInputs(config: Config): Record<string, string> {
  const reels: Record<string, string> = {};
  for (const [inputId, input] of Object.entries(config.inputs)) {
    if (input.reelName) {
      reels[inputId] = input.reelName;
    }
  }
  return reels;
}
