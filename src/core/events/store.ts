/**
 * Event Store for the cut engine journal.
 *
 * Persists every applied event as JSONL so a session can be replayed
 * offline. Features ordered writes, daily log rotation and tolerant loading.
 */

import { appendFile, mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { pino, type Logger } from 'pino';
import { z } from 'zod';
import { TRANSPORT_STATES, type EngineEvent, type EventLogEntry, deserialiseEvent, serialiseEvent } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface EventStoreOptions {
  /** Directory for storing event log files */
  logDirectory: string;
  /** Enable daily log rotation (default: true) */
  rotateDaily?: boolean;
  logger?: Logger;
}

export interface EventFilter {
  type?: EngineEvent['type'] | EngineEvent['type'][];
  /** Inclusive lower bound on observedAt */
  from?: number;
  /** Inclusive upper bound on observedAt */
  to?: number;
}

// ============================================================================
// Entry Schema
// ============================================================================

const TransportStateSchema = z.enum(TRANSPORT_STATES);

const EventLogEntrySchema: z.ZodType<EventLogEntry> = z.discriminatedUnion('type', [
  z.object({
    id: z.string(),
    type: z.literal('source_changed'),
    observedAt: z.number(),
    data: z.object({ source: z.object({ id: z.string(), label: z.string() }) }),
  }),
  z.object({
    id: z.string(),
    type: z.literal('timecode_tick'),
    observedAt: z.number(),
    data: z.object({ timecode: z.string(), transportState: TransportStateSchema }),
  }),
  z.object({
    id: z.string(),
    type: z.literal('session'),
    observedAt: z.number(),
    data: z.object({ action: z.enum(['start', 'stop']), sessionId: z.string() }),
  }),
]);

// ============================================================================
// Event Store
// ============================================================================

/**
 * Append-only JSONL journal with daily rotation.
 */
export class EventStore {
  private readonly logDirectory: string;
  private readonly rotateDaily: boolean;
  private readonly logger: Logger;

  private currentDate: string;
  private writeQueue: Promise<void> = Promise.resolve();
  private closed = false;
  private eventsWritten = 0;

  constructor(options: EventStoreOptions) {
    this.logDirectory = options.logDirectory;
    this.rotateDaily = options.rotateDaily ?? true;
    this.logger = (options.logger ?? pino({ level: 'silent' })).child({ module: 'journal' });
    this.currentDate = this.getDateString();
  }

  /**
   * Append an event. Writes are chained so the file keeps arrival order.
   */
  async append(event: EngineEvent): Promise<void> {
    if (this.closed) {
      throw new EventStoreError('Cannot append to closed EventStore');
    }

    const line = JSON.stringify(serialiseEvent(event)) + '\n';

    const write = this.writeQueue.then(async () => {
      await this.ensureDirectory(this.logDirectory);
      this.checkRotation();
      await this.atomicAppend(line);
      this.eventsWritten++;
    });

    // A failed write is reported to its caller and must not block later writes
    this.writeQueue = write.catch((error: unknown) => {
      this.logger.error({ err: error, type: event.type }, 'Journal write failed');
    });

    return write;
  }

  /**
   * Events from the current log file.
   */
  async getEvents(filter?: EventFilter): Promise<EngineEvent[]> {
    const logPath = this.getCurrentLogPath();
    if (!existsSync(logPath)) {
      return [];
    }
    return applyFilter(await this.loadFromFile(logPath), filter);
  }

  /**
   * Events from every journal file in the directory, oldest file first.
   */
  async getAllEvents(filter?: EventFilter): Promise<EngineEvent[]> {
    if (!existsSync(this.logDirectory)) {
      return [];
    }

    const files = (await readdir(this.logDirectory))
      .filter((name) => /^events-.+\.jsonl$/.test(name))
      .sort();

    const events: EngineEvent[] = [];
    for (const file of files) {
      events.push(...(await this.loadFromFile(join(this.logDirectory, file))));
    }
    return applyFilter(events, filter);
  }

  getCurrentLogPath(): string {
    return join(this.logDirectory, `events-${this.rotateDaily ? this.currentDate : 'all'}.jsonl`);
  }

  /**
   * Load events from a JSONL file. Malformed lines are skipped and logged.
   */
  async loadFromFile(path: string): Promise<EngineEvent[]> {
    if (!existsSync(path)) {
      throw new EventStoreError(`Log file not found: ${path}`);
    }

    const content = await readFile(path, 'utf-8');
    const lines = content.split('\n').filter((line) => line.trim().length > 0);

    const events: EngineEvent[] = [];
    const errors: Array<{ line: number; error: string }> = [];

    lines.forEach((line, index) => {
      try {
        events.push(deserialiseEvent(this.parseJsonlLine(line)));
      } catch (error) {
        errors.push({ line: index + 1, error: error instanceof Error ? error.message : String(error) });
      }
    });

    if (errors.length > 0) {
      this.logger.warn({ path, count: errors.length, errors: errors.slice(0, 5) }, 'Skipped malformed journal lines');
    }

    return events;
  }

  /**
   * Parse a single JSONL line into an EventLogEntry.
   */
  parseJsonlLine(line: string): EventLogEntry {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      throw new EventStoreError('Empty line');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new EventStoreError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = EventLogEntrySchema.safeParse(parsed);
    if (!result.success) {
      throw new EventStoreError(`Invalid event log entry: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }
    return result.data;
  }

  /**
   * Close the store after pending writes complete.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.writeQueue;
  }

  getEventsWritten(): number {
    return this.eventsWritten;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Appends to an existing file; a new file is written to a temp path and
   * renamed into place so it never appears half-written.
   */
  private async atomicAppend(line: string): Promise<void> {
    const logPath = this.getCurrentLogPath();

    if (existsSync(logPath)) {
      try {
        await appendFile(logPath, line, 'utf-8');
      } catch (error) {
        throw new EventStoreError(`Failed to write event: ${describe(error)}`);
      }
      return;
    }

    const tempPath = `${logPath}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, line, 'utf-8');
      await rename(tempPath, logPath);
    } catch (error) {
      if (existsSync(tempPath)) {
        await unlink(tempPath).catch((cleanupError: unknown) => {
          this.logger.warn({ tempPath, err: cleanupError }, 'Could not remove temp journal file');
        });
      }
      throw new EventStoreError(`Failed to write event: ${describe(error)}`);
    }
  }

  private async ensureDirectory(dir: string): Promise<void> {
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
  }

  private checkRotation(): void {
    if (!this.rotateDaily) {
      return;
    }
    const today = this.getDateString();
    if (today !== this.currentDate) {
      this.logger.info({ from: this.currentDate, to: today }, 'Rotating journal');
      this.currentDate = today;
    }
  }

  private getDateString(): string {
    return new Date().toISOString().slice(0, 10);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function applyFilter(events: EngineEvent[], filter?: EventFilter): EngineEvent[] {
  if (!filter) {
    return events;
  }

  const types = filter.type === undefined ? null : Array.isArray(filter.type) ? filter.type : [filter.type];

  return events.filter((event) => {
    if (types && !types.includes(event.type)) return false;
    if (filter.from !== undefined && event.observedAt < filter.from) return false;
    if (filter.to !== undefined && event.observedAt > filter.to) return false;
    return true;
  });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Errors
// ============================================================================

export class EventStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventStoreError';
    Error.captureStackTrace?.(this, EventStoreError);
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create an EventStore, creating its directory up front.
 *
 * @example
 * ```typescript
 * const store = await createEventStore({ logDirectory: './logs/journal' });
 * const engine = new CutEngine({ config, journal: store });
 * ```
 */
export async function createEventStore(options: EventStoreOptions): Promise<EventStore> {
  const store = new EventStore(options);
  if (!existsSync(options.logDirectory)) {
    await mkdir(options.logDirectory, { recursive: true });
  }
  return store;
}
