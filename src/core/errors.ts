/**
 * Error taxonomy for the cut correlation engine.
 *
 * Reference errors are recovered internally through deferred resolution.
 * Invariant violations are programming errors and are never retried.
 * Export errors leave the cut log intact.
 */

export type EngineErrorCode =
  | 'NO_REFERENCE_AVAILABLE'
  | 'STALE_REFERENCE'
  | 'INVALID_OFFSET'
  | 'INVARIANT_VIOLATION'
  | 'EMPTY_LOG'
  | 'UNSUPPORTED_FRAME_RATE'
  | 'SESSION_STATE';

/**
 * Base class for every error thrown by the engine.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    Error.captureStackTrace?.(this, new.target);
  }
}

// ============================================================================
// Reference Unavailable
// ============================================================================

export class NoReferenceAvailableError extends EngineError {
  constructor(instant: number) {
    super(
      'NO_REFERENCE_AVAILABLE',
      `No playing timecode reading available to estimate instant ${String(instant)}`
    );
    this.name = 'NoReferenceAvailableError';
  }
}

export class StaleReferenceError extends EngineError {
  readonly ageMs: number;

  constructor(instant: number, ageMs: number, thresholdMs: number) {
    super(
      'STALE_REFERENCE',
      `Timecode reference is ${String(ageMs)}ms from instant ${String(instant)} ` +
      `(threshold ${String(thresholdMs)}ms)`
    );
    this.name = 'StaleReferenceError';
    this.ageMs = ageMs;
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class InvalidOffsetError extends EngineError {
  constructor(message: string) {
    super('INVALID_OFFSET', message);
    this.name = 'InvalidOffsetError';
  }
}

// ============================================================================
// Invariant Violation
// ============================================================================

export class InvariantViolationError extends EngineError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'InvariantViolationError';
  }
}

// ============================================================================
// Export Failures
// ============================================================================

export class EmptyLogError extends EngineError {
  constructor() {
    super('EMPTY_LOG', 'Cut log has no records and empty exports are rejected');
    this.name = 'EmptyLogError';
  }
}

export class UnsupportedFrameRateError extends EngineError {
  readonly frameRate: number;

  constructor(frameRate: number, dropFrame: boolean) {
    super(
      'UNSUPPORTED_FRAME_RATE',
      `${String(frameRate)} fps${dropFrame ? ' drop-frame' : ''} has no CMX 3600 representation`
    );
    this.name = 'UnsupportedFrameRateError';
    this.frameRate = frameRate;
  }
}

// ============================================================================
// Session Lifecycle
// ============================================================================

export class SessionStateError extends EngineError {
  constructor(message: string) {
    super('SESSION_STATE', message);
    this.name = 'SessionStateError';
  }
}

/**
 * True for the errors that deferred resolution recovers from.
 */
export function isReferenceUnavailable(
  error: unknown
): error is NoReferenceAvailableError | StaleReferenceError {
  return error instanceof NoReferenceAvailableError || error instanceof StaleReferenceError;
}
