/**
 * Exploration engine errors.
 *
 * Each error carries a stable `code` so results and logs can be grouped
 * without string-matching messages.
 */

import { RoamerError } from '@roamer/shared';

/** The driver returned an empty or unparseable UI snapshot, or timed out capturing one. */
export class CaptureError extends RoamerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CAPTURE_ERROR', details);
    this.name = 'CaptureError';
  }
}

/** The model reply was not a well-formed decision object. */
export class OracleParseError extends RoamerError {
  constructor(
    message: string,
    public rawText: string
  ) {
    super(message, 'ORACLE_PARSE_ERROR');
    this.name = 'OracleParseError';
  }
}

/** The model reply was well-formed but named an element or interaction that does not exist. */
export class OracleInvalidActionError extends RoamerError {
  constructor(
    message: string,
    public rawText: string
  ) {
    super(message, 'ORACLE_INVALID_ACTION');
    this.name = 'OracleInvalidActionError';
  }
}

export class OracleUnavailableError extends RoamerError {
  constructor(
    message: string,
    public attempts: number,
    public cause?: Error
  ) {
    super(message, 'ORACLE_UNAVAILABLE', { attempts });
    this.name = 'OracleUnavailableError';
  }
}

export type ActionFailureKind = 'stale' | 'timeout' | 'crash';

export class ActionExecutionError extends RoamerError {
  constructor(
    message: string,
    public kind: ActionFailureKind,
    details?: Record<string, unknown>
  ) {
    super(message, 'ACTION_EXECUTION_ERROR', { kind, ...details });
    this.name = 'ActionExecutionError';
  }
}

/**
 * Two deltas disagree on a non-mergeable field of the same record. Merges
 * resolve these last-writer-wins and log them; the error is never thrown
 * out of the store.
 */
export class KnowledgeMergeConflict extends RoamerError {
  constructor(
    message: string,
    public fingerprint: string,
    public field: string
  ) {
    super(message, 'KNOWLEDGE_MERGE_CONFLICT', { fingerprint, field });
    this.name = 'KnowledgeMergeConflict';
  }
}

export class NoDeviceAvailableError extends RoamerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NO_DEVICE_AVAILABLE', details);
    this.name = 'NoDeviceAvailableError';
  }
}

export class JobFileError extends RoamerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'JOB_FILE_ERROR', details);
    this.name = 'JobFileError';
  }
}
