/**
 * Error taxonomy for the sync pipeline
 *
 * Run-level: SourceUnavailable, QuotaExhausted, Settings. Article-level: TransformFailed,
 * PublishRejected, PublishUnavailable, InvalidCandidate. DuplicateKey marks a
 * ledger invariant violation and is never shown to users.
 */

export type SyncErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'QUOTA_EXHAUSTED'
  | 'TRANSFORM_FAILED'
  | 'PUBLISH_REJECTED'
  | 'PUBLISH_UNAVAILABLE'
  | 'DUPLICATE_KEY'
  | 'INVALID_CANDIDATE'
  | 'INVALID_SETTINGS';

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;
  }
}

export class SourceUnavailableError extends SyncError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('SOURCE_UNAVAILABLE', message, options);
    this.name = 'SourceUnavailableError';
    this.status = options?.status;
  }
}

/**
 * The monthly source API quota cannot cover a run
 */
export class QuotaExhaustedError extends SyncError {
  constructor(message: string) {
    super('QUOTA_EXHAUSTED', message);
    this.name = 'QuotaExhaustedError';
  }
}

export class TransformFailedError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSFORM_FAILED', message, options);
    this.name = 'TransformFailedError';
  }
}

/**
 * 4xx from the publish target: the request itself is wrong
 */
export class PublishRejectedError extends SyncError {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super('PUBLISH_REJECTED', message, options);
    this.name = 'PublishRejectedError';
    this.status = status;
  }
}

/**
 * Network failure or 5xx from the publish target
 */
export class PublishUnavailableError extends SyncError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('PUBLISH_UNAVAILABLE', message, options);
    this.name = 'PublishUnavailableError';
    this.status = options?.status;
  }
}

export class DuplicateKeyError extends SyncError {
  readonly sourceUrl: string;

  constructor(sourceUrl: string) {
    super('DUPLICATE_KEY', `Sync record already exists for ${sourceUrl}`);
    this.name = 'DuplicateKeyError';
    this.sourceUrl = sourceUrl;
  }
}

export class InvalidCandidateError extends SyncError {
  constructor(message: string) {
    super('INVALID_CANDIDATE', message);
    this.name = 'InvalidCandidateError';
  }
}

export class SettingsError extends SyncError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_SETTINGS', message);
    this.name = 'SettingsError';
    this.issues = issues;
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
