// src/model/PipelineError.ts
import type { RemoteTarget } from './RemoteTarget';
import { describeTarget } from './RemoteTarget';

/**
 * How the retry wrapper treats an extraction failure.
 * `fatal` failures stop the whole run, `permanent` ones only the object they belong to.
 */
export type ErrorDisposition = 'retryable' | 'permanent' | 'fatal';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PipelineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.code = code;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('CONFIGURATION_ERROR', message, cause);
  }
}

export class AuthenticationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('AUTHENTICATION_ERROR', message, cause);
  }
}

export class ExtractionError extends PipelineError {
  readonly objectName: string;
  readonly attempts: number;
  readonly disposition: ErrorDisposition;

  constructor(objectName: string, cause: unknown, attempts = 1, disposition: ErrorDisposition = 'retryable') {
    super(
      'EXTRACTION_ERROR',
      attempts === 0
        ? `Extraction of ${objectName} was cancelled before it started: ${errorMessage(cause)}`
        : `Extraction of ${objectName} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(cause)}`,
      cause
    );
    this.objectName = objectName;
    this.attempts = attempts;
    this.disposition = disposition;
  }
}

export class PersistenceError extends PipelineError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('PERSISTENCE_ERROR', `Could not write ${path}: ${errorMessage(cause)}`, cause);
    this.path = path;
  }
}

export class SyncError extends PipelineError {
  readonly target: RemoteTarget;

  constructor(target: RemoteTarget, cause: unknown) {
    super('SYNC_ERROR', `Upload to ${describeTarget(target)} failed: ${errorMessage(cause)}`, cause);
    this.target = target;
  }
}
