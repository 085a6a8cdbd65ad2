/**
 * Export job error taxonomy.
 *
 * Every error is fatal for the run: nothing here is retried. `code` is the
 * stable identifier written to the logs; `message` is for humans.
 */

export type ExportErrorCode =
  | 'AUTHENTICATION_ERROR'
  | 'FETCH_ERROR'
  | 'WRITE_ERROR'
  | 'POST_CONDITION_ERROR'
  | 'ARTIFACT_UPLOAD_ERROR';

export class ExportJobError extends Error {
  constructor(
    public readonly code: ExportErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExportJobError';
  }
}

export class AuthenticationError extends ExportJobError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTHENTICATION_ERROR', message, options);
    this.name = 'AuthenticationError';
  }
}

export class FetchError extends ExportJobError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, options);
    this.name = 'FetchError';
  }
}

export class WriteError extends ExportJobError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('WRITE_ERROR', message, options);
    this.name = 'WriteError';
  }
}

/**
 * The raw export for the run date is missing after the pipeline reported
 * success.
 */
export class PostConditionError extends ExportJobError {
  constructor(public readonly expectedPath: string) {
    super('POST_CONDITION_ERROR', `Audit log file was not created: ${expectedPath}`);
    this.name = 'PostConditionError';
  }
}

export class ArtifactUploadError extends ExportJobError {
  constructor(
    public readonly key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('ARTIFACT_UPLOAD_ERROR', message, options);
    this.name = 'ArtifactUploadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
