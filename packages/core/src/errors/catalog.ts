/**
 * Typed error catalog for the sync engine and its HTTP surface.
 */

export class SyncEngineError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Stage-fatal errors

export class ListingFailedError extends SyncEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('LISTING_FAILED', `Remote listing failed: ${message}`, details);
  }
}

export class BuildFailedError extends SyncEngineError {
  constructor(
    public readonly exitCode: number | null,
    public readonly stderr: string,
    reason?: string,
  ) {
    super(
      'BUILD_FAILED',
      reason ??
        `Build command failed with exit code ${exitCode ?? 'unknown'}`,
      { exitCode, stderr },
    );
  }
}

// Remote API errors

export class RemoteApiError extends SyncEngineError {
  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    body: string,
  ) {
    super('REMOTE_API_ERROR', `Remote API error ${status} on ${endpoint}`, {
      status,
      endpoint,
      body,
    });
  }
}

// Local filesystem / programming errors

export class PathOutsideRootError extends SyncEngineError {
  constructor(remotePath: string) {
    super(
      'PATH_OUTSIDE_ROOT',
      `Remote path resolves outside the local base: ${remotePath}`,
      { remotePath },
    );
  }
}

export class HasherConsumedError extends SyncEngineError {
  constructor() {
    super('HASHER_CONSUMED', 'Content hasher has already been finalized');
  }
}

// HTTP errors rendered by the server's error handler

export class HttpError extends SyncEngineError {
  constructor(
    public readonly status: 400 | 404 | 409 | 502,
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(code, message, details);
  }
}

export class InvalidRequestError extends HttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'INVALID_REQUEST', message, details);
  }
}

export class RemoteUnavailableError extends HttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(502, 'REMOTE_UNAVAILABLE', message, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
