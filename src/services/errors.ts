import type { FailureKind } from '../types/request';

/**
 * Base class for errors that end a single conversion request.
 * `kind` is recorded on the request's failure.
 */
export abstract class JobError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class LaunchError extends JobError {
  readonly kind = 'launch';

  constructor(readonly executablePath: string, reason: string) {
    super(`Failed to launch converter "${executablePath}": ${reason}`);
  }
}

export class ConversionError extends JobError {
  readonly kind = 'conversion';

  constructor(message: string, readonly exitCode: number | null = null) {
    super(message);
  }
}

export class FilesystemError extends JobError {
  readonly kind: FailureKind = 'filesystem';

  constructor(message: string, readonly code?: string) {
    super(message);
  }
}

/** Disk full, quota or descriptor exhaustion: pauses the queue instead of failing every job. */
export class ResourceExhaustedError extends FilesystemError {
  readonly kind: FailureKind = 'resource';
}

export class DownloadError extends JobError {
  readonly kind = 'download';

  constructor(readonly url: string, reason: string) {
    super(`Failed to download "${url}": ${reason}`);
  }
}

/** User-initiated stop. Not a failure. */
export class CancellationError extends Error {
  constructor(message = 'Conversion cancelled by user.') {
    super(message);
    this.name = 'CancellationError';
  }
}

export class RunnerBusyError extends Error {
  constructor() {
    super('A converter process is already running.');
    this.name = 'RunnerBusyError';
  }
}

/** Invalid user input; nothing was queued or changed. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SourceValidationError extends ValidationError {}

export class PageRangeError extends ValidationError {}

export class RequestNotFoundError extends Error {
  constructor(readonly requestId: string) {
    super(`Conversion request "${requestId}" not found.`);
    this.name = 'RequestNotFoundError';
  }
}

export class RequestStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestStateError';
  }
}

export class FavoriteValidationError extends ValidationError {}

const RESOURCE_ERROR_CODES = new Set(['ENOSPC', 'EDQUOT', 'EMFILE', 'ENFILE']);

/** Checks the shape: errors raised by `fs` are not `instanceof Error` under every test runner's realm. */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/** The message of anything thrown, including errors created in another realm. */
export function describeError(error: unknown, fallback = 'Unknown error'): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : fallback;
}

/** Wraps an fs failure, keeping the OS message. */
export function toFilesystemError(error: unknown, action: string): FilesystemError {
  if (error instanceof FilesystemError) {
    return error;
  }

  const reason = describeError(error);
  const code = isErrnoException(error) ? error.code : undefined;
  const message = `Failed to ${action}: ${reason}`;

  if (code && RESOURCE_ERROR_CODES.has(code)) {
    return new ResourceExhaustedError(message, code);
  }

  return new FilesystemError(message, code);
}
