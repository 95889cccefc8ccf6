/**
 * Error classes for the transcription pipeline.
 *
 * Two families: `FatalError` halts a run, `TranscriptionError` is scoped to a
 * single chunk and is logged and skipped by the orchestrator.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code?: string | number;
  details?: ErrorDetails;

  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    if (this.code !== undefined) {
      parts.push(`(code: ${this.code})`);
    }
    return parts.join(' ');
  }
}

export class FatalError extends PipelineError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'FatalError';
  }
}

/**
 * Source file missing, unreadable or empty
 */
export class SourceFileError extends FatalError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'SourceFileError';
  }
}

/**
 * ffmpeg / ffprobe could not be started
 */
export class SplitterUnavailableError extends FatalError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'ENOENT', details);
    this.name = 'SplitterUnavailableError';
  }
}

export class SplitError extends FatalError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'SplitError';
  }
}

/**
 * Bad command line
 */
export class UsageError extends FatalError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

export class TranscriptionError extends PipelineError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'TranscriptionError';
  }
}

/**
 * Missing, invalid or insufficient credentials
 */
export class AuthenticationError extends TranscriptionError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'AuthenticationError';
  }
}

export class QuotaExceededError extends TranscriptionError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'QuotaExceededError';
  }
}

/**
 * The service refused the audio or config (encoding, sample rate, size)
 */
export class AudioRejectedError extends TranscriptionError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'AudioRejectedError';
  }
}

export class TranscriptionTimeoutError extends TranscriptionError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'TranscriptionTimeoutError';
  }
}

export class ServiceUnavailableError extends TranscriptionError {
  constructor(message: string, code?: string | number, details?: ErrorDetails) {
    super(message, code, details);
    this.name = 'ServiceUnavailableError';
  }
}

// gRPC status codes returned by the Google client libraries
const GRPC = {
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  UNAVAILABLE: 14,
  UNAUTHENTICATED: 16,
} as const;

function errorCode(e: unknown): string | number | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e) {
    const c = e.code;
    if (typeof c === 'number' || typeof c === 'string') return c;
  }
  return undefined;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  return String(e);
}

/**
 * Classify an error thrown by the speech or storage client
 */
export function toTranscriptionError(e: unknown, details?: ErrorDetails): TranscriptionError {
  if (e instanceof TranscriptionError) return e;
  const code = errorCode(e);
  const message = errorMessage(e);

  if (code === GRPC.UNAUTHENTICATED || code === GRPC.PERMISSION_DENIED || code === 401 || code === 403) {
    return new AuthenticationError(message, code, details);
  }
  // google-auth-library raises a plain Error when no credentials can be found
  if (/credentials/i.test(message)) {
    return new AuthenticationError(message, code, details);
  }
  if (code === GRPC.RESOURCE_EXHAUSTED || code === 429) {
    return new QuotaExceededError(message, code, details);
  }
  if (code === GRPC.INVALID_ARGUMENT || code === 400) {
    return new AudioRejectedError(message, code, details);
  }
  if (code === GRPC.DEADLINE_EXCEEDED) {
    return new TranscriptionTimeoutError(message, code, details);
  }
  if (code === GRPC.UNAVAILABLE || code === 503) {
    return new ServiceUnavailableError(message, code, details);
  }
  return new TranscriptionError(message, code, details);
}

/**
 * One-line rendering of any thrown value for log metadata
 */
export function describeError(e: unknown): string {
  if (e instanceof PipelineError) return e.toString();
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}
