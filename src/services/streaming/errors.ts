/**
 * Error taxonomy for the streaming engine. Every error carries a stable `code`
 * so transports can map it without string matching.
 */

export type TranscriptionErrorCode =
  | 'UnsupportedFormat'
  | 'UnknownSession'
  | 'SessionClosed'
  | 'OutOfOrderChunk'
  | 'RangeUnavailable'
  | 'InferenceUnavailable'
  | 'InferenceFailed';

export abstract class TranscriptionError extends Error {
  abstract readonly code: TranscriptionErrorCode;
  /** True when the session survives the error and only the chunk or window is lost. */
  abstract readonly recoverable: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedFormatError extends TranscriptionError {
  readonly code = 'UnsupportedFormat';
  readonly recoverable = false;
}

export class UnknownSessionError extends TranscriptionError {
  readonly code = 'UnknownSession';
  readonly recoverable = false;

  constructor(readonly sessionId: string) {
    super(`Unknown session: ${sessionId}`);
  }
}

export class SessionClosedError extends TranscriptionError {
  readonly code = 'SessionClosed';
  readonly recoverable = false;

  constructor(readonly sessionId: string, state: string) {
    super(`Session ${sessionId} is not open (state=${state})`);
  }
}

export class OutOfOrderChunkError extends TranscriptionError {
  readonly code = 'OutOfOrderChunk';
  readonly recoverable = true;

  constructor(readonly expected: number, readonly received: number) {
    super(`Out-of-order chunk: expected seq ${expected}, received ${received}`);
  }
}

export class RangeUnavailableError extends TranscriptionError {
  readonly code = 'RangeUnavailable';
  readonly recoverable = false;

  constructor(readonly start: number, readonly end: number, detail: string) {
    super(`Audio range [${start}, ${end}) unavailable: ${detail}`);
  }
}

export class InferenceUnavailableError extends TranscriptionError {
  readonly code = 'InferenceUnavailable';
  readonly recoverable = true;
}

export class InferenceFailedError extends TranscriptionError {
  readonly code = 'InferenceFailed';
  readonly recoverable = true;
}

export function isTranscriptionError(error: unknown): error is TranscriptionError {
  return error instanceof TranscriptionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
