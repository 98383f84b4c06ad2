import type { Response } from 'express';
import { logger } from '../config/logger';
import {
  TranscriptionErrorCode,
  errorMessage,
  isTranscriptionError,
} from '../services/streaming/errors';

const STATUS_BY_CODE: Record<TranscriptionErrorCode, number> = {
  UnknownSession: 404,
  SessionClosed: 409,
  UnsupportedFormat: 415,
  OutOfOrderChunk: 409,
  RangeUnavailable: 500,
  InferenceUnavailable: 503,
  InferenceFailed: 502,
};

export function httpStatusFor(error: unknown): number {
  return isTranscriptionError(error) ? STATUS_BY_CODE[error.code] : 500;
}

/** Responds with `{ error, code }` using the status mapped from the error. */
export function sendError(res: Response, error: unknown, context: string): void {
  const status = httpStatusFor(error);
  if (status >= 500) {
    logger.error(`${context} failed`, { error: errorMessage(error) });
  }

  if (isTranscriptionError(error)) {
    res.status(status).json({ error: error.message, code: error.code });
    return;
  }
  res.status(status).json({ error: 'Internal server error' });
}
