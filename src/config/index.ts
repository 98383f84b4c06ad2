/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable.
 */
import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() === 'true';
}

function parseNumberList(value: string | undefined, fallback: number[]): number[] {
  if (!value) return fallback;
  const parsed = value
    .split(',')
    .map((part) => Number.parseInt(part.trim(), 10))
    .filter((n) => Number.isInteger(n) && n > 0);
  return parsed.length > 0 ? parsed : fallback;
}

export const config = {
  env: process.env.NODE_ENV || 'development',
  host: process.env.HOST || '0.0.0.0',
  port: parseInt(process.env.PORT || '8000', 10),
  apiPrefix: process.env.API_PREFIX || '/api/v1',
  /** Origin allowed by CORS for the browser recorder. */
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:3000',

  redis: {
    // Default to in-memory so the app runs without Redis. Set REDIS_URL (e.g. redis://localhost:6379) to use Redis.
    url: process.env.REDIS_URL || 'memory',
    transcriptTtlSeconds: parseNumber(process.env.TRANSCRIPT_TTL_SECONDS, 24 * 60 * 60),
  },

  streaming: {
    /** Seconds of new audio that trigger a transcription pass. */
    windowSeconds: parseNumber(process.env.STREAM_WINDOW_SECONDS, 2.0),
    /** Seconds each window re-reads from the end of the previous one. */
    overlapSeconds: parseNumber(process.env.STREAM_OVERLAP_SECONDS, 0.5),
    inferenceTimeoutMs: parseNumber(process.env.INFERENCE_TIMEOUT_MS, 120000),
    sessionIdleTimeoutMs: parseNumber(process.env.SESSION_IDLE_TIMEOUT_MS, 5 * 60 * 1000),
    closedSessionRetentionMs: parseNumber(process.env.CLOSED_SESSION_RETENTION_MS, 10 * 60 * 1000),
    sweepIntervalMs: parseNumber(process.env.SESSION_SWEEP_INTERVAL_MS, 30000),
    maxChunkBytes: parseNumber(process.env.MAX_CHUNK_BYTES, 10 * 1024 * 1024),
    /** Undelivered events kept per session before the oldest are dropped. */
    maxBufferedEvents: parseNumber(process.env.SESSION_EVENT_BUFFER, 1000),
  },

  reconcile: {
    minOverlapChars: parseNumber(process.env.RECONCILE_MIN_OVERLAP_CHARS, 3),
    maxOverlapChars: parseNumber(process.env.RECONCILE_MAX_OVERLAP_CHARS, 200),
    caseInsensitive: parseBool(process.env.RECONCILE_CASE_INSENSITIVE, true),
    collapseWhitespace: parseBool(process.env.RECONCILE_COLLAPSE_WHITESPACE, true),
  },

  whisper: {
    bin: process.env.WHISPER_CPP_PATH || 'whisper-cli',
    modelPath: process.env.WHISPER_MODEL_PATH || path.join(process.cwd(), 'models', 'ggml-base.en.bin'),
    language: process.env.WHISPER_LANGUAGE || 'en',
    threads: parseNumber(process.env.WHISPER_THREADS, 4),
  },

  audio: {
    ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
    supportedSampleRates: parseNumberList(process.env.SUPPORTED_SAMPLE_RATES, [
      8000, 16000, 22050, 24000, 32000, 44100, 48000,
    ]),
  },
} as const;

export type StreamingConfig = typeof config.streaming;

/**
 * Throws when the streaming settings cannot produce valid windows.
 */
export function assertStreamingConfig(streaming: StreamingConfig): void {
  const problems: string[] = [];

  if (!(streaming.windowSeconds > 0)) {
    problems.push('STREAM_WINDOW_SECONDS must be greater than 0.');
  }
  if (streaming.overlapSeconds < 0) {
    problems.push('STREAM_OVERLAP_SECONDS must not be negative.');
  }
  if (streaming.overlapSeconds >= streaming.windowSeconds) {
    problems.push('STREAM_OVERLAP_SECONDS must be smaller than STREAM_WINDOW_SECONDS.');
  }
  if (streaming.inferenceTimeoutMs <= 0) {
    problems.push('INFERENCE_TIMEOUT_MS must be greater than 0.');
  }
  if (streaming.maxChunkBytes <= 0) {
    problems.push('MAX_CHUNK_BYTES must be greater than 0.');
  }
  if (!Number.isInteger(streaming.maxBufferedEvents) || streaming.maxBufferedEvents < 1) {
    problems.push('SESSION_EVENT_BUFFER must be a positive integer.');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid streaming configuration: ${problems.join(' ')}`);
  }
}
