/**
 * Keeps finished transcripts retrievable after their session has been purged
 * from the in-process registry.
 */
import { config } from '../config';
import { logger } from '../config/logger';
import { RedisLike, getRedis, transcriptKey } from '../redis/client';
import type { StoredTranscript } from '../types';
import { errorMessage } from './streaming/errors';

export interface TranscriptStore {
  save(record: StoredTranscript): Promise<void>;
  get(sessionId: string): Promise<StoredTranscript | null>;
}

function isStoredTranscript(value: unknown): value is StoredTranscript {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sessionId' in value &&
    typeof value.sessionId === 'string' &&
    'transcript' in value &&
    typeof value.transcript === 'string' &&
    'createdAt' in value &&
    typeof value.createdAt === 'string' &&
    'closedAt' in value &&
    typeof value.closedAt === 'string' &&
    'format' in value &&
    typeof value.format === 'object' &&
    value.format !== null
  );
}

export class RedisTranscriptStore implements TranscriptStore {
  constructor(
    private readonly redis: RedisLike,
    private readonly ttlSeconds: number = config.redis.transcriptTtlSeconds
  ) {}

  async save(record: StoredTranscript): Promise<void> {
    await this.redis.setex(transcriptKey(record.sessionId), this.ttlSeconds, JSON.stringify(record));
  }

  async get(sessionId: string): Promise<StoredTranscript | null> {
    const raw = await this.redis.get(transcriptKey(sessionId));
    if (!raw) return null;

    try {
      const parsed: unknown = JSON.parse(raw);
      return isStoredTranscript(parsed) ? parsed : null;
    } catch (e) {
      logger.warn('Discarding unreadable stored transcript', { sessionId, error: errorMessage(e) });
      return null;
    }
  }
}

let instance: TranscriptStore | null = null;

export function getTranscriptStore(): TranscriptStore {
  if (!instance) {
    instance = new RedisTranscriptStore(getRedis());
  }
  return instance;
}
