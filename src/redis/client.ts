/**
 * Redis client for finished transcripts. When REDIS_URL is empty or "memory",
 * uses an in-memory store so the app runs without Redis (e.g. local dev, tests).
 */
import Redis from 'ioredis';
import { config } from '../config';
import { logger } from '../config/logger';

const KEY_PREFIX = 'live_transcription:';

/** Minimal interface used by the transcript store */
export type RedisLike = {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<string>;
};

export function createMemoryStore(now: () => number = Date.now): RedisLike {
  const store = new Map<string, { value: string; expiryTs: number }>();
  return {
    async get(key: string): Promise<string | null> {
      const entry = store.get(key);
      if (!entry) return null;
      if (now() > entry.expiryTs) {
        store.delete(key);
        return null;
      }
      return entry.value;
    },
    async setex(key: string, seconds: number, value: string): Promise<string> {
      store.set(key, { value, expiryTs: now() + seconds * 1000 });
      return 'OK';
    },
  };
}

let client: RedisLike | null = null;
let redisConnection: Redis | null = null;

export function getRedis(): RedisLike {
  if (!client) {
    const url = (config.redis.url || '').trim();
    if (url === '' || url.toLowerCase() === 'memory') {
      logger.info('Using in-memory store for transcripts (no Redis). Set REDIS_URL to a running Redis to use it.');
      client = createMemoryStore();
    } else {
      const r = new Redis(url, {
        maxRetriesPerRequest: 3,
        retryStrategy(times) {
          return Math.min(times * 100, 3000);
        },
      });
      r.on('error', (err) => {
        logger.error('Redis error', { error: err.message });
      });
      redisConnection = r;
      client = {
        get: (key) => r.get(key),
        setex: (key, seconds, value) => r.setex(key, seconds, value),
      };
    }
  }
  return client;
}

export function transcriptKey(sessionId: string): string {
  return `${KEY_PREFIX}transcript:${sessionId}`;
}

export async function closeRedis(): Promise<void> {
  if (redisConnection) {
    await redisConnection.quit();
    redisConnection = null;
  }
  client = null;
}
