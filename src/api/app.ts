/**
 * Express app: CORS, JSON body, whole-file transcription and the polling
 * session API. Collaborators are passed in so tests can supply fakes.
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { config } from '../config';
import { logger } from '../config/logger';
import { AudioDecoder } from '../services/audio/decoder';
import { SessionManager } from '../services/streaming/SessionManager';
import { errorMessage } from '../services/streaming/errors';
import type { TranscriptStore } from '../services/transcriptStore.service';
import { createSessionRoutes } from './routes/sessions.routes';
import { createTranscribeRoutes } from './routes/transcribe.routes';

export interface AppDeps {
  sessions: SessionManager;
  transcriptStore: TranscriptStore;
  decoder: AudioDecoder;
  apiPrefix?: string;
  maxBodyBytes?: number;
  corsOrigin?: string;
}

/** Body parser and upload errors carry a status of their own. */
function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ text: '', status: 'error', error: err.message });
    return;
  }

  if (typeof err === 'object' && err !== null && 'type' in err) {
    if (err.type === 'entity.too.large') {
      res.status(413).json({ error: 'Request body too large' });
      return;
    }
    if (err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
  }

  if (err instanceof Error && err.message.startsWith('Invalid content-type')) {
    res.status(415).json({ text: '', status: 'error', error: err.message });
    return;
  }

  logger.error('Unhandled request error', { error: errorMessage(err) });
  res.status(500).json({ error: 'Internal server error' });
}

export function createApp(deps: AppDeps): express.Express {
  const apiPrefix = deps.apiPrefix ?? config.apiPrefix;
  const maxBodyBytes = deps.maxBodyBytes ?? config.streaming.maxChunkBytes;
  const app = express();

  app.use(cors({ origin: deps.corsOrigin ?? true, credentials: true }));
  // base64 grows payloads by a third
  app.use(express.json({ limit: Math.ceil(maxBodyBytes * 4 / 3) + 1024 }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString(), sessions: deps.sessions.activeCounts() });
  });

  const transcribeRoutes = createTranscribeRoutes({
    sessions: deps.sessions,
    decoder: deps.decoder,
    maxUploadBytes: maxBodyBytes,
  });

  app.use(`${apiPrefix}/transcribe`, transcribeRoutes);
  // Alias to satisfy clients expecting POST /api/transcribe
  if (apiPrefix !== '/api') {
    app.use('/api/transcribe', transcribeRoutes);
  }
  app.use(
    `${apiPrefix}/sessions`,
    createSessionRoutes({ sessions: deps.sessions, transcriptStore: deps.transcriptStore })
  );

  app.use(errorHandler);

  return app;
}
