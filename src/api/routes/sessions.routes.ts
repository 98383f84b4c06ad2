/**
 * Polling session API for clients that cannot hold a socket open:
 * open, push chunks, end, and read state, events and the stored transcript.
 */
import { Router, Request, Response } from 'express';
import { body, param } from 'express-validator';
import { isKnownEncoding } from '../../services/audio/decoder';
import { SessionManager } from '../../services/streaming/SessionManager';
import { UnsupportedFormatError } from '../../services/streaming/errors';
import type { TranscriptStore } from '../../services/transcriptStore.service';
import { sendError } from '../httpErrors';
import { validate } from '../middleware/validate';

export interface SessionRouteDeps {
  sessions: SessionManager;
  transcriptStore: TranscriptStore;
}

const sessionId = () => param('id').isUUID().withMessage('id must be a UUID');

export function createSessionRoutes(deps: SessionRouteDeps): Router {
  const router = Router();
  const { sessions, transcriptStore } = deps;

  router.post(
    '/',
    validate([
      body('format').isString().notEmpty().withMessage('format is required'),
      body('sample_rate').isInt({ gt: 0 }).withMessage('sample_rate must be a positive integer').toInt(),
      body('channels').optional().isInt({ min: 1 }).withMessage('channels must be a positive integer').toInt(),
    ]),
    (req: Request, res: Response) => {
      try {
        const encoding = String(req.body.format).trim().toLowerCase();
        if (!isKnownEncoding(encoding)) {
          throw new UnsupportedFormatError(`Unsupported audio format: ${String(req.body.format)}`);
        }
        const id = sessions.openSession({
          encoding,
          sampleRate: Number(req.body.sample_rate),
          channels: req.body.channels === undefined ? 1 : Number(req.body.channels),
        });
        res.status(201).json({ sessionId: id });
      } catch (e) {
        sendError(res, e, 'Open session');
      }
    }
  );

  router.post(
    '/:id/chunks',
    validate([
      sessionId(),
      body('data').isString().withMessage('data must be a base64 string'),
      body('seq').optional().isInt({ min: 0 }).withMessage('seq must be a non-negative integer').toInt(),
    ]),
    (req: Request, res: Response) => {
      try {
        const receipt = sessions.submitChunk(req.params.id, {
          data: Buffer.from(String(req.body.data), 'base64'),
          seq: req.body.seq === undefined ? undefined : Number(req.body.seq),
        });
        res.json(receipt);
      } catch (e) {
        sendError(res, e, 'Submit chunk');
      }
    }
  );

  router.post('/:id/end', validate([sessionId()]), async (req: Request, res: Response) => {
    try {
      const transcript = await sessions.endSession(req.params.id);
      res.json({ sessionId: req.params.id, transcript });
    } catch (e) {
      sendError(res, e, 'End session');
    }
  });

  router.get('/:id', validate([sessionId()]), (req: Request, res: Response) => {
    try {
      res.json(sessions.getSnapshot(req.params.id));
    } catch (e) {
      sendError(res, e, 'Get session');
    }
  });

  router.get('/:id/events', validate([sessionId()]), (req: Request, res: Response) => {
    try {
      const channel = sessions.events(req.params.id);
      res.json({ events: channel.drain(), closed: channel.isClosed });
    } catch (e) {
      sendError(res, e, 'Get session events');
    }
  });

  router.get('/:id/transcript', validate([sessionId()]), async (req: Request, res: Response) => {
    try {
      const stored = await transcriptStore.get(req.params.id);
      if (!stored) {
        res.status(404).json({ error: 'Transcript not found' });
        return;
      }
      res.json(stored);
    } catch (e) {
      sendError(res, e, 'Get transcript');
    }
  });

  return router;
}
