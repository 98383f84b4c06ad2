import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import multer from 'multer';
import * as path from 'path';
import { logger } from '../../config/logger';
import { AudioDecoder, isContainerEncoding, isKnownEncoding } from '../../services/audio/decoder';
import { WavInfo, parseWav } from '../../services/audio/wav';
import { SessionManager } from '../../services/streaming/SessionManager';
import {
  UnsupportedFormatError,
  errorMessage,
  isTranscriptionError,
} from '../../services/streaming/errors';
import type { AudioEncoding, AudioFormat } from '../../types';
import { httpStatusFor } from '../httpErrors';
import { InvalidRequestHandler, validate } from '../middleware/validate';

export interface TranscribeRouteDeps {
  sessions: SessionManager;
  decoder: AudioDecoder;
  maxUploadBytes: number;
}

const EXTENSION_ENCODINGS: Record<string, AudioEncoding> = {
  '.wav': 'wav',
  '.webm': 'webm',
  '.ogg': 'ogg',
  '.oga': 'ogg',
  '.opus': 'ogg',
  '.mp3': 'mp3',
  '.m4a': 'm4a',
  '.mp4': 'm4a',
  '.flac': 'flac',
};

const MIME_ENCODINGS: Array<[RegExp, AudioEncoding]> = [
  [/wav/i, 'wav'],
  [/webm/i, 'webm'],
  [/ogg|opus/i, 'ogg'],
  [/mpeg|mp3/i, 'mp3'],
  [/mp4|m4a|aac/i, 'm4a'],
  [/flac/i, 'flac'],
];

/** Guess an upload's encoding from its name, then its content type. */
export function encodingForUpload(originalName: string, mimetype: string): AudioEncoding | null {
  const byExtension = EXTENSION_ENCODINGS[path.extname(originalName).toLowerCase()];
  if (byExtension) return byExtension;

  const byMime = MIME_ENCODINGS.find(([pattern]) => pattern.test(mimetype));
  return byMime ? byMime[1] : null;
}

function requireEncoding(value: string): AudioEncoding {
  const encoding = value.trim().toLowerCase();
  if (!isKnownEncoding(encoding)) {
    throw new UnsupportedFormatError(`Unsupported audio format: ${value}`);
  }
  return encoding;
}

/** WAV carries its own rate and channel count; trust the header over the request. */
function wavFormat(data: Buffer): AudioFormat {
  let wav: WavInfo;
  try {
    wav = parseWav(data);
  } catch (e) {
    throw new UnsupportedFormatError(`Invalid WAV file: ${errorMessage(e)}`);
  }
  return { encoding: 'wav', sampleRate: wav.sampleRate, channels: wav.channels };
}

/** 16-bit integer PCM at a rate the engine takes goes straight in; other WAV layouts go through ffmpeg. */
function isBufferableWav(sessions: SessionManager, data: Buffer, format: AudioFormat): boolean {
  const wav = parseWav(data);
  return wav.audioFormat === 1 && wav.bitsPerSample === 16 && sessions.supportsFormat(format);
}

async function transcribeAudio(deps: TranscribeRouteDeps, data: Buffer, format: AudioFormat): Promise<string> {
  const encoding = format.encoding;
  if (isContainerEncoding(encoding) || (encoding === 'wav' && !isBufferableWav(deps.sessions, data, format))) {
    const decoded = await deps.decoder.decode(data, encoding);
    return deps.sessions.transcribeWhole(decoded.pcm, decoded.format);
  }
  return deps.sessions.transcribeWhole(data, format);
}

const rejectRequest: InvalidRequestHandler = (res, problems) => {
  res.status(400).json({ text: '', status: 'error', error: problems[0]?.message ?? 'Invalid request' });
};

function sendFailure(res: Response, error: unknown): void {
  const status = httpStatusFor(error);
  const message = isTranscriptionError(error) ? error.message : 'Internal server error';
  if (status >= 500) {
    logger.error('Transcription request failed', { error: errorMessage(error) });
  }
  res.status(status).json({ text: '', status: 'error', error: message });
}

/**
 * Whole-file transcription. `POST /` takes base64 audio in JSON; `POST /upload`
 * takes a multipart file in field `audio`. Both answer `{ text, status }`.
 */
export function createTranscribeRoutes(deps: TranscribeRouteDeps): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      const ok =
        /audio\//i.test(file.mimetype) ||
        /video\/(webm|mp4)/i.test(file.mimetype) ||
        file.mimetype === 'application/octet-stream' ||
        file.mimetype === '';
      if (ok) cb(null, true);
      else cb(new Error(`Invalid content-type: ${file.mimetype}`));
    },
  });

  router.post(
    '/',
    validate([
      body('audio_data').isString().withMessage('audio_data must be a base64 string'),
      body('format').isString().notEmpty().withMessage('format is required'),
      body('sample_rate').isInt({ gt: 0 }).withMessage('sample_rate must be a positive integer').toInt(),
      body('channels').optional().isInt({ min: 1 }).withMessage('channels must be a positive integer').toInt(),
    ], rejectRequest),
    async (req: Request, res: Response) => {
      try {
        const data = Buffer.from(String(req.body.audio_data), 'base64');
        if (data.length === 0) {
          res.status(400).json({ text: '', status: 'error', error: 'No audio data received' });
          return;
        }

        const encoding = requireEncoding(String(req.body.format));
        const format: AudioFormat =
          encoding === 'wav'
            ? wavFormat(data)
            : {
                encoding,
                sampleRate: Number(req.body.sample_rate),
                channels: req.body.channels === undefined ? 1 : Number(req.body.channels),
              };

        logger.info('Transcribe request received', { format, bytes: data.length });
        const text = await transcribeAudio(deps, data, format);
        res.json({ text, status: 'success' });
      } catch (e) {
        sendFailure(res, e);
      }
    }
  );

  router.post('/upload', upload.single('audio'), async (req: Request, res: Response) => {
    const file = req.file;
    try {
      if (!file) {
        res.status(400).json({ text: '', status: 'error', error: 'Audio file is required (field: audio)' });
        return;
      }
      if (file.size <= 0) {
        res.status(400).json({ text: '', status: 'error', error: 'No audio detected (empty upload)' });
        return;
      }

      logger.info('Upload received', {
        originalname: file.originalname,
        mimetype: file.mimetype,
        size: file.size,
      });

      const declared = typeof req.body?.format === 'string' ? req.body.format : '';
      const encoding = declared
        ? requireEncoding(declared)
        : encodingForUpload(file.originalname, file.mimetype);
      if (!encoding) {
        throw new UnsupportedFormatError(`Cannot tell the audio format of ${file.originalname || 'upload'}`);
      }

      let format: AudioFormat;
      if (encoding === 'wav') {
        format = wavFormat(file.buffer);
      } else if (isContainerEncoding(encoding)) {
        // the decoder reports the real format
        format = { encoding, sampleRate: 0, channels: 0 };
      } else {
        const sampleRate = Number(req.body?.sample_rate);
        if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
          res.status(400).json({ text: '', status: 'error', error: 'sample_rate is required for raw PCM uploads' });
          return;
        }
        const channels = req.body?.channels === undefined ? 1 : Number(req.body.channels);
        format = { encoding, sampleRate, channels };
      }

      const text = await transcribeAudio(deps, file.buffer, format);
      res.json({ text, status: 'success' });
    } catch (e) {
      sendFailure(res, e);
    }
  });

  return router;
}
