/**
 * Service entry point: HTTP server with Socket.io for live transcription.
 */
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './api/app';
import { config, assertStreamingConfig } from './config';
import { logger } from './config/logger';
import { getSTTService } from './ai/stt';
import { closeRedis } from './redis/client';
import { AudioDecoder } from './services/audio/decoder';
import { SessionManager, TranscriptReconciler, errorMessage } from './services/streaming';
import { StreamingGateway } from './services/streaming.gateway';
import { getTranscriptStore } from './services/transcriptStore.service';

async function start() {
  assertStreamingConfig(config.streaming);

  logger.info('Initializing services...');

  const transcriptStore = getTranscriptStore();
  const sessions = new SessionManager({
    adapter: getSTTService(),
    streaming: config.streaming,
    reconciler: new TranscriptReconciler(config.reconcile),
    transcriptStore,
    maxBufferedEvents: config.streaming.maxBufferedEvents,
  });
  sessions.startCleanupInterval(config.streaming.sweepIntervalMs);

  const app = createApp({
    sessions,
    transcriptStore,
    decoder: new AudioDecoder({ ffmpegPath: config.audio.ffmpegPath }),
    corsOrigin: config.frontendUrl,
  });

  const httpServer = createServer(app);

  const io = new SocketIOServer(httpServer, {
    path: '/ws/transcribe',
    cors: {
      origin: config.frontendUrl,
      methods: ['GET', 'POST'],
      credentials: true,
    },
    maxHttpBufferSize: config.streaming.maxChunkBytes,
  });
  new StreamingGateway(sessions).attach(io);

  logger.info('All services initialized');

  const server = httpServer.listen(config.port, config.host, () => {
    logger.info(`Server listening on ${config.host}:${config.port} (env: ${config.env})`);
    logger.info('Live transcription socket ready at /ws/transcribe');
    logger.info(`Frontend URL: ${config.frontendUrl}`);
  });

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });

    sessions.shutdown();
    io.close(() => {
      closeRedis()
        .catch((e: unknown) => logger.warn('Failed to close Redis', { error: errorMessage(e) }))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  return server;
}

const serverPromise = start().catch((e: unknown) => {
  logger.error('Startup failed', { error: errorMessage(e) });
  process.exit(1);
});

export default serverPromise;
