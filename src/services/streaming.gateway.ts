import { Server as SocketIOServer, Socket } from 'socket.io';
import { logger } from '../config/logger';
import { isStreamEncoding } from './audio/wav';
import { SessionManager, errorMessage, isTranscriptionError } from './streaming';
import type { AudioFormat, SessionEvent } from '../types';

interface StartMessage {
  format: AudioFormat;
}

interface ChunkMessage {
  data: Buffer;
  format: AudioFormat;
  seq?: number;
}

/** The part of a socket.io `Socket` the gateway uses. */
export interface StreamSocket {
  readonly id: string;
  on(event: string, listener: (payload?: unknown) => void): unknown;
  emit(event: string, payload: unknown): unknown;
}

interface ConnectionState {
  sessionId: string | null;
  pump: Promise<void> | null;
  ending: boolean;
}

function readFormat(payload: Record<string, unknown>): AudioFormat | null {
  const encoding = payload.format;
  const sampleRate = payload.sample_rate;
  const channels = payload.channels ?? 1;

  if (typeof encoding !== 'string' || !isStreamEncoding(encoding)) return null;
  if (typeof sampleRate !== 'number' || typeof channels !== 'number') return null;
  return { encoding, sampleRate, channels };
}

function asRecord(payload: unknown): Record<string, unknown> | null {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) return null;
  return Object.fromEntries(Object.entries(payload));
}

export function parseStartMessage(payload: unknown): StartMessage | null {
  const record = asRecord(payload);
  if (!record) return null;
  const format = readFormat(record);
  return format ? { format } : null;
}

/**
 * `{ type: "audio_chunk", data, format, sample_rate, channels?, seq? }` where
 * `data` is base64 text or a binary attachment.
 */
export function parseChunkMessage(payload: unknown): ChunkMessage | null {
  const record = asRecord(payload);
  if (!record) return null;

  const format = readFormat(record);
  if (!format) return null;

  let data: Buffer;
  if (typeof record.data === 'string') {
    data = Buffer.from(record.data, 'base64');
  } else if (Buffer.isBuffer(record.data)) {
    data = record.data;
  } else if (record.data instanceof ArrayBuffer) {
    data = Buffer.from(new Uint8Array(record.data));
  } else if (record.data instanceof Uint8Array) {
    data = Buffer.from(record.data.buffer, record.data.byteOffset, record.data.byteLength);
  } else {
    return null;
  }

  const seq = record.seq;
  if (seq !== undefined && (typeof seq !== 'number' || !Number.isInteger(seq) || seq < 0)) return null;

  return { data, format, seq };
}

/**
 * socket.io transport for live sessions. One session per connection; events
 * from the session's channel are forwarded to the socket in order.
 */
export class StreamingGateway {
  constructor(private readonly sessions: SessionManager) {}

  attach(io: SocketIOServer): void {
    io.on('connection', (socket: Socket) => this.handleConnection(socket));
    logger.info('Socket.io handlers initialized');
  }

  handleConnection(socket: StreamSocket): void {
    logger.info('Client connected', { socketId: socket.id });

    const state: ConnectionState = { sessionId: null, pump: null, ending: false };

    socket.on('start', (payload) => this.handleStart(socket, state, payload));
    socket.on('audio_chunk', (payload) => this.handleChunk(socket, state, payload));
    socket.on('end', () => {
      this.handleEnd(socket, state).catch((e: unknown) => {
        logger.error('Failed to end session', { socketId: socket.id, error: errorMessage(e) });
      });
    });
    socket.on('disconnect', () => this.handleDisconnect(socket, state));
  }

  private handleStart(socket: StreamSocket, state: ConnectionState, payload: unknown): void {
    if (state.sessionId) {
      this.emitError(socket, 'SessionExists', 'A session is already active on this connection');
      return;
    }

    const message = parseStartMessage(payload);
    if (!message) {
      this.emitError(socket, 'UnsupportedFormat', 'start requires format and sample_rate');
      return;
    }
    this.open(socket, state, message.format);
  }

  private handleChunk(socket: StreamSocket, state: ConnectionState, payload: unknown): void {
    const message = parseChunkMessage(payload);
    if (!message) {
      this.emitError(socket, 'InvalidMessage', 'audio_chunk requires data, format and sample_rate');
      return;
    }

    if (!state.sessionId && !this.open(socket, state, message.format)) return;
    const sessionId = state.sessionId;
    if (!sessionId) return;

    try {
      this.sessions.submitChunk(sessionId, { data: message.data, format: message.format, seq: message.seq });
    } catch (error) {
      this.reportError(socket, error);
    }
  }

  private async handleEnd(socket: StreamSocket, state: ConnectionState): Promise<void> {
    const sessionId = state.sessionId;
    if (!sessionId) {
      this.emitError(socket, 'NoAudio', 'No audio data received');
      return;
    }
    if (state.ending) return;
    state.ending = true;

    try {
      await this.sessions.endSession(sessionId);
    } catch (error) {
      this.reportError(socket, error);
    }
    // the final event is delivered by the pump; wait so nothing is emitted after we return
    await state.pump;
  }

  private handleDisconnect(socket: StreamSocket, state: ConnectionState): void {
    logger.info('Client disconnected', { socketId: socket.id });
    if (!state.sessionId) return;

    try {
      this.sessions.closeSession(state.sessionId, 'disconnected');
    } catch (error) {
      logger.warn('Failed to close session on disconnect', {
        sessionId: state.sessionId,
        error: errorMessage(error),
      });
    }
  }

  private open(socket: StreamSocket, state: ConnectionState, format: AudioFormat): boolean {
    try {
      const sessionId = this.sessions.openSession(format);
      state.sessionId = sessionId;
      socket.emit('session', { sessionId });
      state.pump = this.pumpEvents(socket, sessionId);
      return true;
    } catch (error) {
      this.reportError(socket, error);
      return false;
    }
  }

  private async pumpEvents(socket: StreamSocket, sessionId: string): Promise<void> {
    try {
      for await (const event of this.sessions.events(sessionId)) {
        this.forward(socket, event);
      }
    } catch (error) {
      logger.error('Event pump failed', { sessionId, error: errorMessage(error) });
    }
  }

  private forward(socket: StreamSocket, event: SessionEvent): void {
    switch (event.type) {
      case 'ack':
        socket.emit('ack', { chunk: event.seq, bufferedBytes: event.bufferedBytes });
        return;
      case 'update':
        socket.emit('transcript', {
          delta: event.delta,
          transcript: event.transcript,
          is_final: false,
          discontinuity: event.discontinuity,
        });
        return;
      case 'notice':
        socket.emit('notice', { code: event.code, message: event.message });
        return;
      case 'final':
        socket.emit('final', { transcript: event.transcript, is_final: true });
        return;
    }
  }

  private reportError(socket: StreamSocket, error: unknown): void {
    if (isTranscriptionError(error)) {
      if (error.recoverable) {
        socket.emit('notice', { code: error.code, message: error.message });
      } else {
        this.emitError(socket, error.code, error.message);
      }
      return;
    }

    logger.error('Unexpected streaming error', { socketId: socket.id, error: errorMessage(error) });
    this.emitError(socket, 'Internal', 'Internal error');
  }

  private emitError(socket: StreamSocket, code: string, message: string): void {
    socket.emit('error', { code, message });
  }
}
