/**
 * Live transcription session engine.
 *
 * Owns one Session per client: routes chunks into the session's buffer, drives
 * the window scheduler, calls the inference adapter for each window and pushes
 * reconciled transcript updates onto the session's event channel. Transports
 * (socket.io gateway, HTTP routes) only talk to this class.
 */
import { v4 as uuidv4 } from 'uuid';
import type { StreamingConfig } from '../../config';
import { logger } from '../../config/logger';
import type { InferenceAdapter } from '../../ai/stt/types';
import type { TranscriptStore } from '../transcriptStore.service';
import {
  WavInfo,
  frameBytes,
  isStreamEncoding,
  parseWav,
  sameFormat,
  secondsToBytes,
  toPcmFormat,
} from '../audio/wav';
import type {
  AudioChunk,
  AudioFormat,
  ChunkReceipt,
  CloseReason,
  SessionSnapshot,
  Window,
} from '../../types';
import { ChunkBuffer } from './ChunkBuffer';
import {
  InferenceFailedError,
  InferenceUnavailableError,
  SessionClosedError,
  UnknownSessionError,
  UnsupportedFormatError,
  errorMessage,
} from './errors';
import { SessionChannel } from './SessionChannel';
import { Session, SessionRegistry } from './SessionRegistry';
import { TranscriptReconciler } from './TranscriptReconciler';
import { WindowScheduler } from './WindowScheduler';

export type SessionTimingConfig = Pick<
  StreamingConfig,
  'windowSeconds' | 'overlapSeconds' | 'inferenceTimeoutMs' | 'sessionIdleTimeoutMs' | 'closedSessionRetentionMs'
>;

export interface SessionManagerOptions {
  adapter: InferenceAdapter;
  streaming: SessionTimingConfig;
  registry?: SessionRegistry;
  reconciler?: TranscriptReconciler;
  transcriptStore?: TranscriptStore;
  /** Per-session cap on undelivered events. */
  maxBufferedEvents?: number;
  now?: () => number;
}

export interface SweepResult {
  timedOut: string[];
  purged: string[];
}

type InferenceError = InferenceFailedError | InferenceUnavailableError;

export class SessionManager {
  private readonly adapter: InferenceAdapter;
  private readonly streaming: SessionTimingConfig;
  private readonly registry: SessionRegistry;
  private readonly reconciler: TranscriptReconciler;
  private readonly transcriptStore?: TranscriptStore;
  private readonly now: () => number;
  private readonly maxBufferedEvents?: number;
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionManagerOptions) {
    this.adapter = options.adapter;
    this.streaming = options.streaming;
    this.registry = options.registry ?? new SessionRegistry();
    this.reconciler = options.reconciler ?? new TranscriptReconciler();
    this.transcriptStore = options.transcriptStore;
    this.now = options.now ?? Date.now;
    this.maxBufferedEvents = options.maxBufferedEvents;
  }

  /** Whether a session can be opened for `format`. */
  supportsFormat(format: AudioFormat): boolean {
    return (
      isStreamEncoding(format.encoding) &&
      Number.isInteger(format.sampleRate) &&
      format.sampleRate > 0 &&
      Number.isInteger(format.channels) &&
      format.channels > 0 &&
      this.adapter.supportsFormat(format)
    );
  }

  openSession(format: AudioFormat): string {
    if (!this.supportsFormat(format)) {
      throw new UnsupportedFormatError(
        `Unsupported audio format: ${format.encoding} ${format.sampleRate}Hz x${format.channels}`
      );
    }

    const pcmFormat = toPcmFormat(format);
    if (!pcmFormat) {
      throw new UnsupportedFormatError(`Encoding ${format.encoding} cannot be streamed`);
    }

    const frame = frameBytes(pcmFormat);
    const targetBytes = Math.max(frame, secondsToBytes(this.streaming.windowSeconds, pcmFormat));
    const overlapBytes = Math.min(secondsToBytes(this.streaming.overlapSeconds, pcmFormat), targetBytes - frame);

    const id = uuidv4();
    const now = this.now();
    const session: Session = {
      id,
      format: { ...format },
      pcmFormat,
      state: 'OPEN',
      createdAt: now,
      lastActivityAt: now,
      transcript: '',
      buffer: new ChunkBuffer(),
      scheduler: new WindowScheduler({ targetBytes, overlapBytes }),
      channel: new SessionChannel(this.maxBufferedEvents),
      carry: Buffer.alloc(0),
      inflight: null,
      finalizer: null,
      stats: { chunksAccepted: 0, windowsDispatched: 0, windowsFailed: 0, discontinuities: 0 },
    };

    this.registry.add(session);
    logger.info('Session opened', { sessionId: id, format, targetBytes, overlapBytes });
    return id;
  }

  submitChunk(sessionId: string, chunk: AudioChunk): ChunkReceipt {
    const session = this.requireOpen(sessionId);

    if (chunk.format && !sameFormat(chunk.format, session.format)) {
      throw new UnsupportedFormatError(
        `Chunk format ${chunk.format.encoding} ${chunk.format.sampleRate}Hz x${chunk.format.channels} does not match the session`
      );
    }

    const samples = this.decodeChunk(session, chunk.data);
    const joined = session.carry.length > 0 ? Buffer.concat([session.carry, samples]) : samples;
    const usable = joined.length - (joined.length % frameBytes(session.pcmFormat));
    const seq = chunk.seq ?? session.buffer.nextSeq;

    session.buffer.append(seq, joined.subarray(0, usable));
    session.carry = Buffer.from(joined.subarray(usable));
    session.stats.chunksAccepted += 1;
    session.lastActivityAt = this.now();

    const receipt: ChunkReceipt = { sessionId, seq, bufferedBytes: session.buffer.end };
    session.channel.push({ type: 'ack', sessionId, seq, bufferedBytes: receipt.bufferedBytes });

    const window = session.scheduler.onChunkAppended(session.buffer.end);
    if (window) this.dispatch(session, window);

    return receipt;
  }

  /**
   * Flush the remaining audio and resolve with the full transcript once the
   * final window has been reconciled.
   */
  async endSession(sessionId: string): Promise<string> {
    const session = this.requireOpen(sessionId);

    session.state = 'FLUSHING';
    session.lastActivityAt = this.now();
    session.finalizer = createFinalizer();

    if (session.carry.length > 0) {
      logger.debug('Dropping incomplete trailing frame', { sessionId, bytes: session.carry.length });
      session.carry = Buffer.alloc(0);
    }

    if (session.buffer.end === 0) {
      session.channel.push({ type: 'notice', sessionId, code: 'NoAudio', message: 'No audio data received' });
    }

    logger.info('Session flushing', { sessionId, bufferedBytes: session.buffer.end });

    const window = session.scheduler.onEndOfStream(session.buffer.end);
    if (window) this.dispatch(session, window);

    return session.finalizer.promise;
  }

  /**
   * Drop a session without a final transcript (disconnect, idle timeout,
   * shutdown). An in-flight inference call is aborted and its result ignored.
   * Returns false when the session was already closed.
   */
  closeSession(sessionId: string, reason: CloseReason): boolean {
    const session = this.registry.get(sessionId);
    if (!session) throw new UnknownSessionError(sessionId);
    if (session.state === 'CLOSED') return false;

    this.markClosed(session, reason);
    session.inflight?.abort();
    session.inflight = null;
    session.channel.close();
    session.finalizer?.reject(new SessionClosedError(sessionId, 'CLOSED'));

    logger.info('Session dropped', { sessionId, reason, transcriptChars: session.transcript.length });
    return true;
  }

  events(sessionId: string): SessionChannel {
    return this.require(sessionId).channel;
  }

  getSnapshot(sessionId: string): SessionSnapshot {
    const session = this.require(sessionId);
    return {
      sessionId: session.id,
      state: session.state,
      format: { ...session.format },
      transcript: session.transcript,
      cursor: session.scheduler.cursor,
      bufferedBytes: session.buffer.end,
      retainedBytes: session.buffer.retainedBytes,
      chunksAccepted: session.stats.chunksAccepted,
      windowsDispatched: session.stats.windowsDispatched,
      windowsFailed: session.stats.windowsFailed,
      discontinuities: session.stats.discontinuities,
      eventsDropped: session.channel.dropped,
      createdAt: new Date(session.createdAt).toISOString(),
      lastActivityAt: new Date(session.lastActivityAt).toISOString(),
      closedAt: session.closedAt !== undefined ? new Date(session.closedAt).toISOString() : undefined,
      closeReason: session.closeReason,
    };
  }

  /**
   * Whole-file transcription: one session, one chunk, immediate end. Throws the
   * last window error when nothing could be transcribed.
   */
  async transcribeWhole(data: Buffer, format: AudioFormat): Promise<string> {
    const sessionId = this.openSession(format);
    try {
      this.submitChunk(sessionId, { data, format });
      const transcript = await this.endSession(sessionId);

      if (!transcript) {
        const failure = this.events(sessionId)
          .drain()
          .filter((event) => event.type === 'notice')
          .pop();
        if (failure?.type === 'notice') {
          if (failure.code === 'InferenceUnavailable') throw new InferenceUnavailableError(failure.message);
          if (failure.code === 'InferenceFailed') throw new InferenceFailedError(failure.message);
        }
      }
      return transcript;
    } finally {
      const session = this.registry.get(sessionId);
      if (session && session.state !== 'CLOSED') {
        this.closeSession(sessionId, 'error');
      }
      this.registry.remove(sessionId);
    }
  }

  /** Live session counts for health reporting. */
  activeCounts(): { open: number; flushing: number } {
    return {
      open: this.registry.countByState('OPEN'),
      flushing: this.registry.countByState('FLUSHING'),
    };
  }

  /** Time out idle open sessions and purge closed ones past retention. */
  sweep(now: number = this.now()): SweepResult {
    const result: SweepResult = { timedOut: [], purged: [] };

    for (const session of this.registry.list()) {
      if (session.state === 'OPEN' && now - session.lastActivityAt > this.streaming.sessionIdleTimeoutMs) {
        this.closeSession(session.id, 'timeout');
        result.timedOut.push(session.id);
        continue;
      }

      if (
        session.state === 'CLOSED' &&
        session.closedAt !== undefined &&
        now - session.closedAt > this.streaming.closedSessionRetentionMs
      ) {
        this.registry.remove(session.id);
        result.purged.push(session.id);
      }
    }

    if (result.timedOut.length > 0 || result.purged.length > 0) {
      logger.info('Session sweep', { timedOut: result.timedOut.length, purged: result.purged.length });
    }
    return result;
  }

  startCleanupInterval(intervalMs: number): void {
    this.stopCleanupInterval();
    this.cleanupTimer = setInterval(() => this.sweep(), intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanupInterval(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  shutdown(): void {
    this.stopCleanupInterval();
    for (const session of this.registry.list()) {
      if (session.state !== 'CLOSED') this.closeSession(session.id, 'shutdown');
    }
  }

  private require(sessionId: string): Session {
    const session = this.registry.get(sessionId);
    if (!session) throw new UnknownSessionError(sessionId);
    return session;
  }

  private requireOpen(sessionId: string): Session {
    const session = this.require(sessionId);
    if (session.state !== 'OPEN') throw new SessionClosedError(sessionId, session.state);
    return session;
  }

  private decodeChunk(session: Session, data: Buffer): Buffer {
    if (session.format.encoding !== 'wav') return data;

    let wav: WavInfo;
    try {
      wav = parseWav(data);
    } catch (e) {
      throw new UnsupportedFormatError(`Invalid WAV chunk: ${errorMessage(e)}`);
    }

    if (
      wav.audioFormat !== 1 ||
      wav.bitsPerSample !== 16 ||
      wav.sampleRate !== session.format.sampleRate ||
      wav.channels !== session.format.channels
    ) {
      throw new UnsupportedFormatError(
        `WAV chunk is ${wav.bitsPerSample}-bit ${wav.sampleRate}Hz x${wav.channels}, session expects 16-bit ${session.format.sampleRate}Hz x${session.format.channels}`
      );
    }
    return wav.data;
  }

  private dispatch(session: Session, window: Window): void {
    session.stats.windowsDispatched += 1;
    logger.debug('Window dispatched', {
      sessionId: session.id,
      window: window.index,
      start: window.start,
      end: window.end,
      final: window.final,
    });
    this.processWindow(session, window).catch((e: unknown) => {
      logger.error('Window processing failed', { sessionId: session.id, error: errorMessage(e) });
    });
  }

  private async processWindow(session: Session, window: Window): Promise<void> {
    try {
      let text = '';
      let failure: InferenceError | null = null;

      if (window.end > window.start) {
        const audio = session.buffer.read(window.start, window.end);
        try {
          text = await this.transcribeWithDeadline(session, audio);
        } catch (e) {
          failure = toInferenceError(e);
        }
      }

      if (session.state === 'CLOSED') {
        logger.debug('Discarding window result for closed session', { sessionId: session.id, window: window.index });
        return;
      }

      if (failure) {
        session.stats.windowsFailed += 1;
        logger.warn('Window transcription failed', {
          sessionId: session.id,
          window: window.index,
          code: failure.code,
          error: failure.message,
        });
        session.channel.push({
          type: 'notice',
          sessionId: session.id,
          code: failure.code,
          message: `Skipped audio window ${window.index}: ${failure.message}`,
          windowIndex: window.index,
        });
      } else if (window.end > window.start) {
        this.applyFragment(session, window, text);
      }

      const next = session.scheduler.onWindowSettled(window, session.buffer.end);
      session.buffer.evictBefore(session.scheduler.retainFrom);

      if (window.final) {
        await this.finish(session);
        return;
      }

      if (next) this.dispatch(session, next);
    } catch (e) {
      this.abortWithError(session, e);
    }
  }

  private applyFragment(session: Session, window: Window, text: string): void {
    const result = this.reconciler.reconcile(session.transcript, text);
    session.transcript = result.transcript;

    if (result.discontinuity) {
      session.stats.discontinuities += 1;
      logger.info('Transcript discontinuity', {
        sessionId: session.id,
        window: window.index,
        fragmentPreview: text.slice(0, 120),
      });
    }

    session.channel.push({
      type: 'update',
      sessionId: session.id,
      delta: result.delta,
      transcript: result.transcript,
      windowIndex: window.index,
      discontinuity: result.discontinuity,
    });
  }

  /**
   * Run the adapter under the inference deadline. A timed-out call is aborted
   * and awaited before the window fails, so the adapter never runs twice at
   * once for a session.
   */
  private async transcribeWithDeadline(session: Session, audio: Buffer): Promise<string> {
    const controller = new AbortController();
    session.inflight = controller;
    const timeoutMs = this.streaming.inferenceTimeoutMs;
    let timeoutId: NodeJS.Timeout | undefined;
    let timedOut = false;

    const deadline = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(new InferenceFailedError(`Inference timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });
    const inference = this.adapter.transcribe(audio, session.pcmFormat, { signal: controller.signal });

    try {
      return await Promise.race([inference, deadline]);
    } catch (e) {
      if (timedOut) {
        await inference.then(
          () => logger.debug('Discarding inference result that arrived after the deadline', { sessionId: session.id }),
          (late: unknown) => logger.debug('Timed-out inference settled', { sessionId: session.id, error: errorMessage(late) })
        );
      }
      throw e;
    } finally {
      clearTimeout(timeoutId);
      if (session.inflight === controller) session.inflight = null;
    }
  }

  private async finish(session: Session): Promise<void> {
    this.markClosed(session, 'ended');
    session.channel.push({ type: 'final', sessionId: session.id, transcript: session.transcript });
    session.channel.close();

    logger.info('Session closed', {
      sessionId: session.id,
      transcriptChars: session.transcript.length,
      windows: session.stats.windowsDispatched,
      failedWindows: session.stats.windowsFailed,
      discontinuities: session.stats.discontinuities,
    });

    if (this.transcriptStore) {
      try {
        await this.transcriptStore.save({
          sessionId: session.id,
          transcript: session.transcript,
          format: { ...session.format },
          createdAt: new Date(session.createdAt).toISOString(),
          closedAt: new Date(session.closedAt ?? this.now()).toISOString(),
        });
      } catch (e) {
        logger.warn('Failed to store transcript', { sessionId: session.id, error: errorMessage(e) });
      }
    }

    session.finalizer?.resolve(session.transcript);
  }

  private abortWithError(session: Session, error: unknown): void {
    logger.error('Session failed', { sessionId: session.id, error: errorMessage(error) });
    if (session.state === 'CLOSED') return;

    this.markClosed(session, 'error');
    session.channel.close();
    session.finalizer?.reject(error instanceof Error ? error : new Error(errorMessage(error)));
  }

  private markClosed(session: Session, reason: CloseReason): void {
    session.state = 'CLOSED';
    session.closeReason = reason;
    session.closedAt = this.now();
  }
}

function toInferenceError(error: unknown): InferenceError {
  if (error instanceof InferenceFailedError || error instanceof InferenceUnavailableError) {
    return error;
  }
  return new InferenceFailedError(errorMessage(error));
}

function createFinalizer(): NonNullable<Session['finalizer']> {
  let resolve: (transcript: string) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<string>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
