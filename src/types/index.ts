/**
 * Shared domain types for the transcription service.
 * Keeps API, gateway, and streaming engine aligned on the same shapes.
 */

/** Encodings a live session can buffer. */
export type StreamEncoding = 'pcm_s16le' | 'pcm_f32le' | 'wav';

/** Container formats accepted on the whole-file path; decoded by ffmpeg. */
export type ContainerEncoding = 'webm' | 'ogg' | 'mp3' | 'm4a' | 'flac';

export type AudioEncoding = StreamEncoding | ContainerEncoding;

/** Raw sample layouts the chunk buffer stores. */
export type PcmEncoding = 'pcm_s16le' | 'pcm_f32le';

export interface AudioFormat {
  encoding: AudioEncoding;
  sampleRate: number;
  channels: number;
}

/** Format of the bytes the buffer holds and the inference adapter receives. */
export interface PcmFormat {
  encoding: PcmEncoding;
  sampleRate: number;
  channels: number;
}

export type SessionState = 'OPEN' | 'FLUSHING' | 'CLOSED';

export type CloseReason = 'ended' | 'disconnected' | 'timeout' | 'shutdown' | 'error';

export interface AudioChunk {
  data: Buffer;
  /** Declared format; must match the session's when present. */
  format?: AudioFormat;
  /** Client-side sequence number. Assigned at arrival when omitted. */
  seq?: number;
}

/** A contiguous span of buffered audio `[start, end)` in bytes. */
export interface Window {
  index: number;
  start: number;
  end: number;
  final: boolean;
}

export interface ChunkReceipt {
  sessionId: string;
  seq: number;
  bufferedBytes: number;
}

export type NoticeCode = 'InferenceFailed' | 'InferenceUnavailable' | 'OutOfOrderChunk' | 'NoAudio';

export type SessionEvent =
  | { type: 'ack'; sessionId: string; seq: number; bufferedBytes: number }
  | {
      type: 'update';
      sessionId: string;
      delta: string;
      transcript: string;
      windowIndex: number;
      discontinuity: boolean;
    }
  | { type: 'notice'; sessionId: string; code: NoticeCode; message: string; windowIndex?: number }
  | { type: 'final'; sessionId: string; transcript: string };

export interface SessionSnapshot {
  sessionId: string;
  state: SessionState;
  format: AudioFormat;
  transcript: string;
  /** Byte offset of audio already reconciled into the transcript. */
  cursor: number;
  bufferedBytes: number;
  /** Bytes still held in memory after eviction. */
  retainedBytes: number;
  chunksAccepted: number;
  windowsDispatched: number;
  windowsFailed: number;
  discontinuities: number;
  /** Events dropped because the client did not read them. */
  eventsDropped: number;
  createdAt: string;
  lastActivityAt: string;
  closedAt?: string;
  closeReason?: CloseReason;
}

export interface StoredTranscript {
  sessionId: string;
  transcript: string;
  format: AudioFormat;
  createdAt: string;
  closedAt: string;
}
