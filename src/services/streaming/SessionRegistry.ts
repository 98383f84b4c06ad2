import type { ChunkBuffer } from './ChunkBuffer';
import type { SessionChannel } from './SessionChannel';
import type { WindowScheduler } from './WindowScheduler';
import type { AudioFormat, CloseReason, PcmFormat, SessionState } from '../../types';

export interface Session {
  id: string;
  format: AudioFormat;
  /** Layout of the bytes in `buffer`. */
  pcmFormat: PcmFormat;
  state: SessionState;
  createdAt: number;
  lastActivityAt: number;
  closedAt?: number;
  closeReason?: CloseReason;
  transcript: string;
  buffer: ChunkBuffer;
  scheduler: WindowScheduler;
  channel: SessionChannel;
  /** Trailing bytes of an incomplete sample frame, prepended to the next chunk. */
  carry: Buffer;
  /** Aborts the in-flight inference call; set only while a window is being transcribed. */
  inflight: AbortController | null;
  /** Resolved or rejected by the final window; set once `endSession` is called. */
  finalizer: {
    promise: Promise<string>;
    resolve: (transcript: string) => void;
    reject: (error: Error) => void;
  } | null;
  stats: {
    chunksAccepted: number;
    windowsDispatched: number;
    windowsFailed: number;
    discontinuities: number;
  };
}

/**
 * Session table with an explicit lifecycle: create, lookup, remove.
 * Closed sessions stay listed until purged so late calls can tell
 * "closed" apart from "never existed".
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  get size(): number {
    return this.sessions.size;
  }

  add(session: Session): void {
    if (this.sessions.has(session.id)) {
      throw new Error(`Session ${session.id} already registered`);
    }
    this.sessions.set(session.id, session);
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Snapshot of the registered sessions; safe to mutate the registry while iterating it. */
  list(): Session[] {
    return Array.from(this.sessions.values());
  }

  countByState(state: SessionState): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.state === state) count++;
    }
    return count;
  }
}
