import type { Window } from '../../types';

export interface WindowSchedulerOptions {
  /** Unwindowed bytes that trigger a window. */
  targetBytes: number;
  /** Bytes each window re-reads from the end of the previous one. */
  overlapBytes: number;
}

/**
 * Decides when a transcription pass runs and which span it covers.
 *
 * Holds at most one window in flight; the next one is only produced after
 * `onWindowSettled`. Exactly one final window is emitted per stream.
 */
export class WindowScheduler {
  private lastWindowEnd = 0;
  private inFlight: Window | null = null;
  private endRequested = false;
  private finalEmitted = false;
  private nextIndex = 0;

  constructor(private readonly options: WindowSchedulerOptions) {
    if (options.targetBytes <= 0) {
      throw new Error('targetBytes must be greater than 0');
    }
    if (options.overlapBytes < 0 || options.overlapBytes >= options.targetBytes) {
      throw new Error('overlapBytes must be between 0 and targetBytes');
    }
  }

  get hasWindowInFlight(): boolean {
    return this.inFlight !== null;
  }

  get isFinished(): boolean {
    return this.finalEmitted && this.inFlight === null;
  }

  /** End offset of the last settled window; audio before it has been reconciled. */
  get cursor(): number {
    return this.lastWindowEnd;
  }

  /** Earliest offset any future window may start at. */
  get retainFrom(): number {
    return Math.max(0, this.lastWindowEnd - this.options.overlapBytes);
  }

  onChunkAppended(bufferEnd: number): Window | null {
    if (this.inFlight || this.endRequested) return null;
    if (bufferEnd - this.lastWindowEnd < this.options.targetBytes) return null;
    return this.emit(bufferEnd, false);
  }

  onEndOfStream(bufferEnd: number): Window | null {
    if (this.endRequested) return null;
    this.endRequested = true;
    if (this.inFlight) return null;
    return this.emitFinal(bufferEnd);
  }

  onWindowSettled(window: Window, bufferEnd: number): Window | null {
    if (!this.inFlight || this.inFlight.index !== window.index) {
      throw new Error(`Window ${window.index} is not the window in flight`);
    }

    this.inFlight = null;
    this.lastWindowEnd = window.end;

    if (window.final) return null;
    if (this.endRequested) return this.emitFinal(bufferEnd);
    return this.onChunkAppended(bufferEnd);
  }

  private emitFinal(bufferEnd: number): Window | null {
    if (this.finalEmitted) return null;
    this.finalEmitted = true;

    if (bufferEnd <= this.lastWindowEnd) {
      return this.track({ index: this.nextIndex++, start: bufferEnd, end: bufferEnd, final: true });
    }
    return this.emit(bufferEnd, true);
  }

  private emit(bufferEnd: number, final: boolean): Window {
    return this.track({
      index: this.nextIndex++,
      start: this.retainFrom,
      end: bufferEnd,
      final,
    });
  }

  private track(window: Window): Window {
    this.inFlight = window;
    return window;
  }
}
