import type { SessionEvent } from '../../types';

interface Waiter {
  resolve: (result: IteratorResult<SessionEvent>) => void;
}

const DEFAULT_CHANNEL_CAPACITY = 1000;

/**
 * Per-session outbound queue. The engine pushes; one transport drains it,
 * either by `drain()` (polling) or by async iteration (push transports).
 *
 * At most `capacity` events wait for a reader. Past that the oldest `ack` is
 * dropped first, then the oldest event of any kind.
 */
export class SessionChannel implements AsyncIterable<SessionEvent> {
  private buffered: SessionEvent[] = [];
  private waiters: Waiter[] = [];
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('capacity must be a positive integer');
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffered.length;
  }

  /** Events discarded because nobody read them in time. */
  get dropped(): number {
    return this.droppedCount;
  }

  push(event: SessionEvent): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: event, done: false });
      return;
    }

    if (this.buffered.length >= this.capacity) {
      const oldestAck = this.buffered.findIndex((buffered) => buffered.type === 'ack');
      this.buffered.splice(oldestAck === -1 ? 0 : oldestAck, 1);
      this.droppedCount += 1;
    }
    this.buffered.push(event);
  }

  /** Take every buffered event. */
  drain(): SessionEvent[] {
    const events = this.buffered;
    this.buffered = [];
    return events;
  }

  /** Stop accepting events. Already-buffered events can still be drained or iterated. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<SessionEvent>> {
    const event = this.buffered.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push({ resolve });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<SessionEvent> {
    return {
      next: () => this.next(),
    };
  }
}
