import { OutOfOrderChunkError, RangeUnavailableError } from './errors';

interface Segment {
  start: number;
  bytes: Buffer;
}

/**
 * Time-ordered byte store for one session's decoded audio.
 *
 * Offsets are absolute for the life of the session; eviction drops bytes from
 * the front without renumbering.
 */
export class ChunkBuffer {
  private segments: Segment[] = [];
  private endOffset = 0;
  private evictedOffset = 0;
  private expectedSeq = 0;

  get end(): number {
    return this.endOffset;
  }

  get nextSeq(): number {
    return this.expectedSeq;
  }

  get evictedBefore(): number {
    return this.evictedOffset;
  }

  get retainedBytes(): number {
    return this.endOffset - this.evictedOffset;
  }

  append(seq: number, bytes: Buffer): void {
    if (seq !== this.expectedSeq) {
      throw new OutOfOrderChunkError(this.expectedSeq, seq);
    }

    this.expectedSeq += 1;
    if (bytes.length === 0) return;

    this.segments.push({ start: this.endOffset, bytes });
    this.endOffset += bytes.length;
  }

  read(start: number, end: number): Buffer {
    if (start > end) {
      throw new RangeUnavailableError(start, end, 'start is after end');
    }
    if (start < this.evictedOffset) {
      throw new RangeUnavailableError(start, end, `evicted below ${this.evictedOffset}`);
    }
    if (end > this.endOffset) {
      throw new RangeUnavailableError(start, end, `buffer ends at ${this.endOffset}`);
    }
    if (start === end) return Buffer.alloc(0);

    const parts: Buffer[] = [];
    for (const segment of this.segments) {
      const segmentEnd = segment.start + segment.bytes.length;
      if (segmentEnd <= start) continue;
      if (segment.start >= end) break;

      const from = Math.max(start, segment.start) - segment.start;
      const to = Math.min(end, segmentEnd) - segment.start;
      parts.push(segment.bytes.subarray(from, to));
    }

    return parts.length === 1 ? parts[0] : Buffer.concat(parts);
  }

  /** Drop everything below `offset`. Offsets past the end are clamped. */
  evictBefore(offset: number): void {
    const target = Math.min(offset, this.endOffset);
    if (target <= this.evictedOffset) return;

    while (this.segments.length > 0) {
      const head = this.segments[0];
      const headEnd = head.start + head.bytes.length;

      if (headEnd <= target) {
        this.segments.shift();
        continue;
      }

      if (head.start < target) {
        this.segments[0] = {
          start: target,
          // copy so the evicted prefix can be collected
          bytes: Buffer.from(head.bytes.subarray(target - head.start)),
        };
      }
      break;
    }

    this.evictedOffset = target;
  }
}
