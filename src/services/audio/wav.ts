/**
 * PCM and RIFF/WAVE helpers shared by the streaming engine and the whisper adapter.
 */
import type { AudioFormat, PcmEncoding, PcmFormat, StreamEncoding } from '../../types';

const STREAM_ENCODINGS: readonly StreamEncoding[] = ['pcm_s16le', 'pcm_f32le', 'wav'];

export interface WavInfo {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  /** Sample data of the `data` chunk. */
  data: Buffer;
}

export function isStreamEncoding(encoding: string): encoding is StreamEncoding {
  return (STREAM_ENCODINGS as readonly string[]).includes(encoding);
}

export function bytesPerSample(encoding: PcmEncoding): number {
  return encoding === 'pcm_f32le' ? 4 : 2;
}

export function frameBytes(format: PcmFormat): number {
  return bytesPerSample(format.encoding) * format.channels;
}

/** Whole frames covering `seconds` of audio, in bytes. */
export function secondsToBytes(seconds: number, format: PcmFormat): number {
  const frames = Math.round(seconds * format.sampleRate);
  return frames * frameBytes(format);
}

/** Layout the chunk buffer uses for a stream encoding; null for containers. */
export function toPcmFormat(format: AudioFormat): PcmFormat | null {
  switch (format.encoding) {
    case 'pcm_s16le':
    case 'wav':
      return { encoding: 'pcm_s16le', sampleRate: format.sampleRate, channels: format.channels };
    case 'pcm_f32le':
      return { encoding: 'pcm_f32le', sampleRate: format.sampleRate, channels: format.channels };
    default:
      return null;
  }
}

export function sameFormat(a: AudioFormat, b: AudioFormat): boolean {
  return a.encoding === b.encoding && a.sampleRate === b.sampleRate && a.channels === b.channels;
}

/**
 * Build a 44-byte-header PCM WAV around 16-bit little-endian samples.
 */
export function buildWav(pcm16: Buffer, sampleRate: number, channels: number): Buffer {
  const bitsPerSample = 16;
  const header = Buffer.alloc(44);

  // RIFF header
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + pcm16.length, 4);
  header.write('WAVE', 8);

  // fmt chunk
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // audio format (1 = PCM)
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE((sampleRate * channels * bitsPerSample) / 8, 28); // byte rate
  header.writeUInt16LE((channels * bitsPerSample) / 8, 32); // block align
  header.writeUInt16LE(bitsPerSample, 34);

  // data chunk
  header.write('data', 36);
  header.writeUInt32LE(pcm16.length, 40);

  return Buffer.concat([header, pcm16]);
}

/**
 * Walk the RIFF chunks and return the fmt fields plus the sample data.
 * Throws when the buffer is not a PCM WAV.
 */
export function parseWav(buffer: Buffer): WavInfo {
  if (buffer.length < 12) throw new Error('WAV too short');
  if (buffer.toString('ascii', 0, 4) !== 'RIFF') throw new Error('missing RIFF header');
  if (buffer.toString('ascii', 8, 12) !== 'WAVE') throw new Error('missing WAVE marker');

  let fmt: Omit<WavInfo, 'data'> | null = null;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    offset += 8;

    if (chunkId === 'fmt ') {
      if (offset + 16 > buffer.length) throw new Error('truncated fmt chunk');
      fmt = {
        audioFormat: buffer.readUInt16LE(offset),
        channels: buffer.readUInt16LE(offset + 2),
        sampleRate: buffer.readUInt32LE(offset + 4),
        bitsPerSample: buffer.readUInt16LE(offset + 14),
      };
    } else if (chunkId === 'data') {
      if (!fmt) throw new Error('data chunk before fmt chunk');
      // streaming writers leave the size at 0 or 0xffffffff; take what is there
      const end = Math.min(buffer.length, offset + chunkSize);
      const dataEnd = chunkSize === 0 ? buffer.length : end;
      return { ...fmt, data: buffer.subarray(offset, dataEnd) };
    }

    // Skip chunk payload (plus padding to word boundary).
    offset += chunkSize + (chunkSize % 2);
  }

  throw new Error('missing data chunk');
}

/** Float32 samples in [-1, 1] to signed 16-bit, clipping out-of-range values. */
export function float32ToPcm16(floatBytes: Buffer): Buffer {
  const sampleCount = Math.floor(floatBytes.length / 4);
  const out = Buffer.alloc(sampleCount * 2);

  for (let i = 0; i < sampleCount; i++) {
    const f = floatBytes.readFloatLE(i * 4);
    const clipped = f > 1 ? 1 : f < -1 ? -1 : f;
    const s = clipped < 0 ? Math.round(clipped * 32768) : Math.round(clipped * 32767);
    out.writeInt16LE(s, i * 2);
  }

  return out;
}

/** Samples as 16-bit PCM, whatever the buffered layout. */
export function toPcm16(bytes: Buffer, encoding: PcmEncoding): Buffer {
  return encoding === 'pcm_f32le' ? float32ToPcm16(bytes) : bytes;
}
