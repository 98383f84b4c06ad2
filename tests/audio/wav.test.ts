import {
  buildWav,
  float32ToPcm16,
  frameBytes,
  parseWav,
  secondsToBytes,
  toPcmFormat,
} from '../../src/services/audio/wav';

function chunk(id: string, payload: Buffer): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, 'ascii');
  header.writeUInt32LE(payload.length, 4);
  const pad = payload.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
  return Buffer.concat([header, payload, pad]);
}

describe('wav helpers', () => {
  test('frame and window sizes follow the sample layout', () => {
    expect(frameBytes({ encoding: 'pcm_s16le', sampleRate: 16000, channels: 1 })).toBe(2);
    expect(frameBytes({ encoding: 'pcm_f32le', sampleRate: 48000, channels: 2 })).toBe(8);
    expect(secondsToBytes(0.5, { encoding: 'pcm_s16le', sampleRate: 16000, channels: 1 })).toBe(16000);
    expect(secondsToBytes(2, { encoding: 'pcm_f32le', sampleRate: 48000, channels: 2 })).toBe(768000);
  });

  test('stream encodings map to a buffer layout and containers do not', () => {
    expect(toPcmFormat({ encoding: 'wav', sampleRate: 16000, channels: 1 })).toEqual({
      encoding: 'pcm_s16le',
      sampleRate: 16000,
      channels: 1,
    });
    expect(toPcmFormat({ encoding: 'pcm_f32le', sampleRate: 8000, channels: 2 })?.encoding).toBe('pcm_f32le');
    expect(toPcmFormat({ encoding: 'webm', sampleRate: 48000, channels: 1 })).toBeNull();
  });

  test('buildWav writes a header parseWav can read back', () => {
    const samples = Buffer.from([1, 2, 3, 4, 5, 6]);
    const wav = buildWav(samples, 22050, 1);

    expect(wav.length).toBe(50);
    const info = parseWav(wav);
    expect(info.audioFormat).toBe(1);
    expect(info.sampleRate).toBe(22050);
    expect(info.channels).toBe(1);
    expect(info.bitsPerSample).toBe(16);
    expect([...info.data]).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('parseWav skips unknown chunks including odd-sized ones', () => {
    const fmt = buildWav(Buffer.alloc(0), 16000, 2).subarray(12, 36);
    const riff = Buffer.alloc(12);
    riff.write('RIFF', 0, 'ascii');
    riff.write('WAVE', 8, 'ascii');

    const file = Buffer.concat([
      riff,
      fmt,
      chunk('LIST', Buffer.from([9, 9, 9, 9, 9])),
      chunk('data', Buffer.from([7, 8, 7, 8])),
    ]);

    const info = parseWav(file);
    expect(info.channels).toBe(2);
    expect([...info.data]).toEqual([7, 8, 7, 8]);
  });

  test('a zero data size reads to the end of the buffer', () => {
    const wav = buildWav(Buffer.from([1, 1, 2, 2]), 16000, 1);
    wav.writeUInt32LE(0, 40);
    expect([...parseWav(wav).data]).toEqual([1, 1, 2, 2]);
  });

  test('parseWav rejects buffers that are not WAV', () => {
    expect(() => parseWav(Buffer.alloc(4))).toThrow('WAV too short');
    expect(() => parseWav(Buffer.alloc(64))).toThrow('missing RIFF header');

    const noData = buildWav(Buffer.alloc(0), 16000, 1).subarray(0, 36);
    expect(() => parseWav(noData)).toThrow('missing data chunk');
  });

  test('float32ToPcm16 scales and clips', () => {
    const floats = Buffer.alloc(16);
    floats.writeFloatLE(0.5, 0);
    floats.writeFloatLE(-0.5, 4);
    floats.writeFloatLE(2, 8);
    floats.writeFloatLE(0, 12);

    const out = float32ToPcm16(floats);
    expect(out.length).toBe(8);
    expect([0, 2, 4, 6].map((offset) => out.readInt16LE(offset))).toEqual([16384, -16384, 32767, 0]);
  });
});
