import * as fs from 'fs';
import {
  WhisperCppSTTService,
  WhisperCppOptions,
  extractTranscriptFromWhisperStdout,
} from '../../src/ai/stt/WhisperCppSTTService';
import { WavInfo, parseWav } from '../../src/services/audio/wav';
import type { CommandResult, RunCommandOptions } from '../../src/services/process/runCommand';
import { InferenceFailedError, InferenceUnavailableError } from '../../src/services/streaming/errors';

type RunnerArgs = [string, string[], RunCommandOptions];

function makeRunner(impl: (cmd: string, args: string[]) => CommandResult | Promise<CommandResult>) {
  return jest.fn<Promise<CommandResult>, RunnerArgs>(async (cmd, args) => impl(cmd, args));
}

function makeService(runner: ReturnType<typeof makeRunner>, overrides: Partial<WhisperCppOptions> = {}) {
  return new WhisperCppSTTService({
    bin: 'whisper-cli',
    modelPath: 'models/test-model.bin',
    language: 'en',
    threads: 2,
    ffmpegPath: 'ffmpeg',
    supportedSampleRates: [16000, 48000],
    runner,
    hasResampler: () => true,
    ...overrides,
  });
}

const MONO_16K = { encoding: 'pcm_s16le', sampleRate: 16000, channels: 1 } as const;

describe('extractTranscriptFromWhisperStdout', () => {
  test('drops bracketed lines and collapses whitespace', () => {
    const stdout = ' Hello   there.\n[BLANK_AUDIO]\n  see you tomorrow \n\n';
    expect(extractTranscriptFromWhisperStdout(stdout)).toBe('Hello there. see you tomorrow');
  });

  test('empty output is an empty transcript', () => {
    expect(extractTranscriptFromWhisperStdout('')).toBe('');
  });
});

describe('WhisperCppSTTService', () => {
  test('runs whisper directly on 16 kHz mono audio', async () => {
    const runner = makeRunner(() => ({ code: 0, stdout: ' hi there \n', stderr: '' }));
    const service = makeService(runner);

    await expect(service.transcribe(Buffer.alloc(3200), MONO_16K)).resolves.toBe('hi there');

    expect(runner).toHaveBeenCalledTimes(1);
    const [cmd, args] = runner.mock.calls[0];
    expect(cmd).toBe('whisper-cli');
    expect(args.slice(0, 2)).toEqual(['-m', 'models/test-model.bin']);
    expect(args[2]).toBe('-f');
    expect(args[3].endsWith('window.wav')).toBe(true);
    expect(args.slice(4)).toEqual(['-l', 'en', '-t', '2', '--no-timestamps']);
  });

  test('resamples other rates through ffmpeg first', async () => {
    const runner = makeRunner(() => ({ code: 0, stdout: 'resampled', stderr: '' }));
    const service = makeService(runner);

    await service.transcribe(Buffer.alloc(9600), { encoding: 'pcm_s16le', sampleRate: 48000, channels: 1 });

    expect(runner.mock.calls.map(([cmd]) => cmd)).toEqual(['ffmpeg', 'whisper-cli']);
    const ffmpegArgs = runner.mock.calls[0][1];
    expect(ffmpegArgs).toContain('16000');
    expect(runner.mock.calls[1][1][3].endsWith('window_16k_mono.wav')).toBe(true);
  });

  test('writes float samples as 16-bit WAV', async () => {
    const written: WavInfo[] = [];
    const runner = makeRunner((_cmd, args) => {
      written.push(parseWav(fs.readFileSync(args[3])));
      return { code: 0, stdout: 'ok', stderr: '' };
    });
    const service = makeService(runner);

    const floats = Buffer.alloc(8);
    floats.writeFloatLE(1, 0);
    floats.writeFloatLE(-1, 4);
    await service.transcribe(floats, { encoding: 'pcm_f32le', sampleRate: 16000, channels: 1 });

    expect(written).toHaveLength(1);
    expect(written[0].bitsPerSample).toBe(16);
    expect(written[0].data.readInt16LE(0)).toBe(32767);
    expect(written[0].data.readInt16LE(2)).toBe(-32768);
  });

  test('passes the abort signal to the subprocess runner', async () => {
    const runner = makeRunner(() => ({ code: 0, stdout: 'x', stderr: '' }));
    const service = makeService(runner);
    const controller = new AbortController();

    await service.transcribe(Buffer.alloc(320), MONO_16K, { signal: controller.signal });
    expect(runner.mock.calls[0][2].signal).toBe(controller.signal);
  });

  test('empty audio skips the subprocess', async () => {
    const runner = makeRunner(() => ({ code: 0, stdout: 'never', stderr: '' }));
    const service = makeService(runner);

    await expect(service.transcribe(Buffer.alloc(0), MONO_16K)).resolves.toBe('');
    expect(runner).not.toHaveBeenCalled();
  });

  test('a missing binary is InferenceUnavailable', async () => {
    const runner = makeRunner(() => {
      throw Object.assign(new Error('spawn whisper-cli ENOENT'), { code: 'ENOENT' });
    });
    const service = makeService(runner);

    const result = service.transcribe(Buffer.alloc(320), MONO_16K);
    await expect(result).rejects.toThrow(InferenceUnavailableError);
    await expect(result).rejects.toThrow('whisper.cpp binary not found at whisper-cli');
  });

  test('a non-zero exit is InferenceFailed with the last stderr line', async () => {
    const runner = makeRunner(() => ({
      code: 1,
      stdout: '',
      stderr: 'loading model\nerror: failed to open model\n',
    }));
    const service = makeService(runner);

    const result = service.transcribe(Buffer.alloc(320), MONO_16K);
    await expect(result).rejects.toThrow(InferenceFailedError);
    await expect(result).rejects.toThrow('whisper.cpp exited with code 1: error: failed to open model');
  });

  test('a timed out run is InferenceFailed', async () => {
    const runner = makeRunner(() => {
      throw new Error('Command timed out after 50ms: whisper-cli');
    });
    const service = makeService(runner);

    await expect(service.transcribe(Buffer.alloc(320), MONO_16K)).rejects.toThrow(
      'whisper.cpp run failed: Command timed out after 50ms: whisper-cli'
    );
  });

  test('supportsFormat follows the rate list and resampler availability', () => {
    const runner = makeRunner(() => ({ code: 0, stdout: '', stderr: '' }));
    const withFfmpeg = makeService(runner);
    const withoutFfmpeg = makeService(runner, { hasResampler: () => false });

    expect(withFfmpeg.supportsFormat(MONO_16K)).toBe(true);
    expect(withFfmpeg.supportsFormat({ encoding: 'wav', sampleRate: 48000, channels: 2 })).toBe(true);
    expect(withFfmpeg.supportsFormat({ encoding: 'pcm_s16le', sampleRate: 44100, channels: 1 })).toBe(false);
    expect(withFfmpeg.supportsFormat({ encoding: 'webm', sampleRate: 48000, channels: 1 })).toBe(false);
    expect(withFfmpeg.supportsFormat({ encoding: 'pcm_s16le', sampleRate: 16000, channels: 3 })).toBe(false);

    expect(withoutFfmpeg.supportsFormat(MONO_16K)).toBe(true);
    expect(withoutFfmpeg.supportsFormat({ encoding: 'pcm_s16le', sampleRate: 48000, channels: 1 })).toBe(false);
  });
});
