/**
 * whisper.cpp inference adapter. Each window is written to a temporary WAV,
 * resampled to 16 kHz mono by ffmpeg when needed, and passed to the whisper
 * CLI; the transcript is read back from stdout.
 */
import { promises as fsp } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../../config/logger';
import { buildWav, isStreamEncoding, toPcm16 } from '../../services/audio/wav';
import {
  CommandResult,
  CommandRunner,
  hasCommandOnPath,
  isMissingExecutable,
  runCommand,
} from '../../services/process/runCommand';
import {
  InferenceFailedError,
  InferenceUnavailableError,
  errorMessage,
} from '../../services/streaming/errors';
import type { AudioFormat, PcmFormat } from '../../types';
import type { InferenceAdapter, TranscribeOptions } from './types';

const WHISPER_SAMPLE_RATE = 16000;

export interface WhisperCppOptions {
  bin: string;
  modelPath: string;
  language: string;
  threads: number;
  ffmpegPath: string;
  supportedSampleRates: readonly number[];
  /** Upper bound for one whisper or ffmpeg run; the session applies its own deadline too. */
  commandTimeoutMs?: number;
  runner?: CommandRunner;
  /** Whether ffmpeg can be used to resample; probed lazily when omitted. */
  hasResampler?: () => boolean;
}

/** Drop bracketed timestamp/marker lines and normalize whitespace. */
export function extractTranscriptFromWhisperStdout(stdout: string): string {
  const lines = (stdout || '').split('\n');
  return lines
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith('['))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export class WhisperCppSTTService implements InferenceAdapter {
  readonly name = 'whisper.cpp';
  private readonly runner: CommandRunner;
  private readonly commandTimeoutMs: number;
  private resamplerAvailable: boolean | null = null;

  constructor(private readonly options: WhisperCppOptions) {
    this.runner = options.runner ?? runCommand;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 240000;
  }

  supportsFormat(format: AudioFormat): boolean {
    if (!isStreamEncoding(format.encoding)) return false;
    if (!Number.isInteger(format.channels) || format.channels < 1 || format.channels > 2) return false;
    if (!this.options.supportedSampleRates.includes(format.sampleRate)) return false;

    if (format.sampleRate === WHISPER_SAMPLE_RATE && format.channels === 1) return true;
    return this.canResample();
  }

  async transcribe(audio: Buffer, format: PcmFormat, options: TranscribeOptions = {}): Promise<string> {
    const pcm16 = toPcm16(audio, format.encoding);
    if (pcm16.length === 0) return '';

    const workDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'stt-'));

    try {
      const inputPath = path.join(workDir, 'window.wav');
      await fsp.writeFile(inputPath, buildWav(pcm16, format.sampleRate, format.channels));

      const wavPath =
        format.sampleRate === WHISPER_SAMPLE_RATE && format.channels === 1
          ? inputPath
          : await this.resample(inputPath, path.join(workDir, 'window_16k_mono.wav'), options.signal);

      return await this.runWhisper(wavPath, options.signal);
    } finally {
      await fsp.rm(workDir, { recursive: true, force: true }).catch((e: unknown) => {
        logger.warn('Failed to remove STT temp dir', { workDir, error: errorMessage(e) });
      });
    }
  }

  private canResample(): boolean {
    if (this.resamplerAvailable === null) {
      this.resamplerAvailable = this.options.hasResampler
        ? this.options.hasResampler()
        : hasCommandOnPath(this.options.ffmpegPath);
    }
    return this.resamplerAvailable;
  }

  private async resample(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<string> {
    const args = ['-y', '-i', inputPath, '-ar', String(WHISPER_SAMPLE_RATE), '-ac', '1', '-c:a', 'pcm_s16le', outputPath];

    let result: CommandResult;
    try {
      result = await this.runner(this.options.ffmpegPath, args, { timeoutMs: this.commandTimeoutMs, signal });
    } catch (e) {
      if (isMissingExecutable(e)) {
        throw new InferenceUnavailableError(`ffmpeg not found at ${this.options.ffmpegPath}`);
      }
      throw new InferenceFailedError(`ffmpeg resample failed: ${errorMessage(e)}`);
    }

    if (result.code !== 0) {
      logger.error('ffmpeg resample failed', { code: result.code, stderr: result.stderr.slice(0, 2000) });
      throw new InferenceFailedError(`ffmpeg exited with code ${result.code}`);
    }
    return outputPath;
  }

  private async runWhisper(wavPath: string, signal?: AbortSignal): Promise<string> {
    const args = [
      '-m',
      this.options.modelPath,
      '-f',
      wavPath,
      '-l',
      this.options.language,
      '-t',
      String(this.options.threads),
      '--no-timestamps',
    ];

    logger.debug('Running whisper.cpp', { bin: this.options.bin, args: args.join(' ') });

    let result: CommandResult;
    try {
      result = await this.runner(this.options.bin, args, { timeoutMs: this.commandTimeoutMs, signal });
    } catch (e) {
      if (isMissingExecutable(e)) {
        throw new InferenceUnavailableError(`whisper.cpp binary not found at ${this.options.bin}`);
      }
      throw new InferenceFailedError(`whisper.cpp run failed: ${errorMessage(e)}`);
    }

    if (result.code !== 0) {
      logger.error('whisper.cpp failed', {
        code: result.code,
        stderr: result.stderr.slice(0, 2000),
        stdout: result.stdout.slice(0, 500),
      });
      const detail = (result.stderr || result.stdout).trim().split('\n').pop() ?? '';
      throw new InferenceFailedError(`whisper.cpp exited with code ${result.code}${detail ? `: ${detail}` : ''}`);
    }

    return extractTranscriptFromWhisperStdout(result.stdout);
  }
}
