/**
 * Decoding for the whole-file path. Compressed formats, and WAV files in a
 * layout the engine cannot buffer, are handed to ffmpeg and come back as
 * 16 kHz mono 16-bit WAV.
 */
import { promises as fsp } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../../config/logger';
import { CommandRunner, isMissingExecutable, runCommand } from '../process/runCommand';
import { UnsupportedFormatError, errorMessage } from '../streaming/errors';
import type { AudioFormat, ContainerEncoding } from '../../types';
import { WavInfo, isStreamEncoding, parseWav } from './wav';

const CONTAINER_ENCODINGS: readonly ContainerEncoding[] = ['webm', 'ogg', 'mp3', 'm4a', 'flac'];

export type DecodableEncoding = ContainerEncoding | 'wav';

export interface DecodedAudio {
  pcm: Buffer;
  format: AudioFormat;
}

export interface AudioDecoderOptions {
  ffmpegPath: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export function isContainerEncoding(encoding: string): encoding is ContainerEncoding {
  return (CONTAINER_ENCODINGS as readonly string[]).includes(encoding);
}

export function isKnownEncoding(encoding: string): encoding is AudioFormat['encoding'] {
  return isStreamEncoding(encoding) || isContainerEncoding(encoding);
}

export class AudioDecoder {
  private readonly runner: CommandRunner;

  constructor(private readonly options: AudioDecoderOptions) {
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Decode a file to 16 kHz mono PCM. Anything ffmpeg cannot read is reported
   * as UnsupportedFormat.
   */
  async decode(bytes: Buffer, encoding: DecodableEncoding): Promise<DecodedAudio> {
    const workDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'decode-'));

    try {
      const inputPath = path.join(workDir, `input.${encoding}`);
      const outputPath = path.join(workDir, 'output.wav');
      await fsp.writeFile(inputPath, bytes);

      const args = ['-y', '-i', inputPath, '-ar', '16000', '-ac', '1', '-c:a', 'pcm_s16le', '-f', 'wav', outputPath];
      logger.info('Decoding upload with ffmpeg', { encoding, bytes: bytes.length });

      let code: number;
      let stderr: string;
      try {
        ({ code, stderr } = await this.runner(this.options.ffmpegPath, args, {
          timeoutMs: this.options.timeoutMs ?? 60000,
        }));
      } catch (e) {
        if (isMissingExecutable(e)) {
          throw new UnsupportedFormatError(`ffmpeg is required to decode ${encoding} audio`);
        }
        throw new UnsupportedFormatError(`Could not decode ${encoding} audio: ${errorMessage(e)}`);
      }

      if (code !== 0) {
        logger.error('ffmpeg decode failed', { code, stderr: stderr.slice(0, 2000) });
        throw new UnsupportedFormatError(`Could not decode ${encoding} audio (ffmpeg exit ${code})`);
      }

      let wav: WavInfo;
      try {
        wav = parseWav(await fsp.readFile(outputPath));
      } catch (e) {
        throw new UnsupportedFormatError(`ffmpeg produced unreadable audio: ${errorMessage(e)}`);
      }
      return {
        pcm: Buffer.from(wav.data),
        format: { encoding: 'pcm_s16le', sampleRate: wav.sampleRate, channels: wav.channels },
      };
    } finally {
      await fsp.rm(workDir, { recursive: true, force: true }).catch((e: unknown) => {
        logger.warn('Failed to remove decode temp dir', { workDir, error: errorMessage(e) });
      });
    }
  }
}
