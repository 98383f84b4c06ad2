/**
 * STT is handled by a local whisper.cpp binary reached through a subprocess.
 */
import { config } from '../../config';
import type { InferenceAdapter } from './types';
import { WhisperCppSTTService } from './WhisperCppSTTService';

let instance: InferenceAdapter | null = null;

export function getSTTService(): InferenceAdapter {
  if (!instance) {
    instance = new WhisperCppSTTService({
      bin: config.whisper.bin,
      modelPath: config.whisper.modelPath,
      language: config.whisper.language,
      threads: config.whisper.threads,
      ffmpegPath: config.audio.ffmpegPath,
      supportedSampleRates: config.audio.supportedSampleRates,
      commandTimeoutMs: config.streaming.inferenceTimeoutMs,
    });
  }
  return instance;
}

export type { InferenceAdapter, TranscribeOptions } from './types';
export { WhisperCppSTTService, extractTranscriptFromWhisperStdout } from './WhisperCppSTTService';
