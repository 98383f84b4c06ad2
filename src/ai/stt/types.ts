/**
 * Speech-to-Text abstraction. The streaming engine only knows this interface;
 * whisper.cpp is one implementation, tests plug in fakes.
 */
import type { AudioFormat, PcmFormat } from '../../types';

export interface TranscribeOptions {
  /** Aborted when the owning session is dropped or the window times out. */
  signal?: AbortSignal;
}

export interface InferenceAdapter {
  readonly name: string;
  /** Whether audio declared with this format can be decoded and transcribed. */
  supportsFormat(format: AudioFormat): boolean;
  /**
   * Transcribe one window of raw samples. Rejects with InferenceUnavailableError
   * when the engine cannot be reached, InferenceFailedError when it ran and failed.
   */
  transcribe(audio: Buffer, format: PcmFormat, options?: TranscribeOptions): Promise<string>;
}
