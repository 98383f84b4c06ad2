import { assertStreamingConfig, config } from '../../src/config';

describe('config', () => {
  const ENV_KEYS = [
    'STREAM_WINDOW_SECONDS',
    'SUPPORTED_SAMPLE_RATES',
    'RECONCILE_CASE_INSENSITIVE',
    'INFERENCE_TIMEOUT_MS',
  ] as const;
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) saved.set(key, process.env[key]);
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  test('reads streaming and reconcile settings from the environment', () => {
    process.env.STREAM_WINDOW_SECONDS = '3';
    process.env.SUPPORTED_SAMPLE_RATES = '16000, abc, 8000';
    process.env.RECONCILE_CASE_INSENSITIVE = 'false';
    process.env.INFERENCE_TIMEOUT_MS = 'not-a-number';

    jest.isolateModules(() => {
      const fresh: typeof import('../../src/config') = require('../../src/config');
      expect(fresh.config.streaming.windowSeconds).toBe(3);
      expect(fresh.config.audio.supportedSampleRates).toEqual([16000, 8000]);
      expect(fresh.config.reconcile.caseInsensitive).toBe(false);
      expect(fresh.config.streaming.inferenceTimeoutMs).toBe(120000);
    });
  });

  test('accepts the default streaming settings', () => {
    expect(() => assertStreamingConfig(config.streaming)).not.toThrow();
  });

  test('rejects an overlap that is not smaller than the window', () => {
    expect(() => assertStreamingConfig({ ...config.streaming, windowSeconds: 2, overlapSeconds: 2 })).toThrow(
      'Invalid streaming configuration: STREAM_OVERLAP_SECONDS must be smaller than STREAM_WINDOW_SECONDS.'
    );
  });

  test('rejects an empty event buffer', () => {
    expect(() => assertStreamingConfig({ ...config.streaming, maxBufferedEvents: 0 })).toThrow(
      'Invalid streaming configuration: SESSION_EVENT_BUFFER must be a positive integer.'
    );
  });

  test('rejects a non-positive window and timeout', () => {
    expect(() =>
      assertStreamingConfig({ ...config.streaming, windowSeconds: 0, overlapSeconds: 0, inferenceTimeoutMs: 0 })
    ).toThrow(
      'Invalid streaming configuration: STREAM_WINDOW_SECONDS must be greater than 0. ' +
        'STREAM_OVERLAP_SECONDS must be smaller than STREAM_WINDOW_SECONDS. ' +
        'INFERENCE_TIMEOUT_MS must be greater than 0.'
    );
  });
});
