import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { loadAnalysisConfig } from '../config.js';

describe('loadAnalysisConfig', () => {
  it('applies defaults', () => {
    expect(loadAnalysisConfig({})).toEqual({
      rawLogPath: 's-bahn-munich-live-map.jsonl',
      port: 3002,
      tickIntervalMs: 20,
      frameBound: undefined,
      surface: { width: 1280, height: 720 },
      corsOrigin: '*',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadAnalysisConfig({
      RAW_LOG_PATH: '/data/feed.jsonl',
      PORT: '8080',
      REPLAY_TICK_MS: '40',
      REPLAY_FRAME_BOUND: '600',
      SURFACE_WIDTH: '800',
      SURFACE_HEIGHT: '600',
    });
    expect(config).toMatchObject({
      rawLogPath: '/data/feed.jsonl',
      port: 8080,
      tickIntervalMs: 40,
      frameBound: 600,
      surface: { width: 800, height: 600 },
    });
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadAnalysisConfig({ PORT: 'http' })).toThrow(ZodError);
  });
});
