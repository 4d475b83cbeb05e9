import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      env: 'development',
      corsOrigin: '*',
      maxUploadBytes: 30 * 1024 * 1024,
      sessionTtlSeconds: 0,
      listLimit: 20,
      matchThreshold: 0.6,
      rateLimit: { windowMs: 900000, requests: 100 },
    });
  });

  it('coerces values from the environment', () => {
    const config = loadConfig({ PORT: '3000', MAX_UPLOAD_MB: '1', MATCH_THRESHOLD: '0.75', NODE_ENV: 'production' });
    expect(config.port).toBe(3000);
    expect(config.maxUploadBytes).toBe(1048576);
    expect(config.matchThreshold).toBe(0.75);
    expect(config.env).toBe('production');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT/);
    expect(() => loadConfig({ MATCH_THRESHOLD: '2' })).toThrow(/MATCH_THRESHOLD/);
  });
});
