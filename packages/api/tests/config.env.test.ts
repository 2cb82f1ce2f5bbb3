import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '@spatial-audio/contracts';

import { loadConfig } from '../src/config/env.js';

describe('config/env', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.HTTP_PORT;
    delete process.env.HTTP_HOST;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('defaults the port and host and embeds the pipeline config', () => {
    process.env.NODE_ENV = 'test';
    process.env.DATA_DIR = '/tmp/spatial-data';

    const config = loadConfig();

    expect(config.nodeEnv).toBe('test');
    expect(config.httpPort).toBe(8080);
    expect(config.httpHost).toBe('0.0.0.0');
    expect(config.pipeline.dataDir).toBe('/tmp/spatial-data');
  });

  it('falls back to development for unknown NODE_ENV values', () => {
    process.env.NODE_ENV = 'staging';

    expect(loadConfig().nodeEnv).toBe('development');
  });

  it('rejects ports outside the valid range', () => {
    process.env.HTTP_PORT = '70000';

    expect(() => loadConfig()).toThrow(ConfigurationError);
    expect(() => loadConfig()).toThrow('HTTP_PORT must be between 1 and 65535, got 70000');
  });
});
