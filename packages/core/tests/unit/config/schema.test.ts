import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('validateConfig', () => {
  it('fills every default from an empty object', () => {
    expect(validateConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('accepts a full configuration', () => {
    const config = validateConfig({
      stepfile: 'ci/stepyard.yml',
      cacheDir: '/tmp/stepyard',
      jobs: 8,
      failFast: true,
      killGraceMs: 100,
      logLevel: 'debug',
      passenv: ['CI', 'NODE_AUTH_TOKEN'],
      installer: { command: ['npm', 'install'] },
    });
    expect(config.jobs).toBe(8);
    expect(config.passenv).toEqual(['CI', 'NODE_AUTH_TOKEN']);
  });

  it('names the first invalid field', () => {
    try {
      validateConfig({ installer: { command: [] } });
      expect.unreachable('validateConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.field).toBe('installer.command');
    }
  });

  it('rejects fractional job counts', () => {
    expect(() => validateConfig({ jobs: 1.5 })).toThrow(/^Invalid configuration: jobs: /);
  });

  it('rejects unknown log levels', () => {
    expect(() => validateConfig({ logLevel: 'trace' })).toThrow(ConfigError);
  });
});
