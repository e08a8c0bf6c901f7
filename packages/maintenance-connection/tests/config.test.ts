/**
 * Config Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, validateConfig } from '../src/utils/config.js';

describe('loadConfigFromEnv', () => {
  it('reads server and credentials', () => {
    const config = loadConfigFromEnv({
      MC_SERVER: 'mc.test.local',
      MC_USER: 'test-user',
      MC_PASSWORD: 'test-secret',
    });

    expect(config).toEqual({ server: 'mc.test.local', user: 'test-user', password: 'test-secret' });
  });

  it('reads a positive timeout', () => {
    expect(loadConfigFromEnv({ MC_TIMEOUT_MS: '15000' }).timeout).toBe(15000);
  });

  it('ignores a missing or invalid timeout', () => {
    expect(loadConfigFromEnv({})).not.toHaveProperty('timeout');
    expect(loadConfigFromEnv({ MC_TIMEOUT_MS: 'soon' })).not.toHaveProperty('timeout');
    expect(loadConfigFromEnv({ MC_TIMEOUT_MS: '0' })).not.toHaveProperty('timeout');
  });

  it('defaults missing values to empty strings', () => {
    expect(loadConfigFromEnv({})).toEqual({ server: '', user: '', password: '' });
  });
});

describe('validateConfig', () => {
  it('accepts a complete config', () => {
    expect(validateConfig({ server: 'mc.test.local:8080', user: 'test-user', password: 'test-secret' }))
      .toEqual({ valid: true, errors: [] });
  });

  it('lists every missing field', () => {
    expect(validateConfig({ server: '', user: '', password: '' })).toEqual({
      valid: false,
      errors: ['Missing server', 'Missing user', 'Missing password'],
    });
  });

  it('rejects a server with a scheme or path', () => {
    const result = validateConfig({ server: 'http://mc.test.local', user: 'test-user', password: 'test-secret' });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['server must be a bare host, without scheme or path']);
    expect(validateConfig({ server: 'mc.test.local/v8', user: 'u', password: 'p' }).valid).toBe(false);
  });

  it('rejects a non-positive timeout', () => {
    expect(validateConfig({ server: 'mc.test.local', user: 'u', password: 'p', timeout: -1 }).errors)
      .toEqual(['timeout must be a positive number, got -1']);
  });
});
