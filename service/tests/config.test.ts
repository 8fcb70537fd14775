/**
 * Tests for Service Configuration
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  const required = {
    METASERVER_URI: '/var/lib/fibermeta/catalog.db',
    METASERVER_STORE: '/data/warehouse',
  };

  it('should apply defaults', () => {
    expect(loadConfig(required)).toEqual({
      metaserverUri: '/var/lib/fibermeta/catalog.db',
      storageRoot: '/data/warehouse',
      port: 4100,
      host: '0.0.0.0',
      logLevel: 'info',
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      ...required,
      PORT: '8080',
      HOST: '127.0.0.1',
      LOG_LEVEL: 'debug',
    });
    expect(config.port).toBe(8080);
    expect(config.host).toBe('127.0.0.1');
    expect(config.logLevel).toBe('debug');
  });

  it('should list every missing variable', () => {
    try {
      loadConfig({});
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toHaveLength(2);
        expect(error.problems[0]).toMatch(/^METASERVER_URI /);
        expect(error.problems[1]).toMatch(/^METASERVER_STORE /);
      }
    }
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ ...required, PORT: '70000' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...required, PORT: 'http' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...required, LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});
