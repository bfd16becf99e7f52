import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config.js';
import { ValidationError } from '../lib/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ JWT_SECRET: 'test-secret-value-0001' });
    expect(config.env).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.databasePath).toBe('./data/workhub.db');
    expect(config.corsOrigin).toBe('http://localhost:5173');
    expect(config.logLevel).toBe('info');
    expect(config.jwt.issuer).toBeUndefined();
  });

  it('encodes the secret and coerces the port', () => {
    const config = loadConfig({
      JWT_SECRET: 'test-secret-value-0001',
      PORT: '8080',
      JWT_ISSUER: 'workhub',
    });
    expect(config.port).toBe(8080);
    expect(config.jwt.issuer).toBe('workhub');
    expect(new TextDecoder().decode(config.jwt.secret)).toBe('test-secret-value-0001');
  });

  it('names every invalid variable', () => {
    try {
      loadConfig({ JWT_SECRET: 'short', PORT: '0' });
      expect.unreachable('loadConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.message).toBe('Invalid environment configuration: PORT, JWT_SECRET');
      }
    }
  });

  it('defaults to a silent log under test and rejects unknown levels', () => {
    expect(loadConfig({ JWT_SECRET: 'test-secret-value-0001', NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ JWT_SECRET: 'test-secret-value-0001', LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
    expect(() => loadConfig({ JWT_SECRET: 'test-secret-value-0001', LOG_LEVEL: 'loud' })).toThrow(
      'Invalid environment configuration: LOG_LEVEL'
    );
  });

  it('requires a secret', () => {
    expect(() => loadConfig({})).toThrow(ValidationError);
  });
});
