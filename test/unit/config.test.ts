import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/index.js';
import { SessionSchema } from '../../src/config/schema.js';

describe('loadConfig', () => {
  it('applies defaults around the required credentials', () => {
    const config = loadConfig({ SMPP_SYSTEM_ID: 'esme', SMPP_PASSWORD: 'test-pw' });

    expect(config.session).toEqual({
      endpoint: { host: '127.0.0.1', port: 2775, tls: false },
      enquireLinkIntervalMs: 30_000,
      connectTimeoutMs: 3000,
      requestTimeoutMs: 0,
    });
    expect(config.bind).toEqual({ systemId: 'esme', password: 'test-pw', mode: 'transceiver' });
    expect(config.health).toEqual({ port: 8080, bindAddress: '127.0.0.1' });
    expect(config.logLevel).toBe('info');
  });

  it('reads the session settings from the environment', () => {
    const config = loadConfig({
      SMPP_HOST: 'smsc.internal',
      SMPP_PORT: '3550',
      SMPP_TLS: 'true',
      SMPP_SYSTEM_ID: 'esme',
      SMPP_PASSWORD: 'test-pw',
      SMPP_SYSTEM_TYPE: 'VMA',
      SMPP_BIND_MODE: 'receiver',
      ENQUIRE_LINK_INTERVAL_S: '0',
      SMPP_REQUEST_TIMEOUT_MS: '10000',
    });

    expect(config.session.endpoint).toEqual({ host: 'smsc.internal', port: 3550, tls: true });
    expect(config.session.enquireLinkIntervalMs).toBe(0);
    expect(config.session.requestTimeoutMs).toBe(10_000);
    expect(config.bind.mode).toBe('receiver');
    expect(config.bind.systemType).toBe('VMA');
  });

  it('rejects a missing password', () => {
    expect(() => loadConfig({ SMPP_SYSTEM_ID: 'esme' })).toThrow();
  });

  it('rejects an unknown bind mode', () => {
    expect(() => loadConfig({ SMPP_SYSTEM_ID: 'esme', SMPP_PASSWORD: 'test-pw', SMPP_BIND_MODE: 'both' })).toThrow();
  });

  it('rejects a system id longer than 16 characters', () => {
    expect(() => loadConfig({ SMPP_SYSTEM_ID: 'a'.repeat(17), SMPP_PASSWORD: 'test-pw' })).toThrow();
  });
});

describe('SessionSchema', () => {
  it('fills every session default', () => {
    expect(SessionSchema.parse({})).toEqual({
      endpoint: { host: '127.0.0.1', port: 2775, tls: false },
      enquireLinkIntervalMs: 30_000,
      connectTimeoutMs: 3000,
      requestTimeoutMs: 0,
    });
  });
});
