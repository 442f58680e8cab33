import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('../../src/monitoring/logger.js', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: { ...log, child: vi.fn(() => log) }, maskAddress: (a: string) => a };
});

import { readiness, setSessionState } from '../../src/monitoring/health.js';

describe('readiness', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('is not ready before the session binds', () => {
    const { status, body } = readiness();
    expect(status).toBe(503);
    expect(body.ready).toBe(false);
    expect(body.state).toBe('connecting');
  });

  it('is ready while bound and reports when the state was entered', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    setSessionState('bound');

    vi.setSystemTime(new Date('2026-01-01T00:05:00Z'));
    setSessionState('bound');

    expect(readiness()).toEqual({
      status: 200,
      body: { ready: true, state: 'bound', since: '2026-01-01T00:00:00.000Z' },
    });
  });

  it('is not ready once the session terminates', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T01:00:00Z'));
    setSessionState('terminated');

    expect(readiness()).toEqual({
      status: 503,
      body: { ready: false, state: 'terminated', since: '2026-01-01T01:00:00.000Z' },
    });
  });
});
