import { describe, expect, it, vi } from 'vitest';
import type { PageRequest, RequestSender } from './http-client.js';
import { compileProfile } from './profiles.js';
import { seededRng } from './rng.js';
import { runSession } from './session.js';
import type { RequestOutcome, SessionProfile } from './types.js';

function profile(overrides: Partial<SessionProfile> = {}): SessionProfile {
  return {
    key: 'fixed',
    name: 'Fixed',
    sessionDurationSec: [60, 60],
    pagesPerSession: [5, 5],
    thinkTimeSec: [0, 0],
    endpoints: [['/', 1]],
    ...overrides,
  };
}

function okSender(serverId = 'replica-a'): RequestSender & { calls: PageRequest[] } {
  const calls: PageRequest[] = [];
  const send = async (req: PageRequest): Promise<RequestOutcome> => {
    calls.push(req);
    return { template: req.template, path: req.path, status: 'ok', httpStatus: 200, latencyMs: 4, serverId };
  };
  return Object.assign(send, { calls });
}

describe('runSession', () => {
  it('issues exactly the page budget when time allows', async () => {
    const send = okSender();
    const result = await runSession(compileProfile(profile()), 'http://target', seededRng(1), { send });

    expect(send.calls).toHaveLength(5);
    expect(send.calls.every((c) => c.path === '/')).toBe(true);
    expect(result.requests).toBe(5);
    expect(result.successes).toBe(5);
    expect(result.failures).toBe(0);
    expect(result.endpointHits).toEqual({ '/': 5 });
    expect(result.statusCounts).toEqual({ '200': 5 });
    expect(result.serversHit).toEqual(['replica-a']);
    expect(result.stopped).toBe(false);
  });

  it('returns immediately with a zero page budget', async () => {
    const send = okSender();
    const result = await runSession(compileProfile(profile({ pagesPerSession: [0, 0] })), 'http://target', seededRng(1), { send });
    expect(send.calls).toHaveLength(0);
    expect(result.requests).toBe(0);
  });

  it('counts failures and keeps going', async () => {
    let n = 0;
    const send: RequestSender = async (req) => {
      n++;
      return n % 2 === 0
        ? { template: req.template, path: req.path, status: 'error', httpStatus: 503, latencyMs: 1, serverId: 'r1', error: 'HTTP 503' }
        : { template: req.template, path: req.path, status: 'error', httpStatus: null, latencyMs: 1, serverId: null, error: 'ECONNREFUSED' };
    };
    const result = await runSession(compileProfile(profile({ pagesPerSession: [4, 4] })), 'http://target', seededRng(1), { send });
    expect(result.requests).toBe(4);
    expect(result.failures).toBe(4);
    expect(result.statusCounts).toEqual({ '503': 2, error: 2 });
    expect(result.serversHit).toEqual(['r1']);
  });

  it('never exceeds the page budget across random draws', async () => {
    const p = profile({ pagesPerSession: [1, 6] });
    const rng = seededRng(11);
    for (let i = 0; i < 25; i++) {
      const result = await runSession(compileProfile(p), 'http://target', rng, { send: okSender() });
      expect(result.requests).toBeGreaterThanOrEqual(1);
      expect(result.requests).toBeLessThanOrEqual(6);
    }
  });

  it('stops during think time when the stop signal fires', async () => {
    const stop = new AbortController();
    const send = okSender();
    const onRequest = vi.fn(() => stop.abort());
    const started = Date.now();
    const result = await runSession(
      compileProfile(profile({ thinkTimeSec: [30, 30] })),
      'http://target',
      seededRng(1),
      { send, signal: stop.signal, onRequest },
    );
    expect(Date.now() - started).toBeLessThan(2000);
    expect(result.requests).toBe(1);
    expect(result.stopped).toBe(true);
    expect(onRequest).toHaveBeenCalledTimes(1);
  });

  it('ends after the in-flight request on drain without marking stopped', async () => {
    const drain = new AbortController();
    const send: RequestSender = async (req) => {
      drain.abort();
      return { template: req.template, path: req.path, status: 'ok', httpStatus: 200, latencyMs: 2, serverId: 'r2' };
    };
    const result = await runSession(compileProfile(profile()), 'http://target', seededRng(1), {
      send,
      drainSignal: drain.signal,
    });
    expect(result.requests).toBe(1);
    expect(result.successes).toBe(1);
    expect(result.stopped).toBe(false);
  });

  it('does not record a request cut off by the stop signal', async () => {
    const stop = new AbortController();
    const send: RequestSender = async (req) => {
      stop.abort();
      return { template: req.template, path: req.path, status: 'error', httpStatus: null, latencyMs: 0, serverId: null, error: 'Stopped' };
    };
    const result = await runSession(compileProfile(profile()), 'http://target', seededRng(1), { send, signal: stop.signal });
    expect(result.requests).toBe(0);
    expect(result.failures).toBe(0);
    expect(result.stopped).toBe(true);
  });

  it('caps the session at its time budget', async () => {
    const send = okSender();
    const started = Date.now();
    const result = await runSession(
      compileProfile(profile({ sessionDurationSec: [0.2, 0.2], pagesPerSession: [100, 100], thinkTimeSec: [0.05, 0.05] })),
      'http://target',
      seededRng(1),
      { send },
    );
    expect(Date.now() - started).toBeLessThan(1500);
    expect(result.requests).toBeGreaterThan(1);
    expect(result.requests).toBeLessThan(100);
  });
});
