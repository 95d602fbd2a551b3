import type { AppConfig } from './config.js';
import type { RequestSender } from './http-client.js';
import { recordRequestMetrics, recordSessionMetrics, setActiveSessions } from './prom-metrics.js';
import type { Rng } from './rng.js';
import { AgentRunner, type SessionCallback } from './runner.js';
import type { RequestOutcome, SessionResult } from './types.js';

export interface AgentOptions {
  targetUrl?: string;
  rng?: Rng;
  send?: RequestSender;
  /** Extra per-session listener, e.g. a WebSocket broadcast */
  onSessionComplete?: SessionCallback;
}

function logSession(r: SessionResult): void {
  const meanMs = r.latenciesMs.length > 0
    ? r.latenciesMs.reduce((a, b) => a + b, 0) / r.latenciesMs.length
    : 0;
  console.log(
    `[session] profile=${r.profile} requests=${r.requests} ok=${r.successes} err=${r.failures} ` +
    `avg=${meanMs.toFixed(0)}ms servers=${r.serversHit.join(',') || '-'} ` +
    `dur=${((r.endedAt - r.startedAt) / 1000).toFixed(1)}s${r.stopped ? ' stopped' : ''}`
  );
}

function logFailedRequest(o: RequestOutcome): void {
  if (o.status === 'error') {
    console.warn(`[session] ${o.path} failed: ${o.error?.slice(0, 100) ?? 'unknown error'}`);
  }
}

/** Runner wired to the agent's logging and Prometheus metrics. */
export function createAgentRunner(config: AppConfig, options: AgentOptions = {}): AgentRunner {
  return new AgentRunner({
    targetUrl: options.targetUrl ?? config.targetUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    rng: options.rng,
    send: options.send,
    onRequest: (o) => {
      recordRequestMetrics(o);
      logFailedRequest(o);
    },
    onSessionComplete: (r) => {
      recordSessionMetrics(r);
      logSession(r);
      options.onSessionComplete?.(r);
    },
    onActiveChange: setActiveSessions,
  });
}
