import client from 'prom-client';
import type { RequestOutcome, SessionResult } from './types.js';

export const register = new client.Registry();

const requestsCounter = new client.Counter({
  name: 'loadgen_requests_total',
  help: 'Page requests issued by simulated sessions, by endpoint template and status',
  labelNames: ['endpoint', 'status'] as const,
  registers: [register],
});

const latencySummary = new client.Summary({
  name: 'loadgen_request_latency_seconds',
  help: 'Page request latency measured client-side',
  labelNames: ['endpoint'] as const,
  percentiles: [0.5, 0.95],
  maxAgeSeconds: 300,
  ageBuckets: 5,
  registers: [register],
});

const sessionsCounter = new client.Counter({
  name: 'loadgen_sessions_total',
  help: 'Completed simulated sessions by profile',
  labelNames: ['profile', 'stopped'] as const,
  registers: [register],
});

const activeSessionsGauge = new client.Gauge({
  name: 'loadgen_active_sessions',
  help: 'Sessions currently running',
  registers: [register],
});

export function recordRequestMetrics(o: RequestOutcome): void {
  requestsCounter.inc({ endpoint: o.template, status: o.status });
  latencySummary.observe({ endpoint: o.template }, o.latencyMs / 1000);
}

export function recordSessionMetrics(r: SessionResult): void {
  sessionsCounter.inc({ profile: r.profile, stopped: r.stopped ? 'true' : 'false' });
}

export function setActiveSessions(n: number): void {
  activeSessionsGauge.set(n);
}
