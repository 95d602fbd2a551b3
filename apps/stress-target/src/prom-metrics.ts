import client from 'prom-client';
import type { JobInfo } from './types.js';

export const register = new client.Registry();

client.collectDefaultMetrics({ register });

const requestsCounter = new client.Counter({
  name: 'target_requests_total',
  help: 'Requests served by this instance, by endpoint label',
  labelNames: ['instance', 'endpoint'] as const,
  registers: [register],
});

const activeJobsGauge = new client.Gauge({
  name: 'target_saturation_jobs_active',
  help: 'Saturation jobs currently holding resources',
  labelNames: ['kind'] as const,
  registers: [register],
});

const jobsCounter = new client.Counter({
  name: 'target_saturation_jobs_total',
  help: 'Finished saturation jobs by kind and final status',
  labelNames: ['kind', 'status'] as const,
  registers: [register],
});

export function recordRequest(instanceId: string, endpoint: string): void {
  requestsCounter.inc({ instance: instanceId, endpoint });
}

export function recordJobStart(job: JobInfo): void {
  activeJobsGauge.inc({ kind: job.kind });
}

export function recordJobEnd(job: JobInfo): void {
  activeJobsGauge.dec({ kind: job.kind });
  jobsCounter.inc({ kind: job.kind, status: job.status });
}
