import { Router } from 'express';
import { asyncHandler } from './async-handler.js';
import { register } from './prom-metrics.js';
import type { EndpointStats, RequestTally } from './request-tally.js';
import type { SaturationController } from './saturation/controller.js';
import type { MetricsResponse, ProcessGauges } from './types.js';
import { MB } from './units.js';

export interface MonitoringDeps {
  instanceId: string;
  tally: RequestTally;
  endpointStats: EndpointStats;
  saturation: SaturationController;
}

const toMb = (bytes: number): number => Math.round((bytes / MB) * 100) / 100;

export function processGauges(): ProcessGauges {
  const mem = process.memoryUsage();
  const cpu = process.cpuUsage();
  return {
    rssMb: toMb(mem.rss),
    heapUsedMb: toMb(mem.heapUsed),
    heapTotalMb: toMb(mem.heapTotal),
    externalMb: toMb(mem.external),
    arrayBuffersMb: toMb(mem.arrayBuffers),
    cpuUserMicros: cpu.user,
    cpuSystemMicros: cpu.system,
    uptimeSec: Math.round(process.uptime()),
  };
}

/** Probe and scrape endpoints. None of these count toward the tally. */
export function createMonitoringRouter(deps: MonitoringDeps): Router {
  const { instanceId, tally, endpointStats, saturation } = deps;
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', server_id: instanceId });
  });

  router.get('/ready', (_req, res) => {
    res.json({ status: 'ready', server_id: instanceId });
  });

  router.get('/metrics', (_req, res) => {
    const active = saturation.activeJobs();
    const body: MetricsResponse = {
      server_id: instanceId,
      total_requests: tally.total(),
      tally: tally.snapshot(),
      requests_by_endpoint: endpointStats.toJSON(),
      process: processGauges(),
      saturation: { active: active.length, byKind: saturation.countsByKind() },
      timestamp: new Date().toISOString(),
    };
    res.json(body);
  });

  router.get('/request-stats', (_req, res) => {
    res.json({
      server_id: instanceId,
      total_requests: tally.total(),
      requests_by_endpoint: endpointStats.toJSON(),
    });
  });

  router.get('/metrics/prometheus', asyncHandler(async (_req, res) => {
    res.set('Content-Type', register.contentType);
    res.end(await register.metrics());
  }));

  return router;
}
