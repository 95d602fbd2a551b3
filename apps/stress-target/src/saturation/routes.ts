import { Router, type Request, type Response } from 'express';
import type { z } from 'zod';
import { asyncHandler } from '../async-handler.js';
import { setEndpoint, stampResponseTime } from '../fairness-recorder.js';
import type { JobInfo, NetworkParams } from '../types.js';
import type { SaturationController } from './controller.js';
import { KB, MB } from '../units.js';
import { describeIssues, type SaturationSchemas } from './params.js';

/**
 * Parses the query with `schema`, or answers 400 and returns null. Nothing is
 * allocated before this passes.
 */
function parseQuery<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.output<S> | null {
  const parsed = schema.safeParse(req.query);
  if (!parsed.success) {
    stampResponseTime(res);
    res.status(400).json({ error: 'invalid_parameters', details: describeIssues(parsed.error) });
    return null;
  }
  return parsed.data;
}

function ack(res: Response, job: JobInfo, extra: Record<string, unknown> = {}): void {
  stampResponseTime(res);
  res.status(202).json({
    accepted: true,
    type: job.kind,
    job: { id: job.id, kind: job.kind, params: job.params, startedAt: job.startedAt, deadline: job.deadline },
    ...extra,
  });
}

function networkStats(params: NetworkParams): Record<string, number> {
  return { target_megabytes: params.mb, total_bytes: params.mb * MB, chunk_bytes: params.chunkKb * KB };
}

async function stream(
  saturation: SaturationController,
  res: Response,
  params: NetworkParams,
  summary: Record<string, unknown>,
): Promise<void> {
  stampResponseTime(res);
  res.setHeader('Content-Type', 'application/octet-stream');
  const trailer = JSON.stringify({ message: 'stress execution complete', stats: summary });
  const { job, done } = saturation.streamNetwork(params, res, trailer);
  console.log(`[saturation] Streaming ${params.mb} MB as job ${job.id}`);
  await done;
}

/**
 * Resource saturation endpoints. CPU and memory variants acknowledge with 202
 * and run in the background; the network variants stream their payload as
 * the response body.
 */
export function createSaturationRouter(saturation: SaturationController, schemas: SaturationSchemas): Router {
  const router = Router();

  router.use((_req, res, next) => {
    setEndpoint(res, 'extreme');
    next();
  });

  router.get('/cpu', (req, res) => {
    const q = parseQuery(schemas.cpu, req, res);
    if (!q) return;
    ack(res, saturation.startCpu({ durationSec: q.duration, workers: q.workers }));
  });

  router.get('/memory', (req, res) => {
    const q = parseQuery(schemas.memory, req, res);
    if (!q) return;
    ack(res, saturation.startMemory({ mb: q.mb, holdSec: q.hold }));
  });

  router.get('/network', asyncHandler(async (req, res) => {
    const q = parseQuery(schemas.network, req, res);
    if (!q) return;
    const params: NetworkParams = { mb: q.mb, chunkKb: q.chunk_kb };
    await stream(saturation, res, params, { network: networkStats(params) });
  }));

  router.get('/cpu-mem', (req, res) => {
    const q = parseQuery(schemas.cpuMem, req, res);
    if (!q) return;
    ack(res, saturation.startCombined('cpu-mem', { cpuDurationSec: q.cpu_duration, memoryMb: q.memory_mb }));
  });

  // Network stays out of the combined run; /all-network streams it.
  router.get('/all', (req, res) => {
    const q = parseQuery(schemas.all, req, res);
    if (!q) return;
    const job = saturation.startCombined('all', { cpuDurationSec: q.cpu_duration, memoryMb: q.memory_mb });
    ack(res, job, { network: { requested_mb: q.network_mb, included: false } });
  });

  router.get('/all-network', asyncHandler(async (req, res) => {
    const q = parseQuery(schemas.all, req, res);
    if (!q) return;
    const job = saturation.startCombined('all-network', { cpuDurationSec: q.cpu_duration, memoryMb: q.memory_mb });
    res.setHeader('X-Saturation-Job', job.id);
    const params: NetworkParams = { mb: q.network_mb, chunkKb: 256 };
    await stream(saturation, res, params, { job: job.id, network: networkStats(params) });
  }));

  router.get('/jobs', (_req, res) => {
    stampResponseTime(res);
    res.json({ active: saturation.activeJobs(), recent: saturation.recentJobs() });
  });

  return router;
}
