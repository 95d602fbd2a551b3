import { randomUUID } from 'node:crypto';
import { Router, type Request, type Response } from 'express';
import { asyncHandler } from './async-handler.js';
import { setEndpoint, stampResponseTime } from './fairness-recorder.js';
import { streamPayload } from './saturation/network.js';
import { KB, MB } from './units.js';
import type { SimulatedWork } from './simulated-work.js';

const MEDIA_CHUNK_BYTES = 256 * KB;

function randInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function send(res: Response, endpoint: string, body: unknown): void {
  setEndpoint(res, endpoint);
  stampResponseTime(res);
  res.json(body);
}

/**
 * Ordinary pages with realistic per-request cost: a simulated DB wait, some
 * CPU and occasionally a short-lived buffer.
 */
export function createContentRouter(work: SimulatedWork, instanceId: string, maxMediaMb: number): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req, res) => {
    const dbMs = await work.dbQuery('simple');
    const cpuMs = work.cpu('light');
    send(res, 'homepage', {
      page: 'homepage',
      message: 'Welcome',
      server_id: instanceId,
      processing: { db_query_ms: round2(dbMs), cpu_work_ms: round2(cpuMs) },
    });
  }));

  router.get('/api/data', asyncHandler(async (_req, res) => {
    const dbMs = await work.dbQuery('medium');
    const cpuMs = work.cpu('medium');
    const items = Array.from({ length: 50 }, (_, id) => ({
      id,
      value: randInt(100, 999),
      status: Math.random() < 0.5 ? 'active' : 'pending',
    }));
    send(res, 'api_data', {
      endpoint: 'api_data',
      items,
      count: items.length,
      processing: { db_query_ms: round2(dbMs), cpu_work_ms: round2(cpuMs) },
    });
  }));

  router.get('/dashboard', asyncHandler(async (_req, res) => {
    const dbMs = (await work.dbQuery('complex')) + (await work.dbQuery('medium')) + (await work.dbQuery('simple'));
    const cpuMs = work.cpu('heavy');
    const memMs = await work.memory(20, 100);
    send(res, 'dashboard', {
      page: 'dashboard',
      metrics: {
        users_online: randInt(100, 500),
        requests_per_sec: randInt(50, 200),
        error_rate: round2(0.1 + Math.random() * 1.9),
        avg_response_ms: randInt(100, 500),
      },
      charts: [
        { type: 'line', data: Array.from({ length: 24 }, () => randInt(10, 100)) },
        { type: 'bar', data: Array.from({ length: 12 }, () => randInt(50, 200)) },
        { type: 'pie', data: { success: 95, error: 5 } },
      ],
      processing: { db_queries_ms: round2(dbMs), cpu_work_ms: round2(cpuMs), memory_work_ms: round2(memMs) },
    });
  }));

  router.get('/search', asyncHandler(async (req, res) => {
    const q = typeof req.query.q === 'string' && req.query.q.length > 0 ? req.query.q : 'default';
    const complexity = q.length < 5 ? 'simple' : q.length < 15 ? 'medium' : 'complex';
    const dbMs = await work.dbQuery(complexity);
    const cpuMs = work.cpu('medium');
    const results = Array.from({ length: randInt(5, 20) }, (_, id) => ({
      id,
      title: `Result ${id} for '${q}'`,
      relevance: round2(0.5 + Math.random() * 0.5),
      snippet: `This is a search result snippet for query: ${q}...`,
    }));
    send(res, 'search', {
      query: q,
      results,
      count: results.length,
      processing: { db_query_ms: round2(dbMs), cpu_work_ms: round2(cpuMs), complexity },
    });
  }));

  router.get('/product/:id', asyncHandler(async (req, res) => {
    const dbMs = await work.dbQuery('medium');
    const cpuMs = work.cpu('medium');
    const id = req.params.id;
    send(res, 'product', {
      product: {
        id,
        name: `Product ${id}`,
        price: round2(10 + Math.random() * 990),
        description: 'Lorem ipsum dolor sit amet '.repeat(20),
        stock: randInt(0, 100),
        rating: Math.round((3 + Math.random() * 2) * 10) / 10,
        reviews: randInt(0, 500),
      },
      recommendations: Array.from({ length: 6 }, (_, i) => `prod_${i}`),
      processing: { db_query_ms: round2(dbMs), cpu_work_ms: round2(cpuMs) },
    });
  }));

  router.get('/media/:id', asyncHandler(async (req, res) => {
    const requested = Number(req.query.size_mb ?? 2);
    const sizeMb = Number.isInteger(requested) && requested >= 0 ? Math.min(requested, maxMediaMb) : 2;
    await work.dbQuery('simple');
    setEndpoint(res, 'media');
    stampResponseTime(res);
    res.setHeader('Content-Type', 'application/octet-stream');
    res.setHeader('Content-Disposition', `attachment; filename=media_${req.params.id.replace(/[^\w.-]/g, '_')}.bin`);
    res.setHeader('X-Media-Size-MB', String(sizeMb));
    try {
      await streamPayload(res, sizeMb * MB, MEDIA_CHUNK_BYTES);
    } catch (err) {
      // client went away mid-download
      console.log(`[content] media stream ended early: ${err instanceof Error ? err.message : err}`);
    }
  }));

  const checkout = asyncHandler(async (_req: Request, res: Response) => {
    const db1 = await work.dbQuery('medium');
    const cpu1 = work.cpu('heavy');
    const memMs = await work.memory(30, 150);
    const db2 = await work.dbQuery('complex');
    const cpu2 = work.cpu('medium');
    send(res, 'checkout', {
      checkout: 'success',
      transaction: {
        transaction_id: randomUUID(),
        amount: round2(10 + Math.random() * 490),
        status: 'completed',
        timestamp: new Date().toISOString(),
      },
      processing: {
        total_db_ms: round2(db1 + db2),
        total_cpu_ms: round2(cpu1 + cpu2),
        memory_work_ms: round2(memMs),
      },
    });
  });
  router.get('/checkout', checkout);
  router.post('/checkout', checkout);

  return router;
}
