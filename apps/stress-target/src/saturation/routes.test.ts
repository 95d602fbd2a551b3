import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createTestTarget, type TestTarget } from '../test-app.js';
import type { Allocator } from './memory.js';
import { MB } from '../units.js';

let target: TestTarget;
let allocations: number[];

const recording: Allocator = (bytes) => {
  allocations.push(bytes);
  return Buffer.alloc(8, 1);
};

function setup(env: Record<string, string> = {}): TestTarget {
  allocations = [];
  target = createTestTarget(env, { allocate: recording });
  return target;
}

afterEach(async () => {
  await target.saturation.shutdown();
});

describe('saturation endpoints', () => {
  it('rejects invalid parameters before starting anything', async () => {
    const { app, saturation } = setup();
    const res = await request(app).get('/extreme/cpu?duration=abc&workers=99').expect(400);
    expect(res.body).toEqual({
      error: 'invalid_parameters',
      details: [
        { param: 'duration', message: 'duration must be a number' },
        { param: 'workers', message: 'workers must be at most 2' },
      ],
    });

    await request(app).get('/extreme/memory?mb=100000').expect(400);
    await request(app).get('/extreme/memory?mb=-1').expect(400);
    await request(app).get('/extreme/all?network_mb=9').expect(400);

    expect(saturation.activeJobs()).toEqual([]);
    expect(saturation.recentJobs()).toEqual([]);
    expect(allocations).toEqual([]);
  });

  it('acknowledges a memory job and releases it after the hold', async () => {
    const { app, saturation } = setup();
    const res = await request(app).get('/extreme/memory?mb=2&hold=1').expect(202);
    expect(res.body).toMatchObject({
      accepted: true,
      type: 'memory',
      job: { kind: 'memory', params: { mb: 2, hold: 1 } },
    });
    expect(res.body.job.deadline - res.body.job.startedAt).toBe(1000);
    expect(res.headers['x-server-id']).toBe('test-instance');

    await vi.waitFor(() => {
      expect(saturation.activeJobs()).toEqual([]);
    }, { timeout: 4000 });
    expect(allocations).toEqual([2 * MB]);
    expect(saturation.recentJobs()[0].status).toBe('completed');
  });

  it('runs a cpu job to its deadline', async () => {
    const { app, saturation } = setup();
    const res = await request(app).get('/extreme/cpu?duration=1&workers=1').expect(202);
    expect(res.body.job.params).toEqual({ duration: 1, workers: 1 });

    const jobs = await request(app).get('/extreme/jobs').expect(200);
    expect(jobs.body.active.map((j: { id: string }) => j.id)).toEqual([res.body.job.id]);

    await vi.waitFor(() => {
      expect(saturation.recentJobs()).toHaveLength(1);
    }, { timeout: 5000 });
    const [job] = saturation.recentJobs();
    expect(job.status).toBe('completed');
    expect(job.result?.iterations).toBeGreaterThan(0);
  });

  it('keeps network out of the combined job', async () => {
    const { app } = setup();
    const res = await request(app).get('/extreme/all?cpu_duration=1&memory_mb=1&network_mb=7').expect(202);
    expect(res.body.type).toBe('all');
    expect(res.body.network).toEqual({ requested_mb: 7, included: false });
    expect(res.body.job.params).toEqual({ cpu_duration: 1, memory_mb: 1, workers: 1 });
  });

  it('acknowledges cpu-mem with a small body', async () => {
    const { app } = setup();
    const res = await request(app).get('/extreme/cpu-mem?cpu_duration=1&memory_mb=1').expect(202);
    expect(res.body.type).toBe('cpu-mem');
    expect(JSON.stringify(res.body).length).toBeLessThan(400);
  });

  it('streams the network payload followed by a summary', async () => {
    const { app, saturation } = setup();
    const res = await request(app).get('/extreme/network?mb=1&chunk_kb=64').responseType('blob').expect(200);
    const body: Buffer = res.body;

    expect(res.headers['content-type']).toBe('application/octet-stream');
    expect(body[0]).toBe(0x58);
    expect(body[MB - 1]).toBe(0x58);
    expect(body.subarray(MB).toString()).toBe(`\n${JSON.stringify({
      message: 'stress execution complete',
      stats: { network: { target_megabytes: 1, total_bytes: MB, chunk_bytes: 65536 } },
    })}`);

    await vi.waitFor(() => {
      expect(saturation.recentJobs().map((j) => j.kind)).toEqual(['network']);
    });
  });

  it('streams only the summary for a zero-size payload', async () => {
    const { app } = setup();
    const res = await request(app).get('/extreme/network?mb=0').responseType('blob').expect(200);
    const body: Buffer = res.body;
    expect(JSON.parse(body.toString())).toEqual({
      message: 'stress execution complete',
      stats: { network: { target_megabytes: 0, total_bytes: 0, chunk_bytes: 262144 } },
    });
  });

  it('streams network alongside cpu and memory for all-network', async () => {
    const { app } = setup();
    const res = await request(app)
      .get('/extreme/all-network?cpu_duration=1&memory_mb=1&network_mb=1')
      .responseType('blob')
      .expect(200);
    const body: Buffer = res.body;
    const jobId = res.headers['x-saturation-job'];

    expect(typeof jobId).toBe('string');
    expect(body.length).toBeGreaterThan(MB);
    expect(JSON.parse(body.subarray(MB + 1).toString())).toEqual({
      message: 'stress execution complete',
      stats: { job: jobId, network: { target_megabytes: 1, total_bytes: MB, chunk_bytes: 262144 } },
    });
  });

  it('cancels running jobs on shutdown', async () => {
    const { app, saturation } = setup();
    await request(app).get('/extreme/cpu?duration=10&workers=1').expect(202);
    await request(app).get('/extreme/memory?mb=1&hold=10').expect(202);

    await saturation.shutdown();

    expect(saturation.activeJobs()).toEqual([]);
    expect(saturation.recentJobs().map((j) => j.status).sort()).toEqual(['cancelled', 'cancelled']);
  });
});
