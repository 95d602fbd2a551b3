import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebSocket } from 'ws';
import { loadConfig, type AppConfig } from './config.js';
import { createControlServer, type ControlServer } from './control-server.js';
import type { RequestSender } from './http-client.js';
import { seededRng } from './rng.js';

const instantOk: RequestSender = async (req) => ({
  template: req.template,
  path: req.path,
  status: 'ok',
  httpStatus: 200,
  latencyMs: 2,
  serverId: 'replica-a',
});

let dir: string;
let config: AppConfig;
let control: ControlServer;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'loadgen-control-'));
  config = loadConfig({
    SUMMARY_LOG: path.join(dir, 'traffic.log'),
    AGENT_ID: 'test-agent',
    TARGET_URL: 'http://target.test',
  });
  control = createControlServer(config, { send: instantOk, rng: seededRng(9) });
});

afterEach(async () => {
  await control.close();
  await rm(dir, { recursive: true, force: true });
});

describe('control server', () => {
  it('answers health and profile queries', async () => {
    await request(control.app).get('/healthz').expect(200, { status: 'ok' });
    const profiles = await request(control.app).get('/api/profiles').expect(200);
    expect(profiles.body).toHaveLength(5);
  });

  it('has no summary before the first run', async () => {
    await request(control.app).get('/api/summary').expect(404);
    const status = await request(control.app).get('/api/status').expect(200);
    expect(status.body).toMatchObject({ running: false, config: null, targetUrl: 'http://target.test', activeSessions: 0 });
  });

  it('rejects malformed start bodies', async () => {
    const res = await request(control.app).post('/api/run/start').send({ concurrency: 0 }).expect(400);
    expect(res.body.error).toBe('invalid_body');
    await request(control.app).post('/api/run/start').send({ scenario: 'weekend' }).expect(400);
  });

  it('rejects unknown profiles with 400', async () => {
    const res = await request(control.app)
      .post('/api/run/start')
      .send({ profile: 'nobody', concurrency: 1, durationSec: 5 })
      .expect(400);
    expect(res.body.error).toMatch(/Unknown profile "nobody"/);
    expect(control.runner.running).toBe(false);
  });

  it('starts, reports, stops and logs a run', async () => {
    const started = await request(control.app)
      .post('/api/run/start')
      .send({ profile: 'mobile_user', concurrency: 2, durationSec: 60 })
      .expect(200);
    expect(started.body).toEqual({
      status: 'started',
      config: { profile: 'mobile_user', concurrency: 2, durationSec: 60 },
      scenario: null,
    });

    await request(control.app).post('/api/run/start').send({}).expect(409);

    const status = await request(control.app).get('/api/status').expect(200);
    expect(status.body.running).toBe(true);
    expect(status.body.activeSessions).toBe(2);

    await request(control.app).post('/api/run/stop').expect(200, { status: 'stopping' });
    await vi.waitFor(() => {
      expect(control.runner.running).toBe(false);
    });

    const summary = await request(control.app).get('/api/summary').expect(200);
    expect(summary.body.stopped).toBe(true);
    expect(summary.body.sessionsCompleted).toBe(2);
    expect(summary.body.requests).toBe(2);

    await request(control.app).post('/api/run/stop').expect(409);

    await vi.waitFor(async () => {
      const log = await readFile(config.summaryLogPath, 'utf-8');
      expect(log).toContain('[summary] agent=test-agent');
      expect(log).toContain('Total Requests: 2');
    });
  });

  it('runs scenarios through the same endpoint', async () => {
    const res = await request(control.app)
      .post('/api/run/start')
      .send({ scenario: 'gradual-ramp', profile: 'mobile_user' })
      .expect(200);
    expect(res.body.scenario).toBe('gradual-ramp');
    expect(res.body.config).toEqual({ profile: 'mobile_user', concurrency: 20, durationSec: 30 });
    expect(control.runner.activeSessions).toBe(20);

    await request(control.app).post('/api/run/stop').expect(200);
    await vi.waitFor(() => {
      expect(control.runner.running).toBe(false);
    });
  });

  it('exposes Prometheus metrics', async () => {
    const res = await request(control.app).get('/metrics').expect(200);
    expect(res.text).toContain('loadgen_active_sessions');
  });

  it('greets WebSocket clients with the current state', async () => {
    await new Promise<void>((resolve) => control.server.listen(0, '127.0.0.1', resolve));
    const address = control.server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');

    const ws = new WebSocket(`ws://127.0.0.1:${address.port}/ws`);
    const first = await new Promise<unknown>((resolve, reject) => {
      ws.once('message', (data) => resolve(JSON.parse(data.toString())));
      ws.once('error', reject);
    });
    ws.close();
    expect(first).toEqual({ type: 'state_change', data: { running: false } });
  });
});
