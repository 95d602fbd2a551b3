import express, { type Express } from 'express';
import { createServer, type Server } from 'node:http';
import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import { createAgentRunner, type AgentOptions } from './agent.js';
import type { AppConfig } from './config.js';
import { listProfiles } from './profiles.js';
import { register } from './prom-metrics.js';
import type { AgentRunner } from './runner.js';
import { isScenarioName, ScenarioController, SCENARIOS } from './scenarios.js';
import { writeSummaryLog } from './summary-log.js';
import type { AgentStatus, RunConfig, RunSummary, WSMessage } from './types.js';

const startBodySchema = z.object({
  profile: z.union([z.string().min(1), z.record(z.string(), z.number().nonnegative())]).optional(),
  concurrency: z.number().int().positive().optional(),
  durationSec: z.number().positive().optional(),
  scenario: z.string().refine(isScenarioName, { message: 'Unknown scenario' }).optional(),
});

export interface ControlServer {
  app: Express;
  server: Server;
  runner: AgentRunner;
  close(): Promise<void>;
}

/**
 * REST + WebSocket control surface so a central controller can start, stop
 * and poll this agent instead of tailing its log.
 */
export function createControlServer(config: AppConfig, options: AgentOptions = {}): ControlServer {
  const app = express();
  app.use(express.json());

  const server = createServer(app);
  const wss = new WebSocketServer({ server, path: '/ws' });

  const runner = createAgentRunner(config, {
    ...options,
    onSessionComplete: (r) => {
      options.onSessionComplete?.(r);
      broadcast({ type: 'session_complete', data: r });
    },
  });
  const scenarios = new ScenarioController(runner, (scenario, phase, phaseIndex, totalPhases) => {
    broadcast({ type: 'scenario_phase', data: { scenario, phase: phase.label, phaseIndex, totalPhases } });
  });
  const targetUrl = options.targetUrl ?? config.targetUrl;
  const startTime = Date.now();

  // -------------------------------------------------------------------------
  // WebSocket broadcast
  // -------------------------------------------------------------------------

  function broadcast(msg: WSMessage): void {
    const data = JSON.stringify(msg);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  }

  wss.on('connection', (ws) => {
    const stateMsg: WSMessage = {
      type: 'state_change',
      data: { running: runner.running, config: runner.currentConfig ?? undefined },
    };
    ws.send(JSON.stringify(stateMsg));
  });

  let summaryTimer: ReturnType<typeof setInterval> | null = null;

  function startSummaryBroadcast(): void {
    if (summaryTimer) return;
    summaryTimer = setInterval(() => {
      const summary = runner.summary();
      if (summary) broadcast({ type: 'summary', data: summary });
    }, 1000);
  }

  function stopSummaryBroadcast(): void {
    if (summaryTimer) {
      clearInterval(summaryTimer);
      summaryTimer = null;
    }
  }

  async function onRunFinished(summary: RunSummary): Promise<void> {
    stopSummaryBroadcast();
    broadcast({ type: 'summary', data: summary });
    broadcast({ type: 'state_change', data: { running: false } });
    try {
      await writeSummaryLog(config.summaryLogPath, config.agentId, summary);
    } catch (err) {
      console.error(`[control] Failed to write summary log: ${err instanceof Error ? err.message : err}`);
    }
  }

  // -------------------------------------------------------------------------
  // REST API
  // -------------------------------------------------------------------------

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/status', (_req, res) => {
    const status: AgentStatus = {
      running: runner.running,
      config: runner.currentConfig,
      targetUrl,
      uptimeMs: Date.now() - startTime,
      activeSessions: runner.activeSessions,
      summary: runner.summary(),
    };
    res.json(status);
  });

  app.get('/api/profiles', (_req, res) => {
    res.json(listProfiles());
  });

  app.post('/api/run/start', (req, res) => {
    if (runner.running || scenarios.active) {
      res.status(409).json({ error: 'Already running. POST /api/run/stop first.' });
      return;
    }

    const parsed = startBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid_body', details: parsed.error.issues });
      return;
    }
    const body = parsed.data;
    const profile = body.profile ?? config.defaultProfile;

    let done: Promise<RunSummary>;
    let runConfig: RunConfig;
    if (body.scenario && isScenarioName(body.scenario)) {
      const phases = SCENARIOS[body.scenario];
      runConfig = { profile, concurrency: phases[0].users, durationSec: phases[0].durationSec };
      done = scenarios.run(body.scenario, phases, profile);
    } else {
      runConfig = {
        profile,
        concurrency: body.concurrency ?? config.defaultUsers,
        durationSec: body.durationSec ?? config.defaultDurationSec,
      };
      done = runner.runLoad(runConfig);
    }

    // runLoad validates synchronously, so a bad config has already rejected
    if (!runner.running) {
      done.then(
        () => res.status(500).json({ error: 'Run ended before it started' }),
        (err: unknown) => res.status(400).json({ error: err instanceof Error ? err.message : String(err) }),
      );
      return;
    }

    done.then(onRunFinished, (err: unknown) => {
      stopSummaryBroadcast();
      console.error('[control] Run failed:', err);
    });
    startSummaryBroadcast();
    broadcast({ type: 'state_change', data: { running: true, config: runConfig } });
    res.json({ status: 'started', config: runConfig, scenario: body.scenario ?? null });
  });

  app.post('/api/run/stop', (_req, res) => {
    if (!runner.running && !scenarios.active) {
      res.status(409).json({ error: 'Not running.' });
      return;
    }
    if (scenarios.active) {
      scenarios.stop();
    } else {
      runner.stop();
    }
    res.json({ status: 'stopping' });
  });

  app.get('/api/summary', (_req, res) => {
    const summary = runner.summary();
    if (!summary) {
      res.status(404).json({ error: 'No run yet' });
      return;
    }
    res.json(summary);
  });

  app.get('/metrics', async (_req, res) => {
    res.set('Content-Type', register.contentType);
    res.end(await register.metrics());
  });

  async function close(): Promise<void> {
    scenarios.stop();
    runner.stop();
    stopSummaryBroadcast();
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    if (server.listening) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  }

  return { app, server, runner, close };
}
