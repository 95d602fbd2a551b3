#!/usr/bin/env node
import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { recordJobEnd, recordJobStart } from './prom-metrics.js';
import { EndpointStats, RequestTally } from './request-tally.js';
import { SaturationController } from './saturation/controller.js';
import { SimulatedWork } from './simulated-work.js';

function main(): void {
  const config = loadConfig();
  const tally = new RequestTally();
  const endpointStats = new EndpointStats();
  const saturation = new SaturationController(config, {
    onJobStart: recordJobStart,
    onJobEnd: recordJobEnd,
  });
  const work = new SimulatedWork(config.workScale);

  const app = createApp({ config, tally, endpointStats, saturation, work });
  const server = createServer(app);

  server.listen(config.port, () => {
    console.log(`[boot] Stress target ${config.instanceId} listening on :${config.port}`);
    console.log(
      `[boot] Limits: cpu ${config.maxCpuWorkers} workers x ${config.maxCpuDurationSec}s, `
      + `memory ${config.maxMemoryMb} MB, network ${config.maxNetworkMb} MB`,
    );
  });

  const shutdown = (signal: string): void => {
    console.log(`[boot] ${signal} received, releasing saturation jobs`);
    saturation.shutdown()
      .then(() => new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }))
      .then(
        () => {
          console.log(`[boot] Served ${tally.total()} requests`);
          process.exit(0);
        },
        (err: unknown) => {
          console.error('[boot] Shutdown error:', err);
          process.exit(1);
        },
      );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (err) {
  console.error('[boot] Fatal error:', err);
  process.exit(1);
}
