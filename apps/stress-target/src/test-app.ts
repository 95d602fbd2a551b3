import type { Express } from 'express';
import { createApp } from './app.js';
import { loadConfig, type TargetConfig } from './config.js';
import { EndpointStats, RequestTally } from './request-tally.js';
import { SaturationController, type SaturationControllerOptions } from './saturation/controller.js';
import { SimulatedWork } from './simulated-work.js';

export interface TestTarget {
  app: Express;
  config: TargetConfig;
  tally: RequestTally;
  endpointStats: EndpointStats;
  saturation: SaturationController;
}

/** A target with no simulated request cost and small saturation ceilings. */
export function createTestTarget(
  env: Record<string, string> = {},
  saturationOptions: SaturationControllerOptions = {},
): TestTarget {
  const config = loadConfig({
    INSTANCE_ID: 'test-instance',
    WORK_SCALE: '0',
    MAX_CPU_WORKERS: '2',
    MAX_CPU_DURATION_SEC: '10',
    DEFAULT_CPU_WORKERS: '1',
    MAX_MEMORY_MB: '128',
    MAX_HOLD_SEC: '10',
    MAX_NETWORK_MB: '8',
    DEADLINE_GRACE_MS: '500',
    ...env,
  });
  const tally = new RequestTally();
  const endpointStats = new EndpointStats();
  const saturation = new SaturationController(config, saturationOptions);
  const app = createApp({ config, tally, endpointStats, saturation, work: new SimulatedWork(config.workScale) });
  return { app, config, tally, endpointStats, saturation };
}
