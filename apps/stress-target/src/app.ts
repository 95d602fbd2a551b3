import express, { type ErrorRequestHandler, type Express } from 'express';
import type { TargetConfig } from './config.js';
import { createContentRouter } from './content-routes.js';
import { fairnessRecorder } from './fairness-recorder.js';
import { createMonitoringRouter } from './monitoring-routes.js';
import { recordRequest } from './prom-metrics.js';
import type { EndpointStats, RequestTally } from './request-tally.js';
import type { SaturationController } from './saturation/controller.js';
import { saturationSchemas } from './saturation/params.js';
import { createSaturationRouter } from './saturation/routes.js';
import type { SimulatedWork } from './simulated-work.js';

export interface AppDeps {
  config: TargetConfig;
  tally: RequestTally;
  endpointStats: EndpointStats;
  saturation: SaturationController;
  work: SimulatedWork;
}

function statusOf(err: unknown): number {
  // body-parser and friends attach an HTTP status to client errors
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);
  if (status >= 500) console.error('[http] Unhandled error:', message);
  if (res.headersSent) {
    next(err);
    return;
  }
  res.status(status).json({ error: status >= 500 ? 'internal_error' : 'bad_request', message });
};

export function createApp(deps: AppDeps): Express {
  const { config, tally, endpointStats, saturation, work } = deps;
  const app = express();
  app.disable('x-powered-by');
  app.use(fairnessRecorder({
    tally,
    endpointStats,
    instanceId: config.instanceId,
    onRecord: (endpoint) => recordRequest(config.instanceId, endpoint),
  }));
  app.use(express.json());

  app.use(createMonitoringRouter({ instanceId: config.instanceId, tally, endpointStats, saturation }));
  app.use('/extreme', createSaturationRouter(saturation, saturationSchemas(config)));
  app.use(createContentRouter(work, config.instanceId, config.maxNetworkMb));

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });
  app.use(errorHandler);

  return app;
}
