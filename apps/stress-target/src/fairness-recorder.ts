import { randomUUID } from 'node:crypto';
import type { RequestHandler, Response } from 'express';
import type { EndpointStats, RequestTally } from './request-tally.js';

export const SERVER_ID_HEADER = 'X-Server-ID';

/** Probe and scrape paths; stamped but left out of the tally. */
export const MONITORING_PATHS: ReadonlySet<string> = new Set([
  '/health',
  '/ready',
  '/metrics',
  '/metrics/prometheus',
  '/request-stats',
]);

export interface FairnessRecorderOptions {
  tally: RequestTally;
  endpointStats: EndpointStats;
  instanceId: string;
  onRecord?: (endpoint: string) => void;
}

/** Labels the request for per-endpoint stats. Called by route handlers. */
export function setEndpoint(res: Response, endpoint: string): void {
  res.locals.endpoint = endpoint;
}

export function endpointOf(res: Response): string {
  const endpoint: unknown = res.locals.endpoint;
  return typeof endpoint === 'string' ? endpoint : 'unmatched';
}

/** Sets X-Response-Time-Ms from the recorder's start mark; call before writing. */
export function stampResponseTime(res: Response): void {
  const startedAt: unknown = res.locals.startedAt;
  if (typeof startedAt === 'number' && !res.headersSent) {
    res.setHeader('X-Response-Time-Ms', (performance.now() - startedAt).toFixed(2));
  }
}

/**
 * Stamps every response with this instance's identity and counts it toward
 * the instance tally. The per-endpoint count is taken when the response
 * closes, since the route label is only known after routing.
 */
export function fairnessRecorder(options: FairnessRecorderOptions): RequestHandler {
  const { tally, endpointStats, instanceId, onRecord } = options;

  return (req, res, next) => {
    res.locals.startedAt = performance.now();
    res.setHeader(SERVER_ID_HEADER, instanceId);
    res.setHeader('X-Request-ID', randomUUID());

    if (!MONITORING_PATHS.has(req.path)) {
      tally.increment(instanceId);
      res.once('close', () => {
        const endpoint = endpointOf(res);
        endpointStats.record(endpoint);
        onRecord?.(endpoint);
      });
    }
    next();
  };
}
