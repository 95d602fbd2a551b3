import type { RequestOutcome } from './types.js';

export const SERVER_ID_HEADER = 'x-server-id';

export interface PageRequest {
  baseUrl: string;
  template: string;
  path: string;
  timeoutMs: number;
  /** Stop signal for the whole run; aborts the in-flight request */
  signal?: AbortSignal;
}

/** Sends one page request. Never rejects: failures come back as outcomes. */
export type RequestSender = (req: PageRequest) => Promise<RequestOutcome>;

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path.startsWith('/') ? path : `/${path}`}`;
}

/**
 * Issues a GET against the target and drains the body so latency covers the
 * full response. Transport errors, timeouts and non-2xx statuses are
 * reported as `status: 'error'`.
 */
export const sendPageRequest: RequestSender = async (req) => {
  const url = joinUrl(req.baseUrl, req.path);
  const startTime = performance.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), req.timeoutMs);
  const onStop = (): void => controller.abort();
  if (req.signal?.aborted) controller.abort();
  req.signal?.addEventListener('abort', onStop, { once: true });

  try {
    const resp = await fetch(url, { method: 'GET', signal: controller.signal });
    await resp.arrayBuffer();
    const latencyMs = performance.now() - startTime;
    const serverId = resp.headers.get(SERVER_ID_HEADER);

    if (!resp.ok) {
      return {
        template: req.template,
        path: req.path,
        status: 'error',
        httpStatus: resp.status,
        latencyMs,
        serverId,
        error: `HTTP ${resp.status}`,
      };
    }
    return {
      template: req.template,
      path: req.path,
      status: 'ok',
      httpStatus: resp.status,
      latencyMs,
      serverId,
    };
  } catch (err) {
    let msg: string;
    if (req.signal?.aborted) {
      msg = 'Stopped';
    } else if (controller.signal.aborted) {
      msg = `Request timeout (${req.timeoutMs}ms)`;
    } else {
      msg = err instanceof Error ? err.message : String(err);
    }
    return errorOutcome(req, performance.now() - startTime, msg);
  } finally {
    clearTimeout(timeout);
    req.signal?.removeEventListener('abort', onStop);
  }
};

function errorOutcome(req: PageRequest, latencyMs: number, error: string): RequestOutcome {
  return {
    template: req.template,
    path: req.path,
    status: 'error',
    httpStatus: null,
    latencyMs,
    serverId: null,
    error,
  };
}
