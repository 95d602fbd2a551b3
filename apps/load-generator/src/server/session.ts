import { setTimeout as sleep } from 'node:timers/promises';
import { sendPageRequest, type RequestSender } from './http-client.js';
import { resolveEndpoint, type CompiledProfile } from './profiles.js';
import { uniform, uniformInt, type Rng } from './rng.js';
import type { RequestOutcome, SessionResult } from './types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export interface SessionOptions {
  requestTimeoutMs?: number;
  /** Run-wide stop signal: aborts the in-flight request and any think time */
  signal?: AbortSignal;
  /** Soft end: lets the in-flight request finish, then ends the session */
  drainSignal?: AbortSignal;
  /** Injected transport; defaults to fetch */
  send?: RequestSender;
  /** Called after every request, in issue order */
  onRequest?: (outcome: RequestOutcome) => void;
}

/** Mutable accumulator owned by one running session. */
class SessionAccumulator {
  requests = 0;
  successes = 0;
  failures = 0;
  readonly latenciesMs: number[] = [];
  readonly endpointHits: Record<string, number> = {};
  readonly statusCounts: Record<string, number> = {};
  private readonly servers = new Set<string>();

  record(o: RequestOutcome): void {
    this.requests++;
    if (o.status === 'ok') {
      this.successes++;
    } else {
      this.failures++;
    }
    this.latenciesMs.push(o.latencyMs);
    this.endpointHits[o.template] = (this.endpointHits[o.template] ?? 0) + 1;
    const statusKey = o.httpStatus === null ? 'error' : String(o.httpStatus);
    this.statusCounts[statusKey] = (this.statusCounts[statusKey] ?? 0) + 1;
    if (o.serverId) this.servers.add(o.serverId);
  }

  toResult(profile: string, startedAt: number, stopped: boolean): SessionResult {
    return {
      profile,
      requests: this.requests,
      successes: this.successes,
      failures: this.failures,
      latenciesMs: this.latenciesMs,
      endpointHits: this.endpointHits,
      statusCounts: this.statusCounts,
      serversHit: [...this.servers].sort(),
      startedAt,
      endedAt: Date.now(),
      stopped,
    };
  }
}

/**
 * Runs one simulated user to completion: draws a time and page budget from
 * the profile, then alternates page requests and think time until either
 * budget is spent or the stop signal fires.
 */
export async function runSession(
  compiled: CompiledProfile,
  targetBaseUrl: string,
  rng: Rng,
  options: SessionOptions = {},
): Promise<SessionResult> {
  const { profile, endpoints } = compiled;
  const send = options.send ?? sendPageRequest;
  const timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const { signal, drainSignal } = options;

  const budgetMs = uniform(rng, profile.sessionDurationSec) * 1000;
  const pageBudget = uniformInt(rng, profile.pagesPerSession);

  const acc = new SessionAccumulator();
  const startedAt = Date.now();
  const start = performance.now();
  const elapsed = (): number => performance.now() - start;

  if (pageBudget <= 0 || budgetMs <= 0) {
    return acc.toResult(profile.key, startedAt, false);
  }

  // Think time wakes early on either signal
  const wake = new AbortController();
  const onWake = (): void => wake.abort();
  for (const s of [signal, drainSignal]) {
    if (s?.aborted) wake.abort();
    s?.addEventListener('abort', onWake, { once: true });
  }

  try {
    let pages = 0;
    while (pages < pageBudget && elapsed() < budgetMs && !wake.signal.aborted) {
      const template = endpoints.sample(rng);
      const path = resolveEndpoint(template, rng);
      const outcome = await send({ baseUrl: targetBaseUrl, template, path, timeoutMs, signal });
      pages++;

      // A request cut short by the stop signal is not a target failure
      if (signal?.aborted && outcome.status === 'error') break;
      acc.record(outcome);
      options.onRequest?.(outcome);

      if (pages >= pageBudget || elapsed() >= budgetMs || wake.signal.aborted) break;

      // Never think past the session's time budget
      const thinkMs = Math.min(uniform(rng, profile.thinkTimeSec) * 1000, budgetMs - elapsed());
      if (thinkMs > 0) {
        try {
          await sleep(thinkMs, undefined, { signal: wake.signal });
        } catch (err) {
          if (wake.signal.aborted) break;
          throw err;
        }
      }
    }
  } finally {
    signal?.removeEventListener('abort', onWake);
    drainSignal?.removeEventListener('abort', onWake);
  }

  return acc.toResult(profile.key, startedAt, signal?.aborted ?? false);
}
