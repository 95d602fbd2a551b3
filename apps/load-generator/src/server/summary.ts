import type { PercentileStats, RunSummary, SessionResult } from './types.js';

function addCounts(target: Record<string, number>, source: Record<string, number>): void {
  for (const [key, n] of Object.entries(source)) {
    target[key] = (target[key] ?? 0) + n;
  }
}

/**
 * Accumulates finished sessions into a RunSummary. Every field is a sum, a
 * set union or a multiset of samples, so the result does not depend on the
 * order sessions complete in.
 */
export class SummaryBuilder {
  private sessions = 0;
  private requests = 0;
  private successes = 0;
  private errors = 0;
  private stopped = false;
  private endedAt: number | null = null;
  private readonly latencies: number[] = [];
  private readonly endpointHits: Record<string, number> = {};
  private readonly statusCounts: Record<string, number> = {};
  private readonly profileCounts: Record<string, number> = {};
  private readonly servers = new Set<string>();
  readonly startedAt: number;

  constructor(startedAt: number = Date.now()) {
    this.startedAt = startedAt;
  }

  add(r: SessionResult): void {
    this.sessions++;
    this.requests += r.requests;
    this.successes += r.successes;
    this.errors += r.failures;
    for (const l of r.latenciesMs) this.latencies.push(l);
    addCounts(this.endpointHits, r.endpointHits);
    addCounts(this.statusCounts, r.statusCounts);
    this.profileCounts[r.profile] = (this.profileCounts[r.profile] ?? 0) + 1;
    for (const s of r.serversHit) this.servers.add(s);
  }

  markStopped(): void {
    this.stopped = true;
  }

  finish(endedAt: number = Date.now()): void {
    this.endedAt = endedAt;
  }

  build(): RunSummary {
    return {
      sessionsCompleted: this.sessions,
      requests: this.requests,
      successes: this.successes,
      errors: this.errors,
      endpointHits: { ...this.endpointHits },
      statusCounts: { ...this.statusCounts },
      profileCounts: { ...this.profileCounts },
      serversHit: [...this.servers].sort(),
      latency: percentiles(this.latencies),
      startedAt: this.startedAt,
      endedAt: this.endedAt ?? Date.now(),
      stopped: this.stopped,
    };
  }
}

export function percentiles(values: number[]): PercentileStats {
  if (values.length === 0) {
    return { mean: 0, p50: 0, p95: 0, max: 0 };
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mean = sorted.reduce((a, b) => a + b, 0) / sorted.length;
  const p50 = sorted[Math.floor(sorted.length * 0.5)];
  const p95 = sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * 0.95))];
  return { mean, p50, p95, max: sorted[sorted.length - 1] };
}

/**
 * Merges summaries from several agents. Counters are summed; latency mean is
 * request-weighted while p50/p95/max take the worst agent, since raw samples
 * are not available at this level.
 */
export function mergeSummaries(summaries: RunSummary[]): RunSummary {
  const merged: RunSummary = {
    sessionsCompleted: 0,
    requests: 0,
    successes: 0,
    errors: 0,
    endpointHits: {},
    statusCounts: {},
    profileCounts: {},
    serversHit: [],
    latency: { mean: 0, p50: 0, p95: 0, max: 0 },
    startedAt: summaries.length > 0 ? Math.min(...summaries.map((s) => s.startedAt)) : 0,
    endedAt: summaries.length > 0 ? Math.max(...summaries.map((s) => s.endedAt)) : 0,
    stopped: summaries.some((s) => s.stopped),
  };
  const servers = new Set<string>();
  let weightedLatency = 0;

  for (const s of summaries) {
    merged.sessionsCompleted += s.sessionsCompleted;
    merged.requests += s.requests;
    merged.successes += s.successes;
    merged.errors += s.errors;
    addCounts(merged.endpointHits, s.endpointHits);
    addCounts(merged.statusCounts, s.statusCounts);
    addCounts(merged.profileCounts, s.profileCounts);
    for (const id of s.serversHit) servers.add(id);
    weightedLatency += s.latency.mean * s.requests;
    merged.latency.p50 = Math.max(merged.latency.p50, s.latency.p50);
    merged.latency.p95 = Math.max(merged.latency.p95, s.latency.p95);
    merged.latency.max = Math.max(merged.latency.max, s.latency.max);
  }

  merged.serversHit = [...servers].sort();
  merged.latency.mean = merged.requests > 0 ? weightedLatency / merged.requests : 0;
  return merged;
}

function pct(part: number, whole: number): string {
  return whole > 0 ? ((part / whole) * 100).toFixed(1) : '0.0';
}

function sortedEntries(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Line-oriented rendering for log scrapers: one labeled total per line,
 * stable ordering for the per-key sections.
 */
export function formatSummary(s: RunSummary): string {
  const lines = [
    '==== TRAFFIC GENERATION SUMMARY ====',
    `Total Sessions: ${s.sessionsCompleted}`,
    `Total Requests: ${s.requests}`,
    `Successful: ${s.successes} (${pct(s.successes, s.requests)}%)`,
    `Errors: ${s.errors} (${pct(s.errors, s.requests)}%)`,
    `Avg Response Time: ${s.latency.mean.toFixed(1)}ms`,
    `P95 Response Time: ${s.latency.p95.toFixed(1)}ms`,
    `Servers Hit: ${s.serversHit.length} (${s.serversHit.join(', ')})`,
  ];
  for (const [template, n] of sortedEntries(s.endpointHits)) {
    lines.push(`Endpoint ${template}: ${n}`);
  }
  for (const [status, n] of sortedEntries(s.statusCounts)) {
    lines.push(`Status ${status}: ${n}`);
  }
  for (const [profile, n] of sortedEntries(s.profileCounts)) {
    lines.push(`Profile ${profile}: ${n}`);
  }
  lines.push(`Duration: ${((s.endedAt - s.startedAt) / 1000).toFixed(1)}s`);
  lines.push(`Stopped: ${s.stopped ? 'yes' : 'no'}`);
  lines.push('====================================');
  return lines.join('\n');
}
