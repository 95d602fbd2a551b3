import { z } from 'zod';
import type { FairnessReport, TallyEntry } from './types.js';

const QUERY_TIMEOUT_MS = 5_000;

const metricsResponseSchema = z.object({
  server_id: z.string(),
  tally: z.array(z.object({ instanceId: z.string(), count: z.number().int().nonnegative() })),
});

/**
 * Folds tally observations together. Counters only grow, so for each
 * instance the largest observed value is the most recent one.
 */
export function mergeTallies(observations: TallyEntry[][]): TallyEntry[] {
  const byInstance = new Map<string, number>();
  for (const entries of observations) {
    for (const { instanceId, count } of entries) {
      byInstance.set(instanceId, Math.max(byInstance.get(instanceId) ?? 0, count));
    }
  }
  return [...byInstance.entries()]
    .map(([instanceId, count]) => ({ instanceId, count }))
    .sort((a, b) => (a.instanceId < b.instanceId ? -1 : a.instanceId > b.instanceId ? 1 : 0));
}

export function computeFairness(tally: TallyEntry[]): FairnessReport {
  const total = tally.reduce((sum, e) => sum + e.count, 0);
  const instances = tally.map((e) => ({ ...e, share: total > 0 ? e.count / total : 0 }));
  const shares = instances.map((i) => i.share);
  const maxMinusMinShare = shares.length > 0 ? Math.max(...shares) - Math.min(...shares) : 0;
  return { total, instances, maxMinusMinShare };
}

/**
 * Samples the target's /metrics through its load balancer. Each call lands on
 * one replica, so repeated samples are needed to see every instance.
 */
export async function collectTally(targetUrl: string, samples: number): Promise<TallyEntry[]> {
  const observations: TallyEntry[][] = [];
  const url = `${targetUrl.replace(/\/+$/, '')}/metrics`;

  for (let i = 0; i < samples; i++) {
    try {
      const resp = await fetch(url, { signal: AbortSignal.timeout(QUERY_TIMEOUT_MS) });
      if (!resp.ok) {
        console.log(`[fairness] /metrics returned ${resp.status}`);
        continue;
      }
      const parsed = metricsResponseSchema.safeParse(await resp.json());
      if (!parsed.success) {
        console.log(`[fairness] Unexpected /metrics shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        continue;
      }
      observations.push(parsed.data.tally);
    } catch (err) {
      console.log(`[fairness] Sample failed: ${err instanceof Error ? err.message : err}`);
    }
  }

  return mergeTallies(observations);
}

export function formatFairness(report: FairnessReport): string {
  const lines = ['==== FAIRNESS REPORT ====', `Total Requests: ${report.total}`];
  for (const i of report.instances) {
    lines.push(`Instance ${i.instanceId}: ${i.count} (${(i.share * 100).toFixed(1)}%)`);
  }
  lines.push(`Max-Min Share Deviation: ${(report.maxMinusMinShare * 100).toFixed(1)}%`);
  lines.push('=========================');
  return lines.join('\n');
}
