import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { formatSummary } from './summary.js';
import type { RunSummary } from './types.js';

/**
 * Appends a summary block to the agent's log so remote tailing/grep picks it
 * up, e.g. `grep -E 'SUMMARY|Total|Successful|Errors|Servers Hit'`.
 */
export async function writeSummaryLog(
  logPath: string,
  agentId: string,
  summary: RunSummary,
): Promise<void> {
  await mkdir(path.dirname(logPath), { recursive: true });
  const block =
    `[summary] agent=${agentId} finished=${new Date(summary.endedAt).toISOString()}\n` +
    `${formatSummary(summary)}\n`;
  await appendFile(logPath, block, 'utf-8');
}
