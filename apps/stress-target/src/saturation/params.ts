import { z } from 'zod';
import type { TargetConfig } from '../config.js';

const int = (label: string, min: number, max: number, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be an integer`)
    .min(min, `${label} must be at least ${min}`)
    .max(max, `${label} must be at most ${max}`)
    .default(Math.max(min, Math.min(fallback, max)));

/** Query schemas for the saturation endpoints, bounded by the process config. */
export function saturationSchemas(config: TargetConfig) {
  const cpuDuration = (label: string) => int(label, 1, config.maxCpuDurationSec, 5);
  const memoryMb = (label: string, fallback: number) => int(label, 1, config.maxMemoryMb, fallback);
  const networkMb = (label: string, fallback: number) => int(label, 0, config.maxNetworkMb, fallback);

  return {
    cpu: z.object({
      duration: cpuDuration('duration'),
      workers: int('workers', 1, config.maxCpuWorkers, 4),
    }),
    memory: z.object({
      mb: memoryMb('mb', 512),
      hold: int('hold', 0, config.maxHoldSec, 5),
    }),
    network: z.object({
      mb: networkMb('mb', 5),
      chunk_kb: int('chunk_kb', 1, 4096, 256),
    }),
    cpuMem: z.object({
      cpu_duration: cpuDuration('cpu_duration'),
      memory_mb: memoryMb('memory_mb', 256),
    }),
    all: z.object({
      cpu_duration: cpuDuration('cpu_duration'),
      memory_mb: memoryMb('memory_mb', 256),
      network_mb: networkMb('network_mb', 50),
    }),
  };
}

export type SaturationSchemas = ReturnType<typeof saturationSchemas>;

export interface ParamIssue {
  param: string;
  message: string;
}

export function describeIssues(error: z.ZodError): ParamIssue[] {
  return error.issues.map((issue) => ({
    param: issue.path.join('.') || '(query)',
    message: issue.message,
  }));
}
