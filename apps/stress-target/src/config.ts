import os from 'node:os';

export interface TargetConfig {
  port: number;
  /** Stable identity of this replica, fixed for the process lifetime */
  instanceId: string;
  maxCpuWorkers: number;
  maxCpuDurationSec: number;
  defaultCpuWorkers: number;
  maxMemoryMb: number;
  maxHoldSec: number;
  maxNetworkMb: number;
  /** Extra time past a job's deadline before its resources are forcibly released */
  deadlineGraceMs: number;
  /** Multiplier on simulated DB/CPU work in content endpoints; 0 disables it */
  workScale: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TargetConfig {
  const cpus = os.availableParallelism();
  return {
    port: parseInt(env.PORT || '7777', 10),
    instanceId: env.INSTANCE_ID || os.hostname(),
    maxCpuWorkers: parseInt(env.MAX_CPU_WORKERS || String(cpus * 4), 10),
    maxCpuDurationSec: parseInt(env.MAX_CPU_DURATION_SEC || '300', 10),
    defaultCpuWorkers: parseInt(env.DEFAULT_CPU_WORKERS || String(Math.min(4, cpus)), 10),
    maxMemoryMb: parseInt(env.MAX_MEMORY_MB || '2048', 10),
    maxHoldSec: parseInt(env.MAX_HOLD_SEC || '300', 10),
    maxNetworkMb: parseInt(env.MAX_NETWORK_MB || '1024', 10),
    deadlineGraceMs: parseInt(env.DEADLINE_GRACE_MS || '1000', 10),
    workScale: parseFloat(env.WORK_SCALE || '1'),
  };
}
