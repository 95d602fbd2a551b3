// ---------------------------------------------------------------------------
// Fairness
// ---------------------------------------------------------------------------

export interface TallyEntry {
  instanceId: string;
  count: number;
}

// ---------------------------------------------------------------------------
// Saturation jobs
// ---------------------------------------------------------------------------

export type SaturationKind = 'cpu' | 'memory' | 'network' | 'cpu-mem' | 'all' | 'all-network';

export type JobStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export interface CpuParams {
  durationSec: number;
  workers: number;
}

export interface MemoryParams {
  mb: number;
  holdSec: number;
}

export interface NetworkParams {
  mb: number;
  chunkKb: number;
}

export interface CpuStats {
  workers: number;
  iterations: number;
  elapsedMs: number;
}

export interface MemoryStats {
  requestedMb: number;
  allocatedBytes: number;
  chunkCount: number;
  heldMs: number;
}

export interface JobInfo {
  id: string;
  kind: SaturationKind;
  params: Record<string, number>;
  status: JobStatus;
  startedAt: number;
  deadline: number;
  endedAt: number | null;
  /** Flattened CPU/memory stats once the job ends */
  result?: Record<string, number>;
  error?: string;
}

// ---------------------------------------------------------------------------
// Monitoring
// ---------------------------------------------------------------------------

export interface ProcessGauges {
  rssMb: number;
  heapUsedMb: number;
  heapTotalMb: number;
  externalMb: number;
  arrayBuffersMb: number;
  cpuUserMicros: number;
  cpuSystemMicros: number;
  uptimeSec: number;
}

export interface MetricsResponse {
  server_id: string;
  total_requests: number;
  tally: TallyEntry[];
  requests_by_endpoint: Record<string, number>;
  process: ProcessGauges;
  saturation: {
    active: number;
    byKind: Partial<Record<SaturationKind, number>>;
  };
  timestamp: string;
}
