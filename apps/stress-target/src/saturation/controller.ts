import { randomUUID } from 'node:crypto';
import type { Writable } from 'node:stream';
import type { TargetConfig } from '../config.js';
import type { CpuParams, JobInfo, MemoryParams, NetworkParams, SaturationKind } from '../types.js';
import { runCpuJob } from './cpu.js';
import { runMemoryJob, type Allocator } from './memory.js';
import { KB, MB } from '../units.js';
import { streamPayload } from './network.js';

const HISTORY_SIZE = 50;

type AbortReason = 'deadline' | 'shutdown';

interface ActiveJob {
  info: JobInfo;
  abort: AbortController;
  done: Promise<void>;
}

export interface SaturationHooks {
  onJobStart?: (job: JobInfo) => void;
  onJobEnd?: (job: JobInfo) => void;
}

export interface SaturationControllerOptions extends SaturationHooks {
  /** Memory allocator override */
  allocate?: Allocator;
}

export interface CombinedParams {
  cpuDurationSec: number;
  memoryMb: number;
}

function snapshot(info: JobInfo): JobInfo {
  return { ...info, params: { ...info.params }, result: info.result ? { ...info.result } : undefined };
}

function abortReason(signal: AbortSignal): AbortReason | null {
  if (!signal.aborted) return null;
  return signal.reason === 'shutdown' ? 'shutdown' : 'deadline';
}

const DISCONNECT_CODES = new Set(['ERR_STREAM_PREMATURE_CLOSE', 'ECONNRESET', 'EPIPE']);

/** The client went away mid-stream. */
function isDisconnect(err: unknown): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && DISCONNECT_CODES.has(err.code);
}

/**
 * Owns every running saturation job. Each job gets an abort signal and a
 * hard timer at deadline + grace; whichever way a job ends, its resources
 * are released and it leaves the active set.
 */
export class SaturationController {
  private config: TargetConfig;
  private hooks: SaturationHooks;
  private allocate: Allocator | undefined;
  private jobs = new Map<string, ActiveJob>();
  private history: JobInfo[] = [];
  private closed = false;

  constructor(config: TargetConfig, options: SaturationControllerOptions = {}) {
    this.config = config;
    this.hooks = { onJobStart: options.onJobStart, onJobEnd: options.onJobEnd };
    this.allocate = options.allocate;
  }

  startCpu(params: CpuParams): JobInfo {
    return this.launch('cpu', { duration: params.durationSec, workers: params.workers }, params.durationSec * 1000,
      async (signal) => {
        const stats = await runCpuJob(params, signal);
        return { workers: stats.workers, iterations: stats.iterations, elapsed_ms: Math.round(stats.elapsedMs) };
      });
  }

  startMemory(params: MemoryParams): JobInfo {
    return this.launch('memory', { mb: params.mb, hold: params.holdSec }, params.holdSec * 1000,
      async (signal) => {
        const stats = await runMemoryJob(params, signal, this.allocate);
        return {
          allocated_bytes: stats.allocatedBytes,
          chunk_count: stats.chunkCount,
          held_ms: Math.round(stats.heldMs),
        };
      });
  }

  /**
   * CPU and memory over the same window: memory is held for as long as the
   * CPU workers spin.
   */
  startCombined(kind: 'cpu-mem' | 'all' | 'all-network', params: CombinedParams): JobInfo {
    const cpu: CpuParams = { durationSec: params.cpuDurationSec, workers: Math.min(this.config.defaultCpuWorkers, this.config.maxCpuWorkers) };
    const memory: MemoryParams = { mb: params.memoryMb, holdSec: params.cpuDurationSec };
    return this.launch(kind, { cpu_duration: params.cpuDurationSec, memory_mb: params.memoryMb, workers: cpu.workers },
      params.cpuDurationSec * 1000,
      async (signal) => {
        // either half failing releases the other before the job settles
        const halves = new AbortController();
        const forward = (): void => halves.abort(signal.reason);
        signal.addEventListener('abort', forward, { once: true });
        if (signal.aborted) forward();
        const abortOnFailure = <T>(work: Promise<T>): Promise<T> => work.catch((err: unknown) => {
          halves.abort('failed');
          throw err;
        });
        try {
          const [cpuOutcome, memOutcome] = await Promise.allSettled([
            abortOnFailure(runCpuJob(cpu, halves.signal)),
            abortOnFailure(runMemoryJob(memory, halves.signal, this.allocate)),
          ]);
          if (memOutcome.status === 'rejected') throw memOutcome.reason;
          if (cpuOutcome.status === 'rejected') throw cpuOutcome.reason;
          return {
            workers: cpuOutcome.value.workers,
            iterations: cpuOutcome.value.iterations,
            allocated_bytes: memOutcome.value.allocatedBytes,
            held_ms: Math.round(memOutcome.value.heldMs),
          };
        } finally {
          signal.removeEventListener('abort', forward);
        }
      });
  }

  /**
   * Streams the payload to `dest` as a tracked job. The hard deadline caps a
   * stalled client at maxHoldSec.
   */
  streamNetwork(params: NetworkParams, dest: Writable, trailer?: string): { job: JobInfo; done: Promise<void> } {
    const job = this.launch('network', { mb: params.mb, chunk_kb: params.chunkKb }, this.config.maxHoldSec * 1000,
      async (signal) => {
        const onAbort = (): void => {
          dest.destroy();
        };
        signal.addEventListener('abort', onAbort, { once: true });
        try {
          await streamPayload(dest, params.mb * MB, params.chunkKb * KB, trailer);
        } finally {
          signal.removeEventListener('abort', onAbort);
        }
        return { bytes_sent: params.mb * MB };
      });
    const active = this.jobs.get(job.id);
    return { job, done: active ? active.done : Promise.resolve() };
  }

  activeJobs(): JobInfo[] {
    return [...this.jobs.values()].map((j) => snapshot(j.info));
  }

  recentJobs(): JobInfo[] {
    return this.history.map(snapshot);
  }

  countsByKind(): Partial<Record<SaturationKind, number>> {
    const counts: Partial<Record<SaturationKind, number>> = {};
    for (const { info } of this.jobs.values()) {
      counts[info.kind] = (counts[info.kind] ?? 0) + 1;
    }
    return counts;
  }

  /** Aborts every job and waits until each has released its resources. */
  async shutdown(): Promise<void> {
    this.closed = true;
    const pending = [...this.jobs.values()];
    if (pending.length > 0) {
      console.log(`[saturation] Shutting down ${pending.length} active job(s)`);
    }
    for (const job of pending) job.abort.abort('shutdown');
    await Promise.all(pending.map((j) => j.done));
  }

  private launch(
    kind: SaturationKind,
    params: Record<string, number>,
    durationMs: number,
    run: (signal: AbortSignal) => Promise<Record<string, number>>,
  ): JobInfo {
    if (this.closed) {
      throw new Error('Saturation controller is shut down');
    }

    const now = Date.now();
    const info: JobInfo = {
      id: randomUUID(),
      kind,
      params,
      status: 'running',
      startedAt: now,
      deadline: now + durationMs,
      endedAt: null,
    };
    const abort = new AbortController();
    const hardTimer = setTimeout(() => abort.abort('deadline'), durationMs + this.config.deadlineGraceMs);

    console.log(`[saturation] Job ${info.id} started: ${kind} ${JSON.stringify(params)}`);

    const done = run(abort.signal)
      .then(
        (result) => {
          info.result = result;
          info.status = abortReason(abort.signal) === 'shutdown' ? 'cancelled' : 'completed';
        },
        (err: unknown) => {
          const reason = abortReason(abort.signal);
          if (reason !== null || isDisconnect(err)) {
            info.status = 'cancelled';
            console.log(`[saturation] Job ${info.id} (${kind}) cancelled: ${reason ?? 'client disconnected'}`);
            return;
          }
          info.status = 'failed';
          info.error = err instanceof Error ? err.message : String(err);
          console.error(`[saturation] Job ${info.id} (${kind}) failed: ${info.error}`);
        },
      )
      .finally(() => {
        clearTimeout(hardTimer);
        info.endedAt = Date.now();
        this.jobs.delete(info.id);
        this.history.push(snapshot(info));
        if (this.history.length > HISTORY_SIZE) this.history.shift();
        console.log(`[saturation] Job ${info.id} ${info.status} after ${info.endedAt - info.startedAt}ms`);
        this.hooks.onJobEnd?.(snapshot(info));
      });

    this.jobs.set(info.id, { info, abort, done });
    this.hooks.onJobStart?.(snapshot(info));
    return snapshot(info);
  }
}
