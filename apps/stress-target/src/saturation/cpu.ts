import { Worker } from 'node:worker_threads';
import type { CpuParams, CpuStats } from '../types.js';

const BATCH = 10_000;

// Plain JS so it runs the same under a TS loader and from dist/
const SPIN_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const deadline = workerData.deadline;
let iterations = 0;
let sink = 0;
while (Date.now() < deadline) {
  for (let i = 0; i < ${BATCH}; i++) {
    sink += Math.sqrt(Math.random() * 99999);
  }
  iterations += ${BATCH};
}
parentPort.postMessage({ iterations, sink: sink > 0 });
`;

interface SpinResult {
  iterations: number;
}

function isSpinResult(value: unknown): value is SpinResult {
  return typeof value === 'object' && value !== null
    && 'iterations' in value && typeof value.iterations === 'number';
}

/** Resolves with the worker's iteration count, or 0 if it was terminated first. */
function waitForWorker(worker: Worker): Promise<number> {
  return new Promise((resolve, reject) => {
    let iterations = 0;
    worker.once('message', (msg: unknown) => {
      if (isSpinResult(msg)) iterations = msg.iterations;
    });
    worker.once('error', reject);
    worker.once('exit', () => resolve(iterations));
  });
}

/**
 * Pins `workers` threads at 100% until the deadline. Each thread checks the
 * clock itself; the abort signal terminates them early. Threads are always
 * terminated before this returns.
 */
export async function runCpuJob(params: CpuParams, signal: AbortSignal): Promise<CpuStats> {
  const start = performance.now();
  const deadline = Date.now() + params.durationSec * 1000;
  const workers: Worker[] = [];
  const terminateAll = (): void => {
    for (const w of workers) {
      w.terminate().catch((err: unknown) => {
        console.error('[saturation] worker terminate failed:', err);
      });
    }
  };
  signal.addEventListener('abort', terminateAll, { once: true });

  try {
    for (let i = 0; i < params.workers; i++) {
      workers.push(new Worker(SPIN_SOURCE, { eval: true, workerData: { deadline } }));
    }
    if (signal.aborted) terminateAll();
    const counts = await Promise.all(workers.map(waitForWorker));
    return {
      workers: params.workers,
      iterations: counts.reduce((a, b) => a + b, 0),
      elapsedMs: performance.now() - start,
    };
  } finally {
    signal.removeEventListener('abort', terminateAll);
    await Promise.all(workers.map((w) => w.terminate()));
  }
}
