import { setImmediate as yieldToLoop, setTimeout as sleep } from 'node:timers/promises';
import type { MemoryParams, MemoryStats } from '../types.js';
import { MB } from '../units.js';

export const MEMORY_CHUNK_BYTES = 64 * MB;

export type Allocator = (bytes: number) => Buffer;

/** Uninitialized memory, then filled so every page is actually resident. */
export const residentAllocator: Allocator = (bytes) => Buffer.allocUnsafeSlow(bytes).fill(1);

export class AllocationError extends Error {
  readonly allocatedBytes: number;

  constructor(message: string, allocatedBytes: number) {
    super(message);
    this.name = 'AllocationError';
    this.allocatedBytes = allocatedBytes;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Allocates `mb` in 64 MB chunks, holds them for `holdSec`, then drops every
 * reference. On allocation failure the chunks already taken are released
 * and an AllocationError is thrown. An abort cuts the hold short.
 */
export async function runMemoryJob(
  params: MemoryParams,
  signal: AbortSignal,
  allocate: Allocator = residentAllocator,
): Promise<MemoryStats> {
  const chunks: Buffer[] = [];
  let allocatedBytes = 0;

  try {
    let remaining = params.mb * MB;
    while (remaining > 0 && !signal.aborted) {
      const size = Math.min(MEMORY_CHUNK_BYTES, remaining);
      let chunk: Buffer;
      try {
        chunk = allocate(size);
      } catch (err) {
        throw new AllocationError(
          `Could not allocate ${params.mb} MB: ${err instanceof Error ? err.message : String(err)}`,
          allocatedBytes,
        );
      }
      chunks.push(chunk);
      allocatedBytes += chunk.length;
      remaining -= size;
      // keep the event loop responsive between large fills
      await yieldToLoop();
    }

    const holdStart = performance.now();
    if (params.holdSec > 0 && !signal.aborted) {
      try {
        await sleep(params.holdSec * 1000, undefined, { signal });
      } catch (err) {
        if (!isAbortError(err)) throw err;
      }
    }

    return {
      requestedMb: params.mb,
      allocatedBytes,
      chunkCount: chunks.length,
      heldMs: performance.now() - holdStart,
    };
  } finally {
    chunks.length = 0;
  }
}
