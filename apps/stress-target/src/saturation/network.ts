import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Writable } from 'node:stream';

function* payloadChunks(totalBytes: number, chunkBytes: number, trailer: string | undefined): Generator<Buffer> {
  const chunk = Buffer.alloc(Math.min(chunkBytes, Math.max(totalBytes, 1)), 'X');
  let emitted = 0;
  while (emitted < totalBytes) {
    const size = Math.min(chunk.length, totalBytes - emitted);
    yield size === chunk.length ? chunk : chunk.subarray(0, size);
    emitted += size;
  }
  if (trailer !== undefined) {
    yield Buffer.from(`${totalBytes > 0 ? '\n' : ''}${trailer}`, 'utf-8');
  }
}

/**
 * Writes `totalBytes` of filler to `dest`, one reused chunk at a time, with
 * backpressure. Rejects if the client goes away mid-stream; the generator is
 * closed either way so nothing keeps a reference to the chunk.
 */
export async function streamPayload(
  dest: Writable,
  totalBytes: number,
  chunkBytes: number,
  trailer?: string,
): Promise<void> {
  await pipeline(Readable.from(payloadChunks(totalBytes, chunkBytes, trailer), { objectMode: false }), dest);
}
