import type { ReadableStream } from 'node:stream/web';

/**
 * Drain a web ReadableStream of byte chunks into one Uint8Array.
 * The reader lock is released even when the stream errors.
 */
export async function readStreamToBuffer(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  const reader = stream.getReader();

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }

  return new Uint8Array(Buffer.concat(chunks));
}
