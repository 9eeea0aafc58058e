import type { ByteSink } from "./types.js";

/** Growable in-memory body buffer */
export class MemorySink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private length = 0;

  write(chunk: Uint8Array): void {
    // Callers reuse their read buffers, so keep a private copy.
    this.chunks.push(chunk.slice());
    this.length += chunk.length;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  /** Bytes written so far */
  get size(): number {
    return this.length;
  }
}
