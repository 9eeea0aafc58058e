import { readSync } from "node:fs";
import type { ByteSource, StreamInput } from "./types.js";

const encoder = new TextEncoder();

/** Serve an in-memory byte array (or UTF-8 string) in buffer-sized pieces */
export function bytesSource(data: Uint8Array | string): ByteSource {
  const bytes = typeof data === "string" ? encoder.encode(data) : data;
  let offset = 0;

  return {
    read: (buffer) => {
      const count = Math.min(buffer.length, bytes.length - offset);
      buffer.set(bytes.subarray(offset, offset + count));
      offset += count;
      return count;
    },
  };
}

/**
 * Serve a sequence of chunks. Empty chunks are skipped so they never
 * read as end of input.
 */
export function iterableSource(chunks: Iterable<Uint8Array>): ByteSource {
  const iterator = chunks[Symbol.iterator]();
  let current: Uint8Array = new Uint8Array(0);
  let offset = 0;
  let done = false;

  return {
    read: (buffer) => {
      while (!done && offset >= current.length) {
        const next = iterator.next();
        if (next.done) {
          done = true;
        } else {
          current = next.value;
          offset = 0;
        }
      }
      if (done) {
        return 0;
      }
      const count = Math.min(buffer.length, current.length - offset);
      buffer.set(current.subarray(offset, offset + count));
      offset += count;
      return count;
    },
  };
}

/** Read from an open file descriptor until end of file */
export function fileDescriptorSource(fd: number): ByteSource {
  return {
    read: (buffer) => readSync(fd, buffer, 0, buffer.length, null),
  };
}

export function isByteSource(input: unknown): input is ByteSource {
  return (
    typeof input === "object" &&
    input !== null &&
    "read" in input &&
    typeof input.read === "function"
  );
}

/** Normalise any accepted stream input into a ByteSource */
export function toByteSource(input: StreamInput): ByteSource {
  if (typeof input === "string" || input instanceof Uint8Array) {
    return bytesSource(input);
  }
  if (isByteSource(input)) {
    return input;
  }
  return iterableSource(input);
}
