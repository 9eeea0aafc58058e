import type { FormpostLogger } from "../utils/types.js";

/**
 * Returns a uniformly distributed integer in `[0, maxExclusive)`.
 * Injected into the builder so tests can substitute a deterministic sequence.
 */
export type RandomSource = (maxExclusive: number) => number;

/**
 * Synchronous readable byte source.
 * `read` fills the start of `buffer` and returns how many bytes it wrote;
 * 0 means the source is exhausted.
 */
export interface ByteSource {
  read: (buffer: Uint8Array) => number;
}

/** Anything `addStream` accepts as part content */
export type StreamInput = ByteSource | Uint8Array | string | Iterable<Uint8Array>;

/**
 * Append-only destination for the encoded body.
 * The in-memory sink never fails; disk-backed sinks may, and their
 * failures surface as `sink` errors.
 */
export interface ByteSink {
  write: (chunk: Uint8Array) => void;
  /** Return everything written so far as a single byte sequence */
  toBytes: () => Uint8Array;
}

/** Finished multipart body and its matching Content-Type header value */
export interface MultipartBody {
  contentType: string;
  body: Uint8Array;
}

/** Builder construction options */
export interface MultipartBuilderOptions {
  /** Random digit source for the boundary (default: crypto RNG) */
  random?: RandomSource;
  /** Body destination (default: in-memory) */
  sink?: ByteSink;
  /** Log each framed field through the diagnostics log */
  diagnostics?: boolean;
  logger?: FormpostLogger;
}
