/**
 * Where an encoding failure came from:
 * - `source`: opening or reading the part content failed
 * - `sink`: writing to the body buffer failed
 * - `consumed`: the builder was used after `finish()`
 */
export type MultipartErrorKind = "source" | "sink" | "consumed";

export class MultipartError extends Error {
  readonly kind: MultipartErrorKind;

  constructor(kind: MultipartErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "MultipartError";
    this.kind = kind;
  }
}

export function isMultipartError(error: unknown): error is MultipartError {
  return error instanceof MultipartError;
}

/** Message of an unknown thrown value, for wrapping into a MultipartError */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
