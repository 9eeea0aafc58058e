/**
 * File system and MIME glue for file fields.
 * The encoder only needs: open read-only, read to the end, close,
 * plus a best-guess content type and a filename.
 */

import { closeSync, openSync } from "node:fs";
import { basename } from "node:path";
import { fileURLToPath } from "node:url";
import { lookup } from "mime-types";
import { MultipartError, describeCause } from "../encoder/errors.js";

export const OCTET_STREAM = "application/octet-stream";

/** Path forms accepted wherever a file is named */
export type FilePath = string | URL;

/** Convert a `file:` URL to a platform path; plain strings pass through */
export function toFsPath(path: FilePath): string {
  return typeof path === "string" ? path : fileURLToPath(path);
}

/**
 * Final path component, or undefined when the path has none
 * (e.g. "" or "/").
 */
export function fileNameOf(path: FilePath): string | undefined {
  const name = basename(toFsPath(path));
  return name === "" ? undefined : name;
}

/** Guess the content type from the extension; never fails */
export function inferContentType(path: FilePath): string {
  return lookup(toFsPath(path)) || OCTET_STREAM;
}

/**
 * Open a file for reading and hand its descriptor to `use`.
 * The descriptor is closed however `use` exits.
 * Open failures (not found, permission denied) become `source` errors.
 */
export function withOpenFile<T>(path: FilePath, use: (fd: number) => T): T {
  const fsPath = toFsPath(path);
  let fd: number;
  try {
    fd = openSync(fsPath, "r");
  } catch (cause) {
    throw new MultipartError(
      "source",
      `cannot open ${fsPath}: ${describeCause(cause)}`,
      cause
    );
  }

  try {
    return use(fd);
  } finally {
    closeSync(fd);
  }
}
