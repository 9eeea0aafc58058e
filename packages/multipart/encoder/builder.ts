/**
 * multipart/form-data body builder (RFC 7578).
 *
 * Parts are framed lazily: a part's content is never scanned, so the CRLF
 * that ends it is only written once the next delimiter (or the closing
 * delimiter) is known to follow.
 *
 * @example
 * const { contentType, body } = new MultipartBuilder()
 *   .addFile("upload", "./report.csv")
 *   .addText("title", "Q4 Report")
 *   .finish();
 */

import {
  type FilePath,
  OCTET_STREAM,
  fileNameOf,
  inferContentType,
  withOpenFile,
} from "../files/file-field.js";
import { createDiagnosticsLog } from "../utils/diagnostics-log.js";
import {
  boundaryParameter,
  closeDelimiterLine,
  cryptoRandom,
  delimiterLine,
  generateBoundaryToken,
  multipartContentType,
} from "./boundary.js";
import { MultipartError, describeCause } from "./errors.js";
import { MemorySink } from "./sinks.js";
import { fileDescriptorSource, toByteSource } from "./sources.js";
import type {
  ByteSink,
  MultipartBody,
  MultipartBuilderOptions,
  StreamInput,
} from "./types.js";

const CRLF = "\r\n";

/** Read buffer size used when copying stream content into the body */
export const COPY_CHUNK_SIZE = 64 * 1024;

const HEADER_PARAM_ESCAPES: Record<string, string> = {
  '"': "%22",
  "\r": "%0D",
  "\n": "%0A",
};

/** Percent-encode the characters that would end a quoted header parameter */
export function escapeHeaderParam(value: string): string {
  return value.replace(/["\r\n]/g, (ch) => HEADER_PARAM_ESCAPES[ch] ?? ch);
}

const textEncoder = new TextEncoder();

export class MultipartBuilder {
  private readonly parameter: string;
  private readonly sink: ByteSink;
  private readonly log: (message: string, data?: unknown) => void;
  private dataWritten = false;
  private finished = false;
  private abandoned = false;

  constructor(options: MultipartBuilderOptions = {}) {
    this.parameter = boundaryParameter(
      generateBoundaryToken(options.random ?? cryptoRandom)
    );
    this.sink = options.sink ?? new MemorySink();
    this.log = createDiagnosticsLog("MultipartBuilder", {
      diagnostics: options.diagnostics,
      logger: options.logger,
    });
  }

  /** Boundary parameter, hyphen prefix included, as echoed in the header */
  get boundary(): string {
    return this.parameter;
  }

  /**
   * Add a text field.
   *
   * @param name - Field name
   * @param text - Field value, written as raw UTF-8
   */
  addText(name: string, text: string): this {
    this.ensureOpen();
    return this.abandonOnError(() => {
      this.writeFieldHeaders(name);
      const bytes = textEncoder.encode(text);
      this.write(bytes);
      this.log(`text field "${name}"`, { bytes: bytes.length });
      return this;
    });
  }

  /**
   * Add a file part read from an open file.
   * The content type is guessed from the extension and the filename taken
   * from the last path component.
   */
  addFile(name: string, path: FilePath): this {
    this.ensureOpen();
    const contentType = inferContentType(path);
    const filename = fileNameOf(path);
    return this.abandonOnError(() =>
      withOpenFile(path, (fd) =>
        this.copyPart(fileDescriptorSource(fd), name, filename, contentType)
      )
    );
  }

  /**
   * Add a part copied verbatim from `source` until it is exhausted.
   * A Content-Type line is always written (`application/octet-stream` when
   * none is given) so receivers treat the part as a file.
   */
  addStream(
    source: StreamInput,
    name: string,
    filename?: string,
    contentType?: string
  ): this {
    this.ensureOpen();
    return this.abandonOnError(() =>
      this.copyPart(source, name, filename, contentType)
    );
  }

  /**
   * Terminate the last part and write the closing delimiter, even when no
   * field was added. The builder cannot be used afterwards.
   */
  finish(): MultipartBody {
    this.ensureOpen();
    this.finished = true;
    if (this.dataWritten) {
      this.write(CRLF);
    }
    this.write(closeDelimiterLine(this.parameter));

    let body: Uint8Array;
    try {
      body = this.sink.toBytes();
    } catch (cause) {
      throw new MultipartError(
        "sink",
        `failed to collect multipart body: ${describeCause(cause)}`,
        cause
      );
    }
    this.log("finished body", { bytes: body.length });
    return { contentType: multipartContentType(this.parameter), body };
  }

  // --- Framing ---

  private copyPart(
    source: StreamInput,
    name: string,
    filename?: string,
    contentType?: string
  ): this {
    const reader = toByteSource(source);
    this.writeFieldHeaders(name, filename, contentType ?? OCTET_STREAM);

    const buffer = new Uint8Array(COPY_CHUNK_SIZE);
    let total = 0;
    for (;;) {
      let count: number;
      try {
        count = reader.read(buffer);
      } catch (cause) {
        throw new MultipartError(
          "source",
          `failed to read content of field "${name}": ${describeCause(cause)}`,
          cause
        );
      }
      if (!Number.isInteger(count) || count < 0 || count > buffer.length) {
        throw new MultipartError(
          "source",
          `failed to read content of field "${name}": read returned ${String(count)}, expected 0-${buffer.length}`
        );
      }
      if (count === 0) {
        break;
      }
      this.write(buffer.subarray(0, count));
      total += count;
    }

    this.log(`stream field "${name}"`, { filename, bytes: total });
    return this;
  }

  private writeBoundary(): void {
    if (this.dataWritten) {
      this.write(CRLF);
    }
    this.write(delimiterLine(this.parameter));
  }

  private writeFieldHeaders(
    name: string,
    filename?: string,
    contentType?: string
  ): void {
    this.writeBoundary();
    this.dataWritten = true;

    let headers = `Content-Disposition: form-data; name="${escapeHeaderParam(name)}"`;
    if (filename !== undefined) {
      headers += `; filename="${escapeHeaderParam(filename)}"`;
    }
    if (contentType !== undefined) {
      headers += `${CRLF}Content-Type: ${contentType}`;
    }
    this.write(`${headers}${CRLF}${CRLF}`);
  }

  private write(data: string | Uint8Array): void {
    const chunk = typeof data === "string" ? textEncoder.encode(data) : data;
    try {
      this.sink.write(chunk);
    } catch (cause) {
      throw new MultipartError(
        "sink",
        `failed to write multipart body: ${describeCause(cause)}`,
        cause
      );
    }
  }

  /** A field that fails partway leaves a truncated part behind */
  private abandonOnError<T>(add: () => T): T {
    try {
      return add();
    } catch (error) {
      this.abandoned = true;
      this.log("field failed, body abandoned", { error: describeCause(error) });
      throw error;
    }
  }

  private ensureOpen(): void {
    if (this.abandoned) {
      throw new MultipartError(
        "consumed",
        "multipart body abandoned after a failed field; create a new builder"
      );
    }
    if (this.finished) {
      throw new MultipartError(
        "consumed",
        "multipart body already finished; create a new builder"
      );
    }
  }
}
