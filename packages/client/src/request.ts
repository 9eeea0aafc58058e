import {
  type FilePath,
  fileNameOf,
  type MultipartBody,
  MultipartBuilder,
  type MultipartBuilderOptions,
} from "@formpost/multipart";
import type { FetchRequestOptions, OutgoingRequest } from "./types.js";

/**
 * fetch-backed outgoing request.
 * Headers set later replace earlier ones regardless of case.
 */
export class FetchRequest implements OutgoingRequest<Response> {
  private readonly headers: Record<string, string> = {};

  constructor(
    readonly url: string,
    private readonly options: FetchRequestOptions = {}
  ) {
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      this.set(name, value);
    }
  }

  set(name: string, value: string): this {
    for (const existing of Object.keys(this.headers)) {
      if (existing.toLowerCase() === name.toLowerCase()) {
        delete this.headers[existing];
      }
    }
    this.headers[name] = value;
    return this;
  }

  /** Headers that will be sent, as set */
  get headerEntries(): Record<string, string> {
    return { ...this.headers };
  }

  async sendBytes(body: Uint8Array): Promise<Response> {
    const { method = "POST", timeout, fetch: fetchImpl = fetch } = this.options;

    const controller = new AbortController();
    const timeoutId =
      timeout === undefined
        ? undefined
        : setTimeout(() => controller.abort(), timeout);

    try {
      return await fetchImpl(this.url, {
        method,
        headers: { ...this.headers },
        body,
        signal: controller.signal,
      });
    } catch (error) {
      if (timeout !== undefined && controller.signal.aborted) {
        throw new Error(`Request to ${this.url} timed out after ${timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/** Build a fetch-backed request for `url` */
export function createRequest(
  url: string,
  options: FetchRequestOptions = {}
): FetchRequest {
  return new FetchRequest(url, options);
}

/**
 * Attach a finished body to the request and send it.
 * The transport's response or rejection is returned unchanged.
 */
export function sendMultipartBody<TResponse>(
  request: OutgoingRequest<TResponse>,
  { contentType, body }: MultipartBody
): Promise<TResponse> {
  return request.set("Content-Type", contentType).sendBytes(body);
}

/**
 * Send one file under the given field name.
 * Encoding failures (missing file, unreadable content) reject before
 * anything is sent.
 */
export async function sendMultipartFile<TResponse>(
  request: OutgoingRequest<TResponse>,
  name: string,
  path: FilePath,
  options?: MultipartBuilderOptions
): Promise<TResponse> {
  const body = new MultipartBuilder(options).addFile(name, path).finish();
  return await sendMultipartBody(request, body);
}

/**
 * Send several files, each under a field named after the file itself,
 * in list order.
 */
export async function sendMultipartFiles<TResponse>(
  request: OutgoingRequest<TResponse>,
  paths: readonly FilePath[],
  options?: MultipartBuilderOptions
): Promise<TResponse> {
  const builder = new MultipartBuilder(options);
  for (const path of paths) {
    builder.addFile(fileNameOf(path) ?? "", path);
  }
  return await sendMultipartBody(request, builder.finish());
}
