import type { FilePath, FormpostLogger } from "@formpost/multipart";

/**
 * Outgoing HTTP request the adapter binds a multipart body onto.
 * `set` records a header; `sendBytes` performs the single send and resolves
 * to the transport's response, or rejects with the transport's own error.
 */
export interface OutgoingRequest<TResponse> {
  set: (name: string, value: string) => OutgoingRequest<TResponse>;
  sendBytes: (body: Uint8Array) => Promise<TResponse>;
}

/** fetch-compatible function, injectable for tests and custom transports */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Options for the fetch-backed request */
export interface FetchRequestOptions {
  /** HTTP method (default: POST) */
  method?: string;
  headers?: Record<string, string>;
  /** Abort the send after this many ms; no timeout when omitted */
  timeout?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

/** Result pattern: { error, data } (graceful failure over throwing) */
export interface ClientResult<T> {
  error: string | null;
  data: T | null;
}

/** Decoded response of an upload */
export interface UploadResponse {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  /** Parsed JSON for application/json responses, text otherwise */
  body: unknown;
}

/** Parameters for upload */
export interface UploadParams {
  /** Path appended to the client's baseUrl */
  path?: string;
  /** Files to upload, keyed by field name */
  files?: Record<string, FilePath | FilePath[]>;
  /** Text fields, written before the files */
  fields?: Record<string, string>;
  /** Headers for this request only */
  headers?: Record<string, string>;
}

/** Interface for the upload client */
export interface UploadClient {
  /** Upload files and fields as one multipart/form-data request */
  upload: (params: UploadParams) => Promise<ClientResult<UploadResponse>>;
}

/** Non-serialisable collaborators accepted next to the validated config */
export interface UploadClientHooks {
  fetch?: FetchLike;
  logger?: FormpostLogger;
}
