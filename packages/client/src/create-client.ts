import { createDiagnosticsLog, MultipartBuilder } from "@formpost/multipart";
import { z } from "zod";
import { createRequest, sendMultipartBody } from "./request.js";
import { safeTry } from "./safe-try.js";
import type {
  ClientResult,
  UploadClient,
  UploadClientHooks,
  UploadParams,
  UploadResponse,
} from "./types.js";

/** Upload client configuration, validated on creation */
export const uploadClientConfigSchema = z.object({
  baseUrl: z.string().url(),
  headers: z.record(z.string()).optional(),
  /** Timeout in ms (default: 30000) */
  timeout: z.number().int().positive().default(30_000),
  diagnostics: z.boolean().default(false),
});

export type UploadClientConfig = z.input<typeof uploadClientConfigSchema> &
  UploadClientHooks;

/** Join baseUrl and an optional path with exactly one slash between them */
export function joinUrl(baseUrl: string, path?: string): string {
  if (!path) {
    return baseUrl;
  }
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * Creates an upload client bound to a base URL.
 * Invalid configuration throws; uploads never do.
 *
 * @example
 * const client = createUploadClient({ baseUrl: "https://files.example.com" });
 * const { error, data } = await client.upload({
 *   path: "/reports",
 *   fields: { title: "Q4 Report" },
 *   files: { report: "./q4.csv" },
 * });
 */
export function createUploadClient(config: UploadClientConfig): UploadClient {
  const parsed = uploadClientConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid upload client config: ${issues}`);
  }

  const { baseUrl, headers, timeout, diagnostics } = parsed.data;
  const log = createDiagnosticsLog("UploadClient", {
    diagnostics,
    logger: config.logger,
  });

  return {
    upload: async (params: UploadParams) => {
      const buildResult = await safeTry(() => {
        const builder = new MultipartBuilder({
          diagnostics,
          logger: config.logger,
        });
        for (const [name, value] of Object.entries(params.fields ?? {})) {
          builder.addText(name, value);
        }
        for (const [name, value] of Object.entries(params.files ?? {})) {
          const paths = Array.isArray(value) ? value : [value];
          for (const path of paths) {
            builder.addFile(name, path);
          }
        }
        return builder.finish();
      });

      if (buildResult.isErr) {
        return resolveError(buildResult.error);
      }

      const multipart = buildResult.value;
      const url = joinUrl(baseUrl, params.path);
      const request = createRequest(url, {
        headers: { ...headers, ...params.headers },
        timeout,
        fetch: config.fetch,
      });

      log(`sending ${multipart.body.length} bytes`, { url });

      const sendResult = await safeTry(async () =>
        toUploadResponse(await sendMultipartBody(request, multipart))
      );

      if (sendResult.isErr) {
        return resolveError(sendResult.error);
      }

      const response = sendResult.value;
      log(`received ${response.status}`, { url });

      if (!response.ok) {
        return {
          error: `HTTP ${response.status}: ${response.statusText}`,
          data: response.data,
        };
      }

      return { error: null, data: response.data };
    },
  };
}

/** Read the response body as JSON or text depending on its content type */
async function toUploadResponse(
  response: Response
): Promise<{ ok: boolean; status: number; statusText: string; data: UploadResponse }> {
  const contentType = response.headers.get("content-type") ?? "";
  const body: unknown = contentType.includes("application/json")
    ? await response.json()
    : await response.text();

  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    ok: response.ok,
    status: response.status,
    statusText: response.statusText,
    data: { status: response.status, ok: response.ok, headers, body },
  };
}

/**
 * Failed upload result carrying the failure's message. An `AbortError` from
 * a caller's signal reports as a timeout; the request's own timeout already
 * names the URL and the delay.
 */
function resolveError<T>(cause: unknown): ClientResult<T> {
  if (!(cause instanceof Error)) {
    return { error: String(cause), data: null };
  }
  const message =
    cause.name === "AbortError" ? "Request timed out" : cause.message;
  return { error: message, data: null };
}
