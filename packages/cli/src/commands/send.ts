import { createRequest, sendMultipartBody } from "@formpost/client";
import {
  describeCause,
  fileNameOf,
  MultipartBuilder,
} from "@formpost/multipart";
import { error, hint, info, success } from "../utils/log.js";
import {
  parseFieldOptions,
  parseHeaderOptions,
  parseTimeout,
} from "../utils/options.js";

export interface SendOptions {
  /** Field name for every file; defaults to each file's own name */
  name?: string;
  field: string[];
  header: string[];
  timeout?: string;
}

/**
 * Send files and text fields to `url` as one multipart/form-data POST.
 * Text fields go first, then files in argument order.
 *
 * @returns Process exit code: 0 on a 2xx response, 1 otherwise
 */
export const sendCommand = async (
  url: string,
  files: string[],
  options: SendOptions
): Promise<number> => {
  let fields: Array<[string, string]>;
  let headers: Record<string, string>;
  let timeout: number | undefined;
  try {
    fields = parseFieldOptions(options.field);
    headers = parseHeaderOptions(options.header);
    timeout = parseTimeout(options.timeout);
  } catch (err) {
    error(describeCause(err));
    return 1;
  }

  if (files.length === 0 && fields.length === 0) {
    error("Nothing to send.");
    hint("Pass at least one file or --field key=value.");
    return 1;
  }

  info(
    `Sending ${fields.length} field(s) and ${files.length} file(s) to ${url}`
  );

  let response: Response;
  try {
    const builder = new MultipartBuilder();
    for (const [name, value] of fields) {
      builder.addText(name, value);
    }
    for (const file of files) {
      builder.addFile(options.name ?? fileNameOf(file) ?? "file", file);
    }
    response = await sendMultipartBody(
      createRequest(url, { headers, timeout }),
      builder.finish()
    );
  } catch (err) {
    error(describeCause(err));
    return 1;
  }

  const status = `${response.status} ${response.statusText}`.trim();
  if (response.ok) {
    success(status);
  } else {
    error(status);
  }

  let body: string;
  try {
    body = await response.text();
  } catch (err) {
    error(`Failed to read response body: ${describeCause(err)}`);
    return 1;
  }
  if (body) {
    console.log(body);
  }

  return response.ok ? 0 : 1;
};
