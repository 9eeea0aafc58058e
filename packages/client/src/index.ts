export {
  createUploadClient,
  joinUrl,
  type UploadClientConfig,
  uploadClientConfigSchema,
} from "./create-client.js";
export {
  createRequest,
  FetchRequest,
  sendMultipartBody,
  sendMultipartFile,
  sendMultipartFiles,
} from "./request.js";
export { type SafeResult, safeTry } from "./safe-try.js";
export type {
  ClientResult,
  FetchLike,
  FetchRequestOptions,
  OutgoingRequest,
  UploadClient,
  UploadClientHooks,
  UploadParams,
  UploadResponse,
} from "./types.js";
