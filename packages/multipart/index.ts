export {
  BOUNDARY_PREFIX,
  BOUNDARY_TOKEN_LENGTH,
  boundaryParameter,
  cryptoRandom,
  generateBoundaryToken,
  multipartContentType,
} from "./encoder/boundary.js";
export {
  COPY_CHUNK_SIZE,
  escapeHeaderParam,
  MultipartBuilder,
} from "./encoder/builder.js";
export {
  describeCause,
  isMultipartError,
  MultipartError,
  type MultipartErrorKind,
} from "./encoder/errors.js";
export { MemorySink } from "./encoder/sinks.js";
export {
  bytesSource,
  fileDescriptorSource,
  isByteSource,
  iterableSource,
  toByteSource,
} from "./encoder/sources.js";
export type {
  ByteSink,
  ByteSource,
  MultipartBody,
  MultipartBuilderOptions,
  RandomSource,
  StreamInput,
} from "./encoder/types.js";
export {
  type FilePath,
  fileNameOf,
  inferContentType,
  OCTET_STREAM,
  toFsPath,
  withOpenFile,
} from "./files/file-field.js";
export {
  type DiagnosticsLog,
  type DiagnosticsLogOptions,
  createDiagnosticsLog,
} from "./utils/diagnostics-log.js";
export type { FormpostLogger, LogInput } from "./utils/types.js";
