/** Structured log input shared by every formpost logger call */
export interface LogInput {
  atFunction: string;
  message: string;
  data?: unknown;
}

/**
 * Structured logger accepted by the builder and the upload client.
 * Each method returns the id of the written entry.
 */
export interface FormpostLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}
