import type { FormpostLogger } from "./types.js";

export type DiagnosticsLog = (message: string, data?: unknown) => void;

export interface DiagnosticsLogOptions {
  diagnostics?: boolean;
  logger?: FormpostLogger;
}

const silent: DiagnosticsLog = () => undefined;

/**
 * Log function for encoder and client internals, tagged with `[component]`.
 * Silent unless `diagnostics` is set; entries go to `logger.info` as
 * structured input when a logger is given, to console.log otherwise.
 */
export function createDiagnosticsLog(
  component: string,
  { diagnostics, logger }: DiagnosticsLogOptions
): DiagnosticsLog {
  if (!diagnostics) {
    return silent;
  }

  if (logger) {
    return (message, data) => {
      logger.info({
        atFunction: component,
        message: `[${component}] ${message}`,
        data,
      });
    };
  }

  return (message, data) => {
    console.log(`[${component}] ${message}`, data ?? "");
  };
}
