import type { TransportSingleOptions } from "pino";
import type { PrettyOptions } from "pino-pretty";
import type { LoggingConfig } from "../core/types.js";

const MESSAGE_FORMATS: Record<LoggingConfig["format"], string> = {
  json: "{msg}",
  pretty: "{msg}",
  compact: "{service} | {module} | {msg}",
};

/**
 * pino-pretty options for the given config. Compact output is always one
 * line, prefixed with the service and module bindings.
 */
export function createPrettyOptions(config: LoggingConfig): PrettyOptions {
  return {
    colorize: config.colorize,
    translateTime: config.translateTime,
    ignore: "pid,hostname",
    singleLine: config.format === "compact" || config.singleLine,
    messageFormat: MESSAGE_FORMATS[config.format],
    errorLikeObjectKeys: ["err", "error"],
  };
}

export function createPrettyTransport(
  config: LoggingConfig,
): TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: { ...createPrettyOptions(config) },
  };
}
