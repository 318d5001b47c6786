/**
 * @ocr-structure/logging
 * Structured logging with Pino
 */

export { Logger } from "./core/logger.js";
export { getLoggingConfig, getDefaultConfig } from "./core/config.js";

export type {
  LoggerConfig,
  LogContext,
  LoggingConfig,
  LogLevel,
  LogFormat,
} from "./core/types.js";

export { shouldSample, parseSampleRate } from "./utils/sampling.js";
export { normalizeError } from "./utils/error.js";
export type { NormalizedError } from "./utils/error.js";

export {
  createPrettyOptions,
  createPrettyTransport,
} from "./formatters/pretty.js";

export type { Logger as PinoLogger, LoggerOptions } from "pino";

import { Logger } from "./core/logger.js";
import type { LoggerConfig } from "./core/types.js";

/**
 * Create a new logger instance with the given configuration
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}
