import type { LogFormat, LoggingConfig } from "./types.js";
import { parseSampleRate } from "../utils/sampling.js";

const LOG_FORMATS: readonly LogFormat[] = ["json", "pretty", "compact"];

function parseLogFormat(value?: string): LogFormat | undefined {
  return LOG_FORMATS.find((format) => format === value);
}

/**
 * Parse environment variables to create logging configuration
 */
export function getLoggingConfig(
  env: NodeJS.ProcessEnv = process.env,
): LoggingConfig {
  // Default to development (pretty) if NODE_ENV is not set
  const isDevelopment = !env.NODE_ENV || env.NODE_ENV === "development";

  return {
    level: env.LOG_LEVEL || "info",
    format:
      parseLogFormat(env.LOGGING_OUTPUT_FORMAT) ||
      (isDevelopment ? "pretty" : "json"),

    includeCaller: env.LOGGING_INCLUDE_CALLER === "true",

    colorize: env.LOGGING_COLOR !== "false",
    singleLine: env.LOGGING_SINGLE_LINE === "true",
    translateTime: env.LOGGING_TRANSLATE_TIME || "SYS:standard",

    sampleRate: parseSampleRate(env.LOGGING_SAMPLE_RATE),
  };
}

/**
 * Create default configuration
 */
export function getDefaultConfig(): LoggingConfig {
  return {
    level: "info",
    format: "json",
    includeCaller: false,
    colorize: true,
    singleLine: false,
    translateTime: "SYS:standard",
    sampleRate: 1,
  };
}
