import type { LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * `pretty` and `compact` go through pino-pretty; `json` is raw pino output.
 */
export type LogFormat = "json" | "pretty" | "compact";

export type LoggerConfig = LoggerOptions & {
  /** Bound as `service` on every line */
  service?: string;
  environment?: string;
  /** Forces pino-pretty on or off regardless of the format */
  prettyPrint?: boolean;
  /** Read LOG_LEVEL and LOGGING_* from the environment (default true) */
  useEnvConfig?: boolean;
};

export type LogContext = Record<string, unknown>;

export type LoggingConfig = {
  level: string;
  format: LogFormat;
  includeCaller: boolean;
  colorize: boolean;
  singleLine: boolean;
  translateTime: string | boolean;
  /** 0..1; applies to trace through warn */
  sampleRate: number;
};
