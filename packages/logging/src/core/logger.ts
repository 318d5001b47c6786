import pino from "pino";
import type { Logger as PinoLoggerType, LoggerOptions } from "pino";
import { getLoggingConfig, getDefaultConfig } from "./config.js";
import type { LoggerConfig, LogContext, LoggingConfig } from "./types.js";
import { shouldSample } from "../utils/sampling.js";
import { createPrettyTransport } from "../formatters/pretty.js";

const CALLER_PATTERN = /at\s+(.+)\s+\((.+):(\d+):(\d+)\)/;

/**
 * Build the caller mixin. Skips the Error line, the mixin itself, pino's
 * write path and our level method.
 */
function callerMixin(): LogContext {
  const stack = new Error().stack;
  const callerLine = stack?.split("\n")[4];
  const match = callerLine?.match(CALLER_PATTERN);
  if (!match) {
    return {};
  }
  return {
    caller: {
      function: match[1],
      file: match[2],
      line: parseInt(match[3], 10),
    },
  };
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }
  return error;
}

export class Logger {
  private readonly pinoInstance: PinoLoggerType;
  private readonly config: LoggingConfig;

  /**
   * @param instance - an existing pino logger to wrap; used by {@link child}
   */
  constructor(
    private readonly loggerConfig: LoggerConfig = {},
    instance?: PinoLoggerType,
  ) {
    const {
      service,
      environment,
      prettyPrint,
      useEnvConfig = true,
      ...pinoOptions
    } = loggerConfig;

    this.config = useEnvConfig ? getLoggingConfig() : getDefaultConfig();
    if (loggerConfig.level) this.config.level = loggerConfig.level;

    if (instance) {
      this.pinoInstance = instance;
      return;
    }

    const isDevelopment =
      environment === "development" || process.env.NODE_ENV === "development";

    const shouldPrettyPrint =
      prettyPrint !== undefined
        ? prettyPrint
        : this.config.format === "pretty" ||
          this.config.format === "compact" ||
          (isDevelopment && this.config.format !== "json");

    const options: LoggerOptions = {
      ...pinoOptions,
      level: this.config.level,
      formatters: {
        level: (label) => {
          return { level: label.toUpperCase() };
        },
        ...pinoOptions.formatters,
      },
      base: {
        service: service || "ocr-structure",
        environment: environment || process.env.NODE_ENV || "development",
        pid: process.pid,
        ...pinoOptions.base,
      },
    };

    if (this.config.includeCaller) {
      options.mixin = callerMixin;
    }

    this.pinoInstance = shouldPrettyPrint
      ? pino({ ...options, transport: createPrettyTransport(this.config) })
      : pino(options);
  }

  /**
   * Create a child logger with additional bound context
   */
  child(context: LogContext): Logger {
    return new Logger(this.loggerConfig, this.pinoInstance.child(context));
  }

  trace(message: string, context?: LogContext): void {
    if (shouldSample(this.config.sampleRate)) {
      this.pinoInstance.trace(context || {}, message);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (shouldSample(this.config.sampleRate)) {
      this.pinoInstance.debug(context || {}, message);
    }
  }

  info(message: string, context?: LogContext): void {
    if (shouldSample(this.config.sampleRate)) {
      this.pinoInstance.info(context || {}, message);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (shouldSample(this.config.sampleRate)) {
      this.pinoInstance.warn(context || {}, message);
    }
  }

  /**
   * Log at error level. Errors are never sampled.
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const errorContext: LogContext = { ...context };
    if (error !== undefined) {
      errorContext.error = serializeError(error);
    }
    this.pinoInstance.error(errorContext, message);
  }

  fatal(message: string, error?: unknown, context?: LogContext): void {
    const errorContext: LogContext = { ...context };
    if (error !== undefined) {
      errorContext.error = serializeError(error);
    }
    this.pinoInstance.fatal(errorContext, message);
  }

  getPinoInstance(): PinoLoggerType {
    return this.pinoInstance;
  }

  isLevelEnabled(level: string): boolean {
    return this.pinoInstance.isLevelEnabled(level);
  }

  getConfig(): LoggingConfig {
    return this.config;
  }
}
