/**
 * Base error class with a machine-readable code and structured context
 */
export abstract class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Domain errors - invalid input or configuration
 */
export class ValidationError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
  }
}

/**
 * Infrastructure errors - external programs and services
 */
export class InfrastructureError extends BaseError {
  constructor(
    message: string,
    code: string = "INFRASTRUCTURE_ERROR",
    context?: Record<string, unknown>,
  ) {
    super(message, code, context);
  }
}

export class ExternalServiceError extends InfrastructureError {
  constructor(
    public readonly service: string,
    message: string,
    public readonly exitCode?: number,
    context?: Record<string, unknown>,
  ) {
    super(message, "EXTERNAL_SERVICE_ERROR", {
      ...context,
      service,
      exitCode,
    });
  }
}

export class TimeoutError extends InfrastructureError {
  constructor(
    public readonly timeout: number,
    public readonly operation: string,
    context?: Record<string, unknown>,
  ) {
    super(`Operation ${operation} timed out after ${timeout}ms`, "TIMEOUT", {
      ...context,
      timeout,
      operation,
    });
  }
}
