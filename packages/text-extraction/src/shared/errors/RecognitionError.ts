import { ExternalServiceError } from "@ocr-structure/types";

/**
 * The recognition engine could not produce tokens for an image.
 */
export class RecognitionError extends ExternalServiceError {
  constructor(
    engine: string,
    message: string,
    exitCode?: number,
    context?: Record<string, unknown>,
  ) {
    super(engine, message, exitCode, context);
    this.name = "RecognitionError";
  }
}
