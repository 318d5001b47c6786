import { ValidationError } from "@ocr-structure/types";

/**
 * A token payload from the engine is missing a field or carries a value of
 * the wrong type. Fails the whole extraction call.
 */
export class MalformedTokenError extends ValidationError {
  constructor(
    public readonly index: number,
    public readonly issues: string[],
  ) {
    super(`Malformed token at index ${index}: ${issues.join("; ")}`, {
      index,
      issues,
    });
    this.name = "MalformedTokenError";
  }
}
