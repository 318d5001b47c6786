/**
 * Error normalization for catch blocks, where the caught value is `unknown`.
 */

export type NormalizedError = {
  error: Error;
  message: string;
};

/**
 * Normalizes an unknown thrown value into an Error and its message.
 *
 * @example
 * ```typescript
 * try {
 *   parser.parse(output);
 * } catch (error) {
 *   const { error: normalizedError, message } = normalizeError(error);
 *   logger.error("Parsing failed", normalizedError, { errorMessage: message });
 * }
 * ```
 */
export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    return { error, message: error.message };
  }
  const message = String(error);
  return { error: new Error(message), message };
}
