import { z } from "zod";
import { Result, ok, err } from "@ocr-structure/types";
import { MalformedTokenError } from "../../shared/errors/MalformedTokenError.js";

const Coordinate = z.number().int().nonnegative();

export const BoundingBoxSchema = z.object({
  x: Coordinate,
  y: Coordinate,
  width: Coordinate,
  height: Coordinate,
});

/**
 * A recognized text fragment as reported by the engine. Confidence uses the
 * engine's 0-100 scale; geometry is in pixels, origin top-left.
 */
export const TokenSchema = BoundingBoxSchema.extend({
  text: z.string(),
  confidence: z.number().finite(),
});

export type BoundingBox = z.infer<typeof BoundingBoxSchema>;
export type Token = z.infer<typeof TokenSchema>;

/**
 * Validates raw engine payloads. The first invalid payload fails the whole
 * batch; there is no per-token recovery.
 */
export function parseTokens(
  payloads: readonly unknown[],
): Result<Token[], MalformedTokenError> {
  const tokens: Token[] = [];

  for (const [index, payload] of payloads.entries()) {
    const parsed = TokenSchema.safeParse(payload);
    if (!parsed.success) {
      return err(
        new MalformedTokenError(
          index,
          parsed.error.issues.map(
            (issue) => `${issue.path.join(".") || "token"}: ${issue.message}`,
          ),
        ),
      );
    }
    tokens.push(parsed.data);
  }

  return ok(tokens);
}

export function toBoundingBox(token: Token): BoundingBox {
  return {
    x: token.x,
    y: token.y,
    width: token.width,
    height: token.height,
  };
}
