import { BoundingBox, Token, toBoundingBox } from "../entities/Token.entity.js";

export type AssembledLines = {
  lines: string[];
  confidenceScores: number[];
  boundingBoxes: BoundingBox[];
};

/**
 * Groups tokens into text lines by vertical position.
 *
 * Tokens must arrive in raster order (top-to-bottom, then left-to-right);
 * this is assumed, not checked. The pass is greedy: a line is referenced on
 * the token that opened it, and a token further than half that token's
 * height away, above or below, starts a new line.
 */
export class LineAssembler {
  private static readonly TOLERANCE_RATIO = 0.5;

  assemble(tokens: readonly Token[]): AssembledLines {
    const lines: string[] = [];
    const confidenceScores: number[] = [];
    const boundingBoxes: BoundingBox[] = [];

    let current: string[] = [];
    let open = false;
    let lineY = 0;
    let lineHeight = 0;

    for (const token of tokens) {
      const text = token.text.trim();
      if (text.length === 0) {
        continue;
      }

      if (!open) {
        open = true;
        lineY = token.y;
        lineHeight = token.height;
      } else if (
        Math.abs(token.y - lineY) >
        lineHeight * LineAssembler.TOLERANCE_RATIO
      ) {
        lines.push(current.join(" "));
        current = [];
        lineY = token.y;
        lineHeight = token.height;
      }

      current.push(text);
      confidenceScores.push(token.confidence);
      boundingBoxes.push(toBoundingBox(token));
    }

    if (current.length > 0) {
      lines.push(current.join(" "));
    }

    return { lines, confidenceScores, boundingBoxes };
  }
}
