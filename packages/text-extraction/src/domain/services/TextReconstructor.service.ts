import { isErr } from "@ocr-structure/types";
import { createLogger, normalizeError } from "@ocr-structure/logging";
import { parseTokens } from "../entities/Token.entity.js";
import { ExtractionResult } from "../entities/ExtractionResult.entity.js";
import { ExtractionConfig } from "../value-objects/ExtractionConfig.value-object.js";
import { TokenFilter } from "./TokenFilter.service.js";
import { LineAssembler } from "./LineAssembler.service.js";
import { ParagraphAssembler } from "./ParagraphAssembler.service.js";

const logger = createLogger({ service: "text-extraction" }).child({
  module: "TextReconstructor",
});

/**
 * Turns raw engine payloads into an extraction result:
 * validate, filter by confidence, group into lines, join into paragraphs.
 *
 * Never throws. Malformed payloads and unexpected faults come back as a
 * failed result carrying the requested language and profile.
 */
export class TextReconstructor {
  constructor(
    private readonly tokenFilter: TokenFilter = new TokenFilter(),
    private readonly lineAssembler: LineAssembler = new LineAssembler(),
    private readonly paragraphAssembler: ParagraphAssembler = new ParagraphAssembler(),
  ) {}

  reconstruct(
    payloads: readonly unknown[],
    config: ExtractionConfig,
  ): ExtractionResult {
    const language = config.getLanguage();
    const profile = config.getProfileName();

    try {
      const tokensResult = parseTokens(payloads);
      if (isErr(tokensResult)) {
        logger.warn("Rejected malformed token payload", {
          index: tokensResult.error.index,
          issues: tokensResult.error.issues,
        });
        return ExtractionResult.failure(
          language,
          profile,
          tokensResult.error.message,
        );
      }

      const kept = this.tokenFilter.filter(
        tokensResult.value,
        config.getConfidenceThreshold(),
      );
      const { lines, confidenceScores, boundingBoxes } =
        this.lineAssembler.assemble(kept);

      const result = ExtractionResult.create({
        text: this.paragraphAssembler.join(lines),
        lines,
        confidenceScores,
        boundingBoxes,
        language,
        config: profile,
      });
      if (isErr(result)) {
        return ExtractionResult.failure(language, profile, result.error.message);
      }

      logger.debug("Reconstructed text", {
        tokens: payloads.length,
        kept: kept.length,
        lines: lines.length,
      });

      return result.value;
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      logger.error("Text reconstruction failed", normalizedError, {
        errorMessage: message,
        language,
        profile,
      });
      return ExtractionResult.failure(language, profile, message);
    }
  }
}
