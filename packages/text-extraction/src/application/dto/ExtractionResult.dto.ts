import type { BoundingBox } from "../../domain/entities/Token.entity.js";
import type { ExtractionResult } from "../../domain/entities/ExtractionResult.entity.js";

/**
 * Output shape of every extraction call. Check `success` before reading
 * `text`; `success: true` with empty text means nothing was detected.
 */
export type ExtractionResultDto = {
  text: string;
  lines: string[];
  confidence: number;
  confidenceScores: number[];
  boundingBoxes: BoundingBox[];
  language: string;
  config: string;
  success: boolean;
  error?: string;
  paragraphCount?: number;
  avgParagraphLength?: number;
};

export type TokenBoxDto = {
  text: string;
  confidence: number;
  bbox: BoundingBox;
};

export function toExtractionResultDto(
  result: ExtractionResult,
): ExtractionResultDto {
  const dto: ExtractionResultDto = {
    text: result.getText(),
    lines: result.getLines(),
    confidence: result.getConfidence(),
    confidenceScores: result.getConfidenceScores(),
    boundingBoxes: result.getBoundingBoxes(),
    language: result.getLanguage(),
    config: result.getConfig(),
    success: result.isSuccess(),
  };

  const error = result.getError();
  if (error !== undefined) {
    dto.error = error;
  }

  const metrics = result.getParagraphMetrics();
  if (metrics) {
    dto.paragraphCount = metrics.paragraphCount;
    dto.avgParagraphLength = metrics.avgParagraphLength;
  }

  return dto;
}
