import { createLogger } from "@ocr-structure/logging";
import { ImageInput } from "../../infrastructure/adapters/RecognitionAdapter.interface.js";
import { ExtractTextUseCase } from "./ExtractText.use-case.js";

const logger = createLogger({ service: "text-extraction" }).child({
  module: "DetectLanguageUseCase",
});

export const CANDIDATE_LANGUAGES = [
  "eng",
  "fra",
  "deu",
  "spa",
  "ita",
  "por",
  "rus",
  "chi_sim",
  "jpn",
  "kor",
] as const;

const FALLBACK_LANGUAGE = "eng";
const MIN_CONFIDENCE = 30;

/**
 * Picks the language whose extraction has the highest mean confidence.
 * Runs one extraction per candidate with no confidence threshold.
 */
export class DetectLanguageUseCase {
  constructor(
    private readonly extractText: ExtractTextUseCase,
    private readonly candidates: readonly string[] = CANDIDATE_LANGUAGES,
  ) {}

  async execute(image: ImageInput): Promise<string> {
    let bestLanguage = FALLBACK_LANGUAGE;
    let bestConfidence = 0;

    for (const language of this.candidates) {
      const result = await this.extractText.execute(image, {
        language,
        confidenceThreshold: 0,
      });

      if (result.success && result.confidence > bestConfidence) {
        bestConfidence = result.confidence;
        bestLanguage = language;
      }
    }

    if (bestConfidence <= MIN_CONFIDENCE) {
      logger.info("No confident language, using fallback", {
        bestConfidence,
        fallback: FALLBACK_LANGUAGE,
      });
      return FALLBACK_LANGUAGE;
    }

    logger.info("Detected language", {
      language: bestLanguage,
      confidence: bestConfidence,
    });
    return bestLanguage;
  }
}
