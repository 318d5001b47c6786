import { EntityExtractor } from "../../domain/services/EntityExtractor.service.js";
import { StatisticsCalculator } from "../../domain/services/StatisticsCalculator.service.js";
import {
  NormalizationOptions,
  TextNormalizer,
} from "../../domain/services/TextNormalizer.service.js";
import { TextAnalysisDto } from "../dto/TextAnalysis.dto.js";

/**
 * Use case for analyzing an extracted text. Entities and statistics are
 * computed on the text as given, not on the cleaned text.
 */
export class AnalyzeTextUseCase {
  constructor(
    private readonly normalizer: TextNormalizer = new TextNormalizer(),
    private readonly entityExtractor: EntityExtractor = new EntityExtractor(),
    private readonly statistics: StatisticsCalculator = new StatisticsCalculator(),
  ) {}

  execute(text: string, options: NormalizationOptions = {}): TextAnalysisDto {
    return {
      cleanedText: this.normalizer.clean(text, options),
      structuredData: this.entityExtractor.extract(text),
      statistics: this.statistics.getWordCount(text),
    };
  }
}
