import type {
  StructuredData,
  TextStatistics,
} from "../../domain/entities/TextAnalysis.entity.js";

export type TextAnalysisDto = {
  cleanedText: string;
  structuredData: StructuredData;
  statistics: TextStatistics;
};
