/**
 * @ocr-structure/text-extraction
 * Rebuilds lines, paragraphs, statistics and entities from OCR word tokens
 */

// Domain
export {
  TokenSchema,
  BoundingBoxSchema,
  parseTokens,
  toBoundingBox,
} from "./domain/entities/Token.entity.js";
export type { Token, BoundingBox } from "./domain/entities/Token.entity.js";
export { ExtractionResult } from "./domain/entities/ExtractionResult.entity.js";
export type { ExtractionResultProps } from "./domain/entities/ExtractionResult.entity.js";
export type {
  StructuredData,
  TextStatistics,
  ParagraphMetrics,
} from "./domain/entities/TextAnalysis.entity.js";

export { ConfidenceScore } from "./domain/value-objects/ConfidenceScore.value-object.js";
export type { ConfidenceLevel } from "./domain/value-objects/ConfidenceScore.value-object.js";
export { RecognitionProfile } from "./domain/value-objects/RecognitionProfile.value-object.js";
export type { RecognitionProfileName } from "./domain/value-objects/RecognitionProfile.value-object.js";
export { LanguageCode } from "./domain/value-objects/LanguageCode.value-object.js";
export type { LanguageEntry } from "./domain/value-objects/LanguageCode.value-object.js";
export { ExtractionConfig } from "./domain/value-objects/ExtractionConfig.value-object.js";
export type { ExtractionConfigProps } from "./domain/value-objects/ExtractionConfig.value-object.js";

export { TokenFilter } from "./domain/services/TokenFilter.service.js";
export { LineAssembler } from "./domain/services/LineAssembler.service.js";
export type { AssembledLines } from "./domain/services/LineAssembler.service.js";
export { ParagraphAssembler } from "./domain/services/ParagraphAssembler.service.js";
export { TextNormalizer } from "./domain/services/TextNormalizer.service.js";
export type { NormalizationOptions } from "./domain/services/TextNormalizer.service.js";
export { EntityExtractor } from "./domain/services/EntityExtractor.service.js";
export { StatisticsCalculator } from "./domain/services/StatisticsCalculator.service.js";
export { TextReconstructor } from "./domain/services/TextReconstructor.service.js";

// Application
export { ExtractTextUseCase } from "./application/use-cases/ExtractText.use-case.js";
export {
  DetectLanguageUseCase,
  CANDIDATE_LANGUAGES,
} from "./application/use-cases/DetectLanguage.use-case.js";
export { AnalyzeTextUseCase } from "./application/use-cases/AnalyzeText.use-case.js";
export { ListLanguagesUseCase } from "./application/use-cases/ListLanguages.use-case.js";
export type { AvailableLanguage } from "./application/use-cases/ListLanguages.use-case.js";
export { toExtractionResultDto } from "./application/dto/ExtractionResult.dto.js";
export type {
  ExtractionResultDto,
  TokenBoxDto,
} from "./application/dto/ExtractionResult.dto.js";
export type { ExtractionOptionsDto } from "./application/dto/ExtractionOptions.dto.js";
export type { TextAnalysisDto } from "./application/dto/TextAnalysis.dto.js";

// Infrastructure
export type {
  RecognitionAdapter,
  RecognitionRequest,
  ImageInput,
} from "./infrastructure/adapters/RecognitionAdapter.interface.js";
export { TesseractAdapter } from "./infrastructure/adapters/TesseractAdapter.js";
export { MockAdapter } from "./infrastructure/adapters/MockAdapter.js";
export type {
  MockAdapterOptions,
  MockRecognitionCall,
} from "./infrastructure/adapters/MockAdapter.js";
export { TesseractClient } from "./infrastructure/clients/TesseractClient.js";
export type { TesseractClientOptions } from "./infrastructure/clients/TesseractClient.js";
export { SpawnProcessRunner } from "./infrastructure/clients/ProcessRunner.js";
export type {
  ProcessRunner,
  ProcessOutput,
  RunOptions,
} from "./infrastructure/clients/ProcessRunner.js";
export { TsvResponseParser } from "./infrastructure/parsers/TsvResponseParser.js";
export type { TokenPayload } from "./infrastructure/parsers/TsvResponseParser.js";
export { RecognitionAdapterFactory } from "./infrastructure/factories/RecognitionAdapterFactory.js";
export type {
  RecognitionAdapterType,
  RecognitionAdapterConfig,
} from "./infrastructure/factories/RecognitionAdapterFactory.js";

// Shared
export { RecognitionError, MalformedTokenError } from "./shared/errors/index.js";

export { formatReport } from "./cli/format-report.js";
