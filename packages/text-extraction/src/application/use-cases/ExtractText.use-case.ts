import { isErr } from "@ocr-structure/types";
import { createLogger, normalizeError } from "@ocr-structure/logging";
import { parseTokens } from "../../domain/entities/Token.entity.js";
import { ExtractionResult } from "../../domain/entities/ExtractionResult.entity.js";
import { ExtractionConfig } from "../../domain/value-objects/ExtractionConfig.value-object.js";
import { TextReconstructor } from "../../domain/services/TextReconstructor.service.js";
import { ParagraphAssembler } from "../../domain/services/ParagraphAssembler.service.js";
import { StatisticsCalculator } from "../../domain/services/StatisticsCalculator.service.js";
import {
  ImageInput,
  RecognitionAdapter,
} from "../../infrastructure/adapters/RecognitionAdapter.interface.js";
import { ExtractionOptionsDto } from "../dto/ExtractionOptions.dto.js";
import {
  ExtractionResultDto,
  TokenBoxDto,
  toExtractionResultDto,
} from "../dto/ExtractionResult.dto.js";

const logger = createLogger({ service: "text-extraction" }).child({
  module: "ExtractTextUseCase",
});

const DOCUMENT_PROFILE = "document";

/**
 * Use case for extracting text from an image.
 * Every entry point returns a result shape; none of them throws.
 */
export class ExtractTextUseCase {
  constructor(
    private readonly adapter: RecognitionAdapter,
    private readonly reconstructor: TextReconstructor = new TextReconstructor(),
    private readonly paragraphAssembler: ParagraphAssembler = new ParagraphAssembler(),
    private readonly statistics: StatisticsCalculator = new StatisticsCalculator(),
  ) {}

  async execute(
    image: ImageInput,
    options: ExtractionOptionsDto = {},
  ): Promise<ExtractionResultDto> {
    return toExtractionResultDto(await this.extract(image, options));
  }

  /**
   * Runs the document profile and reflows the text into paragraphs.
   */
  async executeLongText(
    image: ImageInput,
    options: ExtractionOptionsDto = {},
  ): Promise<ExtractionResultDto> {
    return toExtractionResultDto(await this.extractDocument(image, options));
  }

  /**
   * Like {@link executeLongText}, plus paragraph count and average
   * paragraph length in words.
   */
  async executeOptimizedForParagraphs(
    image: ImageInput,
    options: ExtractionOptionsDto = {},
  ): Promise<ExtractionResultDto> {
    const result = await this.extractDocument(image, options);
    if (!result.isSuccess()) {
      return toExtractionResultDto(result);
    }

    return toExtractionResultDto(
      result.withParagraphMetrics(
        this.statistics.getParagraphMetrics(result.getText()),
      ),
    );
  }

  /**
   * Every recognized word with a positive confidence, with its box.
   * The threshold is not applied. Any failure yields an empty list.
   */
  async executeWithBoxes(
    image: ImageInput,
    options: ExtractionOptionsDto = {},
  ): Promise<TokenBoxDto[]> {
    // The threshold is not applied here, so it is not validated either.
    const configResult = ExtractionConfig.create({
      language: options.language,
      profile: options.profile,
    });
    if (isErr(configResult)) {
      logger.warn("Invalid extraction options", {
        errorMessage: configResult.error.message,
      });
      return [];
    }
    const config = configResult.value;

    try {
      const payloads = await this.adapter.recognize(image, {
        language: config.getLanguage(),
        profile: config.getProfile(),
      });
      if (isErr(payloads)) {
        logger.warn("Recognition failed", {
          errorMessage: payloads.error.message,
        });
        return [];
      }

      const tokens = parseTokens(payloads.value);
      if (isErr(tokens)) {
        logger.warn("Rejected malformed token payload", {
          errorMessage: tokens.error.message,
        });
        return [];
      }

      return tokens.value
        .filter(
          (token) => token.confidence > 0 && token.text.trim().length > 0,
        )
        .map((token) => ({
          text: token.text.trim(),
          confidence: token.confidence,
          bbox: {
            x: token.x,
            y: token.y,
            width: token.width,
            height: token.height,
          },
        }));
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      logger.error("Box extraction failed", normalizedError, {
        errorMessage: message,
      });
      return [];
    }
  }

  private async extractDocument(
    image: ImageInput,
    options: ExtractionOptionsDto,
  ): Promise<ExtractionResult> {
    const result = await this.extract(image, {
      ...options,
      profile: DOCUMENT_PROFILE,
    });
    if (!result.isSuccess()) {
      return result;
    }

    return result.withText(
      this.paragraphAssembler.improveFormatting(result.getText()),
    );
  }

  private async extract(
    image: ImageInput,
    options: ExtractionOptionsDto,
  ): Promise<ExtractionResult> {
    const language = options.language ?? "eng";
    const profile = options.profile ?? "default";

    const configResult = ExtractionConfig.create(options);
    if (isErr(configResult)) {
      logger.warn("Invalid extraction options", {
        errorMessage: configResult.error.message,
        context: configResult.error.context,
      });
      return ExtractionResult.failure(
        language,
        profile,
        configResult.error.message,
      );
    }
    const config = configResult.value;

    logger.info("Starting extraction", {
      provider: this.adapter.getProviderName(),
      language,
      profile,
      confidenceThreshold: config.getConfidenceThreshold(),
    });

    try {
      const payloads = await this.adapter.recognize(image, {
        language: config.getLanguage(),
        profile: config.getProfile(),
      });
      if (isErr(payloads)) {
        logger.warn("Recognition failed", {
          errorMessage: payloads.error.message,
          code: payloads.error.code,
        });
        return ExtractionResult.failure(
          language,
          profile,
          payloads.error.message,
        );
      }

      const result = this.reconstructor.reconstruct(payloads.value, config);

      logger.info("Extraction finished", {
        success: result.isSuccess(),
        lines: result.getLines().length,
        confidence: result.getConfidence(),
      });

      return result;
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      logger.error("Extraction failed", normalizedError, {
        errorMessage: message,
        language,
        profile,
      });
      return ExtractionResult.failure(language, profile, message);
    }
  }
}
