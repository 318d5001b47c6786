import { Result, ok, err, ValidationError } from "@ocr-structure/types";
import { BoundingBox } from "./Token.entity.js";
import { ParagraphMetrics } from "./TextAnalysis.entity.js";
import { ConfidenceScore } from "../value-objects/ConfidenceScore.value-object.js";

export type ExtractionResultProps = {
  text: string;
  lines: string[];
  confidenceScores: number[];
  boundingBoxes: BoundingBox[];
  language: string;
  config: string;
};

type State = ExtractionResultProps & {
  error?: string;
  paragraphMetrics?: ParagraphMetrics;
};

/**
 * Outcome of one extraction call. A failed result keeps the requested
 * language and profile and nothing else; a successful one may still have
 * empty text when no token survived filtering.
 */
export class ExtractionResult {
  private constructor(private readonly state: State) {}

  /**
   * Creates a successful result. Confidence scores and bounding boxes are
   * per token and must line up.
   */
  static create(
    props: ExtractionResultProps,
  ): Result<ExtractionResult, ValidationError> {
    if (props.confidenceScores.length !== props.boundingBoxes.length) {
      return err(
        new ValidationError(
          "Confidence scores and bounding boxes must have the same length",
          {
            field: "confidenceScores",
            confidenceScores: props.confidenceScores.length,
            boundingBoxes: props.boundingBoxes.length,
          },
        ),
      );
    }

    return ok(
      new ExtractionResult({
        ...props,
        lines: [...props.lines],
        confidenceScores: [...props.confidenceScores],
        boundingBoxes: [...props.boundingBoxes],
      }),
    );
  }

  static failure(
    language: string,
    config: string,
    message: string,
  ): ExtractionResult {
    return new ExtractionResult({
      text: "",
      lines: [],
      confidenceScores: [],
      boundingBoxes: [],
      language,
      config,
      error: message,
    });
  }

  isSuccess(): boolean {
    return this.state.error === undefined;
  }

  getText(): string {
    return this.state.text;
  }

  getLines(): string[] {
    return [...this.state.lines];
  }

  getConfidenceScores(): number[] {
    return [...this.state.confidenceScores];
  }

  getBoundingBoxes(): BoundingBox[] {
    return [...this.state.boundingBoxes];
  }

  /**
   * Mean of the per-token scores, 0 when there are none.
   */
  getConfidence(): number {
    return ConfidenceScore.average(this.state.confidenceScores);
  }

  getLanguage(): string {
    return this.state.language;
  }

  getConfig(): string {
    return this.state.config;
  }

  getError(): string | undefined {
    return this.state.error;
  }

  getParagraphMetrics(): ParagraphMetrics | undefined {
    return this.state.paragraphMetrics;
  }

  withText(text: string): ExtractionResult {
    return new ExtractionResult({ ...this.state, text });
  }

  withParagraphMetrics(metrics: ParagraphMetrics): ExtractionResult {
    return new ExtractionResult({ ...this.state, paragraphMetrics: metrics });
  }
}
