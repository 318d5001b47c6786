import { Result, ok, err, ValidationError } from "@ocr-structure/types";

export type ConfidenceLevel = "low" | "medium" | "high";

/**
 * Value object representing an engine confidence on the 0-100 scale.
 */
export class ConfidenceScore {
  private constructor(private readonly value: number) {}

  private static readonly MIN_SCORE = 0;
  private static readonly MAX_SCORE = 100;
  private static readonly LOW_THRESHOLD = 70;
  private static readonly HIGH_THRESHOLD = 90;

  /**
   * Creates a ConfidenceScore from a numeric value.
   */
  static create(score: number): Result<ConfidenceScore, ValidationError> {
    if (isNaN(score) || !isFinite(score)) {
      return err(
        new ValidationError("Confidence score must be a valid number", {
          field: "score",
          value: score,
        }),
      );
    }

    if (score < this.MIN_SCORE || score > this.MAX_SCORE) {
      return err(
        new ValidationError("Confidence score must be between 0 and 100", {
          field: "score",
          value: score,
          min: this.MIN_SCORE,
          max: this.MAX_SCORE,
        }),
      );
    }

    return ok(new ConfidenceScore(score));
  }

  /**
   * Arithmetic mean of the given scores, or 0 when there are none.
   */
  static average(scores: readonly number[]): number {
    if (scores.length === 0) {
      return 0;
    }

    const sum = scores.reduce((acc, score) => acc + score, 0);
    return sum / scores.length;
  }

  getValue(): number {
    return this.value;
  }

  /**
   * Returns the confidence level based on thresholds.
   */
  getLevel(): ConfidenceLevel {
    if (this.value < ConfidenceScore.LOW_THRESHOLD) {
      return "low";
    }
    if (this.value < ConfidenceScore.HIGH_THRESHOLD) {
      return "medium";
    }
    return "high";
  }

  /**
   * Rounded to one decimal, for display.
   */
  toDisplayString(): string {
    return `${this.value.toFixed(1)}%`;
  }
}
