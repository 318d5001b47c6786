import {
  Result,
  ok,
  err,
  isErr,
  map,
  mapErr,
  ValidationError,
} from "@ocr-structure/types";
import { ConfidenceScore } from "./ConfidenceScore.value-object.js";
import { RecognitionProfile } from "./RecognitionProfile.value-object.js";

export type ExtractionConfigProps = {
  language: string;
  profile: string;
  confidenceThreshold: number;
};

/**
 * Value object holding the per-call extraction settings.
 * The profile name is kept as given; unknown names run with default flags.
 */
export class ExtractionConfig {
  private constructor(private readonly props: ExtractionConfigProps) {}

  private static readonly DEFAULT_CONFIG: ExtractionConfigProps = {
    language: "eng",
    profile: "default",
    confidenceThreshold: 60,
  };

  /**
   * Creates an ExtractionConfig with validation.
   */
  static create(
    props: Partial<ExtractionConfigProps>,
  ): Result<ExtractionConfig, ValidationError> {
    const config: ExtractionConfigProps = {
      language: props.language ?? this.DEFAULT_CONFIG.language,
      profile: props.profile ?? this.DEFAULT_CONFIG.profile,
      confidenceThreshold:
        props.confidenceThreshold ?? this.DEFAULT_CONFIG.confidenceThreshold,
    };

    const validationResult = this.validate(config);
    if (isErr(validationResult)) {
      return err(validationResult.error);
    }

    return ok(new ExtractionConfig(config));
  }

  static default(): ExtractionConfig {
    return new ExtractionConfig({ ...this.DEFAULT_CONFIG });
  }

  private static validate(
    config: ExtractionConfigProps,
  ): Result<void, ValidationError> {
    if (config.language.trim().length === 0) {
      return err(
        new ValidationError("Language cannot be empty", {
          field: "language",
          value: config.language,
        }),
      );
    }

    if (config.profile.trim().length === 0) {
      return err(
        new ValidationError("Profile cannot be empty", {
          field: "profile",
          value: config.profile,
        }),
      );
    }

    return mapErr(
      map(ConfidenceScore.create(config.confidenceThreshold), () => undefined),
      () =>
        new ValidationError("Confidence threshold must be between 0 and 100", {
          field: "confidenceThreshold",
          value: config.confidenceThreshold,
        }),
    );
  }

  /**
   * Returns a copy with the given fields replaced, validated like `create`.
   */
  withOverrides(
    overrides: Partial<ExtractionConfigProps>,
  ): Result<ExtractionConfig, ValidationError> {
    return ExtractionConfig.create({ ...this.props, ...overrides });
  }

  getLanguage(): string {
    return this.props.language;
  }

  getProfileName(): string {
    return this.props.profile;
  }

  getProfile(): RecognitionProfile {
    return RecognitionProfile.resolve(this.props.profile);
  }

  getConfidenceThreshold(): number {
    return this.props.confidenceThreshold;
  }

  toJSON(): ExtractionConfigProps {
    return { ...this.props };
  }
}
