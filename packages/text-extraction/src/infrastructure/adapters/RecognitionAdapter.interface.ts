import { InfrastructureError, Result } from "@ocr-structure/types";
import { RecognitionProfile } from "../../domain/value-objects/RecognitionProfile.value-object.js";

/**
 * An image file path, or the encoded image bytes.
 */
export type ImageInput = string | Buffer;

export type RecognitionRequest = {
  language: string;
  profile: RecognitionProfile;
};

/**
 * Port to a recognition engine. Allows pluggable engines; the payloads are
 * validated by the caller.
 */
export interface RecognitionAdapter {
  /**
   * Recognizes words in the image, in the engine's reading order.
   */
  recognize(
    image: ImageInput,
    request: RecognitionRequest,
  ): Promise<Result<unknown[], InfrastructureError>>;

  getAvailableLanguages(): Promise<Result<string[], InfrastructureError>>;

  getProviderName(): string;
}
