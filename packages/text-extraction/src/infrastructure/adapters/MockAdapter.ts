import { InfrastructureError, Result, err, ok } from "@ocr-structure/types";
import {
  ImageInput,
  RecognitionAdapter,
  RecognitionRequest,
} from "./RecognitionAdapter.interface.js";

export type MockAdapterOptions = {
  tokens?: unknown[];
  tokensByLanguage?: Record<string, unknown[]>;
  failWith?: InfrastructureError;
  languages?: string[];
};

export type MockRecognitionCall = {
  image: ImageInput;
  language: string;
  profile: string;
  flags: string;
};

const SAMPLE_TOKENS: unknown[] = [
  { text: "Sample", confidence: 95, x: 10, y: 10, width: 60, height: 20 },
  { text: "text", confidence: 93, x: 80, y: 10, width: 40, height: 20 },
];

/**
 * Mock adapter for tests and offline runs.
 * Returns fixed payloads without calling an engine and records each call.
 */
export class MockAdapter implements RecognitionAdapter {
  readonly calls: MockRecognitionCall[] = [];

  constructor(private readonly options: MockAdapterOptions = {}) {}

  getProviderName(): string {
    return "Mock";
  }

  async recognize(
    image: ImageInput,
    request: RecognitionRequest,
  ): Promise<Result<unknown[], InfrastructureError>> {
    this.calls.push({
      image,
      language: request.language,
      profile: request.profile.getName(),
      flags: request.profile.getFlags(),
    });

    if (this.options.failWith) {
      return err(this.options.failWith);
    }

    const byLanguage = this.options.tokensByLanguage?.[request.language];
    return ok([...(byLanguage ?? this.options.tokens ?? SAMPLE_TOKENS)]);
  }

  async getAvailableLanguages(): Promise<Result<string[], InfrastructureError>> {
    if (this.options.failWith) {
      return err(this.options.failWith);
    }
    return ok(this.options.languages ?? ["eng", "osd"]);
  }
}
