import { isErr } from "@ocr-structure/types";
import { createLogger } from "@ocr-structure/logging";
import { LanguageCode } from "../../domain/value-objects/LanguageCode.value-object.js";
import { RecognitionAdapter } from "../../infrastructure/adapters/RecognitionAdapter.interface.js";

const logger = createLogger({ service: "text-extraction" }).child({
  module: "ListLanguagesUseCase",
});

export type AvailableLanguage = {
  code: string;
  name: string;
};

/**
 * Languages installed for the engine, with display names. Falls back to
 * English when the engine cannot be asked.
 */
export class ListLanguagesUseCase {
  constructor(private readonly adapter: RecognitionAdapter) {}

  async execute(): Promise<AvailableLanguage[]> {
    const result = await this.adapter.getAvailableLanguages();

    if (isErr(result)) {
      logger.warn("Could not list engine languages", {
        errorMessage: result.error.message,
      });
    }

    const codes =
      isErr(result) || result.value.length === 0 ? ["eng"] : result.value;

    return codes.map((code) => ({ code, name: LanguageCode.getName(code) }));
  }
}
