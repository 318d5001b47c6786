import { InfrastructureError, Result, isErr, ok } from "@ocr-structure/types";
import { createLogger } from "@ocr-structure/logging";
import { TesseractClient } from "../clients/TesseractClient.js";
import { TsvResponseParser } from "../parsers/TsvResponseParser.js";
import {
  ImageInput,
  RecognitionAdapter,
  RecognitionRequest,
} from "./RecognitionAdapter.interface.js";

const logger = createLogger({ service: "text-extraction" }).child({
  module: "TesseractAdapter",
});

export class TesseractAdapter implements RecognitionAdapter {
  constructor(
    private readonly client: TesseractClient = new TesseractClient(),
    private readonly parser: TsvResponseParser = new TsvResponseParser(),
  ) {}

  getProviderName(): string {
    return "Tesseract";
  }

  async recognize(
    image: ImageInput,
    request: RecognitionRequest,
  ): Promise<Result<unknown[], InfrastructureError>> {
    const tsv = await this.client.recognizeTsv(
      image,
      request.language,
      request.profile.getArgs(),
    );
    if (isErr(tsv)) {
      return tsv;
    }

    const payloads = this.parser.parse(tsv.value);
    if (isErr(payloads)) {
      return payloads;
    }

    logger.debug("Parsed recognition output", {
      words: payloads.value.length,
      profile: request.profile.getName(),
    });

    return ok(payloads.value);
  }

  getAvailableLanguages(): Promise<Result<string[], InfrastructureError>> {
    return this.client.listLanguages();
  }
}
