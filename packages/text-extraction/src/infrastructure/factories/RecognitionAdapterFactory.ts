import { z } from "zod";
import { Result, ValidationError, err, ok } from "@ocr-structure/types";
import { RecognitionAdapter } from "../adapters/RecognitionAdapter.interface.js";
import { TesseractAdapter } from "../adapters/TesseractAdapter.js";
import { MockAdapter } from "../adapters/MockAdapter.js";
import { TesseractClient } from "../clients/TesseractClient.js";

export type RecognitionAdapterType = "tesseract" | "mock";

export type RecognitionAdapterConfig = {
  type: RecognitionAdapterType;
  binaryPath?: string;
  timeoutMs?: number;
};

const EnvSchema = z.object({
  OCR_ADAPTER_TYPE: z.enum(["tesseract", "mock"]).default("tesseract"),
  TESSERACT_PATH: z.string().min(1).default("tesseract"),
  TESSERACT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

/**
 * Factory for creating recognition adapters.
 */
export class RecognitionAdapterFactory {
  static create(config: RecognitionAdapterConfig): RecognitionAdapter {
    switch (config.type) {
      case "tesseract":
        return new TesseractAdapter(
          new TesseractClient({
            binaryPath: config.binaryPath,
            timeoutMs: config.timeoutMs,
          }),
        );

      case "mock":
        return new MockAdapter();
    }
  }

  /**
   * Creates an adapter from `OCR_ADAPTER_TYPE`, `TESSERACT_PATH` and
   * `TESSERACT_TIMEOUT_MS`.
   */
  static createFromEnv(
    env: NodeJS.ProcessEnv = process.env,
  ): Result<RecognitionAdapter, ValidationError> {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
      return err(
        new ValidationError("Invalid recognition adapter environment", {
          issues: parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
          ),
        }),
      );
    }

    return ok(
      this.create({
        type: parsed.data.OCR_ADAPTER_TYPE,
        binaryPath: parsed.data.TESSERACT_PATH,
        timeoutMs: parsed.data.TESSERACT_TIMEOUT_MS,
      }),
    );
  }
}
