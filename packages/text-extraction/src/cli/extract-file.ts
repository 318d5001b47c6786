#!/usr/bin/env tsx
/* eslint-disable no-console */
import { readFileSync, writeFileSync } from "fs";
import { basename, extname, join } from "path";
import dotenv from "dotenv";
import prompts from "prompts";
import { createLogger, normalizeError } from "@ocr-structure/logging";
import { isErr } from "@ocr-structure/types";
import { RecognitionAdapterFactory } from "../infrastructure/factories/RecognitionAdapterFactory.js";
import { RecognitionProfile } from "../domain/value-objects/RecognitionProfile.value-object.js";
import { LanguageCode } from "../domain/value-objects/LanguageCode.value-object.js";
import { ExtractTextUseCase } from "../application/use-cases/ExtractText.use-case.js";
import { DetectLanguageUseCase } from "../application/use-cases/DetectLanguage.use-case.js";
import { AnalyzeTextUseCase } from "../application/use-cases/AnalyzeText.use-case.js";
import type { ExtractionResultDto } from "../application/dto/ExtractionResult.dto.js";
import { formatReport } from "./format-report.js";

dotenv.config();

const logger = createLogger({ service: "text-extraction" }).child({
  module: "CLI-ExtractFile",
});

const SUPPORTED_EXTENSIONS = [
  ".png",
  ".jpg",
  ".jpeg",
  ".tif",
  ".tiff",
  ".bmp",
  ".gif",
  ".webp",
];

type Mode = "standard" | "long-text" | "paragraphs";

function fail(message: string): never {
  console.log(`\n❌ ${message}\n`);
  process.exit(1);
}

async function main() {
  try {
    console.log("\n🔎 OCR Text Extraction CLI\n");

    let filePath = process.argv[2];

    if (!filePath) {
      const response = await prompts({
        type: "text",
        name: "filePath",
        message: "Enter the path to the image you want to read:",
        validate: (value: string) => (value ? true : "File path is required"),
      });

      if (!response.filePath) {
        fail("File path is required");
      }

      filePath = String(response.filePath);
    }

    const filename = basename(filePath);
    const ext = extname(filename).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.includes(ext)) {
      fail(
        `Unsupported file type: ${ext || "(none)"}. Supported types: ${SUPPORTED_EXTENSIONS.join(", ")}`,
      );
    }

    let image: Buffer;
    try {
      image = readFileSync(filePath);
    } catch (error) {
      const { message } = normalizeError(error);
      fail(`Failed to read file: ${message}`);
    }

    const adapterResult = RecognitionAdapterFactory.createFromEnv();
    if (isErr(adapterResult)) {
      fail(adapterResult.error.message);
    }
    const adapter = adapterResult.value;

    const answers = await prompts([
      {
        type: "select",
        name: "mode",
        message: "Select extraction mode:",
        choices: [
          { title: "Standard", value: "standard" },
          { title: "Long text (document layout)", value: "long-text" },
          { title: "Paragraphs (with metrics)", value: "paragraphs" },
        ],
        initial: 0,
      },
      {
        type: (prev: Mode) => (prev === "standard" ? "select" : null),
        name: "profile",
        message: "Select recognition profile:",
        choices: RecognitionProfile.names().map((name) => ({
          title: name,
          value: name,
        })),
        initial: 0,
      },
      {
        type: "text",
        name: "language",
        message: "Language code (\"auto\" to detect):",
        initial: "eng",
        validate: (value: string) =>
          value === "auto" ||
          LanguageCode.isSupported(value) ||
          value.includes("+") ||
          `Unknown language code: ${value}`,
      },
    ]);

    if (!answers.mode || !answers.language) {
      fail("Extraction mode and language are required");
    }

    const extractText = new ExtractTextUseCase(adapter);

    let language = String(answers.language);
    if (language === "auto") {
      console.log("\n🌐 Detecting language...");
      language = await new DetectLanguageUseCase(extractText).execute(image);
      console.log(`   Using ${language} (${LanguageCode.getName(language)})`);
    }

    console.log(`\n🚀 Extracting with ${adapter.getProviderName()}...\n`);

    const options = {
      language,
      profile: answers.profile ? String(answers.profile) : undefined,
    };

    let result: ExtractionResultDto;
    switch (answers.mode) {
      case "long-text":
        result = await extractText.executeLongText(image, options);
        break;
      case "paragraphs":
        result = await extractText.executeOptimizedForParagraphs(
          image,
          options,
        );
        break;
      default:
        result = await extractText.execute(image, options);
    }

    const analysis = result.success
      ? new AnalyzeTextUseCase().execute(result.text)
      : undefined;

    console.log("─".repeat(80));
    console.log(formatReport(result, analysis));
    console.log("─".repeat(80));

    if (!result.success) {
      process.exit(1);
    }

    const outputFilename = `extraction-${filename.replace(/\.[^/.]+$/, "")}-${Date.now()}.json`;
    const outputPath = join(process.cwd(), outputFilename);

    writeFileSync(
      outputPath,
      JSON.stringify(
        {
          metadata: {
            sourceFile: filePath,
            filename,
            extractedAt: new Date().toISOString(),
            provider: adapter.getProviderName(),
            mode: answers.mode,
          },
          extraction: result,
          analysis,
        },
        null,
        2,
      ),
      "utf-8",
    );

    console.log(`\n📄 Results saved to: ${outputPath}\n`);
  } catch (error) {
    const { error: normalizedError, message } = normalizeError(error);
    logger.error("CLI execution failed", normalizedError);
    fail(`Error: ${message}`);
  }
}

void main();
