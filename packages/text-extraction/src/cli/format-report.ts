import { isErr } from "@ocr-structure/types";
import type { ExtractionResultDto } from "../application/dto/ExtractionResult.dto.js";
import type { TextAnalysisDto } from "../application/dto/TextAnalysis.dto.js";
import type { StructuredData } from "../domain/entities/TextAnalysis.entity.js";
import { ConfidenceScore } from "../domain/value-objects/ConfidenceScore.value-object.js";
import { LanguageCode } from "../domain/value-objects/LanguageCode.value-object.js";

const ENTITY_LABELS: Record<keyof StructuredData, string> = {
  emails: "Emails",
  phoneNumbers: "Phone numbers",
  urls: "URLs",
  numbers: "Numbers",
  dates: "Dates",
};

/**
 * Renders a plain-text summary of an extraction and its analysis.
 */
export function formatReport(
  result: ExtractionResultDto,
  analysis?: TextAnalysisDto,
): string {
  if (!result.success) {
    return `Extraction failed (${result.language}, ${result.config}): ${result.error ?? "unknown error"}`;
  }

  if (result.text.length === 0) {
    return `No text detected (${result.language}, ${result.config})`;
  }

  const lines = [
    `Language: ${result.language} (${LanguageCode.getName(result.language)})`,
    `Profile: ${result.config}`,
    `Confidence: ${describeConfidence(result.confidence)}`,
    `Lines: ${result.lines.length}`,
  ];

  if (
    result.paragraphCount !== undefined &&
    result.avgParagraphLength !== undefined
  ) {
    lines.push(
      `Paragraphs: ${result.paragraphCount} (avg ${result.avgParagraphLength.toFixed(1)} words)`,
    );
  }

  if (analysis) {
    const { statistics, structuredData } = analysis;
    lines.push(
      `Words: ${statistics.words} | Characters: ${statistics.characters} | Sentences: ${statistics.sentences}`,
    );

    for (const key of Object.keys(ENTITY_LABELS)) {
      if (!isEntityKey(key)) continue;
      const values = structuredData[key];
      if (values.length > 0) {
        lines.push(`${ENTITY_LABELS[key]}: ${values.join(", ")}`);
      }
    }
  }

  lines.push("", result.text);
  return lines.join("\n");
}

function describeConfidence(value: number): string {
  const score = ConfidenceScore.create(value);
  if (isErr(score)) {
    return String(value);
  }
  return `${score.value.toDisplayString()} (${score.value.getLevel()})`;
}

function isEntityKey(key: string): key is keyof StructuredData {
  return key in ENTITY_LABELS;
}
