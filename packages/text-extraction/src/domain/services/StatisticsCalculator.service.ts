import {
  ParagraphMetrics,
  TextStatistics,
} from "../entities/TextAnalysis.entity.js";

const countNonBlank = (parts: string[]): number =>
  parts.filter((part) => part.trim().length > 0).length;

const countWords = (text: string): number => {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
};

export class StatisticsCalculator {
  /**
   * Characters exclude spaces only (tabs and newlines still count).
   * Sentences are non-blank segments between periods, paragraphs non-blank
   * segments between newlines.
   */
  getWordCount(text: string): TextStatistics {
    if (text.length === 0) {
      return { characters: 0, words: 0, sentences: 0, paragraphs: 0 };
    }

    return {
      characters: [...text.replaceAll(" ", "")].length,
      words: countWords(text),
      sentences: countNonBlank(text.split(".")),
      paragraphs: countNonBlank(text.split("\n")),
    };
  }

  /**
   * Paragraphs here are the blocks between blank lines; the average is in
   * words.
   */
  getParagraphMetrics(text: string): ParagraphMetrics {
    const paragraphs = text
      .split("\n\n")
      .filter((paragraph) => paragraph.trim().length > 0);

    if (paragraphs.length === 0) {
      return { paragraphCount: 0, avgParagraphLength: 0 };
    }

    const totalWords = paragraphs.reduce(
      (sum, paragraph) => sum + countWords(paragraph),
      0,
    );

    return {
      paragraphCount: paragraphs.length,
      avgParagraphLength: totalWords / paragraphs.length,
    };
  }
}
