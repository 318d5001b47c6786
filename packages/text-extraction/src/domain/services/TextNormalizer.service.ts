export type NormalizationOptions = {
  /**
   * Replace characters the engine commonly confuses (`|`, `0`, `1`).
   * Rewrites real digits too. Defaults to true.
   */
  substituteMisreads?: boolean;
};

const MISREADS: ReadonlyArray<readonly [string, string]> = [
  ["|", "I"],
  ["0", "O"],
  ["1", "l"],
];

const SENTENCE_SEPARATOR = ". ";

/**
 * Cleans recognized text in three independent stages.
 */
export class TextNormalizer {
  clean(text: string, options: NormalizationOptions = {}): string {
    if (text.length === 0) {
      return "";
    }

    let cleaned = this.collapseWhitespace(text);
    if (options.substituteMisreads ?? true) {
      cleaned = this.substituteCommonMisreads(cleaned);
    }
    return this.capitalizeSentences(cleaned);
  }

  collapseWhitespace(text: string): string {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return "";
    }
    return trimmed.split(/\s+/).join(" ");
  }

  substituteCommonMisreads(text: string): string {
    return MISREADS.reduce(
      (acc, [from, to]) => acc.replaceAll(from, to),
      text,
    );
  }

  /**
   * Upper-cases the first character after every ". " and drops blank
   * fragments between separators.
   */
  capitalizeSentences(text: string): string {
    return text
      .split(SENTENCE_SEPARATOR)
      .filter((sentence) => sentence.trim().length > 0)
      .map((sentence) => sentence.charAt(0).toUpperCase() + sentence.slice(1))
      .join(SENTENCE_SEPARATOR);
  }
}
