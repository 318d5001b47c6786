/**
 * Entities recognized in a text by regular expressions. Each category keeps
 * duplicates in order of appearance and is independent of the others.
 */
export type StructuredData = {
  emails: string[];
  phoneNumbers: string[];
  urls: string[];
  numbers: string[];
  dates: string[];
};

export type TextStatistics = {
  characters: number;
  words: number;
  sentences: number;
  paragraphs: number;
};

export type ParagraphMetrics = {
  paragraphCount: number;
  avgParagraphLength: number;
};
