export type ExtractionOptionsDto = {
  language?: string;
  profile?: string;
  confidenceThreshold?: number;
};
