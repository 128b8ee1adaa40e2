export * from './segmentation';
export type { Sentence, LexiconKind } from './types';
export {
  segmenterOptionsSchema,
  lexiconFileSchema,
  MAX_ABBREVIATION_LENGTH,
} from './validation';
export type { SegmenterOptions, LexiconFile } from './validation';
