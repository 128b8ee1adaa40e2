import { z } from 'zod';

/**
 * Longest abbreviation the look-back window can see
 */
export const MAX_ABBREVIATION_LENGTH = 10;

const lexiconEntry = z.string().trim().min(1, 'Lexicon entries must not be empty');

/**
 * 辞書ファイルのバリデーションスキーマ
 * Schema of config/lexicons/*.json
 */
export const lexiconFileSchema = z.object({
  // File-format tag only; every lexicon is Russian
  language: z.literal('ru', {
    errorMap: () => ({ message: 'language must be "ru"' }),
  }),
  abbreviations: z.array(
    lexiconEntry.max(MAX_ABBREVIATION_LENGTH, `Abbreviations must be at most ${MAX_ABBREVIATION_LENGTH} characters`)
  ),
  titles: z.array(lexiconEntry),
  speechVerbs: z.array(lexiconEntry),
});

export type LexiconFile = z.infer<typeof lexiconFileSchema>;

/**
 * Segmentation rule schema (for rules passed in through options)
 */
export const segmentationRuleSchema = z.object({
  name: z.string().min(1, 'Rule name is required'),
  pattern: z.instanceof(RegExp, { message: 'Rule pattern must be a RegExp' }),
  isBoundary: z.boolean(),
  priority: z.number().int('Rule priority must be an integer'),
  description: z.string(),
});

/**
 * セグメンター設定のバリデーションスキーマ
 */
export const segmenterOptionsSchema = z.object({
  extraAbbreviations: z.array(
    z.string()
      .trim()
      .min(1, 'Abbreviations must not be empty')
      .max(MAX_ABBREVIATION_LENGTH, `Abbreviations must be at most ${MAX_ABBREVIATION_LENGTH} characters`)
  ).optional(),
  extraRules: z.array(segmentationRuleSchema).optional(),
  lexiconPath: z.string().min(1, 'lexiconPath must not be empty').optional(),
  debug: z.boolean().optional(),
});

/**
 * Segmenter options (before validation)
 */
export type SegmenterOptions = z.input<typeof segmenterOptionsSchema>;

/**
 * Segmenter options (after validation)
 */
export type SegmenterOptionsValidated = z.infer<typeof segmenterOptionsSchema>;

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
