/**
 * 辞書ローダー
 *
 * Reads a lexicon JSON file, validates it and caches the result per path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { lexiconFileSchema, formatIssues } from '../validation';
import { Lexicon, normalizeEntry } from './lexicon';

/**
 * Bundled Russian lexicon
 */
export const DEFAULT_LEXICON_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'lexicons',
  'ru.json'
);

const lexiconCache = new Map<string, Lexicon>();

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    const normalized = normalizeEntry(value);
    if (seen.has(normalized)) {
      duplicates.add(normalized);
    }
    seen.add(normalized);
  }
  return [...duplicates];
}

/**
 * 辞書を読み込む
 *
 * @param lexiconPath - JSON file (defaults to the bundled Russian lexicon)
 * @throws when the file is missing, is not JSON, or fails validation
 *
 * @example
 * const lexicon = loadLexicon();
 * lexicon.isAbbreviation('проф'); // => true
 */
export function loadLexicon(lexiconPath: string = DEFAULT_LEXICON_PATH): Lexicon {
  const resolvedPath = path.resolve(lexiconPath);

  const cached = lexiconCache.get(resolvedPath);
  if (cached) {
    return cached;
  }

  if (!fs.existsSync(resolvedPath)) {
    console.warn(`[Lexicon Loader] File not found: ${resolvedPath}`);
    throw new Error(`Lexicon file not found: ${resolvedPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in ${resolvedPath}: ${error.message}`);
    }
    throw error;
  }

  const parsed = lexiconFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Lexicon validation failed for ${resolvedPath}:\n${formatIssues(parsed.error)}`);
  }

  const data = parsed.data;
  const duplicates = [
    ...findDuplicates(data.abbreviations),
    ...findDuplicates(data.titles),
    ...findDuplicates(data.speechVerbs),
  ];
  if (duplicates.length > 0) {
    console.warn(`[Lexicon Loader] Duplicate entries in ${resolvedPath}: ${duplicates.join(', ')}`);
  }

  const lexicon = new Lexicon(data);
  lexiconCache.set(resolvedPath, lexicon);

  console.log(
    `[Lexicon Loader] ✓ Loaded ${data.language} lexicon: ${lexicon.size('abbreviations')} abbreviations, ` +
      `${lexicon.size('titles')} titles, ${lexicon.size('speechVerbs')} speech verbs`
  );

  return lexicon;
}

/**
 * キャッシュをクリア（テスト用）
 */
export function clearLexiconCache(): void {
  lexiconCache.clear();
}
