import path from 'path';
import tokenData from '../../data/titleTokens.json';
import { TitleTokenSet } from '../../types/media.js';

/**
 * Title tokenization for movie-mode matching.
 *
 * Words are lowercased and split on anything that is not a letter or digit.
 * Filler words, release/technical markers, language tags, resolutions and
 * episode markers are discarded; the first release year is kept apart.
 */

const FILLER_WORDS: ReadonlySet<string> = new Set(tokenData.fillerWords);
const TECHNICAL_INDICATORS: ReadonlySet<string> = new Set(tokenData.technicalIndicators);
const LANGUAGE_TAGS: ReadonlySet<string> = new Set(tokenData.languageTags);

const YEAR = /^(?:19|20)\d{2}$/;
const RESOLUTION = /^(?:\d{3,4}[pi]|\d{3,4}x\d{3,4})$/;
const EPISODE_MARKER = /^(?:s\d{1,2})?e(?:p)?\d{1,4}$/;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.3;

function isNoise(word: string): boolean {
  return (
    FILLER_WORDS.has(word) ||
    TECHNICAL_INDICATORS.has(word) ||
    LANGUAGE_TAGS.has(word) ||
    RESOLUTION.test(word) ||
    EPISODE_MARKER.test(word)
  );
}

export function tokenizeTitle(filename: string): TitleTokenSet {
  const stem = path.parse(path.basename(filename)).name.toLowerCase();
  const words = new Set<string>();
  let year: number | undefined;

  for (const word of stem.split(/[^\p{L}\p{N}]+/u)) {
    if (!word) {
      continue;
    }
    if (YEAR.test(word)) {
      year ??= parseInt(word, 10);
      continue;
    }
    if (!isNoise(word)) {
      words.add(word);
    }
  }

  return year === undefined ? { words } : { words, year };
}

export function commonWords(a: TitleTokenSet, b: TitleTokenSet): string[] {
  return [...a.words].filter(word => b.words.has(word)).sort();
}

/**
 * |A ∩ B| / min(|A|, |B|), or 0 when either side has no words
 */
export function overlapRatio(a: TitleTokenSet, b: TitleTokenSet): number {
  const smaller = Math.min(a.words.size, b.words.size);
  if (smaller === 0) {
    return 0;
  }
  return commonWords(a, b).length / smaller;
}
