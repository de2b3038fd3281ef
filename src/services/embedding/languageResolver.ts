import path from 'path';
import languageData from '../../data/languageCodes.json';
import { logger } from '../../utils/logger.js';
import { LanguageResolution } from '../../types/media.js';

/**
 * Subtitle language resolution: filename tag, then configured code, then none.
 * Codes are normalized to the three-letter ISO 639-2/B form mkvmerge accepts.
 */

const THREE_LETTER: ReadonlyMap<string, string> = new Map(Object.entries(languageData.codes));
const TWO_LETTER: ReadonlyMap<string, string> = new Map(Object.entries(languageData.twoLetter));
const ALIASES: ReadonlyMap<string, string> = new Map(Object.entries(languageData.aliases));

const NON_LANGUAGE_TAGS: ReadonlySet<string> = new Set(['forced', 'sdh', 'cc', 'hi']);

/** How many trailing dot-separated stem parts are inspected */
const TAG_WINDOW = 3;

/**
 * Map a two- or three-letter code to its ISO 639-2/B code, or null
 */
export function normalizeLanguageCode(code: string): string | null {
  const lower = code.trim().toLowerCase();
  if (!lower) {
    return null;
  }
  if (THREE_LETTER.has(lower)) {
    return lower;
  }
  return TWO_LETTER.get(lower) ?? ALIASES.get(lower) ?? null;
}

export function languageName(code: string): string | undefined {
  return THREE_LETTER.get(code);
}

/**
 * `Show.S01E01.ar.srt` -> `ara`, `Movie.en.forced.srt` -> `eng`
 */
export function detectLanguageFromFilename(filename: string): string | null {
  const stem = path.parse(path.basename(filename)).name;
  const parts = stem.split('.').slice(-TAG_WINDOW).reverse();

  for (const part of parts) {
    const tag = part.trim().toLowerCase();
    if (NON_LANGUAGE_TAGS.has(tag)) {
      continue;
    }
    const normalized = normalizeLanguageCode(tag);
    if (normalized) {
      return normalized;
    }
  }
  return null;
}

export function resolveLanguage(subtitleName: string, configuredCode = ''): LanguageResolution {
  const fromFilename = detectLanguageFromFilename(subtitleName);
  if (fromFilename) {
    return { source: 'filename', code: fromFilename };
  }

  if (configuredCode.trim()) {
    const fromConfig = normalizeLanguageCode(configuredCode);
    if (fromConfig) {
      return { source: 'config', code: fromConfig };
    }
    logger.warn('Ignoring invalid configured language code', {
      service: 'languageResolver',
      languageCode: configuredCode,
    });
  }

  return { source: 'none' };
}
