import path from 'path';
import { BoundedCache } from '../../utils/BoundedCache.js';
import { logger } from '../../utils/logger.js';
import { EpisodeIdentifier, ExtractionResult } from '../../types/media.js';
import { EPISODE_PATTERNS, EpisodePatternRule, applyRule } from './patternLibrary.js';

/**
 * Identifier Extractor
 *
 * Walks the pattern table in rank order against a file's basename (extension
 * stripped) and returns the first surviving capture as a normalized
 * (season, episode) pair. Results are memoized per basename.
 */

export const DEFAULT_IDENTIFIER_CACHE_SIZE = 1024;

const FINAL_SEASON_KEYWORD = /final[\s._-]*season/i;

export class IdentifierExtractor {
  private readonly cache: BoundedCache<string, ExtractionResult>;

  constructor(
    cacheSize: number = DEFAULT_IDENTIFIER_CACHE_SIZE,
    private readonly rules: readonly EpisodePatternRule[] = EPISODE_PATTERNS
  ) {
    this.cache = new BoundedCache(cacheSize);
  }

  extract(filename: string): ExtractionResult {
    const name = path.basename(filename);
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const result = this.evaluate(name);
    this.cache.set(name, result);
    return result;
  }

  clearCache(): void {
    this.cache.clear();
  }

  cacheStats(): { size: number; maxSize: number; hits: number; misses: number } {
    return this.cache.stats();
  }

  private evaluate(name: string): ExtractionResult {
    const stem = path.parse(name).name;

    for (let rank = 0; rank < this.rules.length; rank++) {
      const rule = this.rules[rank];
      if (!rule) {
        continue;
      }

      const capture = applyRule(rule, stem);
      if (!capture) {
        continue;
      }

      const identifier: EpisodeIdentifier = {
        season: capture.season ?? 1,
        episode: capture.episode,
        sourcePatternRank: rank,
        seasonExplicit: capture.season !== undefined,
      };

      if (!identifier.seasonExplicit && hasFinalSeasonKeyword(stem)) {
        logger.debug('Final season release without season number, season defaulted to 1', {
          service: 'identifierExtractor',
          filename: name,
          rule: rule.name,
        });
      }

      return { ok: true, identifier };
    }

    return { ok: false };
  }
}

export function hasFinalSeasonKeyword(name: string): boolean {
  return FINAL_SEASON_KEYWORD.test(name);
}

/** Canonical key, e.g. S02E08 */
export function identifierKey(identifier: Pick<EpisodeIdentifier, 'season' | 'episode'>): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `S${pad(identifier.season)}E${pad(identifier.episode)}`;
}

export function sameEpisode(a: EpisodeIdentifier, b: EpisodeIdentifier): boolean {
  return a.season === b.season && a.episode === b.episode;
}

const defaultExtractor = new IdentifierExtractor();

/**
 * Extract an episode identifier from a filename using the shared cache
 */
export function extractIdentifier(filename: string): ExtractionResult {
  return defaultExtractor.extract(filename);
}

export function clearIdentifierCache(): void {
  defaultExtractor.clearCache();
}

export function identifierCacheStats(): { size: number; maxSize: number; hits: number; misses: number } {
  return defaultExtractor.cacheStats();
}
