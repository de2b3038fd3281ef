import { logger } from '../../utils/logger.js';
import { ErrorCode } from '../../errors/index.js';
import {
  EpisodeIdentifier,
  ExtractionResult,
  MatchConflict,
  MatchOptions,
  MatchResult,
  MatchedPair,
  MediaFile,
  UnmatchedFile,
} from '../../types/media.js';
import { extractIdentifier, identifierKey, sameEpisode } from './identifierExtractor.js';
import { DEFAULT_SIMILARITY_THRESHOLD, commonWords, overlapRatio, tokenizeTitle } from './titleTokens.js';

/**
 * Matcher
 *
 * Pairs videos with subtitles. Inputs are deduplicated by path and sorted by
 * filename first, so "first wins" collision handling never depends on the
 * order the directory listing happened to return.
 *
 * - One video and one subtitle: movie mode (same identifier, then the
 *   contextual final-season rule, then title-word overlap)
 * - Anything else: episode mode (identifier lookup, then the contextual
 *   final-season rule for leftovers)
 */

type Extract = (filename: string) => ExtractionResult;

interface IdentifiedFile {
  file: MediaFile;
  identifier: EpisodeIdentifier;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byName(a: MediaFile, b: MediaFile): number {
  return compareText(a.name, b.name) || compareText(a.path, b.path);
}

export function normalizeInputs(files: readonly MediaFile[]): MediaFile[] {
  const unique = new Map<string, MediaFile>();
  for (const file of files) {
    if (!unique.has(file.path)) {
      unique.set(file.path, file);
    }
  }
  return [...unique.values()].sort(byName);
}

/**
 * One identifier defaulted its season, the other carries it explicitly,
 * and the episode numbers agree
 */
function isContextualCandidate(a: EpisodeIdentifier, b: EpisodeIdentifier): boolean {
  return a.episode === b.episode && a.seasonExplicit !== b.seasonExplicit;
}

export class Matcher {
  constructor(private readonly extract: Extract = extractIdentifier) {}

  match(videos: readonly MediaFile[], subtitles: readonly MediaFile[], options: MatchOptions = {}): MatchResult {
    const sortedVideos = normalizeInputs(videos);
    const sortedSubtitles = normalizeInputs(subtitles);

    const [onlyVideo] = sortedVideos;
    const [onlySubtitle] = sortedSubtitles;
    const result =
      sortedVideos.length === 1 && sortedSubtitles.length === 1 && onlyVideo && onlySubtitle
        ? this.matchMovie(onlyVideo, onlySubtitle, options)
        : this.matchEpisodes(sortedVideos, sortedSubtitles);

    logger.info('Matching complete', {
      service: 'matcher',
      mode: result.mode,
      matched: result.matched.length,
      unmatchedVideos: result.unmatchedVideos.length,
      unmatchedSubtitles: result.unmatchedSubtitles.length,
      conflicts: result.conflicts.length,
    });

    return result;
  }

  private matchMovie(video: MediaFile, subtitle: MediaFile, options: MatchOptions): MatchResult {
    const videoId = this.extract(video.name);
    const subtitleId = this.extract(subtitle.name);

    if (videoId.ok && subtitleId.ok && sameEpisode(videoId.identifier, subtitleId.identifier)) {
      return {
        mode: 'movie',
        matched: [{ video, subtitle, basis: 'episode', identifier: videoId.identifier, lowConfidence: false }],
        unmatchedVideos: [],
        unmatchedSubtitles: [],
        conflicts: [],
      };
    }

    const videoTokens = tokenizeTitle(video.name);
    const subtitleTokens = tokenizeTitle(subtitle.name);
    const shared = commonWords(videoTokens, subtitleTokens);

    if (
      videoId.ok &&
      subtitleId.ok &&
      shared.length > 0 &&
      isContextualCandidate(videoId.identifier, subtitleId.identifier)
    ) {
      const identifier = videoId.identifier.seasonExplicit ? videoId.identifier : subtitleId.identifier;
      logger.info('Paired final-season release by context', {
        service: 'matcher',
        video: video.name,
        subtitle: subtitle.name,
        identifier: identifierKey(identifier),
      });
      return {
        mode: 'movie',
        matched: [{ video, subtitle, basis: 'contextual-final-season', identifier, lowConfidence: false }],
        unmatchedVideos: [],
        unmatchedSubtitles: [],
        conflicts: [],
      };
    }

    const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    const similarity = overlapRatio(videoTokens, subtitleTokens);
    const yearsAgree =
      videoTokens.year !== undefined && videoTokens.year === subtitleTokens.year && shared.length > 0;
    const lowConfidence = similarity < threshold && !yearsAgree;

    if (lowConfidence && options.strict) {
      logger.info('Movie pair rejected below similarity threshold', {
        service: 'matcher',
        video: video.name,
        subtitle: subtitle.name,
        similarity,
        threshold,
      });
      return {
        mode: 'movie',
        matched: [],
        unmatchedVideos: [{ file: video, reason: 'below-threshold' }],
        unmatchedSubtitles: [{ file: subtitle, reason: 'below-threshold' }],
        conflicts: [],
      };
    }

    if (lowConfidence) {
      logger.warn('Low-confidence movie pair', {
        service: 'matcher',
        video: video.name,
        subtitle: subtitle.name,
        similarity,
      });
    }

    return {
      mode: 'movie',
      matched: [{ video, subtitle, basis: 'movie-title', similarity, lowConfidence }],
      unmatchedVideos: [],
      unmatchedSubtitles: [],
      conflicts: [],
    };
  }

  private matchEpisodes(videos: MediaFile[], subtitles: MediaFile[]): MatchResult {
    const conflicts: MatchConflict[] = [];
    const unmatchedVideos: UnmatchedFile[] = [];
    const unmatchedSubtitles: UnmatchedFile[] = [];

    // Index videos; the first video for an identifier keeps it
    const videosByKey = new Map<string, IdentifiedFile>();
    for (const video of videos) {
      const extraction = this.extract(video.name);
      if (!extraction.ok) {
        unmatchedVideos.push({ file: video, reason: 'unidentified' });
        continue;
      }

      const key = identifierKey(extraction.identifier);
      const existing = videosByKey.get(key);
      if (existing) {
        conflicts.push({
          kind: 'video-collision',
          code: ErrorCode.COLLISION_DETECTED,
          identifier: extraction.identifier,
          kept: existing.file,
          rejected: video,
        });
        unmatchedVideos.push({ file: video, reason: 'conflict', identifier: extraction.identifier });
        logger.warn('Duplicate episode identifier among videos', {
          service: 'matcher',
          identifier: key,
          kept: existing.file.name,
          rejected: video.name,
        });
        continue;
      }
      videosByKey.set(key, { file: video, identifier: extraction.identifier });
    }

    // Exact identifier lookup
    const pairsByVideo = new Map<string, MatchedPair>();
    const pending: IdentifiedFile[] = [];
    for (const subtitle of subtitles) {
      const extraction = this.extract(subtitle.name);
      if (!extraction.ok) {
        unmatchedSubtitles.push({ file: subtitle, reason: 'unidentified' });
        logger.debug('No episode pattern matched subtitle', {
          service: 'matcher',
          code: ErrorCode.PATTERN_MISMATCH,
          subtitle: subtitle.name,
        });
        continue;
      }

      const target = videosByKey.get(identifierKey(extraction.identifier));
      if (!target) {
        pending.push({ file: subtitle, identifier: extraction.identifier });
        continue;
      }

      const taken = pairsByVideo.get(target.file.path);
      if (taken) {
        conflicts.push({
          kind: 'subtitle-conflict',
          code: ErrorCode.COLLISION_DETECTED,
          identifier: extraction.identifier,
          kept: taken.subtitle,
          rejected: subtitle,
        });
        unmatchedSubtitles.push({ file: subtitle, reason: 'conflict', identifier: extraction.identifier });
        continue;
      }

      pairsByVideo.set(target.file.path, {
        video: target.file,
        subtitle,
        basis: 'episode',
        identifier: target.identifier,
        lowConfidence: false,
      });
    }

    // Contextual final-season rule for what is left
    for (const entry of pending) {
      const subtitleTokens = tokenizeTitle(entry.file.name);
      const candidates = [...videosByKey.values()].filter(
        video =>
          !pairsByVideo.has(video.file.path) &&
          isContextualCandidate(entry.identifier, video.identifier) &&
          commonWords(subtitleTokens, tokenizeTitle(video.file.name)).length > 0
      );

      const [candidate] = candidates;
      if (candidates.length !== 1 || !candidate) {
        if (candidates.length > 1) {
          logger.debug('Ambiguous final-season candidates, leaving subtitle unmatched', {
            service: 'matcher',
            subtitle: entry.file.name,
            candidates: candidates.map(c => c.file.name),
          });
        }
        unmatchedSubtitles.push({ file: entry.file, reason: 'no-video', identifier: entry.identifier });
        continue;
      }

      const identifier = entry.identifier.seasonExplicit ? entry.identifier : candidate.identifier;
      pairsByVideo.set(candidate.file.path, {
        video: candidate.file,
        subtitle: entry.file,
        basis: 'contextual-final-season',
        identifier,
        lowConfidence: false,
      });
      logger.info('Paired final-season release by context', {
        service: 'matcher',
        video: candidate.file.name,
        subtitle: entry.file.name,
        identifier: identifierKey(identifier),
      });
    }

    for (const video of videosByKey.values()) {
      if (!pairsByVideo.has(video.file.path)) {
        unmatchedVideos.push({ file: video.file, reason: 'no-subtitle', identifier: video.identifier });
      }
    }

    return {
      mode: 'episode',
      matched: [...pairsByVideo.values()].sort((a, b) => byName(a.video, b.video)),
      unmatchedVideos: unmatchedVideos.sort((a, b) => byName(a.file, b.file)),
      unmatchedSubtitles: unmatchedSubtitles.sort((a, b) => byName(a.file, b.file)),
      conflicts,
    };
  }
}

const defaultMatcher = new Matcher();

export function match(
  videos: readonly MediaFile[],
  subtitles: readonly MediaFile[],
  options: MatchOptions = {}
): MatchResult {
  return defaultMatcher.match(videos, subtitles, options);
}
