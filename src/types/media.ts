/**
 * Media Domain Types
 *
 * Files, episode identifiers, match results and merge transaction records
 * shared by the matching engine and the embed workflow.
 */

import type { ErrorCode } from '../errors/index.js';

export type MediaKind = 'video' | 'subtitle';

/**
 * A scanned file. Immutable once created by the directory scanner.
 */
export interface MediaFile {
  readonly path: string;
  /** Basename including extension */
  readonly name: string;
  /** Lowercase, without the leading dot */
  readonly extension: string;
  readonly kind: MediaKind;
  readonly sizeBytes: number;
}

export interface EpisodeIdentifier {
  readonly season: number;
  readonly episode: number;
  /** Position of the rule that produced it in the pattern table (0 = most specific) */
  readonly sourcePatternRank: number;
  /** false when no season marker was present and season defaulted to 1 */
  readonly seasonExplicit: boolean;
}

export type ExtractionResult =
  | { ok: true; identifier: EpisodeIdentifier }
  | { ok: false };

export interface TitleTokenSet {
  readonly words: ReadonlySet<string>;
  /** First 1900-2099 year found in the name, kept apart from the words */
  readonly year?: number;
}

export type MatchBasis = 'episode' | 'movie-title' | 'contextual-final-season';

export type MatchMode = 'episode' | 'movie';

export interface MatchedPair {
  readonly video: MediaFile;
  readonly subtitle: MediaFile;
  readonly basis: MatchBasis;
  /** Shared identifier for episode and contextual matches */
  readonly identifier?: EpisodeIdentifier;
  /** Title overlap ratio for movie-title matches */
  readonly similarity?: number;
  readonly lowConfidence: boolean;
}

export type UnmatchedReason = 'unidentified' | 'no-video' | 'no-subtitle' | 'conflict' | 'below-threshold';

export interface UnmatchedFile {
  readonly file: MediaFile;
  readonly reason: UnmatchedReason;
  readonly identifier?: EpisodeIdentifier;
}

export interface MatchConflict {
  readonly kind: 'video-collision' | 'subtitle-conflict';
  readonly code: ErrorCode.COLLISION_DETECTED;
  readonly identifier: EpisodeIdentifier;
  readonly kept: MediaFile;
  readonly rejected: MediaFile;
}

export interface MatchResult {
  readonly mode: MatchMode;
  readonly matched: MatchedPair[];
  readonly unmatchedVideos: UnmatchedFile[];
  readonly unmatchedSubtitles: UnmatchedFile[];
  readonly conflicts: MatchConflict[];
}

export interface MatchOptions {
  /** Drop single/single movie pairs whose overlap is below the threshold */
  strict?: boolean;
  threshold?: number;
}

/**
 * Three-tier language resolution: filename, then configuration, then none
 */
export type LanguageResolution =
  | { source: 'filename'; code: string }
  | { source: 'config'; code: string }
  | { source: 'none' };

export enum TransactionState {
  INIT = 'Init',
  VALIDATED = 'Validated',
  MERGED = 'Merged',
  BACKED_UP = 'BackedUp',
  COMMITTED = 'Committed',
  FAILED = 'Failed',
  ROLLED_BACK = 'RolledBack',
}

export interface TransactionResult {
  readonly pair: MatchedPair;
  /** Path holding the video afterwards: the merged file, or the untouched original */
  readonly finalPath: string;
  readonly state: TransactionState.COMMITTED | TransactionState.FAILED;
  /** Cleanup ran to completion after a failure */
  readonly rolledBack: boolean;
  readonly errorKind?: ErrorCode;
  readonly errorMessage?: string;
  /** errno code (ENOSPC, EACCES, EXDEV, ...) when a filesystem step failed */
  readonly systemCode?: string;
  /** Captured merge tool diagnostics */
  readonly stderr?: string;
  readonly language: LanguageResolution;
  readonly backupDir?: string;
  readonly elapsedMs: number;
  readonly history: TransactionState[];
}
