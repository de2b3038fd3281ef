import path from 'path';
import { MatchResult, TransactionResult, TransactionState, UnmatchedFile } from '../../types/media.js';
import { identifierKey } from '../matching/identifierExtractor.js';
import { RenameOutcome } from '../renaming/SubtitleRenamer.js';

/**
 * Report Builder
 *
 * Turns match, rename and embed results into flat rows plus run statistics.
 * Rendering (CSV, console tables) is left to the caller.
 */

export type RunStatus = 'success' | 'partial' | 'failure';

export type ReportKind = 'match' | 'rename' | 'embed';

export type RowStatus = 'matched' | 'unmatched' | 'conflict' | 'renamed' | 'unchanged' | 'embedded' | 'failed';

export interface ReportRow {
  source: string;
  target?: string;
  /** Resulting filename after a rename */
  output?: string;
  status: RowStatus;
  basis?: string;
  identifier?: string;
  reason?: string;
  lowConfidence?: boolean;
  language?: string;
  errorKind?: string;
  message?: string;
  elapsedMs?: number;
}

export interface ReportStats {
  total: number;
  succeeded: number;
  failed: number;
  unmatched: number;
  elapsedMs: number;
}

export interface RunReport {
  kind: ReportKind;
  status: RunStatus;
  stats: ReportStats;
  rows: ReportRow[];
  generatedAt: string;
}

/**
 * Nothing went wrong: success. Nothing went right: failure. Otherwise partial.
 */
export function runStatus(succeeded: number, failed: number, unmatched: number): RunStatus {
  if (failed === 0 && unmatched === 0) {
    return 'success';
  }
  return succeeded === 0 ? 'failure' : 'partial';
}

function unmatchedRow(entry: UnmatchedFile): ReportRow {
  return {
    source: entry.file.name,
    status: 'unmatched',
    reason: entry.reason,
    ...(entry.identifier && { identifier: identifierKey(entry.identifier) }),
  };
}

function report(kind: ReportKind, rows: ReportRow[], counts: Omit<ReportStats, 'total'>): RunReport {
  const total = counts.succeeded + counts.failed + counts.unmatched;
  return {
    kind,
    status: runStatus(counts.succeeded, counts.failed, counts.unmatched),
    stats: { total, ...counts },
    rows,
    generatedAt: new Date().toISOString(),
  };
}

export function buildMatchReport(result: MatchResult, elapsedMs = 0): RunReport {
  const rows: ReportRow[] = [];

  for (const pair of result.matched) {
    rows.push({
      source: pair.subtitle.name,
      target: pair.video.name,
      status: 'matched',
      basis: pair.basis,
      lowConfidence: pair.lowConfidence,
      ...(pair.identifier && { identifier: identifierKey(pair.identifier) }),
    });
  }

  rows.push(...result.unmatchedSubtitles.map(unmatchedRow));
  rows.push(...result.unmatchedVideos.map(unmatchedRow));

  for (const conflict of result.conflicts) {
    rows.push({
      source: conflict.rejected.name,
      target: conflict.kept.name,
      status: 'conflict',
      reason: conflict.kind,
      identifier: identifierKey(conflict.identifier),
      errorKind: conflict.code,
    });
  }

  return report('match', rows, {
    succeeded: result.matched.length,
    failed: 0,
    unmatched: result.unmatchedSubtitles.length,
    elapsedMs,
  });
}

export function buildRenameReport(match: MatchResult, outcomes: readonly RenameOutcome[], elapsedMs = 0): RunReport {
  const rows: ReportRow[] = outcomes.map((outcome): ReportRow => ({
    source: outcome.pair.subtitle.name,
    target: outcome.pair.video.name,
    status: outcome.status,
    basis: outcome.pair.basis,
    ...(outcome.to && { output: path.basename(outcome.to) }),
    ...(outcome.errorKind && { errorKind: outcome.errorKind }),
    ...(outcome.errorMessage && { message: outcome.errorMessage }),
  }));
  rows.push(...match.unmatchedSubtitles.map(unmatchedRow));

  const failed = outcomes.filter(o => o.status === 'failed').length;
  return report('rename', rows, {
    succeeded: outcomes.length - failed,
    failed,
    unmatched: match.unmatchedSubtitles.length,
    elapsedMs,
  });
}

export function buildEmbedReport(
  results: readonly TransactionResult[],
  elapsedMs: number,
  match?: MatchResult
): RunReport {
  const rows: ReportRow[] = results.map((result): ReportRow => {
    const committed = result.state === TransactionState.COMMITTED;
    return {
      source: result.pair.subtitle.name,
      target: result.pair.video.name,
      status: committed ? 'embedded' : 'failed',
      basis: result.pair.basis,
      elapsedMs: result.elapsedMs,
      ...(result.language.source !== 'none' && { language: result.language.code }),
      ...(result.errorKind && { errorKind: result.errorKind }),
      ...(result.errorMessage && { message: result.errorMessage }),
    };
  });

  const unmatched = match?.unmatchedSubtitles ?? [];
  rows.push(...unmatched.map(unmatchedRow));

  const succeeded = results.filter(r => r.state === TransactionState.COMMITTED).length;
  return report('embed', rows, {
    succeeded,
    failed: results.length - succeeded,
    unmatched: unmatched.length,
    elapsedMs,
  });
}
