import { ConfigManager } from '../config/ConfigManager.js';
import { DependencyError, ValidationError } from '../errors/index.js';
import { initializeLogger, logger } from '../utils/logger.js';
import { locateMergeTool } from '../utils/binaryCheck.js';
import { MatchResult } from '../types/media.js';
import { Matcher } from './matching/Matcher.js';
import { IdentifierExtractor } from './matching/identifierExtractor.js';
import { ScanResult, scanDirectory } from './scan/directoryScanner.js';
import { RenameOutcome, SubtitleRenamer } from './renaming/SubtitleRenamer.js';
import { EmbedBatchResult, EmbedBatchRunner } from './embedding/EmbedBatchRunner.js';
import { MergeTransactionDeps } from './embedding/MergeTransaction.js';
import { RunReport, buildEmbedReport, buildMatchReport, buildRenameReport } from './reporting/reportBuilder.js';

export interface PairingServiceDeps {
  config?: ConfigManager;
  matcher?: Matcher;
  renamer?: SubtitleRenamer;
  embed?: MergeTransactionDeps;
  scan?: typeof scanDirectory;
  locate?: typeof locateMergeTool;
}

export interface MatchRun {
  scan: ScanResult;
  match: MatchResult;
  report: RunReport;
}

export interface RenameRun {
  match: MatchResult;
  outcomes: RenameOutcome[];
  /** Present when renaming.report is enabled */
  report?: RunReport;
}

export interface EmbedRun {
  match: MatchResult;
  batch: EmbedBatchResult;
  /** Present when embedding.report is enabled */
  report?: RunReport;
}

/**
 * Subtitle Pairing Service
 *
 * Directory-level entry point: scan, match, then rename or embed, using the
 * settings held by ConfigManager.
 */
export class SubtitlePairingService {
  private readonly config: ConfigManager;
  private readonly matcher: Matcher;
  private readonly renamer: SubtitleRenamer;
  private readonly embedDeps: MergeTransactionDeps;
  private readonly scan: typeof scanDirectory;
  private readonly locate: typeof locateMergeTool;

  constructor(deps: PairingServiceDeps = {}) {
    this.config = deps.config ?? ConfigManager.getInstance();
    this.config.validate();
    initializeLogger(this.config);

    if (deps.matcher) {
      this.matcher = deps.matcher;
    } else {
      const extractor = new IdentifierExtractor(this.config.getMatchingConfig().identifierCacheSize);
      this.matcher = new Matcher(filename => extractor.extract(filename));
    }
    this.renamer = deps.renamer ?? new SubtitleRenamer();
    this.embedDeps = deps.embed ?? {};
    this.scan = deps.scan ?? scanDirectory;
    this.locate = deps.locate ?? locateMergeTool;
  }

  async matchDirectory(directory: string): Promise<MatchRun> {
    if (!directory.trim()) {
      throw new ValidationError('A directory path is required', { service: 'subtitlePairing', operation: 'matchDirectory' });
    }
    const startedAt = Date.now();
    const scan = await this.scan(directory, this.config.getMediaConfig());

    const matching = this.config.getMatchingConfig();
    const match = this.matcher.match(scan.videos, scan.subtitles, {
      strict: matching.strictMovieMode,
      threshold: matching.movieSimilarityThreshold,
    });

    return { scan, match, report: buildMatchReport(match, Date.now() - startedAt) };
  }

  async renameDirectory(directory: string): Promise<RenameRun> {
    const startedAt = Date.now();
    const { match } = await this.matchDirectory(directory);
    const renaming = this.config.getRenamingConfig();

    const outcomes = await this.renamer.renameAll(match.matched, { languageSuffix: renaming.languageSuffix });

    if (!renaming.report) {
      return { match, outcomes };
    }
    return { match, outcomes, report: buildRenameReport(match, outcomes, Date.now() - startedAt) };
  }

  async embedDirectory(directory: string): Promise<EmbedRun> {
    const embedding = this.config.getEmbeddingConfig();

    const toolPath = await this.locate(embedding.mergeToolPath);
    if (!toolPath) {
      logger.error('mkvmerge not found in the configured path, bin/ or PATH', {
        service: 'subtitlePairing',
        configuredPath: embedding.mergeToolPath,
      });
      throw new DependencyError('mkvmerge', 'mkvmerge executable not found (set MKVMERGE_PATH or add it to PATH)', {
        service: 'subtitlePairing',
        operation: 'locateMergeTool',
      });
    }

    const { match } = await this.matchDirectory(directory);
    const batch = await new EmbedBatchRunner(this.embedDeps).run(match.matched, {
      mergeToolPath: toolPath,
      languageCode: embedding.languageCode,
      defaultTrack: embedding.defaultTrack,
      backupDirName: embedding.backupDirName,
      containerExtensions: embedding.containerExtensions,
    });

    if (!embedding.report) {
      return { match, batch };
    }
    return { match, batch, report: buildEmbedReport(batch.results, batch.elapsedMs, match) };
  }
}
