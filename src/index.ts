export { ConfigManager } from './config/ConfigManager.js';
export type { AppConfig, EmbeddingConfig, MatchingConfig, MediaConfig, RenamingConfig } from './config/types.js';
export * from './errors/index.js';
export * from './types/media.js';
export { logger, initializeLogger } from './utils/logger.js';
export { BoundedCache } from './utils/BoundedCache.js';
export { checkBinary, locateMergeTool } from './utils/binaryCheck.js';
export type { BinaryCheckResult } from './utils/binaryCheck.js';

export { EPISODE_PATTERNS } from './services/matching/patternLibrary.js';
export type { EpisodePatternRule } from './services/matching/patternLibrary.js';
export {
  IdentifierExtractor,
  extractIdentifier,
  clearIdentifierCache,
  identifierCacheStats,
  identifierKey,
} from './services/matching/identifierExtractor.js';
export { tokenizeTitle, overlapRatio } from './services/matching/titleTokens.js';
export { Matcher, match } from './services/matching/Matcher.js';

export { ResourceGuard } from './services/resources/ResourceGuard.js';
export { resolveLanguage, normalizeLanguageCode } from './services/embedding/languageResolver.js';
export { SpawnMergeToolRunner, buildMergeArgs, mergeTimeoutSeconds } from './services/embedding/mergeTool.js';
export type { MergeInvocation, MergeOutcome, MergeToolRunner } from './services/embedding/mergeTool.js';
export {
  MergeTransaction,
  MergeTransactionManager,
  runMergeTransaction,
} from './services/embedding/MergeTransaction.js';
export type { MergeTransactionDeps, TransactionFileOps } from './services/embedding/MergeTransaction.js';
export { EmbedBatchRunner, runEmbedBatch } from './services/embedding/EmbedBatchRunner.js';
export type { EmbedBatchResult } from './services/embedding/EmbedBatchRunner.js';

export { scanDirectory } from './services/scan/directoryScanner.js';
export type { ScanResult } from './services/scan/directoryScanner.js';
export { SubtitleRenamer, renameSubtitles } from './services/renaming/SubtitleRenamer.js';
export type { RenameOutcome, RenameOptions } from './services/renaming/SubtitleRenamer.js';
export { buildMatchReport, buildRenameReport, buildEmbedReport } from './services/reporting/reportBuilder.js';
export type { RunReport, ReportRow, ReportStats, RunStatus } from './services/reporting/reportBuilder.js';

export { SubtitlePairingService } from './services/SubtitlePairingService.js';
export type { MatchRun, RenameRun, EmbedRun } from './services/SubtitlePairingService.js';
export type { MergeOptionsInput } from './validation/configSchemas.js';
