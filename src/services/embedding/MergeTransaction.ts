import path from 'path';
import fs from 'fs-extra';
import { logger } from '../../utils/logger.js';
import { createErrorLogContext, getErrorMessage, getFileSystemErrorCode, toError } from '../../utils/errorHandling.js';
import {
  ApplicationError,
  ConfigurationError,
  DependencyError,
  ErrorContext,
  FileSystemError,
  InsufficientSpaceError,
  InvalidStateError,
  MergeTimeoutError,
  MergeToolError,
  UnsupportedContainerError,
} from '../../errors/index.js';
import { LanguageResolution, MatchedPair, TransactionResult, TransactionState } from '../../types/media.js';
import { MergeOptions, MergeOptionsInput, mergeOptionsSchema } from '../../validation/configSchemas.js';
import { ResourceGuard } from '../resources/ResourceGuard.js';
import { resolveLanguage } from './languageResolver.js';
import {
  MergeOutcome,
  MergeToolRunner,
  SpawnMergeToolRunner,
  buildMergeArgs,
  mergeTimeoutSeconds,
} from './mergeTool.js';

/**
 * Merge Transaction
 *
 * Embeds one subtitle into one video so that, at every point a user could
 * look at the directory, it holds either the original pair or the finished
 * merged video:
 *
 *   Init -> Validated -> Merged -> BackedUp -> Committed
 *
 * Any stage may fail. Failed runs its cleanup (delete the temp output, move
 * backed-up originals home) and records RolledBack once cleanup completes.
 * Originals are only ever moved, never deleted or rewritten.
 */

const SERVICE = 'mergeTransaction';

export const TEMP_OUTPUT_SUFFIX = '.embedded.mkv';

export const TRANSACTION_TRANSITIONS: Readonly<Record<TransactionState, readonly TransactionState[]>> = {
  [TransactionState.INIT]: [TransactionState.VALIDATED, TransactionState.FAILED],
  [TransactionState.VALIDATED]: [TransactionState.MERGED, TransactionState.FAILED],
  [TransactionState.MERGED]: [TransactionState.BACKED_UP, TransactionState.FAILED],
  [TransactionState.BACKED_UP]: [TransactionState.COMMITTED, TransactionState.FAILED],
  [TransactionState.COMMITTED]: [],
  [TransactionState.FAILED]: [TransactionState.ROLLED_BACK],
  [TransactionState.ROLLED_BACK]: [],
};

export class MergeTransaction {
  private current: TransactionState = TransactionState.INIT;
  private readonly trail: TransactionState[] = [TransactionState.INIT];

  constructor(
    readonly pair: MatchedPair,
    readonly tempOutputPath: string,
    readonly backupDir: string
  ) {}

  get state(): TransactionState {
    return this.current;
  }

  get history(): TransactionState[] {
    return [...this.trail];
  }

  transition(next: TransactionState): void {
    if (!TRANSACTION_TRANSITIONS[this.current].includes(next)) {
      throw new InvalidStateError(
        TRANSACTION_TRANSITIONS[this.current].join(' | ') || 'terminal',
        next,
        `Illegal transaction transition ${this.current} -> ${next}`,
        { service: SERVICE, paths: [this.pair.video.path] }
      );
    }
    this.current = next;
    this.trail.push(next);
  }
}

/**
 * Filesystem operations used by a transaction
 */
export interface TransactionFileOps {
  size(filePath: string): Promise<number>;
  pathExists(filePath: string): Promise<boolean>;
  remove(filePath: string): Promise<void>;
  ensureDir(dirPath: string): Promise<void>;
  /** Move replacing any existing destination */
  move(from: string, to: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
}

export const fsTransactionFileOps: TransactionFileOps = {
  size: async filePath => (await fs.stat(filePath)).size,
  pathExists: filePath => fs.pathExists(filePath),
  remove: filePath => fs.remove(filePath),
  ensureDir: dirPath => fs.ensureDir(dirPath),
  move: (from, to) => fs.move(from, to, { overwrite: true }),
  rename: (from, to) => fs.rename(from, to),
};

export interface MergeTransactionDeps {
  runner?: MergeToolRunner;
  guard?: ResourceGuard;
  fileOps?: TransactionFileOps;
}

interface CleanupStep {
  name: string;
  run: () => Promise<void>;
}

export function tempOutputPathFor(videoPath: string): string {
  return path.join(path.dirname(videoPath), `${path.parse(videoPath).name}${TEMP_OUTPUT_SUFFIX}`);
}

export function parseMergeOptions(input: MergeOptionsInput): MergeOptions {
  const parsed = mergeOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('mergeOptions', `Invalid merge options:\n${issues.join('\n')}`, {
      service: SERVICE,
    });
  }
  return parsed.data;
}

export class MergeTransactionManager {
  private readonly runner: MergeToolRunner;
  private readonly guard: ResourceGuard;
  private readonly fileOps: TransactionFileOps;

  constructor(deps: MergeTransactionDeps = {}) {
    this.runner = deps.runner ?? new SpawnMergeToolRunner();
    this.guard = deps.guard ?? new ResourceGuard();
    this.fileOps = deps.fileOps ?? fsTransactionFileOps;
  }

  async run(pair: MatchedPair, optionsInput: MergeOptionsInput): Promise<TransactionResult> {
    const options = parseMergeOptions(optionsInput);
    const startedAt = Date.now();

    const videoPath = pair.video.path;
    const subtitlePath = pair.subtitle.path;
    const workingDir = path.dirname(videoPath);
    const tx = new MergeTransaction(pair, tempOutputPathFor(videoPath), path.join(workingDir, options.backupDirName));
    const language = resolveLanguage(pair.subtitle.name, options.languageCode);
    const context: ErrorContext = { service: SERVICE, paths: [videoPath, subtitlePath] };

    let videoLocation = videoPath;
    let backupCreated = false;

    const result = (rolledBack: boolean, error?: ApplicationError): TransactionResult => {
      const stderr = error instanceof MergeToolError || error instanceof MergeTimeoutError ? error.stderr : undefined;
      const systemCode = error?.context.metadata?.systemCode;
      return {
        pair,
        finalPath: videoLocation,
        state: error ? TransactionState.FAILED : TransactionState.COMMITTED,
        rolledBack,
        errorKind: error?.code,
        errorMessage: error?.message,
        systemCode: typeof systemCode === 'string' ? systemCode : undefined,
        stderr,
        language,
        backupDir: backupCreated ? tx.backupDir : undefined,
        elapsedMs: Date.now() - startedAt,
        history: tx.history,
      };
    };

    const removeTemp: CleanupStep = {
      name: 'removeTempOutput',
      run: () => this.fileOps.remove(tx.tempOutputPath),
    };

    // Validated
    let totalBytes: number;
    try {
      totalBytes = await this.validate(tx, options, context);
    } catch (error) {
      const failure = this.asApplicationError(error, videoPath, 'validate');
      return result(await this.fail(tx, failure, []), failure);
    }
    tx.transition(TransactionState.VALIDATED);

    // Merged
    const timeoutMs = mergeTimeoutSeconds(totalBytes) * 1000;
    try {
      if (await this.fileOps.pathExists(tx.tempOutputPath)) {
        logger.info('Removing stale temporary output from an earlier run', {
          service: SERVICE,
          path: tx.tempOutputPath,
        });
        await this.fileOps.remove(tx.tempOutputPath);
      }
    } catch (error) {
      const failure = this.asApplicationError(error, tx.tempOutputPath, 'removeStaleOutput');
      return result(await this.fail(tx, failure, []), failure);
    }

    const mergeError = await this.merge(tx, options, language, timeoutMs, context);
    if (mergeError) {
      return result(await this.fail(tx, mergeError, [removeTemp]), mergeError);
    }
    tx.transition(TransactionState.MERGED);

    // BackedUp
    const restoreSteps: CleanupStep[] = [];
    try {
      await this.fileOps.ensureDir(tx.backupDir);
      backupCreated = true;

      for (const source of [videoPath, subtitlePath]) {
        const destination = path.join(tx.backupDir, path.basename(source));
        await this.fileOps.move(source, destination);
        if (source === videoPath) {
          videoLocation = destination;
        }
        restoreSteps.unshift({
          name: `restore ${path.basename(source)}`,
          run: async () => {
            await this.fileOps.move(destination, source);
            if (source === videoPath) {
              videoLocation = source;
            }
          },
        });
      }
    } catch (error) {
      const failure = this.asApplicationError(error, tx.backupDir, 'backupOriginals');
      return result(await this.fail(tx, failure, [...restoreSteps, removeTemp]), failure);
    }
    tx.transition(TransactionState.BACKED_UP);

    // Committed
    try {
      await this.fileOps.rename(tx.tempOutputPath, videoPath);
      videoLocation = videoPath;
    } catch (error) {
      const failure = this.asApplicationError(error, videoPath, 'commit');
      return result(await this.fail(tx, failure, [...restoreSteps, removeTemp]), failure);
    }
    tx.transition(TransactionState.COMMITTED);

    logger.info('Subtitle embedded', {
      service: SERVICE,
      video: pair.video.name,
      subtitle: pair.subtitle.name,
      language: language.source === 'none' ? undefined : language.code,
      backupDir: tx.backupDir,
      elapsedMs: Date.now() - startedAt,
    });
    return result(false);
  }

  /**
   * Returns the combined input size in bytes
   */
  private async validate(tx: MergeTransaction, options: MergeOptions, context: ErrorContext): Promise<number> {
    const { video, subtitle } = tx.pair;
    const container = path.extname(video.path).slice(1).toLowerCase();
    if (!options.containerExtensions.includes(container)) {
      throw new UnsupportedContainerError(video.path, options.containerExtensions, context);
    }

    const probe = await this.guard.probeMergeTool(options.mergeToolPath);
    if (!probe.available) {
      throw new DependencyError(
        'mkvmerge',
        `Merge tool not usable at ${options.mergeToolPath}: ${probe.error ?? 'no version output'}`,
        context
      );
    }

    const videoBytes = await this.fileOps.size(video.path);
    const subtitleBytes = await this.fileOps.size(subtitle.path);

    const workingDir = path.dirname(video.path);
    const required = this.guard.requiredSpaceFor(videoBytes, subtitleBytes, options.spaceSafetyFactor);
    const space = await this.guard.checkSpace(workingDir, required);
    if (!space.ok) {
      throw new InsufficientSpaceError(workingDir, required, space.freeBytes, context);
    }

    return videoBytes + subtitleBytes;
  }

  /**
   * Run the tool and verify its output. Returns the failure, or null when the
   * temp output exists after a clean exit.
   */
  private async merge(
    tx: MergeTransaction,
    options: MergeOptions,
    language: LanguageResolution,
    timeoutMs: number,
    context: ErrorContext
  ): Promise<ApplicationError | null> {
    const args = buildMergeArgs({
      outputPath: tx.tempOutputPath,
      videoPath: tx.pair.video.path,
      subtitlePath: tx.pair.subtitle.path,
      languageCode: language.source === 'none' ? null : language.code,
      defaultTrack: options.defaultTrack,
    });

    logger.debug('Running merge tool', { service: SERVICE, toolPath: options.mergeToolPath, args, timeoutMs });

    let outcome: MergeOutcome;
    try {
      outcome = await this.runner.run({ toolPath: options.mergeToolPath, args, timeoutMs });
    } catch (error) {
      return new MergeToolError(null, '', `Merge tool invocation failed: ${getErrorMessage(error)}`, context, toError(error));
    }

    switch (outcome.kind) {
      case 'timeout':
        return new MergeTimeoutError(timeoutMs, outcome.stderr, context);
      case 'spawn-error':
        return new MergeToolError(
          null,
          outcome.stderr,
          `Merge tool could not be started: ${outcome.error.message}`,
          context,
          outcome.error
        );
      case 'exited':
        if (outcome.exitCode !== 0) {
          return new MergeToolError(outcome.exitCode, outcome.stderr, undefined, context);
        }
        if (!(await this.fileOps.pathExists(tx.tempOutputPath))) {
          return new MergeToolError(
            0,
            outcome.stderr,
            `Merge tool exited cleanly but produced no output at ${tx.tempOutputPath}`,
            context
          );
        }
        return null;
    }
  }

  /**
   * Enter Failed, run cleanup, and record RolledBack when every step succeeded
   */
  private async fail(tx: MergeTransaction, error: ApplicationError, cleanup: CleanupStep[]): Promise<boolean> {
    const failedIn = tx.state;
    tx.transition(TransactionState.FAILED);

    logger[error.isFatal ? 'error' : 'warn']('Merge transaction failed', {
      service: SERVICE,
      stage: failedIn,
      code: error.code,
      systemCode: error.context.metadata?.systemCode,
      error: error.message,
      video: tx.pair.video.path,
      subtitle: tx.pair.subtitle.path,
    });

    let clean = true;
    for (const step of cleanup) {
      try {
        await step.run();
      } catch (cleanupError) {
        clean = false;
        logger.error(
          'Rollback step failed, manual recovery may be needed',
          createErrorLogContext(cleanupError, { service: SERVICE, step: step.name, backupDir: tx.backupDir })
        );
      }
    }

    if (clean) {
      tx.transition(TransactionState.ROLLED_BACK);
    }
    return clean;
  }

  private asApplicationError(error: unknown, filePath: string, operation: string): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }
    const systemCode = getFileSystemErrorCode(error);
    return new FileSystemError(
      `${operation} failed for ${filePath}: ${getErrorMessage(error)}`,
      filePath,
      { service: SERVICE, operation, ...(systemCode && { metadata: { systemCode } }) },
      toError(error)
    );
  }
}

export function runMergeTransaction(
  pair: MatchedPair,
  options: MergeOptionsInput,
  deps: MergeTransactionDeps = {}
): Promise<TransactionResult> {
  return new MergeTransactionManager(deps).run(pair, options);
}
