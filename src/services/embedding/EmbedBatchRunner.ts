import { logger } from '../../utils/logger.js';
import { DependencyError } from '../../errors/index.js';
import { MatchedPair, TransactionResult, TransactionState } from '../../types/media.js';
import { MergeOptionsInput } from '../../validation/configSchemas.js';
import { ResourceGuard } from '../resources/ResourceGuard.js';
import { MergeTransactionDeps, MergeTransactionManager, parseMergeOptions } from './MergeTransaction.js';

export interface EmbedBatchResult {
  toolPath: string;
  toolVersion?: string;
  results: TransactionResult[];
  elapsedMs: number;
}

/**
 * Runs merge transactions one pair at a time. A missing merge tool stops the
 * batch before any file is touched; every other failure stays with its pair.
 */
export class EmbedBatchRunner {
  private readonly guard: ResourceGuard;
  private readonly manager: MergeTransactionManager;

  constructor(deps: MergeTransactionDeps = {}) {
    this.guard = deps.guard ?? new ResourceGuard();
    this.manager = new MergeTransactionManager({ ...deps, guard: this.guard });
  }

  async run(pairs: readonly MatchedPair[], options: MergeOptionsInput): Promise<EmbedBatchResult> {
    const startedAt = Date.now();
    const { mergeToolPath } = parseMergeOptions(options);

    const probe = await this.guard.probeMergeTool(mergeToolPath);
    if (!probe.available) {
      throw new DependencyError(
        'mkvmerge',
        `Merge tool not usable at ${mergeToolPath}: ${probe.error ?? 'no version output'}`,
        { service: 'embedBatch', operation: 'probeMergeTool' }
      );
    }

    logger.info('Starting embed batch', {
      service: 'embedBatch',
      pairs: pairs.length,
      toolPath: mergeToolPath,
      toolVersion: probe.version,
    });

    const results: TransactionResult[] = [];
    for (const [index, pair] of pairs.entries()) {
      logger.debug(`Embedding pair ${index + 1}/${pairs.length}`, {
        service: 'embedBatch',
        video: pair.video.name,
        subtitle: pair.subtitle.name,
      });
      results.push(await this.manager.run(pair, options));
    }

    const committed = results.filter(r => r.state === TransactionState.COMMITTED).length;
    logger.info('Embed batch finished', {
      service: 'embedBatch',
      committed,
      failed: results.length - committed,
      elapsedMs: Date.now() - startedAt,
    });

    return {
      toolPath: mergeToolPath,
      toolVersion: probe.version,
      results,
      elapsedMs: Date.now() - startedAt,
    };
  }
}

export function runEmbedBatch(
  pairs: readonly MatchedPair[],
  options: MergeOptionsInput,
  deps: MergeTransactionDeps = {}
): Promise<EmbedBatchResult> {
  return new EmbedBatchRunner(deps).run(pairs, options);
}
