import { statfs } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import { BinaryCheckResult, checkBinary } from '../../utils/binaryCheck.js';
import { FileSystemError } from '../../errors/index.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';

/**
 * Resource Guard
 *
 * Pre-flight checks for a merge: the merge tool answers `--version`, and the
 * volume holding the video has room for the merged copy while the originals
 * still exist.
 */

export const DEFAULT_SPACE_SAFETY_FACTOR = 1.1;

export type BinaryProbe = (binaryPath: string) => Promise<BinaryCheckResult>;

export interface VolumeStats {
  bavail: number;
  bsize: number;
}

export type VolumeStatter = (target: string) => Promise<VolumeStats>;

export interface SpaceCheckResult {
  ok: boolean;
  freeBytes: number;
  requiredBytes: number;
}

export interface ResourceGuardDeps {
  probe?: BinaryProbe;
  statVolume?: VolumeStatter;
}

export class ResourceGuard {
  private readonly probe: BinaryProbe;
  private readonly statVolume: VolumeStatter;
  private readonly probeCache = new Map<string, Promise<BinaryCheckResult>>();

  constructor(deps: ResourceGuardDeps = {}) {
    this.probe = deps.probe ?? (binaryPath => checkBinary(binaryPath));
    this.statVolume = deps.statVolume ?? (target => statfs(target));
  }

  /**
   * Probe once per tool path for the lifetime of this guard
   */
  async probeMergeTool(toolPath: string): Promise<BinaryCheckResult> {
    let pending = this.probeCache.get(toolPath);
    if (!pending) {
      pending = this.probe(toolPath);
      this.probeCache.set(toolPath, pending);
    }

    const result = await pending;
    if (!result.available) {
      logger.error('Merge tool probe failed', {
        service: 'resourceGuard',
        toolPath,
        error: result.error,
      });
    }
    return result;
  }

  async getFreeSpace(target: string): Promise<number> {
    try {
      const stats = await this.statVolume(target);
      return stats.bavail * stats.bsize;
    } catch (error) {
      throw new FileSystemError(
        `Cannot determine free space for ${target}: ${getErrorMessage(error)}`,
        target,
        { service: 'resourceGuard', operation: 'getFreeSpace' },
        toError(error)
      );
    }
  }

  requiredSpaceFor(videoBytes: number, subtitleBytes: number, safetyFactor = DEFAULT_SPACE_SAFETY_FACTOR): number {
    return Math.ceil((videoBytes + subtitleBytes) * safetyFactor);
  }

  async checkSpace(target: string, requiredBytes: number): Promise<SpaceCheckResult> {
    const freeBytes = await this.getFreeSpace(target);
    return { ok: freeBytes >= requiredBytes, freeBytes, requiredBytes };
  }
}
