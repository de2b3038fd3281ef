import path from 'path';
import fs from 'fs-extra';
import { logger } from '../../utils/logger.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import { MatchedPair } from '../../types/media.js';

/**
 * Subtitle Renamer
 *
 * Gives each paired subtitle its video's stem, `<videoStem>[.<suffix>]<ext>`,
 * in the subtitle's own directory. When that name is taken (a second
 * subtitle for the same video, or a file left from an earlier run) the
 * subtitle's own stem is appended and a numeric counter after that.
 */

const SUBTITLE_MARKER = /[._\-\s]*\bsub(?:title)?s?\b[._\-\s]*/gi;
const PROBLEMATIC_CHARS = /[<>:"/\\|?*]/g;

export type RenameStatus = 'renamed' | 'unchanged' | 'failed';

export interface RenameOutcome {
  pair: MatchedPair;
  from: string;
  to?: string;
  status: RenameStatus;
  /** The plain target name was taken and a disambiguated name was used */
  disambiguated: boolean;
  errorKind?: ErrorCode;
  errorMessage?: string;
}

export interface RenameOptions {
  languageSuffix?: string;
}

export interface RenameFileOps {
  pathExists(filePath: string): Promise<boolean>;
  rename(from: string, to: string): Promise<void>;
}

const fsRenameFileOps: RenameFileOps = {
  pathExists: filePath => fs.pathExists(filePath),
  rename: (from, to) => fs.rename(from, to),
};

export function targetSubtitleName(videoName: string, subtitleExt: string, languageSuffix = ''): string {
  const videoStem = path.parse(videoName).name;
  return languageSuffix ? `${videoStem}.${languageSuffix}${subtitleExt}` : `${videoStem}${subtitleExt}`;
}

/**
 * Subtitle stem with `sub`/`subtitle` markers removed
 */
export function cleanSubtitleStem(subtitleName: string): string {
  const stem = path.parse(subtitleName).name;
  const cleaned = stem.replace(SUBTITLE_MARKER, '.').replace(/^\.+|\.+$/g, '');
  return cleaned || stem;
}

export class SubtitleRenamer {
  constructor(private readonly fileOps: RenameFileOps = fsRenameFileOps) {}

  async renameAll(pairs: readonly MatchedPair[], options: RenameOptions = {}): Promise<RenameOutcome[]> {
    const outcomes: RenameOutcome[] = [];
    for (const pair of pairs) {
      outcomes.push(await this.rename(pair, options));
    }

    logger.info('Subtitle renaming finished', {
      service: 'subtitleRenamer',
      renamed: outcomes.filter(o => o.status === 'renamed').length,
      unchanged: outcomes.filter(o => o.status === 'unchanged').length,
      failed: outcomes.filter(o => o.status === 'failed').length,
    });
    return outcomes;
  }

  async rename(pair: MatchedPair, options: RenameOptions = {}): Promise<RenameOutcome> {
    const suffix = options.languageSuffix ?? '';
    const from = pair.subtitle.path;
    const directory = path.dirname(from);
    const ext = path.extname(pair.subtitle.name);
    const target = targetSubtitleName(pair.video.name, ext, suffix);

    if (pair.subtitle.name === target) {
      return { pair, from, to: from, status: 'unchanged', disambiguated: false };
    }

    try {
      const { name, disambiguated } = await this.chooseName(directory, target, pair.video.name, pair.subtitle.name, suffix);
      const to = path.join(directory, name);
      await this.fileOps.rename(from, to);

      logger.info(disambiguated ? 'Renamed subtitle to disambiguated name' : 'Renamed subtitle', {
        service: 'subtitleRenamer',
        from: pair.subtitle.name,
        to: name,
      });
      return { pair, from, to, status: 'renamed', disambiguated };
    } catch (error) {
      const failure = new FileSystemError(
        `Cannot rename ${pair.subtitle.name}: ${getErrorMessage(error)}`,
        from,
        { service: 'subtitleRenamer', operation: 'rename' },
        toError(error)
      );
      logger.warn(failure.message, { service: 'subtitleRenamer', path: from });
      return {
        pair,
        from,
        status: 'failed',
        disambiguated: false,
        errorKind: failure.code,
        errorMessage: failure.message,
      };
    }
  }

  private async chooseName(
    directory: string,
    target: string,
    videoName: string,
    subtitleName: string,
    suffix: string
  ): Promise<{ name: string; disambiguated: boolean }> {
    if (!(await this.fileOps.pathExists(path.join(directory, target)))) {
      return { name: target, disambiguated: false };
    }

    const videoStem = path.parse(videoName).name;
    const ext = path.extname(subtitleName);
    const prefix = suffix ? `${suffix}_` : '';
    const specific = `${videoStem}.${prefix}${cleanSubtitleStem(subtitleName)}${ext}`.replace(PROBLEMATIC_CHARS, '_');

    let candidate = specific;
    const { name: base } = path.parse(specific);
    for (let counter = 1; await this.fileOps.pathExists(path.join(directory, candidate)); counter++) {
      candidate = `${base}_${counter}${ext}`;
    }
    return { name: candidate, disambiguated: true };
  }
}

export function renameSubtitles(pairs: readonly MatchedPair[], options: RenameOptions = {}): Promise<RenameOutcome[]> {
  return new SubtitleRenamer().renameAll(pairs, options);
}
