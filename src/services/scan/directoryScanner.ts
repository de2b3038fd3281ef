import path from 'path';
import fs from 'fs-extra';
import { logger } from '../../utils/logger.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { DirectoryUnreadableError } from '../../errors/index.js';
import { MediaConfig } from '../../config/types.js';
import { MediaFile, MediaKind } from '../../types/media.js';
import { TEMP_OUTPUT_SUFFIX } from '../embedding/MergeTransaction.js';

export interface ScanResult {
  directory: string;
  videos: MediaFile[];
  subtitles: MediaFile[];
}

function classify(extension: string, options: MediaConfig): MediaKind | null {
  if (options.videoExtensions.includes(extension)) return 'video';
  if (options.subtitleExtensions.includes(extension)) return 'subtitle';
  return null;
}

/**
 * List the videos and subtitles directly inside a directory (no recursion).
 * Only regular files count; both lists come back sorted by name. Leftover
 * merge outputs (`*.embedded.mkv`) are not media and are skipped.
 */
export async function scanDirectory(directory: string, options: MediaConfig): Promise<ScanResult> {
  const root = path.resolve(directory);

  let entries: string[];
  try {
    entries = await fs.readdir(root);
  } catch (error) {
    logger.error('Cannot read directory', { service: 'directoryScanner', directory: root, error: getErrorMessage(error) });
    throw new DirectoryUnreadableError(root, toError(error));
  }

  const videos: MediaFile[] = [];
  const subtitles: MediaFile[] = [];

  for (const name of entries.sort()) {
    if (name.toLowerCase().endsWith(TEMP_OUTPUT_SUFFIX)) {
      logger.debug('Skipping leftover merge output', { service: 'directoryScanner', path: path.join(root, name) });
      continue;
    }

    const extension = path.extname(name).slice(1).toLowerCase();
    const kind = classify(extension, options);
    if (!kind) {
      continue;
    }

    const filePath = path.join(root, name);
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        continue;
      }
      const file: MediaFile = { path: filePath, name, extension, kind, sizeBytes: stats.size };
      (kind === 'video' ? videos : subtitles).push(file);
    } catch (error) {
      // Vanished between readdir and stat
      logger.debug('Skipping unreadable entry', {
        service: 'directoryScanner',
        path: filePath,
        error: getErrorMessage(error),
      });
    }
  }

  logger.info('Directory scanned', {
    service: 'directoryScanner',
    directory: root,
    videos: videos.length,
    subtitles: subtitles.length,
  });

  return { directory: root, videos, subtitles };
}
