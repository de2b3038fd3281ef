/**
 * Binary Availability Checker
 *
 * Locates the merge tool executable and verifies it actually runs before a
 * batch touches any file.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import path from 'path';
import fs from 'fs-extra';
import { logger } from './logger.js';
import { getErrorMessage } from './errorHandling.js';

const execFilePromise = promisify(execFile);

export const MERGE_TOOL_NAME = 'mkvmerge';

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  version?: string;
  error?: string;
}

/**
 * Run `<binary> --version` and report whether it answered
 */
export async function checkBinary(binaryPath: string, versionArgs: string[] = ['--version']): Promise<BinaryCheckResult> {
  try {
    const { stdout, stderr } = await execFilePromise(binaryPath, versionArgs, {
      timeout: 5000, // 5 second timeout
      windowsHide: true,
    });

    const output = stdout || stderr;
    const versionMatch = output.match(/version\s+([\d.]+)|v([\d.]+)|([\d.]+)/i);
    const version = versionMatch ? (versionMatch[1] || versionMatch[2] || versionMatch[3]) : 'unknown';

    return {
      binary: binaryPath,
      available: true,
      version,
    };
  } catch (error) {
    return {
      binary: binaryPath,
      available: false,
      error: getErrorMessage(error),
    };
  }
}

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) {
      return false;
    }
    if (platform !== 'win32') {
      await fs.access(candidate, fs.constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

export interface LocateOptions {
  /** Directories searched before PATH, default `<cwd>/bin` */
  searchDirs?: string[];
  pathEnv?: string;
  platform?: NodeJS.Platform;
}

/**
 * Search order: configured path, bundled bin/ directory, then PATH.
 * Returns null when nothing executable is found.
 */
export async function locateMergeTool(configuredPath: string, options: LocateOptions = {}): Promise<string | null> {
  const platform = options.platform ?? process.platform;
  const searchDirs = options.searchDirs ?? [path.join(process.cwd(), 'bin')];
  const pathEnv = options.pathEnv ?? process.env.PATH ?? '';
  const names = platform === 'win32' ? [`${MERGE_TOOL_NAME}.exe`, MERGE_TOOL_NAME] : [MERGE_TOOL_NAME];

  const configured = configuredPath.trim();
  if (configured) {
    if (await isExecutableFile(configured, platform)) {
      return configured;
    }
    logger.warn('Configured merge tool path is not an executable file, searching elsewhere', {
      service: 'binaryCheck',
      configuredPath: configured,
    });
  }

  const pathDirs = pathEnv.split(path.delimiter).filter(dir => dir.length > 0);
  for (const dir of [...searchDirs, ...pathDirs]) {
    for (const name of names) {
      const candidate = path.join(dir, name);
      if (await isExecutableFile(candidate, platform)) {
        logger.debug('Merge tool located', { service: 'binaryCheck', path: candidate });
        return candidate;
      }
    }
  }

  return null;
}
