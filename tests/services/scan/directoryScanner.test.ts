import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { jest } from '@jest/globals';
import { scanDirectory } from '../../../src/services/scan/directoryScanner.js';
import { DirectoryUnreadableError, ErrorCode } from '../../../src/errors/index.js';
import { defaultConfig } from '../../../src/config/defaults.js';
import { logger } from '../../../src/utils/logger.js';

jest.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('scanDirectory', () => {
  let dir: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('classifies regular files by extension, sorted by name', async () => {
    await fs.writeFile(path.join(dir, 'b.S01E02.mkv'), 'bb');
    await fs.writeFile(path.join(dir, 'a.S01E01.MKV'), 'aaaa');
    await fs.writeFile(path.join(dir, 'a.S01E01.srt'), 'sub');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');
    await fs.ensureDir(path.join(dir, 'extras.mkv'));

    const result = await scanDirectory(dir, defaultConfig.media);

    expect(result.directory).toBe(path.resolve(dir));
    expect(result.videos).toEqual([
      { path: path.join(dir, 'a.S01E01.MKV'), name: 'a.S01E01.MKV', extension: 'mkv', kind: 'video', sizeBytes: 4 },
      { path: path.join(dir, 'b.S01E02.mkv'), name: 'b.S01E02.mkv', extension: 'mkv', kind: 'video', sizeBytes: 2 },
    ]);
    expect(result.subtitles).toEqual([
      { path: path.join(dir, 'a.S01E01.srt'), name: 'a.S01E01.srt', extension: 'srt', kind: 'subtitle', sizeBytes: 3 },
    ]);
  });

  it('skips merge output left behind by an interrupted run', async () => {
    await fs.writeFile(path.join(dir, 'Show.S01E01.mkv'), 'real video');
    await fs.writeFile(path.join(dir, 'Show.S01E01.embedded.mkv'), 'partial');
    await fs.writeFile(path.join(dir, 'Show.S01E02.EMBEDDED.MKV'), 'partial');
    await fs.writeFile(path.join(dir, 'Show.S01E01.ar.srt'), 'subs');

    const result = await scanDirectory(dir, defaultConfig.media);

    expect(result.videos.map(f => f.name)).toEqual(['Show.S01E01.mkv']);
    expect(result.subtitles.map(f => f.name)).toEqual(['Show.S01E01.ar.srt']);
    expect(logger.debug).toHaveBeenCalledWith('Skipping leftover merge output', {
      service: 'directoryScanner',
      path: path.join(path.resolve(dir), 'Show.S01E01.embedded.mkv'),
    });
    expect(logger.debug).toHaveBeenCalledTimes(2);
  });

  it('does not descend into subdirectories', async () => {
    await fs.ensureDir(path.join(dir, 'Season 1'));
    await fs.writeFile(path.join(dir, 'Season 1', 'Show.S01E01.mkv'), 'v');

    const result = await scanDirectory(dir, defaultConfig.media);

    expect(result.videos).toEqual([]);
  });

  it('honours the configured extensions', async () => {
    await fs.writeFile(path.join(dir, 'Show.S01E01.avi'), 'v');
    await fs.writeFile(path.join(dir, 'Show.S01E01.vtt'), 's');

    const result = await scanDirectory(dir, { videoExtensions: ['avi'], subtitleExtensions: ['vtt'] });

    expect(result.videos.map(f => f.name)).toEqual(['Show.S01E01.avi']);
    expect(result.subtitles.map(f => f.name)).toEqual(['Show.S01E01.vtt']);
  });

  it('fails the run for a missing directory', async () => {
    const missing = path.join(dir, 'missing');

    const error = await scanDirectory(missing, defaultConfig.media).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DirectoryUnreadableError);
    expect(error).toMatchObject({ code: ErrorCode.DIRECTORY_UNREADABLE, path: missing, scope: 'batch' });
  });
});
