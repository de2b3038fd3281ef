import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { jest } from '@jest/globals';
import {
  MergeTransaction,
  MergeTransactionManager,
  TransactionFileOps,
  fsTransactionFileOps,
  tempOutputPathFor,
} from '../../../src/services/embedding/MergeTransaction.js';
import { MergeInvocation, MergeOutcome, MergeToolRunner } from '../../../src/services/embedding/mergeTool.js';
import { ResourceGuard, VolumeStats } from '../../../src/services/resources/ResourceGuard.js';
import { ConfigurationError, ErrorCode, InvalidStateError } from '../../../src/errors/index.js';
import { MatchedPair, TransactionState } from '../../../src/types/media.js';
import { episodePair, mediaFile } from '../../helpers/media.js';

jest.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const GIB = 1024 ** 3;
const TOOL = '/opt/mkvtoolnix/mkvmerge';

type Behaviour = (invocation: MergeInvocation) => Promise<MergeOutcome>;

/**
 * Stands in for the merge tool: records each invocation and writes the
 * output file named after `-o` when asked to
 */
class FakeRunner implements MergeToolRunner {
  readonly invocations: MergeInvocation[] = [];

  constructor(private readonly behaviour: Behaviour = writeOutput('merged')) {}

  run(invocation: MergeInvocation): Promise<MergeOutcome> {
    this.invocations.push(invocation);
    return this.behaviour(invocation);
  }
}

function outputOf(invocation: MergeInvocation): string {
  const output = invocation.args[1];
  if (output === undefined) {
    throw new Error('no output argument');
  }
  return output;
}

function writeOutput(content: string, exitCode = 0, stderr = ''): Behaviour {
  return async invocation => {
    await fs.writeFile(outputOf(invocation), content);
    return { kind: 'exited', exitCode, stderr };
  };
}

function guardWith(options: { available?: boolean; volume?: VolumeStats } = {}): ResourceGuard {
  return new ResourceGuard({
    probe: async binary =>
      options.available === false
        ? { binary, available: false, error: 'spawn ENOENT' }
        : { binary, available: true, version: '80.0' },
    statVolume: async () => options.volume ?? { bavail: 1_000_000, bsize: 4096 },
  });
}

describe('MergeTransaction', () => {
  const pair = episodePair(mediaFile('Show.S01E01.mkv', 'video'), mediaFile('Show.S01E01.srt', 'subtitle'));

  it('walks the forward path', () => {
    const tx = new MergeTransaction(pair, '/media/Show.S01E01.embedded.mkv', '/media/backups');
    tx.transition(TransactionState.VALIDATED);
    tx.transition(TransactionState.MERGED);
    expect(tx.state).toBe(TransactionState.MERGED);
    expect(tx.history).toEqual([TransactionState.INIT, TransactionState.VALIDATED, TransactionState.MERGED]);
  });

  it('rejects a skipped stage', () => {
    const tx = new MergeTransaction(pair, '/media/Show.S01E01.embedded.mkv', '/media/backups');
    expect(() => tx.transition(TransactionState.COMMITTED)).toThrow(InvalidStateError);
    expect(tx.state).toBe(TransactionState.INIT);
  });

  it('allows no transition out of a terminal state', () => {
    const tx = new MergeTransaction(pair, '/media/Show.S01E01.embedded.mkv', '/media/backups');
    tx.transition(TransactionState.FAILED);
    tx.transition(TransactionState.ROLLED_BACK);
    expect(() => tx.transition(TransactionState.FAILED)).toThrow(InvalidStateError);
  });

  it('names the temporary output beside the video', () => {
    expect(tempOutputPathFor('/media/Show.S01E01.mkv')).toBe('/media/Show.S01E01.embedded.mkv');
  });
});

describe('MergeTransactionManager', () => {
  let dir: string;
  let pair: MatchedPair;
  let videoPath: string;
  let subtitlePath: string;
  let tempPath: string;
  let backupDir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-tx-'));
    pair = episodePair(
      mediaFile('Show.S01E01.mkv', 'video', dir, 5),
      mediaFile('Show.S01E01.ar.srt', 'subtitle', dir, 4)
    );
    videoPath = pair.video.path;
    subtitlePath = pair.subtitle.path;
    tempPath = path.join(dir, 'Show.S01E01.embedded.mkv');
    backupDir = path.join(dir, 'backups');
    await fs.writeFile(videoPath, 'video');
    await fs.writeFile(subtitlePath, 'subs');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  async function expectOriginalsInPlace(): Promise<void> {
    expect(await fs.readFile(videoPath, 'utf8')).toBe('video');
    expect(await fs.readFile(subtitlePath, 'utf8')).toBe('subs');
    expect(await fs.pathExists(tempPath)).toBe(false);
  }

  it('commits the merged video and keeps the originals in the backup directory', async () => {
    const runner = new FakeRunner();
    const manager = new MergeTransactionManager({ runner, guard: guardWith() });

    const result = await manager.run(pair, { mergeToolPath: TOOL });

    expect(result.state).toBe(TransactionState.COMMITTED);
    expect(result.rolledBack).toBe(false);
    expect(result.finalPath).toBe(videoPath);
    expect(result.backupDir).toBe(backupDir);
    expect(result.language).toEqual({ source: 'filename', code: 'ara' });
    expect(result.history).toEqual([
      TransactionState.INIT,
      TransactionState.VALIDATED,
      TransactionState.MERGED,
      TransactionState.BACKED_UP,
      TransactionState.COMMITTED,
    ]);

    expect(await fs.readFile(videoPath, 'utf8')).toBe('merged');
    expect(await fs.pathExists(subtitlePath)).toBe(false);
    expect(await fs.pathExists(tempPath)).toBe(false);
    expect(await fs.readFile(path.join(backupDir, 'Show.S01E01.mkv'), 'utf8')).toBe('video');
    expect(await fs.readFile(path.join(backupDir, 'Show.S01E01.ar.srt'), 'utf8')).toBe('subs');

    expect(runner.invocations).toEqual([
      {
        toolPath: TOOL,
        args: ['-o', tempPath, videoPath, '--language', '0:ara', '--default-track', '0:yes', subtitlePath],
        timeoutMs: 300_000,
      },
    ]);
  });

  it('passes the configured language and default flag when the filename has no tag', async () => {
    const untagged = episodePair(pair.video, mediaFile('Show.S01E01.srt', 'subtitle', dir, 4));
    await fs.writeFile(untagged.subtitle.path, 'subs');
    const runner = new FakeRunner();

    const result = await new MergeTransactionManager({ runner, guard: guardWith() }).run(untagged, {
      mergeToolPath: TOOL,
      languageCode: 'en',
      defaultTrack: false,
    });

    expect(result.language).toEqual({ source: 'config', code: 'eng' });
    expect(runner.invocations[0]?.args).toEqual([
      '-o',
      tempPath,
      videoPath,
      '--language',
      '0:eng',
      '--default-track',
      '0:no',
      untagged.subtitle.path,
    ]);
  });

  it('rolls back a non-zero exit and reports the diagnostics', async () => {
    const runner = new FakeRunner(writeOutput('partial', 2, 'Error: track 1 unreadable'));

    const result = await new MergeTransactionManager({ runner, guard: guardWith() }).run(pair, { mergeToolPath: TOOL });

    expect(result).toMatchObject({
      state: TransactionState.FAILED,
      rolledBack: true,
      errorKind: ErrorCode.MERGE_TOOL_FAILURE,
      errorMessage: 'Merge tool failed with exit code 2: Error: track 1 unreadable',
      stderr: 'Error: track 1 unreadable',
      finalPath: videoPath,
      backupDir: undefined,
    });
    expect(result.history).toEqual([
      TransactionState.INIT,
      TransactionState.VALIDATED,
      TransactionState.FAILED,
      TransactionState.ROLLED_BACK,
    ]);
    await expectOriginalsInPlace();
    expect(await fs.pathExists(backupDir)).toBe(false);
  });

  it('treats a clean exit without output as a failure', async () => {
    const runner = new FakeRunner(async () => ({ kind: 'exited', exitCode: 0, stderr: '' }));

    const result = await new MergeTransactionManager({ runner, guard: guardWith() }).run(pair, { mergeToolPath: TOOL });

    expect(result.errorKind).toBe(ErrorCode.MERGE_TOOL_FAILURE);
    expect(result.errorMessage).toBe(`Merge tool exited cleanly but produced no output at ${tempPath}`);
    await expectOriginalsInPlace();
  });

  it('reports a timeout with a budget scaled to the input size', async () => {
    const runner = new FakeRunner(async invocation => {
      await fs.writeFile(outputOf(invocation), 'partial');
      return { kind: 'timeout', stderr: 'Progress: 40%' };
    });
    const fileOps: TransactionFileOps = {
      ...fsTransactionFileOps,
      size: async filePath => (filePath === videoPath ? 10 * GIB : 4),
    };
    const guard = guardWith({ volume: { bavail: 1_000_000_000, bsize: 4096 } });

    const result = await new MergeTransactionManager({ runner, guard, fileOps }).run(pair, { mergeToolPath: TOOL });

    expect(runner.invocations[0]?.timeoutMs).toBe(1_500_000);
    expect(result).toMatchObject({
      state: TransactionState.FAILED,
      rolledBack: true,
      errorKind: ErrorCode.MERGE_TIMEOUT,
      errorMessage: 'Merge tool timed out after 1500s',
      stderr: 'Progress: 40%',
    });
    await expectOriginalsInPlace();
  });

  it('reports a tool that cannot be started', async () => {
    const runner = new FakeRunner(async () => ({ kind: 'spawn-error', error: new Error('spawn EACCES'), stderr: '' }));

    const result = await new MergeTransactionManager({ runner, guard: guardWith() }).run(pair, { mergeToolPath: TOOL });

    expect(result.errorKind).toBe(ErrorCode.MERGE_TOOL_FAILURE);
    expect(result.errorMessage).toBe('Merge tool could not be started: spawn EACCES');
    await expectOriginalsInPlace();
  });

  it('removes a stale temporary output before merging', async () => {
    await fs.writeFile(tempPath, 'stale');
    let sawStale = true;
    const runner = new FakeRunner(async invocation => {
      sawStale = await fs.pathExists(outputOf(invocation));
      await fs.writeFile(outputOf(invocation), 'merged');
      return { kind: 'exited', exitCode: 0, stderr: '' };
    });

    const result = await new MergeTransactionManager({ runner, guard: guardWith() }).run(pair, { mergeToolPath: TOOL });

    expect(sawStale).toBe(false);
    expect(result.state).toBe(TransactionState.COMMITTED);
    expect(await fs.readFile(videoPath, 'utf8')).toBe('merged');
  });

  it('replaces a stale backup of the same name', async () => {
    await fs.ensureDir(backupDir);
    await fs.writeFile(path.join(backupDir, 'Show.S01E01.mkv'), 'older');

    const result = await new MergeTransactionManager({ runner: new FakeRunner(), guard: guardWith() }).run(pair, {
      mergeToolPath: TOOL,
    });

    expect(result.state).toBe(TransactionState.COMMITTED);
    expect(await fs.readFile(path.join(backupDir, 'Show.S01E01.mkv'), 'utf8')).toBe('video');
  });

  it('restores the video when the subtitle backup fails', async () => {
    const fileOps: TransactionFileOps = {
      ...fsTransactionFileOps,
      move: async (from, to) => {
        if (from === subtitlePath) {
          throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
        }
        await fsTransactionFileOps.move(from, to);
      },
    };

    const result = await new MergeTransactionManager({ runner: new FakeRunner(), guard: guardWith(), fileOps }).run(
      pair,
      { mergeToolPath: TOOL }
    );

    expect(result).toMatchObject({
      state: TransactionState.FAILED,
      rolledBack: true,
      errorKind: ErrorCode.FILE_SYSTEM_ERROR,
      systemCode: 'EACCES',
      finalPath: videoPath,
      backupDir,
    });
    expect(result.history).toEqual([
      TransactionState.INIT,
      TransactionState.VALIDATED,
      TransactionState.MERGED,
      TransactionState.FAILED,
      TransactionState.ROLLED_BACK,
    ]);
    await expectOriginalsInPlace();
    expect(await fs.pathExists(path.join(backupDir, 'Show.S01E01.mkv'))).toBe(false);
  });

  it('restores both originals when the commit rename fails', async () => {
    const fileOps: TransactionFileOps = {
      ...fsTransactionFileOps,
      rename: async () => {
        throw Object.assign(new Error('EXDEV: cross-device link not permitted'), { code: 'EXDEV' });
      },
    };

    const result = await new MergeTransactionManager({ runner: new FakeRunner(), guard: guardWith(), fileOps }).run(
      pair,
      { mergeToolPath: TOOL }
    );

    expect(result.state).toBe(TransactionState.FAILED);
    expect(result.rolledBack).toBe(true);
    expect(result.systemCode).toBe('EXDEV');
    expect(result.errorMessage).toBe(
      `commit failed for ${videoPath}: EXDEV: cross-device link not permitted`
    );
    expect(result.finalPath).toBe(videoPath);
    expect(result.history).toEqual([
      TransactionState.INIT,
      TransactionState.VALIDATED,
      TransactionState.MERGED,
      TransactionState.BACKED_UP,
      TransactionState.FAILED,
      TransactionState.ROLLED_BACK,
    ]);
    await expectOriginalsInPlace();
  });

  it('reports where the video is when rollback itself fails', async () => {
    const fileOps: TransactionFileOps = {
      ...fsTransactionFileOps,
      move: async (from, to) => {
        if (from === subtitlePath || path.dirname(from) === backupDir) {
          throw new Error('EIO: i/o error');
        }
        await fsTransactionFileOps.move(from, to);
      },
    };

    const result = await new MergeTransactionManager({ runner: new FakeRunner(), guard: guardWith(), fileOps }).run(
      pair,
      { mergeToolPath: TOOL }
    );

    expect(result.state).toBe(TransactionState.FAILED);
    expect(result.rolledBack).toBe(false);
    expect(result.systemCode).toBeUndefined();
    expect(result.finalPath).toBe(path.join(backupDir, 'Show.S01E01.mkv'));
    expect(result.history).toEqual([
      TransactionState.INIT,
      TransactionState.VALIDATED,
      TransactionState.MERGED,
      TransactionState.FAILED,
    ]);
    expect(await fs.readFile(path.join(backupDir, 'Show.S01E01.mkv'), 'utf8')).toBe('video');
    expect(await fs.pathExists(tempPath)).toBe(false);
  });

  it('fails validation without enough free space and never runs the tool', async () => {
    const runner = new FakeRunner();
    const guard = guardWith({ volume: { bavail: 2, bsize: 4 } });

    const result = await new MergeTransactionManager({ runner, guard }).run(pair, { mergeToolPath: TOOL });

    expect(result.errorKind).toBe(ErrorCode.INSUFFICIENT_SPACE);
    expect(result.errorMessage).toBe(`Insufficient disk space on volume of ${dir}: need 10 bytes, 8 available`);
    expect(result.history).toEqual([TransactionState.INIT, TransactionState.FAILED, TransactionState.ROLLED_BACK]);
    expect(runner.invocations).toEqual([]);
    await expectOriginalsInPlace();
  });

  it('rejects a container the tool cannot write', async () => {
    const mp4 = episodePair(mediaFile('Movie.mp4', 'video', dir), pair.subtitle);
    const runner = new FakeRunner();

    const result = await new MergeTransactionManager({ runner, guard: guardWith() }).run(mp4, { mergeToolPath: TOOL });

    expect(result.errorKind).toBe(ErrorCode.UNSUPPORTED_CONTAINER);
    expect(runner.invocations).toEqual([]);
  });

  it('fails when the tool does not answer its probe', async () => {
    const runner = new FakeRunner();

    const result = await new MergeTransactionManager({ runner, guard: guardWith({ available: false }) }).run(pair, {
      mergeToolPath: TOOL,
    });

    expect(result.errorKind).toBe(ErrorCode.DEPENDENCY_MISSING);
    expect(result.errorMessage).toBe(`Merge tool not usable at ${TOOL}: spawn ENOENT`);
    expect(runner.invocations).toEqual([]);
    await expectOriginalsInPlace();
  });

  it('rejects invalid options before touching anything', async () => {
    const manager = new MergeTransactionManager({ runner: new FakeRunner(), guard: guardWith() });

    await expect(manager.run(pair, { mergeToolPath: '' })).rejects.toThrow(ConfigurationError);
    await expect(manager.run(pair, { mergeToolPath: TOOL, spaceSafetyFactor: 0.5 })).rejects.toThrow(ConfigurationError);
    await expect(manager.run(pair, { mergeToolPath: TOOL, backupDirName: '../outside' })).rejects.toThrow(ConfigurationError);
    await expect(manager.run(pair, { mergeToolPath: TOOL, backupDirName: '..' })).rejects.toThrow(ConfigurationError);
    expect(await fs.pathExists(path.join(path.dirname(dir), 'outside'))).toBe(false);
    await expectOriginalsInPlace();
  });
});
