import { EventEmitter } from 'events';
import { ChildProcess, spawn } from 'child_process';
import { jest } from '@jest/globals';
import {
  SpawnMergeToolRunner,
  buildMergeArgs,
  mergeTimeoutSeconds,
} from '../../../src/services/embedding/mergeTool.js';

jest.mock('child_process', () => ({
  spawn: jest.fn(),
}));

jest.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const mockSpawn = spawn as jest.MockedFunction<typeof spawn>;
const GIB = 1024 ** 3;

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  kill = jest.fn((_signal?: NodeJS.Signals) => true);
}

describe('buildMergeArgs', () => {
  it('places track options between the video and the subtitle', () => {
    expect(
      buildMergeArgs({
        outputPath: '/m/Show.embedded.mkv',
        videoPath: '/m/Show.mkv',
        subtitlePath: '/m/Show.ar.srt',
        languageCode: 'ara',
        defaultTrack: true,
      })
    ).toEqual(['-o', '/m/Show.embedded.mkv', '/m/Show.mkv', '--language', '0:ara', '--default-track', '0:yes', '/m/Show.ar.srt']);
  });

  it('omits the language when none was resolved', () => {
    expect(
      buildMergeArgs({
        outputPath: '/m/out.mkv',
        videoPath: '/m/in.mkv',
        subtitlePath: '/m/in.srt',
        languageCode: null,
        defaultTrack: false,
      })
    ).toEqual(['-o', '/m/out.mkv', '/m/in.mkv', '--default-track', '0:no', '/m/in.srt']);
  });
});

describe('mergeTimeoutSeconds', () => {
  it.each([
    [0, 300],
    [GIB / 2, 360],
    [GIB, 420],
    [10 * GIB, 1500],
    [100 * GIB, 1800],
  ])('gives %d bytes a %d second budget', (bytes, seconds) => {
    expect(mergeTimeoutSeconds(bytes)).toBe(seconds);
  });
});

describe('SpawnMergeToolRunner', () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    mockSpawn.mockReset();
    mockSpawn.mockReturnValue(child as unknown as ChildProcess);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('spawns the tool with an argument array', async () => {
    const run = new SpawnMergeToolRunner().run({ toolPath: '/opt/mkvmerge', args: ['-o', 'a', 'b'], timeoutMs: 1000 });
    child.emit('close', 0);
    await run;

    expect(mockSpawn).toHaveBeenCalledWith('/opt/mkvmerge', ['-o', 'a', 'b'], expect.objectContaining({ windowsHide: true }));
  });

  it('reports the exit code and stderr', async () => {
    const run = new SpawnMergeToolRunner().run({ toolPath: 'mkvmerge', args: [], timeoutMs: 1000 });
    child.stderr.emit('data', Buffer.from('Error: bad track'));
    child.emit('close', 2);

    await expect(run).resolves.toEqual({ kind: 'exited', exitCode: 2, stderr: 'Error: bad track' });
  });

  it('falls back to stdout for diagnostics', async () => {
    const run = new SpawnMergeToolRunner().run({ toolPath: 'mkvmerge', args: [], timeoutMs: 1000 });
    child.stdout.emit('data', Buffer.from('Error: no space'));
    child.emit('close', 2);

    await expect(run).resolves.toEqual({ kind: 'exited', exitCode: 2, stderr: 'Error: no space' });
  });

  it('terminates the process on timeout, then kills it after the grace period', async () => {
    jest.useFakeTimers();
    const run = new SpawnMergeToolRunner(1000).run({ toolPath: 'mkvmerge', args: [], timeoutMs: 5000 });

    jest.advanceTimersByTime(5000);
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');

    jest.advanceTimersByTime(1000);
    expect(child.kill).toHaveBeenCalledWith('SIGKILL');

    child.emit('close', null);
    await expect(run).resolves.toEqual({ kind: 'timeout', stderr: '' });
  });

  it('reports a spawn failure', async () => {
    const run = new SpawnMergeToolRunner().run({ toolPath: '/missing/mkvmerge', args: [], timeoutMs: 1000 });
    const error = new Error('spawn /missing/mkvmerge ENOENT');
    child.emit('error', error);

    await expect(run).resolves.toEqual({ kind: 'spawn-error', error, stderr: '' });
  });
});
