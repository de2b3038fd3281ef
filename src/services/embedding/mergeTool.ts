import { spawn } from 'child_process';
import { logger } from '../../utils/logger.js';

/**
 * Merge tool invocation
 *
 * The tool is always spawned with an argument array, never through a shell,
 * so filenames with spaces or quotes need no escaping.
 */

export const TIMEOUT_BASE_SECONDS = 300;
export const TIMEOUT_PER_GIB_SECONDS = 120;
export const TIMEOUT_MAX_SECONDS = 1800;

const GIB = 1024 ** 3;
const DIAGNOSTIC_LIMIT = 8192;
const DEFAULT_KILL_GRACE_MS = 5000;

export interface MergeInvocation {
  toolPath: string;
  args: string[];
  timeoutMs: number;
}

export type MergeOutcome =
  | { kind: 'exited'; exitCode: number | null; stderr: string }
  | { kind: 'timeout'; stderr: string }
  | { kind: 'spawn-error'; error: Error; stderr: string };

export interface MergeToolRunner {
  run(invocation: MergeInvocation): Promise<MergeOutcome>;
}

export interface MergeArgsInput {
  outputPath: string;
  videoPath: string;
  subtitlePath: string;
  languageCode: string | null;
  defaultTrack: boolean;
}

/**
 * `-o <out> <video> [--language 0:<code>] --default-track 0:<yes|no> <subtitle>`
 *
 * Track options apply to the file that follows them, so they sit between
 * the video and the subtitle.
 */
export function buildMergeArgs(input: MergeArgsInput): string[] {
  const args = ['-o', input.outputPath, input.videoPath];
  if (input.languageCode) {
    args.push('--language', `0:${input.languageCode}`);
  }
  args.push('--default-track', `0:${input.defaultTrack ? 'yes' : 'no'}`);
  args.push(input.subtitlePath);
  return args;
}

/**
 * 300s base plus 120s per whole GiB of input, clamped to [300s, 1800s]
 */
export function mergeTimeoutSeconds(totalBytes: number): number {
  const gib = Math.max(0, totalBytes) / GIB;
  const seconds = TIMEOUT_BASE_SECONDS + Math.floor(gib * TIMEOUT_PER_GIB_SECONDS);
  return Math.min(TIMEOUT_MAX_SECONDS, Math.max(TIMEOUT_BASE_SECONDS, seconds));
}

function tail(text: string): string {
  return text.length > DIAGNOSTIC_LIMIT ? text.slice(-DIAGNOSTIC_LIMIT) : text;
}

/**
 * Default runner: spawns the executable and captures its diagnostics.
 * mkvmerge reports errors on stdout, so stdout stands in when stderr is empty.
 */
export class SpawnMergeToolRunner implements MergeToolRunner {
  constructor(private readonly killGraceMs: number = DEFAULT_KILL_GRACE_MS) {}

  run(invocation: MergeInvocation): Promise<MergeOutcome> {
    return new Promise(resolve => {
      const child = spawn(invocation.toolPath, invocation.args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const diagnostics = (): string => tail(stderr.trim() ? stderr : stdout);

      const finish = (outcome: MergeOutcome): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        resolve(outcome);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        logger.warn('Merge tool exceeded timeout, terminating', {
          service: 'mergeTool',
          timeoutMs: invocation.timeoutMs,
          pid: child.pid,
        });
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, this.killGraceMs);
      }, invocation.timeoutMs);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', error => {
        finish({ kind: 'spawn-error', error, stderr: diagnostics() });
      });

      child.on('close', code => {
        if (timedOut) {
          finish({ kind: 'timeout', stderr: diagnostics() });
          return;
        }
        finish({ kind: 'exited', exitCode: code, stderr: diagnostics() });
      });
    });
  }
}
