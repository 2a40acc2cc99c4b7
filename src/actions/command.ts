/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import fs from 'fs-extra';
import { spawn, spawnSync } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import os from 'node:os';
import type { ExecutionResult, RuntimeSettings } from '../types.js';
import { redactSensitiveText } from '../core/redaction.js';

/** Exit code recorded when the shell itself could not be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface RunCommandOptions {
  /** Working directory (defaults to process.cwd()) */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in seconds (null/0 = no timeout) */
  timeoutSeconds?: number | null;
  /** Aborting kills the command and marks it interrupted */
  signal?: AbortSignal;
  /** Standard input for the command (default: inherit the operator's) */
  stdin?: 'inherit' | 'ignore' | number;
  /** Stream stdout output */
  onStdout?: (chunk: string) => void;
  /** Stream stderr output */
  onStderr?: (chunk: string) => void;
}

/**
 * Shell convention for a process killed by a signal: 128 + signal number
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 0);
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * SIGKILL one pid or, when negative, one process group. False when it is already gone.
 */
function killTarget(pid: number): boolean {
  try {
    process.kill(pid, 'SIGKILL');
    return true;
  } catch (error) {
    if (errorCode(error) === 'ESRCH') {
      return false;
    }
    throw error;
  }
}

interface ProcessRow {
  pid: number;
  ppid: number;
}

function processTable(): ProcessRow[] {
  if (process.platform === 'linux' && fs.existsSync('/proc')) {
    const rows: ProcessRow[] = [];
    for (const entry of fs.readdirSync('/proc')) {
      if (!/^\d+$/.test(entry)) continue;
      try {
        const stat = fs.readFileSync(`/proc/${entry}/stat`, 'utf8');
        // Fields after the parenthesized name: state, ppid, ...
        const fields = stat.slice(stat.lastIndexOf(')') + 2).split(' ');
        rows.push({ pid: Number(entry), ppid: Number(fields[1]) });
      } catch {
        // Exited while scanning
        continue;
      }
    }
    return rows;
  }

  const listing = spawnSync('ps', ['-A', '-o', 'pid=,ppid='], { encoding: 'utf8' });
  if (listing.status !== 0 || !listing.stdout) {
    return [];
  }
  return listing.stdout
    .split('\n')
    .map((line) => line.trim().split(/\s+/).map(Number))
    .filter(([pid, ppid]) => Number.isInteger(pid) && Number.isInteger(ppid) && pid > 0)
    .map(([pid, ppid]) => ({ pid, ppid }));
}

/**
 * Every live descendant of `root`
 */
export function descendantPids(root: number): number[] {
  const children = new Map<number, number[]>();
  for (const { pid, ppid } of processTable()) {
    children.set(ppid, [...(children.get(ppid) ?? []), pid]);
  }
  const found: number[] = [];
  const queue = [root];
  for (let i = 0; i < queue.length; i += 1) {
    for (const child of children.get(queue[i]) ?? []) {
      found.push(child);
      queue.push(child);
    }
  }
  return found;
}

/**
 * Execute one command line through the host shell.
 *
 * stdout and stderr are drained concurrently into their own buffers and the
 * result is assembled on 'close', after both streams have ended. Never
 * rejects: spawn failures, timeouts and interrupts are encoded in the result.
 * Captured text is returned unredacted; see CommandRunner.
 */
export function runShellCommand(command: string, options: RunCommandOptions = {}): Promise<ExecutionResult> {
  return new Promise((resolve) => {
    const isWindows = process.platform === 'win32';
    const stdin = options.stdin ?? 'inherit';
    // A new session would cost the command its controlling terminal (sudo, y/N prompts),
    // so only commands without one get their own process group.
    const onTerminal = stdin === 'inherit' && process.stdin.isTTY === true;
    const ownGroup = !isWindows && !onTerminal;
    const spawnOptions: SpawnOptions = {
      cwd: options.cwd ?? process.cwd(),
      shell: true,
      detached: ownGroup,
      stdio: [stdin, 'pipe', 'pipe'],
      env: {
        ...process.env,
        SHELLMATE: '1',
        ...options.env,
      },
    };

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let interrupted = false;
    let killed = false;
    let settled = false;
    let timeoutId: NodeJS.Timeout | undefined;

    const child = spawn(command, [], spawnOptions);

    const kill = (): void => {
      if (settled) return;
      killed = true;
      const pid = child.pid;
      try {
        if (isWindows || pid === undefined) {
          child.kill('SIGKILL');
        } else if (ownGroup) {
          killTarget(-pid);
        } else {
          for (const target of [...descendantPids(pid), pid]) {
            killTarget(target);
          }
        }
      } catch {
        child.kill('SIGKILL');
      }
      if (child.exitCode !== null || child.signalCode !== null) {
        // The shell is gone; a leftover holder of the pipes must not keep 'close' from firing
        child.stdout?.destroy();
        child.stderr?.destroy();
      }
    };

    const onAbort = (): void => {
      interrupted = true;
      kill();
    };

    const finish = (exitCode: number): void => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
      resolve({ command, stdout, stderr, exitCode, timedOut, interrupted });
    };

    if (options.timeoutSeconds && options.timeoutSeconds > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        kill();
      }, options.timeoutSeconds * 1000);
    }

    if (options.signal) {
      if (options.signal.aborted) {
        onAbort();
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
      options.onStdout?.(chunk);
    });

    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
      options.onStderr?.(chunk);
    });

    child.once('error', (error) => {
      stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}${error.message}\n`;
      finish(SPAWN_FAILURE_EXIT_CODE);
    });

    child.once('close', (code, signal) => {
      if (killed) {
        finish(signalExitCode('SIGKILL'));
      } else if (code !== null) {
        finish(code);
      } else if (signal) {
        finish(signalExitCode(signal));
      } else {
        finish(SPAWN_FAILURE_EXIT_CODE);
      }
    });
  });
}

export interface CommandExecutor {
  run(command: string, options?: { signal?: AbortSignal }): Promise<ExecutionResult>;
}

export interface CommandRunnerOptions {
  cwd?: string;
  /** Echo output live to the terminal (default: true) */
  echo?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

/**
 * Runs commands with the session's timeout, echoing stdout as-is and
 * stderr in red while it streams, and redacts both streams before
 * handing the result back.
 */
export class CommandRunner implements CommandExecutor {
  private readonly cwd?: string;
  private readonly echo: boolean;
  private readonly out: NodeJS.WritableStream;
  private readonly err: NodeJS.WritableStream;

  constructor(
    private readonly settings: Pick<RuntimeSettings, 'commandTimeoutSeconds'>,
    options: CommandRunnerOptions = {}
  ) {
    this.cwd = options.cwd;
    this.echo = options.echo ?? true;
    this.out = options.stdout ?? process.stdout;
    this.err = options.stderr ?? process.stderr;
  }

  async run(command: string, options: { signal?: AbortSignal } = {}): Promise<ExecutionResult> {
    const result = await runShellCommand(command, {
      cwd: this.cwd,
      timeoutSeconds: this.settings.commandTimeoutSeconds,
      signal: options.signal,
      onStdout: this.echo ? (chunk) => this.out.write(chunk) : undefined,
      onStderr: this.echo ? (chunk) => this.err.write(chalk.red(chunk)) : undefined,
    });

    return {
      ...result,
      stdout: redactSensitiveText(result.stdout),
      stderr: redactSensitiveText(result.stderr),
    };
  }
}
