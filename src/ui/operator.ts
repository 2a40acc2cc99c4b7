/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import enquirer from 'enquirer';
import ora from 'ora';
import readline from 'node:readline';
import type { GuardAction, GuardPrompter } from '../core/CommandGuard.js';
import { HISTORY_SIZE, PromptHistory } from './promptHistory.js';

export type CommandAction = 'run' | 'edit' | 'skip' | 'all' | 'stop';

/**
 * Everything the session asks of the person at the keyboard
 */
export interface Operator extends GuardPrompter {
  /**
   * Read one line. Ctrl+C yields '' (back to the prompt); end of input yields null.
   * Lines typed at a terminal are kept in the prompt history.
   */
  readInput(prompt: string): Promise<string | null>;
  chooseCommandAction(index: number, total: number): Promise<CommandAction>;
  confirm(message: string): Promise<boolean>;
  /** Show progress while waiting; call the returned function to clear it */
  startActivity(label: string): () => void;
}

/**
 * enquirer rejects with an empty string on Ctrl+C/Esc; anything else is a real failure
 */
async function promptOrCancel<T>(run: () => Promise<T>): Promise<{ value: T } | null> {
  try {
    return { value: await run() };
  } catch (error) {
    if (error === '' || (error instanceof Error && error.message === '')) {
      return null;
    }
    if (error instanceof Error && 'code' in error && error.code === 'ERR_USE_AFTER_CLOSE') {
      return null;
    }
    throw error;
  }
}

interface PipedLines {
  queue: string[];
  waiters: Array<(line: string | null) => void>;
  closed: boolean;
}

export class TerminalOperator implements Operator {
  private piped?: PipedLines;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    private readonly history: PromptHistory = new PromptHistory()
  ) {}

  async readInput(prompt: string): Promise<string | null> {
    if (!('isTTY' in this.input && this.input.isTTY === true)) {
      return this.readPipedLine(prompt);
    }

    const recent = await this.history.load().catch((error: unknown) => {
      this.warnHistory(error);
      return [];
    });
    const line = await new Promise<string | null>((resolve) => {
      const rl = readline.createInterface({
        input: this.input,
        output: this.output,
        terminal: true,
        crlfDelay: Infinity,
        history: recent,
        historySize: HISTORY_SIZE,
        removeHistoryDuplicates: true
      });
      let settled = false;
      const finish = (value: string | null) => {
        if (settled) return;
        settled = true;
        rl.close();
        resolve(value);
      };

      rl.on('line', (value) => finish(value));
      rl.on('SIGINT', () => {
        this.output.write('\n');
        finish('');
      });
      rl.on('close', () => finish(null));
      rl.setPrompt(prompt);
      rl.prompt();
    });

    if (line?.trim()) {
      await this.history.add(line).catch((error: unknown) => this.warnHistory(error));
    }
    return line;
  }

  private warnHistory(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.output.write(chalk.yellow(`Warning: prompt history unavailable: ${message}\n`));
  }

  /**
   * Without a terminal one reader lives for the whole session, so lines that
   * arrive together are queued rather than lost between prompts.
   */
  private readPipedLine(prompt: string): Promise<string | null> {
    const state = this.piped ?? this.openPipedLines();
    this.output.write(prompt);
    const queued = state.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (state.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      state.waiters.push(resolve);
    });
  }

  private openPipedLines(): PipedLines {
    const state: PipedLines = { queue: [], waiters: [], closed: false };
    const rl = readline.createInterface({ input: this.input, terminal: false, crlfDelay: Infinity });
    rl.on('line', (line) => {
      const waiter = state.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        state.queue.push(line);
      }
    });
    rl.on('close', () => {
      state.closed = true;
      for (const waiter of state.waiters.splice(0)) {
        waiter(null);
      }
    });
    this.piped = state;
    return state;
  }

  async chooseCommandAction(index: number, total: number): Promise<CommandAction> {
    const answer = await promptOrCancel(() =>
      enquirer.prompt<{ action: CommandAction }>({
        type: 'select',
        name: 'action',
        message: `Command ${index}/${total} action`,
        choices: [
          { name: 'skip', message: 'Skip' },
          { name: 'run', message: 'Run' },
          { name: 'edit', message: 'Edit' },
          { name: 'all', message: 'Run all remaining' },
          { name: 'stop', message: 'Stop' }
        ],
        initial: 0
      })
    );
    return answer?.value.action ?? 'stop';
  }

  async chooseGuardAction(reason: string, command: string): Promise<GuardAction> {
    this.output.write(chalk.red(`Safe mode blocked high-risk command (${reason}): ${command}\n`));
    const answer = await promptOrCancel(() =>
      enquirer.prompt<{ action: GuardAction }>({
        type: 'select',
        name: 'action',
        message: 'Safe mode action',
        choices: [
          { name: 'skip', message: 'Skip' },
          { name: 'override', message: 'Run once anyway' },
          { name: 'edit', message: 'Edit' }
        ],
        initial: 0
      })
    );
    return answer?.value.action ?? 'skip';
  }

  async editCommand(initial: string): Promise<string> {
    const answer = await promptOrCancel(() =>
      enquirer.prompt<{ command: string }>({
        type: 'input',
        name: 'command',
        message: 'Enter the modified command',
        initial
      })
    );
    return answer?.value.command.trim() ?? '';
  }

  async confirm(message: string): Promise<boolean> {
    const answer = await promptOrCancel(() =>
      enquirer.prompt<{ confirmed: boolean }>({
        type: 'confirm',
        name: 'confirmed',
        message,
        initial: false
      })
    );
    return answer?.value.confirmed ?? false;
  }

  startActivity(label: string): () => void {
    const spinner = ora({ text: label, stream: process.stderr }).start();
    return () => {
      spinner.stop();
    };
  }
}
