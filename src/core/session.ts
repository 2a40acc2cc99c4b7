/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import type { CommandExecutor } from '../actions/command.js';
import { APP_NAME } from '../constants.js';
import type {
  CommandProposal,
  ExecutionResult,
  ExecutionSummaryEntry,
  RuntimeSettings
} from '../types.js';
import type { CommandAction, Operator } from '../ui/operator.js';
import type { PlatformInfo } from '../utils/platform.js';
import type { CommandGuard } from './CommandGuard.js';
import type { InteractionLogger } from './interactionLogger.js';
import { RuntimeCommandHandler } from './runtimeCommands.js';
import type { ResolveOutcome } from './toolCallResolver.js';
import type { UsageTracker } from './usageTracker.js';

export type SessionState = 'idle' | 'awaitingProposal' | 'reviewingBatch' | 'executing' | 'awaitingFollowUp';

/**
 * The two model exchanges a session needs
 */
export interface CommandResolver {
  requestCommands(prompt: string, round?: number, signal?: AbortSignal): Promise<ResolveOutcome>;
  reportExecution(
    outputs: ExecutionResult[],
    summary: ExecutionSummaryEntry[],
    round: number,
    signal?: AbortSignal
  ): Promise<ResolveOutcome>;
}

export interface SessionDeps {
  settings: RuntimeSettings;
  resolver: CommandResolver;
  guard: CommandGuard;
  runner: CommandExecutor;
  operator: Operator;
  usage: UsageTracker;
  logger?: InteractionLogger;
  platform?: Pick<PlatformInfo, 'osName' | 'shellName'>;
  /** Standard output sink; defaults to console.log */
  print?: (line: string) => void;
  /** Error output sink; defaults to console.error */
  printError?: (line: string) => void;
  /** Subscribe to operator interrupts while a command runs; returns the unsubscribe */
  onInterrupt?: (handler: () => void) => () => void;
}

interface BatchResult {
  outputs: ExecutionResult[];
  summary: ExecutionSummaryEntry[];
  stopped: boolean;
}

function processInterrupts(handler: () => void): () => void {
  process.on('SIGINT', handler);
  return () => {
    process.off('SIGINT', handler);
  };
}

/**
 * One interactive session: reads requests, walks the operator through each
 * proposed batch, and feeds execution reports back to the model until it
 * stops proposing commands.
 */
export class Session {
  private state: SessionState = 'idle';
  private readonly runtimeCommands: RuntimeCommandHandler;
  private readonly print: (line: string) => void;
  private readonly printError: (line: string) => void;
  private readonly onInterrupt: (handler: () => void) => () => void;

  constructor(private readonly deps: SessionDeps) {
    this.print = deps.print ?? ((line) => console.log(line));
    this.printError = deps.printError ?? ((line) => console.error(line));
    this.onInterrupt = deps.onInterrupt ?? processInterrupts;
    this.runtimeCommands = new RuntimeCommandHandler({
      settings: deps.settings,
      confirm: (message) => deps.operator.confirm(message),
      logger: deps.logger,
      print: this.print
    });
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Foreground loop. Returns when the operator quits or input ends.
   */
  async run(): Promise<void> {
    this.printBanner();

    for (;;) {
      const input = await this.deps.operator.readInput(chalk.green(`${APP_NAME}: `));
      if (input === null) {
        break;
      }
      const trimmed = input.trim();
      if (!trimmed) {
        continue;
      }
      this.deps.logger?.log('user', trimmed);

      try {
        const signal = await this.dispatch(trimmed);
        if (signal === '/quit') {
          break;
        }
      } catch (error) {
        this.reportFailure(error, { input: trimmed });
      } finally {
        this.state = 'idle';
      }
    }
  }

  /**
   * Handle one line: a runtime command, manual mode, or a request for the model
   */
  async dispatch(input: string): Promise<'/quit' | null> {
    if (this.runtimeCommands.matches(input)) {
      const signal = await this.runtimeCommands.handle(input);
      if (signal === '/manual') {
        await this.manualMode();
        return null;
      }
      return signal;
    }
    await this.handleRequest(input);
    return null;
  }

  async handleRequest(prompt: string): Promise<void> {
    this.state = 'awaitingProposal';
    const outcome = await this.withActivity('Thinking', () => this.deps.resolver.requestCommands(prompt, 1));
    this.printUsage();

    if (outcome.error) {
      this.printError(chalk.red(`Error: ${outcome.error.message}`));
      this.state = 'idle';
      return;
    }

    this.deps.logger?.logEvent('auto_mode_commands_payload', {
      response: outcome.text,
      commands: outcome.commands
    });
    if (outcome.text) {
      this.printAssistant(outcome.text);
    }

    if (outcome.commands) {
      await this.executeBatches(outcome.commands);
    } else if (outcome.text) {
      this.print(chalk.yellow('No commands proposed.'));
    } else {
      this.print(chalk.red('No commands found'));
    }
    this.state = 'idle';
  }

  /**
   * Read one command from the operator, run it, and have the model analyze it
   */
  async manualMode(): Promise<void> {
    this.print(chalk.green('Manual command mode activated. Please enter your command:'));
    const command = ((await this.deps.operator.readInput('')) ?? '').trim();
    if (!command) {
      this.print(chalk.yellow('No command entered.'));
      return;
    }

    if (!(await this.deps.operator.confirm(`Run command \`${command}\`?`))) {
      this.print(chalk.yellow('Command canceled.'));
      this.deps.logger?.logEvent('command_skipped', { command, reason: 'manual_mode_cancel' });
      return;
    }

    const screened = await this.deps.guard.screen({ command, round: 1 }, this.deps.operator);
    if (screened.verdict.kind !== 'allow') {
      this.print(chalk.yellow('Command canceled by safe mode.'));
      this.deps.logger?.logEvent('command_skipped', { command, reason: screened.verdict.reason });
      return;
    }

    const result = await this.execute(screened.proposal.command);
    const summary: ExecutionSummaryEntry[] = [this.executedEntry(result)];
    const followUps = await this.report([result], summary, 1);
    if (followUps) {
      await this.executeBatches(followUps);
    }
    this.state = 'idle';
  }

  /**
   * Review, run and report batches until the model stops proposing or the operator stops
   */
  async executeBatches(initial: CommandProposal[]): Promise<void> {
    let batch: CommandProposal[] | null = initial;

    while (batch && batch.length > 0) {
      const round = batch[0].round;
      this.state = 'reviewingBatch';
      this.printBatch(batch);
      this.deps.logger?.logEvent('commands_batch', batch);

      const { outputs, summary, stopped } = await this.reviewBatch(batch);
      this.deps.logger?.logEvent('commands_execution_summary', summary);

      if (outputs.length === 0) {
        this.print(chalk.yellow('No commands were executed.'));
        break;
      }

      const followUps = await this.report(outputs, summary, round + 1);
      if (stopped) {
        break;
      }
      batch = followUps;
    }

    this.state = 'idle';
  }

  private async reviewBatch(batch: CommandProposal[]): Promise<BatchResult> {
    const { operator, guard, logger } = this.deps;
    const outputs: ExecutionResult[] = [];
    const summary: ExecutionSummaryEntry[] = [];
    let runAll = false;
    let stopped = false;

    for (const [offset, proposal] of batch.entries()) {
      let command = proposal.command.trim();
      if (!command) {
        summary.push({ command: '', status: 'skipped_empty' });
        continue;
      }

      let action: CommandAction = runAll ? 'run' : await operator.chooseCommandAction(offset + 1, batch.length);

      if (action === 'stop') {
        summary.push({ command, status: 'stopped_by_user' });
        stopped = true;
        break;
      }

      if (action === 'all') {
        runAll = true;
        action = 'run';
      }

      if (action === 'edit') {
        const edited = (await operator.editCommand(command)).trim();
        if (!edited) {
          this.print(chalk.yellow('Empty command after edit, skipping.'));
          summary.push({ command, status: 'skipped_empty_after_edit' });
          logger?.logEvent('command_skipped', { command, reason: 'empty_after_edit' });
          continue;
        }
        command = edited;
        if (!(await operator.confirm('Run the edited command?'))) {
          this.print(chalk.yellow('Skipping command'));
          summary.push({ command, status: 'skipped_after_edit' });
          logger?.logEvent('command_skipped', { command, reason: 'skipped_after_edit' });
          continue;
        }
        action = 'run';
      }

      if (action === 'skip') {
        this.print(chalk.yellow('Skipping command'));
        summary.push({ command, status: 'skipped' });
        logger?.logEvent('command_skipped', { command });
        continue;
      }

      const screened = await guard.screen({ ...proposal, command }, operator);
      if (screened.verdict.kind !== 'allow') {
        this.print(chalk.yellow('Skipping command (safe mode).'));
        summary.push({ command, status: 'blocked_by_safe_mode', reason: screened.verdict.reason });
        logger?.logEvent('command_skipped', { command, reason: screened.verdict.reason });
        continue;
      }

      const result = await this.execute(screened.proposal.command);
      outputs.push(result);
      summary.push(this.executedEntry(result));
      this.state = 'reviewingBatch';
    }

    return { outputs, summary, stopped };
  }

  private async execute(command: string): Promise<ExecutionResult> {
    this.state = 'executing';
    this.print(chalk.blue.bold(`$ ${command}`));

    const controller = new AbortController();
    const unsubscribe = this.onInterrupt(() => controller.abort());
    const result = await this.deps.runner.run(command, { signal: controller.signal }).finally(unsubscribe);

    if (result.timedOut) {
      this.print(chalk.red(`Error: Command timed out after ${this.deps.settings.commandTimeoutSeconds}s`));
    }
    if (result.interrupted) {
      this.print(chalk.yellow('Command interrupted by user'));
    }
    this.deps.logger?.logEvent('command_executed', result);
    return result;
  }

  /**
   * Send the report; returns follow-up proposals, if any
   */
  private async report(
    outputs: ExecutionResult[],
    summary: ExecutionSummaryEntry[],
    round: number
  ): Promise<CommandProposal[] | null> {
    this.state = 'awaitingFollowUp';
    const outcome = await this.withActivity('Analyzing output', () =>
      this.deps.resolver.reportExecution(outputs, summary, round)
    );
    this.printUsage();

    if (outcome.error) {
      this.printError(chalk.red(`Error: ${outcome.error.message}`));
      return null;
    }
    if (outcome.text) {
      this.printAssistant(outcome.text);
    }
    return outcome.commands;
  }

  private executedEntry(result: ExecutionResult): ExecutionSummaryEntry {
    return {
      command: result.command,
      status: 'executed',
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      interrupted: result.interrupted
    };
  }

  private async withActivity<T>(label: string, task: () => Promise<T>): Promise<T> {
    const stop = this.deps.operator.startActivity(label);
    try {
      return await task();
    } finally {
      stop();
    }
  }

  private printBanner(): void {
    const { settings, platform } = this.deps;
    if (platform) {
      this.print(chalk.green(`Your current environment: Shell=${platform.shellName}, OS=${platform.osName}`));
    }
    this.print(chalk.green(`Safe mode: ${settings.safeMode ? 'ON' : 'OFF'} (use \`safe on\`, \`safe off\`, \`safe\`).`));
    this.print(
      chalk.green(`Token usage display: ${settings.showTokens ? 'ON' : 'OFF'} (use \`tokens on\`, \`tokens off\`, \`tokens\`).`)
    );
    this.print(chalk.green("Type 'e' to enter manual command mode, 'help' for commands or 'q' to quit.\n"));
  }

  private printBatch(batch: CommandProposal[]): void {
    this.print(chalk.green('\nProposed commands:'));
    batch.forEach((proposal, index) => {
      this.print(chalk.blue.bold(`[${index + 1}] ${proposal.command.trim()}`));
      const description = proposal.description?.trim();
      if (description) {
        this.print(chalk.gray(`    ${description}`));
      }
    });
  }

  private printAssistant(text: string): void {
    const trimmed = text.trim();
    if (!trimmed) {
      return;
    }
    this.print(chalk.white(trimmed));
    this.deps.logger?.log('assistant', trimmed);
  }

  private printUsage(): void {
    if (!this.deps.settings.showTokens) {
      return;
    }
    this.print(chalk.cyan(this.deps.usage.formatSummary(this.deps.settings.maxOutputTokens)));
  }

  private reportFailure(error: unknown, context: Record<string, unknown>): void {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.printError(chalk.red(`Error: ${failure.message}`));
    this.deps.logger?.logError(failure, context);
  }
}
