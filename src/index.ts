#!/usr/bin/env node
process.title = 'shellmate';
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, getProviderConfig, loadConfig } from './config.js';
import { APP_NAME } from './constants.js';
import { CommandRunner } from './actions/command.js';
import { CommandGuard } from './core/CommandGuard.js';
import { ConversationManager } from './core/conversationManager.js';
import { InteractionLogger } from './core/interactionLogger.js';
import { Session } from './core/session.js';
import { TokenAccountant } from './core/tokenAccountant.js';
import { ToolCallResolver } from './core/toolCallResolver.js';
import { UsageTracker } from './core/usageTracker.js';
import { ProviderFactory } from './providers/ProviderFactory.js';
import { TerminalOperator } from './ui/operator.js';
import { getPlatformInfo } from './utils/platform.js';
import type { CLIOptions } from './types.js';

/**
 * Version from the nearest package.json (source tree or dist/)
 */
function getVersionString(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [path.join(here, '..', 'package.json'), path.join(here, '..', '..', 'package.json')]) {
    try {
      const parsed = z.object({ name: z.string(), version: z.string() }).safeParse(fs.readJsonSync(candidate));
      if (parsed.success && parsed.data.name === APP_NAME) {
        return parsed.data.version;
      }
    } catch {
      // Not this one; try the next location
    }
  }
  return 'unknown';
}

function parseTimeoutFlag(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Timeout must be a whole number of seconds.');
  }
  return parsed;
}

let activeLogger: InteractionLogger | undefined;

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  activeLogger?.logError(error, { source: 'unhandledRejection' });
  console.error(chalk.red(`Unhandled error: ${error.message}`));
});

const program = new Command();

program
  .name(APP_NAME)
  .description('Turn plain-language requests into reviewed shell commands')
  .version(getVersionString(), '-v, --version', 'output the current version')
  .option('-p, --prompt <text>', 'Handle a single request, then exit')
  .option('--model <model>', 'Override the configured model')
  .option('--provider <name>', 'LLM provider: openai or openrouter')
  .option('--timeout <seconds>', 'Command timeout in seconds (0 disables it)', parseTimeoutFlag)
  .option('--unsafe', 'Start with safe mode off', false)
  .option('--no-tokens', 'Hide the token usage line')
  .option('--log-file <path>', 'Interaction log location')
  .option('--config <path>', 'Path to config file (default ~/.shellmate/config.json)')
  .action(async (options: CLIOptions) => {
    await runCLI(options);
  });

async function runCLI(options: CLIOptions): Promise<void> {
  try {
    const config = await loadConfig(options);
    const { settings } = config;
    const providerSettings = getProviderConfig(config);

    const logger = new InteractionLogger(settings.logFile);
    activeLogger = logger;

    const accountant = new TokenAccountant({
      model: settings.model,
      onWarning: (message) => {
        console.warn(chalk.yellow(message));
        logger.logEvent('token_profile_fallback', { model: settings.model });
      }
    });
    // Fails fast on an unusable budget
    accountant.budget(settings.contextTokens, settings.maxOutputTokens);

    const platform = getPlatformInfo();
    const usage = new UsageTracker();
    const operator = new TerminalOperator();
    const resolver = new ToolCallResolver({
      provider: ProviderFactory.create(settings.provider, providerSettings),
      conversation: new ConversationManager(),
      accountant,
      settings,
      usage,
      logger,
      platform
    });

    const session = new Session({
      settings,
      resolver,
      guard: new CommandGuard(settings, logger),
      runner: new CommandRunner(settings),
      operator,
      usage,
      logger,
      platform
    });

    if (options.prompt) {
      logger.log('user', options.prompt);
      await session.handleRequest(options.prompt);
    } else {
      await session.run();
    }
    await logger.flush();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
    } else if (error instanceof Error) {
      activeLogger?.logError(error, { stage: 'startup' });
      console.error(chalk.red(error.message));
    } else {
      console.error(error);
    }
    await activeLogger?.flush();
    process.exitCode = 1;
  }
}

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
