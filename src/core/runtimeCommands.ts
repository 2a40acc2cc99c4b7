/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import * as safe from '../commands/safe.js';
import * as tokens from '../commands/tokens.js';
import * as manual from '../commands/manual.js';
import * as help from '../commands/help.js';
import * as quit from '../commands/quit.js';
import type { RuntimeCommand, RuntimeCommandContext, RuntimeSignal } from './runtimeCommandTypes.js';

export const RUNTIME_COMMANDS: RuntimeCommand[] = [
  safe.metadata,
  tokens.metadata,
  manual.metadata,
  help.metadata,
  quit.metadata
];

/** Accepted spellings (without the leading slash) and the single argument each may take */
const COMMAND_FORMS: Record<string, { command: string; args: ReadonlyArray<string> }> = {
  safe: { command: '/safe', args: ['on', 'off'] },
  tokens: { command: '/tokens', args: ['on', 'off'] },
  e: { command: '/e', args: [] },
  help: { command: '/help', args: [] },
  '?': { command: '/help', args: [] },
  q: { command: '/quit', args: [] },
  quit: { command: '/quit', args: [] },
  exit: { command: '/quit', args: [] }
};

export interface ParsedRuntimeCommand {
  command: string;
  args: string[];
}

/**
 * Recognize a runtime command, with or without a leading slash.
 * Anything else (including `safe mode please`) is a request for the model.
 */
export function parseRuntimeCommand(input: string): ParsedRuntimeCommand | null {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    return null;
  }
  const [head, ...rest] = normalized.replace(/^\//, '').split(/\s+/);
  const form = COMMAND_FORMS[head];
  if (!form) {
    return null;
  }
  if (rest.length === 0) {
    return { command: form.command, args: [] };
  }
  if (rest.length === 1 && form.args.includes(rest[0])) {
    return { command: form.command, args: rest };
  }
  return null;
}

export class RuntimeCommandHandler {
  private readonly commandMap = new Map<string, RuntimeCommand>();

  constructor(private readonly ctx: RuntimeCommandContext, commands: RuntimeCommand[] = RUNTIME_COMMANDS) {
    commands.forEach((cmd) => this.commandMap.set(cmd.command, cmd));
  }

  /**
   * True when the input is a runtime command and must not reach the model
   */
  matches(input: string): boolean {
    const parsed = parseRuntimeCommand(input);
    return parsed !== null && this.commandMap.has(parsed.command);
  }

  async handle(input: string): Promise<RuntimeSignal | null> {
    const parsed = parseRuntimeCommand(input);
    if (!parsed) {
      return null;
    }
    const meta = this.commandMap.get(parsed.command);
    if (!meta || !meta.implemented) {
      this.ctx.print(chalk.yellow(`Command ${parsed.command} is not supported. Type help for the list.`));
      return null;
    }

    switch (parsed.command) {
      case '/safe':
        return safe.safe(this.ctx, parsed.args);
      case '/tokens':
        return tokens.tokens(this.ctx, parsed.args);
      case '/e':
        return manual.manual();
      case '/help':
        return help.help(this.ctx, [...this.commandMap.values()]);
      case '/quit':
        return quit.quit();
      default:
        this.ctx.print(chalk.yellow(`Command ${parsed.command} is not supported. Type help for the list.`));
        return null;
    }
  }
}
