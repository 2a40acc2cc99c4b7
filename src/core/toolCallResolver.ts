/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { z } from 'zod';
import type { LLMProvider } from '../providers/LLMProvider.js';
import type {
  CommandProposal,
  ExecutionResult,
  ExecutionSummaryEntry,
  FunctionDefinition,
  LLMResponse,
  LLMToolCall,
  RuntimeSettings,
  ToolChoice
} from '../types.js';
import { GET_COMMANDS_TOOL, MAX_TOOL_ROUNDS } from '../constants.js';
import { getPlatformInfo, type PlatformInfo } from '../utils/platform.js';
import type { ConversationManager } from './conversationManager.js';
import type { InteractionLogger } from './interactionLogger.js';
import type { TokenAccountant } from './tokenAccountant.js';
import { truncateHistory, trimOutputs } from './transcriptTruncator.js';
import type { UsageTracker } from './usageTracker.js';

export const SYSTEM_INSTRUCTIONS =
  'You are a shell command assistant. Prefer safe, idempotent commands first. ' +
  'For any command proposal, return it through the get_commands function. ' +
  'Include a short description for each command. ' +
  'If no command is needed, return an empty commands list with a helpful response.';

export function buildCommandsTool(platform: Pick<PlatformInfo, 'osName' | 'shellName'>): FunctionDefinition {
  return {
    name: GET_COMMANDS_TOOL,
    description: `Return a list of ${platform.shellName} commands for an ${platform.osName} machine`,
    parameters: {
      type: 'object',
      properties: {
        commands: {
          type: 'array',
          description: 'List of shell commands to execute',
          items: {
            type: 'object',
            properties: {
              command: { type: 'string', description: 'A valid command string' },
              description: { type: 'string', description: 'Description of the command' }
            },
            required: ['command'],
            additionalProperties: false
          }
        },
        response: { type: 'string', description: 'Human-readable explanation for the user' }
      },
      required: ['commands', 'response'],
      additionalProperties: false
    }
  };
}

export interface CommandsPayload {
  commands: Array<{ command: string; description: string }>;
  response: string;
}

const RawPayloadSchema = z.object({
  commands: z.array(z.unknown()),
  response: z.unknown().optional()
});

const RawEntrySchema = z.object({
  command: z.string().refine((value) => value.trim() !== ''),
  description: z.unknown().optional()
});

/**
 * Keep well-formed entries only. Returns null when there is no commands list at all.
 */
export function sanitizeCommandsPayload(value: unknown): CommandsPayload | null {
  const parsed = RawPayloadSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const commands: CommandsPayload['commands'] = [];
  for (const entry of parsed.data.commands) {
    const item = RawEntrySchema.safeParse(entry);
    if (!item.success) {
      continue;
    }
    commands.push({
      command: item.data.command,
      description: typeof item.data.description === 'string' ? item.data.description : ''
    });
  }
  const response = parsed.data.response;
  return { commands, response: typeof response === 'string' ? response : '' };
}

export function buildReportPrompt(outputs: ExecutionResult[], summary: ExecutionSummaryEntry[]): string {
  const report = JSON.stringify({ execution_summary: summary, outputs });
  return (
    'Analyze the following shell execution report and explain what happened. ' +
    'If useful, propose next steps via get_commands. ' +
    'If nothing was executed, clearly state that and do not propose follow-up commands.\n\n' +
    `Execution report:\n${report}`
  );
}

export interface ResolveOutcome {
  /** Narrative for the operator */
  text: string | null;
  /** Proposals from the last payload; null when there were none */
  commands: CommandProposal[] | null;
  /** Set when the exchange failed and was rolled back */
  error?: Error;
}

export interface ToolCallResolverDeps {
  provider: LLMProvider;
  conversation: ConversationManager;
  accountant: TokenAccountant;
  settings: Pick<RuntimeSettings, 'model' | 'maxOutputTokens' | 'contextTokens'>;
  usage: UsageTracker;
  logger?: InteractionLogger;
  platform?: Pick<PlatformInfo, 'osName' | 'shellName'>;
}

interface Acknowledgment {
  content: string;
  payload?: CommandsPayload;
}

/**
 * Drives one exchange of the get_commands protocol: the opening call, then
 * at most MAX_TOOL_ROUNDS follow-ups answering the model's tool calls.
 */
export class ToolCallResolver {
  private readonly tool: FunctionDefinition;
  /** Rollback point of the running exchange; shifts when truncation drops older messages */
  private exchangeMark = 0;

  constructor(private readonly deps: ToolCallResolverDeps) {
    this.tool = buildCommandsTool(deps.platform ?? getPlatformInfo());
    if (!deps.conversation.isInitialized()) {
      deps.conversation.reset(SYSTEM_INSTRUCTIONS);
    }
  }

  getTool(): FunctionDefinition {
    return this.tool;
  }

  /** Token ceiling for the transcript sent with each call */
  historyCeiling(): number {
    const { contextTokens, maxOutputTokens } = this.deps.settings;
    const budget = this.deps.accountant.budget(contextTokens, maxOutputTokens);
    return budget.ceiling - budget.reserve;
  }

  /** Token ceiling for the outputs of one execution report */
  outputCeiling(): number {
    return Math.floor(this.historyCeiling() / 2);
  }

  /**
   * Ask for commands for a natural-language request. The first call forces the tool.
   */
  requestCommands(prompt: string, round = 1, signal?: AbortSignal): Promise<ResolveOutcome> {
    return this.exchange(prompt, { type: 'function', function: { name: GET_COMMANDS_TOOL } }, round, signal);
  }

  /**
   * Send an execution report; the model explains it and may propose follow-ups.
   */
  reportExecution(
    outputs: ExecutionResult[],
    summary: ExecutionSummaryEntry[],
    round: number,
    signal?: AbortSignal
  ): Promise<ResolveOutcome> {
    const trimmed = trimOutputs(outputs, this.outputCeiling(), this.deps.accountant);
    return this.exchange(buildReportPrompt(trimmed, summary), 'auto', round, signal);
  }

  private async exchange(
    content: string,
    toolChoice: ToolChoice,
    round: number,
    signal?: AbortSignal
  ): Promise<ResolveOutcome> {
    const { conversation, usage, logger } = this.deps;
    this.exchangeMark = conversation.mark();
    usage.begin();

    try {
      conversation.addMessage({ role: 'user', content });
      let response = await this.call(toolChoice, signal);
      let payload: CommandsPayload | null = null;

      for (let followUps = 0; followUps < MAX_TOOL_ROUNDS; followUps += 1) {
        const calls = response.toolCalls ?? [];
        if (calls.length === 0) {
          break;
        }
        for (const call of calls) {
          const ack = this.acknowledge(call);
          if (ack.payload) {
            payload = ack.payload;
          }
          conversation.addMessage({ role: 'tool', tool_call_id: call.id, content: ack.content });
        }
        response = await this.call('none', signal);
      }

      const pending = response.toolCalls ?? [];
      if (pending.length > 0) {
        logger?.logEvent('tool_round_limit', { pending: pending.map((call) => call.function.name) });
        for (const call of pending) {
          conversation.addMessage({
            role: 'tool',
            tool_call_id: call.id,
            content: JSON.stringify({ status: 'ignored', reason: 'round_limit_reached' })
          });
        }
      }

      const freeText = response.content.trim();
      const text = freeText || payload?.response.trim() || null;
      const commands =
        payload && payload.commands.length > 0
          ? payload.commands.map((entry) => ({ command: entry.command, description: entry.description, round }))
          : null;
      return { text, commands };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      const dropped = conversation.rollback(this.exchangeMark);
      logger?.logEvent('api_error', { message: failure.message, rolled_back: dropped.length });
      return { text: null, commands: null, error: failure };
    } finally {
      usage.finish();
    }
  }

  private async call(toolChoice: ToolChoice, signal?: AbortSignal): Promise<LLMResponse> {
    const { provider, conversation, accountant, settings, usage, logger } = this.deps;

    const { messages, removed } = truncateHistory(conversation.history(), this.historyCeiling(), accountant, {
      pinSystem: true
    });
    if (removed.length > 0) {
      conversation.replace(messages);
      this.exchangeMark = Math.max(1, this.exchangeMark - removed.length);
      logger?.logEvent('history_truncated', { removed: removed.length, remaining: messages.length });
    }

    const last = messages[messages.length - 1];
    logger?.logEvent('api_request', {
      model: settings.model,
      tool_choice: toolChoice,
      message_count: messages.length,
      input: last?.content ?? null
    });

    const response = await provider.complete({
      model: settings.model,
      messages,
      tools: [this.tool],
      toolChoice,
      maxTokens: settings.maxOutputTokens,
      signal
    });
    usage.record(response.usage);

    const toolCalls = response.toolCalls ?? [];
    conversation.addMessage({
      role: 'assistant',
      content: response.content || (toolCalls.length > 0 ? null : ''),
      ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {})
    });

    logger?.logEvent('api_response', {
      response_id: response.id,
      output_text: response.content.trim() || null,
      tool_calls: toolCalls.map((call) => ({ id: call.id, name: call.function.name })),
      usage: response.usage ?? null
    });
    return response;
  }

  private acknowledge(call: LLMToolCall): Acknowledgment {
    if (call.function.name !== GET_COMMANDS_TOOL) {
      return { content: JSON.stringify({ status: 'ignored', reason: 'Unsupported function' }) };
    }
    try {
      const raw: unknown = JSON.parse(call.function.arguments || '{}');
      const payload = sanitizeCommandsPayload(raw);
      if (!payload) {
        throw new Error('Invalid get_commands payload');
      }
      this.deps.logger?.logEvent('get_commands_payload', payload);
      return {
        content: JSON.stringify({ status: 'ok', commands_count: payload.commands.length }),
        payload
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { content: JSON.stringify({ status: 'error', error: message }) };
    }
  }
}
