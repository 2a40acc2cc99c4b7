/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export type ProviderName = 'openai' | 'openrouter';

export interface ProviderSettings {
  apiKey?: string;
  baseUrl?: string;
  model: string;
}

/**
 * Tool call returned by the LLM
 */
export interface LLMToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;  // JSON string of arguments
  };
}

export interface LLMMessage {
  role: MessageRole;
  content?: string | null;
  name?: string;
  /** Tool call ID for tool response messages (required when role is 'tool') */
  tool_call_id?: string;
  /** Tool calls made by the assistant (included when role is 'assistant' and model invoked tools) */
  tool_calls?: LLMToolCall[];
}

/**
 * Function/tool definition for LLM function calling
 * Compatible with OpenAI/OpenRouter function calling API
 */
export interface FunctionDefinition {
  name: string;
  description: string;
  parameters?: Record<string, unknown>;
}

/**
 * Tool choice option for function calling
 */
export type ToolChoice =
  | 'auto'      // LLM decides whether to call a function
  | 'required'  // LLM must call at least one function
  | 'none'      // LLM should not call any function
  | { type: 'function'; function: { name: string } };  // Force specific function

export interface LLMRequest {
  messages: LLMMessage[];
  maxTokens?: number;
  /** Tool/function definitions for function calling */
  tools?: FunctionDefinition[];
  /** How the model should choose which tool to use */
  toolChoice?: ToolChoice;
  model?: string;
  signal?: AbortSignal;
}

/** Token usage statistics from LLM response */
export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  id: string;
  created: number;
  content: string;
  /** Tool calls from the LLM (native function calling) */
  toolCalls?: LLMToolCall[];
  /** Finish reason from the API */
  finishReason?: 'stop' | 'tool_calls' | 'length' | 'content_filter';
  /** Token usage statistics */
  usage?: LLMUsage;
  raw: unknown;
}

export interface TokenBudget {
  /** Max tokens per exchange */
  ceiling: number;
  /** Tokens held back for the next model reply */
  reserve: number;
  /** Fixed framing cost added per message */
  perMessageOverhead: number;
}

export interface CommandProposal {
  command: string;
  description?: string;
  /** Batch round the proposal originated in (1 = first proposal of the turn) */
  round: number;
}

export interface ExecutionResult {
  readonly command: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
  readonly interrupted: boolean;
}

export type GuardVerdict =
  | { kind: 'allow'; reason?: string }
  | { kind: 'blockedPendingUser'; reason: string }
  | { kind: 'blockedFinal'; reason: string };

export type ExecutionStatus =
  | 'executed'
  | 'skipped'
  | 'skipped_empty'
  | 'skipped_empty_after_edit'
  | 'skipped_after_edit'
  | 'blocked_by_safe_mode'
  | 'stopped_by_user';

export interface ExecutionSummaryEntry {
  command: string;
  status: ExecutionStatus;
  reason?: string;
  exitCode?: number;
  timedOut?: boolean;
  interrupted?: boolean;
}

export interface UsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  calls: number;
}

/**
 * Settings resolved once at startup and shared by reference.
 * The interactive toggles (safeMode, showTokens) mutate this object.
 */
export interface RuntimeSettings {
  provider: ProviderName;
  model: string;
  /** Seconds before a command is killed; null disables the timeout */
  commandTimeoutSeconds: number | null;
  safeMode: boolean;
  showTokens: boolean;
  maxOutputTokens: number;
  /** Token ceiling for one exchange (history + reply) */
  contextTokens: number;
  logFile: string;
}

export interface ShellmateConfig {
  provider?: ProviderName;
  openai?: ProviderSettings;
  openrouter?: ProviderSettings;
  session?: {
    commandTimeoutSeconds?: number;
    safeMode?: boolean;
    showTokens?: boolean;
    maxOutputTokens?: number;
    contextTokens?: number;
  };
  logging?: {
    file?: string;
  };
}

export interface LoadedConfig extends ShellmateConfig {
  configPath: string;
  settings: RuntimeSettings;
}

export interface CLIOptions {
  prompt?: string;
  model?: string;
  provider?: string;
  config?: string;
  timeout?: number;
  unsafe?: boolean;
  tokens?: boolean;
  logFile?: string;
}
