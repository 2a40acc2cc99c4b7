/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { LLMMessage, TokenBudget } from '../types.js';
import { ConfigError } from '../config.js';
import { CharChunkTokenizer, type Tokenizer } from '../utils/tokenizer.js';

/**
 * Per-model framing costs for chat-formatted requests
 */
export interface TokenProfile {
  /** Added for every message in the list */
  perMessage: number;
  /** Added when a message carries a name (negative when the role is then omitted) */
  perName: number;
  /** Added once per list: every reply is primed with the assistant header */
  priming: number;
}

/** Ordered most specific first: 'gpt-4o-mini' must win over 'gpt-4o' and 'gpt-4' */
const MODEL_PROFILES: Array<[string, TokenProfile]> = [
  ['gpt-4o-mini', { perMessage: 5, perName: 1, priming: 3 }],
  ['gpt-4o', { perMessage: 6, perName: 2, priming: 3 }],
  ['gpt-4', { perMessage: 3, perName: 1, priming: 3 }],
  ['gpt-3.5-turbo', { perMessage: 4, perName: -1, priming: 3 }]
];

export const DEFAULT_TOKEN_PROFILE: TokenProfile = { perMessage: 3, perName: 1, priming: 3 };

export interface TokenAccountantOptions {
  model: string;
  tokenizer?: Tokenizer;
  /** Called once when the model has no known profile */
  onWarning?: (message: string) => void;
}

export function findTokenProfile(model: string): TokenProfile | undefined {
  const normalized = model.toLowerCase().split('/').pop() ?? '';
  const match = MODEL_PROFILES.find(([prefix]) => normalized.startsWith(prefix));
  return match?.[1];
}

export class TokenAccountant {
  readonly tokenizer: Tokenizer;
  private readonly profile: TokenProfile;
  private readonly onWarning?: (message: string) => void;

  constructor(options: TokenAccountantOptions) {
    this.tokenizer = options.tokenizer ?? new CharChunkTokenizer();
    this.onWarning = options.onWarning;
    this.profile = this.resolveProfile(options.model);
  }

  getProfile(): TokenProfile {
    return { ...this.profile };
  }

  count(text: string | null | undefined): number {
    if (!text) return 0;
    return this.tokenizer.count(text);
  }

  /**
   * Cost of a single message without the list-level priming constant
   */
  messageCost(message: LLMMessage): number {
    let tokens = this.profile.perMessage;
    tokens += this.count(message.role);
    tokens += this.count(message.content);
    if (message.name) {
      tokens += this.profile.perName;
      tokens += this.count(message.name);
    }
    tokens += this.count(message.tool_call_id);
    for (const call of message.tool_calls ?? []) {
      tokens += this.count(call.id);
      tokens += this.count(call.function.name);
      tokens += this.count(call.function.arguments);
    }
    return tokens;
  }

  costOf(messages: LLMMessage[]): number {
    return messages.reduce((acc, message) => acc + this.messageCost(message), this.profile.priming);
  }

  budget(ceiling: number, reserve: number): TokenBudget {
    if (!Number.isFinite(ceiling) || ceiling <= 0) {
      throw new ConfigError(`Token ceiling must be positive, got ${ceiling}`);
    }
    if (reserve < 0 || reserve >= ceiling) {
      throw new ConfigError(`Token reserve (${reserve}) must be below the ceiling (${ceiling})`);
    }
    return { ceiling, reserve, perMessageOverhead: this.profile.perMessage };
  }

  private resolveProfile(model: string): TokenProfile {
    const profile = findTokenProfile(model);
    if (profile) {
      return profile;
    }
    this.onWarning?.(`Model ${model} has no token profile; using default overhead.`);
    return DEFAULT_TOKEN_PROFILE;
  }
}
