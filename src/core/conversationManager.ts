/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { LLMMessage } from '../types.js';

/**
 * Ordered transcript for one session. Index 0 is the system message and is
 * never evicted; everything after it is append-only except for truncation
 * of the oldest entries and rollback of a failed exchange.
 */
export class ConversationManager {
  private messages: LLMMessage[] = [];
  private initialized = false;

  reset(systemPrompt: string): void {
    this.messages = [
      {
        role: 'system',
        content: systemPrompt
      }
    ];
    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  addMessage(message: LLMMessage): void {
    if (!this.initialized) {
      throw new Error('ConversationManager must be initialized with a system prompt before adding messages.');
    }
    this.messages.push(message);
  }

  history(): LLMMessage[] {
    return [...this.messages];
  }

  size(): number {
    return this.messages.length;
  }

  /**
   * Position to roll back to if the exchange that starts now fails
   */
  mark(): number {
    return this.messages.length;
  }

  /**
   * Drop everything appended since `mark`. Returns the dropped messages.
   */
  rollback(mark: number): LLMMessage[] {
    const start = Math.max(1, Math.min(mark, this.messages.length));
    return this.messages.splice(start);
  }

  /**
   * Swap in a truncated history. The system message must still lead it.
   */
  replace(messages: LLMMessage[]): void {
    if (!this.initialized) {
      throw new Error('ConversationManager must be initialized before replacing history.');
    }
    if (messages[0]?.role !== 'system') {
      throw new Error('Replacement history must start with the system message.');
    }
    this.messages = [...messages];
  }
}
