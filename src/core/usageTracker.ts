/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { LLMUsage, UsageSummary } from '../types.js';

function emptySummary(): UsageSummary {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0, calls: 0 };
}

/**
 * Provider-reported usage, per exchange and for the whole session.
 * Calls without a usage block still count as calls.
 */
export class UsageTracker {
  private current: UsageSummary | null = null;
  private last: UsageSummary = emptySummary();
  private readonly session: UsageSummary = emptySummary();

  /** Start a new exchange; its counters begin at zero */
  begin(): void {
    this.current = emptySummary();
  }

  record(usage: LLMUsage | undefined): void {
    const target = this.current ?? (this.current = emptySummary());
    const input = usage?.promptTokens ?? 0;
    const output = usage?.completionTokens ?? 0;
    const total = usage?.totalTokens ?? input + output;
    for (const summary of [target, this.session]) {
      summary.inputTokens += input;
      summary.outputTokens += output;
      summary.totalTokens += total;
      summary.calls += 1;
    }
  }

  /** Close the exchange and keep it as the last one */
  finish(): UsageSummary {
    this.last = this.current ?? emptySummary();
    this.current = null;
    return { ...this.last };
  }

  getLast(): UsageSummary {
    return { ...this.last };
  }

  getSession(): UsageSummary {
    return { ...this.session };
  }

  /**
   * Tokens last: in=…, out=…, total=…, out_left=…/max | session: …
   */
  formatSummary(maxOutputTokens: number): string {
    const last = this.last;
    const session = this.session;
    const outLeft = Math.max(0, maxOutputTokens - last.outputTokens);
    return (
      `Tokens last: in=${last.inputTokens}, out=${last.outputTokens}, total=${last.totalTokens}, ` +
      `out_left=${outLeft}/${maxOutputTokens} | ` +
      `session: in=${session.inputTokens}, out=${session.outputTokens}, total=${session.totalTokens}, calls=${session.calls}`
    );
  }
}
