/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Keeps the transcript and command outputs inside their token ceilings.
 */
import type { ExecutionResult, LLMMessage } from '../types.js';
import type { TokenAccountant } from './tokenAccountant.js';

export interface HistoryTruncation {
  /** Surviving messages, a contiguous suffix of the input (plus the pinned head) */
  messages: LLMMessage[];
  /** Dropped prefix, oldest first */
  removed: LLMMessage[];
}

export interface TruncateHistoryOptions {
  /** Never evict index 0 when it is a system message */
  pinSystem?: boolean;
}

/**
 * Drop the oldest messages until the list fits `ceiling`.
 * Running out of removable messages is a degraded state, not an error.
 */
export function truncateHistory(
  messages: LLMMessage[],
  ceiling: number,
  accountant: TokenAccountant,
  options: TruncateHistoryOptions = {}
): HistoryTruncation {
  const pinned = options.pinSystem === true && messages[0]?.role === 'system';
  const start = pinned ? 1 : 0;
  const kept = [...messages];
  const removed: LLMMessage[] = [];

  while (kept.length > start && accountant.costOf(kept) > ceiling) {
    removed.push(...kept.splice(start, 1));
  }

  // A tool acknowledgment without the assistant call before it is invalid input for the API
  if (removed.length > 0) {
    while (kept.length > start && kept[start].role === 'tool') {
      removed.push(...kept.splice(start, 1));
    }
  }

  return { messages: kept, removed };
}

/**
 * Token cost of one captured output: command, stdout and stderr
 */
export function outputCost(output: ExecutionResult, accountant: TokenAccountant): number {
  return accountant.count(output.command) + accountant.count(output.stdout) + accountant.count(output.stderr);
}

/**
 * Proportional trim of a batch of outputs to roughly fit `ceiling`.
 *
 * The cheapest outputs are protected while their sum stays within half the
 * ceiling. Every other output gives up a share of the excess proportional to
 * its cost, cut from the end of its stdout. Single pass: the result may land
 * slightly above or below the ceiling.
 */
export function trimOutputs(
  outputs: ExecutionResult[],
  ceiling: number,
  accountant: TokenAccountant
): ExecutionResult[] {
  const costs = outputs.map((output) => outputCost(output, accountant));
  const total = costs.reduce((acc, cost) => acc + cost, 0);
  if (total <= ceiling) {
    return [...outputs];
  }

  const excess = total - ceiling;
  const order = costs
    .map((cost, index) => ({ cost, index }))
    .sort((a, b) => a.cost - b.cost || a.index - b.index);

  const protectLimit = Math.floor(ceiling / 2);
  let protectedSum = 0;
  let firstUnprotected = 0;
  for (const entry of order) {
    if (protectedSum + entry.cost > protectLimit) {
      break;
    }
    protectedSum += entry.cost;
    firstUnprotected += 1;
  }

  const unprotectedSum = total - protectedSum;
  const result = [...outputs];
  if (unprotectedSum <= 0) {
    return result;
  }

  const { tokenizer } = accountant;
  for (const { cost, index } of order.slice(firstUnprotected)) {
    const share = Math.floor((excess * cost) / unprotectedSum);
    if (share <= 0) {
      continue;
    }
    const original = outputs[index];
    const tokens = tokenizer.encode(original.stdout);
    const keep = Math.max(0, tokens.length - share);
    result[index] = { ...original, stdout: tokenizer.decode(tokens.slice(0, keep)) };
  }

  return result;
}
