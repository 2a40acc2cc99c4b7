/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, vi } from 'vitest';
import { ConfigError } from '../src/config.js';
import { TokenAccountant, findTokenProfile, DEFAULT_TOKEN_PROFILE } from '../src/core/tokenAccountant.js';
import { CharChunkTokenizer } from '../src/utils/tokenizer.js';

describe('CharChunkTokenizer', () => {
  it('splits text into four-character chunks that decode back', () => {
    const tokenizer = new CharChunkTokenizer();
    const tokens = tokenizer.encode('abcdefghij');
    expect(tokens).toEqual(['abcd', 'efgh', 'ij']);
    expect(tokenizer.decode(tokens)).toBe('abcdefghij');
    expect(tokenizer.count('abcdefghij')).toBe(3);
  });

  it('counts surrogate pairs as one character', () => {
    const tokenizer = new CharChunkTokenizer();
    expect(tokenizer.encode('😀😀😀😀😀')).toEqual(['😀😀😀😀', '😀']);
    expect(tokenizer.count('')).toBe(0);
  });

  it('rejects a non-positive chunk size', () => {
    expect(() => new CharChunkTokenizer(0)).toThrow('charsPerToken must be a positive integer');
  });
});

describe('findTokenProfile', () => {
  it('matches the most specific model family first', () => {
    expect(findTokenProfile('gpt-4o-mini-2024-07-18')?.perMessage).toBe(5);
    expect(findTokenProfile('gpt-4o-2024-08-06')?.perMessage).toBe(6);
    expect(findTokenProfile('gpt-4-turbo')?.perMessage).toBe(3);
    expect(findTokenProfile('gpt-3.5-turbo-0125')?.perName).toBe(-1);
  });

  it('ignores a provider prefix', () => {
    expect(findTokenProfile('openai/gpt-4o-mini')?.perMessage).toBe(5);
  });

  it('returns undefined for unknown models', () => {
    expect(findTokenProfile('llama-3-70b')).toBeUndefined();
  });
});

describe('TokenAccountant', () => {
  it('adds per-message overhead, field tokens and priming', () => {
    const accountant = new TokenAccountant({ model: 'gpt-4o-mini' });
    const message = { role: 'user' as const, content: 'hello world!' };
    // 5 overhead + 1 (role) + 3 (content)
    expect(accountant.messageCost(message)).toBe(9);
    expect(accountant.costOf([message])).toBe(12);
    expect(accountant.costOf([])).toBe(3);
  });

  it('charges the name overhead when a name is present', () => {
    const accountant = new TokenAccountant({ model: 'gpt-4o-mini' });
    expect(accountant.messageCost({ role: 'user', content: 'hi', name: 'bob' })).toBe(9);
  });

  it('counts tool call ids, names and arguments', () => {
    const accountant = new TokenAccountant({ model: 'gpt-4' });
    const cost = accountant.messageCost({
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_commands', arguments: '{}' } }]
    });
    // 3 overhead + 3 (assistant) + 2 (call_1) + 3 (get_commands) + 1 ({})
    expect(cost).toBe(12);
  });

  it('falls back to the default profile and warns once for an unknown model', () => {
    const onWarning = vi.fn();
    const accountant = new TokenAccountant({ model: 'mystery-model', onWarning });
    expect(accountant.getProfile()).toEqual(DEFAULT_TOKEN_PROFILE);
    accountant.costOf([{ role: 'user', content: 'hi' }]);
    accountant.costOf([{ role: 'user', content: 'again' }]);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith('Model mystery-model has no token profile; using default overhead.');
  });

  it('builds a validated budget', () => {
    const accountant = new TokenAccountant({ model: 'gpt-4o-mini' });
    expect(accountant.budget(1000, 200)).toEqual({ ceiling: 1000, reserve: 200, perMessageOverhead: 5 });
    expect(() => accountant.budget(1000, 1000)).toThrow(ConfigError);
    expect(() => accountant.budget(0, 0)).toThrow(ConfigError);
  });
});
