/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationManager } from '../src/core/conversationManager.js';

describe('ConversationManager', () => {
  let manager: ConversationManager;

  beforeEach(() => {
    manager = new ConversationManager();
    manager.reset('system message');
  });

  it('refuses messages before it has a system prompt', () => {
    const fresh = new ConversationManager();
    expect(fresh.isInitialized()).toBe(false);
    expect(() => fresh.addMessage({ role: 'user', content: 'Hello' })).toThrow(/must be initialized/);
  });

  it('maintains history with the system prompt and user messages', () => {
    manager.addMessage({ role: 'user', content: 'Hello' });
    const history = manager.history();
    expect(history[0]).toEqual({ role: 'system', content: 'system message' });
    expect(history[1]).toEqual({ role: 'user', content: 'Hello' });
    expect(manager.size()).toBe(2);
  });

  it('returns a copy of the history', () => {
    manager.history().push({ role: 'user', content: 'sneaky' });
    expect(manager.size()).toBe(1);
  });

  it('rolls back to a mark without touching earlier turns', () => {
    manager.addMessage({ role: 'user', content: 'first' });
    const mark = manager.mark();
    manager.addMessage({ role: 'user', content: 'second' });
    manager.addMessage({ role: 'assistant', content: 'reply' });

    const dropped = manager.rollback(mark);

    expect(dropped).toEqual([
      { role: 'user', content: 'second' },
      { role: 'assistant', content: 'reply' }
    ]);
    expect(manager.history().map((m) => m.content)).toEqual(['system message', 'first']);
  });

  it('never rolls back the system message', () => {
    manager.addMessage({ role: 'user', content: 'first' });
    expect(manager.rollback(0)).toEqual([{ role: 'user', content: 'first' }]);
    expect(manager.history()).toEqual([{ role: 'system', content: 'system message' }]);
  });

  it('only accepts replacement histories led by the system message', () => {
    expect(() => manager.replace([{ role: 'user', content: 'orphan' }])).toThrow(/start with the system message/);
    manager.replace([
      { role: 'system', content: 'system message' },
      { role: 'user', content: 'kept' }
    ]);
    expect(manager.size()).toBe(2);
  });
});
