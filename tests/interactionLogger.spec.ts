/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { InteractionLogger } from '../src/core/interactionLogger.js';

describe('InteractionLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-log-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('appends one redacted JSON object per line', async () => {
    const logPath = path.join(dir, 'logs', 'session.log');
    const logger = new InteractionLogger(logPath);

    logger.log('user', 'my password=hunter2');
    logger.logEvent('command_executed', { command: 'env', stdout: 'OPENAI_API_KEY=sk-abcdef123456789012' });
    await logger.flush();

    const lines = (await fs.readFile(logPath, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    const [first, second] = lines.map((line) => JSON.parse(line));
    expect(first).toMatchObject({ role: 'user', text: 'my password=<REDACTED>' });
    expect(typeof first.timestamp).toBe('string');
    expect(second).toMatchObject({
      type: 'event',
      event: 'command_executed',
      data: { command: 'env', stdout: 'OPENAI_API_KEY=<REDACTED>' }
    });
  });

  it('skips blank text and writes null for missing event data', async () => {
    const logger = new InteractionLogger(path.join(dir, 'a.log'));
    logger.log('assistant', '   ');
    logger.logEvent('session_started');
    const entries = await logger.getRecentEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ type: 'event', event: 'session_started', data: null });
  });

  it('keeps entries whole and ordered under concurrent writes', async () => {
    const logPath = path.join(dir, 'burst.log');
    const logger = new InteractionLogger(logPath);
    for (let i = 0; i < 50; i += 1) {
      logger.logEvent('tick', { i });
    }
    await logger.flush();

    const lines = (await fs.readFile(logPath, 'utf-8')).trim().split('\n');
    expect(lines.map((line) => JSON.parse(line).data.i)).toEqual(Array.from({ length: 50 }, (_, i) => i));
  });

  it('writes nothing when disabled', async () => {
    const logPath = path.join(dir, 'off.log');
    const logger = new InteractionLogger(logPath, { enabled: false });
    logger.log('user', 'hello');
    await logger.flush();
    expect(await fs.pathExists(logPath)).toBe(false);
  });

  it('warns and carries on when the log cannot be written', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const onWarning = vi.fn();
    const logger = new InteractionLogger(path.join(blocker, 'nested', 'x.log'), { onWarning });

    logger.log('user', 'first');
    logger.log('user', 'second');
    await logger.flush();

    expect(onWarning).toHaveBeenCalledTimes(2);
    expect(onWarning.mock.calls[0][0]).toMatch(/^Warning: unable to write log: /);
  });

  it('records errors with system details', async () => {
    const logger = new InteractionLogger(path.join(dir, 'err.log'));
    logger.logError(new Error('boom'), { input: 'ls' });
    const [entry] = await logger.getRecentEntries(1);
    expect(entry).toMatchObject({
      event: 'error',
      data: { error: { name: 'Error', message: 'boom' }, context: { input: 'ls' }, system: { platform: os.platform() } }
    });
  });
});
