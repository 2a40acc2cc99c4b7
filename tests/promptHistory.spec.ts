/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { PromptHistory } from '../src/ui/promptHistory.js';
import { TerminalOperator } from '../src/ui/operator.js';

describe('PromptHistory', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-history-'));
    file = path.join(dir, 'nested', 'history');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('starts empty without a history file', async () => {
    expect(await new PromptHistory(file).load()).toEqual([]);
  });

  it('persists entries for the next session, newest first', async () => {
    const history = new PromptHistory(file);
    await history.add('ls -la');
    await history.add('  df -h  ');
    await history.add('df -h');
    await history.add('   ');

    expect(await fs.readFile(file, 'utf-8')).toBe('ls -la\ndf -h\n');
    expect(await new PromptHistory(file).load()).toEqual(['df -h', 'ls -la']);
  });

  it('keeps only the most recent entries', async () => {
    await fs.outputFile(file, 'one\ntwo\nthree\n');
    expect(await new PromptHistory(file, 2).load()).toEqual(['three', 'two']);
  });
});

describe('TerminalOperator.readInput', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-operator-'));
    file = path.join(dir, 'history');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('queues piped lines that arrive together', async () => {
    const input = new PassThrough();
    const operator = new TerminalOperator(input, new PassThrough(), new PromptHistory(file));
    input.end('list files\nshow disk usage\n');

    expect(await operator.readInput('> ')).toBe('list files');
    expect(await operator.readInput('> ')).toBe('show disk usage');
    expect(await operator.readInput('> ')).toBeNull();
  });

  it('recalls earlier prompts with the up arrow', async () => {
    await fs.writeFile(file, 'ls -la\n');
    const input = Object.assign(new PassThrough(), { isTTY: true });
    const operator = new TerminalOperator(input, new PassThrough(), new PromptHistory(file));

    const pending = operator.readInput('> ');
    input.write('\x1b[A\r');

    expect(await pending).toBe('ls -la');
  });

  it('saves lines typed at the terminal', async () => {
    const input = Object.assign(new PassThrough(), { isTTY: true });
    const operator = new TerminalOperator(input, new PassThrough(), new PromptHistory(file));

    const pending = operator.readInput('> ');
    input.write('uptime\r');

    expect(await pending).toBe('uptime');
    expect(await fs.readFile(file, 'utf-8')).toBe('uptime\n');
  });
});
