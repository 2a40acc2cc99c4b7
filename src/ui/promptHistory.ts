/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import fs from 'fs-extra';
import path from 'node:path';
import { SHELLMATE_FILES } from '../constants.js';

export const HISTORY_SIZE = 1000;

/**
 * Prompt lines kept across sessions for up-arrow recall
 */
export class PromptHistory {
  /** Newest first, the order readline expects */
  private entries: string[] = [];
  private loaded = false;

  constructor(
    private readonly filePath: string = SHELLMATE_FILES.history,
    private readonly size: number = HISTORY_SIZE
  ) {}

  async load(): Promise<string[]> {
    if (!this.loaded) {
      this.loaded = true;
      if (await fs.pathExists(this.filePath)) {
        const content = await fs.readFile(this.filePath, 'utf-8');
        this.entries = content
          .split('\n')
          .filter((line) => line.trim())
          .slice(-this.size)
          .reverse();
      }
    }
    return [...this.entries];
  }

  async add(line: string): Promise<void> {
    await this.load();
    const entry = line.trim();
    if (!entry || this.entries[0] === entry) {
      return;
    }
    this.entries.unshift(entry);
    if (this.entries.length > this.size) {
      this.entries.length = this.size;
    }
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.appendFile(this.filePath, `${entry}\n`, 'utf-8');
  }
}
