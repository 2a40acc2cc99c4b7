/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Pluggable tokenizer. `encode` and `decode` must round-trip so that
 * token-level trimming can cut text on token boundaries.
 */
export interface Tokenizer {
  readonly name: string;
  encode(text: string): string[];
  decode(tokens: string[]): string;
  count(text: string): number;
}

/**
 * Character-chunk tokenizer.
 * Uses character count / 4 as a rough approximation; conservative for
 * English text (actual is ~3.5-4 chars/token). Chunks are built from code
 * points so surrogate pairs are never split.
 */
export class CharChunkTokenizer implements Tokenizer {
  readonly name: string;

  constructor(private readonly charsPerToken = 4) {
    if (!Number.isInteger(charsPerToken) || charsPerToken < 1) {
      throw new Error(`charsPerToken must be a positive integer, got ${charsPerToken}`);
    }
    this.name = `chars/${charsPerToken}`;
  }

  encode(text: string): string[] {
    if (!text) return [];
    const chars = Array.from(text);
    const tokens: string[] = [];
    for (let i = 0; i < chars.length; i += this.charsPerToken) {
      tokens.push(chars.slice(i, i + this.charsPerToken).join(''));
    }
    return tokens;
  }

  decode(tokens: string[]): string {
    return tokens.join('');
  }

  count(text: string): number {
    if (!text) return 0;
    return Math.ceil(Array.from(text).length / this.charsPerToken);
  }
}
