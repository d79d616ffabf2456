/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * NFF tokenizer - splits a scene file into directive lines
 */

export interface NffLine {
  /** 1-based source line */
  line: number;
  /** First token, e.g. 's', 'from', or a bare number on vertex lines */
  directive: string;
  args: string[];
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const COUNT = /^\d+$/;

export class NffTokenizer {
  private readonly lines: string[];
  private position: number = 0;

  constructor(text: string) {
    this.lines = text.split(/\r?\n/);
  }

  /**
   * Next non-blank, non-comment line, or null at end of input
   */
  next(): NffLine | null {
    while (this.position < this.lines.length) {
      const line = this.position + 1;
      const raw = this.lines[this.position++].trim();
      if (raw === '' || raw.startsWith('#')) {
        continue;
      }
      const [directive, ...args] = raw.split(/\s+/);
      return { line, directive, args };
    }
    return null;
  }

  /**
   * Iterate the remaining lines
   */
  *[Symbol.iterator](): Generator<NffLine> {
    let entry = this.next();
    while (entry) {
      yield entry;
      entry = this.next();
    }
  }

  /** Last line number consumed */
  get lineNumber(): number {
    return this.position;
  }
}

/**
 * Parse a decimal number token; null when it is not one
 */
export function parseDecimal(token: string): number | null {
  if (!DECIMAL.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a non-negative integer token; null when it is not one
 */
export function parseCount(token: string): number | null {
  if (!COUNT.test(token)) return null;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}
