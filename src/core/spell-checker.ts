import type { RadixTree } from "./radix-tree";
import { checkerLogger as logger } from "../utils/logger";

/** A document line holding at least one word the dictionary lacks. */
export interface LineReport {
  /** Zero-based. */
  lineNumber: number;
  line: string;
  misspelt: string[];
}

// ASCII punctuation or whitespace
const WORD_BOUNDARY = /[\x21-\x2f\x3a-\x40\x5b-\x60\x7b-\x7e\s]/;
const WORD = /^[a-z']+$/;

/** Split a line into lowercase candidate words, dropping anything that is not letters. */
export function tokenize(line: string): string[] {
  return line
    .split(WORD_BOUNDARY)
    .map(token => token.trim().toLowerCase())
    .filter(token => WORD.test(token));
}

export function formatReport({ lineNumber, line, misspelt }: LineReport): string {
  return `${lineNumber} ${line}\n\n${misspelt.join(" ")}\n\n`;
}

/**
 * Checks document lines against a dictionary tree. The tree must hold
 * lowercase words, since tokens are lowercased before lookup.
 */
export class SpellChecker {
  private readonly dictionary: RadixTree;

  constructor(dictionary: RadixTree) {
    this.dictionary = dictionary;
  }

  isCorrect(word: string): boolean {
    return this.dictionary.contains(word);
  }

  check(lines: readonly string[]): LineReport[] {
    const reports: LineReport[] = [];
    let wordCount = 0;

    lines.forEach((line, lineNumber) => {
      const words = tokenize(line);
      wordCount += words.length;

      const misspelt = words.filter(w => !this.isCorrect(w));
      if (misspelt.length > 0) reports.push({ lineNumber, line, misspelt });
    });

    logger.debug({
      lines: lines.length,
      words: wordCount,
      linesWithMistakes: reports.length,
    }, 'Document checked');

    return reports;
  }
}
