import fs from "fs";
import { RadixTree } from "../core/radix-tree";
import { InputFileError } from "../utils/errors";
import { dictionaryLogger as logger, logPerformance } from "../utils/logger";

export interface LoadedDictionary {
  tree: RadixTree;
  /** Lines read from the file, blank ones included. */
  wordCount: number;
}

/**
 * Read a text file as lines. A trailing line break does not produce a final
 * empty line.
 */
export function readLines(file: string): string[] {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (error) {
    throw new InputFileError(file, error);
  }

  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Build a tree holding every line of `file`, lowercased. */
export function loadDictionary(file: string): LoadedDictionary {
  logger.info({ dictFile: file }, 'Loading dictionary');
  const startLoad = Date.now();

  const tree = new RadixTree();
  const lines = readLines(file);
  for (const line of lines) tree.insert(line.toLowerCase());

  logPerformance(logger, 'dictionary-load', startLoad, {
    dictFile: file,
    dictionarySize: lines.length,
  });

  return { tree, wordCount: lines.length };
}
