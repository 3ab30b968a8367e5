import type { AppConfig } from "./config";
import { formatReport, SpellChecker } from "./core/spell-checker";
import { loadDictionary, readLines } from "./storage/dictionary";
import { InputFileError } from "./utils/errors";
import { cliLogger as logger, logError, logPerformance } from "./utils/logger";

export const USAGE = "Usage: spellcheck document [dictionary]";

export const EXIT_OK = 0;
export const EXIT_MISSPELT = 1;
export const EXIT_FAILURE = 2;

export type Output = (text: string) => void;

/**
 * Spell-check `args[0]` against `args[1]`, or the configured dictionary.
 * Returns the process exit code.
 */
export function run(args: readonly string[], config: AppConfig, out: Output): number {
  if (args.length < 1 || args.length > 2) {
    logger.warn({ argCount: args.length }, 'Invalid arguments');
    out(`${USAGE}\n`);
    return EXIT_FAILURE;
  }

  const [documentPath, dictionaryPath = config.dictionaryPath] = args;
  const startTime = Date.now();

  try {
    const { tree } = loadDictionary(dictionaryPath);
    const lines = readLines(documentPath);
    const reports = new SpellChecker(tree).check(lines);

    for (const report of reports) out(formatReport(report));

    logPerformance(logger, 'spell-check', startTime, {
      document: documentPath,
      linesWithMistakes: reports.length,
    });

    return reports.length === 0 ? EXIT_OK : EXIT_MISSPELT;
  } catch (error) {
    logError(logger, error, { document: documentPath, dictionary: dictionaryPath });
    if (error instanceof InputFileError) {
      out(`${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
