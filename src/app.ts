// ===========================================================================
//  src/app.ts   (command-line entry point)
// ===========================================================================

import { run } from "./cli";
import { loadConfig } from "./config";
import { logger } from "./utils/logger";

const config = loadConfig();

logger.debug({
  dictionaryPath: config.dictionaryPath,
  logLevel: config.logLevel,
  NODE_ENV: process.env.NODE_ENV,
}, 'Starting spell checker');

process.exitCode = run(process.argv.slice(2), config, text => process.stdout.write(text));
