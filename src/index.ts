#!/usr/bin/env node
/**
 * sgr-template - compiles styled templates into ANSI SGR escape sequences
 */

import { parseArgs } from './cli/args.js';
import { loadConfig } from './config/loader.js';
import { type RunnerContext, runCompile } from './core/runner.js';
import { printInfo } from './output/colors.js';
import { createLogger } from './output/logger.js';
import { createStreamWriter } from './output/writer.js';
import { EXIT_COMPILE_ERROR, EXIT_USAGE } from './utils/constants.js';

function main(): void {
  const parsed = parseArgs(process.argv.slice(2));
  const cwd = process.cwd();
  const { config, source } = loadConfig(cwd, parsed.config);

  const logName =
    parsed.subcommand === 'file' ? parsed.input : parsed.subcommand;
  const logger = createLogger(config.enableLog, config.logDir, logName);

  if (config.verbosity === 'verbose') {
    printInfo(
      `Mode: ${parsed.subcommand} | Output: ${config.output} | Raw: ${config.raw}`
    );
    if (source) {
      printInfo(`Config: ${source}`);
    }
    if (logger.filePath) {
      printInfo(`Log: ${logger.filePath}`);
    }
  }

  const context: RunnerContext = {
    config,
    logger,
    out: createStreamWriter(process.stdout),
    cwd,
  };

  const outcome = runCompile(parsed.subcommand, parsed.input, context);
  process.exitCode = outcome.status === 'ok' ? 0 : EXIT_COMPILE_ERROR;
}

try {
  main();
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(EXIT_USAGE);
}
