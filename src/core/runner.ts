/**
 * Core runner: reads the input, compiles it and writes the result
 */

import * as fs from 'fs';
import * as path from 'path';

import {
  type CompileResult,
  compileLiteral,
  compileTemplate,
} from '../compiler/compile.js';
import { isTemplateError } from '../compiler/errors.js';
import { wrapLiteral } from '../compiler/literal.js';
import {
  colors,
  formatDuration,
  printError,
  printInfo,
  truncate,
} from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import type { CapableWriter } from '../output/writer.js';
import type {
  CompilerConfig,
  OutputFormat,
  Subcommand,
} from '../types/index.js';
import { TRUNCATE_PREVIEW } from '../utils/constants.js';
import { escapeControls, formatSize } from '../utils/formatting.js';

export interface RunnerContext {
  config: CompilerConfig;
  logger: Logger;
  /** Destination for compiled output */
  out: CapableWriter;
  cwd: string;
}

export type RunStatus = 'ok' | 'compile_error';

export interface RunOutcome {
  status: RunStatus;
  /** Text written to `out`, or null when compilation failed */
  written: string | null;
}

/**
 * Resolve the template source for a subcommand
 * For `file`, reads the file relative to `cwd`
 */
export function readTemplateSource(
  subcommand: Subcommand,
  input: string,
  cwd: string
): string {
  if (subcommand !== 'file') {
    return input;
  }
  const filePath = path.resolve(cwd, input);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Template file not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Compile a template body, capturing failures as a result
 * The replacement literal is always a normal "..." literal
 */
export function compileBody(body: string, raw: boolean): CompileResult {
  try {
    const output = compileTemplate(body, { raw });
    // Raw bodies may hold quotes, so always re-quote as a normal literal
    const source = { kind: 'normal' as const, body };
    return { ok: true, output, literal: wrapLiteral(output, source), source };
  } catch (error) {
    if (isTemplateError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Render a successful result in the configured format
 */
export function formatOutput(
  format: OutputFormat,
  output: string,
  literal: string
): string {
  switch (format) {
    case 'text':
      return output;
    case 'literal':
      return literal;
    case 'escaped':
      return escapeControls(output);
  }
}

/**
 * Compile one input and write the formatted result
 */
export function runCompile(
  subcommand: Subcommand,
  input: string,
  context: RunnerContext
): RunOutcome {
  const { config, logger, out } = context;
  const start = Date.now();
  const source = readTemplateSource(subcommand, input, context.cwd);

  logger.logEvent({
    event: 'compile_start',
    subcommand,
    raw: config.raw,
    size: source.length,
  });
  if (config.verbosity === 'verbose') {
    printInfo(
      `Compiling ${subcommand} input: ${truncate(escapeControls(source), TRUNCATE_PREVIEW)}`
    );
  }

  const result =
    subcommand === 'literal'
      ? compileLiteral(source)
      : compileBody(source, config.raw);

  if (!result.ok) {
    const { error } = result;
    logger.logEvent({
      event: 'compile_error',
      kind: error.kind,
      position: error.position,
      message: error.message,
    });
    printError(`${colors.red}Compile failed${colors.reset} ${error.message}`);
    return { status: 'compile_error', written: null };
  }

  const formatted = formatOutput(config.output, result.output, result.literal);
  const written = formatted.endsWith('\n') ? formatted : formatted + '\n';
  out.write(written);

  const duration = Date.now() - start;
  logger.log(formatted);
  logger.logEvent({
    event: 'compile_ok',
    size: result.output.length,
    durationMs: duration,
  });
  if (config.verbosity !== 'quiet') {
    printInfo(
      `Compiled ${formatSize(source.length)} to ${formatSize(result.output.length)} in ${formatDuration(duration)}`
    );
  }

  return { status: 'ok', written };
}
