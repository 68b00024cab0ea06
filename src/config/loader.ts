/**
 * Configuration loading: defaults < project file < CLI flags
 */

import * as fs from 'fs';
import * as path from 'path';

import { printWarning } from '../output/colors.js';
import { type CompilerConfig, DEFAULT_CONFIG } from '../types/config.js';
import { CONFIG_FILE_NAME } from '../utils/constants.js';
import { type ProjectConfig, ProjectConfigSchema } from './schema.js';

export interface LoadedConfig {
  config: CompilerConfig;
  /** Path of the project file that was applied, if any */
  source: string | null;
}

/**
 * Read and validate a project config file
 * Returns null when the file is missing or invalid (invalid files warn)
 */
export function loadConfigFile(filePath: string): ProjectConfig | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    printWarning(`Config warning: ${filePath}\n${msg}`);
    return null;
  }

  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    printWarning(`Config warning: ${filePath}\n${result.error.message}`);
    return null;
  }
  return result.data;
}

/**
 * Apply only the fields that are set
 */
export function mergeConfig(
  base: CompilerConfig,
  override: ProjectConfig | Partial<CompilerConfig>
): CompilerConfig {
  const merged = { ...base };
  if (override.raw !== undefined) merged.raw = override.raw;
  if (override.output !== undefined) merged.output = override.output;
  if (override.verbosity !== undefined) merged.verbosity = override.verbosity;
  if (override.enableLog !== undefined) merged.enableLog = override.enableLog;
  if (override.logDir !== undefined) merged.logDir = override.logDir;
  return merged;
}

/**
 * Load and merge config from all sources
 */
export function loadConfig(
  cwd: string,
  cliConfig: Partial<CompilerConfig> = {}
): LoadedConfig {
  const filePath = path.join(cwd, CONFIG_FILE_NAME);
  const fileConfig = loadConfigFile(filePath);

  let config = { ...DEFAULT_CONFIG };
  if (fileConfig) config = mergeConfig(config, fileConfig);
  config = mergeConfig(config, cliConfig);

  return { config, source: fileConfig ? filePath : null };
}
