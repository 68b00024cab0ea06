/**
 * Shared mock factories for tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';

import type { Logger } from '../../src/output/logger.js';
import type { CompilerConfig } from '../../src/types/config.js';

/**
 * Create a mock logger
 */
export function createMockLogger(): Logger {
  return {
    log: vi.fn(),
    logEvent: vi.fn(),
    filePath: null,
  };
}

/**
 * Create a mock compiler config with optional overrides
 */
export function createMockConfig(
  overrides?: Partial<CompilerConfig>
): CompilerConfig {
  return {
    raw: false,
    output: 'text',
    verbosity: 'normal',
    enableLog: false,
    logDir: 'logs',
    ...overrides,
  };
}

const tempDirs: string[] = [];

/**
 * Create a fresh temporary directory, removed by removeTempDirs()
 */
export function createTempDir(prefix = 'sgr-test-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/**
 * Remove every directory made by createTempDir()
 */
export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
