import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  loadConfig,
  loadConfigFile,
  mergeConfig,
} from '../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../src/types/config.js';
import {
  createMockConfig,
  createTempDir,
  removeTempDirs,
} from '../helpers/mocks.js';

function writeConfig(dir: string, content: string): string {
  const filePath = path.join(dir, 'sgr-template.json');
  fs.writeFileSync(filePath, content);
  return filePath;
}

describe('loadConfig', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    removeTempDirs();
  });

  it('returns defaults when no project file exists', () => {
    const result = loadConfig(createTempDir());

    expect(result).toEqual({ config: DEFAULT_CONFIG, source: null });
  });

  it('applies the project file over defaults', () => {
    const dir = createTempDir();
    const filePath = writeConfig(dir, '{"raw": true, "output": "escaped"}');

    const result = loadConfig(dir);

    expect(result.source).toBe(filePath);
    expect(result.config).toEqual({
      ...DEFAULT_CONFIG,
      raw: true,
      output: 'escaped',
    });
  });

  it('lets CLI flags win over the project file', () => {
    const dir = createTempDir();
    writeConfig(dir, '{"output": "escaped", "verbosity": "quiet"}');

    const result = loadConfig(dir, { output: 'literal' });

    expect(result.config.output).toBe('literal');
    expect(result.config.verbosity).toBe('quiet');
  });

  it('ignores files with unknown keys and warns', () => {
    const dir = createTempDir();
    writeConfig(dir, '{"colour": "red"}');

    const result = loadConfig(dir);

    expect(result).toEqual({ config: DEFAULT_CONFIG, source: null });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('Config warning');
  });

  it('ignores files with invalid values', () => {
    const dir = createTempDir();
    writeConfig(dir, '{"output": "html"}');

    expect(loadConfig(dir).config.output).toBe('text');
  });

  it('ignores files that are not JSON and warns', () => {
    const dir = createTempDir();
    writeConfig(dir, '{ raw: true');

    expect(loadConfigFile(path.join(dir, 'sgr-template.json'))).toBeNull();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

describe('mergeConfig', () => {
  it('copies only fields that are set', () => {
    const base = createMockConfig({ logDir: 'base-logs' });

    expect(mergeConfig(base, { enableLog: true })).toEqual({
      ...base,
      enableLog: true,
    });
  });

  it('does not mutate the base config', () => {
    const base = createMockConfig();
    mergeConfig(base, { raw: true });

    expect(base.raw).toBe(false);
  });
});
