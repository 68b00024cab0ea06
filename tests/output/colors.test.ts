import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  colors,
  formatDuration,
  formatTimestamp,
  printError,
  printInfo,
  printWarning,
  stripAnsi,
  timestampPrefix,
  truncate,
} from '../../src/output/colors.js';

describe('colors', () => {
  it('builds palette sequences from the code tables', () => {
    expect(colors.reset).toBe('\x1b[0m');
    expect(colors.dim).toBe('\x1b[2m');
    expect(colors.yellow).toBe('\x1b[33m');
    expect(colors.red).toBe('\x1b[31m');
    expect(colors.magenta).toBe('\x1b[35m');
  });
});

describe('stripAnsi', () => {
  it('removes ANSI color codes', () => {
    const colored = '\x1b[31mRed Text\x1b[0m';
    expect(stripAnsi(colored)).toBe('Red Text');
  });

  it('removes multi-code sequences', () => {
    expect(stripAnsi('\x1b[1;38;2;1;2;3mBold\x1b[22m')).toBe('Bold');
  });

  it('returns plain text unchanged', () => {
    expect(stripAnsi('Plain text')).toBe('Plain text');
  });
});

describe('truncate', () => {
  it('returns short strings unchanged', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('truncates long strings with ellipsis', () => {
    expect(truncate('hello world', 8)).toBe('hello wo...');
  });

  it('handles exact length', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });
});

describe('formatDuration', () => {
  it('formats milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('formats seconds', () => {
    expect(formatDuration(2500)).toBe('2.5s');
  });

  it('formats minutes and seconds', () => {
    expect(formatDuration(125000)).toBe('2m5s');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as HH:MM:SS.mmm with padding', () => {
    const date = new Date(2024, 0, 15, 9, 5, 3, 42);
    expect(formatTimestamp(date)).toBe('09:05:03.042');
  });

  it('uses current time when no date provided', () => {
    expect(formatTimestamp()).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3}$/);
  });
});

describe('timestampPrefix', () => {
  it('stripping ANSI leaves just timestamp and space', () => {
    const stripped = stripAnsi(timestampPrefix());
    expect(stripped).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} $/);
  });
});

describe('print helpers', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('prints info to stderr with a magenta [sgr] label', () => {
    printInfo('Test message');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const output = String(errorSpy.mock.calls[0]?.[0]);
    expect(output).toContain('\x1b[35m[sgr]\x1b[0m Test message');
    expect(stripAnsi(output)).toMatch(
      /^\d{2}:\d{2}:\d{2}\.\d{3} \[sgr\] Test message$/
    );
  });

  it('uses yellow for warnings', () => {
    printWarning('careful');

    expect(String(errorSpy.mock.calls[0]?.[0])).toContain(
      '\x1b[33m[sgr]\x1b[0m careful'
    );
  });

  it('uses red for errors', () => {
    printError('broken');

    expect(String(errorSpy.mock.calls[0]?.[0])).toContain(
      '\x1b[31m[sgr]\x1b[0m broken'
    );
  });
});
