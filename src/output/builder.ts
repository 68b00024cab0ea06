/**
 * SGR code buffer
 *
 * Accumulates numeric codes and frames them as ESC[c1;c2;...m on flush.
 * Used by the compiler for literal templates and by writers for codes only
 * known at run time.
 */

import {
  CSI,
  MAX_SGR_CODE,
  SGR_END,
  SGR_SEPARATOR,
} from '../utils/constants.js';
import type { CapableWriter } from './writer.js';

export interface SgrBuilder {
  /** Number of pending codes */
  readonly length: number;
  /** Append one code */
  writeCode(code: number): void;
  /** Append codes in order */
  writeCodes(codes: readonly number[]): void;
  /** Append one code, returning the builder for chaining */
  chainCode(code: number): SgrBuilder;
  /** Append codes, returning the builder for chaining */
  chainCodes(codes: readonly number[]): SgrBuilder;
  /** Pending codes, oldest first */
  codes(): number[];
  /** Return the framed sequence and clear; empty buffer yields '' */
  flush(): string;
  /** Return the joined codes without ESC[ and m, and clear */
  flushPartial(): string;
  /** Write the framed sequence to a writer and clear */
  writeTo(writer: CapableWriter): void;
  /** Write the joined codes without framing and clear */
  writePartial(writer: CapableWriter): void;
}

function assertCode(code: number): void {
  if (!Number.isInteger(code) || code < 0 || code > MAX_SGR_CODE) {
    throw new RangeError(
      `SGR code must be an integer from 0 to ${MAX_SGR_CODE}, got ${code}`
    );
  }
}

/**
 * Create an empty SGR builder
 */
export function createSgrBuilder(initial: readonly number[] = []): SgrBuilder {
  const pending: number[] = [];

  const builder: SgrBuilder = {
    get length(): number {
      return pending.length;
    },

    writeCode(code: number): void {
      assertCode(code);
      pending.push(code);
    },

    writeCodes(codes: readonly number[]): void {
      codes.forEach(assertCode);
      pending.push(...codes);
    },

    chainCode(code: number): SgrBuilder {
      builder.writeCode(code);
      return builder;
    },

    chainCodes(codes: readonly number[]): SgrBuilder {
      builder.writeCodes(codes);
      return builder;
    },

    codes(): number[] {
      return [...pending];
    },

    flush(): string {
      if (pending.length === 0) {
        return '';
      }
      return `${CSI}${builder.flushPartial()}${SGR_END}`;
    },

    flushPartial(): string {
      const text = pending.join(SGR_SEPARATOR);
      pending.length = 0;
      return text;
    },

    writeTo(writer: CapableWriter): void {
      const text = builder.flush();
      if (text) {
        writer.write(text);
      }
    },

    writePartial(writer: CapableWriter): void {
      const text = builder.flushPartial();
      if (text) {
        writer.write(text);
      }
    },
  };

  builder.writeCodes(initial);
  return builder;
}

/**
 * Frame codes as one complete SGR sequence
 */
export function sgr(...codes: number[]): string {
  return createSgrBuilder(codes).flush();
}
