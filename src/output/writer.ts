/**
 * Writers that accept compiled text and run-time SGR codes
 */

import type { Writable } from 'stream';

import { createSgrBuilder, type SgrBuilder } from './builder.js';

/**
 * Minimal text sink
 */
export interface CapableWriter {
  write(text: string): void;
}

/**
 * Writer that keeps everything written in memory
 */
export interface StringWriter extends CapableWriter {
  /** Everything written so far */
  readonly text: string;
  clear(): void;
}

/**
 * Writer with SGR helpers on top of a CapableWriter
 */
export interface SgrWriter extends CapableWriter {
  /** A fresh, empty builder */
  builder(): SgrBuilder;
  /** Write codes as one complete ESC[...m sequence */
  sgr(codes: readonly number[]): void;
  /** Write codes joined by ';' without ESC[ and m */
  partialSgr(codes: readonly number[]): void;
  /** Flush a builder's pending codes as one sequence */
  place(builder: SgrBuilder): void;
}

export function createStringWriter(): StringWriter {
  let buffer = '';

  return {
    get text(): string {
      return buffer;
    },
    write(text: string): void {
      buffer += text;
    },
    clear(): void {
      buffer = '';
    },
  };
}

/**
 * Wrap a Node writable stream (stdout, a file stream, ...)
 */
export function createStreamWriter(stream: Writable): CapableWriter {
  return {
    write(text: string): void {
      stream.write(text);
    },
  };
}

export function createSgrWriter(inner: CapableWriter): SgrWriter {
  return {
    write(text: string): void {
      inner.write(text);
    },
    builder(): SgrBuilder {
      return createSgrBuilder();
    },
    sgr(codes: readonly number[]): void {
      createSgrBuilder(codes).writeTo(inner);
    },
    partialSgr(codes: readonly number[]): void {
      createSgrBuilder(codes).writePartial(inner);
    },
    place(builder: SgrBuilder): void {
      builder.writeTo(inner);
    },
  };
}
